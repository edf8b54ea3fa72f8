import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { readFile } from 'fs/promises';
import { loadSettings, getSpecnestDir, getSettingsFilePath, redactSettings } from '../settings.js';
import { SettingsError } from '../errors.js';

// Mock fs/promises module
vi.mock('fs/promises', () => ({
  readFile: vi.fn(),
}));

// Mock os module
vi.mock('os', () => ({
  homedir: vi.fn(() => '/mock/home'),
}));

const SECRET = 'test-secret-test-secret-test-secret';

function missingFile(): void {
  vi.mocked(readFile).mockRejectedValue(Object.assign(new Error('ENOENT: no such file'), { code: 'ENOENT' }));
}

describe('settings', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('path helpers', () => {
    it('getSpecnestDir returns home directory path by default', () => {
      expect(getSpecnestDir({})).toBe('/mock/home/.specnest');
    });

    it('getSettingsFilePath honours SPECNEST_HOME', () => {
      expect(getSettingsFilePath({ SPECNEST_HOME: '/srv/specnest' })).toBe('/srv/specnest/config.json');
    });
  });

  describe('loadSettings', () => {
    it('loadSettings_FileMissing_ReturnsDefaults', async () => {
      missingFile();

      const settings = await loadSettings({ JWT_SECRET: SECRET });

      expect(settings).toEqual({
        server: { port: 3000, host: 'localhost', corsOrigins: ['*'], production: false },
        database: { url: null, poolSize: 10 },
        redis: { url: null },
        auth: {
          jwtSecret: SECRET,
          jwtExpiryHours: 24,
          googleClientId: null,
          maxFailedAttempts: 5,
          lockoutMinutes: 15,
        },
        limits: { maxSpecificationsPerProject: 100 },
        rateLimit: { requestsPerHour: 1000, authenticatePerHour: 20 },
        cache: { projectTtlSeconds: 300, specificationTtlSeconds: 120, itemTtlSeconds: 120 },
        logLevel: 'info',
      });
      expect(readFile).toHaveBeenCalledWith('/mock/home/.specnest/config.json', 'utf-8');
    });

    it('loadSettings_EnvAndFile_EnvWins', async () => {
      vi.mocked(readFile).mockResolvedValue(
        JSON.stringify({ server: { port: 4000, host: '0.0.0.0' }, limits: { maxSpecificationsPerProject: 50 } })
      );

      const settings = await loadSettings({ JWT_SECRET: SECRET, PORT: '5000' });

      expect(settings.server.port).toBe(5000);
      expect(settings.server.host).toBe('0.0.0.0');
      expect(settings.limits.maxSpecificationsPerProject).toBe(50);
    });

    it('loadSettings_CorsOrigins_SplitsAndTrims', async () => {
      missingFile();

      const settings = await loadSettings({
        JWT_SECRET: SECRET,
        CORS_ORIGINS: 'https://a.example, https://b.example,',
      });

      expect(settings.server.corsOrigins).toEqual(['https://a.example', 'https://b.example']);
    });

    it('loadSettings_ShortSecret_ThrowsSettingsError', async () => {
      missingFile();

      await expect(loadSettings({ JWT_SECRET: 'short' })).rejects.toThrow(
        'Invalid settings: auth.jwtSecret must be at least 32 characters'
      );
    });

    it('loadSettings_SeveralInvalidValues_ListsEveryPath', async () => {
      missingFile();

      const error = await loadSettings({ JWT_SECRET: SECRET, PORT: 'abc', RATE_LIMIT_PER_HOUR: '0' }).catch(
        (e: unknown) => e
      );

      expect(error).toBeInstanceOf(SettingsError);
      if (!(error instanceof SettingsError)) return;
      expect(error.issues.map((issue) => issue.path)).toEqual(['server.port', 'rateLimit.requestsPerHour']);
    });

    it('loadSettings_ProductionWithoutSecret_Throws', async () => {
      missingFile();

      await expect(loadSettings({ NODE_ENV: 'production' })).rejects.toThrow(
        'Invalid settings: auth.jwtSecret is required'
      );
    });

    it('loadSettings_ProductionEnv_SetsProductionFlag', async () => {
      missingFile();

      const settings = await loadSettings({ NODE_ENV: 'production', JWT_SECRET: SECRET });

      expect(settings.server.production).toBe(true);
    });

    it('loadSettings_DevelopmentWithoutSecret_GeneratesOne', async () => {
      missingFile();

      const settings = await loadSettings({});

      expect(settings.auth.jwtSecret).toMatch(/^[0-9a-f]{64}$/);
    });

    it('loadSettings_CorruptFile_FallsBackToDefaults', async () => {
      vi.mocked(readFile).mockResolvedValue('{ not json');

      const settings = await loadSettings({ JWT_SECRET: SECRET });

      expect(settings.server.port).toBe(3000);
    });

    it('loadSettings_DebugFlag_SetsDebugLevel', async () => {
      missingFile();

      const settings = await loadSettings({ JWT_SECRET: SECRET, SPECNEST_DEBUG: '1', SPECNEST_LOG_LEVEL: 'warn' });

      expect(settings.logLevel).toBe('debug');
    });
  });

  describe('redactSettings', () => {
    it('redactSettings_MasksSecretsAndPasswords', async () => {
      missingFile();
      const settings = await loadSettings({
        JWT_SECRET: SECRET,
        DATABASE_URL: 'postgres://app:pw@db:5432/specnest',
        GOOGLE_CLIENT_ID: 'client-id',
      });

      const redacted = redactSettings(settings);

      expect(redacted.auth.jwtSecret).toBe('********');
      expect(redacted.auth.googleClientId).toBe('********');
      expect(redacted.database.url).toBe('postgres://app:****@db:5432/specnest');
    });
  });
});
