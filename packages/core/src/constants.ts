/**
 * Fixed limits and defaults shared by the repositories, services and HTTP layer.
 */

export const MAX_ITEMS_PER_SPECIFICATION = 10;
export const DEFAULT_MAX_SPECIFICATIONS_PER_PROJECT = 100;

export const MAX_TITLE_LENGTH = 255;
export const MAX_CONTENT_LENGTH = 1000;

// Row ids are SERIAL (32-bit signed) columns
export const MAX_ROW_ID = 2147483647;

export const DEFAULT_PAGE_SIZE = 20;
export const MAX_PAGE_SIZE = 100;

export const CACHE_KEY_PREFIX = 'specnest';

export const ACCESS_TOKEN_TYPE = 'access';
export const TOKEN_BLACKLIST_PREFIX = 'blacklist';
export const MIN_JWT_SECRET_LENGTH = 32;

export const API_VERSION = 'v1';
export const APP_VERSION = '0.1.0';
