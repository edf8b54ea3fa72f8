/**
 * Request Schemas
 *
 * zod schemas for every payload the API accepts, plus one validate function
 * per entity returning a Result so callers outside Express can use them.
 */

import { z } from 'zod';
import {
  DEFAULT_PAGE_SIZE,
  MAX_CONTENT_LENGTH,
  MAX_PAGE_SIZE,
  MAX_ROW_ID,
  MAX_TITLE_LENGTH,
} from '../constants.js';
import { ValidationError } from '../errors.js';
import type { FieldIssue } from '../errors.js';

const DANGEROUS_CHARS = /[<>&;]/;

export const TitleSchema = z
  .string({ required_error: 'is required', invalid_type_error: 'must be a string' })
  .trim()
  .min(1, 'must not be empty')
  .max(MAX_TITLE_LENGTH, `must be at most ${MAX_TITLE_LENGTH} characters`)
  .refine((value) => !DANGEROUS_CHARS.test(value), 'must not contain < > & or ;');

export const ContentSchema = z
  .string({ required_error: 'is required', invalid_type_error: 'must be a string' })
  .trim()
  .min(1, 'must not be empty')
  .max(MAX_CONTENT_LENGTH, `must be at most ${MAX_CONTENT_LENGTH} characters`);

export const IdParamSchema = z.coerce
  .number({ invalid_type_error: 'must be a number' })
  .int('must be an integer')
  .positive('must be positive')
  .max(MAX_ROW_ID, 'is out of range');

export const ProjectCreateSchema = z.object({ title: TitleSchema });
export const ProjectUpdateSchema = z.object({ title: TitleSchema });

export const ProjectListQuerySchema = z.object({
  page: z.coerce.number().int('must be an integer').min(1, 'must be at least 1').default(1),
  pageSize: z.coerce
    .number()
    .int('must be an integer')
    .min(1, `must be between 1 and ${MAX_PAGE_SIZE}`)
    .max(MAX_PAGE_SIZE, `must be between 1 and ${MAX_PAGE_SIZE}`)
    .default(DEFAULT_PAGE_SIZE),
  sort: z
    .enum(['asc', 'desc'], { errorMap: () => ({ message: "must be either 'asc' or 'desc'" }) })
    .default('desc'),
});

// Range checks on position and orderIndex belong to the ordering engine
export const ChildCreateSchema = z.object({
  content: ContentSchema,
  position: z.number().int('must be an integer').optional(),
});

export const ChildUpdateSchema = z.object({ content: ContentSchema });

export const MoveSchema = z.object({
  orderIndex: z.number({ required_error: 'is required' }).int('must be an integer'),
});

export const ReorderSchema = z.object({
  moves: z.array(
    z.object({
      id: z.number().int('must be an integer').positive('must be positive').max(MAX_ROW_ID, 'is out of range'),
      orderIndex: z.number().int('must be an integer'),
    })
  ),
});

export const AuthenticateSchema = z.object({
  token: z.string({ required_error: 'Missing OAuth token' }).min(1, 'Missing OAuth token'),
});

export type ProjectCreateInput = z.output<typeof ProjectCreateSchema>;
export type ProjectUpdateInput = z.output<typeof ProjectUpdateSchema>;
export type ChildCreateInput = z.output<typeof ChildCreateSchema>;
export type ChildUpdateInput = z.output<typeof ChildUpdateSchema>;
export type MoveInput = z.output<typeof MoveSchema>;
export type ReorderInput = z.output<typeof ReorderSchema>;
export type AuthenticateInput = z.output<typeof AuthenticateSchema>;

export type Result<T> = { ok: true; value: T } | { ok: false; error: ValidationError };

export function toFieldIssues(error: z.ZodError): FieldIssue[] {
  return error.issues.map((issue) => ({
    path: issue.path.length > 0 ? issue.path.join('.') : '(root)',
    message: issue.message,
  }));
}

export function validate<S extends z.ZodTypeAny>(schema: S, input: unknown): Result<z.output<S>> {
  const parsed = schema.safeParse(input);
  if (parsed.success) {
    return { ok: true, value: parsed.data };
  }
  const issues = toFieldIssues(parsed.error);
  return {
    ok: false,
    error: new ValidationError(issues.map((i) => `${i.path} ${i.message}`).join('; '), issues),
  };
}

export function parseOrThrow<S extends z.ZodTypeAny>(schema: S, input: unknown): z.output<S> {
  const result = validate(schema, input);
  if (!result.ok) throw result.error;
  return result.value;
}

export const validateProjectCreate = (input: unknown): Result<ProjectCreateInput> =>
  validate(ProjectCreateSchema, input);
export const validateProjectUpdate = (input: unknown): Result<ProjectUpdateInput> =>
  validate(ProjectUpdateSchema, input);
export const validateChildCreate = (input: unknown): Result<ChildCreateInput> =>
  validate(ChildCreateSchema, input);
export const validateChildUpdate = (input: unknown): Result<ChildUpdateInput> =>
  validate(ChildUpdateSchema, input);
export const validateMove = (input: unknown): Result<MoveInput> => validate(MoveSchema, input);
export const validateReorder = (input: unknown): Result<ReorderInput> => validate(ReorderSchema, input);
