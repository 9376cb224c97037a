import { z } from 'zod';
import { ValidationError } from '../core/errors';

export const DEFAULT_API_VERSION = '2.4';
export const DEFAULT_AUTH_HEADER = 'X-Tableau-Auth';
export const DEFAULT_TIMEOUT_MS = 30000;

/** Files at or above this size are published through an upload session */
export const DEFAULT_FILESIZE_LIMIT = 1024 * 1024 * 64;

/** Size of each piece appended to an upload session */
export const DEFAULT_CHUNK_SIZE = 1024 * 1024 * 5;

/**
 * Schema for the server connection and client behaviour
 */
export const serverConfigSchema = z.object({
  serverAddress: z.string().url(),
  apiVersion: z.string().regex(/^\d+\.\d+$/, 'must look like "3.4"').default(DEFAULT_API_VERSION),
  siteId: z.string().min(1).optional(),
  authToken: z.string().min(1).optional(),
  authHeaderName: z.string().min(1).default(DEFAULT_AUTH_HEADER),
  timeout: z.number().int().positive().default(DEFAULT_TIMEOUT_MS),
  retry: z.object({
    maxRetries: z.number().int().nonnegative().default(2),
    baseDelay: z.number().nonnegative().default(300)
  }).default({}),
  upload: z.object({
    filesizeLimit: z.number().int().positive().default(DEFAULT_FILESIZE_LIMIT),
    chunkSize: z.number().int().positive().default(DEFAULT_CHUNK_SIZE)
  }).default({})
});

export type ServerConfigInput = z.input<typeof serverConfigSchema>;
export type ServerConfig = z.output<typeof serverConfigSchema>;

const filterValueSchema = z.union([z.string(), z.number(), z.boolean()]);

export const sortSchema = z.object({
  field: z.string().min(1),
  direction: z.enum(['asc', 'desc'])
});

export const filterSchema = z.object({
  field: z.string().min(1),
  operator: z.enum(['eq', 'gt', 'gte', 'lt', 'lte', 'in', 'has']),
  value: z.union([filterValueSchema, z.array(filterValueSchema)])
});

/**
 * Schema for paging, sorting and filtering of list requests
 */
export const requestOptionsSchema = z.object({
  pageNumber: z.number().int().positive().default(1),
  pageSize: z.number().int().positive().max(1000).default(100),
  sort: z.array(sortSchema).default([]),
  filter: z.array(filterSchema).default([])
});

export type RequestOptionsInput = z.input<typeof requestOptionsSchema>;

/**
 * Validates input against a schema
 *
 * @param data - Data to validate
 * @param schema - Validation schema
 * @returns Validated, typed data with defaults applied
 * @throws ValidationError naming every failing path
 */
export function validateInput<Output, Input = Output>(
  data: unknown,
  schema: z.ZodType<Output, z.ZodTypeDef, Input>
): Output {
  const result = schema.safeParse(data);
  if (result.success) {
    return result.data;
  }

  const issues = result.error.issues.map(issue => {
    const path = issue.path.join('.');
    return `'${path}': ${issue.message}`;
  }).join('; ');

  const firstIssue = result.error.issues[0];
  const propertyName = firstIssue?.path.join('.');

  let expectedType: string | undefined;
  let receivedValue: unknown;
  if (firstIssue?.code === 'invalid_type') {
    expectedType = firstIssue.expected;
    receivedValue = firstIssue.received;
  }

  throw new ValidationError(
    `Validation failed: ${issues}`,
    propertyName,
    expectedType,
    receivedValue
  );
}
