/**
 * Types shared by every Prism resource.
 * @module types/common
 */

import { z } from 'zod';
import { UnexpectedResponseError } from '../errors/index.js';

/**
 * Field names with this prefix are managed by the service and are never sent back.
 */
export const RESERVED_FIELD_PREFIX = 'WPA_';

/**
 * Reference to a Workday object, either by `Category=Value` id or by display descriptor.
 */
export const TypeReferenceSchema = z
  .object({
    id: z.string().optional(),
    descriptor: z.string().optional(),
  })
  .passthrough();

export type TypeReference = z.infer<typeof TypeReferenceSchema>;

/**
 * Builds a `Category=Value` type reference, e.g. `Operation_Type=Insert`.
 */
export function typeReference(category: string, value: string): { id: string } {
  return { id: `${category}=${value}` };
}

/**
 * Load operations a bucket can apply to its target table.
 */
export const LOAD_OPERATIONS = ['Insert', 'Update', 'Upsert', 'Delete', 'TruncateAndInsert'] as const;

export type LoadOperation = (typeof LOAD_OPERATIONS)[number];

/**
 * Level of detail requested when reading a resource.
 */
export type OutputType = 'summary' | 'full' | 'permissions';

/**
 * Result of every list or search operation. `total` always equals `data.length`.
 */
export interface PagedResult<T> {
  total: number;
  data: T[];
}

/**
 * Envelope of a single list page as returned by the service.
 */
export function listPageSchema<T extends z.ZodTypeAny>(item: T) {
  return z
    .object({
      total: z.number().optional(),
      data: z.array(item),
    })
    .passthrough();
}

/**
 * Validates a response body, throwing UnexpectedResponseError with each issue.
 */
export function parsePayload<T extends z.ZodTypeAny>(schema: T, body: unknown, resource: string): z.infer<T> {
  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) =>
      issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
    );
    throw new UnexpectedResponseError(resource, issues);
  }
  return parsed.data;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
