/**
 * Validation Utilities
 *
 * Zod schemas for queue messages and the helper that turns a failed parse
 * into a `ValidationError`.
 */

import { z } from 'zod';

import type { JsonValue } from '../types/common';
import type { IngestionJob } from '../types/models';
import { ValidationError } from './errors';

// =============================================================================
// COMMON SCHEMAS
// =============================================================================

export const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(JsonValueSchema),
    z.record(JsonValueSchema),
  ])
);

const requiredString = (field: string) =>
  z.string({ required_error: `${field} is required` }).trim().min(1, `${field} must not be empty`);

// =============================================================================
// QUEUE MESSAGE SCHEMAS
// =============================================================================

/**
 * Body of a "data package ready" message.
 */
export const IngestionJobMessageSchema = z.object({
  packageID: requiredString('packageID'),
  userID: requiredString('userID'),
  consentTokenID: z
    .string()
    .trim()
    .min(1, 'consentTokenID must not be empty')
    .nullish()
    .transform((value) => value ?? null),
  rawDataReference: requiredString('rawDataReference'),
  dataType: requiredString('dataType'),
  sourceDescription: z.string().nullish().transform((value) => value ?? null),
  metadata: z.record(JsonValueSchema).nullish().transform((value) => value ?? {}),
});

export type IngestionJobMessage = z.infer<typeof IngestionJobMessageSchema>;

// =============================================================================
// VALIDATION HELPERS
// =============================================================================

/**
 * Validate data against a schema, throwing a ValidationError on failure.
 */
export function validate<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  data: unknown,
  fieldName?: string
): T {
  const result = schema.safeParse(data);

  if (!result.success) {
    const firstError = result.error.issues[0];
    const field = fieldName || firstError?.path.join('.') || undefined;
    throw new ValidationError(firstError?.message ?? 'Invalid value', field, {
      errors: result.error.issues,
    });
  }

  return result.data;
}

/**
 * Parse a raw queue body into an ingestion job.
 */
export function parseJobMessage(body: string, sqsMessageId?: string): IngestionJob {
  let payload: unknown;
  try {
    payload = JSON.parse(body);
  } catch {
    throw new ValidationError('Message body is not valid JSON', 'body');
  }

  const message = validate(IngestionJobMessageSchema, payload);
  return { ...message, sqsMessageId };
}
