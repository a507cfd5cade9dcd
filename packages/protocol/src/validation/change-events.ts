// Change event wire validation
//
// The wire contract with upstream producers. Events are plain JSON objects;
// this module checks their shape and narrows them to ChangeEvent.

import { z } from 'zod';
import type { ChangeEvent } from '../types/changes.js';
import { isUrn } from '../types/urns.js';

const AspectPayloadSchema = z.record(z.unknown());

const SystemMetadataSchema = z
  .object({
    runId: z.string().min(1).optional(),
    lastObserved: z.number().int().nonnegative().optional(),
    properties: z.record(z.string()).optional(),
  })
  .strict();

const base = {
  entityUrn: z.string().refine(isUrn, { message: 'must be a URN (urn:<namespace>:<type>:<key>)' }),
  aspectName: z.string().min(1),
  systemMetadata: SystemMetadataSchema.optional(),
};

export const ChangeEventSchema: z.ZodType<ChangeEvent> = z.discriminatedUnion('changeType', [
  z
    .object({
      ...base,
      changeType: z.enum(['UPSERT', 'CREATE', 'UPDATE', 'RESTATE', 'CREATE_ENTITY']),
      payload: AspectPayloadSchema,
    })
    .strict(),
  z
    .object({
      ...base,
      changeType: z.literal('PATCH'),
      patch: AspectPayloadSchema,
    })
    .strict(),
  z
    .object({
      ...base,
      changeType: z.literal('DELETE'),
    })
    .strict(),
]);

export type ChangeEventIssue = {
  path: string;
  message: string;
};

export type ChangeEventValidationResult =
  | { valid: true; event: ChangeEvent }
  | { valid: false; issues: ChangeEventIssue[] };

/**
 * Validate an untrusted value against the change event wire contract.
 */
export function validateChangeEvent(value: unknown): ChangeEventValidationResult {
  const result = ChangeEventSchema.safeParse(value);
  if (result.success) {
    return { valid: true, event: result.data };
  }

  return {
    valid: false,
    issues: result.error.issues.map((issue) => ({
      path: issue.path.length > 0 ? issue.path.join('.') : '(root)',
      message: issue.message,
    })),
  };
}
