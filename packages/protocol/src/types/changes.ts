// Change events - typed mutations of aspect state

import type { AspectPayload, EpochMillis, Urn } from './common.js';

/**
 * Closed set of change types carried by change events.
 *
 * UPDATE is reserved: it is accepted on the wire but never executable.
 */
export const CHANGE_TYPES = [
  'UPSERT',
  'CREATE',
  'UPDATE',
  'DELETE',
  'PATCH',
  'RESTATE',
  'CREATE_ENTITY',
] as const;

export type ChangeType = (typeof CHANGE_TYPES)[number];

/**
 * Change types whose events carry a full payload
 */
export type PayloadChangeType = Exclude<ChangeType, 'DELETE' | 'PATCH'>;

/**
 * Producer-side metadata that travels with an event
 */
export type SystemMetadata = {
  runId?: string;
  lastObserved?: EpochMillis;
  properties?: Record<string, string>;
};

type ChangeEventBase = {
  entityUrn: Urn;
  aspectName: string;
  systemMetadata?: SystemMetadata;
};

export type PayloadChangeEvent = ChangeEventBase & {
  changeType: PayloadChangeType;
  payload: AspectPayload;
};

export type PatchChangeEvent = ChangeEventBase & {
  changeType: 'PATCH';

  /**
   * JSON merge patch applied to the current payload
   */
  patch: AspectPayload;
};

export type DeleteChangeEvent = ChangeEventBase & {
  changeType: 'DELETE';
};

export type ChangeEvent = PayloadChangeEvent | PatchChangeEvent | DeleteChangeEvent;

export function isChangeType(value: unknown): value is ChangeType {
  return typeof value === 'string' && (CHANGE_TYPES as readonly string[]).includes(value);
}

/**
 * Whether a failed delivery of this change type can be blindly retried.
 * UPSERT and DELETE converge to the same state when repeated; the rest do not.
 */
export function isRetrySafe(changeType: ChangeType): boolean {
  return changeType === 'UPSERT' || changeType === 'DELETE';
}

/**
 * Key used to serialize changes: one writer per (entity, aspect)
 */
export function changeKey(event: Pick<ChangeEvent, 'entityUrn' | 'aspectName'>): string {
  return `${event.entityUrn}\u0000${event.aspectName}`;
}
