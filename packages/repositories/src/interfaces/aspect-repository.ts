import type { AspectPayload, ChangeType, Timestamp, Urn } from '@metagraph/protocol';

/**
 * Current row for a versioned aspect.
 *
 * A removed aspect keeps its row as a tombstone so the next write continues
 * the version sequence instead of restarting it.
 */
export type StoredAspect = {
  entityUrn: Urn;
  aspectName: string;
  version: number;
  payload: AspectPayload;
  removed: boolean;
  lastModified: Timestamp;

  /**
   * Change type of the last write
   */
  changeType: ChangeType;
};

/**
 * One entry of an aspect's version history
 */
export type AspectVersion = {
  entityUrn: Urn;
  aspectName: string;
  version: number;
  payload: AspectPayload;
  changeType: ChangeType;
  recordedAt: Timestamp;
};

export type WriteAspectInput = {
  entityUrn: Urn;
  aspectName: string;
  version: number;
  payload: AspectPayload;
  changeType: ChangeType;

  /**
   * Version of the current row the write was planned against;
   * null when no row (not even a tombstone) exists.
   */
  expectedVersion: number | null;

  /**
   * ISO 8601, defaults to now
   */
  timestamp?: Timestamp;
};

/**
 * Repository interface for versioned aspects.
 *
 * Writes are conditional on `expectedVersion`. Implementations MUST throw
 * VersionConflictError when the current version differs, so that concurrent
 * writers in different processes cannot both commit the same version.
 */
export interface AspectRepository {
  /**
   * Get the current row, tombstones included
   * @returns StoredAspect or null if the aspect was never written
   */
  get(entityUrn: Urn, aspectName: string): Promise<StoredAspect | null>;

  /**
   * Write a new current value and record it in the version history.
   * Writing the current version again (restatement) replaces that history entry.
   */
  write(input: WriteAspectInput): Promise<StoredAspect>;

  /**
   * Turn the current row into a tombstone.
   * @returns The tombstone, or null if there was nothing to remove
   */
  remove(
    entityUrn: Urn,
    aspectName: string,
    expectedVersion: number,
    timestamp?: Timestamp
  ): Promise<StoredAspect | null>;

  /**
   * Version history, oldest first
   */
  history(entityUrn: Urn, aspectName: string): Promise<AspectVersion[]>;

  /**
   * All live (non-removed) aspects of an entity, ordered by aspect name
   */
  listByEntity(entityUrn: Urn): Promise<StoredAspect[]>;

  /**
   * Stream every live aspect for export, ordered by entity then aspect name
   */
  stream(): AsyncIterable<StoredAspect>;
}
