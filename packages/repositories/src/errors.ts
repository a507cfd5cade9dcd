// Repository error types

/**
 * Error when a conditional write finds a different current version than the
 * one it was planned against. Another writer committed first; the change can
 * be re-planned against the new state.
 */
export class VersionConflictError extends Error {
  readonly code = 'VERSION_CONFLICT';
  readonly entityUrn: string;
  readonly aspectName: string;
  readonly expectedVersion: number | null;
  readonly actualVersion: number | null;

  constructor(
    entityUrn: string,
    aspectName: string,
    expectedVersion: number | null,
    actualVersion: number | null
  ) {
    super(
      `Version conflict on ${aspectName} of ${entityUrn}: expected ${expectedVersion ?? 'none'}, found ${actualVersion ?? 'none'}`
    );
    this.name = 'VersionConflictError';
    this.entityUrn = entityUrn;
    this.aspectName = aspectName;
    this.expectedVersion = expectedVersion;
    this.actualVersion = actualVersion;
  }
}
