// Change Event Processor - applies change events to the aspect stores
//
// Events for one (entity, aspect) run one at a time in arrival order; events
// for different keys run concurrently. Every check happens before the first
// write, so a rejected event leaves no trace in storage.

import {
  changeKey,
  type ChangeEvent,
  type IndexUpdate,
  type PayloadChangeEvent,
  type TimeseriesAspectInstance,
  type VersionedAspectInstance,
} from '@metagraph/protocol';
import {
  runInTransaction,
  VersionConflictError,
  type RepositoryContext,
  type StoredAspect,
  type TransactionalRepositoryContext,
} from '@metagraph/repositories';
import {
  InvalidFieldValueError,
  RuntimeError,
  UnknownFieldError,
  UnsupportedForTimeseriesError,
  UnsupportedOperationError,
} from '../errors.js';
import { createIndexResolver, type IndexResolver } from '../indexing/resolver.js';
import { silentLogger, type Logger } from '../logging/index.js';
import type { AspectRegistry, ResolvedAspectDescriptor } from '../registry/index.js';
import { KeyedLock } from './keyed-lock.js';
import { planTransition, stateOf, type TransitionPlan } from './transitions.js';

/**
 * Receives index updates after their change has committed
 */
export type IndexSink = {
  submit(update: IndexUpdate): Promise<void> | void;
};

export type ChangeOutcome = TransitionPlan['outcome'] | 'appended';

export type IndexDelivery = { delivered: true } | { delivered: false; error: Error };

export type ChangeResult = {
  event: ChangeEvent;
  outcome: ChangeOutcome;

  /**
   * Live versioned instance before the change; null for time-series changes
   */
  previous: VersionedAspectInstance | null;

  /**
   * Instance written by the change; null for deletes and no-ops
   */
  current: VersionedAspectInstance | TimeseriesAspectInstance | null;
  indexUpdate: IndexUpdate | null;

  /**
   * null when there is no sink or nothing to index
   */
  indexDelivery: IndexDelivery | null;
};

/**
 * Errors a single event can be rejected with
 */
export type ChangeError = RuntimeError | VersionConflictError;

export type SettledChange =
  | { ok: true; result: ChangeResult }
  | { ok: false; event: ChangeEvent; error: ChangeError };

export type ChangeProcessorOptions = {
  registry: AspectRegistry;
  repos: RepositoryContext | TransactionalRepositoryContext;
  logger?: Logger;
  indexSink?: IndexSink;

  /**
   * Clock for lastModified and recordedAt (default: system time)
   */
  now?: () => Date;
};

export type ChangeProcessor = {
  /**
   * Apply one event. Rejects with a ChangeError when the event is not allowed.
   */
  process(event: ChangeEvent): Promise<ChangeResult>;

  /**
   * Apply a batch. Events are queued in iteration order, so events sharing a
   * key apply in that order. Rejections are returned, not thrown; any other
   * error rejects the whole batch.
   */
  processAll(events: Iterable<ChangeEvent>): Promise<SettledChange[]>;
};

export function isChangeError(error: unknown): error is ChangeError {
  return error instanceof RuntimeError || error instanceof VersionConflictError;
}

function toInstance(stored: StoredAspect): VersionedAspectInstance {
  return {
    kind: 'versioned',
    aspectName: stored.aspectName,
    entityUrn: stored.entityUrn,
    payload: stored.payload,
    version: stored.version,
    lastModified: stored.lastModified,
  };
}

type Applied = Omit<ChangeResult, 'indexDelivery'>;

export function createChangeProcessor(options: ChangeProcessorOptions): ChangeProcessor {
  const { registry, repos, indexSink } = options;
  const logger = options.logger ?? silentLogger;
  const now = options.now ?? (() => new Date());
  const resolver: IndexResolver = createIndexResolver(registry);
  const lock = new KeyedLock();

  const inTransaction = <T>(fn: (ctx: RepositoryContext) => Promise<T>): Promise<T> =>
    runInTransaction(repos, fn);

  function validateInput(descriptor: ResolvedAspectDescriptor, event: ChangeEvent): void {
    switch (event.changeType) {
      case 'DELETE':
        return;
      case 'PATCH':
        for (const key of Object.keys(event.patch)) {
          if (!descriptor.fieldsByName.has(key)) {
            throw new UnknownFieldError(descriptor.name, key);
          }
        }
        return;
      default:
        registry.assertValid(descriptor.name, event.payload);
    }
  }

  async function appendTimeseries(
    descriptor: ResolvedAspectDescriptor,
    event: PayloadChangeEvent
  ): Promise<Applied> {
    registry.assertValid(descriptor.name, event.payload);

    const bucketTimestamp = event.payload.timestampMillis;
    if (typeof bucketTimestamp !== 'number' || !Number.isInteger(bucketTimestamp)) {
      throw new InvalidFieldValueError(descriptor.name, 'timestampMillis', 'must be an integer');
    }

    const restatement = event.changeType === 'RESTATE';
    const record = await repos.timeseries.append({
      entityUrn: event.entityUrn,
      aspectName: event.aspectName,
      bucketTimestamp,
      payload: event.payload,
      restatement,
      recordedAt: now().toISOString(),
    });

    return {
      event,
      outcome: restatement ? 'restated' : 'appended',
      previous: null,
      current: record,
      indexUpdate: resolver.timeseriesUpdate(record, restatement ? 'reindex' : 'append'),
    };
  }

  function applyTimeseries(descriptor: ResolvedAspectDescriptor, event: ChangeEvent): Promise<Applied> {
    switch (event.changeType) {
      case 'DELETE':
      case 'PATCH':
      case 'CREATE_ENTITY':
        throw new UnsupportedForTimeseriesError(event.changeType, event.aspectName);
      case 'UPDATE':
        throw new UnsupportedOperationError(event.changeType, event.aspectName);
      case 'CREATE':
      case 'UPSERT':
      case 'RESTATE':
        return appendTimeseries(descriptor, event);
    }
  }

  async function applyVersioned(ctx: RepositoryContext, event: ChangeEvent): Promise<Applied> {
    const stored = await ctx.aspects.get(event.entityUrn, event.aspectName);
    const plan = planTransition(stateOf(stored), event);
    const previous = stored && !stored.removed ? toInstance(stored) : null;
    const timestamp = now().toISOString();

    switch (plan.action) {
      case 'none':
        return { event, outcome: plan.outcome, previous, current: null, indexUpdate: null };

      case 'remove':
        await ctx.aspects.remove(event.entityUrn, event.aspectName, plan.version, timestamp);
        return {
          event,
          outcome: plan.outcome,
          previous,
          current: null,
          indexUpdate: resolver.deletionUpdate(event.entityUrn, event.aspectName, plan.version),
        };

      case 'write': {
        if (plan.outcome === 'patched') {
          registry.assertValid(event.aspectName, plan.payload);
        }
        const written = await ctx.aspects.write({
          entityUrn: event.entityUrn,
          aspectName: event.aspectName,
          version: plan.version,
          payload: plan.payload,
          changeType: event.changeType,
          expectedVersion: stored?.version ?? null,
          timestamp,
        });
        const current = toInstance(written);
        return {
          event,
          outcome: plan.outcome,
          previous,
          current,
          indexUpdate: resolver.versionedUpdate(
            current,
            plan.outcome === 'restated' ? 'reindex' : 'upsert'
          ),
        };
      }
    }
  }

  async function deliver(update: IndexUpdate | null): Promise<IndexDelivery | null> {
    if (!indexSink || !update) {
      return null;
    }
    try {
      await indexSink.submit(update);
      return { delivered: true };
    } catch (error) {
      const err = error instanceof Error ? error : new Error(String(error));
      logger.error(`Index sink failed for ${update.aspectName} of ${update.entityUrn}`, {
        action: update.action,
        error: err.message,
      });
      return { delivered: false, error: err };
    }
  }

  async function apply(event: ChangeEvent): Promise<ChangeResult> {
    let applied: Applied;
    try {
      const descriptor = registry.describe(event.aspectName);
      if (descriptor.kind === 'timeseries') {
        applied = await applyTimeseries(descriptor, event);
      } else {
        validateInput(descriptor, event);
        applied = await inTransaction((ctx) => applyVersioned(ctx, event));
      }
    } catch (error) {
      if (isChangeError(error)) {
        logger.info(`Rejected ${event.changeType} of ${event.aspectName}`, {
          entityUrn: event.entityUrn,
          code: error.code,
          error: error.message,
        });
      }
      throw error;
    }

    logger.debug(`Applied ${event.changeType} of ${event.aspectName}`, {
      entityUrn: event.entityUrn,
      outcome: applied.outcome,
      version: applied.current?.kind === 'versioned' ? applied.current.version : undefined,
    });

    return { ...applied, indexDelivery: await deliver(applied.indexUpdate) };
  }

  const process = (event: ChangeEvent): Promise<ChangeResult> =>
    lock.run(changeKey(event), () => apply(event));

  return {
    process,

    processAll(events) {
      return Promise.all(
        Array.from(events, async (event): Promise<SettledChange> => {
          try {
            return { ok: true, result: await process(event) };
          } catch (error) {
            if (isChangeError(error)) {
              return { ok: false, event, error };
            }
            throw error;
          }
        })
      );
    },
  };
}
