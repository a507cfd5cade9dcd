import { eq, and, gte, lte, asc } from 'drizzle-orm';
import type { TimeseriesAspectInstance } from '@metagraph/protocol';
import type { Executor } from '../db.js';
import { timeseriesAspects } from '../schema/index.js';
import type {
  TimeseriesRepository,
  AppendTimeseriesInput,
  TimeseriesQuery,
} from '../../interfaces/index.js';

export class PgTimeseriesRepository implements TimeseriesRepository {
  constructor(
    private db: Executor,
    private batchSize = 500
  ) {}

  async append(input: AppendTimeseriesInput): Promise<TimeseriesAspectInstance> {
    const [row] = await this.db
      .insert(timeseriesAspects)
      .values({
        entityUrn: input.entityUrn,
        aspectName: input.aspectName,
        bucketTimestamp: input.bucketTimestamp,
        payload: input.payload,
        restatement: input.restatement,
        recordedAt: input.recordedAt ? new Date(input.recordedAt) : new Date(),
      })
      .returning();

    return this.rowToRecord(row);
  }

  query(query: TimeseriesQuery): AsyncIterable<TimeseriesAspectInstance> {
    const conditions = [
      eq(timeseriesAspects.entityUrn, query.entityUrn),
      eq(timeseriesAspects.aspectName, query.aspectName),
    ];

    if (query.range?.start !== undefined) {
      conditions.push(gte(timeseriesAspects.bucketTimestamp, query.range.start));
    }

    if (query.range?.end !== undefined) {
      conditions.push(lte(timeseriesAspects.bucketTimestamp, query.range.end));
    }

    const where = and(...conditions);

    // Nothing is fetched until iteration starts; each iteration pages from the top
    return {
      [Symbol.asyncIterator]: () =>
        this.paginate((offset) =>
          this.db
            .select()
            .from(timeseriesAspects)
            .where(where)
            .orderBy(asc(timeseriesAspects.bucketTimestamp), asc(timeseriesAspects.sequence))
            .limit(this.batchSize)
            .offset(offset)
        ),
    };
  }

  stream(): AsyncIterable<TimeseriesAspectInstance> {
    return {
      [Symbol.asyncIterator]: () =>
        this.paginate((offset) =>
          this.db
            .select()
            .from(timeseriesAspects)
            .orderBy(asc(timeseriesAspects.sequence))
            .limit(this.batchSize)
            .offset(offset)
        ),
    };
  }

  private async *paginate(
    fetchBatch: (offset: number) => PromiseLike<(typeof timeseriesAspects.$inferSelect)[]>
  ): AsyncGenerator<TimeseriesAspectInstance> {
    let offset = 0;

    while (true) {
      const batch = await fetchBatch(offset);

      for (const row of batch) {
        yield this.rowToRecord(row);
      }

      if (batch.length < this.batchSize) break;
      offset += this.batchSize;
    }
  }

  private rowToRecord(row: typeof timeseriesAspects.$inferSelect): TimeseriesAspectInstance {
    return {
      kind: 'timeseries',
      aspectName: row.aspectName,
      entityUrn: row.entityUrn,
      payload: row.payload,
      bucketTimestamp: row.bucketTimestamp,
      restatement: row.restatement,
      sequence: row.sequence,
      recordedAt: row.recordedAt.toISOString(),
    };
  }
}
