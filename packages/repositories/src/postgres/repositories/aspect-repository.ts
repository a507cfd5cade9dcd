import { eq, and, asc } from 'drizzle-orm';
import type { Urn, Timestamp } from '@metagraph/protocol';
import type { Executor } from '../db.js';
import { aspects, aspectVersions } from '../schema/index.js';
import type {
  AspectRepository,
  StoredAspect,
  AspectVersion,
  WriteAspectInput,
} from '../../interfaces/index.js';
import { VersionConflictError } from '../../errors.js';

export class PgAspectRepository implements AspectRepository {
  constructor(
    private db: Executor,
    private batchSize = 500
  ) {}

  async get(entityUrn: Urn, aspectName: string): Promise<StoredAspect | null> {
    const [row] = await this.db
      .select()
      .from(aspects)
      .where(and(eq(aspects.entityUrn, entityUrn), eq(aspects.aspectName, aspectName)));

    return row ? this.rowToAspect(row) : null;
  }

  async write(input: WriteAspectInput): Promise<StoredAspect> {
    const lastModified = input.timestamp ? new Date(input.timestamp) : new Date();
    const values = {
      entityUrn: input.entityUrn,
      aspectName: input.aspectName,
      version: input.version,
      payload: input.payload,
      removed: false,
      changeType: input.changeType,
      lastModified,
    };

    return this.db.transaction(async (tx) => {
      // The row only changes hands when it still carries the expected version
      const [row] =
        input.expectedVersion === null
          ? await tx.insert(aspects).values(values).onConflictDoNothing().returning()
          : await tx
              .update(aspects)
              .set(values)
              .where(
                and(
                  eq(aspects.entityUrn, input.entityUrn),
                  eq(aspects.aspectName, input.aspectName),
                  eq(aspects.version, input.expectedVersion)
                )
              )
              .returning();

      if (!row) {
        const current = await this.currentVersion(tx, input.entityUrn, input.aspectName);
        throw new VersionConflictError(
          input.entityUrn,
          input.aspectName,
          input.expectedVersion,
          current
        );
      }

      await tx
        .insert(aspectVersions)
        .values({
          entityUrn: input.entityUrn,
          aspectName: input.aspectName,
          version: input.version,
          payload: input.payload,
          changeType: input.changeType,
          recordedAt: lastModified,
        })
        .onConflictDoUpdate({
          target: [aspectVersions.entityUrn, aspectVersions.aspectName, aspectVersions.version],
          set: {
            payload: input.payload,
            changeType: input.changeType,
            recordedAt: lastModified,
          },
        });

      return this.rowToAspect(row);
    });
  }

  async remove(
    entityUrn: Urn,
    aspectName: string,
    expectedVersion: number,
    timestamp?: Timestamp
  ): Promise<StoredAspect | null> {
    const [row] = await this.db
      .update(aspects)
      .set({
        payload: {},
        removed: true,
        changeType: 'DELETE',
        lastModified: timestamp ? new Date(timestamp) : new Date(),
      })
      .where(
        and(
          eq(aspects.entityUrn, entityUrn),
          eq(aspects.aspectName, aspectName),
          eq(aspects.removed, false),
          eq(aspects.version, expectedVersion)
        )
      )
      .returning();

    if (row) {
      return this.rowToAspect(row);
    }

    const current = await this.get(entityUrn, aspectName);
    if (!current || current.removed) {
      return null;
    }
    throw new VersionConflictError(entityUrn, aspectName, expectedVersion, current.version);
  }

  async history(entityUrn: Urn, aspectName: string): Promise<AspectVersion[]> {
    const rows = await this.db
      .select()
      .from(aspectVersions)
      .where(
        and(eq(aspectVersions.entityUrn, entityUrn), eq(aspectVersions.aspectName, aspectName))
      )
      .orderBy(asc(aspectVersions.version));

    return rows.map((r) => ({
      entityUrn: r.entityUrn,
      aspectName: r.aspectName,
      version: r.version,
      payload: r.payload,
      changeType: r.changeType,
      recordedAt: r.recordedAt.toISOString(),
    }));
  }

  async listByEntity(entityUrn: Urn): Promise<StoredAspect[]> {
    const rows = await this.db
      .select()
      .from(aspects)
      .where(and(eq(aspects.entityUrn, entityUrn), eq(aspects.removed, false)))
      .orderBy(asc(aspects.aspectName));

    return rows.map((r) => this.rowToAspect(r));
  }

  async *stream(): AsyncGenerator<StoredAspect> {
    let offset = 0;

    while (true) {
      const batch = await this.db
        .select()
        .from(aspects)
        .where(eq(aspects.removed, false))
        .orderBy(asc(aspects.entityUrn), asc(aspects.aspectName))
        .limit(this.batchSize)
        .offset(offset);

      for (const row of batch) {
        yield this.rowToAspect(row);
      }

      if (batch.length < this.batchSize) break;
      offset += this.batchSize;
    }
  }

  private async currentVersion(
    db: Executor,
    entityUrn: Urn,
    aspectName: string
  ): Promise<number | null> {
    const [row] = await db
      .select({ version: aspects.version })
      .from(aspects)
      .where(and(eq(aspects.entityUrn, entityUrn), eq(aspects.aspectName, aspectName)));

    return row?.version ?? null;
  }

  private rowToAspect(row: typeof aspects.$inferSelect): StoredAspect {
    return {
      entityUrn: row.entityUrn,
      aspectName: row.aspectName,
      version: row.version,
      payload: row.payload,
      removed: row.removed,
      lastModified: row.lastModified.toISOString(),
      changeType: row.changeType,
    };
  }
}
