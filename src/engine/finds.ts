import { asc, desc, eq, inArray, sql } from 'drizzle-orm';
import { schema } from '../db/index.js';
import type { WorldDb } from '../db/index.js';
import type { SerialWriter } from './writer.js';
import type { WorldEventSink } from '../realtime/events.js';
import { NotFoundError } from './errors.js';
import { requireText } from './validate.js';
import type { FindRecord, UnmarkResult, UserFind } from '../types.js';

type FindRow = typeof schema.finds.$inferSelect;

function toFind(row: FindRow): FindRecord {
  return { id: row.id, objectId: row.objectId, foundBy: row.foundBy, foundAt: row.foundAt };
}

/**
 * Append-only record of who found what, and when.
 *
 * Rows are never updated. They leave the ledger only through unmarkFound,
 * resetAllFinds, or the cascade when their object is deleted.
 */
export class FindLedger {
  constructor(
    private readonly db: WorldDb,
    private readonly writer: SerialWriter,
    private readonly events: WorldEventSink,
  ) {}

  async markFound(objectId: string, foundBy: string): Promise<FindRecord> {
    const finder = requireText(foundBy, 'found_by');

    const record = await this.writer.run(`markFound(${objectId})`, () => {
      const object = this.db
        .select({ id: schema.objects.id })
        .from(schema.objects)
        .where(eq(schema.objects.id, objectId))
        .get();
      if (!object) {
        throw new NotFoundError(`Object ${objectId} not found`, objectId);
      }

      // Repeat visits are allowed: no check for an existing find by this finder.
      const row = this.db
        .insert(schema.finds)
        .values({ objectId, foundBy: finder, foundAt: new Date().toISOString() })
        .returning()
        .get();
      return toFind(row);
    });

    this.events.emit({
      type: 'object_collected',
      objectId: record.objectId,
      foundBy: record.foundBy,
      foundAt: record.foundAt,
    });
    return record;
  }

  /** Remove every find of an object. Succeeds with zero rows as "already unfound". */
  async unmarkFound(objectId: string): Promise<UnmarkResult> {
    const findsDeleted = await this.writer.run(`unmarkFound(${objectId})`, () => {
      return this.db.delete(schema.finds).where(eq(schema.finds.objectId, objectId)).run().changes;
    });

    this.events.emit({ type: 'object_uncollected', objectId, findsDeleted });
    return { objectId, findsDeleted, alreadyUnfound: findsDeleted === 0 };
  }

  async resetAllFinds(): Promise<{ findsDeleted: number }> {
    const findsDeleted = await this.writer.run('resetAllFinds', () => {
      return this.db.delete(schema.finds).run().changes;
    });

    console.log(`[Finds] Reset: ${findsDeleted} finds removed`);
    this.events.emit({ type: 'all_finds_reset', findsDeleted });
    return { findsDeleted };
  }

  // ─── Reads ───

  findsForObject(objectId: string): FindRecord[] {
    return this.db
      .select()
      .from(schema.finds)
      .where(eq(schema.finds.objectId, objectId))
      .orderBy(asc(schema.finds.id))
      .all()
      .map(toFind);
  }

  /** Finds for a set of objects, each list in insertion order. */
  findsForObjects(objectIds: readonly string[]): FindRecord[] {
    if (objectIds.length === 0) return [];
    return this.db
      .select()
      .from(schema.finds)
      .where(inArray(schema.finds.objectId, [...objectIds]))
      .orderBy(asc(schema.finds.id))
      .all()
      .map(toFind);
  }

  /** Objects a device has found, most recent find first. */
  findsByUser(deviceUuid: string): UserFind[] {
    return this.db
      .select({
        objectId: schema.objects.id,
        name: schema.objects.name,
        type: schema.objects.type,
        latitude: schema.objects.latitude,
        longitude: schema.objects.longitude,
        foundAt: schema.finds.foundAt,
      })
      .from(schema.finds)
      .innerJoin(schema.objects, eq(schema.finds.objectId, schema.objects.id))
      .where(eq(schema.finds.foundBy, deviceUuid))
      .orderBy(desc(schema.finds.id))
      .all();
  }

  countsByFinder(limit: number): Array<{ user: string; count: number }> {
    const count = sql<number>`count(*)`;
    return this.db
      .select({ user: schema.finds.foundBy, count })
      .from(schema.finds)
      .groupBy(schema.finds.foundBy)
      .orderBy(desc(count), asc(schema.finds.foundBy))
      .limit(limit)
      .all();
  }

  totals(): { totalFinds: number; foundObjects: number } {
    const row = this.db
      .select({
        totalFinds: sql<number>`count(*)`,
        foundObjects: sql<number>`count(distinct ${schema.finds.objectId})`,
      })
      .from(schema.finds)
      .get();
    return { totalFinds: row?.totalFinds ?? 0, foundObjects: row?.foundObjects ?? 0 };
  }
}
