import { and, between, desc, eq, sql } from 'drizzle-orm';
import type { SQL } from 'drizzle-orm';
import { schema } from '../db/index.js';
import type { WorldDb } from '../db/index.js';
import type { SerialWriter } from './writer.js';
import type { FindLedger } from './finds.js';
import type { WorldEventSink } from '../realtime/events.js';
import { ConflictError, NotFoundError, ValidationError, sqliteCode } from './errors.js';
import { hasAnyField, optionalNumber, optionalText, requireNumber, requireText } from './validate.js';
import { applyVisibility, groupFindsByObject, resolveVisibility } from './visibility.js';
import { WORLD } from '../world/config.js';
import type {
  ArPlacementPatch,
  LocationPatch,
  NewObjectInput,
  ObjectQuery,
  ObjectView,
  WorldObject,
} from '../types.js';

type ObjectRow = typeof schema.objects.$inferSelect;

function toObject(row: ObjectRow): WorldObject {
  return {
    id: row.id,
    name: row.name,
    type: row.type,
    latitude: row.latitude,
    longitude: row.longitude,
    radius: row.radius,
    createdAt: row.createdAt,
    createdBy: row.createdBy || WORLD.DEFAULT_CREATED_BY,
    groundingHeight: row.groundingHeight,
    ar: {
      arOriginLatitude: row.arOriginLatitude,
      arOriginLongitude: row.arOriginLongitude,
      arOffsetX: row.arOffsetX,
      arOffsetY: row.arOffsetY,
      arOffsetZ: row.arOffsetZ,
      arPlacementTimestamp: row.arPlacementTimestamp,
      arAnchorTransform: row.arAnchorTransform,
      arPlacementHeading: row.arPlacementHeading,
    },
    multifindable: row.multifindable,
  };
}

function checkArPatch(patch: ArPlacementPatch): ArPlacementPatch {
  return {
    arOriginLatitude: optionalNumber(patch.arOriginLatitude, 'ar_origin_latitude'),
    arOriginLongitude: optionalNumber(patch.arOriginLongitude, 'ar_origin_longitude'),
    arOffsetX: optionalNumber(patch.arOffsetX, 'ar_offset_x'),
    arOffsetY: optionalNumber(patch.arOffsetY, 'ar_offset_y'),
    arOffsetZ: optionalNumber(patch.arOffsetZ, 'ar_offset_z'),
    arPlacementTimestamp: optionalText(patch.arPlacementTimestamp, 'ar_placement_timestamp'),
    arAnchorTransform: optionalText(patch.arAnchorTransform, 'ar_anchor_transform'),
    arPlacementHeading: optionalNumber(patch.arPlacementHeading, 'ar_placement_heading'),
  };
}

/**
 * Lat/lon box around a center. An approximation (one degree ≈ 111 km), not a
 * geodesic distance.
 */
export function boundingBox(latitude: number, longitude: number, radiusMeters: number) {
  const latRange = radiusMeters / WORLD.METERS_PER_DEGREE;
  const lonRange = radiusMeters / (WORLD.METERS_PER_DEGREE * Math.abs(Math.cos((latitude * Math.PI) / 180)));
  return {
    minLat: latitude - latRange,
    maxLat: latitude + latRange,
    minLon: longitude - lonRange,
    maxLon: longitude + lonRange,
  };
}

/**
 * Authoritative record of placed objects.
 *
 * Writes are funnelled through the SerialWriter and emit exactly one event
 * after they commit. A failed write emits nothing.
 */
export class WorldStore {
  constructor(
    private readonly db: WorldDb,
    private readonly writer: SerialWriter,
    private readonly ledger: FindLedger,
    private readonly events: WorldEventSink,
  ) {}

  async createObject(input: NewObjectInput): Promise<ObjectView> {
    const values = {
      id: requireText(input.id, 'id'),
      name: requireText(input.name, 'name'),
      type: requireText(input.type, 'type'),
      latitude: requireNumber(input.latitude, 'latitude'),
      longitude: requireNumber(input.longitude, 'longitude'),
      radius: requireNumber(input.radius, 'radius'),
      createdAt: new Date().toISOString(),
      createdBy: input.createdBy || WORLD.DEFAULT_CREATED_BY,
      groundingHeight: optionalNumber(input.groundingHeight, 'grounding_height') ?? null,
      ...checkArPatch(input.ar ?? {}),
      multifindable: input.multifindable ?? false,
    };

    const row = await this.writer.run(`createObject(${values.id})`, () => {
      try {
        return this.db.insert(schema.objects).values(values).returning().get();
      } catch (err) {
        if (sqliteCode(err) === 'SQLITE_CONSTRAINT_PRIMARYKEY') {
          throw new ConflictError(`Object with id ${values.id} already exists`, values.id);
        }
        throw err;
      }
    });

    const object = toObject(row);
    const view: ObjectView = { ...object, ...resolveVisibility(object, []) };
    this.events.emit({ type: 'object_created', object: view });
    return view;
  }

  getObject(id: string, viewer?: string): ObjectView {
    const object = this.findObject(id);
    if (!object) {
      throw new NotFoundError(`Object ${id} not found`, id);
    }
    return { ...object, ...resolveVisibility(object, this.ledger.findsForObject(id), viewer) };
  }

  findObject(id: string): WorldObject | undefined {
    const row = this.db.select().from(schema.objects).where(eq(schema.objects.id, id)).get();
    return row ? toObject(row) : undefined;
  }

  // ─── Partial Updates ───

  updateLocation(id: string, patch: LocationPatch): Promise<ObjectView> {
    const values = {
      latitude: optionalNumber(patch.latitude, 'latitude') ?? undefined,
      longitude: optionalNumber(patch.longitude, 'longitude') ?? undefined,
    };
    return this.applyUpdate(id, 'updateLocation', values);
  }

  /** `null` clears the height. */
  updateGrounding(id: string, height: number | null | undefined): Promise<ObjectView> {
    return this.applyUpdate(id, 'updateGrounding', {
      groundingHeight: optionalNumber(height, 'grounding_height'),
    });
  }

  updateArOffset(id: string, patch: ArPlacementPatch): Promise<ObjectView> {
    return this.applyUpdate(id, 'updateArOffset', checkArPatch(patch));
  }

  private async applyUpdate(
    id: string,
    label: string,
    values: Partial<Omit<ObjectRow, 'id' | 'createdAt'>>,
  ): Promise<ObjectView> {
    if (!hasAnyField(values)) {
      throw new ValidationError(`${label}: no recognized field supplied`);
    }

    const row = await this.writer.run(`${label}(${id})`, () => {
      return this.db.update(schema.objects).set(values).where(eq(schema.objects.id, id)).returning().get();
    });
    if (!row) {
      throw new NotFoundError(`Object ${id} not found`, id);
    }

    const object = toObject(row);
    const view: ObjectView = { ...object, ...resolveVisibility(object, this.ledger.findsForObject(id)) };
    this.events.emit({ type: 'object_updated', object: view });
    return view;
  }

  /** Delete an object together with every find that references it. */
  async deleteObject(id: string): Promise<{ objectId: string; findsDeleted: number }> {
    const findsDeleted = await this.writer.run(`deleteObject(${id})`, () => {
      return this.db.transaction((tx) => {
        const removedFinds = tx.delete(schema.finds).where(eq(schema.finds.objectId, id)).run().changes;
        const removed = tx.delete(schema.objects).where(eq(schema.objects.id, id)).run().changes;
        if (removed === 0) {
          // Rolls back the transaction; nothing was deleted.
          throw new NotFoundError(`Object ${id} not found`, id);
        }
        return removedFinds;
      });
    });

    this.events.emit({ type: 'object_deleted', objectId: id, findsDeleted });
    return { objectId: id, findsDeleted };
  }

  // ─── Queries ───

  /** Objects in an optional area with visibility attached, newest first. */
  listObjects(query: ObjectQuery = {}): ObjectView[] {
    const conditions: SQL[] = [];

    if (query.radius !== undefined && query.radius < 0) {
      throw new ValidationError('Field radius must not be negative', 'radius');
    }

    if (query.latitude !== undefined && query.longitude !== undefined) {
      const box = boundingBox(query.latitude, query.longitude, query.radius ?? WORLD.DEFAULT_SEARCH_RADIUS_M);
      conditions.push(between(schema.objects.latitude, box.minLat, box.maxLat));
      conditions.push(between(schema.objects.longitude, box.minLon, box.maxLon));
    }

    const rows = this.db
      .select()
      .from(schema.objects)
      .where(conditions.length > 0 ? and(...conditions) : undefined)
      .orderBy(desc(schema.objects.createdAt), desc(sql`rowid`))
      .all();

    const objects = rows.map(toObject);
    const finds = groupFindsByObject(this.ledger.findsForObjects(objects.map((o) => o.id)));
    return applyVisibility(objects, finds, { viewer: query.viewer, includeFound: query.includeFound });
  }

  /** Every object, collected or not, as seen by `viewer`. Used for full resyncs. */
  listAllObjects(viewer?: string): ObjectView[] {
    return this.listObjects({ includeFound: true, viewer });
  }

  countObjects(): number {
    const row = this.db.select({ count: sql<number>`count(*)` }).from(schema.objects).get();
    return row?.count ?? 0;
  }
}
