import { desc } from 'drizzle-orm';
import { schema } from '../db/index.js';
import type { WorldDb } from '../db/index.js';
import type { SerialWriter } from './writer.js';
import type { WorldEventSink } from '../realtime/events.js';
import { ValidationError } from './errors.js';
import { optionalNumber, requireNumber, requireText } from './validate.js';
import { SYNC, WORLD } from '../world/config.js';
import type { ArOffset, LiveLocation, LocationUpdate, MapCenter } from '../types.js';

function checkArOffset(offset: ArOffset | null | undefined): ArOffset | null {
  if (!offset) return null;
  return {
    x: requireNumber(offset.x, 'ar_offset_x'),
    y: requireNumber(offset.y, 'ar_offset_y'),
    z: requireNumber(offset.z, 'ar_offset_z'),
  };
}

/**
 * Where each device was last seen. Last write wins per device, in arrival
 * order. Stale entries stay in memory but drop out of the active list.
 * Every update is also saved as the device's last known position.
 */
export class LiveLocations {
  private readonly locations = new Map<string, LiveLocation>();

  constructor(
    private readonly db: WorldDb,
    private readonly writer: SerialWriter,
    private readonly events: WorldEventSink,
    private readonly freshnessMs: number = SYNC.LOCATION_FRESHNESS_MS,
    private readonly now: () => number = Date.now,
  ) {}

  async update(deviceUuid: string, update: LocationUpdate): Promise<LiveLocation> {
    const uuid = requireText(deviceUuid, 'device_uuid');
    const latitude = requireNumber(update.latitude, 'latitude');
    const longitude = requireNumber(update.longitude, 'longitude');
    if (Math.abs(latitude) > 90 || Math.abs(longitude) > 180) {
      throw new ValidationError(`Coordinates out of range: ${latitude}, ${longitude}`, 'latitude');
    }

    const location: LiveLocation = {
      deviceUuid: uuid,
      latitude,
      longitude,
      accuracy: optionalNumber(update.accuracy, 'accuracy') ?? null,
      heading: optionalNumber(update.heading, 'heading') ?? null,
      arOffset: checkArOffset(update.arOffset),
      updatedAt: new Date(this.now()).toISOString(),
    };

    await this.writer.run(`saveLastLocation(${uuid})`, () => {
      this.db
        .insert(schema.userLastLocations)
        .values({ deviceUuid: uuid, latitude, longitude, updatedAt: location.updatedAt })
        .onConflictDoUpdate({
          target: schema.userLastLocations.deviceUuid,
          set: { latitude, longitude, updatedAt: location.updatedAt },
        })
        .run();
    });

    this.locations.set(uuid, location);
    this.events.emit({ type: 'user_location_updated', location });
    return location;
  }

  get(deviceUuid: string): LiveLocation | undefined {
    return this.locations.get(deviceUuid);
  }

  /** Locations updated within the freshness window. */
  listActive(): LiveLocation[] {
    const cutoff = this.now() - this.freshnessMs;
    return [...this.locations.values()].filter((l) => Date.parse(l.updatedAt) >= cutoff);
  }

  /** Most recent last-known position across all devices, else the configured default. */
  defaultCenter(): MapCenter {
    const row = this.db
      .select()
      .from(schema.userLastLocations)
      .orderBy(desc(schema.userLastLocations.updatedAt))
      .limit(1)
      .get();

    if (row) {
      return { latitude: row.latitude, longitude: row.longitude, source: 'last_known', deviceUuid: row.deviceUuid };
    }
    return { ...WORLD.DEFAULT_MAP_CENTER, source: 'default' };
  }
}
