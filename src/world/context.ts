import { openDatabase } from '../db/index.js';
import type { WorldDatabase } from '../db/index.js';
import { SerialWriter } from '../engine/writer.js';
import type { WriterOptions } from '../engine/writer.js';
import { FindLedger } from '../engine/finds.js';
import { WorldStore } from '../engine/objects.js';
import { PlayerRegistry } from '../engine/players.js';
import { PresenceRegistry } from '../engine/presence.js';
import { LiveLocations } from '../engine/locations.js';
import { Broadcaster } from '../realtime/broadcast.js';
import type { SessionTransport } from '../realtime/broadcast.js';
import { combineSinks } from '../realtime/events.js';
import { Reconciler } from '../realtime/reconcile.js';
import { SocketGateway } from '../realtime/gateway.js';
import { MemoryCache, invalidateOnEvents } from '../services/cache.js';
import { SERVER } from './config.js';
import type { WorldStats } from '../types.js';

export interface WorldOptions {
  transport: SessionTransport;
  /** Defaults to DB_PATH, or data/world.db. */
  dbPath?: string;
  writer?: WriterOptions;
  batchSize?: number;
  resyncIntervalMs?: number;
  locationFreshnessMs?: number;
  now?: () => number;
}

/** Every service of one running world, wired together. */
export interface World {
  database: WorldDatabase;
  writer: SerialWriter;
  ledger: FindLedger;
  objects: WorldStore;
  players: PlayerRegistry;
  presence: PresenceRegistry;
  locations: LiveLocations;
  broadcaster: Broadcaster;
  reconciler: Reconciler;
  gateway: SocketGateway;
  statsCache: MemoryCache<WorldStats>;
  close(): void;
}

export function createWorld(options: WorldOptions): World {
  const database = openDatabase(options.dbPath ?? (SERVER.DB_PATH || undefined));
  const writer = new SerialWriter(options.writer);

  const presence = new PresenceRegistry(options.transport);
  const broadcaster = new Broadcaster(options.transport, () => presence.allSessions());
  const statsCache = new MemoryCache<WorldStats>();

  // Cache first: a stats read triggered by a broadcast must not see stale data.
  const events = combineSinks(invalidateOnEvents(statsCache), broadcaster);

  const ledger = new FindLedger(database.db, writer, events);
  const objects = new WorldStore(database.db, writer, ledger, events);
  const players = new PlayerRegistry(database.db, writer, ledger, objects, (uuid) => presence.isConnected(uuid));
  const locations = new LiveLocations(database.db, writer, events, options.locationFreshnessMs, options.now);
  const reconciler = new Reconciler(objects, presence, broadcaster, options.batchSize, options.resyncIntervalMs);
  const gateway = new SocketGateway(presence, reconciler, broadcaster, undefined, options.now);

  return {
    database,
    writer,
    ledger,
    objects,
    players,
    presence,
    locations,
    broadcaster,
    reconciler,
    gateway,
    statsCache,
    close() {
      reconciler.stop();
      statsCache.destroy();
      database.close();
    },
  };
}
