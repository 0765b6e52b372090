import { asc, eq, sql } from 'drizzle-orm';
import { schema } from '../db/index.js';
import type { WorldDb } from '../db/index.js';
import type { SerialWriter } from './writer.js';
import type { FindLedger } from './finds.js';
import type { WorldStore } from './objects.js';
import { NotFoundError } from './errors.js';
import { requireText } from './validate.js';
import { WORLD } from '../world/config.js';
import type { Player, PlayerSummary, WorldStats } from '../types.js';

type PlayerRow = typeof schema.players.$inferSelect;

function toPlayer(row: PlayerRow): Player {
  return {
    deviceUuid: row.deviceUuid,
    playerName: row.playerName,
    createdAt: row.createdAt,
    updatedAt: row.updatedAt,
  };
}

export function shortUuid(deviceUuid: string): string {
  return deviceUuid.slice(0, 8);
}

/**
 * Names shown on the admin map. Player names are not unique; when two devices
 * share one, each gets its short device id appended.
 */
export function displayNames(players: ReadonlyArray<Pick<Player, 'deviceUuid' | 'playerName'>>): Map<string, string> {
  const nameCounts = new Map<string, number>();
  for (const p of players) {
    const name = p.playerName.trim();
    if (name) nameCounts.set(name, (nameCounts.get(name) ?? 0) + 1);
  }

  const names = new Map<string, string>();
  for (const p of players) {
    const name = p.playerName.trim();
    if (!name) {
      names.set(p.deviceUuid, `User ${shortUuid(p.deviceUuid)}`);
    } else if ((nameCounts.get(name) ?? 0) > 1) {
      names.set(p.deviceUuid, `${name} (${shortUuid(p.deviceUuid)})`);
    } else {
      names.set(p.deviceUuid, name);
    }
  }
  return names;
}

/**
 * Persisted player identities. The device uuid is the only identity; the
 * player name is a free-form label.
 */
export class PlayerRegistry {
  constructor(
    private readonly db: WorldDb,
    private readonly writer: SerialWriter,
    private readonly ledger: FindLedger,
    private readonly world: WorldStore,
    private readonly isConnected: (deviceUuid: string) => boolean = () => false,
  ) {}

  /** Create the player, or rename it if it already exists. */
  async upsertPlayer(deviceUuid: string, playerName: string): Promise<Player> {
    const uuid = requireText(deviceUuid, 'device_uuid');
    const name = requireText(playerName, 'player_name').trim();
    const now = new Date().toISOString();

    const row = await this.writer.run(`upsertPlayer(${uuid})`, () => {
      return this.db
        .insert(schema.players)
        .values({ deviceUuid: uuid, playerName: name, createdAt: now, updatedAt: now })
        .onConflictDoUpdate({
          target: schema.players.deviceUuid,
          set: { playerName: name, updatedAt: now },
        })
        .returning()
        .get();
    });
    return toPlayer(row);
  }

  getPlayer(deviceUuid: string): Player {
    const row = this.db.select().from(schema.players).where(eq(schema.players.deviceUuid, deviceUuid)).get();
    if (!row) {
      throw new NotFoundError(`Player ${deviceUuid} not found`, deviceUuid);
    }
    return toPlayer(row);
  }

  /** Remove the identity record. The player's finds stay in the ledger. */
  async deletePlayer(deviceUuid: string): Promise<void> {
    const removed = await this.writer.run(`deletePlayer(${deviceUuid})`, () => {
      return this.db.delete(schema.players).where(eq(schema.players.deviceUuid, deviceUuid)).run().changes;
    });
    if (removed === 0) {
      throw new NotFoundError(`Player ${deviceUuid} not found`, deviceUuid);
    }
  }

  listPlayers(): PlayerSummary[] {
    const rows = this.db
      .select()
      .from(schema.players)
      .orderBy(asc(schema.players.createdAt), asc(schema.players.deviceUuid))
      .all();
    const names = displayNames(rows);

    const counts = new Map<string, number>();
    const countRows = this.db
      .select({ user: schema.finds.foundBy, count: sql<number>`count(*)` })
      .from(schema.finds)
      .groupBy(schema.finds.foundBy)
      .all();
    for (const r of countRows) counts.set(r.user, r.count);

    return rows.map((row) => ({
      ...toPlayer(row),
      displayName: names.get(row.deviceUuid) ?? row.playerName,
      findCount: counts.get(row.deviceUuid) ?? 0,
      connected: this.isConnected(row.deviceUuid),
    }));
  }

  getStats(): WorldStats {
    const totalObjects = this.world.countObjects();
    const { totalFinds, foundObjects } = this.ledger.totals();
    const top = this.ledger.countsByFinder(WORLD.TOP_FINDERS_LIMIT);

    const players = this.db.select().from(schema.players).all();
    const names = displayNames(players);

    return {
      totalObjects,
      foundObjects,
      unfoundObjects: totalObjects - foundObjects,
      totalFinds,
      topFinders: top.map((t) => ({
        user: t.user,
        displayName: names.get(t.user) ?? t.user,
        count: t.count,
      })),
    };
  }
}
