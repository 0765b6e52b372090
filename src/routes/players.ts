import { Hono } from 'hono';
import type { World } from '../world/context.js';
import { requireText } from '../engine/validate.js';
import { CACHE_KEYS } from '../services/cache.js';
import { readBody } from './params.js';
import type { Player, PlayerSummary } from '../types.js';

function toWirePlayer(player: Player) {
  return {
    device_uuid: player.deviceUuid,
    player_name: player.playerName,
    created_at: player.createdAt,
    updated_at: player.updatedAt,
  };
}

function toWireSummary(player: PlayerSummary) {
  return {
    ...toWirePlayer(player),
    display_name: player.displayName,
    find_count: player.findCount,
    connected: player.connected,
  };
}

export function playerRoutes(world: World): Hono {
  const players = new Hono();

  players.get('/', (c) => {
    const list = world.players.listPlayers();
    return c.json({ players: list.map(toWireSummary), count: list.length });
  });

  // Registered before /:deviceUuid so "connected" is not taken as a device id.
  players.get('/connected', (c) => {
    const clients = world.presence.listConnected().map((d) => ({
      device_uuid: d.deviceUuid,
      session_count: d.sessionCount,
      session_ids: d.sessionIds,
    }));
    return c.json({ clients, count: clients.length });
  });

  players.get('/:deviceUuid', (c) => {
    return c.json(toWirePlayer(world.players.getPlayer(c.req.param('deviceUuid'))));
  });

  // POST /api/players/:deviceUuid — create or rename
  players.post('/:deviceUuid', async (c) => {
    const body = await readBody(c);
    const player = await world.players.upsertPlayer(c.req.param('deviceUuid'), requireText(body.player_name, 'player_name'));
    // Display names in the top-finders list come from here.
    world.statsCache.delete(CACHE_KEYS.stats());
    return c.json({ message: 'Player name saved', player: toWirePlayer(player) });
  });

  players.delete('/:deviceUuid', async (c) => {
    const deviceUuid = c.req.param('deviceUuid');
    await world.players.deletePlayer(deviceUuid);
    world.statsCache.delete(CACHE_KEYS.stats());
    return c.json({ message: 'Player deleted', device_uuid: deviceUuid });
  });

  players.post('/:deviceUuid/kick', (c) => {
    const deviceUuid = c.req.param('deviceUuid');
    const result = world.presence.kick(deviceUuid);
    return c.json({
      device_uuid: deviceUuid,
      kicked: result.kicked,
      session_ids: result.sessionIds,
      message: result.kicked ? `Disconnected ${result.sessionIds.length} session(s)` : 'Device has no active sessions',
    });
  });

  return players;
}
