import { Hono } from 'hono';
import type { World } from '../world/context.js';
import { CACHE_KEYS } from '../services/cache.js';
import { WORLD } from '../world/config.js';

export function statsRoutes(world: World): Hono {
  const stats = new Hono();

  // GET /api/stats — cached; dropped by the cache sink on every world event
  stats.get('/stats', (c) => {
    const s = world.statsCache.getOrSet(CACHE_KEYS.stats(), WORLD.STATS_CACHE_TTL, () => world.players.getStats());
    return c.json({
      total_objects: s.totalObjects,
      found_objects: s.foundObjects,
      unfound_objects: s.unfoundObjects,
      total_finds: s.totalFinds,
      top_finders: s.topFinders.map((t) => ({ user: t.user, display_name: t.displayName, count: t.count })),
    });
  });

  // POST /api/finds/reset — admin: every object becomes unfound
  stats.post('/finds/reset', async (c) => {
    const { findsDeleted } = await world.ledger.resetAllFinds();
    return c.json({ message: 'All finds reset', finds_deleted: findsDeleted });
  });

  return stats;
}
