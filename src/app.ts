import { Hono } from 'hono';
import { cors } from 'hono/cors';
import { logger } from 'hono/logger';
import type { World } from './world/context.js';
import { objectRoutes } from './routes/objects.js';
import { playerRoutes } from './routes/players.js';
import { statsRoutes } from './routes/stats.js';
import { userRoutes } from './routes/users.js';
import { isWorldError } from './engine/errors.js';
import { SERVER } from './world/config.js';

export interface AppOptions {
  requestLog?: boolean;
}

export function createApp(world: World, options: AppOptions = {}): Hono {
  const app = new Hono();

  // Middleware
  app.use('*', cors());
  if (options.requestLog ?? true) {
    app.use('*', logger());
  }

  // ─── Routes ───

  app.get('/health', (c) => {
    return c.json({
      status: 'ok',
      server_time: new Date().toISOString(),
      connected_devices: world.presence.listConnected().length,
      pending_writes: world.writer.depth,
    });
  });

  app.get('/api', (c) => {
    return c.json({
      name: 'World Sync Server',
      version: '0.1.0',
      description: 'Shared world of geolocated objects with live sync.',
      endpoints: {
        'GET /api/objects': 'List objects (latitude, longitude, radius, include_found, viewer)',
        'POST /api/objects': 'Place an object',
        'GET /api/objects/:id': 'One object',
        'PATCH /api/objects/:id': 'Move an object',
        'PUT /api/objects/:id/grounding': 'Set grounding height',
        'PUT /api/objects/:id/ar-offset': 'Set AR placement',
        'DELETE /api/objects/:id': 'Delete an object and its finds',
        'POST /api/objects/:id/found': 'Record a find',
        'DELETE /api/objects/:id/found': 'Remove all finds of an object',
        'POST /api/finds/reset': 'Remove every find',
        'GET /api/players': 'All players',
        'GET /api/players/connected': 'Devices with live sessions',
        'POST /api/players/:deviceUuid/kick': 'Disconnect a device',
        'GET /api/stats': 'Counts and top finders',
        'GET /api/users/locations': 'Live player locations',
        'GET /api/map/default_center': 'Where to center the map',
        [`WS ${SERVER.WS_PATH}`]: 'Live event stream',
      },
    });
  });

  app.route('/api/objects', objectRoutes(world));
  app.route('/api/players', playerRoutes(world));
  app.route('/api', statsRoutes(world));
  app.route('/api', userRoutes(world));

  // ─── 404 ───
  app.notFound((c) => {
    return c.json({ error: 'NotFound', message: 'Not found. Try GET /api for available endpoints.' }, 404);
  });

  // ─── Error Handler ───
  app.onError((err, c) => {
    if (isWorldError(err)) {
      return c.json({ error: err.kind, message: err.message }, err.status);
    }
    console.error('🔥 Error:', err.message);
    console.error('Stack:', err.stack);
    return c.json({
      error: 'Internal server error',
      message: SERVER.DEV_MODE ? err.message : undefined,
    }, 500);
  });

  return app;
}
