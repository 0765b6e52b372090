import { Hono } from 'hono';
import type { World } from '../world/context.js';
import { toWireLocation } from '../realtime/events.js';
import { optionalNumber, requireNumber } from '../engine/validate.js';
import { readBody } from './params.js';
import type { ArOffset } from '../types.js';

function arOffsetFrom(body: Record<string, unknown>): ArOffset | null {
  const { ar_offset_x: x, ar_offset_y: y, ar_offset_z: z } = body;
  if (x === undefined && y === undefined && z === undefined) return null;
  return {
    x: requireNumber(x, 'ar_offset_x'),
    y: requireNumber(y, 'ar_offset_y'),
    z: requireNumber(z, 'ar_offset_z'),
  };
}

export function userRoutes(world: World): Hono {
  const users = new Hono();

  // GET /api/users/locations — devices seen within the freshness window
  users.get('/users/locations', (c) => {
    const locations: Record<string, ReturnType<typeof toWireLocation>> = {};
    for (const location of world.locations.listActive()) {
      locations[location.deviceUuid] = toWireLocation(location);
    }
    return c.json(locations);
  });

  users.post('/users/:deviceUuid/location', async (c) => {
    const body = await readBody(c);
    const location = await world.locations.update(c.req.param('deviceUuid'), {
      latitude: requireNumber(body.latitude, 'latitude'),
      longitude: requireNumber(body.longitude, 'longitude'),
      accuracy: optionalNumber(body.accuracy, 'accuracy'),
      heading: optionalNumber(body.heading, 'heading'),
      arOffset: arOffsetFrom(body),
    });
    return c.json({ message: 'Location updated', location: toWireLocation(location) });
  });

  users.get('/users/:deviceUuid/finds', (c) => {
    const deviceUuid = c.req.param('deviceUuid');
    const finds = world.ledger.findsByUser(deviceUuid).map((f) => ({
      object_id: f.objectId,
      name: f.name,
      type: f.type,
      latitude: f.latitude,
      longitude: f.longitude,
      found_at: f.foundAt,
    }));
    return c.json({ device_uuid: deviceUuid, finds, count: finds.length });
  });

  users.get('/map/default_center', (c) => {
    const center = world.locations.defaultCenter();
    return c.json({
      latitude: center.latitude,
      longitude: center.longitude,
      source: center.source,
      device_uuid: center.deviceUuid ?? null,
    });
  });

  return users;
}
