import { Hono } from 'hono';
import type { World } from '../world/context.js';
import { toWireObject } from '../realtime/events.js';
import { optionalFlag, optionalNumber, optionalText, requireNumber, requireText } from '../engine/validate.js';
import { queryNumber, queryText, readBody } from './params.js';
import type { ArPlacementPatch } from '../types.js';

function arPatchFrom(body: Record<string, unknown>): ArPlacementPatch {
  return {
    arOriginLatitude: optionalNumber(body.ar_origin_latitude, 'ar_origin_latitude'),
    arOriginLongitude: optionalNumber(body.ar_origin_longitude, 'ar_origin_longitude'),
    arOffsetX: optionalNumber(body.ar_offset_x, 'ar_offset_x'),
    arOffsetY: optionalNumber(body.ar_offset_y, 'ar_offset_y'),
    arOffsetZ: optionalNumber(body.ar_offset_z, 'ar_offset_z'),
    arPlacementTimestamp: optionalText(body.ar_placement_timestamp, 'ar_placement_timestamp'),
    arAnchorTransform: optionalText(body.ar_anchor_transform, 'ar_anchor_transform'),
    arPlacementHeading: optionalNumber(body.ar_placement_heading, 'ar_placement_heading'),
  };
}

export function objectRoutes(world: World): Hono {
  const objects = new Hono();

  // GET /api/objects — optionally within a radius, optionally including found
  objects.get('/', (c) => {
    const list = world.objects.listObjects({
      latitude: queryNumber(c, 'latitude'),
      longitude: queryNumber(c, 'longitude'),
      radius: queryNumber(c, 'radius'),
      includeFound: c.req.query('include_found')?.toLowerCase() === 'true',
      viewer: queryText(c, 'viewer'),
    });
    return c.json({ objects: list.map(toWireObject), count: list.length });
  });

  objects.get('/:id', (c) => {
    const view = world.objects.getObject(c.req.param('id'), queryText(c, 'viewer'));
    return c.json(toWireObject(view));
  });

  objects.post('/', async (c) => {
    const body = await readBody(c);
    const view = await world.objects.createObject({
      id: requireText(body.id, 'id'),
      name: requireText(body.name, 'name'),
      type: requireText(body.type, 'type'),
      latitude: requireNumber(body.latitude, 'latitude'),
      longitude: requireNumber(body.longitude, 'longitude'),
      radius: requireNumber(body.radius, 'radius'),
      createdBy: optionalText(body.created_by, 'created_by') ?? undefined,
      groundingHeight: optionalNumber(body.grounding_height, 'grounding_height'),
      ar: arPatchFrom(body),
      multifindable: optionalFlag(body.multifindable, 'multifindable'),
    });
    return c.json({ message: 'Object created', object: toWireObject(view) }, 201);
  });

  // PATCH /api/objects/:id — move an object
  objects.patch('/:id', async (c) => {
    const body = await readBody(c);
    const view = await world.objects.updateLocation(c.req.param('id'), {
      latitude: optionalNumber(body.latitude, 'latitude') ?? undefined,
      longitude: optionalNumber(body.longitude, 'longitude') ?? undefined,
    });
    return c.json({ message: 'Object location updated', object: toWireObject(view) });
  });

  objects.put('/:id/grounding', async (c) => {
    const body = await readBody(c);
    const height = optionalNumber(body.grounding_height, 'grounding_height');
    const view = await world.objects.updateGrounding(c.req.param('id'), height);
    return c.json({ message: 'Grounding height updated', object: toWireObject(view) });
  });

  objects.put('/:id/ar-offset', async (c) => {
    const body = await readBody(c);
    const view = await world.objects.updateArOffset(c.req.param('id'), arPatchFrom(body));
    return c.json({ message: 'AR placement updated', object: toWireObject(view) });
  });

  objects.delete('/:id', async (c) => {
    const result = await world.objects.deleteObject(c.req.param('id'));
    return c.json({ message: 'Object deleted', object_id: result.objectId, finds_deleted: result.findsDeleted });
  });

  // ─── Finds ───

  objects.post('/:id/found', async (c) => {
    const body = await readBody(c);
    const find = await world.ledger.markFound(c.req.param('id'), requireText(body.found_by, 'found_by'));
    return c.json({
      message: 'Object marked as found',
      find_id: find.id,
      object_id: find.objectId,
      found_by: find.foundBy,
      found_at: find.foundAt,
    });
  });

  objects.delete('/:id/found', async (c) => {
    const result = await world.ledger.unmarkFound(c.req.param('id'));
    return c.json({
      message: result.alreadyUnfound ? 'Object was already unfound' : 'Object marked as unfound',
      object_id: result.objectId,
      finds_deleted: result.findsDeleted,
      already_unfound: result.alreadyUnfound,
    });
  });

  return objects;
}
