/**
 * WORLD STORE - OBJECTS
 *
 * - Create / read / partial update / delete
 * - Duplicate ids rejected, even when the creates race
 * - Deleting an object removes its finds
 * - Exactly one event per committed write, none for a failed one
 */

import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import { createTestWorld, dataOf, objectInput } from './helpers.js';
import type { TestWorld } from './helpers.js';
import { ConflictError, NotFoundError, ValidationError } from '../engine/errors.js';
import { boundingBox } from '../engine/objects.js';

describe('WorldStore', () => {
  let world: TestWorld;

  beforeEach(() => {
    world = createTestWorld();
    // A session with no device sees every broadcast.
    world.gateway.handleConnect('watcher');
    world.transport.reset();
  });

  afterEach(() => {
    world.close();
  });

  describe('createObject', () => {
    it('stores the object and returns it uncollected', async () => {
      const view = await world.objects.createObject(objectInput('obj-1', { name: 'Golden Chalice' }));

      assert.equal(view.id, 'obj-1');
      assert.equal(view.name, 'Golden Chalice');
      assert.equal(view.createdBy, 'unknown');
      assert.equal(view.multifindable, false);
      assert.equal(view.collected, false);
      assert.equal(view.findCount, 0);
      assert.deepEqual(world.objects.getObject('obj-1'), view);
    });

    it('passes the AR payload through untouched', async () => {
      await world.objects.createObject(
        objectInput('obj-ar', {
          groundingHeight: -1.25,
          ar: { arOffsetX: 0.5, arOffsetY: 0, arOffsetZ: -2, arAnchorTransform: 'AAECAw==', arPlacementHeading: 271.5 },
        }),
      );

      const stored = world.objects.getObject('obj-ar');
      assert.equal(stored.groundingHeight, -1.25);
      assert.deepEqual(stored.ar, {
        arOriginLatitude: null,
        arOriginLongitude: null,
        arOffsetX: 0.5,
        arOffsetY: 0,
        arOffsetZ: -2,
        arPlacementTimestamp: null,
        arAnchorTransform: 'AAECAw==',
        arPlacementHeading: 271.5,
      });
    });

    it('broadcasts object_created in wire form', async () => {
      await world.objects.createObject(objectInput('obj-1', { createdBy: 'dev-a' }));

      const frames = world.transport.framesFor('watcher');
      assert.equal(frames.length, 1);
      assert.equal(frames[0].event, 'object_created');
      const data = dataOf(frames[0]);
      assert.equal(data.id, 'obj-1');
      assert.equal(data.created_by, 'dev-a');
      assert.equal(data.collected, false);
      assert.equal(data.found_by, null);
      assert.equal(data.find_count, 0);
    });

    it('rejects a duplicate id with Conflict and emits nothing for it', async () => {
      await world.objects.createObject(objectInput('obj-1'));
      world.transport.reset();

      await assert.rejects(world.objects.createObject(objectInput('obj-1', { name: 'Other' })), ConflictError);
      assert.deepEqual(world.transport.framesFor('watcher'), []);
      assert.equal(world.objects.getObject('obj-1').name, 'Object obj-1');
    });

    it('lets exactly one of two racing creates with the same id win', async () => {
      const results = await Promise.allSettled([
        world.objects.createObject(objectInput('race', { name: 'First' })),
        world.objects.createObject(objectInput('race', { name: 'Second' })),
      ]);

      const fulfilled = results.filter((r) => r.status === 'fulfilled');
      const rejected = results.filter((r): r is PromiseRejectedResult => r.status === 'rejected');
      assert.equal(fulfilled.length, 1);
      assert.equal(rejected.length, 1);
      assert.ok(rejected[0].reason instanceof ConflictError);
      assert.equal(world.objects.countObjects(), 1);
      assert.deepEqual(world.transport.eventsFor('watcher'), ['object_created']);
    });

    it('rejects missing required fields without writing', async () => {
      await assert.rejects(
        world.objects.createObject(objectInput('obj-1', { name: '   ' })),
        (err: unknown) => err instanceof ValidationError && err.field === 'name',
      );
      await assert.rejects(
        world.objects.createObject(objectInput('obj-2', { latitude: Number.NaN })),
        (err: unknown) => err instanceof ValidationError && err.field === 'latitude',
      );
      assert.equal(world.objects.countObjects(), 0);
      assert.deepEqual(world.transport.framesFor('watcher'), []);
    });
  });

  describe('getObject', () => {
    it('throws NotFound for an unknown id', () => {
      assert.throws(() => world.objects.getObject('missing'), NotFoundError);
    });
  });

  describe('partial updates', () => {
    beforeEach(async () => {
      await world.objects.createObject(objectInput('obj-1'));
      world.transport.reset();
    });

    it('moves an object, leaving unspecified fields alone', async () => {
      const view = await world.objects.updateLocation('obj-1', { latitude: 41.5 });

      assert.equal(view.latitude, 41.5);
      assert.equal(view.longitude, -105.3008);
      assert.deepEqual(world.transport.eventsFor('watcher'), ['object_updated']);
      assert.equal(dataOf(world.transport.lastFrame('watcher', 'object_updated')).latitude, 41.5);
    });

    it('sets grounding height and AR offset', async () => {
      await world.objects.updateGrounding('obj-1', 0.75);
      await world.objects.updateArOffset('obj-1', { arOffsetX: 1, arOffsetY: 2, arOffsetZ: 3 });

      const stored = world.objects.getObject('obj-1');
      assert.equal(stored.groundingHeight, 0.75);
      assert.equal(stored.ar.arOffsetX, 1);
      assert.equal(stored.ar.arOffsetY, 2);
      assert.equal(stored.ar.arOffsetZ, 3);
      assert.equal(stored.ar.arAnchorTransform, null);
    });

    it('clears grounding height with null', async () => {
      await world.objects.updateGrounding('obj-1', 0.75);
      const cleared = await world.objects.updateGrounding('obj-1', null);

      assert.equal(cleared.groundingHeight, null);
      assert.equal(world.objects.getObject('obj-1').groundingHeight, null);
      assert.deepEqual(world.transport.eventsFor('watcher'), ['object_updated', 'object_updated']);
    });

    it('rejects an update with no recognized field', async () => {
      await assert.rejects(world.objects.updateLocation('obj-1', {}), ValidationError);
      assert.deepEqual(world.transport.framesFor('watcher'), []);
    });

    it('throws NotFound for an unknown id', async () => {
      await assert.rejects(world.objects.updateLocation('missing', { latitude: 1 }), NotFoundError);
      assert.deepEqual(world.transport.framesFor('watcher'), []);
    });
  });

  describe('deleteObject', () => {
    it('removes the object together with its finds', async () => {
      await world.objects.createObject(objectInput('obj-1'));
      await world.ledger.markFound('obj-1', 'dev-a');
      await world.ledger.markFound('obj-1', 'dev-b');
      world.transport.reset();

      const result = await world.objects.deleteObject('obj-1');

      assert.deepEqual(result, { objectId: 'obj-1', findsDeleted: 2 });
      assert.throws(() => world.objects.getObject('obj-1'), NotFoundError);
      assert.deepEqual(world.ledger.findsForObject('obj-1'), []);
      assert.deepEqual(world.ledger.findsByUser('dev-a'), []);
      const frame = world.transport.lastFrame('watcher', 'object_deleted');
      assert.deepEqual(frame.data, { object_id: 'obj-1', finds_deleted: 2 });
    });

    it('throws NotFound for an unknown id and emits nothing', async () => {
      await assert.rejects(world.objects.deleteObject('missing'), NotFoundError);
      assert.deepEqual(world.transport.framesFor('watcher'), []);
    });
  });

  describe('listObjects', () => {
    it('returns the newest objects first', async () => {
      await world.objects.createObject(objectInput('older'));
      await world.objects.createObject(objectInput('newer'));

      assert.deepEqual(
        world.objects.listObjects().map((o) => o.id),
        ['newer', 'older'],
      );
    });

    it('filters by bounding box around a center', async () => {
      await world.objects.createObject(objectInput('near', { latitude: 40.0759, longitude: -105.3009 }));
      await world.objects.createObject(objectInput('far', { latitude: 41.0, longitude: -105.3008 }));

      const found = world.objects.listObjects({ latitude: 40.0758, longitude: -105.3008, radius: 1000 });
      assert.deepEqual(
        found.map((o) => o.id),
        ['near'],
      );
    });

    it('rejects a negative radius', async () => {
      await world.objects.createObject(objectInput('obj-1'));

      assert.throws(
        () => world.objects.listObjects({ latitude: 40.0758, longitude: -105.3008, radius: -5 }),
        (err: unknown) => err instanceof ValidationError && err.message === 'Field radius must not be negative',
      );
    });

    it('hides found objects unless asked to include them', async () => {
      await world.objects.createObject(objectInput('obj-1'));
      await world.objects.createObject(objectInput('obj-2'));
      await world.ledger.markFound('obj-1', 'dev-a');

      assert.deepEqual(
        world.objects.listObjects().map((o) => o.id),
        ['obj-2'],
      );
      assert.deepEqual(
        world.objects.listObjects({ includeFound: true }).map((o) => [o.id, o.collected]),
        [
          ['obj-2', false],
          ['obj-1', true],
        ],
      );
    });
  });
});

describe('boundingBox', () => {
  it('spans radius / 111 km degrees of latitude at the equator', () => {
    const box = boundingBox(0, 0, 111_000);
    assert.equal(box.minLat, -1);
    assert.equal(box.maxLat, 1);
    assert.equal(box.minLon, -1);
    assert.equal(box.maxLon, 1);
  });
});
