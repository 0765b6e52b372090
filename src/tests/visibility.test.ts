/**
 * VISIBILITY RULES
 *
 * Single-find objects disappear for everyone after the first find.
 * Multifindable objects disappear only for the devices that found them.
 */

import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { applyVisibility, groupFindsByObject, resolveVisibility } from '../engine/visibility.js';
import type { FindRecord, WorldObject } from '../types.js';

function find(id: number, objectId: string, foundBy: string): FindRecord {
  return { id, objectId, foundBy, foundAt: `2026-01-01T00:00:0${id}.000Z` };
}

function object(id: string, multifindable: boolean): WorldObject {
  return {
    id,
    name: id,
    type: 'Chalice',
    latitude: 0,
    longitude: 0,
    radius: 5,
    createdAt: '2026-01-01T00:00:00.000Z',
    createdBy: 'unknown',
    groundingHeight: null,
    ar: {
      arOriginLatitude: null,
      arOriginLongitude: null,
      arOffsetX: null,
      arOffsetY: null,
      arOffsetZ: null,
      arPlacementTimestamp: null,
      arAnchorTransform: null,
      arPlacementHeading: null,
    },
    multifindable,
  };
}

describe('resolveVisibility', () => {
  it('reports an unfound object as uncollected', () => {
    assert.deepEqual(resolveVisibility({ multifindable: false }, [], 'dev-a'), {
      collected: false,
      foundBy: null,
      foundAt: null,
      findCount: 0,
    });
  });

  it('collects a single-find object for every viewer, naming the first finder', () => {
    const finds = [find(1, 'o1', 'dev-a'), find(2, 'o1', 'dev-b')];

    for (const viewer of ['dev-a', 'dev-b', 'dev-c', undefined]) {
      assert.deepEqual(resolveVisibility({ multifindable: false }, finds, viewer), {
        collected: true,
        foundBy: 'dev-a',
        foundAt: '2026-01-01T00:00:01.000Z',
        findCount: 2,
      });
    }
  });

  it('collects a multifindable object only for viewers with their own find', () => {
    const finds = [find(1, 'o1', 'dev-a'), find(2, 'o1', 'dev-b')];

    assert.deepEqual(resolveVisibility({ multifindable: true }, finds, 'dev-b'), {
      collected: true,
      foundBy: 'dev-b',
      foundAt: '2026-01-01T00:00:02.000Z',
      findCount: 2,
    });
    assert.equal(resolveVisibility({ multifindable: true }, finds, 'dev-c').collected, false);
  });

  it('leaves a multifindable object uncollected in the global view', () => {
    const finds = [find(1, 'o1', 'dev-a')];
    assert.deepEqual(resolveVisibility({ multifindable: true }, finds), {
      collected: false,
      foundBy: null,
      foundAt: null,
      findCount: 1,
    });
  });
});

describe('applyVisibility', () => {
  const objects = [object('single', false), object('multi', true), object('fresh', false)];
  const finds = groupFindsByObject([find(1, 'single', 'dev-a'), find(2, 'multi', 'dev-a')]);

  it('drops collected objects unless includeFound is set', () => {
    assert.deepEqual(
      applyVisibility(objects, finds, { viewer: 'dev-a' }).map((o) => o.id),
      ['fresh'],
    );
    assert.deepEqual(
      applyVisibility(objects, finds, { viewer: 'dev-b' }).map((o) => o.id),
      ['multi', 'fresh'],
    );
  });

  it('keeps everything with includeFound', () => {
    const views = applyVisibility(objects, finds, { viewer: 'dev-a', includeFound: true });
    assert.deepEqual(
      views.map((o) => [o.id, o.collected]),
      [
        ['single', true],
        ['multi', true],
        ['fresh', false],
      ],
    );
  });
});

describe('groupFindsByObject', () => {
  it('keeps insertion order within each object', () => {
    const grouped = groupFindsByObject([find(1, 'a', 'x'), find(2, 'b', 'y'), find(3, 'a', 'z')]);
    assert.deepEqual(grouped.get('a')?.map((f) => f.id), [1, 3]);
    assert.deepEqual(grouped.get('b')?.map((f) => f.id), [2]);
  });
});
