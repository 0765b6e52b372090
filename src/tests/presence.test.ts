/**
 * PRESENCE REGISTRY
 *
 * session → device and device → sessions must always agree.
 */

import { describe, it, beforeEach } from 'node:test';
import assert from 'node:assert/strict';
import { PresenceRegistry } from '../engine/presence.js';
import { ValidationError } from '../engine/errors.js';

describe('PresenceRegistry', () => {
  let closed: string[];
  let presence: PresenceRegistry;

  beforeEach(() => {
    closed = [];
    presence = new PresenceRegistry({ close: (sessionId) => closed.push(sessionId) });
  });

  it('binds sessions to devices', () => {
    presence.onConnect('s1');
    presence.onConnect('s2');
    assert.equal(presence.registerDevice('s1', 'dev-a'), true);
    presence.registerDevice('s2', 'dev-a');

    assert.deepEqual(presence.listConnected(), [{ deviceUuid: 'dev-a', sessionCount: 2, sessionIds: ['s1', 's2'] }]);
    assert.equal(presence.deviceFor('s2'), 'dev-a');
    assert.equal(presence.phaseOf('s1'), 'registered');
    assert.equal(presence.isConnected('dev-a'), true);
  });

  it('treats a repeated registration as a no-op', () => {
    presence.onConnect('s1');
    presence.registerDevice('s1', 'dev-a');
    assert.equal(presence.registerDevice('s1', 'dev-a'), false);
    assert.deepEqual(presence.sessionsFor('dev-a'), ['s1']);
  });

  it('moves a session that registers as another device', () => {
    presence.onConnect('s1');
    presence.registerDevice('s1', 'dev-a');
    presence.registerDevice('s1', 'dev-b');

    assert.deepEqual(presence.sessionsFor('dev-a'), []);
    assert.deepEqual(presence.sessionsFor('dev-b'), ['s1']);
    assert.deepEqual(
      presence.listConnected().map((d) => d.deviceUuid),
      ['dev-b'],
    );
  });

  it('rejects an empty device id or an unknown session', () => {
    presence.onConnect('s1');
    assert.throws(() => presence.registerDevice('s1', ''), ValidationError);
    assert.throws(() => presence.registerDevice('ghost', 'dev-a'), ValidationError);
    assert.deepEqual(presence.listConnected(), []);
  });

  it('drops a device once its last session disconnects', () => {
    presence.onConnect('s1');
    presence.onConnect('s2');
    presence.registerDevice('s1', 'dev-a');
    presence.registerDevice('s2', 'dev-a');

    presence.onDisconnect('s1');
    assert.deepEqual(presence.sessionsFor('dev-a'), ['s2']);

    presence.onDisconnect('s2');
    assert.equal(presence.isConnected('dev-a'), false);
    assert.deepEqual(presence.allSessions(), []);
    assert.equal(presence.phaseOf('s2'), 'disconnected');
  });

  it('ignores disconnects of unknown sessions', () => {
    presence.onDisconnect('ghost');
    assert.deepEqual(presence.allSessions(), []);
  });

  describe('kick', () => {
    it('closes every session of the device and purges it', () => {
      presence.onConnect('s1');
      presence.onConnect('s2');
      presence.onConnect('s3');
      presence.registerDevice('s1', 'dev-a');
      presence.registerDevice('s2', 'dev-a');
      presence.registerDevice('s3', 'dev-b');

      const result = presence.kick('dev-a');

      assert.deepEqual(result, { kicked: true, sessionIds: ['s1', 's2'] });
      assert.deepEqual(closed, ['s1', 's2']);
      assert.deepEqual(
        presence.listConnected().map((d) => d.deviceUuid),
        ['dev-b'],
      );
      assert.equal(presence.deviceFor('s1'), null);
      assert.deepEqual(presence.allSessions(), ['s3']);
    });

    it('reports kicked: false for a device with no sessions', () => {
      assert.deepEqual(presence.kick('dev-z'), { kicked: false, sessionIds: [] });
      assert.deepEqual(closed, []);
    });
  });

  describe('phases', () => {
    it('follows the connection lifecycle and refuses skipped steps', () => {
      presence.onConnect('s1');
      assert.equal(presence.transition('s1', 'live'), false);
      assert.equal(presence.transition('s1', 'syncing'), true);
      assert.equal(presence.transition('s1', 'live'), true);
      assert.equal(presence.phaseOf('s1'), 'live');
      assert.equal(presence.transition('ghost', 'syncing'), false);
    });
  });
});
