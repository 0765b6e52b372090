/**
 * Shared fixtures: an in-memory world and a transport that records frames
 * instead of writing to sockets.
 */

import assert from 'node:assert/strict';
import type { SessionTransport } from '../realtime/broadcast.js';
import type { WireFrame } from '../realtime/events.js';
import { createWorld } from '../world/context.js';
import type { World, WorldOptions } from '../world/context.js';
import { isRecord } from '../engine/validate.js';
import type { NewObjectInput } from '../types.js';

export class RecordingTransport implements SessionTransport {
  readonly messages: Array<{ sessionId: string; message: string }> = [];
  readonly closed: string[] = [];
  /** Sessions whose sends throw, as a dead socket would. */
  readonly failing = new Set<string>();

  send(sessionId: string, message: string): void {
    if (this.failing.has(sessionId)) {
      throw new Error('socket is closed');
    }
    this.messages.push({ sessionId, message });
  }

  close(sessionId: string): void {
    this.closed.push(sessionId);
  }

  framesFor(sessionId: string): WireFrame[] {
    return this.messages.filter((m) => m.sessionId === sessionId).map((m) => parseFrame(m.message));
  }

  eventsFor(sessionId: string): string[] {
    return this.framesFor(sessionId).map((f) => f.event);
  }

  lastFrame(sessionId: string, event: string): WireFrame {
    const frame = this.framesFor(sessionId).filter((f) => f.event === event).pop();
    assert.ok(frame, `no ${event} frame sent to ${sessionId}`);
    return frame;
  }

  reset(): void {
    this.messages.length = 0;
    this.closed.length = 0;
  }
}

export function parseFrame(message: string): WireFrame {
  const parsed: unknown = JSON.parse(message);
  assert.ok(isRecord(parsed) && typeof parsed.event === 'string', `not a frame: ${message}`);
  return { event: parsed.event, data: parsed.data };
}

/** The frame's data as a record, failing the test if it is not one. */
export function dataOf(frame: WireFrame): Record<string, unknown> {
  assert.ok(isRecord(frame.data), `${frame.event} has no data object`);
  return frame.data;
}

export interface TestWorld extends World {
  transport: RecordingTransport;
}

export function createTestWorld(options: Partial<Omit<WorldOptions, 'transport' | 'dbPath'>> = {}): TestWorld {
  const transport = new RecordingTransport();
  const world = createWorld({
    transport,
    dbPath: ':memory:',
    ...options,
    writer: { retryBaseMs: 1, ...options.writer },
  });
  return { ...world, transport };
}

export function objectInput(id: string, overrides: Partial<NewObjectInput> = {}): NewObjectInput {
  return {
    id,
    name: `Object ${id}`,
    type: 'Chalice',
    latitude: 40.0758,
    longitude: -105.3008,
    radius: 5,
    ...overrides,
  };
}

/** Connect a session and, when a device is given, register it. */
export function connectDevice(world: TestWorld, sessionId: string, deviceUuid?: string): void {
  world.gateway.handleConnect(sessionId);
  if (deviceUuid) {
    world.gateway.handleMessage(sessionId, JSON.stringify({ event: 'register_device', data: { device_uuid: deviceUuid } }));
  }
}
