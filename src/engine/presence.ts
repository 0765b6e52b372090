import { ValidationError } from './errors.js';
import { requireText } from './validate.js';
import type { ConnectedDevice, SessionPhase } from '../types.js';

export interface SessionCloser {
  close(sessionId: string): void;
}

interface SessionEntry {
  deviceUuid: string | null;
  phase: SessionPhase;
}

const TRANSITIONS: Record<SessionPhase, readonly SessionPhase[]> = {
  connected: ['registered', 'syncing', 'disconnected'],
  registered: ['syncing', 'disconnected'],
  syncing: ['live', 'registered', 'connected', 'disconnected'],
  live: ['syncing', 'registered', 'disconnected'],
  disconnected: [],
};

/**
 * Who is connected, and as which device.
 *
 * Keeps `session → device` and `device → sessions` in step: a session sits in
 * exactly one device's set, or in none. One device may hold many sessions.
 * All operations are synchronous, so each one completes before any other
 * connection handler runs; the maps are never handed out.
 */
export class PresenceRegistry {
  private readonly sessions = new Map<string, SessionEntry>();
  private readonly devices = new Map<string, Set<string>>();

  constructor(private readonly closer: SessionCloser) {}

  onConnect(sessionId: string): void {
    this.sessions.set(sessionId, { deviceUuid: null, phase: 'connected' });
  }

  /**
   * Bind a session to a device. A session that was bound to another device is
   * moved off that device first.
   * @returns whether the binding changed
   */
  registerDevice(sessionId: string, deviceUuid: string): boolean {
    const uuid = requireText(deviceUuid, 'device_uuid');
    const entry = this.sessions.get(sessionId);
    if (!entry) {
      throw new ValidationError(`Session ${sessionId} is not connected`, 'session_id');
    }

    if (entry.deviceUuid === uuid) return false;

    if (entry.deviceUuid !== null) {
      this.unbind(sessionId, entry.deviceUuid);
    }

    entry.deviceUuid = uuid;
    let set = this.devices.get(uuid);
    if (!set) {
      set = new Set();
      this.devices.set(uuid, set);
    }
    set.add(sessionId);

    if (entry.phase !== 'syncing') this.transition(sessionId, 'registered');
    return true;
  }

  /** Forget a session. Unknown sessions are ignored. */
  onDisconnect(sessionId: string): void {
    const entry = this.sessions.get(sessionId);
    if (!entry) return;

    if (entry.deviceUuid !== null) {
      this.unbind(sessionId, entry.deviceUuid);
    }
    entry.phase = 'disconnected';
    this.sessions.delete(sessionId);
  }

  /** Terminate every session of a device and drop its entries. */
  kick(deviceUuid: string): { kicked: boolean; sessionIds: string[] } {
    const set = this.devices.get(deviceUuid);
    if (!set || set.size === 0) {
      return { kicked: false, sessionIds: [] };
    }

    const sessionIds = [...set];
    this.devices.delete(deviceUuid);
    for (const sessionId of sessionIds) {
      this.sessions.delete(sessionId);
    }

    for (const sessionId of sessionIds) {
      this.closer.close(sessionId);
    }
    console.log(`[Presence] Kicked ${deviceUuid}: closed ${sessionIds.length} session(s)`);
    return { kicked: true, sessionIds };
  }

  listConnected(): ConnectedDevice[] {
    const list: ConnectedDevice[] = [];
    for (const [deviceUuid, set] of this.devices) {
      if (set.size === 0) continue;
      list.push({ deviceUuid, sessionCount: set.size, sessionIds: [...set] });
    }
    return list;
  }

  // ─── Lookups ───

  sessionsFor(deviceUuid: string): string[] {
    return [...(this.devices.get(deviceUuid) ?? [])];
  }

  deviceFor(sessionId: string): string | null {
    return this.sessions.get(sessionId)?.deviceUuid ?? null;
  }

  isConnected(deviceUuid: string): boolean {
    return (this.devices.get(deviceUuid)?.size ?? 0) > 0;
  }

  allSessions(): string[] {
    return [...this.sessions.keys()];
  }

  // ─── Phases ───

  phaseOf(sessionId: string): SessionPhase {
    return this.sessions.get(sessionId)?.phase ?? 'disconnected';
  }

  /**
   * Move a session to the next phase. Transitions that the phase table does
   * not allow are ignored and reported as false.
   */
  transition(sessionId: string, next: SessionPhase): boolean {
    const entry = this.sessions.get(sessionId);
    if (!entry) return false;
    if (!TRANSITIONS[entry.phase].includes(next)) return false;
    entry.phase = next;
    return true;
  }

  private unbind(sessionId: string, deviceUuid: string): void {
    const set = this.devices.get(deviceUuid);
    if (!set) return;
    set.delete(sessionId);
    if (set.size === 0) this.devices.delete(deviceUuid);
  }
}
