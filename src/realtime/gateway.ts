import type { PresenceRegistry } from '../engine/presence.js';
import type { Broadcaster } from './broadcast.js';
import type { Reconciler } from './reconcile.js';
import { isWorldError } from '../engine/errors.js';
import { isRecord } from '../engine/validate.js';
import { SYNC } from '../world/config.js';

type Payload = Record<string, unknown>;

interface PendingPing {
  adminSessionId: string;
  deviceUuid: string;
  sentAt: number;
}

function readString(data: Payload, key: string): string | undefined {
  const value = data[key];
  return typeof value === 'string' && value !== '' ? value : undefined;
}

/**
 * Socket message protocol. Transport-agnostic: the ws server feeds it
 * connect / message / close calls keyed by session id, and replies go out
 * through the broadcaster.
 */
export class SocketGateway {
  private readonly pendingPings = new Map<string, PendingPing>();

  constructor(
    private readonly presence: PresenceRegistry,
    private readonly reconciler: Reconciler,
    private readonly broadcaster: Broadcaster,
    private readonly pingTtlMs: number = SYNC.ADMIN_PING_TTL_MS,
    private readonly now: () => number = Date.now,
  ) {}

  handleConnect(sessionId: string): void {
    this.presence.onConnect(sessionId);
    this.reply(sessionId, 'connected', {
      session_id: sessionId,
      message: 'Connected to world sync server',
      server_timestamp: this.timestamp(),
    });
    this.reconciler.syncSession(sessionId);
  }

  handleClose(sessionId: string): void {
    this.presence.onDisconnect(sessionId);
    for (const [pingId, ping] of this.pendingPings) {
      if (ping.adminSessionId === sessionId) this.pendingPings.delete(pingId);
    }
  }

  handleMessage(sessionId: string, raw: string): void {
    let frame: unknown;
    try {
      frame = JSON.parse(raw);
    } catch {
      this.reply(sessionId, 'error', { error: 'ValidationError', message: 'Frame is not valid JSON' });
      return;
    }

    if (!isRecord(frame) || typeof frame.event !== 'string') {
      this.reply(sessionId, 'error', { error: 'ValidationError', message: 'Frame must be { event, data }' });
      return;
    }

    const data = isRecord(frame.data) ? frame.data : {};
    this.expirePings();

    switch (frame.event) {
      case 'register_device':
        return this.onRegisterDevice(sessionId, data);
      case 'get_connected_clients':
        return this.onGetConnectedClients(sessionId);
      case 'request_sync':
        this.reconciler.syncSession(sessionId);
        return;
      case 'ping':
        return this.reply(sessionId, 'pong', { server_timestamp: this.timestamp() });
      case 'diagnostic_ping':
        return this.reply(sessionId, 'diagnostic_pong', {
          ping_id: data.ping_id ?? null,
          client_timestamp: data.timestamp ?? null,
          server_timestamp: this.timestamp(),
        });
      case 'admin_ping_client':
        return this.onAdminPingClient(sessionId, data);
      case 'client_diagnostic_pong':
        return this.onClientPong(sessionId, data);
      default:
        this.reply(sessionId, 'error', { error: 'ValidationError', message: `Unknown event: ${frame.event}` });
    }
  }

  // ─── Handlers ───

  private onRegisterDevice(sessionId: string, data: Payload): void {
    const deviceUuid = readString(data, 'device_uuid') ?? '';
    try {
      const changed = this.presence.registerDevice(sessionId, deviceUuid);
      if (changed) console.log(`[Socket] ${sessionId} registered as ${deviceUuid}`);
    } catch (err) {
      if (!isWorldError(err)) throw err;
      this.reply(sessionId, 'device_registered', { error: err.kind, message: err.message });
      return;
    }

    this.reply(sessionId, 'device_registered', { device_uuid: deviceUuid, session_id: sessionId, status: 'ok' });
    // Re-sync with this device's personal view of multifindable objects.
    this.reconciler.syncSession(sessionId);
  }

  private onGetConnectedClients(sessionId: string): void {
    const clients = this.presence.listConnected().map((d) => ({
      device_uuid: d.deviceUuid,
      session_count: d.sessionCount,
      session_ids: d.sessionIds,
    }));
    this.reply(sessionId, 'connected_clients_list', { clients });
  }

  private onAdminPingClient(adminSessionId: string, data: Payload): void {
    const deviceUuid = readString(data, 'device_uuid');
    const pingId = readString(data, 'ping_id');
    if (!deviceUuid || !pingId) {
      this.reply(adminSessionId, 'admin_ping_error', {
        ping_id: pingId ?? null,
        device_uuid: deviceUuid ?? null,
        error: 'ValidationError',
        message: 'device_uuid and ping_id are required',
      });
      return;
    }

    const targets = this.presence.sessionsFor(deviceUuid);
    if (targets.length === 0) {
      this.reply(adminSessionId, 'admin_ping_error', {
        ping_id: pingId,
        device_uuid: deviceUuid,
        error: 'NotFound',
        message: `Device ${deviceUuid} is not connected`,
      });
      return;
    }

    this.pendingPings.set(pingId, { adminSessionId, deviceUuid, sentAt: this.now() });
    const report = this.broadcaster.sendTo(targets, {
      event: 'admin_diagnostic_ping',
      data: { ping_id: pingId, device_uuid: deviceUuid, server_timestamp: this.timestamp() },
    });

    if (report.delivered === 0) {
      this.pendingPings.delete(pingId);
      this.reply(adminSessionId, 'admin_ping_error', {
        ping_id: pingId,
        device_uuid: deviceUuid,
        error: 'BroadcastFailure',
        message: `Could not reach any session of ${deviceUuid}`,
      });
    }
  }

  private onClientPong(sessionId: string, data: Payload): void {
    const pingId = readString(data, 'ping_id');
    const pending = pingId ? this.pendingPings.get(pingId) : undefined;
    if (!pingId || !pending) {
      console.warn(`[Socket] ${sessionId} answered unknown ping ${pingId ?? '(none)'}`);
      return;
    }

    this.pendingPings.delete(pingId);
    this.reply(pending.adminSessionId, 'admin_ping_response', {
      ping_id: pingId,
      device_uuid: this.presence.deviceFor(sessionId) ?? pending.deviceUuid,
      session_id: sessionId,
      client_timestamp: data.client_timestamp ?? null,
      server_timestamp: this.timestamp(),
      latency_ms: this.now() - pending.sentAt,
    });
  }

  // ─── Helpers ───

  private reply(sessionId: string, event: string, data: Payload): void {
    this.broadcaster.sendTo([sessionId], { event, data });
  }

  private expirePings(): void {
    const cutoff = this.now() - this.pingTtlMs;
    for (const [pingId, ping] of this.pendingPings) {
      if (ping.sentAt < cutoff) this.pendingPings.delete(pingId);
    }
  }

  private timestamp(): string {
    return new Date(this.now()).toISOString();
  }
}
