import type { WorldStore } from '../engine/objects.js';
import type { PresenceRegistry } from '../engine/presence.js';
import type { Broadcaster } from './broadcast.js';
import { toWireObject } from './events.js';
import type { WireObject } from './events.js';
import { errorMessage } from '../engine/errors.js';
import { SYNC } from '../world/config.js';

export interface ObjectsBatch {
  objects: WireObject[];
  batch_index: number;
  total_batches: number;
  is_last_batch: boolean;
}

/** Split into fixed-size batches. An empty list still yields one (empty) batch. */
export function toBatches<T>(items: readonly T[], size: number): T[][] {
  const step = Math.max(1, size);
  if (items.length === 0) return [[]];
  const batches: T[][] = [];
  for (let i = 0; i < items.length; i += step) {
    batches.push(items.slice(i, i + step));
  }
  return batches;
}

/**
 * Full-state resync. Broadcast deltas are only a latency shortcut; this is
 * what makes a client that missed events converge. Runs on connect, on device
 * registration, on request, and on a fixed interval for every session.
 */
export class Reconciler {
  private timer: NodeJS.Timeout | null = null;

  constructor(
    private readonly world: WorldStore,
    private readonly presence: PresenceRegistry,
    private readonly broadcaster: Broadcaster,
    private readonly batchSize: number = SYNC.OBJECT_BATCH_SIZE,
    private readonly intervalMs: number = SYNC.RESYNC_INTERVAL_MS,
  ) {}

  /**
   * Send the whole object set to one session, personalized to its device.
   * @returns number of batches delivered
   */
  syncSession(sessionId: string): number {
    if (this.presence.phaseOf(sessionId) === 'disconnected') return 0;

    const viewer = this.presence.deviceFor(sessionId) ?? undefined;
    // Read before entering `syncing`: a failed read must leave the phase as it was.
    const objects = this.world.listAllObjects(viewer).map(toWireObject);
    const batches = toBatches(objects, this.batchSize);

    if (!this.presence.transition(sessionId, 'syncing')) {
      return 0;
    }

    let delivered = 0;
    for (const [index, batch] of batches.entries()) {
      const data: ObjectsBatch = {
        objects: batch,
        batch_index: index,
        total_batches: batches.length,
        is_last_batch: index === batches.length - 1,
      };
      const report = this.broadcaster.sendTo([sessionId], { event: 'objects_batch', data });
      if (report.failed.length > 0) {
        // Session is unreachable; the next resync will try again.
        this.presence.transition(sessionId, viewer ? 'registered' : 'connected');
        return delivered;
      }
      delivered++;
    }

    this.presence.transition(sessionId, 'live');
    return delivered;
  }

  /** Resync every connected session. */
  syncAll(): number {
    let synced = 0;
    for (const sessionId of this.presence.allSessions()) {
      if (this.syncSession(sessionId) > 0) synced++;
    }
    return synced;
  }

  start(): void {
    if (this.timer) return;
    this.timer = setInterval(() => {
      try {
        const synced = this.syncAll();
        if (synced > 0) console.log(`[Sync] Periodic resync sent to ${synced} session(s)`);
      } catch (err) {
        console.error(`[Sync] Periodic resync failed: ${errorMessage(err)}`);
      }
    }, this.intervalMs);
    this.timer.unref();
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }
}
