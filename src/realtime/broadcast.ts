import { toWireFrame } from './events.js';
import type { WireFrame, WorldEvent, WorldEventSink } from './events.js';
import { errorMessage } from '../engine/errors.js';

/** Delivery side of a socket server, addressed by session id. */
export interface SessionTransport {
  send(sessionId: string, message: string): void;
  close(sessionId: string): void;
}

export interface DeliveryReport {
  delivered: number;
  failed: string[];
}

/**
 * Pushes world events to connected sessions.
 *
 * Delivery is fire-and-forget: a session that cannot be reached is logged
 * and skipped, and the rest still get the frame. Nothing here can fail the
 * write that produced the event.
 */
export class Broadcaster implements WorldEventSink {
  constructor(
    private readonly transport: SessionTransport,
    private readonly sessions: () => Iterable<string>,
  ) {}

  emit(event: WorldEvent): void {
    this.broadcast(toWireFrame(event));
  }

  /** Send a frame to every connected session. */
  broadcast(frame: WireFrame): DeliveryReport {
    return this.sendTo(this.sessions(), frame);
  }

  /** Send a frame to specific sessions only. */
  sendTo(sessionIds: Iterable<string>, frame: WireFrame): DeliveryReport {
    const message = JSON.stringify(frame);
    const report: DeliveryReport = { delivered: 0, failed: [] };

    for (const sessionId of sessionIds) {
      try {
        this.transport.send(sessionId, message);
        report.delivered++;
      } catch (err) {
        report.failed.push(sessionId);
        console.warn(`[Broadcast] ${frame.event} not delivered to ${sessionId}: ${errorMessage(err)}`);
      }
    }

    return report;
  }
}
