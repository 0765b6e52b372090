import type { Server } from 'http';
import { WebSocketServer, WebSocket } from 'ws';
import type { RawData } from 'ws';
import { v4 as uuidv4 } from 'uuid';
import type { SessionTransport } from './broadcast.js';
import type { SocketGateway } from './gateway.js';
import { errorMessage } from '../engine/errors.js';

/** Close code sent to sessions terminated by an admin kick. */
export const KICK_CLOSE_CODE = 4000;

/** How long a kicked peer gets to answer the close frame before its socket is destroyed. */
export const KICK_GRACE_MS = 1000;

/** The parts of a `ws` socket the transport drives. */
export interface SessionSocket {
  readonly readyState: number;
  send(data: string, cb?: (err?: Error) => void): void;
  close(code?: number, reason?: string): void;
  terminate(): void;
  once(event: 'close', listener: () => void): unknown;
}

function decode(data: RawData): string {
  if (Array.isArray(data)) return Buffer.concat(data).toString('utf8');
  if (data instanceof ArrayBuffer) return Buffer.from(data).toString('utf8');
  return data.toString('utf8');
}

/** Live `ws` sockets keyed by session id. */
export class WsTransport implements SessionTransport {
  private readonly sockets = new Map<string, SessionSocket>();

  constructor(private readonly kickGraceMs: number = KICK_GRACE_MS) {}

  add(sessionId: string, socket: SessionSocket): void {
    this.sockets.set(sessionId, socket);
  }

  remove(sessionId: string): void {
    this.sockets.delete(sessionId);
  }

  get size(): number {
    return this.sockets.size;
  }

  send(sessionId: string, message: string): void {
    const socket = this.sockets.get(sessionId);
    if (!socket || socket.readyState !== WebSocket.OPEN) {
      throw new Error(`Session ${sessionId} is not open`);
    }
    socket.send(message, (err) => {
      if (err) console.warn(`[WS] Send to ${sessionId} failed: ${err.message}`);
    });
  }

  close(sessionId: string): void {
    const socket = this.sockets.get(sessionId);
    if (!socket) return;
    this.sockets.delete(sessionId);
    socket.close(KICK_CLOSE_CODE, 'Kicked by admin');

    const timer = setTimeout(() => socket.terminate(), this.kickGraceMs);
    timer.unref();
    socket.once('close', () => clearTimeout(timer));
  }

  closeAll(): void {
    for (const socket of this.sockets.values()) {
      socket.terminate();
    }
    this.sockets.clear();
  }
}

/** Accept socket connections on `path` of an existing HTTP server. */
export function attachSocketServer(
  server: Server,
  path: string,
  transport: WsTransport,
  gateway: SocketGateway,
): WebSocketServer {
  const wss = new WebSocketServer({ server, path });

  wss.on('connection', (socket) => {
    const sessionId = uuidv4();
    transport.add(sessionId, socket);
    console.log(`[WS] Session ${sessionId} connected (${transport.size} open)`);

    socket.on('message', (data) => {
      try {
        gateway.handleMessage(sessionId, decode(data));
      } catch (err) {
        console.error(`[WS] Message from ${sessionId} failed: ${errorMessage(err)}`);
      }
    });

    socket.on('close', () => {
      transport.remove(sessionId);
      gateway.handleClose(sessionId);
      console.log(`[WS] Session ${sessionId} closed`);
    });

    socket.on('error', (err) => {
      console.warn(`[WS] Session ${sessionId} error: ${err.message}`);
    });

    try {
      gateway.handleConnect(sessionId);
    } catch (err) {
      console.error(`[WS] Connect of ${sessionId} failed: ${errorMessage(err)}`);
    }
  });

  return wss;
}
