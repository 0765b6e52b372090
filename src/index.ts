import { serve } from '@hono/node-server';
import { Server } from 'http';
import { createApp } from './app.js';
import { createWorld } from './world/context.js';
import { WsTransport, attachSocketServer } from './realtime/server.js';
import { SERVER, SYNC } from './world/config.js';

// ─── Initialize ───
console.log('🌍 Initializing world sync server...');
const transport = new WsTransport();
const world = createWorld({ transport });
console.log(`🗺️  World loaded: ${world.objects.countObjects()} objects.`);

if (SERVER.DEV_MODE) {
  console.log('⚠️  DEV_MODE enabled: internal error messages are returned to clients');
}

const app = createApp(world);

// ─── Start ───
const server = serve({ fetch: app.fetch, port: SERVER.PORT }, (info) => {
  console.log(`\n📡 World sync server is live at http://localhost:${info.port}`);
  console.log(`🔌 WebSocket endpoint: ws://localhost:${info.port}${SERVER.WS_PATH}\n`);
});

if (!(server instanceof Server)) {
  throw new Error('WebSocket support needs an HTTP/1 server');
}

const wss = attachSocketServer(server, SERVER.WS_PATH, transport, world.gateway);
world.reconciler.start();
console.log(`🔄 Full resync every ${SYNC.RESYNC_INTERVAL_MS / 1000}s`);

// ─── Shutdown ───
function shutdown(signal: string): void {
  console.log(`\n🛑 ${signal} received, shutting down...`);
  world.reconciler.stop();
  transport.closeAll();
  wss.close();
  server.close(() => {
    world.close();
    process.exit(0);
  });
}

process.on('SIGINT', () => shutdown('SIGINT'));
process.on('SIGTERM', () => shutdown('SIGTERM'));

export default app;
