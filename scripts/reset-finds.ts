#!/usr/bin/env npx tsx
/**
 * Clear the finds ledger so every object is unfound again.
 * Run with: npx tsx scripts/reset-finds.ts
 * Connected clients are not notified; use POST /api/finds/reset on a running server for that.
 */

import { openDatabase } from '../src/db/index.js';
import { SerialWriter } from '../src/engine/writer.js';
import { FindLedger } from '../src/engine/finds.js';
import { WorldStore } from '../src/engine/objects.js';
import type { WorldEventSink } from '../src/realtime/events.js';
import { SERVER } from '../src/world/config.js';

const offline: WorldEventSink = { emit: () => undefined };

const database = openDatabase(SERVER.DB_PATH || undefined);
const writer = new SerialWriter();
const ledger = new FindLedger(database.db, writer, offline);
const world = new WorldStore(database.db, writer, ledger, offline);

console.log('🔄 Resetting all objects to unfound...');
const { findsDeleted } = await ledger.resetAllFinds();
console.log(`   Objects in database: ${world.countObjects()}`);
console.log(`   Finds removed: ${findsDeleted}`);
database.close();
