#!/usr/bin/env npx tsx
/**
 * Seed a few shared test objects around the default map center.
 * Run with: npx tsx scripts/seed-objects.ts
 * Existing ids are skipped, so the script can be re-run.
 */

import { openDatabase } from '../src/db/index.js';
import { SerialWriter } from '../src/engine/writer.js';
import { FindLedger } from '../src/engine/finds.js';
import { WorldStore } from '../src/engine/objects.js';
import { ConflictError } from '../src/engine/errors.js';
import type { WorldEventSink } from '../src/realtime/events.js';
import { SERVER, WORLD } from '../src/world/config.js';
import type { NewObjectInput } from '../src/types.js';

const { latitude, longitude } = WORLD.DEFAULT_MAP_CENTER;

const SEED_OBJECTS: NewObjectInput[] = [
  { id: 'seed-chalice-001', name: 'Golden Chalice', type: 'Chalice', latitude, longitude, radius: 5 },
  { id: 'seed-chest-001', name: 'Iron Chest', type: 'Treasure Chest', latitude: latitude + 0.0001, longitude: longitude - 0.0001, radius: 5 },
  { id: 'seed-relic-001', name: 'Stone Relic', type: 'Temple Relic', latitude: latitude + 0.0002, longitude: longitude - 0.0002, radius: 5 },
  { id: 'seed-chalice-002', name: 'Silver Chalice', type: 'Chalice', latitude: latitude - 0.0001, longitude: longitude + 0.0001, radius: 5 },
  { id: 'seed-orb-001', name: 'Glass Orb', type: 'Sphere', latitude: latitude + 0.0003, longitude: longitude - 0.0003, radius: 5, multifindable: true },
];

// No sockets here, so events have nowhere to go.
const offline: WorldEventSink = { emit: () => undefined };

const database = openDatabase(SERVER.DB_PATH || undefined);
const writer = new SerialWriter();
const ledger = new FindLedger(database.db, writer, offline);
const world = new WorldStore(database.db, writer, ledger, offline);

console.log('🌱 Seeding shared objects...');

let created = 0;
let skipped = 0;
for (const input of SEED_OBJECTS) {
  try {
    await world.createObject({ ...input, createdBy: 'seed-script' });
    created++;
    console.log(`✅ Created: ${input.name} (${input.id})`);
  } catch (err) {
    if (!(err instanceof ConflictError)) throw err;
    skipped++;
    console.log(`⏭️  Skipped (already exists): ${input.name} (${input.id})`);
  }
}

console.log(`\n📊 Created ${created}, skipped ${skipped}. Objects in database: ${world.countObjects()}`);
database.close();
