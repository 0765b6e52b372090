import { sqliteTable, text, integer, real, index } from 'drizzle-orm/sqlite-core';

// ─── Objects ───
export const objects = sqliteTable('objects', {
  id: text('id').primaryKey(),
  name: text('name').notNull(),
  type: text('type').notNull(),
  latitude: real('latitude').notNull(),
  longitude: real('longitude').notNull(),
  radius: real('radius').notNull(), // meters
  createdAt: text('created_at').notNull(),
  createdBy: text('created_by'),
  groundingHeight: real('grounding_height'),
  // AR placement payload (opaque to the server)
  arOriginLatitude: real('ar_origin_latitude'),
  arOriginLongitude: real('ar_origin_longitude'),
  arOffsetX: real('ar_offset_x'),
  arOffsetY: real('ar_offset_y'),
  arOffsetZ: real('ar_offset_z'),
  arPlacementTimestamp: text('ar_placement_timestamp'),
  arAnchorTransform: text('ar_anchor_transform'), // base64
  arPlacementHeading: real('ar_placement_heading'),
  multifindable: integer('multifindable', { mode: 'boolean' }).notNull().default(false),
}, (table) => ({
  createdAtIdx: index('objects_created_at_idx').on(table.createdAt),
  latLonIdx: index('objects_lat_lon_idx').on(table.latitude, table.longitude),
}));

// ─── Finds (append-only ledger) ───
export const finds = sqliteTable('finds', {
  id: integer('id').primaryKey({ autoIncrement: true }),
  objectId: text('object_id').notNull().references(() => objects.id),
  foundBy: text('found_by').notNull(),
  foundAt: text('found_at').notNull(),
}, (table) => ({
  objectIdx: index('finds_object_idx').on(table.objectId),
  foundByIdx: index('finds_found_by_idx').on(table.foundBy),
}));

// ─── Players ───
export const players = sqliteTable('players', {
  deviceUuid: text('device_uuid').primaryKey(),
  playerName: text('player_name').notNull(),
  createdAt: text('created_at').notNull(),
  updatedAt: text('updated_at').notNull(),
});

// ─── Last Known Locations (map centering) ───
export const userLastLocations = sqliteTable('user_last_locations', {
  deviceUuid: text('device_uuid').primaryKey(),
  latitude: real('latitude').notNull(),
  longitude: real('longitude').notNull(),
  updatedAt: text('updated_at').notNull(),
});
