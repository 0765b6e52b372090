import type { LiveLocation, ObjectView, WorldObject } from '../types.js';

// ─── World Events ───
// One event per committed mutation. Emitted by the store after the write
// resolves, consumed by the broadcaster and the stats cache.

export type WorldEvent =
  | { type: 'object_created'; object: ObjectView }
  | { type: 'object_updated'; object: ObjectView }
  | { type: 'object_collected'; objectId: string; foundBy: string; foundAt: string }
  | { type: 'object_uncollected'; objectId: string; findsDeleted: number }
  | { type: 'object_deleted'; objectId: string; findsDeleted: number }
  | { type: 'all_finds_reset'; findsDeleted: number }
  | { type: 'user_location_updated'; location: LiveLocation };

export interface WorldEventSink {
  emit(event: WorldEvent): void;
}

/** Sink that fans one event out to several sinks. */
export function combineSinks(...sinks: WorldEventSink[]): WorldEventSink {
  return {
    emit(event) {
      for (const sink of sinks) sink.emit(event);
    },
  };
}

// ─── Wire Format ───
// Clients speak snake_case JSON. Frames are { event, data }.

export interface WireFrame {
  event: string;
  data: unknown;
}

export interface WireObject {
  id: string;
  name: string;
  type: string;
  latitude: number;
  longitude: number;
  radius: number;
  created_at: string;
  created_by: string;
  grounding_height: number | null;
  ar_origin_latitude: number | null;
  ar_origin_longitude: number | null;
  ar_offset_x: number | null;
  ar_offset_y: number | null;
  ar_offset_z: number | null;
  ar_placement_timestamp: string | null;
  ar_anchor_transform: string | null;
  ar_placement_heading: number | null;
  multifindable: boolean;
  collected?: boolean;
  found_by?: string | null;
  found_at?: string | null;
  find_count?: number;
}

export function toWireObject(object: WorldObject | ObjectView): WireObject {
  const wire: WireObject = {
    id: object.id,
    name: object.name,
    type: object.type,
    latitude: object.latitude,
    longitude: object.longitude,
    radius: object.radius,
    created_at: object.createdAt,
    created_by: object.createdBy,
    grounding_height: object.groundingHeight,
    ar_origin_latitude: object.ar.arOriginLatitude,
    ar_origin_longitude: object.ar.arOriginLongitude,
    ar_offset_x: object.ar.arOffsetX,
    ar_offset_y: object.ar.arOffsetY,
    ar_offset_z: object.ar.arOffsetZ,
    ar_placement_timestamp: object.ar.arPlacementTimestamp,
    ar_anchor_transform: object.ar.arAnchorTransform,
    ar_placement_heading: object.ar.arPlacementHeading,
    multifindable: object.multifindable,
  };

  if ('collected' in object) {
    wire.collected = object.collected;
    wire.found_by = object.foundBy;
    wire.found_at = object.foundAt;
    wire.find_count = object.findCount;
  }

  return wire;
}

export function toWireLocation(location: LiveLocation) {
  return {
    device_uuid: location.deviceUuid,
    latitude: location.latitude,
    longitude: location.longitude,
    accuracy: location.accuracy,
    heading: location.heading,
    ar_offset_x: location.arOffset?.x ?? null,
    ar_offset_y: location.arOffset?.y ?? null,
    ar_offset_z: location.arOffset?.z ?? null,
    updated_at: location.updatedAt,
  };
}

export function toWireFrame(event: WorldEvent): WireFrame {
  switch (event.type) {
    case 'object_created':
    case 'object_updated':
      return { event: event.type, data: toWireObject(event.object) };
    case 'object_collected':
      return {
        event: event.type,
        data: { object_id: event.objectId, found_by: event.foundBy, found_at: event.foundAt },
      };
    case 'object_uncollected':
    case 'object_deleted':
      return { event: event.type, data: { object_id: event.objectId, finds_deleted: event.findsDeleted } };
    case 'all_finds_reset':
      return { event: event.type, data: { finds_deleted: event.findsDeleted } };
    case 'user_location_updated':
      return { event: event.type, data: toWireLocation(event.location) };
  }
}
