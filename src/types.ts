// ─── World Objects ───

/**
 * AR placement payload. Produced by the placing client and passed through
 * untouched; the server never interprets these values.
 */
export interface ArPlacement {
  arOriginLatitude: number | null;
  arOriginLongitude: number | null;
  arOffsetX: number | null;
  arOffsetY: number | null;
  arOffsetZ: number | null;
  arPlacementTimestamp: string | null;
  arAnchorTransform: string | null; // base64 blob
  arPlacementHeading: number | null;
}

export type ArPlacementPatch = Partial<ArPlacement>;

export interface WorldObject {
  id: string;
  name: string;
  type: string;
  latitude: number;
  longitude: number;
  radius: number;
  createdAt: string;
  createdBy: string;
  groundingHeight: number | null;
  ar: ArPlacement;
  multifindable: boolean;
}

export interface NewObjectInput {
  id: string;
  name: string;
  type: string;
  latitude: number;
  longitude: number;
  radius: number;
  createdBy?: string;
  groundingHeight?: number | null;
  ar?: ArPlacementPatch;
  multifindable?: boolean;
}

export interface LocationPatch {
  latitude?: number;
  longitude?: number;
}

// ─── Finds & Visibility ───

export interface FindRecord {
  id: number;
  objectId: string;
  foundBy: string;
  foundAt: string;
}

export interface Visibility {
  collected: boolean;
  foundBy: string | null;
  foundAt: string | null;
  findCount: number;
}

export type ObjectView = WorldObject & Visibility;

export interface ObjectQuery {
  latitude?: number;
  longitude?: number;
  radius?: number;
  includeFound?: boolean;
  viewer?: string;
}

export interface UnmarkResult {
  objectId: string;
  findsDeleted: number;
  alreadyUnfound: boolean;
}

export interface UserFind {
  objectId: string;
  name: string;
  type: string;
  latitude: number;
  longitude: number;
  foundAt: string;
}

// ─── Players ───

export interface Player {
  deviceUuid: string;
  playerName: string;
  createdAt: string;
  updatedAt: string;
}

export interface PlayerSummary extends Player {
  displayName: string;
  findCount: number;
  connected: boolean;
}

export interface TopFinder {
  user: string;
  displayName: string;
  count: number;
}

export interface WorldStats {
  totalObjects: number;
  foundObjects: number;
  unfoundObjects: number;
  totalFinds: number;
  topFinders: TopFinder[];
}

// ─── Presence & Locations ───

export type SessionPhase = 'connected' | 'registered' | 'syncing' | 'live' | 'disconnected';

export interface ConnectedDevice {
  deviceUuid: string;
  sessionCount: number;
  sessionIds: string[];
}

export interface ArOffset {
  x: number;
  y: number;
  z: number;
}

export interface LocationUpdate {
  latitude: number;
  longitude: number;
  accuracy?: number | null;
  heading?: number | null;
  arOffset?: ArOffset | null;
}

export interface LiveLocation {
  deviceUuid: string;
  latitude: number;
  longitude: number;
  accuracy: number | null;
  heading: number | null;
  arOffset: ArOffset | null;
  updatedAt: string;
}

export interface MapCenter {
  latitude: number;
  longitude: number;
  source: 'last_known' | 'default';
  deviceUuid?: string;
}
