// ─── Environment Helpers ───
function envInt(name: string, fallback: number): number {
  const raw = process.env[name];
  if (!raw) return fallback;
  const parsed = parseInt(raw, 10);
  return Number.isFinite(parsed) ? parsed : fallback;
}

function envFloat(name: string, fallback: number): number {
  const raw = process.env[name];
  if (!raw) return fallback;
  const parsed = parseFloat(raw);
  return Number.isFinite(parsed) ? parsed : fallback;
}

// ─── Server ───
export const SERVER = {
  PORT: envInt('PORT', 5000),
  DB_PATH: process.env.DB_PATH || '',
  DEV_MODE: process.env.DEV_MODE === 'true',
  WS_PATH: process.env.WS_PATH || '/ws',
} as const;

// ─── Sync Engine ───
export const SYNC = {
  OBJECT_BATCH_SIZE: envInt('OBJECT_BATCH_SIZE', 50),
  RESYNC_INTERVAL_MS: envInt('RESYNC_INTERVAL_MS', 120_000), // periodic full resync
  LOCATION_FRESHNESS_MS: envInt('LOCATION_FRESHNESS_MS', 5 * 60 * 1000),
  ADMIN_PING_TTL_MS: envInt('ADMIN_PING_TTL_MS', 30_000),
} as const;

// ─── Store Writer ───
export const WRITER = {
  MAX_ATTEMPTS: envInt('WRITE_MAX_ATTEMPTS', 3),
  RETRY_BASE_MS: envInt('WRITE_RETRY_BASE_MS', 100), // doubles per attempt
  QUEUE_TIMEOUT_MS: envInt('WRITE_QUEUE_TIMEOUT_MS', 5000),
} as const;

// ─── World ───
export const WORLD = {
  DEFAULT_SEARCH_RADIUS_M: 10_000,
  METERS_PER_DEGREE: 111_000,
  DEFAULT_CREATED_BY: 'unknown',
  DEFAULT_MAP_CENTER: {
    latitude: envFloat('DEFAULT_MAP_LAT', 40.0758),
    longitude: envFloat('DEFAULT_MAP_LON', -105.3008),
  },
  TOP_FINDERS_LIMIT: 10,
  STATS_CACHE_TTL: envInt('STATS_CACHE_TTL', 5), // seconds
} as const;
