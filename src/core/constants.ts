/**
 * Centralized constants for node packing, table layout and cache files.
 * The table names and file names are fixed by the GatherMate2 addon and the
 * files it imports, so they are not part of the run configuration.
 */

// ── Coordinate packing ────────────────────────────────────────────
export const COORDINATE_SCALE = 10_000;   // 4 fixed-point digits per axis
export const X_MULTIPLIER = 1_000_000;
export const Y_MULTIPLIER = 100;          // tens and units reserved for collisions
export const PERCENT_MIN = 0;
export const PERCENT_MAX = 100;

// Zone ids, packed coordinates and source ids are written unquoted into Lua.
export const DECIMAL_ID = /^\d+$/;

// ── Categories ────────────────────────────────────────────────────
export const CATEGORIES = ['herbs', 'ores', 'fish', 'treasures'] as const;

export const CATEGORY_LABELS = {
  herbs: 'Herb',
  ores: 'Mine',
  fish: 'Fish',
  treasures: 'Treasure'
} as const;

export const CATEGORY_FILES = {
  herbs: 'Mined_HerbalismData.lua',
  ores: 'Mined_MiningData.lua',
  fish: 'Mined_FishData.lua',
  treasures: 'Mined_TreasureData.lua'
} as const;

// ── SavedVariables ────────────────────────────────────────────────
export const DEFAULT_TABLE_PREFIX = 'GatherMate2';
export const SETTINGS_SUFFIX = 'DB';
export const BACKUP_INFIX = '.backup_';

// ── Cache ─────────────────────────────────────────────────────────
export const CACHE_FILE_PREFIX = 'node_cache_';
export const CACHE_KEY_SEPARATOR = '_';
export const CACHE_JSON_INDENT = 2;
