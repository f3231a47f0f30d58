import { z } from 'zod';
import { CATEGORIES, DECIMAL_ID, DEFAULT_TABLE_PREFIX, PERCENT_MAX, PERCENT_MIN } from './constants.js';
import { LOG_LEVELS } from './logger.js';

const NumericId = z.string().regex(DECIMAL_ID, 'expected a decimal id');
const Percent = z.number().finite().min(PERCENT_MIN).max(PERCENT_MAX);
const TablePrefix = z.string().regex(/^[A-Za-z_][A-Za-z0-9_]*$/, 'expected a Lua identifier');

export const CategorySchema = z.enum(CATEGORIES);
export const PartitionSchema = z.string().regex(/^[A-Za-z0-9_-]+$/, 'expected a file-safe partition key');

export const ConfigSchema = z.object({
  outDir: z.string().default('out'),
  cacheDir: z.string().optional(),
  tablePrefix: TablePrefix.default(DEFAULT_TABLE_PREFIX),
  savedVariablesPath: z.string().optional(),
  partitions: z.array(PartitionSchema).optional(),
  categories: z.array(CategorySchema).optional(),
  zonesFile: z.string().optional(),
  logLevel: z.enum(LOG_LEVELS).default('info')
});

export type NodepackConfig = z.infer<typeof ConfigSchema>;

export const ZoneFileSchema = z.object({
  zones: z.array(z.object({ external: NumericId, canonical: NumericId, name: z.string() })),
  suppressed: z.array(NumericId).default([])
});

export const MiningInputSchema = z.object({
  groups: z.array(z.object({
    partition: PartitionSchema,
    category: CategorySchema,
    sources: z.array(z.object({
      sourceId: NumericId,
      name: z.string().optional(),
      points: z.array(z.object({ zone: NumericId, x: Percent, y: Percent }))
    }))
  }))
});

export type MiningInput = z.infer<typeof MiningInputSchema>;

const Coordinates = z.record(NumericId, NumericId);
const NodeMap = z.record(NumericId, Coordinates);

export const CacheSnapshotSchema = z.object({
  expansion: z.string(),
  last_run: z.string(),
  nodes: z.record(z.string(), Coordinates)
});

// ── HTTP request bodies ───────────────────────────────────────────
export const AggregateRequestSchema = z.object({
  category: CategorySchema,
  prefix: TablePrefix.default(DEFAULT_TABLE_PREFIX),
  observations: z.array(z.object({
    zoneId: z.string(),
    zoneName: z.string().optional(),
    x: z.number(),
    y: z.number(),
    sourceId: z.string()
  }))
});

export const ParseRequestSchema = z.object({
  text: z.string(),
  category: CategorySchema,
  prefix: TablePrefix.default(DEFAULT_TABLE_PREFIX)
});

export const MergeRequestSchema = z.object({
  document: z.string().default(''),
  tables: z.record(CategorySchema, NodeMap).default({}),
  prefix: TablePrefix.default(DEFAULT_TABLE_PREFIX)
});
