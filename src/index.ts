export { encodeCoordinate, allocateCoordinate } from './core/codec.js';
export { aggregate, aggregateSources, flattenSources, tableToParsed } from './core/aggregate.js';
export type { SourceObject, SourcePoint } from './core/aggregate.js';
export { ZoneRegistry } from './core/zones.js';
export { runPipeline, mergeTableFiles } from './core/engine.js';
export { ConfigSchema, MiningInputSchema } from './core/schema.js';
export type { NodepackConfig, MiningInput } from './core/schema.js';
export { createLogger, silentLogger, stderrLogger } from './core/logger.js';
export * from './core/errors.js';
export * from './core/types.js';
export { parseDocument } from './lua/parser.js';
export { serializeTable, serializeCategoryTable, parseCategoryTable } from './lua/table.js';
export { readDocument, renderDocument, tableNameFor } from './merge/document.js';
export { mergeDocument, mergeTables } from './merge/merge.js';
export { mergeIntoFile } from './merge/savedvars.js';
export { DeltaTracker, cacheKey, classify, unionSnapshots } from './cache/delta.js';
export { loadSnapshot, saveSnapshot } from './cache/store.js';
export { buildServer, zoneResolver } from './api/server.js';
