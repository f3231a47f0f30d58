import { mkdir } from 'node:fs/promises';
import { DeltaTracker, unionSnapshots } from '../cache/delta.js';
import { loadSnapshot, saveSnapshot } from '../cache/store.js';
import { readCategoryFiles, writeCategoryFile } from '../export/tables.js';
import { mergeIntoFile } from '../merge/savedvars.js';
import { aggregate, countEntries, tableToParsed } from './aggregate.js';
import { CATEGORIES } from './constants.js';
import { NodepackError, describeError } from './errors.js';
import { Logger } from './logger.js';
import { MiningInput, NodepackConfig } from './schema.js';
import { CategoryTables, MergeOutcome, NodeCounts, RawObservation, RunSummary } from './types.js';
import { ZoneRegistry } from './zones.js';

export type PipelineContext = {
  log: Logger;
  registry: ZoneRegistry;
  now?: () => Date;
};

type SourceTally = NodeCounts & { name: string; partition: string };

type TrackedObservation = RawObservation & { partition: string; tally: SourceTally };

type InputGroup = MiningInput['groups'][number];

function selectGroups(input: MiningInput, config: NodepackConfig): InputGroup[] {
  return input.groups.filter((group) =>
    (!config.partitions || config.partitions.includes(group.partition)) &&
    (!config.categories || config.categories.includes(group.category))
  );
}

/**
 * Resolves every point to its zone, in group, then source, then point order.
 * That order decides which of two colliding nodes keeps the plain key.
 */
function resolveObservations(groups: InputGroup[], registry: ZoneRegistry, log: Logger) {
  const observations: TrackedObservation[] = [];
  const tallies: SourceTally[] = [];
  const reported = new Set<string>();
  for (const group of groups) {
    for (const source of group.sources) {
      const tally: SourceTally = { name: source.name ?? source.sourceId, partition: group.partition, nodes: 0, new: 0 };
      tallies.push(tally);
      for (const point of source.points) {
        const lookup = registry.resolve(point.zone);
        if (lookup.kind !== 'zone') {
          if (!reported.has(point.zone)) {
            reported.add(point.zone);
            if (lookup.kind === 'unlisted') {
              log.warn({ zone: point.zone, partition: group.partition, category: group.category, sourceId: source.sourceId }, 'found unlisted zone, skipping its nodes');
            } else {
              log.debug({ zone: point.zone }, 'suppressed zone skipped');
            }
          }
          continue;
        }
        observations.push({ zone: lookup.zone, x: point.x, y: point.y, sourceId: source.sourceId, partition: group.partition, tally });
      }
    }
  }
  return { observations, tallies };
}

async function loadPriorNodes(cacheDir: string, partitions: string[], log: Logger) {
  const loaded = await Promise.all(partitions.map((partition) => loadSnapshot(cacheDir, partition, log)));
  return {
    prior: unionSnapshots(loaded.map((entry) => entry.snapshot)),
    firstRun: !loaded.some((entry) => entry.found)
  };
}

/**
 * One mining run: aggregate every selected group, write the mined table
 * files, fold them into SavedVariables when configured, and replace the
 * cache of each partition that produced nodes.
 */
export async function runPipeline(input: MiningInput, config: NodepackConfig, context: PipelineContext): Promise<RunSummary> {
  const { log, registry } = context;
  const runAt = (context.now ?? (() => new Date()))();
  const cacheDir = config.cacheDir ?? config.outDir;
  const groups = selectGroups(input, config);
  const partitions = [...new Set(groups.map((group) => group.partition))];

  await mkdir(config.outDir, { recursive: true });
  await mkdir(cacheDir, { recursive: true });

  const { prior, firstRun } = await loadPriorNodes(cacheDir, partitions, log);
  const tracker = new DeltaTracker(prior);
  const tables: CategoryTables = {};
  const files: string[] = [];

  for (const category of CATEGORIES) {
    const categoryGroups = groups.filter((group) => group.category === category);
    if (categoryGroups.length === 0) continue;
    const { observations, tallies } = resolveObservations(categoryGroups, registry, log);
    const table = aggregate(category, observations, (observation, entry) => {
      const { isNew } = tracker.record({
        partition: observation.partition,
        zoneId: observation.zone.canonicalId,
        category,
        packedCoordinate: entry.packedCoordinate,
        sourceId: entry.sourceId
      });
      observation.tally.nodes += 1;
      if (isNew) observation.tally.new += 1;
    });
    for (const tally of tallies) {
      log.info({ category, partition: tally.partition, source: tally.name, nodes: tally.nodes, new: tally.new }, 'processed source');
    }
    if (countEntries(table) === 0) {
      log.info({ category }, 'no nodes mined, no table written');
      continue;
    }
    const file = await writeCategoryFile(config.outDir, table, config.tablePrefix);
    files.push(file);
    tables[category] = tableToParsed(table);
    const counts = tracker.countsByCategory()[category];
    log.info({ category, path: file, nodes: counts?.nodes ?? 0, new: counts?.new ?? 0 }, 'saved mined table');
  }

  const merge = await mergeStep(config, tables, runAt, log);

  const cachesSaved: string[] = [];
  for (const partition of tracker.partitions) {
    if (await saveSnapshot(cacheDir, tracker.snapshotFor(partition, runAt), log)) {
      cachesSaved.push(partition);
    }
  }

  const summary: RunSummary = {
    firstRun,
    categories: tracker.countsByCategory(),
    partitions: tracker.countsByPartition(),
    files,
    merge,
    cachesSaved
  };
  const totalNew = Object.values(summary.partitions).reduce((acc, counts) => acc + counts.new, 0);
  if (firstRun) {
    log.info({ nodes: Object.values(summary.partitions).reduce((acc, counts) => acc + counts.nodes, 0) }, 'first run, all nodes are considered new');
  } else {
    log.info({ new: totalNew, categories: summary.categories }, totalNew > 0 ? 'new nodes found since last run' : 'no new nodes since last run');
  }
  return summary;
}

async function mergeStep(config: NodepackConfig, tables: CategoryTables, runAt: Date, log: Logger): Promise<MergeOutcome> {
  const target = config.savedVariablesPath;
  if (!target) return { status: 'skipped' };
  if (Object.keys(tables).length === 0) {
    log.info({ path: target }, 'nothing mined, SavedVariables left alone');
    return { status: 'skipped' };
  }
  try {
    const result = await mergeIntoFile(target, tables, { prefix: config.tablePrefix, now: runAt, log });
    return { status: 'merged', path: target, backupPath: result.backupPath, zones: result.zones };
  } catch (error) {
    if (!(error instanceof NodepackError)) throw error;
    log.error({ path: target, code: error.code, reason: error.message }, 'writing SavedVariables failed, mined table files are still usable');
    return { status: 'failed', path: target, error: describeError(error) };
  }
}

/** Folds mined table files already on disk into SavedVariables. */
export async function mergeTableFiles(tablesDir: string, config: NodepackConfig, context: Omit<PipelineContext, 'registry'>): Promise<MergeOutcome> {
  const { log } = context;
  const runAt = (context.now ?? (() => new Date()))();
  const tables = await readCategoryFiles(tablesDir, config.tablePrefix, log);
  return mergeStep(config, tables, runAt, log);
}
