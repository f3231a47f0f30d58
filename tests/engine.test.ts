import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { afterEach, beforeAll, beforeEach, describe, expect, it } from 'vitest';
import { mergeTableFiles, runPipeline } from '../src/core/engine.js';
import { silentLogger } from '../src/core/logger.js';
import { ConfigSchema, MiningInput } from '../src/core/schema.js';
import { ZoneRegistry } from '../src/core/zones.js';
import { WARN, captureLog } from './support/log.js';

const input: MiningInput = {
  groups: [
    {
      partition: 'TWW',
      category: 'herbs',
      sources: [
        { sourceId: '401', name: 'Mycobloom', points: [{ zone: '14717', x: 10, y: 20 }] },
        { sourceId: '402', points: [{ zone: '14717', x: 10, y: 20 }, { zone: '1', x: 50, y: 50 }] }
      ]
    },
    {
      partition: 'TWW',
      category: 'fish',
      sources: [
        {
          sourceId: '1118',
          points: [
            { zone: '14838', x: 25, y: 75 },
            { zone: '99999', x: 1, y: 1 },
            { zone: '6511', x: 1, y: 1 }
          ]
        }
      ]
    }
  ]
};

const HERB_TABLE =
  'GatherMate2HerbDB = {\n' +
  '\t[27] = {\n' +
  '\t\t[5000500000] = 402,\n' +
  '\t},\n' +
  '\t[2248] = {\n' +
  '\t\t[1000200000] = 401,\n' +
  '\t\t[1000200001] = 402,\n' +
  '\t},\n' +
  '}';

const FISH_TABLE = 'GatherMate2FishDB = {\n\t[2215] = {\n\t\t[2500750000] = 1118,\n\t},\n}';

const now = () => new Date(2026, 0, 2, 3, 4, 5);

describe('runPipeline', () => {
  let registry: ZoneRegistry;
  let dir: string;

  beforeAll(async () => {
    registry = await ZoneRegistry.fromFile();
  });

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), 'nodepack-run-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('writes one table per mined category and a cache per partition', async () => {
    const config = ConfigSchema.parse({ outDir: dir });
    const summary = await runPipeline(input, config, { log: silentLogger(), registry, now });

    expect(summary).toEqual({
      firstRun: true,
      categories: { herbs: { nodes: 3, new: 3 }, fish: { nodes: 1, new: 1 } },
      partitions: { TWW: { nodes: 4, new: 4 } },
      files: [path.join(dir, 'Mined_HerbalismData.lua'), path.join(dir, 'Mined_FishData.lua')],
      merge: { status: 'skipped' },
      cachesSaved: ['TWW']
    });
    expect(await readFile(path.join(dir, 'Mined_HerbalismData.lua'), 'utf-8')).toBe(HERB_TABLE);
    expect(await readFile(path.join(dir, 'Mined_FishData.lua'), 'utf-8')).toBe(FISH_TABLE);
    expect(JSON.parse(await readFile(path.join(dir, 'node_cache_TWW.json'), 'utf-8'))).toEqual({
      expansion: 'TWW',
      last_run: '2026-01-02 03:04:05',
      nodes: {
        '2248_herbs': { '1000200000': '401', '1000200001': '402' },
        '27_herbs': { '5000500000': '402' },
        '2215_fish': { '2500750000': '1118' }
      }
    });
  });

  it('finds nothing new on an identical second run', async () => {
    const config = ConfigSchema.parse({ outDir: dir });
    await runPipeline(input, config, { log: silentLogger(), registry, now });
    const summary = await runPipeline(input, config, { log: silentLogger(), registry, now });
    expect(summary.firstRun).toBe(false);
    expect(summary.partitions).toEqual({ TWW: { nodes: 4, new: 0 } });
  });

  it('warns once about an unlisted zone and skips suppressed ones quietly', async () => {
    const { log, lines } = captureLog();
    await runPipeline(input, ConfigSchema.parse({ outDir: dir }), { log, registry, now });
    const warnings = lines.filter((line) => line.level === WARN);
    expect(warnings).toHaveLength(1);
    expect(warnings[0]).toMatchObject({ msg: 'found unlisted zone, skipping its nodes', zone: '99999' });
  });

  it('keeps caches apart from tables when asked', async () => {
    const cacheDir = path.join(dir, 'cache');
    await runPipeline(input, ConfigSchema.parse({ outDir: dir, cacheDir }), { log: silentLogger(), registry, now });
    const cached: unknown = JSON.parse(await readFile(path.join(cacheDir, 'node_cache_TWW.json'), 'utf-8'));
    expect(cached).toMatchObject({ expansion: 'TWW' });
  });

  it('runs only the selected categories and partitions', async () => {
    const fishOnly = await runPipeline(input, ConfigSchema.parse({ outDir: dir, categories: ['fish'] }), { log: silentLogger(), registry, now });
    expect(fishOnly.files).toEqual([path.join(dir, 'Mined_FishData.lua')]);

    const nothing = await runPipeline(input, ConfigSchema.parse({ outDir: dir, partitions: ['Classic'] }), { log: silentLogger(), registry, now });
    expect(nothing.files).toEqual([]);
    expect(nothing.cachesSaved).toEqual([]);
  });

  it('merges into SavedVariables after a backup', async () => {
    const target = path.join(dir, 'GatherMate2.lua');
    await writeFile(target, 'GatherMate2DB = {\n\t["x"] = 1,\n}\n');
    const config = ConfigSchema.parse({ outDir: dir, savedVariablesPath: target });
    const summary = await runPipeline(input, config, { log: silentLogger(), registry, now });

    expect(summary.merge).toEqual({
      status: 'merged',
      path: target,
      backupPath: `${target}.backup_20260102_030405`,
      zones: { herbs: 2, fish: 1 }
    });
    expect(await readFile(target, 'utf-8')).toBe(`GatherMate2DB = {\n\t["x"] = 1,\n}\n${HERB_TABLE}\n${FISH_TABLE}\n`);
  });

  it('keeps the mined files and caches when the merge fails', async () => {
    const target = path.join(dir, 'missing', 'GatherMate2.lua');
    const config = ConfigSchema.parse({ outDir: dir, savedVariablesPath: target });
    const summary = await runPipeline(input, config, { log: silentLogger(), registry, now });

    expect(summary.merge.status).toBe('failed');
    expect(summary.files).toHaveLength(2);
    expect(summary.cachesSaved).toEqual(['TWW']);
  });
});

describe('mergeTableFiles', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), 'nodepack-merge-files-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('folds table files on disk into SavedVariables', async () => {
    await writeFile(path.join(dir, 'Mined_HerbalismData.lua'), HERB_TABLE);
    await writeFile(path.join(dir, 'Mined_TreasureData.lua'), 'GatherMate2TreasureDB = {');
    const target = path.join(dir, 'GatherMate2.lua');
    const { log, lines } = captureLog();
    const outcome = await mergeTableFiles(dir, ConfigSchema.parse({ savedVariablesPath: target }), { log, now });

    expect(outcome).toEqual({ status: 'merged', path: target, backupPath: undefined, zones: { herbs: 2 } });
    expect(await readFile(target, 'utf-8')).toBe(`GatherMate2DB = {\n}\n${HERB_TABLE}\n`);
    expect(lines.filter((line) => line.level === WARN).map((line) => line.category)).toEqual(['treasures']);
  });

  it('skips without a target', async () => {
    await writeFile(path.join(dir, 'Mined_HerbalismData.lua'), HERB_TABLE);
    expect(await mergeTableFiles(dir, ConfigSchema.parse({}), { log: silentLogger() })).toEqual({ status: 'skipped' });
  });
});
