import { readFile } from 'node:fs/promises';
import path from 'node:path';
import { ZodError } from 'zod';
import { CACHE_FILE_PREFIX, CACHE_JSON_INDENT } from '../core/constants.js';
import { describeError } from '../core/errors.js';
import { Logger } from '../core/logger.js';
import { CacheSnapshotSchema } from '../core/schema.js';
import { CacheSnapshot } from '../core/types.js';
import { isMissingFile, writeTextFile } from '../core/utils/files.js';
import { countNodes } from './delta.js';

export const cacheFilePath = (dir: string, partition: string): string =>
  path.join(dir, `${CACHE_FILE_PREFIX}${partition}.json`);

export type LoadedSnapshot = { snapshot: CacheSnapshot; found: boolean };

/**
 * Reads a partition's cache. A missing, unreadable or malformed file counts as
 * an empty cache, so every node of that partition is reported as new.
 */
export async function loadSnapshot(dir: string, partition: string, log: Logger): Promise<LoadedSnapshot> {
  const file = cacheFilePath(dir, partition);
  const empty: CacheSnapshot = { expansion: partition, last_run: 'never', nodes: {} };
  let raw: string;
  try {
    raw = await readFile(file, 'utf-8');
  } catch (error) {
    if (isMissingFile(error)) {
      log.info({ partition, path: file }, 'no cache found (first run)');
    } else {
      log.warn({ partition, path: file, reason: describeError(error) }, 'could not read cache, treating it as empty');
    }
    return { snapshot: empty, found: false };
  }
  try {
    const snapshot = CacheSnapshotSchema.parse(JSON.parse(raw));
    log.info({ partition, nodes: countNodes(snapshot.nodes), lastRun: snapshot.last_run }, 'loaded cache');
    return { snapshot, found: true };
  } catch (error) {
    const reason = error instanceof ZodError ? error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ') : describeError(error);
    log.warn({ partition, path: file, reason }, 'corrupt cache, treating it as empty');
    return { snapshot: empty, found: false };
  }
}

/** Writes a partition's cache. Failure is logged and reported, never thrown. */
export async function saveSnapshot(dir: string, snapshot: CacheSnapshot, log: Logger): Promise<boolean> {
  const file = cacheFilePath(dir, snapshot.expansion);
  try {
    await writeTextFile(file, JSON.stringify(snapshot, null, CACHE_JSON_INDENT));
    log.info({ partition: snapshot.expansion, nodes: countNodes(snapshot.nodes) }, 'cache saved');
    return true;
  } catch (error) {
    log.error({ partition: snapshot.expansion, path: file, reason: describeError(error) }, 'failed to save cache');
    return false;
  }
}
