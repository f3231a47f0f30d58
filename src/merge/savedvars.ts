import { copyFile, readFile } from 'node:fs/promises';
import { BACKUP_INFIX, CATEGORIES } from '../core/constants.js';
import { MergeWriteError } from '../core/errors.js';
import { Logger } from '../core/logger.js';
import { Category, CategoryTables } from '../core/types.js';
import { isMissingFile, writeTextFile } from '../core/utils/files.js';
import { formatBackupStamp } from '../core/utils/time.js';
import { emptyDocument, readDocument, renderDocument } from './document.js';
import { mergeDocument } from './merge.js';

export type MergeIntoFileOptions = {
  prefix: string;
  now: Date;
  log: Logger;
};

export type MergeIntoFileResult = {
  backupPath?: string;
  zones: Partial<Record<Category, number>>;
};

export const backupPathFor = (path: string, now: Date): string => `${path}${BACKUP_INFIX}${formatBackupStamp(now)}`;

/**
 * Merges new node tables into the SavedVariables file at `path`, in place.
 * An existing file is copied aside first. Unreadable settings abort with a
 * TableParseError before anything is touched; I/O failures surface as
 * MergeWriteError.
 */
export async function mergeIntoFile(path: string, newTables: CategoryTables, { prefix, now, log }: MergeIntoFileOptions): Promise<MergeIntoFileResult> {
  let existingText: string | undefined;
  try {
    existingText = await readFile(path, 'utf-8');
    log.info({ path }, 'read existing SavedVariables');
  } catch (error) {
    if (!isMissingFile(error)) throw new MergeWriteError(path, error);
    log.info({ path }, 'no SavedVariables yet, creating a new file');
  }

  const existing = existingText === undefined ? emptyDocument(prefix) : readDocument(existingText, { prefix, log });
  const merged = mergeDocument(existing, newTables);
  const output = renderDocument(merged, prefix);

  let backupPath: string | undefined;
  try {
    if (existingText !== undefined) {
      backupPath = backupPathFor(path, now);
      await copyFile(path, backupPath);
      log.info({ path: backupPath }, 'backup created');
    }
    await writeTextFile(path, output);
  } catch (error) {
    throw new MergeWriteError(path, error);
  }

  for (const category of CATEGORIES) {
    if (existing.unreadable[category] !== undefined && merged.unreadable[category] === undefined) {
      log.warn({ category, path, backupPath }, 'unreadable node table replaced by new nodes, its old text is only in the backup');
    }
  }

  const zones: Partial<Record<Category, number>> = {};
  for (const category of CATEGORIES) {
    const table = newTables[category];
    if (table) zones[category] = Object.keys(table).length;
  }
  log.info({ path, zones }, 'merged node tables into SavedVariables');
  return { backupPath, zones };
}
