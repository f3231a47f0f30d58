import { readFile } from 'node:fs/promises';
import path from 'node:path';
import { CATEGORIES, CATEGORY_FILES } from '../core/constants.js';
import { TableParseError, describeError } from '../core/errors.js';
import { Logger } from '../core/logger.js';
import { CategoryTable, CategoryTables } from '../core/types.js';
import { isMissingFile, writeTextFile } from '../core/utils/files.js';
import { parseCategoryTable, serializeCategoryTable } from '../lua/table.js';
import { tableNameFor } from '../merge/document.js';

/** Writes `Mined_<Kind>Data.lua` for one category and returns its path. */
export async function writeCategoryFile(outDir: string, table: CategoryTable, prefix: string): Promise<string> {
  const file = path.join(outDir, CATEGORY_FILES[table.category]);
  await writeTextFile(file, serializeCategoryTable(table, tableNameFor(prefix, table.category)));
  return file;
}

/**
 * Reads back whichever mined table files exist in `dir`. A file that does not
 * parse is reported and left out.
 */
export async function readCategoryFiles(dir: string, prefix: string, log: Logger): Promise<CategoryTables> {
  const tables: CategoryTables = {};
  for (const category of CATEGORIES) {
    const file = path.join(dir, CATEGORY_FILES[category]);
    let text: string;
    try {
      text = await readFile(file, 'utf-8');
    } catch (error) {
      if (isMissingFile(error)) {
        log.debug({ category, path: file }, 'no mined table file');
        continue;
      }
      throw error;
    }
    try {
      tables[category] = parseCategoryTable(text, tableNameFor(prefix, category));
    } catch (error) {
      if (!(error instanceof TableParseError)) throw error;
      log.warn({ category, path: file, reason: describeError(error) }, 'mined table file does not parse, skipping it');
    }
  }
  return tables;
}
