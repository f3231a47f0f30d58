import { CATEGORIES, CATEGORY_LABELS, SETTINGS_SUFFIX } from '../core/constants.js';
import { TableParseError } from '../core/errors.js';
import { Logger } from '../core/logger.js';
import { Category, CategoryTables, PersistedDocument } from '../core/types.js';
import { parseDocument } from '../lua/parser.js';
import { serializeTable, toParsedTable } from '../lua/table.js';

export const tableNameFor = (prefix: string, category: Category): string =>
  `${prefix}${CATEGORY_LABELS[category]}${SETTINGS_SUFFIX}`;

export const settingsNameFor = (prefix: string): string => `${prefix}${SETTINGS_SUFFIX}`;

export const emptySettings = (prefix: string): string => `${settingsNameFor(prefix)} = {\n}`;

export const emptyDocument = (prefix: string): PersistedDocument => ({
  settings: emptySettings(prefix),
  extras: [],
  tables: {},
  unreadable: {}
});

export type ReadDocumentOptions = { prefix: string; log: Logger };

/**
 * Splits a SavedVariables file into the addon settings (kept as text), node
 * tables per category (parsed), and any other sections (kept as text).
 * A node table that cannot be read counts as empty and its text is kept;
 * anything else that cannot be read aborts, so no settings are ever dropped.
 */
export function readDocument(text: string, { prefix, log }: ReadDocumentOptions): PersistedDocument {
  const parsed = parseDocument(text);
  const categoryByName = new Map<string, Category>(CATEGORIES.map((category) => [tableNameFor(prefix, category), category]));
  const settingsName = settingsNameFor(prefix);
  const tables: CategoryTables = {};
  const unreadable: PersistedDocument['unreadable'] = {};

  for (const error of parsed.errors) {
    const category = error.name === undefined ? undefined : categoryByName.get(error.name);
    if (!category) {
      throw new TableParseError(`${error.name ?? 'statement'}: ${error.message}`, error.line);
    }
    log.warn({ category, table: error.name, line: error.line, reason: error.message }, 'unreadable node table treated as empty');
    tables[category] = {};
    unreadable[category] = error.source;
  }

  let settings: string | undefined;
  const extras: string[] = [];
  for (const section of parsed.sections) {
    if (section.name === settingsName) {
      settings = section.source;
      continue;
    }
    const category = categoryByName.get(section.name);
    if (!category) {
      extras.push(section.source);
      continue;
    }
    try {
      tables[category] = toParsedTable(section.value, section.name, section.line);
    } catch (error) {
      if (!(error instanceof TableParseError)) throw error;
      log.warn({ category, table: section.name, line: section.line, reason: error.message }, 'unreadable node table treated as empty');
      tables[category] = {};
      unreadable[category] = section.source;
    }
  }

  if (settings === undefined) {
    log.info({ table: settingsName }, 'no settings section found, writing an empty one');
  }
  return { settings: settings ?? emptySettings(prefix), extras, tables, unreadable };
}

export function renderDocument(document: PersistedDocument, prefix: string): string {
  const parts = [document.settings, ...document.extras];
  for (const category of CATEGORIES) {
    const table = document.tables[category];
    const raw = document.unreadable[category];
    if (table && Object.keys(table).length > 0) {
      parts.push(serializeTable(tableNameFor(prefix, category), table));
    } else if (raw !== undefined) {
      parts.push(raw);
    }
  }
  return `${parts.join('\n')}\n`;
}
