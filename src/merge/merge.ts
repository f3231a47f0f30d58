import { CATEGORIES } from '../core/constants.js';
import { CategoryTables, ParsedTable, PersistedDocument } from '../core/types.js';

function cloneTable(table: ParsedTable): ParsedTable {
  const copy: ParsedTable = {};
  for (const [zoneId, coords] of Object.entries(table)) {
    copy[zoneId] = { ...coords };
  }
  return copy;
}

/** Union of both tables; on a shared coordinate the incoming id wins. */
export function mergeTables(existing: ParsedTable | undefined, incoming: ParsedTable): ParsedTable {
  const merged = cloneTable(existing ?? {});
  for (const [zoneId, coords] of Object.entries(incoming)) {
    merged[zoneId] = { ...(merged[zoneId] ?? {}), ...coords };
  }
  return merged;
}

/**
 * Folds freshly mined tables into a persisted document. Nothing is ever
 * removed: a node missing from the new data stays as it was. Categories
 * without new data, settings and extra sections pass through, and so does the
 * text of an unreadable node table until new nodes replace it.
 */
export function mergeDocument(existing: PersistedDocument, newTables: CategoryTables): PersistedDocument {
  const tables: CategoryTables = {};
  const unreadable: PersistedDocument['unreadable'] = {};
  for (const category of CATEGORIES) {
    const current = existing.tables[category];
    const incoming = newTables[category];
    const raw = existing.unreadable[category];
    if (incoming) {
      tables[category] = mergeTables(current, incoming);
    } else if (current) {
      tables[category] = cloneTable(current);
    }
    if (raw !== undefined && !(incoming && Object.keys(incoming).length > 0)) {
      unreadable[category] = raw;
    }
  }
  return { settings: existing.settings, extras: [...existing.extras], tables, unreadable };
}
