import { compareNumericKeys, tableToParsed } from '../core/aggregate.js';
import { DECIMAL_ID } from '../core/constants.js';
import { InputPreconditionError, TableParseError } from '../core/errors.js';
import { CategoryTable, ParsedTable } from '../core/types.js';
import { LuaValue, isTable, parseDocument } from './parser.js';

function assertDecimal(value: string, what: string): void {
  if (!DECIMAL_ID.test(value)) {
    throw new InputPreconditionError(`${what} "${value}" is not a decimal id`);
  }
}

/**
 * Renders a node table the way the addon expects it: zones by numeric map id,
 * nodes by packed coordinate, one tab per nesting level, no trailing newline.
 * Zones without nodes are left out. Every key and id must be decimal digits.
 */
export function serializeTable(tableName: string, table: ParsedTable): string {
  for (const [zoneId, coords] of Object.entries(table)) {
    assertDecimal(zoneId, `${tableName} zone`);
    for (const [coord, sourceId] of Object.entries(coords)) {
      assertDecimal(coord, `${tableName}[${zoneId}] coordinate`);
      assertDecimal(sourceId, `${tableName}[${zoneId}][${coord}]`);
    }
  }
  const lines = [`${tableName} = {`];
  for (const zoneId of Object.keys(table).sort(compareNumericKeys)) {
    const coords = table[zoneId];
    const keys = Object.keys(coords).sort(compareNumericKeys);
    if (keys.length === 0) continue;
    lines.push(`\t[${zoneId}] = {`);
    for (const coord of keys) {
      lines.push(`\t\t[${coord}] = ${coords[coord]},`);
    }
    lines.push('\t},');
  }
  lines.push('}');
  return lines.join('\n');
}

export function serializeCategoryTable(table: CategoryTable, tableName: string): string {
  return serializeTable(tableName, tableToParsed(table));
}

function integerText(value: LuaValue | undefined, what: string, line: number): string {
  if (typeof value !== 'number' || !Number.isSafeInteger(value) || value < 0) {
    throw new TableParseError(`${what} must be a non-negative integer`, line);
  }
  return String(value);
}

/**
 * Reads the shape `{ [zone] = { [coord] = id, ... }, ... }` out of a parsed
 * section. Anything else in the table is a parse error, not something to skip.
 */
export function toParsedTable(value: LuaValue, tableName: string, line: number): ParsedTable {
  if (!isTable(value)) {
    throw new TableParseError(`${tableName} is not a table`, line);
  }
  const parsed: ParsedTable = {};
  for (const zoneField of value.fields) {
    const zoneId = integerText(zoneField.key, `${tableName} zone key`, line);
    if (!isTable(zoneField.value)) {
      throw new TableParseError(`${tableName}[${zoneId}] is not a table`, line);
    }
    const coords: Record<string, string> = parsed[zoneId] ?? {};
    for (const nodeField of zoneField.value.fields) {
      const coord = integerText(nodeField.key, `${tableName}[${zoneId}] coordinate`, line);
      coords[coord] = integerText(nodeField.value, `${tableName}[${zoneId}][${coord}]`, line);
    }
    if (Object.keys(coords).length > 0) {
      parsed[zoneId] = coords;
    }
  }
  return parsed;
}

/**
 * Finds `tableName = { ... }` in arbitrary SavedVariables text and returns its
 * nodes. Other sections are ignored, broken ones included. A missing section
 * yields an empty table.
 */
export function parseCategoryTable(text: string, tableName: string): ParsedTable {
  const document = parseDocument(text);
  const broken = document.errors.find((error) => error.name === tableName);
  if (broken) {
    throw new TableParseError(`${tableName}: ${broken.message}`, broken.line);
  }
  let result: ParsedTable = {};
  for (const section of document.sections) {
    if (section.name === tableName) {
      result = toParsedTable(section.value, tableName, section.line);
    }
  }
  return result;
}
