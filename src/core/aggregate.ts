import { allocateCoordinate, encodeCoordinate } from './codec.js';
import { DECIMAL_ID, PERCENT_MAX, PERCENT_MIN } from './constants.js';
import { InputPreconditionError } from './errors.js';
import { Category, CategoryTable, Entry, ParsedTable, RawObservation, Zone } from './types.js';

export type SourcePoint = { zone: Zone; x: number; y: number };

/** One tracked object (a herb, a vein, a pool) and everywhere it was seen. */
export type SourceObject = {
  sourceId: string;
  name?: string;
  points: SourcePoint[];
};

export type PlacementListener<T extends RawObservation> = (observation: T, entry: Entry) => void;

function assertObservation(observation: RawObservation): void {
  const { zone, x, y, sourceId } = observation;
  if (!DECIMAL_ID.test(zone.canonicalId)) {
    throw new InputPreconditionError(`zone ${zone.displayName || zone.externalId} has non-numeric id "${zone.canonicalId}"`);
  }
  for (const [axis, value] of [['x', x], ['y', y]] as const) {
    if (!Number.isFinite(value) || value < PERCENT_MIN || value > PERCENT_MAX) {
      throw new InputPreconditionError(`${axis}=${value} out of range for source ${sourceId} in zone ${zone.canonicalId}`);
    }
  }
  if (!DECIMAL_ID.test(sourceId)) {
    throw new InputPreconditionError(`source id "${sourceId}" in zone ${zone.canonicalId} is not numeric`);
  }
}

/**
 * Builds the per-zone table for one category. Observations are placed in the
 * order given, so the bump applied to a colliding key depends on that order.
 * Every observation produces exactly one entry.
 */
export function aggregate<T extends RawObservation>(
  category: Category,
  observations: Iterable<T>,
  onPlace?: PlacementListener<T>
): CategoryTable {
  const zones: CategoryTable['zones'] = new Map();
  const occupiedByZone = new Map<string, Set<number>>();
  for (const observation of observations) {
    assertObservation(observation);
    const zoneId = observation.zone.canonicalId;
    let bucket = zones.get(zoneId);
    if (!bucket) {
      bucket = { zone: observation.zone, entries: [] };
      zones.set(zoneId, bucket);
    }
    let occupied = occupiedByZone.get(zoneId);
    if (!occupied) {
      occupied = new Set();
      occupiedByZone.set(zoneId, occupied);
    }
    const packedCoordinate = allocateCoordinate(encodeCoordinate(observation.x, observation.y), occupied);
    occupied.add(packedCoordinate);
    const entry: Entry = { packedCoordinate, sourceId: observation.sourceId };
    bucket.entries.push(entry);
    onPlace?.(observation, entry);
  }
  return { category, zones };
}

export function* flattenSources(sources: Iterable<SourceObject>): Generator<RawObservation> {
  for (const source of sources) {
    for (const point of source.points) {
      yield { zone: point.zone, x: point.x, y: point.y, sourceId: source.sourceId };
    }
  }
}

export function aggregateSources(category: Category, sources: Iterable<SourceObject>): CategoryTable {
  return aggregate(category, flattenSources(sources));
}

export const compareNumericKeys = (a: string, b: string): number => Number(a) - Number(b);

export function tableToParsed(table: CategoryTable): ParsedTable {
  const parsed: ParsedTable = {};
  const zoneIds = [...table.zones.keys()].sort(compareNumericKeys);
  for (const zoneId of zoneIds) {
    const bucket = table.zones.get(zoneId);
    if (!bucket || bucket.entries.length === 0) continue;
    const coords: Record<string, string> = {};
    const sorted = [...bucket.entries].sort((a, b) => a.packedCoordinate - b.packedCoordinate);
    for (const entry of sorted) {
      coords[String(entry.packedCoordinate)] = entry.sourceId;
    }
    parsed[zoneId] = coords;
  }
  return parsed;
}

export function countEntries(table: CategoryTable): number {
  let total = 0;
  for (const bucket of table.zones.values()) total += bucket.entries.length;
  return total;
}
