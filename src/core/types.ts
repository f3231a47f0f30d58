import { CATEGORIES } from './constants.js';

export type Category = (typeof CATEGORIES)[number];

/**
 * A map region as the addon knows it. Identity is the canonical id; the
 * external id is only the key the scraper looked it up under.
 */
export class Zone {
  readonly externalId: string;
  readonly canonicalId: string;
  readonly displayName: string;

  constructor(externalId: string, canonicalId: string, displayName: string) {
    this.externalId = externalId;
    this.canonicalId = canonicalId;
    this.displayName = displayName;
    Object.freeze(this);
  }

  equals(other: Zone): boolean {
    return this.canonicalId === other.canonicalId;
  }
}

export type RawObservation = {
  zone: Zone;
  x: number;
  y: number;
  sourceId: string;
};

export type Entry = {
  packedCoordinate: number;
  sourceId: string;
};

export type ZoneEntries = {
  zone: Zone;
  entries: Entry[];
};

/** Entries per zone in insertion order; keyed by canonical zone id. */
export type CategoryTable = {
  category: Category;
  zones: Map<string, ZoneEntries>;
};

/** canonicalId -> packed coordinate text -> source id text. */
export type ParsedTable = Record<string, Record<string, string>>;

export type CategoryTables = Partial<Record<Category, ParsedTable>>;

export type PersistedDocument = {
  settings: string;
  extras: string[];
  tables: CategoryTables;
  /** Source text of node tables that could not be read, kept until new data replaces them. */
  unreadable: Partial<Record<Category, string>>;
};

export type CacheNodes = Record<string, Record<string, string>>;

export type CacheSnapshot = {
  expansion: string;
  last_run: string;
  nodes: CacheNodes;
};

export type NodeCounts = { nodes: number; new: number };

export type MergeOutcome =
  | { status: 'skipped' }
  | { status: 'merged'; path: string; backupPath?: string; zones: Partial<Record<Category, number>> }
  | { status: 'failed'; path: string; error: string };

export type RunSummary = {
  firstRun: boolean;
  categories: Partial<Record<Category, NodeCounts>>;
  partitions: Record<string, NodeCounts>;
  files: string[];
  merge: MergeOutcome;
  cachesSaved: string[];
};
