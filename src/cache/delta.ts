import { CACHE_KEY_SEPARATOR } from '../core/constants.js';
import { CacheNodes, CacheSnapshot, Category, NodeCounts } from '../core/types.js';
import { formatRunTimestamp } from '../core/utils/time.js';

export const cacheKey = (zoneId: string, category: Category): string => `${zoneId}${CACHE_KEY_SEPARATOR}${category}`;

export const countNodes = (nodes: CacheNodes): number =>
  Object.values(nodes).reduce((acc, coords) => acc + Object.keys(coords).length, 0);

export type NodeRecord = {
  partition: string;
  zoneId: string;
  category: Category;
  packedCoordinate: number;
  sourceId: string;
};

export type Classification = { isNew: boolean; key: string };

/** Everything any prior partition has seen, merged per zone and category. */
export function unionSnapshots(snapshots: Iterable<CacheSnapshot>): CacheNodes {
  const union: CacheNodes = {};
  for (const snapshot of snapshots) {
    for (const [key, coords] of Object.entries(snapshot.nodes)) {
      union[key] = { ...(union[key] ?? {}), ...coords };
    }
  }
  return union;
}

/**
 * A node is new when its coordinate was never cached for that zone and
 * category. Only presence counts: a coordinate whose source id changed is
 * still reported as seen.
 */
export function classify(record: NodeRecord, prior: CacheNodes): Classification {
  const key = cacheKey(record.zoneId, record.category);
  const seen = prior[key];
  return { isNew: seen === undefined || !Object.hasOwn(seen, String(record.packedCoordinate)), key };
}

const emptyCounts = (): NodeCounts => ({ nodes: 0, new: 0 });

/** Collects one run's records per partition and counts what is new. */
export class DeltaTracker {
  private readonly prior: CacheNodes;
  private readonly nodesByPartition = new Map<string, CacheNodes>();
  private readonly partitionCounts = new Map<string, NodeCounts>();
  private readonly categoryCounts = new Map<Category, NodeCounts>();

  constructor(prior: CacheNodes) {
    this.prior = prior;
  }

  record(record: NodeRecord): Classification {
    const result = classify(record, this.prior);
    let nodes = this.nodesByPartition.get(record.partition);
    if (!nodes) {
      nodes = {};
      this.nodesByPartition.set(record.partition, nodes);
    }
    const coords = nodes[result.key] ?? {};
    coords[String(record.packedCoordinate)] = record.sourceId;
    nodes[result.key] = coords;

    for (const counts of [this.countsFor(this.partitionCounts, record.partition), this.countsFor(this.categoryCounts, record.category)]) {
      counts.nodes += 1;
      if (result.isNew) counts.new += 1;
    }
    return result;
  }

  get partitions(): string[] {
    return [...this.nodesByPartition.keys()];
  }

  countsByPartition(): Record<string, NodeCounts> {
    return Object.fromEntries(this.partitionCounts);
  }

  countsByCategory(): Partial<Record<Category, NodeCounts>> {
    const result: Partial<Record<Category, NodeCounts>> = {};
    for (const [category, counts] of this.categoryCounts) result[category] = { ...counts };
    return result;
  }

  /** Replacement snapshot for a partition, built only from this run. */
  snapshotFor(partition: string, now: Date): CacheSnapshot {
    const nodes: CacheNodes = {};
    for (const [key, coords] of Object.entries(this.nodesByPartition.get(partition) ?? {})) {
      nodes[key] = { ...coords };
    }
    return { expansion: partition, last_run: formatRunTimestamp(now), nodes };
  }

  private countsFor<K>(map: Map<K, NodeCounts>, key: K): NodeCounts {
    let counts = map.get(key);
    if (!counts) {
      counts = emptyCounts();
      map.set(key, counts);
    }
    return counts;
  }
}
