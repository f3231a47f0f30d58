import { readFile } from 'node:fs/promises';
import { fileURLToPath } from 'node:url';
import { ZoneFileSchema } from './schema.js';
import { Zone } from './types.js';

export const DEFAULT_ZONES_FILE = fileURLToPath(new URL('../../data/zones.json', import.meta.url));

export type ZoneLookup =
  | { kind: 'zone'; zone: Zone }
  | { kind: 'suppressed' }
  | { kind: 'unlisted' };

/**
 * Maps the scraper's zone ids onto addon map ids. Several external ids may
 * alias one canonical id; they all resolve to the same Zone instance.
 */
export class ZoneRegistry {
  private readonly byExternal = new Map<string, Zone>();
  private readonly canonical = new Map<string, Zone>();
  private readonly suppressed = new Set<string>();

  static async fromFile(path: string = DEFAULT_ZONES_FILE): Promise<ZoneRegistry> {
    const raw = await readFile(path, 'utf-8');
    const data = ZoneFileSchema.parse(JSON.parse(raw));
    const registry = new ZoneRegistry();
    for (const zone of data.zones) {
      registry.define(zone.external, zone.canonical, zone.name);
    }
    for (const id of data.suppressed) {
      registry.suppress(id);
    }
    return registry;
  }

  define(externalId: string, canonicalId: string, displayName: string): Zone {
    const known = this.byExternal.get(externalId);
    if (known) {
      if (known.canonicalId !== canonicalId) {
        throw new Error(`zone ${externalId} already maps to ${known.canonicalId}, not ${canonicalId}`);
      }
      return known;
    }
    const zone = this.canonical.get(canonicalId) ?? new Zone(externalId, canonicalId, displayName);
    this.canonical.set(canonicalId, zone);
    this.byExternal.set(externalId, zone);
    return zone;
  }

  suppress(externalId: string): void {
    this.suppressed.add(externalId);
  }

  resolve(externalId: string): ZoneLookup {
    const zone = this.byExternal.get(externalId);
    if (zone) return { kind: 'zone', zone };
    return this.suppressed.has(externalId) ? { kind: 'suppressed' } : { kind: 'unlisted' };
  }

  byCanonical(canonicalId: string): Zone | undefined {
    return this.canonical.get(canonicalId);
  }

  get size(): number {
    return this.canonical.size;
  }
}
