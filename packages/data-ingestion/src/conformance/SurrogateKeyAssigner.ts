import type { DimensionEntity, KeyLookup } from '@conservation-warehouse/types';
import { DeduplicationEngine } from '../validation/DeduplicationEngine';

export type KeyAssignment = { ok: true; key: number } | { ok: false; collidesWith: string };

/**
 * Surrogate keys for one dimension batch. A natural key already in the store
 * keeps its persisted key; a new one gets the stable hash of its natural key.
 */
export class SurrogateKeyAssigner {
  private readonly owners = new Map<number, string>();

  constructor(
    private readonly entity: DimensionEntity,
    private readonly persisted: KeyLookup,
    private readonly hash: (namespace: string, naturalKey: string) => number = DeduplicationEngine.hashKey
  ) {
    for (const [naturalKey, key] of persisted) {
      this.owners.set(key, naturalKey);
    }
  }

  assign(naturalKey: string): KeyAssignment {
    const existing = this.persisted.get(naturalKey);
    if (existing !== undefined) {
      return { ok: true, key: existing };
    }

    const key = this.hash(this.entity, naturalKey);
    const owner = this.owners.get(key);
    if (owner !== undefined && owner !== naturalKey) {
      return { ok: false, collidesWith: owner };
    }

    this.owners.set(key, naturalKey);
    return { ok: true, key };
  }
}
