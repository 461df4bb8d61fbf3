import crypto from 'crypto';

export interface DuplicateOccurrence<T> {
  item: T;
  index: number;
  key: string;
  // Index of the occurrence that was kept
  firstIndex: number;
}

/**
 * Surrogate key hashing and keep-first duplicate detection
 */
export class DeduplicationEngine {
  /**
   * Stable surrogate key: the first 48 bits of SHA-256 over `<namespace>:<natural key>`,
   * always a positive safe integer
   */
  static hashKey(namespace: string, naturalKey: string): number {
    const digest = crypto.createHash('sha256').update(`${namespace}:${naturalKey}`).digest();
    return digest.readUIntBE(0, 6) || 1;
  }

  /**
   * Second and later occurrences of each key; the first occurrence wins
   */
  static findDuplicates<T>(items: readonly T[], keyOf: (item: T) => string): DuplicateOccurrence<T>[] {
    const firstSeen = new Map<string, number>();
    const duplicates: DuplicateOccurrence<T>[] = [];

    items.forEach((item, index) => {
      const key = keyOf(item);
      const firstIndex = firstSeen.get(key);
      if (firstIndex === undefined) {
        firstSeen.set(key, index);
      } else {
        duplicates.push({ item, index, key, firstIndex });
      }
    });

    return duplicates;
  }
}

export default DeduplicationEngine;
