/**
 * FILE PURPOSE: Known-item index: run-scoped snapshot of stored identity hashes
 *
 * WHY: Built once per run from a single bulk read, then queried for every
 *      candidate. Never mutated during the run: items inserted by this run
 *      or by another process are not observed until the next run.
 *
 * Failure policy: a failed load is fatal (IndexLoadError). Carrying on with
 * an empty index would mark every candidate unique.
 */

import type { KnownItem, KnownItemSource, NearCandidate } from '../types.js';
import { IndexLoadError } from '../../errors.js';
import { describeError } from '../../outcome.js';

export class KnownItemIndex {
  private constructor(
    private readonly byExactHash: ReadonlyMap<string, string>,
    private readonly near: readonly NearCandidate[],
    readonly size: number,
  ) {}

  /** Items without a perceptual hash still take part in exact matching. */
  static fromItems(items: readonly KnownItem[]): KnownItemIndex {
    const byExactHash = new Map<string, string>();
    const near: NearCandidate[] = [];

    for (const item of items) {
      if (item.exactHash) {
        const key = item.exactHash.toLowerCase();
        // First stored row wins when two rows share a hash
        if (!byExactHash.has(key)) byExactHash.set(key, item.id);
      }
      if (item.perceptualHash) {
        near.push(Object.freeze({ perceptualHash: item.perceptualHash, id: item.id }));
      }
    }

    return new KnownItemIndex(byExactHash, Object.freeze(near), items.length);
  }

  static async load(source: KnownItemSource): Promise<KnownItemIndex> {
    let items: KnownItem[];
    try {
      items = await source.listKnownItems();
    } catch (err) {
      throw new IndexLoadError(describeError(err), { cause: err });
    }
    return KnownItemIndex.fromItems(items);
  }

  exactLookup(hash: string): string | undefined {
    return this.byExactHash.get(hash.toLowerCase());
  }

  /** `(perceptualHash, id)` pairs in store order. */
  nearCandidates(): readonly NearCandidate[] {
    return this.near;
  }
}
