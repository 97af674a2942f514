// ─────────────────────────────────────────────────────────────
// Bucket Lookup — Threshold tables shared by scorers & classifiers
// ─────────────────────────────────────────────────────────────

/** A label that applies from `lowerBound` upward */
export interface Bucket<L> {
  readonly lowerBound: number;
  readonly label: L;
}

/** Ordered breakpoints plus the label for values below all of them */
export interface BucketTable<L> {
  readonly buckets: readonly Bucket<L>[];
  readonly fallback: L;
}

/**
 * Return the label of the highest bucket whose lower bound is <= value.
 * Bucket order in the table does not matter.
 */
export function lookupBucket<L>(value: number, table: BucketTable<L>): L {
  let best: Bucket<L> | undefined;
  for (const bucket of table.buckets) {
    if (value >= bucket.lowerBound && (!best || bucket.lowerBound > best.lowerBound)) {
      best = bucket;
    }
  }
  return best ? best.label : table.fallback;
}
