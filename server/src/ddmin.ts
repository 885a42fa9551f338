export interface Verdict<A> {
  ok: boolean;
  artifact?: A;
}

export type ReductionPredicate<T, A> = (remainder: T[]) => Promise<Verdict<A>>;

export interface Reduction<T, A> {
  items: T[];
  tests: number;
  /** Artifact of the most recent passing predicate call, if any passed. */
  accepted: A | undefined;
}

/**
 * Chunked delta-debugging reduction.
 *
 * Granularity starts at 2. Each round splits the collection into contiguous
 * chunks of `ceil(len / n)` and tries removing them in order; the first removal
 * the predicate accepts is committed and `n` drops by one (never below 2).
 * A round with no accepted removal doubles `n`, or stops once `n` has reached
 * the collection length. Every predicate call costs one unit of `budget`;
 * when it runs out the current collection is returned as is.
 *
 * `budget` undefined means unbounded.
 */
export const ddmin = async <T, A>(
  items: readonly T[],
  predicate: ReductionPredicate<T, A>,
  budget?: number
): Promise<Reduction<T, A>> => {
  let collection = [...items];
  let accepted: A | undefined;
  let tests = 0;

  if (collection.length === 0 || (budget !== undefined && budget <= 0)) {
    return { items: collection, tests, accepted };
  }

  let n = 2;
  while (collection.length > 0) {
    const chunkSize = Math.ceil(collection.length / n);
    let removed = false;

    for (let start = 0; start < collection.length; start += chunkSize) {
      if (budget !== undefined && tests >= budget) {
        return { items: collection, tests, accepted };
      }
      const remainder = [
        ...collection.slice(0, start),
        ...collection.slice(start + chunkSize),
      ];
      tests += 1;
      const verdict = await predicate(remainder);
      if (verdict.ok) {
        collection = remainder;
        accepted = verdict.artifact;
        n = Math.max(n - 1, 2);
        removed = true;
        break;
      }
    }

    if (!removed) {
      if (n >= collection.length) {
        break;
      }
      n = Math.min(collection.length, n * 2);
    }
  }

  return { items: collection, tests, accepted };
};
