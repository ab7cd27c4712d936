import { AggregateResult, PatternEntry, PatternResult } from "@/types";

interface PatternAccumulator {
  batches: Set<number>;
  engagement: number;
  occurrences: number;
  firstSeen: number;
}

export const MIN_PATTERN_SUPPORT = 2;

/**
 * Finds keywords that recur across independently fetched batches.
 *
 * Keywords seen in a single batch stay in that batch's own keyword ranking.
 * Ranking is by number of supporting batches, then by the summed engagement of
 * the items mentioning the keyword, then by first encounter (batch order, then
 * fetch order inside the batch).
 */
export class PatternCorrelator {
  correlate(batches: readonly AggregateResult[]): PatternResult {
    const itemCount = batches.reduce((sum, batch) => sum + batch.totalCount, 0);
    if (batches.length < MIN_PATTERN_SUPPORT) {
      return { patterns: [], batchCount: batches.length, itemCount };
    }

    const accumulators = new Map<string, PatternAccumulator>();
    let encounter = 0;

    batches.forEach((batch, batchIndex) => {
      const inFetchOrder = [...batch.items].sort(
        (a, b) => a.position - b.position
      );
      for (const scored of inFetchOrder) {
        for (const keyword of scored.match.keywords) {
          let acc = accumulators.get(keyword);
          if (!acc) {
            acc = {
              batches: new Set(),
              engagement: 0,
              occurrences: 0,
              firstSeen: encounter++,
            };
            accumulators.set(keyword, acc);
          }
          acc.batches.add(batchIndex);
          acc.engagement += scored.engagement;
          acc.occurrences++;
        }
      }
    });

    const patterns: (PatternEntry & { firstSeen: number })[] = [];
    for (const [pattern, acc] of accumulators) {
      if (acc.batches.size < MIN_PATTERN_SUPPORT) continue;
      patterns.push({
        pattern,
        supportCount: acc.batches.size,
        engagement: acc.engagement,
        occurrences: acc.occurrences,
        batches: [...acc.batches].sort((a, b) => a - b),
        firstSeen: acc.firstSeen,
      });
    }

    patterns.sort(
      (a, b) =>
        b.supportCount - a.supportCount ||
        b.engagement - a.engagement ||
        a.firstSeen - b.firstSeen
    );

    return {
      patterns: patterns.map(({ firstSeen, ...entry }) => entry),
      batchCount: batches.length,
      itemCount,
    };
  }
}
