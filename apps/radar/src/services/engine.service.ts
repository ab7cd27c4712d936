import { ProblemSignalMatcher } from "@/filters/problemSignalMatcher";
import { EngineConfig, RawItem, ScoredItem, TextExtractor } from "@/types";
import { CollectionAggregator, defaultTextOf } from "./aggregator.service";
import { PatternCorrelator } from "./patterns.service";
import { PostScorer } from "./scorer.service";

/**
 * Wires the matcher, scorer, aggregator and correlator around one frozen
 * EngineConfig.
 */
export class ProblemEngine {
  readonly matcher: ProblemSignalMatcher;
  readonly scorer: PostScorer;
  readonly aggregator: CollectionAggregator;
  readonly correlator: PatternCorrelator;

  constructor(readonly config: EngineConfig) {
    this.matcher = new ProblemSignalMatcher(config.taxonomy);
    this.scorer = new PostScorer(config);
    this.aggregator = new CollectionAggregator(this.matcher, this.scorer);
    this.correlator = new PatternCorrelator();
  }

  scoreItem(item: RawItem, textOf: TextExtractor = defaultTextOf): ScoredItem {
    return this.scorer.score(item, this.matcher.match(textOf(item)));
  }
}
