/**
 * @file src/session/strategy.ts
 * @summary Chooses the pagination strategy for a session from a single count query.
 * Collections above the threshold are paged with limit/offset queries; everything else
 * is materialised once as an id list. Criteria anchored to a start position always page
 * from the store, whose ordering the anchor was taken in.
 *
 * @exports
 *   - StrategyDecision - chosen strategy plus the count it was based on
 *   - selectStrategy - run the count query and decide
 */

import { log } from "../core/logger";
import type { Criteria } from "../types/criteria";
import type { SessionStrategy } from "../types/engine";
import type { RecordStore } from "../types/store";

export type StrategyDecision = {
  strategy: SessionStrategy;
  count: number;
};

export async function selectStrategy(
  store: RecordStore,
  criteria: Criteria,
  threshold: number,
): Promise<StrategyDecision> {
  const count = await store.count(criteria);
  const strategy: SessionStrategy = criteria.startAt || count > threshold ? "windowed" : "snapshot";
  log.debug(`strategy: ${strategy} (count=${count}, threshold=${threshold})`);
  return { strategy, count };
}
