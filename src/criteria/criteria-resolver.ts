/**
 * @file src/criteria/criteria-resolver.ts
 * @summary Collapses the overlapping filter sources into one canonical Criteria. Exactly
 * one source is active at a time, chosen by priority: an explicit allow-list, then the
 * in-page filter, then a precise session filter, then the global filter mode. Lower
 * sources are ignored rather than merged. A start-position anchor, when present, is
 * layered onto whichever source wins.
 *
 * @exports
 *   - EMPTY_CRITERIA - criteria with no constraints
 *   - normaliseList - turn an unknown list into a non-empty string list or null
 *   - widenEndDate - extend a date to the last millisecond of its day
 *   - resolveCriteria - pure resolution of CriteriaInputs into Criteria
 *   - criteriaKey - stable string key for a Criteria (used to detect changes)
 */

import { MS_DAY } from "../core/constants";
import { cleanStringArray } from "../core/utils";
import type { Criteria, CriteriaInputs, InPageFilter, SessionFilter } from "../types/criteria";

export const EMPTY_CRITERIA: Criteria = Object.freeze({
  includeBuckets: null,
  excludeBuckets: null,
  startDate: null,
  endDate: null,
  ids: null,
  startAt: null,
  precise: false,
  matchNone: false,
});

/** Empty lists mean "no constraint", never "match nothing". */
export function normaliseList(v: unknown): string[] | null {
  const out = cleanStringArray(v);
  return out.length ? out : null;
}

function finiteOrNull(v: unknown): number | null {
  if (v === null || v === undefined) return null;
  const n = Number(v);
  return Number.isFinite(n) ? n : null;
}

/** Non-precise end dates are the start of a day; make them inclusive of that whole day. */
export function widenEndDate(endDate: number | null): number | null {
  return endDate === null ? null : endDate + MS_DAY - 1;
}

function hasConstraints(f: InPageFilter | SessionFilter | null): boolean {
  if (!f) return false;
  return (
    normaliseList(f.albumIds) !== null ||
    finiteOrNull(f.startDate) !== null ||
    finiteOrNull(f.endDate) !== null
  );
}

function fromDateFilter(f: InPageFilter | SessionFilter, precise: boolean): Criteria {
  const end = finiteOrNull(f.endDate);
  return {
    ...EMPTY_CRITERIA,
    includeBuckets: normaliseList(f.albumIds),
    startDate: finiteOrNull(f.startDate),
    endDate: precise ? end : widenEndDate(end),
    precise,
  };
}

function allowListOf(inputs: CriteriaInputs): string[] | null {
  const sf = inputs.sessionFilter;
  if (!sf) return null;
  if (!sf.preciseMode && inputs.filterMode !== "custom") return null;
  return normaliseList(sf.photoIds);
}

export function resolveCriteria(inputs: CriteriaInputs): Criteria {
  const base = resolveSource(inputs);
  const startAt = inputs.startAt ?? null;
  return startAt && !base.matchNone ? { ...base, startAt } : base;
}

function resolveSource(inputs: CriteriaInputs): Criteria {
  // (a) explicit allow-list
  const ids = allowListOf(inputs);
  if (ids) return { ...EMPTY_CRITERIA, ids, precise: true };

  // (b) in-page filter
  const inPage = inputs.inPageFilter;
  if (inPage && hasConstraints(inPage)) return fromDateFilter(inPage, false);

  // (c) precise session filter
  const sf = inputs.sessionFilter;
  if (sf?.preciseMode) return fromDateFilter(sf, true);

  // (d) global filter mode
  const camera = normaliseList(inputs.cameraBucketIds);
  switch (inputs.filterMode) {
    case "all":
      return { ...EMPTY_CRITERIA };
    case "camera-only":
      return camera ? { ...EMPTY_CRITERIA, includeBuckets: camera } : { ...EMPTY_CRITERIA, matchNone: true };
    case "exclude-camera":
      return camera ? { ...EMPTY_CRITERIA, excludeBuckets: camera } : { ...EMPTY_CRITERIA };
    case "custom":
      return sf && hasConstraints(sf) ? fromDateFilter(sf, false) : { ...EMPTY_CRITERIA };
    default:
      return { ...EMPTY_CRITERIA };
  }
}

export function criteriaKey(c: Criteria): string {
  return JSON.stringify([
    c.includeBuckets,
    c.excludeBuckets,
    c.startDate,
    c.endDate,
    c.ids,
    c.startAt,
    c.precise,
    c.matchNone,
  ]);
}
