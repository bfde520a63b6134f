// tests/criteria-resolver.test.ts
// ---------------------------------------------------------------------------
// Tests for src/criteria - resolveCriteria priority and normalisation, and
// matchesCriteria evaluation.
// ---------------------------------------------------------------------------

import { describe, it, expect } from "vitest";
import { EMPTY_CRITERIA, criteriaKey, resolveCriteria, widenEndDate } from "../src/criteria/criteria-resolver";
import { matchesCriteria } from "../src/criteria/criteria-match";
import { MS_DAY } from "../src/core/constants";
import type { CriteriaInputs } from "../src/types/criteria";

function inputs(over: Partial<CriteriaInputs> = {}): CriteriaInputs {
  return {
    filterMode: "all",
    cameraBucketIds: ["cam"],
    sessionFilter: null,
    inPageFilter: null,
    ...over,
  };
}

const DAY = 20 * MS_DAY;

describe("resolveCriteria - global filter mode", () => {
  it("all → no constraints", () => {
    expect(resolveCriteria(inputs())).toEqual(EMPTY_CRITERIA);
  });

  it("camera-only includes camera buckets", () => {
    const c = resolveCriteria(inputs({ filterMode: "camera-only", cameraBucketIds: ["cam", "cam2"] }));
    expect(c.includeBuckets).toEqual(["cam", "cam2"]);
    expect(c.matchNone).toBe(false);
  });

  it("camera-only with no camera buckets matches nothing", () => {
    const c = resolveCriteria(inputs({ filterMode: "camera-only", cameraBucketIds: [] }));
    expect(c.matchNone).toBe(true);
    expect(c.includeBuckets).toBeNull();
  });

  it("exclude-camera excludes camera buckets, or nothing when there are none", () => {
    expect(resolveCriteria(inputs({ filterMode: "exclude-camera" })).excludeBuckets).toEqual(["cam"]);
    expect(resolveCriteria(inputs({ filterMode: "exclude-camera", cameraBucketIds: [] }))).toEqual(EMPTY_CRITERIA);
  });

  it("custom applies a non-precise session filter with widened end date", () => {
    const c = resolveCriteria(
      inputs({ filterMode: "custom", sessionFilter: { albumIds: ["trip"], startDate: 0, endDate: DAY } }),
    );
    expect(c).toEqual({
      ...EMPTY_CRITERIA,
      includeBuckets: ["trip"],
      startDate: 0,
      endDate: DAY + MS_DAY - 1,
      precise: false,
    });
  });

  it("custom with an empty session filter is unconstrained", () => {
    expect(resolveCriteria(inputs({ filterMode: "custom", sessionFilter: { albumIds: [] } }))).toEqual(EMPTY_CRITERIA);
  });
});

describe("resolveCriteria - priority", () => {
  it("allow-list beats every other source", () => {
    const c = resolveCriteria(
      inputs({
        filterMode: "camera-only",
        sessionFilter: { preciseMode: true, photoIds: ["b", "a", "b"], albumIds: ["x"] },
        inPageFilter: { albumIds: ["y"] },
      }),
    );
    expect(c).toEqual({ ...EMPTY_CRITERIA, ids: ["b", "a"], precise: true });
  });

  it("allow-list on a non-precise filter is ignored outside custom mode", () => {
    const c = resolveCriteria(inputs({ sessionFilter: { photoIds: ["a"] } }));
    expect(c.ids).toBeNull();
  });

  it("in-page filter beats a precise session filter and the global mode, without merging", () => {
    const c = resolveCriteria(
      inputs({
        filterMode: "exclude-camera",
        sessionFilter: { preciseMode: true, albumIds: ["x"] },
        inPageFilter: { albumIds: ["y"], endDate: DAY },
      }),
    );
    expect(c.includeBuckets).toEqual(["y"]);
    expect(c.excludeBuckets).toBeNull();
    expect(c.endDate).toBe(DAY + MS_DAY - 1);
    expect(c.precise).toBe(false);
  });

  it("an in-page filter with no constraints is skipped", () => {
    const c = resolveCriteria(inputs({ filterMode: "camera-only", inPageFilter: { albumIds: [] } }));
    expect(c.includeBuckets).toEqual(["cam"]);
  });

  it("precise session filter is used as given (no end-of-day widening)", () => {
    const c = resolveCriteria(
      inputs({ filterMode: "camera-only", sessionFilter: { preciseMode: true, startDate: 5, endDate: DAY } }),
    );
    expect(c).toEqual({ ...EMPTY_CRITERIA, startDate: 5, endDate: DAY, precise: true });
  });
});

describe("resolveCriteria - start anchor", () => {
  const startAt = { id: "p05", takenAt: 1_005_000, sort: { kind: "date-desc" as const } };

  it("layers the anchor onto whichever source wins", () => {
    const c = resolveCriteria(inputs({ filterMode: "camera-only", startAt }));
    expect(c).toEqual({ ...EMPTY_CRITERIA, includeBuckets: ["cam"], startAt });
    expect(criteriaKey(c)).not.toBe(criteriaKey({ ...c, startAt: null }));
  });

  it("is dropped when nothing can match", () => {
    const c = resolveCriteria(inputs({ filterMode: "camera-only", cameraBucketIds: [], startAt }));
    expect(c).toEqual({ ...EMPTY_CRITERIA, matchNone: true });
  });
});

describe("widenEndDate / criteriaKey", () => {
  it("widens to the last millisecond of the day", () => {
    expect(widenEndDate(0)).toBe(MS_DAY - 1);
    expect(widenEndDate(null)).toBeNull();
  });

  it("keys equal criteria identically", () => {
    const a = resolveCriteria(inputs({ filterMode: "camera-only" }));
    const b = resolveCriteria(inputs({ filterMode: "camera-only" }));
    expect(criteriaKey(a)).toBe(criteriaKey(b));
    expect(criteriaKey(a)).not.toBe(criteriaKey(EMPTY_CRITERIA));
  });
});

describe("matchesCriteria", () => {
  const rec = { id: "a", bucketId: "cam", takenAt: 100 };

  it("checks every constraint", () => {
    expect(matchesCriteria(EMPTY_CRITERIA, rec)).toBe(true);
    expect(matchesCriteria({ ...EMPTY_CRITERIA, matchNone: true }, rec)).toBe(false);
    expect(matchesCriteria({ ...EMPTY_CRITERIA, ids: ["b"] }, rec)).toBe(false);
    expect(matchesCriteria({ ...EMPTY_CRITERIA, includeBuckets: ["other"] }, rec)).toBe(false);
    expect(matchesCriteria({ ...EMPTY_CRITERIA, excludeBuckets: ["cam"] }, rec)).toBe(false);
    expect(matchesCriteria({ ...EMPTY_CRITERIA, startDate: 101 }, rec)).toBe(false);
    expect(matchesCriteria({ ...EMPTY_CRITERIA, endDate: 99 }, rec)).toBe(false);
    expect(matchesCriteria({ ...EMPTY_CRITERIA, startDate: 100, endDate: 100 }, rec)).toBe(true);
  });
});
