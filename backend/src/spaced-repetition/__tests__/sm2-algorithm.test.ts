/**
 * SM-2 Algorithm Tests
 *
 * - hard (q=2) is a failed recall: repetitions=0, interval=1, EF -0.32
 * - good (q=4): first=1, second=6, then interval*EF; EF unchanged
 * - easy (q=5): same intervals with EF +0.10
 * - EF floored at 1.3, no ceiling
 * - interval capped at MAX_INTERVAL_DAYS
 */

import { describe, expect, test } from "vitest";
import type { ReviewQuality } from "@chunk-recall/shared";
import { InvalidInputError } from "../../errors.js";
import type { ReviewEvent } from "../chunk-schema.js";
import {
  calculateSM2,
  createNewScheduleState,
  isValidQuality,
  isValidScheduleState,
  replayReviews,
  verifyHistory,
  DEFAULT_EASE_FACTOR,
  MAX_INTERVAL_DAYS,
  MIN_EASE_FACTOR,
  PASS_THRESHOLD,
  QUALITY_SCORES,
  type ScheduleState,
} from "../sm2-algorithm.js";

// Fixed time for deterministic tests
const NOW = new Date("2026-01-23T09:00:00.000Z");

// =============================================================================
// Helper Functions
// =============================================================================

function makeState(
  intervalDays: number,
  easeFactor: number,
  repetitionCount: number
): ScheduleState {
  return {
    interval_days: intervalDays,
    ease_factor: easeFactor,
    repetition_count: repetitionCount,
  };
}

function buildEvents(reviews: Array<[ReviewQuality, string]>): ReviewEvent[] {
  let state: ScheduleState = createNewScheduleState();
  return reviews.map(([quality, reviewedAt], index) => {
    const result = calculateSM2(state, quality, new Date(reviewedAt));
    state = result;
    return {
      id: `event-${index + 1}`,
      chunk_id: "chunk-1",
      reviewed_at: reviewedAt,
      quality,
      ease_factor_after: result.ease_factor,
      interval_days_after: result.interval_days,
      repetition_count_after: result.repetition_count,
      due_at_after: result.due_at,
      after_schedule_edit: false,
    };
  });
}

// =============================================================================
// Quality Mapping
// =============================================================================

describe("quality mapping", () => {
  test("maps the three buttons onto the 0-5 scale", () => {
    expect(QUALITY_SCORES).toEqual({ hard: 2, good: 4, easy: 5 });
  });

  test("hard is below the pass threshold, good and easy are above", () => {
    expect(QUALITY_SCORES.hard).toBeLessThan(PASS_THRESHOLD);
    expect(QUALITY_SCORES.good).toBeGreaterThanOrEqual(PASS_THRESHOLD);
    expect(QUALITY_SCORES.easy).toBeGreaterThanOrEqual(PASS_THRESHOLD);
  });

  test("isValidQuality accepts only the three buttons", () => {
    expect(isValidQuality("hard")).toBe(true);
    expect(isValidQuality("good")).toBe(true);
    expect(isValidQuality("easy")).toBe(true);
    expect(isValidQuality("again")).toBe(false);
    expect(isValidQuality("GOOD")).toBe(false);
    expect(isValidQuality(4)).toBe(false);
    expect(isValidQuality("toString")).toBe(false);
  });
});

// =============================================================================
// Core Algorithm Tests
// =============================================================================

describe("calculateSM2", () => {
  describe("new chunk (interval=0, repetitions=0)", () => {
    const newChunk = createNewScheduleState();

    test("hard: fails, interval=1, repetitions=0, EF drops by 0.32", () => {
      const result = calculateSM2(newChunk, "hard", NOW);

      expect(result.passed).toBe(false);
      expect(result.interval_days).toBe(1);
      expect(result.repetition_count).toBe(0);
      expect(result.ease_factor).toBe(2.18);
      expect(result.due_at).toBe("2026-01-24T09:00:00.000Z");
    });

    test("good: interval=1, repetitions=1, EF unchanged", () => {
      const result = calculateSM2(newChunk, "good", NOW);

      expect(result.passed).toBe(true);
      expect(result.interval_days).toBe(1);
      expect(result.repetition_count).toBe(1);
      expect(result.ease_factor).toBe(DEFAULT_EASE_FACTOR);
      expect(result.due_at).toBe("2026-01-24T09:00:00.000Z");
    });

    test("easy: interval=1, repetitions=1, EF rises by 0.1", () => {
      const result = calculateSM2(newChunk, "easy", NOW);

      expect(result.interval_days).toBe(1);
      expect(result.repetition_count).toBe(1);
      expect(result.ease_factor).toBe(2.6);
    });
  });

  describe("second repetition (interval=1, repetitions=1)", () => {
    const state = makeState(1, 2.5, 1);

    test("good: interval=6", () => {
      const result = calculateSM2(state, "good", NOW);

      expect(result.interval_days).toBe(6);
      expect(result.repetition_count).toBe(2);
      expect(result.due_at).toBe("2026-01-29T09:00:00.000Z");
    });

    test("hard: resets the streak", () => {
      const result = calculateSM2(state, "hard", NOW);

      expect(result.interval_days).toBe(1);
      expect(result.repetition_count).toBe(0);
    });
  });

  describe("later repetitions use the previous interval times the new EF", () => {
    test("good on interval 6: 6 * 2.5 = 15", () => {
      const result = calculateSM2(makeState(6, 2.5, 2), "good", NOW);

      expect(result.interval_days).toBe(15);
      expect(result.repetition_count).toBe(3);
      expect(result.due_at).toBe("2026-02-07T09:00:00.000Z");
    });

    test("easy on interval 6: 6 * 2.6 = 15.6, rounded to 16", () => {
      const result = calculateSM2(makeState(6, 2.5, 2), "easy", NOW);

      expect(result.ease_factor).toBe(2.6);
      expect(result.interval_days).toBe(16);
    });

    test("good on interval 15: 15 * 2.5 = 37.5, rounded to 38", () => {
      const result = calculateSM2(makeState(15, 2.5, 3), "good", NOW);

      expect(result.interval_days).toBe(38);
      expect(result.repetition_count).toBe(4);
    });

    test("minimum EF: 6 * 1.3 = 7.8, rounded to 8", () => {
      const result = calculateSM2(makeState(6, MIN_EASE_FACTOR, 2), "good", NOW);

      expect(result.interval_days).toBe(8);
    });

    test("an interval of 0 after imported repetitions still schedules at least a day", () => {
      const result = calculateSM2(makeState(0, 2.5, 5), "good", NOW);

      expect(result.repetition_count).toBe(6);
      expect(result.interval_days).toBe(1);
    });

    test("interval is capped at MAX_INTERVAL_DAYS", () => {
      const result = calculateSM2(makeState(30000, 2.5, 10), "good", NOW);

      expect(result.interval_days).toBe(MAX_INTERVAL_DAYS);
      expect(result.due_at).toBe("2125-12-30T09:00:00.000Z");
    });

    test("a long run of easy grades keeps due_at representable", () => {
      let state: ScheduleState = createNewScheduleState();
      let reviewedAt = NOW;
      const intervals: number[] = [];

      for (let i = 0; i < 30; i++) {
        const result = calculateSM2(state, "easy", reviewedAt);
        intervals.push(result.interval_days);
        state = result;
        reviewedAt = new Date(result.due_at);
      }

      expect(intervals.slice(0, 10)).toEqual([1, 6, 17, 49, 147, 456, 1459, 4815, 16371, MAX_INTERVAL_DAYS]);
      expect(intervals.every((interval) => interval <= MAX_INTERVAL_DAYS)).toBe(true);
      expect(state.ease_factor).toBe(5.5);
      expect(reviewedAt.toISOString()).toBe("4188-07-08T09:00:00.000Z");
    });
  });

  describe("failed recall", () => {
    test("a long streak graded hard resets to interval 1 and repetitions 0", () => {
      const result = calculateSM2(makeState(20, 2.3, 4), "hard", NOW);

      expect(result.repetition_count).toBe(0);
      expect(result.interval_days).toBe(1);
      expect(result.ease_factor).toBe(1.98);
      expect(result.due_at).toBe("2026-01-24T09:00:00.000Z");
    });

    test("reset happens regardless of streak length", () => {
      for (const repetitions of [0, 1, 2, 10, 50]) {
        const result = calculateSM2(makeState(300, 2.8, repetitions), "hard", NOW);
        expect(result.repetition_count).toBe(0);
        expect(result.interval_days).toBe(1);
      }
    });
  });

  test("is deterministic for identical inputs", () => {
    const state = makeState(6, 2.36, 2);
    const first = calculateSM2(state, "easy", NOW);
    const second = calculateSM2(state, "easy", new Date(NOW.getTime()));

    expect(second).toEqual(first);
  });

  test("does not mutate the input state", () => {
    const state = makeState(6, 2.5, 2);
    calculateSM2(state, "hard", NOW);

    expect(state).toEqual(makeState(6, 2.5, 2));
  });
});

// =============================================================================
// Ease Factor Tests
// =============================================================================

describe("ease factor behavior", () => {
  test("never drops below 1.3", () => {
    expect(calculateSM2(makeState(6, MIN_EASE_FACTOR, 2), "hard", NOW).ease_factor).toBe(
      MIN_EASE_FACTOR
    );
    expect(calculateSM2(makeState(6, 1.5, 2), "hard", NOW).ease_factor).toBe(MIN_EASE_FACTOR);
  });

  test("repeated hard responses bottom out at 1.3", () => {
    let state = makeState(6, 2.5, 2);
    for (let i = 0; i < 10; i++) {
      state = calculateSM2(state, "hard", NOW);
      expect(state.ease_factor).toBeGreaterThanOrEqual(MIN_EASE_FACTOR);
    }

    expect(state.ease_factor).toBe(MIN_EASE_FACTOR);
  });

  test("has no upper bound", () => {
    expect(calculateSM2(makeState(6, 3.0, 2), "easy", NOW).ease_factor).toBe(3.1);
  });

  test("repeated easy responses keep rising in steps of 0.1", () => {
    let state = createNewScheduleState();
    for (let i = 0; i < 10; i++) {
      state = calculateSM2(state, "easy", NOW);
    }

    expect(state.ease_factor).toBe(3.5);
  });

  test("stays at or above the floor over a mixed sequence", () => {
    const grades: ReviewQuality[] = ["hard", "good", "hard", "hard", "easy", "hard", "good"];
    let state = createNewScheduleState();
    for (let round = 0; round < 5; round++) {
      for (const grade of grades) {
        state = calculateSM2(state, grade, NOW);
        expect(state.ease_factor).toBeGreaterThanOrEqual(MIN_EASE_FACTOR);
      }
    }
  });
});

// =============================================================================
// Due Date Tests
// =============================================================================

describe("due_at calculation", () => {
  test("handles month boundaries", () => {
    const result = calculateSM2(makeState(1, 2.5, 1), "good", new Date("2026-01-28T09:00:00.000Z"));

    expect(result.due_at).toBe("2026-02-03T09:00:00.000Z");
  });

  test("handles year boundaries", () => {
    const result = calculateSM2(makeState(6, 2.5, 2), "good", new Date("2026-12-20T18:30:00.000Z"));

    // 15 days after Dec 20
    expect(result.due_at).toBe("2027-01-04T18:30:00.000Z");
  });

  test("handles leap years", () => {
    const result = calculateSM2(makeState(1, 2.5, 1), "good", new Date("2028-02-25T12:00:00.000Z"));

    expect(result.due_at).toBe("2028-03-02T12:00:00.000Z");
  });

  test("keeps the time of day of the review", () => {
    const result = calculateSM2(createNewScheduleState(), "good", new Date("2026-01-23T23:59:59.999Z"));

    expect(result.due_at).toBe("2026-01-24T23:59:59.999Z");
  });
});

// =============================================================================
// Validation
// =============================================================================

describe("invalid input", () => {
  test.each([
    ["ease factor below the floor", makeState(6, 1.2, 2)],
    ["non-finite ease factor", makeState(6, Number.NaN, 2)],
    ["negative interval", makeState(-1, 2.5, 2)],
    ["fractional interval", makeState(1.5, 2.5, 2)],
    ["negative repetition count", makeState(6, 2.5, -1)],
    ["fractional repetition count", makeState(6, 2.5, 0.5)],
  ])("rejects %s", (_label, state) => {
    expect(() => calculateSM2(state, "good", NOW)).toThrow(InvalidInputError);
  });

  test("rejects an invalid review time", () => {
    expect(() => calculateSM2(createNewScheduleState(), "good", new Date("not a date"))).toThrow(
      InvalidInputError
    );
  });

  test("isValidScheduleState", () => {
    expect(isValidScheduleState(createNewScheduleState())).toBe(true);
    expect(isValidScheduleState(makeState(0, 1.3, 0))).toBe(true);
    expect(isValidScheduleState(makeState(0, 1.29, 0))).toBe(false);
    expect(isValidScheduleState(makeState(0, Number.POSITIVE_INFINITY, 0))).toBe(false);
  });
});

// =============================================================================
// Reference Scenario
// =============================================================================

describe("learning progression", () => {
  test("good, good the next day, then easy", () => {
    const r1 = calculateSM2(createNewScheduleState(), "good", NOW);
    expect(r1.repetition_count).toBe(1);
    expect(r1.interval_days).toBe(1);

    const r2 = calculateSM2(r1, "good", new Date("2026-01-24T09:00:00.000Z"));
    expect(r2.interval_days).toBe(6);

    const r3 = calculateSM2(r2, "easy", new Date("2026-01-30T09:00:00.000Z"));
    expect(r3.ease_factor).toBeGreaterThan(2.5);
    expect(r3.interval_days).toBe(Math.round(6 * r3.ease_factor));
    expect(r3.interval_days).toBe(16);
  });
});

// =============================================================================
// History Replay
// =============================================================================

describe("replayReviews", () => {
  test("folds the scheduler over the reviews in order", () => {
    const state = replayReviews(createNewScheduleState(), [
      { quality: "good", reviewed_at: "2026-01-23T09:00:00.000Z" },
      { quality: "good", reviewed_at: "2026-01-24T09:00:00.000Z" },
      { quality: "easy", reviewed_at: "2026-01-30T09:00:00.000Z" },
    ]);

    expect(state).toEqual({
      ease_factor: 2.6,
      interval_days: 16,
      repetition_count: 3,
      due_at: "2026-02-15T09:00:00.000Z",
    });
  });

  test("returns the initial state without a due date for no reviews", () => {
    expect(replayReviews(makeState(6, 2.2, 2), [])).toEqual({
      ease_factor: 2.2,
      interval_days: 6,
      repetition_count: 2,
      due_at: null,
    });
  });
});

describe("verifyHistory", () => {
  const reviews: Array<[ReviewQuality, string]> = [
    ["good", "2026-01-23T09:00:00.000Z"],
    ["good", "2026-01-24T09:00:00.000Z"],
    ["easy", "2026-01-30T09:00:00.000Z"],
  ];

  test("accepts a history produced by the scheduler", () => {
    expect(verifyHistory(buildEvents(reviews))).toEqual([]);
  });

  test("accepts an empty or single-event history", () => {
    expect(verifyHistory([])).toEqual([]);
    expect(verifyHistory(buildEvents(reviews.slice(0, 1)))).toEqual([]);
  });

  test("flags an event whose snapshot disagrees with a replay", () => {
    const events = buildEvents(reviews);
    events[1] = { ...events[1], due_at_after: "2026-02-01T09:00:00.000Z" };

    expect(verifyHistory(events)).toEqual(["event-2"]);
  });

  test("a wrong interval also flags the event computed from it", () => {
    const events = buildEvents(reviews);
    events[1] = { ...events[1], interval_days_after: 7 };

    // event-3 expects round(7 * 2.6) = 18 instead of 16
    expect(verifyHistory(events)).toEqual(["event-2", "event-3"]);
  });

  test("takes an event that follows a schedule edit as given", () => {
    const events = buildEvents(reviews);
    // A reset between event-2 and event-3 leaves event-3 starting from defaults
    events[2] = {
      ...events[2],
      ease_factor_after: 2.6,
      interval_days_after: 1,
      repetition_count_after: 1,
      due_at_after: "2026-01-31T09:00:00.000Z",
    };

    expect(verifyHistory(events)).toEqual(["event-3"]);
    events[2] = { ...events[2], after_schedule_edit: true };
    expect(verifyHistory(events)).toEqual([]);
  });
});
