/**
 * SM-2 Spaced Repetition Algorithm
 *
 * Pure functions for calculating next review parameters based on the SM-2
 * algorithm (Piotr Wozniak, 1987). The three review buttons are mapped onto
 * the SM-2 0-5 quality scale through QUALITY_SCORES; "hard" is a failed
 * recall.
 *
 * "now" is always passed in. Nothing here reads the clock.
 */

import type { ReviewQuality } from "@chunk-recall/shared";
import { InvalidInputError } from "../errors.js";
import { addDays, type ReviewEvent } from "./chunk-schema.js";

// =============================================================================
// Constants
// =============================================================================

/** Default ease factor for new chunks */
export const DEFAULT_EASE_FACTOR = 2.5;

/** Ease factor floor; SM-2 has no ceiling */
export const MIN_EASE_FACTOR = 1.3;

/**
 * Longest interval a passing review can schedule (100 years). SM-2 puts no
 * ceiling on the ease factor, so without a cap a run of easy grades pushes
 * due_at past the last representable ISO 8601 year.
 */
export const MAX_INTERVAL_DAYS = 36500;

/** Lowest SM-2 quality that counts as a successful recall */
export const PASS_THRESHOLD = 3;

/**
 * SM-2 quality score per review button.
 *
 * - hard (q=2): failed recall, EF -0.32
 * - good (q=4): recalled with some effort, EF unchanged
 * - easy (q=5): perfect recall, EF +0.10
 */
export const QUALITY_SCORES = {
  hard: 2,
  good: 4,
  easy: 5,
} as const satisfies Record<ReviewQuality, number>;

// =============================================================================
// Types
// =============================================================================

/** Current chunk state needed for SM-2 calculation */
export interface ScheduleState {
  /** Current ease factor (2.5 for new chunks) */
  ease_factor: number;
  /** Current interval in days (0 for new chunks) */
  interval_days: number;
  /** Consecutive successful reviews (0 for new chunks) */
  repetition_count: number;
}

/** Result of SM-2 calculation */
export interface SM2Result extends ScheduleState {
  /** When the chunk is next due, UTC ISO 8601 */
  due_at: string;
  /** Whether the grade counted as a successful recall */
  passed: boolean;
}

// =============================================================================
// Core Algorithm
// =============================================================================

/**
 * Calculate new SM-2 parameters for a review.
 *
 * - The ease factor is recomputed on every grade and floored at 1.3.
 * - A failed grade resets repetitions to 0 and the interval to 1 day.
 * - A passing grade increments repetitions; the interval is 1 day, then 6,
 *   then the previous interval times the new ease factor, capped at
 *   MAX_INTERVAL_DAYS.
 *
 * @throws InvalidInputError if the grade is unknown, the state violates its
 *   invariants, or `now` is an invalid date
 */
export function calculateSM2(
  state: ScheduleState,
  quality: ReviewQuality,
  now: Date
): SM2Result {
  if (!isValidQuality(quality)) {
    throw new InvalidInputError(`Unknown review quality: ${String(quality)}`);
  }
  assertValidState(state);
  if (Number.isNaN(now.getTime())) {
    throw new InvalidInputError("Review time is not a valid date");
  }

  const q = QUALITY_SCORES[quality];
  const easeFactor = adjustEaseFactor(state.ease_factor, q);
  const passed = q >= PASS_THRESHOLD;

  const repetitionCount = passed ? state.repetition_count + 1 : 0;
  const intervalDays = passed
    ? calculatePassingInterval(state, repetitionCount, easeFactor)
    : 1;

  return {
    ease_factor: easeFactor,
    interval_days: intervalDays,
    repetition_count: repetitionCount,
    due_at: addDays(now, intervalDays),
    passed,
  };
}

/**
 * EF' = EF + (0.1 - (5 - q) * (0.08 + (5 - q) * 0.02)), floored.
 * Rounded to two decimals so repeated updates do not accumulate float noise.
 */
function adjustEaseFactor(easeFactor: number, q: number): number {
  const distance = 5 - q;
  const adjusted = easeFactor + (0.1 - distance * (0.08 + distance * 0.02));
  return Math.max(MIN_EASE_FACTOR, roundTo2(adjusted));
}

function calculatePassingInterval(
  state: ScheduleState,
  repetitionCount: number,
  easeFactor: number
): number {
  if (repetitionCount === 1) {
    return 1;
  }
  if (repetitionCount === 2) {
    return 6;
  }
  // An imported or reset state can carry interval 0 with repetitions > 0
  return Math.min(MAX_INTERVAL_DAYS, Math.max(1, Math.round(state.interval_days * easeFactor)));
}

function roundTo2(value: number): number {
  return Math.round((value + Number.EPSILON) * 100) / 100;
}

// =============================================================================
// Validation
// =============================================================================

/**
 * Check if a quality grade is one of the review buttons.
 */
export function isValidQuality(quality: unknown): quality is ReviewQuality {
  return typeof quality === "string" && Object.hasOwn(QUALITY_SCORES, quality);
}

/**
 * Validate that a schedule state has valid SM-2 values.
 */
export function isValidScheduleState(state: ScheduleState): boolean {
  return (
    Number.isFinite(state.ease_factor) &&
    state.ease_factor >= MIN_EASE_FACTOR &&
    Number.isInteger(state.interval_days) &&
    state.interval_days >= 0 &&
    Number.isInteger(state.repetition_count) &&
    state.repetition_count >= 0
  );
}

function assertValidState(state: ScheduleState): void {
  if (!isValidScheduleState(state)) {
    throw new InvalidInputError(
      `Schedule state violates SM-2 invariants: ease_factor=${state.ease_factor}, ` +
        `interval_days=${state.interval_days}, repetition_count=${state.repetition_count}`
    );
  }
}

/**
 * Create default state for a new chunk.
 */
export function createNewScheduleState(): ScheduleState {
  return {
    ease_factor: DEFAULT_EASE_FACTOR,
    interval_days: 0,
    repetition_count: 0,
  };
}

// =============================================================================
// History Replay
// =============================================================================

/** A graded review, as recorded in the history log */
export interface GradedReview {
  quality: ReviewQuality;
  reviewed_at: string;
}

/**
 * Fold calculateSM2 over a sequence of reviews, oldest first.
 * Returns the initial state unchanged (with no due date) for an empty sequence.
 */
export function replayReviews(
  initial: ScheduleState,
  reviews: readonly GradedReview[]
): ScheduleState & { due_at: string | null } {
  let state: ScheduleState & { due_at: string | null } = { ...initial, due_at: null };
  for (const review of reviews) {
    const result = calculateSM2(state, review.quality, new Date(review.reviewed_at));
    state = {
      ease_factor: result.ease_factor,
      interval_days: result.interval_days,
      repetition_count: result.repetition_count,
      due_at: result.due_at,
    };
  }
  return state;
}

/**
 * Check each event's snapshot against the scheduler applied to the previous
 * event's snapshot. The first event has no predecessor in the log (the chunk
 * may have been imported with prior state), so it is taken as given, and so
 * is an event flagged `after_schedule_edit`, whose starting state was written
 * by a reset or an import rather than by the previous review.
 *
 * @returns ids of events whose snapshot disagrees with the replay
 */
export function verifyHistory(events: readonly ReviewEvent[]): string[] {
  const inconsistent: string[] = [];

  for (let i = 1; i < events.length; i++) {
    const previous = events[i - 1];
    const event = events[i];
    if (event.after_schedule_edit) {
      continue;
    }
    const previousState: ScheduleState = {
      ease_factor: previous.ease_factor_after,
      interval_days: previous.interval_days_after,
      repetition_count: previous.repetition_count_after,
    };

    if (!isValidScheduleState(previousState)) {
      inconsistent.push(event.id);
      continue;
    }

    const expected = calculateSM2(previousState, event.quality, new Date(event.reviewed_at));
    if (
      expected.ease_factor !== event.ease_factor_after ||
      expected.interval_days !== event.interval_days_after ||
      expected.repetition_count !== event.repetition_count_after ||
      expected.due_at !== event.due_at_after
    ) {
      inconsistent.push(event.id);
    }
  }

  return inconsistent;
}
