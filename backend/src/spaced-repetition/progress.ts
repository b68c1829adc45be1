/**
 * Progress
 *
 * Derived analytics over the review history: ease factor over time, review
 * streaks and deck totals. Pure functions; the caller loads the records.
 */

import type { EaseFactorPoint, ProgressSummary, Streaks } from "@chunk-recall/shared";
import { DAY_MS, toTimestamp, toUtcDay, type Chunk, type ReviewEvent } from "./chunk-schema.js";
import { QUALITY_SCORES, PASS_THRESHOLD } from "./sm2-algorithm.js";

/**
 * Ease factor and interval after each review, oldest first.
 */
export function easeFactorSeries(events: readonly ReviewEvent[]): EaseFactorPoint[] {
  return events.map((event) => ({
    reviewed_at: event.reviewed_at,
    ease_factor: event.ease_factor_after,
    interval_days: event.interval_days_after,
  }));
}

/**
 * Streaks of consecutive UTC days with at least one review.
 *
 * The current streak counts only if its last day is today or yesterday, so a
 * learner who has not reviewed yet today keeps yesterday's streak.
 */
export function reviewStreaks(events: readonly ReviewEvent[], today: Date): Streaks {
  const days = [...new Set(events.map((event) => dayNumber(toUtcDay(event.reviewed_at))))].sort(
    (a, b) => a - b
  );
  if (days.length === 0) {
    return { current: 0, longest: 0 };
  }

  let longest = 1;
  let run = 1;
  for (let i = 1; i < days.length; i++) {
    run = days[i] - days[i - 1] === 1 ? run + 1 : 1;
    longest = Math.max(longest, run);
  }

  // `run` is now the length of the run ending on the last review day
  const todayNumber = dayNumber(toUtcDay(toTimestamp(today)));
  const lastDay = days[days.length - 1];
  const current = todayNumber - lastDay <= 1 ? run : 0;

  return { current, longest };
}

function dayNumber(day: string): number {
  return Math.round(Date.parse(`${day}T00:00:00.000Z`) / DAY_MS);
}

/**
 * Deck totals for the progress view.
 */
export function summarizeProgress(
  chunks: readonly Chunk[],
  events: readonly ReviewEvent[],
  now: Date
): ProgressSummary {
  const nowTimestamp = toTimestamp(now);
  const passed = events.filter((event) => QUALITY_SCORES[event.quality] >= PASS_THRESHOLD).length;
  const easeTotal = chunks.reduce((sum, chunk) => sum + chunk.ease_factor, 0);

  return {
    total_chunks: chunks.length,
    due_now: chunks.filter((chunk) => chunk.due_at <= nowTimestamp).length,
    new_chunks: chunks.filter((chunk) => chunk.last_reviewed_at === null).length,
    total_reviews: events.length,
    pass_rate: events.length > 0 ? round2(passed / events.length) : null,
    average_ease_factor: chunks.length > 0 ? round2(easeTotal / chunks.length) : null,
    streaks: reviewStreaks(events, now),
  };
}

function round2(value: number): number {
  return Math.round((value + Number.EPSILON) * 100) / 100;
}
