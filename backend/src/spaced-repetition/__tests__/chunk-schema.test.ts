/**
 * Chunk Schema Tests
 *
 * Tests for the chunk factory, validation and timestamp helpers.
 */

import { describe, test, expect } from "vitest";
import { InvalidInputError } from "../../errors.js";
import {
  ChunkSchema,
  DAY_MS,
  addDays,
  assertValidChunk,
  createNewChunk,
  normalizeTimestamp,
  toTimestamp,
  toUtcDay,
  type Chunk,
} from "../chunk-schema.js";

const NOW = new Date("2026-03-10T08:15:00.000Z");

describe("chunk-schema", () => {
  // ===========================================================================
  // createNewChunk
  // ===========================================================================

  describe("createNewChunk", () => {
    test("starts with the default schedule, due immediately", () => {
      const chunk = createNewChunk("chunk-1", { prompt: "お元気ですか？", answer: "How are you?" }, NOW);

      expect(chunk).toEqual({
        id: "chunk-1",
        prompt: "お元気ですか？",
        answer: "How are you?",
        ease_factor: 2.5,
        interval_days: 0,
        repetition_count: 0,
        due_at: "2026-03-10T08:15:00.000Z",
        created_at: "2026-03-10T08:15:00.000Z",
        last_reviewed_at: null,
        updated_at: "2026-03-10T08:15:00.000Z",
      });
    });

    test("produces a chunk that passes schema validation", () => {
      const chunk = createNewChunk("chunk-1", { prompt: "p", answer: "a" }, NOW);

      expect(ChunkSchema.safeParse(chunk).success).toBe(true);
    });
  });

  // ===========================================================================
  // ChunkSchema
  // ===========================================================================

  describe("ChunkSchema", () => {
    const valid: Chunk = createNewChunk("chunk-1", { prompt: "p", answer: "a" }, NOW);

    test("rejects an ease factor below 1.3", () => {
      expect(ChunkSchema.safeParse({ ...valid, ease_factor: 1.29 }).success).toBe(false);
    });

    test("rejects a negative or fractional interval", () => {
      expect(ChunkSchema.safeParse({ ...valid, interval_days: -1 }).success).toBe(false);
      expect(ChunkSchema.safeParse({ ...valid, interval_days: 2.5 }).success).toBe(false);
    });

    test("rejects a negative repetition count", () => {
      expect(ChunkSchema.safeParse({ ...valid, repetition_count: -1 }).success).toBe(false);
    });

    test("rejects an empty prompt or answer", () => {
      expect(ChunkSchema.safeParse({ ...valid, prompt: "   " }).success).toBe(false);
      expect(ChunkSchema.safeParse({ ...valid, answer: "" }).success).toBe(false);
    });

    test("rejects a due date that is not a timestamp", () => {
      expect(ChunkSchema.safeParse({ ...valid, due_at: "2026-03-10" }).success).toBe(false);
    });

    test("rejects ids with path characters", () => {
      expect(ChunkSchema.safeParse({ ...valid, id: "../chunk" }).success).toBe(false);
    });
  });

  describe("assertValidChunk", () => {
    test("returns the chunk with trimmed content", () => {
      const chunk = createNewChunk("chunk-1", { prompt: "  p  ", answer: "a\n" }, NOW);

      const result = assertValidChunk(chunk);
      expect(result.prompt).toBe("p");
      expect(result.answer).toBe("a");
    });

    test("throws InvalidInputError naming the field", () => {
      const chunk = { ...createNewChunk("chunk-1", { prompt: "p", answer: "a" }, NOW), ease_factor: 1 };

      expect(() => assertValidChunk(chunk)).toThrow(InvalidInputError);
      expect(() => assertValidChunk(chunk)).toThrow(/ease_factor/);
    });
  });

  // ===========================================================================
  // Timestamp Utilities
  // ===========================================================================

  describe("toTimestamp", () => {
    test("formats as UTC ISO 8601", () => {
      expect(toTimestamp(NOW)).toBe("2026-03-10T08:15:00.000Z");
    });

    test("throws on an invalid date", () => {
      expect(() => toTimestamp(new Date("nope"))).toThrow(InvalidInputError);
    });

    test("accepts the last day of year 9999", () => {
      expect(toTimestamp(new Date("9999-12-31T23:59:59.999Z"))).toBe("9999-12-31T23:59:59.999Z");
    });

    test("throws past year 9999", () => {
      expect(() => toTimestamp(new Date(Date.UTC(10000, 0, 1)))).toThrow(InvalidInputError);
    });
  });

  describe("addDays", () => {
    test("adds whole days of 24 hours", () => {
      expect(addDays(NOW, 1)).toBe("2026-03-11T08:15:00.000Z");
      expect(addDays(NOW, 30)).toBe("2026-04-09T08:15:00.000Z");
    });

    test("adds zero days", () => {
      expect(addDays(NOW, 0)).toBe("2026-03-10T08:15:00.000Z");
    });

    test("DAY_MS is 24 hours", () => {
      expect(DAY_MS).toBe(86_400_000);
    });
  });

  describe("normalizeTimestamp", () => {
    test("converts offsets to UTC", () => {
      expect(normalizeTimestamp("2026-03-10T17:15:00+09:00")).toBe("2026-03-10T08:15:00.000Z");
    });

    test("adds milliseconds to a UTC timestamp", () => {
      expect(normalizeTimestamp("2026-03-10T08:15:00Z")).toBe("2026-03-10T08:15:00.000Z");
    });

    test("throws on garbage", () => {
      expect(() => normalizeTimestamp("yesterday")).toThrow(InvalidInputError);
    });

    test("throws on an extended year", () => {
      expect(() => normalizeTimestamp("+010000-01-01T00:00:00.000Z")).toThrow(InvalidInputError);
    });
  });

  describe("toUtcDay", () => {
    test("uses the UTC calendar day", () => {
      expect(toUtcDay("2026-03-10T23:30:00-05:00")).toBe("2026-03-11");
    });
  });
});
