// ---------------------------------------------------------------------------
// Tests for catalogue date parsing.
// ---------------------------------------------------------------------------

import { describe, it, expect } from "vitest";

import { parseDateRange, romanToInt } from "../../../src/domain/dates/date-range.js";

describe("romanToInt", () => {
  it("converts additive and subtractive numerals", () => {
    expect(romanToInt("XII")).toBe(12);
    expect(romanToInt("XIV")).toBe(14);
    expect(romanToInt("xix")).toBe(19);
  });

  it("returns null for empty or non-roman input", () => {
    expect(romanToInt("")).toBeNull();
    expect(romanToInt("ABC")).toBeNull();
  });
});

describe("parseDateRange", () => {
  // ── Arabic years ──────────────────────────────────────────────────────

  it("reads a single year", () => {
    expect(parseDateRange("1450")).toEqual({ start: 1450, end: 1450 });
  });

  it("reads a full year range", () => {
    expect(parseDateRange("1250-1300")).toEqual({ start: 1250, end: 1300 });
    expect(parseDateRange("1250–1300")).toEqual({ start: 1250, end: 1300 });
  });

  it("expands an abbreviated end year", () => {
    expect(parseDateRange("1370-80")).toEqual({ start: 1370, end: 1380 });
  });

  it("widens circa dates by a decade each way", () => {
    expect(parseDateRange("c. 1200")).toEqual({ start: 1190, end: 1210 });
    expect(parseDateRange("circa 1400")).toEqual({ start: 1390, end: 1410 });
  });

  it("leaves one side open for before and after", () => {
    expect(parseDateRange("before 1300")).toEqual({ start: null, end: 1300 });
    expect(parseDateRange("after 1150")).toEqual({ start: 1150, end: null });
  });

  it("finds years embedded in free text", () => {
    expect(parseDateRange("England, 1250")).toEqual({ start: 1250, end: 1250 });
  });

  // ── Roman centuries ───────────────────────────────────────────────────

  it("reads a bare roman century with the s. prefix", () => {
    expect(parseDateRange("s. xi")).toEqual({ start: 1000, end: 1099 });
  });

  it("reads roman century ranges", () => {
    expect(parseDateRange("XII-XIII")).toEqual({ start: 1100, end: 1299 });
  });

  it("reads roman quarters and qualifiers", () => {
    expect(parseDateRange("XV 1/4")).toEqual({ start: 1400, end: 1424 });
    expect(parseDateRange("XVex")).toEqual({ start: 1475, end: 1499 });
  });

  // ── English ordinals ──────────────────────────────────────────────────

  it("reads ordinal centuries", () => {
    expect(parseDateRange("12th century")).toEqual({ start: 1100, end: 1199 });
  });

  it("reads fractions of an ordinal century", () => {
    expect(parseDateRange("second half of the 12th century")).toEqual({
      start: 1150,
      end: 1199,
    });
  });

  it("reads early, mid and late qualifiers", () => {
    expect(parseDateRange("late 14th century")).toEqual({ start: 1375, end: 1399 });
    expect(parseDateRange("early 13th century")).toEqual({ start: 1200, end: 1225 });
  });

  // ── Unparseable ───────────────────────────────────────────────────────

  it("returns nulls for empty or unknown input", () => {
    expect(parseDateRange(null)).toEqual({ start: null, end: null });
    expect(parseDateRange("")).toEqual({ start: null, end: null });
    expect(parseDateRange("undated")).toEqual({ start: null, end: null });
  });
});
