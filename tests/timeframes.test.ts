import { describe, expect, it } from "vitest";

import {
  compareTimeframes,
  formatTimeframe,
  isQualifiedTimeframe,
  normalizeTimeframe,
  timeframeToMinutes,
} from "../src/rules/timeframes.js";

describe("normalizeTimeframe", () => {
  it.each([
    ["M5", "M5"],
    ["5m", "M5"],
    ["5", "M5"],
    ["15min", "M15"],
    ["15MINS", "M15"],
    ["1h", "H1"],
    ["H1", "H1"],
    ["2hr", "H2"],
    ["60", "H1"],
    ["240", "H4"],
    ["90", "M90"],
    ["1440", "D1"],
    ["24h", "D1"],
    ["1d", "D1"],
    ["d1", "D1"],
    [" h4 ", "H4"],
  ])("maps %s to %s", (input, expected) => {
    expect(normalizeTimeframe(input)).toBe(expected);
  });

  it.each(["", "0", "M0", "0h", "65000", "1W", "ABC", "M5X"])("rejects %j", (input) => {
    expect(normalizeTimeframe(input)).toBeUndefined();
  });
});

describe("timeframe helpers", () => {
  it("formats minutes in the largest whole unit", () => {
    expect(formatTimeframe(30)).toBe("M30");
    expect(formatTimeframe(120)).toBe("H2");
    expect(formatTimeframe(2_880)).toBe("D2");
  });

  it("treats bare numbers as unqualified", () => {
    expect(isQualifiedTimeframe("5")).toBe(false);
    expect(isQualifiedTimeframe("5m")).toBe(true);
    expect(isQualifiedTimeframe("H1")).toBe(true);
    expect(isQualifiedTimeframe("GOLD")).toBe(false);
  });

  it("orders timeframes by duration", () => {
    expect(timeframeToMinutes("H4")).toBe(240);
    const sorted = ["D1", "M15", "H1", "M1"].sort(compareTimeframes);
    expect(sorted).toEqual(["M1", "M15", "H1", "D1"]);
  });
});
