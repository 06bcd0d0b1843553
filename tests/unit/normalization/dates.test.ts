/**
 * Unit tests for posting timestamp parsing
 */

import { describe, it, expect } from "vitest";
import { parsePostedAt, parseRelativeDate } from "@/normalization";

const NOW = new Date("2024-06-15T12:00:00.000Z");

describe("parsePostedAt", () => {
  it("should parse ISO strings", () => {
    expect(parsePostedAt("2024-05-01T09:30:00.000Z", NOW)?.toISOString()).toBe(
      "2024-05-01T09:30:00.000Z",
    );
    expect(parsePostedAt("2024-05-01", NOW)?.toISOString()).toBe("2024-05-01T00:00:00.000Z");
  });

  it("should parse epoch seconds and milliseconds", () => {
    expect(parsePostedAt(1717243200, NOW)?.toISOString()).toBe("2024-06-01T12:00:00.000Z");
    expect(parsePostedAt(1717243200000, NOW)?.toISOString()).toBe("2024-06-01T12:00:00.000Z");
    expect(parsePostedAt("1717243200", NOW)?.toISOString()).toBe("2024-06-01T12:00:00.000Z");
  });

  it("should copy Date inputs", () => {
    const input = new Date("2024-06-01T00:00:00.000Z");
    const parsed = parsePostedAt(input, NOW);
    expect(parsed?.getTime()).toBe(input.getTime());
    expect(parsed).not.toBe(input);
  });

  it("should return undefined for missing or invalid values", () => {
    expect(parsePostedAt(undefined, NOW)).toBeUndefined();
    expect(parsePostedAt("", NOW)).toBeUndefined();
    expect(parsePostedAt(-5, NOW)).toBeUndefined();
    expect(parsePostedAt("sometime", NOW)).toBeUndefined();
  });
});

describe("parseRelativeDate", () => {
  it("should parse English phrases", () => {
    expect(parseRelativeDate("2 days ago", NOW)?.toISOString()).toBe("2024-06-13T12:00:00.000Z");
    expect(parseRelativeDate("30+ days ago", NOW)?.toISOString()).toBe("2024-05-16T12:00:00.000Z");
    expect(parseRelativeDate("a week ago", NOW)?.toISOString()).toBe("2024-06-08T12:00:00.000Z");
    expect(parseRelativeDate("5d", NOW)?.toISOString()).toBe("2024-06-10T12:00:00.000Z");
    expect(parseRelativeDate("today", NOW)?.toISOString()).toBe("2024-06-15T12:00:00.000Z");
  });

  it("should parse Portuguese phrases", () => {
    expect(parseRelativeDate("há 3 dias", NOW)?.toISOString()).toBe("2024-06-12T12:00:00.000Z");
    expect(parseRelativeDate("ontem", NOW)?.toISOString()).toBe("2024-06-14T12:00:00.000Z");
  });
});
