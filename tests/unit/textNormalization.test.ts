/**
 * Unit tests for text matching helpers
 */

import { describe, it, expect } from "vitest";
import {
  collapseWhitespace,
  containsTerm,
  escapeRegExp,
  normalizeForMatch,
  removeDiacritics,
} from "@/utils";

describe("removeDiacritics", () => {
  it("should strip combining marks", () => {
    expect(removeDiacritics("José Ñandú Ação")).toBe("Jose Nandu Acao");
  });
});

describe("normalizeForMatch", () => {
  it("should lowercase, strip diacritics and collapse whitespace", () => {
    expect(normalizeForMatch("  São   Paulo ")).toBe("sao paulo");
    expect(collapseWhitespace("a \t\n b")).toBe("a b");
  });
});

describe("containsTerm", () => {
  it("should match whole words only", () => {
    expect(containsTerm("senior java developer", "java")).toBe(true);
    expect(containsTerm("javascript developer", "java")).toBe(false);
    expect(containsTerm("c++ engineer", "c++")).toBe(true);
  });

  it("should escape regex metacharacters", () => {
    expect(escapeRegExp("a.b*c")).toBe("a\\.b\\*c");
  });
});
