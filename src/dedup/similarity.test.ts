import { describe, expect, it } from "vitest";
import { normalizeWhitespace, ratio, tokenSortRatio } from "./similarity";

describe("similarity", () => {
  it("collapses whitespace", () => {
    expect(normalizeWhitespace("  Senior \t Data\nEngineer ")).toBe(
      "Senior Data Engineer",
    );
  });

  it("scores identical strings 100", () => {
    expect(ratio("acme", "acme")).toBe(100);
    expect(ratio("", "")).toBe(100);
  });

  it("scores from the longest common subsequence", () => {
    expect(ratio("abc", "abd")).toBeCloseTo(66.667, 3);
    expect(ratio("abc", "")).toBe(0);
  });

  it("ignores token order and case", () => {
    expect(tokenSortRatio("Software Engineer", "engineer  software")).toBe(100);
  });

  it("is symmetric", () => {
    expect(tokenSortRatio("Google", "Google Inc.")).toBe(
      tokenSortRatio("Google Inc.", "Google"),
    );
    expect(tokenSortRatio("Google", "Google Inc.")).toBeCloseTo(70.588, 3);
  });
});
