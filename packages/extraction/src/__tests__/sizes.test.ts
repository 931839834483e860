import { describe, expect, it } from "vitest";

import { normalizeSize, SIZE_MAPS } from "../sizes";
import { CANONICAL_SIZES, SITE_IDS } from "../types";

describe("normalizeSize", () => {
  it.each([
    [5, 5, "5x10"],
    [5, 6, "5x10"],
    [5, 8, "5x10"],
    [5, 10, "5x10"],
    [5, 14, "5x10"],
    [5, 15, "5x10"],
    [7, 14, "10x10"],
    [10, 10, "10x10"],
    [10, 14, "10x10"],
    [10, 15, "10x15"],
    [10, 17, "10x15"],
    [10, 19, "10x20"],
    [10, 20, "10x20"],
    [10, 30, "10x30"],
    [10, 40, "10x30"],
    [12, 28, "10x30"],
  ])("maps Public Storage %ix%i to %s", (width, depth, expected) => {
    expect(normalizeSize("public_storage", width, depth)).toBe(expected);
  });

  it("has exactly the documented Public Storage pairs", () => {
    expect(Object.keys(SIZE_MAPS.public_storage)).toHaveLength(16);
  });

  it("maps Lockaway's non-standard sizes and ignores 8x4", () => {
    expect(normalizeSize("lockaway", 8, 8)).toBe("5x10");
    expect(normalizeSize("lockaway", 8, 12)).toBe("10x10");
    expect(normalizeSize("lockaway", 8, 4)).toBeNull();
  });

  it("maps Woodlands 12-foot-wide units", () => {
    expect(normalizeSize("woodlands_sao", 12, 10)).toBe("10x10");
    expect(normalizeSize("woodlands_sao", 12, 30)).toBe("10x30");
  });

  it("only tracks canonical sizes for Honea Egypt and Montgomery", () => {
    expect(normalizeSize("honea_egypt", 12, 10)).toBeNull();
    expect(normalizeSize("montgomery", 10, 14)).toBeNull();
    expect(Object.keys(SIZE_MAPS.honea_egypt)).toEqual([...CANONICAL_SIZES]);
  });

  it("maps every canonical size to itself on every site", () => {
    for (const siteId of SITE_IDS) {
      for (const size of CANONICAL_SIZES) {
        const [width, depth] = size.split("x").map(Number);
        expect(normalizeSize(siteId, width, depth)).toBe(size);
      }
    }
  });

  it("does not treat depth-by-width as the same unit", () => {
    expect(normalizeSize("public_storage", 14, 5)).toBeNull();
    expect(normalizeSize("montgomery", 10, 5)).toBeNull();
  });
});
