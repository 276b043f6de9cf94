import { describe, it, expect } from "vitest";
import { decodeRows, encodeToRows, extractAnchors } from "../src/bundle-entry.js";

describe("bundle entry", () => {
  it("round-trips through row strings", () => {
    const rows = encodeToRows("bundle", "hello", 6, 24);
    expect(rows).toHaveLength(4);
    for (const row of rows) expect(row).toHaveLength(12);
    expect(decodeRows(rows, "hello")).toBe("bundle");
  });

  it("falls back to the default grid size", () => {
    const rows = encodeToRows("hi", "hello");
    expect(rows).toHaveLength(3);
    expect(decodeRows(rows, "hello")).toBe("hi");
  });

  it("exposes the anchor extractor", () => {
    expect(extractAnchors("hello")).toEqual(["he", "el", "lo"]);
  });
});
