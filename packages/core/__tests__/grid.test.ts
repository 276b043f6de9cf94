import { describe, it, expect } from "vitest";
import { AnchorTable } from "../src/anchors.js";
import { InvalidOptionsError } from "../src/errors.js";
import { GridLayout, allocateGrid, flatten, placePaddingMarker, unflatten } from "../src/grid.js";
import { scripted } from "./helpers/random.js";

describe("allocateGrid", () => {
  it("builds full rows when the width divides the capacity", () => {
    expect(allocateGrid(4, 8)).toEqual([
      [null, null, null, null],
      [null, null, null, null],
    ]);
  });

  it("shortens the last row to hit the capacity exactly", () => {
    expect(allocateGrid(4, 10).map((r) => r.length)).toEqual([4, 4, 2]);
  });

  it("allows an empty grid", () => {
    expect(allocateGrid(3, 0)).toEqual([]);
  });

  it("rejects bad geometry", () => {
    expect(() => allocateGrid(0, 8)).toThrow(InvalidOptionsError);
    expect(() => allocateGrid(4, 2.5)).toThrow(InvalidOptionsError);
    expect(() => allocateGrid(4, -1)).toThrow("totalMax must be an integer >= 0, got -1");
  });
});

describe("GridLayout", () => {
  const layout = new GridLayout(allocateGrid(4, 10));

  it("counts every slot", () => {
    expect(layout.size).toBe(10);
  });

  it("checks that a run stays in one row", () => {
    expect(layout.fitsInRow(2, 2)).toBe(true);
    expect(layout.fitsInRow(3, 2)).toBe(false);
    expect(layout.fitsInRow(8, 2)).toBe(true);
    expect(layout.fitsInRow(9, 2)).toBe(false);
    expect(layout.fitsInRow(-1, 1)).toBe(false);
  });

  it("locates flat positions", () => {
    expect(layout.locate(9)).toEqual({ row: 2, col: 1 });
    expect(layout.locate(4)).toEqual({ row: 1, col: 0 });
  });
});

describe("flatten / unflatten", () => {
  it("writes a flat list back row by row", () => {
    const grid = allocateGrid(2, 3);
    const flat = flatten(grid);
    flat[1] = "ab";
    flat[2] = "cd";
    unflatten(flat, grid);
    expect(grid).toEqual([[null, "ab"], ["cd"]]);
  });
});

describe("placePaddingMarker", () => {
  const anchors = AnchorTable.fromPassword("hello");

  it("puts a before-anchor in the first slot of a row", () => {
    const grid = allocateGrid(4, 10);
    expect(placePaddingMarker(grid, anchors, scripted([0, 0]))).toEqual({
      row: 0,
      col: 0,
      token: "he",
    });
    expect(grid[0]).toEqual(["he", null, null, null]);
  });

  it("puts an after-anchor in the last slot of a row", () => {
    const grid = allocateGrid(4, 10);
    // 0.5 → "el"; 0.9 → row 2 of 3
    expect(placePaddingMarker(grid, anchors, scripted([0.5, 0.9]))).toEqual({
      row: 2,
      col: 1,
      token: "el",
    });
    expect(grid[2]).toEqual([null, "el"]);
  });
});
