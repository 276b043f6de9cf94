import { describe, it, expect } from "vitest";
import { AnchorTable, directionAt, extractAnchors } from "../src/anchors.js";
import { NoAnchorAvailableError } from "../src/errors.js";
import { scripted } from "./helpers/random.js";
import { thrownBy } from "./helpers/errors.js";

describe("extractAnchors", () => {
  it("drops palindromic windows", () => {
    // windows: he, el, ll, lo
    expect(extractAnchors("hello")).toEqual(["he", "el", "lo"]);
  });

  it("drops every copy of a repeated window", () => {
    // windows: ab, bc, ca, ab
    expect(extractAnchors("abcab")).toEqual(["bc", "ca"]);
  });

  it("drops windows whose reversal is also a window", () => {
    // windows: pa, ab, bq, qb, ba
    expect(extractAnchors("pabqba")).toEqual(["pa"]);
  });

  it("returns nothing for passwords shorter than two characters", () => {
    expect(extractAnchors("")).toEqual([]);
    expect(extractAnchors("a")).toEqual([]);
  });

  it("returns nothing when no window survives", () => {
    expect(extractAnchors("aaaa")).toEqual([]);
    expect(extractAnchors("abab")).toEqual([]);
  });

  it("is stable across calls", () => {
    const pw = "correct horse battery staple";
    expect(extractAnchors(pw)).toEqual(extractAnchors(pw));
  });

  it("works on code points, not UTF-16 units", () => {
    expect(extractAnchors("a😀b")).toEqual(["a😀", "😀b"]);
  });
});

describe("AnchorTable", () => {
  const table = AnchorTable.fromPassword("hello");

  it("assigns directions by index parity", () => {
    expect(table.anchors.map((a) => a.direction)).toEqual(["before", "after", "before"]);
    expect(directionAt(0)).toBe("before");
    expect(directionAt(3)).toBe("after");
  });

  it("looks anchors up by token", () => {
    expect(table.has("el")).toBe(true);
    expect(table.has("ll")).toBe(false);
    expect(table.get("lo")).toEqual({ token: "lo", index: 2, direction: "before" });
    expect(table.get("ol")).toBeUndefined();
  });

  it("groups anchors by direction", () => {
    expect(table.ofDirection("before").map((a) => a.token)).toEqual(["he", "lo"]);
    expect(table.ofDirection("after").map((a) => a.token)).toEqual(["el"]);
  });

  it("picks from the requested direction", () => {
    expect(table.pick(scripted([0.9]), "before").token).toBe("lo");
    expect(table.pick(scripted([0.9]), "after").token).toBe("el");
    expect(table.pick(scripted([0.5])).token).toBe("el");
  });

  it("throws when a direction has no anchor", () => {
    const single = AnchorTable.fromPassword("pabqba");
    expect(() => single.pick(scripted([0]), "after")).toThrow(NoAnchorAvailableError);
    expect(thrownBy(() => single.pick(scripted([0]), "after"))).toMatchObject({
      code: "NO_ANCHOR_AVAILABLE",
      direction: "after",
    });
  });

  it("throws when there are no anchors at all", () => {
    const empty = AnchorTable.fromPassword("x");
    expect(empty.size).toBe(0);
    expect(() => empty.pick(scripted([0]))).toThrow("Password yields no valid anchors");
  });
});
