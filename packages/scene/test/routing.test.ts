import { describe, expect, it } from "vitest";
import fc from "fast-check";
import { selectSides } from "../src/diagram";

describe("selectSides", () => {
  describe("Feature: Automatic Side Selection", () => {
    it("should connect right to left when the target is to the right", () => {
      expect(selectSides({ x: 0, y: 0 }, { x: 300, y: 0 })).toEqual({ fromSide: "right", toSide: "left" });
    });

    it("should connect left to right when the target is to the left", () => {
      expect(selectSides({ x: 0, y: 0 }, { x: -300, y: 40 })).toEqual({ fromSide: "left", toSide: "right" });
    });

    it("should connect bottom to top when the target is below", () => {
      expect(selectSides({ x: 0, y: 0 }, { x: 0, y: 300 })).toEqual({ fromSide: "bottom", toSide: "top" });
    });

    it("should connect top to bottom when the target is above", () => {
      expect(selectSides({ x: 0, y: 0 }, { x: 20, y: -300 })).toEqual({ fromSide: "top", toSide: "bottom" });
    });

    it("should pick the vertical branch on an equal-magnitude diagonal", () => {
      expect(selectSides({ x: 0, y: 0 }, { x: 100, y: 100 })).toEqual({ fromSide: "bottom", toSide: "top" });
      expect(selectSides({ x: 0, y: 0 }, { x: -100, y: -100 })).toEqual({ fromSide: "top", toSide: "bottom" });
    });

    it("should fall back to top/bottom for coincident centers", () => {
      expect(selectSides({ x: 5, y: 5 }, { x: 5, y: 5 })).toEqual({ fromSide: "top", toSide: "bottom" });
    });
  });

  describe("Property: Reverse Direction Mirrors Sides", () => {
    const coordinate = fc.integer({ min: -10_000, max: 10_000 });
    const point = fc.record({ x: coordinate, y: coordinate });

    it("should swap sides when source and target swap, for distinct centers", () => {
      fc.assert(
        fc.property(point, point, (a, b) => {
          fc.pre(a.x !== b.x || a.y !== b.y);
          const forward = selectSides(a, b);
          const backward = selectSides(b, a);
          expect(backward.fromSide).toBe(forward.toSide);
          expect(backward.toSide).toBe(forward.fromSide);
        }),
      );
    });

    it("should always join opposite sides", () => {
      const opposite = { top: "bottom", bottom: "top", left: "right", right: "left" } as const;
      fc.assert(
        fc.property(point, point, (a, b) => {
          const { fromSide, toSide } = selectSides(a, b);
          expect(toSide).toBe(opposite[fromSide]);
        }),
      );
    });
  });
});
