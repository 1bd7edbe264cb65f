import { describe, it, expect } from "vitest";
import {
  boxArea,
  intersectBoxes,
  iou,
  findOverlaps,
  buildDetectionResult,
} from "../../src/utils/geometry.js";
import type { BBox, DetectedObject } from "../../src/schema/detection.js";

function obj(id: number, bbox: BBox, score = 0.9): DetectedObject {
  return {
    id,
    score,
    bbox,
    bbox_center: [(bbox[0] + bbox[2]) / 2, (bbox[1] + bbox[3]) / 2],
    bbox_size: [bbox[2] - bbox[0], bbox[3] - bbox[1]],
  };
}

describe("geometry utilities", () => {
  describe("boxArea", () => {
    it("computes area", () => {
      expect(boxArea([0, 0, 100, 50])).toBe(5000);
    });

    it("is 0 for a degenerate box", () => {
      expect(boxArea([5, 5, 5, 20])).toBe(0);
    });
  });

  describe("intersectBoxes", () => {
    it("computes intersection of overlapping boxes", () => {
      expect(intersectBoxes([0, 0, 100, 100], [50, 50, 150, 150])).toEqual([50, 50, 100, 100]);
    });

    it("returns null for boxes that only touch", () => {
      expect(intersectBoxes([0, 0, 10, 10], [10, 0, 20, 10])).toBeNull();
    });
  });

  describe("iou", () => {
    it("is 1 for identical boxes", () => {
      expect(iou([10, 10, 60, 40], [10, 10, 60, 40])).toBe(1);
    });

    it("is 0 for disjoint boxes", () => {
      expect(iou([0, 0, 10, 10], [20, 20, 30, 30])).toBe(0);
    });

    it("computes intersection over union", () => {
      // intersection 25, union 100 + 100 - 25
      expect(iou([0, 0, 10, 10], [5, 5, 15, 15])).toBeCloseTo(25 / 175, 10);
    });

    it("is symmetric", () => {
      const a: BBox = [3, 7, 40, 22];
      const b: BBox = [12, 0, 31, 90];
      expect(iou(a, b)).toBe(iou(b, a));
    });

    it("stays within [0, 1]", () => {
      const boxes: BBox[] = [
        [0, 0, 10, 10],
        [2, 2, 8, 8],
        [5, 0, 50, 5],
        [0, 0, 0, 0],
      ];
      for (const a of boxes) {
        for (const b of boxes) {
          const v = iou(a, b);
          expect(v).toBeGreaterThanOrEqual(0);
          expect(v).toBeLessThanOrEqual(1);
        }
      }
    });

    it("is 0 when one box has no area", () => {
      expect(iou([5, 5, 5, 5], [0, 0, 10, 10])).toBe(0);
      expect(iou([5, 5, 5, 5], [5, 5, 5, 5])).toBe(0);
    });

    it("grows as a box slides onto another", () => {
      const target: BBox = [0, 0, 100, 100];
      const values = [80, 60, 40, 20, 0].map((x) => iou(target, [x, 0, x + 100, 100]));
      for (let i = 1; i < values.length; i++) {
        expect(values[i]).toBeGreaterThan(values[i - 1] ?? Infinity);
      }
    });
  });

  describe("findOverlaps", () => {
    it("reports the pair above the threshold with its scores", () => {
      const pairs = findOverlaps([obj(0, [0, 0, 10, 10], 0.9), obj(1, [5, 5, 15, 15], 0.7)], 0.1);
      expect(pairs).toHaveLength(1);
      expect(pairs[0]).toMatchObject({ instance1: 0, instance2: 1, score1: 0.9, score2: 0.7 });
      expect(pairs[0]?.iou).toBeCloseTo(0.142857, 5);
    });

    it("skips pairs below the threshold", () => {
      expect(findOverlaps([obj(0, [0, 0, 10, 10]), obj(1, [5, 5, 15, 15])], 0.2)).toEqual([]);
    });

    it("never reports touching boxes, even at threshold 0", () => {
      expect(findOverlaps([obj(0, [0, 0, 10, 10]), obj(1, [10, 0, 20, 10])], 0)).toEqual([]);
    });

    it("orders pairs by first then second index", () => {
      const objects = [
        obj(0, [0, 0, 10, 10]),
        obj(1, [0, 0, 10, 10]),
        obj(2, [0, 0, 10, 10]),
      ];
      const pairs = findOverlaps(objects).map((p) => [p.instance1, p.instance2]);
      expect(pairs).toEqual([
        [0, 1],
        [0, 2],
        [1, 2],
      ]);
    });

    it("gives the same answer on every call", () => {
      const objects = [obj(0, [0, 0, 30, 30]), obj(1, [10, 10, 40, 40]), obj(2, [25, 0, 60, 20])];
      expect(findOverlaps(objects)).toEqual(findOverlaps(objects));
    });

    it("never reports more pairs as the threshold rises", () => {
      const objects = [
        obj(0, [0, 0, 100, 100]),
        obj(1, [10, 10, 110, 110]),
        obj(2, [50, 0, 150, 100]),
        obj(3, [90, 90, 140, 140]),
        obj(4, [0, 0, 100, 100]),
        obj(5, [300, 300, 310, 310]),
      ];
      const counts = [0, 0.05, 0.1, 0.2, 0.5, 1].map((t) => findOverlaps(objects, t).length);
      for (let i = 1; i < counts.length; i++) {
        expect(counts[i]).toBeLessThanOrEqual(counts[i - 1] ?? 0);
      }
      expect(counts[0]).toBeGreaterThan(counts.at(-1) ?? 0);
      expect(counts.at(-1)).toBe(1);
    });

    it("returns nothing for fewer than two objects", () => {
      expect(findOverlaps([])).toEqual([]);
      expect(findOverlaps([obj(0, [0, 0, 10, 10])])).toEqual([]);
    });
  });

  describe("buildDetectionResult", () => {
    it("numbers objects and derives center, size and totals", () => {
      const result = buildDetectionResult(
        [
          { score: 0.9, bbox: [0, 0, 10, 10], mask_area: 80 },
          { score: 0.6, bbox: [5, 5, 15, 15] },
        ],
        [390, 844]
      );
      expect(result.total_objects).toBe(2);
      expect(result.overlaps).toBe(1);
      expect(result.image_size).toEqual([390, 844]);
      expect(result.objects[0]).toEqual({
        id: 0,
        score: 0.9,
        bbox: [0, 0, 10, 10],
        bbox_center: [5, 5],
        bbox_size: [10, 10],
        mask_area: 80,
      });
      expect(result.objects[1]?.id).toBe(1);
      expect(result.objects[1]).not.toHaveProperty("mask_area");
    });
  });
});
