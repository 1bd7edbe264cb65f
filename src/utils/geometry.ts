import type {
  BBox,
  DetectedObject,
  DetectionResult,
  OverlapPair,
  RawDetection,
} from "../schema/detection.js";
import { DEFAULT_IOU_THRESHOLD } from "../constants.js";

/** Area of a box, 0 for degenerate boxes */
export function boxArea([x1, y1, x2, y2]: BBox): number {
  return Math.max(0, x2 - x1) * Math.max(0, y2 - y1);
}

/** Compute the intersection of two boxes, or null if they don't intersect */
export function intersectBoxes(a: BBox, b: BBox): BBox | null {
  const x1 = Math.max(a[0], b[0]);
  const y1 = Math.max(a[1], b[1]);
  const x2 = Math.min(a[2], b[2]);
  const y2 = Math.min(a[3], b[3]);
  if (x2 - x1 <= 0 || y2 - y1 <= 0) return null;
  return [x1, y1, x2, y2];
}

/**
 * Intersection-over-union of two boxes.
 * 0 when they do not intersect or the union is empty.
 */
export function iou(a: BBox, b: BBox): number {
  const inter = intersectBoxes(a, b);
  if (!inter) return 0;
  const interArea = boxArea(inter);
  const union = boxArea(a) + boxArea(b) - interArea;
  if (union <= 0) return 0;
  return interArea / union;
}

export function boxCenter([x1, y1, x2, y2]: BBox): [number, number] {
  return [(x1 + x2) / 2, (y1 + y2) / 2];
}

export function boxSize([x1, y1, x2, y2]: BBox): [number, number] {
  return [x2 - x1, y2 - y1];
}

/**
 * Enumerate overlapping pairs, i < j in input order.
 * Quadratic in object count; a page holds tens of blocks.
 */
export function findOverlaps(
  objects: readonly DetectedObject[],
  threshold: number = DEFAULT_IOU_THRESHOLD
): OverlapPair[] {
  const pairs: OverlapPair[] = [];
  objects.forEach((a, i) => {
    for (const b of objects.slice(i + 1)) {
      const value = iou(a.bbox, b.bbox);
      if (value <= 0 || value < threshold) continue;
      pairs.push({
        instance1: a.id,
        instance2: b.id,
        iou: value,
        score1: a.score,
        score2: b.score,
      });
    }
  });
  return pairs;
}

/**
 * Turn raw boxes into a full detection pass: sequence ids,
 * derived center/size, overlap pairs and totals.
 */
export function buildDetectionResult(
  raw: readonly RawDetection[],
  imageSize: [number, number],
  threshold: number = DEFAULT_IOU_THRESHOLD
): DetectionResult {
  const objects: DetectedObject[] = raw.map((r, id) => {
    const obj: DetectedObject = {
      id,
      score: r.score,
      bbox: r.bbox,
      bbox_center: boxCenter(r.bbox),
      bbox_size: boxSize(r.bbox),
    };
    if (r.mask_area !== undefined) obj.mask_area = r.mask_area;
    return obj;
  });
  const overlapDetails = findOverlaps(objects, threshold);

  return {
    total_objects: objects.length,
    overlaps: overlapDetails.length,
    objects,
    overlap_details: overlapDetails,
    image_size: imageSize,
  };
}
