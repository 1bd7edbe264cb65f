import type { DetectionResult } from "../schema/detection.js";
import type { RenderedImage } from "../renderer/renderer.js";
import type { Detector } from "./detector.js";
import { buildDetectionResult } from "../utils/geometry.js";
import { DEFAULT_IOU_THRESHOLD } from "../constants.js";

/**
 * Detector that trusts the block boxes the renderer measured in the DOM.
 * Every block gets score 1. Needs no model, but only sees `.block` elements.
 */
export class DomBlockDetector implements Detector {
  constructor(private readonly iouThreshold: number = DEFAULT_IOU_THRESHOLD) {}

  async detect(image: RenderedImage): Promise<DetectionResult> {
    if (!image.blocks) {
      throw new Error("Image carries no block measurements; DOM detection needs a rendered page");
    }
    const raw = [...image.blocks]
      .sort((a, b) => a.index - b.index)
      .map((b) => ({ score: 1, bbox: b.bbox }));
    return buildDetectionResult(raw, [image.width, image.height], this.iouThreshold);
  }
}
