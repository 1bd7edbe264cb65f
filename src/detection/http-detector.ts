import type { DetectionResult } from "../schema/detection.js";
import { parseInferenceResponse } from "../schema/detection.js";
import type { RenderedImage } from "../renderer/renderer.js";
import type { Detector } from "./detector.js";
import { buildDetectionResult } from "../utils/geometry.js";
import {
  DEFAULT_CONFIDENCE_THRESHOLD,
  DEFAULT_IOU_THRESHOLD,
} from "../constants.js";

export interface HttpDetectorOptions {
  /** Inference endpoint accepting a PNG body */
  url: string;
  confidenceThreshold?: number;
  iouThreshold?: number;
  timeoutMs?: number;
  fetch?: typeof fetch;
}

/**
 * Detector backed by a model inference server.
 * The server answers `{ objects: [{score, bbox, mask_area?}], image_size? }`;
 * low-confidence boxes are dropped and overlaps are computed here.
 */
export class HttpDetector implements Detector {
  private readonly fetchImpl: typeof fetch;
  private readonly confidenceThreshold: number;
  private readonly iouThreshold: number;

  constructor(private readonly options: HttpDetectorOptions) {
    this.fetchImpl = options.fetch ?? fetch;
    this.confidenceThreshold =
      options.confidenceThreshold ?? DEFAULT_CONFIDENCE_THRESHOLD;
    this.iouThreshold = options.iouThreshold ?? DEFAULT_IOU_THRESHOLD;
  }

  async detect(image: RenderedImage): Promise<DetectionResult> {
    const res = await this.fetchImpl(this.options.url, {
      method: "POST",
      headers: { "content-type": "image/png" },
      body: new Uint8Array(image.png),
      signal:
        this.options.timeoutMs !== undefined && this.options.timeoutMs > 0
          ? AbortSignal.timeout(this.options.timeoutMs)
          : undefined,
    });
    if (!res.ok) {
      throw new Error(`Inference server responded ${res.status} ${res.statusText}`);
    }

    const body = parseInferenceResponse(await res.json());
    const kept = body.objects.filter((o) => o.score >= this.confidenceThreshold);
    const imageSize = body.image_size ?? [image.width, image.height];
    return buildDetectionResult(kept, imageSize, this.iouThreshold);
  }
}
