import type { DetectionResult } from "../schema/detection.js";
import type { RenderedImage } from "../renderer/renderer.js";

export interface Detector {
  detect(image: RenderedImage): Promise<DetectionResult>;
}

const PNG_SIGNATURE = [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a];

/** Width and height from a PNG's IHDR chunk, or null if `buf` is not a PNG */
export function readPngSize(buf: Buffer): { width: number; height: number } | null {
  if (buf.length < 24) return null;
  if (!PNG_SIGNATURE.every((b, i) => buf[i] === b)) return null;
  if (buf.toString("ascii", 12, 16) !== "IHDR") return null;
  return { width: buf.readUInt32BE(16), height: buf.readUInt32BE(20) };
}
