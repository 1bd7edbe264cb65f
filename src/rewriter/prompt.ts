import type { DetectionResult } from "../schema/detection.js";
import { BLOCK_CLASS } from "../constants.js";

export const REWRITE_SYSTEM_PROMPT =
  "You are a web layout expert. You fix HTML pages using object detection data. " +
  `Content blocks carry class '${BLOCK_CLASS}' and use position: absolute. ` +
  "You update block coordinates from the detected boxes, converting pixels to vw/vh units, " +
  "and move blocks so that no two of them overlap. Never delete existing blocks.";

function fmt(n: number): string {
  return n.toFixed(1);
}

/** User prompt asking for a rewrite that clears the reported overlaps */
export function buildRewritePrompt(
  markup: string,
  detection: DetectionResult,
  pageId: string,
  preserveBlocks: boolean
): string {
  const [imgW, imgH] = detection.image_size;

  const objects = detection.objects.map(
    (o) =>
      `Object ${o.id}: bbox=[${o.bbox.map(fmt).join(", ")}], ` +
      `size=${fmt(o.bbox_size[0])}x${fmt(o.bbox_size[1])}px, score=${o.score.toFixed(3)}`
  );
  const overlaps = detection.overlap_details.map(
    (p) => `Objects ${p.instance1} and ${p.instance2} overlap (IoU ${p.iou.toFixed(3)})`
  );

  const blockRule = preserveBlocks
    ? "Keep every existing block; only change its coordinates."
    : "Add new blocks for detected objects that have no block in the markup.";

  return `Fix the HTML of page "${pageId}" using the detection data below.

Source:
\`\`\`html
${markup}
\`\`\`

Detection:
- Objects: ${detection.total_objects}
- Overlapping pairs: ${detection.overlaps}
- Image size: ${imgW}x${imgH} px

Objects:
${objects.join("\n")}

Overlaps:
${overlaps.length > 0 ? overlaps.join("\n") : "none"}

Instructions:
1. Update the coordinates of every block with class '${BLOCK_CLASS}' so that no two blocks overlap.
2. Convert pixel coordinates to viewport units:
   - left = (x1 / ${imgW}) * 100 vw
   - top = (y1 / ${imgH}) * 100 vh
   - width = ((x2 - x1) / ${imgW}) * 100 vw
   - height = ((y2 - y1) / ${imgH}) * 100 vh
3. ${blockRule}
4. Keep all other block styles (z-index, border-radius, background, box-shadow, ...).
5. Reply with the corrected HTML document only, without explanations.`;
}
