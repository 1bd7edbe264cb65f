import type { DetectionResult } from "../schema/detection.js";

export interface RewriteContext {
  pageId: string;
  /** Keep existing blocks and only move them */
  preserveBlocks: boolean;
}

export interface Rewriter {
  /** Corrected markup. Throws when no usable rewrite was produced. */
  rewrite(
    markup: string,
    detection: DetectionResult,
    context: RewriteContext
  ): Promise<string>;
}
