import { z } from "zod";
import type { DetectionResult } from "./detection.js";
import type { TraceEntry } from "./trace.js";
import type { PipelineError } from "../utils/result.js";

/** Page ids double as file names in deployed sites */
export const PAGE_ID_PATTERN = /^[A-Za-z0-9][A-Za-z0-9_-]*$/;

export const PageSchema = z.object({
  id: z.string().regex(PAGE_ID_PATTERN, "page id must be a safe file name"),
  markup: z.string(),
});
export interface Page {
  readonly id: string;
  markup: string;
}

/** Viewport used when rendering markup for detection */
export interface Viewport {
  width: number;
  height: number;
}

export type StopReason = "converged" | "budget_exhausted" | "rewrite_failed";

/** Result of correcting one page */
export interface CorrectionOutcome {
  readonly pageId: string;
  readonly markup: string;
  readonly iterationsApplied: number;
  readonly finalOverlaps: number;
  readonly stopReason: StopReason;
  /** Block-level changes made by each applied rewrite, in order */
  readonly corrections: readonly string[];
  /** Last completed detection pass */
  readonly detection: DetectionResult;
  readonly history: readonly TraceEntry[];
  /** Set when the loop stopped because the rewrite failed */
  readonly error?: PipelineError;
}

/** Parse and validate a page. Throws ZodError on invalid input. */
export function parsePage(data: unknown): Page {
  return PageSchema.parse(data);
}
