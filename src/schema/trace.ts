import type { StopReason } from "./page.js";

/** What the loop did after a detection pass */
export type IterationAction = StopReason | "rewrite";

/** A single trace entry (one per detection pass) */
export interface TraceEntry {
  page_id: string;
  iter: number;
  total_objects: number;
  overlaps: number;
  action: IterationAction;
  corrections?: string[];
  error?: string;
}
