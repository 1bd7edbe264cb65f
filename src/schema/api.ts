import { z, type ZodError } from "zod";
import {
  DEFAULT_VIEWPORT_H,
  DEFAULT_VIEWPORT_W,
  MAX_CORRECTION_ITER,
  MAX_ITER,
  MAX_PAGES,
  MIN_CORRECTION_ITER,
  MIN_PAGES,
} from "../constants.js";
import { PAGE_ID_PATTERN } from "./page.js";

export const GenerateRequestSchema = z.object({
  description: z.string().trim().min(1),
  site_style: z.string().optional(),
  num_pages: z.number().int().min(MIN_PAGES).max(MAX_PAGES).default(1),
  max_correction_iterations: z
    .number()
    .int()
    .min(MIN_CORRECTION_ITER)
    .max(MAX_CORRECTION_ITER)
    .default(MAX_ITER),
  viewport_width: z.number().int().positive().default(DEFAULT_VIEWPORT_W),
  viewport_height: z.number().int().positive().default(DEFAULT_VIEWPORT_H),
});
export type GenerateRequestInput = z.input<typeof GenerateRequestSchema>;
export type GenerateRequest = z.output<typeof GenerateRequestSchema>;

export const CorrectRequestSchema = z.object({
  markup: z.string().min(1),
  page_id: z.string().regex(PAGE_ID_PATTERN, "page id must be a safe file name"),
  options: z
    .object({
      preserve_blocks: z.boolean().optional(),
      max_iterations: z
        .number()
        .int()
        .min(MIN_CORRECTION_ITER)
        .max(MAX_CORRECTION_ITER)
        .optional(),
    })
    .optional(),
});
export type CorrectRequest = z.infer<typeof CorrectRequestSchema>;

/** One line per issue, `path: message` */
export function formatZodError(error: ZodError): string {
  return error.issues
    .map((i) => (i.path.length > 0 ? `${i.path.join(".")}: ${i.message}` : i.message))
    .join("; ");
}
