import { z } from "zod";

/** Axis-aligned box as [x1, y1, x2, y2] in image pixels */
export const BBoxSchema = z
  .tuple([z.number(), z.number(), z.number(), z.number()])
  .refine(([x1, y1, x2, y2]) => x2 >= x1 && y2 >= y1, {
    message: "bbox must satisfy x2 >= x1 and y2 >= y1",
  });
export type BBox = [number, number, number, number];

export const DetectedObjectSchema = z.object({
  id: z.number().int().nonnegative(),
  score: z.number().min(0).max(1),
  bbox: BBoxSchema,
  bbox_center: z.tuple([z.number(), z.number()]),
  bbox_size: z.tuple([z.number().nonnegative(), z.number().nonnegative()]),
  mask_area: z.number().nonnegative().optional(),
});
export type DetectedObject = z.infer<typeof DetectedObjectSchema>;

export const OverlapPairSchema = z
  .object({
    instance1: z.number().int().nonnegative(),
    instance2: z.number().int().nonnegative(),
    iou: z.number().gt(0).max(1),
    score1: z.number().min(0).max(1),
    score2: z.number().min(0).max(1),
  })
  .refine((p) => p.instance1 < p.instance2, {
    message: "instance1 must be lower than instance2",
  });
export type OverlapPair = z.infer<typeof OverlapPairSchema>;

export const DetectionResultSchema = z
  .object({
    total_objects: z.number().int().nonnegative(),
    overlaps: z.number().int().nonnegative(),
    objects: z.array(DetectedObjectSchema),
    overlap_details: z.array(OverlapPairSchema),
    image_size: z.tuple([z.number().positive(), z.number().positive()]),
  })
  .refine((r) => r.overlaps === r.overlap_details.length, {
    message: "overlaps must equal overlap_details length",
  })
  .refine((r) => r.total_objects === r.objects.length, {
    message: "total_objects must equal objects length",
  })
  .refine(
    (r) => new Set(r.objects.map((o) => o.id)).size === r.objects.length,
    { message: "Duplicate object id in detection pass" }
  );
export type DetectionResult = z.infer<typeof DetectionResultSchema>;

/**
 * Raw detection as an inference server returns it: boxes and scores only.
 * Ids, derived geometry and overlaps are filled in locally.
 */
export const RawDetectionSchema = z.object({
  score: z.number().min(0).max(1),
  bbox: BBoxSchema,
  mask_area: z.number().nonnegative().optional(),
});
export type RawDetection = z.infer<typeof RawDetectionSchema>;

export const InferenceResponseSchema = z.object({
  objects: z.array(RawDetectionSchema),
  image_size: z
    .tuple([z.number().positive(), z.number().positive()])
    .optional(),
});
export type InferenceResponse = z.infer<typeof InferenceResponseSchema>;

/** Parse and validate a detection result. Throws ZodError on invalid input. */
export function parseDetectionResult(data: unknown): DetectionResult {
  return DetectionResultSchema.parse(data);
}

/** Parse and validate an inference server response. Throws ZodError on invalid input. */
export function parseInferenceResponse(data: unknown): InferenceResponse {
  return InferenceResponseSchema.parse(data);
}
