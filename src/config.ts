import { z } from "zod";
import {
  COLLABORATOR_TIMEOUT_MS,
  DEFAULT_CONFIDENCE_THRESHOLD,
  DEFAULT_IOU_THRESHOLD,
  DEFAULT_VIEWPORT_H,
  DEFAULT_VIEWPORT_W,
  MAX_ITER,
  PAGE_CONCURRENCY,
  RENDER_SETTLE_MS,
} from "./constants.js";

const optionalString = z
  .string()
  .optional()
  .transform((v) => (v === undefined || v.trim() === "" ? undefined : v));

const booleanFlag = z
  .enum(["true", "false", "1", "0"])
  .transform((v) => v === "true" || v === "1");

export const ConfigSchema = z.object({
  OPENROUTER_API_KEY: optionalString,
  OPENROUTER_MODEL: z.string().default("openai/gpt-4-turbo-preview"),
  OPENROUTER_BASE_URL: z.string().url().default("https://openrouter.ai/api/v1"),

  DETECTOR_MODE: z.enum(["http", "dom"]).default("http"),
  DETECTOR_URL: optionalString.pipe(z.string().url().optional()),
  CONFIDENCE_THRESHOLD: z.coerce
    .number()
    .min(0)
    .max(1)
    .default(DEFAULT_CONFIDENCE_THRESHOLD),
  IOU_THRESHOLD: z.coerce.number().min(0).max(1).default(DEFAULT_IOU_THRESHOLD),

  CHROMIUM_PATH: optionalString,
  RENDER_SETTLE_MS: z.coerce.number().int().nonnegative().default(RENDER_SETTLE_MS),
  VIEWPORT_WIDTH: z.coerce.number().int().positive().default(DEFAULT_VIEWPORT_W),
  VIEWPORT_HEIGHT: z.coerce.number().int().positive().default(DEFAULT_VIEWPORT_H),

  MAX_ITERATIONS: z.coerce.number().int().min(1).max(10).default(MAX_ITER),
  VERIFY_FINAL_REWRITE: booleanFlag.default("true"),
  COLLABORATOR_TIMEOUT_MS: z.coerce
    .number()
    .int()
    .nonnegative()
    .default(COLLABORATOR_TIMEOUT_MS),
  PAGE_CONCURRENCY: z.coerce.number().int().positive().default(PAGE_CONCURRENCY),
  TRACE_DIR: optionalString,

  SITES_DIR: z.string().default("./data/sites"),
  HOST: z.string().default("0.0.0.0"),
  PORT: z.coerce.number().int().min(0).max(65535).default(8000),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
});

export type Config = z.infer<typeof ConfigSchema>;

/** Parse service configuration from environment variables. Throws ZodError on invalid values. */
export function loadConfig(
  env: Record<string, string | undefined> = process.env
): Config {
  return ConfigSchema.parse(env);
}
