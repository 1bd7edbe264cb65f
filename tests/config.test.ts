import { describe, it, expect } from "vitest";
import { loadConfig } from "../src/config.js";

describe("loadConfig", () => {
  it("fills defaults from an empty environment", () => {
    const config = loadConfig({});
    expect(config).toMatchObject({
      OPENROUTER_MODEL: "openai/gpt-4-turbo-preview",
      DETECTOR_MODE: "http",
      CONFIDENCE_THRESHOLD: 0.5,
      IOU_THRESHOLD: 0.1,
      VIEWPORT_WIDTH: 390,
      VIEWPORT_HEIGHT: 844,
      MAX_ITERATIONS: 3,
      VERIFY_FINAL_REWRITE: true,
      SITES_DIR: "./data/sites",
      PORT: 8000,
      LOG_LEVEL: "info",
    });
    expect(config.OPENROUTER_API_KEY).toBeUndefined();
    expect(config.DETECTOR_URL).toBeUndefined();
  });

  it("coerces numbers and flags", () => {
    const config = loadConfig({
      PORT: "9000",
      IOU_THRESHOLD: "0.25",
      VERIFY_FINAL_REWRITE: "false",
      PAGE_CONCURRENCY: "4",
    });
    expect(config.PORT).toBe(9000);
    expect(config.IOU_THRESHOLD).toBe(0.25);
    expect(config.VERIFY_FINAL_REWRITE).toBe(false);
    expect(config.PAGE_CONCURRENCY).toBe(4);
  });

  it("treats blank optional values as unset", () => {
    const config = loadConfig({ OPENROUTER_API_KEY: "  ", DETECTOR_URL: "" });
    expect(config.OPENROUTER_API_KEY).toBeUndefined();
    expect(config.DETECTOR_URL).toBeUndefined();
  });

  it("rejects out-of-range values", () => {
    expect(() => loadConfig({ MAX_ITERATIONS: "11" })).toThrow();
    expect(() => loadConfig({ DETECTOR_URL: "not a url" })).toThrow();
    expect(() => loadConfig({ DETECTOR_MODE: "magic" })).toThrow();
  });
});
