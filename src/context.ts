import type { Config } from "./config.js";
import type { Detector } from "./detection/detector.js";
import type { Rewriter } from "./rewriter/rewriter.js";
import type { RendererFactory } from "./renderer/renderer.js";
import type { SiteGenerator } from "./generation/site-generator.js";
import type { CorrectionOptions } from "./driver/correction-loop.js";
import type { Logger } from "./utils/logger.js";
import { SiteDeployer } from "./deploy/site-deployer.js";
import { HttpDetector } from "./detection/http-detector.js";
import { DomBlockDetector } from "./detection/dom-detector.js";
import { OpenRouterClient } from "./rewriter/chat-client.js";
import { LlmRewriter } from "./rewriter/llm-rewriter.js";
import { LlmSiteGenerator } from "./generation/llm-site-generator.js";
import { PlaywrightRendererFactory } from "./renderer/playwright-renderer.js";

/**
 * Everything the pipeline and the HTTP routes use, built once at startup
 * and passed down. A collaborator left undefined is "not ready".
 */
export interface ServiceContext {
  logger: Logger;
  deployer: SiteDeployer;
  rendererFactory?: RendererFactory;
  detector?: Detector;
  rewriter?: Rewriter;
  generator?: SiteGenerator;
  /** Loop settings applied when a request does not override them */
  correction: CorrectionOptions;
  pageConcurrency: number;
}

/** Build the production context from configuration */
export function createServiceContext(config: Config, logger: Logger): ServiceContext {
  const timeoutMs = config.COLLABORATOR_TIMEOUT_MS;

  let detector: Detector | undefined;
  if (config.DETECTOR_MODE === "dom") {
    detector = new DomBlockDetector(config.IOU_THRESHOLD);
  } else if (config.DETECTOR_URL) {
    detector = new HttpDetector({
      url: config.DETECTOR_URL,
      confidenceThreshold: config.CONFIDENCE_THRESHOLD,
      iouThreshold: config.IOU_THRESHOLD,
      timeoutMs,
    });
  } else {
    logger.warn("DETECTOR_URL is not set; detection is unavailable");
  }

  let rewriter: Rewriter | undefined;
  let generator: SiteGenerator | undefined;
  if (config.OPENROUTER_API_KEY) {
    const chat = new OpenRouterClient({
      apiKey: config.OPENROUTER_API_KEY,
      model: config.OPENROUTER_MODEL,
      baseUrl: config.OPENROUTER_BASE_URL,
      timeoutMs,
    });
    rewriter = new LlmRewriter(chat);
    generator = new LlmSiteGenerator(chat);
  } else {
    logger.warn("OPENROUTER_API_KEY is not set; rewriting and generation are unavailable");
  }

  return {
    logger,
    deployer: new SiteDeployer(config.SITES_DIR, logger),
    rendererFactory: new PlaywrightRendererFactory({
      executablePath: config.CHROMIUM_PATH,
      settleMs: config.RENDER_SETTLE_MS,
    }),
    detector,
    rewriter,
    generator,
    correction: {
      maxIterations: config.MAX_ITERATIONS,
      viewport: { width: config.VIEWPORT_WIDTH, height: config.VIEWPORT_HEIGHT },
      verifyFinalRewrite: config.VERIFY_FINAL_REWRITE,
      timeoutMs,
      traceDir: config.TRACE_DIR,
    },
    pageConcurrency: config.PAGE_CONCURRENCY,
  };
}
