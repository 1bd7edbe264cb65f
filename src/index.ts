// Constants
export {
  DEFAULT_VIEWPORT_W,
  DEFAULT_VIEWPORT_H,
  DEFAULT_IOU_THRESHOLD,
  DEFAULT_CONFIDENCE_THRESHOLD,
  MAX_ITER,
  MIN_PAGES,
  MAX_PAGES,
  MIN_CORRECTION_ITER,
  MAX_CORRECTION_ITER,
  SITE_HASH_LENGTH,
  RENDER_SETTLE_MS,
  COLLABORATOR_TIMEOUT_MS,
  PAGE_CONCURRENCY,
  BLOCK_CLASS,
  SERVICE_VERSION,
} from "./constants.js";

// Schema types
export type {
  BBox,
  DetectedObject,
  OverlapPair,
  DetectionResult,
  RawDetection,
  InferenceResponse,
} from "./schema/detection.js";
export {
  parseDetectionResult,
  parseInferenceResponse,
  DetectionResultSchema,
  DetectedObjectSchema,
  OverlapPairSchema,
} from "./schema/detection.js";

export type {
  Page,
  Viewport,
  StopReason,
  CorrectionOutcome,
} from "./schema/page.js";
export { parsePage, PageSchema, PAGE_ID_PATTERN } from "./schema/page.js";

export type { TraceEntry, IterationAction } from "./schema/trace.js";

export type {
  GenerateRequest,
  GenerateRequestInput,
  CorrectRequest,
} from "./schema/api.js";
export {
  GenerateRequestSchema,
  CorrectRequestSchema,
  formatZodError,
} from "./schema/api.js";

// Results and errors
export type { Result, PipelineError, ErrorKind } from "./utils/result.js";
export { ok, err, pipelineError, attempt, errorMessage } from "./utils/result.js";

// Geometry
export {
  iou,
  findOverlaps,
  intersectBoxes,
  boxArea,
  boxCenter,
  boxSize,
  buildDetectionResult,
} from "./utils/geometry.js";

// Collaborators
export type {
  Renderer,
  RendererSession,
  RendererFactory,
  RenderedImage,
  MeasuredBlock,
} from "./renderer/renderer.js";
export { withRendererSession } from "./renderer/renderer.js";
export { PlaywrightRendererFactory } from "./renderer/playwright-renderer.js";
export type { PlaywrightRendererOptions } from "./renderer/playwright-renderer.js";

export type { Detector } from "./detection/detector.js";
export { readPngSize } from "./detection/detector.js";
export { HttpDetector } from "./detection/http-detector.js";
export type { HttpDetectorOptions } from "./detection/http-detector.js";
export { DomBlockDetector } from "./detection/dom-detector.js";

export type { Rewriter, RewriteContext } from "./rewriter/rewriter.js";
export type { ChatClient, ChatMessage, ChatRequest } from "./rewriter/chat-client.js";
export { OpenRouterClient } from "./rewriter/chat-client.js";
export { LlmRewriter } from "./rewriter/llm-rewriter.js";
export { buildRewritePrompt, REWRITE_SYSTEM_PROMPT } from "./rewriter/prompt.js";

export type { SiteGenerator, SiteRequest } from "./generation/site-generator.js";
export {
  LlmSiteGenerator,
  parseGeneratedPages,
  buildGenerationPrompt,
} from "./generation/llm-site-generator.js";

// Driver
export { correctPage } from "./driver/correction-loop.js";
export type {
  CorrectionDeps,
  CorrectionOptions,
  PageCorrectionError,
} from "./driver/correction-loop.js";
export { runGeneration, correctSinglePage } from "./driver/generation-pipeline.js";
export type { GenerationReport, PageReport } from "./driver/generation-pipeline.js";

// Deployment
export {
  SiteDeployer,
  computeSiteHash,
  DeployValidationError,
} from "./deploy/site-deployer.js";
export type { DeployOptions, SiteMetadata, SiteSummary } from "./deploy/site-deployer.js";

// Wiring
export { loadConfig, ConfigSchema } from "./config.js";
export type { Config } from "./config.js";
export { createServiceContext } from "./context.js";
export type { ServiceContext } from "./context.js";
export { buildServer } from "./server/app.js";

// Utilities
export { describeCorrections, extractBlocks, extractHtmlDocument } from "./utils/html-blocks.js";
export { launchBrowser } from "./utils/browser.js";
export { createLogger, silentLogger } from "./utils/logger.js";
export type { Logger } from "./utils/logger.js";
export { withTimeout, mapWithConcurrency, TimeoutError } from "./utils/concurrency.js";
