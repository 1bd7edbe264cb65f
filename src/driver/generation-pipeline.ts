import type { ServiceContext } from "../context.js";
import type { CorrectionOutcome, Page, StopReason } from "../schema/page.js";
import {
  CorrectRequestSchema,
  GenerateRequestSchema,
  formatZodError,
  type CorrectRequest,
  type GenerateRequestInput,
} from "../schema/api.js";
import { correctPage, type PageCorrectionError } from "./correction-loop.js";
import { withRendererSession } from "../renderer/renderer.js";
import {
  attempt,
  err,
  errorMessage,
  ok,
  pipelineError,
  type Result,
} from "../utils/result.js";
import { mapWithConcurrency } from "../utils/concurrency.js";

/** Per-page line of a generation report */
export interface PageReport {
  page_id: string;
  corrections_applied: number;
  /** Overlaps in the last detection pass; null when none completed */
  final_overlaps: number | null;
  stop_reason: StopReason | "failed";
  error?: string;
}

export interface GenerationReport {
  site_hash: string;
  total_pages: number;
  pages: PageReport[];
}

type PageResult = Result<CorrectionOutcome, PageCorrectionError>;

function pageReport(result: PageResult): PageReport {
  if (!result.ok) {
    return {
      page_id: result.error.pageId,
      corrections_applied: 0,
      final_overlaps: result.error.lastKnownOverlaps,
      stop_reason: "failed",
      error: `${result.error.kind}: ${result.error.detail}`,
    };
  }
  const outcome = result.value;
  const report: PageReport = {
    page_id: outcome.pageId,
    corrections_applied: outcome.iterationsApplied,
    final_overlaps: outcome.finalOverlaps,
    stop_reason: outcome.stopReason,
  };
  if (outcome.error) report.error = `${outcome.error.kind}: ${outcome.error.detail}`;
  return report;
}

/** Markup that gets deployed: the corrected page, or the original on failure */
function deployablePage(original: Page, result: PageResult): Page {
  return result.ok ? { id: original.id, markup: result.value.markup } : original;
}

/**
 * Generate a site, correct every page, and deploy the result.
 *
 * Page failures are reported per page and never abort siblings. Failing to
 * open the renderer fails the whole run before any page is touched.
 */
export async function runGeneration(
  ctx: ServiceContext,
  input: GenerateRequestInput
): Promise<Result<GenerationReport>> {
  const parsed = GenerateRequestSchema.safeParse(input);
  if (!parsed.success) {
    return err(pipelineError("validation_failure", formatZodError(parsed.error)));
  }
  const request = parsed.data;

  const { generator, rendererFactory, detector, rewriter, logger } = ctx;
  if (!generator || !rendererFactory || !detector || !rewriter) {
    return err(pipelineError("service_unavailable", "Services not initialized"));
  }

  const generated = await attempt("generation_failure", () =>
    generator.generate({
      description: request.description,
      siteStyle: request.site_style,
      numPages: request.num_pages,
    })
  );
  if (!generated.ok) return generated;
  const pages = generated.value;
  if (pages.length === 0) {
    return err(pipelineError("generation_failure", "No pages generated"));
  }
  logger.info({ pages: pages.length }, "site generated");

  const correction = {
    ...ctx.correction,
    maxIterations: request.max_correction_iterations,
    viewport: { width: request.viewport_width, height: request.viewport_height },
  };

  let corrected: Array<{ page: Page; result: PageResult }>;
  try {
    corrected = await withRendererSession(rendererFactory, logger, (renderer) =>
      mapWithConcurrency(pages, ctx.pageConcurrency, async (page) => ({
        page,
        result: await correctPage({ renderer, detector, rewriter, logger }, page, correction),
      }))
    );
  } catch (e) {
    logger.error({ err: e }, "renderer unavailable");
    return err(pipelineError("render_failure", `Renderer unavailable: ${errorMessage(e)}`, e));
  }

  const deployed = await attempt("deploy_failure", () =>
    ctx.deployer.deploy(
      corrected.map(({ page, result }) => deployablePage(page, result)),
      {
        metadata: {
          description: request.description,
          site_style: request.site_style ?? null,
          num_pages: pages.length,
        },
      }
    )
  );
  if (!deployed.ok) return deployed;

  return ok({
    site_hash: deployed.value,
    total_pages: pages.length,
    pages: corrected.map(({ result }) => pageReport(result)),
  });
}

/** Correct one page with a renderer session of its own */
export async function correctSinglePage(
  ctx: ServiceContext,
  input: CorrectRequest
): Promise<Result<CorrectionOutcome>> {
  const parsed = CorrectRequestSchema.safeParse(input);
  if (!parsed.success) {
    return err(pipelineError("validation_failure", formatZodError(parsed.error)));
  }
  const request = parsed.data;

  const { rendererFactory, detector, rewriter, logger } = ctx;
  if (!rendererFactory || !detector || !rewriter) {
    return err(pipelineError("service_unavailable", "Services not initialized"));
  }

  const options = {
    ...ctx.correction,
    ...(request.options?.max_iterations !== undefined
      ? { maxIterations: request.options.max_iterations }
      : {}),
    preserveBlocks: request.options?.preserve_blocks ?? true,
  };
  const page: Page = { id: request.page_id, markup: request.markup };

  try {
    const result = await withRendererSession(rendererFactory, logger, (renderer) =>
      correctPage({ renderer, detector, rewriter, logger }, page, options)
    );
    if (result.ok) return result;
    const { kind, detail, cause } = result.error;
    return err(pipelineError(kind, detail, cause));
  } catch (e) {
    return err(pipelineError("render_failure", `Renderer unavailable: ${errorMessage(e)}`, e));
  }
}
