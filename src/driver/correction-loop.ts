import type { DetectionResult } from "../schema/detection.js";
import type {
  CorrectionOutcome,
  Page,
  StopReason,
  Viewport,
} from "../schema/page.js";
import type { IterationAction, TraceEntry } from "../schema/trace.js";
import type { Renderer, RenderedImage } from "../renderer/renderer.js";
import type { Detector } from "../detection/detector.js";
import type { Rewriter } from "../rewriter/rewriter.js";
import type { Logger } from "../utils/logger.js";
import {
  attempt,
  err,
  ok,
  type PipelineError,
  type Result,
} from "../utils/result.js";
import { withTimeout } from "../utils/concurrency.js";
import { describeCorrections } from "../utils/html-blocks.js";
import {
  appendTrace,
  tracePaths,
  writeFile,
  writeJSON,
} from "../utils/fs-helpers.js";
import {
  DEFAULT_VIEWPORT_H,
  DEFAULT_VIEWPORT_W,
  MAX_ITER,
} from "../constants.js";

/** Collaborators one correction run talks to */
export interface CorrectionDeps {
  renderer: Renderer;
  detector: Detector;
  rewriter: Rewriter;
  logger: Logger;
}

export interface CorrectionOptions {
  maxIterations?: number;
  viewport?: Viewport;
  preserveBlocks?: boolean;
  /**
   * Render and detect the last allowed rewrite before giving up.
   * When false the loop stops right after the final rewrite and reports
   * the overlap count of the previous pass.
   */
  verifyFinalRewrite?: boolean;
  /** Bound on each render, detect and rewrite call (ms); 0 disables */
  timeoutMs?: number;
  /** Write per-iteration artifacts under `<traceDir>/<pageId>/` */
  traceDir?: string;
}

/** A correction run that ended in RENDER or DETECT failure */
export interface PageCorrectionError extends PipelineError {
  pageId: string;
  /** Rewrites applied before the failure */
  iterationsApplied: number;
  /** Overlap count of the last completed detection pass, if any */
  lastKnownOverlaps: number | null;
}

type Resolved = Required<Omit<CorrectionOptions, "traceDir">> &
  Pick<CorrectionOptions, "traceDir">;

function resolveOptions(options: CorrectionOptions): Resolved {
  return {
    maxIterations: options.maxIterations ?? MAX_ITER,
    viewport: options.viewport ?? {
      width: DEFAULT_VIEWPORT_W,
      height: DEFAULT_VIEWPORT_H,
    },
    preserveBlocks: options.preserveBlocks ?? true,
    verifyFinalRewrite: options.verifyFinalRewrite ?? true,
    timeoutMs: options.timeoutMs ?? 0,
    traceDir: options.traceDir,
  };
}

/**
 * Drive render → detect → (stop | rewrite) for one page.
 *
 * Stops on the first pass with zero overlaps, when the iteration budget is
 * spent, or when the rewriter fails (keeping the last good markup).
 * Render and detection failures fail the whole page.
 */
export async function correctPage(
  deps: CorrectionDeps,
  page: Page,
  options: CorrectionOptions = {}
): Promise<Result<CorrectionOutcome, PageCorrectionError>> {
  const opts = resolveOptions(options);
  const log = deps.logger.child({ page_id: page.id });
  const history: TraceEntry[] = [];
  const corrections: string[] = [];
  let markup = page.markup;
  let iter = 0;
  let detection: DetectionResult | null = null;

  const fail = (error: PipelineError): { ok: false; error: PageCorrectionError } => {
    log.warn({ kind: error.kind, iter }, error.detail);
    return err({
      ...error,
      pageId: page.id,
      iterationsApplied: iter,
      lastKnownOverlaps: detection?.overlaps ?? null,
    });
  };

  const finish = (
    last: DetectionResult,
    stopReason: StopReason,
    error?: PipelineError
  ): { ok: true; value: CorrectionOutcome } => {
    log.info(
      { iterations: iter, overlaps: last.overlaps, stop_reason: stopReason },
      "correction finished"
    );
    const outcome: CorrectionOutcome = {
      pageId: page.id,
      markup,
      iterationsApplied: iter,
      finalOverlaps: last.overlaps,
      stopReason,
      corrections,
      detection: last,
      history,
      ...(error ? { error } : {}),
    };
    return ok(outcome);
  };

  /** Push a trace entry and, with a trace dir, write the pass's artifacts */
  const record = async (
    action: IterationAction,
    current: string,
    image: RenderedImage,
    pass: DetectionResult,
    extra: Pick<TraceEntry, "corrections" | "error"> = {}
  ): Promise<void> => {
    const entry: TraceEntry = {
      page_id: page.id,
      iter,
      total_objects: pass.total_objects,
      overlaps: pass.overlaps,
      action,
      ...extra,
    };
    history.push(entry);

    if (!opts.traceDir) return;
    try {
      const paths = tracePaths(opts.traceDir, page.id, iter);
      await writeFile(paths.markup, current);
      await writeFile(paths.render, image.png);
      await writeJSON(paths.detect, pass);
      await appendTrace(paths.trace, entry);
    } catch (e) {
      log.warn({ err: e, iter }, "trace write failed");
    }
  };

  for (;;) {
    // RENDER
    const current = markup;
    const rendered = await attempt("render_failure", () =>
      withTimeout("render", opts.timeoutMs, () =>
        deps.renderer.render(current, opts.viewport)
      )
    );
    if (!rendered.ok) return fail(rendered.error);

    // DETECT
    const detected = await attempt("detection_failure", () =>
      withTimeout("detect", opts.timeoutMs, () =>
        deps.detector.detect(rendered.value)
      )
    );
    if (!detected.ok) return fail(detected.error);
    const pass = detected.value;
    detection = pass;
    log.debug(
      { iter, objects: pass.total_objects, overlaps: pass.overlaps },
      "detection pass"
    );

    if (pass.overlaps === 0) {
      await record("converged", current, rendered.value, pass);
      return finish(pass, "converged");
    }

    if (iter >= opts.maxIterations) {
      await record("budget_exhausted", current, rendered.value, pass);
      return finish(pass, "budget_exhausted");
    }

    // REWRITE
    const rewritten = await attempt("rewrite_failure", () =>
      withTimeout("rewrite", opts.timeoutMs, () =>
        deps.rewriter.rewrite(current, pass, {
          pageId: page.id,
          preserveBlocks: opts.preserveBlocks,
        })
      )
    );
    if (!rewritten.ok) {
      log.warn({ iter }, `rewrite failed: ${rewritten.error.detail}`);
      await record("rewrite_failed", current, rendered.value, pass, {
        error: rewritten.error.detail,
      });
      return finish(pass, "rewrite_failed", rewritten.error);
    }

    const changes = describeCorrections(current, rewritten.value);
    corrections.push(...changes);
    await record("rewrite", current, rendered.value, pass, {
      corrections: changes,
    });
    markup = rewritten.value;
    iter++;

    if (!opts.verifyFinalRewrite && iter >= opts.maxIterations) {
      return finish(pass, "budget_exhausted");
    }
  }
}
