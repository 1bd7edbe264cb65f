import { z } from "zod";
import type { FastifyInstance, FastifyReply } from "fastify";
import type { ServiceContext } from "../context.js";
import {
  CorrectRequestSchema,
  GenerateRequestSchema,
  formatZodError,
} from "../schema/api.js";
import { correctSinglePage, runGeneration } from "../driver/generation-pipeline.js";
import { readPngSize } from "../detection/detector.js";
import { errorMessage, type ErrorKind } from "../utils/result.js";
import { SERVICE_VERSION } from "../constants.js";

const siteParams = z.object({ hash: z.string() });
const pageParams = z.object({ hash: z.string(), pageId: z.string() });

/** HTTP status for a pipeline error; collaborator failures stay 200 with status "error" */
export function httpStatus(kind: ErrorKind): number {
  switch (kind) {
    case "validation_failure":
      return 400;
    case "not_found":
      return 404;
    case "service_unavailable":
      return 503;
    default:
      return 200;
  }
}

function badRequest(reply: FastifyReply, error: string) {
  return reply.code(400).send({ status: "error", error });
}

export const registerRoutes = (app: FastifyInstance, ctx: ServiceContext) => {
  app.addContentTypeParser(
    ["image/png", "application/octet-stream"],
    { parseAs: "buffer" },
    (_request, body, done) => done(null, body)
  );

  app.get("/health", async () => {
    const detectorReady = ctx.detector !== undefined;
    const rewriterReady = ctx.rewriter !== undefined;
    return {
      status: detectorReady && rewriterReady ? "healthy" : "degraded",
      detector_ready: detectorReady,
      rewriter_ready: rewriterReady,
      version: SERVICE_VERSION,
    };
  });

  app.post("/correct", async (request, reply) => {
    const parsed = CorrectRequestSchema.safeParse(request.body);
    if (!parsed.success) return badRequest(reply, formatZodError(parsed.error));
    const body = parsed.data;

    const result = await correctSinglePage(ctx, body);
    if (!result.ok) {
      return reply.code(httpStatus(result.error.kind)).send({
        status: "error",
        corrected_markup: body.markup,
        detections: { total_objects: 0, overlaps: 0, objects: [] },
        corrections_applied: [],
        iterations_applied: 0,
        error: `${result.error.kind}: ${result.error.detail}`,
      });
    }

    const outcome = result.value;
    return reply.send({
      status: outcome.error ? "error" : "success",
      corrected_markup: outcome.markup,
      detections: {
        total_objects: outcome.detection.total_objects,
        overlaps: outcome.detection.overlaps,
        objects: outcome.detection.objects,
      },
      corrections_applied: outcome.corrections,
      iterations_applied: outcome.iterationsApplied,
      stop_reason: outcome.stopReason,
      ...(outcome.error
        ? { error: `${outcome.error.kind}: ${outcome.error.detail}` }
        : {}),
    });
  });

  app.post("/detect", async (request, reply) => {
    const detector = ctx.detector;
    if (!detector) {
      return reply.code(503).send({ status: "error", error: "Detector not initialized" });
    }
    if (!Buffer.isBuffer(request.body)) {
      return badRequest(reply, "Expected an image/png request body");
    }
    const png = request.body;
    const size = readPngSize(png);
    if (!size) return badRequest(reply, "Body is not a PNG image");

    try {
      const detection = await detector.detect({ png, ...size });
      return reply.send(detection);
    } catch (e) {
      request.log.error({ err: e }, "detection failed");
      return reply
        .code(500)
        .send({ status: "error", error: `detection_failure: ${errorMessage(e)}` });
    }
  });

  app.post("/generate", async (request, reply) => {
    const parsed = GenerateRequestSchema.safeParse(request.body);
    if (!parsed.success) return badRequest(reply, formatZodError(parsed.error));

    const result = await runGeneration(ctx, parsed.data);
    if (!result.ok) {
      return reply.code(httpStatus(result.error.kind)).send({
        status: "error",
        site_hash: "",
        site_url: "",
        total_pages: 0,
        pages: [],
        error: `${result.error.kind}: ${result.error.detail}`,
      });
    }

    const report = result.value;
    return reply.send({
      status: "success",
      site_hash: report.site_hash,
      site_url: `${request.protocol}://${request.hostname}/site/${report.site_hash}`,
      total_pages: report.total_pages,
      pages: report.pages,
    });
  });

  app.get("/sites", async () => {
    const sites = await ctx.deployer.list();
    return {
      sites: sites.map((s) => ({ site_hash: s.siteHash, metadata: s.metadata })),
    };
  });

  app.get("/site/:hash", async (request, reply) => {
    const params = siteParams.parse(request.params);
    const html = await ctx.deployer.fetch(params.hash);
    if (html === null) {
      return reply.code(404).send({ status: "error", error: `Site ${params.hash} not found` });
    }
    return reply.type("text/html; charset=utf-8").send(html);
  });

  app.get("/site/:hash/:pageId", async (request, reply) => {
    const params = pageParams.parse(request.params);
    const html = await ctx.deployer.fetch(params.hash, params.pageId);
    if (html === null) {
      return reply.code(404).send({
        status: "error",
        error: `Page ${params.pageId} not found in site ${params.hash}`,
      });
    }
    return reply.type("text/html; charset=utf-8").send(html);
  });

  app.delete("/site/:hash", async (request, reply) => {
    const params = siteParams.parse(request.params);
    const deleted = await ctx.deployer.delete(params.hash);
    if (!deleted) {
      return reply.code(404).send({ status: "error", error: `Site ${params.hash} not found` });
    }
    return reply.send({ status: "success", deleted: true });
  });
};
