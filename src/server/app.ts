import Fastify from "fastify";
import type { ServiceContext } from "../context.js";
import { registerRoutes } from "./routes.js";
import { BODY_LIMIT_BYTES } from "../constants.js";

export interface ServerOptions {
  /** Fastify request log level; "silent" or omitted disables request logs */
  logLevel?: string;
}

export const buildServer = (ctx: ServiceContext, options: ServerOptions = {}) => {
  const level = options.logLevel;
  const app = Fastify({
    logger: level && level !== "silent" ? { level } : false,
    bodyLimit: BODY_LIMIT_BYTES,
  });

  registerRoutes(app, ctx);
  return app;
};
