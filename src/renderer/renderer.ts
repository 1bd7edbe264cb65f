import type { Viewport } from "../schema/page.js";
import type { BBox } from "../schema/detection.js";
import type { Logger } from "../utils/logger.js";

/** Box of one `.block` element measured in the rendered page */
export interface MeasuredBlock {
  index: number;
  bbox: BBox;
}

/** A rasterized page */
export interface RenderedImage {
  png: Buffer;
  width: number;
  height: number;
  /** Present when the renderer could measure block elements in the DOM */
  blocks?: MeasuredBlock[];
}

export interface Renderer {
  render(markup: string, viewport: Viewport): Promise<RenderedImage>;
}

/** A renderer holding an expensive resource until closed */
export interface RendererSession extends Renderer {
  close(): Promise<void>;
}

export interface RendererFactory {
  open(): Promise<RendererSession>;
}

/**
 * Open a session, run `fn`, and close the session on every exit path.
 * A failing close is logged and never replaces `fn`'s result or error.
 */
export async function withRendererSession<T>(
  factory: RendererFactory,
  logger: Logger,
  fn: (session: RendererSession) => Promise<T>
): Promise<T> {
  const session = await factory.open();
  try {
    return await fn(session);
  } finally {
    try {
      await session.close();
    } catch (e) {
      logger.warn({ err: e }, "renderer session close failed");
    }
  }
}
