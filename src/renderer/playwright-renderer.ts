import type { Browser } from "playwright-core";
import type { Viewport } from "../schema/page.js";
import type {
  MeasuredBlock,
  RenderedImage,
  RendererFactory,
  RendererSession,
} from "./renderer.js";
import { launchBrowser } from "../utils/browser.js";
import { BLOCK_CLASS, RENDER_SETTLE_MS } from "../constants.js";

/**
 * JavaScript string evaluated in the browser context via page.evaluate().
 * Reports the scrollable document size so the viewport can grow to it.
 */
const CONTENT_SIZE_SCRIPT = `(() => ({
  width: Math.max(document.documentElement.scrollWidth, document.body ? document.body.scrollWidth : 0),
  height: Math.max(document.documentElement.scrollHeight, document.body ? document.body.scrollHeight : 0),
}))()`;

/**
 * Page-space boxes of every block element, in document order.
 * Coordinates include scroll offset so they match a full-page capture.
 */
const BLOCK_MEASURE_SCRIPT = `(() => {
  const nodes = document.querySelectorAll('.${BLOCK_CLASS}');
  const out = [];
  let index = 0;
  for (const el of nodes) {
    const r = el.getBoundingClientRect();
    out.push({
      index: index++,
      bbox: [
        r.left + window.scrollX,
        r.top + window.scrollY,
        r.right + window.scrollX,
        r.bottom + window.scrollY,
      ],
    });
  }
  return out;
})()`;

interface ContentSize {
  width: number;
  height: number;
}

export interface PlaywrightRendererOptions {
  executablePath?: string;
  /** Wait after network idle before measuring (ms) */
  settleMs?: number;
}

class PlaywrightRendererSession implements RendererSession {
  constructor(
    private readonly browser: Browser,
    private readonly settleMs: number
  ) {}

  async render(markup: string, viewport: Viewport): Promise<RenderedImage> {
    const page = await this.browser.newPage();
    try {
      await page.setViewportSize(viewport);
      await page.setContent(markup, { waitUntil: "networkidle" });
      if (this.settleMs > 0) await page.waitForTimeout(this.settleMs);

      const content = (await page.evaluate(CONTENT_SIZE_SCRIPT)) as ContentSize;
      const width = Math.max(viewport.width, Math.ceil(content.width));
      const height = Math.max(viewport.height, Math.ceil(content.height));
      await page.setViewportSize({ width, height });

      const blocks = (await page.evaluate(BLOCK_MEASURE_SCRIPT)) as MeasuredBlock[];
      const png = await page.screenshot({ type: "png", fullPage: true });
      return { png, width, height, blocks };
    } finally {
      await page.close();
    }
  }

  async close(): Promise<void> {
    await this.browser.close();
  }
}

/** Opens one headless Chromium per session; each render uses a fresh tab */
export class PlaywrightRendererFactory implements RendererFactory {
  private readonly settleMs: number;

  constructor(private readonly options: PlaywrightRendererOptions = {}) {
    this.settleMs = options.settleMs ?? RENDER_SETTLE_MS;
  }

  async open(): Promise<RendererSession> {
    const browser = await launchBrowser(this.options.executablePath);
    return new PlaywrightRendererSession(browser, this.settleMs);
  }
}
