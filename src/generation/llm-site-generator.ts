import * as fs from "node:fs/promises";
import { fileURLToPath } from "node:url";
import type { Page } from "../schema/page.js";
import { PAGE_ID_PATTERN } from "../schema/page.js";
import type { ChatClient } from "../rewriter/chat-client.js";
import type { SiteGenerator, SiteRequest } from "./site-generator.js";
import {
  extractHtmlDocument,
  extractHtmlDocuments,
} from "../utils/html-blocks.js";
import { BLOCK_CLASS } from "../constants.js";

const FALLBACK_TEMPLATE = fileURLToPath(
  new URL("../../templates/fallback-page.html", import.meta.url)
);

export const GENERATION_SYSTEM_PROMPT = `You are a web developer who builds modern, good-looking sites from a user's description.

HTML requirements:
1. Modern HTML5 with semantic tags
2. Every content block has class '${BLOCK_CLASS}' and position: absolute
3. Sizes and positions use viewport units (vw, vh)
4. Gradients, shadows, rounded corners, a modern palette
5. Structured content: headings, paragraphs, images
6. Each page is a separate HTML document with styles in a <style> tag

Answer format:
- One page: a single HTML document
- Several pages: a JSON object with keys page_1, page_2, ... whose values are HTML documents`;

/** User prompt for generating `numPages` pages */
export function buildGenerationPrompt(request: SiteRequest): string {
  const style = request.siteStyle ? `\nSite style: ${request.siteStyle}` : "";
  const answer =
    request.numPages > 1
      ? "Return a JSON object with keys page_1, page_2, ... and HTML documents as values."
      : "Return the finished HTML document.";
  return `Build a website from this description:

${request.description}${style}

Requirements:
- Number of pages: ${request.numPages}
- Every content block has class '${BLOCK_CLASS}' and position: absolute
- Use vw/vh units for sizes and positions
- Varied content: headings, text, placeholder images

${answer}`;
}

function escapeHtml(text: string): string {
  return text
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;");
}

/** Pages from a `{"page_1": "<html>..."}` object embedded in `content` */
function parsePageObject(content: string): Page[] {
  const start = content.indexOf("{");
  const end = content.lastIndexOf("}");
  if (start < 0 || end <= start) return [];
  let parsed: unknown;
  try {
    parsed = JSON.parse(content.slice(start, end + 1));
  } catch {
    return [];
  }
  if (typeof parsed !== "object" || parsed === null) return [];

  const pages: Page[] = [];
  for (const [key, value] of Object.entries(parsed)) {
    if (/^page_\d+$/.test(key) && typeof value === "string") {
      pages.push({ id: key, markup: value });
    }
  }
  return pages;
}

/**
 * Split a model reply into pages.
 * Single page: the extracted HTML document. Several pages: a JSON page
 * object, else the `<html>` documents in order. Empty result means the
 * reply held nothing usable.
 */
export function parseGeneratedPages(content: string, numPages: number): Page[] {
  if (numPages === 1) {
    const html = extractHtmlDocument(content);
    return html ? [{ id: "page_1", markup: html }] : [];
  }

  const fromObject = parsePageObject(content).slice(0, numPages);
  if (fromObject.length > 0) return fromObject;

  return extractHtmlDocuments(content)
    .slice(0, numPages)
    .map((markup, i) => ({ id: `page_${i + 1}`, markup }));
}

/** Generates site pages with a chat model */
export class LlmSiteGenerator implements SiteGenerator {
  constructor(private readonly chat: ChatClient) {}

  async generate(request: SiteRequest): Promise<Page[]> {
    const reply = await this.chat.complete({
      messages: [
        { role: "system", content: GENERATION_SYSTEM_PROMPT },
        { role: "user", content: buildGenerationPrompt(request) },
      ],
      temperature: 0.7,
      maxTokens: 8000,
    });

    const pages = parseGeneratedPages(reply, request.numPages).filter((p) =>
      PAGE_ID_PATTERN.test(p.id)
    );
    if (pages.length > 0) return pages;
    return [{ id: "page_1", markup: await fallbackPage(reply) }];
  }
}

/** Single-block page used when the reply held no recognizable HTML */
export async function fallbackPage(summary: string): Promise<string> {
  const template = await fs.readFile(FALLBACK_TEMPLATE, "utf-8");
  return template.replace("{{summary}}", () => escapeHtml(summary.slice(0, 200)));
}
