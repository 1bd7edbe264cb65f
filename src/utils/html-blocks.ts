import * as cheerio from "cheerio";
import { BLOCK_CLASS, BLOCK_POSITION_PROPS } from "../constants.js";

type PositionProp = (typeof BLOCK_POSITION_PROPS)[number];

/** A `.block` element's placement as written in its inline style */
export interface BlockInfo {
  index: number;
  position: Partial<Record<PositionProp, string>>;
  zIndex?: string;
}

/** Parse an inline CSS declaration list into a property map */
export function parseStyle(style: string | undefined): Map<string, string> {
  const out = new Map<string, string>();
  if (!style) return out;
  for (const decl of style.split(";")) {
    const colon = decl.indexOf(":");
    if (colon < 0) continue;
    const key = decl.slice(0, colon).trim().toLowerCase();
    const value = decl.slice(colon + 1).trim();
    if (key) out.set(key, value);
  }
  return out;
}

/** Every `.block` element in document order */
export function extractBlocks(markup: string): BlockInfo[] {
  const $ = cheerio.load(markup);
  return $(`.${BLOCK_CLASS}`)
    .toArray()
    .map((el, index) => {
      const style = parseStyle($(el).attr("style"));
      const position: BlockInfo["position"] = {};
      for (const prop of BLOCK_POSITION_PROPS) {
        const value = style.get(prop);
        if (value !== undefined) position[prop] = value;
      }
      const info: BlockInfo = { index, position };
      const zIndex = style.get("z-index");
      if (zIndex !== undefined) info.zIndex = zIndex;
      return info;
    });
}

/**
 * Human-readable list of block placement changes between two versions
 * of a page, e.g. `block 2: top 10vh -> 24vh`.
 */
export function describeCorrections(before: string, after: string): string[] {
  if (before === after) return [];
  const a = extractBlocks(before);
  const b = extractBlocks(after);
  const changes: string[] = [];

  const shared = Math.min(a.length, b.length);
  for (let i = 0; i < shared; i++) {
    const pa = a[i]?.position ?? {};
    const pb = b[i]?.position ?? {};
    for (const prop of BLOCK_POSITION_PROPS) {
      if (pa[prop] !== pb[prop]) {
        changes.push(`block ${i}: ${prop} ${pa[prop] ?? "unset"} -> ${pb[prop] ?? "unset"}`);
      }
    }
  }
  for (let i = shared; i < b.length; i++) changes.push(`added block ${i}`);
  for (let i = shared; i < a.length; i++) changes.push(`removed block ${i}`);

  if (changes.length === 0) changes.push("rewrote markup without moving blocks");
  return changes;
}

const FENCE_RE = /```(?:html)?\s*\n([\s\S]*?)```/i;
const HTML_DOC_RE = /(?:<!DOCTYPE html>\s*)?<html[^>]*>[\s\S]*?<\/html>/i;
const BODY_RE = /<body[^>]*>[\s\S]*?<\/body>/i;

/**
 * Pull an HTML document out of free-form model output.
 * Prefers a full `<html>` element, then wraps a bare `<body>`,
 * then falls back to the trimmed text.
 */
export function extractHtmlDocument(text: string): string {
  const fenced = FENCE_RE.exec(text)?.[1] ?? text;
  const doc = HTML_DOC_RE.exec(fenced);
  if (doc) return doc[0];
  const body = BODY_RE.exec(fenced);
  if (body) {
    return `<!DOCTYPE html><html><head><meta charset="UTF-8"><title>Generated Site</title></head>${body[0]}</html>`;
  }
  return fenced.trim();
}

/** Every complete `<html>` document in `text`, in order */
export function extractHtmlDocuments(text: string): string[] {
  const re = new RegExp(HTML_DOC_RE.source, "gi");
  return [...text.matchAll(re)].map((m) => m[0]);
}
