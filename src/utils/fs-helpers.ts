import * as fs from "node:fs/promises";
import * as path from "node:path";
import { PAGE_ID_PATTERN } from "../schema/page.js";

/** Read a JSON file and parse it */
export async function readJSON(filePath: string): Promise<unknown> {
  const content = await fs.readFile(filePath, "utf-8");
  const parsed: unknown = JSON.parse(content);
  return parsed;
}

/** Write an object as JSON to a file */
export async function writeJSON(
  filePath: string,
  data: unknown
): Promise<void> {
  const dir = path.dirname(filePath);
  await fs.mkdir(dir, { recursive: true });
  await fs.writeFile(filePath, JSON.stringify(data, null, 2), "utf-8");
}

/** Append a JSON line to a JSONL file */
export async function appendTrace(
  filePath: string,
  entry: unknown
): Promise<void> {
  const dir = path.dirname(filePath);
  await fs.mkdir(dir, { recursive: true });
  await fs.appendFile(filePath, JSON.stringify(entry) + "\n", "utf-8");
}

/** Compute file paths for a page's trace directory and iteration */
export function tracePaths(traceDir: string, pageId: string, iter: number) {
  if (!PAGE_ID_PATTERN.test(pageId)) {
    throw new Error(`Page id is not a safe file name: ${pageId}`);
  }
  const dir = path.join(traceDir, pageId);
  return {
    markup: path.join(dir, `markup_${iter}.html`),
    render: path.join(dir, `render_${iter}.png`),
    detect: path.join(dir, `detect_${iter}.json`),
    trace: path.join(dir, "trace.jsonl"),
  };
}

/** Write a string to a file, creating directories as needed */
export async function writeFile(
  filePath: string,
  content: string | Buffer
): Promise<void> {
  const dir = path.dirname(filePath);
  await fs.mkdir(dir, { recursive: true });
  await fs.writeFile(filePath, content);
}

/** True if the path exists */
export async function pathExists(p: string): Promise<boolean> {
  try {
    await fs.access(p);
    return true;
  } catch {
    return false;
  }
}
