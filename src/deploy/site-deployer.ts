import { createHash, randomUUID } from "node:crypto";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import { z } from "zod";
import type { Page } from "../schema/page.js";
import { PAGE_ID_PATTERN } from "../schema/page.js";
import type { Logger } from "../utils/logger.js";
import { pathExists, readJSON, writeFile, writeJSON } from "../utils/fs-helpers.js";
import { SITE_HASH_LENGTH } from "../constants.js";

const SITE_HASH_RE = new RegExp(`^[0-9a-f]{${SITE_HASH_LENGTH}}$`);
const INDEX_FILE = "index.html";
const METADATA_FILE = "metadata.json";
const PAGES_FILE = "pages.json";
const PAGES_DIR = "pages";
/** Page id that addresses the entry document */
const ENTRY_ALIAS = "index";

/** Entries of a site's pages.json, in page-id order */
export type PageIndex = Array<{ page_id: string; file: string }>;

export type SiteMetadata = Record<string, unknown>;

export interface DeployOptions {
  metadata?: SiteMetadata;
  /** Entry document; defaults to the lowest page id */
  homePageId?: string;
}

export interface SiteSummary {
  siteHash: string;
  metadata: SiteMetadata;
}

/** Raised for page sets that cannot be stored */
export class DeployValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "DeployValidationError";
  }
}

function byId(a: Pick<Page, "id">, b: Pick<Page, "id">): number {
  return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
}

/**
 * Content hash of a page set: markup concatenated in page-id order,
 * SHA-256, truncated. Independent of input order.
 */
export function computeSiteHash(pages: readonly Page[]): string {
  const hash = createHash("sha256");
  for (const page of [...pages].sort(byId)) {
    hash.update(page.markup, "utf-8");
  }
  return hash.digest("hex").slice(0, SITE_HASH_LENGTH);
}

function validatePages(pages: readonly Page[]): void {
  if (pages.length === 0) {
    throw new DeployValidationError("A site needs at least one page");
  }
  const seen = new Set<string>();
  for (const page of pages) {
    if (!PAGE_ID_PATTERN.test(page.id)) {
      throw new DeployValidationError(`Page id is not a safe file name: ${page.id}`);
    }
    if (seen.has(page.id)) {
      throw new DeployValidationError(`Duplicate page id: ${page.id}`);
    }
    seen.add(page.id);
  }
}

async function readIfExists(file: string): Promise<string | null> {
  try {
    return await fs.readFile(file, "utf-8");
  } catch (e) {
    if (e instanceof Error && "code" in e && e.code === "ENOENT") return null;
    throw e;
  }
}

function isRenameConflict(e: unknown): boolean {
  if (!(e instanceof Error) || !("code" in e)) return false;
  return e.code === "EEXIST" || e.code === "ENOTEMPTY" || e.code === "EPERM";
}

/**
 * Content-addressed site storage under one root directory.
 *
 * Layout per site: `<root>/<hash>/{index.html, metadata.json, pages.json,
 * pages/<pageId>.html}`. A site is assembled in a temp directory and
 * published with a single rename, so readers never see a partial site and
 * racing deploys of the same hash leave identical bytes.
 */
export class SiteDeployer {
  constructor(
    readonly root: string,
    private readonly logger: Logger
  ) {}

  computeHash(pages: readonly Page[]): string {
    return computeSiteHash(pages);
  }

  async deploy(pages: readonly Page[], options: DeployOptions = {}): Promise<string> {
    validatePages(pages);
    const siteHash = computeSiteHash(pages);
    const sitePath = path.join(this.root, siteHash);

    if (await pathExists(path.join(sitePath, PAGES_FILE))) {
      this.logger.debug({ site_hash: siteHash }, "site already deployed");
      return siteHash;
    }

    const sorted = [...pages].sort(byId);
    const home =
      sorted.find((p) => p.id === options.homePageId) ?? sorted[0];
    if (!home) throw new DeployValidationError("A site needs at least one page");

    await fs.mkdir(this.root, { recursive: true });
    const staging = path.join(this.root, `.staging-${siteHash}-${randomUUID()}`);
    try {
      const index: PageIndex = [];
      for (const page of sorted) {
        const file = `${PAGES_DIR}/${page.id}.html`;
        await writeFile(path.join(staging, file), page.markup);
        index.push({ page_id: page.id, file });
      }
      await writeFile(path.join(staging, INDEX_FILE), home.markup);
      await writeJSON(path.join(staging, METADATA_FILE), {
        ...options.metadata,
        home_page_id: home.id,
        page_ids: sorted.map((p) => p.id),
      });
      await writeJSON(path.join(staging, PAGES_FILE), index);

      try {
        await fs.rename(staging, sitePath);
      } catch (e) {
        if (!isRenameConflict(e)) throw e;
        this.logger.debug({ site_hash: siteHash }, "concurrent deploy published first");
      }
    } finally {
      await fs.rm(staging, { recursive: true, force: true });
    }

    this.logger.info({ site_hash: siteHash, pages: sorted.length }, "site deployed");
    return siteHash;
  }

  /**
   * Markup of `pageId`, or of the entry document when omitted or "index"
   * (unless a page is named "index"); null on a miss.
   */
  async fetch(siteHash: string, pageId?: string): Promise<string | null> {
    if (!SITE_HASH_RE.test(siteHash)) return null;
    const entry = path.join(this.root, siteHash, INDEX_FILE);
    if (pageId === undefined) return readIfExists(entry);
    if (!PAGE_ID_PATTERN.test(pageId)) return null;

    const markup = await readIfExists(
      path.join(this.root, siteHash, PAGES_DIR, `${pageId}.html`)
    );
    if (markup === null && pageId === ENTRY_ALIAS) return readIfExists(entry);
    return markup;
  }

  async list(): Promise<SiteSummary[]> {
    let entries: string[];
    try {
      entries = await fs.readdir(this.root);
    } catch (e) {
      if (e instanceof Error && "code" in e && e.code === "ENOENT") return [];
      throw e;
    }

    const sites: SiteSummary[] = [];
    for (const name of entries.sort()) {
      if (!SITE_HASH_RE.test(name)) continue;
      const metadata = await this.readMetadata(name);
      if (metadata) sites.push({ siteHash: name, metadata });
    }
    return sites;
  }

  async delete(siteHash: string): Promise<boolean> {
    if (!SITE_HASH_RE.test(siteHash)) return false;
    const sitePath = path.join(this.root, siteHash);
    if (!(await pathExists(sitePath))) return false;
    await fs.rm(sitePath, { recursive: true, force: true });
    this.logger.info({ site_hash: siteHash }, "site deleted");
    return true;
  }

  private async readMetadata(siteHash: string): Promise<SiteMetadata | null> {
    const file = path.join(this.root, siteHash, METADATA_FILE);
    if (!(await pathExists(file))) return null;
    try {
      const data = await readJSON(file);
      return z.record(z.unknown()).parse(data);
    } catch (e) {
      this.logger.warn({ err: e, site_hash: siteHash }, "unreadable site metadata");
      return {};
    }
  }
}
