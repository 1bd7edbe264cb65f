import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import * as os from "node:os";
import {
  SiteDeployer,
  DeployValidationError,
  computeSiteHash,
} from "../../src/deploy/site-deployer.js";
import { silentLogger } from "../../src/utils/logger.js";

const home = { id: "page_1", markup: "<html><body>home</body></html>" };
const about = { id: "page_2", markup: "<html><body>about</body></html>" };

describe("computeSiteHash", () => {
  it("is 16 lowercase hex characters", () => {
    expect(computeSiteHash([home])).toMatch(/^[0-9a-f]{16}$/);
  });

  it("does not depend on page order", () => {
    expect(computeSiteHash([home, about])).toBe(computeSiteHash([about, home]));
  });

  it("changes when any page's markup changes", () => {
    const edited = { ...about, markup: "<html><body>about us</body></html>" };
    expect(computeSiteHash([home, edited])).not.toBe(computeSiteHash([home, about]));
  });
});

describe("SiteDeployer", () => {
  let root: string;
  let deployer: SiteDeployer;

  beforeEach(async () => {
    root = await fs.mkdtemp(path.join(os.tmpdir(), "layout-correct-sites-"));
    deployer = new SiteDeployer(root, silentLogger());
  });

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  it("lays out one directory per site", async () => {
    const hash = await deployer.deploy([about, home], { metadata: { description: "test" } });
    expect(hash).toBe(computeSiteHash([home, about]));

    const dir = path.join(root, hash);
    expect((await fs.readdir(dir)).sort()).toEqual([
      "index.html",
      "metadata.json",
      "pages",
      "pages.json",
    ]);
    expect(await fs.readFile(path.join(dir, "index.html"), "utf-8")).toBe(home.markup);
    expect(await fs.readFile(path.join(dir, "pages", "page_2.html"), "utf-8")).toBe(about.markup);
    expect(JSON.parse(await fs.readFile(path.join(dir, "pages.json"), "utf-8"))).toEqual([
      { page_id: "page_1", file: "pages/page_1.html" },
      { page_id: "page_2", file: "pages/page_2.html" },
    ]);

    const metadata: unknown = JSON.parse(
      await fs.readFile(path.join(dir, "metadata.json"), "utf-8")
    );
    expect(metadata).toMatchObject({
      description: "test",
      home_page_id: "page_1",
      page_ids: ["page_1", "page_2"],
    });
  });

  it("leaves no staging directories behind", async () => {
    const hash = await deployer.deploy([home]);
    expect(await fs.readdir(root)).toEqual([hash]);
  });

  it("uses the requested entry page", async () => {
    const hash = await deployer.deploy([home, about], { homePageId: "page_2" });
    expect(await deployer.fetch(hash)).toBe(about.markup);
  });

  it("keeps the first deploy's bytes when the same site is deployed again", async () => {
    const first = await deployer.deploy([home, about], { metadata: { run: 1 } });
    const metaPath = path.join(root, first, "metadata.json");
    const before = await fs.readFile(metaPath, "utf-8");

    const second = await deployer.deploy([about, home], { metadata: { run: 2 } });

    expect(second).toBe(first);
    expect(await fs.readFile(metaPath, "utf-8")).toBe(before);
    expect(await fs.readdir(root)).toEqual([first]);
  });

  it("serves a racing deploy of the same pages from one directory", async () => {
    const [a, b] = await Promise.all([
      deployer.deploy([home, about]),
      deployer.deploy([about, home]),
    ]);
    expect(a).toBe(b);
    expect(await fs.readdir(root)).toEqual([a]);
    expect(await deployer.fetch(a, "page_1")).toBe(home.markup);
  });

  it("fetches the entry document and named pages", async () => {
    const hash = await deployer.deploy([home, about]);
    expect(await deployer.fetch(hash)).toBe(home.markup);
    expect(await deployer.fetch(hash, "page_2")).toBe(about.markup);
  });

  it("serves the entry document for the index page id", async () => {
    const hash = await deployer.deploy([home, about]);
    expect(await deployer.fetch(hash, "index")).toBe(home.markup);
  });

  it("prefers a page that is actually named index", async () => {
    const named = { id: "index", markup: "<html><body>named</body></html>" };
    const hash = await deployer.deploy([named, home], { homePageId: "page_1" });
    expect(await deployer.fetch(hash, "index")).toBe(named.markup);
    expect(await deployer.fetch(hash)).toBe(home.markup);
  });

  it("stores the same bytes for the same site under another root", async () => {
    const other = new SiteDeployer(path.join(root, "other"), silentLogger());
    const hash = await deployer.deploy([home, about], { metadata: { description: "same" } });
    await other.deploy([about, home], { metadata: { description: "same" } });

    for (const file of ["metadata.json", "pages.json", "index.html"]) {
      expect(await fs.readFile(path.join(root, "other", hash, file), "utf-8")).toBe(
        await fs.readFile(path.join(root, hash, file), "utf-8")
      );
    }
  });

  it("returns null for unknown sites, pages and unsafe names", async () => {
    const hash = await deployer.deploy([home]);
    expect(await deployer.fetch("0123456789abcdef")).toBeNull();
    expect(await deployer.fetch(hash, "page_9")).toBeNull();
    expect(await deployer.fetch(hash, "../index")).toBeNull();
    expect(await deployer.fetch("../etc")).toBeNull();
  });

  it("lists deployed sites with their metadata", async () => {
    expect(await deployer.list()).toEqual([]);
    const hash = await deployer.deploy([home], { metadata: { description: "solo" } });

    const sites = await deployer.list();
    expect(sites).toHaveLength(1);
    expect(sites[0]?.siteHash).toBe(hash);
    expect(sites[0]?.metadata).toMatchObject({ description: "solo", home_page_id: "page_1" });
  });

  it("lists nothing when the root does not exist yet", async () => {
    const fresh = new SiteDeployer(path.join(root, "missing"), silentLogger());
    expect(await fresh.list()).toEqual([]);
  });

  it("deletes a site once", async () => {
    const hash = await deployer.deploy([home]);
    expect(await deployer.delete(hash)).toBe(true);
    expect(await deployer.fetch(hash)).toBeNull();
    expect(await deployer.delete(hash)).toBe(false);
  });

  it("rejects page sets it cannot store", async () => {
    await expect(deployer.deploy([])).rejects.toThrow(DeployValidationError);
    await expect(deployer.deploy([home, { ...home }])).rejects.toThrow(
      "Duplicate page id: page_1"
    );
    await expect(deployer.deploy([{ id: "../x", markup: "" }])).rejects.toThrow(
      "Page id is not a safe file name: ../x"
    );
  });
});
