/**
 * verify-setup.ts — Quick smoke test for container setup.
 * Validates that the modules load, Chromium launches through playwright-core,
 * and a DOM detection pass finds a known overlap.
 *
 * Usage: npx tsx scripts/verify-setup.ts
 * Exit code 0 = all good, non-zero = setup broken.
 */

import {
  loadConfig,
  buildDetectionResult,
  parsePage,
  PlaywrightRendererFactory,
  DomBlockDetector,
  withRendererSession,
  silentLogger,
  describeCorrections,
} from "../src/index.js";

const OVERLAPPING_PAGE = `<!DOCTYPE html>
<html><body style="margin:0">
  <div class="block" style="position:absolute;left:0px;top:0px;width:100px;height:100px">A</div>
  <div class="block" style="position:absolute;left:50px;top:50px;width:100px;height:100px">B</div>
</body></html>`;

async function verify() {
  const checks: string[] = [];

  // 1. Config parsing
  const config = loadConfig({ ...process.env, LOG_LEVEL: "silent" });
  checks.push("config parsing");

  // 2. Geometry
  const pass = buildDetectionResult(
    [
      { score: 0.9, bbox: [0, 0, 100, 100] },
      { score: 0.8, bbox: [50, 50, 150, 150] },
    ],
    [200, 200]
  );
  if (pass.overlaps !== 1) throw new Error(`Expected 1 overlap pair, got ${pass.overlaps}`);
  checks.push("overlap geometry");

  // 3. Markup diffing
  const page = parsePage({ id: "verify", markup: OVERLAPPING_PAGE });
  const moved = page.markup.replace("left:50px;top:50px", "left:0px;top:120px");
  if (describeCorrections(page.markup, moved).length !== 2) {
    throw new Error("describeCorrections missed the moved block");
  }
  checks.push("markup diffing");

  // 4. Chromium render + DOM detection
  const factory = new PlaywrightRendererFactory({
    executablePath: config.CHROMIUM_PATH,
    settleMs: 0,
  });
  const detection = await withRendererSession(factory, silentLogger(), async (renderer) => {
    const image = await renderer.render(page.markup, { width: 390, height: 844 });
    return new DomBlockDetector(config.IOU_THRESHOLD).detect(image);
  });
  if (detection.total_objects !== 2) {
    throw new Error(`Expected 2 blocks, got ${detection.total_objects}`);
  }
  if (detection.overlaps !== 1) {
    throw new Error(`Expected 1 overlap, got ${detection.overlaps}`);
  }
  checks.push("Chromium render + DOM detection");

  console.log(`  All checks passed: ${checks.join(", ")}`);
}

verify().catch((err) => {
  console.error("Setup verification FAILED:", err);
  process.exit(1);
});
