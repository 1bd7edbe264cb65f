import { chromium, type Browser } from "playwright-core";

/**
 * Launch a Chromium browser with environment-aware defaults.
 *
 * Set CHROMIUM_PATH to use a system browser (e.g. /usr/bin/chromium in
 * containers); the sandbox flags containers need are added with it.
 */
export async function launchBrowser(
  executablePath: string | undefined = process.env.CHROMIUM_PATH
): Promise<Browser> {
  if (executablePath) {
    return chromium.launch({
      executablePath,
      args: ["--no-sandbox", "--disable-dev-shm-usage"],
    });
  }
  return chromium.launch();
}
