import { chromium, type Browser } from "playwright";

export interface BrowserOptions {
  headless: boolean;
  cdpUrl: string | null;
}

/**
 * Creates a browser instance for scraping.
 *
 * - With SBR_CDP_URL set: connects to a remote scraping browser over CDP.
 * - Otherwise: launches a local Chromium, headless when HEADLESS or CI is set.
 *   Playwright's own signal handlers are off: run.ts owns SIGINT/SIGTERM and
 *   closes the browser after the final checkpoint.
 */
export async function createBrowser(options: BrowserOptions): Promise<Browser> {
  if (options.cdpUrl) {
    return chromium.connectOverCDP(options.cdpUrl);
  }
  return chromium.launch({
    headless: options.headless,
    handleSIGINT: false,
    handleSIGTERM: false,
    handleSIGHUP: false,
    args: ["--no-sandbox", "--disable-setuid-sandbox"]
  });
}
