import type { AppConfig } from "../config";
import { createBrowser } from "./base";
import type { OpenSession } from "./PortalSession";
import { PublicSearchSession } from "./publicsearch";

/**
 * Session factory handed to the crawl controller. Each call launches (or
 * connects to) a browser and opens the results page for the target.
 */
export function publicSearchOpener(config: AppConfig): OpenSession {
  return async target => {
    const browser = await createBrowser({ headless: config.headless, cdpUrl: config.cdpUrl });
    try {
      return await PublicSearchSession.open(browser, target, {
        baseUrl: config.portalUrl,
        pageLoadTimeoutMs: config.pageLoadTimeoutMs,
        afterScrollMs: config.crawl.afterScrollMs,
        afterClickMs: config.crawl.afterClickMs,
      });
    } catch (err) {
      await browser.close();
      throw err;
    }
  };
}
