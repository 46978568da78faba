import { errors, type Browser, type BrowserContext, type Page } from "playwright";
import type { RowAccessor } from "./extract";
import type { PageTarget, PortalSession } from "./PortalSession";
import { humanDelay, sleep } from "../utils/delay";
import { log } from "../utils/logger";
import { limiter } from "../utils/rateLimit";
import { withRetry } from "../utils/retry";

export class PortalError extends Error {
  constructor(message: string, readonly url: string) {
    super(message);
    this.name = "PortalError";
  }
}

export interface PortalOptions {
  baseUrl: string;
  pageLoadTimeoutMs: number;
  afterScrollMs: number;
  afterClickMs: number;
}

const RESULT_ROW = "table tbody tr";
const NEXT_PAGE_SELECTORS = ['button[aria-label*="Next"]', "nav button"];
const USER_AGENT =
  "Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36";

/** Deed search on a publicsearch.us county portal, newest recordings first. */
export function buildSearchUrl(baseUrl: string, target: PageTarget): string {
  const url = new URL(baseUrl);
  const params: Record<string, string> = {
    department: "RP",
    docTypes: "DEED",
    limit: String(target.pageSize),
    recordedDateRange: `${target.window.startDate},${target.window.endDate}`,
    searchType: "advancedSearch",
    sort: "desc",
    sortBy: "recordedDate",
    offset: String(target.offset),
  };
  for (const [key, value] of Object.entries(params)) {
    url.searchParams.set(key, value);
  }
  return url.toString();
}

/** The slice of a Playwright `Locator` a result row is read through. */
export interface RowLocator {
  locator(selector: string): {
    first(): {
      count(): Promise<number>;
      innerText(options?: { timeout?: number }): Promise<string>;
    };
  };
}

/**
 * Looks cells up by their column class ("col-7"), exact class first. Reads
 * the rendered text so names stacked in one cell keep their line breaks.
 */
export class PlaywrightRow implements RowAccessor {
  constructor(private readonly row: RowLocator) {}

  async field(column: string): Promise<string | undefined> {
    for (const selector of [`td.${column}`, `td[class*='${column}']`]) {
      const cell = this.row.locator(selector).first();
      if ((await cell.count()) > 0) {
        return cell.innerText({ timeout: 3000 });
      }
    }
    return undefined;
  }
}

export class PublicSearchSession implements PortalSession {
  private constructor(
    private readonly browser: Browser,
    private readonly context: BrowserContext,
    private readonly page: Page,
    private readonly options: PortalOptions
  ) {}

  /**
   * Opens a tab on the search results for `target`. The session owns the
   * browser from here on and closes it in `close()`.
   */
  static async open(browser: Browser, target: PageTarget, options: PortalOptions): Promise<PublicSearchSession> {
    const context = await browser.newContext({ userAgent: USER_AGENT });
    const page = await context.newPage();
    page.setDefaultNavigationTimeout(options.pageLoadTimeoutMs);
    const session = new PublicSearchSession(browser, context, page, options);

    const url = buildSearchUrl(options.baseUrl, target);
    log({ stage: "navigate", url });
    try {
      await withRetry(
        () => limiter.schedule(() => page.goto(url, { waitUntil: "domcontentloaded" })),
        3,
        2000,
        "navigate"
      );
    } catch (err) {
      await session.close();
      throw new PortalError(`Could not load search results: ${String(err)}`, url);
    }
    await humanDelay(4000, 6000);
    await session.dismissDialogs();
    return session;
  }

  async waitForResults(timeoutMs: number): Promise<boolean> {
    try {
      await this.page.locator(RESULT_ROW).first().waitFor({ state: "attached", timeout: timeoutMs });
      return true;
    } catch (err) {
      if (err instanceof errors.TimeoutError) return false;
      throw err;
    }
  }

  content(): Promise<string> {
    return this.page.content();
  }

  async rows(): Promise<RowAccessor[]> {
    const rows = await this.page.locator(RESULT_ROW).all();
    return rows.map(row => new PlaywrightRow(row));
  }

  async reload(): Promise<void> {
    await limiter.schedule(() => this.page.reload({ waitUntil: "domcontentloaded" }));
  }

  async nextPage(): Promise<boolean> {
    await this.page.evaluate("window.scrollTo(0, document.body.scrollHeight)");
    await sleep(this.options.afterScrollMs);

    for (const selector of NEXT_PAGE_SELECTORS) {
      const buttons = this.page.locator(selector);
      const count = await buttons.count();
      if (count === 0) continue;
      const last = buttons.nth(count - 1);
      if (await last.isEnabled()) {
        await limiter.schedule(() => last.click());
        await sleep(this.options.afterClickMs);
        return true;
      }
    }
    return false;
  }

  async close(): Promise<void> {
    await this.context.close();
    await this.browser.close();
  }

  // Cookie/consent banners cover the pagination controls.
  private async dismissDialogs(): Promise<void> {
    const buttons = await this.page.locator("button").filter({ hasText: /Accept|Close/ }).all();
    for (const button of buttons) {
      try {
        await button.click({ timeout: 3000 });
        await sleep(1000);
      } catch (err) {
        log({ stage: "dismiss_dialog_failed", error: String(err) });
      }
    }
  }
}
