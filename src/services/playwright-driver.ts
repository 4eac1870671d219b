import { chromium, errors, type Browser, type BrowserContext, type Page } from "playwright";
import { DriverTimeoutError, NavigationError } from "../core/errors";
import { logger } from "../core/logger";
import type { BrowserDriver } from "./browser-driver";
import { cookieMatchesHost, isExpired, type CredentialBundle, type SessionCookie } from "./session-store";

export interface PlaywrightDriverOptions {
  headless: boolean;
  slowMo: number;
  navigationTimeoutMs: number;
  scrollSettleMs: number;
  /** Hosts the credential bundle is meant for; other cookies are skipped. */
  targetHosts: readonly string[];
}

const USER_AGENT =
  "Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36";

export class PlaywrightBrowserDriver implements BrowserDriver {
  private hasNavigated = false;
  private closed = false;

  private constructor(
    private browser: Browser,
    private context: BrowserContext,
    private page: Page,
    private options: PlaywrightDriverOptions
  ) {}

  static async launch(options: PlaywrightDriverOptions): Promise<PlaywrightBrowserDriver> {
    const browser = await chromium.launch({
      headless: options.headless,
      slowMo: options.slowMo,
      args: [
        "--disable-blink-features=AutomationControlled",
        "--disable-features=IsolateOrigins,site-per-process",
        "--no-sandbox",
        "--disable-dev-shm-usage",
      ],
    });

    try {
      const context = await browser.newContext({
        viewport: { width: 1280, height: 900 },
        locale: "en-US",
        userAgent: USER_AGENT,
      });
      const page = await context.newPage();
      page.setDefaultNavigationTimeout(options.navigationTimeoutMs);
      page.setDefaultTimeout(options.navigationTimeoutMs);

      logger.info({ headless: options.headless }, "Launched browser");
      return new PlaywrightBrowserDriver(browser, context, page, options);
    } catch (error) {
      await browser.close().catch((closeError: unknown) => logger.debug({ error: closeError }, "Error closing browser after failed launch"));
      throw error;
    }
  }

  async inject(bundle: CredentialBundle): Promise<void> {
    if (this.hasNavigated) {
      throw new NavigationError("Cookies must be injected before the first navigation", "INJECT_AFTER_NAVIGATION");
    }

    const nowSeconds = Math.floor(Date.now() / 1000);
    const usable = bundle.cookies.filter(
      (cookie) => cookieMatchesHost(cookie, this.options.targetHosts) && !isExpired(cookie, nowSeconds)
    );
    const skipped = bundle.cookies.length - usable.length;

    if (usable.length === 0) {
      logger.warn({ source: bundle.source, skipped }, "No cookies match the target domain; injection is a no-op");
      return;
    }

    await this.context.addCookies(
      usable.map((cookie) => ({
        name: cookie.name,
        value: cookie.value,
        domain: cookie.domain,
        path: cookie.path,
        expires: cookie.expiry ?? -1,
        httpOnly: cookie.httpOnly,
        secure: cookie.secure || cookie.sameSite === "None",
        sameSite: cookie.sameSite,
      }))
    );

    logger.info({ injected: usable.length, skipped }, "Injected session cookies");
  }

  async open(url: string): Promise<void> {
    this.hasNavigated = true;

    try {
      await this.page.goto(url, { waitUntil: "domcontentloaded" });
    } catch (error) {
      if (error instanceof errors.TimeoutError) {
        logger.debug({ url }, "Navigation timeout, continuing with current DOM");
        return;
      }
      const message = error instanceof Error ? error.message : String(error);
      throw new NavigationError(`Failed to open ${url}: ${message}`, "NAVIGATION_FAILED");
    }
  }

  async waitFor(selector: string, timeoutMs: number): Promise<void> {
    try {
      await this.page.waitForSelector(selector, { state: "attached", timeout: timeoutMs });
    } catch (error) {
      if (error instanceof errors.TimeoutError) {
        throw new DriverTimeoutError(`No element matched "${selector}" within ${timeoutMs}ms`);
      }
      throw error;
    }
  }

  async scrollToBottom(): Promise<void> {
    await this.page.evaluate("window.scrollTo(0, document.body.scrollHeight)");
    await this.page.waitForTimeout(this.options.scrollSettleMs);
  }

  currentHtml(): Promise<string> {
    return this.page.content();
  }

  currentUrl(): string {
    return this.page.url();
  }

  async exportCookies(): Promise<SessionCookie[]> {
    const cookies = await this.context.cookies();
    return cookies.map((cookie) => ({
      domain: cookie.domain,
      name: cookie.name,
      value: cookie.value,
      path: cookie.path,
      expiry: cookie.expires < 0 ? null : Math.floor(cookie.expires),
      secure: cookie.secure,
      httpOnly: cookie.httpOnly,
      sameSite: cookie.sameSite,
    }));
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;

    await this.page.close().catch((error: unknown) => logger.debug({ err: error }, "Error closing page (non-fatal)"));
    await this.context.close().catch((error: unknown) => logger.debug({ err: error }, "Error closing browser context (non-fatal)"));
    await this.browser.close().catch((error: unknown) => logger.debug({ err: error }, "Error closing browser (non-fatal)"));
    logger.debug("Browser closed");
  }
}
