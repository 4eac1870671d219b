import type { CredentialBundle, SessionCookie } from "./session-store";
import { logger } from "../core/logger";

/**
 * Control surface the crawler drives. Implementations must accept `inject`
 * only before the first `open`, and `close` must be safe to call twice.
 */
export interface BrowserDriver {
  inject(bundle: CredentialBundle): Promise<void>;
  open(url: string): Promise<void>;
  /** Resolves once a node matches `selector`; rejects with DriverTimeoutError otherwise. */
  waitFor(selector: string, timeoutMs: number): Promise<void>;
  scrollToBottom(): Promise<void>;
  currentHtml(): Promise<string>;
  currentUrl(): string;
  exportCookies(): Promise<SessionCookie[]>;
  close(): Promise<void>;
}

export type BrowserDriverFactory = (options: { headless: boolean }) => Promise<BrowserDriver>;

/**
 * Scoped acquisition: the driver is closed on every exit path, and as soon as
 * `signal` aborts so an operator interrupt never leaves a browser behind.
 */
export async function withBrowserDriver<T>(
  acquire: () => Promise<BrowserDriver>,
  fn: (driver: BrowserDriver) => Promise<T>,
  signal?: AbortSignal
): Promise<T> {
  const driver = await acquire();

  const onAbort = () => {
    logger.warn("Abort requested, closing browser");
    driver.close().catch((error: unknown) => logger.debug({ err: error }, "Error closing browser on abort"));
  };

  if (signal?.aborted) {
    onAbort();
  } else {
    signal?.addEventListener("abort", onAbort, { once: true });
  }

  try {
    return await fn(driver);
  } finally {
    signal?.removeEventListener("abort", onAbort);
    await driver.close();
  }
}
