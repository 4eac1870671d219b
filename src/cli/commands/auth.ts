import type { Command } from "commander";
import type { AppConfig } from "../../core/config";
import { createAppContext } from "../../app-context";
import { withBrowserDriver } from "../../services/browser-driver";
import { TerminalOperatorSignal } from "../../services/operator-signal";
import { SessionStore, cookieMatchesHost, isExpired } from "../../services/session-store";
import { XAdapter } from "../../platforms/x";
import { errorMessage } from "../../core/errors";
import { logger } from "../../core/logger";

export const commands = (program: Command, config: AppConfig) => {
  program
    .command("auth:login")
    .description("Log in with a visible browser and export the session cookies")
    .action(async () => {
      const context = createAppContext(config);
      try {
        logger.info({ loginUrl: context.adapter.loginUrl }, "Starting headful login");

        const cookies = await withBrowserDriver(
          () => context.launchDriver({ headless: false }),
          async (driver) => {
            await driver.open(context.adapter.loginUrl);
            await new TerminalOperatorSignal().waitForLogin({
              loginUrl: context.adapter.loginUrl,
              cookiesPath: context.session.path,
            });
            return driver.exportCookies();
          }
        );

        const relevant = cookies.filter((cookie) => cookieMatchesHost(cookie, context.adapter.hosts));
        if (relevant.length === 0) {
          logger.error("No cookies for the platform were found; was the login completed?");
          process.exitCode = 1;
          return;
        }

        await context.session.save(relevant);
        logger.info({ path: context.session.path, cookieCount: relevant.length }, "Login successful, cookies saved");
      } catch (error) {
        logger.error({ error: errorMessage(error) }, "Login failed");
        process.exitCode = 1;
      } finally {
        context.close();
      }
    });

  program
    .command("auth:check")
    .description("Validate the cookie file without opening a browser")
    .action(async () => {
      const store = new SessionStore(config.session.cookiesPath);
      const adapter = new XAdapter(config.search.baseUrl);

      try {
        const session = await store.load();
        if (session.status === "requires_interactive_login") {
          logger.warn({ path: store.path }, "No cookie file; run auth:login");
          process.exitCode = 1;
          return;
        }

        const nowSeconds = Math.floor(Date.now() / 1000);
        const forPlatform = session.cookies.filter((cookie) => cookieMatchesHost(cookie, adapter.hosts));
        const expired = forPlatform.filter((cookie) => isExpired(cookie, nowSeconds));
        const hasAuthToken = forPlatform.some((cookie) => cookie.name === "auth_token" && !isExpired(cookie, nowSeconds));

        logger.info(
          {
            path: store.path,
            total: session.cookies.length,
            forPlatform: forPlatform.length,
            expired: expired.length,
            hasAuthToken,
          },
          "Cookie file parsed"
        );

        if (!hasAuthToken) {
          logger.warn("No valid auth_token cookie; the session will likely need a fresh login");
          process.exitCode = 1;
        }
      } catch (error) {
        logger.error({ error: errorMessage(error) }, "Cookie file is invalid");
        process.exitCode = 1;
      }
    });
};
