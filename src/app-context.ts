import type { AppConfig } from "./core/config";
import { openDatabase, type DatabaseHandle } from "./db/client";
import { runMigrations } from "./db/migrate";
import { RunsRepository } from "./db/repositories/runs.repo";
import { FileSink } from "./export/file-sink";
import { GoogleSheetsGateway } from "./export/google-sheets-gateway";
import { SpreadsheetSink } from "./export/spreadsheet-sink";
import { CollectionCoordinator } from "./orchestration/collection-coordinator";
import { XAdapter } from "./platforms/x";
import type { BrowserDriverFactory } from "./services/browser-driver";
import type { OperatorSignal } from "./services/operator-signal";
import { PlaywrightBrowserDriver } from "./services/playwright-driver";
import { SessionStore } from "./services/session-store";

export interface AppContext {
  config: AppConfig;
  database: DatabaseHandle;
  runs: RunsRepository;
  session: SessionStore;
  adapter: XAdapter;
  launchDriver: BrowserDriverFactory;
  createCoordinator(operator: OperatorSignal): CollectionCoordinator;
  close(): void;
}

/** Wires the production implementations behind every seam. */
export function createAppContext(config: AppConfig): AppContext {
  const database = openDatabase(config.databasePath);
  runMigrations(database.sqlite);

  const runs = new RunsRepository(database.db);
  const session = new SessionStore(config.session.cookiesPath);
  const adapter = new XAdapter(config.search.baseUrl);

  const launchDriver: BrowserDriverFactory = ({ headless }) =>
    PlaywrightBrowserDriver.launch({
      headless,
      slowMo: config.browser.slowMo,
      navigationTimeoutMs: config.browser.navigationTimeoutMs,
      scrollSettleMs: config.crawl.scrollSettleMs,
      targetHosts: adapter.hosts,
    });

  const sinks = {
    spreadsheet: new SpreadsheetSink(new GoogleSheetsGateway(config.export.credentialsPath)),
    file: new FileSink(),
  };

  return {
    config,
    database,
    runs,
    session,
    adapter,
    launchDriver,
    createCoordinator: (operator) =>
      new CollectionCoordinator({ config, session, adapter, launchDriver, operator, sinks, runs }),
    close: () => database.close(),
  };
}
