// ---------------------------------------------------------------------------
// Process entry point
// ---------------------------------------------------------------------------

import { createApp } from "./app.js";
import { ConfigError, loadAppConfig } from "./config/config.js";
import { createSubsystemLogger, formatError, setLogLevel } from "./logging.js";

const log = createSubsystemLogger("main");

async function main(): Promise<void> {
  const config = loadAppConfig();
  setLogLevel(config.logLevel);

  const app = await createApp(config);
  await app.start();

  const shutdown = (signal: string) => {
    log.info(`received ${signal}, shutting down`);
    app
      .stop()
      .then(() => process.exit(0))
      .catch((err: unknown) => {
        log.error(`shutdown failed: ${formatError(err)}`);
        process.exit(1);
      });
  };
  process.once("SIGINT", () => shutdown("SIGINT"));
  process.once("SIGTERM", () => shutdown("SIGTERM"));
}

main().catch((err: unknown) => {
  if (err instanceof ConfigError) {
    log.error(err.message);
  } else {
    log.error(`startup failed: ${formatError(err)}`);
  }
  process.exit(1);
});
