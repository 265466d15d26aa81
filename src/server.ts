import path from "node:path";

import { createApp } from "./app.js";
import { MemoryCache } from "./cache.js";
import { HttpClassifier } from "./classifier.js";
import { loadConfig } from "./config.js";
import { createContext } from "./context.js";
import { ConsoleLogger } from "./logger.js";
import { MemoryStore } from "./memory.js";
import { PostgresStore } from "./postgres.js";
import { Scheduler } from "./scheduler.js";
import type { Store } from "./store.js";
import { buildTasks } from "./tasks/index.js";
import { TelegramClient } from "./telegram.js";

const main = async (): Promise<void> => {
  const config = loadConfig();
  const logger = new ConsoleLogger("intake", config.logLevel);

  let store: Store;
  if (config.databaseUrl) {
    const postgres = new PostgresStore(config.databaseUrl);
    await postgres.migrate(path.resolve(process.cwd(), "migrations"), logger.child("db"));
    store = postgres;
  } else {
    logger.warn("DATABASE_URL is not set; records live in memory only");
    store = new MemoryStore();
  }

  const telegram = new TelegramClient({ ...config.telegram, timeoutMs: 15_000 });
  const ctx = createContext({
    store,
    cache: new MemoryCache(),
    sink: telegram,
    media: telegram,
    classifier: new HttpClassifier(config.classifier),
    policy: config.policy,
    logger,
  });

  const scheduler = new Scheduler(buildTasks(ctx), {
    intervalMs: config.policy.schedulerIntervalMinutes * 60_000,
    clock: ctx.clock,
    logger: logger.child("scheduler"),
  });
  scheduler.start();

  const server = createApp(ctx).listen(config.port, () => {
    logger.info(`Intake compliance server listening on port ${config.port}.`);
  });

  const shutdown = (signal: string) => {
    logger.info(`Received ${signal}, shutting down`);
    server.close();
    scheduler
      .stop()
      .then(() => store.close())
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        logger.error("Shutdown failed", error);
        process.exit(1);
      });
  };
  process.once("SIGINT", () => shutdown("SIGINT"));
  process.once("SIGTERM", () => shutdown("SIGTERM"));
};

main().catch((error: unknown) => {
  console.error(error);
  process.exit(1);
});
