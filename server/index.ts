import 'dotenv/config';
import express, { type Request, type Response, type NextFunction } from "express";
import { registerRoutes } from "./routes";
import logger from "./logger";
import { loadConfig } from "./config";
import { createEventBus } from "./services/event-bus";
import { assertDbConnection, createDatabase } from "./db";
import { DatabaseStorage, MemStorage, type IStorage } from "./storage";
import { requestLogger } from "./middleware/request-log";

async function waitForDb(check: () => Promise<void>, retries = 10): Promise<void> {
  for (let attempt = 0; attempt < retries; attempt++) {
    try {
      await check();
      return;
    } catch (err) {
      const delay = Math.pow(2, attempt) * 100;
      logger.warn({ err }, `Database connection failed, retrying in ${delay}ms`);
      await new Promise((resolve) => setTimeout(resolve, delay));
    }
  }
  throw new Error("Unable to establish database connection");
}

async function main() {
  const config = loadConfig();

  let storage: IStorage;
  let ping: (() => Promise<void>) | undefined;
  let closeStorage: () => Promise<void> = async () => {};
  if (config.storage.driver === "postgres") {
    const { pool, db } = createDatabase(config.storage.databaseUrl);
    ping = () => assertDbConnection(pool);
    await waitForDb(ping);
    storage = new DatabaseStorage(db);
    closeStorage = () => pool.end();
  } else {
    logger.warn("STORAGE_DRIVER=memory: data is kept in process and lost on restart");
    storage = new MemStorage();
  }

  // Loaded once; updates through the settings route swap the running value
  const settings = await storage.getOrCreateDeliverySettings();
  const eventBus = createEventBus(config.eventBus, logger);

  const app = express();
  app.use(express.json({ limit: '1mb' }));
  app.use((_req, res, next) => {
    res.setHeader('X-Content-Type-Options', 'nosniff');
    res.removeHeader('X-Powered-By');
    next();
  });
  app.use(requestLogger(logger));

  const server = await registerRoutes(app, {
    storage,
    eventBus,
    logger,
    settings,
    adminToken: config.adminToken,
    ping,
  });

  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    logger.error({ err }, "Unhandled request error");
    res.status(500).json({ message: "Internal Server Error" });
  });

  const gracefulShutdown = async () => {
    try {
      server.close();
      await eventBus.shutdown();
      await closeStorage();
    } catch (err) {
      logger.error({ err }, "Error during shutdown");
    } finally {
      process.exit(0);
    }
  };

  process.on("SIGTERM", gracefulShutdown);
  process.on("SIGINT", gracefulShutdown);

  server.listen(config.port, "0.0.0.0", () => {
    logger.info({ port: config.port, storage: config.storage.driver }, `serving on port ${config.port}`);
  });
}

main().catch((err) => {
  logger.error({ err }, "Failed to start server");
  process.exit(1);
});
