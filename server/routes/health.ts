import type { Express } from "express";
import type { Logger } from "pino";

interface HealthRouteDeps {
  app: Express;
  logger: Logger;
  // Resolves when the backing store answers
  ping?: () => Promise<void>;
}

export function registerHealthRoutes({ app, logger, ping }: HealthRouteDeps) {
  app.get("/api/health", async (_req, res) => {
    try {
      if (ping) {
        await ping();
      }
      res.json({ status: "ok", time: new Date().toISOString() });
    } catch (err) {
      logger.warn({ err }, "health check failed");
      res.status(500).json({ status: "error" });
    }
  });
}
