import type { RequestHandler } from "express";
import type { Logger } from "pino";

// One line per /api request once the response is flushed
export function requestLogger(logger: Logger): RequestHandler {
  return (req, res, next) => {
    const start = Date.now();
    const requestPath = req.path;
    res.on("finish", () => {
      if (!requestPath.startsWith("/api")) return;
      logger.info(
        { method: req.method, path: requestPath, status: res.statusCode, durationMs: Date.now() - start },
        `${req.method} ${requestPath} ${res.statusCode} in ${Date.now() - start}ms`,
      );
    });
    next();
  };
}
