import type { RequestHandler } from "express";
import type { Logger } from "../logging";

export function requestLog(logger: Logger): RequestHandler {
  return (req, res, next) => {
    const startedAt = performance.now();
    const { method, path: requestPath } = req;
    logger.info(`[REQUEST] ${method} ${requestPath}`);

    // "close" fires for completed and aborted responses alike.
    res.once("close", () => {
      const elapsed = (performance.now() - startedAt).toFixed(1);
      const outcome = res.writableFinished ? `${res.statusCode}` : `${res.statusCode} aborted`;
      logger.info(`[COMPLETE] ${method} ${requestPath} ${outcome} Duration: ${elapsed}ms`);
    });

    next();
  };
}
