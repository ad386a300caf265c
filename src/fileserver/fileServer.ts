import express, {
  type ErrorRequestHandler,
  type Express,
  type Request,
  type Response,
} from "express";
import { constants, type Dirent, type Stats } from "node:fs";
import { open, readdir, type FileHandle } from "node:fs/promises";
import type { Server } from "node:http";
import path from "node:path";
import type { ServerConfig } from "../config/runtime";
import { LISTING_MESSAGES } from "../constants/messages";
import { createLogger, type Logger } from "../logging";
import { buildListingView, renderListingPage } from "./directoryListing";
import { sendFileDownload } from "./fileDownload";
import { sendError } from "./httpError";
import { resolveRequestPath } from "./pathResolver";
import { requestLog } from "./requestLog";

export type FileServerOptions = Readonly<{
  logger?: Logger;
}>;

const SERVED_METHODS = ["GET", "HEAD"];

function hasErrorCode(err: unknown, code: string): boolean {
  return err instanceof Error && "code" in err && err.code === code;
}

async function serveDirectory(
  res: Response,
  absolutePath: string,
  relativePath: string,
  config: ServerConfig,
  logger: Logger,
): Promise<void> {
  let children: Dirent[];
  try {
    children = await readdir(absolutePath, { withFileTypes: true });
  } catch (err) {
    logger.error(`Directory read error: ${absolutePath}`, err);
    sendError(res, 403);
    return;
  }

  let page: string;
  try {
    page = renderListingPage(
      buildListingView(relativePath, children),
      LISTING_MESSAGES[config.locale],
    );
  } catch (err) {
    logger.error(`Template rendering error: ${absolutePath}`, err);
    sendError(res, 500);
    return;
  }

  res.status(200).type("html").send(page);
}

async function serveEntry(
  req: Request,
  res: Response,
  config: ServerConfig,
  logger: Logger,
): Promise<void> {
  if (!SERVED_METHODS.includes(req.method)) {
    res.set("Allow", SERVED_METHODS.join(", "));
    sendError(res, 405);
    return;
  }

  const resolved = resolveRequestPath(config.rootDir, req.path);
  if (!resolved.ok) {
    logger.warn(`Rejected path ${req.path}: ${resolved.reason}`);
    sendError(res, resolved.reason === "malformed" ? 400 : 403);
    return;
  }
  const { absolutePath, relativePath } = resolved;

  let handle: FileHandle;
  try {
    // O_NONBLOCK keeps a FIFO from stalling the open until a writer shows up.
    handle = await open(absolutePath, constants.O_RDONLY | constants.O_NONBLOCK);
  } catch (err) {
    // Some platforms refuse to open directories at all.
    if (hasErrorCode(err, "EISDIR")) {
      await serveDirectory(res, absolutePath, relativePath, config, logger);
      return;
    }
    logger.error(`File open failed: ${absolutePath}`, err);
    sendError(res, 404);
    return;
  }

  try {
    let stats: Stats;
    try {
      stats = await handle.stat();
    } catch (err) {
      logger.error(`File stat failed: ${absolutePath}`, err);
      sendError(res, 500);
      return;
    }

    if (stats.isDirectory()) {
      await serveDirectory(res, absolutePath, relativePath, config, logger);
    } else if (stats.isFile()) {
      await sendFileDownload(
        req,
        res,
        () => handle.createReadStream({ autoClose: false }),
        {
          absolutePath,
          displayName: path.basename(absolutePath),
          sizeInBytes: stats.size,
        },
        logger,
      );
    } else {
      logger.warn(`Refusing special file: ${absolutePath}`);
      sendError(res, 403);
    }
  } finally {
    await handle.close();
  }
}

export function createFileServer(
  config: ServerConfig,
  options: FileServerOptions = {},
): Express {
  const logger = options.logger ?? createLogger("file-server");

  const app = express();
  app.disable("x-powered-by");
  app.disable("etag");
  app.use(requestLog(logger));

  app.use((req, res, next) => {
    serveEntry(req, res, config, logger).catch(next);
  });

  const handleError: ErrorRequestHandler = (err, req, res, _next) => {
    logger.error(`Unhandled error for ${req.method} ${req.path}`, err);
    if (res.headersSent) {
      res.destroy();
      return;
    }
    sendError(res, 500);
  };
  app.use(handleError);

  return app;
}

/** Resolves once the listener is bound; bind failures reject. */
export function startFileServer(
  config: ServerConfig,
  options: FileServerOptions = {},
): Promise<Server> {
  const app = createFileServer(config, options);

  return new Promise((resolve, reject) => {
    const server = app.listen(config.port, config.host);
    server.requestTimeout = config.timeouts.readTimeoutMs;
    server.headersTimeout = config.timeouts.readTimeoutMs;
    server.setTimeout(config.timeouts.writeTimeoutMs);

    server.once("error", reject);
    server.once("listening", () => {
      server.off("error", reject);
      resolve(server);
    });
  });
}
