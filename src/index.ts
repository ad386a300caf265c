#!/usr/bin/env node
// src/index.ts
import "dotenv/config";
import type { Server } from "node:http";
import { buildStartupOptions, type ServerConfig } from "./config/runtime";
import { STARTUP_MESSAGES, USAGE } from "./constants/messages";
import { ConfigError } from "./errors";
import { startFileServer } from "./fileserver/fileServer";
import { createLogger, describeError } from "./logging";
import { formatBanner } from "./startup/banner";
import { discoverLocalAddress } from "./startup/localAddress";
import { acquireRootDirectory } from "./startup/rootDirectory";

const logger = createLogger("startup");

function closeOnSignal(server: Server): void {
  const shutdown = (signal: NodeJS.Signals) => {
    logger.info(`${signal} received, shutting down`);
    server.close((err) => {
      if (err) logger.error("Server close failed", err);
    });
    server.closeAllConnections();
  };

  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);
}

async function main(): Promise<void> {
  const options = buildStartupOptions(process.argv.slice(2), process.env);
  if (options.showHelp) {
    console.log(USAGE);
    return;
  }

  const rootDir = await acquireRootDirectory(options.rootDir, {
    input: process.stdin,
    output: process.stdout,
    logger,
  });

  const config: ServerConfig = {
    rootDir,
    host: options.host,
    port: options.port,
    locale: options.locale,
    timeouts: options.timeouts,
  };
  const localAddress = await discoverLocalAddress(logger);

  let server: Server;
  try {
    server = await startFileServer(config);
  } catch (err) {
    throw new ConfigError(`${STARTUP_MESSAGES.bindFailed}: ${describeError(err)}`, {
      cause: err,
    });
  }

  logger.info(formatBanner(config, localAddress));
  closeOnSignal(server);
}

main().catch((err: unknown) => {
  if (err instanceof ConfigError) {
    logger.error(err.message);
  } else {
    logger.error("Unexpected startup failure", err);
  }
  process.exitCode = 1;
});
