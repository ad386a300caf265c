import type { ServerConfig } from "../config/runtime";
import { STARTUP_MESSAGES } from "../constants/messages";

export function formatBanner(config: ServerConfig, localAddress: string): string {
  return [
    "[START] File Server Configuration",
    `  Shared Directory: ${config.rootDir}`,
    `  Listening Port: ${config.port}`,
    `  Local Access: http://127.0.0.1:${config.port}`,
    `  Network Access: http://${localAddress}:${config.port}`,
    `  ${STARTUP_MESSAGES.exitHint}`,
  ].join("\n");
}
