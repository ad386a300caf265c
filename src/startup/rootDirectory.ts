import type { Stats } from "node:fs";
import { realpath, stat } from "node:fs/promises";
import path from "node:path";
import readline from "node:readline";
import { STARTUP_MESSAGES } from "../constants/messages";
import { ConfigError } from "../errors";
import { describeError, type Logger } from "../logging";

export type PromptIo = Readonly<{
  input: NodeJS.ReadableStream;
  output: NodeJS.WritableStream;
  logger: Logger;
  maxAttempts?: number;
}>;

export async function validateDirectory(dir: string): Promise<void> {
  if (!dir) throw new ConfigError("path access error: empty path");

  let info: Stats;
  try {
    info = await stat(dir);
  } catch (err) {
    throw new ConfigError(`path access error: ${describeError(err)}`, { cause: err });
  }
  if (!info.isDirectory()) {
    throw new ConfigError(`not a directory: ${dir}`);
  }
}

/** Asks on `input` until an existing directory is entered. */
export async function promptForDirectory(io: PromptIo): Promise<string> {
  const rl = readline.createInterface({ input: io.input, terminal: false });
  let attempts = 0;

  try {
    io.output.write(STARTUP_MESSAGES.promptRootDir);
    for await (const line of rl) {
      attempts += 1;
      const candidate = line.trim();
      try {
        await validateDirectory(candidate);
        return candidate;
      } catch (err) {
        io.logger.warn(`${STARTUP_MESSAGES.invalidRootDir} (${describeError(err)})`);
      }

      if (io.maxAttempts !== undefined && attempts >= io.maxAttempts) {
        throw new ConfigError(`${STARTUP_MESSAGES.promptExhausted} after ${attempts} attempts`);
      }
      io.output.write(STARTUP_MESSAGES.promptRootDir);
    }
  } finally {
    rl.close();
  }

  throw new ConfigError(STARTUP_MESSAGES.promptClosed);
}

/** Expands symlinks once; the result is the root for the whole process lifetime. */
export async function resolveRootDirectory(dir: string): Promise<string> {
  let resolved: string;
  try {
    resolved = await realpath(path.resolve(dir));
  } catch (err) {
    throw new ConfigError(`Symbolic link resolution failed: ${describeError(err)}`, {
      cause: err,
    });
  }

  await validateDirectory(resolved);
  return resolved;
}

export async function acquireRootDirectory(
  configured: string | undefined,
  io: PromptIo,
): Promise<string> {
  const dir = configured ?? (await promptForDirectory(io));
  return resolveRootDirectory(dir);
}
