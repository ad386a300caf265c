import { parseArgs } from "node:util";
import { LOCALES, type Locale } from "../constants/messages";
import { ConfigError } from "../errors";
import { describeError } from "../logging";
import { parseChoice, parseInteger, parseText } from "../utils/env";

const DEFAULT_FILE_PORT = 8080;
const DEFAULT_FILE_HOST = "0.0.0.0";
const DEFAULT_LOCALE: Locale = "en";
const DEFAULT_READ_TIMEOUT_MS = 10_000;
const DEFAULT_WRITE_TIMEOUT_MS = 30_000;
const PORT_RANGE = { min: 1, max: 65_535 } as const;

type TransportTimeouts = Readonly<{
  readTimeoutMs: number;
  writeTimeoutMs: number;
}>;

export type StartupOptions = Readonly<{
  rootDir?: string;
  host: string;
  port: number;
  locale: Locale;
  timeouts: TransportTimeouts;
  showHelp: boolean;
}>;

/** Settled configuration handed to the HTTP layer; never mutated after startup. */
export type ServerConfig = Readonly<{
  rootDir: string;
  host: string;
  port: number;
  locale: Locale;
  timeouts: TransportTimeouts;
}>;

type Env = Readonly<Record<string, string | undefined>>;

function readFlags(argv: readonly string[]) {
  try {
    return parseArgs({
      args: [...argv],
      options: {
        dir: { type: "string" },
        directory: { type: "string" },
        port: { type: "string" },
        host: { type: "string" },
        lang: { type: "string" },
        help: { type: "boolean", short: "h", default: false },
      },
      strict: true,
      allowPositionals: false,
    }).values;
  } catch (err) {
    throw new ConfigError(`Invalid command line: ${describeError(err)}`, { cause: err });
  }
}

function parsePortFlag(raw: string): number {
  const value = raw.trim();
  const parsed = /^\d+$/.test(value) ? Number.parseInt(value, 10) : NaN;
  if (!Number.isInteger(parsed) || parsed < PORT_RANGE.min || parsed > PORT_RANGE.max) {
    throw new ConfigError(`Invalid --port value "${raw}": expected 1-65535`);
  }
  return parsed;
}

function parseLocaleFlag(raw: string): Locale {
  const locale = LOCALES.find((candidate) => candidate === raw.trim().toLowerCase());
  if (!locale) {
    throw new ConfigError(`Invalid --lang value "${raw}": expected ${LOCALES.join(" or ")}`);
  }
  return locale;
}

/** Flags win over environment variables, which win over defaults. */
export function buildStartupOptions(
  argv: readonly string[],
  env: Env,
): StartupOptions {
  const flags = readFlags(argv);

  const rootDir =
    parseText(flags.dir) || parseText(flags.directory) || parseText(env.FILE_DIR);
  const port =
    flags.port !== undefined
      ? parsePortFlag(flags.port)
      : parseInteger(env.FILE_PORT, DEFAULT_FILE_PORT, PORT_RANGE);
  const host = parseText(flags.host) || parseText(env.FILE_HOST) || DEFAULT_FILE_HOST;
  const locale =
    flags.lang !== undefined
      ? parseLocaleFlag(flags.lang)
      : parseChoice(env.FILE_LANG, LOCALES, DEFAULT_LOCALE);

  return {
    rootDir: rootDir || undefined,
    host,
    port,
    locale,
    timeouts: {
      readTimeoutMs: parseInteger(env.FILE_READ_TIMEOUT_MS, DEFAULT_READ_TIMEOUT_MS, {
        min: 1,
      }),
      writeTimeoutMs: parseInteger(env.FILE_WRITE_TIMEOUT_MS, DEFAULT_WRITE_TIMEOUT_MS, {
        min: 1,
      }),
    },
    showHelp: flags.help === true,
  };
}
