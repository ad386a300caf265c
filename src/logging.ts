// src/logging.ts
export type Logger = Readonly<{
  info(message: string): void;
  warn(message: string): void;
  error(message: string, cause?: unknown): void;
}>;

type ConsoleLike = Pick<Console, "log" | "warn" | "error">;

export function describeError(err: unknown): string {
  if (err instanceof Error) {
    return "code" in err && typeof err.code === "string"
      ? `${err.code}: ${err.message}`
      : err.message;
  }
  return String(err);
}

export function createLogger(
  tag: string,
  sink: ConsoleLike = console,
): Logger {
  const prefix = () => `${new Date().toISOString()} [${tag}]`;

  return {
    info: (message) => sink.log(`${prefix()} ${message}`),
    warn: (message) => sink.warn(`${prefix()} ${message}`),
    error: (message, cause) => {
      if (cause === undefined) {
        sink.error(`${prefix()} ${message}`);
        return;
      }
      sink.error(`${prefix()} ${message}: ${describeError(cause)}`);
    },
  };
}

export const silentLogger: Logger = {
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};
