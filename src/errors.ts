/**
 * Startup failure meant for the operator: the message is printed as is and the
 * process exits with status 1.
 */
export class ConfigError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "ConfigError";
  }
}
