export class ConfigurationError extends Error {
  readonly kind = "ConfigurationError";

  constructor(message: string, options?: { cause?: unknown }) {
    super(`CONFIGURATION_ERROR ${message}`, options);
    this.name = "ConfigurationError";
  }
}
