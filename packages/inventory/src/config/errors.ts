/**
 * Raised for invalid configuration files and CLI arguments
 */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}
