/**
 * CLI error classes
 */

/**
 * Input the CLI cannot work with: unreadable file, invalid JSON, unknown
 * entity name.
 */
export class InputError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InputError';
    Object.setPrototypeOf(this, InputError.prototype);
  }
}

/**
 * Invalid environment configuration
 */
export class ConfigError extends Error {
  /** Environment variables that failed validation */
  readonly fields: string[];

  constructor(fields: string[], details: string[]) {
    super(`Invalid configuration: ${details.join('; ')}`);
    this.name = 'ConfigError';
    this.fields = fields;
    Object.setPrototypeOf(this, ConfigError.prototype);
  }
}
