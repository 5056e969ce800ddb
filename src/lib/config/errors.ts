import type { ZodError } from 'zod';

/**
 * Raised for command-line arguments that cannot be parsed
 */
export class ArgumentError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ArgumentError';
  }
}

/**
 * Raised when a config file cannot be read or the merged config is invalid
 */
export class ConfigError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConfigError';
  }

  static fromZod(error: ZodError, source: string): ConfigError {
    const details = error.issues
      .map(issue => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
      .join('; ');
    return new ConfigError(`${source}: ${details}`, { cause: error });
  }
}
