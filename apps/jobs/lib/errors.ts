/**
 * Error helpers shared by the jobs
 */

// Safe error message helper
export const errMsg = (e: unknown): string => (e && e instanceof Error) ? e.message : String(e);

/**
 * Raised when a JSON document (pick store, performance rollup, props history)
 * cannot be read, parsed, validated or written.
 */
export class PersistenceError extends Error {
  readonly filePath: string;

  constructor(filePath: string, message: string, options?: { cause?: unknown }) {
    super(`${message} (${filePath})`, options);
    this.name = 'PersistenceError';
    this.filePath = filePath;
  }
}

/**
 * Raised when YAML configuration is missing required structure.
 */
export class ConfigError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConfigError';
  }
}
