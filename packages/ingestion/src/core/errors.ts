/** Exit status used when configuration is rejected before any connection is made. */
export const CONFIG_ERROR_EXIT_CODE = 2;
export const FATAL_ERROR_EXIT_CODE = 1;
export const FORCED_EXIT_CODE = 130;

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
  }
}

/** Raised when a component is driven outside of its lifecycle (e.g. a tail run twice). */
export class IngestionStateError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'IngestionStateError';
  }
}
