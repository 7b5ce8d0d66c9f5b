/**
 * UI facade for connectors
 *
 * Host-agnostic interface for user-visible output. Connectors report
 * slow external calls through `spinner()` and transfer confirmations
 * through `info()`.
 * - CLI: chalk/ora to stderr (see connector-runtime CliUI)
 * - Library/tests: noopUI
 */

/**
 * Spinner interface for long-running operations
 */
export interface Spinner {
  /**
   * Update spinner message
   */
  update(message: string): void;

  /**
   * Mark as successful
   */
  succeed(message?: string): void;

  /**
   * Mark as failed
   */
  fail(message?: string): void;

  /**
   * Stop the spinner
   */
  stop(): void;
}

export interface ConnectorUI {
  info(message: string): void;
  success(message: string): void;
  warn(message: string): void;
  error(error: Error | string): void;
  /** Only shown in verbose mode */
  debug(message: string): void;
  spinner(message: string): Spinner;
}

/**
 * No-op UI implementation (for testing or silent mode)
 */
export const noopUI: ConnectorUI = {
  info: () => {},
  success: () => {},
  warn: () => {},
  error: () => {},
  debug: () => {},
  spinner: () => ({
    update: () => {},
    succeed: () => {},
    fail: () => {},
    stop: () => {},
  }),
};
