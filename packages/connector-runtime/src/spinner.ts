/**
 * @module @infra-connectors/connector-runtime/spinner
 */

import type { ConnectorUI } from '@infra-connectors/connector-contracts';

/**
 * Run a slow call under a spinner. The spinner starts before `fn` and is
 * marked succeeded or failed after it; errors are rethrown untouched.
 */
export async function withSpinner<T>(ui: ConnectorUI, message: string, fn: () => Promise<T>): Promise<T> {
  const spinner = ui.spinner(message);
  try {
    const result = await fn();
    spinner.succeed();
    return result;
  } catch (error) {
    spinner.fail();
    throw error;
  }
}
