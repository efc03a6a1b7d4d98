/**
 * Configuration errors: mistakes in the CLI's own definition, caught when the
 * extensions are applied.
 */

import { colors } from '@/bin/utils/colors';
import type { Result } from '@/types';

export class ConfigurationError extends Error {
  readonly extension: string;

  constructor(extension: string, message: string) {
    super(`${extension}: ${message}`);
    this.name = 'ConfigurationError';
    this.extension = extension;
  }
}

/**
 * Top-level policy for configuration errors: report and exit.
 */
export function abortOnConfigurationError<T>(result: Result<T, ConfigurationError>): T {
  if (result.ok) {
    return result.value;
  }
  console.error(colors.red(`Configuration error: ${result.error.message}`));
  process.exit(1);
}
