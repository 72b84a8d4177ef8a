import { ConfigManager } from '../../core/config.js';
import { createLogger, setLogger } from '../../core/logger.js';
import type { CadenceConfig, CadenceConfigInput } from '../../core/types.js';

export type GlobalOptions = {
  verbose?: boolean;
};

/**
 * Load configuration for a command and install the matching logger.
 */
export function loadCommandConfig(globals: GlobalOptions, overrides?: CadenceConfigInput): CadenceConfig {
  const config = new ConfigManager().load(overrides);
  const verbose = globals.verbose ?? config.logging.verbose;
  setLogger(createLogger({ verbose, level: config.logging.level }));
  return config;
}

export function parseInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new Error(`Expected an integer, got "${value}"`);
  }
  return parsed;
}
