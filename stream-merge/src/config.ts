// Merge configuration with validation and defaults
// Follows idiomatic TypeScript: plain object configuration, NOT builder pattern

import { ValidationError } from './errors';
import { Strategy } from './strategy';

/**
 * Merge configuration
 */
export interface MergeConfig {
  readonly maxOpen: number; // <= 0 means unbounded, default 0
  readonly strategy: Strategy; // default: process-wide default strategy
}

/**
 * Default configuration values
 */
export const DEFAULT_MAX_OPEN = 0; // unbounded

/**
 * Partial merge configuration (user-provided)
 */
export interface MergeConfigInput {
  readonly maxOpen?: number;
  readonly strategy?: Strategy;
}

/**
 * Validate merge configuration
 * Throws synchronous error if invalid
 */
export function validateConfig(config: MergeConfig): void {
  if (!Number.isInteger(config.maxOpen)) {
    throw new ValidationError(`maxOpen must be an integer, got ${config.maxOpen}`, 'maxOpen');
  }

  if (typeof config.strategy !== 'object' || config.strategy === null) {
    throw new ValidationError('strategy must be an object', 'strategy');
  }

  if (typeof config.strategy.execute !== 'function') {
    throw new ValidationError('strategy.execute must be a function', 'strategy');
  }
}

/**
 * Create a complete MergeConfig from partial input
 * Applies defaults for missing values
 */
export function createConfig(input: MergeConfigInput = {}): MergeConfig {
  const config: MergeConfig = {
    maxOpen: input.maxOpen ?? DEFAULT_MAX_OPEN,
    strategy: input.strategy ?? Strategy.processDefault(),
  };

  // Validate before returning
  validateConfig(config);

  return config;
}

/**
 * Whether the configuration caps the number of open sources
 */
export function isBounded(config: MergeConfig): boolean {
  return config.maxOpen > 0;
}
