/**
 * tallytree - Dotted-key running totals with formatted output.
 */

// Core
export { Accumulator } from './accumulator.js';
export type { AccumulatorOptions } from './accumulator.js';
export { AccumulatorNode } from './node.js';
export type { NodeValue } from './node.js';

// Config
export { Config, loadConfig } from './config.js';
export { TotalConfigSchema, DEFAULT_TOTAL_CONFIG, MAX_DECIMALS, resolveTotalConfig, totalConfigFromConfig } from './total-config.js';
export type { TotalConfig } from './total-config.js';

// Formatting
export { formatAmount, formatNumber, roundHalfAwayFromZero, parseAmount } from './format.js';

// Errors
export {
  TotalError,
  ConfigNotFoundError,
  ConfigError,
  InvalidInputError,
  InvalidValueError,
  StructuralConflictError,
  ErrorCodes,
} from './errors.js';
export type { ErrorCode, ErrorOptions } from './errors.js';

// Observability
export { Logger } from './observability/index.js';
export type { LogLevel, LogFormat, LoggerOptions, WritableOutput } from './observability/index.js';

export const VERSION = '0.1.0';
