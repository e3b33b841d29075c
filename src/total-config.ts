/**
 * Formatting configuration shared by an accumulator and its nodes.
 */

import { Type, type Static, type TSchema } from '@sinclair/typebox';
import { Value } from '@sinclair/typebox/value';
import type { Config } from './config.js';
import { ConfigError } from './errors.js';

/** Largest number of decimal places a total can be rendered with. */
export const MAX_DECIMALS = 100;

const Decimals = Type.Union([Type.Integer({ minimum: 0, maximum: MAX_DECIMALS }), Type.Literal(false)]);
const Affix = Type.Union([Type.String(), Type.Null()]);

export const TotalConfigSchema = Type.Object(
  {
    /** Decimal places rendered with thousands separators, or `false` to skip. */
    numberFormat: Decimals,
    /** Decimal places to round to when `numberFormat` is off. */
    round: Decimals,
    prefix: Affix,
    suffix: Affix,
  },
  { additionalProperties: false },
);

export type TotalConfig = Readonly<Static<typeof TotalConfigSchema>>;

export const DEFAULT_TOTAL_CONFIG: TotalConfig = Object.freeze({
  numberFormat: 2,
  round: false,
  prefix: null,
  suffix: null,
});

/**
 * Merge `override` over `base` and validate the result. The returned
 * configuration is frozen; `base` is returned as-is when there is nothing
 * to merge.
 */
export function resolveTotalConfig(base: TotalConfig, override?: Partial<TotalConfig> | null): TotalConfig {
  if (override == null || Object.keys(override).length === 0) {
    return base;
  }
  const merged: Record<string, unknown> = { ...base };
  for (const [key, value] of Object.entries(override)) {
    if (value !== undefined) merged[key] = value;
  }
  if (!Value.Check(TotalConfigSchema, merged)) {
    throw toConfigError(TotalConfigSchema, merged);
  }
  return Object.freeze(merged);
}

const FILE_KEYS: ReadonlyArray<[string, keyof TotalConfig]> = [
  ['number_format', 'numberFormat'],
  ['round', 'round'],
  ['prefix', 'prefix'],
  ['suffix', 'suffix'],
];

/**
 * Read the snake_case keys of a configuration section (`total` by
 * default) as a partial total configuration. Unknown keys are ignored.
 */
export function totalConfigFromConfig(config: Config, section: string = 'total'): Partial<TotalConfig> {
  const result: Record<string, unknown> = {};
  for (const [fileKey, configKey] of FILE_KEYS) {
    const value = config.get(`${section}.${fileKey}`);
    if (value !== undefined) {
      result[configKey] = value;
    }
  }
  const schema = Type.Partial(TotalConfigSchema);
  if (!Value.Check(schema, result)) {
    throw toConfigError(schema, result);
  }
  return result;
}

function toConfigError(schema: TSchema, value: unknown): ConfigError {
  for (const error of Value.Errors(schema, value)) {
    const path = error.path.replace(/^\//, '') || '(root)';
    return new ConfigError(`Invalid total configuration at '${path}': ${error.message}`, {
      path,
      value: error.value,
    });
  }
  return new ConfigError('Invalid total configuration');
}
