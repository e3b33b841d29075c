/**
 * Number rendering for totals: rounding, thousands grouping, prefix/suffix.
 */

import type { TotalConfig } from './total-config.js';

/**
 * Round half away from zero to `places` decimals.
 *
 * Below 1e15 the scaled value is first cut to 15 significant digits so
 * that inputs such as `1.005` (stored as 1.00499...) round up as written.
 * Integers are returned unchanged.
 */
export function roundHalfAwayFromZero(value: number, places: number): number {
  if (Number.isInteger(value)) {
    return value;
  }
  const factor = 10 ** places;
  let scaled = Math.abs(value) * factor;
  if (scaled < 1e15) {
    scaled = Number(scaled.toPrecision(15));
  }
  return (Math.sign(value) * Math.round(scaled)) / factor;
}

/**
 * Fixed decimals with `,` between thousands and `.` before the fraction.
 */
export function formatNumber(value: number, decimals: number): string {
  const rounded = roundHalfAwayFromZero(value, decimals);
  const fixed = Math.abs(rounded).toFixed(decimals);
  const sign = rounded < 0 ? '-' : '';
  const dot = fixed.indexOf('.');
  const integer = dot === -1 ? fixed : fixed.slice(0, dot);
  const fraction = dot === -1 ? '' : fixed.slice(dot);
  return sign + integer.replace(/\B(?=(\d{3})+(?!\d))/g, ',') + fraction;
}

export function formatAmount(value: number, config: TotalConfig): string {
  let rendered: string;
  if (config.numberFormat !== false) {
    rendered = formatNumber(value, config.numberFormat);
  } else if (config.round !== false) {
    rendered = String(roundHalfAwayFromZero(value, config.round));
  } else {
    rendered = String(value);
  }
  return `${config.prefix ?? ''}${rendered}${config.suffix ?? ''}`;
}

/**
 * Read a written value as a finite number, or `null` when it is not one.
 * Numeric strings are accepted; blank strings are not.
 */
export function parseAmount(value: unknown): number | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}
