/**
 * Shared test fixtures and helpers.
 */

import { fileURLToPath } from 'node:url';
import { Accumulator } from '../src/accumulator.js';
import { Logger, type LogLevel } from '../src/observability/logger.js';
import type { TotalConfig } from '../src/total-config.js';

export function createBufferOutput() {
  const lines: string[] = [];
  return {
    output: { write: (s: string) => lines.push(s) },
    lines,
  };
}

export function createTestLogger(level: LogLevel = 'fatal') {
  const { output, lines } = createBufferOutput();
  return { logger: new Logger({ name: 'test', level, output }), lines };
}

export function createTestAccumulator(config?: Partial<TotalConfig>): Accumulator {
  return new Accumulator(config, { logger: createTestLogger().logger });
}

export function fixturePath(name: string): string {
  return fileURLToPath(new URL(`./fixtures/${name}`, import.meta.url));
}
