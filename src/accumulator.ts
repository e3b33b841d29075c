/**
 * Accumulator: dotted-key running totals over a tree of nodes.
 *
 * Writing `'march.first.am'` adds the value to the grand total, to the
 * `march` node, to the `march.first` node and to the `am` leaf, creating
 * whatever does not exist yet. Reading never fails: a missing path reads
 * as an empty node.
 */

import type { Config } from './config.js';
import { InvalidValueError, StructuralConflictError } from './errors.js';
import { parseAmount } from './format.js';
import { AccumulatorNode, type NodeValue } from './node.js';
import { Logger } from './observability/logger.js';
import { DEFAULT_TOTAL_CONFIG, resolveTotalConfig, totalConfigFromConfig, type TotalConfig } from './total-config.js';

export interface AccumulatorOptions {
  logger?: Logger;
}

interface Location {
  parent: AccumulatorNode;
  key: string;
}

export class Accumulator implements Iterable<[string, NodeValue]> {
  private readonly _config: TotalConfig;
  private readonly _root: AccumulatorNode;
  private readonly _logger: Logger;

  constructor(config?: Partial<TotalConfig> | null, options?: AccumulatorOptions) {
    this._config = resolveTotalConfig(DEFAULT_TOTAL_CONFIG, config);
    this._root = new AccumulatorNode(this._config);
    this._logger = options?.logger ?? new Logger({ name: 'tallytree.accumulator' });
  }

  static factory(config?: Partial<TotalConfig> | null, options?: AccumulatorOptions): Accumulator {
    return new Accumulator(config, options);
  }

  /**
   * Build from a loaded configuration, reading its `total` section.
   */
  static fromConfig(config: Config, options?: AccumulatorOptions & { section?: string }): Accumulator {
    return new Accumulator(totalConfigFromConfig(config, options?.section), options);
  }

  get config(): TotalConfig {
    return this._config;
  }

  get root(): AccumulatorNode {
    return this._root;
  }

  /**
   * Add `value` at `dottedKey` and to every node along the path.
   *
   * Nodes created by this call use `configOverride` merged over the
   * accumulator's configuration. Writing to an existing leaf adds to it;
   * writing to an existing node adds to that node's total.
   *
   * @throws InvalidValueError when `value` is not a finite number
   * @throws StructuralConflictError when the path runs through a leaf
   */
  set(dottedKey: string, value: number | string, configOverride?: Partial<TotalConfig> | null): void {
    const amount = parseAmount(value);
    if (amount === null) {
      this._logger.debug('Rejected non-numeric value', { key: dottedKey, value });
      throw new InvalidValueError(dottedKey, value);
    }

    const keys = splitKey(dottedKey);
    const leafPath = this._findLeafOnPath(keys);
    if (leafPath !== null) {
      this._logger.debug('Rejected write beneath a leaf', { key: dottedKey, leaf: leafPath });
      throw new StructuralConflictError(dottedKey, leafPath);
    }

    const config = resolveTotalConfig(this._config, configOverride);

    this._root.addTotal(amount);
    let row = this._root;
    const last = keys.length - 1;
    for (let i = 0; i < last; i++) {
      const key = keys[i];
      const existing = row.lookup(key);
      if (existing instanceof AccumulatorNode) {
        existing.addTotal(amount);
        row = existing;
      } else {
        const child = new AccumulatorNode(config);
        child.addTotal(amount);
        row.set(key, child);
        row = child;
      }
    }

    const leafKey = keys[last];
    const existing = row.lookup(leafKey);
    if (existing === undefined) {
      row.set(leafKey, amount);
    } else if (existing instanceof AccumulatorNode) {
      existing.addTotal(amount);
    } else {
      row.set(leafKey, existing + amount);
    }

    this._logger.debug('Value added', { key: dottedKey, value: amount });
  }

  /**
   * Node at `dottedKey`. A missing path yields a fresh empty node; a path
   * ending on a leaf yields a detached node whose total is the leaf value.
   */
  get(dottedKey: string): AccumulatorNode {
    const location = this._locate(splitKey(dottedKey));
    if (location === null) {
      return new AccumulatorNode(this._config);
    }
    const result = location.parent.lookup(location.key);
    if (result === undefined) {
      return new AccumulatorNode(this._config);
    }
    if (result instanceof AccumulatorNode) {
      return result;
    }
    return AccumulatorNode.fromLeaf(result, location.parent.config);
  }

  /**
   * Scalar at `dottedKey`: a leaf's value or a node's total, 0 when missing.
   */
  value(dottedKey: string, format: false): number;
  value(dottedKey: string, format?: boolean): string | number;
  value(dottedKey: string, format: boolean = true): string | number {
    const location = this._locate(splitKey(dottedKey));
    if (location === null) {
      return this._root.formatResult(0, format);
    }
    const result = location.parent.get(location.key, false);
    if (result instanceof AccumulatorNode) {
      return result.total(format);
    }
    return location.parent.formatResult(result, format);
  }

  has(dottedKey: string): boolean {
    const location = this._locate(splitKey(dottedKey));
    return location !== null && location.parent.has(location.key);
  }

  /**
   * Remove the entry at `dottedKey`. Totals along the path keep the
   * removed amount.
   */
  delete(dottedKey: string): boolean {
    const location = this._locate(splitKey(dottedKey));
    return location !== null && location.parent.delete(location.key);
  }

  total(format: false): number;
  total(format?: boolean): string | number;
  total(format?: boolean): string | number {
    return this._root.total(format);
  }

  count(): number {
    return this._root.count();
  }

  recursiveCount(depthLimit: number | null = null): number {
    return this._root.recursiveCount(depthLimit);
  }

  current(): NodeValue | null {
    return this._root.current();
  }

  key(): string | null {
    return this._root.key();
  }

  next(): void {
    this._root.next();
  }

  rewind(): void {
    this._root.rewind();
  }

  valid(): boolean {
    return this._root.valid();
  }

  [Symbol.iterator](): IterableIterator<[string, NodeValue]> {
    return this._root.entries();
  }

  toString(): string {
    return this._root.toString();
  }

  /**
   * Parent node and final key of a path, or null when an intermediate
   * segment is missing or is a leaf.
   */
  private _locate(keys: string[]): Location | null {
    let parent = this._root;
    for (let i = 0; i < keys.length - 1; i++) {
      const next = parent.lookup(keys[i]);
      if (!(next instanceof AccumulatorNode)) {
        return null;
      }
      parent = next;
    }
    return { parent, key: keys[keys.length - 1] };
  }

  /**
   * Dotted path of the first leaf a write to `keys` would have to nest
   * under, or null when the path is clear.
   */
  private _findLeafOnPath(keys: string[]): string | null {
    let row = this._root;
    for (let i = 0; i < keys.length - 1; i++) {
      const next = row.lookup(keys[i]);
      if (next === undefined) {
        return null;
      }
      if (!(next instanceof AccumulatorNode)) {
        return keys.slice(0, i + 1).join('.');
      }
      row = next;
    }
    return null;
  }
}

function splitKey(dottedKey: string): string[] {
  return dottedKey.split('.');
}
