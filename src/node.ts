/**
 * AccumulatorNode: one level of a running-total tree.
 */

import { InvalidInputError, InvalidValueError } from './errors.js';
import { formatAmount, parseAmount } from './format.js';
import { DEFAULT_TOTAL_CONFIG, type TotalConfig } from './total-config.js';

export type NodeValue = number | AccumulatorNode;

/**
 * Insertion-ordered map of leaves and nested nodes, carrying the running
 * total of everything added at or beneath it.
 *
 * The node also keeps a cursor (`rewind`, `valid`, `current`, `key`,
 * `next`) for step-wise iteration over its direct children. The
 * `Symbol.iterator`, `keys` and `entries` iterators and `recursiveCount`
 * never touch that cursor.
 */
export class AccumulatorNode implements Iterable<[string, NodeValue]> {
  private _entries: Map<string, NodeValue> = new Map();
  private _total = 0;
  private _cursor = 0;
  private _cursorKeys: string[] | null = null;
  private readonly _config: TotalConfig;

  constructor(config: TotalConfig = DEFAULT_TOTAL_CONFIG) {
    this._config = config;
  }

  /**
   * Detached node reporting `value` as its total, with no children.
   */
  static fromLeaf(value: number, config: TotalConfig = DEFAULT_TOTAL_CONFIG): AccumulatorNode {
    const node = new AccumulatorNode(config);
    node.addTotal(value);
    return node;
  }

  get config(): TotalConfig {
    return this._config;
  }

  addTotal(value: number): void {
    this._total += value;
  }

  total(format: false): number;
  total(format?: boolean): string | number;
  total(format?: boolean): string | number {
    return this.formatResult(this._total, format);
  }

  /**
   * Value stored under `key`. Missing keys read as 0. Numeric values are
   * formatted unless `format` is false; nodes are returned as they are.
   */
  get(key: string, format: false): NodeValue;
  get(key: string, format?: boolean): NodeValue | string;
  get(key: string, format: boolean = true): NodeValue | string {
    const result = this._entries.get(key) ?? 0;
    if (format && typeof result === 'number') {
      return this.formatResult(result);
    }
    return result;
  }

  lookup(key: string): NodeValue | undefined {
    return this._entries.get(key);
  }

  set(key: string, value: NodeValue): void {
    if (value instanceof AccumulatorNode) {
      this._entries.set(key, value);
      this._cursorKeys = null;
      return;
    }
    const amount = parseAmount(value);
    if (amount === null) {
      throw new InvalidValueError(key, value);
    }
    this._entries.set(key, amount);
    this._cursorKeys = null;
  }

  has(key: string): boolean {
    return this._entries.has(key);
  }

  delete(key: string): boolean {
    this._cursorKeys = null;
    return this._entries.delete(key);
  }

  count(): number {
    return this._entries.size;
  }

  /**
   * Count entries across nesting levels. Descent stops at leaves and at
   * layer `depthLimit` (1 = direct children only); `null` means no limit.
   * A node reached at the limit counts as one entry.
   */
  recursiveCount(depthLimit: number | null = null): number {
    if (depthLimit !== null && (!Number.isInteger(depthLimit) || depthLimit < 1)) {
      throw new InvalidInputError(`Depth limit must be a positive integer, got ${depthLimit}`, { depthLimit });
    }
    return countLayer(this, 1, depthLimit);
  }

  formatResult(value: number, format: false): number;
  formatResult(value: number, format?: boolean): string | number;
  formatResult(value: number, format?: boolean): string | number {
    if (format === false) {
      return value;
    }
    return formatAmount(value, this._config);
  }

  keys(): IterableIterator<string> {
    return this._entries.keys();
  }

  entries(): IterableIterator<[string, NodeValue]> {
    return this._entries.entries();
  }

  [Symbol.iterator](): IterableIterator<[string, NodeValue]> {
    return this._entries.entries();
  }

  rewind(): void {
    this._cursor = 0;
  }

  valid(): boolean {
    return this._cursor < this._entries.size;
  }

  key(): string | null {
    return this._entryAtCursor()?.[0] ?? null;
  }

  current(): NodeValue | null {
    return this._entryAtCursor()?.[1] ?? null;
  }

  next(): void {
    if (this.valid()) this._cursor++;
  }

  toString(): string {
    return String(this.total());
  }

  private _entryAtCursor(): [string, NodeValue] | undefined {
    if (!this.valid()) return undefined;
    if (this._cursorKeys === null) {
      this._cursorKeys = [...this._entries.keys()];
    }
    const key = this._cursorKeys[this._cursor];
    const value = this._entries.get(key);
    return value === undefined ? undefined : [key, value];
  }
}

function countLayer(node: AccumulatorNode, layer: number, depthLimit: number | null): number {
  let count = 0;
  for (const [, item] of node) {
    if (!(item instanceof AccumulatorNode) || layer === depthLimit) {
      count++;
    } else {
      count += countLayer(item, layer + 1, depthLimit);
    }
  }
  return count;
}
