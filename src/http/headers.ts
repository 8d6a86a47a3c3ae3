/**
 * Case-insensitive header multimap.
 *
 * @module http/headers
 */

import type { HeaderCollection } from '../signing/types.js';

/**
 * Header input accepted by {@link HeaderMultimap}: a plain object (array
 * values become repeated headers), a list of pairs, or another collection.
 */
export type HeaderInput =
  | Record<string, string | readonly string[]>
  | Iterable<readonly [string, string]>
  | HeaderCollection;

function isHeaderCollection(init: HeaderInput): init is HeaderCollection {
  return 'entries' in init && typeof init.entries === 'function' && 'append' in init;
}

function isPairIterable(init: HeaderInput): init is Iterable<readonly [string, string]> {
  return Symbol.iterator in init;
}

/**
 * Ordered multimap of HTTP headers.
 *
 * Names compare case-insensitively but keep the spelling they were added
 * with. Repeated names keep every value, in insertion order.
 *
 * @example
 * ```typescript
 * const headers = new HeaderMultimap({ 'Content-Type': 'application/json' });
 * headers.append('X-Tag', 'a');
 * headers.append('x-tag', 'b');
 *
 * headers.get('content-type'); // ['application/json']
 * headers.get('X-TAG');        // ['a', 'b']
 * ```
 */
export class HeaderMultimap implements HeaderCollection {
  private readonly items: Array<[string, string]> = [];

  constructor(init?: HeaderInput) {
    if (!init) {
      return;
    }

    if (isHeaderCollection(init) || isPairIterable(init)) {
      const pairs = isHeaderCollection(init) ? init.entries() : init;
      for (const [name, value] of pairs) {
        this.append(name, value);
      }
      return;
    }

    for (const [name, value] of Object.entries(init)) {
      if (typeof value === 'string') {
        this.append(name, value);
      } else {
        for (const item of value) {
          this.append(name, item);
        }
      }
    }
  }

  get(name: string): string[] {
    const key = name.toLowerCase();
    return this.items.filter(([n]) => n.toLowerCase() === key).map(([, v]) => v);
  }

  /**
   * First value stored under `name`, if any.
   */
  first(name: string): string | undefined {
    return this.get(name)[0];
  }

  has(name: string): boolean {
    const key = name.toLowerCase();
    return this.items.some(([n]) => n.toLowerCase() === key);
  }

  append(name: string, value: string): void {
    this.items.push([name, value]);
  }

  /**
   * Replace all values for `name`. The new value takes the position of the
   * first existing one, or goes to the end when the name is new.
   */
  set(name: string, value: string): void {
    const key = name.toLowerCase();
    const index = this.items.findIndex(([n]) => n.toLowerCase() === key);
    this.delete(name);

    if (index === -1) {
      this.items.push([name, value]);
    } else {
      this.items.splice(index, 0, [name, value]);
    }
  }

  delete(name: string): void {
    const key = name.toLowerCase();
    for (let i = this.items.length - 1; i >= 0; i--) {
      const item = this.items[i];
      if (item && item[0].toLowerCase() === key) {
        this.items.splice(i, 1);
      }
    }
  }

  entries(): IterableIterator<[string, string]> {
    return this.items.map(([n, v]): [string, string] => [n, v])[Symbol.iterator]();
  }

  [Symbol.iterator](): IterableIterator<[string, string]> {
    return this.entries();
  }

  get size(): number {
    return this.items.length;
  }
}
