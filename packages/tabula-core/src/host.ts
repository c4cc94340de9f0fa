/**
 * Host interop
 *
 * Game hosts keep their own associative objects and only accept data built
 * from them. These helpers convert library mappings into host maps, nested
 * containers included, and back again.
 */

import { filter } from './mapping';
import { isContainer, isSequence } from './tables';
import { Container, Mapping, Predicate } from './types';

// ---------- Host types ----------

export type HostScalar = string | number | boolean | null;

export type HostValue = HostScalar | HostMap;

/**
 * The host environment's associative object
 */
export interface HostMap {
  set(key: string, value: HostValue): void;
  get(key: string): HostValue | undefined;
  has(key: string): boolean;
  keys(): string[];
  readonly size: number;
}

export type HostMapFactory = () => HostMap;

/**
 * In-process host map, used when no host factory is supplied
 */
export class MemoryHostMap implements HostMap {
  private readonly entries = new Map<string, HostValue>();

  set(key: string, value: HostValue): void {
    this.entries.set(key, value);
  }

  get(key: string): HostValue | undefined {
    return this.entries.get(key);
  }

  has(key: string): boolean {
    return this.entries.has(key);
  }

  keys(): string[] {
    return Array.from(this.entries.keys());
  }

  get size(): number {
    return this.entries.size;
  }
}

export const createHostMap: HostMapFactory = () => new MemoryHostMap();

const isHostScalar = (value: unknown): value is HostScalar =>
  value === null || typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean';

const isHostMap = (value: HostValue | undefined): value is HostMap =>
  typeof value === 'object' && value !== null;

// ---------- Conversion ----------

/**
 * Convert a mapping into a host map. Every nested sequence or mapping becomes
 * a host map too; sequences are keyed by index. Leaves the host cannot hold
 * (`undefined`, functions, symbols, class instances) are left out.
 */
export const toHostMap = (container: Container<unknown>, create: HostMapFactory = createHostMap): HostMap => {
  const host = create();
  const entries: Array<[string, unknown]> = isSequence(container)
    ? container.map((value, index): [string, unknown] => [String(index), value])
    : Object.entries(container);

  for (const [key, value] of entries) {
    if (isContainer(value)) {
      host.set(key, toHostMap(value, create));
    } else if (isHostScalar(value)) {
      host.set(key, value);
    }
  }
  return host;
};

/**
 * Read a host map back into plain nested objects
 */
export const fromHostMap = (host: HostMap): Record<string, unknown> => {
  const result: Record<string, unknown> = {};
  for (const key of host.keys()) {
    const value = host.get(key);
    if (value === undefined) continue;
    result[key] = isHostMap(value) ? fromHostMap(value) : value;
  }
  return result;
};

/**
 * `filter` straight into a host map
 */
export const filterToHost = <A>(
  mapping: Mapping<A>,
  predicate: Predicate<A, string>,
  create: HostMapFactory = createHostMap
): HostMap => toHostMap(filter(mapping, predicate), create);

/**
 * Wrap a function so its mapping result comes out as a host map
 */
export const returningHostMap = <A extends unknown[]>(
  fn: (...args: A) => Container<unknown>,
  create: HostMapFactory = createHostMap
) => (...args: A): HostMap => toHostMap(fn(...args), create);
