import { ScanError } from '../errors';

/**
 * Typed view over a decoded YAML tree. Lookups never throw: a missing key or a
 * value of the wrong type reads as absent.
 */
export type Value = null | boolean | number | string | ValueList | ValueMap;

export type ValueList = readonly Value[];

export interface ValueMap {
  readonly [key: string]: Value;
}

export function isValueMap(value: Value | undefined): value is ValueMap {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isValueList(value: Value | undefined): value is ValueList {
  return Array.isArray(value);
}

/** Nodes one document may expand to once aliases are resolved. */
export const MAX_DOCUMENT_NODES = 1_000_000;

/**
 * Convert whatever js-yaml produced into a frozen Value tree.
 * Timestamps become ISO strings; anything else that is not JSON-like becomes null.
 * js-yaml resolves aliases to shared (possibly cyclic) objects, so a cycle or a
 * tree larger than MAX_DOCUMENT_NODES is a DECODE_FAILED error.
 */
export function toValue(input: unknown): Value {
  const ancestors = new WeakSet<object>();
  let nodes = 0;

  const convert = (item: unknown): Value => {
    nodes++;
    if (nodes > MAX_DOCUMENT_NODES) {
      throw new ScanError('DECODE_FAILED', `more than ${MAX_DOCUMENT_NODES} nodes after alias expansion`);
    }
    if (item === null || item === undefined) return null;
    if (isScalar(item)) return item;
    if (item instanceof Date) return item.toISOString();
    if (typeof item !== 'object') return null;

    if (ancestors.has(item)) {
      throw new ScanError('DECODE_FAILED', 'recursive alias');
    }
    ancestors.add(item);
    try {
      if (Array.isArray(item)) {
        return Object.freeze(item.map(child => convert(child)));
      }
      const out: Record<string, Value> = {};
      for (const [key, child] of Object.entries(item)) {
        out[key] = convert(child);
      }
      return Object.freeze(out);
    } finally {
      ancestors.delete(item);
    }
  };

  return convert(input);
}

export function isScalar(value: unknown): value is boolean | number | string {
  return typeof value === 'boolean' || typeof value === 'number' || typeof value === 'string';
}

export function hasKey(map: ValueMap | undefined, key: string): boolean {
  return map !== undefined && Object.prototype.hasOwnProperty.call(map, key);
}

export function getMap(map: ValueMap | undefined, key: string): ValueMap | undefined {
  if (!hasKey(map, key)) return undefined;
  const value = map?.[key];
  return isValueMap(value) ? value : undefined;
}

/** Follow a chain of mapping keys; undefined as soon as one link is not a mapping. */
export function getMapPath(map: ValueMap | undefined, ...keys: string[]): ValueMap | undefined {
  let current = map;
  for (const key of keys) {
    current = getMap(current, key);
    if (current === undefined) return undefined;
  }
  return current;
}

export function getList(map: ValueMap | undefined, key: string): ValueList {
  if (!hasKey(map, key)) return [];
  const value = map?.[key];
  return isValueList(value) ? value : [];
}

/** Only the mapping entries of a list; other items are ignored. */
export function getMapList(map: ValueMap | undefined, key: string): ValueMap[] {
  return getList(map, key).filter(isValueMap);
}

export function getString(map: ValueMap | undefined, key: string): string | undefined {
  if (!hasKey(map, key)) return undefined;
  const value = map?.[key];
  return typeof value === 'string' ? value : undefined;
}

/** Any scalar as text (`name: 2024` reads as "2024"). */
export function getScalarString(map: ValueMap | undefined, key: string): string | undefined {
  if (!hasKey(map, key)) return undefined;
  const value = map?.[key];
  return isScalar(value) ? String(value) : undefined;
}

export function getBoolean(map: ValueMap | undefined, key: string): boolean | undefined {
  if (!hasKey(map, key)) return undefined;
  const value = map?.[key];
  return typeof value === 'boolean' ? value : undefined;
}

export function getNumber(map: ValueMap | undefined, key: string): number | undefined {
  if (!hasKey(map, key)) return undefined;
  const value = map?.[key];
  return typeof value === 'number' ? value : undefined;
}

export function isTrue(map: ValueMap | undefined, key: string): boolean {
  return getBoolean(map, key) === true;
}

/** String items of a list; other items are dropped. */
export function getStringList(map: ValueMap | undefined, key: string): string[] {
  return getList(map, key).filter((item): item is string => typeof item === 'string');
}
