import { cloneDeep } from 'lodash-es';

export function deepCopy<T>(v: T): T {
  return cloneDeep(v);
}

// Index a list by a key, later entries win on duplicate keys
export function indexBy<K, V>(
  values: Iterable<V>,
  keyFn: (value: V) => K,
): Map<K, V> {
  const index = new Map<K, V>();
  for (const value of values) index.set(keyFn(value), value);
  return index;
}
