/**
 * Deep merge for settings inheritance (`extends` chains and overrides)
 */

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (Object.prototype.toString.call(value) !== '[object Object]') {
    return false;
  }
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  const proto: unknown = Reflect.getPrototypeOf(value);
  return proto === null || proto === Object.prototype;
}

const FORBIDDEN_KEYS = new Set(['__proto__', 'constructor', 'prototype']);

/**
 * Merge `source` over `target`.
 *
 * - plain objects merge recursively
 * - arrays are replaced, never concatenated
 * - `undefined` in source keeps the target value
 * - anything else in source wins
 */
export function deepMerge(target: unknown, source: unknown): unknown {
  if (source === undefined) {
    return target;
  }
  if (!isPlainObject(source) || !isPlainObject(target)) {
    return source;
  }

  const result: Record<string, unknown> = { ...target };
  for (const [key, value] of Object.entries(source)) {
    if (FORBIDDEN_KEYS.has(key)) {
      continue;
    }
    result[key] = deepMerge(result[key], value);
  }
  return result;
}

/**
 * Merge several layers left to right
 */
export function mergeLayers(layers: readonly unknown[]): Record<string, unknown> {
  let merged: Record<string, unknown> = {};
  for (const layer of layers) {
    const next = deepMerge(merged, layer);
    merged = isPlainObject(next) ? next : merged;
  }
  return merged;
}
