import type { Mapping } from "../types/vo.js";
import { isRecord } from "./isRecord.js";

function isMap<T>(mapping: Mapping<T>): mapping is ReadonlyMap<string, T> {
  return mapping instanceof Map;
}

/**
 * Entries in source order. A Map keeps every key where the file put it; a
 * plain object moves integer-like keys ("2024", "1") to the front.
 */
export function entriesOf<T>(mapping: Mapping<T>): Array<[string, T]> {
  return isMap(mapping) ? [...mapping.entries()] : Object.entries(mapping);
}

export function sizeOf<T>(mapping: Mapping<T>): number {
  return isMap(mapping) ? mapping.size : Object.keys(mapping).length;
}

/** Keys of a YAML mapping may be numbers or booleans; they are read as text. */
export function mappingEntries(value: unknown): Array<[string, unknown]> | undefined {
  if (value instanceof Map) {
    return [...value.entries()].map(([key, item]): [string, unknown] => [String(key), item]);
  }
  return isRecord(value) ? Object.entries(value) : undefined;
}

/** For mappings whose key order carries no meaning. */
export function mappingRecord(value: unknown): Record<string, unknown> | undefined {
  const entries = mappingEntries(value);
  return entries ? Object.fromEntries(entries) : undefined;
}

/** Maps, at any depth, as plain objects, for logging. */
export function toPlain(value: unknown): unknown {
  if (value instanceof Map) {
    return Object.fromEntries(
      [...value.entries()].map(([key, item]) => [String(key), toPlain(item)]),
    );
  }
  if (Array.isArray(value)) return value.map(toPlain);
  if (isRecord(value)) {
    return Object.fromEntries(Object.entries(value).map(([key, item]) => [key, toPlain(item)]));
  }
  return value;
}
