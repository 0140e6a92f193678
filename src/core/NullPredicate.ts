/**
 * Optional-field model shared by every expander.
 *
 * - absent:  the key is missing from the container
 * - null:    the key is there but its value is empty (null, false, 0, "", [], {}, an empty Map)
 * - present: anything else
 *
 * Whether "absent" ends up omitted or emitted as an empty element is decided
 * per field by the caller, never here.
 */
export type FieldState<T> =
  | { kind: "absent" }
  | { kind: "null" }
  | { kind: "present"; value: T };

export function readField<T extends object, K extends keyof T & string>(
  container: T,
  key: K,
): FieldState<NonNullable<T[K]>> {
  if (!Object.hasOwn(container, key)) return { kind: "absent" };
  const value = container[key];
  if (value === null || value === undefined || isEmptyValue(value)) {
    return { kind: "null" };
  }
  return { kind: "present", value };
}

/** True when `key` is missing from `container` or holds an empty value. */
export function isNull<T extends object>(
  container: T,
  key: keyof T & string,
): boolean {
  return readField(container, key).kind !== "present";
}

function isEmptyValue(value: unknown): boolean {
  if (value === false || value === "") return true;
  if (typeof value === "number") return value === 0 || Number.isNaN(value);
  if (Array.isArray(value)) return value.length === 0;
  if (value instanceof Map) return value.size === 0;
  if (typeof value === "object" && value !== null) {
    return Object.getPrototypeOf(value) === Object.prototype &&
      Object.keys(value).length === 0;
  }
  return false;
}
