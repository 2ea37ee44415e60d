/**
 * Optional Field Presence
 *
 * Optional attributes arrive in one of three states: absent (`undefined`),
 * explicitly cleared (`null`) or present with a value. Zero, `false` and the
 * empty string are values. Callers inspect presence through these helpers
 * instead of comparing against sentinels.
 */

export type OptionalField<T> = T | null | undefined;

export type FieldPresence = "absent" | "null" | "value";

export function fieldPresence<T>(value: OptionalField<T>): FieldPresence {
  if (value === undefined) return "absent";
  if (value === null) return "null";
  return "value";
}

export function isSet<T>(value: OptionalField<T>): value is T {
  return value !== undefined && value !== null;
}

export function valueOr<T>(value: OptionalField<T>, fallback: T): T {
  return isSet(value) ? value : fallback;
}

/**
 * A reference string (name or id) counts as provided only when it is set
 * and non-empty. An empty reference selects nothing.
 */
export function hasText(value: OptionalField<string>): value is string {
  return isSet(value) && value.length > 0;
}
