/**
 * @file Small type guards for values that arrive untyped (JSON, config
 * modules, caught errors)
 *
 * Narrowing helpers so call sites read parsed input without unsafe casts.
 */

/** Narrow unknown to a generic object record (non-null, non-array). */
export function isObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== "object" || value === null) {
    return false;
  }
  return !Array.isArray(value);
}

/** Check that an object-like value has a given own property key. */
export function hasOwn<T extends string>(obj: unknown, key: T): obj is Record<T, unknown> {
  if (!isObject(obj)) {
    return false;
  }
  return Object.prototype.hasOwnProperty.call(obj, key);
}

/** Narrow to objects that expose a code field (e.g., Node ENOENT). */
export function hasErrorCode(e: unknown): e is { code: unknown } {
  return typeof e === "object" && e !== null && "code" in e;
}

/** Message of a thrown value, whatever was thrown. */
export function errorMessage(e: unknown): string {
  if (e instanceof Error) {
    return e.message;
  }
  if (hasOwn(e, "message")) {
    return String(e.message);
  }
  return String(e);
}

/** Narrow to an array of finite numbers. */
export function isNumberArray(v: unknown): v is number[] {
  return Array.isArray(v) && v.every((x) => typeof x === "number" && Number.isFinite(x));
}

/** Narrow to a non-negative safe integer. */
export function isNonNegativeInteger(v: unknown): v is number {
  return typeof v === "number" && Number.isSafeInteger(v) && v >= 0;
}
