/**
 * Canonical JSON serialization
 *
 * Deterministic stringify with sorted object keys, used as the input of
 * content hashes. Two values that are logically equal produce the same
 * string regardless of how their objects were constructed.
 *
 * Rules:
 * - object keys are sorted by code unit order
 * - fields whose value is `undefined` are omitted
 * - arrays keep their order (`undefined` items become `null`)
 * - `-0` is written as `0`
 * - non-finite numbers, functions, symbols and bigints are rejected
 */

/**
 * Values accepted by canonicalJson
 */
export type CanonicalValue =
  | null
  | boolean
  | number
  | string
  | undefined
  | readonly CanonicalValue[]
  | { readonly [key: string]: CanonicalValue };

function isPlainObject(value: unknown): value is { readonly [key: string]: CanonicalValue } {
  if (value === null || typeof value !== "object" || Array.isArray(value)) {
    return false;
  }
  const proto = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

function write(value: unknown, path: string): string {
  if (value === null) return "null";

  switch (typeof value) {
    case "boolean":
      return value ? "true" : "false";
    case "string":
      return JSON.stringify(value);
    case "number":
      if (!Number.isFinite(value)) {
        throw new TypeError(`Cannot canonicalize non-finite number at ${path}`);
      }
      return Object.is(value, -0) ? "0" : JSON.stringify(value);
    case "object":
      break;
    default:
      throw new TypeError(`Cannot canonicalize ${typeof value} at ${path}`);
  }

  if (Array.isArray(value)) {
    const items = value.map((item, i) => (item === undefined ? "null" : write(item, `${path}[${i}]`)));
    return `[${items.join(",")}]`;
  }

  if (!isPlainObject(value)) {
    throw new TypeError(`Cannot canonicalize non-plain object at ${path}`);
  }

  const parts: string[] = [];
  for (const key of Object.keys(value).sort()) {
    const field = value[key];
    if (field === undefined) continue;
    parts.push(`${JSON.stringify(key)}:${write(field, `${path}.${key}`)}`);
  }
  return `{${parts.join(",")}}`;
}

/**
 * Serialize a value to its canonical JSON form.
 *
 * @example
 * ```typescript
 * canonicalJson({ b: 1, a: [true, "x"], c: undefined });
 * // '{"a":[true,"x"],"b":1}'
 * ```
 */
export function canonicalJson(value: CanonicalValue): string {
  return write(value, "$");
}
