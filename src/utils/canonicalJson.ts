import _ from 'lodash';

type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

// Sorted keys, compact separators - one byte form per value so a signature
// over it can be reproduced by whoever receives it
export function canonicalize(value: unknown): JsonValue | undefined {
  if (value === null) return null;

  if (value instanceof Date) {
    return value.toISOString();
  }

  if (Array.isArray(value)) {
    return value.map((item) => canonicalize(item) ?? null);
  }

  if (typeof value === 'object' && value !== null && _.isPlainObject(value)) {
    const sorted: { [key: string]: JsonValue } = {};
    for (const key of Object.keys(value).sort()) {
      const member = canonicalize(Reflect.get(value, key));
      if (member !== undefined) {
        // Plain assignment would treat a "__proto__" member as the prototype
        Object.defineProperty(sorted, key, { value: member, enumerable: true, writable: true, configurable: true });
      }
    }
    return sorted;
  }

  switch (typeof value) {
    case 'string':
    case 'boolean':
      return value;
    case 'number':
      return Number.isFinite(value) ? value : null;
    default:
      // undefined, functions, symbols, bigint: not representable
      return undefined;
  }
}

export function canonicalStringify(value: unknown): string {
  const canonical = canonicalize(value);
  if (canonical === undefined) {
    throw new TypeError('Value has no JSON representation');
  }
  return JSON.stringify(canonical);
}
