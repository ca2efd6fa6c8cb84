/** Values with their own equality, such as dynamic records. */
export interface Equatable {
  equals(other: unknown): boolean;
  hashCode(): number;
}

export function isEquatable(value: unknown): value is Equatable {
  return (
    typeof value === 'object' &&
    value !== null &&
    typeof Reflect.get(value, 'equals') === 'function' &&
    typeof Reflect.get(value, 'hashCode') === 'function'
  );
}

/** Structural equality used by `==`, `Contains` and record equality. */
export function valuesEqual(a: unknown, b: unknown): boolean {
  if (a === b) return true;
  if (a === null || a === undefined || b === null || b === undefined) {
    return (a === null || a === undefined) && (b === null || b === undefined);
  }
  if (a instanceof Date && b instanceof Date) return a.getTime() === b.getTime();
  if (isEquatable(a)) return a.equals(b);
  if (Array.isArray(a) && Array.isArray(b)) {
    return a.length === b.length && a.every((item, i) => valuesEqual(item, b[i]));
  }
  return typeof a === 'number' && typeof b === 'number' && Number.isNaN(a) && Number.isNaN(b);
}

function hashString(s: string): number {
  let h = 0;
  for (let i = 0; i < s.length; i++) {
    h = (Math.imul(h, 31) + s.charCodeAt(i)) | 0;
  }
  return h;
}

export function hashValue(value: unknown): number {
  if (value === null || value === undefined) return 0;
  switch (typeof value) {
    case 'boolean':
      return value ? 1 : 0;
    case 'number':
      return Number.isInteger(value) ? (value | 0) ^ Math.floor(value / 0x100000000) : hashString(String(value));
    case 'string':
      return hashString(value);
    default:
      break;
  }
  if (value instanceof Date) return hashValue(value.getTime());
  if (isEquatable(value)) return value.hashCode();
  if (Array.isArray(value)) {
    return value.reduce<number>((h, item) => (Math.imul(h, 31) + hashValue(item)) | 0, 17);
  }
  return 0;
}

/**
 * Total order used for sorting and relational operators. Nulls sort first;
 * strings compare by UTF-16 code unit.
 */
export function compareValues(a: unknown, b: unknown): number {
  const aNull = a === null || a === undefined;
  const bNull = b === null || b === undefined;
  if (aNull || bNull) return aNull && bNull ? 0 : aNull ? -1 : 1;
  if (a instanceof Date && b instanceof Date) return Math.sign(a.getTime() - b.getTime());
  if (typeof a === 'number' && typeof b === 'number') return a < b ? -1 : a > b ? 1 : 0;
  if (typeof a === 'boolean' && typeof b === 'boolean') return Number(a) - Number(b);
  const x = String(a);
  const y = String(b);
  return x < y ? -1 : x > y ? 1 : 0;
}

/** Text form used by string concatenation. */
export function formatValue(value: unknown): string {
  if (value === null || value === undefined) return '';
  if (value instanceof Date) return value.toISOString();
  if (Array.isArray(value)) return `[${value.map(formatValue).join(', ')}]`;
  return String(value);
}
