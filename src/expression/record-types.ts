import { ArgumentError } from '../errors.js';
import { typeName, zeroValue, type TypeRef } from './type-system.js';
import { formatValue, hashValue, valuesEqual, type Equatable } from './values.js';

export interface DynamicProperty {
  readonly name: string;
  readonly type: TypeRef;
}

/**
 * Instance of a runtime-generated record type. Values are stored in
 * declaration order; equality and hashing are structural.
 */
export class DynamicRecord implements Equatable {
  constructor(
    readonly recordType: RecordType,
    private readonly values: readonly unknown[],
  ) {}

  get(name: string): unknown {
    const index = this.recordType.indexOf(name);
    if (index < 0) {
      throw new ArgumentError('name', `No property '${name}' exists in type '${this.recordType.name}'`);
    }
    return this.values[index];
  }

  equals(other: unknown): boolean {
    if (!(other instanceof DynamicRecord) || other.recordType !== this.recordType) return false;
    return this.values.every((value, i) => valuesEqual(value, other.values[i]));
  }

  // XOR keeps the hash independent of field order.
  hashCode(): number {
    return this.values.reduce<number>((h, value) => h ^ hashValue(value), 0);
  }

  toString(): string {
    const parts = this.recordType.properties.map((p, i) => {
      const value = this.values[i];
      return `${p.name}=${value instanceof DynamicRecord ? value.toString() : formatValue(value)}`;
    });
    return `{${parts.join(', ')}}`;
  }

  toJSON(): Record<string, unknown> {
    const json: Record<string, unknown> = {};
    this.recordType.properties.forEach((p, i) => {
      json[p.name] = this.values[i];
    });
    return json;
  }
}

export class RecordType {
  private readonly index: ReadonlyMap<string, number>;

  constructor(
    readonly name: string,
    readonly properties: readonly DynamicProperty[],
  ) {
    this.index = new Map(properties.map((p, i) => [p.name.toLowerCase(), i]));
  }

  /** Case-insensitive property lookup; -1 when absent. */
  indexOf(name: string): number {
    return this.index.get(name.toLowerCase()) ?? -1;
  }

  property(name: string): DynamicProperty | undefined {
    const i = this.indexOf(name);
    return i < 0 ? undefined : this.properties[i];
  }

  /**
   * Creates an instance. `values` is either positional (declaration order)
   * or keyed by property name; missing fields take the type's zero value.
   */
  create(values?: readonly unknown[] | Readonly<Record<string, unknown>>): DynamicRecord {
    const resolved = this.properties.map((p, i) => {
      let value: unknown;
      if (Array.isArray(values)) {
        value = values[i];
      } else if (values !== undefined) {
        const key = Object.keys(values).find((k) => k.toLowerCase() === p.name.toLowerCase());
        value = key === undefined ? undefined : Reflect.get(values, key);
      }
      return value === undefined ? zeroValue(p.type) : value;
    });
    return new DynamicRecord(this, resolved);
  }
}

const cache = new Map<string, RecordType>();

function signatureKey(properties: readonly DynamicProperty[]): string {
  return [...properties]
    .sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0))
    .map((p) => `${p.name}:${typeName(p.type)}`)
    .join(',');
}

/**
 * Returns the record type for a property list, creating it on first use.
 * The cache key is the name-sorted signature, so field order does not
 * matter; get-or-create never suspends, which keeps one type per signature.
 */
export function compileRecordType(properties: readonly DynamicProperty[]): RecordType {
  const seen = new Set<string>();
  for (const p of properties) {
    const lower = p.name.toLowerCase();
    if (seen.has(lower)) {
      throw new ArgumentError('properties', `The property '${p.name}' was defined more than once`);
    }
    seen.add(lower);
  }

  const key = signatureKey(properties);
  let recordType = cache.get(key);
  if (recordType === undefined) {
    recordType = new RecordType(`DynamicClass${cache.size + 1}`, properties);
    cache.set(key, recordType);
  }
  return recordType;
}
