import { ArgumentError } from '../errors.js';
import type { EntityType } from '../entity/schema.js';
import type { RecordType } from './record-types.js';

export const PRIMITIVE_NAMES = [
  'object',
  'bool',
  'char',
  'string',
  'sbyte',
  'byte',
  'short',
  'ushort',
  'int',
  'uint',
  'long',
  'ulong',
  'float',
  'double',
  'decimal',
  'DateTime',
  'TimeSpan',
  'Guid',
] as const;

export type PrimitiveName = (typeof PRIMITIVE_NAMES)[number];

export type TypeRef =
  | { readonly kind: 'primitive'; readonly name: PrimitiveName; readonly nullable: boolean }
  | { readonly kind: 'entity'; readonly entity: EntityType }
  | { readonly kind: 'record'; readonly record: RecordType }
  | { readonly kind: 'sequence'; readonly element: TypeRef }
  | { readonly kind: 'null' };

/**
 * Literal information carried by constants parsed from source text or
 * supplied as external values. Numeric literals may convert to any numeric
 * type whose range contains them.
 */
export interface LiteralInfo {
  readonly kind: 'integer' | 'real';
  readonly value: number;
}

const primitiveCache = new Map<string, TypeRef>();

export function primitive(name: PrimitiveName, nullable = false): TypeRef {
  const canBeNullable = nullable && isValueTypeName(name);
  const key = canBeNullable ? `${name}?` : name;
  let t = primitiveCache.get(key);
  if (t === undefined) {
    t = { kind: 'primitive', name, nullable: canBeNullable };
    primitiveCache.set(key, t);
  }
  return t;
}

export const NULL_TYPE: TypeRef = { kind: 'null' };
export const BOOL = primitive('bool');
export const INT = primitive('int');
export const STRING = primitive('string');
export const OBJECT = primitive('object');

export function sequenceOf(element: TypeRef): TypeRef {
  return { kind: 'sequence', element };
}

export function entityType(entity: EntityType): TypeRef {
  return { kind: 'entity', entity };
}

export function recordType(record: RecordType): TypeRef {
  return { kind: 'record', record };
}

const SIGNED_INTEGRAL = new Set<PrimitiveName>(['sbyte', 'short', 'int', 'long']);
const UNSIGNED_INTEGRAL = new Set<PrimitiveName>(['byte', 'ushort', 'uint', 'ulong']);
const FLOATING = new Set<PrimitiveName>(['float', 'double', 'decimal']);
const REFERENCE = new Set<PrimitiveName>(['object', 'string']);

const INTEGRAL_RANGES: Record<string, readonly [number, number]> = {
  sbyte: [-128, 127],
  byte: [0, 255],
  short: [-32768, 32767],
  ushort: [0, 65535],
  int: [-2147483648, 2147483647],
  uint: [0, 4294967295],
  long: [Number.MIN_SAFE_INTEGER, Number.MAX_SAFE_INTEGER],
  ulong: [0, Number.MAX_SAFE_INTEGER],
  char: [0, 65535],
};

// Implicit numeric conversions; identity is handled separately.
const WIDENING: Record<string, readonly PrimitiveName[]> = {
  sbyte: ['short', 'int', 'long', 'float', 'double', 'decimal'],
  byte: ['short', 'ushort', 'int', 'uint', 'long', 'ulong', 'float', 'double', 'decimal'],
  short: ['int', 'long', 'float', 'double', 'decimal'],
  ushort: ['int', 'uint', 'long', 'ulong', 'float', 'double', 'decimal'],
  int: ['long', 'float', 'double', 'decimal'],
  uint: ['long', 'ulong', 'float', 'double', 'decimal'],
  long: ['float', 'double', 'decimal'],
  ulong: ['float', 'double', 'decimal'],
  char: ['ushort', 'int', 'uint', 'long', 'ulong', 'float', 'double', 'decimal'],
  float: ['double'],
};

export function isValueTypeName(name: PrimitiveName): boolean {
  return !REFERENCE.has(name);
}

export function isIntegralName(name: PrimitiveName): boolean {
  return SIGNED_INTEGRAL.has(name) || UNSIGNED_INTEGRAL.has(name);
}

export function isNumericName(name: PrimitiveName): boolean {
  return isIntegralName(name) || FLOATING.has(name);
}

const PRIMITIVE_NAME_SET: ReadonlySet<string> = new Set(PRIMITIVE_NAMES);

export function isPrimitiveName(name: string): name is PrimitiveName {
  return PRIMITIVE_NAME_SET.has(name);
}

export function isNumeric(t: TypeRef): boolean {
  return t.kind === 'primitive' && isNumericName(t.name);
}

export function isIntegral(t: TypeRef): boolean {
  return t.kind === 'primitive' && isIntegralName(t.name);
}

export function isNullable(t: TypeRef): boolean {
  return t.kind === 'primitive' && t.nullable;
}

/** True when values of the type can be null: nullable value types and all reference types. */
export function acceptsNull(t: TypeRef): boolean {
  if (t.kind === 'primitive') return t.nullable || !isValueTypeName(t.name);
  return true;
}

export function isPrimitive(t: TypeRef, name: PrimitiveName): boolean {
  return t.kind === 'primitive' && t.name === name;
}

export function nonNullable(t: TypeRef): TypeRef {
  return t.kind === 'primitive' && t.nullable ? primitive(t.name) : t;
}

export function toNullable(t: TypeRef): TypeRef {
  return t.kind === 'primitive' ? primitive(t.name, true) : t;
}

export function typesEqual(a: TypeRef, b: TypeRef): boolean {
  if (a === b) return true;
  switch (a.kind) {
    case 'primitive':
      return b.kind === 'primitive' && a.name === b.name && a.nullable === b.nullable;
    case 'entity':
      return b.kind === 'entity' && a.entity === b.entity;
    case 'record':
      return b.kind === 'record' && a.record === b.record;
    case 'sequence':
      return b.kind === 'sequence' && typesEqual(a.element, b.element);
    case 'null':
      return b.kind === 'null';
  }
}

export function typeName(t: TypeRef): string {
  switch (t.kind) {
    case 'primitive':
      return t.nullable ? `${t.name}?` : t.name;
    case 'entity':
      return t.entity.name;
    case 'record':
      return t.record.name;
    case 'sequence':
      return `${typeName(t.element)}[]`;
    case 'null':
      return 'null';
  }
}

// Integer literals fit any type whose range holds them; real literals only double and decimal.
function literalFits(literal: LiteralInfo, target: PrimitiveName): boolean {
  if (literal.kind === 'real') return target === 'double' || target === 'decimal';
  if (FLOATING.has(target)) return true;
  if (!isIntegralName(target)) return false;
  const range = INTEGRAL_RANGES[target];
  return range !== undefined && literal.value >= range[0] && literal.value <= range[1];
}

function primitiveConvertible(source: PrimitiveName, target: PrimitiveName): boolean {
  return source === target || (WIDENING[source]?.includes(target) ?? false);
}

/**
 * Implicit conversion check. Literals widen into any numeric type
 * that can hold their value.
 */
export function isImplicitlyConvertible(
  source: TypeRef,
  target: TypeRef,
  literal?: LiteralInfo,
): boolean {
  if (typesEqual(source, target)) return true;
  if (target.kind === 'primitive' && target.name === 'object') return true;
  if (source.kind === 'null') return acceptsNull(target);

  if (source.kind === 'sequence' && target.kind === 'sequence') {
    return isImplicitlyConvertible(source.element, target.element);
  }
  if (source.kind !== 'primitive' || target.kind !== 'primitive') return false;

  // Nullable to non-nullable is never implicit.
  if (source.nullable && !target.nullable) return false;

  if (literal !== undefined && !source.nullable && isNumericName(target.name)) {
    if (literalFits(literal, target.name)) return true;
  }
  return primitiveConvertible(source.name, target.name);
}

/**
 * Ranks two candidate parameter types for an argument of type `source`.
 * Returns 1 when `t1` is the better target, -1 when `t2` is, 0 when neither.
 */
export function compareConversions(source: TypeRef, t1: TypeRef, t2: TypeRef): number {
  if (typesEqual(t1, t2)) return 0;
  if (typesEqual(source, t1)) return 1;
  if (typesEqual(source, t2)) return -1;
  const t1t2 = isImplicitlyConvertible(t1, t2);
  const t2t1 = isImplicitlyConvertible(t2, t1);
  if (t1t2 && !t2t1) return 1;
  if (t2t1 && !t1t2) return -1;
  if (isSigned(t1) && isUnsigned(t2)) return 1;
  if (isSigned(t2) && isUnsigned(t1)) return -1;
  return 0;
}

function isSigned(t: TypeRef): boolean {
  return t.kind === 'primitive' && SIGNED_INTEGRAL.has(t.name);
}

function isUnsigned(t: TypeRef): boolean {
  return t.kind === 'primitive' && UNSIGNED_INTEGRAL.has(t.name);
}

/** Value of a type's unset field, e.g. `0` for `int` and `null` for `string` or `int?`. */
export function zeroValue(t: TypeRef): unknown {
  if (t.kind !== 'primitive' || t.nullable) return null;
  switch (t.name) {
    case 'bool':
      return false;
    case 'char':
      return '\0';
    case 'DateTime':
      // 0001-01-01T00:00:00Z
      return new Date(-62135596800000);
    case 'Guid':
      return '00000000-0000-0000-0000-000000000000';
    case 'object':
    case 'string':
      return null;
    default:
      return 0;
  }
}

/**
 * Parses a declared type name such as `int`, `DateTime?` or `string[]`.
 * Common aliases (`Int32`, `Boolean`, `String`, ...) are accepted.
 */
export function parseTypeName(text: string): TypeRef {
  const trimmed = text.trim();
  if (trimmed.endsWith('[]')) {
    return sequenceOf(parseTypeName(trimmed.slice(0, -2)));
  }
  const nullable = trimmed.endsWith('?');
  const base = nullable ? trimmed.slice(0, -1) : trimmed;
  const name = resolvePrimitiveName(base);
  if (name === undefined) {
    throw new ArgumentError('type', `Unknown type name '${text}'`);
  }
  if (nullable && !isValueTypeName(name)) {
    throw new ArgumentError('type', `Type '${name}' has no nullable form`);
  }
  return primitive(name, nullable);
}

const TYPE_ALIASES: Record<string, PrimitiveName> = {
  object: 'object',
  boolean: 'bool',
  bool: 'bool',
  char: 'char',
  string: 'string',
  sbyte: 'sbyte',
  byte: 'byte',
  short: 'short',
  int16: 'short',
  ushort: 'ushort',
  uint16: 'ushort',
  int: 'int',
  int32: 'int',
  uint: 'uint',
  uint32: 'uint',
  long: 'long',
  int64: 'long',
  ulong: 'ulong',
  uint64: 'ulong',
  float: 'float',
  single: 'float',
  double: 'double',
  decimal: 'decimal',
  datetime: 'DateTime',
  timespan: 'TimeSpan',
  guid: 'Guid',
};

/** Case-insensitive lookup of a primitive type keyword or alias. */
export function resolvePrimitiveName(name: string): PrimitiveName | undefined {
  return TYPE_ALIASES[name.toLowerCase()];
}

/** Static type of an external value supplied to a parse. */
export function typeOfValue(value: unknown): TypeRef | undefined {
  if (value === null || value === undefined) return NULL_TYPE;
  switch (typeof value) {
    case 'boolean':
      return BOOL;
    case 'string':
      return STRING;
    case 'number':
      return Number.isInteger(value) && value >= -2147483648 && value <= 2147483647
        ? INT
        : Number.isInteger(value)
          ? primitive('long')
          : primitive('double');
    case 'bigint':
      return primitive('long');
    default:
      break;
  }
  if (value instanceof Date) return primitive('DateTime');
  if (Array.isArray(value)) {
    let element: TypeRef | undefined;
    for (const item of value) {
      const t = typeOfValue(item);
      if (t === undefined) return undefined;
      if (element === undefined) {
        element = t;
      } else if (element.kind === 'null') {
        element = t.kind === 'null' ? element : toNullable(t);
      } else if (t.kind === 'null') {
        element = toNullable(element);
      } else if (!typesEqual(element, t)) {
        if (isImplicitlyConvertible(element, t)) element = t;
        else if (!isImplicitlyConvertible(t, element)) element = OBJECT;
      }
    }
    return sequenceOf(element === undefined || element.kind === 'null' ? OBJECT : element);
  }
  return undefined;
}
