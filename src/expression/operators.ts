import { primitive, type PrimitiveName, type TypeRef } from './type-system.js';

export interface OperatorSignature {
  readonly params: readonly TypeRef[];
  readonly result: TypeRef;
}

const ARITHMETIC_TYPES: readonly PrimitiveName[] = ['int', 'uint', 'long', 'ulong', 'float', 'double', 'decimal'];
const RELATIONAL_TYPES: readonly PrimitiveName[] = [
  ...ARITHMETIC_TYPES,
  'string',
  'char',
  'DateTime',
  'TimeSpan',
];

function lifted(
  name: PrimitiveName,
  arity: number,
  result: (nullable: boolean) => TypeRef,
): OperatorSignature[] {
  const signatures: OperatorSignature[] = [
    { params: Array.from({ length: arity }, () => primitive(name)), result: result(false) },
  ];
  const nullable = primitive(name, true);
  if (nullable.kind === 'primitive' && nullable.nullable) {
    signatures.push({ params: Array.from({ length: arity }, () => nullable), result: result(true) });
  }
  return signatures;
}

function sameType(name: PrimitiveName): (nullable: boolean) => TypeRef {
  return (nullable) => primitive(name, nullable);
}

const toBool = (): TypeRef => primitive('bool');

/** `&&` and `||` over bool and bool?. */
export const LOGICAL_SIGNATURES: readonly OperatorSignature[] = lifted('bool', 2, sameType('bool'));

/** `*`, `/` and `%`. */
export const ARITHMETIC_SIGNATURES: readonly OperatorSignature[] = ARITHMETIC_TYPES.flatMap((name) =>
  lifted(name, 2, sameType(name)),
);

/** Comparison operators; the result is bool even for lifted operands. */
export const RELATIONAL_SIGNATURES: readonly OperatorSignature[] = RELATIONAL_TYPES.flatMap((name) =>
  lifted(name, 2, toBool),
);

export const EQUALITY_SIGNATURES: readonly OperatorSignature[] = [
  ...RELATIONAL_SIGNATURES,
  ...lifted('bool', 2, toBool),
  ...lifted('Guid', 2, toBool),
];

function mixed(left: PrimitiveName, right: PrimitiveName, result: PrimitiveName): OperatorSignature[] {
  return [
    { params: [primitive(left), primitive(right)], result: primitive(result) },
    { params: [primitive(left, true), primitive(right, true)], result: primitive(result, true) },
  ];
}

export const ADD_SIGNATURES: readonly OperatorSignature[] = [
  ...ARITHMETIC_SIGNATURES,
  ...mixed('DateTime', 'TimeSpan', 'DateTime'),
  ...lifted('TimeSpan', 2, sameType('TimeSpan')),
];

export const SUBTRACT_SIGNATURES: readonly OperatorSignature[] = [
  ...ADD_SIGNATURES,
  ...mixed('DateTime', 'DateTime', 'TimeSpan'),
];

export const NEGATION_SIGNATURES: readonly OperatorSignature[] = (
  ['int', 'long', 'float', 'double', 'decimal'] as const
).flatMap((name) => lifted(name, 1, sameType(name)));

export const NOT_SIGNATURES: readonly OperatorSignature[] = lifted('bool', 1, sameType('bool'));

/** Sum over a selector; also fixes the result type of the aggregate. */
export const SUM_SIGNATURES: readonly OperatorSignature[] = (
  ['int', 'long', 'float', 'double', 'decimal'] as const
).flatMap((name) => lifted(name, 1, sameType(name)));

/** Average: integral selectors average to double. */
export const AVERAGE_SIGNATURES: readonly OperatorSignature[] = [
  ...lifted('int', 1, sameType('double')),
  ...lifted('long', 1, sameType('double')),
  ...lifted('float', 1, sameType('float')),
  ...lifted('double', 1, sameType('double')),
  ...lifted('decimal', 1, sameType('decimal')),
];
