import { UnsupportedExpressionError } from '../errors.js';
import type { Expr } from '../expression/expr.js';
import {
  acceptsNull,
  isIntegral,
  isNumeric,
  isPrimitive,
  nonNullable,
  typeName,
  typesEqual,
  type PrimitiveName,
  type TypeRef,
} from '../expression/type-system.js';

/**
 * Text is compared byte-wise under the "C" collation, which orders like the
 * in-memory pipeline's ordinal comparison outside the supplementary planes.
 */
export function collateOrdinal(expr: Expr, sql: string): string {
  return isPrimitive(expr.type, 'string') || isPrimitive(expr.type, 'char') ? `${sql} COLLATE "C"` : sql;
}

/** Parameter list shared by every fragment of one statement. */
export interface SqlParams {
  readonly params: unknown[];
  readonly counter: { n: number };
}

const PG_TYPES: Record<PrimitiveName, string | null> = {
  object: null,
  bool: 'boolean',
  char: 'text',
  string: 'text',
  sbyte: 'smallint',
  byte: 'smallint',
  short: 'smallint',
  ushort: 'integer',
  int: 'integer',
  uint: 'bigint',
  long: 'bigint',
  ulong: 'numeric',
  float: 'real',
  double: 'double precision',
  decimal: 'numeric',
  DateTime: 'timestamptz',
  TimeSpan: 'bigint',
  Guid: 'uuid',
};

export function pgType(t: TypeRef): string | null {
  if (t.kind === 'primitive') return PG_TYPES[t.name];
  if (t.kind === 'sequence') {
    const element = pgType(t.element);
    return element === null ? null : `${element}[]`;
  }
  return null;
}

export function quoteIdentifier(name: string): string {
  return `"${name.replace(/"/g, '""')}"`;
}

/** Pushes `value` and returns its placeholder, typed when the type maps to a pg type. */
export function addParam(ctx: SqlParams, value: unknown, type?: TypeRef): string {
  ctx.params.push(value);
  ctx.counter.n += 1;
  const cast = type === undefined ? null : pgType(type);
  return cast === null ? `$${ctx.counter.n}` : `$${ctx.counter.n}::${cast}`;
}

function unsupported(expr: Expr, what: string): never {
  throw new UnsupportedExpressionError(`${what} cannot be translated to SQL`, expr.pos);
}

function isNullConstant(expr: Expr): boolean {
  return expr.kind === 'constant' && (expr.value === null || expr.value === undefined);
}

function compileEquality(expr: Extract<Expr, { kind: 'binary' }>, ctx: SqlParams): string {
  const negate = expr.operator === '!=';
  if (isNullConstant(expr.right) || isNullConstant(expr.left)) {
    const other = isNullConstant(expr.right) ? expr.left : expr.right;
    if (isNullConstant(other)) return negate ? 'FALSE' : 'TRUE';
    return `(${compileSqlExpression(other, ctx)} IS ${negate ? 'NOT ' : ''}NULL)`;
  }
  const left = compileSqlExpression(expr.left, ctx);
  const right = compileSqlExpression(expr.right, ctx);
  if (acceptsNull(expr.left.type) || acceptsNull(expr.right.type)) {
    return `(${left} IS ${negate ? '' : 'NOT '}DISTINCT FROM ${right})`;
  }
  return `(${left} ${negate ? '<>' : '='} ${right})`;
}

function compileBinary(expr: Extract<Expr, { kind: 'binary' }>, ctx: SqlParams): string {
  switch (expr.operator) {
    case '&&':
    case '||': {
      const left = compileSqlExpression(expr.left, ctx);
      const right = compileSqlExpression(expr.right, ctx);
      return `(${left} ${expr.operator === '&&' ? 'AND' : 'OR'} ${right})`;
    }
    case '==':
    case '!=':
      return compileEquality(expr, ctx);
    case '<':
    case '<=':
    case '>':
    case '>=': {
      const left = collateOrdinal(expr.left, compileSqlExpression(expr.left, ctx));
      const right = compileSqlExpression(expr.right, ctx);
      const comparison = `${left} ${expr.operator} ${right}`;
      // A null operand compares false rather than unknown.
      return acceptsNull(expr.left.type) || acceptsNull(expr.right.type)
        ? `COALESCE(${comparison}, FALSE)`
        : `(${comparison})`;
    }
    case '&':
      return `concat(${compileSqlExpression(expr.left, ctx)}, ${compileSqlExpression(expr.right, ctx)})`;
    default:
      break;
  }

  if (expr.operator === '+' && isPrimitive(expr.type, 'string')) {
    return `concat(${compileSqlExpression(expr.left, ctx)}, ${compileSqlExpression(expr.right, ctx)})`;
  }

  const left = compileSqlExpression(expr.left, ctx);
  const right = compileSqlExpression(expr.right, ctx);
  const [leftType, rightType] = expr.signature.params;
  if (leftType !== undefined && isPrimitive(leftType, 'DateTime')) {
    if (rightType !== undefined && isPrimitive(rightType, 'DateTime')) {
      return `(EXTRACT(EPOCH FROM (${left} - ${right})) * 1000)`;
    }
    return `(${left} ${expr.operator} ${right} * interval '1 millisecond')`;
  }
  return `(${left} ${expr.operator} ${right})`;
}

function compileConvert(expr: Extract<Expr, { kind: 'convert' }>, ctx: SqlParams): string {
  const operand = compileSqlExpression(expr.operand, ctx);
  const source = nonNullable(expr.operand.type);
  const target = nonNullable(expr.type);
  if (typesEqual(source, target) || isPrimitive(target, 'object')) return operand;
  if (isPrimitive(source, 'char') && isIntegral(target)) return `ascii(${operand})`;
  if (isPrimitive(target, 'char') && isIntegral(source)) return `chr(${operand})`;
  const cast = pgType(target);
  if (cast === null || !isNumeric(source) || !isNumeric(target)) {
    return unsupported(expr, `Conversion from '${typeName(source)}' to '${typeName(target)}'`);
  }
  if (isIntegral(target) && !isIntegral(source)) return `CAST(trunc(${operand}) AS ${cast})`;
  return `CAST(${operand} AS ${cast})`;
}

function compileAggregate(expr: Extract<Expr, { kind: 'aggregate' }>, ctx: SqlParams): string {
  const sourceType = expr.source.type;
  if (sourceType.kind !== 'sequence' || sourceType.element.kind !== 'primitive') {
    return unsupported(expr, `Aggregate '${expr.method}' over '${typeName(sourceType)}'`);
  }
  if (expr.method === 'Contains' && expr.argument !== null) {
    const value = compileSqlExpression(expr.argument, ctx);
    return `(${value} = ANY(${compileSqlExpression(expr.source, ctx)}))`;
  }
  if (expr.lambda === null && expr.method === 'Count') {
    return `COALESCE(cardinality(${compileSqlExpression(expr.source, ctx)}), 0)`;
  }
  if (expr.lambda === null && expr.method === 'Any') {
    return `COALESCE(cardinality(${compileSqlExpression(expr.source, ctx)}) > 0, FALSE)`;
  }
  return unsupported(expr, `Aggregate '${expr.method}'`);
}

/**
 * Translates a bound predicate or selector to a PostgreSQL fragment. Values
 * become `$n` parameters; entity fields become quoted column names.
 */
export function compileSqlExpression(expr: Expr, ctx: SqlParams): string {
  switch (expr.kind) {
    case 'constant':
      if (expr.value === null || expr.value === undefined) return 'NULL';
      if (typeof expr.value === 'boolean') return expr.value ? 'TRUE' : 'FALSE';
      return addParam(ctx, expr.value, expr.type);
    case 'field':
      if (expr.column === null || expr.target.kind !== 'parameter' || expr.target.depth !== 0) {
        return unsupported(expr, `Member '${expr.name}'`);
      }
      return quoteIdentifier(expr.column);
    case 'property': {
      const template = expr.property.sql;
      if (template === undefined) return unsupported(expr, `Property '${expr.property.name}'`);
      return template(expr.target === null ? '' : compileSqlExpression(expr.target, ctx), []);
    }
    case 'call': {
      const template = expr.method.sql;
      if (template === undefined) return unsupported(expr, `Method '${expr.method.name}'`);
      const target = expr.target === null ? '' : compileSqlExpression(expr.target, ctx);
      return template(target, expr.args.map((a) => compileSqlExpression(a, ctx)));
    }
    case 'aggregate':
      return compileAggregate(expr, ctx);
    case 'index': {
      const target = compileSqlExpression(expr.target, ctx);
      const index = compileSqlExpression(expr.index, ctx);
      if (isPrimitive(expr.target.type, 'string')) return `substr(${target}, ${index} + 1, 1)`;
      return `(${target})[${index} + 1]`;
    }
    case 'unary': {
      const operand = compileSqlExpression(expr.operand, ctx);
      return expr.operator === '!' ? `(NOT ${operand})` : `(-${operand})`;
    }
    case 'binary':
      return compileBinary(expr, ctx);
    case 'conditional': {
      const test = compileSqlExpression(expr.test, ctx);
      const whenTrue = compileSqlExpression(expr.whenTrue, ctx);
      const whenFalse = compileSqlExpression(expr.whenFalse, ctx);
      return `(CASE WHEN ${test} THEN ${whenTrue} ELSE ${whenFalse} END)`;
    }
    case 'convert':
      return compileConvert(expr, ctx);
    case 'array': {
      const values: unknown[] = [];
      for (const element of expr.elements) {
        if (element.kind !== 'constant') return unsupported(element, 'A non-constant array element');
        values.push(element.value);
      }
      return addParam(ctx, values, expr.type);
    }
    case 'parameter':
      return unsupported(expr, 'A whole entity');
    case 'new':
      return unsupported(expr, 'A new(...) projection');
  }
}
