import type { BoundOrdering, Expr } from './expr.js';
import { DynamicRecord } from './record-types.js';
import { isIntegralName, isPrimitive, type PrimitiveName, type TypeRef } from './type-system.js';
import { compareValues, formatValue, valuesEqual } from './values.js';

/** Values of the enclosing `it` scopes, outermost first. */
export type Scope = readonly unknown[];
export type Evaluator = (scope: Scope) => unknown;

const isNull = (value: unknown): value is null | undefined => value === null || value === undefined;

function readMember(target: unknown, name: string): unknown {
  if (isNull(target)) return null;
  if (target instanceof DynamicRecord) return target.get(name);
  if (typeof target === 'object') return Reflect.get(target, name) ?? null;
  return null;
}

function toNumber(value: unknown): number {
  if (typeof value === 'number') return value;
  if (typeof value === 'string') return value.charCodeAt(0);
  if (value instanceof Date) return value.getTime();
  return Number(value);
}

function wrapIntegral(name: PrimitiveName, n: number): number {
  switch (name) {
    case 'sbyte':
      return (n << 24) >> 24;
    case 'byte':
      return n & 0xff;
    case 'short':
      return (n << 16) >> 16;
    case 'ushort':
      return n & 0xffff;
    case 'int':
      return n | 0;
    case 'uint':
      return n >>> 0;
    default:
      return n;
  }
}

/** Runtime conversion to `target`; integral targets truncate and wrap like unchecked casts. */
export function convertValue(value: unknown, target: TypeRef): unknown {
  if (isNull(value) || target.kind !== 'primitive') return value ?? null;
  const name = target.name;
  if (name === 'char') {
    return typeof value === 'number' ? String.fromCharCode(value & 0xffff) : value;
  }
  if (isIntegralName(name)) return wrapIntegral(name, Math.trunc(toNumber(value)));
  if (name === 'float') return Math.fround(toNumber(value));
  if (name === 'double' || name === 'decimal') return toNumber(value);
  return value;
}

function divideByZero(): never {
  throw new RangeError('Attempted to divide by zero.');
}

function arithmetic(expr: Extract<Expr, { kind: 'binary' }>): (a: unknown, b: unknown) => unknown {
  const [left, right] = expr.signature.params;
  const result = expr.type;
  if (left !== undefined && isPrimitive(left, 'DateTime')) {
    if (right !== undefined && isPrimitive(right, 'DateTime')) {
      return (a, b) => toNumber(a) - toNumber(b);
    }
    return expr.operator === '+'
      ? (a, b) => new Date(toNumber(a) + toNumber(b))
      : (a, b) => new Date(toNumber(a) - toNumber(b));
  }

  const name = result.kind === 'primitive' ? result.name : 'double';
  const integral = isIntegralName(name);
  const exact = integral || name === 'decimal';
  const finish = integral
    ? (n: number) => wrapIntegral(name, n)
    : name === 'float'
      ? Math.fround
      : (n: number) => n;

  switch (expr.operator) {
    case '+':
      return (a, b) => finish(toNumber(a) + toNumber(b));
    case '-':
      return (a, b) => finish(toNumber(a) - toNumber(b));
    case '*':
      // Products of 32-bit operands can pass 2^53; Math.imul keeps the low 32 bits exact.
      if (integral && name !== 'long' && name !== 'ulong') {
        return (a, b) => finish(Math.imul(toNumber(a), toNumber(b)));
      }
      return (a, b) => finish(toNumber(a) * toNumber(b));
    case '/':
      return (a, b) => {
        const divisor = toNumber(b);
        if (exact && divisor === 0) divideByZero();
        const quotient = toNumber(a) / divisor;
        return finish(integral ? Math.trunc(quotient) : quotient);
      };
    case '%':
      return (a, b) => {
        const divisor = toNumber(b);
        if (exact && divisor === 0) divideByZero();
        return finish(toNumber(a) % divisor);
      };
    default:
      throw new RangeError(`Operator '${expr.operator}' is not arithmetic`);
  }
}

function compileBinary(expr: Extract<Expr, { kind: 'binary' }>): Evaluator {
  const left = compileExpr(expr.left);
  const right = compileExpr(expr.right);

  switch (expr.operator) {
    // Three-valued logic for bool? operands.
    case '&&':
      return (s) => {
        const a = left(s);
        if (a === false) return false;
        const b = right(s);
        if (b === false) return false;
        return isNull(a) || isNull(b) ? null : true;
      };
    case '||':
      return (s) => {
        const a = left(s);
        if (a === true) return true;
        const b = right(s);
        if (b === true) return true;
        return isNull(a) || isNull(b) ? null : false;
      };
    case '==':
      return (s) => valuesEqual(left(s), right(s));
    case '!=':
      return (s) => !valuesEqual(left(s), right(s));
    case '<':
    case '<=':
    case '>':
    case '>=': {
      const test = {
        '<': (c: number) => c < 0,
        '<=': (c: number) => c <= 0,
        '>': (c: number) => c > 0,
        '>=': (c: number) => c >= 0,
      }[expr.operator];
      return (s) => {
        const a = left(s);
        const b = right(s);
        return isNull(a) || isNull(b) ? false : test(compareValues(a, b));
      };
    }
    case '&':
      return (s) => formatValue(left(s)) + formatValue(right(s));
    case '+':
      if (isPrimitive(expr.type, 'string')) {
        return (s) => formatValue(left(s)) + formatValue(right(s));
      }
      break;
    default:
      break;
  }

  const apply = arithmetic(expr);
  return (s) => {
    const a = left(s);
    const b = right(s);
    return isNull(a) || isNull(b) ? null : apply(a, b);
  };
}

function sequenceOf(value: unknown): readonly unknown[] | null {
  return Array.isArray(value) ? value : null;
}

function noElements(): never {
  throw new RangeError('Sequence contains no elements');
}

function compileAggregate(expr: Extract<Expr, { kind: 'aggregate' }>): Evaluator {
  const source = compileExpr(expr.source);
  const lambda = expr.lambda === null ? null : compileExpr(expr.lambda);
  const argument = expr.argument === null ? null : compileExpr(expr.argument);
  const apply = (s: Scope, item: unknown): unknown => (lambda === null ? item : lambda([...s, item]));
  const matches = (s: Scope, item: unknown): boolean => lambda === null || apply(s, item) === true;
  const selected = (s: Scope, items: readonly unknown[]): unknown[] =>
    items.map((item) => apply(s, item)).filter((v) => !isNull(v));

  const evaluate = (s: Scope, items: readonly unknown[]): unknown => {
    switch (expr.method) {
      case 'Where':
        return items.filter((item) => matches(s, item));
      case 'Any':
        return items.some((item) => matches(s, item));
      case 'All':
        return items.every((item) => matches(s, item));
      case 'Count':
        return items.filter((item) => matches(s, item)).length;
      case 'First': {
        const found = items.find((item) => matches(s, item));
        return found === undefined ? noElements() : found;
      }
      case 'Contains': {
        const value = argument === null ? null : argument(s);
        return items.some((item) => valuesEqual(item, value));
      }
      case 'Min':
      case 'Max': {
        const values = selected(s, items);
        if (values.length === 0) return isNullableType(expr.type) ? null : noElements();
        const sign = expr.method === 'Min' ? -1 : 1;
        return values.reduce((best, v) => (Math.sign(compareValues(v, best)) === sign ? v : best));
      }
      case 'Sum':
        return selected(s, items).reduce<number>((sum, v) => sum + toNumber(v), 0);
      case 'Average': {
        const values = selected(s, items);
        if (values.length === 0) return isNullableType(expr.type) ? null : noElements();
        return values.reduce<number>((sum, v) => sum + toNumber(v), 0) / values.length;
      }
    }
  };

  return (s) => {
    const items = sequenceOf(source(s));
    return items === null ? null : evaluate(s, items);
  };
}

function isNullableType(t: TypeRef): boolean {
  return t.kind !== 'primitive' || t.nullable || t.name === 'string' || t.name === 'object';
}

function compileIndex(expr: Extract<Expr, { kind: 'index' }>): Evaluator {
  const target = compileExpr(expr.target);
  const index = compileExpr(expr.index);
  return (s) => {
    const value = target(s);
    const i = index(s);
    if (isNull(value) || typeof i !== 'number') return null;
    if (typeof value === 'string') {
      if (i < 0 || i >= value.length) throw new RangeError('Index was outside the bounds of the array.');
      return value.charAt(i);
    }
    const items = sequenceOf(value);
    if (items === null) return null;
    if (i < 0 || i >= items.length) throw new RangeError('Index was outside the bounds of the array.');
    return items[i];
  };
}

/**
 * Compiles a bound expression into a closure. The tree is walked once here;
 * evaluating the closure does not revisit it.
 */
export function compileExpr(expr: Expr): Evaluator {
  switch (expr.kind) {
    case 'constant': {
      const value = expr.value;
      return () => value;
    }
    case 'parameter': {
      const depth = expr.depth;
      return (s) => s[depth] ?? null;
    }
    case 'field': {
      const target = compileExpr(expr.target);
      const name = expr.name;
      return (s) => readMember(target(s), name);
    }
    case 'property': {
      const property = expr.property;
      if (expr.target === null) return () => property.evaluate(null);
      const target = compileExpr(expr.target);
      const nullSafe = property.name === 'HasValue';
      return (s) => {
        const value = target(s);
        return isNull(value) && !nullSafe ? null : property.evaluate(value);
      };
    }
    case 'call': {
      const method = expr.method;
      const args = expr.args.map(compileExpr);
      if (expr.target === null) {
        return (s) => {
          const values = args.map((a) => a(s));
          return values.some(isNull) ? null : method.evaluate(null, values);
        };
      }
      const target = compileExpr(expr.target);
      return (s) => {
        const value = target(s);
        if (isNull(value)) return null;
        const values = args.map((a) => a(s));
        return values.some(isNull) ? null : method.evaluate(value, values);
      };
    }
    case 'aggregate':
      return compileAggregate(expr);
    case 'index':
      return compileIndex(expr);
    case 'unary': {
      const operand = compileExpr(expr.operand);
      if (expr.operator === '!') {
        return (s) => {
          const v = operand(s);
          return isNull(v) ? null : !v;
        };
      }
      const type = expr.type;
      return (s) => {
        const v = operand(s);
        return isNull(v) ? null : convertValue(-toNumber(v), type);
      };
    }
    case 'binary':
      return compileBinary(expr);
    case 'conditional': {
      const test = compileExpr(expr.test);
      const whenTrue = compileExpr(expr.whenTrue);
      const whenFalse = compileExpr(expr.whenFalse);
      return (s) => (test(s) === true ? whenTrue(s) : whenFalse(s));
    }
    case 'convert': {
      const operand = compileExpr(expr.operand);
      const target = expr.type;
      return (s) => convertValue(operand(s), target);
    }
    case 'new': {
      const record = expr.record;
      const members = expr.members.map(compileExpr);
      return (s) => record.create(members.map((m) => m(s)));
    }
    case 'array': {
      const elements = expr.elements.map(compileExpr);
      return (s) => elements.map((e) => e(s));
    }
  }
}

/**
 * Builds a comparator over the ordering keys. Each key's selector runs once
 * per comparison side; nulls sort first ascending and last descending.
 */
export function compileComparator(orderings: readonly BoundOrdering[]): (a: unknown, b: unknown) => number {
  const keys = orderings.map((o) => ({ select: compileExpr(o.selector), direction: o.ascending ? 1 : -1 }));
  return (a, b) => {
    for (const key of keys) {
      const c = compareValues(key.select([a]), key.select([b]));
      if (c !== 0) return c * key.direction;
    }
    return 0;
  };
}
