import type { EntityType } from '../entity/schema.js';
import { bindExpression, bindOrdering } from './binder.js';
import { compileComparator, compileExpr } from './evaluate.js';
import type { BoundOrdering, Expr } from './expr.js';
import { parseOrderingSyntax, parseSyntax } from './parser.js';
import type { OrderingNode, SyntaxNode } from './syntax.js';
import { BOOL, entityType, parseTypeName, type TypeRef } from './type-system.js';

export { compileRecordType } from './record-types.js';

export interface ParseOptions {
  /** Entity whose fields are in scope as `it`. */
  readonly it?: EntityType;
  /** Required type of the result, e.g. `'bool'` or `'int?'`. */
  readonly resultType?: string | TypeRef;
  readonly values?: readonly unknown[];
  readonly externals?: Readonly<Record<string, unknown>>;
}

export interface CompiledExpression {
  readonly expr: Expr;
  readonly type: TypeRef;
  evaluate(it?: unknown): unknown;
}

export interface CompiledPredicate<T> {
  readonly expr: Expr;
  test(entity: T): boolean;
}

export interface CompiledOrdering<T> {
  readonly keys: readonly BoundOrdering[];
  compare(a: T, b: T): number;
  /** Stable sort into a new array. */
  sort(items: Iterable<T>): T[];
}

export interface CompiledProjection<T> {
  readonly expr: Expr;
  readonly type: TypeRef;
  project(entity: T): unknown;
}

/**
 * Parses and compiles one expression.
 *
 * @example
 * const e = parseExpression('it.Status == 1 && ConferenceId < @0', { it: conferenceEntity, values: [100] });
 * e.evaluate(conference); // true or false
 */
export function parseExpression(text: string, options: ParseOptions = {}): CompiledExpression {
  const syntax = parseSyntax(text, { values: options.values ?? [], externals: options.externals ?? {} });
  const it = options.it === undefined ? undefined : entityType(options.it);
  const resultType = typeof options.resultType === 'string' ? parseTypeName(options.resultType) : options.resultType;
  const expr = bindExpression(syntax, it, resultType);
  const run = compileExpr(expr);
  return { expr, type: expr.type, evaluate: (value?: unknown) => run([value ?? null]) };
}

/** Binds an already-parsed predicate tree against `entity`. */
export function bindPredicate<T extends object>(entity: EntityType<T>, syntax: SyntaxNode): CompiledPredicate<T> {
  const expr = bindExpression(syntax, entityType(entity), BOOL);
  const run = compileExpr(expr);
  return { expr, test: (value: T) => run([value]) === true };
}

export function parsePredicate<T extends object>(
  entity: EntityType<T>,
  text: string,
  ...values: unknown[]
): CompiledPredicate<T> {
  return bindPredicate(entity, parseSyntax(text, { values }));
}

export function bindOrderings<T extends object>(
  entity: EntityType<T>,
  nodes: readonly OrderingNode[],
): CompiledOrdering<T> {
  const keys = bindOrdering(nodes, entityType(entity));
  const compare = compileComparator(keys);
  return {
    keys,
    compare,
    sort: (items) => [...items].sort(compare),
  };
}

/** Parses `"Status, ConferenceId desc"` into a comparator over `entity`. */
export function parseOrdering<T extends object>(
  entity: EntityType<T>,
  text: string,
  ...values: unknown[]
): CompiledOrdering<T> {
  return bindOrderings(entity, parseOrderingSyntax(text, { values }));
}

/** Parses a selector such as `new(Name, Status as State)`. */
export function parseProjection<T extends object>(
  entity: EntityType<T>,
  text: string,
  ...values: unknown[]
): CompiledProjection<T> {
  const expr = bindExpression(parseSyntax(text, { values }), entityType(entity));
  const run = compileExpr(expr);
  return { expr, type: expr.type, project: (value: T) => run([value]) };
}
