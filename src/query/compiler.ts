import type { EntityType } from '../entity/schema.js';
import { toColumnValues } from '../entity/row-mapper.js';
import type { BoundOrdering, Expr } from '../expression/expr.js';
import { addParam, collateOrdinal, compileSqlExpression, quoteIdentifier, type SqlParams } from './sql-expression.js';

export interface CompiledQuery {
  sql: string;
  params: unknown[];
}

export interface SelectOptions {
  readonly where?: Expr | null;
  readonly orderings?: readonly BoundOrdering[];
  readonly limit?: number | null;
  readonly offset?: number | null;
}

function newParams(): SqlParams {
  return { params: [], counter: { n: 0 } };
}

function selectList<T extends object>(entity: EntityType<T>): string {
  return entity.columns.map((f) => quoteIdentifier(f.column)).join(', ');
}

function compileWhereClause(where: Expr | null | undefined, ctx: SqlParams): string | null {
  if (where === null || where === undefined) return null;
  return `WHERE ${compileSqlExpression(where, ctx)}`;
}

function isKeyColumn<T extends object>(entity: EntityType<T>, expr: Expr): boolean {
  return expr.kind === 'field' && expr.column === entity.keyField.column;
}

/**
 * Compiles orderings into an ORDER BY clause. Nulls sort first ascending and
 * last descending, text keys sort under the "C" collation, and the primary
 * key closes the list so pages are stable.
 */
function compileOrderByClause<T extends object>(
  entity: EntityType<T>,
  orderings: readonly BoundOrdering[],
  ctx: SqlParams,
): string {
  const keys = orderings.map((o) => {
    const sql = collateOrdinal(o.selector, compileSqlExpression(o.selector, ctx));
    return o.ascending ? `${sql} ASC NULLS FIRST` : `${sql} DESC NULLS LAST`;
  });
  if (!orderings.some((o) => isKeyColumn(entity, o.selector))) {
    keys.push(`${quoteIdentifier(entity.keyField.column)} ASC`);
  }
  return `ORDER BY ${keys.join(', ')}`;
}

/**
 * Compiles a filtered, ordered and optionally limited SELECT of every
 * column of `entity`.
 */
export function compileSelectQuery<T extends object>(entity: EntityType<T>, options: SelectOptions = {}): CompiledQuery {
  const ctx = newParams();
  const orderings = options.orderings ?? [];
  const limit = options.limit ?? null;
  const offset = options.offset ?? null;

  const lines = [`SELECT ${selectList(entity)}`, `FROM ${quoteIdentifier(entity.table)}`];
  const where = compileWhereClause(options.where, ctx);
  if (where !== null) lines.push(where);
  if (orderings.length > 0 || limit !== null || offset !== null) {
    lines.push(compileOrderByClause(entity, orderings, ctx));
  }
  if (limit !== null) lines.push(`LIMIT ${addParam(ctx, limit)}`);
  if (offset !== null) lines.push(`OFFSET ${addParam(ctx, offset)}`);

  return { sql: lines.join('\n'), params: ctx.params };
}

export function compileCountQuery<T extends object>(entity: EntityType<T>, where: Expr | null = null): CompiledQuery {
  const ctx = newParams();
  const lines = ['SELECT COUNT(*) AS count', `FROM ${quoteIdentifier(entity.table)}`];
  const clause = compileWhereClause(where, ctx);
  if (clause !== null) lines.push(clause);
  return { sql: lines.join('\n'), params: ctx.params };
}

export function compileExistsQuery<T extends object>(entity: EntityType<T>, where: Expr | null = null): CompiledQuery {
  const ctx = newParams();
  const clause = compileWhereClause(where, ctx);
  const inner = [`SELECT 1 FROM ${quoteIdentifier(entity.table)}`, ...(clause === null ? [] : [clause])].join(' ');
  return { sql: `SELECT EXISTS (${inner}) AS exists`, params: ctx.params };
}

/** Single parameterised DELETE for every row matching `where`. */
export function compileDeleteQuery<T extends object>(entity: EntityType<T>, where: Expr): CompiledQuery {
  const ctx = newParams();
  const sql = [`DELETE FROM ${quoteIdentifier(entity.table)}`, `WHERE ${compileSqlExpression(where, ctx)}`].join('\n');
  return { sql, params: ctx.params };
}

/** INSERT ... RETURNING; a generated key column is left to the store. */
export function compileInsertQuery<T extends object>(entity: EntityType<T>, value: T): CompiledQuery {
  const ctx = newParams();
  const columns = toColumnValues(entity, value, !entity.generatedKey);
  const names = columns.map((c) => quoteIdentifier(c.column));
  const placeholders = columns.map((c) => addParam(ctx, c.value));

  const sql = [
    `INSERT INTO ${quoteIdentifier(entity.table)} (${names.join(', ')})`,
    `VALUES (${placeholders.join(', ')})`,
    `RETURNING ${selectList(entity)}`,
  ].join('\n');
  return { sql, params: ctx.params };
}

/** UPDATE of every non-key column, matched by key. */
export function compileUpdateQuery<T extends object>(entity: EntityType<T>, value: T): CompiledQuery {
  const ctx = newParams();
  const assignments = toColumnValues(entity, value, false).map(
    (c) => `${quoteIdentifier(c.column)} = ${addParam(ctx, c.value)}`,
  );
  const key = addParam(ctx, entity.keyOf(value));

  const sql = [
    `UPDATE ${quoteIdentifier(entity.table)}`,
    `SET ${assignments.join(', ')}`,
    `WHERE ${quoteIdentifier(entity.keyField.column)} = ${key}`,
    `RETURNING ${selectList(entity)}`,
  ].join('\n');
  return { sql, params: ctx.params };
}

export function compileDeleteByKeyQuery<T extends object>(entity: EntityType<T>, key: unknown): CompiledQuery {
  const ctx = newParams();
  const sql = [
    `DELETE FROM ${quoteIdentifier(entity.table)}`,
    `WHERE ${quoteIdentifier(entity.keyField.column)} = ${addParam(ctx, key)}`,
  ].join('\n');
  return { sql, params: ctx.params };
}
