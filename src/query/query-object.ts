import { ArgumentError } from '../errors.js';
import { parseOrderingSyntax, parseSyntax } from '../expression/parser.js';
import type { OrderingNode, SyntaxNode } from '../expression/syntax.js';
import { FilterExpression } from './filter-expression.js';
import { FieldRef, Predicate } from './predicate.js';

/** Anything accepted where a predicate is expected; text takes the call's trailing values. */
export type PredicateSource<T extends object> = Predicate<T> | FilterExpression<T> | string;

export type OrderingSource<T extends object> = string | FieldRef<T>;

export interface Paging {
  readonly pageIndex: number;
  readonly pageSize: number;
}

interface QueryState {
  readonly predicate: SyntaxNode | null;
  readonly orderings: readonly OrderingNode[];
  readonly limit: number | null;
  readonly paging: Paging | null;
}

const EMPTY: QueryState = { predicate: null, orderings: [], limit: null, paging: null };

/** Resolves a predicate source to a syntax tree; null for an empty filter. */
export function toSyntax<T extends object>(source: PredicateSource<T>, values: readonly unknown[] = []): SyntaxNode | null {
  if (typeof source === 'string') return parseSyntax(source, { values });
  if (source instanceof FilterExpression) return source.toPredicate()?.node ?? null;
  if (source instanceof Predicate) return source.node;
  throw new ArgumentError('predicate', 'Expected a predicate, filter expression or predicate text');
}

function toOrderings<T extends object>(
  source: OrderingSource<T>,
  values: readonly unknown[],
  descending = false,
): OrderingNode[] {
  if (typeof source === 'string') return parseOrderingSyntax(source, { values, descending });
  return [{ selector: source.node, ascending: !descending }];
}

function requireInteger(argument: string, value: number, min: number): void {
  if (!Number.isInteger(value) || value < min) {
    throw new ArgumentError(argument, `${argument} must be an integer >= ${min}, got ${String(value)}`);
  }
}

/**
 * Immutable query specification: predicate, orderings, limit and paging.
 * Every method returns a new Query; a Query is consumed by a repository's
 * findAll/findPage/select.
 */
export class Query<T extends object> {
  private constructor(private readonly state: QueryState) {}

  static create<T extends object>(): Query<T> {
    return new Query<T>(EMPTY);
  }

  get predicate(): SyntaxNode | null {
    return this.state.predicate;
  }

  get orderings(): readonly OrderingNode[] {
    return this.state.orderings;
  }

  get limit(): number | null {
    return this.state.limit;
  }

  get paging(): Paging | null {
    return this.state.paging;
  }

  private with(patch: Partial<QueryState>): Query<T> {
    return new Query<T>({ ...this.state, ...patch });
  }

  /** Replaces the predicate. */
  where(source: PredicateSource<T>, ...values: unknown[]): Query<T> {
    return this.with({ predicate: toSyntax(source, values) });
  }

  /** ANDs with the current predicate; behaves like where() when there is none. */
  whereAnd(source: PredicateSource<T>, ...values: unknown[]): Query<T> {
    return this.combine('&&', toSyntax(source, values));
  }

  /** ORs with the current predicate; behaves like where() when there is none. */
  whereOr(source: PredicateSource<T>, ...values: unknown[]): Query<T> {
    return this.combine('||', toSyntax(source, values));
  }

  private combine(operator: '&&' | '||', node: SyntaxNode | null): Query<T> {
    const current = this.state.predicate;
    if (node === null) return this;
    if (current === null) return this.with({ predicate: node });
    return this.with({ predicate: { kind: 'binary', operator, left: current, right: node, pos: 0 } });
  }

  /** Replaces the orderings. Text may list several keys, e.g. `"Status, Name desc"`. */
  orderBy(source: OrderingSource<T>, ...values: unknown[]): Query<T> {
    return this.with({ orderings: toOrderings(source, values) });
  }

  /** Like orderBy, but keys written without `asc` or `desc` sort descending. */
  orderByDescending(source: OrderingSource<T>, ...values: unknown[]): Query<T> {
    return this.with({ orderings: toOrderings(source, values, true) });
  }

  /** Appends tie-breaker keys after the existing orderings. */
  thenBy(source: OrderingSource<T>, ...values: unknown[]): Query<T> {
    this.requireOrdered('thenBy');
    return this.with({ orderings: [...this.state.orderings, ...toOrderings(source, values)] });
  }

  thenByDescending(source: OrderingSource<T>, ...values: unknown[]): Query<T> {
    this.requireOrdered('thenByDescending');
    return this.with({ orderings: [...this.state.orderings, ...toOrderings(source, values, true)] });
  }

  private requireOrdered(method: string): void {
    if (this.state.orderings.length === 0) {
      throw new ArgumentError('ordering', `${method} requires a preceding orderBy`);
    }
  }

  /** Keeps the first `count` results; ignored when a page is set. */
  take(count: number): Query<T> {
    requireInteger('limit', count, 0);
    return this.with({ limit: count });
  }

  /** 1-based page of `pageSize` results, applied after filtering and ordering. */
  page(pageIndex: number, pageSize: number): Query<T> {
    requireInteger('pageIndex', pageIndex, 1);
    requireInteger('pageSize', pageSize, 1);
    return this.with({ paging: { pageIndex, pageSize } });
  }
}

/**
 * Entry point for the query DSL.
 *
 * @example
 * query<Conference>()
 *   .where('Status == @0', 1)
 *   .whereAnd(field<Conference>('name').startsWith('Node'))
 *   .orderBy('StartDate desc')
 *   .thenBy(field<Conference>('conferenceId'))
 *   .take(10)
 */
export function query<T extends object>(): Query<T> {
  return Query.create<T>();
}
