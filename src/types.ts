import type { PredicateSource, Query } from './query/query-object.js';

export interface Page<T> {
  items: T[];
  /** Number of entities matching the query's predicate, across all pages. */
  totalCount: number;
  pageIndex: number;
  pageSize: number;
}

/**
 * CRUD and query operations over one entity type. Text predicates take the
 * call's trailing arguments as `{0}`/`@0` values.
 */
export interface Repository<T extends object> {
  create(entity: T): Promise<T>;
  update(entity: T): Promise<T>;
  delete(entity: T): Promise<void>;
  /** Removes every match in one statement; resolves to the number removed. */
  deleteWhere(predicate: PredicateSource<T>, ...values: unknown[]): Promise<number>;
  /** Null when nothing matches; rejects with NonUniqueResultError on several matches. */
  findOne(predicate: PredicateSource<T>, ...values: unknown[]): Promise<T | null>;
  findAll(query?: Query<T>): Promise<T[]>;
  findPage(query: Query<T>, pageIndex: number, pageSize: number): Promise<Page<T>>;
  count(predicate?: PredicateSource<T>, ...values: unknown[]): Promise<number>;
  exists(predicate: PredicateSource<T>, ...values: unknown[]): Promise<boolean>;
  /** Runs the query, then maps each result through `selector` (e.g. `new(Name, Status)`). */
  select(query: Query<T>, selector: string, ...values: unknown[]): Promise<unknown[]>;
}
