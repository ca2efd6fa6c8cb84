import type { EntityType } from '../entity/schema.js';
import { bindOrderings, bindPredicate } from '../expression/dynamic.js';
import type { SyntaxNode } from '../expression/syntax.js';
import type { Query } from './query-object.js';

function matcher<T extends object>(entity: EntityType<T>, predicate: SyntaxNode | null): (item: T) => boolean {
  if (predicate === null) return () => true;
  return bindPredicate(entity, predicate).test;
}

/**
 * Filters and orders `source` per `query`, without paging or limit. The
 * sort is stable, so items equal on every key keep their source order.
 */
export function filterAndOrder<T extends object>(entity: EntityType<T>, source: Iterable<T>, query: Query<T>): T[] {
  const test = matcher(entity, query.predicate);
  const filtered: T[] = [];
  for (const item of source) {
    if (test(item)) filtered.push(item);
  }
  if (query.orderings.length === 0) return filtered;
  return bindOrderings(entity, query.orderings).sort(filtered);
}

/**
 * Runs a query over an in-memory source: filter, then stable multi-key
 * sort, then the page (skip `(pageIndex - 1) * pageSize`, take `pageSize`)
 * or, without a page, the limit.
 */
export function runQuery<T extends object>(entity: EntityType<T>, source: Iterable<T>, query: Query<T>): T[] {
  const ordered = filterAndOrder(entity, source, query);
  const paging = query.paging;
  if (paging !== null) {
    const skip = (paging.pageIndex - 1) * paging.pageSize;
    return ordered.slice(skip, skip + paging.pageSize);
  }
  return query.limit === null ? ordered : ordered.slice(0, query.limit);
}

export function countWhere<T extends object>(entity: EntityType<T>, source: Iterable<T>, predicate: SyntaxNode | null): number {
  const test = matcher(entity, predicate);
  let count = 0;
  for (const item of source) {
    if (test(item)) count++;
  }
  return count;
}

/** Stops at the first match. */
export function anyWhere<T extends object>(entity: EntityType<T>, source: Iterable<T>, predicate: SyntaxNode | null): boolean {
  const test = matcher(entity, predicate);
  for (const item of source) {
    if (test(item)) return true;
  }
  return false;
}
