import type { EntityType } from '../entity/schema.js';
import { bindPredicate, type CompiledPredicate } from '../expression/dynamic.js';
import { Predicate } from './predicate.js';

const ALWAYS_TRUE = new Predicate<object>({ kind: 'literal', literal: 'bool', value: true, text: 'true', pos: 0 });

/**
 * Incrementally built filter. Each step takes a `condition` flag so callers
 * can add clauses only when a search field is filled in:
 *
 * @example
 * FilterExpression.start(field<Conference>('status').eq(1))
 *   .and(field<Conference>('name').contains(search), search !== '')
 *   .or(field<Conference>('conferenceId').eq(id), id > 0);
 *
 * Every step returns a new instance.
 */
export class FilterExpression<T extends object> {
  private constructor(readonly predicate: Predicate<T> | null) {}

  static empty<T extends object>(): FilterExpression<T> {
    return new FilterExpression<T>(null);
  }

  static start<T extends object>(predicate: Predicate<T>, condition = true): FilterExpression<T> {
    return new FilterExpression<T>(condition ? predicate : null);
  }

  /** Replaces the current filter. */
  start(predicate: Predicate<T>, condition = true): FilterExpression<T> {
    return condition ? new FilterExpression<T>(predicate) : this;
  }

  and(predicate: Predicate<T>, condition = true): FilterExpression<T> {
    if (!condition) return this;
    return new FilterExpression<T>(this.predicate === null ? predicate : this.predicate.and(predicate));
  }

  or(predicate: Predicate<T>, condition = true): FilterExpression<T> {
    if (!condition) return this;
    return new FilterExpression<T>(this.predicate === null ? predicate : this.predicate.or(predicate));
  }

  get isEmpty(): boolean {
    return this.predicate === null;
  }

  toPredicate(): Predicate<T> | null {
    return this.predicate;
  }

  /** An empty filter compiles to a predicate that accepts everything. */
  compile(entity: EntityType<T>): CompiledPredicate<T> {
    return bindPredicate(entity, (this.predicate ?? ALWAYS_TRUE).node);
  }
}
