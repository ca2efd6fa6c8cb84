import type { EntityType } from '../entity/schema.js';
import { bindPredicate, type CompiledPredicate } from '../expression/dynamic.js';
import { parseSyntax } from '../expression/parser.js';
import { memberPath, type BinaryOperator, type SyntaxNode } from '../expression/syntax.js';

function valueNode(value: unknown): SyntaxNode {
  return { kind: 'value', value, pos: 0 };
}

/**
 * Typed predicate over `T`, held as a syntax tree and bound against an
 * entity schema only when it is run. Instances are immutable.
 */
export class Predicate<T extends object> {
  constructor(readonly node: SyntaxNode) {}

  and(other: Predicate<T>): Predicate<T> {
    return new Predicate<T>({ kind: 'binary', operator: '&&', left: this.node, right: other.node, pos: 0 });
  }

  or(other: Predicate<T>): Predicate<T> {
    return new Predicate<T>({ kind: 'binary', operator: '||', left: this.node, right: other.node, pos: 0 });
  }

  not(): Predicate<T> {
    return new Predicate<T>({ kind: 'unary', operator: '!', operand: this.node, pos: 0 });
  }

  compile(entity: EntityType<T>): CompiledPredicate<T> {
    return bindPredicate(entity, this.node);
  }
}

/** Reference to one field of `T`, used to build predicates and orderings. */
export class FieldRef<T extends object, K extends keyof T & string = keyof T & string> {
  readonly node: SyntaxNode;

  constructor(readonly name: K) {
    this.node = memberPath(name);
  }

  private compare(operator: BinaryOperator, value: unknown): Predicate<T> {
    return new Predicate<T>({ kind: 'binary', operator, left: this.node, right: valueNode(value), pos: 0 });
  }

  private call(method: string, value: string): Predicate<T> {
    return new Predicate<T>({ kind: 'call', target: this.node, name: method, args: [valueNode(value)], pos: 0 });
  }

  eq(value: T[K] | null): Predicate<T> {
    return this.compare('==', value);
  }

  ne(value: T[K] | null): Predicate<T> {
    return this.compare('!=', value);
  }

  lt(value: T[K]): Predicate<T> {
    return this.compare('<', value);
  }

  le(value: T[K]): Predicate<T> {
    return this.compare('<=', value);
  }

  gt(value: T[K]): Predicate<T> {
    return this.compare('>', value);
  }

  ge(value: T[K]): Predicate<T> {
    return this.compare('>=', value);
  }

  contains(value: string): Predicate<T> {
    return this.call('Contains', value);
  }

  startsWith(value: string): Predicate<T> {
    return this.call('StartsWith', value);
  }

  endsWith(value: string): Predicate<T> {
    return this.call('EndsWith', value);
  }

  /** Matches when the field equals any of `values`. */
  in(values: readonly T[K][]): Predicate<T> {
    return new Predicate<T>({ kind: 'call', target: valueNode([...values]), name: 'Contains', args: [this.node], pos: 0 });
  }

  isNull(): Predicate<T> {
    return this.compare('==', null);
  }

  isNotNull(): Predicate<T> {
    return this.compare('!=', null);
  }
}

export function field<T extends object, K extends keyof T & string = keyof T & string>(name: K): FieldRef<T, K> {
  return new FieldRef<T, K>(name);
}

/**
 * Parses predicate text immediately, so syntax errors surface here rather
 * than when the predicate is run. Type errors surface on binding.
 */
export function predicate<T extends object>(text: string, ...values: unknown[]): Predicate<T> {
  return new Predicate<T>(parseSyntax(text, { values }));
}
