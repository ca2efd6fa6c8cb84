import type { BoundMethod, BoundProperty } from './members.js';
import type { OperatorSignature } from './operators.js';
import type { RecordType } from './record-types.js';
import type { BinaryOperator, UnaryOperator } from './syntax.js';
import type { LiteralInfo, TypeRef } from './type-system.js';

export type AggregateMethod =
  | 'Where'
  | 'Any'
  | 'All'
  | 'Count'
  | 'Min'
  | 'Max'
  | 'Sum'
  | 'Average'
  | 'Contains'
  | 'First';

/**
 * Typed expression tree produced by the binder. Every node carries its
 * static type; trees are never mutated once built.
 */
export type Expr =
  | { readonly kind: 'constant'; readonly type: TypeRef; readonly value: unknown; readonly literal?: LiteralInfo; readonly pos: number }
  /** `it` of the lambda scope at `depth` (0 is the outermost). */
  | { readonly kind: 'parameter'; readonly type: TypeRef; readonly depth: number; readonly pos: number }
  /** Entity field or dynamic record property; `column` is set for entity fields only. */
  | { readonly kind: 'field'; readonly type: TypeRef; readonly target: Expr; readonly name: string; readonly column: string | null; readonly pos: number }
  | { readonly kind: 'property'; readonly type: TypeRef; readonly target: Expr | null; readonly property: BoundProperty; readonly pos: number }
  | { readonly kind: 'call'; readonly type: TypeRef; readonly target: Expr | null; readonly method: BoundMethod; readonly args: readonly Expr[]; readonly pos: number }
  | { readonly kind: 'aggregate'; readonly type: TypeRef; readonly method: AggregateMethod; readonly source: Expr; readonly lambda: Expr | null; readonly argument: Expr | null; readonly pos: number }
  | { readonly kind: 'index'; readonly type: TypeRef; readonly target: Expr; readonly index: Expr; readonly pos: number }
  | { readonly kind: 'unary'; readonly type: TypeRef; readonly operator: UnaryOperator; readonly operand: Expr; readonly pos: number }
  | { readonly kind: 'binary'; readonly type: TypeRef; readonly operator: BinaryOperator; readonly signature: OperatorSignature; readonly left: Expr; readonly right: Expr; readonly pos: number }
  | { readonly kind: 'conditional'; readonly type: TypeRef; readonly test: Expr; readonly whenTrue: Expr; readonly whenFalse: Expr; readonly pos: number }
  | { readonly kind: 'convert'; readonly type: TypeRef; readonly operand: Expr; readonly explicit: boolean; readonly pos: number }
  | { readonly kind: 'new'; readonly type: TypeRef; readonly record: RecordType; readonly members: readonly Expr[]; readonly pos: number }
  | { readonly kind: 'array'; readonly type: TypeRef; readonly elements: readonly Expr[]; readonly pos: number };

export interface BoundOrdering {
  readonly selector: Expr;
  readonly ascending: boolean;
}
