import type { PrimitiveName } from './type-system.js';

export type BinaryOperator =
  | '||'
  | '&&'
  | '=='
  | '!='
  | '<'
  | '<='
  | '>'
  | '>='
  | '+'
  | '-'
  | '&'
  | '*'
  | '/'
  | '%';

export type UnaryOperator = '-' | '!';

export type TypeNodeName = PrimitiveName | 'Math';

export type LiteralKind = 'integer' | 'real' | 'string' | 'char' | 'bool' | 'null';

/** Member of a `new(...)` projection; `name` is null when inferred from a member access. */
export interface NewMember {
  readonly name: string | null;
  readonly value: SyntaxNode;
}

/**
 * Untyped expression tree produced by the parser. Nodes are plain immutable
 * objects; `pos` is the offset of the node's first token.
 */
export type SyntaxNode =
  | { readonly kind: 'literal'; readonly literal: LiteralKind; readonly value: string | number | boolean | null; readonly text: string; readonly pos: number }
  | { readonly kind: 'value'; readonly value: unknown; readonly pos: number }
  | { readonly kind: 'identifier'; readonly name: string; readonly pos: number }
  | { readonly kind: 'it'; readonly pos: number }
  | { readonly kind: 'type'; readonly name: TypeNodeName; readonly nullable: boolean; readonly pos: number }
  | { readonly kind: 'member'; readonly target: SyntaxNode; readonly name: string; readonly pos: number }
  | { readonly kind: 'call'; readonly target: SyntaxNode; readonly name: string | null; readonly args: readonly SyntaxNode[]; readonly pos: number }
  | { readonly kind: 'index'; readonly target: SyntaxNode; readonly args: readonly SyntaxNode[]; readonly pos: number }
  | { readonly kind: 'unary'; readonly operator: UnaryOperator; readonly operand: SyntaxNode; readonly pos: number }
  | { readonly kind: 'binary'; readonly operator: BinaryOperator; readonly left: SyntaxNode; readonly right: SyntaxNode; readonly pos: number }
  | { readonly kind: 'conditional'; readonly test: SyntaxNode; readonly whenTrue: SyntaxNode; readonly whenFalse: SyntaxNode; readonly pos: number }
  | { readonly kind: 'new'; readonly members: readonly NewMember[]; readonly pos: number }
  | { readonly kind: 'array'; readonly elements: readonly SyntaxNode[]; readonly pos: number };

export interface OrderingNode {
  readonly selector: SyntaxNode;
  readonly ascending: boolean;
}

export function memberPath(...names: string[]): SyntaxNode {
  let node: SyntaxNode = { kind: 'it', pos: 0 };
  for (const name of names) {
    node = { kind: 'member', target: node, name, pos: 0 };
  }
  return node;
}
