import type { Expr } from './expr.js';
import {
  acceptsNull,
  compareConversions,
  isImplicitlyConvertible,
  isNumeric,
  typesEqual,
  type TypeRef,
} from './type-system.js';

export interface Overload {
  readonly params: readonly TypeRef[];
}

export type Resolution<S extends Overload> =
  | { readonly kind: 'ok'; readonly signature: S; readonly args: readonly Expr[] }
  | { readonly kind: 'none' }
  | { readonly kind: 'ambiguous'; readonly candidates: readonly S[] };

/**
 * Converts `expr` to `target` when an implicit conversion exists. Literal
 * constants are retyped in place of a conversion node; null constants take
 * the target type. Returns undefined when no implicit conversion applies.
 */
export function promote(expr: Expr, target: TypeRef): Expr | undefined {
  if (typesEqual(expr.type, target)) return expr;
  if (expr.kind === 'constant') {
    if (expr.type.kind === 'null') {
      return acceptsNull(target) ? { ...expr, type: target } : undefined;
    }
    if (expr.literal !== undefined && isNumeric(target) && isImplicitlyConvertible(expr.type, target, expr.literal)) {
      return { kind: 'constant', type: target, value: expr.value, literal: expr.literal, pos: expr.pos };
    }
  }
  if (!isImplicitlyConvertible(expr.type, target)) return undefined;
  return { kind: 'convert', type: target, operand: expr, explicit: false, pos: expr.pos };
}

function literalOf(expr: Expr) {
  return expr.kind === 'constant' ? expr.literal : undefined;
}

function isApplicable(signature: Overload, args: readonly Expr[]): boolean {
  if (signature.params.length !== args.length) return false;
  return args.every((arg, i) => {
    const param = signature.params[i];
    return param !== undefined && isImplicitlyConvertible(arg.type, param, literalOf(arg));
  });
}

// A candidate is better when no argument converts worse and at least one converts better.
function isBetterThan(args: readonly Expr[], m1: Overload, m2: Overload): boolean {
  let better = false;
  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    const p1 = m1.params[i];
    const p2 = m2.params[i];
    if (arg === undefined || p1 === undefined || p2 === undefined) return false;
    const c = compareConversions(arg.type, p1, p2);
    if (c < 0) return false;
    if (c > 0) better = true;
  }
  return better;
}

/**
 * Picks the single best overload for `args`: applicable candidates are those
 * every argument converts to implicitly, and the winner must be better than
 * every other applicable candidate.
 */
export function findBestOverload<S extends Overload>(
  candidates: readonly S[],
  args: readonly Expr[],
): Resolution<S> {
  const applicable = candidates.filter((c) => isApplicable(c, args));
  if (applicable.length === 0) return { kind: 'none' };

  const best = applicable.filter((m1) => applicable.every((m2) => m1 === m2 || isBetterThan(args, m1, m2)));
  const signature = best.length === 1 ? best[0] : undefined;
  if (signature === undefined) {
    return { kind: 'ambiguous', candidates: applicable };
  }

  const promoted: Expr[] = [];
  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    const param = signature.params[i];
    const converted = arg !== undefined && param !== undefined ? promote(arg, param) : undefined;
    if (converted === undefined) return { kind: 'none' };
    promoted.push(converted);
  }
  return { kind: 'ok', signature, args: promoted };
}
