import {
  AmbiguousOperatorError,
  IncompatibleOperandsError,
  ParseError,
  UnknownMemberError,
} from '../errors.js';
import type { AggregateMethod, BoundOrdering, Expr } from './expr.js';
import {
  findConstructors,
  findMethods,
  findProperty,
  findStaticMethods,
  findStaticProperty,
  type BoundMethod,
} from './members.js';
import {
  ADD_SIGNATURES,
  ARITHMETIC_SIGNATURES,
  AVERAGE_SIGNATURES,
  EQUALITY_SIGNATURES,
  LOGICAL_SIGNATURES,
  NEGATION_SIGNATURES,
  NOT_SIGNATURES,
  RELATIONAL_SIGNATURES,
  SUBTRACT_SIGNATURES,
  SUM_SIGNATURES,
  type OperatorSignature,
} from './operators.js';
import { DynamicRecord, compileRecordType, type DynamicProperty } from './record-types.js';
import { findBestOverload, promote } from './resolver.js';
import type { BinaryOperator, NewMember, OrderingNode, SyntaxNode, UnaryOperator } from './syntax.js';
import {
  BOOL,
  INT,
  NULL_TYPE,
  OBJECT,
  STRING,
  acceptsNull,
  isImplicitlyConvertible,
  isNumericName,
  isPrimitive,
  isValueTypeName,
  primitive,
  recordType,
  sequenceOf,
  toNullable,
  typeName,
  typeOfValue,
  typesEqual,
  type LiteralInfo,
  type TypeRef,
} from './type-system.js';

const AGGREGATE_METHODS: readonly AggregateMethod[] = [
  'Where',
  'Any',
  'All',
  'Count',
  'Min',
  'Max',
  'Sum',
  'Average',
  'Contains',
  'First',
];

const INT_RANGE = [-2147483648, 2147483647] as const;
const UINT_MAX = 4294967295;

/** Offset of the first token of `node`, used to report whole-expression errors. */
export function startOf(node: SyntaxNode): number {
  switch (node.kind) {
    case 'binary':
      return startOf(node.left);
    case 'member':
    case 'call':
    case 'index':
      return Math.min(node.pos, startOf(node.target));
    default:
      return node.pos;
  }
}

function integerLiteralType(text: string, value: number): TypeRef {
  const suffix = /[uUlL]+$/.exec(text)?.[0].toUpperCase() ?? '';
  if (suffix === 'UL' || suffix === 'LU') return primitive('ulong');
  if (suffix === 'U') return primitive(value <= UINT_MAX ? 'uint' : 'ulong');
  if (suffix === 'L') return primitive('long');
  if (value >= INT_RANGE[0] && value <= INT_RANGE[1]) return INT;
  if (value >= 0 && value <= UINT_MAX) return primitive('uint');
  return primitive('long');
}

function realLiteralType(text: string): TypeRef {
  const suffix = text.slice(-1).toUpperCase();
  if (suffix === 'F') return primitive('float');
  if (suffix === 'M') return primitive('decimal');
  return primitive('double');
}

/**
 * Turns an untyped syntax tree into a typed {@link Expr}. Identifiers resolve
 * against the innermost `it`; sequence aggregates push a new `it` scope for
 * their lambda argument.
 */
class Binder {
  private readonly scopes: TypeRef[];

  constructor(it: TypeRef | undefined) {
    this.scopes = it === undefined ? [] : [it];
  }

  bind(node: SyntaxNode): Expr {
    switch (node.kind) {
      case 'literal':
        return this.bindLiteral(node);
      case 'value':
        return this.bindValue(node.value, node.pos);
      case 'identifier':
        return this.bindMember(this.currentIt(node.pos, `Unknown identifier '${node.name}'`), node.name, node.pos);
      case 'it':
        return this.currentIt(node.pos, "No 'it' is in scope");
      case 'type':
        throw new ParseError(`'${node.name}' is a type and cannot be used as a value`, node.pos);
      case 'member':
        if (node.target.kind === 'type') {
          const property = findStaticProperty(node.target.name, node.name);
          if (property === undefined) throw new UnknownMemberError(node.name, node.target.name, node.pos);
          return { kind: 'property', type: property.type, target: null, property, pos: node.pos };
        }
        return this.bindMember(this.bind(node.target), node.name, node.pos);
      case 'call':
        return this.bindCall(node.target, node.name, node.args, node.pos);
      case 'index':
        return this.bindIndex(this.bind(node.target), node.args, node.pos);
      case 'unary':
        return this.bindUnary(node.operator, this.bind(node.operand), node.pos);
      case 'binary':
        return this.bindBinary(node.operator, this.bind(node.left), this.bind(node.right), node.pos);
      case 'conditional':
        return this.bindConditional(node.test, this.bind(node.whenTrue), this.bind(node.whenFalse), node.pos);
      case 'new':
        return this.bindNew(node.members, node.pos);
      case 'array':
        return this.bindArray(node.elements.map((e) => this.bind(e)), node.pos);
    }
  }

  private currentIt(pos: number, message: string): Expr {
    const depth = this.scopes.length - 1;
    const type = this.scopes[depth];
    if (type === undefined) throw new ParseError(message, pos);
    return { kind: 'parameter', type, depth, pos };
  }

  // ============================================================
  // LITERALS AND VALUES
  // ============================================================

  private bindLiteral(node: Extract<SyntaxNode, { kind: 'literal' }>): Expr {
    const { value, pos } = node;
    switch (node.literal) {
      case 'integer': {
        const n = Number(value);
        const literal: LiteralInfo = { kind: 'integer', value: n };
        return { kind: 'constant', type: integerLiteralType(node.text, n), value: n, literal, pos };
      }
      case 'real': {
        const n = Number(value);
        return { kind: 'constant', type: realLiteralType(node.text), value: n, literal: { kind: 'real', value: n }, pos };
      }
      case 'string':
        return { kind: 'constant', type: STRING, value, pos };
      case 'char':
        return { kind: 'constant', type: primitive('char'), value, pos };
      case 'bool':
        return { kind: 'constant', type: BOOL, value, pos };
      case 'null':
        return { kind: 'constant', type: NULL_TYPE, value: null, pos };
    }
  }

  private bindValue(raw: unknown, pos: number): Expr {
    const value = typeof raw === 'bigint' ? Number(raw) : raw === undefined ? null : raw;
    if (value instanceof DynamicRecord) {
      return { kind: 'constant', type: recordType(value.recordType), value, pos };
    }
    const type = typeOfValue(value);
    if (type === undefined) {
      throw new ParseError(`Values of type '${typeof value}' cannot be used in an expression`, pos);
    }
    if (typeof value === 'number') {
      const literal: LiteralInfo = { kind: Number.isInteger(value) ? 'integer' : 'real', value };
      return { kind: 'constant', type, value, literal, pos };
    }
    return { kind: 'constant', type, value, pos };
  }

  // ============================================================
  // MEMBERS AND CALLS
  // ============================================================

  private bindMember(target: Expr, name: string, pos: number): Expr {
    const t = target.type;
    if (t.kind === 'entity') {
      const field = t.entity.field(name);
      if (field !== undefined) {
        return { kind: 'field', type: field.type, target, name: field.property, column: field.column, pos };
      }
    } else if (t.kind === 'record') {
      const property = t.record.property(name);
      if (property !== undefined) {
        return { kind: 'field', type: property.type, target, name: property.name, column: null, pos };
      }
    } else {
      const property = findProperty(t, name);
      if (property !== undefined) {
        return { kind: 'property', type: property.type, target, property, pos };
      }
    }
    throw new UnknownMemberError(name, typeName(t), pos);
  }

  private bindCall(targetNode: SyntaxNode, name: string | null, argNodes: readonly SyntaxNode[], pos: number): Expr {
    if (targetNode.kind === 'type') {
      const args = argNodes.map((a) => this.bind(a));
      if (name === null) return this.bindTypeCall(targetNode, args, pos);
      const candidates = findStaticMethods(targetNode.name, name);
      return this.bindMethod(null, targetNode.name, name, candidates, args, pos);
    }

    const target = this.bind(targetNode);
    if (name === null) {
      throw new ParseError("'.' or '(' expected", pos);
    }
    if (target.type.kind === 'sequence') {
      return this.bindAggregate(target, target.type.element, name, argNodes, pos);
    }
    const args = argNodes.map((a) => this.bind(a));
    return this.bindMethod(target, typeName(target.type), name, findMethods(target.type, name), args, pos);
  }

  private bindMethod(
    target: Expr | null,
    owner: string,
    name: string,
    candidates: readonly BoundMethod[],
    args: readonly Expr[],
    pos: number,
  ): Expr {
    if (candidates.length === 0) {
      throw new UnknownMemberError(name, owner, pos, `No applicable method '${name}' exists in type '${owner}'`);
    }
    const resolution = findBestOverload(candidates, args);
    switch (resolution.kind) {
      case 'ok':
        return {
          kind: 'call',
          type: resolution.signature.result,
          target,
          method: resolution.signature,
          args: resolution.args,
          pos,
        };
      case 'ambiguous':
        throw new ParseError(`Ambiguous invocation of method '${name}' in type '${owner}'`, pos);
      case 'none':
        throw new ParseError(`No applicable method '${name}' exists in type '${owner}'`, pos);
    }
  }

  // int(x), int?(x), DateTime(y, m, d)
  private bindTypeCall(node: Extract<SyntaxNode, { kind: 'type' }>, args: readonly Expr[], pos: number): Expr {
    if (node.name === 'Math') {
      throw new ParseError("No matching constructor in type 'Math'", pos);
    }
    const target = primitive(node.name, node.nullable);
    const [single] = args;
    if (single !== undefined && args.length === 1 && isImplicitlyConvertible(single.type, target)) {
      return this.convert(single, target, pos);
    }
    const constructors = node.nullable ? [] : findConstructors(node.name);
    if (constructors.length > 0) {
      const resolution = findBestOverload(constructors, args);
      if (resolution.kind === 'ok') {
        return { kind: 'call', type: target, target: null, method: resolution.signature, args: resolution.args, pos };
      }
    }
    if (single !== undefined && args.length === 1) {
      return this.convert(single, target, pos);
    }
    throw new ParseError(`No matching constructor in type '${typeName(target)}'`, pos);
  }

  private convert(expr: Expr, target: TypeRef, pos: number): Expr {
    if (typesEqual(expr.type, target)) return expr;
    if (expr.kind === 'constant' && expr.type.kind === 'null' && acceptsNull(target)) {
      return { ...expr, type: target };
    }
    const source = expr.type;
    const explicitNumeric =
      source.kind === 'primitive' &&
      target.kind === 'primitive' &&
      (isNumericName(source.name) || source.name === 'char') &&
      (isNumericName(target.name) || target.name === 'char');
    if (!explicitNumeric && !isImplicitlyConvertible(source, target)) {
      throw new ParseError(
        `A value of type '${typeName(source)}' cannot be converted to type '${typeName(target)}'`,
        pos,
      );
    }
    return { kind: 'convert', type: target, operand: expr, explicit: true, pos };
  }

  private bindIndex(target: Expr, argNodes: readonly SyntaxNode[], pos: number): Expr {
    const [indexNode] = argNodes;
    if (indexNode === undefined || argNodes.length !== 1) {
      throw new ParseError('Exactly one index argument is expected', pos);
    }
    const index = promote(this.bind(indexNode), INT);
    if (index === undefined) {
      throw new ParseError('Array index must be an integer expression', pos);
    }
    const t = target.type;
    if (t.kind === 'sequence') {
      return { kind: 'index', type: t.element, target, index, pos };
    }
    if (isPrimitive(t, 'string')) {
      return { kind: 'index', type: primitive('char'), target, index, pos };
    }
    throw new ParseError(`No applicable indexer exists in type '${typeName(t)}'`, pos);
  }

  // ============================================================
  // SEQUENCE AGGREGATES
  // ============================================================

  private bindAggregate(
    source: Expr,
    element: TypeRef,
    name: string,
    argNodes: readonly SyntaxNode[],
    pos: number,
  ): Expr {
    const owner = typeName(source.type);
    const method = AGGREGATE_METHODS.find((m) => m.toLowerCase() === name.toLowerCase());
    if (method === undefined || argNodes.length > 1) {
      throw new UnknownMemberError(name, owner, pos, `No applicable aggregate method '${name}' exists in type '${owner}'`);
    }
    const [argNode] = argNodes;

    if (method === 'Contains') {
      const value = argNode === undefined ? undefined : promote(this.bind(argNode), element);
      if (value === undefined) {
        throw new ParseError(`No applicable aggregate method 'Contains' exists in type '${owner}'`, pos);
      }
      return { kind: 'aggregate', type: BOOL, method, source, lambda: null, argument: value, pos };
    }

    const lambda = this.bindLambda(element, argNode);
    const aggregate = (type: TypeRef, body: Expr | null): Expr => ({
      kind: 'aggregate',
      type,
      method,
      source,
      lambda: body,
      argument: null,
      pos,
    });
    const requirePredicate = (optional: boolean): Expr | null => {
      if (lambda === null) {
        if (optional) return null;
        throw new ParseError(`Aggregate method '${method}' requires a predicate`, pos);
      }
      const predicate = promote(lambda, BOOL);
      if (predicate === undefined) {
        throw new ParseError(`Expression of type 'bool' expected`, lambda.pos);
      }
      return predicate;
    };

    switch (method) {
      case 'Where':
        return aggregate(source.type, requirePredicate(false));
      case 'Any':
        return aggregate(BOOL, requirePredicate(true));
      case 'All':
        return aggregate(BOOL, requirePredicate(false));
      case 'Count':
        return aggregate(INT, requirePredicate(true));
      case 'First':
        return aggregate(element, requirePredicate(true));
      case 'Min':
      case 'Max': {
        const selector = lambda ?? this.identityLambda(element);
        if (selector.type.kind !== 'primitive' || selector.type.name === 'object' || selector.type.name === 'bool') {
          throw new ParseError(`No applicable aggregate method '${method}' exists in type '${owner}'`, pos);
        }
        return aggregate(selector.type, selector);
      }
      case 'Sum':
      case 'Average': {
        const selector = lambda ?? this.identityLambda(element);
        const catalog = method === 'Sum' ? SUM_SIGNATURES : AVERAGE_SIGNATURES;
        const resolution = findBestOverload(catalog, [selector]);
        const [body] = resolution.kind === 'ok' ? resolution.args : [];
        if (resolution.kind !== 'ok' || body === undefined) {
          throw new ParseError(`No applicable aggregate method '${method}' exists in type '${owner}'`, pos);
        }
        return aggregate(resolution.signature.result, body);
      }
    }
  }

  private bindLambda(element: TypeRef, node: SyntaxNode | undefined): Expr | null {
    if (node === undefined) return null;
    this.scopes.push(element);
    try {
      return this.bind(node);
    } finally {
      this.scopes.pop();
    }
  }

  private identityLambda(element: TypeRef): Expr {
    return { kind: 'parameter', type: element, depth: this.scopes.length, pos: 0 };
  }

  // ============================================================
  // OPERATORS
  // ============================================================

  private resolveOperator(
    operator: string,
    catalog: readonly OperatorSignature[],
    args: readonly Expr[],
    pos: number,
  ): { signature: OperatorSignature; args: readonly Expr[] } {
    const resolution = findBestOverload(catalog, args);
    const types = args.map((a) => typeName(a.type));
    switch (resolution.kind) {
      case 'ok':
        return resolution;
      case 'ambiguous':
        throw new AmbiguousOperatorError(operator, types, pos);
      case 'none':
        throw new IncompatibleOperandsError(operator, types, pos);
    }
  }

  private bindUnary(operator: UnaryOperator, operand: Expr, pos: number): Expr {
    const catalog = operator === '-' ? NEGATION_SIGNATURES : NOT_SIGNATURES;
    const { signature, args } = this.resolveOperator(operator, catalog, [operand], pos);
    const [bound = operand] = args;
    return { kind: 'unary', type: signature.result, operator, operand: bound, pos };
  }

  private bindBinary(operator: BinaryOperator, left: Expr, right: Expr, pos: number): Expr {
    const binary = (signature: OperatorSignature, l: Expr, r: Expr): Expr => ({
      kind: 'binary',
      type: signature.result,
      operator,
      signature,
      left: l,
      right: r,
      pos,
    });
    const resolved = (catalog: readonly OperatorSignature[]): Expr => {
      const { signature, args } = this.resolveOperator(operator, catalog, [left, right], pos);
      const [l = left, r = right] = args;
      return binary(signature, l, r);
    };

    switch (operator) {
      case '||':
      case '&&':
        return resolved(LOGICAL_SIGNATURES);
      case '==':
      case '!=':
        return this.bindEquality(operator, left, right, pos, binary);
      case '<':
      case '<=':
      case '>':
      case '>=':
        return resolved(RELATIONAL_SIGNATURES);
      case '+':
        if (isPrimitive(left.type, 'string') || isPrimitive(right.type, 'string')) {
          return binary({ params: [left.type, right.type], result: STRING }, left, right);
        }
        return resolved(ADD_SIGNATURES);
      case '&':
        return binary({ params: [left.type, right.type], result: STRING }, left, right);
      case '-':
        return resolved(SUBTRACT_SIGNATURES);
      case '*':
      case '/':
      case '%':
        return resolved(ARITHMETIC_SIGNATURES);
    }
  }

  private bindEquality(
    operator: BinaryOperator,
    left: Expr,
    right: Expr,
    pos: number,
    binary: (signature: OperatorSignature, l: Expr, r: Expr) => Expr,
  ): Expr {
    // Comparisons against a null constant need no catalog entry.
    if (left.type.kind === 'null' || right.type.kind === 'null') {
      const other = left.type.kind === 'null' ? right : left;
      if (other.type.kind === 'null') {
        return binary({ params: [NULL_TYPE, NULL_TYPE], result: BOOL }, left, right);
      }
      if (acceptsNull(other.type)) {
        const l = promote(left, other.type) ?? left;
        const r = promote(right, other.type) ?? right;
        return binary({ params: [other.type, other.type], result: BOOL }, l, r);
      }
    }

    const resolution = findBestOverload(EQUALITY_SIGNATURES, [left, right]);
    const types = [typeName(left.type), typeName(right.type)];
    switch (resolution.kind) {
      case 'ok': {
        const [l = left, r = right] = resolution.args;
        return binary(resolution.signature, l, r);
      }
      case 'ambiguous':
        throw new AmbiguousOperatorError(operator, types, pos);
      case 'none':
        break;
    }
    if (
      left.type.kind !== 'primitive' &&
      right.type.kind !== 'primitive' &&
      (isImplicitlyConvertible(left.type, right.type) || isImplicitlyConvertible(right.type, left.type))
    ) {
      return binary({ params: [left.type, right.type], result: BOOL }, left, right);
    }
    if (typesEqual(left.type, right.type)) {
      return binary({ params: [left.type, right.type], result: BOOL }, left, right);
    }
    throw new IncompatibleOperandsError(operator, types, pos);
  }

  private bindConditional(testNode: SyntaxNode, whenTrue: Expr, whenFalse: Expr, pos: number): Expr {
    const test = promote(this.bind(testNode), BOOL);
    if (test === undefined) {
      throw new ParseError("The first expression must be of type 'bool'", startOf(testNode));
    }
    const [t, f] = this.commonBranches(whenTrue, whenFalse, pos);
    return { kind: 'conditional', type: t.type, test, whenTrue: t, whenFalse: f, pos };
  }

  private commonBranches(a: Expr, b: Expr, pos: number): readonly [Expr, Expr] {
    if (typesEqual(a.type, b.type)) return [a, b];

    // A null branch lifts a value-type branch to its nullable form.
    const lift = (value: Expr, nullBranch: Expr): TypeRef | undefined =>
      nullBranch.type.kind === 'null' && value.type.kind === 'primitive' && isValueTypeName(value.type.name)
        ? toNullable(value.type)
        : undefined;
    const lifted = lift(a, b) ?? lift(b, a);
    if (lifted !== undefined) {
      const la = promote(a, lifted);
      const lb = promote(b, lifted);
      if (la !== undefined && lb !== undefined) return [la, lb];
    }

    const aToB = promote(a, b.type);
    const bToA = promote(b, a.type);
    const types = [typeName(a.type), typeName(b.type)];
    if (aToB !== undefined && bToA !== undefined) {
      throw new AmbiguousOperatorError(
        '?:',
        types,
        pos,
        `Both of the types '${types[0] ?? ''}' and '${types[1] ?? ''}' convert to the other`,
      );
    }
    if (aToB !== undefined) return [aToB, b];
    if (bToA !== undefined) return [a, bToA];
    throw new IncompatibleOperandsError(
      '?:',
      types,
      pos,
      `Neither of the types '${types[0] ?? ''}' and '${types[1] ?? ''}' converts to the other`,
    );
  }

  // ============================================================
  // PROJECTIONS AND ARRAYS
  // ============================================================

  private bindNew(members: readonly NewMember[], pos: number): Expr {
    const bound = members.map((member) => {
      const value = this.bind(member.value);
      return { name: member.name ?? this.inferredName(member.value, value), value };
    });

    const seen = new Set<string>();
    for (const [i, member] of bound.entries()) {
      const lower = member.name.toLowerCase();
      if (seen.has(lower)) {
        const source = members[i];
        throw new ParseError(
          `The property '${member.name}' was defined more than once`,
          source === undefined ? pos : startOf(source.value),
        );
      }
      seen.add(lower);
    }

    const properties: DynamicProperty[] = bound.map((m) => ({ name: m.name, type: m.value.type }));
    const record = compileRecordType(properties);
    // A cached type may declare the same fields in another order.
    const values = record.properties.map((p) => {
      const match = bound.find((m) => m.name.toLowerCase() === p.name.toLowerCase());
      if (match === undefined) throw new ParseError(`Missing value for property '${p.name}'`, pos);
      return match.value;
    });
    return { kind: 'new', type: recordType(record), record, members: values, pos };
  }

  private inferredName(node: SyntaxNode, value: Expr): string {
    if (value.kind === 'field') return value.name;
    if (value.kind === 'property') return value.property.name;
    if (node.kind === 'member' || node.kind === 'identifier') return node.name;
    throw new ParseError("Expression is missing an 'as' clause", startOf(node));
  }

  private bindArray(elements: readonly Expr[], pos: number): Expr {
    let common: TypeRef | undefined;
    let sawNull = false;
    for (const element of elements) {
      const t = element.type;
      if (t.kind === 'null') {
        sawNull = true;
      } else if (common === undefined || typesEqual(common, t)) {
        common = t;
      } else if (this.widens(elements, common, t)) {
        common = t;
      } else if (!this.widens(elements, t, common)) {
        throw new ParseError(
          `Array elements of types '${typeName(common)}' and '${typeName(t)}' have no common type`,
          element.pos,
        );
      }
    }
    let elementType = common ?? OBJECT;
    if (sawNull) elementType = toNullable(elementType);

    const promoted = elements.map((e) => {
      const p = promote(e, elementType);
      if (p === undefined) {
        throw new ParseError(`Array element of type '${typeName(e.type)}' cannot be converted to '${typeName(elementType)}'`, e.pos);
      }
      return p;
    });
    return { kind: 'array', type: sequenceOf(elementType), elements: promoted, pos };
  }

  // True when every element already typed `from` converts to `to`.
  private widens(elements: readonly Expr[], from: TypeRef, to: TypeRef): boolean {
    return elements.every((e) => !typesEqual(e.type, from) || promote(e, to) !== undefined);
  }
}

/** Binds one expression; when `resultType` is given the root is converted to it. */
export function bindExpression(node: SyntaxNode, it?: TypeRef, resultType?: TypeRef): Expr {
  const expr = new Binder(it).bind(node);
  if (resultType === undefined) return expr;
  const converted = promote(expr, resultType);
  if (converted === undefined) {
    throw new ParseError(`Expression of type '${typeName(resultType)}' expected`, startOf(node));
  }
  return converted;
}

export function bindOrdering(nodes: readonly OrderingNode[], it: TypeRef): BoundOrdering[] {
  const binder = new Binder(it);
  return nodes.map((node) => ({ selector: binder.bind(node.selector), ascending: node.ascending }));
}
