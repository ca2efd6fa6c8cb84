import { ArgumentError, ParseError } from '../errors.js';
import { createLexerState, nextToken, TOKEN_KINDS, type LexerState, type Token, type TokenKind } from './lexer.js';
import type { BinaryOperator, NewMember, OrderingNode, SyntaxNode, TypeNodeName } from './syntax.js';
import { resolvePrimitiveName } from './type-system.js';

export interface SyntaxOptions {
  /** Values substituted for `{0}`, `{1}`, ... and `@0`, `@1`, ... */
  readonly values?: readonly unknown[];
  /** Named values, referenced as `@name` or as a bare identifier. */
  readonly externals?: Readonly<Record<string, unknown>>;
}

export interface OrderingSyntaxOptions extends SyntaxOptions {
  /** Direction of keys written without `asc` or `desc`. */
  readonly descending?: boolean;
}

const EQUALITY_OPERATORS: Partial<Record<TokenKind, BinaryOperator>> = {
  [TOKEN_KINDS.EQUAL]: '==',
  [TOKEN_KINDS.DOUBLE_EQUAL]: '==',
  [TOKEN_KINDS.NOT_EQUAL]: '!=',
  [TOKEN_KINDS.LESS_GREATER]: '!=',
};

const RELATIONAL_OPERATORS: Partial<Record<TokenKind, BinaryOperator>> = {
  [TOKEN_KINDS.LESS]: '<',
  [TOKEN_KINDS.LESS_EQUAL]: '<=',
  [TOKEN_KINDS.GREATER]: '>',
  [TOKEN_KINDS.GREATER_EQUAL]: '>=',
};

const ADDITIVE_OPERATORS: Partial<Record<TokenKind, BinaryOperator>> = {
  [TOKEN_KINDS.PLUS]: '+',
  [TOKEN_KINDS.MINUS]: '-',
  [TOKEN_KINDS.AMPERSAND]: '&',
};

const MULTIPLICATIVE_OPERATORS: Partial<Record<TokenKind, BinaryOperator>> = {
  [TOKEN_KINDS.ASTERISK]: '*',
  [TOKEN_KINDS.SLASH]: '/',
  [TOKEN_KINDS.PERCENT]: '%',
};

/**
 * Recursive-descent parser over a pull-based token stream. One instance
 * parses one source text; each precedence level is its own method and
 * loops left-associatively.
 */
class Parser {
  private readonly lexer: LexerState;
  private token: Token;
  private readonly values: readonly unknown[];
  private readonly externals: ReadonlyMap<string, unknown>;

  constructor(text: string, options: SyntaxOptions) {
    this.values = options.values ?? [];
    const externals = new Map<string, unknown>();
    for (const [name, value] of Object.entries(options.externals ?? {})) {
      const key = name.toLowerCase();
      if (externals.has(key)) {
        throw new ArgumentError('externals', `The identifier '${name}' was defined more than once`);
      }
      externals.set(key, value);
    }
    this.externals = externals;
    this.lexer = createLexerState(text);
    this.token = nextToken(this.lexer);
  }

  parseRoot(): SyntaxNode {
    const expr = this.parseExpression();
    this.validateEnd();
    return expr;
  }

  parseOrderingRoot(descending: boolean): OrderingNode[] {
    const orderings: OrderingNode[] = [];
    for (;;) {
      const selector = this.parseExpression();
      let ascending = !descending;
      if (this.identifierIs('asc') || this.identifierIs('ascending')) {
        this.advance();
        ascending = true;
      } else if (this.identifierIs('desc') || this.identifierIs('descending')) {
        this.advance();
        ascending = false;
      }
      orderings.push({ selector, ascending });
      if (this.token.kind !== TOKEN_KINDS.COMMA) break;
      this.advance();
    }
    this.validateEnd();
    return orderings;
  }

  // ============================================================
  // PRECEDENCE LEVELS
  // ============================================================

  // ?: operator
  private parseExpression(): SyntaxNode {
    const pos = this.token.pos;
    const expr = this.parseLogicalOr();
    if (this.token.kind !== TOKEN_KINDS.QUESTION) return expr;
    this.advance();
    const whenTrue = this.parseExpression();
    this.expect(TOKEN_KINDS.COLON, "':' expected");
    const whenFalse = this.parseExpression();
    return { kind: 'conditional', test: expr, whenTrue, whenFalse, pos };
  }

  // ||, or operator
  private parseLogicalOr(): SyntaxNode {
    let left = this.parseLogicalAnd();
    while (this.token.kind === TOKEN_KINDS.DOUBLE_BAR || this.identifierIs('or')) {
      const pos = this.token.pos;
      this.advance();
      const right = this.parseLogicalAnd();
      left = { kind: 'binary', operator: '||', left, right, pos };
    }
    return left;
  }

  // &&, and operator
  private parseLogicalAnd(): SyntaxNode {
    let left = this.parseEquality();
    while (this.token.kind === TOKEN_KINDS.DOUBLE_AMPERSAND || this.identifierIs('and')) {
      const pos = this.token.pos;
      this.advance();
      const right = this.parseEquality();
      left = { kind: 'binary', operator: '&&', left, right, pos };
    }
    return left;
  }

  // =, ==, !=, <> operators
  private parseEquality(): SyntaxNode {
    return this.parseBinaryLevel(EQUALITY_OPERATORS, () => this.parseRelational());
  }

  // <, <=, >, >= operators
  private parseRelational(): SyntaxNode {
    return this.parseBinaryLevel(RELATIONAL_OPERATORS, () => this.parseAdditive());
  }

  // +, -, & operators
  private parseAdditive(): SyntaxNode {
    return this.parseBinaryLevel(ADDITIVE_OPERATORS, () => this.parseMultiplicative());
  }

  // *, /, %, mod operators
  private parseMultiplicative(): SyntaxNode {
    let left = this.parseUnary();
    for (;;) {
      const operator = MULTIPLICATIVE_OPERATORS[this.token.kind] ?? (this.identifierIs('mod') ? '%' : undefined);
      if (operator === undefined) return left;
      const pos = this.token.pos;
      this.advance();
      const right = this.parseUnary();
      left = { kind: 'binary', operator, left, right, pos };
    }
  }

  private parseBinaryLevel(
    operators: Partial<Record<TokenKind, BinaryOperator>>,
    next: () => SyntaxNode,
  ): SyntaxNode {
    let left = next();
    for (;;) {
      const operator = operators[this.token.kind];
      if (operator === undefined) return left;
      const pos = this.token.pos;
      this.advance();
      const right = next();
      left = { kind: 'binary', operator, left, right, pos };
    }
  }

  // -, !, not unary operators
  private parseUnary(): SyntaxNode {
    const pos = this.token.pos;
    if (this.token.kind === TOKEN_KINDS.MINUS) {
      this.advance();
      // Fold the sign into a following numeric literal so -2147483648 stays an int.
      const literal: Token = this.token;
      if (literal.kind === TOKEN_KINDS.INTEGER || literal.kind === TOKEN_KINDS.REAL) {
        this.advance();
        return this.parsePostfix(this.parseNumericLiteral(literal, true, pos));
      }
      const operand = this.parseUnary();
      return { kind: 'unary', operator: '-', operand, pos };
    }
    if (this.token.kind === TOKEN_KINDS.EXCLAMATION || this.identifierIs('not')) {
      this.advance();
      const operand = this.parseUnary();
      return { kind: 'unary', operator: '!', operand, pos };
    }
    return this.parsePrimary();
  }

  private parsePrimary(): SyntaxNode {
    return this.parsePostfix(this.parsePrimaryStart());
  }

  // .member, .method(...), [index]
  private parsePostfix(start: SyntaxNode): SyntaxNode {
    let expr = start;
    for (;;) {
      if (this.token.kind === TOKEN_KINDS.DOT) {
        this.advance();
        expr = this.parseMemberAccess(expr);
      } else if (this.token.kind === TOKEN_KINDS.LBRACKET) {
        const pos = this.token.pos;
        this.advance();
        const args = this.parseArgumentList(TOKEN_KINDS.RBRACKET, "']' or ',' expected");
        expr = { kind: 'index', target: expr, args, pos };
      } else {
        return expr;
      }
    }
  }

  private parsePrimaryStart(): SyntaxNode {
    const token = this.token;
    switch (token.kind) {
      case TOKEN_KINDS.IDENTIFIER:
        return this.parseIdentifier();
      case TOKEN_KINDS.STRING:
        this.advance();
        return this.parseStringLiteral(token);
      case TOKEN_KINDS.INTEGER:
      case TOKEN_KINDS.REAL:
        this.advance();
        return this.parseNumericLiteral(token, false, token.pos);
      case TOKEN_KINDS.PLACEHOLDER:
        this.advance();
        return this.substitute(Number.parseInt(token.text.slice(1, -1), 10), token);
      case TOKEN_KINDS.LPAREN: {
        this.advance();
        const expr = this.parseExpression();
        this.expect(TOKEN_KINDS.RPAREN, "')' or operator expected");
        return expr;
      }
      case TOKEN_KINDS.LBRACKET: {
        this.advance();
        const elements = this.parseArgumentList(TOKEN_KINDS.RBRACKET, "']' or ',' expected", true);
        return { kind: 'array', elements, pos: token.pos };
      }
      default:
        throw new ParseError('Expression expected', token.pos);
    }
  }

  // ============================================================
  // LITERALS
  // ============================================================

  private parseStringLiteral(token: Token): SyntaxNode {
    const quote = token.text[0] ?? '"';
    const value = token.text.slice(1, -1).split(quote + quote).join(quote);
    if (quote === "'") {
      if (value.length !== 1) {
        throw new ParseError('Character literal must contain exactly one character', token.pos);
      }
      return { kind: 'literal', literal: 'char', value, text: token.text, pos: token.pos };
    }
    return { kind: 'literal', literal: 'string', value, text: token.text, pos: token.pos };
  }

  private parseNumericLiteral(token: Token, negate: boolean, pos: number): SyntaxNode {
    const text = negate ? `-${token.text}` : token.text;
    if (token.kind === TOKEN_KINDS.INTEGER) {
      const digits = token.text.replace(/[uUlL]+$/, '');
      const value = /^0[xX]/.test(digits) ? Number.parseInt(digits.slice(2), 16) : Number(digits);
      if (!Number.isFinite(value)) {
        throw new ParseError(`Invalid integer literal '${text}'`, pos);
      }
      return { kind: 'literal', literal: 'integer', value: negate ? -value : value, text, pos };
    }
    const value = Number(token.text.replace(/[fFdDmM]$/, ''));
    if (!Number.isFinite(value)) {
      throw new ParseError(`Invalid real literal '${text}'`, pos);
    }
    return { kind: 'literal', literal: 'real', value: negate ? -value : value, text, pos };
  }

  // ============================================================
  // IDENTIFIERS AND MEMBERS
  // ============================================================

  private parseIdentifier(): SyntaxNode {
    const token = this.token;
    const name = token.text;
    const lower = name.toLowerCase();

    if (name.startsWith('@')) {
      this.advance();
      const rest = name.slice(1);
      if (/^\d+$/.test(rest)) return this.substitute(Number.parseInt(rest, 10), token);
      return this.external(rest, token);
    }

    switch (lower) {
      case 'true':
      case 'false':
        this.advance();
        return { kind: 'literal', literal: 'bool', value: lower === 'true', text: name, pos: token.pos };
      case 'null':
        this.advance();
        return { kind: 'literal', literal: 'null', value: null, text: name, pos: token.pos };
      case 'it':
        this.advance();
        return { kind: 'it', pos: token.pos };
      case 'iif':
        return this.parseIif();
      case 'new':
        return this.parseNew();
      default:
        break;
    }

    const typeName = lower === 'math' ? 'Math' : resolvePrimitiveName(name);
    if (typeName !== undefined) {
      return this.parseTypeAccess(typeName, token.pos);
    }

    if (this.externals.has(lower)) {
      this.advance();
      return { kind: 'value', value: this.externals.get(lower), pos: token.pos };
    }

    // Anything else is a member of the implicit `it`.
    this.advance();
    if (this.token.kind === TOKEN_KINDS.LPAREN) {
      this.advance();
      const args = this.parseArgumentList(TOKEN_KINDS.RPAREN, "')' or ',' expected", true);
      return { kind: 'call', target: { kind: 'it', pos: token.pos }, name, args, pos: token.pos };
    }
    return { kind: 'identifier', name, pos: token.pos };
  }

  private parseMemberAccess(target: SyntaxNode): SyntaxNode {
    const token = this.token;
    if (token.kind !== TOKEN_KINDS.IDENTIFIER || token.text.startsWith('@')) {
      throw new ParseError('Identifier expected', token.pos);
    }
    this.advance();
    if (this.token.kind === TOKEN_KINDS.LPAREN) {
      this.advance();
      const args = this.parseArgumentList(TOKEN_KINDS.RPAREN, "')' or ',' expected", true);
      return { kind: 'call', target, name: token.text, args, pos: token.pos };
    }
    return { kind: 'member', target, name: token.text, pos: token.pos };
  }

  private parseTypeAccess(name: TypeNodeName, pos: number): SyntaxNode {
    this.advance();
    let nullable = false;
    if (this.token.kind === TOKEN_KINDS.QUESTION && name !== 'Math') {
      nullable = true;
      this.advance();
    }
    const typeNode: SyntaxNode = { kind: 'type', name, nullable, pos };
    if (this.token.kind === TOKEN_KINDS.LPAREN) {
      this.advance();
      const args = this.parseArgumentList(TOKEN_KINDS.RPAREN, "')' or ',' expected", true);
      return { kind: 'call', target: typeNode, name: null, args, pos };
    }
    if (this.token.kind !== TOKEN_KINDS.DOT) {
      throw new ParseError("'.' or '(' expected", this.token.pos);
    }
    this.advance();
    return this.parseMemberAccess(typeNode);
  }

  private parseIif(): SyntaxNode {
    const pos = this.token.pos;
    this.advance();
    this.expect(TOKEN_KINDS.LPAREN, "'(' expected");
    const args = this.parseArgumentList(TOKEN_KINDS.RPAREN, "')' or ',' expected", true);
    const [test, whenTrue, whenFalse] = args;
    if (args.length !== 3 || test === undefined || whenTrue === undefined || whenFalse === undefined) {
      throw new ParseError("The 'iif' function requires three arguments", pos);
    }
    return { kind: 'conditional', test, whenTrue, whenFalse, pos };
  }

  private parseNew(): SyntaxNode {
    const pos = this.token.pos;
    this.advance();
    this.expect(TOKEN_KINDS.LPAREN, "'(' expected");
    const members: NewMember[] = [];
    for (;;) {
      const exprPos = this.token.pos;
      const value = this.parseExpression();
      let name: string | null = null;
      if (this.identifierIs('as')) {
        this.advance();
        if (this.token.kind !== TOKEN_KINDS.IDENTIFIER) {
          throw new ParseError('Identifier expected', this.token.pos);
        }
        name = this.token.text;
        this.advance();
      } else if (value.kind !== 'member' && value.kind !== 'identifier') {
        throw new ParseError("Expression is missing an 'as' clause", exprPos);
      }
      members.push({ name, value });
      if (this.token.kind !== TOKEN_KINDS.COMMA) break;
      this.advance();
    }
    this.expect(TOKEN_KINDS.RPAREN, "')' or ',' expected");
    return { kind: 'new', members, pos };
  }

  // ============================================================
  // HELPERS
  // ============================================================

  /** Parses `a, b, c` up to and including `close`; the opening token is already consumed. */
  private parseArgumentList(close: TokenKind, message: string, allowEmpty = false): SyntaxNode[] {
    const args: SyntaxNode[] = [];
    if (allowEmpty && this.token.kind === close) {
      this.advance();
      return args;
    }
    for (;;) {
      args.push(this.parseExpression());
      if (this.token.kind !== TOKEN_KINDS.COMMA) break;
      this.advance();
    }
    this.expect(close, message);
    return args;
  }

  private substitute(index: number, token: Token): SyntaxNode {
    if (index >= this.values.length) {
      throw new ParseError(`Unknown identifier '${token.text}'`, token.pos);
    }
    return { kind: 'value', value: this.values[index], pos: token.pos };
  }

  private external(name: string, token: Token): SyntaxNode {
    const key = name.toLowerCase();
    if (!this.externals.has(key)) {
      throw new ParseError(`Unknown identifier '${token.text}'`, token.pos);
    }
    return { kind: 'value', value: this.externals.get(key), pos: token.pos };
  }

  private identifierIs(word: string): boolean {
    return this.token.kind === TOKEN_KINDS.IDENTIFIER && this.token.text.toLowerCase() === word;
  }

  private advance(): void {
    this.token = nextToken(this.lexer);
  }

  private expect(kind: TokenKind, message: string): void {
    if (this.token.kind !== kind) {
      throw new ParseError(message, this.token.pos);
    }
    this.advance();
  }

  private validateEnd(): void {
    if (this.token.kind !== TOKEN_KINDS.END) {
      throw new ParseError('Syntax error', this.token.pos);
    }
  }
}

function requireText(text: unknown, argument: string): string {
  if (typeof text !== 'string' || text.trim() === '') {
    throw new ArgumentError(argument, `${argument} must be a non-empty string`);
  }
  return text;
}

/** Parses one expression into an untyped syntax tree. */
export function parseSyntax(text: string, options: SyntaxOptions = {}): SyntaxNode {
  return new Parser(requireText(text, 'expression'), options).parseRoot();
}

/** Parses `key [asc|desc], key [asc|desc], ...`; entries keep their source order. */
export function parseOrderingSyntax(text: string, options: OrderingSyntaxOptions = {}): OrderingNode[] {
  return new Parser(requireText(text, 'ordering'), options).parseOrderingRoot(options.descending ?? false);
}
