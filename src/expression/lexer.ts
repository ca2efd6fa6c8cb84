import { LexError } from '../errors.js';

export const TOKEN_KINDS = {
  END: 'End',
  IDENTIFIER: 'Identifier',
  STRING: 'StringLiteral',
  INTEGER: 'IntegerLiteral',
  REAL: 'RealLiteral',
  PLACEHOLDER: 'Placeholder',
  EXCLAMATION: '!',
  PERCENT: '%',
  AMPERSAND: '&',
  LPAREN: '(',
  RPAREN: ')',
  ASTERISK: '*',
  PLUS: '+',
  COMMA: ',',
  MINUS: '-',
  DOT: '.',
  SLASH: '/',
  COLON: ':',
  LESS: '<',
  EQUAL: '=',
  GREATER: '>',
  QUESTION: '?',
  LBRACKET: '[',
  RBRACKET: ']',
  BAR: '|',
  NOT_EQUAL: '!=',
  DOUBLE_AMPERSAND: '&&',
  LESS_EQUAL: '<=',
  LESS_GREATER: '<>',
  DOUBLE_EQUAL: '==',
  GREATER_EQUAL: '>=',
  DOUBLE_BAR: '||',
} as const;

export type TokenKind = (typeof TOKEN_KINDS)[keyof typeof TOKEN_KINDS];

export interface Token {
  readonly kind: TokenKind;
  readonly text: string;
  readonly pos: number;
}

const TWO_CHAR_OPERATORS: Record<string, TokenKind> = {
  '!=': TOKEN_KINDS.NOT_EQUAL,
  '&&': TOKEN_KINDS.DOUBLE_AMPERSAND,
  '<=': TOKEN_KINDS.LESS_EQUAL,
  '<>': TOKEN_KINDS.LESS_GREATER,
  '==': TOKEN_KINDS.DOUBLE_EQUAL,
  '>=': TOKEN_KINDS.GREATER_EQUAL,
  '||': TOKEN_KINDS.DOUBLE_BAR,
};

const SINGLE_CHAR_OPERATORS: Record<string, TokenKind> = {
  '!': TOKEN_KINDS.EXCLAMATION,
  '%': TOKEN_KINDS.PERCENT,
  '&': TOKEN_KINDS.AMPERSAND,
  '(': TOKEN_KINDS.LPAREN,
  ')': TOKEN_KINDS.RPAREN,
  '*': TOKEN_KINDS.ASTERISK,
  '+': TOKEN_KINDS.PLUS,
  ',': TOKEN_KINDS.COMMA,
  '-': TOKEN_KINDS.MINUS,
  '.': TOKEN_KINDS.DOT,
  '/': TOKEN_KINDS.SLASH,
  ':': TOKEN_KINDS.COLON,
  '<': TOKEN_KINDS.LESS,
  '=': TOKEN_KINDS.EQUAL,
  '>': TOKEN_KINDS.GREATER,
  '?': TOKEN_KINDS.QUESTION,
  '[': TOKEN_KINDS.LBRACKET,
  ']': TOKEN_KINDS.RBRACKET,
  '|': TOKEN_KINDS.BAR,
};

// ============================================================
// LEXER STATE
// ============================================================

export interface LexerState {
  readonly source: string;
  pos: number;
}

export function createLexerState(source: string): LexerState {
  return { source, pos: 0 };
}

function peek(state: LexerState, offset = 0): string {
  return state.source[state.pos + offset] ?? '';
}

function isAtEnd(state: LexerState): boolean {
  return state.pos >= state.source.length;
}

function isDigit(ch: string): boolean {
  return ch >= '0' && ch <= '9';
}

function isHexDigit(ch: string): boolean {
  return isDigit(ch) || (ch >= 'a' && ch <= 'f') || (ch >= 'A' && ch <= 'F');
}

function isIdentifierStart(ch: string): boolean {
  return (ch >= 'a' && ch <= 'z') || (ch >= 'A' && ch <= 'Z') || ch === '_' || /\p{L}/u.test(ch);
}

function isIdentifierPart(ch: string): boolean {
  return isIdentifierStart(ch) || isDigit(ch);
}

function isWhitespace(ch: string): boolean {
  return ch === ' ' || ch === '\t' || ch === '\n' || ch === '\r' || ch === '\f' || ch === '\v';
}

function makeToken(state: LexerState, kind: TokenKind, start: number): Token {
  return { kind, text: state.source.slice(start, state.pos), pos: start };
}

// ============================================================
// READERS
// ============================================================

function readString(state: LexerState, start: number): Token {
  const quote = peek(state);
  do {
    state.pos++;
    while (!isAtEnd(state) && peek(state) !== quote) state.pos++;
    if (isAtEnd(state)) {
      throw new LexError('Unterminated string literal', state.pos);
    }
    state.pos++;
    // A doubled quote is an escaped quote; keep scanning.
  } while (peek(state) === quote);
  return makeToken(state, TOKEN_KINDS.STRING, start);
}

function readDigits(state: LexerState): void {
  if (!isDigit(peek(state))) {
    throw new LexError('Digit expected', state.pos);
  }
  while (isDigit(peek(state))) state.pos++;
}

function readNumber(state: LexerState, start: number): Token {
  if (peek(state) === '0' && (peek(state, 1) === 'x' || peek(state, 1) === 'X')) {
    state.pos += 2;
    if (!isHexDigit(peek(state))) {
      throw new LexError('Digit expected', state.pos);
    }
    while (isHexDigit(peek(state))) state.pos++;
    readIntegerSuffix(state);
    return makeToken(state, TOKEN_KINDS.INTEGER, start);
  }

  let kind: TokenKind = TOKEN_KINDS.INTEGER;
  readDigits(state);
  if (peek(state) === '.' && isDigit(peek(state, 1))) {
    kind = TOKEN_KINDS.REAL;
    state.pos++;
    readDigits(state);
  }
  if (peek(state) === 'E' || peek(state) === 'e') {
    kind = TOKEN_KINDS.REAL;
    state.pos++;
    if (peek(state) === '+' || peek(state) === '-') state.pos++;
    readDigits(state);
  }
  const suffix = peek(state).toUpperCase();
  if (suffix === 'F' || suffix === 'D' || suffix === 'M') {
    state.pos++;
    return makeToken(state, TOKEN_KINDS.REAL, start);
  }
  if (kind === TOKEN_KINDS.INTEGER) readIntegerSuffix(state);
  return makeToken(state, kind, start);
}

function readIntegerSuffix(state: LexerState): void {
  const first = peek(state).toUpperCase();
  if (first !== 'U' && first !== 'L') return;
  state.pos++;
  const second = peek(state).toUpperCase();
  if ((first === 'U' && second === 'L') || (first === 'L' && second === 'U')) state.pos++;
}

function readPlaceholder(state: LexerState, start: number): Token {
  state.pos++;
  readDigits(state);
  if (peek(state) !== '}') {
    throw new LexError("'}' expected", state.pos);
  }
  state.pos++;
  return makeToken(state, TOKEN_KINDS.PLACEHOLDER, start);
}

// ============================================================
// TOKENIZER
// ============================================================

export function nextToken(state: LexerState): Token {
  while (!isAtEnd(state) && isWhitespace(peek(state))) state.pos++;

  const start = state.pos;
  if (isAtEnd(state)) {
    return { kind: TOKEN_KINDS.END, text: '', pos: start };
  }

  const ch = peek(state);

  if (ch === '"' || ch === "'") {
    return readString(state, start);
  }

  if (isDigit(ch)) {
    return readNumber(state, start);
  }

  if (ch === '{') {
    return readPlaceholder(state, start);
  }

  if (isIdentifierStart(ch) || ch === '@') {
    state.pos++;
    while (isIdentifierPart(peek(state))) state.pos++;
    if (state.pos - start === 1 && ch === '@') {
      throw new LexError("Syntax error '@'", start);
    }
    return makeToken(state, TOKEN_KINDS.IDENTIFIER, start);
  }

  const twoChar = state.source.slice(state.pos, state.pos + 2);
  const twoCharKind = TWO_CHAR_OPERATORS[twoChar];
  if (twoCharKind !== undefined) {
    state.pos += 2;
    return makeToken(state, twoCharKind, start);
  }

  const singleCharKind = SINGLE_CHAR_OPERATORS[ch];
  if (singleCharKind !== undefined) {
    state.pos++;
    return makeToken(state, singleCharKind, start);
  }

  throw new LexError(`Syntax error '${ch}'`, start);
}

/**
 * Lazily tokenizes `source`. The sequence always ends with a single End
 * token; to start over, call tokenize again.
 */
export function* tokenize(source: string): Generator<Token, void, undefined> {
  const state = createLexerState(source);
  let token: Token;
  do {
    token = nextToken(state);
    yield token;
  } while (token.kind !== TOKEN_KINDS.END);
}
