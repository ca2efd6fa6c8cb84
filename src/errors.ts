/**
 * Raised for any problem in expression text: grammar violations, unknown
 * identifiers and type errors. `position` is the 0-based character offset
 * where the problem was detected.
 */
export class ParseError extends Error {
  override readonly name: string = 'ParseError';

  constructor(
    message: string,
    readonly position: number,
  ) {
    super(message);
    // Restore prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);
  }

  override toString(): string {
    return `${this.message} (at index ${this.position})`;
  }
}

export class LexError extends ParseError {
  override readonly name = 'LexError';
}

export class IncompatibleOperandsError extends ParseError {
  override readonly name = 'IncompatibleOperandsError';

  constructor(
    readonly operator: string,
    readonly operandTypes: readonly string[],
    position: number,
    message?: string,
  ) {
    super(message ?? incompatibleMessage(operator, operandTypes), position);
  }
}

export class AmbiguousOperatorError extends ParseError {
  override readonly name = 'AmbiguousOperatorError';

  constructor(
    readonly operator: string,
    readonly operandTypes: readonly string[],
    position: number,
    message?: string,
  ) {
    super(
      message ?? `Ambiguous use of operator '${operator}' with operand types ${quoteAll(operandTypes)}`,
      position,
    );
  }
}

export class UnknownMemberError extends ParseError {
  override readonly name = 'UnknownMemberError';

  constructor(
    readonly member: string,
    readonly typeName: string,
    position: number,
    message?: string,
  ) {
    super(message ?? `No property or field '${member}' exists in type '${typeName}'`, position);
  }
}

/** Invalid argument rejected at the API boundary, before any parsing happens. */
export class ArgumentError extends Error {
  override readonly name = 'ArgumentError';

  constructor(
    readonly argument: string,
    message: string,
  ) {
    super(message);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class RepositoryError extends Error {
  override readonly name: string = 'RepositoryError';

  constructor(
    message: string,
    override readonly cause?: unknown,
  ) {
    super(message);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class EntityNotFoundError extends RepositoryError {
  override readonly name = 'EntityNotFoundError';

  constructor(
    readonly entityName: string,
    readonly key: unknown,
  ) {
    super(`${entityName} with key ${String(key)} not found`);
  }
}

export class NonUniqueResultError extends RepositoryError {
  override readonly name = 'NonUniqueResultError';

  constructor(readonly entityName: string) {
    super(`Predicate matched more than one ${entityName}`);
  }
}

/** A bound expression that has no SQL translation. */
export class UnsupportedExpressionError extends RepositoryError {
  override readonly name = 'UnsupportedExpressionError';

  constructor(
    message: string,
    readonly position: number,
  ) {
    super(message);
  }
}

/**
 * Renders a parse error against its source text as two lines: the source
 * line containing the error and a caret under the offending column.
 */
export function formatParseError(error: ParseError, source: string): string {
  const position = Math.max(0, Math.min(error.position, source.length));
  const lineStart = source.lastIndexOf('\n', position - 1) + 1;
  const newline = source.indexOf('\n', position);
  const lineEnd = newline === -1 ? source.length : newline;
  const line = source.slice(lineStart, lineEnd);
  const caret = `${' '.repeat(position - lineStart)}^`;
  return `${error.toString()}\n${line}\n${caret}`;
}

function quoteAll(types: readonly string[]): string {
  return types.map((t) => `'${t}'`).join(' and ');
}

function incompatibleMessage(operator: string, types: readonly string[]): string {
  if (types.length === 1) {
    return `Operator '${operator}' incompatible with operand type '${types[0] ?? ''}'`;
  }
  return `Operator '${operator}' incompatible with operand types ${quoteAll(types)}`;
}
