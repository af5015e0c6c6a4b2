import type { SourcePosition } from './types.js';

/**
 * Every failure the tokenizer or the parser can report
 */
export enum ErrorKind {
  EOF = 'EOF',
  InvalidToken = 'INVALID_TOKEN',
  InvalidString = 'INVALID_STRING',
  InvalidEscapeChar = 'INVALID_ESCAPE_CHAR',
  InvalidNumber = 'INVALID_NUMBER',
  DepthExceeded = 'DEPTH_EXCEEDED',
}

const DESCRIPTIONS: Record<ErrorKind, string> = {
  [ErrorKind.EOF]: 'Unexpected end of input',
  [ErrorKind.InvalidToken]: 'Unexpected token',
  [ErrorKind.InvalidString]: 'Expected a string',
  [ErrorKind.InvalidEscapeChar]: 'Invalid escape sequence',
  [ErrorKind.InvalidNumber]: 'Invalid number',
  [ErrorKind.DepthExceeded]: 'Maximum nesting depth exceeded',
};

export class JsonParseError extends Error {
  readonly kind: ErrorKind;
  readonly position: SourcePosition;

  constructor(kind: ErrorKind, position: SourcePosition) {
    super(`${DESCRIPTIONS[kind]} at line ${position.line}, column ${position.column}`);
    this.name = 'JsonParseError';
    this.kind = kind;
    this.position = position;
  }
}
