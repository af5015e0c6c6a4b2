import { describe, it, expect } from 'vitest';
import { ErrorKind, JsonParseError } from '../src/errors.js';

describe('JsonParseError', () => {
  it('should carry kind and position', () => {
    const position = { offset: 7, line: 2, column: 3 };
    const error = new JsonParseError(ErrorKind.InvalidNumber, position);

    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe('JsonParseError');
    expect(error.kind).toBe(ErrorKind.InvalidNumber);
    expect(error.position).toEqual(position);
  });

  it.each([
    [ErrorKind.EOF, 'Unexpected end of input at line 1, column 1'],
    [ErrorKind.InvalidToken, 'Unexpected token at line 1, column 1'],
    [ErrorKind.InvalidString, 'Expected a string at line 1, column 1'],
    [ErrorKind.InvalidEscapeChar, 'Invalid escape sequence at line 1, column 1'],
    [ErrorKind.InvalidNumber, 'Invalid number at line 1, column 1'],
    [ErrorKind.DepthExceeded, 'Maximum nesting depth exceeded at line 1, column 1'],
  ])('should describe %s', (kind, message) => {
    expect(new JsonParseError(kind, { offset: 0, line: 1, column: 1 }).message).toBe(message);
  });
});
