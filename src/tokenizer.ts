import * as Either from 'effect/Either';
import * as Option from 'effect/Option';
import { ErrorKind, JsonParseError } from './errors.js';
import { SourcePosition, StructuralTokenType, Token, TokenType } from './types.js';

type Result<A> = Either.Either<A, JsonParseError>;

const WHITESPACE = /^[ \n\r\t]$/;
const DIGIT = /^[0-9]$/;

const STRUCTURAL_CHARS: Record<StructuralTokenType, string> = {
  [TokenType.ObjectStart]: '{',
  [TokenType.ObjectEnd]: '}',
  [TokenType.ArrayStart]: '[',
  [TokenType.ArrayEnd]: ']',
  [TokenType.Comma]: ',',
  [TokenType.Colon]: ':',
};

const ESCAPES = new Map<string, string>([
  ['"', '"'],
  ['\\', '\\'],
  ['/', '/'],
  ['b', '\b'],
  ['f', '\f'],
  ['n', '\n'],
  ['r', '\r'],
  ['t', '\t'],
]);

const succeed = (token: Token): Result<Option.Option<Token>> => Either.right(Option.some(token));

/**
 * Pull tokenizer over an in-memory string.
 *
 * The cursor only moves forward. `next()` does not skip whitespace; callers
 * call `eatWhitespaces()` between tokens.
 */
export class Tokenizer {
  private readonly input: string;
  private cursor: SourcePosition;

  constructor(input: string) {
    this.input = input;
    this.cursor = { offset: 0, line: 1, column: 1 };
  }

  getPosition(): SourcePosition {
    return { ...this.cursor };
  }

  isAtEnd(): boolean {
    return this.cursor.offset >= this.input.length;
  }

  /**
   * Scan the token starting at the cursor, consuming exactly its characters.
   */
  next(): Result<Option.Option<Token>> {
    const char = this.peek();
    if (char === undefined) {
      return this.fail(ErrorKind.EOF);
    }

    switch (char) {
      case '{':
        return this.structural(TokenType.ObjectStart);
      case '}':
        return this.structural(TokenType.ObjectEnd);
      case '[':
        return this.structural(TokenType.ArrayStart);
      case ']':
        return this.structural(TokenType.ArrayEnd);
      case ',':
        return this.structural(TokenType.Comma);
      case ':':
        return this.structural(TokenType.Colon);
      case '"':
        return this.processString();
      case 't':
      case 'f':
        return this.processBoolean();
      case 'n':
        return this.processNull();
      default:
        if (char === '-' || DIGIT.test(char)) {
          return this.processNumber();
        }
        return this.fail(ErrorKind.InvalidToken);
    }
  }

  /**
   * Consume a run of space, line feed, carriage return and tab.
   * Returns whether anything was consumed.
   */
  eatWhitespaces(): boolean {
    let eaten = false;
    for (let char = this.peek(); char !== undefined && WHITESPACE.test(char); char = this.peek()) {
      this.one();
      eaten = true;
    }
    return eaten;
  }

  /**
   * Consume the given punctuation token if it is the next character.
   */
  eatToken(expected: StructuralTokenType): boolean {
    return this.eatChar(STRUCTURAL_CHARS[expected]);
  }

  private structural(type: StructuralTokenType): Result<Option.Option<Token>> {
    this.one();
    return succeed({ type });
  }

  private processString(): Result<Option.Option<Token>> {
    if (!this.eatChar('"')) {
      return this.fail(ErrorKind.InvalidString);
    }

    let value = '';
    for (;;) {
      const char = this.peek();
      if (char === undefined) {
        return this.fail(ErrorKind.EOF);
      }

      if (char === '"') {
        this.one();
        return succeed({ type: TokenType.String, value });
      }

      if (char === '\\') {
        this.one();
        const escaped = this.peek();
        if (escaped === undefined) {
          return this.fail(ErrorKind.EOF);
        }
        // \u is not decoded
        const replacement = ESCAPES.get(escaped);
        if (replacement === undefined) {
          return this.fail(ErrorKind.InvalidEscapeChar);
        }
        this.one();
        value += replacement;
        continue;
      }

      this.one();
      value += char;
    }
  }

  private processNumber(): Result<Option.Option<Token>> {
    const integer = this.integer();
    if (Either.isLeft(integer)) {
      return Either.left(integer.left);
    }
    let text = integer.right;

    if (this.eatChar('.')) {
      const fraction = this.fraction();
      if (Either.isLeft(fraction)) {
        return Either.left(fraction.left);
      }
      text += `.${fraction.right}`;
    }

    const marker = this.peek();
    if (marker === 'e' || marker === 'E') {
      this.one();
      const exponent = this.exponent();
      if (Either.isLeft(exponent)) {
        return Either.left(exponent.left);
      }
      text += `${marker}${exponent.right}`;
    }

    return succeed({ type: TokenType.Number, value: text });
  }

  /** `-`? then `0` or a digit run without a leading zero */
  private integer(): Result<string> {
    const sign = this.eatChar('-') ? '-' : '';

    if (this.eatChar('0')) {
      if (this.peekDigit()) {
        return this.fail(ErrorKind.InvalidNumber);
      }
      return Either.right(`${sign}0`);
    }

    const digits = this.digits();
    if (digits === '') {
      return this.fail(ErrorKind.InvalidNumber);
    }
    return Either.right(sign + digits);
  }

  private fraction(): Result<string> {
    const digits = this.digits();
    if (digits === '') {
      return this.fail(ErrorKind.InvalidNumber);
    }
    return Either.right(digits);
  }

  private exponent(): Result<string> {
    const sign = this.peek();
    const prefix = sign === '+' || sign === '-' ? sign : '';
    if (prefix !== '') {
      this.one();
    }

    const digits = this.fraction();
    if (Either.isLeft(digits)) {
      return Either.left(digits.left);
    }
    return Either.right(prefix + digits.right);
  }

  private processBoolean(): Result<Option.Option<Token>> {
    if (this.eatLiteral('true')) {
      return succeed({ type: TokenType.Boolean, value: true });
    }
    if (this.eatLiteral('false')) {
      return succeed({ type: TokenType.Boolean, value: false });
    }
    return this.fail(ErrorKind.InvalidToken);
  }

  private processNull(): Result<Option.Option<Token>> {
    if (this.eatLiteral('null')) {
      return succeed({ type: TokenType.Null });
    }
    return this.fail(ErrorKind.InvalidToken);
  }

  private digits(): string {
    let digits = '';
    while (this.peekDigit()) {
      digits += this.one() ?? '';
    }
    return digits;
  }

  private peekDigit(): boolean {
    const char = this.peek();
    return char !== undefined && DIGIT.test(char);
  }

  // All-or-nothing: the cursor is untouched unless the whole literal matches
  private eatLiteral(literal: string): boolean {
    if (!this.input.startsWith(literal, this.cursor.offset)) {
      return false;
    }
    for (let i = 0; i < literal.length; i++) {
      this.one();
    }
    return true;
  }

  private eatChar(expected: string): boolean {
    if (this.peek() !== expected) {
      return false;
    }
    this.one();
    return true;
  }

  private peek(): string | undefined {
    const code = this.input.codePointAt(this.cursor.offset);
    return code === undefined ? undefined : String.fromCodePoint(code);
  }

  private one(): string | undefined {
    const char = this.peek();
    if (char === undefined) return undefined;

    this.cursor.offset += char.length;
    if (char === '\n') {
      this.cursor.line++;
      this.cursor.column = 1;
    } else {
      this.cursor.column++;
    }
    return char;
  }

  private fail(kind: ErrorKind): Result<never> {
    return Either.left(new JsonParseError(kind, this.getPosition()));
  }
}

/**
 * Run the tokenizer to the end of the input, skipping whitespace between tokens.
 */
export function tokenize(input: string): Result<ReadonlyArray<Token>> {
  const tokenizer = new Tokenizer(input);
  const tokens: Token[] = [];

  for (;;) {
    tokenizer.eatWhitespaces();
    if (tokenizer.isAtEnd()) {
      return Either.right(tokens);
    }

    const next = tokenizer.next();
    if (Either.isLeft(next)) {
      return Either.left(next.left);
    }
    if (Option.isSome(next.right)) {
      tokens.push(next.right.value);
    }
  }
}
