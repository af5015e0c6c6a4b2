import * as Either from 'effect/Either';
import * as Option from 'effect/Option';
import { ErrorKind, JsonParseError } from './errors.js';
import { Tokenizer } from './tokenizer.js';
import {
  ParserEvents,
  ParserOptions,
  SourcePosition,
  TokenType,
  Value,
  ValueType,
} from './types.js';

type Result<A> = Either.Either<A, JsonParseError>;

interface ResolvedOptions {
  maxDepth: number;
  allowTrailingContent: boolean;
  events: ParserEvents;
}

const DEFAULT_MAX_DEPTH = 512;

const resolveMaxDepth = (maxDepth: number | undefined): number =>
  maxDepth !== undefined && Number.isSafeInteger(maxDepth) && maxDepth >= 0 ? maxDepth : DEFAULT_MAX_DEPTH;

const some = (value: Value): Result<Option.Option<Value>> => Either.right(Option.some(value));

/**
 * Recursive-descent parser building a {@link Value} tree from one input string.
 * Each instance parses its input once.
 */
export class Deserializer {
  private tokenizer: Tokenizer;
  private options: ResolvedOptions;

  constructor(input: string, options: ParserOptions = {}) {
    this.options = {
      maxDepth: resolveMaxDepth(options.maxDepth),
      allowTrailingContent: options.allowTrailingContent ?? false,
      events: options.events ?? {},
    };
    this.tokenizer = new Tokenizer(input);
  }

  getPosition(): SourcePosition {
    return this.tokenizer.getPosition();
  }

  /**
   * Parse exactly one top-level value. Unless `allowTrailingContent` is set,
   * anything but whitespace after it fails with `InvalidToken`.
   */
  parse(): Result<Option.Option<Value>> {
    const result = this.document();

    if (Either.isLeft(result)) {
      this.options.events.onError?.(result.left);
    } else if (Option.isSome(result.right)) {
      this.options.events.onComplete?.(result.right.value);
    }

    return result;
  }

  private document(): Result<Option.Option<Value>> {
    const result = this.value(0);
    if (Either.isLeft(result) || this.options.allowTrailingContent) {
      return result;
    }

    this.tokenizer.eatWhitespaces();
    if (!this.tokenizer.isAtEnd()) {
      return this.fail(ErrorKind.InvalidToken);
    }
    return result;
  }

  private value(depth: number): Result<Option.Option<Value>> {
    this.tokenizer.eatWhitespaces();

    const start = this.tokenizer.getPosition();
    const next = this.tokenizer.next();
    if (Either.isLeft(next)) {
      return Either.left(next.left);
    }
    if (Option.isNone(next.right)) {
      return this.failAt(ErrorKind.InvalidToken, start);
    }

    const token = next.right.value;
    switch (token.type) {
      case TokenType.ObjectStart:
        return this.object(depth + 1, start);
      case TokenType.ArrayStart:
        return this.array(depth + 1, start);
      case TokenType.String:
        return some({ type: ValueType.String, value: token.value });
      case TokenType.Number:
        return some({ type: ValueType.Number, value: token.value });
      case TokenType.Boolean:
        return some({ type: ValueType.Boolean, value: token.value });
      case TokenType.Null:
        return some({ type: ValueType.Null });
      case TokenType.ObjectEnd:
      case TokenType.ArrayEnd:
      case TokenType.Comma:
      case TokenType.Colon:
        return this.failAt(ErrorKind.InvalidToken, start);
    }
  }

  // Entered after `{`
  private object(depth: number, start: SourcePosition): Result<Option.Option<Value>> {
    if (depth > this.options.maxDepth) {
      return this.failAt(ErrorKind.DepthExceeded, start);
    }

    // Duplicate keys: last one wins
    const entries = new Map<string, Value>();

    this.tokenizer.eatWhitespaces();
    if (this.tokenizer.eatToken(TokenType.ObjectEnd)) {
      return some({ type: ValueType.Object, value: entries });
    }

    for (;;) {
      this.tokenizer.eatWhitespaces();

      const keyStart = this.tokenizer.getPosition();
      const next = this.tokenizer.next();
      if (Either.isLeft(next)) {
        return Either.left(next.left);
      }
      const key = Option.getOrUndefined(next.right);
      if (key === undefined || key.type !== TokenType.String) {
        return this.failAt(ErrorKind.InvalidToken, keyStart);
      }

      this.tokenizer.eatWhitespaces();
      if (!this.tokenizer.eatToken(TokenType.Colon)) {
        return this.fail(ErrorKind.InvalidToken);
      }

      this.tokenizer.eatWhitespaces();
      const member = this.value(depth);
      if (Either.isLeft(member)) {
        return member;
      }
      if (Option.isNone(member.right)) {
        return this.fail(ErrorKind.InvalidToken);
      }
      entries.set(key.value, member.right.value);

      this.tokenizer.eatWhitespaces();
      if (this.tokenizer.eatToken(TokenType.ObjectEnd)) {
        return some({ type: ValueType.Object, value: entries });
      }
      if (!this.tokenizer.eatToken(TokenType.Comma)) {
        return this.fail(ErrorKind.InvalidToken);
      }
    }
  }

  // Entered after `[`
  private array(depth: number, start: SourcePosition): Result<Option.Option<Value>> {
    if (depth > this.options.maxDepth) {
      return this.failAt(ErrorKind.DepthExceeded, start);
    }

    const elements: Value[] = [];

    this.tokenizer.eatWhitespaces();
    if (this.tokenizer.eatToken(TokenType.ArrayEnd)) {
      return some({ type: ValueType.Array, value: elements });
    }

    for (;;) {
      this.tokenizer.eatWhitespaces();

      const element = this.value(depth);
      if (Either.isLeft(element)) {
        return element;
      }
      if (Option.isNone(element.right)) {
        return this.fail(ErrorKind.InvalidToken);
      }
      elements.push(element.right.value);

      this.tokenizer.eatWhitespaces();
      if (this.tokenizer.eatToken(TokenType.ArrayEnd)) {
        return some({ type: ValueType.Array, value: elements });
      }
      if (!this.tokenizer.eatToken(TokenType.Comma)) {
        return this.fail(ErrorKind.InvalidToken);
      }
    }
  }

  private fail(kind: ErrorKind): Result<never> {
    return this.failAt(kind, this.tokenizer.getPosition());
  }

  private failAt(kind: ErrorKind, position: SourcePosition): Result<never> {
    return Either.left(new JsonParseError(kind, position));
  }
}

/**
 * Create a parser for a single input string
 */
export function createParser(input: string, options?: ParserOptions): Deserializer {
  return new Deserializer(input, options);
}

/**
 * Parse a complete document in one call.
 */
export function parse(input: string, options?: ParserOptions): Result<Value> {
  const parser = createParser(input, options);
  return Either.flatMap(parser.parse(), (value) =>
    Either.fromOption(value, () => new JsonParseError(ErrorKind.EOF, parser.getPosition()))
  );
}

/**
 * Like {@link parse}, but throws the {@link JsonParseError} instead of returning it.
 */
export function parseOrThrow(input: string, options?: ParserOptions): Value {
  const result = parse(input, options);
  if (Either.isLeft(result)) {
    throw result.left;
  }
  return result.right;
}
