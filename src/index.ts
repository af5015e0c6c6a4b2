/**
 * descent-json
 * Recursive-descent JSON parser producing a tagged value tree,
 * with numbers kept as their literal text
 */

export { Deserializer, createParser, parse, parseOrThrow } from './parser.js';
export { Tokenizer, tokenize } from './tokenizer.js';
export { JsonParseError } from './errors.js';

// Export types
export type {
  Token,
  StructuralTokenType,
  Value,
  SourcePosition,
  ParserEvents,
  ParserOptions,
} from './types.js';

// Enums are runtime values as well as types
export { TokenType, ValueType } from './types.js';
export { ErrorKind } from './errors.js';
