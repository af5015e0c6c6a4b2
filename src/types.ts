import type { JsonParseError } from './errors.js';

/**
 * Token types produced by the tokenizer
 */
export enum TokenType {
  ObjectStart = 'OBJECT_START',
  ObjectEnd = 'OBJECT_END',
  ArrayStart = 'ARRAY_START',
  ArrayEnd = 'ARRAY_END',
  Comma = 'COMMA',
  Colon = 'COLON',
  String = 'STRING',
  Number = 'NUMBER',
  Boolean = 'BOOLEAN',
  Null = 'NULL',
}

/** Single-character punctuation tokens; they carry no payload. */
export type StructuralTokenType =
  | TokenType.ObjectStart
  | TokenType.ObjectEnd
  | TokenType.ArrayStart
  | TokenType.ArrayEnd
  | TokenType.Comma
  | TokenType.Colon;

export type Token =
  | { readonly type: StructuralTokenType }
  /** Unescaped contents, without the surrounding quotes */
  | { readonly type: TokenType.String; readonly value: string }
  /** Literal text exactly as written in the input */
  | { readonly type: TokenType.Number; readonly value: string }
  | { readonly type: TokenType.Boolean; readonly value: boolean }
  | { readonly type: TokenType.Null };

/**
 * Value kinds of the parsed tree
 */
export enum ValueType {
  Object = 'OBJECT',
  Array = 'ARRAY',
  String = 'STRING',
  Number = 'NUMBER',
  Boolean = 'BOOLEAN',
  Null = 'NULL',
}

export type Value =
  | { readonly type: ValueType.Object; readonly value: ReadonlyMap<string, Value> }
  | { readonly type: ValueType.Array; readonly value: ReadonlyArray<Value> }
  | { readonly type: ValueType.String; readonly value: string }
  | { readonly type: ValueType.Number; readonly value: string }
  | { readonly type: ValueType.Boolean; readonly value: boolean }
  | { readonly type: ValueType.Null };

export interface SourcePosition {
  /** Offset into the input in UTF-16 code units */
  offset: number;
  /** 1-based line number */
  line: number;
  /** 1-based column, counted in Unicode scalar values */
  column: number;
}

/**
 * Event types for the parser
 */
export interface ParserEvents {
  onComplete?: (value: Value) => void;
  onError?: (error: JsonParseError) => void;
}

/**
 * Parser options
 */
export interface ParserOptions {
  /** Max nesting depth of objects and arrays; anything but a non-negative integer means the default (512) */
  maxDepth?: number;
  /** Leave non-whitespace input after the top-level value unconsumed instead of failing */
  allowTrailingContent?: boolean;
  /** Event callbacks */
  events?: ParserEvents;
}
