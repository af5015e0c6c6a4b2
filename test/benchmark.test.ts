import { describe, it, expect } from 'vitest';
import * as Either from 'effect/Either';
import { parse } from '../src/parser.js';
import { tokenize } from '../src/tokenizer.js';
import { Value, ValueType } from '../src/types.js';

const member = (value: Value | undefined, key: string): Value | undefined =>
  value?.type === ValueType.Object ? value.value.get(key) : undefined;

const element = (value: Value | undefined, index: number): Value | undefined =>
  value?.type === ValueType.Array ? value.value[index] : undefined;

const buildDocument = (count: number) => ({
  items: Array.from({ length: count }, (_, i) => ({
    id: i,
    name: `Item ${i}`,
    score: i / 4,
    active: i % 2 === 0,
    tags: ['alpha', 'beta'],
    parent: null,
  })),
});

describe('Benchmarks', () => {
  describe('performance', () => {
    it('should parse a generated document of 1000 items', () => {
      const json = JSON.stringify(buildDocument(1000));

      const start = performance.now();
      const result = parse(json);
      const elapsed = performance.now() - start;

      expect(Either.isRight(result)).toBe(true);
      if (Either.isRight(result)) {
        const items = member(result.right, 'items');
        expect(items?.type === ValueType.Array && items.value.length).toBe(1000);
        expect(member(element(items, 3), 'score')).toEqual({ type: ValueType.Number, value: '0.75' });
        expect(member(element(items, 999), 'name')).toEqual({ type: ValueType.String, value: 'Item 999' });
      }

      console.log(`Parse time: ${elapsed.toFixed(2)}ms for ${json.length} characters`);
    });

    it('should tokenize the same document into the expected token count', () => {
      const json = JSON.stringify(buildDocument(100));
      const result = tokenize(json);

      expect(Either.isRight(result)).toBe(true);
      if (Either.isRight(result)) {
        // {"items": [ ... ]} is 6 tokens; each item is 29 tokens plus a separating comma
        expect(result.right).toHaveLength(6 + 100 * 29 + 99);
      }
    });

    it('should build the same tree from pretty-printed input', () => {
      const data = buildDocument(200);
      const compact = parse(JSON.stringify(data));
      const pretty = parse(JSON.stringify(data, null, 2));

      expect(Either.isRight(compact) && Either.isRight(pretty)).toBe(true);
      if (Either.isRight(compact) && Either.isRight(pretty)) {
        expect(pretty.right).toEqual(compact.right);
      }
    });
  });
});
