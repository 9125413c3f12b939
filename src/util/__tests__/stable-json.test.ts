import { describe, it, expect } from 'vitest';
import { sortKeysDeep, stableJson, stableStringify } from '../stable-json.js';
import { contentHash, sha256Hex, stripHashPrefix } from '../hash.js';

describe('stable JSON', () => {
  it('sorts keys at every depth and keeps array order', () => {
    expect(stableStringify({ b: 1, a: { d: [3, { z: 1, y: 2 }], c: null } })).toBe(
      '{"a":{"c":null,"d":[3,{"y":2,"z":1}]},"b":1}'
    );
  });

  it('drops undefined properties', () => {
    expect(sortKeysDeep({ a: undefined, b: 2 })).toEqual({ b: 2 });
  });

  it('orders keys by code unit, not locale', () => {
    expect(stableStringify({ b: 0, B: 0, a: 0 })).toBe('{"B":0,"a":0,"b":0}');
  });

  it('indents documents and ends them with a newline', () => {
    expect(stableJson({ b: 1, a: 2 })).toBe('{\n  "a": 2,\n  "b": 1\n}\n');
  });
});

describe('hashing', () => {
  it('hashes the empty string to the well-known digest', () => {
    expect(sha256Hex('')).toBe('e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855');
  });

  it('hashes text as UTF-8 bytes', () => {
    expect(sha256Hex('héllo')).toBe(sha256Hex(Buffer.from('héllo', 'utf-8')));
  });

  it('prefixes and strips the algorithm', () => {
    const prefixed = contentHash('x');
    expect(prefixed.startsWith('sha256:')).toBe(true);
    expect(stripHashPrefix(prefixed)).toBe(sha256Hex('x'));
    expect(stripHashPrefix('abc')).toBe('abc');
  });
});
