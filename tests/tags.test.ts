import { describe, expect, it } from 'vitest';
import { dump } from '../src/emitter';
import { ComposeError } from '../src/errors';
import { loadOne } from '../src/load';
import {
  BINARY_TAG,
  OMAP_TAG,
  resolveTagUri,
  shortenTag,
  TagRegistry,
  TIMESTAMP_TAG,
} from '../src/tags';
import { fromJS, toJS, valuesEqual } from '../src/value';

function invalidReason(input: string): string {
  try {
    loadOne(input);
  } catch (err) {
    if (err instanceof ComposeError && err.kind === 'InvalidValue') return err.reason;
    throw err;
  }
  throw new Error('should have thrown');
}

describe('tag URIs', () => {
  it('expands handles', () => {
    expect(resolveTagUri('!!str', {})).toBe('tag:yaml.org,2002:str');
    expect(resolveTagUri('!local', {})).toBe('!local');
    expect(resolveTagUri('!<tag:example.com,2000:x>', {})).toBe('tag:example.com,2000:x');
    expect(resolveTagUri('!e!point', { '!e!': 'tag:example.com,2000:' })).toBe('tag:example.com,2000:point');
    expect(resolveTagUri('!x', { '!': 'tag:local.test,2024:' })).toBe('tag:local.test,2024:x');
  });

  it('shortens URIs for output', () => {
    expect(shortenTag(BINARY_TAG)).toBe('!!binary');
    expect(shortenTag('tag:example.com,2000:point', { '!e!': 'tag:example.com,2000:' })).toBe('!e!point');
    expect(shortenTag('!local')).toBe('!local');
    expect(shortenTag('tag:other.test,2024:x')).toBe('!<tag:other.test,2024:x>');
  });
});

describe('built-in tags', () => {
  it('keeps timestamps as tagged strings', () => {
    expect(loadOne('!!timestamp 2001-12-14t21:59:43.10-05:00')).toEqual({
      type: 'string',
      value: '2001-12-14t21:59:43.10-05:00',
      tag: TIMESTAMP_TAG,
    });
    expect(invalidReason('!!timestamp yesterday')).toBe('"yesterday" is not a valid timestamp');
  });

  it('keeps binary that is not UTF-8 in its encoded form', () => {
    expect(loadOne('!!binary /w==')).toEqual({ type: 'string', value: '/w==', tag: BINARY_TAG });
    expect(invalidReason('!!binary abc')).toBe('binary value is not valid base64');
  });

  it('checks ordered maps and pairs', () => {
    const omap = loadOne('!!omap [a: 1, b: 2]');
    expect(omap.tag).toBe(OMAP_TAG);
    expect(toJS(omap)).toEqual([{ a: 1 }, { b: 2 }]);
    expect(invalidReason('!!omap [a: 1, a: 2]')).toBe('ordered map keys must be unique');
    expect(toJS(loadOne('!!pairs [a: 1, a: 2]'))).toEqual([{ a: 1 }, { a: 2 }]);
    expect(invalidReason('!!pairs [1, 2]')).toBe('expected a sequence of single-pair mappings');
  });

  it('requires null values in sets', () => {
    expect(invalidReason('!!set {a: 1}')).toBe('set entries must have null values');
  });
});

describe('integers beyond the safe range', () => {
  it('keeps plain and tagged integers exact', () => {
    expect(loadOne('9007199254740993')).toEqual({ type: 'int', value: 9007199254740993n });
    expect(loadOne('!!int "9223372036854775807"')).toEqual({ type: 'int', value: 9223372036854775807n });
    expect(loadOne('-0x20000000000000')).toEqual({ type: 'int', value: -9007199254740992n });
    expect(loadOne('9007199254740991')).toEqual({ type: 'int', value: 9007199254740991 });
  });

  it('converts to float only when asked', () => {
    expect(loadOne('!!float 9007199254740993')).toEqual({ type: 'float', value: 9007199254740992 });
  });

  it('tells neighbouring large keys apart', () => {
    expect(toJS(loadOne('9007199254740992: a\n9007199254740993: b'))).toEqual({
      '9007199254740992': 'a',
      '9007199254740993': 'b',
    });
  });

  it('dumps and loads back the exact digits', () => {
    const value = loadOne('id: 9223372036854775807');
    const text = dump(value);
    expect(text).toBe('id: 9223372036854775807\n');
    expect(valuesEqual(loadOne(text), value)).toBe(true);
    expect(toJS(loadOne(text))).toEqual({ id: 9223372036854775807n });
  });

  it('accepts bigints from JavaScript data', () => {
    expect(fromJS(2n ** 64n)).toEqual({ type: 'int', value: 18446744073709551616n });
    expect(fromJS(5n)).toEqual({ type: 'int', value: 5 });
  });
});

describe('TagRegistry', () => {
  it('registers definitions from the constructor and by chaining', () => {
    const registry = new TagRegistry({ '!a': { kind: 'scalar', construct: (node) => node } }).register('!b', {
      kind: 'mapping',
      construct: (node) => node,
    });
    expect(registry.size).toBe(2);
    expect(registry.has('!b')).toBe(true);
    expect(registry.get('!c')).toBeUndefined();
  });
});
