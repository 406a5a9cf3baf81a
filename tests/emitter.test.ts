import { describe, expect, it } from 'vitest';
import { dump, dumpAll, dumpTo } from '../src/emitter';
import { EmitError } from '../src/errors';
import { loadOne } from '../src/load';
import {
  floatValue,
  fromJS,
  intValue,
  mappingValue,
  sequenceValue,
  stringValue,
  toJS,
  type Value,
} from '../src/value';

describe('block output', () => {
  it('writes mappings with short scalar lists inline', () => {
    expect(dump(fromJS({ name: 'demo', tags: ['a', 'b'] }))).toBe('name: demo\ntags: [a, b]\n');
  });

  it('indents nested mappings', () => {
    expect(dump(fromJS({ a: { b: 1 } }))).toBe('a:\n  b: 1\n');
    expect(dump(fromJS({ a: { b: 1 } }), { indent: 4 })).toBe('a:\n    b: 1\n');
  });

  it('writes mappings inside sequences in compact form', () => {
    expect(dump(fromJS([{ a: 1, b: 2 }]))).toBe('- a: 1\n  b: 2\n');
  });

  it('keeps block style for every collection when asked', () => {
    expect(dump(fromJS({ a: [1, 2] }), { flowStyle: 'block' })).toBe('a:\n  - 1\n  - 2\n');
  });

  it('writes everything inline in flow style', () => {
    expect(dump(fromJS({ a: [1, 2], b: { c: 'd' } }), { flowStyle: 'flow' })).toBe('{a: [1, 2], b: {c: d}}\n');
  });

  it('writes empty collections inline', () => {
    expect(dump(fromJS({ a: [], b: {} }))).toBe('a: []\nb: {}\n');
  });

  it('sorts keys when order is not preserved', () => {
    expect(dump(fromJS({ b: 1, a: 2 }), { preserveOrder: false })).toBe('a: 2\nb: 1\n');
  });

  it('writes collection keys in flow style', () => {
    const value = mappingValue([{ key: sequenceValue([intValue(1), intValue(2)]), value: stringValue('v') }]);
    expect(dump(value)).toBe('[1, 2]: v\n');
  });
});

describe('scalar output', () => {
  it('quotes strings that would load as something else', () => {
    const value = fromJS(['123', 'true', '', 'a: b', "it's", 'tab\there']);
    expect(dump(value, { flowStyle: 'block' })).toBe(
      "- '123'\n- 'true'\n- ''\n- 'a: b'\n- it's\n- \"tab\\there\"\n",
    );
  });

  it('quotes a "<<" key so it stays an ordinary key', () => {
    const text = dump(fromJS({ '<<': 1 }));
    expect(text).toBe("'<<': 1\n");
    expect(toJS(loadOne(text))).toEqual({ '<<': 1 });
  });

  it('writes multi-line strings as literal block scalars', () => {
    expect(dump(fromJS({ text: 'line1\nline2\n' }))).toBe('text: |\n  line1\n  line2\n');
    expect(dump(fromJS({ text: 'line1\nline2' }))).toBe('text: |-\n  line1\n  line2\n');
  });

  it('writes floats so they load back as floats', () => {
    const value = sequenceValue([floatValue(1), floatValue(NaN), floatValue(-Infinity)]);
    expect(dump(value)).toBe('- 1.0\n- .nan\n- -.inf\n');
  });

  it('writes tags that differ from the default', () => {
    expect(dump({ ...stringValue('x'), tag: '!custom' })).toBe('!custom x\n');
    expect(dump({ ...stringValue('aGk='), tag: 'tag:yaml.org,2002:binary' })).toBe('!!binary aGk=\n');
  });
});

describe('anchors', () => {
  it('anchors values that appear more than once', () => {
    const shared = mappingValue([{ key: stringValue('x'), value: intValue(1) }]);
    const root = mappingValue([
      { key: stringValue('a'), value: shared },
      { key: stringValue('b'), value: shared },
    ]);
    expect(dump(root)).toBe('a: &anchor1\n  x: 1\nb: *anchor1\n');
  });

  it('reuses anchor names recorded while loading', () => {
    const value = loadOne('a: &base {x: 1}\nb: *base', { aliases: 'share', captureStyle: true });
    expect(dump(value)).toBe('a: &base\n  x: 1\nb: *base\n');
  });
});

describe('documents', () => {
  it('writes explicit markers and directives', () => {
    expect(dump(stringValue('x'), { explicitStart: true, explicitEnd: true })).toBe('--- x\n...\n');
    expect(dump(stringValue('x'), { version: true })).toBe('%YAML 1.2\n--- x\n');
  });

  it('separates documents with "---"', () => {
    expect(dumpAll([stringValue('a'), stringValue('b')])).toBe('a\n--- b\n');
  });

  it('restores captured styles', () => {
    const value = loadOne("a: 'x'\nb:\n  - 1", { captureStyle: true });
    expect(dump(value, { preserveStyle: true })).toBe("a: 'x'\nb:\n  - 1\n");
  });

  it('writes one chunk per document to a sink', () => {
    const chunks: string[] = [];
    dumpTo([stringValue('a'), stringValue('b')], { write: (chunk: string) => chunks.push(chunk) });
    expect(chunks).toEqual(['a\n', '--- b\n']);
  });

  it('wraps sink failures in EmitError', () => {
    const failure = new Error('disk full');
    const sink = {
      write(): never {
        throw failure;
      },
    };
    let caught: unknown;
    try {
      dumpTo(stringValue('a'), sink);
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(EmitError);
    if (!(caught instanceof EmitError)) return;
    expect(caught.message).toBe('Failed to write document 1: disk full');
    expect(caught.cause).toBe(failure);
  });
});

describe('round trips', () => {
  it('loads back what it writes', () => {
    const samples: Value[] = [
      fromJS({ a: [1, 'two', null], b: { c: true, d: '3' } }),
      fromJS(['- dash', '#hash', 'multi\nline\n', ' padded ']),
      fromJS({ 'key: colon': 'v', '': 'empty key' }),
    ];
    for (const sample of samples) {
      expect(toJS(loadOne(dump(sample)))).toEqual(toJS(sample));
    }
  });
});
