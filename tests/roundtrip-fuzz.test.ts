import { describe, expect, it } from 'vitest';
import { dump, dumpAll } from '../src/emitter';
import { loadAll, loadOne } from '../src/load';
import { fromJS, valuesEqual, type JSValue } from '../src/value';

function assertRoundtrip(data: JSValue): void {
  const value = fromJS(data);
  const text = dump(value);
  const loaded = loadOne(text);
  expect(valuesEqual(loaded, value), text).toBe(true);
  expect(dump(loaded)).toBe(text);
}

describe('roundtrip stability', () => {
  const fixtures: JSValue[] = [
    { name: 'demo', replicas: 3, ratio: 0.5, enabled: true, owner: null },
    { env: [{ name: 'PORT', value: '8080' }, { name: 'DEBUG', value: 'false' }] },
    ['- not a list', '[not flow]', '{not a map}', '&anchor', '*alias', '!tag', '%directive', '@at', '`tick`'],
    { script: 'set -e\nnpm test\n', note: 'no newline\nat end', keep: 'two\n\n' },
    { '': 'empty key', '123': 'numeric key', 'a: b': 'colon key', '<<': 'merge-looking key' },
    [[1, [2, [3, []]]], {}],
    'plain root',
  ];

  for (const data of fixtures) {
    it(`roundtrips: ${JSON.stringify(data).slice(0, 40)}`, () => {
      assertRoundtrip(data);
    });
  }

  it('roundtrips multi-document streams', () => {
    const values = [fromJS({ a: 1 }), fromJS(['x']), fromJS('z')];
    const loaded = loadAll(dumpAll(values));
    expect(loaded).toHaveLength(3);
    loaded.forEach((value, i) => expect(valuesEqual(value, values[i])).toBe(true));
  });
});

describe('fuzz roundtrip', () => {
  it('loads back randomly generated values', () => {
    let seed = 0x5eed1234;
    const rand = () => {
      seed = (seed * 1664525 + 1013904223) >>> 0;
      return seed / 0xffffffff;
    };
    const pick = <T>(items: readonly T[]): T => items[Math.floor(rand() * items.length) % items.length];

    const keys = [
      'id',
      'name',
      'with space',
      '123',
      'true',
      'null',
      '~',
      '',
      'a: b',
      '- x',
      '#hash',
      '<<',
      "quote'd",
      'tab\tin',
      '  lead',
      'é',
      '日本語',
    ];
    const strings = [...keys, 'a,b', '0x1F', 'multi\nline', 'trailing\n', 'a # not a comment', '3.14'];
    const scalars: JSValue[] = [0, 7, -3, 1000000, 1.5, -0.25, true, false, null];

    const generate = (depth: number): JSValue => {
      const roll = rand();
      if (depth >= 3 || roll < 0.45) {
        return rand() < 0.6 ? pick(strings) : pick(scalars);
      }
      const size = Math.floor(rand() * 5);
      if (roll < 0.7) {
        const items: JSValue[] = [];
        for (let i = 0; i < size; i++) items.push(generate(depth + 1));
        return items;
      }
      const out: { [key: string]: JSValue } = {};
      for (let i = 0; i < size; i++) out[pick(keys)] = generate(depth + 1);
      return out;
    };

    for (let i = 0; i < 200; i++) {
      assertRoundtrip(generate(0));
    }
  });
});
