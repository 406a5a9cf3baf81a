import { describe, expect, it } from 'vitest';
import {
  cloneValue,
  floatValue,
  fromJS,
  intValue,
  mappingGet,
  mappingValue,
  sequenceValue,
  stringValue,
  toJS,
  valuesEqual,
} from '../src/value';

describe('valuesEqual', () => {
  it('compares mappings without regard to entry order', () => {
    expect(valuesEqual(fromJS({ a: 1, b: 2 }), fromJS({ b: 2, a: 1 }))).toBe(true);
    expect(valuesEqual(fromJS({ a: 1 }), fromJS({ a: '1' }))).toBe(false);
  });

  it('treats NaN as equal to itself and int apart from float', () => {
    expect(valuesEqual(floatValue(NaN), floatValue(NaN))).toBe(true);
    expect(valuesEqual(intValue(1), floatValue(1))).toBe(false);
  });

  it('ignores presentation hints', () => {
    expect(valuesEqual({ ...stringValue('x'), style: 'single', anchor: 'a' }, stringValue('x'))).toBe(true);
  });
});

describe('toJS and fromJS', () => {
  it('maps numbers to int or float', () => {
    expect(fromJS([1, 1.5, 2 ** 60])).toEqual(sequenceValue([intValue(1), floatValue(1.5), floatValue(2 ** 60)]));
  });

  it('converts Map keys and Dates', () => {
    const value = fromJS(new Map<unknown, unknown>([[1, new Date(0)]]));
    expect(value).toEqual(mappingValue([{ key: intValue(1), value: stringValue('1970-01-01T00:00:00.000Z') }]));
  });

  it('rejects cyclic and non-data input', () => {
    const cyclic: unknown[] = [];
    cyclic.push(cyclic);
    expect(() => fromJS(cyclic)).toThrow(TypeError);
    expect(() => fromJS(() => 1)).toThrow('Cannot convert function to a YAML value');
  });

  it('renders non-string keys as flow text', () => {
    const value = mappingValue([
      { key: intValue(1), value: stringValue('one') },
      { key: sequenceValue([intValue(1), stringValue('a')]), value: stringValue('pair') },
    ]);
    expect(toJS(value)).toEqual({ '1': 'one', '[1, "a"]': 'pair' });
  });

  it('keeps a "__proto__" key as an own property', () => {
    const out = toJS(mappingValue([{ key: stringValue('__proto__'), value: intValue(1) }]));
    expect(Object.prototype.hasOwnProperty.call(out, '__proto__')).toBe(true);
    expect(Object.getPrototypeOf(out)).toBe(Object.prototype);
  });
});

describe('mapping helpers', () => {
  it('looks keys up by value', () => {
    const value = mappingValue([{ key: intValue(1), value: stringValue('one') }]);
    expect(mappingGet(value, intValue(1))).toEqual(stringValue('one'));
    expect(mappingGet(value, '1')).toBeUndefined();
  });

  it('deep-copies values', () => {
    const original = fromJS({ a: [1] });
    const copy = cloneValue(original);
    expect(copy).toEqual(original);
    expect(copy).not.toBe(original);
    if (copy.type !== 'mapping' || original.type !== 'mapping') return;
    expect(copy.entries[0].value).not.toBe(original.entries[0].value);
  });
});
