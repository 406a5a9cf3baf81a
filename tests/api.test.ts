import { describe, expect, it } from 'vitest';
import * as api from '../src/index';

describe('public API surface', () => {
  it('exports the load and dump entry points', () => {
    expect(typeof api.loadOne).toBe('function');
    expect(typeof api.loadAll).toBe('function');
    expect(typeof api.loadAllIter).toBe('function');
    expect(typeof api.loadStream).toBe('function');
    expect(typeof api.dump).toBe('function');
    expect(typeof api.dumpAll).toBe('function');
    expect(typeof api.dumpTo).toBe('function');
  });

  it('exports the pipeline stages and error classes', () => {
    expect(typeof api.Scanner).toBe('function');
    expect(typeof api.Parser).toBe('function');
    expect(typeof api.Composer).toBe('function');
    expect(typeof api.ResourceTracker).toBe('function');
    expect(typeof api.ComposeError).toBe('function');
    expect(typeof api.ScanError).toBe('function');
  });

  it('converts between plain data and YAML text', () => {
    const text = api.dump(api.fromJS({ retries: 3, hosts: ['a', 'b'] }));
    expect(text).toBe('retries: 3\nhosts: [a, b]\n');
    expect(api.toJS(api.loadOne(text))).toEqual({ retries: 3, hosts: ['a', 'b'] });
  });

  it('iterates documents lazily', () => {
    const iter = api.loadAllIter('a\n---\n*x');
    const first = iter.next();
    expect(first.done === false && api.toJS(first.value)).toBe('a');
    expect(() => iter.next()).toThrow(api.ComposeError);
  });

  it('exposes the version and parse state through Loader', () => {
    const loader = new api.Loader('%YAML 1.2\n--- a');
    expect(loader.next()).toEqual({ type: 'string', value: 'a' });
    expect(loader.version).toBe('1.2');
    expect(loader.documentCount).toBe(1);
    expect(loader.next()).toBeNull();
  });

  it('exports version as a development placeholder outside a bundle', () => {
    expect(api.version).toBe('0.0.0-dev');
  });
});
