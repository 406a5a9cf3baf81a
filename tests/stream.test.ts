import { describe, expect, it } from 'vitest';
import { ComposeError } from '../src/errors';
import type { LoadOptions } from '../src/load';
import { loadStream } from '../src/stream';
import { toJS, type JSValue } from '../src/value';

async function* chunks<T>(...parts: T[]): AsyncGenerator<T, void, undefined> {
  for (const part of parts) yield part;
}

async function collect(source: AsyncIterable<string | Uint8Array>, options: LoadOptions = {}): Promise<JSValue[]> {
  const out: JSValue[] = [];
  for await (const value of loadStream(source, options)) out.push(toJS(value));
  return out;
}

describe('loadStream', () => {
  it('splits documents across chunk boundaries', async () => {
    expect(await collect(chunks('a: 1\n--', '-\nb: 2\n'))).toEqual([{ a: 1 }, { b: 2 }]);
  });

  it('decodes UTF-8 split inside a character', async () => {
    const bytes = new TextEncoder().encode('name: café\n');
    const split = bytes.length - 2;
    expect(await collect(chunks(bytes.slice(0, split), bytes.slice(split)))).toEqual([{ name: 'café' }]);
  });

  it('ends a document at "..."', async () => {
    expect(await collect(chunks('a\n...\nb\n'))).toEqual(['a', 'b']);
  });

  it('handles input without a trailing newline', async () => {
    expect(await collect(chunks('- x\n- y'))).toEqual([['x', 'y']]);
  });

  it('yields nothing for an empty source', async () => {
    expect(await collect(chunks<string>())).toEqual([]);
  });

  it('yields earlier documents before failing, with stream positions', async () => {
    const seen: JSValue[] = [];
    let caught: unknown;
    try {
      for await (const value of loadStream(chunks('a: 1\n---\nb: *missing\n'))) seen.push(toJS(value));
    } catch (err) {
      caught = err;
    }
    expect(seen).toEqual([{ a: 1 }]);
    expect(caught).toBeInstanceOf(ComposeError);
    if (!(caught instanceof ComposeError)) return;
    expect(caught.kind).toBe('UndefinedAlias');
    expect(caught.line).toBe(3);
    expect(caught.column).toBe(4);
  });

  it('reports stream byte offsets past non-ASCII text', async () => {
    let caught: unknown;
    try {
      for await (const value of loadStream(chunks('é: 1\n---\nb: *missing\n'))) toJS(value);
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(ComposeError);
    if (!(caught instanceof ComposeError)) return;
    expect(caught.position).toEqual({ line: 3, column: 4, offset: 13 });
  });

  it('resets per-document counters between documents', async () => {
    const options: LoadOptions = { limits: { maxAnchors: 1 } };
    expect(await collect(chunks('- &a 1\n---\n- &b 2\n'), options)).toHaveLength(2);
    const err = await collect(chunks('- &a 1\n---\n- &b 2\n'), { ...options, resetLimitsPerDocument: false }).then(
      () => null,
      (reason: unknown) => reason,
    );
    expect(err instanceof ComposeError && err.kind).toBe('AnchorCountExceeded');
  });

  it('charges bytes across the whole stream', async () => {
    const seen: JSValue[] = [];
    let caught: unknown;
    try {
      for await (const value of loadStream(chunks('a: 1\n', '---\nb: 2\n'), { limits: { maxDocumentSize: 10 } })) {
        seen.push(toJS(value));
      }
    } catch (err) {
      caught = err;
    }
    expect(seen).toEqual([{ a: 1 }]);
    expect(caught).toBeInstanceOf(ComposeError);
    if (!(caught instanceof ComposeError)) return;
    expect(caught.kind).toBe('DocumentSizeExceeded');
    expect(caught.actual).toBe(14);
  });

  it('carries %YAML into later documents', async () => {
    expect(await collect(chunks('%YAML 1.2\n--- a\n--- b\n'))).toEqual(['a', 'b']);
  });
});
