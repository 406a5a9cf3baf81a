import { afterEach, describe, expect, it, vi } from 'vitest';
import { ComposeError, isLimitError, MaxDepthError, ParseError, ScanError, YamlError } from '../src/errors';
import { loadOne } from '../src/load';
import { START_POSITION } from '../src/position';

function thrown(run: () => unknown): unknown {
  try {
    run();
  } catch (err) {
    return err;
  }
  throw new Error('should have thrown');
}

describe('error classes', () => {
  it('share the YamlError base and set their names', () => {
    const scan = new ScanError('bad', START_POSITION);
    const parse = new ParseError('a node', 'end of stream', START_POSITION);
    const compose = new ComposeError('UndefinedAlias', 'Undefined alias *x', START_POSITION);
    expect(scan).toBeInstanceOf(YamlError);
    expect(parse).toBeInstanceOf(YamlError);
    expect(compose).toBeInstanceOf(YamlError);
    expect([scan.name, parse.name, compose.name]).toEqual(['ScanError', 'ParseError', 'ComposeError']);
  });

  it('append the location to the message', () => {
    const err = new ParseError('a node', 'end of stream', { line: 3, column: 7, offset: 20 });
    expect(err.message).toBe('Expected a node, got end of stream at line 3, column 7');
    expect(err.reason).toBe('Expected a node, got end of stream');
    expect(err.expected).toBe('a node');
  });

  it('tell limit violations apart from bad input', () => {
    expect(isLimitError(new MaxDepthError(10, 11, START_POSITION))).toBe(true);
    expect(isLimitError(new ComposeError('TimedOut', 'Timed out', START_POSITION))).toBe(true);
    expect(isLimitError(new ComposeError('DuplicateKey', 'Duplicate mapping key "a"', START_POSITION))).toBe(false);
    expect(isLimitError(new Error('other'))).toBe(false);
  });
});

describe('diagnostics from loading', () => {
  it('renders the offending line with a caret', () => {
    const err = thrown(() => loadOne('key: "unterminated'));
    expect(err).toBeInstanceOf(ScanError);
    if (!(err instanceof ScanError)) return;
    expect(err.snippet).toBe('1 | key: "unterminated\n  |      ^');
  });

  it('reports a key without ":" where the key starts', () => {
    const err = thrown(() => loadOne('a: 1\nb'));
    expect(err).toBeInstanceOf(ScanError);
    if (!(err instanceof ScanError)) return;
    expect(err.reason).toBe('could not find expected ":" while scanning a simple key');
    expect(err.line).toBe(2);
    expect(err.column).toBe(1);
  });

  it('reports the document count for loadOne', () => {
    const none = thrown(() => loadOne(''));
    expect(none instanceof ComposeError && none.kind).toBe('DocumentCount');
    const many = thrown(() => loadOne('a\n---\nb'));
    expect(many instanceof ComposeError && many.suggestion).toBe('use loadAll for multi-document streams');
  });
});

describe('warnings', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('go to stderr when no handler is given', () => {
    const spy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    loadOne('!custom 5');
    expect(spy).toHaveBeenCalledWith(
      'Warning: Unknown tag !custom, resolving the node by its content at line 1, column 1',
    );
  });

  it('go only to the handler when one is given', () => {
    const spy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const codes: string[] = [];
    loadOne('!custom 5', { onWarning: (w) => codes.push(w.code) });
    expect(codes).toEqual(['unknown-tag']);
    expect(spy).not.toHaveBeenCalled();
  });
});
