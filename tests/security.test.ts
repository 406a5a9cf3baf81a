import { describe, expect, it } from 'vitest';
import { ComposeError, isLimitError, MaxDepthError } from '../src/errors';
import { loadAll, loadOne, Loader } from '../src/load';
import type { Value } from '../src/value';

function failure(run: () => unknown): unknown {
  try {
    run();
  } catch (err) {
    return err;
  }
  throw new Error('should have thrown');
}

function composeError(run: () => unknown): ComposeError {
  const err = failure(run);
  if (err instanceof ComposeError) return err;
  throw err;
}

// Each level is a ten-item sequence of aliases to the previous level.
function laughs(levels: number): string {
  const lines = [`l0: &l0 [${Array(10).fill('lol').join(', ')}]`];
  for (let i = 1; i < levels; i++) {
    lines.push(`l${i}: &l${i} [${Array(10).fill(`*l${i - 1}`).join(', ')}]`);
  }
  return lines.join('\n');
}

// a0 holds a scalar; every later anchor wraps an alias to the one before.
const ALIAS_CHAIN = [
  'a0: &a0 [x]',
  'a1: &a1 [*a0]',
  'a2: &a2 [*a1]',
  'a3: &a3 [*a2]',
  'a4: &a4 [*a3]',
  'a5: &a5 [*a4]',
  'a6: &a6 [*a5]',
].join('\n');

describe('alias expansion', () => {
  it('stops exponential alias expansion on the complexity score', () => {
    const err = composeError(() => loadOne(laughs(4), { limits: { maxComplexityScore: 5000 } }));
    expect(err.kind).toBe('ComplexityScoreExceeded');
    expect(err.limit).toBe(5000);
    expect(isLimitError(err)).toBe(true);
  });

  it('stops a deeper expansion under the default limits', () => {
    expect(composeError(() => loadOne(laughs(9))).kind).toBe('ComplexityScoreExceeded');
  });

  it('charges an alias the full cost of its anchor', () => {
    const loader = new Loader('a: &a [1, 2]\nb: *a');
    [...loader];
    // mapping 1, key a 1, sequence 1 + 2 scalars + 2 items, entry 2, key b 1, alias 5, entry 2
    expect(loader.stats().complexityScore).toBe(17);
  });

  it('measures alias chains independently of nesting', () => {
    const err = composeError(() => loadOne(ALIAS_CHAIN, { limits: { maxAliasDepth: 5 } }));
    expect(err.kind).toBe('AliasDepthExceeded');
    expect(err.actual).toBe(6);
    expect(err.limit).toBe(5);
    expect(err.line).toBe(7);
    expect(err.column).toBe(10);
  });

  it('measures nesting plus expanded height in additive mode', () => {
    const err = composeError(() =>
      loadOne(ALIAS_CHAIN, { limits: { maxAliasDepth: 5 }, aliasDepthMode: 'additive' }),
    );
    expect(err.kind).toBe('AliasDepthExceeded');
    expect(err.actual).toBe(6);
    expect(err.line).toBe(5);
    expect(err.column).toBe(10);
  });

  it('accepts the chain within the default limits', () => {
    expect(() => loadOne(ALIAS_CHAIN)).not.toThrow();
  });

  it('checks the expanded depth of an alias against maxDepth', () => {
    const err = composeError(() => loadOne('a: &a [[[1]]]\nb: [[*a]]', { limits: { maxDepth: 4 } }));
    expect(err.kind).toBe('DepthExceeded');
    expect(err.actual).toBe(6);
  });
});

describe('structural limits', () => {
  it('rejects nesting past maxDepth', () => {
    const err = failure(() => loadOne('['.repeat(60) + ']'.repeat(60), { limits: 'strict' }));
    expect(err).toBeInstanceOf(MaxDepthError);
    if (!(err instanceof MaxDepthError)) return;
    expect(err.maxDepth).toBe(50);
    expect(err.depth).toBe(51);
    expect(isLimitError(err)).toBe(true);
  });

  it('composes very deep nesting without recursion', () => {
    const depth = 5000;
    let value: Value = loadOne('- '.repeat(depth) + 'x', { limits: { maxDepth: depth } });
    let seen = 0;
    while (value.type === 'sequence') {
      seen++;
      value = value.items[0];
    }
    expect(seen).toBe(depth);
    expect(value).toEqual({ type: 'string', value: 'x' });
  });

  it('limits anchors per document', () => {
    const err = composeError(() => loadOne('- &a1 1\n- &a2 2\n- &a3 3', { limits: { maxAnchors: 2 } }));
    expect(err.kind).toBe('AnchorCountExceeded');
    expect(err.actual).toBe(3);
  });

  it('limits collection sizes', () => {
    const seq = composeError(() => loadOne('[1, 2, 3, 4]', { limits: { maxCollectionSize: 3 } }));
    expect(seq.kind).toBe('CollectionSizeExceeded');
    expect(seq.actual).toBe(4);
    const map = composeError(() => loadOne('a: 1\nb: 2', { limits: { maxCollectionSize: 1 } }));
    expect(map.actual).toBe(2);
  });

  it('limits input size before scanning', () => {
    const err = composeError(() => loadOne('a: 1234567890', { limits: { maxDocumentSize: 8 } }));
    expect(err.kind).toBe('DocumentSizeExceeded');
    expect(err.actual).toBe(13);
    expect(err.line).toBe(1);
    expect(err.column).toBe(1);
  });

  it('limits scalar length', () => {
    const err = composeError(() => loadOne(`key: ${'x'.repeat(100)}`, { limits: { maxStringLength: 50 } }));
    expect(err.kind).toBe('StringLengthExceeded');
    expect(err.actual).toBe(100);
  });
});

describe('timeouts', () => {
  it('fails once the clock passes the budget', () => {
    let now = 0;
    const clock = () => (now += 1000);
    const err = composeError(() => loadOne('a: 1', { limits: { timeout: 100 }, clock }));
    expect(err.kind).toBe('TimedOut');
    expect(err.limit).toBe(100);
    expect(err.actual).toBe(1000);
  });

  it('never reads the clock without a timeout', () => {
    let calls = 0;
    const clock = () => {
      calls++;
      return 0;
    };
    loadOne('a: [1, 2, 3]', { clock });
    // Only the tracker's start time.
    expect(calls).toBe(1);
  });
});

describe('per-document limits', () => {
  it('resets counters at each document by default', () => {
    expect(loadAll('- &a 1\n---\n- &b 2', { limits: { maxAnchors: 1 } })).toHaveLength(2);
  });

  it('accumulates counters when reset is disabled', () => {
    const err = composeError(() =>
      loadAll('- &a 1\n---\n- &b 2', { limits: { maxAnchors: 1 }, resetLimitsPerDocument: false }),
    );
    expect(err.kind).toBe('AnchorCountExceeded');
  });

  it('reports resource usage', () => {
    const loader = new Loader('a: [1, 2]');
    [...loader];
    expect(loader.stats()).toMatchObject({
      maxDepthSeen: 2,
      anchorCount: 0,
      bytesConsumed: 9,
      complexityScore: 9,
      collectionItems: 3,
    });
  });
});
