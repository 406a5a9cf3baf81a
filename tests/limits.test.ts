import { describe, expect, it } from 'vitest';
import { ComposeError } from '../src/errors';
import {
  DEFAULT_LIMITS,
  LIMIT_PRESETS,
  PERMISSIVE_LIMITS,
  resolveLimits,
  ResourceTracker,
  STRICT_LIMITS,
  UNLIMITED_LIMITS,
} from '../src/limits';
import { START_POSITION } from '../src/position';

describe('resolveLimits', () => {
  it('returns the defaults when nothing is given', () => {
    expect(resolveLimits()).toBe(DEFAULT_LIMITS);
    expect(DEFAULT_LIMITS.maxDepth).toBe(1000);
    expect(DEFAULT_LIMITS.timeout).toBeNull();
  });

  it('looks up presets by name', () => {
    expect(resolveLimits('strict')).toBe(STRICT_LIMITS);
    expect(resolveLimits('permissive')).toBe(PERMISSIVE_LIMITS);
    expect(resolveLimits('unlimited')).toBe(UNLIMITED_LIMITS);
    expect(Object.keys(LIMIT_PRESETS)).toEqual(['strict', 'default', 'permissive', 'unlimited']);
  });

  it('fills a partial override from the defaults', () => {
    const limits = resolveLimits({ maxDepth: 5 });
    expect(limits.maxDepth).toBe(5);
    expect(limits.maxAnchors).toBe(DEFAULT_LIMITS.maxAnchors);
    expect(Object.isFrozen(limits)).toBe(true);
  });

  it('orders the presets from strict to unlimited', () => {
    expect(STRICT_LIMITS.maxDepth).toBeLessThan(DEFAULT_LIMITS.maxDepth);
    expect(DEFAULT_LIMITS.maxDepth).toBeLessThan(PERMISSIVE_LIMITS.maxDepth);
    expect(UNLIMITED_LIMITS.maxDepth).toBe(Infinity);
  });
});

describe('ResourceTracker', () => {
  function violation(run: () => void): ComposeError {
    try {
      run();
    } catch (err) {
      if (err instanceof ComposeError) return err;
      throw err;
    }
    throw new Error('should have thrown');
  }

  it('throws on the first increment past a limit', () => {
    const tracker = new ResourceTracker(resolveLimits({ maxAnchors: 2 }));
    tracker.addAnchor(START_POSITION);
    tracker.addAnchor(START_POSITION);
    const err = violation(() => tracker.addAnchor(START_POSITION));
    expect(err.kind).toBe('AnchorCountExceeded');
    expect(err.reason).toBe('Maximum anchor count 2 exceeded (got 3)');
  });

  it('keeps bytes and resets the other counters per document', () => {
    const tracker = new ResourceTracker();
    tracker.addBytes(10, START_POSITION);
    tracker.addAnchor(START_POSITION);
    tracker.addComplexity(4, START_POSITION);
    tracker.checkDepth(3, START_POSITION);
    tracker.checkCollectionSize(1, START_POSITION);
    tracker.resetDocument();
    expect(tracker.stats()).toMatchObject({
      maxDepthSeen: 0,
      anchorCount: 0,
      bytesConsumed: 10,
      complexityScore: 0,
      collectionItems: 0,
    });
  });

  it('polls the clock only every few ticks', () => {
    let now = 0;
    let reads = 0;
    const clock = () => {
      reads++;
      return now;
    };
    const tracker = new ResourceTracker(resolveLimits({ timeout: 50 }), { clock });
    now = 100;
    for (let i = 0; i < 63; i++) tracker.tick(START_POSITION);
    expect(reads).toBe(1);
    const err = violation(() => tracker.tick(START_POSITION));
    expect(err.kind).toBe('TimedOut');
    expect(err.actual).toBe(100);
  });
});
