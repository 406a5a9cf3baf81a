import {
  DEFAULT_MAX_ALIAS_DEPTH,
  DEFAULT_MAX_ANCHORS,
  DEFAULT_MAX_COLLECTION_SIZE,
  DEFAULT_MAX_COMPLEXITY_SCORE,
  DEFAULT_MAX_DEPTH,
  DEFAULT_MAX_DOCUMENT_SIZE,
  DEFAULT_MAX_STRING_LENGTH,
  TIMEOUT_POLL_INTERVAL,
} from './constants';
import { ComposeError, type ComposeErrorKind } from './errors';
import type { Position } from './position';

/**
 * Numeric ceilings consulted while loading. Read-only during a load, so a
 * single object may be shared by any number of concurrent loads.
 */
export interface Limits {
  /** Maximum collection nesting depth. */
  readonly maxDepth: number;
  /** Maximum number of anchor definitions per document. */
  readonly maxAnchors: number;
  /** Maximum input size in UTF-8 bytes. */
  readonly maxDocumentSize: number;
  /** Maximum length of a single scalar, in characters. */
  readonly maxStringLength: number;
  /** Maximum alias expansion depth. */
  readonly maxAliasDepth: number;
  /** Maximum number of entries in a single sequence or mapping. */
  readonly maxCollectionSize: number;
  /** Maximum accumulated complexity score per document. */
  readonly maxComplexityScore: number;
  /** Wall-clock budget in milliseconds, or `null` for none. */
  readonly timeout: number | null;
}

export type LimitsPreset = 'strict' | 'default' | 'permissive' | 'unlimited';

export const DEFAULT_LIMITS: Limits = Object.freeze({
  maxDepth: DEFAULT_MAX_DEPTH,
  maxAnchors: DEFAULT_MAX_ANCHORS,
  maxDocumentSize: DEFAULT_MAX_DOCUMENT_SIZE,
  maxStringLength: DEFAULT_MAX_STRING_LENGTH,
  maxAliasDepth: DEFAULT_MAX_ALIAS_DEPTH,
  maxCollectionSize: DEFAULT_MAX_COLLECTION_SIZE,
  maxComplexityScore: DEFAULT_MAX_COMPLEXITY_SCORE,
  timeout: null,
});

/** Limits for untrusted input. */
export const STRICT_LIMITS: Limits = Object.freeze({
  maxDepth: 50,
  maxAnchors: 100,
  maxDocumentSize: 1_048_576,
  maxStringLength: 65_536,
  maxAliasDepth: 5,
  maxCollectionSize: 10_000,
  maxComplexityScore: 10_000,
  timeout: 5_000,
});

/** Limits for trusted input. */
export const PERMISSIVE_LIMITS: Limits = Object.freeze({
  maxDepth: 10_000,
  maxAnchors: 100_000,
  maxDocumentSize: 1_073_741_824,
  maxStringLength: 104_857_600,
  maxAliasDepth: 1_000,
  maxCollectionSize: 10_000_000,
  maxComplexityScore: 100_000_000,
  timeout: null,
});

export const UNLIMITED_LIMITS: Limits = Object.freeze({
  maxDepth: Infinity,
  maxAnchors: Infinity,
  maxDocumentSize: Infinity,
  maxStringLength: Infinity,
  maxAliasDepth: Infinity,
  maxCollectionSize: Infinity,
  maxComplexityScore: Infinity,
  timeout: null,
});

export const LIMIT_PRESETS: Readonly<Record<LimitsPreset, Limits>> = Object.freeze({
  strict: STRICT_LIMITS,
  default: DEFAULT_LIMITS,
  permissive: PERMISSIVE_LIMITS,
  unlimited: UNLIMITED_LIMITS,
});

/**
 * Resolve a preset name or a partial override into a complete Limits object.
 * Missing fields fall back to {@link DEFAULT_LIMITS}.
 */
export function resolveLimits(limits?: LimitsPreset | Partial<Limits>): Limits {
  if (limits === undefined) return DEFAULT_LIMITS;
  if (typeof limits === 'string') return LIMIT_PRESETS[limits];
  return Object.freeze({ ...DEFAULT_LIMITS, ...limits });
}

/** Snapshot of the counters kept by a {@link ResourceTracker}. */
export interface ResourceStats {
  maxDepthSeen: number;
  anchorCount: number;
  bytesConsumed: number;
  complexityScore: number;
  collectionItems: number;
  elapsedMs: number;
}

export interface ResourceTrackerOptions {
  /** Millisecond clock used for the timeout. @default Date.now */
  clock?: () => number;
}

/**
 * Live counters compared against {@link Limits} after every increment. The first
 * violation throws a {@link ComposeError} and ends the load.
 *
 * One tracker belongs to exactly one load call; the scanner, parser and composer
 * of that call all charge it.
 */
export class ResourceTracker {
  readonly limits: Limits;
  private readonly clock: () => number;
  private readonly startedAt: number;
  private ticks = 0;
  private maxDepthSeen = 0;
  private anchorCount = 0;
  private bytesConsumed = 0;
  private complexityScore = 0;
  private collectionItems = 0;

  constructor(limits: Limits = DEFAULT_LIMITS, options: ResourceTrackerOptions = {}) {
    this.limits = limits;
    this.clock = options.clock ?? Date.now;
    this.startedAt = this.clock();
  }

  private fail(kind: ComposeErrorKind, what: string, limit: number, actual: number, position: Position): never {
    throw new ComposeError(kind, `Maximum ${what} ${limit} exceeded (got ${actual})`, position, {
      limit,
      actual,
    });
  }

  checkDepth(depth: number, position: Position): void {
    if (depth > this.maxDepthSeen) this.maxDepthSeen = depth;
    if (depth > this.limits.maxDepth) {
      this.fail('DepthExceeded', 'depth', this.limits.maxDepth, depth, position);
    }
  }

  addAnchor(position: Position): void {
    this.anchorCount++;
    if (this.anchorCount > this.limits.maxAnchors) {
      this.fail('AnchorCountExceeded', 'anchor count', this.limits.maxAnchors, this.anchorCount, position);
    }
  }

  addBytes(bytes: number, position: Position): void {
    this.bytesConsumed += bytes;
    if (this.bytesConsumed > this.limits.maxDocumentSize) {
      this.fail('DocumentSizeExceeded', 'document size', this.limits.maxDocumentSize, this.bytesConsumed, position);
    }
  }

  checkStringLength(length: number, position: Position): void {
    if (length > this.limits.maxStringLength) {
      this.fail('StringLengthExceeded', 'string length', this.limits.maxStringLength, length, position);
    }
  }

  checkAliasDepth(depth: number, position: Position): void {
    if (depth > this.limits.maxAliasDepth) {
      this.fail('AliasDepthExceeded', 'alias depth', this.limits.maxAliasDepth, depth, position);
    }
  }

  /** Check the size of one collection after an entry was added to it. */
  checkCollectionSize(size: number, position: Position): void {
    this.collectionItems++;
    if (size > this.limits.maxCollectionSize) {
      this.fail('CollectionSizeExceeded', 'collection size', this.limits.maxCollectionSize, size, position);
    }
  }

  addComplexity(score: number, position: Position): void {
    this.complexityScore += score;
    if (this.complexityScore > this.limits.maxComplexityScore) {
      this.fail(
        'ComplexityScoreExceeded',
        'complexity score',
        this.limits.maxComplexityScore,
        this.complexityScore,
        position,
      );
    }
  }

  get complexity(): number {
    return this.complexityScore;
  }

  /**
   * Count one unit of work and poll the clock every few units.
   */
  tick(position: Position): void {
    if (this.limits.timeout === null) return;
    this.ticks++;
    if (this.ticks % TIMEOUT_POLL_INTERVAL === 0) this.checkTimeout(position);
  }

  checkTimeout(position: Position): void {
    const timeout = this.limits.timeout;
    if (timeout === null) return;
    const elapsed = this.clock() - this.startedAt;
    if (elapsed > timeout) {
      throw new ComposeError('TimedOut', `Timed out after ${elapsed}ms (limit ${timeout}ms)`, position, {
        limit: timeout,
        actual: elapsed,
      });
    }
  }

  /**
   * Reset the per-document counters. Bytes consumed and the clock keep running
   * for the whole input.
   */
  resetDocument(): void {
    this.maxDepthSeen = 0;
    this.anchorCount = 0;
    this.complexityScore = 0;
    this.collectionItems = 0;
  }

  stats(): ResourceStats {
    return {
      maxDepthSeen: this.maxDepthSeen,
      anchorCount: this.anchorCount,
      bytesConsumed: this.bytesConsumed,
      complexityScore: this.complexityScore,
      collectionItems: this.collectionItems,
      elapsedMs: this.clock() - this.startedAt,
    };
  }
}
