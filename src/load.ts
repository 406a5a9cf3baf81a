import { utf8ByteLength } from './chars';
import { Composer, type ComposeOptions } from './composer';
import { ComposeError } from './errors';
import { resolveLimits, ResourceTracker, type ResourceStats } from './limits';
import { Parser, type ParseOptions } from './parser';
import { START_POSITION } from './position';
import type { Value } from './value';

/**
 * Options for {@link loadOne}, {@link loadAll}, {@link loadAllIter} and the
 * {@link Loader} constructor.
 */
export interface LoadOptions extends ParseOptions, ComposeOptions {
  /**
   * Millisecond clock for `limits.timeout`. Tests inject a fake one.
   *
   * @default Date.now
   */
  clock?: () => number;
}

/**
 * One load of one input: scanner, parser, composer and resource tracker.
 *
 * Documents are composed lazily, one per {@link Loader.next} call. After any
 * error the loader is finished; the stream position past a structural error is
 * not trusted.
 */
export class Loader implements Iterable<Value> {
  readonly tracker: ResourceTracker;
  private readonly parser: Parser;
  private readonly composer: Composer;
  private failed = false;

  constructor(input: string, options: LoadOptions = {}) {
    this.tracker = options.tracker ?? new ResourceTracker(resolveLimits(options.limits), { clock: options.clock });
    // Fail fast on input that is already over the size ceiling.
    const size = utf8ByteLength(input);
    if (size > this.tracker.limits.maxDocumentSize) this.tracker.addBytes(size, options.base ?? START_POSITION);
    this.parser = new Parser(input, { ...options, tracker: this.tracker });
    this.composer = new Composer(this.parser, options);
  }

  /** The `%YAML` version in effect after the documents read so far. */
  get version(): string | null {
    return this.parser.version;
  }

  /** Number of documents composed so far. */
  get documentCount(): number {
    return this.composer.documentCount;
  }

  /** Compose the next document, or return null at the end of the stream. */
  next(): Value | null {
    if (this.failed) return null;
    try {
      return this.composer.composeNext();
    } catch (err) {
      this.failed = true;
      throw err;
    }
  }

  /** Counters for the current document, plus bytes and time for the whole input. */
  stats(): ResourceStats {
    return this.tracker.stats();
  }

  *[Symbol.iterator](): Iterator<Value> {
    for (let value = this.next(); value !== null; value = this.next()) {
      yield value;
    }
  }
}

/**
 * Load a stream that must hold exactly one document.
 *
 * @throws {ComposeError} With kind `DocumentCount` when the stream holds no
 *   document or more than one, and for any alias, tag or limit failure.
 * @throws {ScanError} When the input contains a malformed lexeme.
 * @throws {ParseError} When the structure is invalid.
 *
 * @example
 * ```typescript
 * import { loadOne, toJS } from 'yamlguard';
 *
 * toJS(loadOne('retries: 3\nhosts: [a, b]'));
 * // => { retries: 3, hosts: ['a', 'b'] }
 * ```
 */
export function loadOne(input: string, options: LoadOptions = {}): Value {
  const loader = new Loader(input, options);
  const first = loader.next();
  if (first === null) {
    throw new ComposeError('DocumentCount', 'Expected exactly one document, found none', START_POSITION, {
      limit: 1,
      actual: 0,
    });
  }
  const second = loader.next();
  if (second !== null) {
    throw new ComposeError('DocumentCount', 'Expected exactly one document, found more', START_POSITION, {
      limit: 1,
      actual: 2,
      suggestion: 'use loadAll for multi-document streams',
    });
  }
  return first;
}

/**
 * Load every document in the stream.
 */
export function loadAll(input: string, options: LoadOptions = {}): Value[] {
  return [...new Loader(input, options)];
}

/**
 * Lazily load documents one at a time. Iteration stops at the first error,
 * which is thrown from the iterator.
 */
export function* loadAllIter(input: string, options: LoadOptions = {}): Generator<Value, void, undefined> {
  yield* new Loader(input, options);
}
