import type { Position } from './position';

export interface ErrorDetails {
  /** Rendered source line with a caret, see {@link formatErrorContext}. */
  snippet?: string;
  /** Short hint on how to fix the input. */
  suggestion?: string;
}

/**
 * Base class for every error raised while loading or dumping.
 *
 * Carries positional information so callers can produce useful diagnostics.
 *
 * @example
 * ```typescript
 * import { loadOne, YamlError } from 'yamlguard';
 *
 * try {
 *   loadOne('key: "unterminated');
 * } catch (err) {
 *   if (err instanceof YamlError) {
 *     console.error(`Error at ${err.line}:${err.column}: ${err.reason}`);
 *     if (err.snippet) console.error(err.snippet);
 *   }
 * }
 * ```
 */
export class YamlError extends Error {
  /** Where the error was detected. */
  readonly position: Position;
  /** One-based line number where the error was detected. */
  readonly line: number;
  /** One-based column number where the error was detected. */
  readonly column: number;
  /** The message without the trailing location. */
  readonly reason: string;
  readonly snippet?: string;
  readonly suggestion?: string;

  constructor(reason: string, position: Position, details: ErrorDetails = {}) {
    super(`${reason} at line ${position.line}, column ${position.column}`);
    this.name = 'YamlError';
    this.reason = reason;
    this.position = position;
    this.line = position.line;
    this.column = position.column;
    this.snippet = details.snippet;
    this.suggestion = details.suggestion;
  }
}

/**
 * Thrown when the scanner meets a malformed lexeme: an unterminated quoted or
 * block scalar, an invalid escape, a tab used for indentation, or a malformed
 * directive.
 */
export class ScanError extends YamlError {
  constructor(reason: string, position: Position, details: ErrorDetails = {}) {
    super(reason, position, details);
    this.name = 'ScanError';
  }
}

/**
 * Thrown when a token is not valid in the parser's current state.
 *
 * The stream position is unreliable after a structural error, so multi-document
 * iteration stops at the first ParseError.
 */
export class ParseError extends YamlError {
  /** Human-readable description of what the parser expected. */
  readonly expected: string;

  constructor(expected: string, found: string, position: Position, details: ErrorDetails = {}) {
    super(`Expected ${expected}, got ${found}`, position, details);
    this.name = 'ParseError';
    this.expected = expected;
  }
}

/**
 * Thrown when the parser exceeds the configured maximum nesting depth.
 *
 * This is a subclass of {@link ParseError} so callers catching `ParseError`
 * still receive it, but it can be distinguished via `instanceof` when depth
 * violations need special handling.
 */
export class MaxDepthError extends ParseError {
  /** The configured nesting depth limit that was exceeded. */
  readonly maxDepth: number;
  /** The depth the document tried to reach. */
  readonly depth: number;

  constructor(maxDepth: number, depth: number, position: Position, details: ErrorDetails = {}) {
    super(`nesting depth at most ${maxDepth}`, `depth ${depth}`, position, details);
    this.name = 'MaxDepthError';
    this.maxDepth = maxDepth;
    this.depth = depth;
  }
}

export type ComposeErrorKind =
  | 'UndefinedAlias'
  | 'InvalidMergeValue'
  | 'CyclicReference'
  | 'DepthExceeded'
  | 'AliasDepthExceeded'
  | 'AnchorCountExceeded'
  | 'DocumentSizeExceeded'
  | 'StringLengthExceeded'
  | 'CollectionSizeExceeded'
  | 'ComplexityScoreExceeded'
  | 'TimedOut'
  | 'UnknownTag'
  | 'InvalidValue'
  | 'DuplicateKey'
  | 'DocumentCount';

const LIMIT_KINDS: ReadonlySet<ComposeErrorKind> = new Set<ComposeErrorKind>([
  'DepthExceeded',
  'AliasDepthExceeded',
  'AnchorCountExceeded',
  'DocumentSizeExceeded',
  'StringLengthExceeded',
  'CollectionSizeExceeded',
  'ComplexityScoreExceeded',
  'TimedOut',
]);

export interface ComposeErrorInit extends ErrorDetails {
  /** The configured ceiling that was crossed. */
  limit?: number;
  /** The value that crossed it. */
  actual?: number;
}

/**
 * Thrown while building values from events: unresolvable aliases, invalid merge
 * sources, cyclic references, tag construction failures and every resource
 * limit violation.
 *
 * Use {@link ComposeError.kind} (or {@link isLimitError}) instead of matching
 * on the message.
 */
export class ComposeError extends YamlError {
  readonly kind: ComposeErrorKind;
  readonly limit?: number;
  readonly actual?: number;

  constructor(kind: ComposeErrorKind, reason: string, position: Position, init: ComposeErrorInit = {}) {
    super(reason, position, init);
    this.name = 'ComposeError';
    this.kind = kind;
    this.limit = init.limit;
    this.actual = init.actual;
  }

  /** `true` when the error is a resource-limit violation rather than bad syntax. */
  get isLimit(): boolean {
    return LIMIT_KINDS.has(this.kind);
  }
}

/**
 * Thrown by the emitter when the output sink fails. A well-formed value never
 * fails to serialize.
 */
export class EmitError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'EmitError';
  }
}

/**
 * Whether `err` is a resource-limit violation: parser nesting depth, or a
 * {@link ComposeError} of a limit kind.
 */
export function isLimitError(err: unknown): err is MaxDepthError | ComposeError {
  if (err instanceof MaxDepthError) return true;
  return err instanceof ComposeError && err.isLimit;
}

export type WarningCode = 'unknown-tag' | 'duplicate-key' | 'yaml-version';

/**
 * A non-fatal condition found while loading.
 */
export interface YamlWarning {
  code: WarningCode;
  message: string;
  position: Position;
}

export type WarningHandler = (warning: YamlWarning) => void;

/**
 * Deliver a warning to `handler`, or write it to stderr when no handler is set.
 */
export function reportWarning(warning: YamlWarning, handler?: WarningHandler): void {
  if (handler) {
    handler(warning);
    return;
  }
  console.error(
    `Warning: ${warning.message} at line ${warning.position.line}, column ${warning.position.column}`
  );
}
