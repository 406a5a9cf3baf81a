import {
  EOF,
  isBlank,
  isBlankOrEnd,
  isBreakOrEnd,
  isDigit,
  isFlowIndicator,
  isForbiddenCode,
  isLineStartOrIndented,
  isUriChar,
  isWordChar,
  utf8CodeUnitBytes,
} from './chars';
import { MAX_SIMPLE_KEY_LENGTH } from './constants';
import { ScanError } from './errors';
import type { ScalarStyle } from './events';
import { resolveLimits, ResourceTracker, type Limits, type LimitsPreset } from './limits';
import { formatErrorContext, makePosition, rebasePosition, START_POSITION, unbasePosition, type Position } from './position';
import { scanBlockScalar, scanFlowScalar, scanPlain, type ScalarScanContext } from './scanner/scalars';

export type TokenType =
  | 'stream_start'
  | 'stream_end'
  | 'directive'
  | 'document_start'
  | 'document_end'
  | 'block_sequence_start'
  | 'block_mapping_start'
  | 'block_end'
  | 'flow_sequence_start'
  | 'flow_sequence_end'
  | 'flow_mapping_start'
  | 'flow_mapping_end'
  | 'block_entry'
  | 'flow_entry'
  | 'key'
  | 'value'
  | 'alias'
  | 'anchor'
  | 'tag'
  | 'scalar';

interface TokenBase {
  /** Where the token starts in the input. */
  start: Position;
  /** Where the token ends (exclusive). */
  end: Position;
}

/** A structural token with no payload. */
export interface IndicatorToken extends TokenBase {
  type: Exclude<TokenType, 'directive' | 'alias' | 'anchor' | 'tag' | 'scalar'>;
}

export interface DirectiveToken extends TokenBase {
  type: 'directive';
  /** Directive name without the `%`, e.g. `YAML` or `TAG`. */
  name: string;
  /** `['1.2']` for `%YAML`, `[handle, prefix]` for `%TAG`, raw words otherwise. */
  params: string[];
}

export interface AnchorToken extends TokenBase {
  type: 'anchor' | 'alias';
  value: string;
}

export interface TagToken extends TokenBase {
  type: 'tag';
  /** `!`, `!!` or `!name!`; null for a verbatim `!<uri>` tag. */
  handle: string | null;
  suffix: string;
}

export interface ScalarToken extends TokenBase {
  type: 'scalar';
  value: string;
  style: ScalarStyle;
}

/**
 * A single token produced by the scanner.
 */
export type Token = IndicatorToken | DirectiveToken | AnchorToken | TagToken | ScalarToken;

export interface ScannerOptions {
  /**
   * Tracker charged for every consumed byte. When omitted the scanner creates
   * its own from {@link ScannerOptions.limits}.
   */
  tracker?: ResourceTracker;

  /**
   * Limits for a scanner-owned tracker.
   *
   * @default 'default'
   */
  limits?: LimitsPreset | Partial<Limits>;

  /**
   * Position of the first character of `input` within a larger stream. Token
   * positions and error locations are reported relative to the stream.
   *
   * @default START_POSITION
   */
  base?: Position;
}

interface SimpleKey {
  tokenNumber: number;
  required: boolean;
  index: number;
  line: number;
  column: number;
  position: Position;
}

/**
 * Pull-based YAML scanner.
 *
 * Converts text into positioned {@link Token}s on demand. Structure is derived
 * from an indentation-column stack: a nested block may only open at a column
 * strictly greater than the enclosing block's indentation, and each dedent
 * closes blocks with `block_end` tokens. Comments are discarded.
 *
 * @example
 * const scanner = new Scanner('a: 1');
 * for (let token = scanner.next(); token; token = scanner.next()) {
 *   console.log(token.type);
 * }
 */
export class Scanner {
  readonly input: string;
  readonly tracker: ResourceTracker;
  private readonly base: Position;
  private pointer = 0;
  private byteOffset = 0;
  private line = 0;
  private column = 0;
  private done = false;
  private streamStarted = false;
  private flowLevel = 0;
  private readonly tokens: Token[] = [];
  private tokensTaken = 0;
  private indent = -1;
  private readonly indents: number[] = [];
  private allowSimpleKey = true;
  private readonly possibleSimpleKeys = new Map<number, SimpleKey>();
  private readonly scalarContext: ScalarScanContext;

  constructor(input: string, options: ScannerOptions = {}) {
    this.input = input;
    this.tracker = options.tracker ?? new ResourceTracker(resolveLimits(options.limits));
    this.base = options.base ?? START_POSITION;
    this.scalarContext = this.createScalarContext();
  }

  /** Return the next token and consume it, or null once the stream has ended. */
  next(): Token | null {
    this.fill();
    const token = this.tokens.shift();
    if (!token) return null;
    this.tokensTaken++;
    return token;
  }

  /** Return the next token without consuming it, or null once the stream has ended. */
  peek(): Token | null {
    this.fill();
    return this.tokens[0] ?? null;
  }

  /** The current scan position. */
  position(): Position {
    return this.mark();
  }

  private fill(): void {
    while (this.needMoreTokens()) {
      this.fetchMoreTokens();
      this.tracker.tick(this.mark());
    }
  }

  // -------------------------------------------------------------------------
  // Character access
  // -------------------------------------------------------------------------

  private ch(offset: number = 0): string {
    return this.input[this.pointer + offset] ?? EOF;
  }

  private prefix(length: number): string {
    return this.input.slice(this.pointer, this.pointer + length);
  }

  private forward(length: number = 1): void {
    let bytes = 0;
    for (let i = 0; i < length && this.pointer < this.input.length; i++) {
      const ch = this.input[this.pointer];
      const code = ch.charCodeAt(0);
      if (isForbiddenCode(code)) {
        throw this.error(
          `special character U+${code.toString(16).toUpperCase().padStart(4, '0')} is not allowed`,
          this.mark(),
        );
      }
      const width = utf8CodeUnitBytes(code);
      bytes += width;
      this.byteOffset += width;
      this.pointer++;
      if (ch === '\n' || ch === '\x85' || ch === '\u2028' || ch === '\u2029' || (ch === '\r' && this.ch() !== '\n')) {
        this.line++;
        this.column = 0;
      } else if (ch !== '\uFEFF') {
        this.column++;
      }
    }
    if (bytes > 0) this.tracker.addBytes(bytes, this.mark());
  }

  private mark(): Position {
    const local = makePosition(this.line + 1, this.column + 1, this.byteOffset);
    return this.base === START_POSITION ? local : rebasePosition(local, this.base);
  }

  /** Render the input line at `position` with a caret, for error reports. */
  snippet(position: Position): string {
    return formatErrorContext(this.input, unbasePosition(position, this.base));
  }

  private error(reason: string, position: Position, suggestion?: string): ScanError {
    return new ScanError(reason, position, { snippet: this.snippet(position), suggestion });
  }

  private scanLineBreak(): string {
    const ch = this.ch();
    if (ch === '\r' || ch === '\n' || ch === '\x85') {
      this.forward(this.prefix(2) === '\r\n' ? 2 : 1);
      return '\n';
    }
    if (ch === '\u2028' || ch === '\u2029') {
      this.forward();
      return ch;
    }
    return '';
  }

  private createScalarContext(): ScalarScanContext {
    return {
      ch: (offset?: number) => this.ch(offset),
      prefix: (length: number) => this.prefix(length),
      forward: (length?: number) => this.forward(length),
      mark: () => this.mark(),
      column: () => this.column,
      indent: () => this.indent,
      flowLevel: () => this.flowLevel,
      setAllowSimpleKey: (allow: boolean) => {
        this.allowSimpleKey = allow;
      },
      scanLineBreak: () => this.scanLineBreak(),
      error: (reason: string, position: Position, suggestion?: string) => this.error(reason, position, suggestion),
      checkStringLength: (length: number, position: Position) => this.tracker.checkStringLength(length, position),
    };
  }

  // -------------------------------------------------------------------------
  // Token queue
  // -------------------------------------------------------------------------

  private needMoreTokens(): boolean {
    if (this.done) return false;
    if (this.tokens.length === 0) return true;
    // The current token may be a potential simple key, so we need to look further.
    this.staleSimpleKeys();
    return this.nextPossibleSimpleKey() === this.tokensTaken;
  }

  private fetchMoreTokens(): void {
    if (!this.streamStarted) {
      this.streamStarted = true;
      const start = this.mark();
      this.tokens.push({ type: 'stream_start', start, end: start });
      return;
    }

    this.scanToNextToken();
    this.staleSimpleKeys();
    this.unwindIndent(this.column);

    const ch = this.ch();
    if (ch === EOF) return this.fetchStreamEnd();
    if (ch === '%' && this.column === 0) return this.fetchDirective();
    if (ch === '-' && this.checkDocumentMarker('---')) return this.fetchDocumentIndicator('document_start');
    if (ch === '.' && this.checkDocumentMarker('...')) return this.fetchDocumentIndicator('document_end');
    if (ch === '[') return this.fetchFlowCollectionStart('flow_sequence_start');
    if (ch === '{') return this.fetchFlowCollectionStart('flow_mapping_start');
    if (ch === ']') return this.fetchFlowCollectionEnd('flow_sequence_end');
    if (ch === '}') return this.fetchFlowCollectionEnd('flow_mapping_end');
    if (ch === ',') return this.fetchFlowEntry();
    if (ch === '-' && isBlankOrEnd(this.ch(1))) return this.fetchBlockEntry();
    if (ch === '?' && (this.flowLevel > 0 || isBlankOrEnd(this.ch(1)))) return this.fetchKey();
    if (ch === ':' && this.checkValue()) return this.fetchValue();
    if (ch === '*') return this.fetchAnchor('alias');
    if (ch === '&') return this.fetchAnchor('anchor');
    if (ch === '!') return this.fetchTag();
    if (ch === '|' && this.flowLevel === 0) return this.fetchBlockScalar('literal');
    if (ch === '>' && this.flowLevel === 0) return this.fetchBlockScalar('folded');
    if (ch === "'") return this.fetchFlowScalar('single');
    if (ch === '"') return this.fetchFlowScalar('double');
    if (this.checkPlain()) return this.fetchPlain();

    throw this.error(
      `found character "${ch}" that cannot start any token`,
      this.mark(),
      ch === '@' || ch === '`' ? `"${ch}" is reserved; quote the scalar` : undefined,
    );
  }

  private checkDocumentMarker(marker: '---' | '...'): boolean {
    return this.column === 0 && this.prefix(3) === marker && isBlankOrEnd(this.ch(3));
  }

  private checkValue(): boolean {
    if (this.flowLevel > 0) return true;
    return isBlankOrEnd(this.ch(1));
  }

  private checkPlain(): boolean {
    const ch = this.ch();
    if (isBlankOrEnd(ch)) return false;
    if (!'-?:,[]{}#&*!|>\'"%@`'.includes(ch)) return true;
    const next = this.ch(1);
    if (isBlankOrEnd(next)) return false;
    if (ch === '-') return true;
    if (ch === '?' || ch === ':') return this.flowLevel === 0 || !isFlowIndicator(next);
    return false;
  }

  // -------------------------------------------------------------------------
  // Whitespace, comments and indentation
  // -------------------------------------------------------------------------

  private scanToNextToken(): void {
    if (this.pointer === 0 && this.ch() === '\uFEFF') this.forward();
    for (;;) {
      while (this.ch() === ' ') this.forward();
      if (this.ch() === '\t') this.skipTabs();
      if (this.ch() === '#') {
        while (!isBreakOrEnd(this.ch())) this.forward();
      }
      if (!this.scanLineBreak()) return;
      if (this.flowLevel === 0) this.allowSimpleKey = true;
    }
  }

  // Tabs separate tokens inside a line, but block indentation must be spaces.
  private skipTabs(): void {
    const indentation = this.flowLevel === 0 && this.allowSimpleKey && isLineStartOrIndented(this.input, this.pointer);
    if (indentation) {
      let length = 0;
      while (isBlank(this.ch(length))) length++;
      const after = this.ch(length);
      if (!isBreakOrEnd(after) && after !== '#') {
        throw this.error('found a tab character used for indentation', this.mark(), 'indent with spaces, not tabs');
      }
    }
    while (isBlank(this.ch())) this.forward();
  }

  private unwindIndent(column: number): void {
    // Indentation is ignored inside flow collections.
    if (this.flowLevel > 0) return;
    while (this.indent > column) {
      const position = this.mark();
      this.indent = this.indents.pop() ?? -1;
      this.tokens.push({ type: 'block_end', start: position, end: position });
    }
  }

  private addIndent(column: number): boolean {
    if (this.indent < column) {
      this.indents.push(this.indent);
      this.indent = column;
      return true;
    }
    return false;
  }

  // -------------------------------------------------------------------------
  // Simple keys
  // -------------------------------------------------------------------------

  private nextPossibleSimpleKey(): number | null {
    let min: number | null = null;
    for (const key of this.possibleSimpleKeys.values()) {
      if (min === null || key.tokenNumber < min) min = key.tokenNumber;
    }
    return min;
  }

  private staleSimpleKeys(): void {
    for (const [level, key] of this.possibleSimpleKeys) {
      if (key.line !== this.line || this.pointer - key.index > MAX_SIMPLE_KEY_LENGTH) {
        if (key.required) {
          throw this.error('could not find expected ":" while scanning a simple key', key.position, 'add ": " after the key');
        }
        this.possibleSimpleKeys.delete(level);
      }
    }
  }

  private savePossibleSimpleKey(): void {
    // A simple key is required at the current indentation in block context.
    const required = this.flowLevel === 0 && this.indent === this.column;
    if (!this.allowSimpleKey) return;
    this.removePossibleSimpleKey();
    this.possibleSimpleKeys.set(this.flowLevel, {
      tokenNumber: this.tokensTaken + this.tokens.length,
      required,
      index: this.pointer,
      line: this.line,
      column: this.column,
      position: this.mark(),
    });
  }

  private removePossibleSimpleKey(): void {
    const key = this.possibleSimpleKeys.get(this.flowLevel);
    if (key?.required) {
      throw this.error('could not find expected ":" while scanning a simple key', key.position, 'add ": " after the key');
    }
    this.possibleSimpleKeys.delete(this.flowLevel);
  }

  // -------------------------------------------------------------------------
  // Fetchers
  // -------------------------------------------------------------------------

  private pushIndicator(type: IndicatorToken['type'], length: number = 1): void {
    const start = this.mark();
    this.forward(length);
    this.tokens.push({ type, start, end: this.mark() });
  }

  private fetchStreamEnd(): void {
    this.unwindIndent(-1);
    this.removePossibleSimpleKey();
    this.allowSimpleKey = false;
    this.possibleSimpleKeys.clear();
    const position = this.mark();
    this.tokens.push({ type: 'stream_end', start: position, end: position });
    this.done = true;
  }

  private fetchDirective(): void {
    this.unwindIndent(-1);
    this.removePossibleSimpleKey();
    this.allowSimpleKey = false;
    this.tokens.push(this.scanDirective());
  }

  private fetchDocumentIndicator(type: 'document_start' | 'document_end'): void {
    this.unwindIndent(-1);
    this.removePossibleSimpleKey();
    this.allowSimpleKey = false;
    this.pushIndicator(type, 3);
  }

  private fetchFlowCollectionStart(type: 'flow_sequence_start' | 'flow_mapping_start'): void {
    this.savePossibleSimpleKey();
    this.flowLevel++;
    this.allowSimpleKey = true;
    this.pushIndicator(type);
  }

  private fetchFlowCollectionEnd(type: 'flow_sequence_end' | 'flow_mapping_end'): void {
    this.removePossibleSimpleKey();
    if (this.flowLevel > 0) this.flowLevel--;
    this.allowSimpleKey = false;
    this.pushIndicator(type);
  }

  private fetchFlowEntry(): void {
    this.allowSimpleKey = true;
    this.removePossibleSimpleKey();
    this.pushIndicator('flow_entry');
  }

  private fetchBlockEntry(): void {
    if (this.flowLevel === 0) {
      if (!this.allowSimpleKey) {
        throw this.error('sequence entries are not allowed here', this.mark(), 'start the "- " entry on its own line');
      }
      if (this.addIndent(this.column)) {
        const position = this.mark();
        this.tokens.push({ type: 'block_sequence_start', start: position, end: position });
      }
    }
    // In flow context a "-" entry is left for the parser to reject.
    this.allowSimpleKey = true;
    this.removePossibleSimpleKey();
    this.pushIndicator('block_entry');
  }

  private fetchKey(): void {
    if (this.flowLevel === 0) {
      if (!this.allowSimpleKey) {
        throw this.error('mapping keys are not allowed here', this.mark());
      }
      if (this.addIndent(this.column)) {
        const position = this.mark();
        this.tokens.push({ type: 'block_mapping_start', start: position, end: position });
      }
    }
    this.allowSimpleKey = this.flowLevel === 0;
    this.removePossibleSimpleKey();
    this.pushIndicator('key');
  }

  private fetchValue(): void {
    const key = this.possibleSimpleKeys.get(this.flowLevel);
    if (key) {
      // The saved simple key becomes a KEY token inserted before its first token.
      this.possibleSimpleKeys.delete(this.flowLevel);
      const at = key.tokenNumber - this.tokensTaken;
      this.tokens.splice(at, 0, { type: 'key', start: key.position, end: key.position });
      if (this.flowLevel === 0 && this.addIndent(key.column)) {
        this.tokens.splice(at, 0, { type: 'block_mapping_start', start: key.position, end: key.position });
      }
      this.allowSimpleKey = false;
    } else {
      if (this.flowLevel === 0) {
        if (!this.allowSimpleKey) {
          throw this.error(
            'mapping values are not allowed here',
            this.mark(),
            'quote the scalar if it contains ": "',
          );
        }
        if (this.addIndent(this.column)) {
          const position = this.mark();
          this.tokens.push({ type: 'block_mapping_start', start: position, end: position });
        }
      }
      this.allowSimpleKey = this.flowLevel === 0;
      this.removePossibleSimpleKey();
    }
    this.pushIndicator('value');
  }

  private fetchAnchor(type: 'alias' | 'anchor'): void {
    this.savePossibleSimpleKey();
    this.allowSimpleKey = false;
    this.tokens.push(this.scanAnchor(type));
  }

  private fetchTag(): void {
    this.savePossibleSimpleKey();
    this.allowSimpleKey = false;
    this.tokens.push(this.scanTag());
  }

  private fetchBlockScalar(style: 'literal' | 'folded'): void {
    // A simple key may follow a block scalar.
    this.allowSimpleKey = true;
    this.removePossibleSimpleKey();
    this.tokens.push({ type: 'scalar', ...scanBlockScalar(this.scalarContext, style) });
  }

  private fetchFlowScalar(style: 'single' | 'double'): void {
    this.savePossibleSimpleKey();
    this.allowSimpleKey = false;
    this.tokens.push({ type: 'scalar', ...scanFlowScalar(this.scalarContext, style) });
  }

  private fetchPlain(): void {
    this.savePossibleSimpleKey();
    this.allowSimpleKey = false;
    // scanPlain re-enables simple keys when the scalar ends at a line break.
    this.tokens.push({ type: 'scalar', ...scanPlain(this.scalarContext) });
  }

  // -------------------------------------------------------------------------
  // Directives, anchors and tags
  // -------------------------------------------------------------------------

  private scanDirective(): DirectiveToken {
    const start = this.mark();
    this.forward();
    const name = this.scanDirectiveName(start);
    let params: string[];
    if (name === 'YAML') {
      params = [this.scanYamlDirectiveValue()];
    } else if (name === 'TAG') {
      params = this.scanTagDirectiveValue();
    } else {
      params = [];
      for (;;) {
        while (isBlank(this.ch())) this.forward();
        if (isBreakOrEnd(this.ch()) || this.ch() === '#') break;
        let length = 0;
        while (!isBlankOrEnd(this.ch(length))) length++;
        params.push(this.prefix(length));
        this.forward(length);
      }
    }
    const end = this.mark();
    this.scanDirectiveIgnoredLine();
    return { type: 'directive', name, params, start, end };
  }

  private scanDirectiveName(start: Position): string {
    let length = 0;
    while (isWordChar(this.ch(length))) length++;
    if (length === 0) {
      throw this.error(`expected a directive name, but found "${this.ch()}"`, start);
    }
    const name = this.prefix(length);
    this.forward(length);
    if (!isBlankOrEnd(this.ch())) {
      throw this.error(`expected blank after directive name, but found "${this.ch()}"`, this.mark());
    }
    return name;
  }

  private scanYamlDirectiveNumber(): string {
    if (!isDigit(this.ch())) {
      throw this.error(`expected a digit in the %YAML version, but found "${this.ch()}"`, this.mark(), 'write it as "%YAML 1.2"');
    }
    let length = 0;
    while (isDigit(this.ch(length))) length++;
    const digits = this.prefix(length);
    this.forward(length);
    return digits;
  }

  private scanYamlDirectiveValue(): string {
    while (isBlank(this.ch())) this.forward();
    const major = this.scanYamlDirectiveNumber();
    if (this.ch() !== '.') {
      throw this.error(`expected "." in the %YAML version, but found "${this.ch()}"`, this.mark(), 'write it as "%YAML 1.2"');
    }
    this.forward();
    const minor = this.scanYamlDirectiveNumber();
    if (!isBlankOrEnd(this.ch())) {
      throw this.error(`expected blank after the %YAML version, but found "${this.ch()}"`, this.mark());
    }
    return `${major}.${minor}`;
  }

  private scanTagDirectiveValue(): string[] {
    while (isBlank(this.ch())) this.forward();
    const handle = this.scanTagHandle('directive');
    if (!isBlank(this.ch())) {
      throw this.error(`expected blank after the %TAG handle, but found "${this.ch()}"`, this.mark());
    }
    while (isBlank(this.ch())) this.forward();
    const start = this.mark();
    let length = 0;
    while (isUriChar(this.ch(length)) || isFlowIndicator(this.ch(length))) length++;
    if (length === 0) {
      throw this.error('expected a tag prefix in the %TAG directive', start, 'write it as "%TAG !e! tag:example.com,2000:"');
    }
    const prefix = this.decodeUri(this.prefix(length), start);
    this.forward(length);
    if (!isBlankOrEnd(this.ch())) {
      throw this.error(`expected blank after the %TAG prefix, but found "${this.ch()}"`, this.mark());
    }
    return [handle, prefix];
  }

  private scanDirectiveIgnoredLine(): void {
    while (isBlank(this.ch())) this.forward();
    if (this.ch() === '#') {
      while (!isBreakOrEnd(this.ch())) this.forward();
    }
    if (!isBreakOrEnd(this.ch())) {
      throw this.error(`expected a comment or a line break after a directive, but found "${this.ch()}"`, this.mark());
    }
    this.scanLineBreak();
  }

  private scanAnchor(type: 'alias' | 'anchor'): AnchorToken {
    const start = this.mark();
    this.forward();
    let length = 0;
    for (;;) {
      const ch = this.ch(length);
      if (isBlankOrEnd(ch) || isFlowIndicator(ch)) break;
      if (ch === ':' && (isBlankOrEnd(this.ch(length + 1)) || isFlowIndicator(this.ch(length + 1)))) break;
      length++;
    }
    if (length === 0) {
      throw this.error(`expected ${type} name, but found "${this.ch()}"`, start);
    }
    const value = this.prefix(length);
    this.forward(length);
    return { type, value, start, end: this.mark() };
  }

  private scanTag(): TagToken {
    const start = this.mark();
    const next = this.ch(1);
    let handle: string | null;
    let suffix: string;
    if (next === '<') {
      this.forward(2);
      suffix = this.scanTagUri(start, true);
      if (this.ch() !== '>') {
        throw this.error(`expected ">" to close the verbatim tag, but found "${this.ch()}"`, this.mark());
      }
      this.forward();
      handle = null;
    } else if (isBlankOrEnd(next) || (this.flowLevel > 0 && isFlowIndicator(next))) {
      // The non-specific tag "!".
      this.forward();
      handle = '!';
      suffix = '';
    } else {
      let length = 1;
      let named = false;
      while (!isBlankOrEnd(this.ch(length))) {
        if (this.ch(length) === '!') {
          named = true;
          break;
        }
        length++;
      }
      if (named) {
        handle = this.scanTagHandle('tag');
      } else {
        handle = '!';
        this.forward();
      }
      suffix = this.scanTagUri(start, false);
    }
    const ch = this.ch();
    if (!isBlankOrEnd(ch) && !(this.flowLevel > 0 && isFlowIndicator(ch))) {
      throw this.error(`expected blank after tag, but found "${ch}"`, this.mark());
    }
    return { type: 'tag', handle, suffix, start, end: this.mark() };
  }

  private scanTagHandle(context: 'tag' | 'directive'): string {
    const start = this.mark();
    if (this.ch() !== '!') {
      throw this.error(`expected "!" to start a ${context} handle, but found "${this.ch()}"`, start);
    }
    let length = 1;
    if (this.ch(1) !== ' ') {
      while (isWordChar(this.ch(length))) length++;
      if (this.ch(length) !== '!') {
        if (context === 'directive' || length > 1) {
          this.forward(length);
          throw this.error(`expected "!" to close the ${context} handle, but found "${this.ch()}"`, this.mark());
        }
      } else {
        length++;
      }
    }
    const handle = this.prefix(length);
    this.forward(length);
    return handle;
  }

  private scanTagUri(start: Position, verbatim: boolean): string {
    let length = 0;
    for (;;) {
      const ch = this.ch(length);
      if (isUriChar(ch) || (verbatim && (ch === ',' || ch === '[' || ch === ']'))) {
        length++;
        continue;
      }
      break;
    }
    if (length === 0) {
      throw this.error(`expected a tag URI, but found "${this.ch()}"`, start);
    }
    const uri = this.decodeUri(this.prefix(length), start);
    this.forward(length);
    return uri;
  }

  private decodeUri(raw: string, start: Position): string {
    if (!raw.includes('%')) return raw;
    try {
      return decodeURIComponent(raw);
    } catch {
      throw this.error(`invalid URI escape in "${raw}"`, start);
    }
  }
}

/**
 * Scan the whole input into an array of tokens, ending with `stream_end`.
 *
 * @throws {ScanError} When the input contains a malformed lexeme.
 * @throws {ComposeError} When the input exceeds the byte or string-length limits.
 */
export function tokenize(input: string, options: ScannerOptions = {}): Token[] {
  const scanner = new Scanner(input, options);
  const tokens: Token[] = [];
  for (let token = scanner.next(); token; token = scanner.next()) {
    tokens.push(token);
  }
  return tokens;
}
