import { ParseError, MaxDepthError, reportWarning, type WarningHandler } from './errors';
import type {
  AliasEvent,
  DocumentStartEvent,
  Event,
  MappingStartEvent,
  ScalarEvent,
  SequenceStartEvent,
} from './events';
import type { ResourceTracker } from './limits';
import type { Position } from './position';
import { Scanner, type TagToken, type Token, type TokenType, type ScannerOptions } from './scanner';

/**
 * Options for {@link parseEvents} and the {@link Parser} constructor.
 */
export interface ParseOptions extends ScannerOptions {
  /**
   * Receives non-fatal diagnostics such as a `%YAML 1.3` directive. Defaults to
   * writing a `Warning:` line to stderr.
   */
  onWarning?: WarningHandler;

  /**
   * `%YAML` version already in effect when parsing starts. Used when a stream
   * is parsed in segments so a directive from an earlier segment carries over.
   *
   * @default null
   */
  version?: string | null;
}

type ParserState =
  | 'stream_start'
  | 'implicit_document_start'
  | 'document_start'
  | 'document_content'
  | 'document_end'
  | 'block_node'
  | 'block_sequence_entry'
  | 'indentless_sequence_entry'
  | 'block_mapping_key'
  | 'block_mapping_value'
  | 'flow_sequence_first_entry'
  | 'flow_sequence_entry'
  | 'flow_sequence_entry_mapping_key'
  | 'flow_sequence_entry_mapping_value'
  | 'flow_sequence_entry_mapping_end'
  | 'flow_mapping_first_key'
  | 'flow_mapping_key'
  | 'flow_mapping_value'
  | 'flow_mapping_empty_value';

const DEFAULT_TAG_HANDLES: ReadonlySet<string> = new Set(['!', '!!']);

const INDICATOR_NAMES: Partial<Record<TokenType, string>> = {
  stream_end: 'end of stream',
  directive: 'directive',
  document_start: '"---"',
  document_end: '"..."',
  block_sequence_start: 'block sequence',
  block_mapping_start: 'block mapping',
  block_end: 'end of block collection',
  flow_sequence_start: '"["',
  flow_sequence_end: '"]"',
  flow_mapping_start: '"{"',
  flow_mapping_end: '"}"',
  block_entry: '"-"',
  flow_entry: '","',
  key: 'mapping key',
  value: '":"',
};

function describeToken(token: Token): string {
  switch (token.type) {
    case 'scalar':
      return `scalar "${token.value.length > 20 ? `${token.value.slice(0, 20)}...` : token.value}"`;
    case 'alias':
      return `alias "*${token.value}"`;
    case 'anchor':
      return `anchor "&${token.value}"`;
    case 'tag':
      return 'tag';
    default:
      return INDICATOR_NAMES[token.type] ?? token.type;
  }
}

/**
 * Pull-based YAML event parser.
 *
 * Drives an explicit state stack instead of recursion, so nesting depth is
 * bounded by `limits.maxDepth` and never by the host's call stack.
 *
 * @example
 * const parser = new Parser('- a\n- b');
 * for (let event = parser.next(); event; event = parser.next()) {
 *   console.log(event.type);
 * }
 */
export class Parser {
  readonly scanner: Scanner;
  private readonly onWarning?: WarningHandler;
  private readonly states: ParserState[] = [];
  private state: ParserState | null = 'stream_start';
  private current: Event | null = null;
  private depth = 0;
  private yamlVersion: string | null;
  private tagHandles: Record<string, string> = {};
  private lastDocumentExplicitEnd = false;

  constructor(input: string | Scanner, options: ParseOptions = {}) {
    this.scanner = typeof input === 'string' ? new Scanner(input, options) : input;
    this.onWarning = options.onWarning;
    this.yamlVersion = options.version ?? null;
  }

  get tracker(): ResourceTracker {
    return this.scanner.tracker;
  }

  /** The `%YAML` version in effect, or null when none was declared. */
  get version(): string | null {
    return this.yamlVersion;
  }

  /** Return the next event and consume it, or null after `stream_end`. */
  next(): Event | null {
    const event = this.peek();
    this.current = null;
    return event;
  }

  /** Return the next event without consuming it, or null after `stream_end`. */
  peek(): Event | null {
    if (this.current === null && this.state !== null) {
      this.current = this.step(this.state);
    }
    return this.current;
  }

  // -------------------------------------------------------------------------
  // Token helpers
  // -------------------------------------------------------------------------

  private peekToken(): Token {
    const token = this.scanner.peek();
    // The scanner always ends with stream_end, and the parser stops there.
    if (!token) throw this.fail('a token', 'end of input', this.scanner.position());
    return token;
  }

  private nextToken(): Token {
    const token = this.peekToken();
    this.scanner.next();
    return token;
  }

  private check(...types: TokenType[]): boolean {
    return types.includes(this.peekToken().type);
  }

  private fail(expected: string, found: string, position: Position, suggestion?: string): ParseError {
    return new ParseError(expected, found, position, { snippet: this.scanner.snippet(position), suggestion });
  }

  private unexpected(expected: string, suggestion?: string): ParseError {
    const token = this.peekToken();
    return this.fail(expected, describeToken(token), token.start, suggestion);
  }

  private popState(): void {
    this.state = this.states.pop() ?? null;
  }

  private emptyScalar(position: Position): ScalarEvent {
    return {
      type: 'scalar',
      anchor: null,
      tag: null,
      value: '',
      style: 'plain',
      implicit: true,
      start: position,
      end: position,
    };
  }

  private enterCollection(position: Position): void {
    this.depth++;
    const maxDepth = this.tracker.limits.maxDepth;
    if (this.depth > maxDepth) {
      throw new MaxDepthError(maxDepth, this.depth, position, {
        snippet: this.scanner.snippet(position),
        suggestion: 'reduce nesting or raise limits.maxDepth',
      });
    }
    this.tracker.checkDepth(this.depth, position);
  }

  private leaveCollection(): void {
    this.depth--;
  }

  // -------------------------------------------------------------------------
  // State dispatch
  // -------------------------------------------------------------------------

  private step(state: ParserState): Event {
    switch (state) {
      case 'stream_start':
        return this.parseStreamStart();
      case 'implicit_document_start':
        return this.parseImplicitDocumentStart();
      case 'document_start':
        return this.parseDocumentStart();
      case 'document_content':
        return this.parseDocumentContent();
      case 'document_end':
        return this.parseDocumentEnd();
      case 'block_node':
        return this.parseNode(true, false);
      case 'block_sequence_entry':
        return this.parseBlockSequenceEntry();
      case 'indentless_sequence_entry':
        return this.parseIndentlessSequenceEntry();
      case 'block_mapping_key':
        return this.parseBlockMappingKey();
      case 'block_mapping_value':
        return this.parseBlockMappingValue();
      case 'flow_sequence_first_entry':
        return this.parseFlowSequenceEntry(true);
      case 'flow_sequence_entry':
        return this.parseFlowSequenceEntry(false);
      case 'flow_sequence_entry_mapping_key':
        return this.parseFlowSequenceEntryMappingKey();
      case 'flow_sequence_entry_mapping_value':
        return this.parseFlowSequenceEntryMappingValue();
      case 'flow_sequence_entry_mapping_end':
        return this.parseFlowSequenceEntryMappingEnd();
      case 'flow_mapping_first_key':
        return this.parseFlowMappingKey(true);
      case 'flow_mapping_key':
        return this.parseFlowMappingKey(false);
      case 'flow_mapping_value':
        return this.parseFlowMappingValue();
      case 'flow_mapping_empty_value':
        this.state = 'flow_mapping_key';
        return this.emptyScalar(this.peekToken().start);
    }
  }

  // -------------------------------------------------------------------------
  // Stream and documents
  // -------------------------------------------------------------------------

  private parseStreamStart(): Event {
    const token = this.nextToken();
    if (token.type !== 'stream_start') {
      throw this.fail('stream start', describeToken(token), token.start);
    }
    this.state = 'implicit_document_start';
    return { type: 'stream_start', start: token.start, end: token.end };
  }

  private parseImplicitDocumentStart(): Event {
    if (this.check('directive', 'document_start', 'stream_end')) {
      return this.parseDocumentStart();
    }
    return this.startImplicitDocument();
  }

  private startImplicitDocument(): DocumentStartEvent {
    const token = this.peekToken();
    this.tagHandles = {};
    this.states.push('document_end');
    this.state = 'block_node';
    return {
      type: 'document_start',
      explicit: false,
      version: this.yamlVersion,
      tags: {},
      start: token.start,
      end: token.start,
    };
  }

  private parseDocumentStart(): Event {
    // Stray "..." markers between documents are ignored.
    while (this.check('document_end')) {
      this.nextToken();
      this.lastDocumentExplicitEnd = true;
    }

    if (this.check('stream_end')) {
      const token = this.nextToken();
      this.state = null;
      return { type: 'stream_end', start: token.start, end: token.end };
    }

    // A bare document may follow one closed with "...".
    if (this.lastDocumentExplicitEnd && !this.check('directive', 'document_start')) {
      this.lastDocumentExplicitEnd = false;
      return this.startImplicitDocument();
    }

    const start = this.peekToken().start;
    this.processDirectives();
    if (!this.check('document_start')) {
      throw this.unexpected('document start', 'start the document with "---"');
    }
    const token = this.nextToken();
    this.states.push('document_end');
    this.state = 'document_content';
    return {
      type: 'document_start',
      explicit: true,
      version: this.yamlVersion,
      tags: { ...this.tagHandles },
      start,
      end: token.end,
    };
  }

  private processDirectives(): void {
    this.tagHandles = {};
    let sawVersion = false;
    while (this.check('directive')) {
      const token = this.nextToken();
      if (token.type !== 'directive') continue;
      if (token.name === 'YAML') {
        if (sawVersion) {
          throw this.fail('a single %YAML directive', 'a second %YAML directive', token.start);
        }
        sawVersion = true;
        const version = token.params[0] ?? '';
        const [major, minor] = version.split('.').map(Number);
        if (major !== 1) {
          throw this.fail('YAML version 1.x', `%YAML ${version}`, token.start, 'use "%YAML 1.2"');
        }
        if (minor > 2) {
          reportWarning(
            { code: 'yaml-version', message: `Unsupported YAML version ${version}, parsing as 1.2`, position: token.start },
            this.onWarning,
          );
        }
        this.yamlVersion = version;
      } else if (token.name === 'TAG') {
        const [handle, prefix] = token.params;
        if (handle in this.tagHandles) {
          throw this.fail('a unique %TAG handle', `duplicate handle "${handle}"`, token.start);
        }
        this.tagHandles[handle] = prefix;
      }
      // Other directives are reserved and ignored.
    }
  }

  private parseDocumentContent(): Event {
    if (this.check('directive', 'document_start', 'document_end', 'stream_end')) {
      const event = this.emptyScalar(this.peekToken().start);
      this.popState();
      return event;
    }
    return this.parseNode(true, false);
  }

  private parseDocumentEnd(): Event {
    const token = this.peekToken();
    let end = token.start;
    let explicit = false;
    if (token.type === 'document_end') {
      this.nextToken();
      end = token.end;
      explicit = true;
    } else if (!this.check('directive', 'document_start', 'stream_end')) {
      throw this.unexpected('end of document', 'separate documents with "---"');
    }
    this.lastDocumentExplicitEnd = explicit;
    this.tagHandles = {};
    this.depth = 0;
    this.state = 'document_start';
    return { type: 'document_end', explicit, start: token.start, end };
  }

  // -------------------------------------------------------------------------
  // Nodes
  // -------------------------------------------------------------------------

  private resolveTagToken(token: TagToken): string {
    if (token.handle === null) return `!<${token.suffix}>`;
    if (!DEFAULT_TAG_HANDLES.has(token.handle) && !(token.handle in this.tagHandles)) {
      throw this.fail(
        'a declared tag handle',
        `undefined tag handle "${token.handle}"`,
        token.start,
        `declare it with "%TAG ${token.handle} <prefix>"`,
      );
    }
    return token.handle + token.suffix;
  }

  private parseNode(block: boolean, indentlessSequence: boolean): Event {
    const first = this.peekToken();
    if (first.type === 'alias') {
      this.nextToken();
      this.popState();
      const event: AliasEvent = { type: 'alias', anchor: first.value, start: first.start, end: first.end };
      return event;
    }

    let anchor: string | null = null;
    let tag: string | null = null;
    let start: Position | null = null;
    let end: Position = first.start;
    for (;;) {
      const token = this.peekToken();
      if (token.type === 'anchor' && anchor === null) {
        anchor = token.value;
      } else if (token.type === 'tag' && tag === null) {
        tag = this.resolveTagToken(token);
      } else {
        break;
      }
      this.nextToken();
      start ??= token.start;
      end = token.end;
    }

    const token = this.peekToken();
    const nodeStart = start ?? token.start;

    if (indentlessSequence && token.type === 'block_entry') {
      this.enterCollection(token.start);
      this.state = 'indentless_sequence_entry';
      const event: SequenceStartEvent = { type: 'sequence_start', anchor, tag, flow: false, start: nodeStart, end: token.end };
      return event;
    }

    if (token.type === 'scalar') {
      this.nextToken();
      this.popState();
      return {
        type: 'scalar',
        anchor,
        tag,
        value: token.value,
        style: token.style,
        implicit: tag === null && token.style === 'plain',
        start: nodeStart,
        end: token.end,
      };
    }

    if (token.type === 'flow_sequence_start' || (block && token.type === 'block_sequence_start')) {
      this.nextToken();
      this.enterCollection(token.start);
      const flow = token.type === 'flow_sequence_start';
      this.state = flow ? 'flow_sequence_first_entry' : 'block_sequence_entry';
      const event: SequenceStartEvent = { type: 'sequence_start', anchor, tag, flow, start: nodeStart, end: token.end };
      return event;
    }

    if (token.type === 'flow_mapping_start' || (block && token.type === 'block_mapping_start')) {
      this.nextToken();
      this.enterCollection(token.start);
      const flow = token.type === 'flow_mapping_start';
      this.state = flow ? 'flow_mapping_first_key' : 'block_mapping_key';
      const event: MappingStartEvent = { type: 'mapping_start', anchor, tag, flow, start: nodeStart, end: token.end };
      return event;
    }

    if (anchor !== null || tag !== null) {
      // Properties with no content make an empty scalar.
      this.popState();
      return {
        type: 'scalar',
        anchor,
        tag,
        value: '',
        style: 'plain',
        implicit: tag === null,
        start: nodeStart,
        end,
      };
    }

    throw this.unexpected(`${block ? 'block' : 'flow'} node content`);
  }

  // -------------------------------------------------------------------------
  // Block collections
  // -------------------------------------------------------------------------

  private parseBlockSequenceEntry(): Event {
    if (this.check('block_entry')) {
      const token = this.nextToken();
      if (!this.check('block_entry', 'block_end')) {
        this.states.push('block_sequence_entry');
        return this.parseNode(true, false);
      }
      this.state = 'block_sequence_entry';
      return this.emptyScalar(token.end);
    }
    if (!this.check('block_end')) {
      throw this.unexpected('"-" or end of block sequence', 'align sequence entries at the same column');
    }
    const token = this.nextToken();
    this.leaveCollection();
    this.popState();
    return { type: 'sequence_end', start: token.start, end: token.end };
  }

  private parseIndentlessSequenceEntry(): Event {
    if (this.check('block_entry')) {
      const token = this.nextToken();
      if (!this.check('block_entry', 'key', 'value', 'block_end')) {
        this.states.push('indentless_sequence_entry');
        return this.parseNode(true, false);
      }
      this.state = 'indentless_sequence_entry';
      return this.emptyScalar(token.end);
    }
    const token = this.peekToken();
    this.leaveCollection();
    this.popState();
    return { type: 'sequence_end', start: token.start, end: token.start };
  }

  private parseBlockMappingKey(): Event {
    if (this.check('key')) {
      const token = this.nextToken();
      if (!this.check('key', 'value', 'block_end')) {
        this.states.push('block_mapping_value');
        return this.parseNode(true, true);
      }
      this.state = 'block_mapping_value';
      return this.emptyScalar(token.end);
    }
    if (this.check('value')) {
      // ": value" with no key.
      this.state = 'block_mapping_value';
      return this.emptyScalar(this.peekToken().start);
    }
    if (!this.check('block_end')) {
      throw this.unexpected('mapping key or end of block mapping', 'align mapping keys at the same column');
    }
    const token = this.nextToken();
    this.leaveCollection();
    this.popState();
    return { type: 'mapping_end', start: token.start, end: token.end };
  }

  private parseBlockMappingValue(): Event {
    if (this.check('value')) {
      const token = this.nextToken();
      if (!this.check('key', 'value', 'block_end')) {
        this.states.push('block_mapping_key');
        return this.parseNode(true, true);
      }
      this.state = 'block_mapping_key';
      return this.emptyScalar(token.end);
    }
    this.state = 'block_mapping_key';
    return this.emptyScalar(this.peekToken().start);
  }

  // -------------------------------------------------------------------------
  // Flow collections
  // -------------------------------------------------------------------------

  private parseFlowSequenceEntry(first: boolean): Event {
    if (!this.check('flow_sequence_end')) {
      if (!first) {
        if (!this.check('flow_entry')) {
          throw this.unexpected('"," or "]"', 'close the flow sequence with "]"');
        }
        this.nextToken();
      }
      const token = this.peekToken();
      if (token.type === 'key') {
        this.enterCollection(token.start);
        this.state = 'flow_sequence_entry_mapping_key';
        const event: MappingStartEvent = {
          type: 'mapping_start',
          anchor: null,
          tag: null,
          flow: true,
          start: token.start,
          end: token.end,
        };
        return event;
      }
      if (token.type !== 'flow_sequence_end') {
        this.states.push('flow_sequence_entry');
        return this.parseNode(false, false);
      }
    }
    const token = this.nextToken();
    this.leaveCollection();
    this.popState();
    return { type: 'sequence_end', start: token.start, end: token.end };
  }

  private parseFlowSequenceEntryMappingKey(): Event {
    const token = this.nextToken();
    if (!this.check('value', 'flow_entry', 'flow_sequence_end')) {
      this.states.push('flow_sequence_entry_mapping_value');
      return this.parseNode(false, false);
    }
    this.state = 'flow_sequence_entry_mapping_value';
    return this.emptyScalar(token.end);
  }

  private parseFlowSequenceEntryMappingValue(): Event {
    if (this.check('value')) {
      const token = this.nextToken();
      if (!this.check('flow_entry', 'flow_sequence_end')) {
        this.states.push('flow_sequence_entry_mapping_end');
        return this.parseNode(false, false);
      }
      this.state = 'flow_sequence_entry_mapping_end';
      return this.emptyScalar(token.end);
    }
    this.state = 'flow_sequence_entry_mapping_end';
    return this.emptyScalar(this.peekToken().start);
  }

  private parseFlowSequenceEntryMappingEnd(): Event {
    this.state = 'flow_sequence_entry';
    this.leaveCollection();
    const position = this.peekToken().start;
    return { type: 'mapping_end', start: position, end: position };
  }

  private parseFlowMappingKey(first: boolean): Event {
    if (!this.check('flow_mapping_end')) {
      if (!first) {
        if (!this.check('flow_entry')) {
          throw this.unexpected('"," or "}"', 'close the flow mapping with "}"');
        }
        this.nextToken();
      }
      if (this.check('key')) {
        const token = this.nextToken();
        if (!this.check('value', 'flow_entry', 'flow_mapping_end')) {
          this.states.push('flow_mapping_value');
          return this.parseNode(false, false);
        }
        this.state = 'flow_mapping_value';
        return this.emptyScalar(token.end);
      }
      if (!this.check('flow_mapping_end')) {
        this.states.push('flow_mapping_empty_value');
        return this.parseNode(false, false);
      }
    }
    const token = this.nextToken();
    this.leaveCollection();
    this.popState();
    return { type: 'mapping_end', start: token.start, end: token.end };
  }

  private parseFlowMappingValue(): Event {
    if (this.check('value')) {
      const token = this.nextToken();
      if (!this.check('flow_entry', 'flow_mapping_end')) {
        this.states.push('flow_mapping_key');
        return this.parseNode(false, false);
      }
      this.state = 'flow_mapping_key';
      return this.emptyScalar(token.end);
    }
    this.state = 'flow_mapping_key';
    return this.emptyScalar(this.peekToken().start);
  }
}

/**
 * Parse the whole input into an array of events, from `stream_start` to
 * `stream_end`.
 *
 * @throws {ScanError} When the input contains a malformed lexeme.
 * @throws {ParseError} When a token is not valid where it appears.
 * @throws {MaxDepthError} When nesting exceeds `limits.maxDepth`.
 */
export function parseEvents(input: string, options: ParseOptions = {}): Event[] {
  const parser = new Parser(input, options);
  const events: Event[] = [];
  for (let event = parser.next(); event; event = parser.next()) {
    events.push(event);
  }
  return events;
}
