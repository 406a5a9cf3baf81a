import { ComposeError, ParseError, reportWarning, type WarningHandler } from './errors';
import type { Event, MappingStartEvent, ScalarEvent, SequenceStartEvent } from './events';
import type { ResourceTracker } from './limits';
import type { Parser } from './parser';
import type { Position } from './position';
import { FAILSAFE_PROFILE, getSchema, resolvePlainScalar, type SchemaName, type SchemaProfile } from './schemas';
import {
  findTagDefinition,
  MERGE_TAG,
  resolveTagUri,
  type LoaderType,
  type NodeKind,
  type TagContext,
  type TagDefinition,
  type TagRegistry,
} from './tags';
import {
  canonicalKey,
  cloneValue,
  mappingValue,
  sequenceValue,
  stringValue,
  type MappingEntry,
  type MappingValue,
  type SequenceValue,
  type Value,
} from './value';

export type DuplicateKeyPolicy = 'error' | 'first' | 'last';
export type AliasMode = 'copy' | 'share';
export type AliasDepthMode = 'independent' | 'additive';

/**
 * Options for the {@link Composer}.
 */
export interface ComposeOptions {
  /**
   * Plain-scalar typing rules for untagged scalars.
   *
   * @default 'core'
   */
  schema?: SchemaName;

  /**
   * Which tag constructors are active. `base` keeps only str/seq/map and types
   * every untagged scalar as a string; `full` adds {@link ComposeOptions.tags}.
   *
   * @default 'full' when `tags` is given, otherwise 'safe'
   */
  loader?: LoaderType;

  /** Custom tag constructors, used when the loader is `full`. */
  tags?: TagRegistry;

  /**
   * What to do with a tag no active constructor handles: resolve the node as
   * if untagged (with a warning), or fail with `UnknownTag`.
   *
   * @default 'resolve'
   */
  unknownTags?: 'resolve' | 'error';

  /**
   * What to do when a mapping repeats a key.
   *
   * @default 'error'
   */
  duplicateKeys?: DuplicateKeyPolicy;

  /**
   * `copy` expands every alias into an independent deep copy; `share` reuses
   * the anchored value object, so the result may be a DAG.
   *
   * @default 'copy'
   */
  aliases?: AliasMode;

  /**
   * How alias expansion is measured. `independent` checks the alias chain
   * length against `maxAliasDepth` and the expanded nesting against
   * `maxDepth` separately; `additive` checks current nesting plus the height
   * of the referenced subtree against `maxAliasDepth`.
   *
   * @default 'independent'
   */
  aliasDepthMode?: AliasDepthMode;

  /**
   * Reset anchor, depth, complexity and collection counters at each document.
   * Bytes consumed and the timeout always cover the whole input.
   *
   * @default true
   */
  resetLimitsPerDocument?: boolean;

  /**
   * Record source scalar styles, flow collection styles and anchor names on
   * values, for round-trip emission with `preserveStyle`.
   *
   * @default false
   */
  captureStyle?: boolean;

  /** Receives non-fatal diagnostics. Defaults to a `Warning:` line on stderr. */
  onWarning?: WarningHandler;
}

interface AnchorRecord {
  value: Value | null;
  inProgress: boolean;
  /** Complexity charged while composing the anchored node. */
  complexity: number;
  /** Collection levels below the node; 0 for a scalar. */
  height: number;
  /** Longest alias chain inside the node. */
  aliasChain: number;
}

interface ComposedNode {
  value: Value;
  start: Position;
  height: number;
  aliasChain: number;
  isMergeKey: boolean;
}

interface FrameBase {
  anchor: string | null;
  tag: string | null;
  definition: TagDefinition | null;
  start: Position;
  complexityAtStart: number;
  height: number;
  aliasChain: number;
}

interface SequenceFrame extends FrameBase {
  kind: 'sequence';
  value: SequenceValue;
}

interface MappingFrame extends FrameBase {
  kind: 'mapping';
  value: MappingValue;
  key: ComposedNode | null;
  keyStart: Position;
  keyIndex: Map<string, number>;
  mergeSources: MappingValue[];
  mergeIndex: number | null;
}

type Frame = SequenceFrame | MappingFrame;

/**
 * Builds {@link Value}s from the parser's events, one document per
 * {@link Composer.composeNext} call.
 *
 * Composition is iterative over an explicit frame stack. Every resource limit
 * is enforced through the shared {@link ResourceTracker} as values are built,
 * so a hostile document fails before it is fully materialized.
 */
export class Composer {
  private readonly parser: Parser;
  private readonly schema: SchemaProfile;
  private readonly loader: LoaderType;
  private readonly registry?: TagRegistry;
  private readonly unknownTags: 'resolve' | 'error';
  private readonly duplicateKeys: DuplicateKeyPolicy;
  private readonly aliasMode: AliasMode;
  private readonly aliasDepthMode: AliasDepthMode;
  private readonly resetLimitsPerDocument: boolean;
  private readonly captureStyle: boolean;
  private readonly onWarning?: WarningHandler;
  private readonly anchors = new Map<string, AnchorRecord>();
  private readonly stack: Frame[] = [];
  private tagHandles: Record<string, string> = {};
  private documents = 0;
  private finished = false;

  constructor(parser: Parser, options: ComposeOptions = {}) {
    this.parser = parser;
    this.loader = options.loader ?? (options.tags ? 'full' : 'safe');
    this.schema = this.loader === 'base' ? FAILSAFE_PROFILE : getSchema(options.schema ?? 'core');
    this.registry = options.tags;
    this.unknownTags = options.unknownTags ?? 'resolve';
    this.duplicateKeys = options.duplicateKeys ?? 'error';
    this.aliasMode = options.aliases ?? 'copy';
    this.aliasDepthMode = options.aliasDepthMode ?? 'independent';
    this.resetLimitsPerDocument = options.resetLimitsPerDocument ?? true;
    this.captureStyle = options.captureStyle ?? false;
    this.onWarning = options.onWarning;
  }

  get tracker(): ResourceTracker {
    return this.parser.tracker;
  }

  /** Number of documents composed so far. */
  get documentCount(): number {
    return this.documents;
  }

  /**
   * Compose the next document, or return null once the stream is exhausted.
   *
   * @throws {ComposeError} On an alias, merge, tag or resource-limit failure.
   * @throws {ParseError} On malformed structure.
   */
  composeNext(): Value | null {
    if (this.finished) return null;
    let event = this.nextEvent();
    if (event.type === 'stream_start') event = this.nextEvent();
    if (event.type === 'stream_end') {
      this.finished = true;
      return null;
    }
    if (event.type !== 'document_start') {
      throw this.structural('document start', event);
    }

    if (this.documents > 0 && this.resetLimitsPerDocument) this.tracker.resetDocument();
    this.documents++;
    this.anchors.clear();
    this.tagHandles = event.tags;

    const root = this.composeDocument();

    const end = this.nextEvent();
    if (end.type !== 'document_end') throw this.structural('document end', end);
    this.tracker.checkTimeout(end.start);
    return root;
  }

  private nextEvent(): Event {
    const event = this.parser.next();
    if (!event) {
      this.finished = true;
      throw new ParseError('an event', 'end of stream', this.parser.scanner.position());
    }
    this.tracker.tick(event.start);
    return event;
  }

  private structural(expected: string, event: Event): ParseError {
    return new ParseError(expected, event.type.replace('_', ' '), event.start, {
      snippet: this.parser.scanner.snippet(event.start),
    });
  }

  private error(
    kind: ComposeError['kind'],
    reason: string,
    position: Position,
    extra: { limit?: number; actual?: number; suggestion?: string } = {},
  ): ComposeError {
    return new ComposeError(kind, reason, position, { ...extra, snippet: this.parser.scanner.snippet(position) });
  }

  // -------------------------------------------------------------------------
  // Document loop
  // -------------------------------------------------------------------------

  private composeDocument(): Value {
    for (;;) {
      const event = this.nextEvent();
      let done: ComposedNode | null = null;
      switch (event.type) {
        case 'scalar':
          done = this.composeScalar(event);
          break;
        case 'alias':
          done = this.composeAlias(event.anchor, event.start);
          break;
        case 'sequence_start':
        case 'mapping_start':
          this.openCollection(event);
          break;
        case 'sequence_end':
        case 'mapping_end':
          done = this.closeCollection(event.start);
          break;
        default:
          throw this.structural('a node', event);
      }

      if (done) {
        const parent = this.stack[this.stack.length - 1];
        if (!parent) return done.value;
        this.attach(parent, done);
      }
    }
  }

  // -------------------------------------------------------------------------
  // Scalars
  // -------------------------------------------------------------------------

  private composeScalar(event: ScalarEvent): ComposedNode {
    if (event.anchor !== null) this.reserveAnchor(event.anchor, event.start);
    const before = this.tracker.complexity;
    this.tracker.addComplexity(1, event.start);

    let value: Value;
    let isMergeKey = false;
    if (event.tag === null) {
      value = event.style === 'plain' ? resolvePlainScalar(event.value, this.schema) : stringValue(event.value);
      isMergeKey = this.loader !== 'base' && event.style === 'plain' && event.value === '<<';
    } else if (event.tag === '!') {
      value = stringValue(event.value);
    } else {
      const uri = resolveTagUri(event.tag, this.tagHandles);
      isMergeKey = this.loader !== 'base' && uri === MERGE_TAG;
      const definition = this.lookupTag(uri, 'scalar', event.start);
      if (definition) {
        value = definition.construct(stringValue(event.value), this.tagContext(uri, event.start));
      } else {
        value =
          event.style === 'plain' ? resolvePlainScalar(event.value, this.schema) : stringValue(event.value);
        value.tag = uri;
      }
    }

    if (this.captureStyle) {
      if (value.type === 'string' && value.style === undefined) value.style = event.style;
      if (event.anchor !== null) value.anchor = event.anchor;
    }

    const node: ComposedNode = { value, start: event.start, height: 0, aliasChain: 0, isMergeKey };
    if (event.anchor !== null) this.recordAnchor(event.anchor, node, this.tracker.complexity - before);
    return node;
  }

  private lookupTag(uri: string, kind: NodeKind, position: Position): TagDefinition | null {
    const definition = findTagDefinition(uri, this.loader, this.registry);
    if (definition) {
      if (definition.kind !== kind) {
        throw this.error('InvalidValue', `Tag ${uri} cannot be applied to a ${kind}`, position);
      }
      return definition;
    }
    if (this.unknownTags === 'error') {
      throw this.error('UnknownTag', `Unknown tag ${uri}`, position, {
        suggestion: this.loader === 'full' ? 'register the tag in a TagRegistry' : 'load with loader "full" and a TagRegistry',
      });
    }
    reportWarning(
      { code: 'unknown-tag', message: `Unknown tag ${uri}, resolving the node by its content`, position },
      this.onWarning,
    );
    return null;
  }

  private tagContext(tag: string, position: Position): TagContext {
    return {
      tag,
      position,
      invalid: (reason: string) => this.error('InvalidValue', reason, position),
    };
  }

  // -------------------------------------------------------------------------
  // Anchors and aliases
  // -------------------------------------------------------------------------

  private reserveAnchor(name: string, position: Position): void {
    this.tracker.addAnchor(position);
    // A redefinition replaces the earlier anchor from here on.
    this.anchors.set(name, { value: null, inProgress: true, complexity: 0, height: 0, aliasChain: 0 });
  }

  private recordAnchor(name: string, node: ComposedNode, complexity: number): void {
    this.anchors.set(name, {
      value: node.value,
      inProgress: false,
      complexity,
      height: node.height,
      aliasChain: node.aliasChain,
    });
  }

  private composeAlias(name: string, position: Position): ComposedNode {
    const record = this.anchors.get(name);
    if (!record) {
      throw this.error('UndefinedAlias', `Undefined alias *${name}`, position, {
        suggestion: `define &${name} before referencing it`,
      });
    }
    if (record.inProgress || record.value === null) {
      throw this.error('CyclicReference', `Alias *${name} refers to a node that contains it`, position);
    }

    const nesting = this.stack.length;
    const limits = this.tracker.limits;
    const aliasChain = record.aliasChain + 1;
    if (this.aliasDepthMode === 'additive') {
      const depth = nesting + record.height;
      if (depth > limits.maxAliasDepth) {
        throw this.error('AliasDepthExceeded', `Maximum alias depth ${limits.maxAliasDepth} exceeded (got ${depth})`, position, {
          limit: limits.maxAliasDepth,
          actual: depth,
        });
      }
    } else {
      this.tracker.checkAliasDepth(aliasChain, position);
    }
    if (record.height > 0) this.tracker.checkDepth(nesting + record.height, position);
    this.tracker.addComplexity(record.complexity, position);

    const value = this.aliasMode === 'share' ? record.value : cloneValue(record.value);
    return { value, start: position, height: record.height, aliasChain, isMergeKey: false };
  }

  // -------------------------------------------------------------------------
  // Collections
  // -------------------------------------------------------------------------

  private openCollection(event: SequenceStartEvent | MappingStartEvent): void {
    if (event.anchor !== null) this.reserveAnchor(event.anchor, event.start);
    const complexityAtStart = this.tracker.complexity;
    this.tracker.addComplexity(1, event.start);

    const kind: NodeKind = event.type === 'sequence_start' ? 'sequence' : 'mapping';
    let tag: string | null = null;
    let definition: TagDefinition | null = null;
    if (event.tag !== null && event.tag !== '!') {
      tag = resolveTagUri(event.tag, this.tagHandles);
      definition = this.lookupTag(tag, kind, event.start);
    }

    const base: FrameBase = {
      anchor: event.anchor,
      tag,
      definition,
      start: event.start,
      complexityAtStart,
      height: 1,
      aliasChain: 0,
    };
    const flow = this.captureStyle ? { flow: event.flow } : {};
    if (kind === 'sequence') {
      this.stack.push({ ...base, kind, value: { ...sequenceValue(), ...flow } });
    } else {
      this.stack.push({
        ...base,
        kind,
        value: { ...mappingValue(), ...flow },
        key: null,
        keyStart: event.start,
        keyIndex: new Map(),
        mergeSources: [],
        mergeIndex: null,
      });
    }
  }

  private closeCollection(position: Position): ComposedNode {
    const frame = this.stack.pop();
    if (!frame) throw new ParseError('a node', 'end of collection', position);
    if (frame.kind === 'mapping') this.applyMerges(frame);

    let value: Value = frame.value;
    if (frame.definition) {
      value = frame.definition.construct(value, this.tagContext(frame.tag ?? '', frame.start));
    } else if (frame.tag !== null) {
      value.tag = frame.tag;
    }
    if (this.captureStyle && frame.anchor !== null) value.anchor = frame.anchor;

    const node: ComposedNode = {
      value,
      start: frame.start,
      height: frame.height,
      aliasChain: frame.aliasChain,
      isMergeKey: false,
    };
    if (frame.anchor !== null) {
      this.recordAnchor(frame.anchor, node, this.tracker.complexity - frame.complexityAtStart);
    }
    return node;
  }

  private attach(parent: Frame, node: ComposedNode): void {
    parent.height = Math.max(parent.height, node.height + 1);
    parent.aliasChain = Math.max(parent.aliasChain, node.aliasChain);

    if (parent.kind === 'sequence') {
      parent.value.items.push(node.value);
      this.tracker.addComplexity(1, parent.start);
      this.tracker.checkCollectionSize(parent.value.items.length, parent.start);
      return;
    }

    if (parent.key === null) {
      parent.key = node;
      parent.keyStart = node.start;
      return;
    }

    const key = parent.key;
    parent.key = null;
    if (key.isMergeKey) {
      this.addMergeSource(parent, node.value);
      return;
    }
    this.addEntry(parent, { key: key.value, value: node.value });
  }

  private addEntry(frame: MappingFrame, entry: MappingEntry): void {
    const entries = frame.value.entries;
    const id = canonicalKey(entry.key);
    const existing = frame.keyIndex.get(id);
    this.tracker.addComplexity(2, frame.start);
    if (existing !== undefined) {
      if (this.duplicateKeys === 'error') {
        throw this.error('DuplicateKey', `Duplicate mapping key ${describeKey(entry.key)}`, frame.keyStart, {
          suggestion: 'remove the repeated key or load with duplicateKeys "first" or "last"',
        });
      }
      reportWarning(
        {
          code: 'duplicate-key',
          message: `Duplicate mapping key ${describeKey(entry.key)}, keeping the ${this.duplicateKeys} value`,
          position: frame.keyStart,
        },
        this.onWarning,
      );
      if (this.duplicateKeys === 'last') entries[existing] = entry;
      return;
    }
    frame.keyIndex.set(id, entries.length);
    entries.push(entry);
    this.tracker.checkCollectionSize(entries.length, frame.start);
  }

  // -------------------------------------------------------------------------
  // Merge keys
  // -------------------------------------------------------------------------

  private addMergeSource(frame: MappingFrame, source: Value): void {
    const invalid = (): ComposeError =>
      this.error('InvalidMergeValue', 'Merge key "<<" needs a mapping or a sequence of mappings', frame.keyStart, {
        suggestion: 'merge an alias to a mapping, e.g. "<<: *defaults"',
      });
    if (source.type === 'mapping') {
      frame.mergeSources.push(source);
    } else if (source.type === 'sequence') {
      for (const item of source.items) {
        if (item.type !== 'mapping') throw invalid();
        frame.mergeSources.push(item);
      }
    } else {
      throw invalid();
    }
    frame.mergeIndex ??= frame.value.entries.length;
  }

  // Explicit keys beat every source; among sources the later one wins.
  private applyMerges(frame: MappingFrame): void {
    if (frame.mergeIndex === null) return;
    const merged: MappingEntry[] = [];
    const mergedIndex = new Map<string, number>();
    for (const source of frame.mergeSources) {
      for (const entry of source.entries) {
        this.tracker.addComplexity(2, frame.start);
        const id = canonicalKey(entry.key);
        if (frame.keyIndex.has(id)) continue;
        const copy = this.aliasMode === 'share' ? entry : { key: cloneValue(entry.key), value: cloneValue(entry.value) };
        const at = mergedIndex.get(id);
        if (at === undefined) {
          mergedIndex.set(id, merged.length);
          merged.push(copy);
        } else {
          merged[at] = copy;
        }
      }
    }
    const entries = frame.value.entries;
    entries.splice(frame.mergeIndex, 0, ...merged);
    this.tracker.checkCollectionSize(entries.length, frame.start);
  }
}

function describeKey(key: Value): string {
  if (key.type === 'string') return `"${key.value}"`;
  if (key.type === 'sequence' || key.type === 'mapping') return `(${key.type})`;
  if (key.type === 'null') return 'null';
  return String(key.value);
}

