import { CORE_TAG_PREFIX } from './constants';
import type { ComposeError } from './errors';
import type { Position } from './position';
import { parseBoolLiteral, parseFloatLiteral, parseIntLiteral, parseNullLiteral } from './schemas';
import { canonicalKey, floatValue, stringValue, type Value } from './value';

export type NodeKind = 'scalar' | 'sequence' | 'mapping';

/** Which tag constructors a load activates. */
export type LoaderType = 'base' | 'safe' | 'full';

export interface TagContext {
  /** Resolved tag URI being constructed. */
  readonly tag: string;
  /** Where the tagged node starts. */
  readonly position: Position;
  /** Build the error to throw when the node cannot be constructed. */
  invalid(reason: string): ComposeError;
}

/**
 * Constructor for one tag. Scalar constructors receive the raw text as a
 * string value; collection constructors receive the composed collection.
 */
export interface TagDefinition {
  readonly kind: NodeKind;
  construct(node: Value, context: TagContext): Value;
}

/**
 * Custom tag constructors, active when loading with `loader: 'full'`.
 *
 * Tags are keyed by their resolved URI: `!point` stays `!point`, while
 * `!e!point` under `%TAG !e! tag:example.com,2000:` becomes
 * `tag:example.com,2000:point`.
 *
 * @example
 * const tags = new TagRegistry().register('!upper', {
 *   kind: 'scalar',
 *   construct: (node) => (node.type === 'string' ? stringValue(node.value.toUpperCase()) : node),
 * });
 * loadOne('!upper abc', { loader: 'full', tags });
 */
export class TagRegistry {
  private readonly definitions = new Map<string, TagDefinition>();

  constructor(definitions: Readonly<Record<string, TagDefinition>> = {}) {
    for (const [tag, definition] of Object.entries(definitions)) this.register(tag, definition);
  }

  register(tag: string, definition: TagDefinition): this {
    this.definitions.set(tag, definition);
    return this;
  }

  get(tag: string): TagDefinition | undefined {
    return this.definitions.get(tag);
  }

  has(tag: string): boolean {
    return this.definitions.has(tag);
  }

  get size(): number {
    return this.definitions.size;
  }
}

export function coreTag(name: string): string {
  return CORE_TAG_PREFIX + name;
}

export const STR_TAG = coreTag('str');
export const SEQ_TAG = coreTag('seq');
export const MAP_TAG = coreTag('map');
export const MERGE_TAG = coreTag('merge');
export const BINARY_TAG = coreTag('binary');
export const TIMESTAMP_TAG = coreTag('timestamp');
export const SET_TAG = coreTag('set');
export const OMAP_TAG = coreTag('omap');
export const PAIRS_TAG = coreTag('pairs');

/** The tag each value type carries when none is written. */
export const DEFAULT_TAGS: Readonly<Record<Value['type'], string>> = Object.freeze({
  null: coreTag('null'),
  bool: coreTag('bool'),
  int: coreTag('int'),
  float: coreTag('float'),
  string: STR_TAG,
  sequence: SEQ_TAG,
  mapping: MAP_TAG,
});

/**
 * Expand a tag as written in the source (`!!str`, `!e!x`, `!local`, `!<uri>`)
 * against the document's `%TAG` handles.
 */
export function resolveTagUri(tag: string, handles: Readonly<Record<string, string>>): string {
  if (tag.startsWith('!<') && tag.endsWith('>')) return tag.slice(2, -1);
  const close = tag.indexOf('!', 1);
  const handle = close === -1 ? '!' : tag.slice(0, close + 1);
  const suffix = tag.slice(handle.length);
  const prefix = handles[handle];
  if (prefix !== undefined) return prefix + suffix;
  if (handle === '!!') return CORE_TAG_PREFIX + suffix;
  return tag;
}

/**
 * Shorten a tag URI for output: core tags become `!!name`, tags under a
 * declared prefix use its handle, local tags stay as they are, and anything
 * else is written verbatim as `!<uri>`.
 */
export function shortenTag(uri: string, handles: Readonly<Record<string, string>> = {}): string {
  let best: { handle: string; prefix: string } | null = null;
  for (const [handle, prefix] of Object.entries(handles)) {
    if (uri.startsWith(prefix) && uri.length > prefix.length && (!best || prefix.length > best.prefix.length)) {
      best = { handle, prefix };
    }
  }
  if (best) return best.handle + uri.slice(best.prefix.length);
  if (uri.startsWith(CORE_TAG_PREFIX) && uri.length > CORE_TAG_PREFIX.length) {
    return `!!${uri.slice(CORE_TAG_PREFIX.length)}`;
  }
  if (uri.startsWith('!')) return uri;
  return `!<${uri}>`;
}

// ---------------------------------------------------------------------------
// Built-in constructors
// ---------------------------------------------------------------------------

function scalarText(node: Value): string {
  return node.type === 'string' ? node.value : '';
}

function literal(parse: (text: string) => Value | null, what: string): TagDefinition {
  return {
    kind: 'scalar',
    construct(node, context) {
      const text = scalarText(node);
      const value = parse(text);
      if (!value) throw context.invalid(`"${text}" is not a valid ${what}`);
      return value;
    },
  };
}

const BASE64_PATTERN = /^[A-Za-z0-9+/]*={0,2}$/;

function decodeBinary(node: Value, context: TagContext): Value {
  const compact = scalarText(node).replace(/\s+/g, '');
  if (compact.length % 4 !== 0 || !BASE64_PATTERN.test(compact)) {
    throw context.invalid('binary value is not valid base64');
  }
  const bytes = Buffer.from(compact, 'base64');
  try {
    return stringValue(new TextDecoder('utf-8', { fatal: true }).decode(bytes));
  } catch {
    // Not text: keep the encoded form and remember it was binary.
    return { type: 'string', value: compact, tag: BINARY_TAG };
  }
}

const TIMESTAMP_PATTERN =
  /^\d{4}-\d{1,2}-\d{1,2}(?:(?:[Tt]|[ \t]+)\d{1,2}:\d{2}:\d{2}(?:\.\d*)?(?:[ \t]*(?:Z|[-+]\d{1,2}(?::?\d{2})?))?)?$/;

function constructTimestamp(node: Value, context: TagContext): Value {
  const text = scalarText(node);
  if (!TIMESTAMP_PATTERN.test(text)) {
    throw context.invalid(`"${text}" is not a valid timestamp`);
  }
  return { type: 'string', value: text, tag: TIMESTAMP_TAG };
}

function expectPairs(node: Value, context: TagContext, unique: boolean): Value {
  if (node.type !== 'sequence') throw context.invalid('expected a sequence of single-pair mappings');
  const keys = new Set<string>();
  for (const item of node.items) {
    if (item.type !== 'mapping' || item.entries.length !== 1) {
      throw context.invalid('expected a sequence of single-pair mappings');
    }
    if (unique) {
      const key = canonicalKey(item.entries[0].key);
      if (keys.has(key)) throw context.invalid('ordered map keys must be unique');
      keys.add(key);
    }
  }
  return { ...node, tag: context.tag };
}

const BUILTIN_TAGS: ReadonlyMap<string, TagDefinition> = new Map<string, TagDefinition>([
  [STR_TAG, { kind: 'scalar', construct: (node) => stringValue(scalarText(node)) }],
  [coreTag('null'), literal((text) => parseNullLiteral(text), 'null')],
  [coreTag('bool'), literal((text) => parseBoolLiteral(text), 'boolean')],
  [coreTag('int'), literal((text) => parseIntLiteral(text), 'integer')],
  [
    coreTag('float'),
    literal((text) => {
      const value = parseFloatLiteral(text) ?? parseIntLiteral(text);
      return value && (value.type === 'int' || value.type === 'float') ? floatValue(Number(value.value)) : null;
    }, 'float'),
  ],
  [MERGE_TAG, { kind: 'scalar', construct: (node) => stringValue(scalarText(node)) }],
  [BINARY_TAG, { kind: 'scalar', construct: decodeBinary }],
  [TIMESTAMP_TAG, { kind: 'scalar', construct: constructTimestamp }],
  [SEQ_TAG, { kind: 'sequence', construct: (node) => node }],
  [MAP_TAG, { kind: 'mapping', construct: (node) => node }],
  [
    SET_TAG,
    {
      kind: 'mapping',
      construct(node, context) {
        if (node.type !== 'mapping' || node.entries.some((entry) => entry.value.type !== 'null')) {
          throw context.invalid('set entries must have null values');
        }
        return { ...node, tag: SET_TAG };
      },
    },
  ],
  [OMAP_TAG, { kind: 'sequence', construct: (node, context) => expectPairs(node, context, true) }],
  [PAIRS_TAG, { kind: 'sequence', construct: (node, context) => expectPairs(node, context, false) }],
]);

const BASE_LOADER_TAGS: ReadonlySet<string> = new Set([STR_TAG, SEQ_TAG, MAP_TAG]);

/**
 * Find the constructor for `uri` among those the loader activates, or
 * undefined when the tag is unknown to this load.
 */
export function findTagDefinition(
  uri: string,
  loader: LoaderType,
  registry?: TagRegistry,
): TagDefinition | undefined {
  if (loader === 'base') return BASE_LOADER_TAGS.has(uri) ? BUILTIN_TAGS.get(uri) : undefined;
  if (loader === 'full') {
    const custom = registry?.get(uri);
    if (custom) return custom;
  }
  return BUILTIN_TAGS.get(uri);
}
