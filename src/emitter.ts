import { isPrintable } from './chars';
import {
  AUTO_FLOW_MAX_ITEMS,
  DEFAULT_ANCHOR_PREFIX,
  DEFAULT_INDENT,
  MAX_SIMPLE_KEY_LENGTH,
  TERMINAL_WIDTH,
} from './constants';
import { EmitError } from './errors';
import type { ScalarStyle } from './events';
import { CORE_PROFILE, resolvePlainScalar } from './schemas';
import { DEFAULT_TAGS, shortenTag } from './tags';
import { canonicalKey, formatFloat, isCollection, type MappingEntry, type Value } from './value';

export type FlowStyle = 'block' | 'flow' | 'auto';

/**
 * Options for {@link dump}, {@link dumpAll} and {@link dumpTo}.
 */
export interface DumpOptions {
  /**
   * Spaces per nesting level.
   *
   * @default 2
   */
  indent?: number;

  /**
   * Preferred maximum line length, used to decide auto flow style and to wrap
   * folded scalars.
   *
   * @default 80
   */
  lineWidth?: number;

  /**
   * `block` never uses `[...]`/`{...}` except for empty collections, `flow`
   * writes every collection inline, and `auto` writes short sequences of
   * scalars inline.
   *
   * @default 'auto'
   */
  flowStyle?: FlowStyle;

  /**
   * Keep mapping entries in insertion order. When `false`, entries are sorted
   * by key.
   *
   * @default true
   */
  preserveOrder?: boolean;

  /**
   * Honor the scalar style and flow hints recorded by `captureStyle`.
   *
   * @default false
   */
  preserveStyle?: boolean;

  /** Start every document with `---`. @default false */
  explicitStart?: boolean;

  /** End every document with `...`. @default false */
  explicitEnd?: boolean;

  /**
   * Emit a `%YAML` directive: `true` for `1.2`, or a version string.
   *
   * @default false
   */
  version?: boolean | string;

  /**
   * `%TAG` directives to emit, handle → prefix. Tags under a prefix are
   * written with its handle.
   */
  tagDirectives?: Readonly<Record<string, string>>;

  /**
   * Prefix for generated anchor names (`anchor1`, `anchor2`, ...). Anchor
   * names recorded on values are reused when they do not collide.
   *
   * @default 'anchor'
   */
  anchorPrefix?: string;
}

/** A destination for emitted text, such as a Node.js writable stream. */
export interface EmitSink {
  write(chunk: string): unknown;
}

type ResolvedDumpOptions = Required<Omit<DumpOptions, 'version'>> & { version: string | null };

type NodeContext = 'root' | 'compact' | 'mapping' | 'key';

const INDICATORS = new Set([...'-?:,[]{}#&*!|>\'"%@`']);
const FLOW_INDICATORS = /[,[\]{}]/;

function resolveOptions(options: DumpOptions): ResolvedDumpOptions {
  const version = options.version === true ? '1.2' : typeof options.version === 'string' ? options.version : null;
  return {
    indent: Math.max(1, Math.min(9, options.indent ?? DEFAULT_INDENT)),
    lineWidth: options.lineWidth ?? TERMINAL_WIDTH,
    flowStyle: options.flowStyle ?? 'auto',
    preserveOrder: options.preserveOrder ?? true,
    preserveStyle: options.preserveStyle ?? false,
    explicitStart: options.explicitStart ?? false,
    explicitEnd: options.explicitEnd ?? false,
    version,
    tagDirectives: options.tagDirectives ?? {},
    anchorPrefix: options.anchorPrefix ?? DEFAULT_ANCHOR_PREFIX,
  };
}

// ---------------------------------------------------------------------------
// Scalar text
// ---------------------------------------------------------------------------

function isPlainSafe(text: string, inFlow: boolean): boolean {
  if (text === '' || text.trim() !== text) return false;
  // A plain "<<" would load back as a merge key.
  if (text === '<<') return false;
  if (resolvePlainScalar(text, CORE_PROFILE).type !== 'string') return false;
  const first = text[0];
  if (INDICATORS.has(first)) {
    // "-x", "?x" and ":x" are plain in block context; in flow only "-x" is.
    const next = text[1] ?? ' ';
    if (!(inFlow ? first === '-' : '-?:'.includes(first)) || next === ' ') return false;
  }
  if (text.startsWith('---') || text.startsWith('...')) return false;
  if (text.includes(': ') || text.includes(' #') || text.endsWith(':')) return false;
  if (inFlow && FLOW_INDICATORS.test(text)) return false;
  for (const ch of text) {
    if (ch === '\t' || !isPrintable(ch) || ch === '\n') return false;
  }
  return true;
}

const DOUBLE_QUOTE_ESCAPES: Readonly<Record<string, string>> = {
  '\0': '\\0',
  '\x07': '\\a',
  '\b': '\\b',
  '\t': '\\t',
  '\n': '\\n',
  '\v': '\\v',
  '\f': '\\f',
  '\r': '\\r',
  '\x1b': '\\e',
  '"': '\\"',
  '\\': '\\\\',
  '\x85': '\\N',
  '\u2028': '\\L',
  '\u2029': '\\P',
};

function doubleQuoted(text: string): string {
  let out = '"';
  for (const ch of text) {
    const escape = DOUBLE_QUOTE_ESCAPES[ch];
    if (escape !== undefined) {
      out += escape;
    } else if (isPrintable(ch)) {
      out += ch;
    } else {
      const code = ch.codePointAt(0) ?? 0;
      out += code <= 0xff ? `\\x${code.toString(16).toUpperCase().padStart(2, '0')}` : `\\u${code.toString(16).toUpperCase().padStart(4, '0')}`;
    }
  }
  return `${out}"`;
}

function canSingleQuote(text: string): boolean {
  for (const ch of text) {
    if (ch === '\n' || ch === '\t' || !isPrintable(ch)) return false;
  }
  return true;
}

function singleQuoted(text: string): string {
  return `'${text.replace(/'/g, "''")}'`;
}

function countTrailingNewlines(text: string): number {
  let count = 0;
  while (count < text.length && text[text.length - 1 - count] === '\n') count++;
  return count;
}

function canBlockScalar(text: string): boolean {
  if (!text.includes('\n')) return false;
  const body = text.slice(0, text.length - countTrailingNewlines(text));
  if (body === '') return false;
  for (const ch of text) {
    if (ch !== '\t' && ch !== '\n' && !isPrintable(ch)) return false;
  }
  return true;
}

function canFold(text: string): boolean {
  if (!canBlockScalar(text) || text.startsWith('\n')) return false;
  return text.split('\n').every((line) => line === '' || (line[0] !== ' ' && line[0] !== '\t'));
}

// Split a long line at single spaces so each piece fits `width` where possible.
function wrapLine(line: string, width: number): string[] {
  if (line.length <= width) return [line];
  const pieces: string[] = [];
  let rest = line;
  while (rest.length > width) {
    let cut = -1;
    for (let i = width; i > 0; i--) {
      if (rest[i] === ' ' && rest[i - 1] !== ' ' && rest[i + 1] !== ' ' && i + 1 < rest.length) {
        cut = i;
        break;
      }
    }
    if (cut === -1) break;
    pieces.push(rest.slice(0, cut));
    rest = rest.slice(cut + 1);
  }
  pieces.push(rest);
  return pieces;
}

// ---------------------------------------------------------------------------
// Emitter
// ---------------------------------------------------------------------------

class Emitter {
  private readonly anchorNames = new Map<Value, string>();
  private readonly written = new Set<Value>();

  constructor(private readonly options: ResolvedDumpOptions) {}

  document(root: Value, index: number): string {
    this.assignAnchors(root);
    const { version, tagDirectives } = this.options;
    let out = '';
    if (version !== null) out += `%YAML ${version}\n`;
    for (const [handle, prefix] of Object.entries(tagDirectives)) out += `%TAG ${handle} ${prefix}\n`;
    const explicit = this.options.explicitStart || out !== '' || index > 0;

    const body = this.node(root, 0, 'root');
    // The body starts with a space or a line break.
    out += explicit ? `---${body}` : body.slice(1);
    out += '\n';
    if (this.options.explicitEnd) out += '...\n';
    return out;
  }

  // Values reachable more than once get an anchor on first use.
  private assignAnchors(root: Value): void {
    const counts = new Map<Value, number>();
    const order: Value[] = [];
    const pending: Value[] = [root];
    while (pending.length > 0) {
      const value = pending.pop();
      if (value === undefined) break;
      const seen = counts.get(value);
      if (seen !== undefined) {
        counts.set(value, seen + 1);
        continue;
      }
      counts.set(value, 1);
      order.push(value);
      if (value.type === 'sequence') {
        for (let i = value.items.length - 1; i >= 0; i--) pending.push(value.items[i]);
      } else if (value.type === 'mapping') {
        for (let i = value.entries.length - 1; i >= 0; i--) {
          pending.push(value.entries[i].value, value.entries[i].key);
        }
      }
    }

    const used = new Set<string>();
    let counter = 0;
    for (const value of order) {
      if ((counts.get(value) ?? 0) < 2) continue;
      let name = value.anchor;
      if (name === undefined || used.has(name)) {
        do {
          counter++;
          name = `${this.options.anchorPrefix}${counter}`;
        } while (used.has(name));
      }
      used.add(name);
      this.anchorNames.set(value, name);
    }
  }

  private properties(value: Value): string {
    const parts: string[] = [];
    const anchor = this.anchorNames.get(value);
    if (anchor !== undefined) parts.push(`&${anchor}`);
    if (value.tag !== undefined && value.tag !== DEFAULT_TAGS[value.type]) {
      parts.push(shortenTag(value.tag, this.options.tagDirectives));
    }
    return parts.join(' ');
  }

  private alias(value: Value): string | null {
    const name = this.anchorNames.get(value);
    if (name === undefined || !this.written.has(value)) return null;
    return `*${name}`;
  }

  private useFlow(value: Value, context: NodeContext): boolean {
    if (value.type === 'sequence' && value.items.length === 0) return true;
    if (value.type === 'mapping' && value.entries.length === 0) return true;
    const { flowStyle, preserveStyle, lineWidth } = this.options;
    if (flowStyle === 'flow') return true;
    if (flowStyle === 'block') return false;
    if (preserveStyle && (value.type === 'sequence' || value.type === 'mapping') && value.flow !== undefined) {
      return value.flow;
    }
    if (value.type !== 'sequence' || context === 'root' || value.items.length > AUTO_FLOW_MAX_ITEMS) return false;
    for (const item of value.items) {
      if (isCollection(item) || this.anchorNames.has(item) || this.properties(item) !== '') return false;
      if (item.type === 'string' && item.value.includes('\n')) return false;
    }
    return this.flowText(value).length <= lineWidth;
  }

  /** Text after the node's indicator: either `" inline"` or `"\n"` plus indented lines. */
  private node(value: Value, indent: number, context: NodeContext): string {
    const alias = this.alias(value);
    if (alias !== null) return ` ${alias}`;
    const props = this.properties(value);
    this.written.add(value);
    const lead = props === '' ? ' ' : ` ${props} `;

    if (!isCollection(value)) {
      return this.scalar(value, indent, context, lead);
    }
    if (this.useFlow(value, context)) {
      return lead + this.flowCollection(value);
    }

    const childIndent = context === 'root' ? 0 : indent + this.options.indent;
    const lines =
      value.type === 'sequence' ? this.blockSequence(value.items, childIndent) : this.blockMapping(value.entries, childIndent);
    if (context === 'compact' && props === '') {
      // "- a: 1" with the rest of the block aligned under the first entry.
      return ' '.repeat(this.options.indent - 1) + lines.slice(childIndent);
    }
    return (props === '' ? '' : ` ${props}`) + `\n${lines}`;
  }

  private blockSequence(items: readonly Value[], indent: number): string {
    const pad = ' '.repeat(indent);
    return items.map((item) => `${pad}-${this.node(item, indent, 'compact')}`).join('\n');
  }

  private sortedEntries(entries: readonly MappingEntry[]): readonly MappingEntry[] {
    if (this.options.preserveOrder) return entries;
    const sortText = (key: Value): string => (key.type === 'string' ? key.value : canonicalKey(key));
    return [...entries].sort((a, b) => {
      const left = sortText(a.key);
      const right = sortText(b.key);
      return left < right ? -1 : left > right ? 1 : 0;
    });
  }

  private blockMapping(entries: readonly MappingEntry[], indent: number): string {
    const pad = ' '.repeat(indent);
    return this.sortedEntries(entries)
      .map((entry) => {
        const key = this.simpleKey(entry.key);
        if (key !== null) return `${pad}${key}:${this.node(entry.value, indent, 'mapping')}`;
        return `${pad}?${this.node(entry.key, indent, 'compact')}\n${pad}:${this.node(entry.value, indent, 'compact')}`;
      })
      .join('\n');
  }

  // Single-line key text, or null when the key needs the explicit "? " form.
  private simpleKey(key: Value): string | null {
    if (isCollection(key) && !this.alias(key) && !this.useFlow(key, 'key')) return null;
    // Rendering marks nodes as written, so undo that if the key is rejected.
    const snapshot = this.anchorNames.size > 0 ? new Set(this.written) : null;
    const text = this.node(key, 0, 'key').slice(1);
    if (text.includes('\n') || text.length > MAX_SIMPLE_KEY_LENGTH) {
      if (snapshot) {
        this.written.clear();
        for (const value of snapshot) this.written.add(value);
      }
      return null;
    }
    // Alias names may contain ":", so keep a space before the indicator.
    return text.startsWith('*') ? `${text} ` : text;
  }

  private scalar(value: Value, indent: number, context: NodeContext, lead: string): string {
    switch (value.type) {
      case 'null':
        return `${lead}null`;
      case 'bool':
        return `${lead}${value.value}`;
      case 'int':
        return `${lead}${value.value}`;
      case 'float':
        return `${lead}${formatFloat(value.value)}`;
      case 'string':
        return lead + this.stringText(value.value, value.style, indent, context);
      default:
        return lead + this.flowText(value);
    }
  }

  private stringText(text: string, hint: ScalarStyle | undefined, indent: number, context: NodeContext): string {
    const block = context !== 'key';
    const style = this.options.preserveStyle ? hint : undefined;
    if (style === 'folded' && block && canFold(text)) return this.blockScalar(text, indent, true);
    if ((style === 'literal' || style === 'folded') && block && canBlockScalar(text)) {
      return this.blockScalar(text, indent, false);
    }
    if (style === 'single' && canSingleQuote(text)) return singleQuoted(text);
    if (style === 'double') return doubleQuoted(text);
    if (isPlainSafe(text, false)) return text;
    if (block && canBlockScalar(text)) return this.blockScalar(text, indent, false);
    return canSingleQuote(text) ? singleQuoted(text) : doubleQuoted(text);
  }

  private blockScalar(text: string, indent: number, folded: boolean): string {
    const step = this.options.indent;
    const trailing = countTrailingNewlines(text);
    const chomp = trailing === 0 ? '-' : trailing === 1 ? '' : '+';
    const indicator = text.startsWith(' ') || text.startsWith('\n') ? String(step) : '';
    const bodyLines = text.slice(0, text.length - trailing).split('\n');

    let lines: string[];
    if (folded) {
      const width = Math.max(20, this.options.lineWidth - indent - step);
      lines = [];
      bodyLines.forEach((line, i) => {
        lines.push(...wrapLine(line, width));
        // A single break folds to a space, so a kept newline needs an empty line.
        if (line !== '' && i < bodyLines.length - 1) lines.push('');
      });
    } else {
      lines = bodyLines;
    }
    for (let i = 1; i < trailing; i++) lines.push('');

    const pad = ' '.repeat(indent + step);
    const content = lines.map((line) => (line === '' ? '' : pad + line)).join('\n');
    return `${folded ? '>' : '|'}${indicator}${chomp}\n${content}`;
  }

  // -------------------------------------------------------------------------
  // Flow style
  // -------------------------------------------------------------------------

  private flowCollection(value: Value): string {
    if (value.type === 'sequence') {
      return `[${value.items.map((item) => this.flowNode(item)).join(', ')}]`;
    }
    if (value.type === 'mapping') {
      return `{${this.sortedEntries(value.entries)
        .map((entry) => {
          const key = this.flowNode(entry.key);
          return `${key.startsWith('*') ? `${key} ` : key}: ${this.flowNode(entry.value)}`;
        })
        .join(', ')}}`;
    }
    return this.flowNode(value);
  }

  private flowNode(value: Value): string {
    const alias = this.alias(value);
    if (alias !== null) return alias;
    const props = this.properties(value);
    this.written.add(value);
    return (props === '' ? '' : `${props} `) + this.flowText(value);
  }

  private flowText(value: Value): string {
    switch (value.type) {
      case 'null':
        return 'null';
      case 'bool':
      case 'int':
        return String(value.value);
      case 'float':
        return formatFloat(value.value);
      case 'string':
        if (isPlainSafe(value.value, true)) return value.value;
        return canSingleQuote(value.value) ? singleQuoted(value.value) : doubleQuoted(value.value);
      case 'sequence':
      case 'mapping':
        return this.flowCollection(value);
    }
  }
}

/**
 * Serialize one value as a YAML document.
 *
 * @example
 * dump(fromJS({ name: 'demo', tags: ['a', 'b'] }));
 * // name: demo
 * // tags: [a, b]
 */
export function dump(value: Value, options: DumpOptions = {}): string {
  return new Emitter(resolveOptions(options)).document(value, 0);
}

/**
 * Serialize several values as a multi-document stream. Every document after the
 * first starts with `---`.
 */
export function dumpAll(values: readonly Value[], options: DumpOptions = {}): string {
  const resolved = resolveOptions(options);
  return values.map((value, index) => new Emitter(resolved).document(value, index)).join('');
}

/**
 * Serialize values into `sink`, one `write` call per document.
 *
 * @throws {EmitError} When the sink throws.
 */
export function dumpTo(values: Value | readonly Value[], sink: EmitSink, options: DumpOptions = {}): void {
  const resolved = resolveOptions(options);
  const list: readonly Value[] = 'type' in values ? [values] : values;
  list.forEach((value, index) => {
    const text = new Emitter(resolved).document(value, index);
    try {
      sink.write(text);
    } catch (err) {
      throw new EmitError(`Failed to write document ${index + 1}: ${err instanceof Error ? err.message : String(err)}`, {
        cause: err,
      });
    }
  });
}
