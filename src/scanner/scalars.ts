import { EOF, isBlank, isBlankOrEnd, isBreak, isBreakOrEnd, isDigit, isFlowIndicator, isHexDigit } from '../chars';
import type { ScanError } from '../errors';
import type { ScalarStyle } from '../events';
import type { Position } from '../position';

export interface ScalarScanContext {
  ch(offset?: number): string;
  prefix(length: number): string;
  forward(length?: number): void;
  mark(): Position;
  column(): number;
  indent(): number;
  flowLevel(): number;
  setAllowSimpleKey(allow: boolean): void;
  scanLineBreak(): string;
  error(reason: string, position: Position, suggestion?: string): ScanError;
  checkStringLength(length: number, position: Position): void;
}

export interface ScannedScalar {
  value: string;
  style: ScalarStyle;
  start: Position;
  end: Position;
}

// Accumulates scalar text and enforces the string-length ceiling as it grows,
// so an oversized scalar fails before it is fully materialized.
class ChunkBuffer {
  private readonly chunks: string[] = [];
  private length = 0;

  constructor(
    private readonly ctx: ScalarScanContext,
    private readonly start: Position,
  ) {}

  push(...parts: string[]): void {
    for (const part of parts) {
      if (!part) continue;
      this.ctx.checkStringLength(this.length + part.length, this.start);
      this.chunks.push(part);
      this.length += part.length;
    }
  }

  /** Append the next `length` input characters, checked before they are sliced. */
  pushInput(length: number): void {
    this.ctx.checkStringLength(this.length + length, this.start);
    this.push(this.ctx.prefix(length));
  }

  toString(): string {
    return this.chunks.join('');
  }
}

const ESCAPE_REPLACEMENTS: Readonly<Record<string, string>> = {
  '0': '\0',
  a: '\x07',
  b: '\x08',
  t: '\t',
  '\t': '\t',
  n: '\n',
  v: '\x0b',
  f: '\x0c',
  r: '\r',
  e: '\x1b',
  ' ': ' ',
  '"': '"',
  '/': '/',
  '\\': '\\',
  N: '\x85',
  _: '\xa0',
  L: '\u2028',
  P: '\u2029',
};

const ESCAPE_CODES: Readonly<Record<string, number>> = {
  x: 2,
  u: 4,
  U: 8,
};

function isDocumentMarkerAhead(ctx: ScalarScanContext): boolean {
  if (ctx.column() !== 0) return false;
  const marker = ctx.prefix(3);
  return (marker === '---' || marker === '...') && isBlankOrEnd(ctx.ch(3));
}

// ---------------------------------------------------------------------------
// Block scalars: `|` and `>` with chomping and indentation indicators.
// ---------------------------------------------------------------------------

type Chomping = 'clip' | 'strip' | 'keep';

function scanBlockScalarIndicators(ctx: ScalarScanContext): { chomping: Chomping; increment: number | null } {
  let chomping: Chomping = 'clip';
  let increment: number | null = null;
  let ch = ctx.ch();

  const readIncrement = (): void => {
    const digit = ctx.ch();
    if (digit === '0') {
      throw ctx.error('expected indentation indicator in the range 1-9, but found 0', ctx.mark());
    }
    increment = Number(digit);
    ctx.forward();
  };

  if (ch === '+' || ch === '-') {
    chomping = ch === '+' ? 'keep' : 'strip';
    ctx.forward();
    if (isDigit(ctx.ch())) readIncrement();
  } else if (isDigit(ch)) {
    readIncrement();
    ch = ctx.ch();
    if (ch === '+' || ch === '-') {
      chomping = ch === '+' ? 'keep' : 'strip';
      ctx.forward();
    }
  }

  if (!isBlankOrEnd(ctx.ch())) {
    throw ctx.error(
      `expected chomping or indentation indicators, but found "${ctx.ch()}"`,
      ctx.mark(),
      'block scalar headers look like "|", "|-", ">+" or "|2"',
    );
  }
  return { chomping, increment };
}

function scanBlockScalarIgnoredLine(ctx: ScalarScanContext): void {
  while (isBlank(ctx.ch())) ctx.forward();
  if (ctx.ch() === '#') {
    while (!isBreakOrEnd(ctx.ch())) ctx.forward();
  }
  if (!isBreakOrEnd(ctx.ch())) {
    throw ctx.error(`expected a comment or a line break, but found "${ctx.ch()}"`, ctx.mark());
  }
  ctx.scanLineBreak();
}

function scanBlockScalarIndentation(ctx: ScalarScanContext): { breaks: string[]; maxIndent: number; end: Position } {
  const breaks: string[] = [];
  let maxIndent = 0;
  let end = ctx.mark();
  while (ctx.ch() === ' ' || isBreak(ctx.ch())) {
    if (ctx.ch() !== ' ') {
      breaks.push(ctx.scanLineBreak());
      end = ctx.mark();
    } else {
      ctx.forward();
      if (ctx.column() > maxIndent) maxIndent = ctx.column();
    }
  }
  return { breaks, maxIndent, end };
}

function scanBlockScalarBreaks(ctx: ScalarScanContext, indent: number): { breaks: string[]; end: Position } {
  const breaks: string[] = [];
  let end = ctx.mark();
  while (ctx.column() < indent && ctx.ch() === ' ') ctx.forward();
  while (isBreak(ctx.ch())) {
    breaks.push(ctx.scanLineBreak());
    end = ctx.mark();
    while (ctx.column() < indent && ctx.ch() === ' ') ctx.forward();
  }
  return { breaks, end };
}

export function scanBlockScalar(ctx: ScalarScanContext, style: 'literal' | 'folded'): ScannedScalar {
  const folded = style === 'folded';
  const start = ctx.mark();
  const text = new ChunkBuffer(ctx, start);
  ctx.forward();
  const { chomping, increment } = scanBlockScalarIndicators(ctx);
  scanBlockScalarIgnoredLine(ctx);

  const minIndent = Math.max(ctx.indent() + 1, 1);
  let indent: number;
  let breaks: string[];
  let end: Position;
  if (increment === null) {
    const detected = scanBlockScalarIndentation(ctx);
    breaks = detected.breaks;
    end = detected.end;
    indent = Math.max(minIndent, detected.maxIndent);
  } else {
    indent = minIndent + increment - 1;
    ({ breaks, end } = scanBlockScalarBreaks(ctx, indent));
  }

  let lineBreak = '';
  while (ctx.column() === indent && ctx.ch() !== EOF) {
    text.push(...breaks);
    const leadingNonSpace = !isBlank(ctx.ch());
    let length = 0;
    while (!isBreakOrEnd(ctx.ch(length))) length++;
    text.pushInput(length);
    ctx.forward(length);
    end = ctx.mark();
    lineBreak = ctx.scanLineBreak();
    ({ breaks, end } = scanBlockScalarBreaks(ctx, indent));
    if (ctx.column() === indent && ctx.ch() !== EOF) {
      if (folded && lineBreak === '\n' && leadingNonSpace && !isBlank(ctx.ch())) {
        if (breaks.length === 0) text.push(' ');
      } else {
        text.push(lineBreak);
      }
    } else {
      break;
    }
  }

  if (chomping !== 'strip') text.push(lineBreak);
  if (chomping === 'keep') text.push(...breaks);
  return { value: text.toString(), style, start, end };
}

// ---------------------------------------------------------------------------
// Flow scalars: single- and double-quoted.
// ---------------------------------------------------------------------------

function scanFlowScalarNonSpaces(ctx: ScalarScanContext, double: boolean, text: ChunkBuffer): void {
  for (;;) {
    let length = 0;
    for (;;) {
      const ch = ctx.ch(length);
      if (ch === "'" || ch === '"' || ch === '\\' || isBlankOrEnd(ch)) break;
      length++;
    }
    if (length > 0) {
      text.pushInput(length);
      ctx.forward(length);
    }

    const ch = ctx.ch();
    if (!double && ch === "'" && ctx.ch(1) === "'") {
      text.push("'");
      ctx.forward(2);
    } else if ((double && ch === "'") || (!double && (ch === '"' || ch === '\\'))) {
      text.push(ch);
      ctx.forward();
    } else if (double && ch === '\\') {
      const escapeStart = ctx.mark();
      ctx.forward();
      const code = ctx.ch();
      const replacement = ESCAPE_REPLACEMENTS[code];
      const digits = ESCAPE_CODES[code];
      if (replacement !== undefined) {
        text.push(replacement);
        ctx.forward();
      } else if (digits !== undefined) {
        ctx.forward();
        for (let k = 0; k < digits; k++) {
          if (!isHexDigit(ctx.ch(k))) {
            throw ctx.error(
              `expected escape sequence of ${digits} hexadecimal numbers, but found "${ctx.ch(k)}"`,
              escapeStart,
            );
          }
        }
        const codePoint = parseInt(ctx.prefix(digits), 16);
        if (codePoint > 0x10ffff) {
          throw ctx.error(`escape sequence \\${code}${ctx.prefix(digits)} is not a valid code point`, escapeStart);
        }
        text.push(String.fromCodePoint(codePoint));
        ctx.forward(digits);
      } else if (isBreak(code)) {
        ctx.scanLineBreak();
        scanFlowScalarBreaks(ctx, text);
      } else {
        throw ctx.error(`found unknown escape character "${code}"`, escapeStart, 'escape a literal backslash as "\\\\"');
      }
    } else {
      return;
    }
  }
}

function scanFlowScalarSpaces(ctx: ScalarScanContext, start: Position, text: ChunkBuffer): void {
  let length = 0;
  while (isBlank(ctx.ch(length))) length++;
  const whitespaces = ctx.prefix(length);
  ctx.forward(length);
  const ch = ctx.ch();
  if (ch === EOF) {
    throw ctx.error('found unexpected end of stream while scanning a quoted scalar', start, 'close the quoted scalar');
  }
  if (isBreak(ch)) {
    const lineBreak = ctx.scanLineBreak();
    const breaks = new ChunkBuffer(ctx, start);
    const count = scanFlowScalarBreaks(ctx, breaks);
    if (lineBreak !== '\n') {
      text.push(lineBreak);
    } else if (count === 0) {
      text.push(' ');
    }
    text.push(breaks.toString());
  } else {
    text.push(whitespaces);
  }
}

function scanFlowScalarBreaks(ctx: ScalarScanContext, text: ChunkBuffer): number {
  let count = 0;
  for (;;) {
    if (isDocumentMarkerAhead(ctx)) {
      throw ctx.error('found unexpected document separator while scanning a quoted scalar', ctx.mark());
    }
    while (isBlank(ctx.ch())) ctx.forward();
    if (!isBreak(ctx.ch())) return count;
    text.push(ctx.scanLineBreak());
    count++;
  }
}

export function scanFlowScalar(ctx: ScalarScanContext, style: 'single' | 'double'): ScannedScalar {
  const double = style === 'double';
  const start = ctx.mark();
  const text = new ChunkBuffer(ctx, start);
  const quote = ctx.ch();
  ctx.forward();
  scanFlowScalarNonSpaces(ctx, double, text);
  while (ctx.ch() !== quote) {
    scanFlowScalarSpaces(ctx, start, text);
    scanFlowScalarNonSpaces(ctx, double, text);
  }
  ctx.forward();
  return { value: text.toString(), style, start, end: ctx.mark() };
}

// ---------------------------------------------------------------------------
// Plain scalars.
// ---------------------------------------------------------------------------

function scanPlainSpaces(ctx: ScalarScanContext): string[] | null {
  const chunks: string[] = [];
  let length = 0;
  while (isBlank(ctx.ch(length))) length++;
  const whitespaces = ctx.prefix(length);
  ctx.forward(length);
  if (isBreak(ctx.ch())) {
    const lineBreak = ctx.scanLineBreak();
    ctx.setAllowSimpleKey(true);
    if (isDocumentMarkerAhead(ctx)) return null;
    const breaks: string[] = [];
    while (ctx.ch() === ' ' || isBreak(ctx.ch())) {
      if (ctx.ch() === ' ') {
        ctx.forward();
      } else {
        breaks.push(ctx.scanLineBreak());
        if (isDocumentMarkerAhead(ctx)) return null;
      }
    }
    if (lineBreak !== '\n') {
      chunks.push(lineBreak);
    } else if (breaks.length === 0) {
      chunks.push(' ');
    }
    chunks.push(...breaks);
  } else if (whitespaces) {
    chunks.push(whitespaces);
  }
  return chunks;
}

function endsPlainScalar(ctx: ScalarScanContext, offset: number, inFlow: boolean): boolean {
  const ch = ctx.ch(offset);
  if (isBlankOrEnd(ch)) return true;
  if (ch === ':') {
    const next = ctx.ch(offset + 1);
    return isBlankOrEnd(next) || (inFlow && isFlowIndicator(next));
  }
  return inFlow && isFlowIndicator(ch);
}

export function scanPlain(ctx: ScalarScanContext): ScannedScalar {
  const start = ctx.mark();
  const text = new ChunkBuffer(ctx, start);
  let end = start;
  const indent = ctx.indent() + 1;
  const inFlow = ctx.flowLevel() > 0;
  let spaces: string[] = [];

  for (;;) {
    if (ctx.ch() === '#') break;
    let length = 0;
    while (!endsPlainScalar(ctx, length, inFlow)) length++;
    if (length === 0) break;
    ctx.setAllowSimpleKey(false);
    text.push(...spaces);
    text.pushInput(length);
    ctx.forward(length);
    end = ctx.mark();
    const next = scanPlainSpaces(ctx);
    if (next === null || next.length === 0 || ctx.ch() === '#') break;
    if (!inFlow && ctx.column() < indent) break;
    spaces = next;
  }
  return { value: text.toString(), style: 'plain', start, end };
}
