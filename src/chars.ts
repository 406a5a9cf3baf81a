// Character classes shared by the scanner and the emitter. `'\0'` stands for
// end of input throughout the scanner.

export const EOF = '\0';

export function isBreak(ch: string): boolean {
  return ch === '\n' || ch === '\r' || ch === '\x85' || ch === '\u2028' || ch === '\u2029';
}

export function isBreakOrEnd(ch: string): boolean {
  return ch === EOF || isBreak(ch);
}

export function isBlank(ch: string): boolean {
  return ch === ' ' || ch === '\t';
}

export function isBlankOrEnd(ch: string): boolean {
  return isBlank(ch) || isBreakOrEnd(ch);
}

export function isFlowIndicator(ch: string): boolean {
  return ch === ',' || ch === '[' || ch === ']' || ch === '{' || ch === '}';
}

function isAsciiDigitCode(code: number): boolean {
  return code >= 48 && code <= 57;
}

function isAsciiLetterCode(code: number): boolean {
  return (code >= 65 && code <= 90) || (code >= 97 && code <= 122);
}

export function isDigit(ch: string): boolean {
  return ch.length === 1 && isAsciiDigitCode(ch.charCodeAt(0));
}

export function isHexDigit(ch: string): boolean {
  if (ch.length !== 1) return false;
  const code = ch.charCodeAt(0);
  return isAsciiDigitCode(code) || (code >= 65 && code <= 70) || (code >= 97 && code <= 102);
}

/** Word characters allowed in tag handles and directive names. */
export function isWordChar(ch: string): boolean {
  if (ch.length !== 1) return false;
  const code = ch.charCodeAt(0);
  return isAsciiLetterCode(code) || isAsciiDigitCode(code) || code === 45 || code === 95;
}

const URI_PUNCTUATION = new Set([...";/?:@&=+$_.~*'()%!#"]);

export function isUriChar(ch: string): boolean {
  return isWordChar(ch) || URI_PUNCTUATION.has(ch);
}

/**
 * Characters that may not appear in a YAML stream at all: C0 controls other
 * than tab and line breaks, DEL, C1 controls other than NEL, and the two
 * non-characters U+FFFE/U+FFFF.
 */
export function isForbiddenCode(code: number): boolean {
  if (code < 0x20) return code !== 0x09 && code !== 0x0a && code !== 0x0d;
  if (code >= 0x7f && code <= 0x9f) return code !== 0x85;
  return code === 0xfffe || code === 0xffff;
}

/** Whether `ch` can be written unescaped in a double-quoted scalar. */
export function isPrintable(ch: string): boolean {
  const code = ch.charCodeAt(0);
  if (code === 0x09 || code === 0x0a) return true;
  if (code < 0x20 || code === 0x0d) return false;
  if (code >= 0x7f && code <= 0x9f) return false;
  if (code === 0x2028 || code === 0x2029 || code === 0xfeff) return false;
  return code !== 0xfffe && code !== 0xffff;
}

/** Calculate UTF-8 byte length of one UTF-16 code unit sequence position. */
export function utf8CodeUnitBytes(code: number): number {
  if (code <= 0x7f) return 1;
  if (code <= 0x7ff) return 2;
  // A high surrogate stands for the whole 4-byte code point; its low half adds nothing.
  if (code >= 0xd800 && code <= 0xdbff) return 4;
  if (code >= 0xdc00 && code <= 0xdfff) return 0;
  return 3;
}

/** Calculate UTF-8 byte length without allocating an encoded copy. */
export function utf8ByteLength(s: string): number {
  let bytes = 0;
  for (let i = 0; i < s.length; i++) {
    bytes += utf8CodeUnitBytes(s.charCodeAt(i));
  }
  return bytes;
}

export function isLineStartOrIndented(input: string, pos: number): boolean {
  let i = pos - 1;
  while (i >= 0) {
    const ch = input[i];
    if (ch === '\n' || ch === '\r') return true;
    if (ch !== ' ' && ch !== '\t') return false;
    i--;
  }
  return true;
}
