import { utf8ByteLength } from './chars';
import { resolveLimits, ResourceTracker } from './limits';
import { Loader, type LoadOptions } from './load';
import { makePosition, type Position } from './position';
import type { Value } from './value';

const DOCUMENT_MARKER = /^(---|\.\.\.)(?=[ \t\r\n]|$)/;

function hasContent(line: string): boolean {
  const text = line.trim();
  return text !== '' && !text.startsWith('#') && !line.startsWith('%');
}

/**
 * Load documents from an incremental source of text or UTF-8 bytes.
 *
 * Input is buffered one document at a time: a document is composed and yielded
 * as soon as the next `---` or a closing `...` arrives, so memory stays bounded
 * by the largest document rather than the whole stream. Positions in errors
 * refer to the whole stream. Byte and time limits cover the whole stream; the
 * other counters reset per document unless `resetLimitsPerDocument` is false.
 *
 * @example
 * ```typescript
 * import { createReadStream } from 'node:fs';
 * import { loadStream } from 'yamlguard';
 *
 * for await (const doc of loadStream(createReadStream('events.yaml'))) {
 *   handle(doc);
 * }
 * ```
 */
export async function* loadStream(
  source: AsyncIterable<string | Uint8Array>,
  options: LoadOptions = {},
): AsyncGenerator<Value, void, undefined> {
  const tracker = options.tracker ?? new ResourceTracker(resolveLimits(options.limits), { clock: options.clock });
  const resetPerDocument = options.resetLimitsPerDocument ?? true;
  const decoder = new TextDecoder('utf-8');

  let pending = '';
  let segment = '';
  let segmentBase: Position = makePosition(1, 1, 0);
  let segmentBytes = 0;
  let documentStarted = false;
  let line = 1;
  let offset = 0;
  let version: string | null = options.version ?? null;
  let documents = 0;

  function* runSegment(): Generator<Value, void, undefined> {
    if (segment === '') return;
    if (documents > 0 && resetPerDocument) tracker.resetDocument();
    const loader = new Loader(segment, { ...options, tracker, base: segmentBase, version });
    segment = '';
    segmentBytes = 0;
    documentStarted = false;
    for (const value of loader) {
      documents++;
      yield value;
    }
    version = loader.version;
  }

  function* acceptLine(text: string): Generator<Value, void, undefined> {
    const marker = DOCUMENT_MARKER.exec(text)?.[1];
    if (marker === '---' && documentStarted) yield* runSegment();

    if (segment === '') segmentBase = makePosition(line, 1, offset);
    const textBytes = utf8ByteLength(text);
    segment += text;
    segmentBytes += textBytes;
    const consumed = tracker.stats().bytesConsumed;
    if (consumed + segmentBytes > tracker.limits.maxDocumentSize) {
      // Refuse to buffer past the ceiling; this charge throws.
      tracker.addBytes(segmentBytes, segmentBase);
    }
    if (marker === '---' || hasContent(text)) documentStarted = true;

    line++;
    offset += textBytes;
    if (marker === '...') yield* runSegment();
  }

  for await (const chunk of source) {
    pending += typeof chunk === 'string' ? chunk : decoder.decode(chunk, { stream: true });
    let newline = pending.indexOf('\n');
    while (newline !== -1) {
      yield* acceptLine(pending.slice(0, newline + 1));
      pending = pending.slice(newline + 1);
      newline = pending.indexOf('\n');
    }
    tracker.checkTimeout(segmentBase);
  }

  pending += decoder.decode();
  if (pending !== '') yield* acceptLine(pending);
  yield* runSegment();
}
