/**
 * A location in the source text.
 *
 * `line` and `column` are one-based and count characters; `offset` is the
 * zero-based UTF-8 byte offset.
 */
export interface Position {
  readonly line: number;
  readonly column: number;
  readonly offset: number;
}

export const START_POSITION: Position = Object.freeze({ line: 1, column: 1, offset: 0 });

export function makePosition(line: number, column: number, offset: number): Position {
  return { line, column, offset };
}

/**
 * Shift a position found in a slice of a larger input so it points into the
 * larger input. `base` is where the slice starts.
 */
export function rebasePosition(position: Position, base: Position): Position {
  return {
    line: position.line + base.line - 1,
    column: position.line === 1 ? position.column + base.column - 1 : position.column,
    offset: position.offset + base.offset,
  };
}

/** Inverse of {@link rebasePosition}. */
export function unbasePosition(position: Position, base: Position): Position {
  const line = position.line - base.line + 1;
  return {
    line,
    column: line === 1 ? position.column - base.column + 1 : position.column,
    offset: position.offset - base.offset,
  };
}

/**
 * Render the source line at `position` with a caret under the offending column.
 *
 * ```
 *   3 | key: "unterminated
 *     |      ^
 * ```
 */
export function formatErrorContext(source: string, position: Position): string {
  const lines = source.split(/\r\n|\r|\n/);
  const index = position.line - 1;
  const content = index >= 0 && index < lines.length ? lines[index] : '<EOF>';
  const gutter = String(position.line);
  const pad = ' '.repeat(gutter.length);
  const caretColumn = Math.max(0, Math.min(position.column - 1, content.length));
  // Keep tabs in the caret line so it stays aligned with the source line.
  const lead = content.slice(0, caretColumn).replace(/[^\t]/g, ' ');
  return `${gutter} | ${content}\n${pad} | ${lead}^`;
}
