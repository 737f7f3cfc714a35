export type Position = {
  /** 1-based line number. */
  line: number;
  /** 1-based column number (UTF-16 code units). */
  column: number;
};

export function positionAt(text: string, offset: number): Position {
  const clamped = Math.max(0, Math.min(offset, text.length));
  let line = 1;
  let lineStart = 0;
  for (let i = 0; i < clamped; i++) {
    if (text.charCodeAt(i) === 10) {
      line++;
      lineStart = i + 1;
    }
  }
  return { line, column: clamped - lineStart + 1 };
}

/** Offset of the first character of the line containing `offset`. */
export function lineStartOf(text: string, offset: number): number {
  const nl = text.lastIndexOf('\n', offset - 1);
  return nl + 1;
}

/** Offset just past the newline ending the line that contains `offset` (or the text length). */
export function lineEndOf(text: string, offset: number): number {
  const nl = text.indexOf('\n', offset);
  return nl < 0 ? text.length : nl + 1;
}

/** Leading whitespace of the line containing `offset`. */
export function indentationAt(text: string, offset: number): string {
  const start = lineStartOf(text, offset);
  const m = /^[ \t]*/.exec(text.slice(start, offset));
  return m ? m[0] : '';
}

export function isBlankLine(text: string, lineStart: number): boolean {
  const end = lineEndOf(text, lineStart);
  return lineStart < text.length && text.slice(lineStart, end).trim() === '';
}
