import type { SourceSpan } from "../diagnostics/index.js";

export interface Position {
  offset: number;
  line: number;
  column: number;
}

export const createSpan = (
  file: string,
  start: Position,
  end: Position,
): SourceSpan => ({
  file,
  start: start.offset,
  end: end.offset,
  startLine: start.line,
  startColumn: start.column,
  endLine: end.line,
  endColumn: end.column,
});

/** Span covering `first` through `last`. */
export const mergeSpans = (first: SourceSpan, last: SourceSpan): SourceSpan => {
  if (last.end < first.start) {
    return first;
  }

  return {
    file: first.file,
    start: first.start,
    end: last.end,
    startLine: first.startLine,
    startColumn: first.startColumn,
    endLine: last.endLine,
    endColumn: last.endColumn,
  };
};

/** Empty span at the top of `file`, for diagnostics about a file as a whole. */
export const fileStartSpan = (file: string): SourceSpan => {
  const origin = { offset: 0, line: 1, column: 1 };
  return createSpan(file, origin, origin);
};
