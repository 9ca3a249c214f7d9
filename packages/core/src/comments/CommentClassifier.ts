/**
 * Comment Classifier - structural role of a comment from source text alone.
 *
 * | code before | code after | role                                   |
 * |-------------|------------|----------------------------------------|
 * | yes         | yes        | Inline                                 |
 * | yes         | no         | Trailing                               |
 * | no          | yes        | Inline                                 |
 * | no          | no         | Standalone if blank-isolated, else Leading |
 *
 * "Before" is read on the comment's first line, "after" on its last line.
 */
import type { Classification, SourceComment } from '@declsort/types';
import { LineIndex } from '../core/LineIndex.js';

const CODE_BEFORE = /[\p{L}\p{N}_$)}\];]/u;
const CODE_AFTER = /[^\s;),]/u;

export function hasCodeBefore(text: string): boolean {
  return CODE_BEFORE.test(text);
}

export function hasCodeAfter(text: string): boolean {
  return CODE_AFTER.test(text);
}

/**
 * @param lines - index over `source`; built on demand when omitted
 */
export function classifyComment(comment: SourceComment, source: string, lines = new LineIndex(source)): Classification {
  const { start, end } = comment.span;
  const firstLine = lines.lineOf(start);
  const lastLine = lines.lineOf(end);

  const before = source.slice(lines.lineStart(firstLine), start);
  const after = source.slice(end, lines.lineEnd(lastLine));

  const codeBefore = hasCodeBefore(before);
  const codeAfter = hasCodeAfter(after);

  if (codeAfter) return 'Inline';
  if (codeBefore) return 'Trailing';
  return isBlankIsolated(firstLine, lastLine, lines) ? 'Standalone' : 'Leading';
}

/**
 * Lines above and below are blank; a missing line (file edge) counts as blank.
 */
export function isBlankIsolated(firstLine: number, lastLine: number, lines: LineIndex): boolean {
  return lines.isBlank(firstLine - 1) && lines.isBlank(lastLine + 1);
}

/**
 * Classify every comment of a file, keyed by comment start offset.
 */
export function classifyComments(comments: readonly SourceComment[], source: string): Map<number, Classification> {
  const lines = new LineIndex(source);
  const result = new Map<number, Classification>();
  for (const comment of comments) {
    result.set(comment.span.start, classifyComment(comment, source, lines));
  }
  return result;
}
