/**
 * Render a comment back to source lines at a given indentation.
 */
import type { SourceComment } from '@declsort/types';

function leadingWidth(line: string): number {
  const match = /^[ \t]*/.exec(line);
  return match ? match[0].length : 0;
}

/**
 * Every returned line starts with `indentation`, except blank lines inside
 * a free-form block which stay empty.
 *
 * JSDoc-style blocks (every continuation line starts with `*`) get their
 * stars realigned one column right of the opening slash. Other blocks keep
 * their relative indentation.
 */
export function formatCommentLines(comment: SourceComment, indentation: string): string[] {
  if (comment.kind === 'Line') {
    return [`${indentation}//${comment.text}`];
  }

  const parts = comment.text.split('\n').map((part) => part.replace(/\r$/, ''));
  if (parts.length === 1) {
    return [`${indentation}/*${comment.text}*/`];
  }

  const first = `${indentation}/*${parts[0]}`;
  const rest = parts.slice(1);
  const last = rest.length - 1;

  const starred = rest.every((line) => line.trim() === '' || line.trimStart().startsWith('*'));
  if (starred) {
    return [
      first,
      ...rest.map((line, i) => {
        if (i === last) {
          const tail = line.trimStart();
          return tail === '' ? `${indentation} */` : `${indentation} ${tail}*/`;
        }
        return `${indentation} ${line.trim()}`.trimEnd();
      }),
    ];
  }

  const body = rest.filter((line, i) => line.trim() !== '' && i !== last);
  const lastText = rest[last].trim() === '' ? '' : rest[last];
  const margin = Math.min(
    ...[...body, ...(lastText ? [lastText] : [])].map(leadingWidth),
    Number.MAX_SAFE_INTEGER
  );
  return [
    first,
    ...rest.map((line, i) => {
      if (i === last) {
        return lastText ? `${indentation}${lastText.slice(margin)}*/` : `${indentation}*/`;
      }
      return line.trim() === '' ? '' : `${indentation}${line.slice(margin)}`;
    }),
  ];
}

/**
 * Comment text for splicing into an existing line: the first line carries
 * no indentation, continuation lines carry `indentation`.
 */
export function formatCommentInline(comment: SourceComment, indentation: string): string {
  const lines = formatCommentLines(comment, indentation);
  lines[0] = lines[0].slice(indentation.length);
  return lines.join('\n');
}
