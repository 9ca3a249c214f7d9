/**
 * Comment Reinserter - splices extracted comments back into the skeleton.
 *
 * All insertion points are computed against the untouched skeleton and
 * applied bottom-up (line desc, column desc), so no splice shifts the
 * coordinates of one still pending. Standalone comments pinned to a sibling
 * slot are points like any other; the few outside every group go in last,
 * by original line.
 */
import type {
  ExtractionResult,
  InsertionPoint,
  InsertionRole,
  NodeIdentity,
  NodePosition,
  PositionIndex,
  StandaloneAnchor,
  StandaloneComment,
} from '@declsort/types';
import { MissingPositionError, type ErrorContext } from '../errors/DeclsortError.js';
import { formatCommentInline, formatCommentLines } from './formatComment.js';

const STANDALONE_INDENT = '  ';

export function reinsertComments(
  extraction: ExtractionResult,
  skeleton: string,
  positions: PositionIndex,
  context: ErrorContext = {}
): string {
  const missing: NodeIdentity[] = [];
  for (const [identity, comments] of extraction.byIdentity) {
    if (comments.length > 0 && !positions.has(identity)) missing.push(identity);
  }
  for (const { anchor } of extraction.standalone) {
    if (anchor && !anchor.identities.some((identity) => positions.has(identity))) {
      missing.push(...anchor.identities.filter((identity) => !missing.includes(identity)));
    }
  }
  if (missing.length > 0) {
    throw new MissingPositionError(missing, { ...context, stage: 'reinsert' });
  }

  const lines = skeleton.split('\n');
  const points = computeInsertionPoints(extraction, lines, positions);
  points.sort(compareInsertionPoints);
  for (const point of points) {
    applyInsertion(lines, point);
  }
  insertStandalone(lines, extraction.standalone.filter((entry) => !entry.anchor));
  return lines.join('\n');
}

export function computeInsertionPoints(
  extraction: ExtractionResult,
  lines: readonly string[],
  positions: PositionIndex
): InsertionPoint[] {
  const endLines = new Set<number>();
  for (const position of positions.values()) endLines.add(position.endLine);

  const points: InsertionPoint[] = [];
  for (const [identity, comments] of extraction.byIdentity) {
    const position = positions.get(identity);
    if (!position) continue;
    for (const entry of comments) {
      const { comment, role, ordinal } = entry;
      const base = { comment, role, ordinal, indentation: position.indentation };
      if (role === 'Leading') {
        points.push({ ...base, ...leadingTarget(position, lines, endLines) });
      } else if (entry.ownLine) {
        points.push({ ...base, line: position.endLine, column: Number.POSITIVE_INFINITY, mode: 'line' });
      } else {
        points.push({ ...base, ...trailingTarget(position, lines) });
      }
    }
  }

  extraction.standalone.forEach((entry, ordinal) => {
    const position = entry.anchor && anchorPosition(entry.anchor, positions);
    if (!entry.anchor || !position) return;
    const target =
      entry.anchor.side === 'before'
        ? aboveTarget(position, lines, endLines)
        : { line: position.endLine, column: Number.POSITIVE_INFINITY, mode: 'line' as const };
    points.push({
      comment: entry.comment,
      role: 'Standalone',
      ordinal,
      indentation: position.indentation,
      isolated: entry.isolated,
      ...target,
    });
  });
  return points;
}

/**
 * First printed candidate for `before`, last printed for `after`.
 */
function anchorPosition(anchor: StandaloneAnchor, positions: PositionIndex): NodePosition | undefined {
  let best: NodePosition | undefined;
  for (const identity of anchor.identities) {
    const position = positions.get(identity);
    if (!position) continue;
    if (
      !best ||
      (anchor.side === 'before' ? position.startLine < best.startLine : position.endLine > best.endLine)
    ) {
      best = position;
    }
  }
  return best;
}

/** Like a leading comment, but always on a line of its own. */
function aboveTarget(
  position: NodePosition,
  lines: readonly string[],
  endLines: ReadonlySet<number>
): Pick<InsertionPoint, 'line' | 'column' | 'mode'> {
  const target = leadingTarget(position, lines, endLines);
  if (target.mode === 'line') return target;
  return { line: position.startLine - 1, column: Number.POSITIVE_INFINITY, mode: 'line' };
}

function leadingTarget(
  position: NodePosition,
  lines: readonly string[],
  endLines: ReadonlySet<number>
): Pick<InsertionPoint, 'line' | 'column' | 'mode'> {
  const before = lines[position.startLine].slice(0, position.startColumn);
  if (before.trim() !== '') {
    return { line: position.startLine, column: position.startColumn, mode: 'inline' };
  }
  // decorators printed above the node belong to it
  let line = position.startLine - 1;
  while (line >= 0 && lines[line].trimStart().startsWith('@') && !endLines.has(line)) {
    line--;
  }
  return { line, column: Number.POSITIVE_INFINITY, mode: 'line' };
}

function trailingTarget(position: NodePosition, lines: readonly string[]): Pick<InsertionPoint, 'line' | 'column' | 'mode'> {
  const text = lines[position.endLine];
  let column = position.endColumn;
  while (column < text.length && (text[column] === ',' || text[column] === ';')) {
    column++;
  }
  return { line: position.endLine, column, mode: 'inline' };
}

/**
 * Line-mode points sharing a line stack upward as they are applied, so the
 * first applied ends up lowest: a node's leading comments, then standalone
 * comments above them, then the previous node's own-line trailing comments.
 */
const ROLE_ORDER: Record<InsertionRole, number> = { Leading: 0, Standalone: 1, Trailing: 2 };

export function compareInsertionPoints(a: InsertionPoint, b: InsertionPoint): number {
  if (a.line !== b.line) return b.line - a.line;
  if (a.column !== b.column) return a.column > b.column ? -1 : 1;
  if (a.role !== b.role) return ROLE_ORDER[a.role] - ROLE_ORDER[b.role];
  return b.ordinal - a.ordinal;
}

function applyInsertion(lines: string[], point: InsertionPoint): void {
  const { comment, indentation } = point;

  if (point.mode === 'line') {
    const block = formatCommentLines(comment, indentation);
    if (point.isolated) {
      if (point.line >= 0 && lines[point.line].trim() !== '') block.unshift('');
      const below = point.line + 1;
      if (below < lines.length && lines[below].trim() !== '') block.push('');
    }
    lines.splice(point.line + 1, 0, ...block);
    return;
  }

  const text = lines[point.line];
  const head = text.slice(0, point.column);
  const tail = text.slice(point.column);
  const rendered = formatCommentInline(comment, indentation);
  let replacement: string;

  if (point.role === 'Leading') {
    replacement = comment.kind === 'Block'
      ? `${head}${rendered} ${tail}`
      : `${head}${rendered}\n${indentation}${tail}`;
  } else if (tail.trim() === '') {
    replacement = `${head} ${rendered}`;
  } else if (comment.kind === 'Block' || tail.trimStart().startsWith('//')) {
    // a line comment already placed at this point stays on the node's line
    replacement = `${head} ${rendered} ${tail.trimStart()}`;
  } else {
    replacement = `${head} ${rendered}\n${indentation}${tail.trimStart()}`;
  }

  lines.splice(point.line, 1, ...replacement.split('\n'));
}

function insertStandalone(lines: string[], standalone: readonly StandaloneComment[]): void {
  const ordered = [...standalone].sort((a, b) => a.originalLine - b.originalLine);
  for (const entry of ordered) {
    const index = Math.min(entry.originalLine, lines.length);
    const block = formatCommentLines(entry.comment, STANDALONE_INDENT.repeat(entry.nestingDepth));
    if (entry.isolated) {
      if (index < lines.length && lines[index].trim() !== '') block.push('');
      if (index > 0 && lines[index - 1].trim() !== '') block.unshift('');
    }
    lines.splice(index, 0, ...block);
  }
}
