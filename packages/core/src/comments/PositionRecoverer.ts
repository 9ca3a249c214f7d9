/**
 * Position Recoverer - where did each identified node land in the skeleton?
 */
import type { PositionIndex } from '@declsort/types';
import { LineIndex } from '../core/LineIndex.js';
import { LanguageError } from '../errors/DeclsortError.js';
import { parseSource, type ParsedSource } from '../parser/parseSource.js';
import { collectSiblingGroups } from './siblingGroups.js';

/**
 * Re-parse the skeleton and index every identified sibling by identity.
 * On a collision the later node wins. A skeleton that does not parse
 * yields an empty index; the reinserter then reports what is missing.
 */
export function recoverPositions(skeleton: string, filename: string): PositionIndex {
  const positions: PositionIndex = new Map();

  let parsed: ParsedSource;
  try {
    parsed = parseSource(skeleton, filename);
  } catch (err) {
    if (err instanceof LanguageError) return positions;
    throw err;
  }

  const lines = new LineIndex(skeleton);
  for (const group of collectSiblingGroups(parsed.file)) {
    for (const { node, identity } of group.members) {
      if (!identity || node.start == null || node.end == null) continue;
      const startLine = lines.lineOf(node.start);
      positions.set(identity, {
        startLine,
        startColumn: lines.columnOf(node.start),
        endLine: lines.lineOf(node.end),
        endColumn: lines.columnOf(node.end),
        indentation: lines.indentationOf(startLine),
      });
    }
  }
  return positions;
}
