/**
 * Format pipeline - one file, source text in, formatted text out.
 *
 *   parse -> classify -> extract -> reorganize -> print skeleton
 *         -> recover positions -> reinsert -> style passes
 *
 * Stateless: every call builds its own tree, indexes and buffers.
 */
import type { FormatResult, FormatStats, OrganizeOptions, StylePass } from '@declsort/types';
import { classifyComments } from '../comments/CommentClassifier.js';
import { extractComments } from '../comments/CommentExtractor.js';
import { recoverPositions } from '../comments/PositionRecoverer.js';
import { reinsertComments } from '../comments/CommentReinserter.js';
import { collectSiblingGroups } from '../comments/siblingGroups.js';
import { DEFAULT_ORGANIZE } from '../config/ConfigLoader.js';
import { createLogger, type Logger } from '../logging/Logger.js';
import { parseSource } from '../parser/parseSource.js';
import { printSkeleton } from '../printer/SkeletonPrinter.js';
import { reorganize } from '../reorganize/Reorganizer.js';
import { WhitespaceStylePass } from '../style/WhitespaceStylePass.js';

export interface FormatOptions {
  organize?: Partial<OrganizeOptions>;
  /** Defaults to the whitespace pass alone */
  style?: readonly StylePass[];
  logger?: Logger;
}

export function formatSource(source: string, filename: string, options: FormatOptions = {}): FormatResult {
  const logger = options.logger ?? createLogger('silent');
  const organize: OrganizeOptions = { ...DEFAULT_ORGANIZE, ...options.organize };
  const style = options.style ?? [new WhitespaceStylePass()];

  const parsed = parseSource(source, filename);
  const classifications = classifyComments(parsed.comments, source);
  const groups = collectSiblingGroups(parsed.file);
  const extraction = extractComments(parsed.file, parsed.store, source, classifications, groups);

  let inline = 0;
  for (const role of classifications.values()) {
    if (role === 'Inline') inline++;
  }
  let owned = 0;
  for (const list of extraction.byIdentity.values()) owned += list.length;

  const stats: FormatStats = {
    comments: parsed.comments.length,
    inline,
    extracted: owned,
    reassigned: extraction.reassigned,
    standalone: extraction.standalone.length,
    identities: extraction.byIdentity.size,
  };
  logger.debug('Comments extracted', { file: filename, ...stats });

  const { reordered } = reorganize(parsed.file, organize);
  logger.debug('Reorganized', { file: filename, ...reordered });

  const skeleton = printSkeleton(parsed.file, extraction.extracted);
  const positions = recoverPositions(skeleton, filename);
  logger.debug('Positions recovered', { file: filename, positions: positions.size });

  let output = reinsertComments(extraction, skeleton, positions, { filePath: filename });

  for (const pass of style) {
    output = pass.apply(output, filename);
    logger.trace('Style pass applied', { file: filename, pass: pass.name });
  }

  return {
    output,
    changed: output !== source.replace(/\s+$/, ''),
    stats,
  };
}
