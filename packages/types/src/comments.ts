/**
 * Comment records flowing through the formatting pipeline.
 *
 * Everything here lives for exactly one file run. Offsets are string
 * indices into the text the record was computed from; lines and columns
 * are 0-based.
 */

import type { NodeIdentity } from './identity.js';

export type CommentKind = 'Line' | 'Block';

export interface Span {
  start: number;
  end: number;
}

/**
 * Immutable copy of a parser comment. `text` excludes the delimiters.
 */
export interface SourceComment {
  readonly kind: CommentKind;
  readonly text: string;
  readonly span: Readonly<Span>;
}

/**
 * Structural role of a comment relative to the code around it.
 *
 * - Inline: embedded in an expression, left to the printer
 * - Leading: on its own line(s) directly above a node
 * - Trailing: after code on the same line
 * - Standalone: surrounded by blank lines, owned by no node
 */
export type Classification = 'Inline' | 'Leading' | 'Trailing' | 'Standalone';

export type CommentRole = 'Leading' | 'Trailing';

export interface ExtractedComment {
  identity: NodeIdentity;
  role: CommentRole;
  comment: SourceComment;
  /** Relative order among comments of the same role on the same node */
  ordinal: number;
  /** Trailing comment written on its own line(s) below the node */
  ownLine?: boolean;
}

/**
 * Sibling slot a standalone comment is pinned to.
 *
 * With one identity the comment goes directly above (`before`) or below
 * (`after`) that node. With several, the comment sits at the start or end
 * of its group, next to whichever of them is printed first or last.
 */
export interface StandaloneAnchor {
  side: 'before' | 'after';
  identities: NodeIdentity[];
}

export interface StandaloneComment {
  comment: SourceComment;
  /** 0-based line of the comment's first line in the original source */
  originalLine: number;
  nestingDepth: number;
  /** True when the comment sat between blank lines (or at a file edge) */
  isolated: boolean;
  /** Unset for comments outside any sibling group; those go back by line */
  anchor?: StandaloneAnchor;
}

export interface ExtractionResult {
  byIdentity: Map<NodeIdentity, ExtractedComment[]>;
  standalone: StandaloneComment[];
}

/**
 * Where a node landed in the regenerated skeleton text.
 */
export interface NodePosition {
  startLine: number;
  startColumn: number;
  endLine: number;
  endColumn: number;
  /** Leading whitespace of the start line */
  indentation: string;
}

export type PositionIndex = Map<NodeIdentity, NodePosition>;

/**
 * - line: inserted as a new line after `line` (Leading above a node)
 * - inline: spliced into `line` at `column`
 */
export type SpliceMode = 'line' | 'inline';

export type InsertionRole = CommentRole | 'Standalone';

export interface InsertionPoint {
  /** For `line` mode the line after which the comment goes (-1 = top of file) */
  line: number;
  column: number;
  comment: SourceComment;
  indentation: string;
  role: InsertionRole;
  ordinal: number;
  mode: SpliceMode;
  /** Surround with blank lines (standalone comments that had them) */
  isolated?: boolean;
}
