/**
 * Comment Extractor - pulls every structurally owned comment out of the
 * tree and records it against its node's identity.
 *
 * For each sibling group (in document order) and each identified member:
 * - comments anchored at the member's start are Leading candidates
 * - comments anchored at the member's end are Trailing candidates
 *
 * A comment that the parser hangs on both sides of a gap is claimed by
 * whichever anchor sees it first. Inline comments are never extracted; the
 * printer keeps them where the parser left them.
 *
 * After a comma the parser hangs `a: 1, // note` on the next member only.
 * Such a comment still ends the previous member's line and goes to it.
 *
 * A trailing candidate on a line below its node's end really introduces
 * the next sibling. It is handed to that sibling as Leading when no blank
 * line separates them; otherwise it stays with its node, below it.
 *
 * Standalone comments keep their slot among the siblings: above the next
 * identified member, or at the start or end of the group.
 */
import type { File } from '@babel/types';
import type {
  Classification,
  CommentRole,
  ExtractedComment,
  ExtractionResult,
  NodeIdentity,
  SourceComment,
  StandaloneAnchor,
  StandaloneComment,
} from '@declsort/types';
import { LineIndex } from '../core/LineIndex.js';
import { toSourceComment, type CommentStore } from '../parser/CommentStore.js';
import { classifyComment, isBlankIsolated } from './CommentClassifier.js';
import { collectSiblingGroups, type SiblingGroup, type SiblingMember } from './siblingGroups.js';

export interface ExtractionReport extends ExtractionResult {
  /** Start offsets of every comment taken out of the tree */
  extracted: Set<number>;
  /** Line-separated trailing comments moved onto the next sibling */
  reassigned: number;
}

interface LineSeparated {
  memberIndex: number;
  identity: NodeIdentity;
  comment: SourceComment;
}

class ExtractionState {
  readonly byIdentity = new Map<NodeIdentity, ExtractedComment[]>();
  readonly standalone: StandaloneComment[] = [];
  readonly claimed = new Set<number>();
  reassigned = 0;

  constructor(private readonly lines: LineIndex) {}

  claim(comment: SourceComment): void {
    this.claimed.add(comment.span.start);
  }

  release(comment: SourceComment): void {
    this.claimed.delete(comment.span.start);
  }

  record(identity: NodeIdentity, role: CommentRole, comment: SourceComment, ownLine = false): void {
    let list = this.byIdentity.get(identity);
    if (!list) {
      list = [];
      this.byIdentity.set(identity, list);
    }
    const ordinal = list.filter((entry) => entry.role === role).length;
    list.push(ownLine ? { identity, role, comment, ordinal, ownLine } : { identity, role, comment, ordinal });
  }

  divert(comment: SourceComment, nestingDepth: number, isolated: boolean, anchor?: StandaloneAnchor): void {
    const entry: StandaloneComment = {
      comment,
      originalLine: this.lines.lineOf(comment.span.start),
      nestingDepth,
      isolated,
    };
    if (anchor) entry.anchor = anchor;
    this.standalone.push(entry);
  }

  extractedStarts(): Set<number> {
    const starts = new Set<number>();
    for (const list of this.byIdentity.values()) {
      for (const entry of list) starts.add(entry.comment.span.start);
    }
    for (const entry of this.standalone) starts.add(entry.comment.span.start);
    return starts;
  }
}

/**
 * @param classifications - precomputed roles keyed by comment start;
 *        missing entries are classified on the fly
 */
export function extractComments(
  file: File,
  store: CommentStore,
  source: string,
  classifications: ReadonlyMap<number, Classification> = new Map(),
  groups: readonly SiblingGroup[] = collectSiblingGroups(file)
): ExtractionReport {
  const lines = new LineIndex(source);
  const state = new ExtractionState(lines);
  const classify = (comment: SourceComment): Classification =>
    classifications.get(comment.span.start) ?? classifyComment(comment, source, lines);

  for (const group of groups) {
    const lineSeparated: LineSeparated[] = [];

    group.members.forEach((member, memberIndex) => {
      const { node, identity } = member;
      if (!identity || node.start == null || node.end == null) return;

      const previous = group.members[memberIndex - 1];
      for (const comment of store.leadingAt(node.start)) {
        if (state.claimed.has(comment.span.start)) continue;
        const role = classify(comment);
        if (role === 'Standalone') {
          state.claim(comment);
          state.divert(comment, group.depth, true, slotAnchor(group.members, memberIndex));
        } else if (role === 'Leading') {
          state.claim(comment);
          state.record(identity, 'Leading', comment);
        } else if (role === 'Trailing' && previous?.identity && endsOnLineOf(previous, comment, lines)) {
          state.claim(comment);
          state.record(previous.identity, 'Trailing', comment);
        }
      }

      const endLine = lines.lineOf(node.end);
      for (const comment of store.trailingAt(node.end)) {
        if (state.claimed.has(comment.span.start)) continue;
        const role = classify(comment);
        if (role === 'Inline') continue;
        state.claim(comment);
        if (role === 'Standalone') {
          state.divert(comment, group.depth, true, slotAnchor(group.members, memberIndex + 1));
        } else if (lines.lineOf(comment.span.start) > endLine) {
          lineSeparated.push({ memberIndex, identity, comment });
        } else {
          state.record(identity, 'Trailing', comment);
        }
      }
    });

    for (const { memberIndex, identity, comment } of lineSeparated) {
      const next = group.members[memberIndex + 1];
      if (next && next.node.start != null && adjacent(comment, next.node.start, lines)) {
        if (next.identity) {
          state.record(next.identity, 'Leading', comment);
          state.reassigned++;
        } else {
          // the printer emits it with the next sibling
          state.release(comment);
        }
      } else {
        state.record(identity, 'Trailing', comment, true);
      }
    }
  }

  for (const comment of fileComments(file)) {
    if (state.claimed.has(comment.span.start) || store.isAttached(comment)) continue;
    const line = lines.lineOf(comment.span.start);
    const lastLine = lines.lineOf(comment.span.end);
    state.divert(comment, 0, line === 0 || isBlankIsolated(line, lastLine, lines));
  }

  state.standalone.sort((a, b) => a.comment.span.start - b.comment.span.start);

  return {
    byIdentity: state.byIdentity,
    standalone: state.standalone,
    extracted: state.extractedStarts(),
    reassigned: state.reassigned,
  };
}

/**
 * Slot just before `members[index]` (`index` may be past the end). Slots
 * ahead of every identified member pin to the group start, slots behind
 * all of them to the group end.
 */
export function slotAnchor(members: readonly SiblingMember[], index: number): StandaloneAnchor | undefined {
  const identities = members.flatMap((member) => (member.identity ? [member.identity] : []));
  if (identities.length === 0) return undefined;
  if (!members.slice(0, index).some((member) => member.identity)) {
    return { side: 'before', identities };
  }
  const next = members.slice(index).find((member) => member.identity)?.identity;
  if (next === undefined) return { side: 'after', identities };
  return { side: 'before', identities: [next] };
}

function endsOnLineOf(member: SiblingMember, comment: SourceComment, lines: LineIndex): boolean {
  return member.node.end != null && lines.lineOf(member.node.end) === lines.lineOf(comment.span.start);
}

/** No blank line between the comment's last line and `offset`'s line. */
function adjacent(comment: SourceComment, offset: number, lines: LineIndex): boolean {
  const from = lines.lineOf(comment.span.end);
  const to = lines.lineOf(offset);
  for (let line = from + 1; line < to; line++) {
    if (lines.isBlank(line)) return false;
  }
  return true;
}

function fileComments(file: File): SourceComment[] {
  const result: SourceComment[] = [];
  for (const c of file.comments ?? []) {
    const record = toSourceComment(c);
    if (record) result.push(record);
  }
  return result;
}
