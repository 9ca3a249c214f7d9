/**
 * Position-keyed view of the comments the parser attached to nodes.
 *
 * The parser hangs every comment on the node before it (trailing) and the
 * node after it (leading), sharing the same comment object. The store
 * indexes those attachments by the anchoring node's start/end offset, which
 * is all the extractor needs: "comments anchored at this node's start" and
 * "comments anchored at this node's end".
 */
import { traverseFast } from '@babel/types';
import type { Comment, Node } from '@babel/types';
import type { SourceComment } from '@declsort/types';

export function toSourceComment(comment: Comment): SourceComment | undefined {
  if (comment.start == null || comment.end == null) return undefined;
  return {
    kind: comment.type === 'CommentLine' ? 'Line' : 'Block',
    text: comment.value,
    span: { start: comment.start, end: comment.end },
  };
}

export class CommentStore {
  private readonly leading = new Map<number, SourceComment[]>();
  private readonly trailing = new Map<number, SourceComment[]>();
  /** Comment starts attached to some node other than Program/File */
  private readonly attached = new Set<number>();

  static fromAst(root: Node): CommentStore {
    const store = new CommentStore();
    traverseFast(root, (node) => {
      const printable = node.type !== 'Program' && node.type !== 'File';
      if (node.start != null) {
        store.add(store.leading, node.start, node.leadingComments, printable);
      }
      if (node.end != null) {
        store.add(store.trailing, node.end, node.trailingComments, printable);
      }
      if (printable) {
        for (const c of node.innerComments ?? []) {
          if (c.start != null) store.attached.add(c.start);
        }
      }
    });
    return store;
  }

  private add(
    index: Map<number, SourceComment[]>,
    offset: number,
    comments: readonly Comment[] | null | undefined,
    printable: boolean
  ): void {
    if (!comments || comments.length === 0) return;
    let list = index.get(offset);
    if (!list) {
      list = [];
      index.set(offset, list);
    }
    for (const c of comments) {
      const record = toSourceComment(c);
      if (!record) continue;
      if (printable) this.attached.add(record.span.start);
      if (list.some((existing) => existing.span.start === record.span.start)) continue;
      list.push(record);
    }
    list.sort((a, b) => a.span.start - b.span.start);
  }

  leadingAt(offset: number): readonly SourceComment[] {
    return this.leading.get(offset) ?? [];
  }

  trailingAt(offset: number): readonly SourceComment[] {
    return this.trailing.get(offset) ?? [];
  }

  /** True when the printer will emit the comment with some node. */
  isAttached(comment: SourceComment): boolean {
    return this.attached.has(comment.span.start);
  }
}
