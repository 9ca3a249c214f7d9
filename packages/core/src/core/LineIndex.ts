/**
 * Offset <-> line/column conversion for one text buffer.
 *
 * Line starts are collected by a single linear scan; lookups are binary
 * searches. Lines and columns are 0-based. `\r\n` counts as one break and
 * the `\r` stays part of the line text.
 */
export class LineIndex {
  private readonly lineStarts: number[];

  constructor(private readonly text: string) {
    const starts = [0];
    for (let i = 0; i < text.length; i++) {
      if (text.charCodeAt(i) === 10) {
        starts.push(i + 1);
      }
    }
    this.lineStarts = starts;
  }

  get lineCount(): number {
    return this.lineStarts.length;
  }

  lineOf(offset: number): number {
    let lo = 0;
    let hi = this.lineStarts.length - 1;
    while (lo < hi) {
      const mid = (lo + hi + 1) >> 1;
      if (this.lineStarts[mid] <= offset) {
        lo = mid;
      } else {
        hi = mid - 1;
      }
    }
    return lo;
  }

  columnOf(offset: number): number {
    return offset - this.lineStarts[this.lineOf(offset)];
  }

  lineStart(line: number): number {
    return this.lineStarts[line];
  }

  /** Offset of the line's terminating `\n` (or end of text). */
  lineEnd(line: number): number {
    return line + 1 < this.lineStarts.length ? this.lineStarts[line + 1] - 1 : this.text.length;
  }

  lineText(line: number): string {
    return this.text.slice(this.lineStart(line), this.lineEnd(line));
  }

  /** Out-of-range lines count as blank. */
  isBlank(line: number): boolean {
    if (line < 0 || line >= this.lineStarts.length) return true;
    return this.lineText(line).trim() === '';
  }

  indentationOf(line: number): string {
    const match = /^[ \t]*/.exec(this.lineText(line));
    return match ? match[0] : '';
  }
}
