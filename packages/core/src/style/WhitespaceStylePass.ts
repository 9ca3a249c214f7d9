/**
 * Whitespace style pass - final cosmetic cleanup of reassembled text.
 *
 * Trailing whitespace goes, runs of blank lines collapse to one, and the
 * text is trimmed of blank lines at both ends. Template literal content is
 * left exactly as written. The text is re-parsed first, which doubles as
 * the validity check on the formatter's output.
 */
import { traverseFast } from '@babel/types';
import type { StylePass } from '@declsort/types';
import { FormatError, LanguageError } from '../errors/DeclsortError.js';
import { parseSource, type ParsedSource } from '../parser/parseSource.js';

type Range = readonly [start: number, end: number];

function templateRanges(parsed: ParsedSource): Range[] {
  const ranges: Range[] = [];
  traverseFast(parsed.file, (node) => {
    if (node.type === 'TemplateElement' && node.start != null && node.end != null && node.end > node.start) {
      ranges.push([node.start, node.end]);
    }
  });
  return ranges;
}

const within = (ranges: readonly Range[], offset: number): boolean =>
  ranges.some(([start, end]) => offset >= start && offset < end);

export class WhitespaceStylePass implements StylePass {
  readonly name = 'whitespace';

  apply(text: string, filename: string): string {
    let parsed: ParsedSource;
    try {
      parsed = parseSource(text, filename);
    } catch (err) {
      if (err instanceof LanguageError) {
        throw new FormatError(
          `Formatted output for ${filename} is not valid source: ${err.message}`,
          'ERR_OUTPUT_INVALID',
          { filePath: filename, stage: 'style', lineNumber: err.context.lineNumber }
        );
      }
      throw err;
    }

    const ranges = templateRanges(parsed);
    const out: string[] = [];
    let offset = 0;
    let previousBlank = true;

    for (const line of text.split('\n')) {
      const lineStart = offset;
      const lineEnd = offset + line.length;
      offset = lineEnd + 1;

      // a line starting inside a template continues its content
      const startsInTemplate = lineStart > 0 && within(ranges, lineStart - 1);
      const endsInTemplate = within(ranges, lineEnd);
      const cleaned = endsInTemplate ? line : line.replace(/[ \t\r]+$/, '');

      if (!startsInTemplate && !endsInTemplate && cleaned === '') {
        if (previousBlank) continue;
        previousBlank = true;
      } else {
        previousBlank = false;
      }
      out.push(cleaned);
    }

    while (out.length > 0 && out[out.length - 1] === '') {
      out.pop();
    }
    return out.join('\n');
  }
}
