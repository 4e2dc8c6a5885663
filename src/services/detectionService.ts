import { CommentStyle } from '../models/commentStyle';
import { HeaderSpan } from '../models/headerSpan';
import { isBlank } from '../utils/textUtils';

/** Blank lines allowed between the keep-lines and a header */
export const MAX_LEADING_BLANK_LINES = 2;

const YEARS_PATTERN = /\b(19|20)\d{2}(\s*-\s*(19|20)\d{2})?\b/;
const LICENSE_PATTERN = /copyright|licen[cs]e|©/i;

/**
 * Service for detecting existing license headers
 */
export class DetectionService {
  /**
   * Find a header comment at the top of the lines following the keep-lines.
   * Only the first few lines are looked at, so comments further down the
   * body are never mistaken for a header. An unterminated block comment,
   * or one followed by code on its closing line, yields no header.
   * @param lines Lines after the keep-lines
   * @param style Comment style of the file
   * @returns Span of the header, or undefined if none found
   */
  public static findHeader(lines: readonly string[], style: CommentStyle): HeaderSpan | undefined {
    let start = 0;
    while (start < lines.length && isBlank(lines[start])) {
      start++;
    }
    if (start >= lines.length || start > MAX_LEADING_BLANK_LINES) {
      return undefined;
    }

    const endLine =
      style.comment.kind === 'block'
        ? this.findBlockEnd(lines, start, style.comment.start, style.comment.end.trim())
        : this.findLineRunEnd(lines, start, style.comment.prefix.trim());
    if (endLine === undefined) {
      return undefined;
    }

    const text = lines.slice(start, endLine).join('\n');
    return {
      startLine: start,
      endLine,
      isLicense: this.looksLikeLicense(text),
    };
  }

  /**
   * First year or year range in a header, e.g. "2019" or "2019-2021"
   */
  public static extractYears(spanText: string): string | undefined {
    const match = YEARS_PATTERN.exec(spanText);
    return match ? match[0] : undefined;
  }

  /**
   * Whether a comment reads like a copyright or license notice
   */
  public static looksLikeLicense(spanText: string): boolean {
    return LICENSE_PATTERN.test(spanText);
  }

  private static findBlockEnd(
    lines: readonly string[],
    start: number,
    open: string,
    close: string,
  ): number | undefined {
    const first = lines[start].trimStart();
    if (!first.startsWith(open)) {
      return undefined;
    }

    // The close may sit on the opening line, after the delimiter
    const closeOnFirst = first.indexOf(close, open.length);
    if (closeOnFirst !== -1) {
      return this.endsAfter(first, closeOnFirst, close) ? start + 1 : undefined;
    }
    for (let i = start + 1; i < lines.length; i++) {
      const index = lines[i].indexOf(close);
      if (index !== -1) {
        return this.endsAfter(lines[i], index, close) ? i + 1 : undefined;
      }
    }
    return undefined;
  }

  /**
   * Whether only whitespace follows the close token
   */
  private static endsAfter(line: string, index: number, close: string): boolean {
    return isBlank(line.slice(index + close.length));
  }

  private static findLineRunEnd(lines: readonly string[], start: number, prefix: string): number | undefined {
    let end = start;
    while (end < lines.length && lines[end].trim().startsWith(prefix)) {
      end++;
    }
    return end > start ? end : undefined;
  }
}
