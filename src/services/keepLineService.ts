import { CommentStyle } from '../models/commentStyle';

/**
 * Leading lines that stay on top, and where the rest of the file starts
 */
export interface KeepLines {
  keepLines: string[];
  remainderStart: number;
}

/**
 * Service for finding the leading lines a header must never precede
 */
export class KeepLineService {
  /**
   * Match the style's keep-line rules against the leading lines, in order.
   * A rule consumes the next line only when that line's index is within the
   * rule's maxLine and the pattern matches; the first miss moves on to the
   * next rule, so keep-lines are always a prefix of the file.
   * @param lines File lines without terminators
   * @param style Comment style of the file
   */
  public static extractKeepLines(lines: readonly string[], style: CommentStyle): KeepLines {
    let count = 0;

    for (const rule of style.keepLinePatterns) {
      while (count < lines.length && count <= rule.maxLine && rule.pattern.test(lines[count])) {
        count++;
        if (!rule.repeat) {
          break;
        }
      }
    }

    return {
      keepLines: lines.slice(0, count),
      remainderStart: count,
    };
  }
}
