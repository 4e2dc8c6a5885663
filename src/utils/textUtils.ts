/**
 * File text split into lines, with what is needed to join it back
 */
export interface SplitText {
  lines: string[];
  /** Terminator of each line as found; '' for a last line without one */
  terminators: string[];
  /** Dominant terminator, used for lines that have none of their own */
  eol: string;
  finalNewline: boolean;
}

/**
 * Split text into lines, keeping every line's own terminator.
 * The dominant terminator is CRLF when it outnumbers LF; an empty text
 * counts as ending with a newline.
 */
export function splitLines(text: string): SplitText {
  const lines: string[] = [];
  const terminators: string[] = [];
  const pattern = /\r?\n/g;
  let start = 0;
  let crlf = 0;
  let match: RegExpExecArray | null;

  while ((match = pattern.exec(text)) !== null) {
    lines.push(text.slice(start, match.index));
    terminators.push(match[0]);
    if (match[0] === '\r\n') {
      crlf++;
    }
    start = match.index + match[0].length;
  }

  const eol = crlf > terminators.length - crlf ? '\r\n' : '\n';
  const finalNewline = start === text.length;
  if (!finalNewline) {
    lines.push(text.slice(start));
    terminators.push('');
  }

  return { lines, terminators, eol, finalNewline };
}

/**
 * Inverse of splitLines.
 * Lines without a terminator of their own get the dominant one, except the
 * last line of a text that had no final newline.
 */
export function joinLines(split: SplitText): string {
  const last = split.lines.length - 1;
  return split.lines
    .map((line, i) => {
      if (i === last && !split.finalNewline) {
        return line;
      }
      const terminator = split.terminators[i];
      return line + (terminator ? terminator : split.eol);
    })
    .join('');
}

export function isBlank(line: string): boolean {
  return line.trim().length === 0;
}
