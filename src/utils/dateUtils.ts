/**
 * Year or year range, e.g. "2019" or "2019-2021"
 */
export interface YearRange {
  start: number;
  end: number;
}

const YEAR_RANGE_PATTERN = /^\s*((?:19|20)\d{2})(?:\s*-\s*((?:19|20)\d{2}))?\s*$/;

/**
 * Get current year as number
 */
export function getCurrentYear(): number {
  return new Date().getFullYear();
}

/**
 * Parse "2019" or "2019 - 2021"
 * @returns Parsed range, or undefined when the text is not a year token
 */
export function parseYears(text: string): YearRange | undefined {
  const match = YEAR_RANGE_PATTERN.exec(text);
  if (!match) {
    return undefined;
  }
  const start = Number(match[1]);
  const end = match[2] === undefined ? start : Number(match[2]);
  return { start, end };
}

/**
 * Format a range as "2019-2021", or "2019" when start and end coincide
 */
export function formatYears(range: YearRange): string {
  return range.start === range.end ? `${range.start}` : `${range.start}-${range.end}`;
}

/**
 * Extend the end of an existing year token to the current year.
 * The start year is kept and a range is never shrunk.
 * @param existing Year token found in a header
 * @param currentYear Year to extend to
 */
export function mergeYears(existing: string, currentYear: number): string {
  const range = parseYears(existing);
  if (!range || range.end >= currentYear || range.start > currentYear) {
    return existing;
  }
  return formatYears({ start: range.start, end: currentYear });
}
