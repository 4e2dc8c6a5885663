/**
 * Existing header detected in the lines following the keep-lines.
 * Indices are relative to those lines, end exclusive.
 */
export interface HeaderSpan {
  /** First line of the comment */
  startLine: number;

  /** Line after the last line of the comment */
  endLine: number;

  /** Whether the comment text mentions a copyright or license */
  isLicense: boolean;
}
