/**
 * Per-file failure collected during a batch run
 */
export interface FileFailure {
  path: string;
  message: string;
}

/**
 * Summary of a batch run
 */
export interface BatchReport {
  /** Files whose content changed (written unless dry run) */
  updated: string[];

  /** Files processed without changes */
  unchanged: string[];

  /** Files that failed; the rest of the batch still ran */
  failures: FileFailure[];
}
