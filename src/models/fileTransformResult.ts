/**
 * Outcome of transforming one file's text
 */
export interface FileTransformResult {
  /** Complete new file text */
  newContent: string;

  /** Whether newContent differs from the input */
  changed: boolean;
}
