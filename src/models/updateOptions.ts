export type UpdateMode = 'replace' | 'addOnly';

/**
 * Options for a single file update
 */
export interface UpdateOptions {
  /** Replace existing headers, or only add where none is present */
  mode: UpdateMode;

  /** Whether `years` was given explicitly rather than defaulted */
  yearsExplicit?: boolean;

  /** Extend the end year of an existing header to the current year */
  refreshYears?: boolean;

  /** Year used for refreshes, defaults to the clock */
  currentYear?: number;
}

/**
 * Options for a years-only update
 */
export interface YearsUpdateOptions {
  /** Replacement year or year range */
  years?: string;

  /** Extend the end year of the existing range to the current year */
  refreshYears?: boolean;

  /** Year used for refreshes, defaults to the clock */
  currentYear?: number;
}
