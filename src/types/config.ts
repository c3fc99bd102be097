/**
 * Typed view of the header keys Timewarrior passes to report extensions
 */
export interface ReportSettings {
  /** Start of the reported range (temp.report.start) */
  reportStart?: Date;

  /** End of the reported range (temp.report.end) */
  reportEnd?: Date;

  /** Tags the report was filtered on (temp.report.tags) */
  reportTags: string[];

  /** Timewarrior version (temp.version) */
  version?: string;

  /** Database directory (temp.db) */
  database?: string;

  /**
   * @default true
   */
  verbose: boolean;

  /**
   * @default false
   */
  debug: boolean;

  /**
   * @default true
   */
  confirmation: boolean;
}

export const REPORT_KEYS = {
  reportStart: 'temp.report.start',
  reportEnd: 'temp.report.end',
  reportTags: 'temp.report.tags',
  version: 'temp.version',
  database: 'temp.db',
  verbose: 'verbose',
  debug: 'debug',
  confirmation: 'confirmation',
} as const;

export const DEFAULT_FLAGS: Pick<ReportSettings, 'verbose' | 'debug' | 'confirmation'> = {
  verbose: true,
  debug: false,
  confirmation: true,
};

/**
 * Values Timewarrior reads as boolean true
 */
export const TRUE_VALUES = ['on', '1', 'yes', 'y', 'true'] as const;
