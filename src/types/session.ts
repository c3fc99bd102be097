/**
 * One tracked interval from a Timewarrior report
 */
export interface Session {
  readonly id: number;
  readonly start: Date;
  /** Absent while the session is still being tracked */
  readonly end?: Date;
  readonly tags: readonly string[];
  readonly annotation?: string;
}

/**
 * Header settings, one entry per `key: value` line
 */
export type ReportConfig = ReadonlyMap<string, string>;

/**
 * Parsed report: header configuration plus sessions in source order
 */
export interface TimewarriorReport {
  readonly config: ReportConfig;
  readonly sessions: readonly Session[];
  /**
   * IANA zone used to present session times as wall-clock values.
   * Not part of report equality.
   */
  readonly timeZone: string;
}

/**
 * Options accepted by the report entry points
 */
export interface ParseOptions {
  /** IANA zone name, defaults to the process zone */
  timeZone?: string;
}

/**
 * Outcome of a non-throwing parse
 */
export type ParseOutcome =
  | { ok: true; report: TimewarriorReport }
  | { ok: false; error: ReportError };

import { ReportError } from './errors';
