import { parseTimestamp } from '../parser/timestamp';
import { DEFAULT_FLAGS, REPORT_KEYS, ReportSettings, TRUE_VALUES } from '../types/config';
import { ReportConfig } from '../types/session';

/**
 * Read a header flag the way Timewarrior does
 */
export function isTrueValue(value: string): boolean {
  const normalized = value.trim().toLowerCase();
  return TRUE_VALUES.some((truthy) => truthy === normalized);
}

function readFlag(config: ReportConfig, key: string, fallback: boolean): boolean {
  const value = config.get(key);
  return value === undefined ? fallback : isTrueValue(value);
}

function readString(config: ReportConfig, key: string): string | undefined {
  const value = config.get(key)?.trim();
  return value ? value : undefined;
}

function readTimestamp(config: ReportConfig, key: string): Date | undefined {
  const value = readString(config, key);
  return value === undefined ? undefined : parseTimestamp(value, undefined, key);
}

/**
 * Split the temp.report.tags value: comma separated, tags with spaces come quoted
 */
export function parseTagList(value: string): string[] {
  return value
    .split(',')
    .map((tag) => tag.trim().replace(/^"(.*)"$/, '$1'))
    .filter((tag) => tag.length > 0);
}

/**
 * Typed view of the well-known header keys
 * Missing flags take Timewarrior's defaults
 */
export function getReportSettings(config: ReportConfig): ReportSettings {
  const tags = readString(config, REPORT_KEYS.reportTags);

  return {
    reportStart: readTimestamp(config, REPORT_KEYS.reportStart),
    reportEnd: readTimestamp(config, REPORT_KEYS.reportEnd),
    reportTags: tags ? parseTagList(tags) : [],
    version: readString(config, REPORT_KEYS.version),
    database: readString(config, REPORT_KEYS.database),
    verbose: readFlag(config, REPORT_KEYS.verbose, DEFAULT_FLAGS.verbose),
    debug: readFlag(config, REPORT_KEYS.debug, DEFAULT_FLAGS.debug),
    confirmation: readFlag(config, REPORT_KEYS.confirmation, DEFAULT_FLAGS.confirmation),
  };
}
