import { MalformedInputError } from '../types/errors';
import { ReportConfig } from '../types/session';
import { FrozenConfig } from '../utils/frozen-config';

/**
 * Separator between the header and the session body
 */
export const SECTION_SEPARATOR = '\n\n';

/**
 * Separator between a header key and its value
 */
export const SETTING_SEPARATOR = ': ';

/**
 * Raw sections of a report
 */
export interface ReportSections {
  header: string;
  body: string;
}

/**
 * Check if a line is empty or whitespace-only
 */
export function isEmptyLine(line: string): boolean {
  return line.trim().length === 0;
}

/**
 * Split report text on the first blank line.
 * The body keeps any later blank lines untouched.
 */
export function splitInput(input: string): ReportSections {
  const index = input.indexOf(SECTION_SEPARATOR);
  if (index === -1) {
    throw new MalformedInputError('Missing blank line between header and session data');
  }

  return {
    header: input.slice(0, index),
    body: input.slice(index + SECTION_SEPARATOR.length),
  };
}

/**
 * Parse a single `key: value` header line
 *
 * @param line - The line to parse
 * @param lineNumber - Line number for error reporting
 */
export function parseSetting(line: string, lineNumber: number): [string, string] {
  const index = line.indexOf(SETTING_SEPARATOR);
  if (index === -1) {
    throw new MalformedInputError(`Header line has no "${SETTING_SEPARATOR}" separator: "${line}"`, lineNumber);
  }

  return [line.slice(0, index), line.slice(index + SETTING_SEPARATOR.length)];
}

/**
 * Parse the header section into a configuration map.
 * Blank lines are skipped; a repeated key keeps its last value.
 */
export function parseConfig(header: string): ReportConfig {
  const config = new Map<string, string>();
  const lines = header.split('\n');

  for (let i = 0; i < lines.length; i++) {
    if (isEmptyLine(lines[i])) {
      continue;
    }

    const [key, value] = parseSetting(lines[i], i + 1);
    config.set(key, value);
  }

  return new FrozenConfig(config);
}
