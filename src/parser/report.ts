import { IOError, isReportError } from '../types/errors';
import { ParseOptions, ParseOutcome, TimewarriorReport } from '../types/session';
import { logger } from '../utils/logger';
import { resolveTimeZone } from '../utils/timezone';
import { decodeSessions } from './session-decoder';
import { parseConfig, splitInput } from './splitter';

/**
 * Normalise line endings the way a line-by-line reader would see the input
 */
export function joinLines(content: string): string {
  return content.split(/\r?\n/).join('\n');
}

/**
 * Parse the full text Timewarrior hands to a report extension.
 * Throws a ReportError; no partial report is returned.
 */
export function parseReport(input: string, options: ParseOptions = {}): TimewarriorReport {
  const timeZone = resolveTimeZone(options.timeZone);
  const { header, body } = splitInput(input.trim());
  const config = parseConfig(header);
  const sessions = decodeSessions(body);

  return Object.freeze({
    config,
    sessions: Object.freeze(sessions),
    timeZone,
  });
}

/**
 * Like parseReport, but report errors come back as a value
 */
export function safeParseReport(input: string, options: ParseOptions = {}): ParseOutcome {
  try {
    return { ok: true, report: parseReport(input, options) };
  } catch (error) {
    if (isReportError(error)) {
      return { ok: false, error };
    }
    throw error;
  }
}

/**
 * Read a stream to its end and parse it as a report.
 * Read failures surface as IOError.
 */
export async function readReport(
  input: AsyncIterable<string | Buffer> = process.stdin,
  options: ParseOptions = {}
): Promise<TimewarriorReport> {
  const chunks: Buffer[] = [];

  try {
    for await (const chunk of input) {
      chunks.push(typeof chunk === 'string' ? Buffer.from(chunk, 'utf-8') : chunk);
    }
  } catch (error) {
    throw new IOError(`Failed to read input: ${error instanceof Error ? error.message : String(error)}`);
  }

  const content = joinLines(Buffer.concat(chunks).toString('utf-8'));
  logger.debug(`Read ${content.length} characters of report input`);

  return parseReport(content, options);
}
