import { readReport } from '../../parser/report';
import { getReportSettings } from '../../utils/config';
import { logger } from '../../utils/logger';
import { formatJsonReport } from '../formatters/json';
import { formatTerminalReport } from '../formatters/terminal';

export interface ReportOptions {
  format?: string;
  timeZone?: string;
}

const FORMATS = ['terminal', 'json'] as const;
type ReportFormat = typeof FORMATS[number];

function isReportFormat(value: string): value is ReportFormat {
  return FORMATS.some((format) => format === value);
}

/**
 * timew-report command implementation: parse the report on the input and print it
 */
export async function reportCommand(
  options: ReportOptions,
  input: AsyncIterable<string | Buffer> = process.stdin
): Promise<void> {
  const format = options.format || 'terminal';
  if (!isReportFormat(format)) {
    logger.error(`Unknown format: ${format}. Use "terminal" or "json"`);
    process.exit(1);
    return;
  }

  try {
    const report = await readReport(input, { timeZone: options.timeZone });

    if (getReportSettings(report.config).debug) {
      logger.setVerbose(true);
    }
    logger.debug(`Parsed ${report.config.size} settings and ${report.sessions.length} sessions`);

    console.log(format === 'json' ? formatJsonReport(report) : formatTerminalReport(report));
  } catch (error) {
    logger.failure(error);
    process.exit(1);
  }
}
