import chalk from 'chalk';
import { Session, TimewarriorReport } from '../../types/session';
import { getReportSettings } from '../../utils/config';
import { getSessionDurationMinutes, isOpen } from '../../utils/session-query';
import { formatWallClock } from '../../utils/timezone';

/**
 * Format duration as 2h, 30m, 1h30m; a reversed interval gets a leading minus
 */
export function formatDurationString(minutes: number): string {
  const sign = minutes < 0 ? '-' : '';
  const total = Math.abs(minutes);
  const hours = Math.floor(total / 60);
  const mins = total % 60;

  if (hours > 0 && mins > 0) return `${sign}${hours}h${mins}m`;
  if (hours > 0) return `${sign}${hours}h`;
  return `${sign}${mins}m`;
}

/**
 * Format single session line:
 * @id start - end (duration) +tag +tag # annotation
 */
export function formatSessionLine(session: Session, timeZone: string, now: Date): string {
  const parts: string[] = [];

  parts.push(chalk.bold(`@${session.id}`));
  parts.push(formatWallClock(session.start, timeZone));
  parts.push('-');
  parts.push(session.end ? formatWallClock(session.end, timeZone) : chalk.yellow('open'));
  parts.push(`(${formatDurationString(getSessionDurationMinutes(session, now))})`);

  for (const tag of session.tags) {
    parts.push(chalk.magenta(`+${tag}`));
  }

  if (session.annotation) {
    parts.push(chalk.gray(chalk.italic(`# ${session.annotation}`)));
  }

  return parts.join(' ');
}

/**
 * Format a parsed report for the terminal
 */
export function formatTerminalReport(report: TimewarriorReport, now: Date = new Date()): string {
  const lines: string[] = [];
  const settings = getReportSettings(report.config);

  if (settings.reportStart || settings.reportEnd) {
    const from = settings.reportStart ? formatWallClock(settings.reportStart, report.timeZone) : '...';
    const to = settings.reportEnd ? formatWallClock(settings.reportEnd, report.timeZone) : '...';
    lines.push(chalk.cyan(`Range: ${from} - ${to} (${report.timeZone})`));
  }

  if (report.sessions.length === 0) {
    lines.push('No sessions');
    return lines.join('\n');
  }

  let totalMinutes = 0;
  for (const session of report.sessions) {
    lines.push(formatSessionLine(session, report.timeZone, now));
    totalMinutes += getSessionDurationMinutes(session, now);
  }

  const open = report.sessions.filter(isOpen).length;
  const openNote = open > 0 ? `, ${open} open` : '';
  lines.push(chalk.bold(`Total: ${formatDurationString(totalMinutes)} in ${report.sessions.length} sessions${openNote}`));

  return lines.join('\n');
}
