import { TimewarriorReport } from '../../types/session';

/**
 * Format a parsed report as JSON, instants as ISO 8601
 */
export function formatJsonReport(report: TimewarriorReport): string {
  const jsonData = {
    timeZone: report.timeZone,
    // fromEntries defines own properties, so a `__proto__` key survives
    config: Object.fromEntries(report.config),
    sessions: report.sessions.map((session) => ({
      id: session.id,
      start: session.start.toISOString(),
      end: session.end ? session.end.toISOString() : null,
      tags: session.tags,
      annotation: session.annotation ?? null,
    })),
  };

  return JSON.stringify(jsonData, null, 2);
}
