import { ReportConfig, Session, TimewarriorReport } from '../types/session';

function sameInstant(a: Date | undefined, b: Date | undefined): boolean {
  if (a === undefined || b === undefined) {
    return a === b;
  }
  return a.getTime() === b.getTime();
}

function sameTags(a: readonly string[], b: readonly string[]): boolean {
  return a.length === b.length && a.every((tag, i) => tag === b[i]);
}

/**
 * Full equality: id, start, end, tags (in order) and annotation must all match
 */
export function sessionsEqual(a: Session, b: Session): boolean {
  return (
    sameInstant(a.start, b.start) &&
    sameInstant(a.end, b.end) &&
    a.id === b.id &&
    sameTags(a.tags, b.tags) &&
    a.annotation === b.annotation
  );
}

/**
 * Order sessions by id only. Sessions that compare as 0 are not necessarily equal,
 * see sessionsEqual.
 */
export function compareSessions(a: Session, b: Session): number {
  if (a.id < b.id) {
    return -1;
  }
  if (a.id > b.id) {
    return 1;
  }
  return 0;
}

export function configsEqual(a: ReportConfig, b: ReportConfig): boolean {
  if (a.size !== b.size) {
    return false;
  }
  for (const [key, value] of a) {
    if (b.get(key) !== value) {
      return false;
    }
  }
  return true;
}

/**
 * Reports are equal when their configs match and their sessions match pairwise in order.
 * The presentation zone is not compared.
 */
export function reportsEqual(a: TimewarriorReport, b: TimewarriorReport): boolean {
  return (
    configsEqual(a.config, b.config) &&
    a.sessions.length === b.sessions.length &&
    a.sessions.every((session, i) => sessionsEqual(session, b.sessions[i]))
  );
}
