import { differenceInMinutes } from 'date-fns';
import { Session, TimewarriorReport } from '../types/session';
import { compareSessions } from './compare';

/**
 * Check if a session is still being tracked
 */
export function isOpen(session: Session): boolean {
  return session.end === undefined;
}

/**
 * Sessions ordered by id, ties keep their source order
 */
export function sortSessions(sessions: readonly Session[]): Session[] {
  return [...sessions].sort(compareSessions);
}

export function findSession(report: TimewarriorReport, id: number): Session | undefined {
  return report.sessions.find((session) => session.id === id);
}

export function openSessions(report: TimewarriorReport): Session[] {
  return report.sessions.filter(isOpen);
}

/**
 * Whole minutes tracked, measured up to `now` for an open session
 */
export function getSessionDurationMinutes(session: Session, now: Date = new Date()): number {
  return differenceInMinutes(session.end ?? now, session.start);
}
