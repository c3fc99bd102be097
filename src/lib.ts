export { parseReport, readReport, safeParseReport } from './parser/report';
export { splitInput, parseConfig } from './parser/splitter';
export { decodeSession, decodeSessions } from './parser/session-decoder';
export { TIMESTAMP_FORMAT, isTimestamp, parseTimestamp } from './parser/timestamp';
export { sessionsEqual, compareSessions, configsEqual, reportsEqual } from './utils/compare';
export {
  isOpen,
  sortSessions,
  findSession,
  openSessions,
  getSessionDurationMinutes,
} from './utils/session-query';
export { getReportSettings } from './utils/config';
export { FrozenConfig } from './utils/frozen-config';
export { resolveTimeZone, toWallClock, formatWallClock } from './utils/timezone';
export { ReportError, IOError, DecodeError, MalformedInputError, isReportError } from './types/errors';
export type { ReportErrorKind } from './types/errors';
export type { Session, ReportConfig, TimewarriorReport, ParseOptions, ParseOutcome } from './types/session';
export type { ReportSettings } from './types/config';
export type { WallClock } from './utils/timezone';
