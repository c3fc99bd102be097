import { isValid, parse } from 'date-fns';
import { DecodeError } from '../types/errors';

/**
 * Wire format of Timewarrior timestamps as a date-fns pattern, e.g. 20210711T103400Z.
 * The trailing X reads the "Z" designator, so values parse as UTC.
 */
export const TIMESTAMP_FORMAT = "yyyyMMdd'T'HHmmssX";

// date-fns accepts shorter digit runs and other offsets; the wire format does not
const TIMESTAMP_SHAPE = /^\d{8}T\d{6}Z$/;

function decode(value: string): Date | null {
  if (!TIMESTAMP_SHAPE.test(value)) {
    return null;
  }
  const date = parse(value, TIMESTAMP_FORMAT, new Date(0));
  return isValid(date) ? date : null;
}

/**
 * Check a wire timestamp against the exact layout and the calendar
 */
export function isTimestamp(value: string): boolean {
  return decode(value) !== null;
}

/**
 * Parse a wire timestamp into the instant it denotes.
 * The resulting Date presents local wall-clock time through its local getters.
 *
 * @param value - Timestamp in TIMESTAMP_FORMAT
 * @param index - Session index for error reporting
 * @param field - Field name for error reporting
 */
export function parseTimestamp(value: string, index?: number, field?: string): Date {
  const date = decode(value);
  if (date === null) {
    throw new DecodeError(`Invalid timestamp "${value}": expected YYYYMMDDTHHMMSSZ`, index, field);
  }
  return date;
}
