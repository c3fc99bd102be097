import { DecodeError } from '../types/errors';
import { Session } from '../types/session';
import { parseTimestamp } from './timestamp';

type JsonRecord = Record<string, unknown>;

function isRecord(value: unknown): value is JsonRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Short description of a JSON value for error messages
 */
function describe(value: unknown): string {
  if (value === null) {
    return 'null';
  }
  if (Array.isArray(value)) {
    return 'array';
  }
  if (typeof value === 'string') {
    return JSON.stringify(value);
  }
  if (typeof value === 'number' || typeof value === 'boolean') {
    return String(value);
  }
  return typeof value;
}

function decodeId(record: JsonRecord, index: number): number {
  const id = record.id;
  if (id === undefined) {
    throw new DecodeError('Missing required field', index, 'id');
  }
  if (typeof id !== 'number' || !Number.isSafeInteger(id) || id < 0) {
    throw new DecodeError(`Expected a non-negative integer, got ${describe(id)}`, index, 'id');
  }
  return id;
}

function decodeStart(record: JsonRecord, index: number): Date {
  const start = record.start;
  if (start === undefined) {
    throw new DecodeError('Missing required field', index, 'start');
  }
  if (typeof start !== 'string') {
    throw new DecodeError(`Expected a timestamp string, got ${describe(start)}`, index, 'start');
  }
  return parseTimestamp(start, index, 'start');
}

function decodeEnd(record: JsonRecord, index: number): Date | undefined {
  const end = record.end;
  if (end === undefined) {
    return undefined;
  }
  if (typeof end !== 'string') {
    throw new DecodeError(`Expected a timestamp string, got ${describe(end)}`, index, 'end');
  }
  return parseTimestamp(end, index, 'end');
}

function decodeTags(record: JsonRecord, index: number): string[] {
  const tags = record.tags;
  if (tags === undefined) {
    throw new DecodeError('Missing required field', index, 'tags');
  }
  if (!Array.isArray(tags)) {
    throw new DecodeError(`Expected an array of strings, got ${describe(tags)}`, index, 'tags');
  }

  const decoded: string[] = [];
  for (const tag of tags) {
    if (typeof tag !== 'string') {
      throw new DecodeError(`Expected a string tag, got ${describe(tag)}`, index, 'tags');
    }
    decoded.push(tag);
  }
  return decoded;
}

function decodeAnnotation(record: JsonRecord, index: number): string | undefined {
  const annotation = record.annotation;
  if (annotation === undefined || annotation === null) {
    return undefined;
  }
  if (typeof annotation !== 'string') {
    throw new DecodeError(`Expected a string, got ${describe(annotation)}`, index, 'annotation');
  }
  return annotation;
}

/**
 * Decode one session record. Unknown fields are ignored.
 *
 * @param record - Parsed JSON element
 * @param index - Position in the session array, used in error messages
 */
export function decodeSession(record: unknown, index: number): Session {
  if (!isRecord(record)) {
    throw new DecodeError(`Expected a session object, got ${describe(record)}`, index);
  }

  const id = decodeId(record, index);
  const start = decodeStart(record, index);
  const end = decodeEnd(record, index);
  const tags = decodeTags(record, index);
  const annotation = decodeAnnotation(record, index);

  return Object.freeze({
    id,
    start,
    ...(end ? { end } : {}),
    tags: Object.freeze(tags),
    ...(annotation !== undefined ? { annotation } : {}),
  });
}

/**
 * Decode the session body of a report
 */
export function decodeSessions(body: string): Session[] {
  let data: unknown;
  try {
    data = JSON.parse(body);
  } catch (error) {
    throw new DecodeError(`Invalid JSON: ${error instanceof Error ? error.message : String(error)}`);
  }

  if (!Array.isArray(data)) {
    throw new DecodeError(`Expected an array of sessions, got ${describe(data)}`);
  }

  return data.map((record: unknown, index: number) => decodeSession(record, index));
}
