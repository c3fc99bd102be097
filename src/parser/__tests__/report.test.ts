import { Readable } from 'stream';
import { joinLines, parseReport, readReport, safeParseReport } from '../report';
import { DecodeError, IOError, MalformedInputError } from '../../types/errors';
import { reportsEqual } from '../../utils/compare';

const SAMPLE = [
  'debug: off',
  'temp.report.start: 20210711T000000Z',
  'temp.report.tags: work',
  'temp.version: 1.4.3',
  '',
  '[',
  '{"id":2,"start":"20210711T103400Z","end":"20210711T113400Z","tags":["work","t1"],"annotation":"note"},',
  '{"id":1,"start":"20210711T120000Z","tags":["work"]}',
  ']',
].join('\n');

describe('parseReport', () => {
  it('should parse a minimal report', () => {
    const report = parseReport('k: v\n\n[]', { timeZone: 'UTC' });

    expect([...report.config]).toEqual([['k', 'v']]);
    expect(report.sessions).toEqual([]);
    expect(report.timeZone).toBe('UTC');
  });

  it('should parse config and sessions', () => {
    const report = parseReport(SAMPLE, { timeZone: 'UTC' });

    expect(report.config.size).toBe(4);
    expect(report.config.get('temp.report.start')).toBe('20210711T000000Z');
    expect(report.sessions).toHaveLength(2);

    const [first, second] = report.sessions;
    expect(first.id).toBe(2);
    expect(first.start.toISOString()).toBe('2021-07-11T10:34:00.000Z');
    expect(first.end?.toISOString()).toBe('2021-07-11T11:34:00.000Z');
    expect(first.tags).toEqual(['work', 't1']);
    expect(first.annotation).toBe('note');

    expect(second.id).toBe(1);
    expect(second.end).toBeUndefined();
    expect(second.annotation).toBeUndefined();
  });

  it('should trim surrounding whitespace', () => {
    const report = parseReport('\n  k: v\n\n[]\n\n', { timeZone: 'UTC' });
    expect(report.config.get('k')).toBe('v');
  });

  it('should be deterministic', () => {
    expect(reportsEqual(parseReport(SAMPLE), parseReport(SAMPLE))).toBe(true);
  });

  it('should default to the process time zone', () => {
    expect(parseReport('k: v\n\n[]').timeZone).toBe(Intl.DateTimeFormat().resolvedOptions().timeZone);
  });

  it('should reject an unknown time zone', () => {
    expect(() => parseReport('k: v\n\n[]', { timeZone: 'Mars/Olympus_Mons' })).toThrow(RangeError);
  });

  it('should freeze the report', () => {
    const report = parseReport(SAMPLE);
    expect(Object.isFrozen(report)).toBe(true);
    expect(Object.isFrozen(report.sessions)).toBe(true);
    expect(Object.isFrozen(report.config)).toBe(true);
    expect('set' in report.config).toBe(false);
  });

  describe('errors', () => {
    it('should raise MalformedInputError without a blank line', () => {
      expect(() => parseReport('k: v\n[]')).toThrow(MalformedInputError);
    });

    it('should raise MalformedInputError for a header line without separator', () => {
      expect(() => parseReport('k: v\nbroken\n\n[]')).toThrow(MalformedInputError);
    });

    it('should raise DecodeError for a bad body', () => {
      expect(() => parseReport('k: v\n\nnot json')).toThrow(DecodeError);
    });

    it('should raise DecodeError naming an invalid timestamp', () => {
      expect(() => parseReport('k: v\n\n[{"id":1,"start":"20210711T1034Z","tags":[]}]')).toThrow(
        'Invalid timestamp "20210711T1034Z": expected YYYYMMDDTHHMMSSZ (session 0, field "start")'
      );
    });
  });
});

describe('safeParseReport', () => {
  it('should return the report on success', () => {
    const outcome = safeParseReport('k: v\n\n[]');
    expect(outcome.ok).toBe(true);
    if (outcome.ok) {
      expect(outcome.report.config.get('k')).toBe('v');
    }
  });

  it('should return report errors as values', () => {
    const outcome = safeParseReport('k: v');
    expect(outcome.ok).toBe(false);
    if (!outcome.ok) {
      expect(outcome.error).toBeInstanceOf(MalformedInputError);
      expect(outcome.error.kind).toBe('malformed-input');
    }
  });

  it('should still throw for invalid options', () => {
    expect(() => safeParseReport('k: v\n\n[]', { timeZone: 'Nowhere/Atlantis' })).toThrow(RangeError);
  });
});

describe('joinLines', () => {
  it('should normalise CRLF line endings', () => {
    expect(joinLines('a: 1\r\n\r\n[]\r\n')).toBe('a: 1\n\n[]\n');
  });
});

describe('readReport', () => {
  it('should read and parse a stream', async () => {
    const report = await readReport(Readable.from(['k: v\r\n', '\r\n', '[{"id":1,"start":"20210711T103400Z","tags":[]}]\r\n']), {
      timeZone: 'UTC',
    });

    expect(report.config.get('k')).toBe('v');
    expect(report.sessions).toHaveLength(1);
    expect(report.sessions[0].start.toISOString()).toBe('2021-07-11T10:34:00.000Z');
  });

  it('should read buffers', async () => {
    const report = await readReport(Readable.from([Buffer.from('k: v\n\n[]', 'utf-8')]));
    expect(report.config.get('k')).toBe('v');
  });

  it('should wrap stream failures in IOError', async () => {
    async function* failing(): AsyncGenerator<string> {
      yield 'k: v\n';
      throw new Error('stream closed');
    }

    await expect(readReport(failing())).rejects.toThrow(IOError);
    await expect(readReport(failing())).rejects.toThrow('Failed to read input: stream closed');
  });

  it('should surface parse errors unchanged', async () => {
    await expect(readReport(Readable.from(['k: v\n[]']))).rejects.toThrow(MalformedInputError);
  });
});
