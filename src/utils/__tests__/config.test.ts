import { getReportSettings, isTrueValue, parseTagList } from '../config';
import { DecodeError } from '../../types/errors';

describe('isTrueValue', () => {
  it('should accept the values Timewarrior treats as true', () => {
    for (const value of ['on', '1', 'yes', 'y', 'true', 'ON', ' Yes ']) {
      expect(isTrueValue(value)).toBe(true);
    }
  });

  it('should reject anything else', () => {
    for (const value of ['off', '0', 'no', 'false', '', 'enabled']) {
      expect(isTrueValue(value)).toBe(false);
    }
  });
});

describe('parseTagList', () => {
  it('should split on commas and strip quotes', () => {
    expect(parseTagList('work, "client meeting",x')).toEqual(['work', 'client meeting', 'x']);
  });

  it('should drop empty entries', () => {
    expect(parseTagList(',a,,')).toEqual(['a']);
  });
});

describe('getReportSettings', () => {
  it('should use defaults for an empty header', () => {
    expect(getReportSettings(new Map())).toEqual({
      reportStart: undefined,
      reportEnd: undefined,
      reportTags: [],
      version: undefined,
      database: undefined,
      verbose: true,
      debug: false,
      confirmation: true,
    });
  });

  it('should read the well-known keys', () => {
    const settings = getReportSettings(
      new Map([
        ['temp.report.start', '20210711T000000Z'],
        ['temp.report.end', '20210712T000000Z'],
        ['temp.report.tags', 'work,"deep focus"'],
        ['temp.version', '1.4.3'],
        ['temp.db', '/home/user/.timewarrior'],
        ['verbose', 'off'],
        ['debug', 'on'],
        ['confirmation', 'no'],
      ])
    );

    expect(settings.reportStart?.toISOString()).toBe('2021-07-11T00:00:00.000Z');
    expect(settings.reportEnd?.toISOString()).toBe('2021-07-12T00:00:00.000Z');
    expect(settings.reportTags).toEqual(['work', 'deep focus']);
    expect(settings.version).toBe('1.4.3');
    expect(settings.database).toBe('/home/user/.timewarrior');
    expect(settings.verbose).toBe(false);
    expect(settings.debug).toBe(true);
    expect(settings.confirmation).toBe(false);
  });

  it('should treat an empty range bound as absent', () => {
    const settings = getReportSettings(new Map([['temp.report.end', '']]));
    expect(settings.reportEnd).toBeUndefined();
  });

  it('should reject a malformed range bound', () => {
    const header = new Map([['temp.report.start', 'yesterday']]);
    expect(() => getReportSettings(header)).toThrow(DecodeError);
    expect(() => getReportSettings(header)).toThrow(
      'Invalid timestamp "yesterday": expected YYYYMMDDTHHMMSSZ (field "temp.report.start")'
    );
  });
});
