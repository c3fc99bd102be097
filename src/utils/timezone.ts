/**
 * Calendar fields of an instant as seen on a wall clock in some zone
 */
export interface WallClock {
  year: number;
  month: number;
  day: number;
  hour: number;
  minute: number;
  second: number;
}

/**
 * Resolve a zone name, falling back to the process zone.
 * Throws a RangeError for names Intl does not know.
 */
export function resolveTimeZone(timeZone?: string): string {
  if (timeZone === undefined) {
    return Intl.DateTimeFormat().resolvedOptions().timeZone;
  }

  try {
    return new Intl.DateTimeFormat('en-US', { timeZone }).resolvedOptions().timeZone;
  } catch (error) {
    throw new RangeError(`Unknown time zone: "${timeZone}"`, { cause: error });
  }
}

/**
 * Wall-clock fields of an instant in the given zone
 */
export function toWallClock(date: Date, timeZone: string): WallClock {
  const parts = new Intl.DateTimeFormat('en-US', {
    timeZone,
    hourCycle: 'h23',
    year: 'numeric',
    month: 'numeric',
    day: 'numeric',
    hour: 'numeric',
    minute: 'numeric',
    second: 'numeric',
  }).formatToParts(date);

  const field = (type: Intl.DateTimeFormatPartTypes): number => {
    const part = parts.find((p) => p.type === type);
    return part ? parseInt(part.value, 10) : 0;
  };

  return {
    year: field('year'),
    month: field('month'),
    day: field('day'),
    hour: field('hour'),
    minute: field('minute'),
    second: field('second'),
  };
}

function pad(value: number, length = 2): string {
  return String(value).padStart(length, '0');
}

/**
 * Format an instant as "yyyy-MM-dd HH:mm:ss" in the given zone
 */
export function formatWallClock(date: Date, timeZone: string): string {
  const c = toWallClock(date, timeZone);
  return `${pad(c.year, 4)}-${pad(c.month)}-${pad(c.day)} ${pad(c.hour)}:${pad(c.minute)}:${pad(c.second)}`;
}
