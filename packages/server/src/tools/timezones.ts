/**
 * Static city table and the calendar arithmetic shared by both timezone tiers.
 *
 * The offsets are standard-time values. They ignore daylight saving, so a
 * time computed from them is one hour off in a DST-observing city while DST
 * is in effect (London, Paris, Berlin, New York, Los Angeles, Toronto,
 * Chicago, Sydney in their respective summers).
 */

const CITY_DATA = {
  london: { timezone: 'Europe/London', offset: '+00:00' },
  paris: { timezone: 'Europe/Paris', offset: '+01:00' },
  'new york': { timezone: 'America/New_York', offset: '-05:00' },
  'los angeles': { timezone: 'America/Los_Angeles', offset: '-08:00' },
  tokyo: { timezone: 'Asia/Tokyo', offset: '+09:00' },
  sydney: { timezone: 'Australia/Sydney', offset: '+11:00' },
  dubai: { timezone: 'Asia/Dubai', offset: '+04:00' },
  singapore: { timezone: 'Asia/Singapore', offset: '+08:00' },
  mumbai: { timezone: 'Asia/Kolkata', offset: '+05:30' },
  toronto: { timezone: 'America/Toronto', offset: '-05:00' },
  berlin: { timezone: 'Europe/Berlin', offset: '+01:00' },
  moscow: { timezone: 'Europe/Moscow', offset: '+03:00' },
  beijing: { timezone: 'Asia/Shanghai', offset: '+08:00' },
  'hong kong': { timezone: 'Asia/Hong_Kong', offset: '+08:00' },
  chicago: { timezone: 'America/Chicago', offset: '-06:00' },
  'mexico city': { timezone: 'America/Mexico_City', offset: '-06:00' },
  'sao paulo': { timezone: 'America/Sao_Paulo', offset: '-03:00' },
  cairo: { timezone: 'Africa/Cairo', offset: '+02:00' },
  lagos: { timezone: 'Africa/Lagos', offset: '+01:00' },
  johannesburg: { timezone: 'Africa/Johannesburg', offset: '+02:00' },
} as const;

export interface CityTimezone {
  /** IANA timezone identifier */
  timezone: string;
  /** Fixed offset as written in the table, e.g. "+05:30" */
  offset: string;
  offsetMinutes: number;
}

const MS_PER_MINUTE = 60_000;
const MS_PER_DAY = 86_400_000;

const WEEKDAYS = ['Sunday', 'Monday', 'Tuesday', 'Wednesday', 'Thursday', 'Friday', 'Saturday'] as const;

/**
 * Parses a signed "HH:MM" offset into minutes east of UTC.
 */
export function parseUtcOffset(offset: string): number {
  const match = /^([+-])(\d{2}):(\d{2})$/.exec(offset);
  if (!match) {
    throw new Error(`Invalid UTC offset '${offset}', expected ±HH:MM`);
  }
  const [, sign, hours, minutes] = match;
  const total = Number(hours) * 60 + Number(minutes);
  return sign === '-' ? -total : total;
}

// Offsets are parsed here, at module load, so the fallback tier has nothing left that can fail
export const CITY_TIMEZONES: ReadonlyMap<string, CityTimezone> = new Map(
  Object.entries(CITY_DATA).map(([city, { timezone, offset }]): [string, CityTimezone] => [
    city,
    { timezone, offset, offsetMinutes: parseUtcOffset(offset) },
  ])
);

export const SUPPORTED_CITIES: readonly string[] = [...CITY_TIMEZONES.keys()];

export function lookupCity(city: string): CityTimezone | undefined {
  return CITY_TIMEZONES.get(city.trim().toLowerCase());
}

/**
 * A wall-clock reading. Stored as a Date whose UTC fields are the local
 * fields, so calendar arithmetic never touches the host's own timezone.
 */
export type WallClock = Date;

export function wallClockAt(instant: Date, offsetMinutes: number): WallClock {
  return new Date(instant.getTime() + offsetMinutes * MS_PER_MINUTE);
}

/**
 * Reads the local date and time straight from an ISO-8601 string such as
 * "2026-10-19T21:34:56.123456+09:00", ignoring the offset suffix.
 * Returns undefined when the string does not start with a calendar date and time.
 */
export function wallClockFromIso(datetime: string): WallClock | undefined {
  const match = /^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2}):(\d{2})/.exec(datetime);
  if (!match) {
    return undefined;
  }
  const [, year, month, day, hour, minute, second] = match.map(Number);
  const wall = new Date(Date.UTC(year, month - 1, day, hour, minute, second));
  // Date.UTC rolls over out-of-range fields; reject them instead
  if (wall.getUTCMonth() !== month - 1 || wall.getUTCDate() !== day || wall.getUTCHours() !== hour) {
    return undefined;
  }
  return wall;
}

function pad(value: number, width = 2): string {
  return String(value).padStart(width, '0');
}

/** "YYYY-MM-DD HH:MM:SS" */
export function formatWallClock(wall: WallClock): string {
  return (
    `${pad(wall.getUTCFullYear(), 4)}-${pad(wall.getUTCMonth() + 1)}-${pad(wall.getUTCDate())} ` +
    `${pad(wall.getUTCHours())}:${pad(wall.getUTCMinutes())}:${pad(wall.getUTCSeconds())}`
  );
}

export function weekdayName(wall: WallClock): string {
  return WEEKDAYS[wall.getUTCDay()];
}

/** 1-based ordinal day of the year */
export function dayOfYear(wall: WallClock): number {
  const startOfYear = Date.UTC(wall.getUTCFullYear(), 0, 1);
  const startOfDay = Date.UTC(wall.getUTCFullYear(), wall.getUTCMonth(), wall.getUTCDate());
  return (startOfDay - startOfYear) / MS_PER_DAY + 1;
}

/** ISO 8601 week number: weeks start on Monday, week 1 holds the year's first Thursday */
export function isoWeekNumber(wall: WallClock): number {
  const date = new Date(Date.UTC(wall.getUTCFullYear(), wall.getUTCMonth(), wall.getUTCDate()));
  const isoDay = date.getUTCDay() || 7;
  date.setUTCDate(date.getUTCDate() + 4 - isoDay);
  const startOfYear = Date.UTC(date.getUTCFullYear(), 0, 1);
  return Math.ceil(((date.getTime() - startOfYear) / MS_PER_DAY + 1) / 7);
}
