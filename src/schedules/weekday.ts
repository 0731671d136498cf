import { formatInTimeZone, toDate } from 'date-fns-tz';

export const WEEKDAYS = [
  'monday',
  'tuesday',
  'wednesday',
  'thursday',
  'friday',
  'saturday',
  'sunday',
] as const;

export type Weekday = (typeof WEEKDAYS)[number];

export const SEMESTERS = ['1st', '2nd', 'summer', 'summer2'] as const;
export type Semester = (typeof SEMESTERS)[number];

export function isSemester(v: string): v is Semester {
  return (SEMESTERS as readonly string[]).includes(v);
}

// Legacy spellings seen in imported schedules
const ALIASES: Record<string, Weekday> = {
  mon: 'monday',
  tue: 'tuesday',
  tues: 'tuesday',
  wed: 'wednesday',
  thu: 'thursday',
  thur: 'thursday',
  thurs: 'thursday',
  fri: 'friday',
  sat: 'saturday',
  sun: 'sunday',
};

export function parseWeekday(raw: string): Weekday | null {
  const s = String(raw ?? '').trim().toLowerCase();
  if (!s) return null;

  const full = WEEKDAYS.find((d) => d === s);
  return full ?? ALIASES[s] ?? null;
}

/**
 * Normalizes a list of day names (or a comma separated string) into a
 * deduplicated, week-ordered set. Throws on the first unknown name.
 */
export function normalizeWeekdays(input: string | readonly string[]): Weekday[] {
  const parts = typeof input === 'string' ? input.split(',') : input;
  const found = new Set<Weekday>();

  for (const part of parts) {
    if (!String(part ?? '').trim()) continue;
    const day = parseWeekday(part);
    if (!day) throw new Error(`Unknown weekday "${part}"`);
    found.add(day);
  }

  return WEEKDAYS.filter((d) => found.has(d));
}

const TIME_RE = /^([01]\d|2[0-3]):([0-5]\d)(?::([0-5]\d))?$/;

/** "HH:MM" (or "HH:MM:SS") to seconds since midnight. */
export function timeToSeconds(hhmm: string): number | null {
  const m = TIME_RE.exec(String(hhmm ?? '').trim());
  if (!m) return null;
  return Number(m[1]) * 3600 + Number(m[2]) * 60 + Number(m[3] ?? 0);
}

/** Canonical "HH:MM", or null when the value is not a time of day. */
export function normalizeTime(raw: string): string | null {
  const m = TIME_RE.exec(String(raw ?? '').trim());
  return m ? `${m[1]}:${m[2]}` : null;
}

export type LocalMoment = {
  weekday: Weekday;
  /** seconds since local midnight */
  secondOfDay: number;
  /** "HH:MM" for messages */
  clock: string;
};

export function localMoment(now: Date, timeZone: string): LocalMoment {
  const weekday = parseWeekday(formatInTimeZone(now, timeZone, 'EEEE'));
  if (!weekday) {
    throw new Error(`Cannot resolve weekday for ${now.toISOString()} in ${timeZone}`);
  }

  const clock = formatInTimeZone(now, timeZone, 'HH:mm:ss');
  return {
    weekday,
    secondOfDay: timeToSeconds(clock) ?? 0,
    clock: clock.slice(0, 5),
  };
}

const HAS_OFFSET_RE = /(?:[zZ]|[+-]\d\d:?\d\d)$/;

/**
 * Parses a timestamp sent by a controller. Values without an offset are
 * wall-clock times in the service zone. Returns null when unparseable.
 */
export function parseControllerTimestamp(raw: unknown, timeZone: string): Date | null {
  const s = typeof raw === 'string' ? raw.trim() : '';
  if (!s) return null;

  const d = HAS_OFFSET_RE.test(s) ? new Date(s) : toDate(s, { timeZone });
  return Number.isNaN(d.getTime()) ? null : d;
}
