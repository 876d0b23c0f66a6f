export const Weekday = {
  Sunday: 0,
  Monday: 1,
  Tuesday: 2,
  Wednesday: 3,
  Thursday: 4,
  Friday: 5,
  Saturday: 6,
} as const;

export type WeekdayName = keyof typeof Weekday;

const WEEKDAY_NAMES: readonly WeekdayName[] = [
  'Sunday',
  'Monday',
  'Tuesday',
  'Wednesday',
  'Thursday',
  'Friday',
  'Saturday',
];

export function weekdayName(day: number): WeekdayName | 'Unknown' {
  return WEEKDAY_NAMES[day] ?? 'Unknown';
}

export function isWeekday(value: number): boolean {
  return Number.isInteger(value) && value >= 0 && value <= 6;
}

function parseWeekdayToken(token: string): number | undefined {
  if (/^\d+$/.test(token)) {
    const n = Number(token);
    return isWeekday(n) ? n : undefined;
  }
  const lower = token.toLowerCase();
  const index = WEEKDAY_NAMES.findIndex((name) => {
    const candidate = name.toLowerCase();
    return candidate === lower || candidate.slice(0, 3) === lower;
  });
  return index === -1 ? undefined : index;
}

/**
 * Parses "wednesday,sunday", "wed, sun" or "3,0" into weekday numbers.
 * Unrecognized tokens are returned separately so callers can report them.
 */
export function parseWeekdays(input: string): { days: number[]; invalid: string[] } {
  const days: number[] = [];
  const invalid: string[] = [];

  for (const raw of input.split(',')) {
    const token = raw.trim();
    if (token.length === 0) continue;
    const day = parseWeekdayToken(token);
    if (day === undefined) {
      invalid.push(token);
      continue;
    }
    if (!days.includes(day)) days.push(day);
  }

  return { days, invalid };
}
