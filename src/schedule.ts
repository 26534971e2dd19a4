/**
 * Week and list placement resolution.
 *
 * Weeks follow ISO-8601: Monday is the first day and week 1 is the week that
 * contains January 4th. Dates are handled in local time, like the cron entry
 * that starts the run.
 */
import { DEFAULT_POSITION } from './config.js';
import { ErrorCodes, WeeklyListError } from './errors.js';

export const MIN_WEEK = 1;
export const MAX_WEEK = 53;

export const POSITIONS = ['top', 'bottom'] as const;
export type Position = (typeof POSITIONS)[number];

/** Value sent as Trello's `pos` parameter. */
export type PositionValue = 'top' | 'bottom';

export const DAYS_OF_WEEK = [
  'monday',
  'tuesday',
  'wednesday',
  'thursday',
  'friday',
  'saturday',
  'sunday',
] as const;
export type DayOfWeek = (typeof DAYS_OF_WEEK)[number];

export interface RunContext {
  week: number;
  listTitle: string;
  position: PositionValue;
  dryRun: boolean;
  /** Monday 00:00 of the target week. */
  weekStart: Date;
}

export interface RunOptions {
  week?: number;
  position?: string;
  dryRun?: boolean;
}

const MS_PER_DAY = 86_400_000;

// Thursday of the date's ISO week, as a UTC calendar date
function isoThursday(date: Date): Date {
  const d = new Date(Date.UTC(date.getFullYear(), date.getMonth(), date.getDate()));
  const day = d.getUTCDay() || 7;
  d.setUTCDate(d.getUTCDate() + 4 - day);
  return d;
}

export function isoWeekOf(date: Date): number {
  const thursday = isoThursday(date);
  const yearStart = Date.UTC(thursday.getUTCFullYear(), 0, 1);
  return Math.ceil(((thursday.getTime() - yearStart) / MS_PER_DAY + 1) / 7);
}

export function isoYearOf(date: Date): number {
  return isoThursday(date).getUTCFullYear();
}

export function assertWeek(week: number): void {
  if (!Number.isInteger(week) || week < MIN_WEEK || week > MAX_WEEK) {
    throw new WeeklyListError(
      ErrorCodes.RANGE_ERROR,
      `Invalid week number: ${week}. Must be between ${MIN_WEEK} and ${MAX_WEEK}`,
    );
  }
}

export function resolveWeek(explicit: number | undefined, now: Date): number {
  if (explicit === undefined) return isoWeekOf(now);
  assertWeek(explicit);
  return explicit;
}

export function listTitle(week: number): string {
  assertWeek(week);
  return `Todo w${String(week).padStart(2, '0')}`;
}

export function isPosition(value: string): value is Position {
  return (POSITIONS as readonly string[]).includes(value);
}

export function resolvePosition(flag: string): PositionValue {
  if (!isPosition(flag)) {
    throw new WeeklyListError(
      ErrorCodes.RANGE_ERROR,
      `Invalid position: "${flag}". Must be one of ${POSITIONS.join(', ')}`,
    );
  }
  return flag === 'top' ? 'top' : 'bottom';
}

/**
 * Monday 00:00 of an ISO week, in the ISO year `now` belongs to.
 */
export function weekStart(week: number, now: Date): Date {
  assertWeek(week);
  const year = isoYearOf(now);
  const jan4 = new Date(year, 0, 4);
  const jan4Weekday = (jan4.getDay() + 6) % 7; // monday = 0
  return new Date(year, 0, 4 - jan4Weekday + (week - 1) * 7);
}

export function dueDate(
  start: Date,
  dayOfWeek: DayOfWeek,
  hour: number,
  minute = 0,
): Date {
  const offset = DAYS_OF_WEEK.indexOf(dayOfWeek);
  return new Date(
    start.getFullYear(),
    start.getMonth(),
    start.getDate() + offset,
    hour,
    minute,
  );
}

export function resolveRunContext(options: RunOptions, now: Date = new Date()): RunContext {
  const week = resolveWeek(options.week, now);
  return {
    week,
    listTitle: listTitle(week),
    position: resolvePosition(options.position ?? DEFAULT_POSITION),
    dryRun: options.dryRun ?? false,
    weekStart: weekStart(week, now),
  };
}
