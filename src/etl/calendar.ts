import {
  differenceInCalendarDays,
  differenceInYears,
  format,
  getISOWeek,
  getQuarter,
  isValid,
  isWeekend,
  parseISO,
} from 'date-fns';
import { DataConversionError } from '../errors';
import type { DimDate } from '../drizzle/types';

/**
 * Source timestamps are naive wall-clock values (`2024-01-01 08:30:00`), so
 * every calendar computation here works in local time on both sides.
 */
export function parseSourceDate(value: string, entity: string, field: string): Date {
  const parsed = parseISO(value);
  if (!isValid(parsed)) {
    throw new DataConversionError(entity, field, value);
  }
  return parsed;
}

export function parseOptionalSourceDate(
  value: string | null,
  entity: string,
  field: string
): Date | null {
  return value === null ? null : parseSourceDate(value, entity, field);
}

export function toDateKey(date: Date): number {
  return date.getFullYear() * 10000 + (date.getMonth() + 1) * 100 + date.getDate();
}

export function toIsoDate(date: Date): string {
  return format(date, 'yyyy-MM-dd');
}

export function buildDateRow(date: Date): DimDate {
  return {
    dateKey: toDateKey(date),
    fullDate: toIsoDate(date),
    year: date.getFullYear(),
    quarter: getQuarter(date),
    month: date.getMonth() + 1,
    monthName: format(date, 'MMMM'),
    weekOfYear: getISOWeek(date),
    dayOfMonth: date.getDate(),
    dayName: format(date, 'EEEE'),
    isWeekend: isWeekend(date),
  };
}

/** Whole calendar days between the two dates' date parts; zero without a discharge. */
export function lengthOfStayDays(encounterDate: Date, dischargeDate: Date | null): number {
  return differenceInCalendarDays(dischargeDate ?? encounterDate, encounterDate);
}

export function ageInYears(dateOfBirth: Date, asOf: Date): number {
  return differenceInYears(asOf, dateOfBirth);
}
