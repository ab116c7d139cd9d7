import {
  addDays,
  differenceInCalendarDays,
  eachDayOfInterval,
  format,
  isValid,
  isWeekend,
  parse,
} from 'date-fns';
import { validityDays, type OptionCatalog } from '../config/catalog';
import type { InspectionStatus, IsoDate } from '../types/inspection';
import { ValidationError } from './errors';

const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;
const REFERENCE = new Date(2000, 0, 1);

export type DateRejection = 'REQUIRED' | 'INVALID_FORMAT' | 'IN_FUTURE' | 'TOO_OLD' | 'INVALID_RANGE';

export type DateCheck = { valid: true; date: IsoDate } | { valid: false; reason: DateRejection; message: string };

// Strict `YYYY-MM-DD`; rejects impossible days such as 2023-02-29
export function parseIsoDate(value: string | null | undefined): Date | null {
  if (!value || !ISO_DATE.test(value)) return null;
  const d = parse(value, 'yyyy-MM-dd', REFERENCE);
  if (!isValid(d) || format(d, 'yyyy-MM-dd') !== value) return null;
  return d;
}

function requireDate(value: IsoDate, field: string): Date {
  const d = parseIsoDate(value);
  if (!d) throw ValidationError.single(field, `"${value}" is not a valid YYYY-MM-DD date`);
  return d;
}

export interface InspectionDateOptions {
  /** reject dates more than this many days before today */
  maxAgeDays?: number;
}

export function validateInspectionDate(date: string | null | undefined, today: IsoDate, options: InspectionDateOptions = {}): DateCheck {
  if (!date) return { valid: false, reason: 'REQUIRED', message: 'inspection date is required' };
  const d = parseIsoDate(date);
  if (!d) return { valid: false, reason: 'INVALID_FORMAT', message: `"${date}" is not a valid YYYY-MM-DD date` };
  const t = requireDate(today, 'today');
  const age = differenceInCalendarDays(t, d);
  if (age < 0) return { valid: false, reason: 'IN_FUTURE', message: 'inspection date cannot be in the future' };
  if (options.maxAgeDays !== undefined && age > options.maxAgeDays) {
    return { valid: false, reason: 'TOO_OLD', message: `inspection date cannot be more than ${options.maxAgeDays} days ago` };
  }
  return { valid: true, date };
}

export function assertInspectionDate(date: string, today: IsoDate, options: InspectionDateOptions = {}): IsoDate {
  const check = validateInspectionDate(date, today, options);
  if (!check.valid) throw ValidationError.single('inspectionDate', check.message);
  return check.date;
}

export function computeNextInspection(inspectionDate: IsoDate, equipmentType: string, catalog: OptionCatalog): IsoDate {
  const d = requireDate(inspectionDate, 'inspectionDate');
  return format(addDays(d, validityDays(catalog, equipmentType)), 'yyyy-MM-dd');
}

// Negative once the due date has passed
export function daysUntilDue(today: IsoDate, nextInspectionDate: IsoDate): number {
  return differenceInCalendarDays(requireDate(nextInspectionDate, 'nextInspectionDate'), requireDate(today, 'today'));
}

export function inspectionStatus(today: IsoDate, nextInspectionDate: IsoDate, warningWindowDays: number): InspectionStatus {
  const remaining = daysUntilDue(today, nextInspectionDate);
  if (remaining < 0) return 'OVERDUE';
  if (remaining <= warningWindowDays) return 'DUE_SOON';
  return 'OK';
}

export function validateDateRange(start: string, end: string, maxSpanDays = 365): DateCheck {
  if (!start || !end) return { valid: false, reason: 'REQUIRED', message: 'both dates are required' };
  const s = parseIsoDate(start);
  const e = parseIsoDate(end);
  if (!s || !e) return { valid: false, reason: 'INVALID_FORMAT', message: 'dates must be YYYY-MM-DD' };
  const span = differenceInCalendarDays(e, s);
  if (span < 0) return { valid: false, reason: 'INVALID_RANGE', message: 'start date cannot be after end date' };
  if (span > maxSpanDays) return { valid: false, reason: 'INVALID_RANGE', message: `range cannot exceed ${maxSpanDays} days` };
  return { valid: true, date: start };
}

export type DisplayFormat = 'short' | 'long' | 'relative';

export function formatDisplayDate(date: string | null | undefined, style: DisplayFormat = 'short', today?: IsoDate): string {
  if (!date) return '';
  const d = parseIsoDate(date);
  if (!d) return date;
  if (style === 'long') return format(d, 'd MMMM yyyy');
  if (style === 'relative' && today) {
    const delta = differenceInCalendarDays(requireDate(today, 'today'), d);
    if (delta === 0) return 'Today';
    if (delta === 1) return 'Yesterday';
    if (delta === -1) return 'Tomorrow';
    return delta > 0 ? `${delta} days ago` : `in ${-delta} days`;
  }
  return format(d, 'dd/MM/yyyy');
}

// Monday to Friday, both ends inclusive
export function workingDaysBetween(start: IsoDate, end: IsoDate): number {
  const s = parseIsoDate(start);
  const e = parseIsoDate(end);
  if (!s || !e || s > e) return 0;
  return eachDayOfInterval({ start: s, end: e }).filter((d) => !isWeekend(d)).length;
}
