import { addDays as addCalendarDays, differenceInCalendarDays, format, isValid, parseISO } from 'date-fns';
import { InvalidRangeException } from './errors/rental.errors';

const CALENDAR_DATE = /^\d{4}-\d{2}-\d{2}$/;
const DATE_FORMAT = 'yyyy-MM-dd';

/**
 * Half-open range of calendar dates: `start` is the first rented day and
 * `end` the return day, which is not occupied. Both are `YYYY-MM-DD`.
 */
export interface DateRange {
    readonly start: string;
    readonly end: string;
}

/** A maintenance window's span; `end` is its last day, `null` while open. */
export interface WindowSpan {
    readonly start_date: string;
    readonly end_date: string | null;
}

export function parseCalendarDate(value: string, field = 'date'): string {
    if (typeof value !== 'string' || !CALENDAR_DATE.test(value)) {
        throw new InvalidRangeException(`${field} must be a YYYY-MM-DD date`);
    }
    const parsed = parseISO(value);
    if (!isValid(parsed) || format(parsed, DATE_FORMAT) !== value) {
        throw new InvalidRangeException(`${field} ${value} is not a calendar date`);
    }
    return value;
}

export function createDateRange(start: string, end: string): DateRange {
    const range = {
        start: parseCalendarDate(start, 'start_date'),
        end: parseCalendarDate(end, 'end_date'),
    };
    if (range.end <= range.start) {
        throw new InvalidRangeException(`end_date ${range.end} must be after start_date ${range.start}`);
    }
    return range;
}

export function durationDays(range: DateRange): number {
    return differenceInCalendarDays(parseISO(range.end), parseISO(range.start));
}

export function overlaps(a: DateRange, b: DateRange): boolean {
    return a.start < b.end && b.start < a.end;
}

export function windowOverlaps(window: WindowSpan, range: DateRange): boolean {
    return window.start_date < range.end && (window.end_date === null || window.end_date >= range.start);
}

export function addDays(date: string, amount: number): string {
    return format(addCalendarDays(parseISO(date), amount), DATE_FORMAT);
}

export function today(): string {
    return format(new Date(), DATE_FORMAT);
}

/** Stands in for the missing end of a window that is still open. */
export const OPEN_ENDED = '9999-12-31';

/** The half-open range a maintenance window occupies. */
export function windowAsRange(window: WindowSpan): DateRange {
    return {
        start: window.start_date,
        end: window.end_date === null ? OPEN_ENDED : addDays(window.end_date, 1),
    };
}
