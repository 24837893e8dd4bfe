/**
 * Page-local date and time handling
 *
 * The schedule states times in the conference's own zone. Day headers carry
 * only month and day ("Monday, Sep 8"), so the year comes from config.
 */

import { Temporal } from '@js-temporal/polyfill';
import { cleanText } from './text.js';

/** "Talks: Day 1 / Monday, Sep 8" → label + date text */
const DAY_HEADER_RE = /^\s*((?:Talks|Sprints):.*?)\s*\/\s*(.+)$/;

/** "Monday, Sep 8", "Sep 8", "September 8, 2025" */
const MONTH_DAY_RE = /^(?:[A-Za-z]+,?\s+)?([A-Za-z]+)\.?\s+(\d{1,2})(?:,?\s+(\d{4}))?$/;

const MONTHS = ['jan', 'feb', 'mar', 'apr', 'may', 'jun', 'jul', 'aug', 'sep', 'oct', 'nov', 'dec'];

const CLOCK_12H_RE = /^(\d{1,2})(?::(\d{2}))?\s*([ap])\.?\s*m\.?$/;
const CLOCK_24H_RE = /^(\d{1,2}):(\d{2})$/;

/** Trailing UTC offset or Z on an ISO date-time */
const OFFSET_RE = /(?:[+-]\d{2}(?::?\d{2})?|Z)$/i;
const ISO_DATE_RE = /^\d{4}-\d{2}-\d{2}$/;

export interface DayHeader {
  label: string;
  date: Temporal.PlainDate;
}

export interface ClockTime {
  hour: number;
  minute: number;
}

export interface InstantContext {
  timeZone: string;
  /** Date of the enclosing day section */
  day?: Temporal.PlainDate;
  /** Displayed time text, used when the datetime attribute is missing */
  clockText?: string;
}

export function parseMonthDay(text: string, year: number): Temporal.PlainDate | null {
  const m = MONTH_DAY_RE.exec(cleanText(text));
  if (!m) {
    return null;
  }

  const month = MONTHS.indexOf(m[1].slice(0, 3).toLowerCase()) + 1;
  if (month === 0) {
    return null;
  }

  try {
    return Temporal.PlainDate.from(
      { year: m[3] ? Number(m[3]) : year, month, day: Number(m[2]) },
      { overflow: 'reject' }
    );
  } catch {
    return null;
  }
}

/**
 * Parse a day section header
 *
 * @returns null for anything that is not a talks or sprints day header
 */
export function parseDayHeader(text: string, year: number): DayHeader | null {
  const m = DAY_HEADER_RE.exec(cleanText(text));
  if (!m) {
    return null;
  }

  const date = parseMonthDay(m[2], year);
  if (!date) {
    return null;
  }
  return { label: m[1], date };
}

/**
 * Parse an ISO calendar date such as a day header's `datetime` attribute
 */
export function parseIsoDate(value: string | undefined): Temporal.PlainDate | null {
  if (!value || !ISO_DATE_RE.test(value.trim())) {
    return null;
  }
  try {
    return Temporal.PlainDate.from(value.trim(), { overflow: 'reject' });
  } catch {
    return null;
  }
}

/**
 * Parse displayed clock text: "9:00 am", "10 pm", "14:30", "noon", "midnight"
 */
export function parseClockTime(text: string): ClockTime | null {
  const t = cleanText(text).toLowerCase();

  if (t === 'noon') return { hour: 12, minute: 0 };
  if (t === 'midnight') return { hour: 0, minute: 0 };

  const m12 = CLOCK_12H_RE.exec(t);
  if (m12) {
    const hour = Number(m12[1]);
    const minute = m12[2] ? Number(m12[2]) : 0;
    if (hour < 1 || hour > 12 || minute > 59) {
      return null;
    }
    const base = hour === 12 ? 0 : hour;
    return { hour: m12[3] === 'p' ? base + 12 : base, minute };
  }

  const m24 = CLOCK_24H_RE.exec(t);
  if (m24) {
    const hour = Number(m24[1]);
    const minute = Number(m24[2]);
    if (hour > 23 || minute > 59) {
      return null;
    }
    return { hour, minute };
  }

  return null;
}

/**
 * Resolve a `<time>` element to an absolute instant
 *
 * - ISO date-time with offset: taken as is
 * - ISO date-time without offset: interpreted in the conference zone
 * - missing attribute (or a bare date): displayed clock text on the day's
 *   date, in the conference zone
 *
 * @returns null when nothing usable is present
 */
export function resolveInstant(datetime: string | undefined, ctx: InstantContext): Date | null {
  const attr = datetime?.trim() ?? '';

  try {
    if (attr.includes('T')) {
      if (OFFSET_RE.test(attr)) {
        return new Date(Temporal.Instant.from(attr).epochMilliseconds);
      }
      const local = Temporal.PlainDateTime.from(attr);
      return new Date(local.toZonedDateTime(ctx.timeZone).epochMilliseconds);
    }

    const day = parseIsoDate(attr) ?? ctx.day;
    const clock = ctx.clockText ? parseClockTime(ctx.clockText) : null;
    if (!day || !clock) {
      return null;
    }
    const local = day.toPlainDateTime({ hour: clock.hour, minute: clock.minute });
    return new Date(local.toZonedDateTime(ctx.timeZone).epochMilliseconds);
  } catch (error) {
    if (error instanceof RangeError || error instanceof TypeError) {
      return null;
    }
    throw error;
  }
}

/**
 * Check that a string names a time zone the runtime knows
 */
export function isValidTimeZone(timeZone: string): boolean {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone });
    return true;
  } catch {
    return false;
  }
}
