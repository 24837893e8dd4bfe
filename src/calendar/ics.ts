/**
 * iCalendar (RFC 5545) serialization
 *
 * Output is a pure function of the events and options: UIDs are content
 * digests and DTSTAMP never reads the clock, so an unchanged schedule
 * renders to byte-identical text.
 */

import { createHash } from 'crypto';
import type { ScheduleEvent } from '../schedule/types.js';

/** Maximum content line length in octets, excluding CRLF */
export const LINE_FOLD_LIMIT = 75;

const CRLF = '\r\n';

export const DEFAULT_PRODID = '-//confcal//Conference Schedule Export//EN';

export interface CalendarOptions {
  /** X-WR-CALNAME shown by calendar apps */
  calendarName: string;
  /** Right-hand side of every UID */
  uidDomain: string;
  prodId?: string;
  /** Fixed DTSTAMP for every event; defaults to each event's start */
  generatedAt?: Date;
}

/**
 * Escape a TEXT property value
 */
export function escapeText(text: string): string {
  return text
    .replace(/\\/g, '\\\\')
    .replace(/,/g, '\\,')
    .replace(/;/g, '\\;')
    .replace(/\r?\n/g, '\\n');
}

/**
 * Fold a content line at `limit` UTF-8 octets. Continuation lines start
 * with one space, which counts toward their limit. Code points are never
 * split.
 */
export function foldLine(line: string, limit: number = LINE_FOLD_LIMIT): string {
  const out: string[] = [];
  let current = '';
  let currentBytes = 0;

  for (const char of line) {
    const charBytes = Buffer.byteLength(char, 'utf-8');
    if (currentBytes + charBytes > limit) {
      out.push(current);
      current = ' ';
      currentBytes = 1;
    }
    current += char;
    currentBytes += charBytes;
  }
  out.push(current);

  return out.join(CRLF);
}

/**
 * Format an instant as a UTC DATE-TIME: YYYYMMDDTHHMMSSZ
 */
export function formatUtc(date: Date): string {
  return date.toISOString().replace(/[-:]/g, '').replace(/\.\d{3}/, '');
}

/**
 * Deterministic UID: digest of every field read from the session card, so
 * only identical cards share one
 */
export function buildEventUid(event: ScheduleEvent, domain: string): string {
  const fields = [
    event.title,
    event.start.toISOString(),
    event.end.toISOString(),
    event.location ?? '',
    event.presenters.join(', '),
    event.url ?? '',
    event.audienceLevel ?? '',
  ];
  const digest = createHash('sha256').update(fields.join('\n')).digest('hex');
  return `${digest.slice(0, 32)}@${domain}`;
}

/**
 * DESCRIPTION body: metadata lines, then the abstract, then the talk link,
 * each block separated by a blank line
 */
export function buildDescription(event: ScheduleEvent): string {
  const meta: string[] = [];
  if (event.presenters.length > 0) {
    meta.push(`Presented by: ${event.presenters.join(', ')}`);
  }
  if (event.audienceLevel) {
    meta.push(`Audience level: ${event.audienceLevel}`);
  }
  if (event.location) {
    meta.push(`Location: ${event.location}`);
  }

  const blocks: string[] = [];
  if (meta.length > 0) {
    blocks.push(meta.join('\n'));
  }
  if (event.details) {
    blocks.push(event.details);
  }
  if (event.url) {
    blocks.push(`More info: ${event.url}`);
  }
  return blocks.join('\n\n');
}

function categoryLabel(event: ScheduleEvent): string {
  return event.category.toUpperCase();
}

/**
 * Lines of one VEVENT, unfolded
 */
export function renderEvent(event: ScheduleEvent, options: CalendarOptions): string[] {
  const lines = [
    'BEGIN:VEVENT',
    `UID:${buildEventUid(event, options.uidDomain)}`,
    `DTSTAMP:${formatUtc(options.generatedAt ?? event.start)}`,
    `DTSTART:${formatUtc(event.start)}`,
    `DTEND:${formatUtc(event.end)}`,
    `SUMMARY:${escapeText(event.title)}`,
  ];

  if (event.location) {
    lines.push(`LOCATION:${escapeText(event.location)}`);
  }
  const description = buildDescription(event);
  if (description) {
    lines.push(`DESCRIPTION:${escapeText(description)}`);
  }
  if (event.url) {
    lines.push(`URL:${event.url}`);
  }
  lines.push(`CATEGORIES:${categoryLabel(event)}`);
  lines.push('END:VEVENT');

  return lines;
}

/**
 * Render a complete VCALENDAR document. Every line, the last included,
 * ends with CRLF.
 */
export function renderCalendar(events: readonly ScheduleEvent[], options: CalendarOptions): string {
  const lines = [
    'BEGIN:VCALENDAR',
    `PRODID:${options.prodId ?? DEFAULT_PRODID}`,
    'VERSION:2.0',
    'CALSCALE:GREGORIAN',
    'METHOD:PUBLISH',
    `X-WR-CALNAME:${escapeText(options.calendarName)}`,
    'X-WR-TIMEZONE:UTC',
  ];

  for (const event of events) {
    lines.push(...renderEvent(event, options));
  }
  lines.push('END:VCALENDAR');

  return lines.map((line) => foldLine(line)).join(CRLF) + CRLF;
}
