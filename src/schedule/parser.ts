/**
 * Schedule page parser
 *
 * Walks the conference schedule markup:
 *
 *   div.relative                      day container
 *     h2 > a "Talks: Day 1 / Monday, Sep 8"
 *     div.flex.flex-wrap.gap-4        time block
 *       h3 > time[datetime] × 2       start / end
 *       section                       session card
 *         p.text-sm                   room
 *         h4 (> a[href])              title, link to the talk page
 *         div.pt-6.mt-auto h6         presenters
 *         span.font-bold.bg-black     audience level badge
 *
 * Markup drift degrades to partial output: a malformed card is skipped and
 * recorded, never thrown.
 */

import * as cheerio from 'cheerio';
import type { Cheerio, CheerioAPI } from 'cheerio';
import type { AnyNode, Element } from 'domhandler';
import { logger } from '../utils/logger.js';
import { classifyEvent } from './category.js';
import { cleanText, nodeText } from './text.js';
import { parseDayHeader, parseIsoDate, resolveInstant, type DayHeader } from './time.js';
import type { ParseOptions, ParseResult, ScheduleEvent, SkippedSession } from './types.js';

export const SELECTORS = {
  dayContainer: 'div.relative',
  timeBlock: 'div.flex.flex-wrap.gap-4',
  session: 'section',
  room: 'p.text-sm',
  presenters: 'div.pt-6.mt-auto h6',
  audience: 'span.font-bold.bg-black',
} as const;

/**
 * The page does not look like a schedule at all: no day section was found
 */
export class ParseError extends Error {
  constructor(
    message: string,
    public readonly source?: string
  ) {
    super(message);
    this.name = 'ParseError';
  }
}

/** Audience badge value that carries no information */
const AUDIENCE_ALL = 'All';

interface TimeRange {
  start: Date;
  end: Date;
}

/**
 * Parse schedule HTML into events, in document order
 */
export function parseSchedule(html: string, options: ParseOptions): ParseResult {
  const $ = cheerio.load(html);
  const result: ParseResult = { events: [], skipped: [], daysFound: 0 };

  for (const h2 of $('h2').toArray()) {
    const heading = $(h2);
    const day = readDayHeading(heading, options);
    if (!day) {
      continue;
    }

    const container = heading.closest(SELECTORS.dayContainer);
    if (container.length === 0) {
      logger.warn(`Could not find day container for "${day.label}"`, 'parser');
      continue;
    }
    result.daysFound++;

    for (const block of selectTimeBlocks($, container)) {
      parseTimeBlock($, $(block), day, options, result);
    }
  }

  return result;
}

/**
 * Time blocks of one day, in document order. Layout wrappers may carry the
 * same classes as a block, so a slot is the innermost block holding an h3.
 * A block without any h3 is kept only when it sits outside every slot and
 * every other such block; its sessions are then reported as missing a time.
 */
function selectTimeBlocks($: CheerioAPI, container: Cheerio<AnyNode>): Element[] {
  const all = container.find(SELECTORS.timeBlock).toArray();
  const hasHeading = (el: Element): boolean => $(el).find('h3').length > 0;

  const slots = all.filter((el) => hasHeading(el) && $(el).find(SELECTORS.timeBlock).has('h3').length === 0);
  const insideSlot = (el: Element): boolean => slots.some((slot) => $.contains(slot, el));
  const bare = all.filter(
    (el) =>
      !hasHeading(el) &&
      !insideSlot(el) &&
      $(el)
        .parents(SELECTORS.timeBlock)
        .filter((_, parent) => !hasHeading(parent)).length === 0
  );

  return all.filter((el) => slots.includes(el) || bare.includes(el));
}

/**
 * Recognize a day section heading, or return null for other h2s
 */
function readDayHeading(heading: Cheerio<Element>, options: ParseOptions): DayHeader | null {
  const link = heading.find('a').first();
  if (link.length === 0) {
    return null;
  }

  const text = nodeText(link);
  if (!text || text.includes('Schedule')) {
    return null;
  }

  const header = parseDayHeader(text, options.year);
  if (!header) {
    return null;
  }

  // The machine-readable date wins over the displayed one
  const isoDate = parseIsoDate(link.find('time').attr('datetime'));
  return isoDate ? { label: header.label, date: isoDate } : header;
}

function parseTimeBlock(
  $: CheerioAPI,
  block: Cheerio<Element>,
  day: DayHeader,
  options: ParseOptions,
  result: ParseResult
): void {
  const sections = block.find(SELECTORS.session).toArray().map((el) => $(el));
  if (sections.length === 0) {
    return;
  }

  const times = block.find('h3').first().find('time').toArray().map((el) => $(el));
  if (times.length !== 2) {
    for (const section of sections) {
      skip(result, {
        reason: 'missing-time',
        day: day.label,
        title: readTitle(section)?.title,
        detail: `expected 2 <time> elements, found ${times.length}`,
      });
    }
    return;
  }

  const context = { timeZone: options.timeZone, day: day.date };
  const start = resolveInstant(times[0].attr('datetime'), { ...context, clockText: times[0].text() });
  const end = resolveInstant(times[1].attr('datetime'), { ...context, clockText: times[1].text() });

  if (!start || !end) {
    for (const section of sections) {
      skip(result, {
        reason: 'invalid-time',
        day: day.label,
        title: readTitle(section)?.title,
        detail: `unparseable time range "${cleanText(times[0].text())}" to "${cleanText(times[1].text())}"`,
      });
    }
    return;
  }

  if (end.getTime() < start.getTime()) {
    for (const section of sections) {
      skip(result, {
        reason: 'end-before-start',
        day: day.label,
        title: readTitle(section)?.title,
        detail: `${end.toISOString()} is before ${start.toISOString()}`,
      });
    }
    return;
  }

  for (const section of sections) {
    const event = parseSession($, section, day, { start, end }, options);
    if (event) {
      result.events.push(event);
    } else {
      skip(result, { reason: 'missing-title', day: day.label });
    }
  }
}

function readTitle(section: Cheerio<Element>): { title: string; href?: string } | null {
  const h4 = section.find('h4').first();
  if (h4.length === 0) {
    return null;
  }

  const link = h4.find('a').first();
  const title = nodeText(link.length > 0 ? link : h4);
  if (!title) {
    return null;
  }
  return { title, href: link.attr('href') };
}

/**
 * Build one event from a session card
 *
 * @returns null when the card has no title
 */
export function parseSession(
  $: CheerioAPI,
  section: Cheerio<Element>,
  day: DayHeader,
  range: TimeRange,
  options: Pick<ParseOptions, 'baseUrl'>
): ScheduleEvent | null {
  const heading = readTitle(section);
  if (!heading) {
    return null;
  }

  const url = resolveUrl(heading.href, options.baseUrl);
  const location = nodeText(section.find(SELECTORS.room).first());
  const presenters = section
    .find(SELECTORS.presenters)
    .toArray()
    .map((el) => nodeText($(el)))
    .filter((name) => name.length > 0);
  const audience = nodeText(section.find(SELECTORS.audience).first());

  return {
    title: heading.title,
    start: range.start,
    end: range.end,
    location: location || undefined,
    presenters,
    category: classifyEvent({ title: heading.title, dayLabel: day.label, hasDetailPage: url !== undefined }),
    dayLabel: day.label,
    audienceLevel: audience && audience !== AUDIENCE_ALL ? audience : undefined,
    url,
  };
}

/**
 * Resolve a talk link against the page URL
 */
export function resolveUrl(href: string | undefined, baseUrl?: string): string | undefined {
  const trimmed = href?.trim();
  if (!trimmed || trimmed.startsWith('#')) {
    return undefined;
  }
  try {
    return new URL(trimmed, baseUrl).toString();
  } catch {
    return undefined;
  }
}

function skip(result: ParseResult, entry: SkippedSession): void {
  result.skipped.push(entry);
  const what = entry.title ? `"${entry.title}"` : 'session';
  const where = entry.day ? ` (${entry.day})` : '';
  logger.warn(`Skipping ${what}${where}: ${entry.reason}${entry.detail ? ` - ${entry.detail}` : ''}`, 'parser');
}
