/**
 * Export pipeline: schedule HTML → events → .ics file
 */

import { promises as fs } from 'fs';
import { renderCalendar, buildEventUid } from '../calendar/ics.js';
import { writeCalendar } from '../calendar/writer.js';
import { FetchError, ScheduleFetcher } from '../schedule/fetcher.js';
import { ParseError, parseSchedule } from '../schedule/parser.js';
import type { ScheduleEvent, SkippedSession } from '../schedule/types.js';
import type { ExportConfig } from '../types/index.js';
import { logger } from '../utils/logger.js';

/**
 * Wraps a long-running step (network reads); the CLI passes a spinner here
 */
export type StepRunner = <T>(label: string, fn: () => Promise<T>) => Promise<T>;

export interface ExportOptions {
  config: ExportConfig;
  /** Pre-fetched schedule HTML; skips the network read */
  html?: string;
  /** Saved schedule page on disk; skips the network read */
  inputPath?: string;
  fetcher?: ScheduleFetcher;
  /** Fixed DTSTAMP; by default each event's start is used */
  generatedAt?: Date;
  step?: StepRunner;
}

export interface ExportReport {
  /** Where the HTML came from: URL, file path or "inline" */
  source: string;
  outPath: string;
  bytes: number;
  events: ScheduleEvent[];
  skipped: SkippedSession[];
  daysFound: number;
}

const runDirectly: StepRunner = (_label, fn) => fn();

/**
 * UID domain: configured value, else the schedule URL's host
 */
export function resolveUidDomain(config: ExportConfig): string {
  if (config.uid_domain) {
    return config.uid_domain;
  }
  try {
    return new URL(config.url).hostname || 'confcal';
  } catch {
    return 'confcal';
  }
}

/**
 * Stable chronological sort, then drop events whose UID was already seen
 */
export function orderEvents(
  events: readonly ScheduleEvent[],
  uidDomain: string
): { events: ScheduleEvent[]; duplicates: SkippedSession[] } {
  const sorted = [...events].sort((a, b) => a.start.getTime() - b.start.getTime());

  const seen = new Set<string>();
  const unique: ScheduleEvent[] = [];
  const duplicates: SkippedSession[] = [];
  for (const event of sorted) {
    const uid = buildEventUid(event, uidDomain);
    if (seen.has(uid)) {
      duplicates.push({ reason: 'duplicate', day: event.dayLabel, title: event.title });
      logger.warn(`Skipping duplicate "${event.title}" (${event.dayLabel})`, 'export');
      continue;
    }
    seen.add(uid);
    unique.push(event);
  }

  return { events: unique, duplicates };
}

/**
 * Add each linked talk's abstract. Talk pages are fetched one at a time;
 * a failed page leaves that event without details.
 */
export async function enrichDescriptions(
  events: readonly ScheduleEvent[],
  fetcher: ScheduleFetcher
): Promise<ScheduleEvent[]> {
  const enriched: ScheduleEvent[] = [];
  for (const event of events) {
    if (!event.url) {
      enriched.push(event);
      continue;
    }
    const details = await fetcher.fetchTalkDescription(event.url);
    enriched.push(details ? { ...event, details } : event);
  }
  return enriched;
}

async function loadHtml(
  options: ExportOptions,
  fetcher: ScheduleFetcher,
  step: StepRunner
): Promise<{ html: string; source: string }> {
  if (options.html !== undefined) {
    return { html: options.html, source: 'inline' };
  }

  if (options.inputPath) {
    const inputPath = options.inputPath;
    try {
      return { html: await fs.readFile(inputPath, 'utf-8'), source: inputPath };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new FetchError(`Failed to read ${inputPath}: ${message}`, 'READ', inputPath);
    }
  }

  const url = options.config.url;
  const html = await step(`Fetching ${url}`, () => fetcher.fetchSchedule(url));
  return { html, source: url };
}

/**
 * Run one export
 *
 * @throws FetchError when the schedule cannot be read
 * @throws ParseError when no day section is recognized
 * @throws WriteError when the calendar file cannot be written
 */
export async function runExport(options: ExportOptions): Promise<ExportReport> {
  const { config } = options;
  const step = options.step ?? runDirectly;
  const fetcher = options.fetcher ?? new ScheduleFetcher({
    timeoutMs: config.timeout_ms,
    descriptionTimeoutMs: config.description_timeout_ms,
    userAgent: config.user_agent,
  });

  const { html, source } = await loadHtml(options, fetcher, step);

  const parsed = parseSchedule(html, {
    baseUrl: config.url,
    timeZone: config.timezone,
    year: config.conference_year,
  });
  if (parsed.daysFound === 0) {
    throw new ParseError(`No schedule day sections found in ${source}`, source);
  }

  const uidDomain = resolveUidDomain(config);
  const ordered = orderEvents(parsed.events, uidDomain);
  let events = ordered.events;

  if (config.fetch_descriptions) {
    events = await step(`Fetching ${events.length} talk descriptions`, () => enrichDescriptions(events, fetcher));
  }

  const content = renderCalendar(events, {
    calendarName: config.calendar_name,
    uidDomain,
    generatedAt: options.generatedAt,
  });
  const written = await writeCalendar(config.out, content);
  logger.info(`Wrote ${written.bytes} bytes to ${written.path}`, 'export');

  return {
    source,
    outPath: written.path,
    bytes: written.bytes,
    events,
    skipped: [...parsed.skipped, ...ordered.duplicates],
    daysFound: parsed.daysFound,
  };
}
