/**
 * Tests for the export pipeline
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { promises as fs, readFileSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import { randomUUID } from 'crypto';
import { fileURLToPath } from 'url';
import { runExport, orderEvents, resolveUidDomain, enrichDescriptions } from './pipeline.js';
import { mergeConfig } from '../config/manager.js';
import { FetchError, ScheduleFetcher } from '../schedule/fetcher.js';
import { ParseError } from '../schedule/parser.js';
import type { ScheduleEvent } from '../schedule/types.js';
import type { ExportConfig } from '../types/index.js';

const fixture = (name: string): string =>
  readFileSync(fileURLToPath(new URL(`../schedule/__tests__/fixtures/${name}`, import.meta.url)), 'utf-8');

const scheduleHtml = fixture('schedule.html');
const talkHtml = fixture('talk.html');

const mockFetch = vi.fn();
vi.stubGlobal('fetch', mockFetch);

function htmlResponse(body: string, status = 200) {
  return {
    ok: status >= 200 && status < 300,
    status,
    text: () => Promise.resolve(body),
  };
}

function event(title: string, startIso: string, endIso: string, location?: string): ScheduleEvent {
  return {
    title,
    start: new Date(startIso),
    end: new Date(endIso),
    location,
    presenters: [],
    category: 'talk',
    dayLabel: 'Talks: Day 1',
  };
}

function unfold(text: string): string {
  return text.replace(/\r\n /g, '');
}

describe('runExport', () => {
  let testDir: string;
  let config: ExportConfig;

  beforeEach(async () => {
    testDir = join(tmpdir(), `confcal-export-${randomUUID()}`);
    await fs.mkdir(testDir, { recursive: true });
    config = mergeConfig({}, { out: join(testDir, 'conf.ics') });
    mockFetch.mockReset();
    vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.rm(testDir, { recursive: true, force: true });
  });

  it('writes one VEVENT per parsed session', async () => {
    const report = await runExport({ config, html: scheduleHtml });

    const text = await fs.readFile(config.out, 'utf-8');
    expect(text.split('\r\n').filter((l) => l === 'BEGIN:VEVENT')).toHaveLength(6);
    expect(report.events).toHaveLength(6);
    expect(report.daysFound).toBe(2);
    expect(report.source).toBe('inline');
    expect(report.outPath).toBe(config.out);
    expect(report.bytes).toBe(Buffer.byteLength(text, 'utf-8'));
  });

  it('reports the session without a time range as skipped', async () => {
    const report = await runExport({ config, html: scheduleHtml });

    expect(report.skipped).toEqual([
      {
        reason: 'missing-time',
        day: 'Talks: Day 1',
        title: 'Mystery Session',
        detail: 'expected 2 <time> elements, found 1',
      },
    ]);
  });

  it('produces byte-identical output on re-run', async () => {
    const second = join(testDir, 'again.ics');

    await runExport({ config, html: scheduleHtml });
    await runExport({ config: { ...config, out: second }, html: scheduleHtml });

    const first = await fs.readFile(config.out);
    expect((await fs.readFile(second)).equals(first)).toBe(true);
  });

  it('writes UTC times in chronological order', async () => {
    await runExport({ config, html: scheduleHtml });

    const lines = unfold(await fs.readFile(config.out, 'utf-8')).split('\r\n');
    const starts = lines.filter((l) => l.startsWith('DTSTART:')).map((l) => l.slice('DTSTART:'.length));

    expect(starts).toEqual([
      '20250908T140000Z',
      '20250908T150000Z',
      '20250908T153000Z',
      '20250908T153000Z',
      '20250908T170000Z',
      '20250910T140000Z',
    ]);
    for (const line of lines.filter((l) => l.startsWith('DTEND:'))) {
      expect(line).toMatch(/^DTEND:\d{8}T\d{6}Z$/);
    }
  });

  it('names the calendar and categorizes events', async () => {
    await runExport({ config: { ...config, calendar_name: 'Test Conf' }, html: scheduleHtml });

    const lines = unfold(await fs.readFile(config.out, 'utf-8')).split('\r\n');
    expect(lines).toContain('X-WR-CALNAME:Test Conf');
    expect(lines.filter((l) => l.startsWith('CATEGORIES:'))).toEqual([
      'CATEGORIES:KEYNOTE',
      'CATEGORIES:BREAK',
      'CATEGORIES:TALK',
      'CATEGORIES:TALK',
      'CATEGORIES:MEAL',
      'CATEGORIES:SPRINT',
    ]);
    expect(lines).toContain('URL:https://2025.djangocon.us/talks/opening-keynote/');
  });

  it('fetches the configured URL through the step runner', async () => {
    mockFetch.mockResolvedValueOnce(htmlResponse(scheduleHtml));
    const labels: string[] = [];

    const report = await runExport({
      config,
      step: (label, fn) => {
        labels.push(label);
        return fn();
      },
    });

    expect(report.source).toBe('https://2025.djangocon.us/schedule/');
    expect(mockFetch).toHaveBeenCalledTimes(1);
    expect(mockFetch.mock.calls[0][0]).toBe('https://2025.djangocon.us/schedule/');
    expect(labels).toEqual(['Fetching https://2025.djangocon.us/schedule/']);
  });

  it('fails with FetchError and writes nothing when the host is unreachable', async () => {
    mockFetch.mockRejectedValueOnce(new Error('getaddrinfo ENOTFOUND unreachable.invalid'));
    const unreachable = { ...config, url: 'https://unreachable.invalid/schedule/' };

    const error = await runExport({ config: unreachable }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(FetchError);
    expect(error).toMatchObject({ code: 'NETWORK', url: 'https://unreachable.invalid/schedule/' });
    await expect(fs.access(config.out)).rejects.toThrow();
  });

  it('fails with FetchError on an HTTP error status', async () => {
    mockFetch.mockResolvedValueOnce(htmlResponse('gone', 503));

    await expect(runExport({ config })).rejects.toMatchObject({ name: 'FetchError', code: 'HTTP', status: 503 });
  });

  it('fails with ParseError when no day section is recognized', async () => {
    const html = '<html><body><h2><a href="/">Schedule</a></h2><p>Coming soon</p></body></html>';

    const error = await runExport({ config, html }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ParseError);
    expect(String(error)).toContain('No schedule day sections found in inline');
    await expect(fs.access(config.out)).rejects.toThrow();
  });

  it('reads a saved page with inputPath', async () => {
    const inputPath = join(testDir, 'saved.html');
    await fs.writeFile(inputPath, scheduleHtml);

    const report = await runExport({ config, inputPath });

    expect(report.source).toBe(inputPath);
    expect(report.events).toHaveLength(6);
    expect(mockFetch).not.toHaveBeenCalled();
  });

  it('fails with a READ FetchError when inputPath is missing', async () => {
    const inputPath = join(testDir, 'missing.html');

    await expect(runExport({ config, inputPath })).rejects.toMatchObject({
      name: 'FetchError',
      code: 'READ',
      url: inputPath,
    });
  });

  it('fails with WriteError when the output path is a directory', async () => {
    await fs.mkdir(config.out);
    await fs.writeFile(join(config.out, 'inner'), 'x');

    await expect(runExport({ config, html: scheduleHtml })).rejects.toMatchObject({ name: 'WriteError' });
  });

  it('drops repeated sessions and reports them', async () => {
    const section = '<li><section><p class="text-sm">Room A</p><h4>Welcome</h4></section></li>';
    const html = `
      <div class="relative">
        <h2><a href="#Day-1">Talks: Day 1 / Monday, Sep 8</a></h2>
        <div class="flex flex-wrap gap-4 lg:gap-8">
          <div><h3><time datetime="2025-09-08T09:00:00-05:00">9:00 am</time> to <time datetime="2025-09-08T09:15:00-05:00">9:15 am</time></h3></div>
          <ul>${section}${section}</ul>
        </div>
      </div>`;

    const report = await runExport({ config, html });

    expect(report.events.map((e) => e.title)).toEqual(['Welcome']);
    expect(report.skipped).toEqual([{ reason: 'duplicate', day: 'Talks: Day 1', title: 'Welcome' }]);
  });

  it('keeps same-slot sessions that differ only in presenters', async () => {
    const card = (name: string) =>
      `<li><section><h4>Open Space</h4><div class="pt-6 mt-auto"><h6>${name}</h6></div></section></li>`;
    const html = `
      <div class="relative">
        <h2><a href="#Day-1">Talks: Day 1 / Monday, Sep 8</a></h2>
        <div class="flex flex-wrap gap-4 lg:gap-8">
          <div><h3><time datetime="2025-09-08T09:00:00-05:00">9:00 am</time> to <time datetime="2025-09-08T09:45:00-05:00">9:45 am</time></h3></div>
          <ul>${card('Ann')}${card('Bob')}</ul>
        </div>
      </div>`;

    const report = await runExport({ config, html });

    expect(report.events.map((e) => e.presenters)).toEqual([['Ann'], ['Bob']]);
    expect(report.skipped).toEqual([]);
    const text = await fs.readFile(config.out, 'utf-8');
    expect(text.split('\r\n').filter((l) => l === 'BEGIN:VEVENT')).toHaveLength(2);
  });

  it('adds talk abstracts when fetch_descriptions is set', async () => {
    mockFetch.mockImplementation(() => Promise.resolve(htmlResponse(talkHtml)));

    const report = await runExport({ config: { ...config, fetch_descriptions: true }, html: scheduleHtml });

    // Three sessions link to a talk page
    expect(mockFetch).toHaveBeenCalledTimes(3);
    const keynote = report.events[0];
    expect(keynote.details).toBe('A tour of small things that make a big difference.\n\nBring your questions.');
    expect(report.events[1].details).toBeUndefined();

    const text = unfold(await fs.readFile(config.out, 'utf-8'));
    expect(text).toContain('A tour of small things that make a big difference.\\n\\nBring your questions.');
  });
});

describe('orderEvents', () => {
  beforeEach(() => {
    vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('sorts by start and keeps document order for ties', () => {
    const events = [
      event('Late', '2025-09-08T18:00:00Z', '2025-09-08T19:00:00Z'),
      event('Room A', '2025-09-08T15:00:00Z', '2025-09-08T16:00:00Z', 'A'),
      event('Room B', '2025-09-08T15:00:00Z', '2025-09-08T16:00:00Z', 'B'),
    ];

    const { events: ordered, duplicates } = orderEvents(events, 'conf.example');

    expect(ordered.map((e) => e.title)).toEqual(['Room A', 'Room B', 'Late']);
    expect(duplicates).toEqual([]);
  });

  it('keeps same-title sessions in different rooms', () => {
    const events = [
      event('Workshop', '2025-09-08T15:00:00Z', '2025-09-08T16:00:00Z', 'A'),
      event('Workshop', '2025-09-08T15:00:00Z', '2025-09-08T16:00:00Z', 'B'),
    ];

    expect(orderEvents(events, 'conf.example').events).toHaveLength(2);
  });

  it('logs a warning for each duplicate', () => {
    const stderr = vi.mocked(process.stderr.write);
    const events = [
      event('Welcome', '2025-09-08T15:00:00Z', '2025-09-08T16:00:00Z'),
      event('Welcome', '2025-09-08T15:00:00Z', '2025-09-08T16:00:00Z'),
    ];

    orderEvents(events, 'conf.example');

    expect(stderr).toHaveBeenCalledTimes(1);
    expect(String(stderr.mock.calls[0][0])).toContain('[WARN] [export] Skipping duplicate "Welcome" (Talks: Day 1)');
  });
});

describe('resolveUidDomain', () => {
  it('prefers the configured domain', () => {
    expect(resolveUidDomain(mergeConfig({}, { uid_domain: 'cal.example' }))).toBe('cal.example');
  });

  it('falls back to the schedule host', () => {
    expect(resolveUidDomain(mergeConfig({}, { url: 'https://conf.example/schedule/' }))).toBe('conf.example');
  });
});

describe('enrichDescriptions', () => {
  beforeEach(() => {
    mockFetch.mockReset();
  });

  it('leaves events without a talk page untouched', async () => {
    const fetcher = new ScheduleFetcher();
    const plain = event('Lunch', '2025-09-08T17:00:00Z', '2025-09-08T18:00:00Z');

    const [result] = await enrichDescriptions([plain], fetcher);

    expect(result).toBe(plain);
    expect(mockFetch).not.toHaveBeenCalled();
  });

  it('keeps the event when its talk page fails', async () => {
    mockFetch.mockRejectedValueOnce(new Error('connection reset'));
    const fetcher = new ScheduleFetcher();
    const talk = { ...event('Talk', '2025-09-08T15:00:00Z', '2025-09-08T16:00:00Z'), url: 'https://conf.example/talks/x/' };

    const [result] = await enrichDescriptions([talk], fetcher);

    expect(result).toBe(talk);
  });
});
