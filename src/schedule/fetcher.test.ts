/**
 * Tests for the schedule fetcher
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import { ScheduleFetcher, FetchError, extractTalkDescription, DEFAULT_USER_AGENT } from './fetcher.js';

const talkHtml = readFileSync(
  fileURLToPath(new URL('./__tests__/fixtures/talk.html', import.meta.url)),
  'utf-8'
);

// Mock fetch globally
const mockFetch = vi.fn();
vi.stubGlobal('fetch', mockFetch);

function htmlResponse(body: string, status = 200) {
  return {
    ok: status >= 200 && status < 300,
    status,
    text: () => Promise.resolve(body),
  };
}

describe('ScheduleFetcher', () => {
  let fetcher: ScheduleFetcher;

  beforeEach(() => {
    fetcher = new ScheduleFetcher({ timeoutMs: 50, descriptionTimeoutMs: 50 });
    mockFetch.mockReset();
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('fetchSchedule', () => {
    it('returns the page body', async () => {
      mockFetch.mockResolvedValue(htmlResponse('<html>ok</html>'));

      const html = await fetcher.fetchSchedule('https://conf.example/schedule/');

      expect(html).toBe('<html>ok</html>');
      expect(mockFetch).toHaveBeenCalledTimes(1);
      const [url, init] = mockFetch.mock.calls[0];
      expect(url).toBe('https://conf.example/schedule/');
      expect(init.headers['User-Agent']).toBe(DEFAULT_USER_AGENT);
      expect(init.signal).toBeInstanceOf(AbortSignal);
    });

    it('sends a configured user agent', async () => {
      mockFetch.mockResolvedValue(htmlResponse(''));
      await new ScheduleFetcher({ userAgent: 'test-agent' }).fetchSchedule('https://conf.example/');
      expect(mockFetch.mock.calls[0][1].headers['User-Agent']).toBe('test-agent');
    });

    it('throws FetchError with HTTP code on non-2xx status', async () => {
      mockFetch.mockResolvedValue(htmlResponse('missing', 404));

      const error = await fetcher.fetchSchedule('https://conf.example/schedule/').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(FetchError);
      expect(error).toMatchObject({
        name: 'FetchError',
        code: 'HTTP',
        status: 404,
        url: 'https://conf.example/schedule/',
        message: 'Failed to fetch https://conf.example/schedule/: HTTP 404',
      });
    });

    it('throws FetchError with NETWORK code when the request fails', async () => {
      mockFetch.mockRejectedValue(new TypeError('fetch failed'));

      await expect(fetcher.fetchSchedule('https://unreachable.invalid/')).rejects.toMatchObject({
        code: 'NETWORK',
        message: 'Failed to fetch https://unreachable.invalid/: fetch failed',
      });
    });

    it('throws FetchError with TIMEOUT code when the request is aborted by the timeout', async () => {
      mockFetch.mockImplementation(
        (_url: string, init: { signal: AbortSignal }) =>
          new Promise((_resolve, reject) => {
            init.signal.addEventListener('abort', () => reject(new Error('This operation was aborted')));
          })
      );

      await expect(fetcher.fetchSchedule('https://slow.example/')).rejects.toMatchObject({
        code: 'TIMEOUT',
        message: 'Failed to fetch https://slow.example/: timed out after 50ms',
      });
    });
  });

  describe('fetchTalkDescription', () => {
    it('returns the abstract paragraphs', async () => {
      mockFetch.mockResolvedValue(htmlResponse(talkHtml));

      const description = await fetcher.fetchTalkDescription('https://conf.example/talks/tips/');

      expect(description).toBe('A tour of small things that make a big difference.\n\nBring your questions.');
    });

    it('returns empty string for an empty URL without a request', async () => {
      expect(await fetcher.fetchTalkDescription('')).toBe('');
      expect(mockFetch).not.toHaveBeenCalled();
    });

    it('returns empty string when the request fails', async () => {
      mockFetch.mockRejectedValue(new Error('Network error'));
      expect(await fetcher.fetchTalkDescription('https://conf.example/talks/x/')).toBe('');
    });

    it('returns empty string on HTTP errors', async () => {
      mockFetch.mockResolvedValue(htmlResponse('gone', 410));
      expect(await fetcher.fetchTalkDescription('https://conf.example/talks/x/')).toBe('');
    });
  });
});

describe('extractTalkDescription', () => {
  it('returns empty string without an about section', () => {
    expect(extractTalkDescription('<html><body><h2>Other section</h2></body></html>')).toBe('');
  });

  it('returns empty string when the heading has no prose block after it', () => {
    expect(extractTalkDescription('<h2>About this session</h2><p>Loose text</p>')).toBe('');
  });
});
