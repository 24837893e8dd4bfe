/**
 * Schedule page fetcher
 *
 * One GET for the schedule page, plus optional GETs for individual talk
 * pages when description enrichment is on.
 */

import * as cheerio from 'cheerio';
import { logger } from '../utils/logger.js';
import { nodeText } from './text.js';

/** Schedule page timeout in milliseconds */
export const DEFAULT_TIMEOUT_MS = 30000;

/** Talk page timeout in milliseconds */
export const DEFAULT_DESCRIPTION_TIMEOUT_MS = 10000;

export const DEFAULT_USER_AGENT = 'confcal (+schedule to iCalendar export)';

/** Heading that introduces the abstract on a talk page */
const ABOUT_HEADING = 'About this session';

export type FetchErrorCode = 'NETWORK' | 'HTTP' | 'TIMEOUT' | 'READ';

/**
 * The schedule could not be retrieved
 */
export class FetchError extends Error {
  constructor(
    message: string,
    public readonly code: FetchErrorCode,
    public readonly url: string,
    public readonly status?: number
  ) {
    super(message);
    this.name = 'FetchError';
  }
}

export interface ScheduleFetcherOptions {
  timeoutMs?: number;
  descriptionTimeoutMs?: number;
  userAgent?: string;
}

export class ScheduleFetcher {
  private readonly timeoutMs: number;
  private readonly descriptionTimeoutMs: number;
  private readonly userAgent: string;

  constructor(options: ScheduleFetcherOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.descriptionTimeoutMs = options.descriptionTimeoutMs ?? DEFAULT_DESCRIPTION_TIMEOUT_MS;
    this.userAgent = options.userAgent ?? DEFAULT_USER_AGENT;
  }

  /**
   * Download the schedule page
   *
   * @throws FetchError on network failure, non-2xx status or timeout
   */
  async fetchSchedule(url: string): Promise<string> {
    logger.info(`GET ${url}`, 'fetch');
    return this.fetchText(url, this.timeoutMs);
  }

  /**
   * Fetch the abstract from a talk page: the paragraphs of the `div.prose`
   * following the "About this session" heading, separated by blank lines.
   *
   * Returns '' when the URL is empty, the request fails or the page has no
   * such section.
   */
  async fetchTalkDescription(url: string): Promise<string> {
    if (!url) {
      return '';
    }

    let html: string;
    try {
      html = await this.fetchText(url, this.descriptionTimeoutMs);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.info(`No description for ${url}: ${message}`, 'fetch');
      return '';
    }

    return extractTalkDescription(html);
  }

  /**
   * GET a page body with timeout; failures are normalized to FetchError
   */
  private async fetchText(url: string, timeoutMs: number): Promise<string> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

    try {
      const response = await fetch(url, {
        signal: controller.signal,
        headers: {
          Accept: 'text/html',
          'User-Agent': this.userAgent,
        },
      });

      if (!response.ok) {
        throw new FetchError(`Failed to fetch ${url}: HTTP ${response.status}`, 'HTTP', url, response.status);
      }

      return await response.text();
    } catch (error) {
      if (error instanceof FetchError) {
        throw error;
      }
      if (controller.signal.aborted) {
        throw new FetchError(`Failed to fetch ${url}: timed out after ${timeoutMs}ms`, 'TIMEOUT', url);
      }
      const message = error instanceof Error ? error.message : String(error);
      throw new FetchError(`Failed to fetch ${url}: ${message}`, 'NETWORK', url);
    } finally {
      clearTimeout(timeoutId);
    }
  }
}

/**
 * Pull the session abstract out of a talk page
 */
export function extractTalkDescription(html: string): string {
  const $ = cheerio.load(html);
  const heading = $('h2')
    .filter((_, el) => $(el).text().includes(ABOUT_HEADING))
    .first();
  if (heading.length === 0) {
    return '';
  }

  const prose = heading.nextAll('div.prose').first();
  if (prose.length === 0) {
    return '';
  }

  return prose
    .find('p')
    .toArray()
    .map((p) => nodeText($(p)))
    .filter((text) => text.length > 0)
    .join('\n\n');
}
