export * from './types.js';
export { parseSchedule, parseSession, resolveUrl, ParseError, SELECTORS } from './parser.js';
export {
  ScheduleFetcher,
  FetchError,
  extractTalkDescription,
  DEFAULT_TIMEOUT_MS,
  DEFAULT_DESCRIPTION_TIMEOUT_MS,
  DEFAULT_USER_AGENT,
} from './fetcher.js';
export type { FetchErrorCode, ScheduleFetcherOptions } from './fetcher.js';
export { classifyEvent } from './category.js';
export type { CategoryInput } from './category.js';
export {
  parseDayHeader,
  parseMonthDay,
  parseIsoDate,
  parseClockTime,
  resolveInstant,
  isValidTimeZone,
} from './time.js';
export type { DayHeader, ClockTime, InstantContext } from './time.js';
export { cleanText, nodeText } from './text.js';
