/**
 * confcal - conference schedule to iCalendar export
 * Programmatic API exports
 */

// Types
export type { ExportConfig, ConfigFile } from './types/config.js';
export { DEFAULT_CONFIG } from './types/config.js';
export type {
  EventCategory,
  ScheduleEvent,
  SkipReason,
  SkippedSession,
  ParseResult,
  ParseOptions,
} from './schedule/types.js';
export { EVENT_CATEGORIES } from './schedule/types.js';

// Config
export { ConfigManager, ConfigError, mergeConfig, parseConfig, validateConfig } from './config/index.js';

// Fetcher / parser
export {
  ScheduleFetcher,
  FetchError,
  ParseError,
  parseSchedule,
  extractTalkDescription,
  classifyEvent,
  resolveInstant,
} from './schedule/index.js';

// Calendar emitter
export { renderCalendar, writeCalendar, WriteError, escapeText, foldLine, formatUtc, buildEventUid } from './calendar/index.js';
export type { CalendarOptions, WriteResult } from './calendar/index.js';

// Pipeline
export { runExport } from './export/index.js';
export type { ExportOptions, ExportReport } from './export/index.js';

// Utils
export { resolveConfigPath, getDefaultConfigDir, getDefaultConfigPath } from './utils/config-path.js';
export { atomicWriteFile, readFileSafe, fileExists } from './utils/fs.js';
