export {
  escapeText,
  foldLine,
  formatUtc,
  buildEventUid,
  buildDescription,
  renderEvent,
  renderCalendar,
  LINE_FOLD_LIMIT,
  DEFAULT_PRODID,
} from './ics.js';
export type { CalendarOptions } from './ics.js';
export { writeCalendar, WriteError } from './writer.js';
export type { WriteResult } from './writer.js';
