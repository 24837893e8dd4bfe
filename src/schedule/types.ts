/**
 * Schedule domain types
 */

export const EVENT_CATEGORIES = ['talk', 'keynote', 'break', 'meal', 'special', 'sprint'] as const;

export type EventCategory = (typeof EVENT_CATEGORIES)[number];

/**
 * One scheduled session or activity extracted from the schedule page.
 * Built once per parse pass and never mutated afterwards.
 */
export interface ScheduleEvent {
  readonly title: string;
  /** UTC instant */
  readonly start: Date;
  /** UTC instant, never before `start` */
  readonly end: Date;
  /** Room or track label */
  readonly location?: string;
  readonly presenters: readonly string[];
  readonly category: EventCategory;
  /** Day section label, e.g. "Talks: Day 1" */
  readonly dayLabel: string;
  /** Audience badge; "All" is dropped as redundant */
  readonly audienceLevel?: string;
  /** Absolute URL of the session detail page */
  readonly url?: string;
  /** Session abstract from the detail page (description enrichment only) */
  readonly details?: string;
}

export type SkipReason =
  | 'missing-title'
  | 'missing-time'
  | 'invalid-time'
  | 'end-before-start'
  | 'duplicate';

/** A session card that was dropped instead of aborting the run */
export interface SkippedSession {
  reason: SkipReason;
  day?: string;
  title?: string;
  detail?: string;
}

export interface ParseResult {
  events: ScheduleEvent[];
  skipped: SkippedSession[];
  /** Number of recognized day sections; 0 means the layout was not recognized */
  daysFound: number;
}

export interface ParseOptions {
  /** Page URL, used to resolve relative session links */
  baseUrl?: string;
  /** IANA zone the page's local times are stated in */
  timeZone: string;
  /** Year appended to day headers, which only show month and day */
  year: number;
}
