/**
 * Event category derivation
 *
 * The page has no explicit category field; it is inferred from the day
 * section, the session title and whether the card links to a talk page.
 */

import type { EventCategory } from './types.js';

export interface CategoryInput {
  title: string;
  dayLabel: string;
  hasDetailPage: boolean;
}

const KEYNOTE_RE = /\bkeynote\b/i;

/** Checked only for cards without a talk page */
const ACTIVITY_RULES: Array<{ category: EventCategory; pattern: RegExp }> = [
  { category: 'meal', pattern: /\b(breakfast|lunch|dinner|reception|snacks?)\b/i },
  { category: 'break', pattern: /\b(break|coffee)\b/i },
];

/**
 * Classify a session. First match wins:
 * sprint day → keynote → linked card (talk) → meal → break → special
 */
export function classifyEvent(input: CategoryInput): EventCategory {
  if (/^sprints\b/i.test(input.dayLabel)) {
    return 'sprint';
  }
  if (KEYNOTE_RE.test(input.title)) {
    return 'keynote';
  }
  if (input.hasDetailPage) {
    return 'talk';
  }

  for (const rule of ACTIVITY_RULES) {
    if (rule.pattern.test(input.title)) {
      return rule.category;
    }
  }
  return 'special';
}
