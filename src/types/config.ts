/**
 * Configuration types for confcal
 */

/**
 * Settings for one export run. Keys are snake_case, as in the config file.
 */
export interface ExportConfig {
  /** Schedule page to scrape */
  url: string;
  /** Output .ics path */
  out: string;
  /** IANA zone the schedule's local times are stated in */
  timezone: string;
  /** Year for day headers, which only show month and day */
  conference_year: number;
  /** Schedule page request timeout */
  timeout_ms: number;
  /** Per talk page request timeout */
  description_timeout_ms: number;
  /** Fetch each talk page and add its abstract to DESCRIPTION */
  fetch_descriptions: boolean;
  /** X-WR-CALNAME of the generated calendar */
  calendar_name: string;
  /** UID domain; defaults to the schedule URL's host */
  uid_domain?: string;
  user_agent?: string;
}

/**
 * Shape of the optional config file: every key may be omitted
 */
export type ConfigFile = Partial<ExportConfig> & { version?: 1 };

export const DEFAULT_CONFIG: ExportConfig = {
  url: 'https://2025.djangocon.us/schedule/',
  out: 'djangocon-2025.ics',
  timezone: 'America/Chicago',
  conference_year: 2025,
  timeout_ms: 30000,
  description_timeout_ms: 10000,
  fetch_descriptions: false,
  calendar_name: 'DjangoCon US 2025',
};
