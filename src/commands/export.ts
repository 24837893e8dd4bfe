/**
 * Export command - scrape the schedule and write the .ics file
 *
 * confcal [export] [--url <source>] [--out <path>] [--input <file>] ...
 *
 * Exit codes: 0 on success, 1 on FetchError, ParseError, WriteError or
 * invalid configuration.
 */

import { Command } from 'commander';
import { ConfigManager } from '../config/index.js';
import { runExport, type ExportReport } from '../export/index.js';
import type { ExportConfig } from '../types/index.js';
import { logger } from '../utils/logger.js';
import { output, outputError } from '../utils/output.js';
import { withSpinner } from '../utils/spinner.js';

export interface ExportCommandOptions {
  url?: string;
  out?: string;
  input?: string;
  timezone?: string;
  year?: string;
  timeout?: string;
  descriptions?: boolean;
  calendarName?: string;
}

/**
 * Map CLI flags onto config keys; flags the user did not pass stay undefined
 */
export function buildOverrides(options: ExportCommandOptions): Partial<ExportConfig> {
  return {
    url: options.url,
    out: options.out,
    timezone: options.timezone,
    conference_year: options.year !== undefined ? Number.parseInt(options.year, 10) : undefined,
    timeout_ms: options.timeout !== undefined ? Math.round(Number.parseFloat(options.timeout) * 1000) : undefined,
    fetch_descriptions: options.descriptions,
    calendar_name: options.calendarName,
  };
}

export function formatReport(report: ExportReport): string {
  const lines = [
    `✓ Wrote ${report.events.length} events to ${report.outPath}`,
    `  Source: ${report.source}`,
    `  Days: ${report.daysFound}`,
    `  Skipped: ${report.skipped.length}`,
  ];
  for (const entry of report.skipped) {
    const what = entry.title ? `"${entry.title}"` : '(untitled session)';
    const where = entry.day ? ` [${entry.day}]` : '';
    lines.push(`    - ${what}${where}: ${entry.reason}`);
  }
  return lines.join('\n');
}

export function toJsonReport(report: ExportReport): Record<string, unknown> {
  return {
    success: true,
    source: report.source,
    out: report.outPath,
    bytes: report.bytes,
    days: report.daysFound,
    event_count: report.events.length,
    skipped_count: report.skipped.length,
    skipped: report.skipped,
    events: report.events.map((event) => ({
      title: event.title,
      start: event.start.toISOString(),
      end: event.end.toISOString(),
      location: event.location ?? null,
      category: event.category,
      presenters: event.presenters,
    })),
  };
}

export function createExportCommand(getConfigPath: () => string | undefined): Command {
  return new Command('export')
    .description('Scrape the schedule page and write an iCalendar file')
    .option('--url <source>', 'Schedule page URL (default: DjangoCon US 2025 schedule)')
    .option('--out <path>', 'Output .ics path (default: djangocon-2025.ics)')
    .option('--input <file>', 'Read a saved schedule page instead of fetching --url')
    .option('--timezone <tz>', 'IANA time zone of the schedule (default: America/Chicago)')
    .option('--year <year>', 'Conference year for day headers (default: 2025)')
    .option('--timeout <seconds>', 'Schedule request timeout in seconds (default: 30)')
    .option('--descriptions', 'Fetch each talk page and include its abstract')
    .option('--calendar-name <name>', 'Calendar display name')
    .action(async (options: ExportCommandOptions) => {
      try {
        const manager = new ConfigManager(getConfigPath());
        if (await manager.exists()) {
          logger.info(`Using config ${manager.getConfigPath()}`, 'config');
        } else {
          logger.info(`No config file at ${manager.getConfigPath()}`, 'config');
        }
        const config = await manager.resolve(buildOverrides(options));

        const report = await runExport({
          config,
          inputPath: options.input,
          step: withSpinner,
        });

        output(toJsonReport(report), formatReport(report));
      } catch (error) {
        const err = error instanceof Error ? error : new Error(String(error));
        outputError(err.message, err);
        process.exitCode = 1;
      }
    });
}
