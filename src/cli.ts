#!/usr/bin/env node
/**
 * confcal CLI
 * Conference schedule page → iCalendar file
 *
 *   confcal                               # export with defaults
 *   confcal --url <schedule> --out <file>
 *   confcal export --input saved.html     # parse a saved page
 */

import { Command } from 'commander';
import { createRequire } from 'module';
import { createExportCommand } from './commands/index.js';
import { logger, setVerbose } from './utils/logger.js';
import { setOutputOptions } from './utils/output.js';

// Read version from package.json
const require = createRequire(import.meta.url);
const packageJson: { version: string } = require('../package.json');

const program = new Command();

let globalConfigPath: string | undefined;

const HELP_HEADER = `
confcal - conference schedule to iCalendar export

Examples:
  confcal                                  # DjangoCon US 2025 → djangocon-2025.ics
  confcal --out talks.ics                  # custom output path
  confcal --url https://example.org/schedule/ --timezone Europe/Berlin
  confcal --descriptions                   # include talk abstracts (one request per talk)
  confcal --input schedule.html            # parse a saved page, no network
`;

program
  .name('confcal')
  .description('Scrape a conference schedule page and export it as an .ics file')
  .version(packageJson.version)
  .option('-c, --config <path>', 'Path to config file (YAML)')
  .option('--json', 'Output in JSON format')
  .option('-v, --verbose', 'Verbose output')
  .addHelpText('before', HELP_HEADER)
  .hook('preAction', (thisCommand) => {
    const opts = thisCommand.opts<{ config?: string; json?: boolean; verbose?: boolean }>();
    globalConfigPath = opts.config;
    setOutputOptions({
      json: opts.json,
      verbose: opts.verbose,
    });
    setVerbose(opts.verbose === true);
  });

// `confcal --url …` runs export
program.addCommand(createExportCommand(() => globalConfigPath), { isDefault: true });

program.parseAsync().catch((error: unknown) => {
  logger.error(error instanceof Error ? error.message : String(error), 'cli');
  process.exitCode = 1;
});
