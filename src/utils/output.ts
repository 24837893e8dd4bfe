/**
 * Output utilities for CLI
 *
 * stdout carries command results; diagnostics go through the logger (stderr).
 */

export interface OutputOptions {
  json?: boolean;
  verbose?: boolean;
}

let globalOptions: OutputOptions = {};

export function setOutputOptions(options: OutputOptions): void {
  globalOptions = { ...globalOptions, ...options };
}

export function getOutputOptions(): OutputOptions {
  return globalOptions;
}

export function output(data: unknown, humanReadable?: string): void {
  if (globalOptions.json) {
    console.log(JSON.stringify(data, null, 2));
  } else {
    console.log(humanReadable ?? String(data));
  }
}

export function outputError(message: string, error?: Error): void {
  if (globalOptions.json) {
    console.error(JSON.stringify({
      error: message,
      type: error?.name,
      details: error?.message,
    }));
  } else {
    console.error(`Error: ${message}`);
    if (error && globalOptions.verbose) {
      console.error(error.stack);
    }
  }
}
