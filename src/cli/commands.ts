import { Command, InvalidArgumentError } from 'commander';
import { WorkflowService } from '../services/WorkflowService.js';
import { Logger } from '../utils/logger.js';
import { printConfigSummary } from '../config/index.js';
import type { CLIOptions } from '../types/index.js';

function parseInteger(min: number) {
  return (value: string): number => {
    const parsed = Number(value);
    if (!Number.isInteger(parsed) || parsed < min) {
      throw new InvalidArgumentError(`Expected an integer >= ${min}.`);
    }
    return parsed;
  };
}

export function parseOptions(raw: Record<string, unknown>): CLIOptions {
  const options: CLIOptions = {};

  if (typeof raw.dt === 'number') options.dt = raw.dt;
  if (typeof raw.maxPages === 'number') options.maxPages = raw.maxPages;
  if (typeof raw.minPageRecords === 'number') options.minPageRecords = raw.minPageRecords;
  if (typeof raw.out === 'string') options.out = raw.out;
  if (typeof raw.debugDir === 'string') options.debugDir = raw.debugDir;
  if (raw.appendDedupe === true) options.appendDedupe = true;
  if (raw.insecure === true) options.insecure = true;
  if (raw.verbose === true) options.verbose = true;

  return options;
}

export function createCLI(): Command {
  const program = new Command();

  program
    .name('iradio-playlog')
    .description('Scrape the station playback log into a CSV archive')
    .option('--dt <days>', 'days ago to scrape (0 = today)', parseInteger(0), 0)
    .option('--max-pages <n>', 'stop after this many pages', parseInteger(1))
    .option('--min-page-records <n>', 'a page with fewer records is treated as the last', parseInteger(0))
    .option('--out <path>', 'CSV output path')
    .option('--append-dedupe', 'merge into the existing CSV instead of replacing it')
    .option('--insecure', 'disable TLS certificate verification')
    .option('--debug-dir <dir>', 'write the last fetched page and failure details here')
    .option('-v, --verbose', 'debug logging')
    .action(async (raw: Record<string, unknown>) => {
      const options = parseOptions(raw);
      if (options.verbose) {
        Logger.setLevel('debug');
        printConfigSummary();
      }

      const summary = await new WorkflowService(options).run();
      console.log(`Saved: ${summary.outputPath} rows=${summary.scraped}`);
    });

  return program;
}
