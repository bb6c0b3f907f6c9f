#!/usr/bin/env node
/**
 * hist: browse and aggregate the local browser history.
 *
 * Runs in one of three modes:
 * - report (default): prints the selected sections as text, JSON, CSV or TSV
 * - interactive (-i): prompt-driven history browser
 * - serve (--serve): local web dashboard
 */

import { Command } from 'commander';
import * as path from 'path';
import { RawReportOptions, parsePort, parseReportOptions } from './options';
import { collectAnalysis } from './report';
import { HistoryBrowser } from './HistoryBrowser';
import { ServerManager } from './ServerManager';
import { BrowserLauncher } from './BrowserLauncher';
import { createApp } from '../api';
import { HistoryService } from '../services/HistoryService';
import { IgnoreListStore } from '../services/IgnoreListStore';
import { ReportWriter } from '../services/ReportWriter';
import { LoggingService, createLogger, parseLogLevel, toError } from '../services/LoggingService';
import { getEnvVar, getHistoryDbPath, getIgnoreListPath } from '../utils/ConfigLoader';
import {
  DEFAULT_DAILY_DAYS,
  DEFAULT_DOMAIN_LIMIT,
  DEFAULT_HISTORY_LIMIT,
  DEFAULT_PATH_LIMIT,
  DEFAULT_WEB_PORT,
} from '../utils/constants';

const STATIC_DIR = path.resolve(__dirname, '..', '..', 'public', 'static');

export interface CliOptions extends RawReportOptions {
  interactive?: boolean;
  serve?: boolean;
  port: string;
  open?: boolean;
  db: string;
  logLevel: string;
  logFile?: string;
}

function loggerFor(opts: Pick<CliOptions, 'logLevel' | 'logFile'>): LoggingService {
  return createLogger('hist', {
    level: parseLogLevel(opts.logLevel),
    logFile: opts.logFile ?? (getEnvVar('HIST_LOG_FILE', '') || undefined),
  });
}

async function serve(
  history: HistoryService,
  opts: CliOptions,
  ignoreDomains: readonly string[],
  logger: LoggingService
): Promise<void> {
  const port = parsePort(opts.port);
  const app = createApp({ history, logger: logger.child('web'), ignoreDomains, staticDir: STATIC_DIR });
  const manager = new ServerManager(app, port, logger.child('server'));

  await manager.start();
  console.log(`History dashboard: ${manager.getUrl()} (Ctrl+C to stop)`);

  if (opts.open) {
    await new BrowserLauncher(logger).open(manager.getUrl());
  }

  const shutdown = async (): Promise<void> => {
    try {
      await manager.stop();
      history.close();
      process.exit(0);
    } catch (error) {
      logger.error('Shutdown failed', toError(error));
      process.exit(1);
    }
  };
  process.once('SIGINT', () => void shutdown());
  process.once('SIGTERM', () => void shutdown());
}

/**
 * Report, interactive or serve mode, chosen by the flags
 */
export async function run(opts: CliOptions): Promise<void> {
  const logger = loggerFor(opts);
  const store = new IgnoreListStore(getIgnoreListPath(), logger.child('ignore'));
  const config = parseReportOptions(opts, opts.ignore ? store.load() : []);

  const history = HistoryService.open(opts.db, logger.child('history'));

  if (opts.serve) {
    try {
      await serve(history, opts, config.filter.ignoreDomains, logger);
    } catch (error) {
      history.close();
      throw error;
    }
    return;
  }

  try {
    if (opts.interactive) {
      const browser = new HistoryBrowser(history, logger.child('browser'), {
        ignoreDomains: config.filter.ignoreDomains,
      });
      await browser.start();
      return;
    }

    const result = collectAnalysis(history, config);
    new ReportWriter(logger).write(result, config.sections, config.format, config.outputFile);
  } finally {
    history.close();
  }
}

function ignoreStore(command: Command): IgnoreListStore {
  const globals = command.optsWithGlobals<Pick<CliOptions, 'logLevel' | 'logFile'>>();
  return new IgnoreListStore(getIgnoreListPath(), loggerFor(globals).child('ignore'));
}

export function buildProgram(): Command {
  const program = new Command();

  program
    .name('hist')
    .description('Browse, search and aggregate the local browser history')
    .version('1.0.0')
    .option('--json', 'Output as JSON')
    .option('--csv', 'Output as CSV')
    .option('--tsv', 'Output as TSV')
    .option('-o, --output <file>', 'Write output to a file instead of stdout')
    .option('--limit <n>', 'Number of history entries', String(DEFAULT_HISTORY_LIMIT))
    .option('--domains <n>', 'Number of domains in domain stats (0 for all)', String(DEFAULT_DOMAIN_LIMIT))
    .option('--paths <n>', 'Hosts listed per site in hierarchical stats (0 for all)', String(DEFAULT_PATH_LIMIT))
    .option('--days <n>', 'Days covered by daily stats', String(DEFAULT_DAILY_DAYS))
    .option('--history', 'Show recent visits')
    .option('--domain-stats', 'Show visits per domain')
    .option('--hierarchical', 'Show visits grouped by site')
    .option('--hourly', 'Show visits per hour of day')
    .option('--daily', 'Show visits per day')
    .option('--all', 'Show every section')
    .option('--search <keyword>', 'Keyword to match in URL or title')
    .option('--domain <domain>', 'Only visits to this domain')
    .option('--from <date>', 'Start date (YYYY-MM-DD)')
    .option('--to <date>', 'End date, inclusive (YYYY-MM-DD)')
    .option('--no-ignore', 'Do not apply the ignore list')
    .option('-i, --interactive', 'Start the interactive browser')
    .option('--serve', 'Start the web dashboard')
    .option('--port <port>', 'Web dashboard port', String(DEFAULT_WEB_PORT))
    .option('--open', 'Open the dashboard in the default browser')
    .option('--db <path>', 'History database file', getHistoryDbPath())
    .option('--log-level <level>', 'error, warn, info or debug', getEnvVar('HIST_LOG_LEVEL', 'warn'))
    .option('--log-file <file>', 'Also write JSON logs to this file')
    .action(async (opts: CliOptions) => {
      await run(opts);
    });

  const ignore = program.command('ignore').description('Manage the ignore list');

  ignore
    .command('list')
    .description('Show ignored domain patterns')
    .action((_opts: unknown, command: Command) => {
      const store = ignoreStore(command);
      const patterns = store.load();
      if (patterns.length === 0) {
        console.log(`Ignore list is empty (${store.path})`);
        return;
      }
      console.log('Ignore list:');
      for (const pattern of patterns) {
        console.log(`  - ${pattern}`);
      }
    });

  ignore
    .command('add')
    .description('Add a domain pattern to the ignore list')
    .argument('<domain>', 'Domain or pattern, e.g. youtube.com or google')
    .action((domain: string, _opts: unknown, command: Command) => {
      const added = ignoreStore(command).add(domain);
      console.log(added ? `Added to ignore list: ${domain.trim()}` : `Already in ignore list: ${domain.trim()}`);
    });

  ignore
    .command('remove')
    .description('Remove a domain pattern from the ignore list')
    .argument('<domain>', 'Pattern to remove')
    .action((domain: string, _opts: unknown, command: Command) => {
      const removed = ignoreStore(command).remove(domain);
      console.log(removed ? `Removed from ignore list: ${domain.trim()}` : `Not in ignore list: ${domain.trim()}`);
    });

  return program;
}

export async function main(argv: string[] = process.argv): Promise<void> {
  try {
    await buildProgram().parseAsync(argv);
  } catch (error) {
    console.error(`Error: ${toError(error).message}`);
    process.exit(1);
  }
}

if (require.main === module) {
  void main();
}
