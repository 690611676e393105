#!/usr/bin/env node
/**
 * run-crawler — one crawl, meant to be started by cron.
 *
 * Usage:
 *   npm run crawl -- config.json
 *   npm run crawl -- config.json --dry-run
 *   npm run crawl -- config.json --max-papers 5
 *
 * Writes logs/daily_<date>.log (latest.log points at it) and status.json
 * beside the config file.
 *
 * Exit codes:
 *   0  Success
 *   1  Error (usage / config / run failure)
 */

import path from 'node:path';

import { UsageError, parseCrawlArgs } from '../lib/cli-args.js';
import type { CrawlArgs } from '../lib/cli-args.js';
import { loadConfig } from '../lib/config.js';
import { errorMessage } from '../lib/errors.js';
import { getLogger, initLogger } from '../lib/logger.js';
import { runCrawl } from '../lib/runners/crawl.js';
import { linkLatest, pruneOldLogs, writeStatus } from '../lib/status.js';
import { ensureDir, localDateTime, logPaths, statusPath } from '../lib/storage.js';
import type { AppConfig } from '../lib/types.js';

function readArgs(): CrawlArgs {
  try {
    return parseCrawlArgs(process.argv.slice(2));
  } catch (e) {
    if (!(e instanceof UsageError)) throw e;
    console.error(e.message);
    console.error('Usage: run-crawler <config.json> [--dry-run] [--max-papers N]');
    process.exit(1);
  }
}

const args = readArgs();

const lastRun = localDateTime();

let config: AppConfig | null = null;
let configError: string | null = null;
try {
  config = loadConfig(args.configPath);
} catch (e) {
  configError = errorMessage(e);
}

const logDir = config?.logging.dir ?? path.join(path.dirname(path.resolve(args.configPath)), 'logs');
ensureDir(logDir);
const logs = logPaths(logDir);
initLogger({ level: config?.logging.level ?? 'info', json: config?.logging.json ?? false, file: logs.daily });
linkLatest(logs.daily, logs.latest);

const log = getLogger();
log.info({ config: path.resolve(args.configPath), dryRun: args.dryRun }, 'Starting crawl');

let exitCode = 0;
if (!config) {
  log.error({ err: configError }, 'Could not load config');
  exitCode = 1;
} else {
  try {
    const result = await runCrawl({ config, dryRun: args.dryRun, maxPapers: args.maxPapers });
    log.info({ runId: result.runId, status: result.status, stats: result.stats }, 'Run summary');
  } catch (e) {
    log.error({ err: errorMessage(e) }, 'Crawl failed');
    exitCode = 1;
  }
}

writeStatus(statusPath(args.configPath), {
  lastRun,
  endTime: localDateTime(),
  status: exitCode === 0 ? 'success' : 'failed',
  exitCode,
  logFile: logs.daily,
});

const pruned = pruneOldLogs(logDir, config?.logging.retentionDays ?? 30);
if (pruned.length > 0) log.info({ count: pruned.length }, 'Removed old logs');

log.info({ exitCode, logFile: logs.daily }, exitCode === 0 ? 'Run succeeded' : 'Run failed');
process.exitCode = exitCode;
