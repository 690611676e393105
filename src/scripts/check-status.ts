/**
 * check-status — last run status, recent runs and log files.
 *
 * Usage:
 *   npm run status -- config.json
 */

import fs from 'node:fs';

import { loadConfig } from '../lib/config.js';
import { migrate, openDb } from '../lib/db.js';
import { countSyncedSince, recentRuns } from '../lib/repo.js';
import { listDailyLogs, readStatus } from '../lib/status.js';
import { dbPath, logPaths, statusPath } from '../lib/storage.js';

const configPath = process.argv[2] ?? 'config.json';
const config = loadConfig(configPath);

console.log('== Last run ==');
const status = readStatus(statusPath(configPath));
if (!status) {
  console.log('  No status.json yet (the crawler has not run).');
} else {
  const mark = status.status === 'success' ? '✓' : '✗';
  console.log(`  ${mark} ${status.status} (exit ${status.exitCode})`);
  console.log(`  started:  ${status.lastRun}`);
  console.log(`  finished: ${status.endTime}`);
  console.log(`  log:      ${status.logFile}`);
}

console.log('\n== Recent runs ==');
const file = dbPath(config.storage.root);
if (!fs.existsSync(file)) {
  console.log('  No run ledger yet.');
} else {
  const db = openDb(file);
  migrate(db);
  const runs = recentRuns(db, 5);
  if (runs.length === 0) console.log('  None.');
  for (const r of runs) {
    console.log(`  ${r.started_at}  ${r.kind.padEnd(6)} ${r.status.padEnd(7)} ${r.stats_json}`);
  }
  const weekAgo = new Date(Date.now() - 7 * 24 * 60 * 60 * 1000).toISOString();
  console.log(`  papers synced in the last 7 days: ${countSyncedSince(db, weekAgo)}`);
  db.sqlite.close();
}

console.log('\n== Log files ==');
const logs = listDailyLogs(config.logging.dir);
for (const l of logs.slice(0, 10)) {
  console.log(`  ${l.file} (${l.mtime.toISOString()}, ${l.bytes} bytes)`);
}
console.log(`  ${logs.length} daily log(s); latest: ${logPaths(config.logging.dir).latest}`);
