import fs from 'node:fs';
import path from 'node:path';

function pad2(n: number) {
  return String(n).padStart(2, '0');
}

export function ensureDir(dir: string) {
  fs.mkdirSync(dir, { recursive: true });
}

/** Local calendar date, YYYY-MM-DD. */
export function localDate(date = new Date()): string {
  return `${date.getFullYear()}-${pad2(date.getMonth() + 1)}-${pad2(date.getDate())}`;
}

/** Local time, YYYY-MM-DD HH:MM:SS. */
export function localDateTime(date = new Date()): string {
  return `${localDate(date)} ${pad2(date.getHours())}:${pad2(date.getMinutes())}:${pad2(date.getSeconds())}`;
}

export function dbPath(storageRoot: string): string {
  return path.join(storageRoot, 'db.sqlite');
}

/** status.json lives beside the config file. */
export function statusPath(configPath: string): string {
  return path.join(path.dirname(path.resolve(configPath)), 'status.json');
}

export interface LogPaths {
  daily: string;
  latest: string;
}

export function logPaths(logDir: string, date = new Date()): LogPaths {
  return {
    daily: path.join(logDir, `daily_${localDate(date)}.log`),
    latest: path.join(logDir, 'latest.log'),
  };
}
