import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';

import { ensureDir } from './storage.js';

const RunStatusSchema = z.object({
  lastRun: z.string(),
  endTime: z.string(),
  status: z.enum(['success', 'failed']),
  exitCode: z.number().int(),
  logFile: z.string(),
});

export type RunStatusFile = z.infer<typeof RunStatusSchema>;

export function writeStatus(filePath: string, status: RunStatusFile) {
  ensureDir(path.dirname(filePath));
  fs.writeFileSync(filePath, JSON.stringify(status, null, 2) + '\n');
}

/** Null when the file is missing or unreadable. */
export function readStatus(filePath: string): RunStatusFile | null {
  if (!fs.existsSync(filePath)) return null;
  try {
    const parsed = RunStatusSchema.safeParse(JSON.parse(fs.readFileSync(filePath, 'utf8')));
    return parsed.success ? parsed.data : null;
  } catch {
    return null;
  }
}

/** Point `latest` at `target` (a symlink, replacing whatever was there). */
export function linkLatest(target: string, latest: string) {
  fs.rmSync(latest, { force: true });
  fs.symlinkSync(path.basename(target), latest);
}

const DAILY_LOG = /^daily_.*\.log$/;

/** Daily log files in dir, newest first. */
export function listDailyLogs(dir: string): Array<{ file: string; mtime: Date; bytes: number }> {
  if (!fs.existsSync(dir)) return [];
  return fs
    .readdirSync(dir)
    .filter((name) => DAILY_LOG.test(name))
    .map((name) => {
      const file = path.join(dir, name);
      const st = fs.statSync(file);
      return { file, mtime: st.mtime, bytes: st.size };
    })
    .sort((a, b) => b.mtime.getTime() - a.mtime.getTime());
}

/** Delete daily logs last modified more than retentionDays ago. Returns the deleted paths. */
export function pruneOldLogs(dir: string, retentionDays: number, now = new Date()): string[] {
  const cutoff = now.getTime() - retentionDays * 24 * 60 * 60 * 1000;
  const deleted: string[] = [];
  for (const log of listDailyLogs(dir)) {
    if (log.mtime.getTime() < cutoff) {
      fs.rmSync(log.file, { force: true });
      deleted.push(log.file);
    }
  }
  return deleted;
}
