import { z } from 'zod';

import type { Db } from './db.js';
import type { Paper, RunRow } from './types.js';

export type RunStatus = 'running' | 'ok' | 'warn' | 'error';

export function insertRun(db: Db, runId: string, kind: string, startedAt: string) {
  db.sqlite
    .prepare(
      `INSERT INTO runs (run_id, kind, started_at, finished_at, status, stats_json)
       VALUES (?, ?, ?, NULL, 'running', ?)`
    )
    .run(runId, kind, startedAt, JSON.stringify({}));
}

export function finalizeRun(db: Db, runId: string, status: RunStatus, stats: unknown) {
  db.sqlite
    .prepare('UPDATE runs SET finished_at=?, status=?, stats_json=? WHERE run_id=?')
    .run(new Date().toISOString(), status, JSON.stringify(stats), runId);
}

const RunRowSchema = z.object({
  run_id: z.string(),
  kind: z.string(),
  started_at: z.string(),
  finished_at: z.string().nullable(),
  status: z.string(),
  stats_json: z.string(),
});

export function recentRuns(db: Db, limit = 10): RunRow[] {
  const rows = db.sqlite
    .prepare('SELECT run_id, kind, started_at, finished_at, status, stats_json FROM runs ORDER BY started_at DESC LIMIT ?')
    .all(limit);
  return z.array(RunRowSchema).parse(rows);
}

/** Source label of a paper, from its tags. */
export function paperSource(paper: Pick<Paper, 'tags'>): string {
  if (paper.tags.includes('Semantic Scholar')) return 'Semantic Scholar';
  if (paper.tags.includes('arXiv')) return 'arXiv';
  return 'unknown';
}

export function recordSyncedPaper(db: Db, paper: Paper, pageId: string, now = new Date()) {
  db.sqlite
    .prepare(
      `INSERT INTO synced_papers (title, page_id, source, recommend_score, synced_at)
       VALUES (?, ?, ?, ?, ?)
       ON CONFLICT(title) DO UPDATE SET
        page_id=excluded.page_id,
        recommend_score=excluded.recommend_score,
        synced_at=excluded.synced_at`
    )
    .run(paper.title, pageId, paperSource(paper), paper.recommendScore ?? null, now.toISOString());
}

export function isSynced(db: Db, title: string): boolean {
  return db.sqlite.prepare('SELECT 1 FROM synced_papers WHERE title=?').get(title) !== undefined;
}

export function countSyncedSince(db: Db, sinceIso: string): number {
  const row = z
    .object({ n: z.number() })
    .parse(db.sqlite.prepare('SELECT COUNT(*) AS n FROM synced_papers WHERE synced_at >= ?').get(sinceIso));
  return row.n;
}
