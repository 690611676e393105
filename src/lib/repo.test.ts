import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { migrate, openDb, type Db } from './db.js';
import { countSyncedSince, finalizeRun, insertRun, isSynced, paperSource, recentRuns, recordSyncedPaper } from './repo.js';
import type { Paper } from './types.js';

const paper: Paper = {
  title: 'Open VLA',
  authors: 'Ada Example',
  year: '2026',
  abstract: '',
  url: 'http://arxiv.org/abs/2510.00007v1',
  pdfUrl: '',
  doi: 'arXiv:2510.00007v1',
  venue: 'ArXiv',
  tags: ['VLA', 'arXiv'],
  publishedDate: '2026-10-18T00:00:00Z',
  institutions: [],
  recommendScore: 66.5,
};

describe('repo', () => {
  let tmpDir: string;
  let db: Db;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'vla-repo-'));
    db = openDb(path.join(tmpDir, 'nested', 'test.sqlite'));
    migrate(db);
  });

  afterEach(() => {
    db.sqlite.close();
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it('migrate is idempotent', () => {
    migrate(db);
    const row = db.sqlite.prepare('SELECT version FROM schema_meta WHERE id=1').get();
    expect(row).toEqual({ version: 1 });
  });

  it('records runs from start to finish', () => {
    insertRun(db, 'run-1', 'crawl', '2026-10-18T01:00:00.000Z');
    insertRun(db, 'run-2', 'crawl', '2026-10-19T01:00:00.000Z');
    finalizeRun(db, 'run-1', 'ok', { added: 3 });

    const runs = recentRuns(db, 5);
    expect(runs.map((r) => [r.run_id, r.status])).toEqual([
      ['run-2', 'running'],
      ['run-1', 'ok'],
    ]);
    expect(JSON.parse(runs[1]?.stats_json ?? '')).toEqual({ added: 3 });
    expect(runs[1]?.finished_at).not.toBeNull();
    expect(recentRuns(db, 1)).toHaveLength(1);
  });

  it('labels sources from tags', () => {
    expect(paperSource({ tags: ['VLA', 'Semantic Scholar'] })).toBe('Semantic Scholar');
    expect(paperSource({ tags: ['VLA', 'arXiv'] })).toBe('arXiv');
    expect(paperSource({ tags: [] })).toBe('unknown');
  });

  it('upserts synced papers by title', () => {
    recordSyncedPaper(db, paper, 'page-1', new Date('2026-10-18T10:00:00Z'));
    recordSyncedPaper(db, { ...paper, recommendScore: 70 }, 'page-2', new Date('2026-10-19T10:00:00Z'));

    expect(isSynced(db, 'Open VLA')).toBe(true);
    expect(isSynced(db, 'Other')).toBe(false);
    expect(db.sqlite.prepare('SELECT page_id, source, recommend_score FROM synced_papers').all()).toEqual([
      { page_id: 'page-2', source: 'arXiv', recommend_score: 70 },
    ]);
    expect(countSyncedSince(db, '2026-10-19T00:00:00.000Z')).toBe(1);
    expect(countSyncedSince(db, '2026-10-20T00:00:00.000Z')).toBe(0);
  });
});
