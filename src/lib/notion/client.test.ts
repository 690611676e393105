import { afterEach, describe, expect, it, vi } from 'vitest';

import type { Paper } from '../types.js';
import { NOTION_VERSION, NotionClient } from './client.js';
import { METRICS_PROPERTIES } from './properties.js';

interface RecordedCall {
  url: string;
  method: string;
  headers: Headers;
  body: unknown;
}

function json(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
}

function stubNotion(...responses: Response[]) {
  const queue = [...responses];
  const calls: RecordedCall[] = [];
  const fetchMock = vi.fn(async (url: string, init?: RequestInit) => {
    calls.push({
      url,
      method: init?.method ?? 'GET',
      headers: new Headers(init?.headers),
      body: typeof init?.body === 'string' ? JSON.parse(init.body) : undefined,
    });
    const next = queue.shift();
    if (!next) throw new Error('unexpected fetch');
    return next;
  });
  vi.stubGlobal('fetch', fetchMock);
  return { calls, fetchMock };
}

function page(id: string, title: string) {
  return { id, properties: { Name: { type: 'title', title: [{ plain_text: title }] } } };
}

const paper: Paper = {
  title: 'Open VLA Policies at Scale',
  authors: 'Ada Example',
  year: '2026',
  abstract: 'A vision-language-action policy.',
  url: 'http://arxiv.org/abs/2510.00003v2',
  pdfUrl: 'http://arxiv.org/pdf/2510.00003v2',
  doi: 'arXiv:2510.00003v2',
  venue: 'ArXiv',
  tags: ['VLA', 'arXiv'],
  publishedDate: '2026-10-17T12:00:00Z',
  institutions: [],
};

afterEach(() => {
  vi.unstubAllGlobals();
});

describe('NotionClient', () => {
  const client = () => new NotionClient('test-token', 'db-1');

  describe('checkDuplicate', () => {
    it('queries by title, DOI and URL with the API headers', async () => {
      const { calls } = stubNotion(json({ results: [page('p1', paper.title)], has_more: false }));

      expect(await client().checkDuplicate({ title: paper.title, doi: paper.doi, url: paper.url })).toBe(true);
      expect(calls).toHaveLength(1);
      const call = calls[0];
      expect(call?.url).toBe('https://api.notion.com/v1/databases/db-1/query');
      expect(call?.method).toBe('POST');
      expect(call?.headers.get('Authorization')).toBe('Bearer test-token');
      expect(call?.headers.get('Notion-Version')).toBe(NOTION_VERSION);
      expect(call?.body).toEqual({
        filter: {
          or: [
            { property: 'Name', title: { equals: paper.title } },
            { property: 'DOI', rich_text: { equals: paper.doi } },
            { property: 'userDefined:URL', url: { equals: paper.url } },
          ],
        },
      });
    });

    it('is false without keys or on errors', async () => {
      const { fetchMock } = stubNotion(json({ object: 'error', message: 'bad filter' }, 400));
      expect(await client().checkDuplicate({})).toBe(false);
      expect(fetchMock).not.toHaveBeenCalled();
      expect(await client().checkDuplicate({ title: 'x' })).toBe(false);
    });
  });

  it('filterDuplicates keeps papers with no match', async () => {
    stubNotion(json({ results: [page('p1', 'A')] }), json({ results: [] }));
    const unique = await client().filterDuplicates([
      { ...paper, title: 'A' },
      { ...paper, title: 'B' },
    ]);
    expect(unique.map((p) => p.title)).toEqual(['B']);
  });

  it('ensureProperties adds only the missing ones', async () => {
    const { calls } = stubNotion(json({ properties: { Name: {}, Citations: {} } }), json({ properties: {} }));

    expect(await client().ensureProperties(METRICS_PROPERTIES)).toEqual(['Influential Citations', 'Impact (2yr mean)']);
    expect(calls[1]?.method).toBe('PATCH');
    expect(calls[1]?.body).toEqual({
      properties: { 'Influential Citations': { number: {} }, 'Impact (2yr mean)': { number: {} } },
    });
  });

  it('ensureProperties reports nothing on failure', async () => {
    stubNotion(json({ message: 'forbidden' }, 403));
    expect(await client().ensureProperties(METRICS_PROPERTIES)).toEqual([]);
  });

  it('fetchExistingPapers follows cursors and stops at maxPapers', async () => {
    const { calls } = stubNotion(
      json({ results: [page('p1', 'A'), page('p2', 'B')], has_more: true, next_cursor: 'c2' }),
      json({ results: [page('p3', 'C'), page('p4', 'D')], has_more: true, next_cursor: 'c3' })
    );

    const rows = await client().fetchExistingPapers({ pageSize: 2, maxPapers: 3, pageDelayMs: 0 });
    expect(rows.map((r) => [r.pageId, r.title])).toEqual([
      ['p1', 'A'],
      ['p2', 'B'],
      ['p3', 'C'],
    ]);
    expect(calls.map((c) => c.body)).toEqual([{ page_size: 2 }, { page_size: 2, start_cursor: 'c2' }]);
  });

  it('fetchExistingPapers keeps what it has when a page fails', async () => {
    stubNotion(json({ results: [page('p1', 'A')], has_more: true, next_cursor: 'c2' }), json({ message: 'no' }, 400));
    const rows = await client().fetchExistingPapers({ pageDelayMs: 0 });
    expect(rows.map((r) => r.pageId)).toEqual(['p1']);
  });

  it('addPaper creates a page in the database', async () => {
    const { calls } = stubNotion(json({ id: 'new-page' }));

    expect(await client().addPaper(paper, { skipDuplicateCheck: true })).toBe('new-page');
    expect(calls[0]?.url).toBe('https://api.notion.com/v1/pages');
    expect(calls[0]?.body).toMatchObject({
      parent: { database_id: 'db-1' },
      properties: { Name: { title: [{ text: { content: paper.title } }] }, Status: { select: { name: 'To Read' } } },
    });
  });

  it('addPaper skips existing papers', async () => {
    const { calls } = stubNotion(json({ results: [page('p1', paper.title)] }));
    expect(await client().addPaper(paper)).toBeNull();
    expect(calls).toHaveLength(1);
  });

  it('updatePaperFields patches the page and reports failures', async () => {
    const { calls } = stubNotion(json({ id: 'p1' }), json({ message: 'invalid' }, 400));
    const c = client();

    expect(await c.updatePaperFields('p1', {})).toBe(true);
    expect(await c.updateFrameworkImage('p1', 'https://img.example.org/f.png')).toBe(true);
    expect(calls[0]?.method).toBe('PATCH');
    expect(calls[0]?.url).toBe('https://api.notion.com/v1/pages/p1');
    expect(calls[0]?.body).toEqual({
      properties: {
        'Framework Image': { files: [{ name: 'framework.png', external: { url: 'https://img.example.org/f.png' } }] },
      },
    });
    expect(await c.updateFrameworkDiagram('p1', 'https://img.example.org/f.png')).toBe(false);
  });
});
