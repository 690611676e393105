import { z } from 'zod';

import { errorMessage } from '../errors.js';
import { fetchJson } from '../http.js';
import { getLogger, short } from '../logger.js';
import { sleep } from '../sleep.js';
import type { ExistingPaper, Paper } from '../types.js';
import { PageSchema, buildPaperProperties, readExistingPaper } from './properties.js';
import type { PageProperties, PropertySchema } from './properties.js';

export const NOTION_API = 'https://api.notion.com/v1';
export const NOTION_VERSION = '2022-06-28';

const DatabaseSchema = z.object({ properties: z.record(z.unknown()).default({}) }).passthrough();

const QueryResponseSchema = z.object({
  results: z.array(PageSchema).default([]),
  has_more: z.boolean().default(false),
  next_cursor: z.string().nullish(),
});

const CreatedPageSchema = z.object({ id: z.string() }).passthrough();

type DuplicateFilter =
  | { property: 'Name'; title: { equals: string } }
  | { property: 'DOI'; rich_text: { equals: string } }
  | { property: 'userDefined:URL'; url: { equals: string } };

export interface DuplicateKeys {
  title?: string;
  doi?: string;
  url?: string;
}

/** The slice of the Notion REST API the tracker writes to. */
export class NotionClient {
  private schemaCache: Record<string, unknown> | null = null;

  constructor(
    private readonly token: string,
    private readonly databaseId: string
  ) {}

  private async call<S extends z.ZodTypeAny>(
    method: 'GET' | 'POST' | 'PATCH',
    pathname: string,
    schema: S,
    body?: unknown
  ): Promise<z.infer<S>> {
    return fetchJson(
      `${NOTION_API}${pathname}`,
      schema,
      {
        method,
        headers: {
          Authorization: `Bearer ${this.token}`,
          'Content-Type': 'application/json',
          'Notion-Version': NOTION_VERSION,
        },
        body: body === undefined ? undefined : JSON.stringify(body),
      },
      { maxAttempts: 3, timeoutMs: 15_000 }
    );
  }

  async databaseProperties(): Promise<Record<string, unknown>> {
    if (!this.schemaCache) {
      const db = await this.call('GET', `/databases/${this.databaseId}`, DatabaseSchema);
      this.schemaCache = db.properties;
    }
    return this.schemaCache;
  }

  /**
   * Add the properties in `desired` that the database lacks. Failures are
   * logged; writes still go to whatever properties exist.
   */
  async ensureProperties(desired: PropertySchema): Promise<string[]> {
    const log = getLogger();
    try {
      const existing = await this.databaseProperties();
      const missing = Object.fromEntries(Object.entries(desired).filter(([name]) => !(name in existing)));
      const names = Object.keys(missing);
      if (names.length === 0) return [];

      await this.call('PATCH', `/databases/${this.databaseId}`, DatabaseSchema, { properties: missing });
      this.schemaCache = null;
      log.info({ properties: names }, 'Added database properties');
      return names;
    } catch (e) {
      log.warn({ err: errorMessage(e) }, 'Could not add database properties, continuing');
      return [];
    }
  }

  /** True when a row matches the title, DOI or URL. Lookup errors count as "not a duplicate". */
  async checkDuplicate(keys: DuplicateKeys): Promise<boolean> {
    const filters: DuplicateFilter[] = [];
    if (keys.title) filters.push({ property: 'Name', title: { equals: keys.title } });
    if (keys.doi) filters.push({ property: 'DOI', rich_text: { equals: keys.doi } });
    if (keys.url) filters.push({ property: 'userDefined:URL', url: { equals: keys.url } });
    if (filters.length === 0) return false;

    try {
      const res = await this.call('POST', `/databases/${this.databaseId}/query`, QueryResponseSchema, {
        filter: { or: filters },
      });
      return res.results.length > 0;
    } catch (e) {
      getLogger().error({ err: errorMessage(e) }, 'Duplicate check failed');
      return false;
    }
  }

  async filterDuplicates(papers: Paper[]): Promise<Paper[]> {
    const log = getLogger();
    const unique: Paper[] = [];
    for (const paper of papers) {
      if (await this.checkDuplicate({ title: paper.title, doi: paper.doi, url: paper.url })) {
        log.info({ title: short(paper.title) }, 'Already in database, skipping');
      } else {
        unique.push(paper);
      }
    }
    log.info({ unique: unique.length, total: papers.length }, 'Duplicate filter finished');
    return unique;
  }

  /** Rows of the database, oldest query page first, up to `maxPapers`. */
  async fetchExistingPapers(opts: { pageSize?: number; maxPapers?: number; pageDelayMs?: number } = {}): Promise<ExistingPaper[]> {
    const { pageSize = 100, maxPapers = Number.POSITIVE_INFINITY, pageDelayMs = 300 } = opts;
    const log = getLogger();
    const papers: ExistingPaper[] = [];
    let cursor: string | undefined;

    try {
      for (;;) {
        const res = await this.call('POST', `/databases/${this.databaseId}/query`, QueryResponseSchema, {
          page_size: Math.min(pageSize, 100),
          start_cursor: cursor,
        });
        for (const page of res.results) {
          papers.push(readExistingPaper(page));
          if (papers.length >= maxPapers) return papers;
        }
        if (!res.has_more || !res.next_cursor) break;
        cursor = res.next_cursor;
        log.info({ count: papers.length }, 'Fetched database rows, next page');
        await sleep(pageDelayMs);
      }
    } catch (e) {
      log.error({ err: errorMessage(e) }, 'Querying existing papers failed');
    }

    log.info({ count: papers.length }, 'Fetched existing papers');
    return papers;
  }

  async updatePaperFields(pageId: string, properties: PageProperties): Promise<boolean> {
    if (Object.keys(properties).length === 0) return true;
    try {
      await this.call('PATCH', `/pages/${pageId}`, CreatedPageSchema, { properties });
      return true;
    } catch (e) {
      getLogger().error({ pageId: pageId.slice(0, 8), err: errorMessage(e) }, 'Updating page failed');
      return false;
    }
  }

  /** Create a row for the paper. Null when it already exists or the write fails. */
  async addPaper(paper: Paper, opts: { skipDuplicateCheck?: boolean } = {}): Promise<string | null> {
    const log = getLogger();
    if (!opts.skipDuplicateCheck && (await this.checkDuplicate({ title: paper.title, doi: paper.doi, url: paper.url }))) {
      log.info({ title: short(paper.title) }, 'Already in database, skipping');
      return null;
    }

    try {
      const page = await this.call('POST', '/pages', CreatedPageSchema, {
        parent: { database_id: this.databaseId },
        properties: buildPaperProperties(paper),
      });
      log.info({ title: short(paper.title) }, 'Added paper');
      return page.id;
    } catch (e) {
      log.error({ title: short(paper.title), err: errorMessage(e) }, 'Adding paper failed');
      return null;
    }
  }

  async updateFrameworkDiagram(pageId: string, imageUrl: string): Promise<boolean> {
    return this.updatePaperFields(pageId, { 'Framework Diagram': { url: imageUrl } });
  }

  async updateFrameworkImage(pageId: string, imageUrl: string, name = 'framework.png'): Promise<boolean> {
    return this.updatePaperFields(pageId, {
      'Framework Image': { files: [{ name, external: { url: imageUrl } }] },
    });
  }
}
