/**
 * patch-missing — fill missing fields of papers already in the database,
 * without crawling. Uses the `patch` section of the config; the top-level
 * `patch.enabled` flag is ignored here.
 *
 * Usage:
 *   npm run patch-missing -- config.json
 */

import { loadConfig } from '../lib/config.js';
import { errorMessage } from '../lib/errors.js';
import { getLogger, initLogger } from '../lib/logger.js';
import { NotionClient } from '../lib/notion/client.js';
import { ENRICHMENT_PROPERTIES, METRICS_PROPERTIES } from '../lib/notion/properties.js';
import { runPatch } from '../lib/patch.js';
import { patchDepsFor } from '../lib/runners/crawl.js';

const configPath = process.argv[2] ?? 'config.json';
const config = loadConfig(configPath);
initLogger({ level: config.logging.level, json: config.logging.json });
const log = getLogger();

const notion = new NotionClient(config.notion.token, config.notion.databaseId);

try {
  await notion.ensureProperties({ ...METRICS_PROPERTIES, ...ENRICHMENT_PROPERTIES });
  const summary = await runPatch(notion, config.patch, patchDepsFor(config));
  log.info({ scanned: summary.scanned, fields: summary.fields }, 'Patch finished');
} catch (e) {
  log.error({ err: errorMessage(e) }, 'Patch failed');
  process.exitCode = 1;
}
