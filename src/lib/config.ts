import fs from 'node:fs';
import path from 'node:path';
import YAML from 'yaml';
import { z } from 'zod';
import { ConfigError } from './errors.js';
import type { AppConfig } from './types.js';

export const DEFAULT_QUERY_PHRASES = [
  'Vision-Language-Action',
  'VLA model',
  'VLA policy',
  'vision language action model',
];

export const DEFAULT_FULL_PHRASES = ['vision-language-action', 'vision language action', 'visionlanguageaction'];

export const DEFAULT_CONTEXTS = [
  'vla model',
  'vla policy',
  'vla agent',
  'vla robot',
  'vla framework',
  'vla architecture',
];

const patchField = (maxPapers: number) =>
  z
    .object({
      enabled: z.boolean().default(false),
      maxPapers: z.number().int().min(1).default(maxPapers),
    })
    .default({});

const AppConfigSchema = z.object({
  notion: z
    .object({
      token: z.string().default(''),
      databaseId: z.string().default(''),
    })
    .default({}),
  discovery: z
    .object({
      daysBack: z.number().int().min(1).default(3),
      arxivMaxResults: z.number().int().min(1).default(200),
      arxivPageSize: z.number().int().min(1).max(100).default(100),
      queryPhrases: z.array(z.string().min(1)).min(1).default(DEFAULT_QUERY_PHRASES),
      useSemanticScholar: z.boolean().default(false),
      semanticScholarMaxResults: z.number().int().min(1).max(100).default(50),
      keywords: z.array(z.string()).default(['VLA', 'Vision Language Action', 'robot foundation model']),
      enrichInstitutions: z.boolean().default(true),
    })
    .default({}),
  filter: z
    .object({
      fullPhrases: z.array(z.string()).default(DEFAULT_FULL_PHRASES),
      contexts: z.array(z.string()).default(DEFAULT_CONTEXTS),
    })
    .default({}),
  enrichment: z
    .object({
      citations: z.boolean().default(true),
      impact: z.boolean().default(false),
      openalexMailto: z.string().optional(),
    })
    .default({}),
  scoring: z
    .object({
      enabled: z.boolean().default(true),
      weights: z
        .object({
          freshness: z.number().min(0).default(2.0),
          citations: z.number().min(0).default(1.5),
          influential_citations: z.number().min(0).default(1.0),
          impact: z.number().min(0).default(1.0),
          abstract_length: z.number().min(0).default(0.5),
          has_pdf: z.number().min(0).default(0.5),
          source_quality: z.number().min(0).default(1.0),
        })
        .default({}),
      llm: z
        .object({
          enabled: z.boolean().default(false),
          apiKey: z.string().optional(),
          apiBase: z.string().url().optional(),
          model: z.string().min(1).default('gpt-4o-mini'),
          temperature: z.number().min(0).max(2).default(0.2),
          timeoutMs: z.number().int().min(1000).default(60_000),
          maxTokens: z.number().int().min(1).default(500),
          maxRetries: z.number().int().min(0).max(10).default(0),
          maxPapers: z.number().int().min(0).default(50),
          callIntervalMs: z.number().int().min(0).default(400),
          rationaleLanguage: z.string().min(1).default('Chinese'),
          extraInstructions: z.string().optional(),
          pdf: z
            .object({
              enabled: z.boolean().default(true),
              maxPages: z.number().int().min(1).default(30),
              maxChars: z.number().int().min(1).default(50_000),
              extractImages: z.boolean().default(true),
              maxImages: z.number().int().min(0).default(10),
              minImageBytes: z.number().int().min(0).default(2000),
            })
            .default({}),
        })
        .default({}),
    })
    .default({}),
  figures: z
    .object({
      enabled: z.boolean().default(false),
      maxFigures: z.number().int().min(1).default(3),
      outputDir: z.string().min(1).default('images'),
    })
    .default({}),
  sync: z
    .object({
      maxPapers: z.number().int().min(0).default(999),
      requestIntervalMs: z.number().int().min(0).default(500),
    })
    .default({}),
  patch: z
    .object({
      enabled: z.boolean().default(false),
      maxPapersToScan: z.number().int().min(1).default(200),
      pdfUrl: patchField(10),
      citations: patchField(10),
      institutions: patchField(10),
      recommendScore: z
        .object({
          enabled: z.boolean().default(false),
          maxPapers: z.number().int().min(1).default(10),
          useFullPdf: z.boolean().default(false),
        })
        .default({}),
    })
    .default({}),
  storage: z
    .object({
      root: z.string().min(1).default('./data'),
    })
    .default({}),
  logging: z
    .object({
      level: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
      json: z.boolean().default(false),
      dir: z.string().min(1).default('logs'),
      retentionDays: z.number().int().min(1).default(30),
    })
    .default({}),
});

export function loadConfigFile(filePath: string): unknown {
  const raw = fs.readFileSync(filePath, 'utf8');
  // YAML 1.2 is a superset of JSON, so config.json parses here too.
  return YAML.parse(raw);
}

/**
 * Validate a raw config object, fill defaults and pull secrets from the
 * environment where the file leaves them out.
 */
export function parseConfig(raw: unknown, env: NodeJS.ProcessEnv = process.env): AppConfig {
  const result = AppConfigSchema.safeParse(raw ?? {});
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`);
    throw new ConfigError(`Invalid config: ${issues.join('; ')}`);
  }

  const config: AppConfig = result.data;
  config.notion.token ||= env['NOTION_TOKEN'] ?? '';
  config.notion.databaseId ||= env['NOTION_DATABASE_ID'] ?? '';
  config.scoring.llm.apiKey ||= env['OPENAI_API_KEY'];

  if (!config.notion.token || !config.notion.databaseId) {
    throw new ConfigError('Config is missing notion.token or notion.databaseId (or NOTION_TOKEN / NOTION_DATABASE_ID)');
  }
  return config;
}

/**
 * Load the config file named on the command line. Relative storage, log and
 * figure directories resolve against the config file's directory.
 */
export function loadConfig(configPath: string, env: NodeJS.ProcessEnv = process.env): AppConfig {
  const absPath = path.resolve(configPath);
  if (!fs.existsSync(absPath)) {
    throw new ConfigError(`Missing config file at ${absPath}. Copy config.example.json → config.json and edit.`);
  }

  let raw: unknown;
  try {
    raw = loadConfigFile(absPath);
  } catch (e) {
    throw new ConfigError(`Could not parse ${absPath}: ${e instanceof Error ? e.message : String(e)}`);
  }

  const config = parseConfig(raw, env);
  const baseDir = path.dirname(absPath);
  config.storage.root = path.resolve(baseDir, config.storage.root);
  config.logging.dir = path.resolve(baseDir, config.logging.dir);
  config.figures.outputDir = path.resolve(baseDir, config.figures.outputDir);
  return config;
}
