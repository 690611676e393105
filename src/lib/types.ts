export type IsoDateTime = string;

export type PaperSource = 'arXiv' | 'Semantic Scholar';

/**
 * A candidate paper as it flows through the pipeline. The title is the
 * dedup key against the workspace database.
 */
export interface Paper {
  title: string;
  authors: string; // comma-joined
  year: string;
  abstract: string;
  url: string;
  pdfUrl: string;
  doi: string; // real DOI, or arXiv:<id>
  venue: string;
  tags: string[];
  publishedDate: IsoDateTime;
  institutions: string[];
  citations?: number;
  influentialCitations?: number;
  impact2yrMean?: number;
  recommendScore?: number;
  recommendRationale?: string;
}

/** A paper read back from the workspace database. */
export interface ExistingPaper {
  pageId: string;
  title: string | null;
  url: string | null;
  pdfUrl: string | null;
  doi: string | null;
  year: number | null;
  citations: number | null;
  influentialCitations: number | null;
  institutions: string[] | null;
  recommendScore: number | null;
  recommendRationale: string | null;
  frameworkDiagram: string | null;
  authors: string | null;
  abstract: string | null;
}

export type PatchField = 'pdfUrl' | 'doi' | 'institutions' | 'citations' | 'recommendScore' | 'recommendRationale';

export interface FilterRules {
  fullPhrases: string[];
  contexts: string[];
}

export interface RuleWeights {
  freshness: number;
  citations: number;
  influential_citations: number;
  impact: number;
  abstract_length: number;
  has_pdf: number;
  source_quality: number;
}

export interface PdfOptions {
  enabled: boolean;
  maxPages: number;
  maxChars: number;
  extractImages: boolean;
  maxImages: number;
  minImageBytes: number;
}

export interface LlmConfig {
  enabled: boolean;
  apiKey?: string;
  apiBase?: string;
  model: string;
  temperature: number;
  timeoutMs: number;
  maxTokens: number;
  maxRetries: number;
  maxPapers: number;
  callIntervalMs: number;
  rationaleLanguage: string;
  extraInstructions?: string;
  pdf: PdfOptions;
}

export interface PatchFieldConfig {
  enabled: boolean;
  maxPapers: number;
}

export interface AppConfig {
  notion: {
    token: string;
    databaseId: string;
  };
  discovery: {
    daysBack: number;
    arxivMaxResults: number;
    arxivPageSize: number;
    queryPhrases: string[];
    useSemanticScholar: boolean;
    semanticScholarMaxResults: number;
    keywords: string[];
    enrichInstitutions: boolean;
  };
  filter: FilterRules;
  enrichment: {
    citations: boolean;
    impact: boolean;
    openalexMailto?: string;
  };
  scoring: {
    enabled: boolean;
    weights: RuleWeights;
    llm: LlmConfig;
  };
  figures: {
    enabled: boolean;
    maxFigures: number;
    outputDir: string;
  };
  sync: {
    maxPapers: number;
    requestIntervalMs: number;
  };
  patch: {
    enabled: boolean;
    maxPapersToScan: number;
    pdfUrl: PatchFieldConfig;
    citations: PatchFieldConfig;
    institutions: PatchFieldConfig;
    recommendScore: PatchFieldConfig & { useFullPdf: boolean };
  };
  storage: {
    root: string;
  };
  logging: {
    level: 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';
    json: boolean;
    dir: string;
    retentionDays: number;
  };
}

export interface RunRow {
  run_id: string;
  kind: string;
  started_at: IsoDateTime;
  finished_at: IsoDateTime | null;
  status: string;
  stats_json: string;
}
