export interface CrawlArgs {
  configPath: string;
  dryRun: boolean;
  maxPapers: number | undefined;
}

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

/** `<config.json> [--dry-run] [--max-papers N]`; the config path defaults to config.json. */
export function parseCrawlArgs(argv: string[]): CrawlArgs {
  let configPath: string | undefined;
  let dryRun = false;
  let maxPapers: number | undefined;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i]!;

    if (arg === '--dry-run' || arg === '-n') {
      dryRun = true;
    } else if (arg === '--max-papers' || arg.startsWith('--max-papers=')) {
      const raw = arg.includes('=') ? arg.slice(arg.indexOf('=') + 1) : argv[++i];
      const n = Number.parseInt(raw ?? '', 10);
      if (Number.isNaN(n) || n < 0) throw new UsageError(`--max-papers expects a non-negative integer, got "${raw ?? ''}"`);
      maxPapers = n;
    } else if (arg.startsWith('-')) {
      throw new UsageError(`Unknown option: ${arg}`);
    } else if (configPath === undefined) {
      configPath = arg;
    } else {
      throw new UsageError(`Unexpected argument: ${arg}`);
    }
  }

  return { configPath: configPath ?? 'config.json', dryRun, maxPapers };
}
