export function sleep(ms: number) {
  if (ms <= 0) return Promise.resolve();
  return new Promise<void>((resolve) => setTimeout(resolve, ms));
}

// Exponential backoff with ±jitter, capped. attempt is 1-based.
export function backoffMs(attempt: number, baseMs = 1000, capMs = 60_000): number {
  const base = Math.min(capMs, baseMs * 2 ** (attempt - 1));
  return Math.floor(base * (0.75 + Math.random() * 0.75));
}
