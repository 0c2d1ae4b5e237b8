import type { Ranks } from './pagerank.js';

export function samplingTitle(samples: number): string {
  return `PageRank Results from Sampling (n = ${samples})`;
}

export const ITERATION_TITLE = 'PageRank Results from Iteration';

/**
 * Render ranks as a header line followed by `  <page>: <rank>` lines,
 * sorted by page, ranks fixed to 4 decimals.
 */
export function formatRanks(title: string, ranks: ReadonlyMap<string, number>): string {
  const lines = [title];
  for (const page of [...ranks.keys()].sort()) {
    lines.push(`  ${page}: ${(ranks.get(page) ?? 0).toFixed(4)}`);
  }
  return lines.join('\n');
}

export function ranksToRecord(ranks: Ranks): Record<string, number> {
  return Object.fromEntries([...ranks.keys()].sort().map((page): [string, number] => [page, ranks.get(page) ?? 0]));
}
