import type { PullRequest } from './types.js';

/**
 * Picks the pull request an action should target: open ones whose branches
 * match, latest `updatedAt` first, highest id on ties.
 */
export function pickPullRequest(
  candidates: Iterable<PullRequest>,
  source: string,
  target?: string,
): PullRequest | undefined {
  let best: PullRequest | undefined;
  for (const pr of candidates) {
    if (pr.state !== 'open' || pr.sourceBranch !== source) continue;
    if (target !== undefined && pr.targetBranch !== target) continue;
    if (!best || isNewer(pr, best)) best = pr;
  }
  return best;
}

function isNewer(a: PullRequest, b: PullRequest): boolean {
  const diff = Date.parse(a.updatedAt) - Date.parse(b.updatedAt);
  if (diff !== 0 && !Number.isNaN(diff)) return diff > 0;
  return a.id > b.id;
}

export async function collect<T>(iterable: AsyncIterable<T>): Promise<T[]> {
  const items: T[] = [];
  for await (const item of iterable) items.push(item);
  return items;
}
