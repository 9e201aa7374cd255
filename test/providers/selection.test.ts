import { describe, expect, it } from 'vitest';
import { pickPullRequest } from '../../src/providers/selection.js';
import type { PullRequest } from '../../src/providers/types.js';

function pr(overrides: Partial<PullRequest>): PullRequest {
  return {
    id: 1,
    title: 'Change',
    sourceBranch: 'feature',
    targetBranch: 'main',
    state: 'open',
    isApproved: false,
    reviewers: [],
    url: 'https://example.com/pr/1',
    createdAt: '2024-05-01T10:00:00Z',
    updatedAt: '2024-05-01T10:00:00Z',
    ...overrides,
  };
}

describe('pickPullRequest', () => {
  it('returns undefined when nothing matches', () => {
    expect(pickPullRequest([pr({ sourceBranch: 'other' })], 'feature')).toBeUndefined();
  });

  it('prefers the most recently updated open pull request', () => {
    const older = pr({ id: 5, updatedAt: '2024-05-01T10:00:00Z' });
    const newer = pr({ id: 3, updatedAt: '2024-05-02T08:30:00Z' });

    expect(pickPullRequest([older, newer], 'feature')?.id).toBe(3);
  });

  it('breaks ties on the highest id', () => {
    expect(pickPullRequest([pr({ id: 4 }), pr({ id: 9 }), pr({ id: 6 })], 'feature')?.id).toBe(9);
  });

  it('ignores merged and declined pull requests and other targets', () => {
    const candidates = [
      pr({ id: 1, state: 'merged', updatedAt: '2024-06-01T00:00:00Z' }),
      pr({ id: 2, state: 'declined', updatedAt: '2024-06-01T00:00:00Z' }),
      pr({ id: 3, targetBranch: 'release' }),
      pr({ id: 4 }),
    ];

    expect(pickPullRequest(candidates, 'feature', 'main')?.id).toBe(4);
  });
});
