import { describe, it } from 'node:test';
import assert from 'node:assert';
import {
  collectBranchStatuses,
  determineStatus,
  formatBranchTable,
} from '../../../../src/core/branch-cleanup/branch-status.ts';
import {
  buildPullRequestIndex,
  createBulkIndexLookup,
} from '../../../../src/core/branch-cleanup/pull-request-lookup.ts';
import { branchName, repoPath } from '../../../../src/types/branded.ts';
import { gitCommandFailed } from '../../../../src/types/errors.ts';
import { createFakeGitEffects, createMemoryLogger, pullRequest } from '../../../mocks/effects.ts';

describe('determineStatus', () => {
  it('should prefer active-pr over merge status', () => {
    assert.strictEqual(determineStatus('merged', true, true), 'active-pr');
  });

  it('should distinguish merged and stale by remote presence', () => {
    assert.strictEqual(determineStatus('merged', true, false), 'merged');
    assert.strictEqual(determineStatus('merged', false, false), 'stale');
  });

  it('should report active and unknown', () => {
    assert.strictEqual(determineStatus('not-merged', true, false), 'active');
    assert.strictEqual(determineStatus('unknown', true, false), 'unknown');
  });
});

describe('collectBranchStatuses', () => {
  it('should build one row per local branch', async () => {
    const git = createFakeGitEffects({
      local: ['develop', 'feat/pr', 'feat/stale', 'feat/wip', 'feat/broken'],
      remote: ['develop', 'feat/pr', 'feat/wip', 'feat/broken'],
      current: 'develop',
      merged: ['develop', 'feat/pr', 'feat/stale'],
      mergeCheckErrors: { 'feat/broken': gitCommandFailed('for-each-ref', 'fatal: bad ref', 128) },
    });

    const rows = await collectBranchStatuses(
      {
        localBranches: new Set(['develop', 'feat/pr', 'feat/stale', 'feat/wip', 'feat/broken'].map(branchName)),
        remoteBranches: new Set(['develop', 'feat/pr', 'feat/wip', 'feat/broken'].map(branchName)),
        currentBranch: branchName('develop'),
      },
      {
        gitEffects: git.effects,
        repo: repoPath('/repo'),
        baseRef: 'origin/develop',
        lookup: createBulkIndexLookup(buildPullRequestIndex([pullRequest({ number: 3, headRef: 'feat/pr' })])),
        logger: createMemoryLogger(),
      },
    );

    assert.deepStrictEqual(
      rows.map((row) => [row.branch, row.isCurrent, row.status, row.onRemote]),
      [
        ['develop', true, 'merged', true],
        ['feat/pr', false, 'active-pr', true],
        ['feat/stale', false, 'stale', false],
        ['feat/wip', false, 'active', true],
        ['feat/broken', false, 'unknown', true],
      ],
    );
  });
});

describe('formatBranchTable', () => {
  it('should align columns', () => {
    const lines = formatBranchTable([
      { branch: branchName('main'), isCurrent: true, status: 'merged', onRemote: true, pullRequest: null },
      {
        branch: branchName('feat/x'),
        isCurrent: false,
        status: 'active-pr',
        onRemote: false,
        pullRequest: pullRequest({ headRef: 'feat/x' }),
      },
    ]);

    assert.deepStrictEqual(lines, [
      'Branch          Status     Remote  PR',
      'main (current)  merged     ✓       ✗',
      'feat/x          active-pr  ✗       ✓',
    ]);
  });
});
