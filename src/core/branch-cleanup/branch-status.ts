/**
 * ブランチ一覧表示用の状態判定
 */

import type { GitEffects } from '../../adapters/vcs/git-effects.ts';
import type { BranchName, RepoPath } from '../../types/branded.ts';
import type { BranchInventory } from '../../types/branch-cleanup.ts';
import type { PullRequestRecord } from '../../types/github.ts';
import type { Logger } from '../../types/logger.ts';
import { isErr } from 'option-t/plain_result';
import { checkMerged } from './eligibility.ts';
import type { PullRequestLookup } from './pull-request-lookup.ts';

/**
 * - active-pr: 同一リポジトリの PR がある（状態は問わない）
 * - stale: マージ済みでリモートにない
 * - merged: マージ済みでリモートにもある
 * - active: 未マージ
 * - unknown: マージ判定に失敗
 */
export type BranchStatus = 'active-pr' | 'stale' | 'merged' | 'active' | 'unknown';

export type BranchStatusRow = {
  readonly branch: BranchName;
  readonly isCurrent: boolean;
  readonly status: BranchStatus;
  readonly onRemote: boolean;
  readonly pullRequest: PullRequestRecord | null;
};

export type BranchStatusDeps = {
  readonly gitEffects: GitEffects;
  readonly repo: RepoPath;
  readonly baseRef: string;
  readonly lookup: PullRequestLookup;
  readonly logger: Logger;
};

export async function collectBranchStatuses(
  inventory: BranchInventory,
  deps: BranchStatusDeps,
): Promise<BranchStatusRow[]> {
  const rows: BranchStatusRow[] = [];

  for (const branch of inventory.localBranches) {
    const onRemote = inventory.remoteBranches.has(branch);

    const prResult = await deps.lookup.find(branch);
    let pullRequest: PullRequestRecord | null = null;
    if (isErr(prResult)) {
      deps.logger.verbose(`Could not look up pull request for ${branch}: ${prResult.err.message}`);
    } else {
      pullRequest = prResult.val;
    }

    const merge = await checkMerged(deps.gitEffects, deps.repo, branch, deps.baseRef);
    deps.logger.debug(`${branch}: merge=${merge.kind}, pr=${pullRequest ? `#${pullRequest.number}` : 'none'}`);

    rows.push({
      branch,
      isCurrent: branch === inventory.currentBranch,
      status: determineStatus(merge.kind, onRemote, pullRequest !== null),
      onRemote,
      pullRequest,
    });
  }

  return rows;
}

export function determineStatus(
  merge: 'merged' | 'not-merged' | 'unknown',
  onRemote: boolean,
  hasPullRequest: boolean,
): BranchStatus {
  if (hasPullRequest) {
    return 'active-pr';
  }
  switch (merge) {
    case 'merged':
      return onRemote ? 'merged' : 'stale';
    case 'not-merged':
      return 'active';
    case 'unknown':
      return 'unknown';
  }
}

const HEADERS = ['Branch', 'Status', 'Remote', 'PR'] as const;

/**
 * 表形式の行に整形する（列は空白2つ区切りで揃える）
 */
export function formatBranchTable(rows: readonly BranchStatusRow[]): string[] {
  const cells = rows.map((row) => [
    row.isCurrent ? `${row.branch} (current)` : row.branch,
    row.status,
    row.onRemote ? '✓' : '✗',
    row.pullRequest ? '✓' : '✗',
  ]);

  const table = [[...HEADERS], ...cells];
  const widths = HEADERS.map((_, column) =>
    Math.max(...table.map((line) => (line[column] ?? '').length)),
  );

  return table.map((line) =>
    line
      .map((cell, column) => cell.padEnd(widths[column] ?? 0))
      .join('  ')
      .trimEnd(),
  );
}
