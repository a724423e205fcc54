/**
 * 削除可否の判定
 *
 * ルールは上から順に評価し、最初に一致したものを理由とする。
 * 1. 保護ブランチ
 * 2. 現在のブランチ
 * 3. open な Pull Request がある
 * 4. 基準参照にマージされていない（判定不能も含む）
 * 5. 削除可能
 */

import type { GitEffects } from '../../adapters/vcs/git-effects.ts';
import type { BranchName, RepoPath } from '../../types/branded.ts';
import type {
  Branch,
  BranchInventory,
  CleanupCandidates,
  EligibilityDecision,
  MergeCheckResult,
  ProtectionPolicy,
} from '../../types/branch-cleanup.ts';
import type { Logger } from '../../types/logger.ts';
import { isErr } from 'option-t/plain_result';
import { isProtectedBranch } from './protection.ts';
import type { PullRequestLookup } from './pull-request-lookup.ts';

export type EligibilityDeps = {
  readonly gitEffects: GitEffects;
  readonly repo: RepoPath;
  /** マージ判定の基準参照（例: "origin/develop"） */
  readonly baseRef: string;
  readonly policy: ProtectionPolicy;
  readonly lookup: PullRequestLookup;
  readonly logger: Logger;
};

/**
 * マージ判定
 *
 * git の失敗は例外にせず unknown として返す。
 */
export async function checkMerged(
  gitEffects: GitEffects,
  repo: RepoPath,
  branch: BranchName,
  baseRef: string,
): Promise<MergeCheckResult> {
  const result = await gitEffects.isMergedInto(repo, branch, baseRef);
  if (isErr(result)) {
    return { kind: 'unknown', error: result.err };
  }
  return result.val ? { kind: 'merged' } : { kind: 'not-merged' };
}

/**
 * 一覧からブランチ情報を組み立てる
 */
export function toBranch(
  name: BranchName,
  inventory: BranchInventory,
  policy: ProtectionPolicy,
): Branch {
  return {
    name,
    isLocal: inventory.localBranches.has(name),
    isRemote: inventory.remoteBranches.has(name),
    isCurrent: inventory.currentBranch === name,
    isProtected: isProtectedBranch(name, policy),
  };
}

export async function classifyBranch(
  branch: Branch,
  deps: EligibilityDeps,
): Promise<EligibilityDecision> {
  if (branch.isProtected) {
    return { branch, eligible: false, reason: 'protected' };
  }

  if (branch.isCurrent) {
    return { branch, eligible: false, reason: 'current' };
  }

  const prResult = await deps.lookup.find(branch.name);
  if (isErr(prResult)) {
    // PR の取得失敗では削除を止めない
    deps.logger.verbose(
      `Could not look up pull request for ${branch.name}: ${prResult.err.message}`,
    );
  } else if (prResult.val?.state === 'open') {
    return { branch, eligible: false, reason: 'open-pr', pullRequest: prResult.val };
  }

  const merge = await checkMerged(deps.gitEffects, deps.repo, branch.name, deps.baseRef);
  switch (merge.kind) {
    case 'unknown':
      return { branch, eligible: false, reason: 'lookup-failed', error: merge.error };
    case 'not-merged':
      return { branch, eligible: false, reason: 'not-merged' };
    case 'merged':
      return { branch, eligible: true, reason: 'eligible' };
  }
}

/**
 * ローカルブランチを1本ずつ判定し、削除候補をリモート有無で振り分ける
 */
export async function findCleanupCandidates(
  inventory: BranchInventory,
  deps: EligibilityDeps,
): Promise<CleanupCandidates> {
  const decisions: EligibilityDecision[] = [];
  const localOnly: BranchName[] = [];
  const withRemote: BranchName[] = [];

  for (const name of inventory.localBranches) {
    const decision = await classifyBranch(toBranch(name, inventory, deps.policy), deps);
    decisions.push(decision);

    if (!decision.eligible) {
      continue;
    }
    if (decision.branch.isRemote) {
      withRemote.push(name);
    } else {
      localOnly.push(name);
    }
  }

  return {
    localOnly,
    withRemote,
    currentBranchSkipped: decisions.some((decision) => decision.reason === 'current'),
    decisions,
  };
}
