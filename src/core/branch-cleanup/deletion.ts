/**
 * ブランチ削除の実行
 *
 * 1本ずつ順に処理し、あるブランチの失敗で残りを止めない。
 * 結果はブランチごとの DeletionOutcome として積み上げる。
 */

import type { GitEffects } from '../../adapters/vcs/git-effects.ts';
import type { BranchName, RemoteName, RepoPath } from '../../types/branded.ts';
import type {
  DeleteResult,
  DeletionOutcome,
  DeletionReport,
  ProtectionPolicy,
} from '../../types/branch-cleanup.ts';
import type { GitError } from '../../types/errors.ts';
import type { Logger } from '../../types/logger.ts';
import type { PromptEffects } from '../../types/prompt.ts';
import { isErr } from 'option-t/plain_result';
import { isProtectedBranch } from './protection.ts';
import { countDeleted, describeOutcome } from './summary.ts';

export type DeletionDeps = {
  readonly gitEffects: GitEffects;
  readonly repo: RepoPath;
  readonly remote: RemoteName;
  readonly policy: ProtectionPolicy;
  readonly prompt: PromptEffects;
  readonly logger: Logger;
};

/**
 * リモート側の扱い
 * - keep: ローカルのみ削除
 * - ask: ローカル削除後にリモート削除を確認する
 */
type RemoteMode = 'keep' | 'ask';

/**
 * ローカルブランチを削除し、結果を構造化する
 */
export async function deleteLocalBranch(
  gitEffects: GitEffects,
  repo: RepoPath,
  branch: BranchName,
  force: boolean,
): Promise<DeleteResult> {
  const result = await gitEffects.deleteBranch(repo, branch, force);
  if (!isErr(result)) {
    return { kind: 'deleted' };
  }
  if (result.err.type === 'GitBranchNotFullyMergedError') {
    return { kind: 'not-fully-merged', error: result.err };
  }
  return { kind: 'other-error', error: result.err };
}

const outcome = (
  branch: BranchName,
  localDeleted: boolean,
  failureKind: DeletionOutcome['failureKind'],
  errors: GitError[] = [],
  remoteDeleted = false,
): DeletionOutcome => ({ branch, localDeleted, remoteDeleted, failureKind, errors });

/**
 * "not fully merged" で拒否されたブランチの復旧
 *
 * リモートに実在しなければ追跡参照が古いだけなので強制削除する。
 * 実在する、または確認できない場合は本当に未マージとして扱う。
 */
async function recoverStaleRef(
  deps: DeletionDeps,
  branch: BranchName,
  original: GitError,
): Promise<DeletionOutcome> {
  const existsResult = await deps.gitEffects.remoteBranchExists(deps.repo, deps.remote, branch);
  if (isErr(existsResult)) {
    return outcome(branch, false, 'not-fully-merged-then-failed', [original, existsResult.err]);
  }
  if (existsResult.val) {
    return outcome(branch, false, 'not-fully-merged-then-failed', [original]);
  }

  deps.logger.verbose(
    `${branch} is not on ${deps.remote} anymore (stale remote-tracking ref); force deleting.`,
  );
  const forced = await deleteLocalBranch(deps.gitEffects, deps.repo, branch, true);
  if (forced.kind === 'deleted') {
    return outcome(branch, true, 'not-fully-merged-then-recovered');
  }
  return outcome(branch, false, 'not-fully-merged-then-failed', [original, forced.error]);
}

async function deleteRemoteCopy(
  deps: DeletionDeps,
  branch: BranchName,
): Promise<DeletionOutcome> {
  const confirmed = await deps.prompt.confirm(
    `Also delete remote branch ${deps.remote}/${branch}?`,
    false,
  );
  if (!confirmed) {
    return outcome(branch, true, 'none');
  }

  const result = await deps.gitEffects.deleteRemoteBranch(deps.repo, deps.remote, branch);
  if (isErr(result)) {
    return outcome(branch, true, 'remote-failure', [result.err]);
  }
  return outcome(branch, true, 'none', [], true);
}

/**
 * 1ブランチを削除する
 */
export async function deleteOneBranch(
  deps: DeletionDeps,
  branch: BranchName,
  remoteMode: RemoteMode,
): Promise<DeletionOutcome> {
  // 上流の判定に関係なく保護ブランチは消さない
  if (isProtectedBranch(branch, deps.policy)) {
    return outcome(branch, false, 'protected');
  }

  const result = await deleteLocalBranch(deps.gitEffects, deps.repo, branch, false);
  switch (result.kind) {
    case 'deleted':
      return remoteMode === 'ask' ? deleteRemoteCopy(deps, branch) : outcome(branch, true, 'none');
    case 'not-fully-merged':
      return recoverStaleRef(deps, branch, result.error);
    case 'other-error':
      return outcome(
        branch,
        false,
        result.error.type === 'GitRefNotWritableError' ? 'not-writable' : 'unknown',
        [result.error],
      );
  }
}

const reportOutcome = (logger: Logger, result: DeletionOutcome): void => {
  switch (result.failureKind) {
    case 'none':
      logger.success(
        result.remoteDeleted
          ? `Deleted ${result.branch} (local and remote)`
          : `Deleted ${result.branch}`,
      );
      return;
    case 'not-fully-merged-then-recovered':
      logger.success(describeOutcome(result));
      return;
    case 'remote-failure':
    case 'protected':
    case 'not-writable':
    case 'not-fully-merged-then-failed':
    case 'unknown':
      logger.warn(describeOutcome(result));
      return;
  }
};

/**
 * 削除候補を削除する
 *
 * quiet でない場合は最初に1回確認し、拒否されたら何も削除しない。
 * リモートにもあるブランチは、ローカル削除後にブランチごとにリモート削除を確認する。
 * quiet の場合は確認せず、リモートは残す。
 *
 * @param localOnly ローカルにのみあるブランチ
 * @param withRemote リモートにもあるブランチ
 * @param quiet 確認を省略する
 */
export async function deleteBranches(
  deps: DeletionDeps,
  localOnly: readonly BranchName[],
  withRemote: readonly BranchName[],
  quiet: boolean,
): Promise<DeletionReport> {
  const total = localOnly.length + withRemote.length;
  if (total === 0) {
    return { deletedCount: 0, outcomes: [], cancelled: false };
  }

  if (!quiet) {
    const confirmed = await deps.prompt.confirm(`Delete ${total} branch(es)?`, true);
    if (!confirmed) {
      return { deletedCount: 0, outcomes: [], cancelled: true };
    }
  }

  const outcomes: DeletionOutcome[] = [];

  for (const branch of localOnly) {
    const result = await deleteOneBranch(deps, branch, 'keep');
    reportOutcome(deps.logger, result);
    outcomes.push(result);
  }

  for (const branch of withRemote) {
    const result = await deleteOneBranch(deps, branch, quiet ? 'keep' : 'ask');
    reportOutcome(deps.logger, result);
    outcomes.push(result);
  }

  return { deletedCount: countDeleted(outcomes), outcomes, cancelled: false };
}
