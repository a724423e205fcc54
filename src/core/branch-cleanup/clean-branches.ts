/**
 * ブランチクリーンアップ全体の流れ
 *
 * 一覧取得 → PR 対応付け → 判定 → 確認 → 削除 → 件数表示。
 * 呼び出し元に返るエラーは一覧取得の失敗だけ。
 */

import type { GitEffects } from '../../adapters/vcs/git-effects.ts';
import type { RemoteName, RepoPath } from '../../types/branded.ts';
import type {
  CleanupCandidates,
  DeletionReport,
  ProtectionPolicy,
} from '../../types/branch-cleanup.ts';
import type { InventoryError } from '../../types/errors.ts';
import type { PullRequestEffects } from '../../types/github.ts';
import type { Logger } from '../../types/logger.ts';
import type { PromptEffects } from '../../types/prompt.ts';
import { createOk, isErr, type Result } from 'option-t/plain_result';
import { readBranchInventory } from './inventory.ts';
import { resolvePullRequestLookup } from './pull-request-lookup.ts';
import { findCleanupCandidates } from './eligibility.ts';
import { deleteBranches } from './deletion.ts';
import { describeDecision, formatDeletedCount } from './summary.ts';

export type BranchCleanupDeps = {
  readonly gitEffects: GitEffects;
  /** null の場合は PR による判定を行わない */
  readonly pullRequestEffects: PullRequestEffects | null;
  readonly prompt: PromptEffects;
  readonly logger: Logger;
};

export type BranchCleanupOptions = {
  readonly repo: RepoPath;
  readonly remote: RemoteName;
  readonly baseRef: string;
  readonly policy: ProtectionPolicy;
  /** 確認を省略し、リモートブランチは残す */
  readonly quiet: boolean;
};

export type BranchCleanupResult = {
  readonly deletedCount: number;
  readonly candidates: CleanupCandidates;
  readonly report: DeletionReport;
};

const printCandidates = (
  logger: Logger,
  candidates: CleanupCandidates,
  remote: RemoteName,
  quiet: boolean,
): void => {
  const total = candidates.localOnly.length + candidates.withRemote.length;
  logger.info(`Found ${total} merged branch(es) to delete:`);

  for (const branch of candidates.localOnly) {
    logger.info(`  - ${branch}`);
  }

  if (candidates.withRemote.length > 0) {
    logger.info(`Also on ${remote}:`);
    for (const branch of candidates.withRemote) {
      logger.info(`  - ${branch}`);
    }
    logger.note(
      quiet
        ? `Remote branches on ${remote} are kept in quiet mode.`
        : `You will be asked separately before each remote branch on ${remote} is deleted.`,
    );
  }
};

/**
 * マージ済みブランチを削除する
 */
export async function runBranchCleanup(
  deps: BranchCleanupDeps,
  options: BranchCleanupOptions,
): Promise<Result<BranchCleanupResult, InventoryError>> {
  const { logger } = deps;

  logger.section('Cleaning up merged branches');
  logger.debug(`Base: ${options.baseRef}, remote: ${options.remote}, quiet: ${options.quiet}`);

  const inventoryResult = await readBranchInventory(deps.gitEffects, options.repo, options.remote);
  if (isErr(inventoryResult)) {
    return inventoryResult;
  }
  const inventory = inventoryResult.val;
  logger.debug(
    `Local: ${inventory.localBranches.size}, remote: ${inventory.remoteBranches.size}, current: ${inventory.currentBranch}`,
  );

  const lookup = await resolvePullRequestLookup(deps.pullRequestEffects, logger);
  const candidates = await findCleanupCandidates(inventory, {
    gitEffects: deps.gitEffects,
    repo: options.repo,
    baseRef: options.baseRef,
    policy: options.policy,
    lookup,
    logger,
  });

  for (const decision of candidates.decisions) {
    if (!decision.eligible) {
      logger.verbose(`Skip ${describeDecision(decision)}`);
    }
  }

  const eligibleCount = candidates.localOnly.length + candidates.withRemote.length;
  if (candidates.currentBranchSkipped && eligibleCount > 0) {
    logger.note(`Skipping current branch ${inventory.currentBranch}.`);
  }

  if (eligibleCount === 0) {
    logger.info('No merged branches to delete.');
  } else {
    printCandidates(logger, candidates, options.remote, options.quiet);
  }

  const report = await deleteBranches(
    {
      gitEffects: deps.gitEffects,
      repo: options.repo,
      remote: options.remote,
      policy: options.policy,
      prompt: deps.prompt,
      logger,
    },
    candidates.localOnly,
    candidates.withRemote,
    options.quiet,
  );

  if (report.cancelled) {
    logger.info('Cancelled. No branches were deleted.');
  }
  logger.summary(formatDeletedCount(report.deletedCount));

  return createOk({ deletedCount: report.deletedCount, candidates, report });
}
