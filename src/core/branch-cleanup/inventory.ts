/**
 * ブランチ一覧の収集
 *
 * どれか1つでも失敗したら削除は始めない。リトライもしない。
 */

import type { GitEffects } from '../../adapters/vcs/git-effects.ts';
import type { RemoteName, RepoPath } from '../../types/branded.ts';
import type { BranchInventory } from '../../types/branch-cleanup.ts';
import { inventoryError, type InventoryError } from '../../types/errors.ts';
import { createErr, createOk, isErr, type Result } from 'option-t/plain_result';

export async function readBranchInventory(
  gitEffects: GitEffects,
  repo: RepoPath,
  remote: RemoteName,
): Promise<Result<BranchInventory, InventoryError>> {
  const localResult = await gitEffects.listLocalBranches(repo);
  if (isErr(localResult)) {
    return createErr(inventoryError('listLocalBranches', localResult.err));
  }

  const remoteResult = await gitEffects.listRemoteBranches(repo, remote);
  if (isErr(remoteResult)) {
    return createErr(inventoryError('listRemoteBranches', remoteResult.err));
  }

  const currentResult = await gitEffects.getCurrentBranch(repo);
  if (isErr(currentResult)) {
    return createErr(inventoryError('getCurrentBranch', currentResult.err));
  }

  return createOk({
    localBranches: new Set(localResult.val),
    remoteBranches: new Set(remoteResult.val),
    currentBranch: currentResult.val,
  });
}
