/**
 * ブランチ → Pull Request の対応付け
 *
 * 全件取得で索引を作れればそれを使い、失敗したらブランチごとの問い合わせに切り替える。
 * 判定側は PullRequestLookup だけに依存する。
 */

import type { BranchName } from '../../types/branded.ts';
import type { PullRequestEffects, PullRequestRecord } from '../../types/github.ts';
import type { GitHubError } from '../../types/errors.ts';
import type { Logger } from '../../types/logger.ts';
import { createOk, isErr, type Result } from 'option-t/plain_result';

/**
 * head ブランチ名をキーにした索引
 */
export type PullRequestIndex = ReadonlyMap<string, PullRequestRecord>;

export interface PullRequestLookup {
  readonly kind: 'bulk' | 'per-branch' | 'none';
  /**
   * ブランチに対応する同一リポジトリの PR を返す
   * @returns 見つからなければ null
   */
  find(branch: BranchName): Promise<Result<PullRequestRecord | null, GitHubError>>;
}

/**
 * head と base が同じリポジトリか（フォークからの PR を除外する）
 */
export function isSameRepository(record: PullRequestRecord): boolean {
  if (!record.headRef) {
    return false;
  }
  if (!record.headRepoFullName || !record.baseRepoFullName) {
    return false;
  }
  return record.headRepoFullName === record.baseRepoFullName;
}

/**
 * PR 一覧から索引を作る
 *
 * 同じ head ref が重複した場合は基本的に後勝ちだが、open の記録だけは例外で、
 * 後から来た open 以外の記録では上書きしない（単純な後勝ちとは異なる）。
 */
export function buildPullRequestIndex(records: readonly PullRequestRecord[]): PullRequestIndex {
  const index = new Map<string, PullRequestRecord>();

  for (const record of records) {
    if (!isSameRepository(record)) {
      continue;
    }
    const existing = index.get(record.headRef);
    if (existing?.state === 'open' && record.state !== 'open') {
      continue;
    }
    index.set(record.headRef, record);
  }

  return index;
}

export function createBulkIndexLookup(index: PullRequestIndex): PullRequestLookup {
  return {
    kind: 'bulk',
    find: async (branch) => createOk(index.get(branch) ?? null),
  };
}

export function createPerBranchLookup(effects: PullRequestEffects): PullRequestLookup {
  return {
    kind: 'per-branch',
    async find(branch) {
      const result = await effects.findPullRequestByBranch(branch, 'all');
      if (isErr(result)) {
        return result;
      }
      const record = result.val;
      return createOk(record !== null && isSameRepository(record) ? record : null);
    },
  };
}

/**
 * PR 情報が得られない場合（フォージ未設定）
 */
export const noPullRequestLookup: PullRequestLookup = {
  kind: 'none',
  find: async () => createOk(null),
};

/**
 * 実行時に戦略を選ぶ
 *
 * @param effects null の場合は PR による判定を行わない
 */
export async function resolvePullRequestLookup(
  effects: PullRequestEffects | null,
  logger: Logger,
): Promise<PullRequestLookup> {
  if (effects === null) {
    logger.verbose('Pull request checks are disabled (no GitHub repository or token).');
    return noPullRequestLookup;
  }

  const listResult = await effects.listAllPullRequests('all');
  if (isErr(listResult)) {
    logger.verbose(
      `Could not fetch pull requests in bulk (${listResult.err.message}); falling back to per-branch lookup.`,
    );
    return createPerBranchLookup(effects);
  }

  const index = buildPullRequestIndex(listResult.val);
  logger.debug(`Indexed ${index.size} pull request(s) from ${listResult.val.length} fetched.`);
  return createBulkIndexLookup(index);
}
