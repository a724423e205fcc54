/**
 * GitHub Pull Request API Adapter
 *
 * ブランチ掃除に必要な Pull Request 情報を Octokit で取得する。
 */

import type { Octokit } from '@octokit/rest';
import type {
  PullRequestRecord,
  PullRequestStateFilter,
  RepositoryRef,
} from '../../types/github.ts';
import { createErr, createOk, type Result } from 'option-t/plain_result';
import type { GitHubError } from '../../types/errors.ts';
import { classifyGitHubError } from './error.ts';

const PER_PAGE = 100;

/**
 * REST API の Pull Request レスポンスのうち参照する部分
 *
 * head.repo はフォーク元が削除されていると null になる。
 */
export type PullRequestPayload = {
  number: number;
  state: string;
  head: { ref: string; repo?: { full_name: string } | null };
  base: { repo?: { full_name: string } | null };
};

/**
 * APIレスポンスを PullRequestRecord に変換する
 */
export function toPullRequestRecord(data: PullRequestPayload): PullRequestRecord {
  return {
    number: data.number,
    state: data.state,
    headRef: data.head.ref,
    headRepoFullName: data.head.repo?.full_name ?? null,
    baseRepoFullName: data.base.repo?.full_name ?? null,
  };
}

/**
 * リポジトリの全 Pull Request を取得する（全ページ）
 *
 * @param octokit - Octokitインスタンス
 * @param repository - 対象リポジトリ
 * @param state - 状態フィルタ
 */
export async function listAllPullRequests(
  octokit: Octokit,
  repository: RepositoryRef,
  state: PullRequestStateFilter,
): Promise<Result<PullRequestRecord[], GitHubError>> {
  try {
    const pulls = await octokit.paginate(octokit.rest.pulls.list, {
      owner: repository.owner,
      repo: repository.repo,
      state,
      per_page: PER_PAGE,
    });

    return createOk(pulls.map(toPullRequestRecord));
  } catch (error) {
    return createErr(classifyGitHubError(error, 'repository'));
  }
}

/**
 * head ブランチ名で Pull Request を1件探す
 *
 * 同じブランチから複数の PR が作られている場合は open のものを優先する。
 *
 * @param octokit - Octokitインスタンス
 * @param repository - 対象リポジトリ
 * @param branch - head ブランチ名（owner 接頭辞なし）
 * @param state - 状態フィルタ
 */
export async function findPullRequestByBranch(
  octokit: Octokit,
  repository: RepositoryRef,
  branch: string,
  state: PullRequestStateFilter,
): Promise<Result<PullRequestRecord | null, GitHubError>> {
  try {
    const response = await octokit.rest.pulls.list({
      owner: repository.owner,
      repo: repository.repo,
      state,
      head: `${repository.owner}:${branch}`,
      per_page: PER_PAGE,
    });

    return createOk(pickPullRequest(response.data.map(toPullRequestRecord)));
  } catch (error) {
    return createErr(classifyGitHubError(error, 'pullRequest'));
  }
}

/**
 * 候補から1件選ぶ（open 優先、なければ先頭）
 */
export function pickPullRequest(records: PullRequestRecord[]): PullRequestRecord | null {
  return records.find((record) => record.state === 'open') ?? records[0] ?? null;
}
