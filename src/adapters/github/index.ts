import type { PullRequestEffects, RepositoryRef } from '../../types/github.ts';
import type { GitHubConfig } from '../../types/config.ts';
import type { GitHubError } from '../../types/errors.ts';
import { createGitHubClient } from './client.ts';
import { findPullRequestByBranch, listAllPullRequests } from './pull-request.ts';
import { createOk, isErr, type Result } from 'option-t/plain_result';

/**
 * Octokit ベースの PullRequestEffects を生成
 *
 * トークン未設定の場合はエラーを返す。
 */
export function createPullRequestEffects(
  config: GitHubConfig,
  repository: RepositoryRef,
  env: NodeJS.ProcessEnv = process.env,
): Result<PullRequestEffects, GitHubError> {
  const clientResult = createGitHubClient(config, env);
  if (isErr(clientResult)) {
    return clientResult;
  }
  const octokit = clientResult.val;

  return createOk({
    listAllPullRequests: (state) => listAllPullRequests(octokit, repository, state),
    findPullRequestByBranch: (branch, state) =>
      findPullRequestByBranch(octokit, repository, branch, state),
  });
}

export { parseGitHubRemoteUrl } from './remote-url.ts';
export type { PullRequestEffects } from '../../types/github.ts';
