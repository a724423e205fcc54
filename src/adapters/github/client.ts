import { Octokit } from '@octokit/rest';
import type { GitHubConfig } from '../../types/config.ts';
import { createErr, createOk, type Result } from 'option-t/plain_result';
import { githubAuthFailed, type GitHubError } from '../../types/errors.ts';

/**
 * 設定と環境変数から Octokit クライアントを作る
 *
 * @param config GitHub連携設定
 * @param env 環境変数（テスト用に差し替え可能）
 */
export function createGitHubClient(
  config: GitHubConfig,
  env: NodeJS.ProcessEnv = process.env,
): Result<Octokit, GitHubError> {
  const token = env[config.auth.tokenEnvName];
  if (!token) {
    return createErr(
      githubAuthFailed(
        `Environment variable ${config.auth.tokenEnvName} is not set`,
        config.auth.tokenEnvName,
      ),
    );
  }

  const octokit = new Octokit({
    auth: token,
    baseUrl: config.apiBaseUrl,
  });

  return createOk(octokit);
}
