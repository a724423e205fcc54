/**
 * Pull Request 取得先の解決
 *
 * owner/repo は設定を優先し、なければリモートURLから推定する。
 * 推定できない、またはトークンがない場合は null（PR 判定なし）。
 */

import type { GitEffects } from '../../adapters/vcs/git-effects.ts';
import { createPullRequestEffects, parseGitHubRemoteUrl } from '../../adapters/github/index.ts';
import type { RemoteName, RepoPath } from '../../types/branded.ts';
import type { GitHubConfig } from '../../types/config.ts';
import type { PullRequestEffects, RepositoryRef } from '../../types/github.ts';
import type { Logger } from '../../types/logger.ts';
import { isErr } from 'option-t/plain_result';

export async function resolveRepositoryRef(
  config: GitHubConfig,
  gitEffects: GitEffects,
  repo: RepoPath,
  remote: RemoteName,
  logger: Logger,
): Promise<RepositoryRef | null> {
  if (config.owner && config.repo) {
    return { owner: config.owner, repo: config.repo };
  }

  const urlResult = await gitEffects.getRemoteUrl(repo, remote);
  if (isErr(urlResult)) {
    logger.verbose(`Could not read URL of remote ${remote}: ${urlResult.err.message}`);
    return null;
  }
  if (urlResult.val === null) {
    logger.verbose(`Remote ${remote} is not configured.`);
    return null;
  }

  const parsed = parseGitHubRemoteUrl(urlResult.val);
  if (parsed === null) {
    logger.verbose(`Remote URL is not a GitHub repository: ${urlResult.val}`);
    return null;
  }

  return {
    owner: config.owner ?? parsed.owner,
    repo: config.repo ?? parsed.repo,
  };
}

export async function resolvePullRequestEffects(
  config: GitHubConfig,
  gitEffects: GitEffects,
  repo: RepoPath,
  remote: RemoteName,
  logger: Logger,
  env: NodeJS.ProcessEnv = process.env,
): Promise<PullRequestEffects | null> {
  const repository = await resolveRepositoryRef(config, gitEffects, repo, remote, logger);
  if (repository === null) {
    return null;
  }

  const effectsResult = createPullRequestEffects(config, repository, env);
  if (isErr(effectsResult)) {
    logger.verbose(effectsResult.err.message);
    return null;
  }

  logger.debug(`Using GitHub repository ${repository.owner}/${repository.repo}`);
  return effectsResult.val;
}
