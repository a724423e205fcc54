/**
 * リモートURLから GitHub リポジトリを推定する
 */

import type { RepositoryRef } from '../../types/github.ts';

/**
 * 対応する形式:
 * - https://github.com/owner/repo(.git)
 * - git@github.com:owner/repo(.git)
 * - ssh://git@github.com/owner/repo(.git)
 *
 * ホスト名は問わない（GitHub Enterprise もこの形式になる）。
 *
 * @param url - `git remote get-url` 相当の値
 * @returns owner/repo が取れなければ null
 */
export function parseGitHubRemoteUrl(url: string): RepositoryRef | null {
  const trimmed = url.trim().replace(/\/+$/, '');
  if (!trimmed) {
    return null;
  }

  const withoutGit = trimmed.replace(/\.git$/, '');

  // scp形式: git@host:owner/repo
  const scpMatch = withoutGit.match(/^[^@/\s]+@[^:/\s]+:([^/\s]+)\/([^/\s]+)$/);
  if (scpMatch) {
    return toRepositoryRef(scpMatch[1], scpMatch[2]);
  }

  // URL形式: https://host/owner/repo, ssh://git@host/owner/repo
  const urlMatch = withoutGit.match(/^[a-z+]+:\/\/[^/\s]+\/([^/\s]+)\/([^/\s]+)$/i);
  if (urlMatch) {
    return toRepositoryRef(urlMatch[1], urlMatch[2]);
  }

  return null;
}

const toRepositoryRef = (owner: string | undefined, repo: string | undefined): RepositoryRef | null => {
  if (!owner || !repo) {
    return null;
  }
  return { owner, repo };
};
