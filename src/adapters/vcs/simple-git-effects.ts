/**
 * SimpleGitEffects - simple-git を使った GitEffects 実装
 *
 * ブランチ一覧・マージ判定は `for-each-ref` を直接使う。
 * `git branch` の人間向け出力（detached HEAD 表記など）をパースせずに済むため。
 */

import { simpleGit } from 'simple-git';
import { tryCatchIntoResultAsync } from 'option-t/plain_result/try_catch_async';
import { mapErrForResult } from 'option-t/plain_result/map_err';
import { createErr, isErr } from 'option-t/plain_result';
import type { GitError } from '../../types/errors.ts';
import { branchName } from '../../types/branded.ts';
import { gitCommandFailed, gitRepoNotFound } from '../../types/errors.ts';
import type { GitEffects } from './git-effects.ts';
import { classifyDeleteBranchError, parseLsRemoteRefs, parseRefList } from './git-output.ts';

const LOCAL_BRANCH_PREFIX = 'refs/heads/';

/**
 * エラーをGitErrorに変換するヘルパー
 */
const toGitError =
  (operation: string) =>
  (err: unknown): GitError => {
    const stderr = err instanceof Error ? err.message : String(err);
    return gitCommandFailed(operation, stderr, -1);
  };

/**
 * simple-git を使用した GitEffects 実装を作成
 */
export const createSimpleGitEffects = (): GitEffects => {
  // ===== ブランチ一覧 =====

  const listLocalBranches: GitEffects['listLocalBranches'] = async (repo) => {
    const isRepoResult = await tryCatchIntoResultAsync(async () => simpleGit(repo).checkIsRepo());
    if (isErr(isRepoResult)) {
      return createErr(toGitError('listLocalBranches')(isRepoResult.err));
    }
    if (!isRepoResult.val) {
      return createErr(gitRepoNotFound(repo));
    }

    const result = await tryCatchIntoResultAsync(async () => {
      const output = await simpleGit(repo).raw(['for-each-ref', '--format=%(refname)', LOCAL_BRANCH_PREFIX]);
      return parseRefList(output, LOCAL_BRANCH_PREFIX).map(branchName);
    });
    return mapErrForResult(result, toGitError('listLocalBranches'));
  };

  const listRemoteBranches: GitEffects['listRemoteBranches'] = async (repo, remote) => {
    const result = await tryCatchIntoResultAsync(async () => {
      const prefix = `refs/remotes/${remote}/`;
      const output = await simpleGit(repo).raw(['for-each-ref', '--format=%(refname)', prefix]);
      return parseRefList(output, prefix).map(branchName);
    });
    return mapErrForResult(result, toGitError('listRemoteBranches'));
  };

  const getCurrentBranch: GitEffects['getCurrentBranch'] = async (repo) => {
    const result = await tryCatchIntoResultAsync(async () => {
      const name = await simpleGit(repo).revparse(['--abbrev-ref', 'HEAD']);
      return branchName(name.trim());
    });
    return mapErrForResult(result, toGitError('getCurrentBranch'));
  };

  // ===== マージ判定 =====

  const isMergedInto: GitEffects['isMergedInto'] = async (repo, branch, baseRef) => {
    const result = await tryCatchIntoResultAsync(async () => {
      const output = await simpleGit(repo).raw([
        'for-each-ref',
        `--merged=${baseRef}`,
        '--format=%(refname)',
        LOCAL_BRANCH_PREFIX,
      ]);
      return parseRefList(output, LOCAL_BRANCH_PREFIX).includes(branch);
    });
    return mapErrForResult(result, toGitError(`isMergedInto ${baseRef}`));
  };

  // ===== 削除操作 =====

  const deleteBranch: GitEffects['deleteBranch'] = async (repo, branch, force = false) => {
    const result = await tryCatchIntoResultAsync(async () => {
      const flag = force ? '-D' : '-d';
      await simpleGit(repo).raw(['branch', flag, branch]);
    });
    return mapErrForResult(result, (err) => classifyDeleteBranchError(branch, err));
  };

  const deleteRemoteBranch: GitEffects['deleteRemoteBranch'] = async (repo, remote, branch) => {
    const result = await tryCatchIntoResultAsync(async () => {
      await simpleGit(repo).raw(['push', remote, '--delete', branch]);
    });
    return mapErrForResult(result, toGitError(`push ${remote} --delete ${branch}`));
  };

  // ===== リモート情報 =====

  const remoteBranchExists: GitEffects['remoteBranchExists'] = async (repo, remote, branch) => {
    const result = await tryCatchIntoResultAsync(async () => {
      const ref = `${LOCAL_BRANCH_PREFIX}${branch}`;
      const output = await simpleGit(repo).raw(['ls-remote', '--heads', remote, ref]);
      return parseLsRemoteRefs(output).includes(ref);
    });
    return mapErrForResult(result, toGitError(`ls-remote ${remote}`));
  };

  const getRemoteUrl: GitEffects['getRemoteUrl'] = async (repo, remote) => {
    const result = await tryCatchIntoResultAsync(async () => {
      const remotes = await simpleGit(repo).getRemotes(true);
      const found = remotes.find((r) => r.name === remote);
      return found ? found.refs.fetch : null;
    });
    return mapErrForResult(result, toGitError('getRemoteUrl'));
  };

  return {
    listLocalBranches,
    listRemoteBranches,
    getCurrentBranch,
    isMergedInto,
    deleteBranch,
    deleteRemoteBranch,
    remoteBranchExists,
    getRemoteUrl,
  };
};
