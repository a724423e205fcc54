/**
 * git コマンド出力のパースとエラー分類
 *
 * simple-git-effects.ts から副作用のない部分を切り出したもの。
 */

import type { BranchName } from '../../types/branded.ts';
import type { GitError } from '../../types/errors.ts';
import { gitBranchNotFullyMerged, gitCommandFailed, gitRefNotWritable } from '../../types/errors.ts';

const NOT_FULLY_MERGED_PATTERN = /not fully merged/i;

const NOT_WRITABLE_PATTERNS = [
  /permission denied/i,
  /cannot lock ref/i,
  /unable to create '.*\.lock'/i,
  /read-only file system/i,
] as const;

/**
 * `git for-each-ref --format=%(refname)` の出力から、接頭辞配下のブランチ名を取り出す
 *
 * 出力例（prefix = "refs/remotes/origin/"）:
 * ```
 * refs/remotes/origin/HEAD
 * refs/remotes/origin/develop
 * refs/remotes/origin/feat/login
 * ```
 * → `["develop", "feat/login"]`
 *
 * @param output for-each-ref の標準出力
 * @param prefix 取り除く参照接頭辞（末尾スラッシュ付き）
 */
export const parseRefList = (output: string, prefix: string): string[] => {
  const names: string[] = [];

  for (const line of output.split('\n')) {
    const ref = line.trim();
    if (!ref.startsWith(prefix)) {
      continue;
    }

    const name = ref.slice(prefix.length);
    // <remote>/HEAD はシンボリック参照でありブランチではない
    if (name === '' || name === 'HEAD') {
      continue;
    }

    names.push(name);
  }

  return names;
};

/**
 * `git ls-remote --heads` の出力から参照名を取り出す
 *
 * 出力例:
 * ```
 * 3f2a1c0d...\trefs/heads/feat/login
 * ```
 */
export const parseLsRemoteRefs = (output: string): string[] => {
  const refs: string[] = [];

  for (const line of output.split('\n')) {
    const [, ref] = line.trim().split(/\s+/);
    if (ref) {
      refs.push(ref);
    }
  }

  return refs;
};

/**
 * `git branch -d/-D` の失敗を GitError に分類する
 *
 * git はこれらの失敗を終了コードで区別しないため、stderr の文言で判定する。
 * 文言に依存するのはここだけで、呼び出し側はエラーの type で分岐する。
 */
export const classifyDeleteBranchError = (branch: BranchName, err: unknown): GitError => {
  const stderr = err instanceof Error ? err.message : String(err);

  if (NOT_FULLY_MERGED_PATTERN.test(stderr)) {
    return gitBranchNotFullyMerged(branch, stderr);
  }

  if (NOT_WRITABLE_PATTERNS.some((pattern) => pattern.test(stderr))) {
    return gitRefNotWritable(branch, stderr);
  }

  return gitCommandFailed(`branch -d ${branch}`, stderr, -1);
};
