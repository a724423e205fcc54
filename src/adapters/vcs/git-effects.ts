/**
 * GitEffects インターフェース
 *
 * Git操作の副作用を抽象化するインターフェース。
 * すべての操作は Result<T, GitError> を返し、エラーハンドリングを統一する。
 */

import type { Result } from 'option-t/plain_result';
import type { GitError } from '../../types/errors.ts';
import type { RepoPath, BranchName, RemoteName } from '../../types/branded.ts';

/**
 * GitEffects インターフェース
 *
 * Git の副作用操作を抽象化。テスト時にはモックで置き換え可能。
 */
export interface GitEffects {
  // ===== ブランチ一覧 =====

  /**
   * ローカルブランチ名の一覧を取得
   * @param repo リポジトリパス
   */
  listLocalBranches(repo: RepoPath): Promise<Result<BranchName[], GitError>>;

  /**
   * リモート追跡ブランチ名の一覧を取得
   *
   * `<remote>/` 接頭辞を除いたブランチ名を返す。`<remote>/HEAD` は含めない。
   * ローカルの追跡参照を読むだけなので、既に削除されたリモートブランチが残ることがある。
   *
   * @param repo リポジトリパス
   * @param remote リモート名
   */
  listRemoteBranches(repo: RepoPath, remote: RemoteName): Promise<Result<BranchName[], GitError>>;

  /**
   * 現在のブランチ名を取得（detached HEAD の場合は "HEAD"）
   * @param repo リポジトリパス
   */
  getCurrentBranch(repo: RepoPath): Promise<Result<BranchName, GitError>>;

  // ===== マージ判定 =====

  /**
   * ブランチが基準参照にマージ済みかを判定
   * @param repo リポジトリパス
   * @param branch 判定するブランチ
   * @param baseRef 基準参照（例: "origin/develop"）
   */
  isMergedInto(repo: RepoPath, branch: BranchName, baseRef: string): Promise<Result<boolean, GitError>>;

  // ===== 削除操作 =====

  /**
   * ローカルブランチを削除
   *
   * 未マージを理由に拒否された場合は GitBranchNotFullyMergedError を返す。
   *
   * @param repo リポジトリパス
   * @param branch ブランチ名
   * @param force 強制削除するか（`-D`）
   */
  deleteBranch(repo: RepoPath, branch: BranchName, force?: boolean): Promise<Result<void, GitError>>;

  /**
   * リモートブランチを削除（`git push <remote> --delete <branch>`）
   * @param repo リポジトリパス
   * @param remote リモート名
   * @param branch ブランチ名
   */
  deleteRemoteBranch(repo: RepoPath, remote: RemoteName, branch: BranchName): Promise<Result<void, GitError>>;

  // ===== リモート情報 =====

  /**
   * リモート上にブランチが実在するかを問い合わせる（`git ls-remote`）
   *
   * ローカルの追跡参照ではなくリモートそのものを見る。
   *
   * @param repo リポジトリパス
   * @param remote リモート名
   * @param branch ブランチ名
   */
  remoteBranchExists(repo: RepoPath, remote: RemoteName, branch: BranchName): Promise<Result<boolean, GitError>>;

  /**
   * リモートの fetch URL を取得
   * @param repo リポジトリパス
   * @param remote リモート名
   * @returns リモートが存在しなければ null
   */
  getRemoteUrl(repo: RepoPath, remote: RemoteName): Promise<Result<string | null, GitError>>;
}
