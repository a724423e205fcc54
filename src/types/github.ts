import type { Result } from 'option-t/plain_result';
import type { GitHubError } from './errors.ts';

/**
 * Pull Request の状態
 *
 * GitHub REST API は open/closed のみを返すが、他のフォージや
 * 将来の状態値を落とさないよう任意の文字列も受け付ける。
 */
export type PullRequestState = 'open' | 'closed' | (string & {});

/**
 * 一覧取得時の状態フィルタ
 */
export type PullRequestStateFilter = 'open' | 'closed' | 'all';

/**
 * ブランチとの対応付けに必要な Pull Request 情報
 */
export type PullRequestRecord = {
  readonly number: number;
  readonly state: PullRequestState;
  /** head ブランチ名（空の場合は対応付け不可） */
  readonly headRef: string;
  /** head リポジトリの owner/name（フォーク削除済みの場合は null） */
  readonly headRepoFullName: string | null;
  /** base リポジトリの owner/name */
  readonly baseRepoFullName: string | null;
};

/**
 * 対象リポジトリ
 */
export type RepositoryRef = {
  readonly owner: string;
  readonly repo: string;
};

/**
 * Pull Request 取得の副作用インターフェース
 *
 * テスト時にはインメモリ実装で置き換える。
 */
export interface PullRequestEffects {
  /**
   * 全 Pull Request を取得（ページングは実装側で吸収）
   * @param state 状態フィルタ
   */
  listAllPullRequests(state: PullRequestStateFilter): Promise<Result<PullRequestRecord[], GitHubError>>;

  /**
   * ブランチ名から Pull Request を1件探す
   * @param branch head ブランチ名（owner 接頭辞なし）
   * @param state 状態フィルタ
   * @returns 見つからなければ null
   */
  findPullRequestByBranch(
    branch: string,
    state: PullRequestStateFilter,
  ): Promise<Result<PullRequestRecord | null, GitHubError>>;
}
