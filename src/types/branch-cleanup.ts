import type { BranchName } from './branded.ts';
import type { GitError } from './errors.ts';
import type { PullRequestRecord } from './github.ts';

/**
 * 1回の実行で再計算されるブランチ情報
 */
export type Branch = {
  readonly name: BranchName;
  readonly isLocal: boolean;
  readonly isRemote: boolean;
  readonly isCurrent: boolean;
  readonly isProtected: boolean;
};

/**
 * 削除対象外にする保護ポリシー
 */
export type ProtectionPolicy = {
  /** 完全一致で保護するブランチ名 */
  readonly names: readonly string[];
  /** `*` / `?` を含むパターン */
  readonly patterns: readonly string[];
};

/**
 * ブランチ一覧のスナップショット
 */
export type BranchInventory = {
  readonly localBranches: ReadonlySet<BranchName>;
  readonly remoteBranches: ReadonlySet<BranchName>;
  readonly currentBranch: BranchName;
};

/**
 * マージ判定結果
 */
export type MergeCheckResult =
  | { readonly kind: 'merged' }
  | { readonly kind: 'not-merged' }
  | { readonly kind: 'unknown'; readonly error: GitError };

/**
 * 判定理由（最初に一致したルール）
 */
export type EligibilityReason =
  | 'protected'
  | 'current'
  | 'open-pr'
  | 'not-merged'
  | 'lookup-failed'
  | 'eligible';

export type EligibilityDecision = {
  readonly branch: Branch;
  readonly eligible: boolean;
  readonly reason: EligibilityReason;
  /** open-pr の場合の PR */
  readonly pullRequest?: PullRequestRecord;
  /** lookup-failed の場合のエラー */
  readonly error?: GitError;
};

/**
 * クリーンアップ候補
 */
export type CleanupCandidates = {
  /** ローカルにのみ存在する削除可能ブランチ */
  readonly localOnly: BranchName[];
  /** リモートにも存在する削除可能ブランチ */
  readonly withRemote: BranchName[];
  /** 現在のブランチが候補から外れたか */
  readonly currentBranchSkipped: boolean;
  readonly decisions: EligibilityDecision[];
};

/**
 * ローカル削除の結果
 */
export type DeleteResult =
  | { readonly kind: 'deleted' }
  | { readonly kind: 'not-fully-merged'; readonly error: GitError }
  | { readonly kind: 'other-error'; readonly error: GitError };

/**
 * 削除失敗の種別
 *
 * `protected` は削除直前の再チェックで弾かれた場合。
 */
export type DeletionFailureKind =
  | 'none'
  | 'protected'
  | 'not-writable'
  | 'not-fully-merged-then-recovered'
  | 'not-fully-merged-then-failed'
  | 'remote-failure'
  | 'unknown';

export type DeletionOutcome = {
  readonly branch: BranchName;
  readonly localDeleted: boolean;
  readonly remoteDeleted: boolean;
  readonly failureKind: DeletionFailureKind;
  /** 失敗時のエラー（強制削除まで失敗した場合は2件） */
  readonly errors: GitError[];
};

/**
 * 削除バッチの結果
 */
export type DeletionReport = {
  readonly deletedCount: number;
  readonly outcomes: DeletionOutcome[];
  /** 最初の確認で拒否された */
  readonly cancelled: boolean;
};
