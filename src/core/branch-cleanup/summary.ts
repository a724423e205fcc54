/**
 * 削除結果の集計と表示用文字列
 */

import type {
  DeletionFailureKind,
  DeletionOutcome,
  EligibilityDecision,
  EligibilityReason,
} from '../../types/branch-cleanup.ts';

export type DeletionSummary = {
  readonly deleted: number;
  readonly recovered: number;
  readonly failed: number;
  readonly remoteDeleted: number;
  readonly remoteFailed: number;
};

const EMPTY_SUMMARY: DeletionSummary = {
  deleted: 0,
  recovered: 0,
  failed: 0,
  remoteDeleted: 0,
  remoteFailed: 0,
};

/**
 * 結果一覧を畳み込む
 *
 * ローカル削除に成功していればリモート削除の失敗は削除数に影響しない。
 */
export function summarizeOutcomes(outcomes: readonly DeletionOutcome[]): DeletionSummary {
  return outcomes.reduce<DeletionSummary>(
    (acc, outcome) => ({
      deleted: acc.deleted + (outcome.localDeleted ? 1 : 0),
      recovered:
        acc.recovered + (outcome.failureKind === 'not-fully-merged-then-recovered' ? 1 : 0),
      failed: acc.failed + (outcome.localDeleted ? 0 : 1),
      remoteDeleted: acc.remoteDeleted + (outcome.remoteDeleted ? 1 : 0),
      remoteFailed: acc.remoteFailed + (outcome.failureKind === 'remote-failure' ? 1 : 0),
    }),
    EMPTY_SUMMARY,
  );
}

export function countDeleted(outcomes: readonly DeletionOutcome[]): number {
  return summarizeOutcomes(outcomes).deleted;
}

export function formatDeletedCount(count: number): string {
  return `Deleted ${count} branch(es).`;
}

const FAILURE_LABELS: Record<DeletionFailureKind, string> = {
  none: 'deleted',
  protected: 'skipped (protected)',
  'not-writable': 'failed (ref not writable)',
  'not-fully-merged-then-recovered': 'deleted (stale remote-tracking ref, force-deleted)',
  'not-fully-merged-then-failed': 'failed (not fully merged)',
  'remote-failure': 'deleted locally, remote deletion failed',
  unknown: 'failed',
};

/**
 * 1ブランチ分の結果を1行で表す
 */
export function describeOutcome(outcome: DeletionOutcome): string {
  const label = FAILURE_LABELS[outcome.failureKind];
  const details = outcome.errors.map((error) => error.message).join(' / ');
  return details ? `${outcome.branch}: ${label}: ${details}` : `${outcome.branch}: ${label}`;
}

const REASON_LABELS: Record<EligibilityReason, string> = {
  protected: 'protected branch',
  current: 'current branch',
  'open-pr': 'open pull request',
  'not-merged': 'not merged',
  'lookup-failed': 'merge status unknown',
  eligible: 'eligible',
};

/**
 * 判定理由を1行で表す
 */
export function describeDecision(decision: EligibilityDecision): string {
  const name = decision.branch.name;
  const label = REASON_LABELS[decision.reason];

  if (decision.reason === 'open-pr' && decision.pullRequest) {
    return `${name}: ${label} (#${decision.pullRequest.number})`;
  }
  if (decision.reason === 'lookup-failed' && decision.error) {
    return `${name}: ${label} (${decision.error.message})`;
  }
  return `${name}: ${label}`;
}
