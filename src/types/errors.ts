/**
 * Domain Error Types
 *
 * ドメインエラーの型定義。option-tのResult型と組み合わせて使用する。
 * タグ付きユニオン型により、エラーの種類を型安全に区別できる。
 */

import type { RepoPath, BranchName } from './branded.ts';

// ===== Git/VCS Errors =====

export type GitError =
  | GitCommandFailedError
  | GitRepoNotFoundError
  | GitBranchNotFullyMergedError
  | GitRefNotWritableError;

export interface GitCommandFailedError {
  readonly type: 'GitCommandFailedError';
  readonly command: string;
  readonly stderr: string;
  readonly exitCode: number;
  readonly message: string;
}

export interface GitRepoNotFoundError {
  readonly type: 'GitRepoNotFoundError';
  readonly repoPath: RepoPath;
  readonly message: string;
}

/**
 * `git branch -d` が未マージを理由に拒否した
 *
 * 本当に未マージの場合と、リモートが既に削除されているのに
 * リモート追跡参照だけが残っている場合（stale ref）の両方でこのエラーになる。
 */
export interface GitBranchNotFullyMergedError {
  readonly type: 'GitBranchNotFullyMergedError';
  readonly branchName: BranchName;
  readonly stderr: string;
  readonly message: string;
}

/**
 * 参照ファイルのロック・書き込みに失敗した（権限、読み取り専用FSなど）
 */
export interface GitRefNotWritableError {
  readonly type: 'GitRefNotWritableError';
  readonly branchName: BranchName;
  readonly stderr: string;
  readonly message: string;
}

// GitError コンストラクタ
export const gitCommandFailed = (
  command: string,
  stderr: string,
  exitCode: number,
): GitCommandFailedError => ({
  type: 'GitCommandFailedError',
  command,
  stderr,
  exitCode,
  message: `Git command failed: ${command} (exit code ${exitCode})\n${stderr}`,
});

export const gitRepoNotFound = (repoPath: RepoPath): GitRepoNotFoundError => ({
  type: 'GitRepoNotFoundError',
  repoPath,
  message: `Git repository not found: ${repoPath}`,
});

export const gitBranchNotFullyMerged = (
  branchName: BranchName,
  stderr: string,
): GitBranchNotFullyMergedError => ({
  type: 'GitBranchNotFullyMergedError',
  branchName,
  stderr,
  message: `Branch is not fully merged: ${branchName}`,
});

export const gitRefNotWritable = (branchName: BranchName, stderr: string): GitRefNotWritableError => ({
  type: 'GitRefNotWritableError',
  branchName,
  stderr,
  message: `Cannot write ref for branch ${branchName}: ${stderr}`,
});

// ===== GitHub API Errors =====

export type GitHubError =
  | GitHubAuthFailedError
  | GitHubRateLimitedError
  | GitHubNotFoundError
  | GitHubValidationError
  | GitHubUnknownError;

export interface GitHubAuthFailedError {
  readonly type: 'GitHubAuthFailedError';
  readonly missingEnvName?: string;
  readonly message: string;
}

export interface GitHubRateLimitedError {
  readonly type: 'GitHubRateLimitedError';
  readonly resetAt?: number;
  readonly remaining?: number;
  readonly message: string;
}

export interface GitHubNotFoundError {
  readonly type: 'GitHubNotFoundError';
  readonly resourceType: 'repository' | 'branch' | 'pullRequest';
  readonly message: string;
}

export interface GitHubValidationError {
  readonly type: 'GitHubValidationError';
  readonly field?: string;
  readonly message: string;
}

export interface GitHubUnknownError {
  readonly type: 'GitHubUnknownError';
  readonly statusCode?: number;
  readonly originalError?: string;
  readonly message: string;
}

// GitHubError コンストラクタ
export const githubAuthFailed = (message: string, missingEnvName?: string): GitHubAuthFailedError => ({
  type: 'GitHubAuthFailedError',
  missingEnvName,
  message,
});

export const githubRateLimited = (
  message: string,
  resetAt?: number,
  remaining?: number,
): GitHubRateLimitedError => ({
  type: 'GitHubRateLimitedError',
  resetAt,
  remaining,
  message,
});

export const githubNotFound = (
  resourceType: 'repository' | 'branch' | 'pullRequest',
  message: string,
): GitHubNotFoundError => ({
  type: 'GitHubNotFoundError',
  resourceType,
  message,
});

export const githubValidationError = (message: string, field?: string): GitHubValidationError => ({
  type: 'GitHubValidationError',
  field,
  message,
});

export const githubUnknownError = (
  message: string,
  statusCode?: number,
  originalError?: string,
): GitHubUnknownError => ({
  type: 'GitHubUnknownError',
  statusCode,
  originalError,
  message,
});

// ===== Branch Cleanup Errors =====

/**
 * ブランチ一覧・現在ブランチが取得できない
 *
 * 何が存在するか分からない状態では削除を始められないため、
 * クリーンアップ全体を中断する唯一のエラー。
 */
export interface InventoryError {
  readonly type: 'InventoryError';
  readonly operation: 'listLocalBranches' | 'listRemoteBranches' | 'getCurrentBranch';
  readonly cause: GitError;
  readonly message: string;
}

export const inventoryError = (
  operation: InventoryError['operation'],
  cause: GitError,
): InventoryError => ({
  type: 'InventoryError',
  operation,
  cause,
  message: `Failed to read branch inventory (${operation}): ${cause.message}`,
});

// ===== Config Errors =====

export type ConfigError =
  | ConfigParseError
  | ConfigValidationError
  | ConfigMergeError;

export interface ConfigParseError {
  readonly type: 'ConfigParseError';
  readonly filePath: string;
  readonly cause?: unknown;
  readonly message: string;
}

export interface ConfigValidationError {
  readonly type: 'ConfigValidationError';
  readonly filePath?: string;
  readonly details: string;
  readonly message: string;
}

export interface ConfigMergeError {
  readonly type: 'ConfigMergeError';
  readonly details: string;
  readonly message: string;
}

// ConfigError コンストラクタ
export const configParseError = (filePath: string, cause?: unknown): ConfigParseError => ({
  type: 'ConfigParseError',
  filePath,
  cause,
  message: `Failed to parse configuration file: ${filePath}${cause instanceof Error ? `\n${cause.message}` : ''}`,
});

export const configValidationError = (details: string, filePath?: string): ConfigValidationError => ({
  type: 'ConfigValidationError',
  filePath,
  details,
  message: `Configuration validation failed${filePath ? ` (${filePath})` : ''}: ${details}`,
});

export const configMergeError = (details: string): ConfigMergeError => ({
  type: 'ConfigMergeError',
  details,
  message: `Configuration merge failed: ${details}`,
});
