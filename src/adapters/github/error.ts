/**
 * GitHub API Error Classification
 *
 * Octokit RequestErrorをドメインエラー型に変換するユーティリティ関数。
 * HTTPステータスコードに基づいてエラーを分類する。
 */

import {
  githubAuthFailed,
  githubRateLimited,
  githubNotFound,
  githubValidationError,
  githubUnknownError,
  type GitHubError,
  type GitHubNotFoundError,
} from '../../types/errors.ts';

/**
 * Octokit RequestError の必要部分
 */
interface RequestErrorLike {
  status: number;
  message: string;
  response?: {
    headers?: Record<string, string | number | undefined>;
  };
}

function isRequestError(error: unknown): error is RequestErrorLike {
  return (
    typeof error === 'object' &&
    error !== null &&
    'status' in error &&
    typeof error.status === 'number'
  );
}

const readIntHeader = (error: RequestErrorLike, name: string): number | undefined => {
  const raw = error.response?.headers?.[name];
  if (raw === undefined) {
    return undefined;
  }
  const parsed = typeof raw === 'number' ? raw : parseInt(raw, 10);
  return Number.isNaN(parsed) ? undefined : parsed;
};

/**
 * OctokitのエラーをGitHubErrorに分類する
 *
 * @param error - Octokitから投げられたエラー
 * @param resourceType - 404 のときに見つからなかったリソース種別
 */
export function classifyGitHubError(
  error: unknown,
  resourceType: GitHubNotFoundError['resourceType'] = 'repository',
): GitHubError {
  if (!isRequestError(error)) {
    return githubUnknownError(error instanceof Error ? error.message : String(error));
  }

  const statusCode = error.status;
  const message = error.message || `HTTP ${statusCode} error`;

  switch (statusCode) {
    case 401:
      return githubAuthFailed(message);

    case 403:
    case 429: {
      // GitHub は一次レート制限を 403 で返すことがあるため残数ヘッダで見分ける
      const remaining = readIntHeader(error, 'x-ratelimit-remaining');
      if (statusCode === 429 || remaining === 0) {
        return githubRateLimited(message, readIntHeader(error, 'x-ratelimit-reset'), remaining);
      }
      return githubAuthFailed(message);
    }

    case 404:
      return githubNotFound(resourceType, message);

    case 422:
      return githubValidationError(message);

    default:
      return githubUnknownError(message, statusCode, JSON.stringify(error));
  }
}
