/**
 * GitHub Error Classification Tests
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import { classifyGitHubError } from './error.ts';

describe('classifyGitHubError', () => {
  it('should classify 401 as GitHubAuthFailedError', () => {
    const result = classifyGitHubError({ status: 401, message: 'Bad credentials' });

    assert.strictEqual(result.type, 'GitHubAuthFailedError');
    assert.strictEqual(result.message, 'Bad credentials');
  });

  it('should classify 403 with remaining quota as GitHubAuthFailedError', () => {
    const result = classifyGitHubError({
      status: 403,
      message: 'Resource not accessible by integration',
      response: { headers: { 'x-ratelimit-remaining': '4999' } },
    });

    assert.strictEqual(result.type, 'GitHubAuthFailedError');
  });

  it('should classify 403 with exhausted quota as GitHubRateLimitedError', () => {
    const result = classifyGitHubError({
      status: 403,
      message: 'API rate limit exceeded',
      response: { headers: { 'x-ratelimit-remaining': '0', 'x-ratelimit-reset': '1700000000' } },
    });

    assert.strictEqual(result.type, 'GitHubRateLimitedError');
    if (result.type === 'GitHubRateLimitedError') {
      assert.strictEqual(result.resetAt, 1700000000);
      assert.strictEqual(result.remaining, 0);
    }
  });

  it('should classify 429 without headers as GitHubRateLimitedError', () => {
    const result = classifyGitHubError({ status: 429, message: 'Too Many Requests' });

    assert.strictEqual(result.type, 'GitHubRateLimitedError');
    if (result.type === 'GitHubRateLimitedError') {
      assert.strictEqual(result.resetAt, undefined);
      assert.strictEqual(result.remaining, undefined);
    }
  });

  it('should classify 404 with the given resource type', () => {
    const result = classifyGitHubError({ status: 404, message: 'Not Found' }, 'pullRequest');

    assert.strictEqual(result.type, 'GitHubNotFoundError');
    if (result.type === 'GitHubNotFoundError') {
      assert.strictEqual(result.resourceType, 'pullRequest');
    }
  });

  it('should classify 422 as GitHubValidationError', () => {
    const result = classifyGitHubError({ status: 422, message: 'Validation Failed' });

    assert.strictEqual(result.type, 'GitHubValidationError');
  });

  it('should keep the status code of other HTTP errors', () => {
    const result = classifyGitHubError({ status: 502, message: 'Bad Gateway' });

    assert.strictEqual(result.type, 'GitHubUnknownError');
    if (result.type === 'GitHubUnknownError') {
      assert.strictEqual(result.statusCode, 502);
    }
  });

  it('should classify non-HTTP errors as GitHubUnknownError', () => {
    const result = classifyGitHubError(new Error('getaddrinfo ENOTFOUND api.github.com'));

    assert.strictEqual(result.type, 'GitHubUnknownError');
    assert.strictEqual(result.message, 'getaddrinfo ENOTFOUND api.github.com');
  });
});
