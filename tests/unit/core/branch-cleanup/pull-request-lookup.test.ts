import { describe, it } from 'node:test';
import assert from 'node:assert';
import { isOk, unwrapOk } from 'option-t/plain_result';
import {
  buildPullRequestIndex,
  createPerBranchLookup,
  isSameRepository,
  noPullRequestLookup,
  resolvePullRequestLookup,
} from '../../../../src/core/branch-cleanup/pull-request-lookup.ts';
import { branchName } from '../../../../src/types/branded.ts';
import { githubRateLimited } from '../../../../src/types/errors.ts';
import { createFakePullRequestEffects, createMemoryLogger, pullRequest } from '../../../mocks/effects.ts';

describe('isSameRepository', () => {
  it('should accept a pull request whose head and base repository match', () => {
    assert.strictEqual(isSameRepository(pullRequest({ headRef: 'feat/a' })), true);
  });

  it('should reject fork pull requests', () => {
    assert.strictEqual(
      isSameRepository(pullRequest({ headRef: 'feat/a', headRepoFullName: 'someone/widgets' })),
      false,
    );
  });

  it('should reject records with missing fields', () => {
    assert.strictEqual(isSameRepository(pullRequest({ headRef: '' })), false);
    assert.strictEqual(isSameRepository(pullRequest({ headRef: 'feat/a', headRepoFullName: null })), false);
    assert.strictEqual(isSameRepository(pullRequest({ headRef: 'feat/a', baseRepoFullName: null })), false);
  });
});

describe('buildPullRequestIndex', () => {
  it('should key same-repository pull requests by head ref', () => {
    const index = buildPullRequestIndex([
      pullRequest({ number: 1, headRef: 'feat/a', state: 'open' }),
      pullRequest({ number: 2, headRef: 'feat/b' }),
    ]);

    assert.deepStrictEqual([...index.keys()], ['feat/a', 'feat/b']);
    assert.strictEqual(index.get('feat/a')?.number, 1);
  });

  it('should exclude fork pull requests', () => {
    const index = buildPullRequestIndex([
      pullRequest({ number: 3, headRef: 'feat/a', state: 'open', headRepoFullName: 'someone/widgets' }),
    ]);

    assert.strictEqual(index.size, 0);
  });

  it('should keep the last record for duplicate head refs', () => {
    const index = buildPullRequestIndex([
      pullRequest({ number: 4, headRef: 'feat/a' }),
      pullRequest({ number: 5, headRef: 'feat/a' }),
    ]);

    assert.strictEqual(index.get('feat/a')?.number, 5);
  });

  it('should not replace an open record with a closed one', () => {
    const index = buildPullRequestIndex([
      pullRequest({ number: 6, headRef: 'feat/a', state: 'open' }),
      pullRequest({ number: 7, headRef: 'feat/a', state: 'closed' }),
    ]);

    assert.strictEqual(index.get('feat/a')?.number, 6);
  });
});

describe('createPerBranchLookup', () => {
  it('should drop a fork pull request returned by the provider', async () => {
    const { effects } = createFakePullRequestEffects({
      pulls: [pullRequest({ headRef: 'feat/a', state: 'open', headRepoFullName: 'someone/widgets' })],
    });

    const result = await createPerBranchLookup(effects).find(branchName('feat/a'));

    assert.ok(isOk(result));
    assert.strictEqual(unwrapOk(result), null);
  });

  it('should pass provider errors through', async () => {
    const { effects } = createFakePullRequestEffects({
      pulls: [],
      findError: githubRateLimited('API rate limit exceeded'),
    });

    const result = await createPerBranchLookup(effects).find(branchName('feat/a'));

    assert.ok(!isOk(result));
  });
});

describe('resolvePullRequestLookup', () => {
  it('should disable lookups when there is no provider', async () => {
    const lookup = await resolvePullRequestLookup(null, createMemoryLogger());

    assert.strictEqual(lookup, noPullRequestLookup);
    assert.strictEqual(unwrapOk(await lookup.find(branchName('feat/a'))), null);
  });

  it('should use the bulk index when listing succeeds', async () => {
    const { effects, calls } = createFakePullRequestEffects({
      pulls: [pullRequest({ number: 8, headRef: 'feat/a', state: 'open' })],
    });

    const lookup = await resolvePullRequestLookup(effects, createMemoryLogger());
    const result = await lookup.find(branchName('feat/a'));

    assert.strictEqual(lookup.kind, 'bulk');
    assert.strictEqual(unwrapOk(result)?.number, 8);
    assert.deepStrictEqual(calls.find, []);
  });

  it('should fall back to per-branch lookup when listing fails', async () => {
    const logger = createMemoryLogger();
    const { effects, calls } = createFakePullRequestEffects({
      pulls: [pullRequest({ number: 9, headRef: 'feat/a', state: 'open' })],
      listError: githubRateLimited('API rate limit exceeded'),
    });

    const lookup = await resolvePullRequestLookup(effects, logger);
    const result = await lookup.find(branchName('feat/a'));

    assert.strictEqual(lookup.kind, 'per-branch');
    assert.strictEqual(unwrapOk(result)?.number, 9);
    assert.deepStrictEqual(calls.find, ['feat/a']);
    assert.deepStrictEqual(logger.messages('verbose'), [
      'Could not fetch pull requests in bulk (API rate limit exceeded); falling back to per-branch lookup.',
    ]);
  });
});
