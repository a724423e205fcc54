import { describe, it } from 'node:test';
import assert from 'node:assert';
import {
  globToRegex,
  isProtectedBranch,
  protectionPolicyFromConfig,
} from '../../../../src/core/branch-cleanup/protection.ts';
import { ConfigSchema } from '../../../../src/types/config.ts';

describe('globToRegex', () => {
  it('should match across slashes with *', () => {
    assert.ok(globToRegex('release/*').test('release/2024/q1'));
    assert.ok(!globToRegex('release/*').test('prerelease/1.0'));
  });

  it('should treat ? as a single character and escape dots', () => {
    assert.ok(globToRegex('v?.x').test('v1.x'));
    assert.ok(!globToRegex('v?.x').test('v1-x'));
  });
});

describe('isProtectedBranch', () => {
  const policy = protectionPolicyFromConfig(ConfigSchema.parse({}).branches);

  it('should protect the default main-line branches', () => {
    assert.deepStrictEqual(
      ['develop', 'main', 'master'].map((name) => isProtectedBranch(name, policy)),
      [true, true, true],
    );
  });

  it('should protect release and hotfix branches by pattern', () => {
    assert.strictEqual(isProtectedBranch('release/1.2.0', policy), true);
    assert.strictEqual(isProtectedBranch('hotfix/login', policy), true);
  });

  it('should not protect feature branches', () => {
    assert.strictEqual(isProtectedBranch('feat/main', policy), false);
  });
});
