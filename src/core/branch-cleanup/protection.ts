/**
 * 保護ブランチ判定
 */

import type { BranchesConfig } from '../../types/config.ts';
import type { ProtectionPolicy } from '../../types/branch-cleanup.ts';

/**
 * 設定から保護ポリシーを作る
 */
export function protectionPolicyFromConfig(config: BranchesConfig): ProtectionPolicy {
  return {
    names: config.protectedBranches,
    patterns: config.protectedPatterns,
  };
}

/**
 * globパターンを正規表現に変換
 *
 * `*` は `/` を含む任意の文字列、`?` は任意の1文字。
 */
export function globToRegex(pattern: string): RegExp {
  const escaped = pattern
    .replace(/[.+^${}()|[\]\\]/g, '\\$&')
    .replace(/\*/g, '.*')
    .replace(/\?/g, '.');
  return new RegExp(`^${escaped}$`);
}

/**
 * ブランチが保護されているかチェック
 */
export function isProtectedBranch(name: string, policy: ProtectionPolicy): boolean {
  if (policy.names.includes(name)) {
    return true;
  }

  return policy.patterns.some((pattern) => globToRegex(pattern).test(name));
}
