/**
 * VCS アダプター統合エクスポート
 */

import type { GitEffects } from './git-effects.ts';
import { createSimpleGitEffects } from './simple-git-effects.ts';

/**
 * GitEffects 実装を生成
 *
 * @returns simple-git ベースの GitEffects 実装
 */
export const createGitEffects = (): GitEffects => createSimpleGitEffects();

export type { GitEffects } from './git-effects.ts';
