import { z } from 'zod';

/**
 * GitHub連携設定のスキーマ
 *
 * owner/repo を省略した場合はリモートURLから推定する。
 * トークンは設定ファイルに書かず、環境変数名だけを持つ。
 */
export const GitHubConfigSchema = z
  .object({
    /** リポジトリオーナー（省略時はリモートURLから推定） */
    owner: z.string().min(1).optional(),
    /** リポジトリ名（省略時はリモートURLから推定） */
    repo: z.string().min(1).optional(),
    /** APIベースURL（GitHub Enterprise 用） */
    apiBaseUrl: z.string().url().default('https://api.github.com'),
    /** 認証設定 */
    auth: z
      .object({
        /** トークンを読む環境変数名 */
        tokenEnvName: z.string().min(1).default('GITHUB_TOKEN'),
      })
      .default({ tokenEnvName: 'GITHUB_TOKEN' }),
  })
  .default({ apiBaseUrl: 'https://api.github.com', auth: { tokenEnvName: 'GITHUB_TOKEN' } });

/**
 * ブランチクリーンアップ設定のスキーマ
 */
const BranchesConfigSchema = z
  .object({
    /**
     * マージ済み判定の基準となる参照
     *
     * ローカルブランチ名でもリモート追跡参照（例: "origin/develop"）でもよい。
     */
    baseBranch: z.string().min(1).default('origin/develop'),
    /** 削除・存在確認の対象リモート */
    remote: z.string().min(1).default('origin'),
    /** 削除対象から常に除外するブランチ名 */
    protectedBranches: z.array(z.string().min(1)).default(['develop', 'main', 'master']),
    /**
     * 削除対象から常に除外するブランチ名パターン（`*` と `?` のみ対応）
     */
    protectedPatterns: z.array(z.string().min(1)).default(['release/*', 'hotfix/*']),
  })
  .default({
    baseBranch: 'origin/develop',
    remote: 'origin',
    protectedBranches: ['develop', 'main', 'master'],
    protectedPatterns: ['release/*', 'hotfix/*'],
  });

export const ConfigSchema = z.object({
  $schema: z.string().optional(),
  branches: BranchesConfigSchema,
  github: GitHubConfigSchema,
});

export type Config = z.infer<typeof ConfigSchema>;
export type BranchesConfig = z.infer<typeof BranchesConfigSchema>;
export type GitHubConfig = z.infer<typeof GitHubConfigSchema>;
