/**
 * `devflow branches` コマンドの実装
 *
 * - clean: マージ済みブランチを削除する
 * - list: ローカルブランチの状態を一覧表示する
 */

import { Command } from 'commander';
import { createGitEffects, type GitEffects } from '../../adapters/vcs/index.ts';
import { remoteName, repoPath, type RemoteName, type RepoPath } from '../../types/branded.ts';
import type { Config } from '../../types/config.ts';
import type { Logger } from '../../types/logger.ts';
import { isErr } from 'option-t/plain_result';
import {
  collectBranchStatuses,
  formatBranchTable,
  protectionPolicyFromConfig,
  readBranchInventory,
  resolvePullRequestLookup,
  runBranchCleanup,
} from '../../core/branch-cleanup/index.ts';
import { loadConfig } from '../utils/load-config.ts';
import { createConsoleLogger, resolveVerbosity } from '../utils/logger.ts';
import { createReadlinePromptEffects } from '../utils/prompt.ts';
import { resolvePullRequestEffects } from '../utils/forge.ts';

type CommonOptions = {
  base?: string;
  remote?: string;
  verbose?: boolean;
  debug?: boolean;
};

type CleanOptions = CommonOptions & {
  quiet?: boolean;
};

type CommandContext = {
  config: Config;
  logger: Logger;
  gitEffects: GitEffects;
  repo: RepoPath;
  remote: RemoteName;
  baseRef: string;
};

/**
 * 設定とCLIフラグから実行コンテキストを作る（フラグが優先）
 */
async function createContext(options: CleanOptions): Promise<CommandContext> {
  const config = await loadConfig();
  const logger = createConsoleLogger({ verbosity: resolveVerbosity(options) });

  return {
    config,
    logger,
    gitEffects: createGitEffects(),
    repo: repoPath(process.cwd()),
    remote: remoteName(options.remote ?? config.branches.remote),
    baseRef: options.base ?? config.branches.baseBranch,
  };
}

/**
 * ブランチクリーンアップの実装
 *
 * 一覧取得に失敗した場合以外は、個別ブランチの失敗があっても正常終了する。
 */
async function executeClean(options: CleanOptions): Promise<void> {
  const context = await createContext(options);
  const { config, logger, gitEffects, repo, remote } = context;

  const pullRequestEffects = await resolvePullRequestEffects(
    config.github,
    gitEffects,
    repo,
    remote,
    logger,
  );

  const result = await runBranchCleanup(
    {
      gitEffects,
      pullRequestEffects,
      prompt: createReadlinePromptEffects(),
      logger,
    },
    {
      repo,
      remote,
      baseRef: context.baseRef,
      policy: protectionPolicyFromConfig(config.branches),
      quiet: options.quiet ?? false,
    },
  );

  if (isErr(result)) {
    logger.error(result.err.message);
    process.exit(1);
  }
}

async function executeList(options: CommonOptions): Promise<void> {
  const context = await createContext(options);
  const { config, logger, gitEffects, repo, remote } = context;

  logger.section('Branches');

  const inventoryResult = await readBranchInventory(gitEffects, repo, remote);
  if (isErr(inventoryResult)) {
    logger.error(inventoryResult.err.message);
    process.exit(1);
  }
  const inventory = inventoryResult.val;

  if (inventory.localBranches.size === 0) {
    logger.info('No local branches found.');
    return;
  }

  const pullRequestEffects = await resolvePullRequestEffects(
    config.github,
    gitEffects,
    repo,
    remote,
    logger,
  );
  const lookup = await resolvePullRequestLookup(pullRequestEffects, logger);

  const rows = await collectBranchStatuses(inventory, {
    gitEffects,
    repo,
    baseRef: context.baseRef,
    lookup,
    logger,
  });

  for (const line of formatBranchTable(rows)) {
    logger.summary(line);
  }
  logger.verbose(`Remote column shows branches on ${remote}; status is relative to ${context.baseRef}.`);
}

const addCommonOptions = (command: Command): Command =>
  command
    .option('--base <ref>', 'Base ref used for the merge check (default: branches.baseBranch)')
    .option('--remote <name>', 'Remote to compare against (default: branches.remote)')
    .option('--verbose', 'Show skip reasons and lookup details', false)
    .option('--debug', 'Show debug output', false);

/**
 * `devflow branches` コマンドを作成
 */
export function createBranchesCommand(): Command {
  const branches = new Command('branches').description('Inspect and clean up local branches');

  addCommonOptions(
    branches
      .command('clean')
      .description('Delete local branches merged into the base ref')
      .option('-q, --quiet', 'Do not ask for confirmation; keep remote branches', false),
  ).action(async (options: CleanOptions) => {
    try {
      await executeClean(options);
    } catch (error) {
      console.error('Branch cleanup failed:', error instanceof Error ? error.message : error);
      process.exit(1);
    }
  });

  addCommonOptions(
    branches.command('list').description('List local branches with merge, remote and pull request status'),
  ).action(async (options: CommonOptions) => {
    try {
      await executeList(options);
    } catch (error) {
      console.error('Branch listing failed:', error instanceof Error ? error.message : error);
      process.exit(1);
    }
  });

  return branches;
}
