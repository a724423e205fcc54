import { createOk, createErr } from 'option-t/plain_result';
import type { GitEffects } from '../../src/adapters/vcs/git-effects.ts';
import { branchName, type BranchName } from '../../src/types/branded.ts';
import type { GitError, GitHubError } from '../../src/types/errors.ts';
import type { PullRequestEffects, PullRequestRecord } from '../../src/types/github.ts';
import type { Logger, Verbosity } from '../../src/types/logger.ts';
import type { PromptEffects } from '../../src/types/prompt.ts';

/**
 * テスト用リポジトリの状態
 */
export type FakeRepoState = {
  local: string[];
  /** ローカルの追跡参照から見えるリモートブランチ */
  remote: string[];
  current: string;
  /** 基準参照にマージ済みのブランチ */
  merged?: string[];
  /** ls-remote で見える実際のリモートブランチ（省略時は remote と同じ） */
  actualRemote?: string[];
  mergeCheckErrors?: Record<string, GitError>;
  deleteErrors?: Record<string, GitError>;
  forceDeleteErrors?: Record<string, GitError>;
  remoteExistsErrors?: Record<string, GitError>;
  remoteDeleteErrors?: Record<string, GitError>;
  listLocalError?: GitError;
  listRemoteError?: GitError;
  currentBranchError?: GitError;
  remoteUrl?: string | null;
};

export type GitCall =
  | { op: 'isMergedInto'; branch: string; baseRef: string }
  | { op: 'deleteBranch'; branch: string; force: boolean }
  | { op: 'deleteRemoteBranch'; remote: string; branch: string }
  | { op: 'remoteBranchExists'; remote: string; branch: string }
  | { op: 'getRemoteUrl'; remote: string };

/**
 * テスト用のインメモリ GitEffects
 *
 * 呼び出しを calls に記録する。
 */
export const createFakeGitEffects = (state: FakeRepoState): { effects: GitEffects; calls: GitCall[] } => {
  const calls: GitCall[] = [];
  const local = new Set(state.local);
  const actualRemote = new Set(state.actualRemote ?? state.remote);
  const merged = new Set(state.merged ?? []);

  const effects: GitEffects = {
    listLocalBranches: async () =>
      state.listLocalError ? createErr(state.listLocalError) : createOk([...local].map(branchName)),

    listRemoteBranches: async () =>
      state.listRemoteError ? createErr(state.listRemoteError) : createOk(state.remote.map(branchName)),

    getCurrentBranch: async () =>
      state.currentBranchError ? createErr(state.currentBranchError) : createOk(branchName(state.current)),

    isMergedInto: async (_repo, branch, baseRef) => {
      calls.push({ op: 'isMergedInto', branch, baseRef });
      const error = state.mergeCheckErrors?.[branch];
      return error ? createErr(error) : createOk(merged.has(branch));
    },

    deleteBranch: async (_repo, branch, force = false) => {
      calls.push({ op: 'deleteBranch', branch, force });
      const error = force ? state.forceDeleteErrors?.[branch] : state.deleteErrors?.[branch];
      if (error) {
        return createErr(error);
      }
      local.delete(branch);
      return createOk(undefined);
    },

    deleteRemoteBranch: async (_repo, remote, branch) => {
      calls.push({ op: 'deleteRemoteBranch', remote, branch });
      const error = state.remoteDeleteErrors?.[branch];
      if (error) {
        return createErr(error);
      }
      actualRemote.delete(branch);
      return createOk(undefined);
    },

    remoteBranchExists: async (_repo, remote, branch) => {
      calls.push({ op: 'remoteBranchExists', remote, branch });
      const error = state.remoteExistsErrors?.[branch];
      return error ? createErr(error) : createOk(actualRemote.has(branch));
    },

    getRemoteUrl: async (_repo, remote) => {
      calls.push({ op: 'getRemoteUrl', remote });
      return createOk(state.remoteUrl ?? null);
    },
  };

  return { effects, calls };
};

/**
 * 削除呼び出しだけを取り出す
 */
export const deleteCalls = (calls: GitCall[]): Array<{ branch: string; force: boolean }> =>
  calls.flatMap((call) => (call.op === 'deleteBranch' ? [{ branch: call.branch, force: call.force }] : []));

export const pullRequest = (overrides: Partial<PullRequestRecord> & { headRef: string }): PullRequestRecord => ({
  number: 1,
  state: 'closed',
  headRepoFullName: 'acme/widgets',
  baseRepoFullName: 'acme/widgets',
  ...overrides,
});

/**
 * テスト用のインメモリ PullRequestEffects
 */
export const createFakePullRequestEffects = (options: {
  pulls: PullRequestRecord[];
  listError?: GitHubError;
  findError?: GitHubError;
}): { effects: PullRequestEffects; calls: { list: number; find: string[] } } => {
  const calls: { list: number; find: string[] } = { list: 0, find: [] };

  const effects: PullRequestEffects = {
    listAllPullRequests: async () => {
      calls.list += 1;
      return options.listError ? createErr(options.listError) : createOk(options.pulls);
    },
    findPullRequestByBranch: async (branch) => {
      calls.find.push(branch);
      if (options.findError) {
        return createErr(options.findError);
      }
      const matches = options.pulls.filter((pr) => pr.headRef === branch);
      return createOk(matches.find((pr) => pr.state === 'open') ?? matches[0] ?? null);
    },
  };

  return { effects, calls };
};

/**
 * 用意した回答を順に返すプロンプト（尽きたらデフォルト値）
 */
export const createScriptedPrompt = (answers: boolean[]): { prompt: PromptEffects; questions: string[] } => {
  const questions: string[] = [];
  const queue = [...answers];

  return {
    prompt: {
      confirm: async (question, defaultValue) => {
        questions.push(question);
        return queue.shift() ?? defaultValue;
      },
    },
    questions,
  };
};

export type LogLevel = 'section' | 'info' | 'note' | 'success' | 'warn' | 'error' | 'summary' | 'verbose' | 'debug';

/**
 * 出力を記録する Logger
 */
export const createMemoryLogger = (
  verbosity: Verbosity = 'debug',
): Logger & { lines: Array<{ level: LogLevel; message: string }>; messages: (level: LogLevel) => string[] } => {
  const lines: Array<{ level: LogLevel; message: string }> = [];
  const record = (level: LogLevel) => (message: string) => {
    lines.push({ level, message });
  };

  return {
    verbosity,
    lines,
    messages: (level) => lines.filter((line) => line.level === level).map((line) => line.message),
    section: record('section'),
    info: record('info'),
    note: record('note'),
    success: record('success'),
    warn: record('warn'),
    error: record('error'),
    summary: record('summary'),
    verbose: record('verbose'),
    debug: record('debug'),
  };
};

export const names = (values: readonly BranchName[]): string[] => values.map(String);
