import type { Logger, Verbosity } from '../../types/logger.ts';
import { ANSI, colorize, isAnsiEnabled } from './ansi.ts';

const LEVELS: Record<Verbosity, number> = {
  quiet: 0,
  normal: 1,
  verbose: 2,
  debug: 3,
};

/**
 * CLIフラグから詳細度を決める（debug > verbose > quiet）
 */
export function resolveVerbosity(flags: { quiet?: boolean; verbose?: boolean; debug?: boolean }): Verbosity {
  if (flags.debug) {
    return 'debug';
  }
  if (flags.verbose) {
    return 'verbose';
  }
  if (flags.quiet) {
    return 'quiet';
  }
  return 'normal';
}

export type ConsoleLoggerOptions = {
  verbosity: Verbosity;
  /** 省略時は stdout が TTY かで決める */
  useAnsi?: boolean;
  write?: (line: string) => void;
  writeError?: (line: string) => void;
};

/**
 * console 出力の Logger
 */
export function createConsoleLogger(options: ConsoleLoggerOptions): Logger {
  const { verbosity } = options;
  const useAnsi = options.useAnsi ?? isAnsiEnabled(process.stdout);
  const write = options.write ?? ((line: string) => console.log(line));
  const writeError = options.writeError ?? ((line: string) => console.error(line));

  const enabled = (level: Verbosity): boolean => LEVELS[verbosity] >= LEVELS[level];

  return {
    verbosity,
    section(title) {
      if (enabled('normal')) {
        write(`\n${colorize(title, ANSI.BOLD, useAnsi)}`);
        write(colorize('='.repeat(title.length), ANSI.BOLD, useAnsi));
      }
    },
    info(message) {
      if (enabled('normal')) {
        write(message);
      }
    },
    note(message) {
      if (enabled('normal')) {
        write(colorize(message, ANSI.CYAN, useAnsi));
      }
    },
    success(message) {
      if (enabled('normal')) {
        write(colorize(`✓ ${message}`, ANSI.GREEN, useAnsi));
      }
    },
    warn(message) {
      writeError(colorize(`⚠ ${message}`, ANSI.YELLOW, useAnsi));
    },
    error(message) {
      writeError(colorize(`✗ ${message}`, ANSI.RED, useAnsi));
    },
    summary(message) {
      write(message);
    },
    verbose(message) {
      if (enabled('verbose')) {
        write(colorize(`  ${message}`, ANSI.GRAY, useAnsi));
      }
    },
    debug(message) {
      if (enabled('debug')) {
        write(colorize(`    [debug] ${message}`, ANSI.GRAY, useAnsi));
      }
    },
  };
}
