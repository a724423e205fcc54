import { describe, it } from 'node:test';
import assert from 'node:assert';
import { createConsoleLogger, resolveVerbosity } from '../../../src/cli/utils/logger.ts';
import type { Verbosity } from '../../../src/types/logger.ts';

const capture = (verbosity: Verbosity) => {
  const out: string[] = [];
  const err: string[] = [];
  const logger = createConsoleLogger({
    verbosity,
    useAnsi: false,
    write: (line) => out.push(line),
    writeError: (line) => err.push(line),
  });
  return { logger, out, err };
};

describe('resolveVerbosity', () => {
  it('should let debug win over verbose and quiet', () => {
    assert.strictEqual(resolveVerbosity({ quiet: true, verbose: true, debug: true }), 'debug');
    assert.strictEqual(resolveVerbosity({ quiet: true, verbose: true }), 'verbose');
    assert.strictEqual(resolveVerbosity({ quiet: true }), 'quiet');
    assert.strictEqual(resolveVerbosity({}), 'normal');
  });
});

describe('createConsoleLogger', () => {
  it('should print only warnings and the summary in quiet mode', () => {
    const { logger, out, err } = capture('quiet');

    logger.section('Cleaning up merged branches');
    logger.info('Found 1 merged branch(es) to delete:');
    logger.success('Deleted feat/a');
    logger.verbose('Skip main: protected branch');
    logger.warn('feat/b: failed');
    logger.summary('Deleted 1 branch(es).');

    assert.deepStrictEqual(out, ['Deleted 1 branch(es).']);
    assert.deepStrictEqual(err, ['⚠ feat/b: failed']);
  });

  it('should print section headers with an underline', () => {
    const { logger, out } = capture('normal');

    logger.section('Branches');

    assert.deepStrictEqual(out, ['\nBranches', '========']);
  });

  it('should print verbose lines but not debug lines in verbose mode', () => {
    const { logger, out } = capture('verbose');

    logger.verbose('Skip main: protected branch');
    logger.debug('Base: origin/develop');

    assert.deepStrictEqual(out, ['  Skip main: protected branch']);
  });

  it('should print debug lines in debug mode', () => {
    const { logger, out } = capture('debug');

    logger.debug('Base: origin/develop');

    assert.deepStrictEqual(out, ['    [debug] Base: origin/develop']);
  });

  it('should color output when ANSI is enabled', () => {
    const out: string[] = [];
    const logger = createConsoleLogger({ verbosity: 'normal', useAnsi: true, write: (line) => out.push(line) });

    logger.success('Deleted feat/a');

    assert.deepStrictEqual(out, ['\x1b[32m✓ Deleted feat/a\x1b[0m']);
  });
});
