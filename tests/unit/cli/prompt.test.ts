import { describe, it } from 'node:test';
import assert from 'node:assert';
import { Readable, Writable } from 'node:stream';
import { parseYesNo, promptYesNo } from '../../../src/cli/utils/prompt.ts';

describe('parseYesNo', () => {
  it('should use the default for empty input', () => {
    assert.strictEqual(parseYesNo('', true), true);
    assert.strictEqual(parseYesNo('  ', false), false);
  });

  it('should accept y/yes/n/no in any case', () => {
    assert.deepStrictEqual(
      ['y', 'YES', 'n', 'No'].map((answer) => parseYesNo(answer, false)),
      [true, true, false, false],
    );
  });

  it('should return null for anything else', () => {
    assert.strictEqual(parseYesNo('maybe', true), null);
  });
});

describe('promptYesNo', () => {
  const captureOutput = (): { stream: Writable; text: () => string } => {
    const chunks: string[] = [];
    const stream = new Writable({
      write(chunk: Buffer | string, _encoding, callback) {
        chunks.push(chunk.toString());
        callback();
      },
    });
    return { stream, text: () => chunks.join('') };
  };

  it('should treat a closed input as declined', async () => {
    const output = captureOutput();

    const answer = await promptYesNo('Delete 1 branch(es)?', true, {
      input: Readable.from([]),
      output: output.stream,
    });

    assert.strictEqual(answer, false);
    assert.strictEqual(output.text(), 'Delete 1 branch(es)? (Y/n): \n');
  });

  it('should return the parsed answer', async () => {
    const output = captureOutput();

    const answer = await promptYesNo('Also delete remote branch origin/feat/a?', false, {
      input: Readable.from([Buffer.from('yes\n')]),
      output: output.stream,
    });

    assert.strictEqual(answer, true);
    assert.strictEqual(output.text(), 'Also delete remote branch origin/feat/a? (y/N): ');
  });
});
