import { describe, it } from 'node:test';
import assert from 'node:assert';
import { formatConfigValue } from '../../../../src/cli/commands/config.ts';

describe('formatConfigValue', () => {
  it('should quote strings and print primitives as-is', () => {
    assert.strictEqual(formatConfigValue('origin'), '"origin"');
    assert.strictEqual(formatConfigValue(3), '3');
    assert.strictEqual(formatConfigValue(undefined), 'null');
  });

  it('should print nested objects and arrays as an indented tree', () => {
    const formatted = formatConfigValue({
      branches: { remote: 'origin', protectedBranches: ['main'] },
      empty: [],
    });

    assert.strictEqual(
      formatted,
      ['', '  branches:', '    remote: "origin"', '    protectedBranches:', '      - "main"', '  empty: []'].join('\n'),
    );
  });
});
