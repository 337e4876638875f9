/**
 * Tests for the human-readable formatter.
 */
import { describe, it, expect } from 'vitest';
import { HumanFormatter } from '../../../../src/cli/formatters/human.js';
import { batch, failingResult } from './fixtures.js';

describe('HumanFormatter', () => {
  describe('formatResult', () => {
    it('should list each diagnostic under the file', () => {
      const formatter = new HumanFormatter({ colors: false });

      expect(formatter.formatResult(failingResult).split('\n')).toEqual([
        '✗ src/options.ts',
        "   9:3  error  Argument name 'name' is used more than once in the same group  ARG006 DuplicateArgumentName",
      ]);
    });

    it('should show group layout in verbose mode', () => {
      const formatter = new HumanFormatter({ colors: false, verbose: true });

      const lines = formatter.formatResult(failingResult).split('\n');

      expect(lines.slice(2)).toEqual([
        '   class Options',
        '      (default): path, name',
      ]);
    });
  });

  describe('formatBatch', () => {
    it('should hide passing files and end with a summary', () => {
      const formatter = new HumanFormatter({ colors: false });

      const output = formatter.formatBatch(batch);

      expect(output).not.toContain('src/clean.ts');
      expect(output.split('\n').slice(-2)).toEqual([
        'SUMMARY: 1 error(s), 0 warning(s)',
        'Files: 2, classes analyzed: 1, skipped: 1',
      ]);
    });

    it('should show passing files in verbose mode', () => {
      const formatter = new HumanFormatter({ colors: false, verbose: true });

      expect(formatter.formatBatch(batch)).toContain('✓ src/clean.ts');
    });
  });
});
