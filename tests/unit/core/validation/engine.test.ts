/**
 * Tests for the validation engine.
 */
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { ValidationEngine } from '../../../../src/core/validation/engine.js';
import { getDefaultConfig, mergeConfig } from '../../../../src/core/config/loader.js';
import { TypeScriptMetadataProvider } from '../../../../src/metadata/typescript.js';
import type { Config } from '../../../../src/core/config/schema.js';

const SOURCE = [
  "import { RequiredArgument, OptionalArgument, ArgumentGroup, CommonArgument, ActionArgument } from 'commandline';",
  'enum Mode { Start, Stop }',
  'export class Options {',
  '  @ActionArgument()',
  '  mode: Mode;',
  "  @RequiredArgument(0, 'path', 'Path')",
  "  @ArgumentGroup('Start')",
  '  path: string;',
  "  @OptionalArgument(null, 'Path', 'Also path')",
  '  @CommonArgument()',
  '  other: string;',
  '}',
  'export class Unrelated {',
  '  value = 1;',
  '}',
].join('\n');

describe('ValidationEngine', () => {
  let engine: ValidationEngine;

  function createEngine(config: Config): ValidationEngine {
    return new ValidationEngine(config, new TypeScriptMetadataProvider({ inMemory: true }));
  }

  afterEach(() => {
    engine.dispose();
  });

  describe('with default config', () => {
    beforeEach(() => {
      engine = createEngine(getDefaultConfig());
    });

    it('should report findings with locations and a failing status', () => {
      const result = engine.validateSource('/src/options.ts', SOURCE);

      expect(result.status).toBe('fail');
      expect(result.errorCount).toBe(1);
      expect(result.warningCount).toBe(0);
      expect(result.diagnostics.map(d => [d.ruleId, d.location.line, d.args])).toEqual([
        ['DuplicateArgumentName', 11, ['Path']],
      ]);
    });

    it('should list analyzed and skipped classes', () => {
      const result = engine.validateSource('/src/options.ts', SOURCE);

      expect(result.types).toEqual([
        { name: 'Options', skipped: false, groups: { Start: ['path', 'other'], Stop: ['other'] } },
        { name: 'Unrelated', skipped: true, groups: null },
      ]);
    });

    it('should pass a class with a clean schema', () => {
      const result = engine.validateSource('/src/clean.ts', [
        "import { OptionalArgument } from 'commandline';",
        'class Clean {',
        "  @OptionalArgument(false, 'force', 'Force')",
        '  force: boolean;',
        '}',
      ].join('\n'));

      expect(result.status).toBe('pass');
      expect(result.diagnostics).toEqual([]);
    });
  });

  it('should apply rule severities from config', () => {
    engine = createEngine(mergeConfig({ rules: { DuplicateArgumentName: 'warning' } }));

    const result = engine.validateSource('/src/options.ts', SOURCE);

    expect(result.status).toBe('warn');
    expect(result.warningCount).toBe(1);
    expect(result.diagnostics[0].severity).toBe('warning');
  });

  it('should drop rules that are off', () => {
    engine = createEngine(mergeConfig({ rules: { DuplicateArgumentName: 'off' } }));

    const result = engine.validateSource('/src/options.ts', SOURCE);

    expect(result.status).toBe('pass');
    expect(result.diagnostics).toEqual([]);
  });

  it('should recognize the configured modules only', () => {
    engine = createEngine(mergeConfig({ modules: ['@acme/cli-args'] }));

    const result = engine.validateSource('/src/options.ts', SOURCE);

    expect(result.types.every(t => t.skipped)).toBe(true);
    expect(result.diagnostics).toEqual([]);
  });

  it('should report undeclared groups when strict groups is on', () => {
    engine = createEngine(mergeConfig({ strict_groups: true }));

    const result = engine.validateSource('/src/options.ts', SOURCE.replace("@ArgumentGroup('Start')", "@ArgumentGroup('Pause')"));

    expect(result.diagnostics.map(d => [d.ruleId, d.args])).toEqual([
      ['UndeclaredArgumentGroup', ['Pause']],
    ]);
  });

  it('should treat an action typed by its enum initializer as an enum', () => {
    engine = createEngine(getDefaultConfig());

    const result = engine.validateSource('/src/initialized.ts', [
      "import { OptionalArgument, CommonArgument, ActionArgument } from 'commandline';",
      'enum Mode { Start, Stop }',
      'export class Options {',
      '  @ActionArgument()',
      '  readonly mode = Mode.Start;',
      "  @OptionalArgument(false, 'verbose', 'Verbose output')",
      '  @CommonArgument()',
      '  verbose: boolean;',
      '}',
    ].join('\n'));

    expect(result.diagnostics).toEqual([]);
    expect(result.types).toEqual([
      { name: 'Options', skipped: false, groups: { Start: ['verbose'], Stop: ['verbose'] } },
    ]);
  });
});
