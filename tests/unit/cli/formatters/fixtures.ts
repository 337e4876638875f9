/**
 * Shared validation results for formatter tests.
 */
import { createDiagnostic } from '../../../../src/core/diagnostics/rules.js';
import type { BatchValidationResult, ValidationResult } from '../../../../src/core/validation/types.js';

export const failingResult: ValidationResult = {
  status: 'fail',
  file: 'src/options.ts',
  types: [{ name: 'Options', skipped: false, groups: { '': ['path', 'name'] } }],
  diagnostics: [
    createDiagnostic('DuplicateArgumentName', { file: 'src/options.ts', line: 9, column: 3 }, 'name'),
  ],
  errorCount: 1,
  warningCount: 0,
};

export const passingResult: ValidationResult = {
  status: 'pass',
  file: 'src/clean.ts',
  types: [{ name: 'Plain', skipped: true, groups: null }],
  diagnostics: [],
  errorCount: 0,
  warningCount: 0,
};

export const batch: BatchValidationResult = {
  results: [failingResult, passingResult],
  summary: { files: 2, typesAnalyzed: 1, typesSkipped: 1, totalErrors: 1, totalWarnings: 0 },
};
