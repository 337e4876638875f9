/**
 * Validation type definitions.
 */
import type { Diagnostic } from '../diagnostics/types.js';

/**
 * Outcome for one class in a file.
 */
export interface TypeResult {
  name: string;
  /** True when the class carries no argument decorators */
  skipped: boolean;
  /** Group names mapped to member names, null when skipped */
  groups: Record<string, string[]> | null;
}

/**
 * Validation result for a file.
 */
export interface ValidationResult {
  /** Overall status */
  status: 'pass' | 'fail' | 'warn';
  /** File path */
  file: string;
  types: TypeResult[];
  /** Findings after severity overrides, in report order */
  diagnostics: Diagnostic[];
  errorCount: number;
  warningCount: number;
}

/**
 * Results for multiple files.
 */
export interface BatchValidationResult {
  results: ValidationResult[];
  summary: {
    files: number;
    typesAnalyzed: number;
    typesSkipped: number;
    totalErrors: number;
    totalWarnings: number;
  };
}
