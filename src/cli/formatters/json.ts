import type { ValidationResult, BatchValidationResult } from '../../core/validation/types.js';
import type { Diagnostic } from '../../core/diagnostics/types.js';
import type { IFormatter } from './types.js';

/**
 * JSON output formatter for machine consumption.
 */
export class JsonFormatter implements IFormatter {
  formatResult(result: ValidationResult): string {
    return JSON.stringify(this.transformResult(result), null, 2);
  }

  formatBatch(batch: BatchValidationResult): string {
    return JSON.stringify(
      {
        summary: {
          files: batch.summary.files,
          types_analyzed: batch.summary.typesAnalyzed,
          types_skipped: batch.summary.typesSkipped,
          total_errors: batch.summary.totalErrors,
          total_warnings: batch.summary.totalWarnings,
        },
        results: batch.results.map(r => this.transformResult(r)),
      },
      null,
      2
    );
  }

  private transformResult(result: ValidationResult): Record<string, unknown> {
    return {
      status: result.status,
      file: result.file,
      error_count: result.errorCount,
      warning_count: result.warningCount,
      types: result.types,
      diagnostics: result.diagnostics.map(d => this.transformDiagnostic(d)),
    };
  }

  private transformDiagnostic(diagnostic: Diagnostic): Record<string, unknown> {
    return {
      code: diagnostic.code,
      rule: diagnostic.ruleId,
      severity: diagnostic.severity,
      message: diagnostic.message,
      line: diagnostic.location.line,
      column: diagnostic.location.column,
      args: diagnostic.args,
    };
  }
}
