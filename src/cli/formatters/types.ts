import type { ValidationResult, BatchValidationResult } from '../../core/validation/types.js';

export type OutputFormat = 'human' | 'json';

export interface HumanFormatOptions {
  colors: boolean;
  /** Also print passing files and each analyzed class's groups */
  verbose: boolean;
}

/**
 * Renders validation results for the check command.
 */
export interface IFormatter {
  formatResult(result: ValidationResult): string;
  formatBatch(batch: BatchValidationResult): string;
}
