import chalk from 'chalk';
import type { ValidationResult, BatchValidationResult } from '../../core/validation/types.js';
import type { Diagnostic } from '../../core/diagnostics/types.js';
import type { IFormatter, HumanFormatOptions } from './types.js';

type Color = 'red' | 'green' | 'yellow' | 'blue' | 'dim';

/**
 * Human-readable output formatter.
 */
export class HumanFormatter implements IFormatter {
  private options: HumanFormatOptions;

  constructor(options: Partial<HumanFormatOptions> = {}) {
    this.options = {
      colors: options.colors ?? true,
      verbose: options.verbose ?? false,
    };
  }

  formatResult(result: ValidationResult): string {
    const lines: string[] = [];

    const statusIcon = this.getStatusIcon(result.status);
    lines.push(`${statusIcon} ${result.file}`);

    for (const diagnostic of result.diagnostics) {
      lines.push(this.formatDiagnostic(diagnostic));
    }

    if (this.options.verbose) {
      for (const type of result.types) {
        if (!type.groups) {
          continue;
        }
        lines.push(`   ${this.colorize(`class ${type.name}`, 'blue')}`);
        for (const [group, members] of Object.entries(type.groups)) {
          const label = group === '' ? '(default)' : group;
          lines.push(`      ${label}: ${members.length > 0 ? members.join(', ') : this.colorize('(empty)', 'dim')}`);
        }
      }
    }

    return lines.join('\n');
  }

  formatBatch(batch: BatchValidationResult): string {
    const lines: string[] = [];

    // Passing files only show up in verbose mode
    for (const result of batch.results) {
      if (!this.options.verbose && result.status === 'pass') {
        continue;
      }
      lines.push(this.formatResult(result));
      lines.push('');
    }

    lines.push(this.formatSummary(batch));

    return lines.join('\n');
  }

  private formatDiagnostic(diagnostic: Diagnostic): string {
    const { line, column } = diagnostic.location;
    const severity = diagnostic.severity === 'error'
      ? this.colorize('error', 'red')
      : this.colorize('warning', 'yellow');
    const rule = this.colorize(`${diagnostic.code} ${diagnostic.ruleId}`, 'dim');
    return `   ${line}:${column}  ${severity}  ${diagnostic.message}  ${rule}`;
  }

  private formatSummary(batch: BatchValidationResult): string {
    const { summary } = batch;
    const lines: string[] = [];

    lines.push('═'.repeat(60));

    const errorsText = this.colorize(`${summary.totalErrors} error(s)`, summary.totalErrors > 0 ? 'red' : 'green');
    const warningsText = this.colorize(`${summary.totalWarnings} warning(s)`, summary.totalWarnings > 0 ? 'yellow' : 'green');

    lines.push(`SUMMARY: ${errorsText}, ${warningsText}`);
    lines.push(`Files: ${summary.files}, classes analyzed: ${summary.typesAnalyzed}, skipped: ${summary.typesSkipped}`);

    return lines.join('\n');
  }

  private getStatusIcon(status: 'pass' | 'fail' | 'warn'): string {
    switch (status) {
      case 'pass':
        return this.colorize('✓', 'green');
      case 'fail':
        return this.colorize('✗', 'red');
      case 'warn':
        return this.colorize('⚠', 'yellow');
    }
  }

  private colorize(text: string, color: Color): string {
    if (!this.options.colors) {
      return text;
    }

    switch (color) {
      case 'red':
        return chalk.red(text);
      case 'green':
        return chalk.green(text);
      case 'yellow':
        return chalk.yellow(text);
      case 'blue':
        return chalk.blue(text);
      case 'dim':
        return chalk.dim(text);
    }
  }
}
