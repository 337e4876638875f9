/**
 * Diagnostic sinks.
 */
import type { Diagnostic, DiagnosticSink, SeverityLevel } from './types.js';

/**
 * Keeps every diagnostic in report order.
 */
export class CollectingSink implements DiagnosticSink {
  readonly diagnostics: Diagnostic[] = [];

  report(diagnostic: Diagnostic): void {
    this.diagnostics.push(diagnostic);
  }

  get errorCount(): number {
    return this.diagnostics.filter(d => d.severity === 'error').length;
  }

  get warningCount(): number {
    return this.diagnostics.filter(d => d.severity === 'warning').length;
  }
}

/**
 * Applies configured severities before forwarding; rules set to `off` are dropped.
 */
export class SeverityFilterSink implements DiagnosticSink {
  constructor(
    private readonly inner: DiagnosticSink,
    private readonly levels: Readonly<Record<string, SeverityLevel>>
  ) {}

  report(diagnostic: Diagnostic): void {
    const level = this.levels[diagnostic.ruleId] ?? diagnostic.severity;
    if (level === 'off') {
      return;
    }
    this.inner.report(level === diagnostic.severity ? diagnostic : { ...diagnostic, severity: level });
  }
}
