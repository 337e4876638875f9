/**
 * Per-class analysis pipeline: entry gate, reader, builder, validator.
 */
import type { TypeInfo } from '../../metadata/types.js';
import type { Diagnostic, DiagnosticSink } from '../diagnostics/types.js';
import { readAnnotations, DEFAULT_ARGUMENT_MODULES } from './reader.js';
import { buildSchema } from './builder.js';
import { validateGroups } from './validator.js';
import type { SchemaModel } from './types.js';

export interface AnalyzeOptions {
  /** Modules whose decorators are recognized */
  modules?: readonly string[];
  /** Report group names the action enum does not declare */
  strictGroups?: boolean;
  /** Receives each diagnostic as soon as it is found */
  sink?: DiagnosticSink;
}

export interface TypeAnalysis {
  type: TypeInfo;
  /** True when no member carries a recognized decorator */
  skipped: boolean;
  schema: SchemaModel | null;
  /** Every diagnostic found, in report order */
  diagnostics: Diagnostic[];
}

/**
 * Analyze the argument schema of one class.
 */
export function analyzeType(type: TypeInfo, options: AnalyzeOptions = {}): TypeAnalysis {
  const members = readAnnotations(type, options.modules ?? DEFAULT_ARGUMENT_MODULES);
  if (members.length === 0) {
    return { type, skipped: true, schema: null, diagnostics: [] };
  }

  const diagnostics: Diagnostic[] = [];
  const sink: DiagnosticSink = {
    report(diagnostic) {
      diagnostics.push(diagnostic);
      options.sink?.report(diagnostic);
    },
  };

  const schema = buildSchema(members, sink, { strictGroups: options.strictGroups });
  validateGroups(schema.groups, sink);

  return { type, skipped: false, schema, diagnostics };
}

/**
 * Analyze several classes, each with its own state.
 */
export function analyzeTypes(types: readonly TypeInfo[], options: AnalyzeOptions = {}): TypeAnalysis[] {
  return types.map(type => analyzeType(type, options));
}
