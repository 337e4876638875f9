/**
 * Diagnostic type definitions.
 */
import type { SourceLocation } from '../../metadata/types.js';

/**
 * Identifiers of every rule argcheck reports.
 */
export const RULE_IDS = [
  'DuplicateActionArgument',
  'ActionWithoutArgumentsInGroup',
  'ConflictingPropertyDeclaration',
  'CannotSpecifyAGroupForANonProperty',
  'CommonArgumentAttributeUsedWhenActionArgumentNotEnum',
  'DuplicateArgumentName',
  'DuplicatePositionalArgumentPosition',
  'UndeclaredArgumentGroup',
] as const;

export type RuleId = (typeof RULE_IDS)[number];

export type Severity = 'error' | 'warning';

/** Severity as configured; `off` drops the rule's findings. */
export type SeverityLevel = Severity | 'off';

/**
 * Static description of a rule.
 */
export interface RuleDescriptor {
  id: RuleId;
  /** Short stable code shown in output */
  code: string;
  severity: Severity;
  title: string;
  /** Message with `{0}`-style placeholders for the diagnostic arguments */
  messageFormat: string;
}

export type DiagnosticArg = string | number | null;

/**
 * A single finding on a member of an analyzed class.
 */
export interface Diagnostic {
  ruleId: RuleId;
  code: string;
  severity: Severity;
  message: string;
  location: SourceLocation;
  args: DiagnosticArg[];
}

/**
 * Receives diagnostics as they are found.
 */
export interface DiagnosticSink {
  report(diagnostic: Diagnostic): void;
}
