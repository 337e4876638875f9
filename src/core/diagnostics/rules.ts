/**
 * Rule catalogue.
 */
import type { SourceLocation } from '../../metadata/types.js';
import type { Diagnostic, DiagnosticArg, RuleDescriptor, RuleId } from './types.js';

export const RULES: Readonly<Record<RuleId, RuleDescriptor>> = {
  DuplicateActionArgument: {
    id: 'DuplicateActionArgument',
    code: 'ARG001',
    severity: 'error',
    title: 'Duplicate action argument',
    messageFormat: 'Only one member can be marked with @ActionArgument',
  },
  ActionWithoutArgumentsInGroup: {
    id: 'ActionWithoutArgumentsInGroup',
    code: 'ARG002',
    severity: 'warning',
    title: 'Action argument without groups',
    messageFormat: 'The action argument does not define any argument group',
  },
  ConflictingPropertyDeclaration: {
    id: 'ConflictingPropertyDeclaration',
    code: 'ARG003',
    severity: 'error',
    title: 'Conflicting argument declaration',
    messageFormat: 'A member cannot be both a required and an optional argument',
  },
  CannotSpecifyAGroupForANonProperty: {
    id: 'CannotSpecifyAGroupForANonProperty',
    code: 'ARG004',
    severity: 'error',
    title: 'Group on a non-argument member',
    messageFormat: '@CommonArgument and @ArgumentGroup need @RequiredArgument or @OptionalArgument on the same member',
  },
  CommonArgumentAttributeUsedWhenActionArgumentNotEnum: {
    id: 'CommonArgumentAttributeUsedWhenActionArgumentNotEnum',
    code: 'ARG005',
    severity: 'warning',
    title: 'Common argument without an enum action',
    messageFormat: '@CommonArgument has no effect unless the action argument is an enum',
  },
  DuplicateArgumentName: {
    id: 'DuplicateArgumentName',
    code: 'ARG006',
    severity: 'error',
    title: 'Duplicate argument name',
    messageFormat: "Argument name '{0}' is used more than once in the same group",
  },
  DuplicatePositionalArgumentPosition: {
    id: 'DuplicatePositionalArgumentPosition',
    code: 'ARG007',
    severity: 'error',
    title: 'Duplicate positional argument',
    messageFormat: 'Position {0} is used by more than one required argument in the same group',
  },
  UndeclaredArgumentGroup: {
    id: 'UndeclaredArgumentGroup',
    code: 'ARG008',
    severity: 'warning',
    title: 'Undeclared argument group',
    messageFormat: "Group '{0}' is not a member of the action enum",
  },
};

/**
 * Substitute `{n}` placeholders with diagnostic arguments.
 */
export function formatMessage(format: string, args: readonly DiagnosticArg[]): string {
  return format.replace(/\{(\d+)\}/g, (match, index: string) => {
    const i = Number(index);
    return i < args.length ? String(args[i]) : match;
  });
}

/**
 * Create a diagnostic for a rule at a location.
 */
export function createDiagnostic(
  ruleId: RuleId,
  location: SourceLocation,
  ...args: DiagnosticArg[]
): Diagnostic {
  const rule = RULES[ruleId];
  return {
    ruleId,
    code: rule.code,
    severity: rule.severity,
    message: formatMessage(rule.messageFormat, args),
    location,
    args,
  };
}
