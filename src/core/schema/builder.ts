/**
 * Schema builder: finds the action argument, fixes the group universe and
 * places every classified argument into its groups.
 */
import type { DiagnosticSink } from '../diagnostics/types.js';
import { createDiagnostic } from '../diagnostics/rules.js';
import { classifyMember } from './classify.js';
import { GroupMap, DEFAULT_GROUP } from './group-map.js';
import type { ActionArgument, AnnotatedMember, SchemaModel, SchemaOptions } from './types.js';

/**
 * Find the action argument. The first member marked with `@ActionArgument`
 * is authoritative; every later one is reported.
 */
export function findActionArgument(
  members: readonly AnnotatedMember[],
  sink: DiagnosticSink
): ActionArgument | null {
  let action: ActionArgument | null = null;

  for (const { member, annotations } of members) {
    if (!annotations.some(a => a.kind === 'action')) {
      continue;
    }
    if (action) {
      sink.report(createDiagnostic('DuplicateActionArgument', member.location));
      continue;
    }
    const enumType = member.kind !== 'method' && member.type.kind === 'enum' ? member.type : null;
    action = {
      member,
      isEnum: enumType !== null,
      groupNames: enumType ? [...enumType.constants] : [],
    };
  }

  return action;
}

/**
 * Seed the group map before any argument is classified.
 */
export function seedGroups(action: ActionArgument | null): GroupMap {
  const groups = new GroupMap();
  if (!action) {
    groups.ensure(DEFAULT_GROUP);
    return groups;
  }
  for (const name of action.groupNames) {
    groups.ensure(name);
  }
  return groups;
}

/**
 * Build the schema of one class from its annotated members.
 */
export function buildSchema(
  members: readonly AnnotatedMember[],
  sink: DiagnosticSink,
  options: SchemaOptions = {}
): SchemaModel {
  const action = findActionArgument(members, sink);
  const groups = seedGroups(action);
  // Names the action enum declares, before any group is created on demand
  const declaredGroups = new Set(groups.names().map(name => name.toLowerCase()));

  for (const annotated of members) {
    if (action && annotated.member === action.member) {
      continue;
    }

    const classification = classifyMember(annotated);
    const { location } = annotated.member;

    if (classification.kind === 'ignored') {
      continue;
    }
    if (classification.kind === 'grouping-without-argument') {
      sink.report(createDiagnostic('CannotSpecifyAGroupForANonProperty', location));
      continue;
    }

    for (let i = 0; i < classification.conflicts; i++) {
      sink.report(createDiagnostic('ConflictingPropertyDeclaration', location));
    }

    const { argument, placement } = classification;
    switch (placement.kind) {
      case 'common':
        groups.appendToAll(argument);
        if (action && !action.isEnum) {
          sink.report(createDiagnostic('CommonArgumentAttributeUsedWhenActionArgumentNotEnum', location));
        }
        break;
      case 'groups':
        for (const name of placement.names) {
          if (options.strictGroups && action?.isEnum && !declaredGroups.has(name.toLowerCase())) {
            sink.report(createDiagnostic('UndeclaredArgumentGroup', location, name));
          }
          groups.ensure(name).push(argument);
        }
        break;
      case 'default':
        groups.ensure(DEFAULT_GROUP).push(argument);
        break;
    }
  }

  if (action && groups.size === 0) {
    sink.report(createDiagnostic('ActionWithoutArgumentsInGroup', action.member.location));
  }

  return { action, groups };
}
