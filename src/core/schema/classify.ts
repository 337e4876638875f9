/**
 * Member classification: one decision over the full set of annotations on a member.
 */
import type { MemberInfo } from '../../metadata/types.js';
import type { AnnotatedMember, Annotation, Argument } from './types.js';

/** Required and optional markers need position/default, name and description. */
export const MIN_ARGUMENT_ARITY = 3;

/**
 * Where a classified argument goes in the group map.
 */
export type Placement =
  | { kind: 'common' }
  | { kind: 'groups'; names: string[] }
  | { kind: 'default' };

export type Classification =
  | {
      kind: 'argument';
      argument: Argument;
      placement: Placement;
      /** Extra required/optional markers found after the first one */
      conflicts: number;
    }
  | { kind: 'grouping-without-argument' }
  | { kind: 'ignored' };

type ArgumentAnnotation = Extract<Annotation, { kind: 'required' | 'optional' }>;

function toArgument(member: MemberInfo, annotation: ArgumentAnnotation): Argument {
  if (annotation.kind === 'required') {
    return {
      kind: 'required',
      member,
      position: annotation.position,
      name: annotation.name,
      description: annotation.description,
      isCollection: annotation.isCollection,
    };
  }
  return {
    kind: 'optional',
    member,
    defaultValue: annotation.defaultValue,
    name: annotation.name,
    description: annotation.description,
    isCollection: annotation.isCollection,
  };
}

/**
 * Classify a member from its annotations.
 *
 * The first usable required/optional marker wins; each later one counts as a
 * conflict. `@CommonArgument` takes precedence over `@ArgumentGroup`.
 * Grouping markers without an argument marker are a structural error.
 */
export function classifyMember({ member, annotations }: AnnotatedMember): Classification {
  let argument: Argument | null = null;
  let conflicts = 0;
  let isCommon = false;
  let hasGroupMarker = false;
  const groupNames: string[] = [];

  for (const annotation of annotations) {
    switch (annotation.kind) {
      case 'required':
      case 'optional':
        if (annotation.arity < MIN_ARGUMENT_ARITY) {
          break;
        }
        if (argument) {
          conflicts++;
        } else {
          argument = toArgument(member, annotation);
        }
        break;
      case 'common':
        isCommon = true;
        break;
      case 'group': {
        hasGroupMarker = true;
        const groupName = annotation.groupName;
        if (groupName !== undefined && !groupNames.some(name => name.toLowerCase() === groupName.toLowerCase())) {
          groupNames.push(groupName);
        }
        break;
      }
      case 'action':
        // Resolved by the builder before classification
        break;
      default: {
        const unreachable: never = annotation;
        return unreachable;
      }
    }
  }

  if (!argument) {
    return isCommon || hasGroupMarker ? { kind: 'grouping-without-argument' } : { kind: 'ignored' };
  }

  let placement: Placement;
  if (isCommon) {
    placement = { kind: 'common' };
  } else if (groupNames.length > 0) {
    placement = { kind: 'groups', names: groupNames };
  } else {
    placement = { kind: 'default' };
  }

  return { kind: 'argument', argument, placement, conflicts };
}
