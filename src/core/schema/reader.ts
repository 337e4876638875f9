/**
 * Metadata reader: picks the recognized argument decorators off each member.
 */
import type { DecoratorInfo, LiteralValue, TypeInfo } from '../../metadata/types.js';
import type { AnnotatedMember, Annotation } from './types.js';

/** Modules whose decorators are recognized when none are configured. */
export const DEFAULT_ARGUMENT_MODULES: readonly string[] = ['commandline'];

/**
 * Check whether a module specifier belongs to one of the recognized modules.
 * Matching ignores case and accepts subpaths (`commandline/decorators`).
 */
export function isRecognizedModule(module: string | null, modules: readonly string[]): boolean {
  if (module === null) {
    return false;
  }
  const specifier = module.toLowerCase();
  return modules.some((candidate) => {
    const expected = candidate.toLowerCase();
    return specifier === expected || specifier.startsWith(`${expected}/`);
  });
}

function asString(value: LiteralValue): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

function asPosition(value: LiteralValue): number | undefined {
  return typeof value === 'number' && Number.isInteger(value) ? value : undefined;
}

/**
 * Translate one decorator into an annotation, or null for an unknown name.
 */
export function readAnnotation(decorator: DecoratorInfo): Annotation | null {
  const args = decorator.arguments;

  switch (decorator.name) {
    case 'RequiredArgument':
      return {
        kind: 'required',
        arity: args.length,
        position: asPosition(args[0]),
        name: asString(args[1]),
        description: asString(args[2]),
        isCollection: args[3] === true,
      };
    case 'OptionalArgument':
      return {
        kind: 'optional',
        arity: args.length,
        defaultValue: args[0],
        name: asString(args[1]),
        description: asString(args[2]),
        isCollection: args[3] === true,
      };
    case 'CommonArgument':
      return { kind: 'common' };
    case 'ArgumentGroup':
      return { kind: 'group', groupName: asString(args[0]) };
    case 'ActionArgument':
      return { kind: 'action' };
    default:
      return null;
  }
}

/**
 * Get the members of a type carrying at least one recognized annotation,
 * in declaration order. Decorators from other modules are ignored.
 */
export function readAnnotations(
  type: TypeInfo,
  modules: readonly string[] = DEFAULT_ARGUMENT_MODULES
): AnnotatedMember[] {
  const result: AnnotatedMember[] = [];

  for (const member of type.members) {
    const annotations: Annotation[] = [];
    for (const decorator of member.decorators) {
      if (!isRecognizedModule(decorator.module, modules)) {
        continue;
      }
      const annotation = readAnnotation(decorator);
      if (annotation) {
        annotations.push(annotation);
      }
    }
    if (annotations.length > 0) {
      result.push({ member, annotations });
    }
  }

  return result;
}
