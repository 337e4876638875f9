/**
 * Schema type definitions.
 */
import type { LiteralValue, MemberInfo } from '../../metadata/types.js';
import type { GroupMap } from './group-map.js';

/**
 * Recognized argument decorators, as read from a member.
 *
 * `arity` is the number of decorator arguments; required and optional
 * markers with fewer than three are ignored when classifying.
 */
export type Annotation =
  | {
      kind: 'required';
      arity: number;
      position: number | undefined;
      name: string | undefined;
      description: string | undefined;
      isCollection: boolean;
    }
  | {
      kind: 'optional';
      arity: number;
      defaultValue: LiteralValue;
      name: string | undefined;
      description: string | undefined;
      isCollection: boolean;
    }
  | { kind: 'common' }
  | { kind: 'group'; groupName: string | undefined }
  | { kind: 'action' };

/**
 * A member with the recognized annotations found on it.
 */
export interface AnnotatedMember {
  member: MemberInfo;
  annotations: Annotation[];
}

interface ArgumentBase {
  /** Source member, used for locations only */
  readonly member: MemberInfo;
  name: string | undefined;
  description: string | undefined;
  isCollection: boolean;
}

/** A positional argument. */
export interface RequiredArgument extends ArgumentBase {
  kind: 'required';
  /** Undefined when the decorator's position could not be folded to an integer */
  position: number | undefined;
}

/** A named argument. */
export interface OptionalArgument extends ArgumentBase {
  kind: 'optional';
  defaultValue: LiteralValue;
}

export type Argument = RequiredArgument | OptionalArgument;

/**
 * The member selecting the active mode, and the groups it makes legal.
 */
export interface ActionArgument {
  readonly member: MemberInfo;
  /** True when the member's declared type is an enum */
  isEnum: boolean;
  /** Enum constant names in declaration order; empty when not an enum */
  groupNames: string[];
}

/**
 * The reconstructed schema of one class.
 */
export interface SchemaModel {
  action: ActionArgument | null;
  groups: GroupMap;
}

export interface SchemaOptions {
  /** Report group names the action enum does not declare */
  strictGroups?: boolean;
}
