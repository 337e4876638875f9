/**
 * Language-neutral description of the classes argcheck analyzes.
 *
 * A metadata provider fills these records; the schema core only reads them.
 */

/**
 * Location of a declaration in source.
 */
export interface SourceLocation {
  /** Path of the file the declaration lives in */
  file: string;
  /** 1-based line number */
  line: number;
  /** 1-based column number */
  column: number;
}

/**
 * A decorator argument folded to a constant.
 * `undefined` means the expression could not be folded.
 */
export type LiteralValue = string | number | boolean | null | undefined;

/**
 * A decorator as written on a member.
 */
export interface DecoratorInfo {
  /** Exported name of the decorator (import aliases resolved) */
  name: string;
  /** Module the decorator was imported from, null when not imported */
  module: string | null;
  /** Call arguments in order; empty for a bare `@Decorator` */
  arguments: LiteralValue[];
  location: SourceLocation;
}

/**
 * What argcheck needs to know about a member's declared type.
 */
export type TypeShape =
  | { kind: 'enum'; name: string; constants: string[] }
  | { kind: 'other'; text: string };

export type MemberKind = 'property' | 'accessor' | 'method';

/**
 * A declared member of a class.
 */
export interface MemberInfo {
  /** Stable identifier, `<file>#<class>.<member>` */
  id: string;
  name: string;
  kind: MemberKind;
  type: TypeShape;
  decorators: DecoratorInfo[];
  location: SourceLocation;
}

/**
 * A class declaration with its members in declaration order.
 */
export interface TypeInfo {
  name: string;
  filePath: string;
  location: SourceLocation;
  members: MemberInfo[];
}

/**
 * Supplies type metadata to the analyzer.
 */
export interface MetadataProvider {
  /**
   * Get the classes declared in one file, or in every loaded file.
   */
  getTypes(filePath?: string): TypeInfo[];

  /**
   * Release resources.
   */
  dispose(): void;
}
