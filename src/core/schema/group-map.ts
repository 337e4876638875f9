/**
 * Case-insensitive, insertion-ordered map from group name to arguments.
 */
import type { Argument } from './types.js';

/** Name of the group used when no action argument exists. */
export const DEFAULT_GROUP = '';

interface GroupEntry {
  /** Name as first written */
  name: string;
  args: Argument[];
}

export class GroupMap implements Iterable<[string, Argument[]]> {
  private entries = new Map<string, GroupEntry>();

  private static key(name: string): string {
    return name.toLowerCase();
  }

  get size(): number {
    return this.entries.size;
  }

  get(name: string): Argument[] | undefined {
    return this.entries.get(GroupMap.key(name))?.args;
  }

  /**
   * Get a group's arguments, creating the group when absent.
   */
  ensure(name: string): Argument[] {
    const key = GroupMap.key(name);
    let entry = this.entries.get(key);
    if (!entry) {
      entry = { name, args: [] };
      this.entries.set(key, entry);
    }
    return entry.args;
  }

  /**
   * Append an argument to every group present.
   */
  appendToAll(arg: Argument): void {
    for (const entry of this.entries.values()) {
      entry.args.push(arg);
    }
  }

  names(): string[] {
    return Array.from(this.entries.values(), entry => entry.name);
  }

  *[Symbol.iterator](): Iterator<[string, Argument[]]> {
    for (const entry of this.entries.values()) {
      yield [entry.name, entry.args];
    }
  }

  /**
   * Group names mapped to the member names of their arguments.
   */
  toJSON(): Record<string, string[]> {
    const result: Record<string, string[]> = {};
    for (const [name, args] of this) {
      result[name] = args.map(arg => arg.member.name);
    }
    return result;
  }
}
