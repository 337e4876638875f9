/**
 * Group validator: name and position uniqueness, checked per group.
 */
import type { DiagnosticSink } from '../diagnostics/types.js';
import { createDiagnostic } from '../diagnostics/rules.js';
import type { GroupMap } from './group-map.js';
import type { Argument } from './types.js';

/**
 * Validate the arguments of one group in stored order.
 * Names and positions that could not be resolved never collide.
 */
export function validateGroup(args: readonly Argument[], sink: DiagnosticSink): void {
  const seenNames = new Set<string>();
  const seenPositions = new Set<number>();

  for (const arg of args) {
    const { location } = arg.member;

    if (arg.kind === 'required' && arg.position !== undefined) {
      if (seenPositions.has(arg.position)) {
        sink.report(createDiagnostic('DuplicatePositionalArgumentPosition', location, arg.position));
      }
      seenPositions.add(arg.position);
    }

    if (arg.name !== undefined) {
      const key = arg.name.toLowerCase();
      if (seenNames.has(key)) {
        sink.report(createDiagnostic('DuplicateArgumentName', location, arg.name));
      }
      seenNames.add(key);
    }
  }
}

/**
 * Validate every group independently.
 */
export function validateGroups(groups: GroupMap, sink: DiagnosticSink): void {
  for (const [, args] of groups) {
    validateGroup(args, sink);
  }
}
