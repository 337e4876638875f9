/**
 * Tests for member classification.
 */
import { describe, it, expect } from 'vitest';
import { classifyMember } from '../../../../src/core/schema/classify.js';
import type { Annotation } from '../../../../src/core/schema/types.js';
import { member } from '../../../helpers/metadata.js';

const target = member('value', 3, []);

function required(position: number, name: string, arity = 3): Annotation {
  return { kind: 'required', arity, position, name, description: 'desc', isCollection: false };
}

function optional(name: string, arity = 3): Annotation {
  return { kind: 'optional', arity, defaultValue: null, name, description: 'desc', isCollection: false };
}

describe('classifyMember', () => {
  it('should place a plain required argument in the default group', () => {
    const result = classifyMember({ member: target, annotations: [required(0, 'path')] });

    expect(result).toEqual({
      kind: 'argument',
      argument: {
        kind: 'required',
        member: target,
        position: 0,
        name: 'path',
        description: 'desc',
        isCollection: false,
      },
      placement: { kind: 'default' },
      conflicts: 0,
    });
  });

  it('should keep the first marker and count each later one as a conflict', () => {
    const result = classifyMember({
      member: target,
      annotations: [optional('first'), required(0, 'second'), required(1, 'third')],
    });

    expect(result.kind).toBe('argument');
    if (result.kind === 'argument') {
      expect(result.argument.kind).toBe('optional');
      expect(result.argument.name).toBe('first');
      expect(result.conflicts).toBe(2);
    }
  });

  it('should ignore markers with fewer than three parameters', () => {
    const result = classifyMember({
      member: target,
      annotations: [required(0, 'short', 2), optional('kept')],
    });

    expect(result).toMatchObject({ kind: 'argument', conflicts: 0, argument: { name: 'kept' } });
  });

  it('should let common win over groups', () => {
    const result = classifyMember({
      member: target,
      annotations: [{ kind: 'group', groupName: 'Start' }, optional('v'), { kind: 'common' }],
    });

    expect(result).toMatchObject({ kind: 'argument', placement: { kind: 'common' } });
  });

  it('should collect group names without case-insensitive repeats', () => {
    const result = classifyMember({
      member: target,
      annotations: [
        optional('v'),
        { kind: 'group', groupName: 'Start' },
        { kind: 'group', groupName: 'start' },
        { kind: 'group', groupName: 'Stop' },
      ],
    });

    expect(result).toMatchObject({ placement: { kind: 'groups', names: ['Start', 'Stop'] } });
  });

  it('should fall back to the default group when no group name resolved', () => {
    const result = classifyMember({
      member: target,
      annotations: [optional('v'), { kind: 'group', groupName: undefined }],
    });

    expect(result).toMatchObject({ placement: { kind: 'default' } });
  });

  it('should flag grouping markers without an argument marker', () => {
    expect(classifyMember({ member: target, annotations: [{ kind: 'common' }] }))
      .toEqual({ kind: 'grouping-without-argument' });
    expect(classifyMember({ member: target, annotations: [{ kind: 'group', groupName: 'Start' }] }))
      .toEqual({ kind: 'grouping-without-argument' });
  });

  it('should flag grouping markers next to an unusable argument marker', () => {
    const result = classifyMember({
      member: target,
      annotations: [required(0, 'short', 1), { kind: 'common' }],
    });

    expect(result).toEqual({ kind: 'grouping-without-argument' });
  });

  it('should ignore members with no argument or grouping marker', () => {
    expect(classifyMember({ member: target, annotations: [{ kind: 'action' }] })).toEqual({ kind: 'ignored' });
    expect(classifyMember({ member: target, annotations: [optional('v', 2)] })).toEqual({ kind: 'ignored' });
  });
});
