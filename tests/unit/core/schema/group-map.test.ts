/**
 * Tests for GroupMap.
 */
import { describe, it, expect } from 'vitest';
import { GroupMap } from '../../../../src/core/schema/group-map.js';
import type { Argument } from '../../../../src/core/schema/types.js';
import { member } from '../../../helpers/metadata.js';

function optional(name: string): Argument {
  return {
    kind: 'optional',
    member: member(name, 3, []),
    defaultValue: null,
    name,
    description: undefined,
    isCollection: false,
  };
}

describe('GroupMap', () => {
  it('should look up groups case-insensitively', () => {
    const groups = new GroupMap();
    groups.ensure('Start');

    expect(groups.get('START')).toEqual([]);
    expect(groups.get('start')).toEqual([]);
    expect(groups.get('Stop')).toBeUndefined();
  });

  it('should keep the name as first written', () => {
    const groups = new GroupMap();
    groups.ensure('Start');
    groups.ensure('start');

    expect(groups.size).toBe(1);
    expect(groups.names()).toEqual(['Start']);
  });

  it('should append to every group', () => {
    const groups = new GroupMap();
    groups.ensure('Start');
    groups.ensure('Stop');
    const arg = optional('verbose');

    groups.appendToAll(arg);

    expect(groups.get('Start')).toEqual([arg]);
    expect(groups.get('Stop')).toEqual([arg]);
  });

  it('should iterate in insertion order', () => {
    const groups = new GroupMap();
    groups.ensure('b');
    groups.ensure('a');

    expect([...groups].map(([name]) => name)).toEqual(['b', 'a']);
  });

  it('should serialize to member names per group', () => {
    const groups = new GroupMap();
    groups.ensure('').push(optional('verbose'));

    expect(groups.toJSON()).toEqual({ '': ['verbose'] });
  });
});
