import { describe, it, expect } from 'vitest';
import { planMembershipChange } from './GroupMembership.js';

describe('planMembershipChange', () => {
  describe('update_only', () => {
    it('should add missing members without removing any', () => {
      const change = planMembershipChange(['a', 'b'], ['b', 'c'], 'update_only');

      expect(change).toEqual({ action: 'update', members: ['a', 'b', 'c'], added: ['c'], removed: [] });
    });

    it('should skip when nothing is missing even if extras exist', () => {
      expect(planMembershipChange(['a', 'b', 'c'], ['b'], 'update_only')).toEqual({ action: 'skip' });
    });
  });

  describe('full', () => {
    it('should replace the membership with the desired set', () => {
      const change = planMembershipChange(['a', 'b'], ['c'], 'full');

      expect(change).toEqual({ action: 'update', members: ['c'], added: ['c'], removed: ['a', 'b'] });
    });

    it('should update when only removals are needed', () => {
      const change = planMembershipChange(['a', 'b'], ['a'], 'full');

      expect(change).toEqual({ action: 'update', members: ['a'], added: [], removed: ['b'] });
    });

    it('should de-duplicate desired members', () => {
      const change = planMembershipChange([], ['x', 'x', 'y'], 'full');

      expect(change).toEqual({ action: 'update', members: ['x', 'y'], added: ['x', 'y'], removed: [] });
    });
  });

  it.each(['update_only', 'full'] as const)('should skip in-sync groups regardless of order (%s)', (mode) => {
    expect(planMembershipChange(['a', 'b', 'c'], ['c', 'a', 'b'], mode)).toEqual({ action: 'skip' });
  });

  it.each(['update_only', 'full'] as const)('should skip empty groups with nothing desired (%s)', (mode) => {
    expect(planMembershipChange([], [], mode)).toEqual({ action: 'skip' });
  });
});
