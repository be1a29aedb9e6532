import { describe, it, expect } from 'vitest';
import { createAccessContext } from '../context';
import { canEditObject, canViewObject } from '../object-access';

describe('Object access helpers', () => {
  describe('canViewObject', () => {
    it('should allow the owner', () => {
      const context = createAccessContext({ userId: 'u1', tenantId: 't1' });
      expect(canViewObject(context, 'ws-1', 'u1')).toBe(true);
    });

    it('should allow workspace members', () => {
      const context = createAccessContext({ userId: 'u1', tenantId: 't1', workspaceIds: ['ws-1'] });
      expect(canViewObject(context, 'ws-1', 'u2')).toBe(true);
      expect(canViewObject(context, 'ws-2', 'u2')).toBe(false);
    });

    it('should allow managers of the owner', () => {
      const context = createAccessContext({ userId: 'u1', tenantId: 't1', managerOf: ['u2'] });
      expect(canViewObject(context, 'ws-9', 'u2')).toBe(true);
      expect(canViewObject(context, 'ws-9', 'u3')).toBe(false);
    });
  });

  describe('canEditObject', () => {
    const outsider = createAccessContext({ userId: 'u1', tenantId: 't1' });

    it('should allow editors and approvers of the object', () => {
      expect(canEditObject(outsider, 'ws-1', 'u2', ['editor'])).toBe(true);
      expect(canEditObject(outsider, 'ws-1', 'u2', ['approver'])).toBe(true);
    });

    it('should not allow viewers', () => {
      expect(canEditObject(outsider, 'ws-1', 'u2', ['viewer'])).toBe(false);
    });

    it('should require both management and workspace membership otherwise', () => {
      const managerOnly = createAccessContext({ userId: 'u1', tenantId: 't1', managerOf: ['u2'] });
      const both = createAccessContext({
        userId: 'u1',
        tenantId: 't1',
        managerOf: ['u2'],
        workspaceIds: ['ws-1'],
      });

      expect(canEditObject(managerOnly, 'ws-1', 'u2', [])).toBe(false);
      expect(canEditObject(both, 'ws-1', 'u2', [])).toBe(true);
    });
  });
});
