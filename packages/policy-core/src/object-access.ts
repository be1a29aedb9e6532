/**
 * Object Access Helpers
 *
 * Standalone checks for quick view/edit decisions on a single object,
 * without going through role resolution.
 */

import { ObjectRole, type AccessContext } from './types';

/**
 * Owners, members of the object's workspace and managers of the owner may view.
 *
 * @example
 * ```typescript
 * if (canViewObject(context, objective.workspaceId, objective.ownerId)) {
 *   // render
 * }
 * ```
 */
export function canViewObject(
  context: AccessContext,
  objectWorkspaceId: string,
  ownerId: string
): boolean {
  if (ownerId === context.userId) return true;
  if (context.workspaceIds.has(objectWorkspaceId)) return true;
  return context.managerOf.has(ownerId);
}

/**
 * Editors and approvers of the object may edit; otherwise the caller must
 * manage the owner AND belong to the object's workspace.
 */
export function canEditObject(
  context: AccessContext,
  objectWorkspaceId: string,
  ownerId: string,
  objectRoles: Iterable<ObjectRole>
): boolean {
  for (const role of objectRoles) {
    if (role === ObjectRole.EDITOR || role === ObjectRole.APPROVER) return true;
  }
  return context.managerOf.has(ownerId) && context.workspaceIds.has(objectWorkspaceId);
}
