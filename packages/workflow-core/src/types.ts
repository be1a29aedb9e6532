/**
 * Workflow Core Types
 */

import type { AccessContext, ObjectRole } from '@stagegate/policy-core';

/**
 * Approval lifecycle states of an objective
 */
export const WorkflowState = {
  DRAFT: 'draft',
  REVIEW: 'expert_review',
  MANAGER_APPROVAL: 'manager_approval',
  ACTIVE: 'active',
  RETURNED: 'returned',
} as const;

export type WorkflowState = (typeof WorkflowState)[keyof typeof WorkflowState];

export const WORKFLOW_STATES: readonly WorkflowState[] = [
  WorkflowState.DRAFT,
  WorkflowState.REVIEW,
  WorkflowState.MANAGER_APPROVAL,
  WorkflowState.ACTIVE,
  WorkflowState.RETURNED,
];

/**
 * Actions accepted by the state machine (plus the synthetic create entry)
 */
export const WorkflowAction = {
  CREATE: 'workflow:create',
  SUBMIT: 'workflow:submit',
  RETURN: 'workflow:return',
  REVIEW: 'workflow:review',
  APPROVE: 'workflow:approve',
  REOPEN: 'workflow:reopen',
} as const;

export type WorkflowAction = (typeof WorkflowAction)[keyof typeof WorkflowAction];

/**
 * One applied transition. Entries are frozen when appended.
 */
export interface WorkflowHistoryEntry {
  readonly timestamp: Date;
  readonly action: string;
  readonly actorId: string;
  readonly resultingState: WorkflowState;
  readonly comment?: string;
}

/**
 * Read-only view of a workflow instance
 */
export interface WorkflowInstance {
  readonly id: string;
  readonly objectiveId: string;
  readonly ownerId: string;
  readonly tenantId: string;
  readonly workspaceIds: readonly string[];
  readonly state: WorkflowState;
  /** Append-only, in the order transitions were applied */
  readonly history: readonly WorkflowHistoryEntry[];
}

export interface CreateInstanceRequest {
  objectiveId: string;
  ownerId: string;
  tenantId: string;
  workspaceIds: Iterable<string>;
}

export interface AdvanceRequest {
  workflowId: string;
  action: string;
  /** Caller context; actor.userId is recorded as the history actor */
  actor: AccessContext;
  comment?: string | null;
  /** Passed through to PolicyEngine.evaluate (explicit list overrides the stored overlay) */
  objectRoles?: Iterable<ObjectRole> | null;
}

/**
 * Payload handed to the transition listener after a transition is committed
 */
export interface TransitionEvent {
  instance: WorkflowInstance;
  entry: WorkflowHistoryEntry;
  previousState: WorkflowState;
}
