/**
 * Fixed transition table of the approval workflow.
 *
 * draft -> expert_review -> manager_approval -> active -> returned -> expert_review
 * with 'return' stepping back one stage from review and manager approval.
 * Any (state, action) pair not listed here is invalid.
 */

import { WorkflowAction, WorkflowState } from './types';

export const TRANSITIONS: Readonly<
  Record<WorkflowState, Readonly<Partial<Record<string, WorkflowState>>>>
> = {
  [WorkflowState.DRAFT]: {
    [WorkflowAction.SUBMIT]: WorkflowState.REVIEW,
  },
  [WorkflowState.REVIEW]: {
    [WorkflowAction.RETURN]: WorkflowState.DRAFT,
    [WorkflowAction.REVIEW]: WorkflowState.MANAGER_APPROVAL,
  },
  [WorkflowState.MANAGER_APPROVAL]: {
    [WorkflowAction.RETURN]: WorkflowState.REVIEW,
    [WorkflowAction.APPROVE]: WorkflowState.ACTIVE,
  },
  [WorkflowState.ACTIVE]: {
    [WorkflowAction.REOPEN]: WorkflowState.RETURNED,
  },
  [WorkflowState.RETURNED]: {
    [WorkflowAction.SUBMIT]: WorkflowState.REVIEW,
  },
};

/**
 * Next state for (state, action), or undefined when the pair is not in the table
 */
export function nextState(state: WorkflowState, action: string): WorkflowState | undefined {
  const row = TRANSITIONS[state];
  return Object.hasOwn(row, action) ? row[action] : undefined;
}

/**
 * Actions defined from a state, sorted
 */
export function availableActions(state: WorkflowState): string[] {
  return Object.keys(TRANSITIONS[state]).sort();
}
