/**
 * @stagegate/workflow-core
 *
 * Objective approval workflow gated by the policy engine.
 */

export { WorkflowState, WorkflowAction, WORKFLOW_STATES } from './types';
export type {
  AdvanceRequest,
  CreateInstanceRequest,
  TransitionEvent,
  WorkflowHistoryEntry,
  WorkflowInstance,
} from './types';

export { TRANSITIONS, nextState, availableActions } from './transitions';

export { WorkflowEngine } from './engine';
export type { WorkflowEngineOptions } from './engine';

export {
  workflowCreateRequestSchema,
  workflowActionRequestSchema,
  toHistoryEntryDto,
  toInstanceDto,
  toListResponse,
  createFromPayload,
  advanceFromPayload,
} from './schemas';
export type {
  WorkflowCreateRequest,
  WorkflowActionRequest,
  WorkflowHistoryEntryDto,
  WorkflowInstanceDto,
  WorkflowListResponse,
} from './schemas';

export { createStagegateCore } from './bootstrap';
export type { StagegateCore } from './bootstrap';
