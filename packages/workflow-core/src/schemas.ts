/**
 * Workflow payload schemas and DTO mapping for the request layer.
 */

import { z } from 'zod';
import {
  accessContextSchema,
  objectRoleSchema,
  parsePayload,
  toAccessContext,
} from '@stagegate/policy-core';
import type { WorkflowEngine } from './engine';
import type { WorkflowHistoryEntry, WorkflowInstance, WorkflowState } from './types';

export const workflowCreateRequestSchema = z.object({
  objective_id: z.string().min(1),
  owner_id: z.string().min(1),
  tenant_id: z.string().min(1),
  workspace_ids: z.array(z.string()).default([]),
});

export const workflowActionRequestSchema = z.object({
  action: z.string().min(1),
  context: accessContextSchema,
  comment: z.string().nullish(),
  object_roles: z.array(objectRoleSchema).nullish(),
});

export type WorkflowCreateRequest = z.infer<typeof workflowCreateRequestSchema>;
export type WorkflowActionRequest = z.infer<typeof workflowActionRequestSchema>;

export interface WorkflowHistoryEntryDto {
  timestamp: string;
  action: string;
  actor_id: string;
  resulting_state: WorkflowState;
  comment: string | null;
}

export interface WorkflowInstanceDto {
  id: string;
  objective_id: string;
  owner_id: string;
  tenant_id: string;
  workspace_ids: string[];
  state: WorkflowState;
  history: WorkflowHistoryEntryDto[];
}

export interface WorkflowListResponse {
  items: WorkflowInstanceDto[];
}

export function toHistoryEntryDto(entry: WorkflowHistoryEntry): WorkflowHistoryEntryDto {
  return {
    timestamp: entry.timestamp.toISOString(),
    action: entry.action,
    actor_id: entry.actorId,
    resulting_state: entry.resultingState,
    comment: entry.comment ?? null,
  };
}

export function toInstanceDto(instance: WorkflowInstance): WorkflowInstanceDto {
  return {
    id: instance.id,
    objective_id: instance.objectiveId,
    owner_id: instance.ownerId,
    tenant_id: instance.tenantId,
    workspace_ids: [...instance.workspaceIds],
    state: instance.state,
    history: instance.history.map(toHistoryEntryDto),
  };
}

export function toListResponse(instances: readonly WorkflowInstance[]): WorkflowListResponse {
  return { items: instances.map(toInstanceDto) };
}

/**
 * Validate a create payload and open a workflow
 */
export function createFromPayload(engine: WorkflowEngine, input: unknown): WorkflowInstanceDto {
  const payload = parsePayload(workflowCreateRequestSchema, input);
  const instance = engine.createInstance({
    objectiveId: payload.objective_id,
    ownerId: payload.owner_id,
    tenantId: payload.tenant_id,
    workspaceIds: payload.workspace_ids,
  });
  return toInstanceDto(instance);
}

/**
 * Validate an action payload and advance the workflow.
 * Errors from the engine propagate unchanged; see describeError in lib-core.
 */
export function advanceFromPayload(
  engine: WorkflowEngine,
  workflowId: string,
  input: unknown
): WorkflowInstanceDto {
  const payload = parsePayload(workflowActionRequestSchema, input);
  const instance = engine.advance({
    workflowId,
    action: payload.action,
    actor: toAccessContext(payload.context),
    comment: payload.comment,
    objectRoles: payload.object_roles,
  });
  return toInstanceDto(instance);
}
