/**
 * Workflow Engine
 *
 * In-memory state machine coordinating objective approvals. Every transition
 * is checked by the policy engine first, then applied together with its
 * history entry inside one synchronous call, so no caller can observe a state
 * change without the matching entry (or the reverse).
 */

import { randomUUID } from 'node:crypto';
import {
  InvalidTransitionError,
  NotFoundError,
  PermissionDeniedError,
  createLogger,
  type Logger,
} from '@stagegate/lib-core';
import type { PolicyEngine, ResourceAttributes } from '@stagegate/policy-core';
import { nextState } from './transitions';
import {
  WorkflowAction,
  WorkflowState,
  type AdvanceRequest,
  type CreateInstanceRequest,
  type TransitionEvent,
  type WorkflowHistoryEntry,
  type WorkflowInstance,
} from './types';

export interface WorkflowEngineOptions {
  /** Decides every transition */
  policyEngine: PolicyEngine;

  /** Clock for history timestamps (default: current time) */
  now?: () => Date;

  /** Id generator for new instances (default: randomUUID) */
  generateId?: () => string;

  logger?: Logger;

  /**
   * Called after a transition is committed (notifications, persistence hooks).
   * A throwing listener is logged; the transition stays applied.
   */
  onTransition?: (event: TransitionEvent) => void;
}

interface InstanceRecord {
  id: string;
  objectiveId: string;
  ownerId: string;
  tenantId: string;
  workspaceIds: readonly string[];
  state: WorkflowState;
  history: WorkflowHistoryEntry[];
}

/**
 * Entries are frozen, but Date is mutable: hand out a fresh timestamp each time.
 */
function copyEntry(entry: WorkflowHistoryEntry): WorkflowHistoryEntry {
  return Object.freeze({ ...entry, timestamp: new Date(entry.timestamp.getTime()) });
}

function snapshot(record: InstanceRecord): WorkflowInstance {
  return Object.freeze({
    id: record.id,
    objectiveId: record.objectiveId,
    ownerId: record.ownerId,
    tenantId: record.tenantId,
    workspaceIds: record.workspaceIds,
    state: record.state,
    history: Object.freeze(record.history.map(copyEntry)),
  });
}

export class WorkflowEngine {
  private readonly instances = new Map<string, InstanceRecord>();
  private readonly policyEngine: PolicyEngine;
  private readonly now: () => Date;
  private readonly generateId: () => string;
  private readonly log: Logger;
  private readonly onTransition?: (event: TransitionEvent) => void;

  constructor(options: WorkflowEngineOptions) {
    this.policyEngine = options.policyEngine;
    this.now = options.now ?? (() => new Date());
    this.generateId = options.generateId ?? randomUUID;
    this.log = options.logger ?? createLogger().module('WORKFLOW');
    this.onTransition = options.onTransition;
  }

  /**
   * Create a workflow for an objective in the draft state.
   * The first history entry is a synthetic 'workflow:create' by the owner.
   */
  createInstance(request: CreateInstanceRequest): WorkflowInstance {
    const record: InstanceRecord = {
      id: this.generateId(),
      objectiveId: request.objectiveId,
      ownerId: request.ownerId,
      tenantId: request.tenantId,
      workspaceIds: Object.freeze([...request.workspaceIds]),
      state: WorkflowState.DRAFT,
      history: [],
    };
    record.history.push(
      this.entry(WorkflowAction.CREATE, request.ownerId, WorkflowState.DRAFT, 'Workflow created')
    );
    this.instances.set(record.id, record);

    this.log.info('Workflow created', {
      tenantId: record.tenantId,
      userId: record.ownerId,
      workflowId: record.id,
      objectiveId: record.objectiveId,
    });
    return snapshot(record);
  }

  getInstance(workflowId: string): WorkflowInstance | undefined {
    const record = this.instances.get(workflowId);
    return record ? snapshot(record) : undefined;
  }

  /**
   * @throws NotFoundError if the workflow does not exist
   */
  requireInstance(workflowId: string): WorkflowInstance {
    return snapshot(this.requireRecord(workflowId));
  }

  /**
   * All instances in creation order
   */
  listInstances(): WorkflowInstance[] {
    return [...this.instances.values()].map(snapshot);
  }

  /**
   * Apply `action` to a workflow on behalf of the actor.
   *
   * @throws NotFoundError if the workflow does not exist
   * @throws PermissionDeniedError if the policy engine denies the action
   * @throws InvalidTransitionError if the action is undefined for the current state
   */
  advance(request: AdvanceRequest): WorkflowInstance {
    const record = this.requireRecord(request.workflowId);
    const { actor, action } = request;
    const logContext = {
      tenantId: record.tenantId,
      userId: actor.userId,
      workflowId: record.id,
      action,
    };

    const resource: ResourceAttributes = {
      id: record.objectiveId,
      workspace_ids: record.workspaceIds,
      owner_id: record.ownerId,
    };
    const decision = this.policyEngine.evaluate({
      userId: actor.userId,
      action,
      context: actor,
      resource,
      objectRoles: request.objectRoles,
    });
    if (!decision.allowed) {
      this.log.warn('Workflow action denied', { ...logContext, permissions: decision.permissions });
      throw new PermissionDeniedError(action, decision.permissions, actor.userId);
    }

    const previousState = record.state;
    const target = nextState(previousState, action);
    if (target === undefined) {
      this.log.warn('Invalid workflow transition', { ...logContext, state: previousState });
      throw new InvalidTransitionError(previousState, action);
    }

    const entry = this.entry(action, actor.userId, target, request.comment ?? undefined);
    record.history.push(entry);
    record.state = target;

    this.log.info('Workflow transition applied', {
      ...logContext,
      from: previousState,
      to: target,
    });

    const instance = snapshot(record);
    this.notify({ instance, entry: copyEntry(entry), previousState });
    return instance;
  }

  private requireRecord(workflowId: string): InstanceRecord {
    const record = this.instances.get(workflowId);
    if (!record) {
      throw new NotFoundError('Workflow', workflowId);
    }
    return record;
  }

  private entry(
    action: string,
    actorId: string,
    resultingState: WorkflowState,
    comment: string | undefined
  ): WorkflowHistoryEntry {
    return Object.freeze({
      timestamp: new Date(this.now().getTime()),
      action,
      actorId,
      resultingState,
      ...(comment !== undefined && { comment }),
    });
  }

  private notify(event: TransitionEvent): void {
    if (!this.onTransition) return;
    try {
      this.onTransition(event);
    } catch (error) {
      this.log.error(
        'Transition listener failed',
        { tenantId: event.instance.tenantId, workflowId: event.instance.id },
        error instanceof Error ? error : new Error(String(error))
      );
    }
  }
}
