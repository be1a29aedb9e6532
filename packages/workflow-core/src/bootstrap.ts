/**
 * Process bootstrap
 *
 * Builds the engines once at startup. Request handlers receive them by
 * reference; there is no module-level singleton.
 */

import {
  applyLoggerConfig,
  createLogger,
  loadConfig,
  type StagegateConfig,
  type StagegateEnv,
} from '@stagegate/lib-core';
import { PolicyEngine, createDefaultPolicyEngine } from '@stagegate/policy-core';
import { WorkflowEngine, type WorkflowEngineOptions } from './engine';

export interface StagegateCore {
  config: StagegateConfig;
  policyEngine: PolicyEngine;
  workflowEngine: WorkflowEngine;
}

/**
 * @example
 * ```typescript
 * const core = createStagegateCore(process.env, {
 *   onTransition: (event) => notifier.enqueue(event),
 * });
 * ```
 */
export function createStagegateCore(
  env: StagegateEnv,
  workflowOptions: Omit<WorkflowEngineOptions, 'policyEngine'> = {}
): StagegateCore {
  const config = loadConfig(env);
  applyLoggerConfig(config);

  const policyConfig = { verbose: config.policyLogging };
  const policyEngine = config.seedDefaultRoles
    ? createDefaultPolicyEngine(policyConfig)
    : new PolicyEngine(policyConfig);
  const workflowEngine = new WorkflowEngine({ ...workflowOptions, policyEngine });

  createLogger().module('BOOTSTRAP').info('Stagegate core initialised', {
    roles: policyEngine.describeRoles().map((role) => role.name),
    policyLogging: config.policyLogging,
  });

  return { config, policyEngine, workflowEngine };
}
