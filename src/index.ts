/**
 * dwn public API.
 *
 * Re-exports the core so dwn can be driven from code as well as from the
 * `dwn` command.
 */

export const VERSION = '0.1.0';

export type {
  EngineClient,
  ContainerSpec,
  ContainerDescriptor,
  ContainerInspection,
  ContainerStatus,
  PublishedPort,
} from './core/engine/engine-client.js';
export { DockerEngine } from './core/engine/docker-engine.js';
export { MockEngine } from './core/engine/mock-engine.js';
export { InstanceNamer, mintSessionToken, type ContainerRole, type SessionToken } from './core/instance-namer.js';
export {
  RunningPlanTracker,
  primaryFor,
  type ContainerSummary,
  type NamespaceScan,
  type RunningPlanView,
} from './core/running-plan-tracker.js';
export {
  PlanOrchestrator,
  type RunOptions,
  type RunResult,
  type StopOptions,
  type StopReport,
} from './core/plan-orchestrator.js';
export { DynamicPortBinder, type PortForwardDescriptor } from './core/port-binder.js';
export { PlanLoader, parsePlanDocument } from './core/plan-loader.js';
export { DwnError, PartialStopFailure, isDwnError } from './core/dwn-error.js';
export { ErrorCode, type ErrorCodeValue } from './types/errors.js';
export { createPlan, type Plan } from './types/plan.js';
export type { DwnConfig } from './types/config.js';
