/**
 * Error taxonomy for dwn.
 *
 * Every failure the core surfaces carries one of these codes. The first
 * group is what operators see from commands; the engine-level codes are
 * raised by {@link EngineClient} adapters and usually translated by the
 * orchestrator or binder before they reach the CLI.
 */

// ---------------------------------------------------------------------------
// ErrorCode
// ---------------------------------------------------------------------------

export const ErrorCode = {
  PLAN_NOT_FOUND: 'PLAN_NOT_FOUND',
  INVALID_PLAN: 'INVALID_PLAN',
  ALREADY_RUNNING: 'ALREADY_RUNNING',
  PLAN_NOT_RUNNING: 'PLAN_NOT_RUNNING',
  PORT_CONFLICT: 'PORT_CONFLICT',
  ENGINE_UNREACHABLE: 'ENGINE_UNREACHABLE',
  PARTIAL_STOP_FAILURE: 'PARTIAL_STOP_FAILURE',
  ORPHANED_BINDING: 'ORPHANED_BINDING',
  UNRECOGNIZED_CONTAINER: 'UNRECOGNIZED_CONTAINER',
  // Engine-level
  NAME_CONFLICT: 'NAME_CONFLICT',
  CONTAINER_NOT_FOUND: 'CONTAINER_NOT_FOUND',
  ENGINE_ERROR: 'ENGINE_ERROR',
} as const;

export type ErrorCodeValue = (typeof ErrorCode)[keyof typeof ErrorCode];

// ---------------------------------------------------------------------------
// Retriable defaults
// ---------------------------------------------------------------------------

/**
 * Whether a caller may reasonably retry the same operation. The core never
 * retries on its own; this is advice for the CLI layer.
 */
export const ERROR_RETRIABLE_DEFAULTS: Readonly<Record<ErrorCodeValue, boolean>> = {
  PLAN_NOT_FOUND: false,
  INVALID_PLAN: false,
  ALREADY_RUNNING: false,
  PLAN_NOT_RUNNING: false,
  PORT_CONFLICT: false,
  ENGINE_UNREACHABLE: true,
  PARTIAL_STOP_FAILURE: true,
  ORPHANED_BINDING: false,
  UNRECOGNIZED_CONTAINER: false,
  NAME_CONFLICT: false,
  CONTAINER_NOT_FOUND: false,
  ENGINE_ERROR: false,
};

// ---------------------------------------------------------------------------
// Engine operations
// ---------------------------------------------------------------------------

/** Engine calls named in error context. */
export type EngineOperation =
  | 'create'
  | 'start'
  | 'stop'
  | 'remove'
  | 'list'
  | 'inspect'
  | 'logs'
  | 'info'
  | 'network'
  | 'image';
