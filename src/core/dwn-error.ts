/**
 * DwnError: structured error class for the dwn core.
 *
 * Every failure that crosses a component boundary is a DwnError carrying a
 * machine-readable code plus enough context (plan, container, engine
 * operation) for the caller to act on it. Engine adapters wrap the raw
 * engine failure as `cause`.
 */

import type { EngineOperation, ErrorCodeValue } from '../types/errors.js';
import { ERROR_RETRIABLE_DEFAULTS, ErrorCode } from '../types/errors.js';

// ---------------------------------------------------------------------------
// Brand symbol (module-private, not exported)
// ---------------------------------------------------------------------------

const DWN_ERROR_BRAND = Symbol.for('dwn.DwnError');

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

/** Identity of a container named in an error. */
export interface ContainerRef {
  id: string;
  name: string;
}

/** Options for constructing a DwnError. */
export interface DwnErrorOptions {
  code: ErrorCodeValue;
  message: string;
  /** Plan the failing operation targeted. */
  plan?: string;
  /** Container the failing engine call targeted. */
  container?: ContainerRef | string;
  /** Engine call that failed. */
  operation?: EngineOperation;
  /** Defaults to ERROR_RETRIABLE_DEFAULTS. */
  retriable?: boolean;
  cause?: unknown;
}

// ---------------------------------------------------------------------------
// DwnError
// ---------------------------------------------------------------------------

export class DwnError extends Error {
  readonly code: ErrorCodeValue;
  readonly retriable: boolean;
  readonly plan?: string;
  readonly container?: ContainerRef | string;
  readonly operation?: EngineOperation;

  /** @internal Brand for safe instanceof checks across module boundaries. */
  readonly [DWN_ERROR_BRAND] = true as const;

  constructor(options: DwnErrorOptions) {
    super(options.message, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = 'DwnError';
    this.code = options.code;
    this.retriable = options.retriable ?? ERROR_RETRIABLE_DEFAULTS[options.code];

    if (options.plan !== undefined) {
      this.plan = options.plan;
    }
    if (options.container !== undefined) {
      this.container = options.container;
    }
    if (options.operation !== undefined) {
      this.operation = options.operation;
    }
  }

  /** Container identity as a display string, if one is attached. */
  get containerLabel(): string | undefined {
    if (this.container === undefined) return undefined;
    return typeof this.container === 'string' ? this.container : this.container.name;
  }
}

// ---------------------------------------------------------------------------
// PartialStopFailure
// ---------------------------------------------------------------------------

/** One container that could not be stopped or removed. */
export interface StopFailure {
  container: ContainerRef;
  operation: 'stop' | 'remove';
  error: DwnError;
}

/**
 * Raised by `stop` after every container has been attempted and at least
 * one failed. Containers in `stopped` stay stopped; nothing is rolled back.
 */
export class PartialStopFailure extends DwnError {
  readonly stopped: readonly ContainerRef[];
  readonly failures: readonly StopFailure[];

  constructor(plan: string, stopped: ContainerRef[], failures: StopFailure[]) {
    const names = failures.map((f) => `${f.container.name} (${f.operation})`).join(', ');
    super({
      code: ErrorCode.PARTIAL_STOP_FAILURE,
      message: `Failed to stop ${failures.length} container(s) of plan "${plan}": ${names}`,
      plan,
    });
    this.name = 'PartialStopFailure';
    this.stopped = stopped;
    this.failures = failures;
  }
}

// ---------------------------------------------------------------------------
// Type guards
// ---------------------------------------------------------------------------

/**
 * Type guard for DwnError instances, including ones created by another copy
 * of this module (checked through the registered brand symbol).
 */
export function isDwnError(value: unknown): value is DwnError {
  if (value instanceof DwnError) {
    return true;
  }

  return (
    typeof value === 'object' &&
    value !== null &&
    DWN_ERROR_BRAND in value &&
    (value as Record<symbol, unknown>)[DWN_ERROR_BRAND] === true
  );
}

/** True when `value` is a DwnError with the given code. */
export function hasErrorCode(value: unknown, code: ErrorCodeValue): value is DwnError {
  return isDwnError(value) && value.code === code;
}

/** Render any thrown value as a message string. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
