/**
 * Stop-and-remove loop shared by `stop`, binding removal, orphan pruning and
 * the cleanup after an attached run.
 *
 * Containers are handled one at a time. A failure is recorded against the
 * container and operation that failed and the loop moves on; callers decide
 * whether a non-empty failure list is fatal.
 */

import type { EngineClient } from './engine/engine-client.js';
import { hasErrorCode, isDwnError, DwnError, type ContainerRef, type StopFailure } from './dwn-error.js';
import type { ContainerSummary } from './running-plan-tracker.js';
import { ErrorCode } from '../types/errors.js';
import type { Logger } from './logger.js';

export interface TeardownResult {
  /** Containers that are gone: removed now, or already missing. */
  stopped: ContainerRef[];
  failures: StopFailure[];
}

export interface TeardownOptions {
  /** Grace period passed to the engine's stop call. */
  timeoutSeconds?: number;
  logger: Logger;
}

function asDwnError(err: unknown, operation: 'stop' | 'remove', container: ContainerRef): DwnError {
  if (isDwnError(err)) return err;
  return new DwnError({
    code: ErrorCode.ENGINE_ERROR,
    message: err instanceof Error ? err.message : String(err),
    operation,
    container,
    cause: err,
  });
}

/** Forwarders first, so no relay outlives its Primary. */
export function teardownOrder(containers: readonly ContainerSummary[]): ContainerSummary[] {
  return [...containers].sort((a, b) => {
    if (a.role.kind !== b.role.kind) return a.role.kind === 'port-forward' ? -1 : 1;
    return a.name.localeCompare(b.name);
  });
}

export async function teardownContainers(
  engine: EngineClient,
  containers: readonly ContainerSummary[],
  options: TeardownOptions,
): Promise<TeardownResult> {
  const { logger } = options;
  const result: TeardownResult = { stopped: [], failures: [] };

  for (const container of containers) {
    const ref: ContainerRef = { id: container.id, name: container.name };

    if (container.status === 'running' || container.status === 'restarting' || container.status === 'paused') {
      try {
        await engine.stop(container.id, options.timeoutSeconds);
      } catch (err) {
        if (hasErrorCode(err, ErrorCode.CONTAINER_NOT_FOUND)) {
          logger.debug('container already gone', { container: container.name });
          result.stopped.push(ref);
          continue;
        }
        const error = asDwnError(err, 'stop', ref);
        logger.warn('failed to stop container', { container: container.name, error_code: error.code, error });
        result.failures.push({ container: ref, operation: 'stop', error });
        continue;
      }
    }

    try {
      await engine.remove(container.id);
      logger.debug('container removed', { container: container.name });
    } catch (err) {
      if (!hasErrorCode(err, ErrorCode.CONTAINER_NOT_FOUND)) {
        const error = asDwnError(err, 'remove', ref);
        logger.warn('failed to remove container', { container: container.name, error_code: error.code, error });
        result.failures.push({ container: ref, operation: 'remove', error });
        continue;
      }
      logger.debug('container already gone', { container: container.name });
    }
    result.stopped.push(ref);
  }

  return result;
}
