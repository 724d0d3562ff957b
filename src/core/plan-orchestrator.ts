/**
 * Plan orchestrator for dwn.
 *
 * Starts and stops the containers of a plan. `run` mints a session token,
 * creates the Primary container on the dwn network and either detaches once
 * it is running or streams its output until it exits. `stop` tears down
 * every container of a plan, forwarders first, orphans included.
 *
 * Stopping is not atomic: each container is attempted in turn and failures
 * are collected into a {@link PartialStopFailure} thrown after the loop.
 * Containers already stopped stay stopped.
 */

import type { ContainerSpec, EngineClient } from './engine/engine-client.js';
import { DwnError, PartialStopFailure, hasErrorCode, type ContainerRef } from './dwn-error.js';
import { PRIMARY, mintSessionToken, type InstanceNamer, type SessionToken } from './instance-namer.js';
import { createLogger, type Logger } from './logger.js';
import {
  RunningPlanTracker,
  type ContainerSummary,
  type RunningPlanView,
} from './running-plan-tracker.js';
import { teardownContainers, teardownOrder } from './teardown.js';
import { ErrorCode } from '../types/errors.js';
import type { Plan } from '../types/plan.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface PlanOrchestratorOptions {
  engine: EngineClient;
  namer: InstanceNamer;
  /** Defaults to a tracker over the same engine and namer. */
  tracker?: RunningPlanTracker;
  /** Engine network every Primary and forwarder joins. */
  networkName: string;
  /** Image reference of the port forwarder, checked by preflight. */
  forwarderImage: string;
  /** Grace period for a non-forced stop (default 10). */
  stopTimeoutSeconds?: number;
  logger?: Logger;
}

export interface RunOptions {
  /** Reuse a session token instead of minting one. */
  session?: SessionToken;
  /** Receives each output line of an attached run. */
  onLog?: (line: string) => void;
  /** Aborting detaches from an attached run; the container keeps running. */
  signal?: AbortSignal;
}

export interface RunResult {
  session: SessionToken;
  containerId: string;
  containerName: string;
  /** The plan's view right after the Primary started. */
  view: RunningPlanView;
  /** Set once an attached run's container has exited. */
  exitCode?: number;
  /** True when the container was left running (detached plan or aborted stream). */
  detached: boolean;
}

export interface StopOptions {
  /** Stop with a zero grace period. */
  force?: boolean;
  /** Only stop this session (and the forwarders serving it). */
  session?: SessionToken;
}

export interface StopReport {
  plan: string;
  stopped: ContainerRef[];
}

export interface PlanCounts {
  valid: number;
  invalid: number;
}

export interface PreflightReport {
  engine: { available: boolean; version?: string };
  network: { name: string; present: boolean };
  forwarderImage: { ref: string; present: boolean };
  plans: PlanCounts;
  /** Engine reachable, network and forwarder image present. */
  ok: boolean;
}

export interface StatusReport {
  plans: RunningPlanView[];
  /** ORPHANED_BINDING and UNRECOGNIZED_CONTAINER errors, orphans first. */
  warnings: DwnError[];
}

const DEFAULT_STOP_TIMEOUT_SECONDS = 10;

// ---------------------------------------------------------------------------
// PlanOrchestrator
// ---------------------------------------------------------------------------

export class PlanOrchestrator {
  private readonly engine: EngineClient;
  private readonly namer: InstanceNamer;
  private readonly tracker: RunningPlanTracker;
  private readonly networkName: string;
  private readonly forwarderImage: string;
  private readonly stopTimeoutSeconds: number;
  private readonly logger: Logger;

  constructor(options: PlanOrchestratorOptions) {
    this.engine = options.engine;
    this.namer = options.namer;
    this.logger = options.logger ?? createLogger('orchestrator');
    this.tracker =
      options.tracker ??
      new RunningPlanTracker({ engine: options.engine, namer: options.namer, logger: this.logger.child('tracker') });
    this.networkName = options.networkName;
    this.forwarderImage = options.forwarderImage;
    this.stopTimeoutSeconds = options.stopTimeoutSeconds ?? DEFAULT_STOP_TIMEOUT_SECONDS;
  }

  // -----------------------------------------------------------------------
  // run
  // -----------------------------------------------------------------------

  /**
   * Start a new instance of `plan`.
   *
   * @throws DwnError ALREADY_RUNNING when the session already has a Primary.
   */
  async run(plan: Plan, options: RunOptions = {}): Promise<RunResult> {
    const session = options.session ?? mintSessionToken();
    const log = this.logger.withContext({ plan: plan.name, session });

    const existing = await this.tracker.getPlan(plan.name);
    if (existing?.containers.some((c) => c.role.kind === 'primary' && c.session === session)) {
      throw new DwnError({
        code: ErrorCode.ALREADY_RUNNING,
        message: `Plan "${plan.name}" is already running in session ${session}`,
        plan: plan.name,
      });
    }

    await this.ensureNetwork();
    await this.ensurePlanImage(plan, log);

    const spec = this.primarySpec(plan, session);
    for (const mount of spec.mounts) {
      log.info('mounting host path', { hostPath: mount.hostPath, containerPath: mount.containerPath });
    }

    let containerId: string;
    try {
      containerId = await this.engine.createContainer(spec);
    } catch (err) {
      if (hasErrorCode(err, ErrorCode.NAME_CONFLICT)) {
        throw new DwnError({
          code: ErrorCode.ALREADY_RUNNING,
          message: `Plan "${plan.name}" is already running in session ${session}`,
          plan: plan.name,
          container: spec.name,
          operation: 'create',
          cause: err,
        });
      }
      throw err;
    }
    const ref: ContainerRef = { id: containerId, name: spec.name };

    try {
      await this.engine.start(containerId);
    } catch (err) {
      await this.discard(ref, log);
      throw err;
    }
    log.info('primary started', { container: spec.name });

    if (plan.detach) {
      const inspection = await this.engine.inspect(containerId);
      if (inspection.status !== 'running') {
        await this.discard(ref, log);
        throw new DwnError({
          code: ErrorCode.ENGINE_ERROR,
          message: `Container ${spec.name} exited right after start (status ${inspection.status}, exit code ${inspection.exitCode ?? 'unknown'})`,
          plan: plan.name,
          container: ref,
          operation: 'start',
        });
      }
    }

    const view = await this.tracker.getPlan(plan.name);
    if (!view) {
      throw new DwnError({
        code: ErrorCode.CONTAINER_NOT_FOUND,
        message: `Container ${spec.name} disappeared right after start`,
        plan: plan.name,
        container: ref,
      });
    }

    const result: RunResult = { session, containerId, containerName: spec.name, view, detached: true };
    if (plan.detach) {
      log.info('container started, detaching', { container: spec.name });
      return result;
    }

    log.debug('streaming container logs', { container: spec.name });
    for await (const line of this.engine.streamLogs(containerId, { signal: options.signal })) {
      options.onLog?.(line);
    }

    if (options.signal?.aborted) {
      log.info('detached from running container', { container: spec.name });
      return result;
    }

    const inspection = await this.engine.inspect(containerId);
    log.info('container exited', { container: spec.name, exitCode: inspection.exitCode });

    // The run is over; take the session's forwarders down with the Primary.
    await this.cleanupSession(plan.name, session);
    return { ...result, exitCode: inspection.exitCode, detached: false };
  }

  // -----------------------------------------------------------------------
  // stop
  // -----------------------------------------------------------------------

  /**
   * Stop and remove every container of a plan, forwarders first.
   *
   * @throws PartialStopFailure after all containers were attempted, if any failed.
   */
  async stop(planName: string, options: StopOptions = {}): Promise<StopReport> {
    const log = this.logger.withContext({ plan: planName, session: options.session });
    const view = await this.tracker.getPlan(planName);
    if (!view) {
      log.info('nothing to stop');
      return { plan: planName, stopped: [] };
    }

    const targets =
      options.session === undefined
        ? view.containers
        : view.containers.filter((c) => belongsToSession(c, options.session));

    const timeoutSeconds = options.force ? 0 : this.stopTimeoutSeconds;
    const started = Date.now();
    const result = await teardownContainers(this.engine, teardownOrder(targets), { timeoutSeconds, logger: log });

    if (result.failures.length > 0) {
      throw new PartialStopFailure(planName, result.stopped, result.failures);
    }

    log.info('plan stopped', { count: result.stopped.length, duration_ms: Date.now() - started });
    return { plan: planName, stopped: result.stopped };
  }

  // -----------------------------------------------------------------------
  // status / check
  // -----------------------------------------------------------------------

  /**
   * Running plans, plus one warning per orphaned forwarder and per managed
   * container whose labels dwn cannot place.
   */
  async status(): Promise<StatusReport> {
    const { plans, unrecognized } = await this.tracker.scan();
    const warnings = plans.flatMap((view) =>
      view.orphans.map((orphan) => {
        const target = orphan.role.kind === 'port-forward' ? orphan.role.targetSession : orphan.session;
        this.logger.warn('orphaned port forwarder', { plan: view.planName, container: orphan.name });
        return new DwnError({
          code: ErrorCode.ORPHANED_BINDING,
          message: `Forwarder ${orphan.name} of plan "${view.planName}" has no running primary (session ${target})`,
          plan: view.planName,
          container: { id: orphan.id, name: orphan.name },
        });
      }),
    );
    for (const raw of unrecognized) {
      this.logger.warn('managed container with incomplete labels', { container: raw.name });
      warnings.push(
        new DwnError({
          code: ErrorCode.UNRECOGNIZED_CONTAINER,
          message: `Container ${raw.name} is labeled as managed by dwn but its labels are incomplete; remove it with "docker rm -f ${raw.name}"`,
          container: { id: raw.id, name: raw.name },
        }),
      );
    }
    return { plans, warnings };
  }

  /** Preflight: engine, network, forwarder image and plan counts. */
  async check(plans: PlanCounts): Promise<PreflightReport> {
    const available = await this.engine.isAvailable();
    if (!available) {
      return {
        engine: { available: false },
        network: { name: this.networkName, present: false },
        forwarderImage: { ref: this.forwarderImage, present: false },
        plans,
        ok: false,
      };
    }

    const version = await this.engine.version();
    const networkPresent = await this.engine.networkExists(this.networkName);
    const imagePresent = await this.engine.imageExists(this.forwarderImage);

    return {
      engine: { available: true, version },
      network: { name: this.networkName, present: networkPresent },
      forwarderImage: { ref: this.forwarderImage, present: imagePresent },
      plans,
      ok: networkPresent && imagePresent,
    };
  }

  /**
   * Create the dwn network unless it exists. Returns true when it was created.
   */
  async ensureNetwork(): Promise<boolean> {
    if (await this.engine.networkExists(this.networkName)) {
      return false;
    }
    try {
      await this.engine.createNetwork(this.networkName);
    } catch (err) {
      // A concurrent run may have created it first.
      if (await this.engine.networkExists(this.networkName)) return false;
      throw err;
    }
    this.logger.info('network created', { network: this.networkName });
    return true;
  }

  // -----------------------------------------------------------------------
  // Internals
  // -----------------------------------------------------------------------

  private primarySpec(plan: Plan, session: SessionToken): ContainerSpec {
    return {
      name: this.namer.nameFor(plan.name, session, PRIMARY),
      image: plan.image,
      command: plan.command,
      env: plan.environment,
      labels: this.namer.labelsFor(plan.name, session, PRIMARY),
      mounts: plan.mounts.map((m) => ({
        hostPath: m.hostPath,
        containerPath: m.containerPath,
        readOnly: m.mode === 'ro',
      })),
      ports: plan.staticPorts.map((p) =>
        p.hostPort === 'auto'
          ? { containerPort: p.containerPort, protocol: p.protocol }
          : { containerPort: p.containerPort, protocol: p.protocol, hostPort: p.hostPort },
      ),
      network: this.networkName,
      tty: plan.tty,
      extraOptions: plan.extraOptions,
    };
  }

  /** Remove a container that never reached a usable state. */
  /** Build a plan's inline Dockerfile unless its image is already present. */
  private async ensurePlanImage(plan: Plan, log: Logger): Promise<void> {
    if (plan.dockerfile === undefined) return;
    if (await this.engine.imageExists(plan.image)) return;

    log.info('image not found, building it from the inline dockerfile', { image: plan.image });
    const started = Date.now();
    await this.engine.buildImage({ tag: plan.image, dockerfile: plan.dockerfile, pull: true });
    log.info('image built', { image: plan.image, duration_ms: Date.now() - started });
  }

  private async discard(ref: ContainerRef, log: Logger): Promise<void> {
    try {
      await this.engine.remove(ref.id);
    } catch (err) {
      log.warn('failed to remove container after failed start', { container: ref.name, error: err });
    }
  }

  private async cleanupSession(planName: string, session: SessionToken): Promise<void> {
    const view = await this.tracker.getPlan(planName);
    if (!view) return;

    const targets = view.containers.filter((c) => belongsToSession(c, session));
    const result = await teardownContainers(this.engine, teardownOrder(targets), {
      timeoutSeconds: this.stopTimeoutSeconds,
      logger: this.logger.withContext({ plan: planName, session }),
    });
    if (result.failures.length > 0) {
      throw new PartialStopFailure(planName, result.stopped, result.failures);
    }
  }
}

function belongsToSession(container: ContainerSummary, session: SessionToken | undefined): boolean {
  if (container.session === session) return true;
  return container.role.kind === 'port-forward' && container.role.targetSession === session;
}
