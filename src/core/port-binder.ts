/**
 * Dynamic port binder for dwn.
 *
 * The engine fixes a container's published ports at creation time, so a new
 * host port for a running Primary is emulated with a forwarding container:
 * it joins the dwn network, publishes the host port itself and relays
 * traffic to `<primary address>:<container port>`.
 *
 * Each forwarder gets its own session token, so a binding can be removed
 * without touching the Primary or other bindings. The engine's host-port
 * exclusivity is the only lock; concurrent requests for the same host port
 * resolve to one winner and a PORT_CONFLICT for the rest.
 */

import type { ContainerSpec, EngineClient } from './engine/engine-client.js';
import { DwnError, PartialStopFailure, hasErrorCode, type ContainerRef, type StopFailure } from './dwn-error.js';
import {
  mintSessionToken,
  portForwardRole,
  type InstanceNamer,
  type SessionToken,
} from './instance-namer.js';
import { createLogger, type Logger } from './logger.js';
import {
  RunningPlanTracker,
  primaryFor,
  summarizeContainer,
  type ContainerSummary,
} from './running-plan-tracker.js';
import { teardownContainers } from './teardown.js';
import { ErrorCode } from '../types/errors.js';
import type { Protocol } from '../types/plan.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface PortBinderOptions {
  engine: EngineClient;
  namer: InstanceNamer;
  tracker?: RunningPlanTracker;
  networkName: string;
  forwarderImage: string;
  /**
   * Build context of the forwarder image. When set, a missing image is built
   * from it on first use; otherwise addBinding fails until it is built.
   */
  forwarderContextDir?: string;
  stopTimeoutSeconds?: number;
  logger?: Logger;
}

/** A forwarding container, as created by {@link DynamicPortBinder.addBinding}. */
export interface PortForwardDescriptor {
  planName: string;
  containerId: string;
  containerName: string;
  /** The binding's own session token. */
  session: SessionToken;
  /** Session of the Primary receiving the traffic. */
  targetSession: SessionToken;
  hostPort: number;
  containerPort: number;
  protocol: Protocol;
  /** Primary's address on the dwn network. */
  remoteHost: string;
}

/** One forwarder of a plan, as reported by {@link DynamicPortBinder.listBindings}. */
export interface BindingSummary {
  containerId: string;
  containerName: string;
  hostPort: number;
  containerPort: number;
  protocol: Protocol;
  targetSession: SessionToken;
  orphaned: boolean;
}

export interface AddBindingOptions {
  /** Primary session to relay to; defaults to the newest running Primary. */
  session?: SessionToken;
}

const DEFAULT_STOP_TIMEOUT_SECONDS = 10;

// ---------------------------------------------------------------------------
// DynamicPortBinder
// ---------------------------------------------------------------------------

export class DynamicPortBinder {
  private readonly engine: EngineClient;
  private readonly namer: InstanceNamer;
  private readonly tracker: RunningPlanTracker;
  private readonly networkName: string;
  private readonly forwarderImage: string;
  private readonly forwarderContextDir: string | undefined;
  private readonly stopTimeoutSeconds: number;
  private readonly logger: Logger;

  constructor(options: PortBinderOptions) {
    this.engine = options.engine;
    this.namer = options.namer;
    this.logger = options.logger ?? createLogger('port-binder');
    this.tracker =
      options.tracker ??
      new RunningPlanTracker({ engine: options.engine, namer: options.namer, logger: this.logger.child('tracker') });
    this.networkName = options.networkName;
    this.forwarderImage = options.forwarderImage;
    this.forwarderContextDir = options.forwarderContextDir;
    this.stopTimeoutSeconds = options.stopTimeoutSeconds ?? DEFAULT_STOP_TIMEOUT_SECONDS;
  }

  /**
   * Publish `hostPort` for the running Primary's `containerPort`.
   *
   * @throws DwnError PLAN_NOT_RUNNING when there is no running Primary.
   * @throws DwnError PORT_CONFLICT when the container port is already
   *   published statically or the engine rejects the host-port bind.
   */
  async addBinding(
    planName: string,
    containerPort: number,
    protocol: Protocol,
    hostPort: number,
    options: AddBindingOptions = {},
  ): Promise<PortForwardDescriptor> {
    const view = await this.tracker.getPlan(planName);
    const primary = view ? primaryFor(view, options.session) : null;
    if (!view || !primary) {
      const scope = options.session ? ` in session ${options.session}` : '';
      throw new DwnError({
        code: ErrorCode.PLAN_NOT_RUNNING,
        message: `Plan "${planName}" is not running${scope}`,
        plan: planName,
      });
    }

    const published = view.ports.find(
      (p) =>
        p.containerId === primary.id &&
        p.containerPort === containerPort &&
        p.protocol === protocol,
    );
    if (published) {
      throw new DwnError({
        code: ErrorCode.PORT_CONFLICT,
        message: `Container port ${containerPort}/${protocol} of plan "${planName}" is already published on host port ${published.hostPort}`,
        plan: planName,
        container: { id: primary.id, name: primary.name },
      });
    }

    await this.ensureForwarderImage(planName);

    const inspection = await this.engine.inspect(primary.id);
    const remoteHost = inspection.networkAddresses[this.networkName];
    if (remoteHost === undefined) {
      throw new DwnError({
        code: ErrorCode.ENGINE_ERROR,
        message: `Container ${primary.name} is not attached to network "${this.networkName}"`,
        plan: planName,
        container: { id: primary.id, name: primary.name },
        operation: 'inspect',
      });
    }

    const session = mintSessionToken();
    const role = portForwardRole(containerPort, protocol, hostPort, primary.session);
    const log = this.logger.withContext({ plan: planName, session });
    const spec: ContainerSpec = {
      name: this.namer.nameFor(planName, session, role),
      image: this.forwarderImage,
      command: [],
      env: {
        LOCAL_PORT: String(hostPort),
        REMOTE_HOST: remoteHost,
        REMOTE_PORT: String(containerPort),
        PROTOCOL: protocol,
      },
      labels: this.namer.labelsFor(planName, session, role),
      mounts: [],
      ports: [{ containerPort: hostPort, protocol, hostPort }],
      network: this.networkName,
      tty: false,
      extraOptions: {},
    };

    const containerId = await this.engine.createContainer(spec);
    const ref: ContainerRef = { id: containerId, name: spec.name };

    try {
      await this.engine.start(containerId);
    } catch (err) {
      await this.discard(ref, log);
      if (hasErrorCode(err, ErrorCode.PORT_CONFLICT)) {
        throw new DwnError({
          code: ErrorCode.PORT_CONFLICT,
          message: `Host port ${hostPort}/${protocol} is already in use`,
          plan: planName,
          container: ref,
          operation: 'start',
          cause: err,
        });
      }
      throw err;
    }

    log.info('port forwarder started', {
      container: spec.name,
      hostPort,
      containerPort,
      protocol,
      remoteHost,
    });

    return {
      planName,
      containerId,
      containerName: spec.name,
      session,
      targetSession: primary.session,
      hostPort,
      containerPort,
      protocol,
      remoteHost,
    };
  }

  /**
   * Remove the forwarder(s) publishing `hostPort` for a plan.
   *
   * @returns false when no such binding exists.
   */
  async removeBinding(planName: string, hostPort: number): Promise<boolean> {
    const descriptors = await this.engine.listByLabels(this.namer.bindingFilter(planName, hostPort));
    const forwarders: ContainerSummary[] = [];
    for (const raw of descriptors) {
      const summary = summarizeContainer(this.namer, raw);
      if (summary?.role.kind === 'port-forward') forwarders.push(summary);
    }

    const log = this.logger.withContext({ plan: planName });
    if (forwarders.length === 0) {
      log.info('no binding to remove', { hostPort });
      return false;
    }

    const result = await teardownContainers(this.engine, forwarders, {
      timeoutSeconds: this.stopTimeoutSeconds,
      logger: log,
    });
    if (result.failures.length > 0) {
      throw new PartialStopFailure(planName, result.stopped, result.failures);
    }

    log.info('port forwarder removed', { hostPort, count: result.stopped.length });
    return true;
  }

  /** Every forwarder of a plan, running or not. */
  async listBindings(planName: string): Promise<BindingSummary[]> {
    const view = await this.tracker.getPlan(planName);
    if (!view) return [];

    const bindings: BindingSummary[] = [];
    for (const c of view.containers) {
      if (c.role.kind !== 'port-forward') continue;
      bindings.push({
        containerId: c.id,
        containerName: c.name,
        hostPort: c.role.hostPort,
        containerPort: c.role.containerPort,
        protocol: c.role.protocol,
        targetSession: c.role.targetSession,
        orphaned: view.orphans.some((o) => o.id === c.id),
      });
    }
    return bindings.sort((a, b) => a.hostPort - b.hostPort);
  }

  /**
   * Remove orphaned forwarders across all plans.
   *
   * @returns the number of forwarders removed.
   */
  async pruneOrphans(): Promise<number> {
    const orphans = await this.tracker.findOrphans();
    if (orphans.length === 0) return 0;

    const stopped: ContainerRef[] = [];
    const failures: StopFailure[] = [];
    const failedPlans = new Set<string>();

    for (const orphan of orphans) {
      const result = await teardownContainers(this.engine, [orphan], {
        timeoutSeconds: this.stopTimeoutSeconds,
        logger: this.logger.withContext({ plan: orphan.planName }),
      });
      stopped.push(...result.stopped);
      failures.push(...result.failures);
      if (result.failures.length > 0) failedPlans.add(orphan.planName);
    }

    if (failures.length > 0) {
      throw new PartialStopFailure([...failedPlans].join(', '), stopped, failures);
    }

    this.logger.info('orphaned forwarders pruned', { count: stopped.length });
    return stopped.length;
  }

  /** Remove a forwarder that never reached Running. */
  private async ensureForwarderImage(planName: string): Promise<void> {
    if (await this.engine.imageExists(this.forwarderImage)) return;

    if (this.forwarderContextDir === undefined) {
      throw new DwnError({
        code: ErrorCode.ENGINE_ERROR,
        message: `Forwarder image "${this.forwarderImage}" not found. Build it with "dwn network build-container"`,
        plan: planName,
        operation: 'image',
      });
    }

    this.logger.info('forwarder image not found, building it', { plan: planName, image: this.forwarderImage });
    await this.engine.buildImage({ tag: this.forwarderImage, contextDir: this.forwarderContextDir, pull: true });
  }

  private async discard(ref: ContainerRef, log: Logger): Promise<void> {
    try {
      await this.engine.remove(ref.id);
    } catch (err) {
      log.warn('failed to remove forwarder after failed start', { container: ref.name, error: err });
    }
  }
}
