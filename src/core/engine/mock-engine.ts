/**
 * In-memory container engine for testing.
 *
 * Implements {@link EngineClient} with in-memory state so the tracker,
 * orchestrator and binder can be exercised without a real engine. It keeps
 * the two guarantees dwn relies on the engine for:
 *
 * - container names are unique (NAME_CONFLICT at create time),
 * - a host port is bound by at most one running container (PORT_CONFLICT
 *   at start time).
 *
 * It also emulates the forwarder image: {@link MockEngine.connect} follows a
 * host port through a forwarding container (`REMOTE_HOST`/`REMOTE_PORT`
 * env) to the container that finally receives the traffic.
 *
 * Failure simulation covers an unreachable engine and one-shot failures of
 * individual engine calls.
 */

import type {
  ContainerDescriptor,
  ContainerInspection,
  ContainerSpec,
  ContainerStatus,
  EngineClient,
  ImageBuildOptions,
  LabelFilter,
  LogStreamOptions,
  PublishedPort,
} from './engine-client.js';
import { DwnError } from '../dwn-error.js';
import { ErrorCode, type EngineOperation, type ErrorCodeValue } from '../../types/errors.js';
import type { Protocol } from '../../types/plan.js';

// ---------------------------------------------------------------------------
// Internal records
// ---------------------------------------------------------------------------

interface MockContainer {
  id: string;
  name: string;
  spec: ContainerSpec;
  status: ContainerStatus;
  exitCode?: number;
  createdAt: string;
  published: PublishedPort[];
  networkAddresses: Record<string, string>;
}

/** Scripted behavior for containers created from an image. */
export interface ImageBehavior {
  /** Lines the container prints before exiting. */
  logs: string[];
  /** Exit code once the logs have been read. */
  exitCode: number;
}

/** Where a host-port connection ends up. */
export interface ConnectionTarget {
  containerId: string;
  containerName: string;
  containerPort: number;
}

type SimulatedOperation = 'create' | 'start' | 'stop' | 'remove';

interface SimulatedFailure {
  code: ErrorCodeValue;
  message: string;
}

const FIRST_AUTO_PORT = 49153;
const EPOCH = Date.UTC(2026, 0, 1);

// ---------------------------------------------------------------------------
// MockEngine
// ---------------------------------------------------------------------------

export class MockEngine implements EngineClient {
  readonly name = 'mock';

  private readonly containers = new Map<string, MockContainer>();
  private readonly networks = new Map<string, { index: number; nextHost: number }>();
  private readonly images = new Set<string>();
  private readonly behaviors = new Map<string, ImageBehavior>();
  private readonly failures = new Map<string, SimulatedFailure>();
  private readonly stopWaiters = new Map<string, Array<() => void>>();

  /** Every stop() call, in order, for assertions. */
  readonly stopCalls: Array<{ containerId: string; timeoutSeconds?: number }> = [];

  /** Every buildImage() call, in order. */
  readonly buildCalls: ImageBuildOptions[] = [];

  private idCounter = 0;
  private nextAutoPort = FIRST_AUTO_PORT;
  private reachable = true;

  // -----------------------------------------------------------------------
  // Availability
  // -----------------------------------------------------------------------

  async isAvailable(): Promise<boolean> {
    return this.reachable;
  }

  async version(): Promise<string> {
    this.assertReachable('info');
    return 'Mock 1.0.0';
  }

  // -----------------------------------------------------------------------
  // Containers
  // -----------------------------------------------------------------------

  async createContainer(spec: ContainerSpec): Promise<string> {
    this.assertReachable('create');
    this.consumeFailure('create', spec.name);

    for (const existing of this.containers.values()) {
      if (existing.name === spec.name) {
        throw new DwnError({
          code: ErrorCode.NAME_CONFLICT,
          message: `The container name "/${spec.name}" is already in use by container "${existing.id}"`,
          operation: 'create',
          container: spec.name,
        });
      }
    }

    if (spec.network !== undefined && !this.networks.has(spec.network)) {
      throw new DwnError({
        code: ErrorCode.ENGINE_ERROR,
        message: `network ${spec.network} not found`,
        operation: 'create',
        container: spec.name,
      });
    }

    this.idCounter += 1;
    const id = `mock-${this.idCounter}`;
    this.containers.set(id, {
      id,
      name: spec.name,
      spec,
      status: 'created',
      createdAt: new Date(EPOCH + this.idCounter * 1000).toISOString(),
      published: [],
      networkAddresses: {},
    });
    return id;
  }

  async start(containerId: string): Promise<void> {
    this.assertReachable('start');
    const container = this.require(containerId, 'start');
    this.consumeFailure('start', container.id, container.name);
    if (container.status === 'running') return;

    const published: PublishedPort[] = [];
    for (const port of container.spec.ports) {
      if (port.hostPort !== undefined) {
        const holder = this.holderOf(port.hostPort, port.protocol);
        if (holder) {
          throw new DwnError({
            code: ErrorCode.PORT_CONFLICT,
            message: `Bind for 0.0.0.0:${port.hostPort} failed: port is already allocated`,
            operation: 'start',
            container: container.name,
          });
        }
        published.push({ containerPort: port.containerPort, protocol: port.protocol, hostPort: port.hostPort });
      } else {
        published.push({
          containerPort: port.containerPort,
          protocol: port.protocol,
          hostPort: this.allocateAutoPort(),
        });
      }
    }

    container.published = published;
    if (container.spec.network !== undefined) {
      container.networkAddresses = {
        [container.spec.network]: this.allocateAddress(container.spec.network),
      };
    }
    container.status = 'running';
    container.exitCode = undefined;
  }

  async stop(containerId: string, timeoutSeconds?: number): Promise<void> {
    this.assertReachable('stop');
    const container = this.require(containerId, 'stop');
    this.consumeFailure('stop', container.id, container.name);
    this.stopCalls.push({ containerId: container.id, timeoutSeconds });

    if (container.status === 'running') {
      this.exit(container, timeoutSeconds === 0 ? 137 : 0);
    }
  }

  async remove(containerId: string): Promise<void> {
    this.assertReachable('remove');
    const container = this.require(containerId, 'remove');
    this.consumeFailure('remove', container.id, container.name);

    if (container.status === 'running') {
      throw new DwnError({
        code: ErrorCode.ENGINE_ERROR,
        message: `You cannot remove a running container ${container.id}. Stop the container before attempting removal`,
        operation: 'remove',
        container: container.name,
      });
    }
    this.containers.delete(container.id);
  }

  async listByLabels(filter: LabelFilter): Promise<ContainerDescriptor[]> {
    this.assertReachable('list');
    const entries = Object.entries(filter);

    return [...this.containers.values()]
      .filter((c) => entries.every(([key, value]) => c.spec.labels[key] === value))
      .map((c) => ({
        id: c.id,
        name: c.name,
        image: c.spec.image,
        labels: { ...c.spec.labels },
        status: c.status,
        createdAt: c.createdAt,
        ports: c.published.map((p) => ({ ...p })),
        mounts: c.spec.mounts.map((m) => ({ hostPath: m.hostPath, containerPath: m.containerPath })),
      }));
  }

  async inspect(containerId: string): Promise<ContainerInspection> {
    this.assertReachable('inspect');
    const container = this.require(containerId, 'inspect');
    return {
      id: container.id,
      name: container.name,
      status: container.status,
      exitCode: container.exitCode,
      networkAddresses: { ...container.networkAddresses },
      publishedPorts: container.published.map((p) => ({ ...p })),
    };
  }

  async *streamLogs(containerId: string, options?: LogStreamOptions): AsyncIterable<string> {
    this.assertReachable('logs');
    const container = this.require(containerId, 'logs');
    const signal = options?.signal;
    const behavior = this.behaviors.get(container.spec.image);

    if (behavior) {
      for (const line of behavior.logs) {
        if (signal?.aborted) return;
        yield line;
      }
      if (container.status === 'running') {
        this.exit(container, behavior.exitCode);
      }
      return;
    }

    // A long-running container: follow until it stops or the caller detaches.
    if (container.status !== 'running' || signal?.aborted) return;
    await new Promise<void>((resolve) => {
      const done = () => {
        signal?.removeEventListener('abort', done);
        const waiters = this.stopWaiters.get(container.id);
        if (waiters) {
          const remaining = waiters.filter((w) => w !== done);
          if (remaining.length > 0) this.stopWaiters.set(container.id, remaining);
          else this.stopWaiters.delete(container.id);
        }
        resolve();
      };
      const waiters = this.stopWaiters.get(container.id) ?? [];
      waiters.push(done);
      this.stopWaiters.set(container.id, waiters);
      signal?.addEventListener('abort', done, { once: true });
    });
  }

  // -----------------------------------------------------------------------
  // Networks and images
  // -----------------------------------------------------------------------

  async networkExists(name: string): Promise<boolean> {
    this.assertReachable('network');
    return this.networks.has(name);
  }

  async createNetwork(name: string): Promise<void> {
    this.assertReachable('network');
    if (this.networks.has(name)) {
      throw new DwnError({
        code: ErrorCode.ENGINE_ERROR,
        message: `network with name ${name} already exists`,
        operation: 'network',
      });
    }
    this.networks.set(name, { index: this.networks.size, nextHost: 2 });
  }

  async imageExists(ref: string): Promise<boolean> {
    this.assertReachable('image');
    return this.images.has(ref);
  }

  async buildImage(options: ImageBuildOptions): Promise<void> {
    this.assertReachable('image');
    this.buildCalls.push(options);
    this.images.add(options.tag);
  }

  // -----------------------------------------------------------------------
  // Emulated traffic
  // -----------------------------------------------------------------------

  /**
   * Follow a connection to a host port. Returns null when nothing is bound
   * (connection refused) or a forwarder's target is gone.
   */
  connect(hostPort: number, protocol: Protocol = 'tcp'): ConnectionTarget | null {
    const holder = this.holderOf(hostPort, protocol);
    if (!holder) return null;

    const remoteHost = holder.spec.env['REMOTE_HOST'];
    const remotePort = holder.spec.env['REMOTE_PORT'];
    if (remoteHost === undefined || remotePort === undefined) {
      const port = holder.published.find((p) => p.hostPort === hostPort && p.protocol === protocol);
      return port
        ? { containerId: holder.id, containerName: holder.name, containerPort: port.containerPort }
        : null;
    }

    for (const target of this.containers.values()) {
      if (target.status !== 'running') continue;
      if (Object.values(target.networkAddresses).includes(remoteHost)) {
        return { containerId: target.id, containerName: target.name, containerPort: Number(remotePort) };
      }
    }
    return null;
  }

  // -----------------------------------------------------------------------
  // Failure simulation
  // -----------------------------------------------------------------------

  /** Make every engine call fail with ENGINE_UNREACHABLE until reset. */
  setReachable(value: boolean): void {
    this.reachable = value;
  }

  /**
   * Make the next `operation` on the given container (ID or name) fail.
   */
  simulateFailure(
    operation: SimulatedOperation,
    container: string,
    code: ErrorCodeValue = ErrorCode.ENGINE_ERROR,
    message = `simulated ${operation} failure`,
  ): void {
    this.failures.set(`${operation}:${container}`, { code, message });
  }

  /** Containers created from `image` print `logs` and exit when streamed. */
  setImageBehavior(image: string, behavior: ImageBehavior): void {
    this.behaviors.set(image, behavior);
  }

  /** Simulate a container exiting on its own (crash or completion). */
  simulateExit(containerId: string, exitCode = 1): void {
    const container = this.containers.get(containerId);
    if (container && container.status === 'running') {
      this.exit(container, exitCode);
    }
  }

  /** Simulate a container disappearing behind dwn's back. */
  simulateRemoval(containerId: string): void {
    this.containers.delete(containerId);
  }

  // -----------------------------------------------------------------------
  // Inspection helpers (test-only)
  // -----------------------------------------------------------------------

  /** Snapshot of every container the engine holds. */
  listAll(): Array<{ id: string; name: string; status: ContainerStatus; spec: ContainerSpec }> {
    return [...this.containers.values()].map((c) => ({
      id: c.id,
      name: c.name,
      status: c.status,
      spec: c.spec,
    }));
  }

  findByName(name: string): { id: string; status: ContainerStatus; spec: ContainerSpec } | undefined {
    const found = [...this.containers.values()].find((c) => c.name === name);
    return found ? { id: found.id, status: found.status, spec: found.spec } : undefined;
  }

  /** Clear all internal state. */
  reset(): void {
    this.containers.clear();
    this.networks.clear();
    this.images.clear();
    this.behaviors.clear();
    this.failures.clear();
    this.stopWaiters.clear();
    this.stopCalls.length = 0;
    this.buildCalls.length = 0;
    this.idCounter = 0;
    this.nextAutoPort = FIRST_AUTO_PORT;
    this.reachable = true;
  }

  // -----------------------------------------------------------------------
  // Internals
  // -----------------------------------------------------------------------

  private assertReachable(operation: EngineOperation): void {
    if (!this.reachable) {
      throw new DwnError({
        code: ErrorCode.ENGINE_UNREACHABLE,
        message: 'Cannot connect to the mock engine',
        operation,
      });
    }
  }

  private require(containerId: string, operation: EngineOperation): MockContainer {
    const container = this.containers.get(containerId);
    if (!container) {
      throw new DwnError({
        code: ErrorCode.CONTAINER_NOT_FOUND,
        message: `No such container: ${containerId}`,
        operation,
        container: containerId,
      });
    }
    return container;
  }

  private consumeFailure(operation: SimulatedOperation, ...keys: string[]): void {
    for (const key of keys) {
      const mapKey = `${operation}:${key}`;
      const failure = this.failures.get(mapKey);
      if (failure) {
        this.failures.delete(mapKey);
        throw new DwnError({
          code: failure.code,
          message: failure.message,
          operation,
          container: key,
        });
      }
    }
  }

  private holderOf(hostPort: number, protocol: Protocol): MockContainer | undefined {
    return [...this.containers.values()].find(
      (c) =>
        c.status === 'running' &&
        c.published.some((p) => p.hostPort === hostPort && p.protocol === protocol),
    );
  }

  private allocateAutoPort(): number {
    let port = this.nextAutoPort;
    while (this.holderOf(port, 'tcp') || this.holderOf(port, 'udp')) {
      port += 1;
    }
    this.nextAutoPort = port + 1;
    return port;
  }

  private allocateAddress(network: string): string {
    const entry = this.networks.get(network);
    if (!entry) {
      throw new DwnError({
        code: ErrorCode.ENGINE_ERROR,
        message: `network ${network} not found`,
        operation: 'start',
      });
    }
    const address = `172.${20 + entry.index}.0.${entry.nextHost}`;
    entry.nextHost += 1;
    return address;
  }

  private exit(container: MockContainer, exitCode: number): void {
    container.status = 'exited';
    container.exitCode = exitCode;
    container.published = [];
    container.networkAddresses = {};

    const waiters = this.stopWaiters.get(container.id) ?? [];
    this.stopWaiters.delete(container.id);
    for (const resolve of waiters) resolve();
  }
}
