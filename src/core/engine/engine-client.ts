/**
 * Container engine interface and supporting types for dwn.
 *
 * Every other component talks to the engine through {@link EngineClient},
 * which keeps the core testable against the in-memory
 * {@link MockEngine} and lets the Docker CLI adapter stay the only place
 * that knows engine flags and output formats.
 *
 * The engine is dwn's only store: container labels carry plan identity,
 * session tokens and roles, so `listByLabels` is the query that every
 * read-side operation starts from.
 */

import { execFile as execFileCb, spawn } from 'node:child_process';
import { promisify } from 'node:util';
import type { ExtraOptions, Protocol } from '../../types/plan.js';

const execFileAsync = promisify(execFileCb);

// ---------------------------------------------------------------------------
// Container spec
// ---------------------------------------------------------------------------

/** A bind mount into a container. */
export interface MountSpec {
  hostPath: string;
  containerPath: string;
  readOnly: boolean;
}

/**
 * A port published on the host. `hostPort` undefined asks the engine to
 * pick a free host port.
 */
export interface PortSpec {
  containerPort: number;
  protocol: Protocol;
  hostPort?: number;
}

/** Everything needed to create one container. */
export interface ContainerSpec {
  name: string;
  image: string;
  /** Command override as argv words; empty keeps the image default. */
  command: readonly string[];
  env: Readonly<Record<string, string>>;
  labels: Readonly<Record<string, string>>;
  mounts: readonly MountSpec[];
  ports: readonly PortSpec[];
  /** Engine network to attach the container to. */
  network?: string;
  tty: boolean;
  /** Opaque engine-specific options, forwarded verbatim. */
  extraOptions: ExtraOptions;
}

// ---------------------------------------------------------------------------
// Observed state
// ---------------------------------------------------------------------------

export type ContainerStatus =
  | 'created'
  | 'running'
  | 'paused'
  | 'restarting'
  | 'removing'
  | 'exited'
  | 'dead';

/** A port the engine has actually bound on the host. */
export interface PublishedPort {
  containerPort: number;
  protocol: Protocol;
  hostPort: number;
  hostAddress?: string;
}

/** A mount as the engine reports it. */
export interface ObservedMount {
  hostPath: string;
  containerPath: string;
}

/** One row of a label query. */
export interface ContainerDescriptor {
  id: string;
  name: string;
  image: string;
  labels: Readonly<Record<string, string>>;
  status: ContainerStatus;
  /** ISO 8601 creation timestamp. */
  createdAt: string;
  ports: readonly PublishedPort[];
  mounts: readonly ObservedMount[];
}

/** Result of {@link EngineClient.inspect}. */
export interface ContainerInspection {
  id: string;
  name: string;
  status: ContainerStatus;
  /** Only meaningful once the container has exited. */
  exitCode?: number;
  /** Internal address per attached network name. */
  networkAddresses: Readonly<Record<string, string>>;
  publishedPorts: readonly PublishedPort[];
}

/** Label filter: every key must be present with the given value. */
export type LabelFilter = Readonly<Record<string, string>>;

/** Options for {@link EngineClient.streamLogs}. */
export interface LogStreamOptions {
  /** Aborting ends the iteration; the container keeps running. */
  signal?: AbortSignal;
}

/** Where a build reads its Dockerfile from. */
export type ImageBuildSource =
  /** A directory holding the Dockerfile and everything it copies. */
  | { contextDir: string }
  /** Dockerfile text, built with an otherwise empty context. */
  | { dockerfile: string };

/** Options for {@link EngineClient.buildImage}. */
export type ImageBuildOptions = ImageBuildSource & {
  tag: string;
  /** Pull newer versions of the base images first. */
  pull?: boolean;
};

// ---------------------------------------------------------------------------
// EngineClient
// ---------------------------------------------------------------------------

/**
 * Abstraction over the container engine.
 *
 * Every method is a remote engine call. Failures are thrown as DwnError
 * with the engine operation and container identity attached; nothing is
 * retried here, since only callers know whether an operation is safe to
 * repeat.
 */
export interface EngineClient {
  /** Short engine name for logs (e.g. `docker`). */
  readonly name: string;

  // -- Availability ---------------------------------------------------------

  /** Whether the engine answers at all. Never throws. */
  isAvailable(): Promise<boolean>;

  /** Engine server version string (e.g. `Docker 27.5.1`). */
  version(): Promise<string>;

  // -- Containers -----------------------------------------------------------

  /** Create (but do not start) a container. Returns the engine ID. */
  createContainer(spec: ContainerSpec): Promise<string>;

  /** Start a created container. Host ports are bound here. */
  start(containerId: string): Promise<void>;

  /**
   * Stop a container.
   * @param timeoutSeconds - Grace period before the engine kills it.
   */
  stop(containerId: string, timeoutSeconds?: number): Promise<void>;

  /** Remove a stopped container. */
  remove(containerId: string): Promise<void>;

  /** All containers (running or not) whose labels match every filter entry. */
  listByLabels(filter: LabelFilter): Promise<ContainerDescriptor[]>;

  inspect(containerId: string): Promise<ContainerInspection>;

  /**
   * Stream a container's output line by line, following until it exits.
   * Call again to restart from the beginning of the log.
   */
  streamLogs(containerId: string, options?: LogStreamOptions): AsyncIterable<string>;

  // -- Networks and images --------------------------------------------------

  networkExists(name: string): Promise<boolean>;

  createNetwork(name: string): Promise<void>;

  imageExists(ref: string): Promise<boolean>;

  buildImage(options: ImageBuildOptions): Promise<void>;
}

// ---------------------------------------------------------------------------
// Shared exec / spawn types
// ---------------------------------------------------------------------------

/**
 * Injectable exec function for shelling out to the engine CLI.
 * Returns stdout/stderr as strings; rejects when the command fails.
 */
export type ExecFn = (
  file: string,
  args: readonly string[],
) => Promise<{ stdout: string; stderr: string }>;

/** A spawned child process, reduced to what log streaming needs. */
export interface SpawnedProcess {
  stdout: NodeJS.ReadableStream;
  stderr: NodeJS.ReadableStream;
  kill(): void;
  /** Resolves with the exit code once the process has exited. */
  exited: Promise<number | null>;
}

/** Spawn function type for long-running engine commands (`logs -f`). */
export type SpawnFn = (file: string, args: readonly string[]) => SpawnedProcess;

// ---------------------------------------------------------------------------
// Default exec / spawn implementations
// ---------------------------------------------------------------------------

/** Default exec implementation: wraps child_process.execFile. */
export const defaultExec: ExecFn = async (file, args) => {
  return execFileAsync(file, [...args], { encoding: 'utf-8', maxBuffer: 16 * 1024 * 1024 });
};

/** Default spawn implementation: wraps child_process.spawn with piped output. */
export const defaultSpawn: SpawnFn = (file, args) => {
  const child = spawn(file, [...args], { stdio: ['ignore', 'pipe', 'pipe'] });
  const exited = new Promise<number | null>((resolve, reject) => {
    child.once('error', reject);
    child.once('close', (code) => resolve(code));
  });
  return {
    stdout: child.stdout,
    stderr: child.stderr,
    kill: () => {
      child.kill();
    },
    exited,
  };
};
