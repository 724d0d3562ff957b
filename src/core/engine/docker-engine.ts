/**
 * Docker engine adapter.
 *
 * Reference implementation of {@link EngineClient} using the Docker CLI via
 * `child_process.execFile`. No Docker SDK dependency: it shells out to
 * the `docker` binary and reads its JSON output.
 *
 * CLI failures are translated into DwnError codes from the CLI's stderr:
 * - daemon unreachable / binary missing → ENGINE_UNREACHABLE
 * - "port is already allocated"         → PORT_CONFLICT
 * - container name already in use       → NAME_CONFLICT
 * - "No such container"                 → CONTAINER_NOT_FOUND
 * - anything else                       → ENGINE_ERROR
 */

import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { PassThrough } from 'node:stream';
import { createInterface } from 'node:readline';
import type {
  ContainerDescriptor,
  ContainerInspection,
  ContainerSpec,
  ContainerStatus,
  EngineClient,
  ExecFn,
  ImageBuildOptions,
  LabelFilter,
  LogStreamOptions,
  ObservedMount,
  PublishedPort,
  SpawnFn,
} from './engine-client.js';
import { defaultExec, defaultSpawn } from './engine-client.js';
import { DwnError, isDwnError } from '../dwn-error.js';
import { ErrorCode, type EngineOperation, type ErrorCodeValue } from '../../types/errors.js';
import type { ExtraOptions, Protocol } from '../../types/plan.js';
import { createLogger, type Logger } from '../logger.js';

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

export interface DockerEngineOptions {
  /** Injectable exec function for testing. Defaults to promisified execFile. */
  exec?: ExecFn;
  /** Injectable spawn function for log streaming. Defaults to child_process.spawn. */
  spawn?: SpawnFn;
  /** Path to the docker binary. Defaults to `'docker'`. */
  dockerPath?: string;
}

// ---------------------------------------------------------------------------
// Raw `docker inspect` shape (the fields dwn reads)
// ---------------------------------------------------------------------------

interface RawPortBinding {
  HostIp: string;
  HostPort: string;
}

interface RawInspect {
  Id: string;
  Name: string;
  Created: string;
  Config: {
    Image: string;
    Labels: Record<string, string> | null;
  };
  State: {
    Status: string;
    ExitCode: number;
  };
  NetworkSettings: {
    Ports: Record<string, RawPortBinding[] | null> | null;
    Networks: Record<string, { IPAddress: string }> | null;
  };
  Mounts: Array<{ Type: string; Source: string; Destination: string }> | null;
}

// ---------------------------------------------------------------------------
// Error translation
// ---------------------------------------------------------------------------

const ERROR_PATTERNS: ReadonlyArray<[RegExp, ErrorCodeValue]> = [
  [
    /Cannot connect to the Docker daemon|error during connect|Is the docker daemon running/i,
    ErrorCode.ENGINE_UNREACHABLE,
  ],
  [
    /port is already allocated|address already in use|ports are not available/i,
    ErrorCode.PORT_CONFLICT,
  ],
  [/is already in use by container|Conflict\. The container name/i, ErrorCode.NAME_CONFLICT],
  [/No such container|No such object/i, ErrorCode.CONTAINER_NOT_FOUND],
];

function stderrOf(err: unknown): string {
  if (typeof err === 'object' && err !== null && 'stderr' in err) {
    const stderr = err.stderr;
    if (typeof stderr === 'string' && stderr.length > 0) return stderr;
    if (Buffer.isBuffer(stderr)) return stderr.toString('utf-8');
  }
  return err instanceof Error ? err.message : String(err);
}

function stdoutOf(err: unknown): string {
  if (typeof err === 'object' && err !== null && 'stdout' in err) {
    const stdout = err.stdout;
    if (typeof stdout === 'string') return stdout;
    if (Buffer.isBuffer(stdout)) return stdout.toString('utf-8');
  }
  return '';
}

function isMissingBinary(err: unknown): boolean {
  return typeof err === 'object' && err !== null && 'code' in err && err.code === 'ENOENT';
}

/**
 * Translate a failed docker CLI call into a DwnError.
 *
 * @param container - Container ID or name the call targeted, if any.
 */
export function translateDockerError(
  err: unknown,
  operation: EngineOperation,
  container?: string,
): DwnError {
  if (isDwnError(err)) return err;

  if (isMissingBinary(err)) {
    return new DwnError({
      code: ErrorCode.ENGINE_UNREACHABLE,
      message: 'docker binary not found on PATH',
      operation,
      container,
      cause: err,
    });
  }

  const detail = stderrOf(err).trim();
  const code =
    ERROR_PATTERNS.find(([pattern]) => pattern.test(detail))?.[1] ?? ErrorCode.ENGINE_ERROR;
  const target = container !== undefined ? ` ${container}` : '';

  return new DwnError({
    code,
    message: `docker ${operation}${target} failed: ${detail}`,
    operation,
    container,
    cause: err,
  });
}

// ---------------------------------------------------------------------------
// State mapping
// ---------------------------------------------------------------------------

const KNOWN_STATUSES: readonly ContainerStatus[] = [
  'created',
  'running',
  'paused',
  'restarting',
  'removing',
  'exited',
  'dead',
];

function mapStatus(status: string): ContainerStatus {
  return KNOWN_STATUSES.find((known) => known === status) ?? 'dead';
}

function parsePortKey(key: string): { containerPort: number; protocol: Protocol } | null {
  const match = /^(\d+)\/(tcp|udp)$/.exec(key);
  if (!match) return null;
  return { containerPort: Number(match[1]), protocol: match[2] === 'udp' ? 'udp' : 'tcp' };
}

function mapPorts(raw: RawInspect['NetworkSettings']['Ports']): PublishedPort[] {
  const ports: PublishedPort[] = [];
  const seen = new Set<string>();

  for (const [key, bindings] of Object.entries(raw ?? {})) {
    const parsed = parsePortKey(key);
    if (!parsed || !bindings) continue;

    for (const binding of bindings) {
      const hostPort = Number(binding.HostPort);
      if (!Number.isInteger(hostPort) || hostPort <= 0) continue;

      // IPv4 and IPv6 wildcard binds show up as two rows for one port.
      const dedupeKey = `${hostPort}/${parsed.protocol}`;
      if (seen.has(dedupeKey)) continue;
      seen.add(dedupeKey);

      ports.push({
        ...parsed,
        hostPort,
        hostAddress: binding.HostIp.length > 0 ? binding.HostIp : undefined,
      });
    }
  }

  return ports.sort((a, b) => a.hostPort - b.hostPort);
}

function mapMounts(raw: RawInspect['Mounts']): ObservedMount[] {
  return (raw ?? [])
    .filter((m) => m.Type === 'bind')
    .map((m) => ({ hostPath: m.Source, containerPath: m.Destination }));
}

function mapNetworks(raw: RawInspect['NetworkSettings']['Networks']): Record<string, string> {
  const addresses: Record<string, string> = {};
  for (const [network, settings] of Object.entries(raw ?? {})) {
    if (settings.IPAddress.length > 0) {
      addresses[network] = settings.IPAddress;
    }
  }
  return addresses;
}

function stripSlash(name: string): string {
  return name.startsWith('/') ? name.slice(1) : name;
}

// ---------------------------------------------------------------------------
// Passthrough options
// ---------------------------------------------------------------------------

/**
 * Render plan passthrough options as CLI flags: `memory: 512m` becomes
 * `--memory 512m`, `privileged: true` becomes `--privileged`, arrays repeat
 * the flag, `false` drops it. Underscores in keys become dashes.
 */
export function extraOptionFlags(options: ExtraOptions): string[] {
  const args: string[] = [];
  for (const [key, value] of Object.entries(options)) {
    const flag = `--${key.replace(/_/g, '-')}`;
    if (value === true) {
      args.push(flag);
    } else if (value === false) {
      continue;
    } else if (Array.isArray(value)) {
      for (const item of value) {
        args.push(flag, item);
      }
    } else {
      args.push(flag, String(value));
    }
  }
  return args;
}

// ---------------------------------------------------------------------------
// DockerEngine
// ---------------------------------------------------------------------------

export class DockerEngine implements EngineClient {
  readonly name = 'docker' as const;

  private readonly exec: ExecFn;
  private readonly spawnFn: SpawnFn;
  private readonly dockerPath: string;
  private readonly logger: Logger;

  constructor(options?: DockerEngineOptions) {
    this.exec = options?.exec ?? defaultExec;
    this.spawnFn = options?.spawn ?? defaultSpawn;
    this.dockerPath = options?.dockerPath ?? 'docker';
    this.logger = createLogger('engine:docker');
  }

  // -----------------------------------------------------------------------
  // Availability
  // -----------------------------------------------------------------------

  async isAvailable(): Promise<boolean> {
    try {
      await this.exec(this.dockerPath, ['info', '--format', '{{.ServerVersion}}']);
      return true;
    } catch (err) {
      this.logger.debug('docker info failed', { error: err });
      return false;
    }
  }

  async version(): Promise<string> {
    const { stdout } = await this.docker(
      'info',
      undefined,
      'version',
      '--format',
      '{{.Server.Version}}',
    );
    return `Docker ${stdout.trim()}`;
  }

  // -----------------------------------------------------------------------
  // Containers
  // -----------------------------------------------------------------------

  async createContainer(spec: ContainerSpec): Promise<string> {
    const { stdout } = await this.docker('create', spec.name, ...this.buildCreateArgs(spec));
    return stdout.trim();
  }

  async start(containerId: string): Promise<void> {
    await this.docker('start', containerId, 'start', containerId);
  }

  async stop(containerId: string, timeoutSeconds?: number): Promise<void> {
    if (timeoutSeconds !== undefined) {
      await this.docker('stop', containerId, 'stop', '-t', String(timeoutSeconds), containerId);
    } else {
      await this.docker('stop', containerId, 'stop', containerId);
    }
  }

  async remove(containerId: string): Promise<void> {
    await this.docker('remove', containerId, 'rm', containerId);
  }

  async listByLabels(filter: LabelFilter): Promise<ContainerDescriptor[]> {
    const args = ['ps', '-a', '-q', '--no-trunc'];
    for (const [key, value] of Object.entries(filter)) {
      args.push('--filter', `label=${key}=${value}`);
    }

    const { stdout } = await this.docker('list', undefined, ...args);
    const ids = stdout
      .split('\n')
      .map((line) => line.trim())
      .filter((line) => line.length > 0);

    if (ids.length === 0) return [];

    // Containers can vanish between `ps` and `inspect`; keep the survivors.
    const raw = await this.inspectRaw('list', ids, { skipMissing: true });
    return raw.map((c) => ({
      id: c.Id,
      name: stripSlash(c.Name),
      image: c.Config.Image,
      labels: c.Config.Labels ?? {},
      status: mapStatus(c.State.Status),
      createdAt: c.Created,
      ports: mapPorts(c.NetworkSettings.Ports),
      mounts: mapMounts(c.Mounts),
    }));
  }

  async inspect(containerId: string): Promise<ContainerInspection> {
    const [raw] = await this.inspectRaw('inspect', [containerId]);
    if (!raw) {
      throw new DwnError({
        code: ErrorCode.CONTAINER_NOT_FOUND,
        message: `docker inspect returned nothing for ${containerId}`,
        operation: 'inspect',
        container: containerId,
      });
    }

    const status = mapStatus(raw.State.Status);
    const terminal = status === 'exited' || status === 'dead';

    return {
      id: raw.Id,
      name: stripSlash(raw.Name),
      status,
      exitCode: terminal ? raw.State.ExitCode : undefined,
      networkAddresses: mapNetworks(raw.NetworkSettings.Networks),
      publishedPorts: mapPorts(raw.NetworkSettings.Ports),
    };
  }

  async *streamLogs(containerId: string, options?: LogStreamOptions): AsyncIterable<string> {
    const signal = options?.signal;
    if (signal?.aborted) return;

    const child = this.spawnFn(this.dockerPath, ['logs', '--follow', containerId]);

    // Container stdout and stderr arrive on the CLI's stdout and stderr;
    // both are part of the tool's output.
    const merged = new PassThrough();
    let open = 2;
    const endOne = () => {
      open -= 1;
      if (open === 0) merged.end();
    };
    let stderrTail = '';
    child.stdout.on('end', endOne);
    child.stderr.on('end', endOne);
    child.stderr.on('data', (chunk: Buffer | string) => {
      stderrTail = (stderrTail + chunk.toString()).slice(-4096);
    });
    child.stdout.pipe(merged, { end: false });
    child.stderr.pipe(merged, { end: false });

    // A failed spawn never ends its pipes; settle here and end the stream.
    const exit = child.exited.then(
      (code) => ({ code, error: undefined }),
      (error: unknown) => {
        child.stdout.unpipe(merged);
        child.stderr.unpipe(merged);
        if (!merged.writableEnded) merged.end();
        return { code: null, error };
      },
    );

    let aborted = false;
    const onAbort = () => {
      aborted = true;
      child.kill();
    };
    signal?.addEventListener('abort', onAbort, { once: true });

    const lines = createInterface({ input: merged, crlfDelay: Infinity });
    try {
      for await (const line of lines) {
        yield line;
      }
    } finally {
      signal?.removeEventListener('abort', onAbort);
      lines.close();
      if (!aborted) child.kill();
    }

    const { code: exitCode, error } = await exit;
    if (error !== undefined) {
      throw translateDockerError(error, 'logs', containerId);
    }
    if (!aborted && exitCode !== 0 && exitCode !== null) {
      throw translateDockerError({ stderr: stderrTail }, 'logs', containerId);
    }
  }

  // -----------------------------------------------------------------------
  // Networks and images
  // -----------------------------------------------------------------------

  async networkExists(name: string): Promise<boolean> {
    return this.inspectExists('network', 'network', 'inspect', name);
  }

  async createNetwork(name: string): Promise<void> {
    await this.docker('network', undefined, 'network', 'create', name);
  }

  async imageExists(ref: string): Promise<boolean> {
    return this.inspectExists('image', 'image', 'inspect', ref);
  }

  async buildImage(options: ImageBuildOptions): Promise<void> {
    const args = ['build', '-t', options.tag];
    if (options.pull) args.push('--pull');

    if ('contextDir' in options) {
      await this.docker('image', undefined, ...args, options.contextDir);
      return;
    }

    const contextDir = await mkdtemp(join(tmpdir(), 'dwn-build-'));
    try {
      await writeFile(join(contextDir, 'Dockerfile'), options.dockerfile, 'utf-8');
      this.logger.debug('building inline dockerfile', { tag: options.tag, contextDir });
      await this.docker('image', undefined, ...args, contextDir);
    } finally {
      await rm(contextDir, { recursive: true, force: true });
    }
  }

  // -----------------------------------------------------------------------
  // Internals
  // -----------------------------------------------------------------------

  /** Build `docker create` args for a container spec. */
  buildCreateArgs(spec: ContainerSpec): string[] {
    const args: string[] = ['create', '--name', spec.name];

    for (const [key, value] of Object.entries(spec.labels)) {
      args.push('--label', `${key}=${value}`);
    }

    if (spec.network) {
      args.push('--network', spec.network);
    }

    for (const mount of spec.mounts) {
      const suffix = mount.readOnly ? ':ro' : '';
      args.push('-v', `${mount.hostPath}:${mount.containerPath}${suffix}`);
    }

    for (const port of spec.ports) {
      const target = `${port.containerPort}/${port.protocol}`;
      args.push('-p', port.hostPort !== undefined ? `${port.hostPort}:${target}` : target);
    }

    for (const [key, value] of Object.entries(spec.env)) {
      args.push('-e', `${key}=${value}`);
    }

    if (spec.tty) {
      args.push('-t', '-i');
    }

    args.push(...extraOptionFlags(spec.extraOptions));

    args.push(spec.image);
    args.push(...spec.command);

    return args;
  }

  private async inspectRaw(
    operation: EngineOperation,
    ids: string[],
    options: { skipMissing?: boolean } = {},
  ): Promise<RawInspect[]> {
    const target = ids.length === 1 ? ids[0] : undefined;
    const args = ['container', 'inspect', ...ids];

    let stdout: string;
    try {
      ({ stdout } = await this.exec(this.dockerPath, args));
    } catch (err) {
      const translated = translateDockerError(err, operation, target);
      if (!options.skipMissing || translated.code !== ErrorCode.CONTAINER_NOT_FOUND) {
        throw translated;
      }
      // docker still prints the containers it found before exiting non-zero.
      stdout = stdoutOf(err);
      this.logger.debug('some containers vanished before inspect', { requested: ids.length, error: translated });
    }

    if (stdout.trim().length === 0) return [];
    try {
      return JSON.parse(stdout) as RawInspect[];
    } catch (err) {
      throw new DwnError({
        code: ErrorCode.ENGINE_ERROR,
        message: `docker inspect returned unparseable output`,
        operation,
        cause: err,
      });
    }
  }

  /**
   * Run an `inspect` command. A failing inspect means "absent", except
   * when the engine itself cannot be reached.
   */
  private async inspectExists(operation: EngineOperation, ...args: string[]): Promise<boolean> {
    try {
      await this.docker(operation, undefined, ...args);
      return true;
    } catch (err) {
      if (isDwnError(err) && err.code === ErrorCode.ENGINE_UNREACHABLE) {
        throw err;
      }
      return false;
    }
  }

  private async docker(
    operation: EngineOperation,
    container: string | undefined,
    ...args: string[]
  ): Promise<{ stdout: string; stderr: string }> {
    try {
      return await this.exec(this.dockerPath, args);
    } catch (err) {
      throw translateDockerError(err, operation, container);
    }
  }
}
