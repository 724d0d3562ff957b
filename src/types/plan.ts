/**
 * Plan model.
 *
 * A Plan is the in-memory form of one tool definition file. Plans are
 * produced by the plan loader, frozen, and treated as read-only input for
 * the rest of a command invocation.
 */

// ---------------------------------------------------------------------------
// Ports and mounts
// ---------------------------------------------------------------------------

export type Protocol = 'tcp' | 'udp';

export const PROTOCOLS: readonly Protocol[] = ['tcp', 'udp'];

/** A host port, or `'auto'` to let the engine pick one. */
export type HostPortSpec = number | 'auto';

/** A port the Primary container publishes at creation time. */
export interface StaticPort {
  readonly containerPort: number;
  readonly protocol: Protocol;
  readonly hostPort: HostPortSpec;
}

export type MountMode = 'rw' | 'ro';

/** A bind mount from the host into the Primary container. */
export interface PlanMount {
  /** Absolute, `~`-expanded host path. */
  readonly hostPath: string;
  readonly containerPath: string;
  readonly mode: MountMode;
}

// ---------------------------------------------------------------------------
// Engine passthrough options
// ---------------------------------------------------------------------------

/** A single passthrough option value, forwarded verbatim to the engine. */
export type ExtraOptionValue = string | number | boolean | readonly string[];

export type ExtraOptions = Readonly<Record<string, ExtraOptionValue>>;

// ---------------------------------------------------------------------------
// Plan
// ---------------------------------------------------------------------------

export interface Plan {
  /** Unique, user-chosen key. */
  readonly name: string;
  /** Full image reference including tag (e.g. `nginx:latest`). */
  readonly image: string;
  /** Command override as argv words. Empty means the image default. */
  readonly command: readonly string[];
  readonly mounts: readonly PlanMount[];
  readonly staticPorts: readonly StaticPort[];
  readonly environment: Readonly<Record<string, string>>;
  readonly extraOptions: ExtraOptions;
  /** Long-running tool: return once the container is running. */
  readonly detach: boolean;
  /** Allocate a TTY and keep stdin open. */
  readonly tty: boolean;
  /**
   * Inline Dockerfile. When set, `image` is built locally from it the first
   * time the plan runs instead of being pulled.
   */
  readonly dockerfile?: string;
  /** File the plan was loaded from, if any. */
  readonly source?: string;
}

/** Fields a caller must supply when building a Plan in code. */
export type PlanInit = Pick<Plan, 'name' | 'image'> & Partial<Omit<Plan, 'name' | 'image'>>;

/**
 * Build a frozen Plan, filling defaults for everything but name and image.
 */
export function createPlan(init: PlanInit): Plan {
  const plan: Plan = {
    name: init.name,
    image: init.image,
    command: Object.freeze([...(init.command ?? [])]),
    mounts: Object.freeze((init.mounts ?? []).map((m) => Object.freeze({ ...m }))),
    staticPorts: Object.freeze((init.staticPorts ?? []).map((p) => Object.freeze({ ...p }))),
    environment: Object.freeze({ ...(init.environment ?? {}) }),
    extraOptions: Object.freeze({ ...(init.extraOptions ?? {}) }),
    detach: init.detach ?? false,
    tty: init.tty ?? false,
  };
  return Object.freeze({
    ...plan,
    ...(init.dockerfile !== undefined ? { dockerfile: init.dockerfile } : {}),
    ...(init.source !== undefined ? { source: init.source } : {}),
  });
}

/**
 * Return a copy of `plan` with `args` appended to its command, as `dwn run
 * <plan> <args...>` does.
 */
export function withExtraArgs(plan: Plan, args: readonly string[]): Plan {
  if (args.length === 0) return plan;
  return createPlan({ ...plan, command: [...plan.command, ...args] });
}

/** Render a static port as `host<-container/proto` for reports. */
export function formatStaticPort(port: StaticPort): string {
  return `${port.hostPort}<-${port.containerPort}/${port.protocol}`;
}
