/**
 * Running-plan tracker for dwn.
 *
 * Rebuilds the state of running plans from a single label query against the
 * engine. Nothing is cached: every call reflects the engine as it is now, so
 * containers started or removed outside dwn are picked up immediately.
 *
 * Forwarders whose Primary is gone (or not running) are reported as
 * orphaned rather than treated as errors; `network prune` cleans them up.
 */

import type { ContainerDescriptor, ContainerStatus, EngineClient } from './engine/engine-client.js';
import type { ContainerRole, InstanceNamer, SessionToken } from './instance-namer.js';
import { createLogger, type Logger } from './logger.js';
import type { Protocol } from '../types/plan.js';

// ---------------------------------------------------------------------------
// View types
// ---------------------------------------------------------------------------

/** One managed container as seen by the tracker. */
export interface ContainerSummary {
  id: string;
  name: string;
  planName: string;
  session: SessionToken;
  role: ContainerRole;
  status: ContainerStatus;
  image: string;
  /** ISO 8601 creation timestamp. */
  createdAt: string;
}

/** A host port currently bound by one of the plan's containers. */
export interface BoundPort {
  hostPort: number;
  /** Port inside the Primary that traffic reaches. */
  containerPort: number;
  protocol: Protocol;
  boundBy: ContainerRole;
  containerId: string;
  /** True for forwarders with no running Primary to relay to. */
  orphaned: boolean;
}

export interface VolumeBinding {
  hostPath: string;
  containerPath: string;
}

/** Derived view of one plan's containers. Never stored. */
export interface RunningPlanView {
  planName: string;
  /** Session tokens with a container, oldest first. */
  sessions: SessionToken[];
  containers: ContainerSummary[];
  ports: BoundPort[];
  volumes: VolumeBinding[];
  orphans: ContainerSummary[];
}

export interface NamespaceScan {
  plans: RunningPlanView[];
  /** Managed containers whose labels are incomplete, in engine order. */
  unrecognized: ContainerDescriptor[];
}

export interface RunningPlanTrackerOptions {
  engine: EngineClient;
  namer: InstanceNamer;
  logger?: Logger;
}

// ---------------------------------------------------------------------------
// RunningPlanTracker
// ---------------------------------------------------------------------------

export class RunningPlanTracker {
  private readonly engine: EngineClient;
  private readonly namer: InstanceNamer;
  private readonly logger: Logger;

  constructor(options: RunningPlanTrackerOptions) {
    this.engine = options.engine;
    this.namer = options.namer;
    this.logger = options.logger ?? createLogger('tracker');
  }

  /** Every plan with at least one managed container, sorted by plan name. */
  async listRunningPlans(): Promise<RunningPlanView[]> {
    return (await this.scan()).plans;
  }

  /**
   * One pass over the namespace: the plan views, plus the containers that
   * carry the namespace labels but not enough of the others to be placed.
   */
  async scan(): Promise<NamespaceScan> {
    const descriptors = await this.engine.listByLabels(this.namer.namespaceFilter());

    const byPlan = new Map<string, Array<{ summary: ContainerSummary; raw: ContainerDescriptor }>>();
    const unrecognized: ContainerDescriptor[] = [];
    for (const raw of descriptors) {
      const summary = this.summarize(raw);
      if (!summary) {
        unrecognized.push(raw);
        continue;
      }
      const group = byPlan.get(summary.planName) ?? [];
      group.push({ summary, raw });
      byPlan.set(summary.planName, group);
    }

    const plans = [...byPlan.keys()]
      .sort((a, b) => a.localeCompare(b))
      .map((planName) => buildView(planName, byPlan.get(planName) ?? []));
    return { plans, unrecognized };
  }

  /** The view of one plan, or null when it has no containers. */
  async getPlan(planName: string): Promise<RunningPlanView | null> {
    const descriptors = await this.engine.listByLabels(this.namer.planFilter(planName));

    const entries: Array<{ summary: ContainerSummary; raw: ContainerDescriptor }> = [];
    for (const raw of descriptors) {
      const summary = this.summarize(raw);
      if (summary && summary.planName === planName) {
        entries.push({ summary, raw });
      }
    }

    return entries.length > 0 ? buildView(planName, entries) : null;
  }

  /** Orphaned forwarders across all plans. */
  async findOrphans(): Promise<ContainerSummary[]> {
    const views = await this.listRunningPlans();
    return views.flatMap((view) => view.orphans);
  }

  private summarize(raw: ContainerDescriptor): ContainerSummary | null {
    const summary = summarizeContainer(this.namer, raw);
    if (!summary) {
      this.logger.debug('skipping container with incomplete labels', { container: raw.name });
    }
    return summary;
  }
}

/** Decode a label-query row; null when its labels are not ours or incomplete. */
export function summarizeContainer(namer: InstanceNamer, raw: ContainerDescriptor): ContainerSummary | null {
  const identity = namer.identityFromLabels(raw.labels);
  if (!identity) return null;
  return {
    id: raw.id,
    name: raw.name,
    planName: identity.planName,
    session: identity.session,
    role: identity.role,
    status: raw.status,
    image: raw.image,
    createdAt: raw.createdAt,
  };
}

// ---------------------------------------------------------------------------
// primaryFor
// ---------------------------------------------------------------------------

/**
 * The running Primary of a view: the one for `session` when given, else the
 * most recently created.
 */
export function primaryFor(view: RunningPlanView, session?: SessionToken): ContainerSummary | null {
  const primaries = view.containers.filter(
    (c) =>
      c.role.kind === 'primary' &&
      c.status === 'running' &&
      (session === undefined || c.session === session),
  );
  if (primaries.length === 0) return null;

  return primaries.reduce((latest, c) => (c.createdAt > latest.createdAt ? c : latest));
}

// ---------------------------------------------------------------------------
// View folding
// ---------------------------------------------------------------------------

function compareContainers(a: ContainerSummary, b: ContainerSummary): number {
  if (a.createdAt !== b.createdAt) return a.createdAt < b.createdAt ? -1 : 1;
  return a.name.localeCompare(b.name);
}

function buildView(
  planName: string,
  entries: ReadonlyArray<{ summary: ContainerSummary; raw: ContainerDescriptor }>,
): RunningPlanView {
  const sorted = [...entries].sort((a, b) => compareContainers(a.summary, b.summary));
  const containers = sorted.map((e) => e.summary);

  const liveSessions = new Set(
    containers
      .filter((c) => c.role.kind === 'primary' && c.status === 'running')
      .map((c) => c.session),
  );
  const isOrphan = (c: ContainerSummary): boolean =>
    c.role.kind === 'port-forward' && !liveSessions.has(c.role.targetSession);

  const sessions: SessionToken[] = [];
  for (const c of containers) {
    if (!sessions.includes(c.session)) sessions.push(c.session);
  }

  const ports: BoundPort[] = [];
  const volumes: VolumeBinding[] = [];
  for (const { summary, raw } of sorted) {
    if (summary.role.kind === 'primary') {
      for (const p of raw.ports) {
        ports.push({
          hostPort: p.hostPort,
          containerPort: p.containerPort,
          protocol: p.protocol,
          boundBy: summary.role,
          containerId: summary.id,
          orphaned: false,
        });
      }
      for (const m of raw.mounts) {
        if (!volumes.some((v) => v.hostPath === m.hostPath && v.containerPath === m.containerPath)) {
          volumes.push({ hostPath: m.hostPath, containerPath: m.containerPath });
        }
      }
    } else if (raw.ports.length > 0) {
      // A forwarder publishes its own listener; report the Primary port it relays to.
      ports.push({
        hostPort: summary.role.hostPort,
        containerPort: summary.role.containerPort,
        protocol: summary.role.protocol,
        boundBy: summary.role,
        containerId: summary.id,
        orphaned: isOrphan(summary),
      });
    }
  }
  ports.sort((a, b) => a.hostPort - b.hostPort || a.protocol.localeCompare(b.protocol));

  return {
    planName,
    sessions,
    containers,
    ports,
    volumes,
    orphans: containers.filter(isOrphan),
  };
}
