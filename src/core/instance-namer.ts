/**
 * Container naming and labeling for dwn.
 *
 * Labels are the whole database: they encode the namespace, plan, session
 * token and role of every managed container, so a later invocation can
 * rebuild the running state from a single label query. Names mirror the
 * same information for operators using the engine CLI directly, and are
 * parsed only as a display fallback.
 *
 * The label keys below are a stable contract with already-running
 * containers. Do not rename them.
 */

import { randomBytes } from 'node:crypto';
import { PROTOCOLS, type Protocol } from '../types/plan.js';

// ---------------------------------------------------------------------------
// Label keys
// ---------------------------------------------------------------------------

export const LABEL_MANAGED = 'dwn.managed';
export const LABEL_NAMESPACE = 'dwn.namespace';
export const LABEL_PLAN = 'dwn.plan';
export const LABEL_SESSION = 'dwn.session';
export const LABEL_ROLE = 'dwn.role';
export const LABEL_FORWARD_CONTAINER_PORT = 'dwn.forward.container-port';
export const LABEL_FORWARD_PROTOCOL = 'dwn.forward.protocol';
export const LABEL_FORWARD_HOST_PORT = 'dwn.forward.host-port';
export const LABEL_FORWARD_TARGET_SESSION = 'dwn.forward.target-session';

/** Infix separating a forwarder name from its port pair. */
export const FORWARD_NAME_INFIX = '_net_';

// ---------------------------------------------------------------------------
// Session tokens
// ---------------------------------------------------------------------------

/** Per-run disambiguator: 8 lowercase hex characters. */
export type SessionToken = string;

const SESSION_TOKEN_PATTERN = /^[0-9a-f]{8}$/;

export function mintSessionToken(): SessionToken {
  return randomBytes(4).toString('hex');
}

export function isSessionToken(value: string): value is SessionToken {
  return SESSION_TOKEN_PATTERN.test(value);
}

// ---------------------------------------------------------------------------
// Roles
// ---------------------------------------------------------------------------

export interface PrimaryRole {
  kind: 'primary';
}

export interface PortForwardRole {
  kind: 'port-forward';
  containerPort: number;
  protocol: Protocol;
  hostPort: number;
  /** Session of the Primary this forwarder relays to. */
  targetSession: SessionToken;
}

export type ContainerRole = PrimaryRole | PortForwardRole;

export const PRIMARY: PrimaryRole = Object.freeze({ kind: 'primary' });

export function portForwardRole(
  containerPort: number,
  protocol: Protocol,
  hostPort: number,
  targetSession: SessionToken,
): PortForwardRole {
  return { kind: 'port-forward', containerPort, protocol, hostPort, targetSession };
}

// ---------------------------------------------------------------------------
// InstanceNamer
// ---------------------------------------------------------------------------

/** Identity recovered from a container name by {@link InstanceNamer.parseName}. */
export interface ParsedName {
  session: SessionToken;
  planName: string;
  /** Present for forwarder names. */
  ports?: { containerPort: number; hostPort: number };
}

/** Identity recovered from container labels. */
export interface LabeledIdentity {
  planName: string;
  session: SessionToken;
  role: ContainerRole;
}

/**
 * Pure naming/labeling scheme bound to one namespace.
 */
export class InstanceNamer {
  readonly namespace: string;

  constructor(namespace: string) {
    this.namespace = namespace;
  }

  nameFor(planName: string, session: SessionToken, role: ContainerRole): string {
    const base = `${this.namespace}_${session}_${planName}`;
    if (role.kind === 'primary') {
      return base;
    }
    return `${base}${FORWARD_NAME_INFIX}${role.containerPort}_${role.hostPort}`;
  }

  labelsFor(planName: string, session: SessionToken, role: ContainerRole): Record<string, string> {
    const labels: Record<string, string> = {
      [LABEL_MANAGED]: 'true',
      [LABEL_NAMESPACE]: this.namespace,
      [LABEL_PLAN]: planName,
      [LABEL_SESSION]: session,
      [LABEL_ROLE]: role.kind,
    };

    if (role.kind === 'port-forward') {
      labels[LABEL_FORWARD_CONTAINER_PORT] = String(role.containerPort);
      labels[LABEL_FORWARD_PROTOCOL] = role.protocol;
      labels[LABEL_FORWARD_HOST_PORT] = String(role.hostPort);
      labels[LABEL_FORWARD_TARGET_SESSION] = role.targetSession;
    }

    return labels;
  }

  // -- Filters --------------------------------------------------------------

  /** Every container this namespace manages. */
  namespaceFilter(): Record<string, string> {
    return { [LABEL_MANAGED]: 'true', [LABEL_NAMESPACE]: this.namespace };
  }

  /** Every container of a plan, across all sessions. */
  planFilter(planName: string): Record<string, string> {
    return { ...this.namespaceFilter(), [LABEL_PLAN]: planName };
  }

  /** Forwarders of a plan publishing the given host port. */
  bindingFilter(planName: string, hostPort: number): Record<string, string> {
    return {
      ...this.planFilter(planName),
      [LABEL_ROLE]: 'port-forward',
      [LABEL_FORWARD_HOST_PORT]: String(hostPort),
    };
  }

  // -- Decoding -------------------------------------------------------------

  /**
   * Decode plan, session and role from labels. Returns null for containers
   * of another namespace or with incomplete labels.
   */
  identityFromLabels(labels: Readonly<Record<string, string>>): LabeledIdentity | null {
    if (labels[LABEL_NAMESPACE] !== this.namespace) return null;

    const planName = labels[LABEL_PLAN];
    const session = labels[LABEL_SESSION];
    if (!planName || !session) return null;

    const role = roleFromLabels(labels);
    if (!role) return null;

    return { planName, session, role };
  }

  /**
   * Fallback decoder for containers seen only by name (e.g. in operator
   * output). Never used to decide roles when labels are available.
   */
  parseName(name: string): ParsedName | null {
    const prefix = `${this.namespace}_`;
    const bare = name.startsWith('/') ? name.slice(1) : name;
    if (!bare.startsWith(prefix)) return null;

    const rest = bare.slice(prefix.length);
    const sep = rest.indexOf('_');
    if (sep <= 0) return null;

    const session = rest.slice(0, sep);
    if (!isSessionToken(session)) return null;

    const tail = rest.slice(sep + 1);
    const infixAt = tail.lastIndexOf(FORWARD_NAME_INFIX);
    if (infixAt > 0) {
      const match = /^(\d+)_(\d+)$/.exec(tail.slice(infixAt + FORWARD_NAME_INFIX.length));
      if (match) {
        return {
          session,
          planName: tail.slice(0, infixAt),
          ports: { containerPort: Number(match[1]), hostPort: Number(match[2]) },
        };
      }
    }

    return tail.length > 0 ? { session, planName: tail } : null;
  }
}

// ---------------------------------------------------------------------------
// roleFromLabels
// ---------------------------------------------------------------------------

function parsePort(value: string | undefined): number | null {
  if (value === undefined || !/^\d+$/.test(value)) return null;
  const port = Number(value);
  return port >= 1 && port <= 65535 ? port : null;
}

function isProtocol(value: string | undefined): value is Protocol {
  return value !== undefined && (PROTOCOLS as readonly string[]).includes(value);
}

/** Decode the role variant from labels; null when the labels are malformed. */
export function roleFromLabels(labels: Readonly<Record<string, string>>): ContainerRole | null {
  const kind = labels[LABEL_ROLE];

  if (kind === 'primary') {
    return PRIMARY;
  }

  if (kind === 'port-forward') {
    const containerPort = parsePort(labels[LABEL_FORWARD_CONTAINER_PORT]);
    const hostPort = parsePort(labels[LABEL_FORWARD_HOST_PORT]);
    const protocol = labels[LABEL_FORWARD_PROTOCOL];
    const targetSession = labels[LABEL_FORWARD_TARGET_SESSION];
    if (containerPort === null || hostPort === null || !isProtocol(protocol) || !targetSession) {
      return null;
    }
    return portForwardRole(containerPort, protocol, hostPort, targetSession);
  }

  return null;
}

/** Render a role for reports: `primary` or `forward 9000->80/tcp`. */
export function describeRole(role: ContainerRole): string {
  if (role.kind === 'primary') return 'primary';
  return `forward ${role.hostPort}->${role.containerPort}/${role.protocol}`;
}
