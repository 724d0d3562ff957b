/**
 * dwn configuration schema and DWN_HOME resolution.
 *
 * Defines the TypeScript types for the config.toml sections, the
 * $DWN_HOME resolution algorithm, and the directory layout under it.
 */

import { mkdirSync } from 'node:fs';
import { join } from 'node:path';
import { homedir } from 'node:os';

// ---------------------------------------------------------------------------
// Config section types
// ---------------------------------------------------------------------------

/** `[engine]` section of config.toml. */
export interface EngineConfig {
  /** Engine CLI binary (e.g. `docker`, or an absolute path to it). */
  binary: string;
  /** Seconds a graceful stop waits before the engine kills the container. */
  stop_timeout: number;
}

/** `[naming]` section of config.toml. */
export interface NamingConfig {
  /** Prefix of every container name and value of the `dwn.namespace` label. */
  namespace: string;
}

/** `[network]` section of config.toml. */
export interface NetworkConfig {
  /** Engine network every Primary and forwarder joins. */
  name: string;
  /** Image reference of the TCP/UDP relay used for dynamic bindings. */
  forwarder_image: string;
}

/** `[plans]` section of config.toml. */
export interface PlansConfig {
  /** Extra plan directories, searched after the bundled and user ones. */
  dirs: string[];
}

// ---------------------------------------------------------------------------
// Top-level config
// ---------------------------------------------------------------------------

/**
 * Full dwn configuration.
 *
 * Unknown top-level keys are preserved as-is so newer config files keep
 * loading in older builds.
 */
export interface DwnConfig {
  engine: EngineConfig;
  naming: NamingConfig;
  network: NetworkConfig;
  plans: PlansConfig;
  [section: string]: unknown;
}

// ---------------------------------------------------------------------------
// Defaults
// ---------------------------------------------------------------------------

/** Default configuration applied when config.toml is absent or partial. */
export const DEFAULT_CONFIG: DwnConfig = {
  engine: { binary: 'docker', stop_timeout: 10 },
  naming: { namespace: 'dwn' },
  network: { name: 'dwn', forwarder_image: 'dwn-network:local' },
  plans: { dirs: [] },
};

const KNOWN_SECTIONS = ['engine', 'naming', 'network', 'plans'];

// Namespaces end up in container names and label values.
const NAMESPACE_PATTERN = /^[a-z0-9][a-z0-9-]*$/;

// ---------------------------------------------------------------------------
// resolveHome()
// ---------------------------------------------------------------------------

/**
 * Resolve the dwn home directory.
 *
 * Precedence:
 *  1. `$DWN_HOME` environment variable (if non-empty)
 *  2. `~/.dwn/` default
 *
 * Trailing slashes are stripped. A leading `~` is expanded to the
 * user's home directory.
 */
export function resolveHome(): string {
  const envValue = process.env['DWN_HOME'];
  if (envValue && envValue.length > 0) {
    let resolved = envValue;
    if (resolved.startsWith('~/') || resolved === '~') {
      resolved = join(homedir(), resolved.slice(2));
    }
    if (resolved.length > 1 && resolved.endsWith('/')) {
      resolved = resolved.slice(0, -1);
    }
    return resolved;
  }
  return join(homedir(), '.dwn');
}

// ---------------------------------------------------------------------------
// Directory structure
// ---------------------------------------------------------------------------

/** Resolved paths under `$DWN_HOME`. */
export interface DirectoryStructure {
  root: string;
  plans: string;
  configFile: string;
}

/**
 * Create `$DWN_HOME` and its `plans/` directory. Idempotent.
 */
export function ensureDirectoryStructure(root: string): DirectoryStructure {
  const plans = join(root, 'plans');
  mkdirSync(plans, { recursive: true });

  return {
    root,
    plans,
    configFile: join(root, 'config.toml'),
  };
}

// ---------------------------------------------------------------------------
// parseConfig()
// ---------------------------------------------------------------------------

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function section(raw: Record<string, unknown>, key: string): Record<string, unknown> {
  const value = raw[key];
  if (value === undefined) return {};
  if (!isRecord(value)) {
    throw new Error(`[${key}] must be a table`);
  }
  return value;
}

function stringField(
  table: Record<string, unknown>,
  path: string,
  key: string,
  fallback: string,
): string {
  const value = table[key];
  if (value === undefined) return fallback;
  if (typeof value !== 'string' || value.length === 0) {
    throw new Error(`${path}.${key} must be a non-empty string`);
  }
  return value;
}

/**
 * Parse and validate a raw config object (e.g. from TOML parsing) into a
 * fully typed `DwnConfig`. Applies defaults for missing sections and fields
 * and throws on invalid values.
 */
export function parseConfig(raw: Record<string, unknown>): DwnConfig {
  const extra: Record<string, unknown> = {};
  for (const key of Object.keys(raw)) {
    if (!KNOWN_SECTIONS.includes(key)) {
      extra[key] = raw[key];
    }
  }

  // --- engine ---
  const rawEngine = section(raw, 'engine');
  const binary = stringField(rawEngine, 'engine', 'binary', DEFAULT_CONFIG.engine.binary);
  const stopTimeout = rawEngine['stop_timeout'] ?? DEFAULT_CONFIG.engine.stop_timeout;
  if (typeof stopTimeout !== 'number' || !Number.isInteger(stopTimeout) || stopTimeout < 0) {
    throw new Error('engine.stop_timeout must be a non-negative integer');
  }

  // --- naming ---
  const rawNaming = section(raw, 'naming');
  const namespace = stringField(
    rawNaming,
    'naming',
    'namespace',
    DEFAULT_CONFIG.naming.namespace,
  );
  if (!NAMESPACE_PATTERN.test(namespace)) {
    throw new Error(
      `Invalid naming.namespace: "${namespace}". Use lowercase letters, digits and dashes.`,
    );
  }

  // --- network ---
  const rawNetwork = section(raw, 'network');
  const network: NetworkConfig = {
    name: stringField(rawNetwork, 'network', 'name', DEFAULT_CONFIG.network.name),
    forwarder_image: stringField(
      rawNetwork,
      'network',
      'forwarder_image',
      DEFAULT_CONFIG.network.forwarder_image,
    ),
  };

  // --- plans ---
  const rawPlans = section(raw, 'plans');
  const dirs = rawPlans['dirs'] ?? DEFAULT_CONFIG.plans.dirs;
  if (!Array.isArray(dirs)) {
    throw new Error('plans.dirs must be an array');
  }
  const planDirs: string[] = [];
  for (const entry of dirs) {
    if (typeof entry !== 'string') {
      throw new Error('plans.dirs entries must be strings');
    }
    planDirs.push(entry);
  }

  return {
    ...extra,
    engine: { binary, stop_timeout: stopTimeout },
    naming: { namespace },
    network,
    plans: { dirs: planDirs },
  };
}
