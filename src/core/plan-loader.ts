/**
 * Plan loader for dwn.
 *
 * Reads plan definition files (`*.yml` / `*.yaml`) from an ordered list of
 * directories: the bundled plans, then `$DWN_HOME/plans`, then any extra
 * directories from config. A plan in a later directory replaces one of the
 * same name from an earlier directory.
 *
 * Every document is validated against {@link PLAN_JSON_SCHEMA}. A file that
 * fails to parse or validate is kept in the record with its errors, so
 * `dwn plans` can report it, but is never returned by {@link PlanLoader.getPlan}.
 */

import { readdir, readFile } from 'node:fs/promises';
import { homedir } from 'node:os';
import { basename, extname, join, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import { parse as parseYaml } from 'yaml';

import _Ajv, { type ErrorObject } from 'ajv';
// ajv ESM interop: default export is the constructor
const Ajv = _Ajv.default ?? _Ajv;

import { DwnError, errorMessage, hasErrorCode } from './dwn-error.js';
import { createLogger, type Logger } from './logger.js';
import { ErrorCode } from '../types/errors.js';
import {
  createPlan,
  type ExtraOptions,
  type Plan,
  type PlanMount,
  type Protocol,
  type StaticPort,
} from '../types/plan.js';
import { PLAN_JSON_SCHEMA, type RawPlanFile, type RawPortEntry } from '../types/plan-schema.js';

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

/** Plans shipped with dwn, next to the package root. */
export const BUNDLED_PLANS_DIR = fileURLToPath(new URL('../../plans/', import.meta.url));

const PLAN_EXTENSIONS = new Set(['.yml', '.yaml']);

const ajv = new Ajv({ allErrors: true, allowUnionTypes: true });
const validatePlanFile = ajv.compile<RawPlanFile>(PLAN_JSON_SCHEMA);

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** Outcome of loading one plan file. */
export interface PlanRecord {
  /** Plan name, or the file's base name when the document has none. */
  name: string;
  source: string;
  valid: boolean;
  plan?: Plan;
  errors: string[];
}

export interface PlanLoaderOptions {
  /** Directories in increasing priority. Missing directories are skipped. */
  dirs: readonly string[];
  /** Used for `~` expansion in volume paths. Defaults to os.homedir(). */
  homeDir?: string;
  logger?: Logger;
}

// ---------------------------------------------------------------------------
// Document parsing
// ---------------------------------------------------------------------------

/**
 * Split a command string into argv words, honoring single quotes, double
 * quotes and backslash escapes.
 */
export function splitCommand(command: string): string[] {
  const words: string[] = [];
  let current = '';
  let inWord = false;
  let quote: "'" | '"' | null = null;

  for (let i = 0; i < command.length; i++) {
    const ch = command.charAt(i);

    if (quote === "'") {
      if (ch === "'") quote = null;
      else current += ch;
      continue;
    }
    if (quote === '"') {
      if (ch === '"') {
        quote = null;
      } else if (ch === '\\' && (command[i + 1] === '"' || command[i + 1] === '\\')) {
        current += command.charAt(i + 1);
        i++;
      } else {
        current += ch;
      }
      continue;
    }

    if (ch === "'" || ch === '"') {
      quote = ch;
      inWord = true;
    } else if (ch === '\\' && i + 1 < command.length) {
      current += command.charAt(i + 1);
      inWord = true;
      i++;
    } else if (/\s/.test(ch)) {
      if (inWord) {
        words.push(current);
        current = '';
        inWord = false;
      }
    } else {
      current += ch;
      inWord = true;
    }
  }

  if (quote !== null) {
    throw new Error(`unterminated ${quote} quote in command`);
  }
  if (inWord) words.push(current);
  return words;
}

/** Expand a leading `~` and resolve to an absolute path. */
export function expandHostPath(path: string, home: string = homedir()): string {
  if (path === '~') return home;
  if (path.startsWith('~/')) return join(home, path.slice(2));
  return resolve(path);
}

function imageReference(image: string, version: string | number | undefined): string {
  if (version !== undefined) return `${image}:${version}`;
  const lastSegment = image.slice(image.lastIndexOf('/') + 1);
  return lastSegment.includes(':') || image.includes('@') ? image : `${image}:latest`;
}

/** Tag given to images built from a plan's inline Dockerfile. */
export const LOCAL_BUILD_TAG = 'dwnlocal';

function localImageReference(image: string): string {
  const slash = image.lastIndexOf('/');
  const colon = image.lastIndexOf(':');
  const repository = colon > slash ? image.slice(0, colon) : image;
  return `${repository}:${LOCAL_BUILD_TAG}`;
}

function parsePortKey(key: string): { containerPort: number; protocol: Protocol } {
  const [port, protocol] = key.split('/');
  return { containerPort: Number(port), protocol: protocol === 'udp' ? 'udp' : 'tcp' };
}

function collectPorts(entry: RawPortEntry, into: StaticPort[]): void {
  if (typeof entry === 'number') {
    into.push({ containerPort: entry, protocol: 'tcp', hostPort: entry });
    return;
  }
  for (const [key, hostPort] of Object.entries(entry)) {
    into.push({ ...parsePortKey(key), hostPort });
  }
}

function parseEnvironment(raw: RawPlanFile['environment']): Record<string, string> {
  const env: Record<string, string> = {};
  if (raw === undefined) return env;

  if (Array.isArray(raw)) {
    for (const item of raw) {
      const eq = item.indexOf('=');
      env[item.slice(0, eq)] = item.slice(eq + 1);
    }
    return env;
  }

  for (const [key, value] of Object.entries(raw)) {
    env[key] = String(value);
  }
  return env;
}

/**
 * Turn a parsed YAML document into a Plan.
 *
 * @param fallbackName - Used when the document has no `name`.
 * @throws DwnError INVALID_PLAN listing every problem found.
 */
export function parsePlanDocument(
  doc: unknown,
  source: string,
  fallbackName: string,
  home: string = homedir(),
): Plan {
  if (!validatePlanFile(doc)) {
    const details =
      validatePlanFile.errors
        ?.map((e: ErrorObject) => `${e.instancePath || '/'} ${e.message ?? 'is invalid'}`)
        .join('; ') ?? 'unknown error';
    throw new DwnError({
      code: ErrorCode.INVALID_PLAN,
      message: `Invalid plan file ${source}: ${details}`,
      plan: fallbackName,
    });
  }

  const name = doc.name ?? fallbackName;
  const problems: string[] = [];

  let command: string[] = [];
  if (typeof doc.command === 'string') {
    try {
      command = splitCommand(doc.command);
    } catch (err) {
      problems.push(errorMessage(err));
    }
  } else if (doc.command !== undefined) {
    command = [...doc.command];
  }

  const mounts: PlanMount[] = Object.entries(doc.volumes ?? {}).map(([hostPath, volume]) => ({
    hostPath: expandHostPath(hostPath, home),
    containerPath: volume.bind,
    mode: volume.mode ?? 'rw',
  }));

  const staticPorts: StaticPort[] = [];
  if (doc.ports !== undefined) {
    const entries = Array.isArray(doc.ports) ? doc.ports : [doc.ports];
    for (const entry of entries) collectPorts(entry, staticPorts);
  }

  const seenHostPorts = new Set<number>();
  for (const port of staticPorts) {
    if (port.containerPort < 1 || port.containerPort > 65535) {
      problems.push(`container port ${port.containerPort} is out of range`);
    }
    if (port.hostPort === 'auto') continue;
    if (seenHostPorts.has(port.hostPort)) {
      problems.push(`host port ${port.hostPort} is exposed more than once`);
    }
    seenHostPorts.add(port.hostPort);
  }

  if (doc.dockerfile !== undefined && !/^\s*FROM\s/im.test(doc.dockerfile)) {
    problems.push('dockerfile has no FROM instruction');
  }

  if (problems.length > 0) {
    throw new DwnError({
      code: ErrorCode.INVALID_PLAN,
      message: `Invalid plan file ${source}: ${problems.join('; ')}`,
      plan: name,
    });
  }

  const extraOptions: ExtraOptions = { ...doc.options };

  return createPlan({
    name,
    image: doc.dockerfile !== undefined ? localImageReference(doc.image) : imageReference(doc.image, doc.version),
    command,
    mounts,
    staticPorts,
    environment: parseEnvironment(doc.environment),
    extraOptions,
    detach: doc.detach ?? false,
    tty: doc.tty ?? false,
    dockerfile: doc.dockerfile,
    source,
  });
}

// ---------------------------------------------------------------------------
// PlanLoader
// ---------------------------------------------------------------------------

export class PlanLoader {
  private readonly dirs: readonly string[];
  private readonly homeDir: string;
  private readonly logger: Logger;
  private readonly records = new Map<string, PlanRecord>();

  constructor(options: PlanLoaderOptions) {
    this.dirs = options.dirs;
    this.homeDir = options.homeDir ?? homedir();
    this.logger = options.logger ?? createLogger('plan-loader');
  }

  /** (Re)read every directory. */
  async load(): Promise<void> {
    this.records.clear();

    for (const dir of this.dirs) {
      let entries: string[];
      try {
        entries = await readdir(dir);
      } catch {
        this.logger.debug('plan directory not readable, skipping', { dir });
        continue;
      }

      for (const entry of entries.sort()) {
        if (!PLAN_EXTENSIONS.has(extname(entry))) continue;
        const record = await this.loadFile(join(dir, entry));
        if (!record) continue;

        const previous = this.records.get(record.name);
        if (previous) {
          this.logger.debug('plan overridden', { plan: record.name, source: record.source, previous: previous.source });
        }
        this.records.set(record.name, record);
      }
    }

    this.logger.debug('plans loaded', { valid: this.validPlans().length, total: this.records.size });
  }

  /** Every record, valid or not, sorted by name. */
  allRecords(): PlanRecord[] {
    return [...this.records.values()].sort((a, b) => a.name.localeCompare(b.name));
  }

  validPlans(): Plan[] {
    return this.allRecords().flatMap((r) => (r.plan ? [r.plan] : []));
  }

  invalidRecords(): PlanRecord[] {
    return this.allRecords().filter((r) => !r.valid);
  }

  /**
   * @throws DwnError PLAN_NOT_FOUND when no valid plan has this name.
   */
  getPlan(name: string): Plan {
    const record = this.records.get(name);
    if (record?.plan) return record.plan;

    if (record) {
      throw new DwnError({
        code: ErrorCode.PLAN_NOT_FOUND,
        message: `Plan "${name}" is invalid: ${record.errors.join('; ')}`,
        plan: name,
      });
    }
    throw new DwnError({
      code: ErrorCode.PLAN_NOT_FOUND,
      message: `Unable to find plan "${name}"`,
      plan: name,
    });
  }

  private async loadFile(path: string): Promise<PlanRecord | null> {
    const fallbackName = basename(path, extname(path));

    let doc: unknown;
    try {
      doc = parseYaml(await readFile(path, 'utf-8'));
    } catch (err) {
      this.logger.warn('unreadable plan file', { source: path, error: err });
      return { name: fallbackName, source: path, valid: false, errors: [errorMessage(err)] };
    }

    // Empty documents are placeholders, not plans.
    if (doc === null || doc === undefined) return null;

    try {
      const plan = parsePlanDocument(doc, path, fallbackName, this.homeDir);
      return { name: plan.name, source: path, valid: true, plan, errors: [] };
    } catch (err) {
      if (!hasErrorCode(err, ErrorCode.INVALID_PLAN)) throw err;
      this.logger.warn('invalid plan file', { source: path, error_code: err.code, reason: err.message });
      return { name: err.plan ?? fallbackName, source: path, valid: false, errors: [err.message] };
    }
  }
}
