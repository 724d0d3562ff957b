/**
 * dwn CLI.
 *
 * Provides the `dwn` command with subcommands:
 *   - `run`     Start a plan (detached plans return once running).
 *   - `stop`    Stop every container of a plan, forwarders included.
 *   - `show`    Report running plans and orphaned forwarders.
 *   - `check`   Preflight: engine, network, forwarder image, plans.
 *   - `plans`   List plans, or `plans info <plan>` for one.
 *   - `network` Add, remove and prune port bindings; build the forwarder image.
 *
 * All external dependencies are injected via {@link CliDeps} for testability.
 * The real `main()` wires production dependencies and calls `runCommand()`.
 */

import { VERSION } from './index.js';
import type { EngineClient } from './core/engine/engine-client.js';
import { InstanceNamer, describeRole } from './core/instance-namer.js';
import { PlanOrchestrator } from './core/plan-orchestrator.js';
import { DynamicPortBinder } from './core/port-binder.js';
import { RunningPlanTracker, type RunningPlanView } from './core/running-plan-tracker.js';
import type { PlanLoader } from './core/plan-loader.js';
import { PartialStopFailure, errorMessage } from './core/dwn-error.js';
import type { DwnConfig } from './types/config.js';
import { PROTOCOLS, formatStaticPort, withExtraArgs, type Protocol } from './types/plan.js';

// ---------------------------------------------------------------------------
// CLI dependency injection
// ---------------------------------------------------------------------------

/** Injectable dependencies for CLI commands. */
export interface CliDeps {
  /** Write to stdout. */
  stdout: (msg: string) => void;
  /** Write to stderr. */
  stderr: (msg: string) => void;
  /** Resolved DWN_HOME path. */
  home: string;
  config: DwnConfig;
  engine: EngineClient;
  /** Plan loader over the configured directories; `load()` is called per command. */
  plans: PlanLoader;
  /** Ask user for confirmation. Returns true if confirmed. */
  confirm: (prompt: string) => Promise<boolean>;
  /** Build context of the forwarder image. */
  networkContextDir: string;
  /** Aborted on Ctrl-C: detaches from an attached run. */
  signal?: AbortSignal;
}

/** Core services built from one set of deps. */
interface Services {
  orchestrator: PlanOrchestrator;
  binder: DynamicPortBinder;
}

function createServices(deps: CliDeps): Services {
  const namer = new InstanceNamer(deps.config.naming.namespace);
  const tracker = new RunningPlanTracker({ engine: deps.engine, namer });
  const shared = {
    engine: deps.engine,
    namer,
    tracker,
    networkName: deps.config.network.name,
    forwarderImage: deps.config.network.forwarder_image,
    forwarderContextDir: deps.networkContextDir,
    stopTimeoutSeconds: deps.config.engine.stop_timeout,
  };
  return {
    orchestrator: new PlanOrchestrator(shared),
    binder: new DynamicPortBinder(shared),
  };
}

// ---------------------------------------------------------------------------
// Argument parsing
// ---------------------------------------------------------------------------

/** Parsed CLI arguments. */
export interface ParsedArgs {
  command: string;
  /** Non-flag arguments after the command, in order. */
  positionals: string[];
  flags: Record<string, boolean>;
}

const SHORT_FLAGS: Record<string, string> = { y: 'yes', f: 'force', h: 'help' };

/**
 * Parse process.argv into a command, positionals and boolean flags.
 *
 * Everything after `--` is positional. For `run`, everything after the plan
 * name belongs to the tool as well, so `dwn run nmap -p 80 host` and
 * `dwn run nmap -- -p 80 host` pass the same arguments.
 */
export function parseArgs(argv: string[]): ParsedArgs {
  const args = argv.slice(2);
  const flags: Record<string, boolean> = {};
  const positionals: string[] = [];
  let command = '';
  let passthrough = false;
  let toolArgs = false;

  for (const arg of args) {
    if (toolArgs) {
      // One `--` right after the plan name is a separator, not a tool argument.
      toolArgs = false;
      passthrough = true;
      if (arg !== '--') positionals.push(arg);
    } else if (passthrough) {
      positionals.push(arg);
    } else if (arg === '--') {
      passthrough = true;
    } else if (arg.startsWith('--')) {
      flags[arg.slice(2)] = true;
    } else if (/^-[a-z]$/.test(arg)) {
      flags[SHORT_FLAGS[arg.slice(1)] ?? arg.slice(1)] = true;
    } else if (!command) {
      command = arg;
    } else {
      positionals.push(arg);
      toolArgs = command === 'run' && positionals.length === 1;
    }
  }

  return { command, positionals, flags };
}

/** Parse `80` or `80/udp`. Returns null when malformed. */
export function parsePortArg(value: string): { port: number; protocol: Protocol } | null {
  const match = /^(\d{1,5})(?:\/(tcp|udp))?$/.exec(value);
  if (!match) return null;
  const port = Number(match[1]);
  if (port < 1 || port > 65535) return null;
  const protocol = PROTOCOLS.find((p) => p === match[2]) ?? 'tcp';
  return { port, protocol };
}

// ---------------------------------------------------------------------------
// Command dispatch
// ---------------------------------------------------------------------------

const USAGE = `Usage: dwn <command>

Commands:
  run <plan> [-- args...]               Run a plan
  stop <plan>                           Stop a plan
  show                                  Show running plans
  check                                 Check that dwn is ready to use
  plans                                 List available plans
  plans info <plan>                     Show details of a plan
  network add <plan> <port>[/proto] <host-port>
                                        Publish a host port for a running plan
  network remove <plan> <host-port>     Remove a host port binding
  network prune                         Remove orphaned port forwarders
  network build-container               Build the port forwarder image
  version                               Show version number

Options:
  --version    Show version number
  --help       Show this help message
  --yes, -y    Do not prompt for confirmation (stop)
  --force, -f  Stop without a grace period (stop)
  --debug      Verbose logging`;

/**
 * Dispatch a command string to the appropriate handler.
 *
 * @returns Process exit code (0 = success, 1 = failure).
 */
export async function runCommand(
  command: string,
  deps: CliDeps,
  flags: Record<string, boolean> = {},
  positionals: string[] = [],
): Promise<number> {
  if (command === '--version' || command === 'version') {
    deps.stdout(VERSION);
    return 0;
  }

  if (command === '' || command === '--help') {
    deps.stdout(USAGE);
    return 0;
  }

  try {
    switch (command) {
      case 'run':
        return await run(deps, positionals);
      case 'stop':
        return await stop(deps, positionals, flags);
      case 'show':
        return await show(deps);
      case 'check':
        return await check(deps);
      case 'plans':
        return await plans(deps, positionals);
      case 'network':
        return await network(deps, positionals);
      default:
        deps.stderr(`Unknown command: "${command}"\n`);
        deps.stdout(USAGE);
        return 1;
    }
  } catch (err) {
    deps.stderr(`error: ${errorMessage(err)}`);
    return 1;
  }
}

function usageError(deps: CliDeps, message: string): number {
  deps.stderr(`error: ${message}`);
  deps.stderr('Run "dwn --help" for usage.');
  return 1;
}

// ---------------------------------------------------------------------------
// run
// ---------------------------------------------------------------------------

export async function run(deps: CliDeps, positionals: string[]): Promise<number> {
  const [name, ...extraArgs] = positionals;
  if (!name) return usageError(deps, 'please specify a plan name');

  await deps.plans.load();
  const plan = withExtraArgs(deps.plans.getPlan(name), extraArgs);
  const { orchestrator } = createServices(deps);

  const result = await orchestrator.run(plan, { onLog: deps.stdout, signal: deps.signal });

  if (result.exitCode === undefined) {
    deps.stdout(`Started ${plan.name} as ${result.containerName} (session ${result.session})`);
    for (const port of result.view.ports) {
      if (port.containerId === result.containerId) {
        deps.stdout(`  host port ${port.hostPort} -> ${port.containerPort}/${port.protocol}`);
      }
    }
    return 0;
  }

  if (result.exitCode !== 0) {
    deps.stderr(`${plan.name} exited with code ${result.exitCode}`);
    return 1;
  }
  return 0;
}

// ---------------------------------------------------------------------------
// stop
// ---------------------------------------------------------------------------

export async function stop(
  deps: CliDeps,
  positionals: string[],
  flags: Record<string, boolean>,
): Promise<number> {
  const [name] = positionals;
  if (!name) return usageError(deps, 'please specify a plan name');

  if (!flags['yes']) {
    const confirmed = await deps.confirm(`Are you sure you want to stop containers for plan "${name}"?`);
    if (!confirmed) {
      deps.stdout('Not stopping any plans');
      return 0;
    }
  }

  const { orchestrator } = createServices(deps);
  try {
    const report = await orchestrator.stop(name, { force: flags['force'] === true });
    for (const ref of report.stopped) {
      deps.stdout(`  stopped  ${ref.name}`);
    }
    deps.stdout(`Stopped ${report.stopped.length} container(s) of plan "${name}"`);
    return 0;
  } catch (err) {
    if (!(err instanceof PartialStopFailure)) throw err;
    for (const ref of err.stopped) {
      deps.stdout(`  stopped  ${ref.name}`);
    }
    for (const failure of err.failures) {
      deps.stderr(`  FAILED   ${failure.container.name} (${failure.operation}): ${failure.error.message}`);
    }
    deps.stderr(`error: ${err.message}`);
    return 1;
  }
}

// ---------------------------------------------------------------------------
// show
// ---------------------------------------------------------------------------

function renderView(view: RunningPlanView): string[] {
  const lines = [view.planName];
  for (const c of view.containers) {
    lines.push(`  container  ${c.name}  ${describeRole(c.role)}  ${c.status}`);
  }
  for (const p of view.ports) {
    const by = p.boundBy.kind === 'primary' ? 'primary' : 'forwarder';
    const note = p.orphaned ? '  (orphaned)' : '';
    lines.push(`  port       ${p.hostPort} -> ${p.containerPort}/${p.protocol}  ${by}${note}`);
  }
  for (const v of view.volumes) {
    lines.push(`  volume     ${v.hostPath} -> ${v.containerPath}`);
  }
  return lines;
}

export async function show(deps: CliDeps): Promise<number> {
  const { orchestrator } = createServices(deps);
  const report = await orchestrator.status();

  if (report.plans.length === 0) {
    deps.stdout('No running plans');
  }
  for (const view of report.plans) {
    for (const line of renderView(view)) deps.stdout(line);
  }
  for (const warning of report.warnings) {
    deps.stderr(`warning: ${warning.message}`);
  }
  return 0;
}

// ---------------------------------------------------------------------------
// check
// ---------------------------------------------------------------------------

export async function check(deps: CliDeps): Promise<number> {
  await deps.plans.load();
  const counts = {
    valid: deps.plans.validPlans().length,
    invalid: deps.plans.invalidRecords().length,
  };

  const { orchestrator } = createServices(deps);
  const report = await orchestrator.check(counts);

  if (report.engine.available) {
    deps.stdout(`  PASS  engine: ${report.engine.version ?? 'unknown version'}`);
  } else {
    deps.stderr(`  FAIL  engine: ${deps.engine.name} is not reachable`);
    deps.stderr('        Fix: start the container engine and make sure your user can reach it');
    return 1;
  }

  if (report.network.present) {
    deps.stdout(`  PASS  network: ${report.network.name}`);
  } else {
    deps.stderr(`  WARN  network: ${report.network.name} not found`);
    deps.stderr('        Fix: it is created on the next "dwn run"');
  }

  if (report.forwarderImage.present) {
    deps.stdout(`  PASS  forwarder image: ${report.forwarderImage.ref}`);
  } else {
    deps.stderr(`  WARN  forwarder image: ${report.forwarderImage.ref} not found`);
    deps.stderr('        Fix: dwn network build-container');
  }

  deps.stdout(`  ${counts.invalid === 0 ? 'PASS' : 'WARN'}  plans: ${counts.valid} valid, ${counts.invalid} invalid`);

  return report.ok ? 0 : 1;
}

// ---------------------------------------------------------------------------
// plans
// ---------------------------------------------------------------------------

export async function plans(deps: CliDeps, positionals: string[]): Promise<number> {
  const [sub, name] = positionals;
  await deps.plans.load();

  if (sub === 'info') {
    if (!name) return usageError(deps, 'please specify a plan name');
    const plan = deps.plans.getPlan(name);
    deps.stdout(`name         ${plan.name}`);
    deps.stdout(`image        ${plan.image}${plan.dockerfile !== undefined ? ' (built from inline dockerfile)' : ''}`);
    deps.stdout(`command      ${plan.command.join(' ') || '(image default)'}`);
    deps.stdout(`detach       ${plan.detach}`);
    deps.stdout(`tty          ${plan.tty}`);
    for (const m of plan.mounts) {
      deps.stdout(`volume       ${m.hostPath} -> ${m.containerPath} (${m.mode})`);
    }
    for (const p of plan.staticPorts) {
      deps.stdout(`port         ${formatStaticPort(p)}`);
    }
    for (const key of Object.keys(plan.environment).sort()) {
      deps.stdout(`environment  ${key}`);
    }
    if (plan.source) deps.stdout(`source       ${plan.source}`);
    return 0;
  }

  if (sub !== undefined) {
    return usageError(deps, `unknown plans subcommand "${sub}"`);
  }

  const valid = deps.plans.validPlans();
  if (valid.length === 0) deps.stdout('No plans found');
  for (const plan of valid) {
    deps.stdout(`${plan.name}  ${plan.image}`);
  }
  for (const record of deps.plans.invalidRecords()) {
    deps.stderr(`  INVALID  ${record.name}: ${record.errors.join('; ')}`);
  }
  return 0;
}

// ---------------------------------------------------------------------------
// network
// ---------------------------------------------------------------------------

export async function network(deps: CliDeps, positionals: string[]): Promise<number> {
  const [sub, ...rest] = positionals;
  const { binder } = createServices(deps);

  switch (sub) {
    case 'add': {
      const [name, portArg, hostPortArg] = rest;
      if (!name || !portArg || !hostPortArg) {
        return usageError(deps, 'usage: dwn network add <plan> <port>[/proto] <host-port>');
      }
      const target = parsePortArg(portArg);
      const host = parsePortArg(hostPortArg);
      if (!target) return usageError(deps, `invalid container port "${portArg}"`);
      if (!host) return usageError(deps, `invalid host port "${hostPortArg}"`);

      const binding = await binder.addBinding(name, target.port, target.protocol, host.port);
      deps.stdout(
        `Forwarding host port ${binding.hostPort} to ${name}:${binding.containerPort}/${binding.protocol} (${binding.containerName})`,
      );
      return 0;
    }

    case 'remove': {
      const [name, hostPortArg] = rest;
      if (!name || !hostPortArg) {
        return usageError(deps, 'usage: dwn network remove <plan> <host-port>');
      }
      const host = parsePortArg(hostPortArg);
      if (!host) return usageError(deps, `invalid host port "${hostPortArg}"`);

      const removed = await binder.removeBinding(name, host.port);
      deps.stdout(
        removed
          ? `Removed binding for host port ${host.port} of plan "${name}"`
          : `No binding for host port ${host.port} of plan "${name}"`,
      );
      return 0;
    }

    case 'prune': {
      const count = await binder.pruneOrphans();
      deps.stdout(`Removed ${count} orphaned forwarder(s)`);
      return 0;
    }

    case 'build-container': {
      const tag = deps.config.network.forwarder_image;
      deps.stdout(`Building forwarder image ${tag}...`);
      await deps.engine.buildImage({ contextDir: deps.networkContextDir, tag });
      deps.stdout(`Built forwarder image ${tag}`);
      return 0;
    }

    default:
      return usageError(deps, sub ? `unknown network subcommand "${sub}"` : 'please specify a network subcommand');
  }
}
