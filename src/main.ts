#!/usr/bin/env node
/**
 * Production entry point for dwn.
 *
 * Wires real dependencies (config, Docker CLI engine, plan directories,
 * terminal prompts) into CliDeps and dispatches to the CLI command handler.
 *
 * Usage:
 *   dwn run nginx
 *   dwn network add nginx 80 9000
 *   dwn stop nginx --yes
 */

import { fileURLToPath } from 'node:url';
import { createInterface } from 'node:readline';

import { parseArgs, runCommand } from './cli.js';
import type { CliDeps } from './cli.js';
import { resolveHome } from './types/config.js';
import { initialize, type InitResult } from './core/config-loader.js';
import { DockerEngine } from './core/engine/docker-engine.js';
import { BUNDLED_PLANS_DIR, PlanLoader, expandHostPath } from './core/plan-loader.js';
import { configureLogging, isLogLevel, stderrSink, type LogLevel } from './core/logger.js';
import { errorMessage } from './core/dwn-error.js';

/** Build context of the forwarder image, next to the package root. */
const NETWORK_CONTEXT_DIR = fileURLToPath(new URL('../assets/network/', import.meta.url));

// ---------------------------------------------------------------------------
// Readline helpers
// ---------------------------------------------------------------------------

async function promptString(prompt: string): Promise<string> {
  const rl = createInterface({ input: process.stdin, output: process.stdout });
  return new Promise((resolve) => {
    rl.question(prompt, (answer) => {
      rl.close();
      resolve(answer);
    });
  });
}

async function confirm(prompt: string): Promise<boolean> {
  const answer = await promptString(`${prompt} (y/N) `);
  return answer.toLowerCase() === 'y' || answer.toLowerCase() === 'yes';
}

// ---------------------------------------------------------------------------
// Logging
// ---------------------------------------------------------------------------

function resolveLogLevel(debug: boolean): LogLevel {
  if (debug) return 'debug';
  const fromEnv = process.env['DWN_LOG_LEVEL'];
  return fromEnv !== undefined && isLogLevel(fromEnv) ? fromEnv : 'warn';
}

// ---------------------------------------------------------------------------
// main()
// ---------------------------------------------------------------------------

/**
 * Production main(): wires real deps and dispatches commands.
 *
 * @param argv - Process arguments (defaults to process.argv).
 * @returns Exit code (0 = success, non-zero = failure).
 */
export async function main(argv: string[] = process.argv): Promise<number> {
  const { command: parsedCommand, flags, positionals } = parseArgs(argv);

  // Command output goes to stdout; structured logs stay on stderr.
  configureLogging({ level: resolveLogLevel(flags['debug'] === true), sink: stderrSink });

  // Translate flags to pseudo-commands for runCommand compatibility
  let command = parsedCommand;
  if (!command && flags['version']) {
    command = '--version';
  } else if (flags['help']) {
    command = '--help';
  }

  const home = resolveHome();
  let init: InitResult;
  try {
    init = initialize(home);
  } catch (err) {
    process.stderr.write(`error: invalid configuration in ${home}: ${errorMessage(err)}\n`);
    return 1;
  }
  const { config, dirs } = init;

  const plans = new PlanLoader({
    dirs: [BUNDLED_PLANS_DIR, dirs.plans, ...config.plans.dirs.map((d) => expandHostPath(d))],
  });

  // Ctrl-C during an attached run detaches instead of killing dwn outright.
  const controller = new AbortController();
  if (command === 'run') {
    process.once('SIGINT', () => controller.abort());
  }

  const deps: CliDeps = {
    stdout: (msg: string) => process.stdout.write(`${msg}\n`),
    stderr: (msg: string) => process.stderr.write(`${msg}\n`),
    home,
    config,
    engine: new DockerEngine({ dockerPath: config.engine.binary }),
    plans,
    confirm,
    networkContextDir: NETWORK_CONTEXT_DIR,
    signal: controller.signal,
  };

  return runCommand(command, deps, flags, positionals);
}

// ---------------------------------------------------------------------------
// Entry point, run when executed directly
// ---------------------------------------------------------------------------

/* c8 ignore next 3 */
main().then((code) => {
  process.exitCode = code;
});
