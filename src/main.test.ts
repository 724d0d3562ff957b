/**
 * Tests for main() entry point.
 *
 * main() is a thin wiring layer that parses args, loads configuration,
 * creates real CliDeps, calls runCommand, and returns the exit code.
 */

import { describe, it, expect, vi, afterEach, beforeEach } from 'vitest';
import { main } from './main.js';

// Mock cli.ts to intercept runCommand calls
vi.mock('./cli.js', async () => {
  const actual = await vi.importActual<typeof import('./cli.js')>('./cli.js');
  return {
    ...actual,
    runCommand: vi.fn().mockResolvedValue(0),
  };
});

// Keep main() away from the real home directory
vi.mock('./core/config-loader.js', async () => {
  const { DEFAULT_CONFIG } = await vi.importActual<typeof import('./types/config.js')>('./types/config.js');
  return {
    initialize: vi.fn(() => ({
      config: structuredClone(DEFAULT_CONFIG),
      dirs: {
        root: '/tmp/dwn-test-home',
        plans: '/tmp/dwn-test-home/plans',
        configFile: '/tmp/dwn-test-home/config.toml',
      },
    })),
  };
});

import { runCommand } from './cli.js';
import type { CliDeps } from './cli.js';
import { initialize } from './core/config-loader.js';
import { PlanLoader } from './core/plan-loader.js';

function lastDeps(): CliDeps {
  const call = vi.mocked(runCommand).mock.calls.at(-1);
  if (!call) throw new Error('runCommand was not called');
  return call[1];
}

describe('main', () => {
  const originalHome = process.env['DWN_HOME'];

  beforeEach(() => {
    process.env['DWN_HOME'] = '/tmp/dwn-test-home';
  });

  afterEach(() => {
    vi.clearAllMocks();
    vi.restoreAllMocks();
    if (originalHome !== undefined) {
      process.env['DWN_HOME'] = originalHome;
    } else {
      delete process.env['DWN_HOME'];
    }
  });

  it('calls runCommand with the parsed command and returns its exit code', async () => {
    const code = await main(['node', 'dwn', 'stop', 'web', '--yes']);

    expect(runCommand).toHaveBeenCalledWith('stop', expect.any(Object), { yes: true }, ['web']);
    expect(initialize).toHaveBeenCalledWith('/tmp/dwn-test-home');
    expect(code).toBe(0);
  });

  it('wires the Docker engine, config and plan loader', async () => {
    await main(['node', 'dwn', 'show']);

    const deps = lastDeps();
    expect(deps.home).toBe('/tmp/dwn-test-home');
    expect(deps.engine.name).toBe('docker');
    expect(deps.config.network.name).toBe('dwn');
    expect(deps.plans).toBeInstanceOf(PlanLoader);
    expect(deps.networkContextDir).toMatch(/assets\/network\/$/);
  });

  it('passes --version through as command', async () => {
    await main(['node', 'dwn', '--version']);
    expect(runCommand).toHaveBeenCalledWith('--version', expect.any(Object), { version: true }, []);
  });

  it('turns --help into the help command', async () => {
    await main(['node', 'dwn', 'network', '-h']);
    expect(runCommand).toHaveBeenCalledWith('--help', expect.any(Object), { help: true }, []);
  });

  it('returns non-zero exit code on failure', async () => {
    vi.mocked(runCommand).mockResolvedValueOnce(1);
    expect(await main(['node', 'dwn', 'bogus'])).toBe(1);
  });

  it('reports an invalid configuration without running the command', async () => {
    const write = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
    vi.mocked(initialize).mockImplementationOnce(() => {
      throw new Error('[engine] must be a table');
    });

    expect(await main(['node', 'dwn', 'show'])).toBe(1);
    expect(runCommand).not.toHaveBeenCalled();
    expect(write).toHaveBeenCalledWith('error: invalid configuration in /tmp/dwn-test-home: [engine] must be a table\n');
  });
});
