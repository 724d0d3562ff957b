/**
 * TOML-based configuration loader for dwn.
 *
 * Reads `config.toml` from `$DWN_HOME`, parses it with smol-toml, validates
 * it, and returns a fully typed `DwnConfig`. Also provides `initialize()`,
 * which sets up everything a command needs at startup.
 */

import { parse as parseTOML } from 'smol-toml';
import { existsSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import { parseConfig, ensureDirectoryStructure, DEFAULT_CONFIG } from '../types/config.js';
import type { DwnConfig, DirectoryStructure } from '../types/config.js';

// ---------------------------------------------------------------------------
// loadConfig()
// ---------------------------------------------------------------------------

/**
 * Load and validate `config.toml` from a dwn home directory.
 *
 * If `config.toml` does not exist or is empty, returns `DEFAULT_CONFIG`.
 * Throws on invalid TOML syntax or invalid values.
 */
export function loadConfig(home: string): DwnConfig {
  const configPath = join(home, 'config.toml');

  if (!existsSync(configPath)) {
    return structuredClone(DEFAULT_CONFIG);
  }

  const content = readFileSync(configPath, 'utf-8');
  if (content.trim().length === 0) {
    return structuredClone(DEFAULT_CONFIG);
  }

  return parseConfig(parseTOML(content));
}

// ---------------------------------------------------------------------------
// initialize()
// ---------------------------------------------------------------------------

/** Result of `initialize()`. */
export interface InitResult {
  config: DwnConfig;
  dirs: DirectoryStructure;
}

/**
 * Initialize a dwn home directory: ensure `plans/` exists, then load
 * `config.toml` (or the defaults). Safe to call on every invocation.
 */
export function initialize(home: string): InitResult {
  const dirs = ensureDirectoryStructure(home);
  const config = loadConfig(home);

  return { config, dirs };
}
