/**
 * Centralized Path Definitions
 *
 * ~/.docr/
 * └── config.toml     (User configuration)
 *
 * DOCR_HOME relocates the directory.
 */

import { join } from 'node:path';
import { homedir } from 'node:os';

export const DOCR_DIR = process.env.DOCR_HOME ?? join(homedir(), '.docr');
export const CONFIG_PATH = join(DOCR_DIR, 'config.toml');

export function getDocrDir(): string {
  return DOCR_DIR;
}

export function getConfigPath(): string {
  return CONFIG_PATH;
}
