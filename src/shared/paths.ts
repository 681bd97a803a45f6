/**
 * STL Relay: Path Constants
 *
 * All paths to relay runtime files. Uses path.join() for cross-platform support.
 */

import * as path from 'node:path';
import * as os from 'node:os';

/** ~/.stl-relay/ */
export const RELAY_HOME = path.join(os.homedir(), '.stl-relay');

export const PATHS = {
  home: RELAY_HOME,

  // Configuration
  config: path.join(RELAY_HOME, 'config.json'),

  // Decoded images waiting for the converter
  work: path.join(RELAY_HOME, 'work'),
} as const;

const YAML_EXTENSIONS = new Set(['.yaml', '.yml']);

/**
 * Whether a config path should be read as YAML rather than JSON.
 */
export function isYamlPath(filePath: string): boolean {
  return YAML_EXTENSIONS.has(path.extname(filePath).toLowerCase());
}
