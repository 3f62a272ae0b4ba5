import path from 'path';
import os from 'os';

/**
 * Base directory for pinned-region state on disk.
 *
 * Override with `PINNED_REGION_HOME` (useful for sandboxes/tests/portable installs).
 * Default: `~/.pinned-region`
 */
export function getAppHomeDir(): string {
  const override = process.env.PINNED_REGION_HOME?.trim();
  if (override) return override;
  return path.join(os.homedir(), '.pinned-region');
}

export function getConfigFile(): string {
  return path.join(getAppHomeDir(), 'config.json');
}
