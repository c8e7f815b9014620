import { realpathSync } from 'fs';
import { pathToFileURL } from 'url';

/**
 * True when the module at `moduleUrl` is the script node was started with,
 * following the symlinks npm puts in node_modules/.bin.
 */
export function isEntrypoint(moduleUrl: string): boolean {
  const entry = process.argv[1];
  if (!entry) return false;
  try {
    return pathToFileURL(realpathSync(entry)).href === moduleUrl;
  } catch {
    return false;
  }
}
