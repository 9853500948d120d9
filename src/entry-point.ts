import { realpathSync } from 'fs';
import { fileURLToPath } from 'url';

function resolveReal(path: string): string | undefined {
  try {
    return realpathSync(path);
  } catch {
    return undefined;
  }
}

/**
 * Whether the module at `moduleUrl` is the script node was started with.
 * Both sides go through realpath, so an npm bin symlink (whatever its name)
 * counts as the module itself.
 */
export function isEntryPoint(moduleUrl: string, scriptPath: string | undefined = process.argv[1]): boolean {
  if (!scriptPath) return false;
  const script = resolveReal(scriptPath);
  return script !== undefined && script === resolveReal(fileURLToPath(moduleUrl));
}
