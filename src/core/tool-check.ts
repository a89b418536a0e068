/**
 * Tool availability probe
 *
 * Resolves whether an analyzer binary is on PATH without running it.
 * Results are cached per command for the life of the process.
 */

import { execa } from 'execa';

const availabilityCache = new Map<string, Promise<boolean>>();

/**
 * Check if a command is installed (`which` on POSIX, `where` on Windows)
 */
export function isToolAvailable(command: string): Promise<boolean> {
  const cached = availabilityCache.get(command);
  if (cached) {
    return cached;
  }

  const probe = (async () => {
    const locator = process.platform === 'win32' ? 'where' : 'which';
    try {
      const { exitCode } = await execa(locator, [command], { reject: false, stdin: 'ignore' });
      return exitCode === 0;
    } catch {
      // Locator itself missing: treat the tool as unavailable
      return false;
    }
  })();

  availabilityCache.set(command, probe);
  return probe;
}

export function clearAvailabilityCache(): void {
  availabilityCache.clear();
}
