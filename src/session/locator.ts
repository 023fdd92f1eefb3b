import type { TerminalHost } from '../host/index.js';

/**
 * Find the surface currently running the agent, or null.
 *
 * Nothing is cached: surfaces and the process table are read fresh on every
 * call, so a pane closed or a process killed behind our back is never
 * reported. With several matches the first in host order wins.
 */
export async function findActiveSession(
  host: Pick<TerminalHost, 'listSurfaces' | 'processName'>,
  processMatch: string,
): Promise<string | null> {
  const surfaces = await host.listSurfaces();

  for (const surface of surfaces) {
    if (surface.pid === null || surface.dead) continue;
    // The process may exit between listing and lookup; that is not a match.
    const name = await host.processName(surface.pid).catch(() => null);
    if (name !== null && name.includes(processMatch)) {
      return surface.id;
    }
  }
  return null;
}
