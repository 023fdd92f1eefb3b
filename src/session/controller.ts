import type { AgentConfig } from '../config.js';
import { SurfaceGoneError } from '../errors.js';
import type { Disposable, TerminalHost } from '../host/index.js';
import { findActiveSession } from './locator.js';

/** Appended to every message so the agent submits it. */
export const INPUT_TERMINATOR = '\n';

/**
 * Where the request left the session: `attached` when an existing agent
 * surface took it, `launching` when a new one had to be started.
 */
export type SessionState = 'launching' | 'attached';

export interface SessionOutcome {
  state: SessionState;
  surfaceId: string;
}

export interface DeliveryOutcome extends SessionOutcome {
  /**
   * Settles with true once the text was written, false if the surface went
   * away first. For a new session this happens after the startup delay.
   */
  delivered: Promise<boolean>;
}

/**
 * Drives the agent session: no-session → launching → attached → closing →
 * no-session.
 *
 * The controller keeps no record of which surface is the session. Every call
 * asks the locator again, and the only per-surface state held here (pending
 * deliveries, focus observers) is dropped when the surface closes.
 */
export class SessionController {
  private readonly pending = new Map<string, AbortController>();
  private readonly focusObservers = new Map<string, Disposable>();

  constructor(
    private readonly host: TerminalHost,
    private readonly agent: Readonly<AgentConfig>,
  ) {}

  findActiveSession(): Promise<string | null> {
    return findActiveSession(this.host, this.agent.processMatch);
  }

  async deliver(text: string): Promise<DeliveryOutcome> {
    const existing = await this.findActiveSession();
    if (existing) {
      const delivered = await this.write(existing, text);
      await this.bringToFront(existing);
      return { state: 'attached', surfaceId: existing, delivered: Promise.resolve(delivered) };
    }

    const surfaceId = await this.launch();
    return { state: 'launching', surfaceId, delivered: this.scheduleDelivery(surfaceId, text) };
  }

  async openOrFocus(): Promise<SessionOutcome> {
    const existing = await this.findActiveSession();
    if (existing) {
      await this.bringToFront(existing);
      return { state: 'attached', surfaceId: existing };
    }
    return { state: 'launching', surfaceId: await this.launch() };
  }

  /**
   * Close the surface whose process `pid` exited. Resolves false when no
   * surface hosts it any more, which makes repeated signals harmless.
   */
  async exit(pid: number): Promise<boolean> {
    const surfaces = await this.host.listSurfaces();
    const surface = surfaces.find((s) => s.pid === pid);
    if (!surface) return false;

    this.release(surface.id);
    await this.host.destroySurface(surface.id);
    return true;
  }

  private async launch(): Promise<string> {
    const surfaceId = await this.host.createSurface();
    const argv = [this.agent.command, ...this.agent.args];

    try {
      await this.host.spawn(surfaceId, argv, {
        onExit: (pid) => {
          // The surface may already be gone, so release by id before locating it.
          this.release(surfaceId);
          this.exit(pid).catch((err) => {
            console.error('[agentline] Failed to close agent session:', err instanceof Error ? err.message : err);
          });
        },
      });
    } catch (err) {
      await this.host.destroySurface(surfaceId);
      throw err;
    }

    this.focusObservers.set(
      surfaceId,
      this.host.onFocusGained(surfaceId, () => this.refocus(surfaceId)),
    );
    await this.bringToFront(surfaceId);
    return surfaceId;
  }

  /** The agent needs a moment after start before it reads input reliably. */
  private scheduleDelivery(surfaceId: string, text: string): Promise<boolean> {
    const abort = new AbortController();
    this.pending.set(surfaceId, abort);

    return new Promise<boolean>((resolve) => {
      const onAbort = (): void => {
        clearTimeout(timer);
        resolve(false);
      };
      const timer = setTimeout(() => {
        abort.signal.removeEventListener('abort', onAbort);
        if (this.pending.get(surfaceId) === abort) this.pending.delete(surfaceId);
        this.write(surfaceId, text).then(resolve, (err) => {
          console.error(`[agentline] Failed to send prompt to ${surfaceId}:`, err instanceof Error ? err.message : err);
          resolve(false);
        });
      }, this.agent.startupDelayMs);
      abort.signal.addEventListener('abort', onAbort, { once: true });
    });
  }

  /** Liveness is checked right before writing; a vanished stream is a no-op. */
  private async write(surfaceId: string, text: string): Promise<boolean> {
    if (!(await this.host.isAttached(surfaceId))) return false;
    try {
      await this.host.send(surfaceId, text + INPUT_TERMINATOR);
      return true;
    } catch (err) {
      if (err instanceof SurfaceGoneError) return false;
      throw err;
    }
  }

  private async bringToFront(surfaceId: string): Promise<void> {
    try {
      await this.host.focus(surfaceId);
      await this.host.requestInput(surfaceId);
    } catch (err) {
      if (err instanceof SurfaceGoneError) return;
      throw err;
    }
  }

  private refocus(surfaceId: string): void {
    this.host
      .isAttached(surfaceId)
      .then((attached) => (attached ? this.host.requestInput(surfaceId) : undefined))
      .catch((err) => {
        if (err instanceof SurfaceGoneError) return;
        console.warn(`[agentline] Could not focus ${surfaceId}:`, err instanceof Error ? err.message : err);
      });
  }

  private release(surfaceId: string): void {
    this.pending.get(surfaceId)?.abort();
    this.pending.delete(surfaceId);
    this.focusObservers.get(surfaceId)?.dispose();
    this.focusObservers.delete(surfaceId);
  }
}
