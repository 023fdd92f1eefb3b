import { randomUUID } from 'node:crypto';
import type { EditorState } from '../context/extractor.js';
import type { SelectionAnchors } from '../context/range.js';
import { SurfaceGoneError } from '../errors.js';
import { execRunner, type CommandResult, type CommandRunner } from './exec.js';
import type { Disposable, SpawnOptions, SurfaceInfo, TerminalHost } from './index.js';

/** How often a launched pane is checked for having been closed from outside. */
export const PANE_POLL_INTERVAL_MS = 1000;

/**
 * tmux reads a `;` ending an argument as a command separator, and `\;` as an
 * escaped `;`. Escaping the final `;` makes tmux hand back the text unchanged.
 */
export function escapeTrailingSemicolon(text: string): string {
  return text.endsWith(';') ? `${text.slice(0, -1)}\\;` : text;
}

export interface TmuxHostOptions {
  editor: EditorState;
  selection?: SelectionAnchors | null;
  runner?: CommandRunner;
  pollIntervalMs?: number;
}

/**
 * Host backed by a tmux server (3.2 or newer for per-pane hooks).
 *
 * Surfaces are panes. Exit and focus notifications travel through
 * `tmux wait-for` channels that per-pane hooks signal, so the observers only
 * fire while this process is still running. `pane-died` does not fire for a
 * pane killed from outside, so launched panes are also polled until they go.
 */
export class TmuxHost implements TerminalHost {
  private readonly editor: EditorState;
  private readonly selection: SelectionAnchors | null;
  private readonly runner: CommandRunner;
  private readonly pollIntervalMs: number;

  constructor(options: TmuxHostOptions) {
    this.editor = options.editor;
    this.selection = options.selection ?? null;
    this.runner = options.runner ?? execRunner;
    this.pollIntervalMs = options.pollIntervalMs ?? PANE_POLL_INTERVAL_MS;
  }

  editorState(): EditorState {
    return this.editor;
  }

  selectionAnchors(): SelectionAnchors | null {
    return this.selection;
  }

  async listSurfaces(): Promise<SurfaceInfo[]> {
    const r = await this.tmux('list-panes', '-a', '-F', '#{pane_id}\t#{pane_pid}\t#{pane_dead}');
    // No server running means no panes.
    if (r.code !== 0) return [];

    const surfaces: SurfaceInfo[] = [];
    for (const line of r.stdout.split('\n')) {
      const [id, pid, dead] = line.trim().split('\t');
      if (!id) continue;
      const parsed = Number(pid);
      surfaces.push({
        id,
        pid: Number.isInteger(parsed) && parsed > 0 ? parsed : null,
        dead: dead === '1',
      });
    }
    return surfaces;
  }

  async processName(pid: number): Promise<string | null> {
    const r = await this.runner('ps', ['-p', String(pid), '-o', 'comm=']);
    if (r.code !== 0) return null;
    const name = r.stdout.trim();
    return name || null;
  }

  async createSurface(): Promise<string> {
    const r = await this.tmux('split-window', '-h', '-f', '-P', '-F', '#{pane_id}', '-c', this.editor.cwd);
    const paneId = r.stdout.trim();
    if (r.code !== 0 || !paneId) {
      throw new Error(`tmux split-window failed: ${r.stderr.trim() || `exit code ${r.code}`}`);
    }
    return paneId;
  }

  async spawn(surfaceId: string, argv: readonly string[], options: SpawnOptions): Promise<number> {
    const channel = this.channel('exit', surfaceId);

    // pane-died only fires for panes that remain on exit. The hook closes the
    // pane itself so nothing is left behind when no observer is running.
    await this.expect(surfaceId, 'set-option', '-p', '-t', surfaceId, 'remain-on-exit', 'on');
    await this.expect(
      surfaceId,
      'set-hook', '-p', '-t', surfaceId, 'pane-died', `wait-for -S ${channel} ; kill-pane -t ${surfaceId}`,
    );

    const respawn = await this.tmux('respawn-pane', '-k', '-t', surfaceId, ...argv);
    if (respawn.code !== 0) {
      throw new Error(`Failed to start ${argv.join(' ')}: ${respawn.stderr.trim() || `exit code ${respawn.code}`}`);
    }

    const r = await this.tmux('display-message', '-p', '-t', surfaceId, '#{pane_pid}');
    const pid = Number(r.stdout.trim());
    if (r.code !== 0 || !Number.isInteger(pid) || pid <= 0) {
      throw new SurfaceGoneError(surfaceId);
    }

    const stopPolling = this.pollUntilGone(surfaceId, channel);
    this.tmux('wait-for', channel).then(
      () => {
        stopPolling();
        options.onExit(pid);
      },
      (err) => {
        stopPolling();
        console.error(`[agentline] Lost exit watcher for ${surfaceId}:`, err instanceof Error ? err.message : err);
      },
    );
    return pid;
  }

  async isAttached(surfaceId: string): Promise<boolean> {
    const r = await this.tmux('display-message', '-p', '-t', surfaceId, '#{pane_dead}');
    return r.code === 0 && r.stdout.trim() === '0';
  }

  async send(surfaceId: string, text: string): Promise<void> {
    const submit = text.endsWith('\n');
    const body = submit ? text.slice(0, -1) : text;
    if (body) {
      await this.expect(surfaceId, 'send-keys', '-t', surfaceId, '-l', '--', escapeTrailingSemicolon(body));
    }
    if (submit) {
      await this.expect(surfaceId, 'send-keys', '-t', surfaceId, 'Enter');
    }
  }

  async focus(surfaceId: string): Promise<void> {
    await this.expect(surfaceId, 'select-window', '-t', surfaceId);
    await this.expect(surfaceId, 'select-pane', '-t', surfaceId);
  }

  async requestInput(surfaceId: string): Promise<void> {
    const r = await this.tmux('display-message', '-p', '-t', surfaceId, '#{pane_in_mode}');
    if (r.code !== 0) throw new SurfaceGoneError(surfaceId);
    // Copy mode swallows keystrokes.
    if (r.stdout.trim() === '1') {
      await this.expect(surfaceId, 'send-keys', '-t', surfaceId, '-X', 'cancel');
    }
  }

  onFocusGained(surfaceId: string, listener: () => void): Disposable {
    const channel = this.channel('focus', surfaceId);
    let active = true;

    const watch = async (): Promise<void> => {
      await this.expect(surfaceId, 'set-hook', '-p', '-t', surfaceId, 'pane-focus-in', `wait-for -S ${channel}`);
      while (active) {
        const r = await this.tmux('wait-for', channel);
        if (!active || r.code !== 0) return;
        listener();
      }
    };
    watch().catch((err) => {
      if (err instanceof SurfaceGoneError) return;
      console.warn(`[agentline] Focus observer for ${surfaceId} stopped:`, err instanceof Error ? err.message : err);
    });

    return {
      dispose: () => {
        if (!active) return;
        active = false;
        // Wake the pending wait-for so the loop can see it was disposed.
        this.tmux('wait-for', '-S', channel).catch((err) => {
          console.warn(`[agentline] Could not release focus observer for ${surfaceId}:`, err instanceof Error ? err.message : err);
        });
      },
    };
  }

  async destroySurface(surfaceId: string): Promise<void> {
    // A non-zero exit means the pane is already gone.
    await this.tmux('kill-pane', '-t', surfaceId);
  }

  /** Signal the exit channel once the pane no longer exists. */
  private pollUntilGone(surfaceId: string, channel: string): () => void {
    let stopped = false;
    let timer: NodeJS.Timeout | undefined;

    const check = async (): Promise<void> => {
      const r = await this.tmux('display-message', '-p', '-t', surfaceId, '#{pane_id}');
      if (stopped) return;
      if (r.code === 0) {
        timer = setTimeout(tick, this.pollIntervalMs);
        return;
      }
      await this.tmux('wait-for', '-S', channel);
    };
    const tick = (): void => {
      check().catch((err) => {
        console.warn(`[agentline] Stopped watching ${surfaceId}:`, err instanceof Error ? err.message : err);
      });
    };

    timer = setTimeout(tick, this.pollIntervalMs);
    return () => {
      stopped = true;
      clearTimeout(timer);
    };
  }

  private tmux(...args: string[]): Promise<CommandResult> {
    return this.runner('tmux', args);
  }

  /** Run a tmux command against a pane; any failure means the pane is gone. */
  private async expect(surfaceId: string, ...args: string[]): Promise<CommandResult> {
    const r = await this.tmux(...args);
    if (r.code !== 0) throw new SurfaceGoneError(surfaceId);
    return r;
  }

  private channel(kind: 'exit' | 'focus', surfaceId: string): string {
    return `agentline-${kind}-${surfaceId.replace(/\W/g, '')}-${randomUUID().slice(0, 8)}`;
  }
}
