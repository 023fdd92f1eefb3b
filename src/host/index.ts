import type { EditorState } from '../context/extractor.js';
import type { SelectionSource } from '../context/range.js';

export interface SurfaceInfo {
  id: string;
  /** Process attached to the surface, null when it hosts none. */
  pid: number | null;
  /** The attached process has exited but the surface is still open. */
  dead: boolean;
}

export interface SpawnOptions {
  onExit: (pid: number) => void;
}

export interface Disposable {
  dispose(): void;
}

/**
 * Everything the session controller needs from the editor/terminal it runs
 * in. Methods that act on a surface which is already gone either do nothing
 * (`destroySurface`) or throw `SurfaceGoneError`.
 */
export interface TerminalHost extends SelectionSource {
  editorState(): EditorState;
  /** Open surfaces in host order. */
  listSurfaces(): Promise<SurfaceInfo[]>;
  /** Program name from the live process table, null if the process is gone. */
  processName(pid: number): Promise<string | null>;
  createSurface(): Promise<string>;
  /** Run `argv` attached to the surface. Resolves with the process id. */
  spawn(surfaceId: string, argv: readonly string[], options: SpawnOptions): Promise<number>;
  /** True while the surface exists and its process is running. */
  isAttached(surfaceId: string): Promise<boolean>;
  /** Write to the attached process. A trailing newline submits the input. */
  send(surfaceId: string, text: string): Promise<void>;
  focus(surfaceId: string): Promise<void>;
  /** Put the surface in a state where keystrokes reach the process. */
  requestInput(surfaceId: string): Promise<void>;
  onFocusGained(surfaceId: string, listener: () => void): Disposable;
  destroySurface(surfaceId: string): Promise<void>;
}
