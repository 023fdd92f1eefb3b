import { displayPath } from '../paths.js';
import type { LocationRange } from './range.js';

export interface EditorState {
  /** Absent for buffers that have no file yet. */
  filePath?: string;
  cursorLine: number;
  cwd: string;
}

/**
 * Editor state captured for a single request. The range belongs to that
 * request only; build a new context for the next one.
 */
export class EditorContext {
  constructor(
    private readonly state: EditorState,
    readonly range?: LocationRange,
  ) {}

  private path(): string | undefined {
    const { filePath, cwd } = this.state;
    if (!filePath) return undefined;
    return displayPath(cwd, filePath);
  }

  buffer(): string | undefined {
    const path = this.path();
    return path === undefined ? undefined : `@${path}`;
  }

  cursor(): string | undefined {
    const path = this.path();
    return path === undefined ? undefined : `@${path}:${this.state.cursorLine}`;
  }

  selection(): string | undefined {
    const path = this.path();
    if (!this.range || path === undefined) return undefined;
    const { start, end } = this.range;
    return start === end ? `@${path}:${start}` : `@${path}:${start}-${end}`;
  }

  /** Selection when there is one, cursor otherwise. */
  this(): string | undefined {
    return this.selection() ?? this.cursor();
  }
}
