import { resolve } from 'node:path';
import { Agentline } from './bridge.js';
import { loadConfig, resolveConfig, type AgentlineConfig } from './config.js';
import type { SelectionAnchors } from './context/range.js';
import type { CommandRunner } from './host/exec.js';
import { TmuxHost } from './host/tmux.js';
import { renderKeymaps } from './keymaps.js';
import { completePlaceholders } from './render/completion.js';
import { buildRegistry } from './render/placeholders.js';
import type { DeliveryOutcome, SessionOutcome } from './session/controller.js';

export interface ConfigOptions {
  config: string;
  cwd: string;
}

export interface EditorOptions extends ConfigOptions {
  file?: string;
  line: number;
  selection?: SelectionAnchors;
}

export function readConfig(opts: ConfigOptions): Readonly<AgentlineConfig> {
  return resolveConfig(loadConfig(resolve(opts.cwd, opts.config)));
}

export function createAgentline(opts: EditorOptions, runner?: CommandRunner): Agentline {
  const cwd = resolve(opts.cwd);
  const host = new TmuxHost({
    editor: { filePath: opts.file, cursorLine: opts.line, cwd },
    selection: opts.selection ?? null,
    runner,
  });
  return new Agentline(readConfig(opts), host);
}

export async function runPrompt(text: string, opts: EditorOptions): Promise<void> {
  const app = createAgentline(opts);
  await report(await app.prompt(text, app.getSelectionRange() ?? undefined));
}

export async function runAsk(defaultText: string | undefined, opts: EditorOptions): Promise<void> {
  const app = createAgentline(opts);
  await report(await app.ask(defaultText, app.getSelectionRange() ?? undefined));
}

export async function runOpen(opts: EditorOptions): Promise<void> {
  const app = createAgentline(opts);
  await report(await app.openOrFocusSession());
}

export function runRange(opts: EditorOptions): void {
  const range = createAgentline(opts).getSelectionRange();
  if (!range) {
    process.exitCode = 1;
    return;
  }
  console.log(`${range.start}-${range.end}`);
}

export function runComplete(line: string, opts: ConfigOptions): void {
  const registry = buildRegistry(readConfig(opts).placeholders);
  for (const candidate of completePlaceholders(line, registry.keys())) {
    console.log(candidate);
  }
}

export function runKeymaps(opts: ConfigOptions & { executable: string }): void {
  process.stdout.write(renderKeymaps(readConfig(opts), opts.executable));
}

/** A launched session keeps this process alive as its exit observer. */
async function report(outcome: DeliveryOutcome | SessionOutcome | null): Promise<void> {
  if (!outcome) return;
  if (outcome.state === 'launching') {
    console.log(`[agentline] Started agent in ${outcome.surfaceId}`);
  }
  if ('delivered' in outcome) {
    await outcome.delivered;
  }
}
