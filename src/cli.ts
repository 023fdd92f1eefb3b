#!/usr/bin/env node
import { Command, InvalidArgumentError } from 'commander';
import type { SelectionAnchors } from './context/range.js';

interface CliEditorOptions {
  config: string;
  cwd: string;
  file?: string;
  line: number;
  selection?: SelectionAnchors;
}

function parseLine(value: string): number {
  const line = Number(value);
  if (!Number.isInteger(line) || line < 1) {
    throw new InvalidArgumentError('Expected a line number (1 or greater).');
  }
  return line;
}

function parseSelection(value: string): SelectionAnchors {
  const match = value.match(/^(\d+)\s*[,-]\s*(\d+)$/);
  if (!match) {
    throw new InvalidArgumentError('Expected <anchor>,<cursor> line numbers, e.g. 12,30.');
  }
  return { anchor: parseLine(match[1] ?? ''), cursor: parseLine(match[2] ?? '') };
}

function withConfig(command: Command): Command {
  return command
    .option('-c, --config <path>', 'Path to agentline.toml config file', 'agentline.toml')
    .option('--cwd <dir>', 'Editor working directory', process.cwd());
}

function withEditor(command: Command): Command {
  return withConfig(command)
    .option('-f, --file <path>', 'File in the current buffer')
    .option('-l, --line <n>', 'Cursor line', parseLine, 1)
    .option('-s, --selection <anchor,cursor>', 'Visual selection anchor and cursor lines', parseSelection);
}

const program = new Command();

program
  .name('agentline')
  .description('Send prompts with editor context to an interactive AI agent running in tmux')
  .version('0.1.0');

withEditor(program.command('prompt'))
  .description('Render placeholders and send the prompt to the agent session')
  .argument('<text...>', 'Prompt text, may contain @buffer, @cursor, @selection, @this')
  .action(async (text: string[], opts: CliEditorOptions) => {
    const { runPrompt } = await import('./commands.js');
    await runPrompt(text.join(' '), opts);
  });

withEditor(program.command('ask'))
  .description('Read a prompt interactively, then send it')
  .argument('[default]', 'Text to prefill')
  .action(async (defaultText: string | undefined, opts: CliEditorOptions) => {
    const { runAsk } = await import('./commands.js');
    await runAsk(defaultText, opts);
  });

withEditor(program.command('open'))
  .description('Focus the agent session, starting one if none is running')
  .action(async (opts: CliEditorOptions) => {
    const { runOpen } = await import('./commands.js');
    await runOpen(opts);
  });

withEditor(program.command('range'))
  .description('Print the normalized selection range as <start>-<end>')
  .action(async (opts: CliEditorOptions) => {
    const { runRange } = await import('./commands.js');
    runRange(opts);
  });

withConfig(program.command('complete'))
  .description('Print completions for the placeholder at the end of a line')
  .argument('<line>', 'Input line typed so far')
  .action(async (line: string, opts: { config: string; cwd: string }) => {
    const { runComplete } = await import('./commands.js');
    runComplete(line, opts);
  });

withConfig(program.command('keymaps'))
  .description('Print Neovim keymaps that call this CLI')
  .option('--executable <path>', 'Command the keymaps should run', 'agentline')
  .action(async (opts: { config: string; cwd: string; executable: string }) => {
    const { runKeymaps } = await import('./commands.js');
    runKeymaps(opts);
  });

program.parseAsync().catch((err: unknown) => {
  console.error(`[agentline] ${err instanceof Error ? err.message : String(err)}`);
  process.exitCode = 1;
});
