import { createInterface, emitKeypressEvents, type Key } from 'node:readline';

export interface InputRequest {
  label: string;
  defaultText: string;
  /** Candidate lines for the text typed so far. */
  complete: (line: string) => string[];
}

/** A modal text input. Resolves null when the user cancels. */
export interface PromptInput {
  read(request: InputRequest): Promise<string | null>;
}

/**
 * Single-line input on a terminal. Enter confirms, Escape or Ctrl-C cancels,
 * Tab completes placeholders.
 */
export class ReadlineInput implements PromptInput {
  constructor(
    private readonly input: NodeJS.ReadStream = process.stdin,
    private readonly output: NodeJS.WritableStream = process.stderr,
  ) {}

  read({ label, defaultText, complete }: InputRequest): Promise<string | null> {
    return new Promise((resolve) => {
      const rl = createInterface({
        input: this.input,
        output: this.output,
        terminal: true,
        completer: (line: string): [string[], string] => [complete(line), line],
      });

      let settled = false;
      const finish = (value: string | null): void => {
        if (settled) return;
        settled = true;
        this.input.off('keypress', onKeypress);
        rl.close();
        resolve(value);
      };
      const onKeypress = (_chunk: string | undefined, key: Key | undefined): void => {
        if (key?.name === 'escape') finish(null);
      };

      emitKeypressEvents(this.input, rl);
      this.input.on('keypress', onKeypress);
      rl.on('SIGINT', () => finish(null));
      rl.on('close', () => finish(null));
      rl.question(label, (answer) => finish(answer));
      rl.write(defaultText);
    });
  }
}
