import { basename } from 'node:path';
import type { AgentlineConfig } from './config.js';
import { EditorContext } from './context/extractor.js';
import { getSelectionRange, type LocationRange } from './context/range.js';
import type { TerminalHost } from './host/index.js';
import { ReadlineInput, type PromptInput } from './input.js';
import { completePlaceholders } from './render/completion.js';
import { renderPrompt } from './render/index.js';
import { buildRegistry, type PlaceholderRegistry } from './render/placeholders.js';
import { SessionController, type DeliveryOutcome, type SessionOutcome } from './session/controller.js';

/** The operations an editor binding calls. */
export class Agentline {
  readonly registry: PlaceholderRegistry;
  readonly sessions: SessionController;

  constructor(
    private readonly config: Readonly<AgentlineConfig>,
    private readonly host: TerminalHost,
    private readonly input: PromptInput = new ReadlineInput(),
  ) {
    this.registry = buildRegistry(config.placeholders);
    this.sessions = new SessionController(host, config.agent);
  }

  render(text: string, range?: LocationRange): string {
    const ctx = new EditorContext(this.host.editorState(), range);
    return renderPrompt(text, this.registry, ctx);
  }

  complete(line: string): string[] {
    return completePlaceholders(line, this.registry.keys());
  }

  /** Render and send. A prompt that renders blank is dropped; resolves null. */
  async prompt(text: string, range?: LocationRange): Promise<DeliveryOutcome | null> {
    const rendered = this.render(text, range);
    if (rendered.trim() === '') return null;
    return this.sessions.deliver(rendered);
  }

  /** Ask for the prompt first. Cancelling resolves null without touching the session. */
  async ask(defaultText = '', range?: LocationRange): Promise<DeliveryOutcome | null> {
    const text = await this.input.read({
      label: `Ask ${basename(this.config.agent.command)}: `,
      defaultText,
      complete: (line) => this.complete(line),
    });
    if (!text) return null;
    return this.prompt(text, range);
  }

  openOrFocusSession(): Promise<SessionOutcome> {
    return this.sessions.openOrFocus();
  }

  getSelectionRange(): LocationRange | null {
    return getSelectionRange(this.host);
  }
}
