export { Agentline } from './bridge.js';
export {
  resolveConfig,
  loadConfig,
  parseConfigLayer,
  type AgentConfig,
  type AgentlineConfig,
  type ConfigLayer,
} from './config.js';
export { EditorContext, type EditorState } from './context/extractor.js';
export {
  getSelectionRange,
  normalizeRange,
  parseRange,
  type LocationRange,
  type SelectionAnchors,
} from './context/range.js';
export { ConfigError, SurfaceGoneError } from './errors.js';
export type { Disposable, SpawnOptions, SurfaceInfo, TerminalHost } from './host/index.js';
export { TmuxHost, type TmuxHostOptions } from './host/tmux.js';
export { execRunner, type CommandResult, type CommandRunner } from './host/exec.js';
export { ReadlineInput, type InputRequest, type PromptInput } from './input.js';
export { renderKeymaps } from './keymaps.js';
export { completePlaceholders } from './render/completion.js';
export { renderPrompt } from './render/index.js';
export {
  buildRegistry,
  DEFAULT_PLACEHOLDERS,
  type PlaceholderEntry,
  type PlaceholderKind,
  type PlaceholderRegistry,
  type PlaceholderResolver,
} from './render/placeholders.js';
export { findActiveSession } from './session/locator.js';
export {
  SessionController,
  INPUT_TERMINATOR,
  type DeliveryOutcome,
  type SessionOutcome,
  type SessionState,
} from './session/controller.js';
