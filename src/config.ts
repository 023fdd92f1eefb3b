import { readFileSync, existsSync } from 'node:fs';
import { basename, resolve } from 'node:path';
import { parse } from 'toml';
import { ConfigError } from './errors.js';
import {
  DEFAULT_PLACEHOLDERS,
  isPlaceholderKind,
  type PlaceholderEntry,
} from './render/placeholders.js';

export const CONFIG_FILE = 'agentline.toml';

export interface AgentConfig {
  /** Agent executable, run as `<command> <args...>`. */
  command: string;
  args: readonly string[];
  /** Text a surface's process name must contain to count as the agent. */
  processMatch: string;
  /** Wait after spawning before the first message is sent. */
  startupDelayMs: number;
}

export interface KeysConfig {
  leader: string;
}

export interface AgentlineConfig {
  agent: Readonly<AgentConfig>;
  placeholders: Readonly<Record<string, PlaceholderEntry>>;
  keys: Readonly<KeysConfig>;
}

/** A partial config, as read from a file or passed in code. */
export interface ConfigLayer {
  agent?: Partial<AgentConfig>;
  placeholders?: Record<string, PlaceholderEntry>;
  keys?: Partial<KeysConfig>;
}

export const DEFAULT_AGENT_COMMAND = 'cursor';

const DEFAULTS = {
  agent: {
    command: DEFAULT_AGENT_COMMAND,
    args: ['agent'],
    startupDelayMs: 100,
  },
  keys: {
    leader: '<leader>',
  },
};

/**
 * Merge layers over the defaults, later layers winning field by field.
 * Placeholder tables merge per token. The result is frozen.
 */
export function resolveConfig(...layers: Array<ConfigLayer | null | undefined>): Readonly<AgentlineConfig> {
  let command: string = DEFAULTS.agent.command;
  let args: readonly string[] = DEFAULTS.agent.args;
  let processMatch: string | undefined;
  let startupDelayMs = DEFAULTS.agent.startupDelayMs;
  let leader = DEFAULTS.keys.leader;
  const placeholders: Record<string, PlaceholderEntry> = { ...DEFAULT_PLACEHOLDERS };

  for (const layer of layers) {
    if (!layer) continue;
    command = layer.agent?.command ?? command;
    args = layer.agent?.args ?? args;
    processMatch = layer.agent?.processMatch ?? processMatch;
    startupDelayMs = layer.agent?.startupDelayMs ?? startupDelayMs;
    leader = layer.keys?.leader ?? leader;
    Object.assign(placeholders, layer.placeholders);
  }

  return Object.freeze({
    agent: Object.freeze({
      command,
      args: Object.freeze([...args]),
      processMatch: processMatch ?? basename(command),
      startupDelayMs,
    }),
    placeholders: Object.freeze(placeholders),
    keys: Object.freeze({ leader }),
  });
}

export function loadConfig(configPath: string): ConfigLayer | null {
  const absPath = resolve(configPath);
  if (!existsSync(absPath)) {
    return null;
  }

  let raw: string;
  try {
    raw = readFileSync(absPath, 'utf-8');
  } catch (err) {
    console.error(`[agentline] Failed to read config: ${absPath}`);
    console.error(err instanceof Error ? err.message : err);
    return null;
  }

  let parsed: unknown;
  try {
    parsed = parse(raw);
  } catch (err) {
    console.error(`[agentline] Invalid TOML in config: ${absPath}`);
    console.error(err instanceof Error ? err.message : err);
    return null;
  }

  try {
    return parseConfigLayer(parsed);
  } catch (err) {
    if (!(err instanceof ConfigError)) throw err;
    console.error(`[agentline] Invalid config: ${absPath}`);
    console.error(err.message);
    return null;
  }
}

/** Validate a parsed TOML document into a config layer. */
export function parseConfigLayer(doc: unknown): ConfigLayer {
  if (!isRecord(doc)) throw new ConfigError('Config must be a table');
  const layer: ConfigLayer = {};

  const agent = section(doc, 'agent');
  if (agent) {
    layer.agent = {
      command: optionalString(agent, 'command', 'agent'),
      args: optionalStringArray(agent, 'args', 'agent'),
      processMatch: optionalString(agent, 'process_match', 'agent'),
      startupDelayMs: optionalDelay(agent, 'startup_delay_ms', 'agent'),
    };
  }

  const placeholders = section(doc, 'placeholders');
  if (placeholders) {
    const table: Record<string, PlaceholderEntry> = {};
    for (const [token, kind] of Object.entries(placeholders)) {
      if (!token) throw new ConfigError('placeholders: token must not be empty');
      if (!isPlaceholderKind(kind)) {
        throw new ConfigError(`placeholders.${token}: unknown placeholder kind ${JSON.stringify(kind)}`);
      }
      table[token] = kind;
    }
    layer.placeholders = table;
  }

  const keys = section(doc, 'keys');
  if (keys) {
    layer.keys = { leader: optionalString(keys, 'leader', 'keys') };
  }

  return layer;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function section(doc: Record<string, unknown>, name: string): Record<string, unknown> | undefined {
  const value = doc[name];
  if (value === undefined) return undefined;
  if (!isRecord(value)) throw new ConfigError(`[${name}] must be a table`);
  return value;
}

function optionalString(table: Record<string, unknown>, key: string, where: string): string | undefined {
  const value = table[key];
  if (value === undefined) return undefined;
  if (typeof value !== 'string' || value === '') {
    throw new ConfigError(`${where}.${key} must be a non-empty string`);
  }
  return value;
}

function optionalStringArray(table: Record<string, unknown>, key: string, where: string): string[] | undefined {
  const value = table[key];
  if (value === undefined) return undefined;
  if (!Array.isArray(value) || !value.every((item): item is string => typeof item === 'string')) {
    throw new ConfigError(`${where}.${key} must be an array of strings`);
  }
  return value;
}

function optionalDelay(table: Record<string, unknown>, key: string, where: string): number | undefined {
  const value = table[key];
  if (value === undefined) return undefined;
  if (typeof value !== 'number' || !Number.isInteger(value) || value < 0) {
    throw new ConfigError(`${where}.${key} must be a non-negative integer`);
  }
  return value;
}
