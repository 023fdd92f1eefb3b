import type { EditorContext } from '../context/extractor.js';

export const PLACEHOLDER_KINDS = ['buffer', 'cursor', 'selection', 'this'] as const;

export type PlaceholderKind = (typeof PLACEHOLDER_KINDS)[number];

/** Returns the replacement text, or undefined to leave the token as typed. */
export type PlaceholderResolver = (ctx: EditorContext) => string | undefined;

export type PlaceholderEntry = PlaceholderKind | PlaceholderResolver;

export type PlaceholderRegistry = ReadonlyMap<string, PlaceholderResolver>;

const RESOLVERS: Record<PlaceholderKind, PlaceholderResolver> = {
  buffer: (ctx) => ctx.buffer(),
  cursor: (ctx) => ctx.cursor(),
  selection: (ctx) => ctx.selection(),
  this: (ctx) => ctx.this(),
};

export const DEFAULT_PLACEHOLDERS: Readonly<Record<string, PlaceholderKind>> = {
  '@buffer': 'buffer',
  '@cursor': 'cursor',
  '@selection': 'selection',
  '@this': 'this',
};

const KIND_NAMES: ReadonlySet<string> = new Set(PLACEHOLDER_KINDS);

export function isPlaceholderKind(value: unknown): value is PlaceholderKind {
  return typeof value === 'string' && KIND_NAMES.has(value);
}

/**
 * Merge placeholder tables into a registry. Later tables win for tokens
 * they share with earlier ones.
 */
export function buildRegistry(
  ...tables: ReadonlyArray<Readonly<Record<string, PlaceholderEntry>>>
): PlaceholderRegistry {
  const registry = new Map<string, PlaceholderResolver>();
  for (const table of tables) {
    for (const [token, entry] of Object.entries(table)) {
      registry.set(token, typeof entry === 'function' ? entry : RESOLVERS[entry]);
    }
  }
  return registry;
}
