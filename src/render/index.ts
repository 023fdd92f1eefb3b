import type { EditorContext } from '../context/extractor.js';
import type { PlaceholderRegistry } from './placeholders.js';

/**
 * Replace registered placeholder tokens in `prompt`.
 *
 * The prompt is scanned once, left to right. At each position the longest
 * registered token that matches literally wins, so `@sel` never eats into
 * `@selection`. Replacement text is not scanned again. A token whose resolver
 * returns undefined stays in the output exactly as typed.
 */
export function renderPrompt(
  prompt: string,
  registry: PlaceholderRegistry,
  ctx: EditorContext,
): string {
  const tokens = [...registry.keys()]
    .filter((token) => token.length > 0)
    .sort((a, b) => b.length - a.length);
  if (tokens.length === 0) return prompt;

  const resolved = new Map<string, string | undefined>();
  const resolve = (token: string): string | undefined => {
    if (!resolved.has(token)) {
      resolved.set(token, registry.get(token)?.(ctx));
    }
    return resolved.get(token);
  };

  let rendered = '';
  let copied = 0;
  let i = 0;
  while (i < prompt.length) {
    const token = tokens.find((t) => prompt.startsWith(t, i));
    if (token === undefined) {
      i += 1;
      continue;
    }
    rendered += prompt.slice(copied, i) + (resolve(token) ?? token);
    i += token.length;
    copied = i;
  }
  return rendered + prompt.slice(copied);
}
