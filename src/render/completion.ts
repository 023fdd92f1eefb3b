/**
 * Candidate input lines for the placeholder being typed at the end of `line`.
 *
 * The trailing non-whitespace run is the fragment. Every token starting with
 * it (literally) yields the line with the fragment swapped for the token.
 * With no fragment, every token is appended.
 */
export function completePlaceholders(line: string, tokens: Iterable<string>): string[] {
  const match = /\S+$/.exec(line);
  const candidates: string[] = [];

  for (const token of tokens) {
    if (!match) {
      candidates.push(line + token);
    } else if (token.startsWith(match[0])) {
      candidates.push(line.slice(0, match.index) + token);
    }
  }
  return candidates;
}
