/**
 * Helpers for pulling a JSON payload out of model output, which may wrap it
 * in code fences or surround it with prose.
 */

export function stripCodeFences(text: string): string {
  return text.replace(/```(?:json)?\s*([\s\S]*?)```/gi, (_match, inner: string) => inner.trim());
}

/**
 * Top-level balanced `{...}` and `[...]` blocks, in order of appearance
 */
export function scanBalancedJsonBlocks(text: string): string[] {
  const blocks: string[] = [];
  const closers: Record<string, string> = { '{': '}', '[': ']' };

  for (let i = 0; i < text.length; i++) {
    const open = text[i];
    const close = open !== undefined ? closers[open] : undefined;
    if (open === undefined || close === undefined) continue;

    let depth = 0;
    let inString = false;
    let escaped = false;

    for (let j = i; j < text.length; j++) {
      const ch = text[j];

      if (inString) {
        if (escaped) {
          escaped = false;
        } else if (ch === '\\') {
          escaped = true;
        } else if (ch === '"') {
          inString = false;
        }
        continue;
      }

      if (ch === '"') {
        inString = true;
      } else if (ch === open) {
        depth++;
      } else if (ch === close) {
        depth--;
        if (depth === 0) {
          blocks.push(text.slice(i, j + 1));
          i = j;
          break;
        }
      }
    }
  }

  return blocks;
}

export function extractJsonCandidates(text: string): string[] {
  const cleaned = stripCodeFences(text.trim());
  const candidates = [cleaned, ...scanBalancedJsonBlocks(cleaned)]
    .map(candidate => candidate.trim())
    .filter(candidate => candidate.length > 0);
  return [...new Set(candidates)];
}

/**
 * Parses the first candidate that is valid JSON
 * @returns undefined when no candidate parses
 */
export function parseJsonOutput(text: string): unknown {
  for (const candidate of extractJsonCandidates(text)) {
    try {
      return JSON.parse(candidate);
    } catch {
      continue;
    }
  }
  return undefined;
}
