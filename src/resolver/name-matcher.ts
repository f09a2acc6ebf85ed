/**
 * Fuzzy matching of free-text references against roster labels.
 *
 * Scoring combines token coverage (how much of the query and of the label is
 * matched token-by-token) with whole-string edit similarity. A reference is
 * accepted only when exactly one candidate scores above the threshold and no
 * other accepted candidate lies within the ambiguity margin of the best.
 */

export interface MatchOptions {
  /** Minimum score for a candidate to be considered at all */
  acceptThreshold: number;
  /** Accepted candidates within this distance of the best score tie with it */
  ambiguityMargin: number;
}

export const DEFAULT_MATCH_OPTIONS: MatchOptions = {
  acceptThreshold: 0.6,
  ambiguityMargin: 0.1,
};

/** Two tokens are the same word at or above this similarity */
const TOKEN_MATCH_THRESHOLD = 0.8;

const QUERY_COVERAGE_WEIGHT = 0.7;
const LABEL_COVERAGE_WEIGHT = 0.3;

const STOP_WORDS = new Set(['the', 'of', 'by', 'on', 'and', 'for', 'to', 'in', 'with', 'a', 'at']);

export interface MatchCandidate {
  id: string;
  /** Display label reported back on ambiguity */
  label: string;
  /** Every text the candidate may be referred to by (name, title, code) */
  aliases: string[];
}

export interface ScoredCandidate {
  id: string;
  label: string;
  score: number;
}

export type MatchResult =
  | { status: 'matched'; match: ScoredCandidate }
  | { status: 'ambiguous'; candidates: ScoredCandidate[] }
  | { status: 'none'; best?: ScoredCandidate };

/**
 * Lower-cases, strips diacritics (including Vietnamese đ) and collapses
 * punctuation to single spaces.
 */
export function normalize(text: string): string {
  return text
    .normalize('NFD')
    .replace(/[\u0300-\u036f]/g, '')
    .replace(/[đĐ]/g, 'd')
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, ' ')
    .trim();
}

export function tokenize(text: string): string[] {
  return normalize(text)
    .split(' ')
    .filter(token => token.length > 0 && !STOP_WORDS.has(token));
}

export function levenshtein(a: string, b: string): number {
  if (a === b) return 0;
  if (a.length === 0) return b.length;
  if (b.length === 0) return a.length;

  let previous = Array.from({ length: b.length + 1 }, (_, j) => j);
  for (let i = 1; i <= a.length; i++) {
    const current = [i];
    for (let j = 1; j <= b.length; j++) {
      const cost = a[i - 1] === b[j - 1] ? 0 : 1;
      current[j] = Math.min(
        (previous[j] ?? 0) + 1,
        (current[j - 1] ?? 0) + 1,
        (previous[j - 1] ?? 0) + cost
      );
    }
    previous = current;
  }
  return previous[b.length] ?? 0;
}

/**
 * 1 for identical strings, 0 for completely different ones
 */
export function similarity(a: string, b: string): number {
  const longest = Math.max(a.length, b.length);
  if (longest === 0) return 1;
  return 1 - levenshtein(a, b) / longest;
}

function coverage(from: string[], against: string[]): number {
  if (from.length === 0) return 0;
  const matched = from.filter(token =>
    against.some(other => similarity(token, other) >= TOKEN_MATCH_THRESHOLD)
  ).length;
  return matched / from.length;
}

/**
 * Scores how well a free-text query refers to one label, in [0, 1]
 */
export function scoreMatch(query: string, label: string): number {
  const q = normalize(query);
  const l = normalize(label);
  if (q.length === 0 || l.length === 0) return 0;
  if (q === l) return 1;

  const queryTokens = tokenize(query);
  const labelTokens = tokenize(label);
  const tokenScore =
    QUERY_COVERAGE_WEIGHT * coverage(queryTokens, labelTokens) +
    LABEL_COVERAGE_WEIGHT * coverage(labelTokens, queryTokens);

  return Math.max(tokenScore, similarity(q, l));
}

/**
 * Ranks candidates against a query and applies the acceptance and tie rules
 */
export function matchReference(
  query: string,
  candidates: readonly MatchCandidate[],
  options: MatchOptions = DEFAULT_MATCH_OPTIONS
): MatchResult {
  // A single exact alias wins outright; several exact aliases still tie below
  const normalizedQuery = normalize(query);
  const exact = candidates.filter(
    candidate => normalizedQuery.length > 0 && candidate.aliases.some(alias => normalize(alias) === normalizedQuery)
  );
  const [onlyExact] = exact;
  if (onlyExact && exact.length === 1) {
    return { status: 'matched', match: { id: onlyExact.id, label: onlyExact.label, score: 1 } };
  }

  const scored: ScoredCandidate[] = candidates
    .map(candidate => ({
      id: candidate.id,
      label: candidate.label,
      score: Math.max(0, ...candidate.aliases.map(alias => scoreMatch(query, alias))),
    }))
    .sort((a, b) => b.score - a.score);

  const best = scored[0];
  if (!best || best.score < options.acceptThreshold) {
    return best ? { status: 'none', best } : { status: 'none' };
  }

  const comparable = scored.filter(
    c => c.score >= options.acceptThreshold && best.score - c.score <= options.ambiguityMargin
  );
  if (comparable.length > 1) {
    return { status: 'ambiguous', candidates: comparable };
  }
  return { status: 'matched', match: best };
}
