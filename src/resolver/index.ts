export {
  normalize,
  tokenize,
  levenshtein,
  similarity,
  scoreMatch,
  matchReference,
  DEFAULT_MATCH_OPTIONS,
} from './name-matcher.js';
export type { MatchOptions, MatchCandidate, ScoredCandidate, MatchResult } from './name-matcher.js';
export { RosterResolver } from './roster-resolver.js';
export type { RosterKind, RosterSource, Resolution } from './roster-resolver.js';
