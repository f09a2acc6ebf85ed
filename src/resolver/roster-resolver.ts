import { AmbiguousReferenceError } from '../errors/index.js';
import type { Student, LearningObject } from '../storage/records.js';
import {
  matchReference,
  DEFAULT_MATCH_OPTIONS,
  type MatchCandidate,
  type MatchOptions,
  type ScoredCandidate,
} from './name-matcher.js';

/**
 * Roster entity kinds that free text may refer to
 */
export type RosterKind = 'student' | 'learning_object';

/**
 * Read access to the roster. RecordStore satisfies this.
 */
export interface RosterSource {
  students(): readonly Student[];
  learningObjects(): readonly LearningObject[];
}

export type Resolution =
  | { status: 'resolved'; id: string; score: number; exact: boolean }
  | { status: 'unresolved'; best?: ScoredCandidate };

/**
 * RosterResolver - Maps free-text student and learning object references to ids
 *
 * An exact id always wins. Otherwise the reference is fuzzy-matched against
 * the student's name, or the learning object's title and code.
 */
export class RosterResolver {
  private readonly options: MatchOptions;

  constructor(
    private readonly roster: RosterSource,
    options: Partial<MatchOptions> = {}
  ) {
    this.options = { ...DEFAULT_MATCH_OPTIONS, ...options };
  }

  /**
   * @throws AmbiguousReferenceError when several entries match comparably well
   */
  resolve(kind: RosterKind, reference: string): Resolution {
    const candidates = this.candidates(kind);
    const trimmed = reference.trim();

    if (candidates.some(c => c.id === trimmed)) {
      return { status: 'resolved', id: trimmed, score: 1, exact: true };
    }

    const result = matchReference(trimmed, candidates, this.options);
    switch (result.status) {
      case 'matched':
        return { status: 'resolved', id: result.match.id, score: result.match.score, exact: false };
      case 'ambiguous':
        throw new AmbiguousReferenceError(kind, reference, result.candidates);
      case 'none':
        return result.best ? { status: 'unresolved', best: result.best } : { status: 'unresolved' };
    }
  }

  private candidates(kind: RosterKind): MatchCandidate[] {
    if (kind === 'student') {
      return this.roster.students().map(s => ({ id: s.id, label: s.name, aliases: [s.name] }));
    }
    return this.roster
      .learningObjects()
      .map(lo => ({ id: lo.id, label: lo.title, aliases: [lo.title, lo.code] }));
  }
}
