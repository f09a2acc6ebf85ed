import { describe, it, expect } from 'vitest';
import {
  normalize,
  tokenize,
  levenshtein,
  similarity,
  scoreMatch,
  matchReference,
  type MatchCandidate,
} from './name-matcher.js';

describe('normalize', () => {
  it('should strip diacritics and lower-case', () => {
    expect(normalize('Nguyễn Văn An')).toBe('nguyen van an');
    expect(normalize('Đặng Thu')).toBe('dang thu');
  });

  it('should collapse punctuation to single spaces', () => {
    expect(normalize('  ALG-SUB / part 2 ')).toBe('alg sub part 2');
  });
});

describe('tokenize', () => {
  it('should drop stop words', () => {
    expect(tokenize('The solving of systems by substitution')).toEqual(['solving', 'systems', 'substitution']);
  });

  it('should keep short names that are not stop words', () => {
    expect(tokenize('An')).toEqual(['an']);
  });
});

describe('levenshtein', () => {
  it('should count edits', () => {
    expect(levenshtein('kitten', 'sitting')).toBe(3);
    expect(levenshtein('', 'abc')).toBe(3);
    expect(levenshtein('same', 'same')).toBe(0);
  });

  it('should derive similarity from edit distance', () => {
    expect(similarity('', '')).toBe(1);
    expect(similarity('ann', 'an')).toBeCloseTo(2 / 3);
  });
});

describe('scoreMatch', () => {
  it('should give 1 for equal normalized strings', () => {
    expect(scoreMatch('nguyen van AN', 'Nguyễn Văn An')).toBe(1);
  });

  it('should weight query coverage over label coverage', () => {
    // query fully covered, one of three label tokens covered
    expect(scoreMatch('An', 'Nguyen Van An')).toBeCloseTo(0.8);
  });

  it('should fall back to whole-string similarity for typos', () => {
    expect(scoreMatch('Nguyen Van Ann', 'Nguyen Van An')).toBeCloseTo(1 - 1 / 14);
  });

  it('should score empty queries as 0', () => {
    expect(scoreMatch('  ', 'Nguyen Van An')).toBe(0);
  });
});

describe('matchReference', () => {
  const students: MatchCandidate[] = [
    { id: 'stu-001', label: 'Nguyen Van An', aliases: ['Nguyen Van An'] },
    { id: 'stu-002', label: 'Tran Minh Binh', aliases: ['Tran Minh Binh'] },
    { id: 'stu-003', label: 'Le Thi Hoa', aliases: ['Le Thi Hoa'] },
    { id: 'stu-004', label: 'Pham Thi Hoa', aliases: ['Pham Thi Hoa'] },
  ];

  it('should match a unique given name', () => {
    const result = matchReference('An', students);
    expect(result.status).toBe('matched');
    if (result.status === 'matched') {
      expect(result.match.id).toBe('stu-001');
    }
  });

  it('should report ties within the margin as ambiguous', () => {
    const result = matchReference('Hoa', students);
    expect(result.status).toBe('ambiguous');
    if (result.status === 'ambiguous') {
      expect(result.candidates.map(c => c.id)).toEqual(['stu-003', 'stu-004']);
    }
  });

  it('should prefer a full name over a partial overlap', () => {
    const result = matchReference('Le Thi Hoa', students);
    expect(result).toEqual({
      status: 'matched',
      match: { id: 'stu-003', label: 'Le Thi Hoa', score: 1 },
    });
  });

  it('should take an exact name over a near-identical one', () => {
    const pair: MatchCandidate[] = [
      { id: 'stu-1', label: 'Nguyễn Văn An', aliases: ['Nguyễn Văn An'] },
      { id: 'stu-2', label: 'Nguyễn Văn Anh', aliases: ['Nguyễn Văn Anh'] },
    ];
    expect(matchReference('nguyen van an', pair)).toEqual({
      status: 'matched',
      match: { id: 'stu-1', label: 'Nguyễn Văn An', score: 1 },
    });
  });

  it('should keep two exact matches ambiguous', () => {
    const twins: MatchCandidate[] = [
      { id: 'stu-1', label: 'Le Thi Hoa', aliases: ['Le Thi Hoa'] },
      { id: 'stu-2', label: 'Lê Thị Hoa', aliases: ['Lê Thị Hoa'] },
    ];
    const result = matchReference('Le Thi Hoa', twins);
    expect(result.status).toBe('ambiguous');
    if (result.status === 'ambiguous') {
      expect(result.candidates.map(c => c.id)).toEqual(['stu-1', 'stu-2']);
    }
  });

  it('should return none below the acceptance threshold', () => {
    const result = matchReference('An', students, { acceptThreshold: 0.9, ambiguityMargin: 0.1 });
    expect(result.status).toBe('none');
    if (result.status === 'none') {
      expect(result.best?.id).toBe('stu-001');
    }
  });

  it('should return none without candidates', () => {
    expect(matchReference('An', [])).toEqual({ status: 'none' });
  });

  it('should score a candidate by its best alias', () => {
    const objects: MatchCandidate[] = [
      { id: 'lo-101', label: 'Solving systems of equations by substitution', aliases: ['Solving systems of equations by substitution', 'ALG-SUB'] },
      { id: 'lo-102', label: 'Solving systems of equations by elimination', aliases: ['Solving systems of equations by elimination', 'ALG-ELIM'] },
    ];

    const byCode = matchReference('alg elim', objects);
    expect(byCode.status).toBe('matched');
    if (byCode.status === 'matched') {
      expect(byCode.match).toEqual({ id: 'lo-102', label: 'Solving systems of equations by elimination', score: 1 });
    }

    const partial = matchReference('systems of equations', objects);
    expect(partial.status).toBe('ambiguous');
  });
});
