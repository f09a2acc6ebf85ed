import { describe, it, expect } from 'vitest';
import { RosterResolver } from './roster-resolver.js';
import { AmbiguousReferenceError } from '../errors/index.js';
import { roster } from '../../test/fixtures/roster.js';

describe('RosterResolver', () => {
  const resolver = new RosterResolver(roster);

  describe('students', () => {
    it('should accept an exact id', () => {
      expect(resolver.resolve('student', ' stu-002 ')).toEqual({
        status: 'resolved',
        id: 'stu-002',
        score: 1,
        exact: true,
      });
    });

    it('should resolve a given name', () => {
      const resolution = resolver.resolve('student', 'An');
      expect(resolution.status).toBe('resolved');
      if (resolution.status === 'resolved') {
        expect(resolution.id).toBe('stu-001');
        expect(resolution.exact).toBe(false);
      }
    });

    it('should resolve names written with diacritics', () => {
      const resolution = resolver.resolve('student', 'Trần Minh Bình');
      expect(resolution).toEqual({ status: 'resolved', id: 'stu-002', score: 1, exact: false });
    });

    it('should throw with candidates when two students share a name', () => {
      let caught: unknown;
      try {
        resolver.resolve('student', 'Hoa');
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(AmbiguousReferenceError);
      if (caught instanceof AmbiguousReferenceError) {
        expect(caught.code).toBe('ambiguous_reference');
        expect(caught.candidates.map(c => c.id)).toEqual(['stu-003', 'stu-004']);
        expect(caught.message).toBe(
          '"Hoa" matches more than one student: Le Thi Hoa (stu-003), Pham Thi Hoa (stu-004)'
        );
      }
    });

    it('should resolve a full name even when another differs by one letter', () => {
      const pair = new RosterResolver({
        students: () => [
          { id: 'stu-1', name: 'Nguyễn Văn An' },
          { id: 'stu-2', name: 'Nguyễn Văn Anh' },
        ],
        learningObjects: () => [],
      });

      expect(pair.resolve('student', 'Nguyễn Văn An')).toEqual({ status: 'resolved', id: 'stu-1', score: 1, exact: false });
      expect(pair.resolve('student', 'Nguyễn Văn Anh')).toEqual({ status: 'resolved', id: 'stu-2', score: 1, exact: false });
    });

    it('should still refuse a full name two students share', () => {
      const twins = new RosterResolver({
        students: () => [
          { id: 'stu-1', name: 'Le Thi Hoa' },
          { id: 'stu-2', name: 'Le Thi Hoa' },
        ],
        learningObjects: () => [],
      });

      expect(() => twins.resolve('student', 'Le Thi Hoa')).toThrow(AmbiguousReferenceError);
    });

    it('should leave unknown names unresolved', () => {
      expect(resolver.resolve('student', 'Zoltan').status).toBe('unresolved');
    });
  });

  describe('learning objects', () => {
    it('should resolve a full title', () => {
      const resolution = resolver.resolve('learning_object', 'solving systems of equations by substitution');
      expect(resolution).toEqual({ status: 'resolved', id: 'lo-101', score: 1, exact: false });
    });

    it('should resolve a distinguishing keyword', () => {
      const resolution = resolver.resolve('learning_object', 'substitution');
      expect(resolution.status).toBe('resolved');
      if (resolution.status === 'resolved') {
        expect(resolution.id).toBe('lo-101');
      }
    });

    it('should resolve a code', () => {
      const resolution = resolver.resolve('learning_object', 'GEO-PYTH');
      expect(resolution).toEqual({ status: 'resolved', id: 'lo-201', score: 1, exact: false });
    });

    it('should refuse to pick between two methods', () => {
      expect(() => resolver.resolve('learning_object', 'systems of equations')).toThrow(AmbiguousReferenceError);
    });
  });

  it('should apply custom thresholds', () => {
    const strict = new RosterResolver(roster, { acceptThreshold: 0.95 });
    expect(strict.resolve('student', 'An').status).toBe('unresolved');
  });
});
