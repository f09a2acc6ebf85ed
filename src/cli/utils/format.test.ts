import { describe, it, expect } from 'vitest';
import { formatCallOutcome, formatResponse, formatToolCall } from './format.js';

describe('format', () => {
  const plain = { color: false };

  describe('formatResponse', () => {
    it('should keep the headline and call lines', () => {
      const text = formatResponse(
        { status: 'partial_success', message: 'Completed 1 of 2 actions; 1 failed.\n1. a [ok] done\n2. b [error] nope' },
        plain
      );
      expect(text).toBe('Completed 1 of 2 actions; 1 failed.\n1. a [ok] done\n2. b [error] nope');
    });

    it('should append the error code of a command-level failure', () => {
      const text = formatResponse(
        { status: 'failure', message: 'Could not carry out the instruction: x', error: { code: 'timeout' } },
        plain
      );
      expect(text).toBe('Could not carry out the instruction: x\n(timeout)');
    });

    it('should color the headline by status', () => {
      const text = formatResponse({ status: 'success', message: 'Completed 1 action.' });
      expect(text).toBe('\x1b[1m\x1b[32mCompleted 1 action.\x1b[0m');
    });
  });

  describe('calls', () => {
    it('should show the tool and its arguments', () => {
      expect(formatToolCall({ tool: 'get_student_activity_log', arguments: { student: 'An' } }, plain)).toBe(
        '→ get_student_activity_log {"student":"An"}'
      );
    });

    it('should show each outcome status', () => {
      expect(formatCallOutcome({ tool: 'assign_exercise', status: 'ok', message: 'Assigned' }, plain)).toBe('✓ Assigned');
      expect(formatCallOutcome({ tool: 'assign_exercise', status: 'skipped' }, plain)).toBe('- assign_exercise skipped');
      expect(
        formatCallOutcome({ tool: 'assign_exercise', status: 'error', error: { message: 'Unknown student: "Zed"' } }, plain)
      ).toBe('✗ assign_exercise: Unknown student: "Zed"');
    });
  });
});
