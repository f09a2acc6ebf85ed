import { describe, it, expect } from 'vitest';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { randomUUID } from 'node:crypto';
import { ClaudeCliCapability, DEFAULT_CLAUDE_CLI_CONFIG } from './claude-cli-capability.js';
import type { CapabilityRequest } from './language-capability.js';
import { ExternalServiceError } from '../errors/index.js';
import { Logger } from '../logging/logger.js';
import { ADD_NOTE_TO_REPORT_TOOL, LIST_STUDENT_ASSIGNMENTS_TOOL } from '../tools/tool-catalog.js';

function request(overrides: Partial<CapabilityRequest> = {}): CapabilityRequest {
  return {
    instruction: 'note that An did well today',
    tools: [ADD_NOTE_TO_REPORT_TOOL],
    roster: {
      students: [{ id: 'stu-001', name: 'Nguyen Van An' }],
      learning_objects: [{ id: 'lo-101', code: 'ALG-SUB', title: 'Solving systems of equations by substitution' }],
    },
    strict: false,
    ...overrides,
  };
}

describe('ClaudeCliCapability', () => {
  const logger = new Logger({ level: 'error', path: join(tmpdir(), `claude-cli-test-${randomUUID()}.log`) });

  it('should merge config with defaults', () => {
    const capability = new ClaudeCliCapability({ model: 'opus' }, logger);
    expect(capability.getConfig()).toEqual({ cliPath: DEFAULT_CLAUDE_CLI_CONFIG.cliPath, model: 'opus' });
  });

  it('should describe parameters with their constraints', () => {
    const capability = new ClaudeCliCapability({}, logger);
    expect(capability.formatTools([LIST_STUDENT_ASSIGNMENTS_TOOL])).toBe(
      '- list_student_assignments: List the assignments given to a student\n' +
        '  - student (string, required): Student id or name as written by the tutor\n' +
        '  - status (string, optional, one of assigned | in_progress | completed): Only assignments with this status'
    );
  });

  it('should list the roster with ids', () => {
    const capability = new ClaudeCliCapability({}, logger);
    expect(capability.formatRoster(request().roster)).toBe(
      'Students:\n- stu-001: Nguyen Van An\n\n' +
        'Learning objects:\n- lo-101 [ALG-SUB]: Solving systems of equations by substitution'
    );
    expect(capability.formatRoster({ students: [], learning_objects: [] })).toBe(
      'Students:\n(none)\n\nLearning objects:\n(none)'
    );
  });

  it('should end the prompt with the instruction', () => {
    const prompt = new ClaudeCliCapability({}, logger).buildPrompt(request());
    expect(prompt.endsWith('Tutor instruction:\nnote that An did well today')).toBe(true);
    expect(prompt).not.toContain('could not be used');
  });

  it('should list the problems on a strict retry', () => {
    const prompt = new ClaudeCliCapability({}, logger).buildPrompt(
      request({ strict: true, problems: ['calls.0.tool: Required', "unknown tool 'delete_student'"] })
    );
    expect(prompt).toContain(
      "Your previous answer could not be used:\n- calls.0.tool: Required\n- unknown tool 'delete_student'\n"
    );
  });

  it('should fail with ExternalServiceError when the CLI cannot be started', async () => {
    const capability = new ClaudeCliCapability(
      { cliPath: join(tmpdir(), `missing-cli-${randomUUID()}`) },
      logger
    );

    await expect(capability.interpret(request(), new AbortController().signal)).rejects.toBeInstanceOf(
      ExternalServiceError
    );
  });
});
