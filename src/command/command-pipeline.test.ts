import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { rm } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { randomUUID } from 'node:crypto';
import { createCommandPipeline, type CommandPipeline, type PipelineEvent } from './command-pipeline.js';
import { createTestStore, NOW, type TestStore } from '../../test/fixtures/store.js';
import { ScriptedCapability, answer } from '../../test/fixtures/capability.js';

describe('CommandPipeline', () => {
  let testDir: string;
  let env: TestStore;

  beforeEach(async () => {
    testDir = join(tmpdir(), `pipeline-test-${randomUUID()}`);
    env = await createTestStore(testDir);
  });

  afterEach(async () => {
    await rm(testDir, { recursive: true, force: true });
  });

  function pipelineWith(capability: ScriptedCapability, timeoutMs = 1000): CommandPipeline {
    return createCommandPipeline({ store: env.store, capability, logger: env.logger, timeoutMs });
  }

  it('should stream interpretation, each call and the final response', async () => {
    const capability = new ScriptedCapability([
      answer([
        { tool: 'assign_exercise', arguments: { student: 'An', learning_object: 'ALG-SUB', quantity: 2 } },
        { tool: 'get_student_activity_log', arguments: { student: 'An' } },
      ]),
    ]);

    const events: PipelineEvent[] = [];
    for await (const event of pipelineWith(capability).stream({ command: 'assign An 2 and show log', tutorId: 'tutor-7' })) {
      events.push(event);
    }

    expect(events.map(e => e.type)).toEqual([
      'interpreted',
      'tool_call',
      'tool_result',
      'tool_call',
      'tool_result',
      'done',
    ]);
    expect(new Set(events.map(e => e.commandId)).size).toBe(1);

    const done = events[5];
    expect(done?.type).toBe('done');
    if (done?.type === 'done') {
      expect(done.response.outcome).toBe('Success');
      expect(done.response.tutor_id).toBe('tutor-7');
      expect(done.response.command_id).toBe(done.commandId);
    }
  });

  it('should record a trace and processing time', async () => {
    const capability = new ScriptedCapability([
      answer([{ tool: 'add_note_to_report', arguments: { student: 'Binh', note: 'Asked good questions' } }]),
    ]);

    const response = await pipelineWith(capability).run({ command: 'note for Binh: asked good questions' });

    expect(response.status).toBe('success');
    expect(response.processing_time_ms).toBeGreaterThanOrEqual(0);
    expect(response.tutor_id).toBeUndefined();
    expect(response.trace.map(t => t.step)).toEqual([
      'received',
      'interpreted',
      'tool_call',
      'tool_result',
      'completed',
    ]);
    expect(response.trace.every(t => t.at === NOW.toISOString())).toBe(true);
    expect(response.trace[3]?.detail).toEqual({ id: 'call-1', status: 'ok' });
  });

  it('should run no tool when interpretation fails', async () => {
    const capability = new ScriptedCapability([{ answer: 'no idea' }, { answer: { calls: 'none' } }]);

    const events: PipelineEvent[] = [];
    for await (const event of pipelineWith(capability).stream({ command: '???' })) {
      events.push(event);
    }

    expect(events.map(e => e.type)).toEqual(['done']);
    const [done] = events;
    if (done?.type === 'done') {
      expect(done.response.outcome).toBe('InterpretationFailure');
      expect(done.response.error?.code).toBe('parse_error');
      expect(done.response.trace.map(t => t.step)).toEqual(['received', 'interpretation_failed', 'completed']);
    }
    expect(env.store.assignments()).toEqual([]);
    expect(env.store.activityLog()).toEqual([]);
  });

  it('should run one command at a time', async () => {
    let releaseFirst: (value: unknown) => void = () => undefined;
    const firstAnswer = new Promise<unknown>(resolve => {
      releaseFirst = resolve;
    });
    const capability = new ScriptedCapability([
      { run: () => firstAnswer },
      answer([{ tool: 'add_note_to_report', arguments: { student: 'stu-001', note: 'second' } }]),
    ]);
    const pipeline = pipelineWith(capability, 5000);

    const first = pipeline.run({ command: 'first' });
    const second = pipeline.run({ command: 'second' });

    await vi.waitFor(() => expect(capability.requests).toHaveLength(1));
    await new Promise(resolve => setTimeout(resolve, 50));
    expect(capability.requests).toHaveLength(1);
    expect(pipeline.pending).toBe(2);

    releaseFirst({ calls: [{ tool: 'add_note_to_report', arguments: { student: 'stu-001', note: 'first' } }] });

    const responses = await Promise.all([first, second]);
    expect(responses.map(r => r.outcome)).toEqual(['Success', 'Success']);
    expect(env.store.activityLog().map(e => e.description)).toEqual(['first', 'second']);
    expect(pipeline.pending).toBe(0);
  });
});
