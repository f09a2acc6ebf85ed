import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { rm } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { randomUUID } from 'node:crypto';
import { GatewayServer } from '../../gateway/gateway-server.js';
import { createCommandPipeline } from '../../command/command-pipeline.js';
import { DEFAULT_CONFIG } from '../../config/config-manager.js';
import { createTestStore, type TestStore } from '../../../test/fixtures/store.js';
import { ScriptedCapability, answer } from '../../../test/fixtures/capability.js';
import { getGatewayUrl, handleConnectionError, parseGatewayMessage, sendToGateway } from './connection.js';
import type { CallSummary } from './format.js';

describe('connection', () => {
  describe('getGatewayUrl', () => {
    it('should build the WebSocket URL from the gateway config', () => {
      expect(getGatewayUrl(DEFAULT_CONFIG)).toBe('ws://127.0.0.1:8000');
    });
  });

  describe('parseGatewayMessage', () => {
    it('should accept a done frame', () => {
      const message = parseGatewayMessage(
        JSON.stringify({ type: 'done', command_id: 'c-1', payload: { status: 'success', outcome: 'Success', message: 'ok' } })
      );
      expect(message?.type).toBe('done');
    });

    it('should reject frames it does not understand', () => {
      expect(parseGatewayMessage('nope')).toBeNull();
      expect(parseGatewayMessage(JSON.stringify({ type: 'text_delta', content: 'x' }))).toBeNull();
    });
  });

  describe('handleConnectionError', () => {
    it('should explain a refused connection', () => {
      const error = handleConnectionError(new Error('connect ECONNREFUSED 127.0.0.1:8000'));
      expect(error.type).toBe('gateway_not_running');
      expect(error.suggestion).toBe('Start the gateway with: tutor-command start');
    });

    it('should pass other messages through', () => {
      expect(handleConnectionError('boom')).toMatchObject({ type: 'unknown', message: 'boom' });
    });
  });

  describe('sendToGateway', () => {
    let testDir: string;
    let env: TestStore;
    let capability: ScriptedCapability;
    let gateway: GatewayServer;

    beforeEach(async () => {
      testDir = join(tmpdir(), `connection-test-${randomUUID()}`);
      env = await createTestStore(testDir);
      capability = new ScriptedCapability([]);
      const pipeline = createCommandPipeline({ store: env.store, capability, logger: env.logger, timeoutMs: 2000 });
      gateway = new GatewayServer({ port: 0, host: '127.0.0.1' }, pipeline, env.logger);
      await gateway.start();
    });

    afterEach(async () => {
      await gateway.stop();
      await rm(testDir, { recursive: true, force: true });
    });

    it('should stream calls and resolve with the response', async () => {
      capability.push(
        answer([{ tool: 'add_note_to_report', arguments: { student: 'Le Thi Hoa', note: 'Great focus today' } }])
      );

      const calls: string[] = [];
      const results: CallSummary[] = [];
      const response = await sendToGateway(
        `ws://127.0.0.1:${gateway.port}`,
        { command: 'note for Hoa', tutor_id: 'tutor-3' },
        {
          onToolCall: call => calls.push(call.tool),
          onToolResult: outcome => results.push(outcome),
        }
      );

      expect(calls).toEqual(['add_note_to_report']);
      expect(results[0]?.status).toBe('ok');
      expect(response.status).toBe('success');
      expect(response.outcome).toBe('Success');
      expect(env.store.activityForStudent('stu-003').map(e => e.description)).toEqual(['Great focus today']);
    });

    it('should reject with the gateway error', async () => {
      await expect(sendToGateway(`ws://127.0.0.1:${gateway.port}`, { command: '  ' })).rejects.toThrow(
        'command: Command must not be empty'
      );
    });
  });
});
