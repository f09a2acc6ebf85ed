/**
 * Gateway connection utilities for the `send` command
 */

import WebSocket from 'ws';
import { z } from 'zod';
import type { TutorCommandConfig } from '../../config/config-manager.js';
import type { CallSummary, ResponseSummary } from './format.js';

export type ConnectionErrorType = 'gateway_not_running' | 'host_not_found' | 'timeout' | 'unknown';

/**
 * Connection error with a hint for the tutor
 */
export interface ConnectionError {
  type: ConnectionErrorType;
  message: string;
  suggestion: string;
}

const ErrorSummarySchema = z.object({ code: z.string(), message: z.string() });

const GatewayMessageSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('connected'), clientId: z.string() }),
  z.object({
    type: z.literal('interpreted'),
    command_id: z.string(),
    payload: z.object({ reply: z.string().optional() }),
  }),
  z.object({
    type: z.literal('tool_call'),
    command_id: z.string(),
    payload: z.object({ tool: z.string(), arguments: z.record(z.unknown()) }),
  }),
  z.object({
    type: z.literal('tool_result'),
    command_id: z.string(),
    payload: z.object({
      tool: z.string(),
      status: z.enum(['ok', 'error', 'skipped']),
      message: z.string().optional(),
      error: ErrorSummarySchema.optional(),
    }),
  }),
  z.object({
    type: z.literal('done'),
    command_id: z.string(),
    payload: z.object({
      status: z.enum(['success', 'partial_success', 'failure']),
      outcome: z.string(),
      message: z.string(),
      error: ErrorSummarySchema.optional(),
    }),
  }),
  z.object({ type: z.literal('error'), error: z.string() }),
]);

export type GatewayMessage = z.infer<typeof GatewayMessageSchema>;

export interface CommandCallbacks {
  onToolCall?: (call: { tool: string; arguments: Record<string, unknown> }) => void;
  onToolResult?: (outcome: CallSummary) => void;
}

export type CommandResult = ResponseSummary & { outcome: string };

export function getGatewayUrl(config: TutorCommandConfig): string {
  return `ws://${config.gateway.host}:${config.gateway.port}`;
}

/**
 * Parses one gateway frame, or returns null when it is not one
 */
export function parseGatewayMessage(data: string): GatewayMessage | null {
  let raw: unknown;
  try {
    raw = JSON.parse(data);
  } catch {
    return null;
  }
  const parsed = GatewayMessageSchema.safeParse(raw);
  return parsed.success ? parsed.data : null;
}

/**
 * Sends one command over WebSocket and resolves with the final response
 */
export function sendToGateway(
  url: string,
  command: { command: string; tutor_id?: string },
  callbacks: CommandCallbacks = {},
  timeoutMs: number = 120_000
): Promise<CommandResult> {
  return new Promise((resolve, reject) => {
    const ws = new WebSocket(url);
    let settled = false;

    const finish = (outcome: { result: CommandResult } | { error: Error }): void => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      ws.close();
      if ('result' in outcome) {
        resolve(outcome.result);
      } else {
        reject(outcome.error);
      }
    };

    const timer = setTimeout(() => {
      finish({ error: new Error(`No response from the gateway within ${timeoutMs}ms (timeout)`) });
    }, timeoutMs);

    ws.on('message', data => {
      const message = parseGatewayMessage(data.toString());
      if (!message) {
        finish({ error: new Error('Gateway sent a message this client does not understand') });
        return;
      }

      switch (message.type) {
        case 'connected':
          ws.send(JSON.stringify({ type: 'command', ...command }));
          break;
        case 'interpreted':
          break;
        case 'tool_call':
          callbacks.onToolCall?.(message.payload);
          break;
        case 'tool_result':
          callbacks.onToolResult?.(message.payload);
          break;
        case 'done':
          finish({ result: message.payload });
          break;
        case 'error':
          finish({ error: new Error(message.error) });
          break;
      }
    });

    ws.on('error', error => finish({ error }));
    ws.on('close', () => finish({ error: new Error('Connection closed before the command finished') }));
  });
}

/**
 * Maps a connection failure to a message and a next step
 */
export function handleConnectionError(error: unknown): ConnectionError {
  const errorMessage = error instanceof Error ? error.message : String(error);

  if (errorMessage.includes('ECONNREFUSED')) {
    return {
      type: 'gateway_not_running',
      message: 'Cannot connect to the gateway - connection refused.',
      suggestion: 'Start the gateway with: tutor-command start',
    };
  }
  if (errorMessage.includes('ENOTFOUND')) {
    return {
      type: 'host_not_found',
      message: 'Cannot resolve the gateway host.',
      suggestion: 'Check your configuration with: tutor-command config get gateway',
    };
  }
  if (errorMessage.includes('ETIMEDOUT') || errorMessage.includes('timeout')) {
    return {
      type: 'timeout',
      message: 'The gateway did not answer in time.',
      suggestion: 'Check the gateway logs with: tutor-command logs --level warn',
    };
  }
  return {
    type: 'unknown',
    message: errorMessage,
    suggestion: 'Check the gateway logs with: tutor-command logs',
  };
}

export function displayConnectionError(error: ConnectionError): void {
  console.error(`\n\x1b[31mError:\x1b[0m ${error.message}`);
  console.error(`\n\x1b[33mSuggestion:\x1b[0m ${error.suggestion}\n`);
}
