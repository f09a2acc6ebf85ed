/**
 * Terminal formatting for command responses and streamed events
 */

import type { CommandResponse, CommandStatus } from '../../command/response-aggregator.js';
import type { CallOutcome } from '../../tools/tool-executor.js';
import type { ToolCall } from '../../tools/tool-registry.js';

/** The parts of a response the terminal shows; also what `send` receives */
export type ResponseSummary = Pick<CommandResponse, 'status' | 'message'> & { error?: { code: string } };

export type CallSummary = Pick<CallOutcome, 'tool' | 'status' | 'message'> & { error?: { message: string } };

const RESET = '\x1b[0m';
const BOLD = '\x1b[1m';
const GREEN = '\x1b[32m';
const YELLOW = '\x1b[33m';
const RED = '\x1b[31m';
const GRAY = '\x1b[90m';

const STATUS_COLORS: Record<CommandStatus, string> = {
  success: GREEN,
  partial_success: YELLOW,
  failure: RED,
};

export interface FormatOptions {
  /** Emit ANSI colors (default: true) */
  color?: boolean;
}

function paint(text: string, code: string, options: FormatOptions): string {
  return options.color === false ? text : `${code}${text}${RESET}`;
}

/**
 * Headline in the status color, call lines as-is, error code last
 */
export function formatResponse(response: ResponseSummary, options: FormatOptions = {}): string {
  const [headline = '', ...lines] = response.message.split('\n');
  const output = [paint(headline, `${BOLD}${STATUS_COLORS[response.status]}`, options), ...lines];
  if (response.error) {
    output.push(paint(`(${response.error.code})`, GRAY, options));
  }
  return output.join('\n');
}

export function formatToolCall(call: Pick<ToolCall, 'tool' | 'arguments'>, options: FormatOptions = {}): string {
  return paint(`→ ${call.tool} ${JSON.stringify(call.arguments)}`, GRAY, options);
}

export function formatCallOutcome(outcome: CallSummary, options: FormatOptions = {}): string {
  switch (outcome.status) {
    case 'ok':
      return `${paint('✓', GREEN, options)} ${outcome.message ?? outcome.tool}`;
    case 'skipped':
      return `${paint('-', GRAY, options)} ${outcome.tool} skipped`;
    case 'error':
      return `${paint('✗', RED, options)} ${outcome.tool}: ${outcome.error?.message ?? 'failed'}`;
  }
}
