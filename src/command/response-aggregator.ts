import { toErrorPayload, type ErrorPayload } from '../errors/index.js';
import type { CallOutcome } from '../tools/tool-executor.js';

export type CommandStatus = 'success' | 'partial_success' | 'failure';

export type CommandOutcome =
  | 'Success'
  | 'PartialSuccess'
  | 'ValidationFailure'
  | 'InterpretationFailure'
  | 'StoreIOFailure';

/**
 * What the tutor gets back for one instruction
 */
export interface CommandResponse {
  status: CommandStatus;
  outcome: CommandOutcome;
  /** Headline followed by one line per call */
  message: string;
  calls: CallOutcome[];
  /** Command-level failure, set when nothing could be executed */
  error?: ErrorPayload;
}

export const NO_ACTION_MESSAGE = 'No action was needed for this instruction.';

function plural(count: number, noun: string): string {
  return `${count} ${noun}${count === 1 ? '' : 's'}`;
}

function describeCall(outcome: CallOutcome, index: number): string {
  const detail =
    outcome.status === 'error' ? (outcome.error?.message ?? 'failed') : (outcome.message ?? outcome.status);
  return `${index + 1}. ${outcome.tool} [${outcome.status}] ${detail}`;
}

/**
 * ResponseAggregator - Merges per-call outcomes into one response
 *
 * Successes and failures are always reported together. A store failure
 * outranks every other outcome since the caller must retry the whole command.
 */
export class ResponseAggregator {
  aggregate(calls: CallOutcome[], reply?: string): CommandResponse {
    const ok = calls.filter(c => c.status === 'ok').length;
    const failed = calls.length - ok;

    if (calls.length === 0) {
      return { status: 'success', outcome: 'Success', message: reply ?? NO_ACTION_MESSAGE, calls };
    }

    let status: CommandStatus;
    let outcome: CommandOutcome;
    let headline: string;

    if (calls.some(c => c.error?.code === 'store_io_error')) {
      status = 'failure';
      outcome = 'StoreIOFailure';
      headline =
        `Stopped after ${plural(ok, 'completed action')}: the records could not be saved. ` +
        'Treat the records as unverified and retry the whole instruction.';
    } else if (failed === 0) {
      status = 'success';
      outcome = 'Success';
      headline = `Completed ${plural(ok, 'action')}.`;
    } else if (ok > 0) {
      status = 'partial_success';
      outcome = 'PartialSuccess';
      headline = `Completed ${ok} of ${plural(calls.length, 'action')}; ${failed} failed.`;
    } else {
      status = 'failure';
      outcome = 'ValidationFailure';
      headline = `No action completed; ${failed === 1 ? 'the action' : `all ${failed} actions`} failed.`;
    }

    const lines = calls.map(describeCall);
    return { status, outcome, message: [headline, ...lines].join('\n'), calls };
  }

  /**
   * Response for a command that failed before any tool ran
   */
  interpretationFailure(error: unknown): CommandResponse {
    const payload = toErrorPayload(error);
    return {
      status: 'failure',
      outcome: 'InterpretationFailure',
      message: `Could not carry out the instruction: ${payload.message}`,
      calls: [],
      error: payload,
    };
  }
}
