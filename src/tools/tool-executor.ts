import type { ZodError } from 'zod';
import {
  CommandError,
  EntityReferenceError,
  StoreIOError,
  ValidationError,
  toErrorPayload,
  type ErrorPayload,
} from '../errors/index.js';
import { settleLog, type Logger } from '../logging/logger.js';
import type { RecordStore } from '../storage/record-store.js';
import type { ToolArgs, ToolName } from './tool-catalog.js';
import type { ToolCall, ToolContext, ToolOutput, ToolRegistry } from './tool-registry.js';

export type CallStatus = 'ok' | 'error' | 'skipped';

/**
 * What happened to one proposed call
 */
export interface CallOutcome {
  id: string;
  tool: string;
  arguments: Record<string, unknown>;
  status: CallStatus;
  message?: string;
  result?: Record<string, unknown>;
  error?: ErrorPayload;
}

export type ExecutionStep =
  | { type: 'tool_call'; call: ToolCall }
  | { type: 'tool_result'; outcome: CallOutcome };

/**
 * Maps the first zod issue to a ValidationError naming the field
 */
export function toValidationError(error: ZodError): ValidationError {
  const issue = error.issues[0];
  if (!issue) {
    return new ValidationError('arguments', 'invalid arguments');
  }
  const field = issue.path.length > 0 ? issue.path.join('.') : 'arguments';
  const reason =
    issue.code === 'invalid_type' && issue.received === 'undefined' ? 'is required' : issue.message;
  return new ValidationError(field, reason);
}

/**
 * A failure after which no further call may touch the store
 */
export function isFatal(outcome: CallOutcome): boolean {
  return outcome.error?.code === 'store_io_error';
}

/**
 * ToolExecutor - Validates and runs proposed calls one at a time
 *
 * Each call is checked against the registry, its arguments parsed with the
 * tool's schema and its references looked up before the handler runs. A
 * failing call does not affect the others, except for store I/O failures,
 * which skip every remaining call.
 */
export class ToolExecutor {
  private readonly context: ToolContext;

  constructor(
    private readonly registry: ToolRegistry,
    private readonly store: RecordStore,
    private readonly logger: Logger
  ) {
    this.context = { store, clock: () => store.now(), logger };
  }

  /**
   * @param parentLogger - Logger carrying the command's context
   */
  async execute(call: ToolCall, parentLogger: Logger = this.logger): Promise<CallOutcome> {
    const base = { id: call.id, tool: call.tool, arguments: call.arguments };
    const logger = parentLogger.child({ operation: 'tool_call', toolName: call.tool, callId: call.id });
    const startTime = Date.now();

    let output: ToolOutput;
    try {
      output = await this.invoke(call);
    } catch (error) {
      if (error instanceof StoreIOError || !(error instanceof CommandError)) {
        await settleLog(logger.error('Tool call failed', error), 'tool');
      } else {
        await settleLog(logger.warn('Tool call rejected', { code: error.code, reason: error.message }), 'tool');
      }
      return { ...base, status: 'error', error: toErrorPayload(error) };
    }

    await settleLog(logger.debug('Tool call succeeded', { durationMs: Date.now() - startTime }), 'tool');
    return { ...base, status: 'ok', message: output.message, result: output.data };
  }

  skip(call: ToolCall): CallOutcome {
    return {
      id: call.id,
      tool: call.tool,
      arguments: call.arguments,
      status: 'skipped',
      message: 'Not run because an earlier call could not write to the store',
    };
  }

  /**
   * Runs calls in order, yielding each call before it runs and its outcome
   * after
   */
  async *steps(calls: readonly ToolCall[], logger: Logger = this.logger): AsyncGenerator<ExecutionStep> {
    let halted = false;
    for (const call of calls) {
      if (halted) {
        yield { type: 'tool_result', outcome: this.skip(call) };
        continue;
      }
      yield { type: 'tool_call', call };
      const outcome = await this.execute(call, logger);
      halted = isFatal(outcome);
      yield { type: 'tool_result', outcome };
    }
  }

  async executeAll(calls: readonly ToolCall[]): Promise<CallOutcome[]> {
    const outcomes: CallOutcome[] = [];
    for await (const step of this.steps(calls)) {
      if (step.type === 'tool_result') {
        outcomes.push(step.outcome);
      }
    }
    return outcomes;
  }

  private async invoke(call: ToolCall): Promise<ToolOutput> {
    const name = call.tool;
    if (!this.registry.has(name)) {
      throw new ValidationError('tool', `unknown tool '${name}'`);
    }
    return this.invokeTool(name, call.arguments);
  }

  private async invokeTool<N extends ToolName>(name: N, rawArgs: Record<string, unknown>): Promise<ToolOutput> {
    const spec = this.registry.spec(name);

    const parsed = spec.schema.safeParse(rawArgs);
    if (!parsed.success) {
      throw toValidationError(parsed.error);
    }

    const args: ToolArgs[N] = parsed.data;
    for (const reference of spec.references) {
      const value = args[reference.field];
      if (typeof value !== 'string' || !this.store.has(reference.kind, value)) {
        throw new EntityReferenceError(reference.kind, String(value));
      }
    }

    return spec.handler(args, this.context);
  }
}
