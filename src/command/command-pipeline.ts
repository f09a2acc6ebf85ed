import { randomUUID } from 'node:crypto';
import { CommandError, toErrorPayload } from '../errors/index.js';
import type { Logger } from '../logging/logger.js';
import type { LanguageCapability } from '../capability/language-capability.js';
import { CommandInterpreter, type Interpretation } from '../interpreter/command-interpreter.js';
import type { MatchOptions } from '../resolver/name-matcher.js';
import type { RecordStore } from '../storage/record-store.js';
import { ToolRegistry, type ToolCall } from '../tools/tool-registry.js';
import { ToolExecutor, type CallOutcome } from '../tools/tool-executor.js';
import { createTutorTools } from '../tools/tutor-tools.js';
import { ResponseAggregator, type CommandResponse } from './response-aggregator.js';

export interface CommandRequest {
  command: string;
  tutorId?: string;
  /** Cancels the language capability call; tools already running finish */
  signal?: AbortSignal;
}

/**
 * One timestamped step of a command's processing
 */
export interface TraceStep {
  at: string;
  step: 'received' | 'interpreted' | 'interpretation_failed' | 'tool_call' | 'tool_result' | 'completed';
  detail?: Record<string, unknown>;
}

export interface PipelineResponse extends CommandResponse {
  command_id: string;
  tutor_id?: string;
  trace: TraceStep[];
  processing_time_ms: number;
}

export type PipelineEvent =
  | { type: 'interpreted'; commandId: string; calls: ToolCall[]; attempts: number; reply?: string }
  | { type: 'tool_call'; commandId: string; call: ToolCall }
  | { type: 'tool_result'; commandId: string; outcome: CallOutcome }
  | { type: 'done'; commandId: string; response: PipelineResponse };

/**
 * CommandPipeline - Interpreter → Executor → Aggregator for one command at a time
 *
 * Commands queue behind a single lock so that only one of them touches the
 * store at any moment, whichever transport they arrive on.
 */
export class CommandPipeline {
  private tail: Promise<void> = Promise.resolve();
  private pendingCount = 0;

  constructor(
    private readonly interpreter: CommandInterpreter,
    private readonly executor: ToolExecutor,
    private readonly aggregator: ResponseAggregator,
    private readonly logger: Logger,
    private readonly clock: () => Date = () => new Date()
  ) {}

  /**
   * Commands waiting for the lock or running
   */
  get pending(): number {
    return this.pendingCount;
  }

  /**
   * Processes a command, yielding progress events and finally `done`
   */
  async *stream(request: CommandRequest): AsyncGenerator<PipelineEvent> {
    this.pendingCount++;
    const release = await this.acquire();
    try {
      yield* this.process(request);
    } finally {
      release();
      this.pendingCount--;
    }
  }

  async run(request: CommandRequest): Promise<PipelineResponse> {
    let response: PipelineResponse | undefined;
    for await (const event of this.stream(request)) {
      if (event.type === 'done') {
        response = event.response;
      }
    }
    if (!response) {
      throw new Error('Command finished without a response');
    }
    return response;
  }

  private acquire(): Promise<() => void> {
    const previous = this.tail;
    let release: () => void = () => undefined;
    const current = new Promise<void>(resolve => {
      release = resolve;
    });
    this.tail = previous.then(() => current);
    return previous.then(() => release);
  }

  private async *process(request: CommandRequest): AsyncGenerator<PipelineEvent> {
    const commandId = randomUUID();
    const startTime = Date.now();
    const trace: TraceStep[] = [];
    const note = (step: TraceStep['step'], detail?: Record<string, unknown>): void => {
      trace.push(detail ? { at: this.clock().toISOString(), step, detail } : { at: this.clock().toISOString(), step });
    };
    const logger = this.logger.child({
      commandId,
      ...(request.tutorId !== undefined ? { tutorId: request.tutorId } : {}),
    });

    const finish = (response: CommandResponse): PipelineResponse => {
      note('completed', { outcome: response.outcome });
      return {
        ...response,
        command_id: commandId,
        ...(request.tutorId !== undefined ? { tutor_id: request.tutorId } : {}),
        trace,
        processing_time_ms: Date.now() - startTime,
      };
    };

    note('received', { command: request.command });
    await logger.info('Command received', { operation: 'command', length: request.command.length });

    let interpretation: Interpretation;
    try {
      interpretation = await this.interpreter.interpret(request.command, {
        logger,
        ...(request.signal ? { signal: request.signal } : {}),
      });
    } catch (error) {
      const payload = toErrorPayload(error);
      note('interpretation_failed', { code: payload.code, message: payload.message });
      if (error instanceof CommandError) {
        await logger.warn('Interpretation failed', { code: payload.code, reason: payload.message });
      } else {
        await logger.error('Interpretation failed unexpectedly', error);
      }
      yield { type: 'done', commandId, response: finish(this.aggregator.interpretationFailure(error)) };
      return;
    }

    note('interpreted', {
      attempts: interpretation.attempts,
      tools: interpretation.calls.map(c => c.tool),
      resolutions: interpretation.resolutions,
    });
    yield {
      type: 'interpreted',
      commandId,
      calls: interpretation.calls,
      attempts: interpretation.attempts,
      ...(interpretation.reply !== undefined ? { reply: interpretation.reply } : {}),
    };

    const outcomes: CallOutcome[] = [];
    for await (const step of this.executor.steps(interpretation.calls, logger)) {
      if (step.type === 'tool_call') {
        note('tool_call', { id: step.call.id, tool: step.call.tool });
        yield { type: 'tool_call', commandId, call: step.call };
      } else {
        outcomes.push(step.outcome);
        note('tool_result', {
          id: step.outcome.id,
          status: step.outcome.status,
          ...(step.outcome.error ? { code: step.outcome.error.code } : {}),
        });
        yield { type: 'tool_result', commandId, outcome: step.outcome };
      }
    }

    const response = finish(this.aggregator.aggregate(outcomes, interpretation.reply));
    await logger.info('Command completed', {
      operation: 'command',
      outcome: response.outcome,
      durationMs: response.processing_time_ms,
    });
    yield { type: 'done', commandId, response };
  }
}

export interface PipelineOptions {
  store: RecordStore;
  capability: LanguageCapability;
  logger: Logger;
  timeoutMs?: number;
  match?: Partial<MatchOptions>;
}

/**
 * Wires the tutor tools, interpreter and executor around a loaded store
 */
export function createCommandPipeline(options: PipelineOptions): CommandPipeline {
  const registry = new ToolRegistry(createTutorTools());
  const interpreter = new CommandInterpreter(options.capability, registry, options.store, {
    logger: options.logger,
    ...(options.timeoutMs !== undefined ? { timeoutMs: options.timeoutMs } : {}),
    ...(options.match ? { match: options.match } : {}),
  });
  const executor = new ToolExecutor(registry, options.store, options.logger);
  return new CommandPipeline(interpreter, executor, new ResponseAggregator(), options.logger, () =>
    options.store.now()
  );
}
