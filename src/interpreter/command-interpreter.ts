import { z } from 'zod';
import {
  CommandError,
  ExternalServiceError,
  ParseError,
  TimeoutError,
} from '../errors/index.js';
import { Logger } from '../logging/logger.js';
import type { LanguageCapability, CapabilityRequest } from '../capability/language-capability.js';
import { RosterResolver, type RosterSource } from '../resolver/roster-resolver.js';
import type { MatchOptions } from '../resolver/name-matcher.js';
import type { ToolCall, ToolRegistry } from '../tools/tool-registry.js';

/** The first attempt plus one stricter retry */
const MAX_ATTEMPTS = 2;

export const DEFAULT_TIMEOUT_MS = 60_000;

const ProposedCallSchema = z.object({
  tool: z.string().min(1),
  arguments: z.record(z.unknown()).default({}),
});

const CallListSchema = z.array(ProposedCallSchema);

const PayloadSchema = z.object({
  calls: CallListSchema,
  reply: z.string().optional(),
});

type ProposedCall = z.infer<typeof ProposedCallSchema>;

/**
 * How one referential argument was resolved
 */
export interface ReferenceResolution {
  callId: string;
  field: string;
  reference: string;
  /** Absent when nothing matched; the executor then reports the reference */
  id?: string;
  score?: number;
}

export interface Interpretation {
  calls: ToolCall[];
  reply?: string;
  attempts: number;
  resolutions: ReferenceResolution[];
}

export interface InterpreterOptions {
  timeoutMs?: number;
  match?: Partial<MatchOptions>;
  logger?: Logger;
}

export interface InterpretOptions {
  signal?: AbortSignal;
  /** Logger carrying the command's context */
  logger?: Logger;
}

type CheckResult =
  | { ok: true; calls: ProposedCall[]; reply?: string }
  | { ok: false; problems: string[] };

function describeIssues(error: z.ZodError, prefix: string): string[] {
  return error.issues.map(issue => {
    const path = [prefix, ...issue.path].filter(part => part !== '').join('.');
    return `${path || 'answer'}: ${issue.message}`;
  });
}

/**
 * Settles with `work`, or rejects as soon as `signal` aborts
 */
function untilAborted<T>(work: Promise<T>, signal: AbortSignal): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => reject(signal.reason);
    signal.addEventListener('abort', onAbort, { once: true });
    void work.then(resolve, reject).finally(() => signal.removeEventListener('abort', onAbort));
  });
}

/**
 * CommandInterpreter - Turns instruction text into an ordered list of calls
 *
 * Asks the language capability for a call list, validates it against the
 * tool catalog (retrying once with the problems spelled out), then replaces
 * student and learning object references with roster ids.
 */
export class CommandInterpreter {
  private readonly resolver: RosterResolver;
  private readonly timeoutMs: number;
  private readonly logger: Logger;

  constructor(
    private readonly capability: LanguageCapability,
    private readonly registry: ToolRegistry,
    private readonly roster: RosterSource,
    options: InterpreterOptions = {}
  ) {
    this.resolver = new RosterResolver(roster, options.match);
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.logger = options.logger ?? new Logger({ level: 'info', path: 'tutor-command.log' });
  }

  /**
   * @throws ParseError when no usable call list is produced after the retry
   * @throws TimeoutError when the capability does not answer in time
   * @throws ExternalServiceError when the capability fails or the command is cancelled
   * @throws AmbiguousReferenceError when a reference matches several roster entries
   */
  async interpret(instruction: string, options: InterpretOptions = {}): Promise<Interpretation> {
    const logger = options.logger ?? this.logger;
    let problems: string[] = [];

    for (let attempt = 1; attempt <= MAX_ATTEMPTS; attempt++) {
      const request: CapabilityRequest = {
        instruction,
        tools: this.registry.list(),
        roster: {
          students: [...this.roster.students()],
          learning_objects: [...this.roster.learningObjects()],
        },
        strict: attempt > 1,
        ...(attempt > 1 ? { problems } : {}),
      };

      const answer = await this.ask(request, options.signal);
      const checked = this.check(answer);

      if (checked.ok) {
        const interpretation = this.resolve(checked.calls, attempt);
        await logger.info('Instruction interpreted', {
          operation: 'interpret',
          attempts: attempt,
          tools: interpretation.calls.map(c => c.tool),
        });
        return checked.reply !== undefined ? { ...interpretation, reply: checked.reply } : interpretation;
      }

      problems = checked.problems;
      await logger.warn('Unusable interpretation', { operation: 'interpret', attempt, problems });
    }

    throw new ParseError(problems);
  }

  /**
   * Validates an answer's shape and its conformance to the catalog
   */
  check(answer: unknown): CheckResult {
    if (answer === undefined || answer === null) {
      return { ok: false, problems: ['the answer was empty'] };
    }
    if (typeof answer === 'string') {
      return { ok: false, problems: ['the answer was not JSON'] };
    }

    let calls: ProposedCall[];
    let reply: string | undefined;
    if (Array.isArray(answer)) {
      const parsed = CallListSchema.safeParse(answer);
      if (!parsed.success) return { ok: false, problems: describeIssues(parsed.error, 'calls') };
      calls = parsed.data;
    } else {
      const parsed = PayloadSchema.safeParse(answer);
      if (!parsed.success) return { ok: false, problems: describeIssues(parsed.error, '') };
      calls = parsed.data.calls;
      reply = parsed.data.reply;
    }

    const problems = calls.flatMap((call, index) =>
      this.registry.checkConformance(call.tool, call.arguments).map(issue => `calls.${index}: ${issue.message}`)
    );
    if (problems.length > 0) {
      return { ok: false, problems };
    }
    return reply !== undefined ? { ok: true, calls, reply } : { ok: true, calls };
  }

  private resolve(proposed: ProposedCall[], attempts: number): Interpretation {
    const resolutions: ReferenceResolution[] = [];

    const calls = proposed.map((call, index): ToolCall => {
      const id = `call-${index + 1}`;
      const args = { ...call.arguments };

      if (this.registry.has(call.tool)) {
        for (const reference of this.registry.references(call.tool)) {
          if (reference.kind === 'assignment') continue;
          const value = args[reference.field];
          if (typeof value !== 'string') continue;

          const resolution = this.resolver.resolve(reference.kind, value);
          if (resolution.status === 'resolved') {
            args[reference.field] = resolution.id;
            resolutions.push({
              callId: id,
              field: reference.field,
              reference: value,
              id: resolution.id,
              score: resolution.score,
            });
          } else {
            resolutions.push({ callId: id, field: reference.field, reference: value });
          }
        }
      }

      return { id, tool: call.tool, arguments: args };
    });

    return { calls, attempts, resolutions };
  }

  private async ask(request: CapabilityRequest, outer: AbortSignal | undefined): Promise<unknown> {
    if (outer?.aborted) {
      throw new ExternalServiceError('Command was cancelled before the language capability answered');
    }

    const controller = new AbortController();
    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.timeoutMs);
    const onOuterAbort = (): void => controller.abort();
    outer?.addEventListener('abort', onOuterAbort, { once: true });

    try {
      return await untilAborted(this.capability.interpret(request, controller.signal), controller.signal);
    } catch (error) {
      if (timedOut) {
        throw new TimeoutError(this.timeoutMs);
      }
      if (error instanceof CommandError) {
        throw error;
      }
      if (controller.signal.aborted) {
        throw new ExternalServiceError('Command was cancelled before the language capability answered', {
          cause: error,
        });
      }
      const reason = error instanceof Error ? error.message : String(error);
      throw new ExternalServiceError(`Language capability ${this.capability.name} failed: ${reason}`, {
        cause: error,
      });
    } finally {
      clearTimeout(timer);
      outer?.removeEventListener('abort', onOuterAbort);
    }
  }
}
