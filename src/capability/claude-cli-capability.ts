import { spawn, type ChildProcess } from 'node:child_process';
import { ExternalServiceError } from '../errors/index.js';
import { Logger } from '../logging/logger.js';
import type { ToolDefinition } from '../tools/tool-catalog.js';
import type { CapabilityRequest, LanguageCapability, RosterSnapshot } from './language-capability.js';
import { parseJsonOutput } from './json-extract.js';

export interface ClaudeCliConfig {
  cliPath: string;
  model: string;
}

export const DEFAULT_CLAUDE_CLI_CONFIG: ClaudeCliConfig = {
  cliPath: 'claude',
  model: 'sonnet',
};

const INSTRUCTIONS = `You turn a tutor's instruction into calls to the tools of a tutoring record system.
Answer with a single JSON object and nothing else:
{"calls": [{"tool": "<tool name>", "arguments": {<argument>: <value>}}], "reply": "<optional short message>"}

Rules:
- Use only the tools listed below, with the argument names they declare.
- Integers must be JSON numbers, not strings.
- For students and learning objects, use the id from the roster when the tutor's wording clearly names one entry; otherwise copy the tutor's wording exactly.
- List calls in the order the tutor asked for them.
- If the instruction needs no tool, return {"calls": [], "reply": "<your answer>"}.`;

/**
 * ClaudeCliCapability - Interprets instructions with the Claude CLI in print mode
 *
 * The prompt goes to the CLI on stdin and the first JSON value found in its
 * output is returned. Output with no JSON in it is returned as raw text so
 * the interpreter can report it.
 */
export class ClaudeCliCapability implements LanguageCapability {
  readonly name = 'claude-cli';
  private config: ClaudeCliConfig;
  private logger: Logger;

  constructor(config: Partial<ClaudeCliConfig> = {}, logger?: Logger) {
    this.config = { ...DEFAULT_CLAUDE_CLI_CONFIG, ...config };
    this.logger = logger ?? new Logger({ level: 'info', path: 'tutor-command.log' });
  }

  getConfig(): ClaudeCliConfig {
    return { ...this.config };
  }

  formatTools(tools: ToolDefinition[]): string {
    return tools
      .map(tool => {
        const required = new Set(tool.parameters.required);
        const params = Object.entries(tool.parameters.properties)
          .map(([name, prop]) => {
            const flags = [prop.type, required.has(name) ? 'required' : 'optional'];
            if (prop.enum) flags.push(`one of ${prop.enum.join(' | ')}`);
            if (prop.minimum !== undefined) flags.push(`>= ${prop.minimum}`);
            return `  - ${name} (${flags.join(', ')}): ${prop.description ?? ''}`.trimEnd();
          })
          .join('\n');
        return `- ${tool.name}: ${tool.description}\n${params}`;
      })
      .join('\n\n');
  }

  formatRoster(roster: RosterSnapshot): string {
    const students = roster.students.map(s => `- ${s.id}: ${s.name}`).join('\n') || '(none)';
    const objects =
      roster.learning_objects.map(lo => `- ${lo.id} [${lo.code}]: ${lo.title}`).join('\n') || '(none)';
    return `Students:\n${students}\n\nLearning objects:\n${objects}`;
  }

  buildPrompt(request: CapabilityRequest): string {
    const parts = [
      INSTRUCTIONS,
      `Available tools:\n${this.formatTools(request.tools)}`,
      this.formatRoster(request.roster),
    ];

    if (request.strict) {
      const problems = (request.problems ?? []).map(p => `- ${p}`).join('\n');
      parts.push(
        `Your previous answer could not be used:\n${problems}\n` +
          'Reply again with ONLY the JSON object described above. No prose, no code fences.'
      );
    }

    parts.push(`Tutor instruction:\n${request.instruction}`);
    return parts.join('\n\n');
  }

  /**
   * Spawns the CLI with the prompt on stdin
   */
  spawnClaude(prompt: string, signal: AbortSignal): ChildProcess {
    const child = spawn(this.config.cliPath, ['--print', '--model', this.config.model], {
      stdio: ['pipe', 'pipe', 'pipe'],
      signal,
    });

    if (child.stdin) {
      // the process may exit or fail to start before reading its input
      child.stdin.on('error', () => undefined);
      child.stdin.write(prompt);
      child.stdin.end();
    }

    return child;
  }

  async interpret(request: CapabilityRequest, signal: AbortSignal): Promise<unknown> {
    const output = await this.run(this.buildPrompt(request), signal);
    const parsed = parseJsonOutput(output);
    if (parsed === undefined) {
      await this.logger.warn('Claude CLI output contained no JSON', { outputLength: output.length });
      return output;
    }
    return parsed;
  }

  private run(prompt: string, signal: AbortSignal): Promise<string> {
    return new Promise((resolve, reject) => {
      let stdout = '';
      let stderr = '';
      let settled = false;

      const fail = (error: ExternalServiceError): void => {
        if (settled) return;
        settled = true;
        reject(error);
      };

      let child: ChildProcess;
      try {
        child = this.spawnClaude(prompt, signal);
      } catch (error) {
        fail(new ExternalServiceError('Failed to start the Claude CLI', { cause: error }));
        return;
      }

      child.stdout?.on('data', (chunk: Buffer) => {
        stdout += chunk.toString();
      });
      child.stderr?.on('data', (chunk: Buffer) => {
        stderr += chunk.toString();
      });

      child.on('error', error => {
        if (error.name === 'AbortError') {
          fail(new ExternalServiceError('Language capability request was cancelled', { cause: error }));
        } else {
          fail(new ExternalServiceError(`Failed to run the Claude CLI: ${error.message}`, { cause: error }));
        }
      });

      child.on('close', code => {
        if (settled) return;
        if (code !== 0) {
          fail(
            new ExternalServiceError(
              `Claude CLI exited with code ${code ?? 'null'}${stderr ? `: ${stderr.trim()}` : ''}`
            )
          );
          return;
        }
        if (stderr) {
          this.logger.warn('Claude CLI stderr', { stderr: stderr.trim() }).catch(() => undefined);
        }
        settled = true;
        resolve(stdout);
      });
    });
  }
}
