/**
 * Run command - Carries out one instruction in-process, without a gateway
 */

import { Command } from 'commander';
import { createRuntime, type WorkspaceOptions } from '../utils/context.js';
import { formatCallOutcome, formatResponse, formatToolCall } from '../utils/format.js';

interface RunOptions extends WorkspaceOptions {
  tutor?: string;
  json?: boolean;
}

export function runCommand(): Command {
  const cmd = new Command('run');

  cmd
    .description('Carry out an instruction against the local records')
    .argument('<text>', 'Instruction in plain language')
    .option('-t, --tutor <id>', 'Tutor id recorded with the command')
    .option('--json', 'Print the full response as JSON')
    .option('-w, --workspace <path>', 'Workspace directory')
    .action(async (text: string, options: RunOptions) => {
      await runInstruction(text, options);
    });

  return cmd;
}

async function runInstruction(text: string, options: RunOptions): Promise<void> {
  let runtime;
  try {
    runtime = await createRuntime(options);
  } catch (error) {
    console.error(error instanceof Error ? error.message : String(error));
    process.exit(1);
  }

  const request = options.tutor !== undefined ? { command: text, tutorId: options.tutor } : { command: text };

  for await (const event of runtime.pipeline.stream(request)) {
    if (options.json) {
      if (event.type === 'done') {
        console.log(JSON.stringify(event.response, null, 2));
      }
      continue;
    }

    switch (event.type) {
      case 'tool_call':
        console.log(formatToolCall(event.call));
        break;
      case 'tool_result':
        console.log(formatCallOutcome(event.outcome));
        break;
      case 'done':
        console.log(`\n${formatResponse(event.response)}`);
        if (event.response.status === 'failure') {
          process.exitCode = 1;
        }
        break;
      default:
        break;
    }
  }
}
