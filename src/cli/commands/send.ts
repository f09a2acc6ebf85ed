/**
 * Send command - Sends an instruction to a running gateway and streams progress
 */

import { Command } from 'commander';
import { loadContext, type WorkspaceOptions } from '../utils/context.js';
import { formatCallOutcome, formatResponse, formatToolCall } from '../utils/format.js';
import { displayConnectionError, getGatewayUrl, handleConnectionError, sendToGateway } from '../utils/connection.js';

interface SendOptions extends WorkspaceOptions {
  tutor?: string;
  url?: string;
}

export function sendCommand(): Command {
  const cmd = new Command('send');

  cmd
    .description('Send an instruction to a running gateway')
    .argument('<text>', 'Instruction in plain language')
    .option('-t, --tutor <id>', 'Tutor id recorded with the command')
    .option('-u, --url <url>', 'Gateway WebSocket URL (defaults to the configured host and port)')
    .option('-w, --workspace <path>', 'Workspace directory')
    .action(async (text: string, options: SendOptions) => {
      await runSend(text, options);
    });

  return cmd;
}

async function runSend(text: string, options: SendOptions): Promise<void> {
  let url = options.url;
  if (url === undefined) {
    try {
      url = getGatewayUrl((await loadContext(options)).config);
    } catch (error) {
      console.error(error instanceof Error ? error.message : String(error));
      process.exit(1);
    }
  }

  try {
    const response = await sendToGateway(
      url,
      options.tutor !== undefined ? { command: text, tutor_id: options.tutor } : { command: text },
      {
        onToolCall: call => console.log(formatToolCall(call)),
        onToolResult: outcome => console.log(formatCallOutcome(outcome)),
      }
    );
    console.log(`\n${formatResponse(response)}`);
    if (response.status === 'failure') {
      process.exitCode = 1;
    }
  } catch (error) {
    displayConnectionError(handleConnectionError(error));
    process.exit(1);
  }
}
