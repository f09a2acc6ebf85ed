/**
 * Start command - Runs the gateway in the foreground
 */

import { Command } from 'commander';
import { GatewayServer } from '../../gateway/gateway-server.js';
import { createRuntime, parsePositiveInt, type WorkspaceOptions } from '../utils/context.js';

interface StartOptions extends WorkspaceOptions {
  port?: number;
  host?: string;
}

export function startCommand(): Command {
  const cmd = new Command('start');

  cmd
    .description('Start the gateway (HTTP and WebSocket)')
    .option('-p, --port <port>', 'Port to listen on', parsePositiveInt)
    .option('--host <host>', 'Interface to bind')
    .option('-w, --workspace <path>', 'Workspace directory')
    .action(async (options: StartOptions) => {
      await runStart(options);
    });

  return cmd;
}

async function runStart(options: StartOptions): Promise<void> {
  let runtime;
  try {
    runtime = await createRuntime(options);
  } catch (error) {
    console.error(error instanceof Error ? error.message : String(error));
    process.exit(1);
  }

  const { config, logger, pipeline, store, workspace } = runtime;
  const gateway = new GatewayServer(
    {
      port: options.port ?? config.gateway.port,
      host: options.host ?? config.gateway.host,
      shutdownTimeoutMs: config.gateway.shutdownTimeoutMs,
    },
    pipeline,
    logger
  );

  const shutdown = (): void => {
    console.log('\nShutting down...');
    gateway.stop().then(
      () => process.exit(0),
      (error: unknown) => {
        console.error('Failed to stop gateway:', error instanceof Error ? error.message : String(error));
        process.exit(1);
      }
    );
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);

  try {
    await gateway.start();
    const { host } = gateway.getConfig();
    console.log(`Gateway listening on http://${host}:${gateway.port}`);
    console.log(`Data: ${workspace.dataDir} (${store.students().length} students, ${store.learningObjects().length} learning objects)`);
    console.log('\nPress Ctrl+C to stop');
  } catch (error) {
    console.error('Failed to start gateway:', error instanceof Error ? error.message : String(error));
    process.exit(1);
  }
}
