/**
 * Config command - View and edit the workspace configuration
 */

import { Command } from 'commander';
import { ConfigManager } from '../../config/config-manager.js';
import { resolveWorkspace, type WorkspaceOptions } from '../utils/context.js';

export function configCommand(): Command {
  const cmd = new Command('config');

  cmd.description('View and edit configuration').option('-w, --workspace <path>', 'Workspace directory');

  const workspaceOptions = (): WorkspaceOptions => {
    const workspace: unknown = cmd.opts()['workspace'];
    return typeof workspace === 'string' ? { workspace } : {};
  };

  cmd
    .command('show')
    .description('Show the effective configuration')
    .action(async () => {
      await showConfig(workspaceOptions());
    });

  cmd
    .command('get <key>')
    .description('Get a configuration value (e.g., gateway.port)')
    .action(async (key: string) => {
      await getConfig(workspaceOptions(), key);
    });

  cmd
    .command('set <key> <value>')
    .description('Set a configuration value (e.g., resolver.acceptThreshold 0.7)')
    .action(async (key: string, value: string) => {
      await setConfig(workspaceOptions(), key, value);
    });

  cmd.action(async () => {
    await showConfig(workspaceOptions());
  });

  return cmd;
}

async function loadManager(options: WorkspaceOptions): Promise<ConfigManager> {
  const configManager = new ConfigManager(resolveWorkspace(options).configPath);
  const result = await configManager.load();
  if (!result.success) {
    console.error('Configuration error:');
    for (const error of result.errors ?? []) {
      console.error(`  - ${error}`);
    }
    process.exit(1);
  }
  return configManager;
}

async function showConfig(options: WorkspaceOptions): Promise<void> {
  const configManager = await loadManager(options);
  console.log(`Configuration (${configManager.path}):\n`);
  console.log(JSON.stringify(configManager.config, null, 2));
}

async function getConfig(options: WorkspaceOptions, key: string): Promise<void> {
  const configManager = await loadManager(options);
  const value = configManager.get(key);

  if (value === undefined) {
    console.error(`Configuration key not found: ${key}`);
    process.exit(1);
  }
  console.log(typeof value === 'object' ? JSON.stringify(value, null, 2) : String(value));
}

/**
 * Numbers and booleans are stored as such; everything else as a string
 */
export function parseConfigValue(value: string): unknown {
  if (value.trim() !== '' && !Number.isNaN(Number(value))) {
    return Number(value);
  }
  if (value.toLowerCase() === 'true') return true;
  if (value.toLowerCase() === 'false') return false;
  return value;
}

async function setConfig(options: WorkspaceOptions, key: string, value: string): Promise<void> {
  const workspace = resolveWorkspace(options);
  if (!(await workspace.exists())) {
    await workspace.initialize();
  }

  const configManager = await loadManager(options);
  const parsedValue = parseConfigValue(value);
  const result = configManager.set(key, parsedValue);

  if (!result.success) {
    console.error('Invalid configuration:');
    for (const error of result.errors ?? []) {
      console.error(`  - ${error}`);
    }
    process.exit(1);
  }

  try {
    await configManager.save();
    console.log(`Set ${key} = ${JSON.stringify(parsedValue)}`);
  } catch (error) {
    console.error('Failed to save configuration:', error instanceof Error ? error.message : String(error));
    process.exit(1);
  }
}
