import { InvalidArgumentError } from 'commander';
import { Workspace } from '../../storage/workspace.js';
import { RecordStore } from '../../storage/record-store.js';
import { ConfigManager, type TutorCommandConfig } from '../../config/config-manager.js';
import { Logger } from '../../logging/logger.js';
import { ClaudeCliCapability } from '../../capability/claude-cli-capability.js';
import { createCommandPipeline, type CommandPipeline } from '../../command/command-pipeline.js';

/** Overrides the workspace root when no --workspace option is given */
export const WORKSPACE_ENV = 'TUTOR_COMMAND_HOME';

export interface WorkspaceOptions {
  workspace?: string;
}

export interface CliContext {
  workspace: Workspace;
  configManager: ConfigManager;
  config: TutorCommandConfig;
  logger: Logger;
}

export interface CliRuntime extends CliContext {
  store: RecordStore;
  pipeline: CommandPipeline;
}

/**
 * Workspace root from the option, then TUTOR_COMMAND_HOME, then ~/.tutor-command
 */
export function resolveWorkspace(options: WorkspaceOptions): Workspace {
  return new Workspace(options.workspace ?? process.env[WORKSPACE_ENV]);
}

/**
 * Loads the configuration of a workspace
 * @throws Error listing every configuration problem
 */
export async function loadContext(options: WorkspaceOptions): Promise<CliContext> {
  const root = resolveWorkspace(options);
  const configManager = new ConfigManager(root.configPath);
  const result = await configManager.load();
  if (!result.success || !result.config) {
    throw new Error(`Configuration error:\n  ${(result.errors ?? []).join('\n  ')}`);
  }

  const config = result.config;
  const workspace = root.withDataDir(config.store.dataDir);
  const logger = new Logger({
    level: config.logging.level,
    path: workspace.logPath(config.logging.file),
    maxSize: config.logging.maxSize,
    maxFiles: config.logging.maxFiles,
  });

  return { workspace, configManager, config, logger };
}

/**
 * Loads the store and wires a pipeline around the Claude CLI
 */
export async function createRuntime(options: WorkspaceOptions): Promise<CliRuntime> {
  const context = await loadContext(options);
  const { workspace, config, logger } = context;

  await workspace.initialize();
  const store = new RecordStore(workspace, { logger });
  await store.load();

  const capability = new ClaudeCliCapability(
    { cliPath: config.capability.cliPath, model: config.capability.model },
    logger
  );
  const pipeline = createCommandPipeline({
    store,
    capability,
    logger,
    timeoutMs: config.capability.timeoutMs,
    match: config.resolver,
  });

  return { ...context, store, pipeline };
}

/**
 * Option parser for positive integers such as ports and line counts
 */
export function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return parsed;
}
