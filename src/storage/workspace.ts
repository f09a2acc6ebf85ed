import { mkdir, access, constants } from 'node:fs/promises';
import { homedir } from 'node:os';
import { join, resolve, isAbsolute } from 'node:path';

/**
 * Default workspace root directory, under the user's home
 */
const DEFAULT_WORKSPACE_ROOT = '.tutor-command';

/**
 * Collection file names inside the data directory
 */
export const COLLECTION_FILES = {
  students: 'students.json',
  learningObjects: 'learning_objects.json',
  assignments: 'assignments.json',
  activityLogs: 'activity_logs.json',
} as const;

export type CollectionName = keyof typeof COLLECTION_FILES;

/**
 * Workspace - Manages the ~/.tutor-command/ directory layout
 *
 * ```
 * ~/.tutor-command/
 *   config.json
 *   data/            collection files (overridable with an absolute dataDir)
 *   logs/
 * ```
 */
export class Workspace {
  private readonly rootPath: string;
  private readonly dataPath: string;

  /**
   * @param rootPath - Custom root path (defaults to ~/.tutor-command/)
   * @param dataDir - Data directory, relative to the root unless absolute
   */
  constructor(rootPath?: string, dataDir: string = 'data') {
    if (rootPath) {
      this.rootPath = isAbsolute(rootPath) ? rootPath : resolve(rootPath);
    } else {
      this.rootPath = join(homedir(), DEFAULT_WORKSPACE_ROOT);
    }
    this.dataPath = isAbsolute(dataDir) ? dataDir : resolve(this.rootPath, dataDir);
  }

  get root(): string {
    return this.rootPath;
  }

  get dataDir(): string {
    return this.dataPath;
  }

  get configPath(): string {
    return join(this.rootPath, 'config.json');
  }

  get logsDir(): string {
    return join(this.rootPath, 'logs');
  }

  /**
   * Returns a workspace with the same root and a different data directory
   */
  withDataDir(dataDir: string): Workspace {
    return new Workspace(this.rootPath, dataDir);
  }

  /**
   * Creates the root, data and logs directories (mode 700)
   */
  async initialize(): Promise<void> {
    for (const dir of [this.rootPath, this.dataPath, this.logsDir]) {
      await mkdir(dir, { recursive: true, mode: 0o700 });
    }
  }

  async exists(): Promise<boolean> {
    try {
      await access(this.rootPath, constants.F_OK);
      return true;
    } catch {
      return false;
    }
  }

  /**
   * Path of a collection file in the data directory
   */
  collectionPath(name: CollectionName): string {
    return join(this.dataPath, COLLECTION_FILES[name]);
  }

  /**
   * Path of a log file in the logs directory
   */
  logPath(filename: string): string {
    if (filename.includes('/') || filename.includes('\\') || filename.includes('..')) {
      throw new Error(`Invalid log filename: ${filename}`);
    }
    return join(this.logsDir, filename);
  }
}
