/**
 * Logs command - View and follow the JSON-lines log
 */

import { Command, InvalidArgumentError } from 'commander';
import { createReadStream, watch } from 'node:fs';
import { readFile, stat } from 'node:fs/promises';
import { createInterface } from 'node:readline';
import { z } from 'zod';
import { LOG_LEVELS, isNotFound, type LogLevel } from '../../logging/logger.js';
import { loadContext, parsePositiveInt, type WorkspaceOptions } from '../utils/context.js';

interface LogsOptions extends WorkspaceOptions {
  follow?: boolean;
  level?: LogLevel;
  lines?: number;
}

const LogEntrySchema = z.object({
  timestamp: z.string(),
  level: z.enum(['debug', 'info', 'warn', 'error']),
  message: z.string(),
  context: z.record(z.unknown()).optional(),
  stack: z.string().optional(),
});

type LogLine = z.infer<typeof LogEntrySchema>;

function parseLevel(value: string): LogLevel {
  const parsed = LogEntrySchema.shape.level.safeParse(value);
  if (!parsed.success) {
    throw new InvalidArgumentError(`Valid levels: ${Object.keys(LOG_LEVELS).join(', ')}.`);
  }
  return parsed.data;
}

export function logsCommand(): Command {
  const cmd = new Command('logs');

  cmd
    .description('View the log file')
    .option('-f, --follow', 'Follow log output (like tail -f)')
    .option('-l, --level <level>', 'Minimum log level (debug, info, warn, error)', parseLevel)
    .option('-n, --lines <count>', 'Number of entries to show', parsePositiveInt)
    .option('-w, --workspace <path>', 'Workspace directory')
    .action(async (options: LogsOptions) => {
      await runLogs(options);
    });

  return cmd;
}

async function runLogs(options: LogsOptions): Promise<void> {
  let logPath: string;
  try {
    logPath = (await loadContext(options)).logger.path;
  } catch (error) {
    console.error(error instanceof Error ? error.message : String(error));
    process.exit(1);
  }

  let content: string;
  try {
    content = await readFile(logPath, 'utf-8');
  } catch (error) {
    if (!isNotFound(error)) throw error;
    console.log('No log file found.');
    return;
  }

  const entries = selectEntries(content.split('\n'), options.level);
  for (const entry of entries.slice(-(options.lines ?? 50))) {
    console.log(formatEntry(entry));
  }

  if (options.follow) {
    await followLogs(logPath, options.level);
  }
}

/**
 * Parses log lines, dropping blank or foreign ones and entries below `minLevel`
 */
export function selectEntries(lines: string[], minLevel?: LogLevel): LogLine[] {
  const entries: LogLine[] = [];
  for (const line of lines) {
    const entry = parseLine(line);
    if (entry && (!minLevel || LOG_LEVELS[entry.level] >= LOG_LEVELS[minLevel])) {
      entries.push(entry);
    }
  }
  return entries;
}

function parseLine(line: string): LogLine | null {
  if (line.trim() === '') return null;
  try {
    const parsed = LogEntrySchema.safeParse(JSON.parse(line));
    return parsed.success ? parsed.data : null;
  } catch {
    return null;
  }
}

async function followLogs(logPath: string, minLevel?: LogLevel): Promise<void> {
  console.log('\n--- Following log file (Ctrl+C to stop) ---\n');

  let position = (await stat(logPath)).size;
  let reading = Promise.resolve();

  const readNew = async (): Promise<void> => {
    const size = (await stat(logPath)).size;
    if (size < position) {
      // rotated
      position = 0;
    }
    if (size === position) return;

    const lines = createInterface({ input: createReadStream(logPath, { start: position, end: size - 1 }) });
    for await (const line of lines) {
      for (const entry of selectEntries([line], minLevel)) {
        console.log(formatEntry(entry));
      }
    }
    position = size;
  };

  const watcher = watch(logPath, eventType => {
    if (eventType !== 'change') return;
    reading = reading.then(readNew).catch((error: unknown) => {
      if (!isNotFound(error)) {
        console.error('Failed to read log file:', error instanceof Error ? error.message : String(error));
      }
      position = 0;
    });
  });

  await new Promise<void>(resolve => {
    process.once('SIGINT', () => {
      watcher.close();
      resolve();
    });
  });
}

const LEVEL_COLORS: Record<LogLevel, string> = {
  debug: '\x1b[90m',
  info: '\x1b[36m',
  warn: '\x1b[33m',
  error: '\x1b[31m',
};
const RESET = '\x1b[0m';
const GRAY = '\x1b[90m';

export function formatEntry(entry: LogLine, color: boolean = true): string {
  const paint = (text: string, code: string): string => (color ? `${code}${text}${RESET}` : text);
  const time = entry.timestamp.split('T')[1]?.split('.')[0] ?? entry.timestamp;

  let output = `${paint(`[${time}] ${entry.level.toUpperCase().padEnd(5)}`, LEVEL_COLORS[entry.level])} ${entry.message}`;
  if (entry.context && Object.keys(entry.context).length > 0) {
    const contextStr = Object.entries(entry.context)
      .map(([k, v]) => `${k}=${JSON.stringify(v)}`)
      .join(' ');
    output += ` ${paint(contextStr, GRAY)}`;
  }
  if (entry.stack) {
    output += `\n${paint(entry.stack, GRAY)}`;
  }
  return output;
}
