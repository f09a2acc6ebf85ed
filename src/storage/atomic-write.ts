import { writeFile, rename, unlink } from 'node:fs/promises';
import { join, dirname, basename } from 'node:path';
import { randomUUID } from 'node:crypto';

export interface AtomicWriteOptions {
  mode?: number;
}

/**
 * Writes content to a sibling temp file and renames it over the target, so
 * readers only ever see the old or the new file in full.
 */
export async function atomicWrite(
  filePath: string,
  content: string,
  options: AtomicWriteOptions = {}
): Promise<void> {
  const tempPath = join(dirname(filePath), `.${basename(filePath)}-${randomUUID()}.tmp`);

  try {
    await writeFile(tempPath, content, { encoding: 'utf-8', mode: options.mode ?? 0o600 });
    await rename(tempPath, filePath);
  } catch (error) {
    await unlink(tempPath).catch(() => undefined);
    throw error;
  }
}
