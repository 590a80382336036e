/**
 * JSON file helpers for stage output.
 */

import { mkdir, writeFile } from 'fs/promises';
import { dirname } from 'path';

/**
 * Write `value` as indented JSON, creating parent directories.
 */
export async function writeJson(path: string, value: unknown): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, JSON.stringify(value, null, 4) + '\n', 'utf-8');
}
