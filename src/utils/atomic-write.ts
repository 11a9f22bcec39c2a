/**
 * Atomic file replacement: write to a temp file in the same directory, then
 * rename over the target. Readers see either the old or the new content.
 */

import { promises as fs } from 'node:fs';
import * as path from 'node:path';

export async function writeFileAtomic(filePath: string, content: string): Promise<void> {
  const dir = path.dirname(filePath);
  await fs.mkdir(dir, { recursive: true });

  const tempPath = path.join(
    dir,
    `.tmp.${Date.now()}.${process.pid}.${Math.random().toString(36).slice(2)}.json`
  );

  try {
    await fs.writeFile(tempPath, content, 'utf-8');
    await fs.rename(tempPath, filePath);
  } catch (error) {
    try {
      await fs.unlink(tempPath);
    } catch {
      // temp file was never created
    }
    throw error;
  }
}

export async function writeJsonAtomic(filePath: string, data: unknown): Promise<void> {
  await writeFileAtomic(filePath, JSON.stringify(data, null, 2));
}
