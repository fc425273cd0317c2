import { promises as fs } from 'node:fs';
import path from 'node:path';

/** Relative paths are taken from the working directory the appliance was started in. */
export function resolveFromCwd(target: string): string {
  return path.isAbsolute(target) ? target : path.resolve(process.cwd(), target);
}

/**
 * Writes JSON through a sibling temp file and a rename, so readers never see a partial file.
 */
export async function writeJsonAtomic(filePath: string, data: unknown): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  const tempPath = `${filePath}.${process.pid}.tmp`;
  await fs.writeFile(tempPath, `${JSON.stringify(data, null, 2)}\n`, 'utf-8');
  try {
    await fs.rename(tempPath, filePath);
  } catch (error) {
    await fs.rm(tempPath, { force: true });
    throw error;
  }
}
