import * as fs from 'fs/promises';
import { v4 as uuidv4 } from 'uuid';

/**
 * Write through a uniquely named temp file and rename it over the target,
 * so readers see either the old or the new file, never a partial one.
 */
export async function writeFileAtomic(filePath: string, data: string): Promise<void> {
  const tempPath = `${filePath}.${uuidv4()}.tmp`;
  try {
    await fs.writeFile(tempPath, data, 'utf-8');
    await fs.rename(tempPath, filePath);
  } catch (error) {
    await fs.rm(tempPath, { force: true });
    throw error;
  }
}
