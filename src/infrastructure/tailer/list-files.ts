import { readdir, stat } from 'node:fs/promises';
import { join } from 'node:path';
import type { FileWithMtime } from '../../application/index.js';

/** Regular files directly inside `directory`, with their mtimes. */
export async function listLogFiles(directory: string): Promise<FileWithMtime[]> {
  const entries = await readdir(directory, { withFileTypes: true });
  const files: FileWithMtime[] = [];
  for (const entry of entries) {
    if (!entry.isFile()) continue;
    const path = join(directory, entry.name);
    const st = await stat(path);
    files.push({ path, mtimeMs: st.mtimeMs });
  }
  return files;
}
