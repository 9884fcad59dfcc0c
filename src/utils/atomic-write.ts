import { mkdir, rename, rm, writeFile } from 'fs/promises';
import { randomBytes } from 'crypto';
import { dirname } from 'path';

export interface PendingFile {
  path: string;
  data: Uint8Array;
}

const tempPathFor = (path: string): string => `${path}.${process.pid}.${randomBytes(6).toString('hex')}.tmp`;

/**
 * Writes a group of files all-or-nothing. Every file is staged in a sibling temp
 * file before the first rename; if staging or any rename fails, the temp files and
 * the files already renamed into place are removed and the error is rethrown.
 */
export async function writeFilesAtomic(files: readonly PendingFile[]): Promise<void> {
  const staged: Array<{ path: string; tempPath: string }> = [];

  try {
    for (const file of files) {
      await mkdir(dirname(file.path), { recursive: true });
      const tempPath = tempPathFor(file.path);
      staged.push({ path: file.path, tempPath });
      await writeFile(tempPath, file.data);
    }
  } catch (error) {
    await Promise.all(staged.map(({ tempPath }) => rm(tempPath, { force: true })));
    throw error;
  }

  const committed: string[] = [];
  try {
    for (const { path, tempPath } of staged) {
      await rename(tempPath, path);
      committed.push(path);
    }
  } catch (error) {
    await Promise.all([
      ...committed.map((path) => rm(path, { force: true })),
      ...staged.map(({ tempPath }) => rm(tempPath, { force: true }))
    ]);
    throw error;
  }
}

/**
 * Writes `data` to `path` via a sibling temp file and a rename, so readers see
 * either the previous file or the complete new one.
 */
export async function writeFileAtomic(path: string, data: Uint8Array): Promise<void> {
  await writeFilesAtomic([{ path, data }]);
}
