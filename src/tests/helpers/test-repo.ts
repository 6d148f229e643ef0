import fs from 'fs/promises';
import os from 'os';
import path from 'path';

/** Throwaway project directory; `cleanup` removes it with everything inside. */
export interface TempRepo {
  root: string;
  cleanup: () => Promise<void>;
}

function resolveInRepo(root: string, relativePath: string): string {
  return path.join(root, ...relativePath.split('/'));
}

/** Strings are written as UTF-8; byte arrays as they are. */
export async function writeRepoFile(root: string, relativePath: string, contents: string | Uint8Array): Promise<void> {
  const target = resolveInRepo(root, relativePath);
  await fs.mkdir(path.dirname(target), { recursive: true });
  await fs.writeFile(target, contents);
}

/** Creates a temp directory holding `files`, keyed by POSIX relative path. */
export async function createTempRepo(files: Record<string, string | Uint8Array>): Promise<TempRepo> {
  const root = await fs.mkdtemp(path.join(os.tmpdir(), 'codeatlas-test-'));
  await Promise.all(
    Object.entries(files).map(([relativePath, contents]) => writeRepoFile(root, relativePath, contents))
  );

  return {
    root,
    cleanup: () => fs.rm(root, { recursive: true, force: true })
  };
}

export async function removeRepoFile(root: string, relativePath: string): Promise<void> {
  await fs.rm(resolveInRepo(root, relativePath), { force: true });
}

/** Sets both access and modification time of a file. */
export async function touchRepoFile(root: string, relativePath: string, time: Date): Promise<void> {
  await fs.utimes(resolveInRepo(root, relativePath), time, time);
}
