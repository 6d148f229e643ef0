import type { FileRecord } from '../types/metadata.js';

/**
 * A file is stale when it was never indexed or was modified after its last
 * indexing. An unknown modification time alone does not make it stale.
 */
export function isStale(file: Pick<FileRecord, 'lastIndexedAt' | 'lastModifiedAt'>): boolean {
  if (file.lastIndexedAt === null) {
    return true;
  }
  return file.lastModifiedAt !== null && file.lastModifiedAt.getTime() > file.lastIndexedAt.getTime();
}
