/**
 * Chunk id: `<project>:<file_path>:<name>`.
 *
 * The same triple always yields the same id, which is what turns a
 * re-index into an overwrite in the vector store.
 */
export function generateChunkId(project: string, filePath: string, name: string): string {
  return `${project}:${filePath}:${name}`;
}
