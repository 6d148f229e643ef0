import type { CodeChunk } from '../types/chunk.js';

/** Indexing state of one source file as seen by the extractor. */
export interface ParsedFile {
  /** POSIX path relative to the project root. */
  filePath: string;
  lastModified: Date | null;
  /** sha256 of the file contents, empty when the file could not be read. */
  hash: string;
  chunkCount: number;
  /** False when the file was skipped with a warning. */
  parsed: boolean;
  error?: string;
}

export interface ExtractionResult {
  chunks: CodeChunk[];
  files: ParsedFile[];
}

/**
 * Structural extractor for one language. Throws `TraversalError` when the
 * tree cannot be walked; per-file parse failures are reported in `files`.
 */
export interface SourceParser {
  readonly language: string;
  parse(projectPath: string, projectName: string): Promise<ExtractionResult>;
}

export interface IndexOptions {
  projectPath: string;
  projectName: string;
  clean?: boolean;
  groupName?: string;
  description?: string;
}

export interface IndexResult {
  projectName: string;
  chunkCount: number;
  fileCount: number;
  skippedFiles: string[];
  /** False when the vector store was written but the metadata update failed. */
  metadataSynced: boolean;
  metadataError?: string;
}

export type ProgressEvent =
  | { type: 'clean'; projectName: string }
  | { type: 'parsed'; chunkCount: number; fileCount: number; skipped: number }
  | { type: 'embedded'; chunkCount: number }
  | { type: 'stored'; chunkCount: number }
  | { type: 'metadata'; synced: boolean };
