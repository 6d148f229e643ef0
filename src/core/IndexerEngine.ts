import { chunkToText } from '../chunking/chunk-text.js';
import { EmptyIndexError, IndexingError, NotFoundError, isAtlasError } from '../errors.js';
import type { EmbeddingProvider } from '../providers/base.js';
import type { FileUpsert, MetadataStore, Project } from '../types/metadata.js';
import type { VectorStore } from '../types/vector-store.js';
import { describeError } from '../utils/error-utils.js';
import { log } from '../utils/logger.js';
import { resolveProjectRoot } from '../utils/path-helpers.js';
import type { ExtractionResult, IndexOptions, IndexResult, ParsedFile, ProgressEvent, SourceParser } from './types.js';

export interface IndexerDependencies {
  parser: SourceParser;
  embedder: EmbeddingProvider;
  vectorStore: VectorStore;
  metadata: MetadataStore;
  onProgress?: (event: ProgressEvent) => void;
  now?: () => Date;
}

function newestModification(files: ParsedFile[]): Date | null {
  let newest: Date | null = null;
  for (const file of files) {
    if (file.lastModified && (!newest || file.lastModified.getTime() > newest.getTime())) {
      newest = file.lastModified;
    }
  }
  return newest;
}

/**
 * Runs indexing for one project at a time:
 * clean (optional) → extract → embed → store → metadata.
 *
 * Project and file rows are written only after the vector store write
 * succeeds. A metadata failure after that point is reported in the result
 * and leaves the stored vectors in place. Runs on the same project must be
 * serialized by the caller.
 */
export class IndexerEngine {
  private readonly now: () => Date;

  constructor(private readonly deps: IndexerDependencies) {
    this.now = deps.now ?? (() => new Date());
  }

  private emit(event: ProgressEvent): void {
    this.deps.onProgress?.(event);
  }

  async index(options: IndexOptions): Promise<IndexResult> {
    const { projectName, clean = false } = options;
    const projectPath = resolveProjectRoot(options.projectPath);

    if (clean) {
      await this.removeProjectData(projectName);
      this.emit({ type: 'clean', projectName });
    }

    log.info('Parsing project', { project: projectName, path: projectPath });
    const extraction = await this.extract(projectPath, projectName);
    const { chunks, files } = extraction;
    const skippedFiles = files.filter((file) => !file.parsed).map((file) => file.filePath);

    this.emit({ type: 'parsed', chunkCount: chunks.length, fileCount: files.length, skipped: skippedFiles.length });
    if (chunks.length === 0) {
      throw new EmptyIndexError(projectName);
    }
    log.info('Extracted chunks', { project: projectName, chunks: chunks.length, files: files.length });

    const vectors = await this.embed(chunks.map(chunkToText));
    if (vectors.length !== chunks.length) {
      throw new IndexingError(
        'embed',
        `embedding provider returned ${vectors.length} vectors for ${chunks.length} chunks`,
        undefined
      );
    }
    this.emit({ type: 'embedded', chunkCount: chunks.length });

    try {
      await this.deps.vectorStore.insertBatch(chunks, vectors);
    } catch (error) {
      throw new IndexingError('store', `failed to store chunks for project ${projectName}`, error);
    }
    this.emit({ type: 'stored', chunkCount: chunks.length });
    log.info('Stored chunks', { project: projectName, chunks: chunks.length });

    const result: IndexResult = {
      projectName,
      chunkCount: chunks.length,
      fileCount: files.length,
      skippedFiles,
      metadataSynced: true
    };

    try {
      await this.syncMetadata(options, projectPath, extraction);
    } catch (error) {
      log.error('Chunks stored but metadata update failed', error, { project: projectName });
      result.metadataSynced = false;
      result.metadataError = describeError(error);
    }
    this.emit({ type: 'metadata', synced: result.metadataSynced });

    return result;
  }

  /**
   * Removes the project's chunks and metadata rows. Returns false when the
   * metadata tracker had no such project.
   */
  async deleteProject(projectName: string): Promise<boolean> {
    return this.removeProjectData(projectName);
  }

  private async removeProjectData(projectName: string): Promise<boolean> {
    try {
      await this.deps.vectorStore.delete(projectName);
    } catch (error) {
      throw new IndexingError('clean', `failed to delete chunks of project ${projectName}`, error);
    }

    try {
      await this.deps.metadata.deleteProject(projectName);
      return true;
    } catch (error) {
      if (error instanceof NotFoundError) {
        log.debug('No metadata to delete', { project: projectName });
        return false;
      }
      throw new IndexingError('clean', `failed to delete metadata of project ${projectName}`, error);
    }
  }

  private async extract(projectPath: string, projectName: string): Promise<ExtractionResult> {
    try {
      return await this.deps.parser.parse(projectPath, projectName);
    } catch (error) {
      if (isAtlasError(error)) {
        throw error;
      }
      throw new IndexingError('extract', `failed to parse project ${projectName}`, error);
    }
  }

  private async embed(texts: string[]): Promise<number[][]> {
    log.info('Generating embeddings', {
      provider: this.deps.embedder.getName(),
      model: this.deps.embedder.getModelName(),
      count: texts.length
    });

    try {
      await this.deps.embedder.init();
      return await this.deps.embedder.generateEmbeddings(texts);
    } catch (error) {
      throw new IndexingError('embed', 'failed to generate embeddings', error);
    }
  }

  private async ensureGroupId(groupName: string): Promise<number> {
    try {
      return (await this.deps.metadata.getGroup(groupName)).id;
    } catch (error) {
      if (!(error instanceof NotFoundError)) {
        throw error;
      }
      log.info('Creating group', { group: groupName });
      return (await this.deps.metadata.createGroup(groupName, '')).id;
    }
  }

  private async findProject(name: string): Promise<Project | null> {
    try {
      return await this.deps.metadata.getProject(name);
    } catch (error) {
      if (error instanceof NotFoundError) {
        return null;
      }
      throw error;
    }
  }

  private async syncMetadata(options: IndexOptions, projectPath: string, extraction: ExtractionResult): Promise<void> {
    const { metadata, parser } = this.deps;
    const indexedAt = this.now();
    const groupId = options.groupName ? await this.ensureGroupId(options.groupName) : undefined;
    const lastModifiedAt = newestModification(extraction.files);
    const existing = await this.findProject(options.projectName);

    const project = existing
      ? await metadata.updateProject({
        name: existing.name,
        path: projectPath,
        language: parser.language,
        description: options.description ?? existing.description,
        groupId: groupId ?? existing.groupId,
        chunkCount: extraction.chunks.length,
        lastIndexedAt: indexedAt,
        lastModifiedAt
      })
      : await metadata.createProject({
        name: options.projectName,
        path: projectPath,
        language: parser.language,
        description: options.description ?? '',
        groupId: groupId ?? null,
        chunkCount: extraction.chunks.length,
        lastIndexedAt: indexedAt,
        lastModifiedAt
      });

    const rows: FileUpsert[] = extraction.files.map((file) => ({
      projectId: project.id,
      filePath: file.filePath,
      lastModifiedAt: file.lastModified,
      lastIndexedAt: file.parsed ? indexedAt : null,
      chunkCount: file.chunkCount,
      fileHash: file.hash
    }));
    await metadata.upsertFiles(rows);

    log.debug('Metadata updated', { project: project.name, files: rows.length });
  }
}
