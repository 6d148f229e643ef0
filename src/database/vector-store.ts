import Database from 'better-sqlite3';
import fs from 'fs';
import path from 'path';
import { StoreError } from '../errors.js';
import { CodeChunkSchema, type CodeChunk } from '../types/chunk.js';
import type { SearchFilters, SearchResult, VectorStore } from '../types/vector-store.js';
import { log } from '../utils/logger.js';
import { cosineSimilarity, decodeEmbedding, encodeEmbedding } from './embedding-codec.js';

export const DEFAULT_COLLECTION = 'codeatlas';
export const DEFAULT_BATCH_SIZE = 1000;

export interface SqliteVectorStoreOptions {
  collection?: string;
  /** Rows written per transaction by `insertBatch`. */
  batchSize?: number;
}

interface ChunkRow {
  id: string;
  project: string;
  file_path: string;
  package: string;
  language: string;
  chunk_type: string;
  name: string;
  receiver: string | null;
  code: string;
  line_start: number;
  line_end: number;
  doc_string: string;
  http_endpoints: string;
  http_calls: string;
  imports: string;
  last_modified: string;
  embedding: Buffer;
}

type InsertParams = Omit<ChunkRow, 'embedding'> & { collection: string; embedding: Buffer; dimensions: number };

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS chunks (
    collection TEXT NOT NULL,
    id TEXT NOT NULL,
    project TEXT NOT NULL,
    file_path TEXT NOT NULL,
    package TEXT NOT NULL,
    language TEXT NOT NULL,
    chunk_type TEXT NOT NULL,
    name TEXT NOT NULL,
    receiver TEXT,
    code TEXT NOT NULL,
    line_start INTEGER NOT NULL,
    line_end INTEGER NOT NULL,
    doc_string TEXT NOT NULL DEFAULT '',
    http_endpoints TEXT NOT NULL DEFAULT '[]',
    http_calls TEXT NOT NULL DEFAULT '[]',
    imports TEXT NOT NULL DEFAULT '[]',
    last_modified TEXT NOT NULL,
    embedding BLOB NOT NULL,
    dimensions INTEGER NOT NULL,
    PRIMARY KEY (collection, id)
  );

  CREATE INDEX IF NOT EXISTS idx_chunks_project ON chunks(collection, project);
`;

const CHUNK_COLUMNS = `id, project, file_path, package, language, chunk_type, name, receiver, code,
  line_start, line_end, doc_string, http_endpoints, http_calls, imports, last_modified, embedding`;

function toInsertParams(collection: string, chunk: CodeChunk, vector: ArrayLike<number>): InsertParams {
  return {
    collection,
    id: chunk.id,
    project: chunk.project,
    file_path: chunk.filePath,
    package: chunk.package,
    language: chunk.language,
    chunk_type: chunk.chunkType,
    name: chunk.name,
    receiver: chunk.receiver ?? null,
    code: chunk.code,
    line_start: chunk.lineStart,
    line_end: chunk.lineEnd,
    doc_string: chunk.docString,
    http_endpoints: JSON.stringify(chunk.httpEndpoints),
    http_calls: JSON.stringify(chunk.httpCalls),
    imports: JSON.stringify(chunk.imports),
    last_modified: chunk.lastModified.toISOString(),
    embedding: encodeEmbedding(vector),
    dimensions: vector.length
  };
}

function toChunk(row: ChunkRow): CodeChunk {
  return CodeChunkSchema.parse({
    id: row.id,
    project: row.project,
    filePath: row.file_path,
    package: row.package,
    language: row.language,
    chunkType: row.chunk_type,
    name: row.name,
    receiver: row.receiver ?? undefined,
    code: row.code,
    lineStart: row.line_start,
    lineEnd: row.line_end,
    docString: row.doc_string,
    httpEndpoints: JSON.parse(row.http_endpoints),
    httpCalls: JSON.parse(row.http_calls),
    imports: JSON.parse(row.imports),
    lastModified: row.last_modified
  });
}

function buildFilterClause(filters: SearchFilters): { sql: string; params: string[] } {
  const clauses: string[] = [];
  const params: string[] = [];

  const exact: Array<[string, string | undefined]> = [
    ['project', filters.project],
    ['language', filters.language],
    ['chunk_type', filters.chunkType],
    ['package', filters.package],
    ['file_path', filters.filePath]
  ];

  for (const [column, value] of exact) {
    if (value !== undefined) {
      clauses.push(`${column} = ?`);
      params.push(value);
    }
  }

  if (filters.projects !== undefined && filters.projects.length > 0) {
    clauses.push(`project IN (${filters.projects.map(() => '?').join(', ')})`);
    params.push(...filters.projects);
  }

  return { sql: clauses.map((clause) => ` AND ${clause}`).join(''), params };
}

/**
 * Vector store on a single better-sqlite3 table. Similarity is computed in
 * process over the rows that pass the filters.
 */
export class SqliteVectorStore implements VectorStore {
  private db: Database.Database;
  private readonly collection: string;
  private readonly batchSize: number;
  private insertStmt: Database.Statement<[InsertParams]>;
  private insertManyStmt: ((rows: InsertParams[]) => void) | null = null;

  constructor(dbPath: string, options: SqliteVectorStoreOptions = {}) {
    this.collection = options.collection ?? DEFAULT_COLLECTION;
    this.batchSize = Math.max(1, options.batchSize ?? DEFAULT_BATCH_SIZE);

    if (dbPath !== ':memory:') {
      fs.mkdirSync(path.dirname(dbPath), { recursive: true });
    }

    this.db = new Database(dbPath);
    if (dbPath !== ':memory:') {
      this.db.pragma('journal_mode = WAL');
      this.db.pragma('synchronous = NORMAL');
    }
    this.db.exec(SCHEMA);

    this.insertStmt = this.db.prepare<[InsertParams]>(`
      INSERT OR REPLACE INTO chunks
        (collection, id, project, file_path, package, language, chunk_type, name, receiver, code,
         line_start, line_end, doc_string, http_endpoints, http_calls, imports, last_modified, embedding, dimensions)
      VALUES
        (@collection, @id, @project, @file_path, @package, @language, @chunk_type, @name, @receiver, @code,
         @line_start, @line_end, @doc_string, @http_endpoints, @http_calls, @imports, @last_modified, @embedding, @dimensions)
    `);
  }

  async insert(chunk: CodeChunk, vector: ArrayLike<number>): Promise<void> {
    try {
      this.insertStmt.run(toInsertParams(this.collection, chunk, vector));
    } catch (error) {
      log.error('Failed to insert chunk', error, { chunkId: chunk.id });
      throw error;
    }
  }

  async insertBatch(chunks: CodeChunk[], vectors: ArrayLike<number>[]): Promise<void> {
    if (chunks.length !== vectors.length) {
      throw new StoreError(`chunk count (${chunks.length}) does not match vector count (${vectors.length})`);
    }
    if (chunks.length === 0) {
      return;
    }

    if (!this.insertManyStmt) {
      this.insertManyStmt = this.db.transaction((rows: InsertParams[]) => {
        for (const row of rows) {
          this.insertStmt.run(row);
        }
      });
    }

    const rows = chunks.map((chunk, i) => toInsertParams(this.collection, chunk, vectors[i]));

    for (let start = 0; start < rows.length; start += this.batchSize) {
      const batch = rows.slice(start, start + this.batchSize);
      try {
        this.insertManyStmt(batch);
      } catch (error) {
        log.error('Failed to insert chunk batch', error, { offset: start, count: batch.length });
        throw error;
      }
      log.debug('Stored chunk batch', { offset: start, count: batch.length });
    }
  }

  async search(queryVector: ArrayLike<number>, limit: number, filters: SearchFilters = {}): Promise<SearchResult[]> {
    if ((filters.projects !== undefined && filters.projects.length === 0) || limit <= 0) {
      return [];
    }

    const { sql, params } = buildFilterClause(filters);
    const rows = this.db
      .prepare<unknown[], ChunkRow & { dimensions: number }>(
        `SELECT ${CHUNK_COLUMNS}, dimensions FROM chunks WHERE collection = ?${sql}`
      )
      .all(this.collection, ...params);

    const results: SearchResult[] = [];
    for (const row of rows) {
      if (row.dimensions !== queryVector.length) {
        continue;
      }
      const distance = 1 - cosineSimilarity(queryVector, decodeEmbedding(row.embedding));
      results.push({ chunk: toChunk(row), score: 1 - distance, distance });
    }

    results.sort((a, b) => b.score - a.score || a.chunk.id.localeCompare(b.chunk.id));
    return results.slice(0, limit);
  }

  async delete(projectName: string): Promise<void> {
    try {
      const { changes } = this.db
        .prepare<[string, string]>('DELETE FROM chunks WHERE collection = ? AND project = ?')
        .run(this.collection, projectName);
      log.debug('Deleted project chunks', { project: projectName, count: changes });
    } catch (error) {
      log.error('Failed to delete project chunks', error, { project: projectName });
      throw error;
    }
  }

  async listProjects(): Promise<string[]> {
    return this.db
      .prepare<[string], { project: string }>(
        'SELECT DISTINCT project FROM chunks WHERE collection = ? ORDER BY project'
      )
      .all(this.collection)
      .map((row) => row.project);
  }

  async get(id: string): Promise<CodeChunk | null> {
    const row = this.db
      .prepare<[string, string], ChunkRow>(`SELECT ${CHUNK_COLUMNS} FROM chunks WHERE collection = ? AND id = ?`)
      .get(this.collection, id);
    return row ? toChunk(row) : null;
  }

  async count(projectName?: string): Promise<number> {
    const row = projectName === undefined
      ? this.db
        .prepare<[string], { total: number }>('SELECT COUNT(*) AS total FROM chunks WHERE collection = ?')
        .get(this.collection)
      : this.db
        .prepare<[string, string], { total: number }>(
          'SELECT COUNT(*) AS total FROM chunks WHERE collection = ? AND project = ?'
        )
        .get(this.collection, projectName);
    return row?.total ?? 0;
  }

  close(): void {
    this.db.close();
  }
}
