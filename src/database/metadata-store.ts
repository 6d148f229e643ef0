import Database from 'better-sqlite3';
import fs from 'fs';
import path from 'path';
import { ConflictError, NotFoundError, type EntityKind } from '../errors.js';
import type {
  FileRecord,
  FileUpsert,
  Group,
  MetadataStore,
  NewProject,
  Project,
  ProjectFilter,
  ProjectUpdate
} from '../types/metadata.js';
import { getErrorCode } from '../utils/error-utils.js';
import { log } from '../utils/logger.js';
import {
  METADATA_SCHEMA,
  METADATA_SCHEMA_VERSION,
  type FileRow,
  type GroupRow,
  type ProjectRow
} from './metadata-schema.js';

export interface MetadataStoreOptions {
  /** Clock used for created/updated/indexed timestamps. */
  now?: () => Date;
}

const PROJECT_SELECT = `
  SELECT p.id, p.name, p.path, p.language, p.description, p.group_id, g.name AS group_name,
         p.chunk_count, p.last_indexed_at, p.last_modified_at, p.created_at, p.updated_at
  FROM projects p
  LEFT JOIN groups g ON g.id = p.group_id
`;

const FILE_COLUMNS = 'id, project_id, file_path, last_modified_at, last_indexed_at, chunk_count, file_hash';

const UPSERT_FILE_SQL = `
  INSERT INTO files (project_id, file_path, last_modified_at, last_indexed_at, chunk_count, file_hash)
  VALUES (@projectId, @filePath, @lastModifiedAt, @lastIndexedAt, @chunkCount, @fileHash)
  ON CONFLICT(project_id, file_path) DO UPDATE SET
    last_modified_at = excluded.last_modified_at,
    last_indexed_at = excluded.last_indexed_at,
    chunk_count = excluded.chunk_count,
    file_hash = excluded.file_hash
`;

function toIso(value: Date | null | undefined): string | null {
  return value ? value.toISOString() : null;
}

function fromIso(value: string | null): Date | null {
  return value === null ? null : new Date(value);
}

function toGroup(row: GroupRow): Group {
  return {
    id: row.id,
    name: row.name,
    description: row.description ?? '',
    createdAt: new Date(row.created_at),
    updatedAt: new Date(row.updated_at)
  };
}

function toProject(row: ProjectRow): Project {
  return {
    id: row.id,
    name: row.name,
    path: row.path,
    language: row.language,
    description: row.description ?? '',
    groupId: row.group_id,
    groupName: row.group_name,
    chunkCount: row.chunk_count,
    lastIndexedAt: fromIso(row.last_indexed_at),
    lastModifiedAt: fromIso(row.last_modified_at),
    createdAt: new Date(row.created_at),
    updatedAt: new Date(row.updated_at)
  };
}

function toFile(row: FileRow): FileRecord {
  return {
    id: row.id,
    projectId: row.project_id,
    filePath: row.file_path,
    lastModifiedAt: fromIso(row.last_modified_at),
    lastIndexedAt: fromIso(row.last_indexed_at),
    chunkCount: row.chunk_count,
    fileHash: row.file_hash ?? ''
  };
}

function fileParams(file: FileUpsert) {
  return {
    projectId: file.projectId,
    filePath: file.filePath,
    lastModifiedAt: toIso(file.lastModifiedAt),
    lastIndexedAt: toIso(file.lastIndexedAt),
    chunkCount: file.chunkCount,
    fileHash: file.fileHash
  };
}

function isUniqueViolation(error: unknown): boolean {
  const code = getErrorCode(error);
  return code === 'SQLITE_CONSTRAINT_UNIQUE' || code === 'SQLITE_CONSTRAINT_PRIMARYKEY';
}

function isForeignKeyViolation(error: unknown): boolean {
  return getErrorCode(error) === 'SQLITE_CONSTRAINT_FOREIGNKEY';
}

/**
 * better-sqlite3 backed metadata tracker. Pass ':memory:' for a throwaway
 * store. Call `close()` when finished.
 */
export class SqliteMetadataStore implements MetadataStore {
  private db: Database.Database;
  private readonly now: () => Date;

  constructor(dbPath: string, options: MetadataStoreOptions = {}) {
    this.now = options.now ?? (() => new Date());

    if (dbPath !== ':memory:') {
      fs.mkdirSync(path.dirname(dbPath), { recursive: true });
    }

    this.db = new Database(dbPath);
    if (dbPath !== ':memory:') {
      this.db.pragma('journal_mode = WAL');
    }
    this.db.pragma('foreign_keys = ON');

    this.ensureSchema();
  }

  private ensureSchema(): void {
    try {
      this.db.exec(METADATA_SCHEMA);
      this.db.pragma(`user_version = ${METADATA_SCHEMA_VERSION}`);
    } catch (error) {
      log.error('Failed to create metadata schema', error);
      throw error;
    }
  }

  private timestamp(): string {
    return this.now().toISOString();
  }

  /** Runs a statement, mapping constraint failures onto the tracker's errors. */
  private guard<T>(action: string, entity: EntityKind, key: string, fn: () => T): T {
    try {
      return fn();
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new ConflictError(entity, key);
      }
      log.error(`Failed to ${action}`, error, { [entity]: key });
      throw error;
    }
  }

  // Groups

  async createGroup(name: string, description: string = ''): Promise<Group> {
    const now = this.timestamp();
    const result = this.guard('create group', 'group', name, () =>
      this.db
        .prepare<[string, string, string, string]>(
          'INSERT INTO groups (name, description, created_at, updated_at) VALUES (?, ?, ?, ?)'
        )
        .run(name, description, now, now)
    );

    return {
      id: Number(result.lastInsertRowid),
      name,
      description,
      createdAt: new Date(now),
      updatedAt: new Date(now)
    };
  }

  async getGroup(name: string): Promise<Group> {
    const row = this.db
      .prepare<[string], GroupRow>('SELECT id, name, description, created_at, updated_at FROM groups WHERE name = ?')
      .get(name);
    if (!row) {
      throw new NotFoundError('group', name);
    }
    return toGroup(row);
  }

  async listGroups(): Promise<Group[]> {
    return this.db
      .prepare<[], GroupRow>('SELECT id, name, description, created_at, updated_at FROM groups ORDER BY name')
      .all()
      .map(toGroup);
  }

  async updateGroup(name: string, description: string): Promise<void> {
    const result = this.guard('update group', 'group', name, () =>
      this.db
        .prepare<[string, string, string]>('UPDATE groups SET description = ?, updated_at = ? WHERE name = ?')
        .run(description, this.timestamp(), name)
    );
    if (result.changes === 0) {
      throw new NotFoundError('group', name);
    }
  }

  async deleteGroup(name: string): Promise<void> {
    const result = this.guard('delete group', 'group', name, () =>
      this.db.prepare<[string]>('DELETE FROM groups WHERE name = ?').run(name)
    );
    if (result.changes === 0) {
      throw new NotFoundError('group', name);
    }
  }

  // Projects

  async createProject(project: NewProject): Promise<Project> {
    const now = this.timestamp();
    const groupId = project.groupId ?? null;

    try {
      this.db
        .prepare(
          `INSERT INTO projects
             (name, path, language, description, group_id, chunk_count, last_indexed_at, last_modified_at, created_at, updated_at)
           VALUES (@name, @path, @language, @description, @groupId, @chunkCount, @lastIndexedAt, @lastModifiedAt, @now, @now)`
        )
        .run({
          name: project.name,
          path: project.path,
          language: project.language,
          description: project.description ?? '',
          groupId,
          chunkCount: project.chunkCount ?? 0,
          lastIndexedAt: toIso(project.lastIndexedAt),
          lastModifiedAt: toIso(project.lastModifiedAt),
          now
        });
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new ConflictError('project', project.name);
      }
      if (isForeignKeyViolation(error)) {
        throw new NotFoundError('group', String(groupId));
      }
      log.error('Failed to create project', error, { project: project.name });
      throw error;
    }

    return this.getProject(project.name);
  }

  async getProject(name: string): Promise<Project> {
    const row = this.db.prepare<[string], ProjectRow>(`${PROJECT_SELECT} WHERE p.name = ?`).get(name);
    if (!row) {
      throw new NotFoundError('project', name);
    }
    return toProject(row);
  }

  async listProjects(filter: ProjectFilter = {}): Promise<Project[]> {
    const clauses: string[] = [];
    const params: Record<string, string | number> = {};

    if (filter.groupId !== undefined) {
      clauses.push('p.group_id = @groupId');
      params.groupId = filter.groupId;
    }
    if (filter.groupName) {
      clauses.push('g.name = @groupName');
      params.groupName = filter.groupName;
    }
    if (filter.name) {
      clauses.push('p.name = @name');
      params.name = filter.name;
    }

    const where = clauses.length > 0 ? ` WHERE ${clauses.join(' AND ')}` : '';
    return this.db
      .prepare<Record<string, string | number>, ProjectRow>(`${PROJECT_SELECT}${where} ORDER BY p.name`)
      .all(params)
      .map(toProject);
  }

  async updateProject(project: ProjectUpdate): Promise<Project> {
    let changes: number;
    try {
      changes = this.db
        .prepare(
          `UPDATE projects
           SET path = @path, language = @language, description = @description, group_id = @groupId,
               chunk_count = @chunkCount, last_indexed_at = @lastIndexedAt, last_modified_at = @lastModifiedAt,
               updated_at = @now
           WHERE name = @name`
        )
        .run({
          name: project.name,
          path: project.path,
          language: project.language,
          description: project.description,
          groupId: project.groupId,
          chunkCount: project.chunkCount,
          lastIndexedAt: toIso(project.lastIndexedAt),
          lastModifiedAt: toIso(project.lastModifiedAt),
          now: this.timestamp()
        }).changes;
    } catch (error) {
      if (isForeignKeyViolation(error)) {
        throw new NotFoundError('group', String(project.groupId));
      }
      log.error('Failed to update project', error, { project: project.name });
      throw error;
    }

    if (changes === 0) {
      throw new NotFoundError('project', project.name);
    }
    return this.getProject(project.name);
  }

  async deleteProject(name: string): Promise<void> {
    // files go with it through ON DELETE CASCADE
    const result = this.guard('delete project', 'project', name, () =>
      this.db.prepare<[string]>('DELETE FROM projects WHERE name = ?').run(name)
    );
    if (result.changes === 0) {
      throw new NotFoundError('project', name);
    }
  }

  // Files

  async upsertFile(file: FileUpsert): Promise<FileRecord> {
    try {
      this.db.prepare(UPSERT_FILE_SQL).run(fileParams(file));
    } catch (error) {
      if (isForeignKeyViolation(error)) {
        throw new NotFoundError('project', String(file.projectId));
      }
      log.error('Failed to upsert file', error, { projectId: file.projectId, file: file.filePath });
      throw error;
    }

    return this.getFile(file.projectId, file.filePath);
  }

  async upsertFiles(files: FileUpsert[]): Promise<void> {
    if (files.length === 0) {
      return;
    }

    const statement = this.db.prepare(UPSERT_FILE_SQL);
    const upsertAll = this.db.transaction((batch: FileUpsert[]) => {
      for (const file of batch) {
        statement.run(fileParams(file));
      }
    });

    try {
      upsertAll(files);
    } catch (error) {
      if (isForeignKeyViolation(error)) {
        throw new NotFoundError('project', String(files[0].projectId));
      }
      log.error('Failed to upsert file batch', error, { count: files.length });
      throw error;
    }
  }

  async getFile(projectId: number, filePath: string): Promise<FileRecord> {
    const row = this.db
      .prepare<[number, string], FileRow>(`SELECT ${FILE_COLUMNS} FROM files WHERE project_id = ? AND file_path = ?`)
      .get(projectId, filePath);
    if (!row) {
      throw new NotFoundError('file', `${projectId}:${filePath}`);
    }
    return toFile(row);
  }

  async listFiles(projectId: number): Promise<FileRecord[]> {
    return this.db
      .prepare<[number], FileRow>(`SELECT ${FILE_COLUMNS} FROM files WHERE project_id = ? ORDER BY file_path`)
      .all(projectId)
      .map(toFile);
  }

  async deleteFile(projectId: number, filePath: string): Promise<void> {
    const result = this.db
      .prepare<[number, string]>('DELETE FROM files WHERE project_id = ? AND file_path = ?')
      .run(projectId, filePath);
    if (result.changes === 0) {
      throw new NotFoundError('file', `${projectId}:${filePath}`);
    }
  }

  async deleteProjectFiles(projectId: number): Promise<void> {
    this.db.prepare<[number]>('DELETE FROM files WHERE project_id = ?').run(projectId);
  }

  // Derived queries

  async getProjectsByGroup(groupName: string): Promise<Project[]> {
    return this.listProjects({ groupName });
  }

  async getStaleFiles(projectId: number): Promise<FileRecord[]> {
    return this.db
      .prepare<[number], FileRow>(
        `SELECT ${FILE_COLUMNS} FROM files
         WHERE project_id = ?
           AND (last_indexed_at IS NULL OR last_modified_at > last_indexed_at)
         ORDER BY file_path`
      )
      .all(projectId)
      .map(toFile);
  }

  close(): void {
    this.db.close();
  }
}
