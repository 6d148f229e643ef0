export interface Group {
  id: number;
  name: string;
  description: string;
  createdAt: Date;
  updatedAt: Date;
}

export interface Project {
  id: number;
  name: string;
  path: string;
  language: string;
  description: string;
  groupId: number | null;
  /** Name of the referenced group, filled by reads that join groups. */
  groupName: string | null;
  /** Chunk total of the last successful run; not verified against the vector store. */
  chunkCount: number;
  /** Null means the project was never indexed. */
  lastIndexedAt: Date | null;
  lastModifiedAt: Date | null;
  createdAt: Date;
  updatedAt: Date;
}

export interface NewProject {
  name: string;
  path: string;
  language: string;
  description?: string;
  groupId?: number | null;
  chunkCount?: number;
  lastIndexedAt?: Date | null;
  lastModifiedAt?: Date | null;
}

/** Fields written by `updateProject`; the project is addressed by name. */
export type ProjectUpdate = Pick<
  Project,
  'name' | 'path' | 'language' | 'description' | 'groupId' | 'chunkCount' | 'lastIndexedAt' | 'lastModifiedAt'
>;

export interface FileRecord {
  id: number;
  projectId: number;
  /** Relative to the project root. */
  filePath: string;
  lastModifiedAt: Date | null;
  lastIndexedAt: Date | null;
  chunkCount: number;
  fileHash: string;
}

export type FileUpsert = Omit<FileRecord, 'id'>;

export interface ProjectFilter {
  groupId?: number;
  groupName?: string;
  name?: string;
}

/**
 * Durable record of groups, projects and per-file indexing state.
 *
 * Reads and writes of a missing row reject with `NotFoundError`; creating a
 * group or project under a taken name rejects with `ConflictError`.
 */
export interface MetadataStore {
  createGroup(name: string, description?: string): Promise<Group>;
  getGroup(name: string): Promise<Group>;
  listGroups(): Promise<Group[]>;
  updateGroup(name: string, description: string): Promise<void>;
  /** Member projects survive with their group reference cleared. */
  deleteGroup(name: string): Promise<void>;

  createProject(project: NewProject): Promise<Project>;
  getProject(name: string): Promise<Project>;
  listProjects(filter?: ProjectFilter): Promise<Project[]>;
  updateProject(project: ProjectUpdate): Promise<Project>;
  /** Removes the project and all of its file rows. */
  deleteProject(name: string): Promise<void>;

  /** Insert or overwrite the row keyed by `(projectId, filePath)`. */
  upsertFile(file: FileUpsert): Promise<FileRecord>;
  /** `upsertFile` for many rows in one transaction. */
  upsertFiles(files: FileUpsert[]): Promise<void>;
  getFile(projectId: number, filePath: string): Promise<FileRecord>;
  listFiles(projectId: number): Promise<FileRecord[]>;
  deleteFile(projectId: number, filePath: string): Promise<void>;
  deleteProjectFiles(projectId: number): Promise<void>;

  getProjectsByGroup(groupName: string): Promise<Project[]>;
  getStaleFiles(projectId: number): Promise<FileRecord[]>;

  close(): void;
}
