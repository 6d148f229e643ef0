export const METADATA_SCHEMA_VERSION = 1;

export const METADATA_SCHEMA = `
  CREATE TABLE IF NOT EXISTS groups (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    name TEXT UNIQUE NOT NULL,
    description TEXT,
    created_at TEXT NOT NULL,
    updated_at TEXT NOT NULL
  );

  CREATE TABLE IF NOT EXISTS projects (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    name TEXT UNIQUE NOT NULL,
    path TEXT NOT NULL,
    language TEXT NOT NULL,
    description TEXT,
    group_id INTEGER,
    chunk_count INTEGER NOT NULL DEFAULT 0,
    last_indexed_at TEXT,
    last_modified_at TEXT,
    created_at TEXT NOT NULL,
    updated_at TEXT NOT NULL,
    FOREIGN KEY (group_id) REFERENCES groups(id) ON DELETE SET NULL
  );

  CREATE INDEX IF NOT EXISTS idx_projects_group ON projects(group_id);

  CREATE TABLE IF NOT EXISTS files (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    project_id INTEGER NOT NULL,
    file_path TEXT NOT NULL,
    last_modified_at TEXT,
    last_indexed_at TEXT,
    chunk_count INTEGER NOT NULL DEFAULT 0,
    file_hash TEXT,
    UNIQUE(project_id, file_path),
    FOREIGN KEY (project_id) REFERENCES projects(id) ON DELETE CASCADE
  );

  CREATE INDEX IF NOT EXISTS idx_files_project ON files(project_id);
  CREATE INDEX IF NOT EXISTS idx_files_modified ON files(project_id, last_modified_at);
`;

export interface GroupRow {
  id: number;
  name: string;
  description: string | null;
  created_at: string;
  updated_at: string;
}

export interface ProjectRow {
  id: number;
  name: string;
  path: string;
  language: string;
  description: string | null;
  group_id: number | null;
  group_name: string | null;
  chunk_count: number;
  last_indexed_at: string | null;
  last_modified_at: string | null;
  created_at: string;
  updated_at: string;
}

export interface FileRow {
  id: number;
  project_id: number;
  file_path: string;
  last_modified_at: string | null;
  last_indexed_at: string | null;
  chunk_count: number;
  file_hash: string | null;
}
