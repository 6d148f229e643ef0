export type ErrorCode =
  | 'TRAVERSAL_FAILED'
  | 'PARSE_FAILED'
  | 'EMPTY_INDEX'
  | 'INDEXING_FAILED'
  | 'NOT_FOUND'
  | 'CONFLICT'
  | 'CONFIG_INVALID'
  | 'STORE_FAILED';

export type EntityKind = 'group' | 'project' | 'file';

/** Step of an indexing run or query that failed. */
export type IndexingStep = 'clean' | 'extract' | 'embed' | 'store' | 'search';

export class AtlasError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'AtlasError';
    this.code = code;
  }
}

export function isAtlasError(error: unknown): error is AtlasError {
  return error instanceof AtlasError;
}

/** The project root is missing, unreadable, or the walk failed part way. */
export class TraversalError extends AtlasError {
  readonly root: string;

  constructor(root: string, cause?: unknown) {
    super('TRAVERSAL_FAILED', `failed to walk project directory: ${root}`, { cause });
    this.name = 'TraversalError';
    this.root = root;
  }
}

export class ParseError extends AtlasError {
  readonly filePath: string;

  constructor(filePath: string, detail: string) {
    super('PARSE_FAILED', `failed to parse ${filePath}: ${detail}`);
    this.name = 'ParseError';
    this.filePath = filePath;
  }
}

export class EmptyIndexError extends AtlasError {
  constructor(projectName: string) {
    super('EMPTY_INDEX', `no code chunks found in project ${projectName}`);
    this.name = 'EmptyIndexError';
  }
}

export class IndexingError extends AtlasError {
  readonly step: IndexingStep;

  constructor(step: IndexingStep, message: string, cause: unknown) {
    super('INDEXING_FAILED', message, { cause });
    this.name = 'IndexingError';
    this.step = step;
  }
}

export class NotFoundError extends AtlasError {
  readonly entity: EntityKind;
  readonly key: string;

  constructor(entity: EntityKind, key: string) {
    super('NOT_FOUND', `${entity} not found: ${key}`);
    this.name = 'NotFoundError';
    this.entity = entity;
    this.key = key;
  }
}

export class ConflictError extends AtlasError {
  readonly entity: EntityKind;
  readonly key: string;

  constructor(entity: EntityKind, key: string) {
    super('CONFLICT', `${entity} already exists: ${key}`);
    this.name = 'ConflictError';
    this.entity = entity;
    this.key = key;
  }
}

export class ConfigError extends AtlasError {
  constructor(message: string, cause?: unknown) {
    super('CONFIG_INVALID', message, { cause });
    this.name = 'ConfigError';
  }
}

/** A storage backend call failed for a reason other than a missing or duplicate row. */
export class StoreError extends AtlasError {
  constructor(message: string, cause?: unknown) {
    super('STORE_FAILED', message, { cause });
    this.name = 'StoreError';
  }
}
