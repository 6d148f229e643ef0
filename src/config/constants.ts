/**
 * Shared defaults and tuning values.
 */

export const PARSING_CONSTANTS = {
  /** Sources longer than this many characters are fed to tree-sitter in slices. */
  SIZE_THRESHOLD: 30_000,
  /** Slice length for the callback parse. */
  CHUNK_SIZE: 30_000,
} as const;

export const STORAGE_DEFAULTS = {
  DATA_DIR: '~/.codeatlas',
  CONFIG_FILE: 'config.json',
  METADATA_DB: 'metadata.db',
  VECTOR_DB: 'vectors.db',
  COLLECTION: 'codeatlas',
  /** Vector store rows per write transaction. */
  BATCH_SIZE: 1000,
} as const;

export const QUERY_DEFAULTS = {
  LIMIT: 10,
} as const;
