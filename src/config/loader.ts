import fs from 'fs';
import path from 'path';
import { ConfigError } from '../errors.js';
import { getErrorMessage } from '../utils/error-utils.js';
import { log } from '../utils/logger.js';
import { expandHome } from '../utils/path-helpers.js';
import { STORAGE_DEFAULTS } from './constants.js';
import { PartialConfigSchema, type AtlasConfig, type PartialConfig } from './types.js';

export const GLOBAL_CONFIG_FILE = path.join(expandHome(STORAGE_DEFAULTS.DATA_DIR), STORAGE_DEFAULTS.CONFIG_FILE);

export interface LoadConfigOptions {
  /** Explicit config file; must exist. Falls back to CODEATLAS_CONFIG, then the global file. */
  configPath?: string;
  env?: NodeJS.ProcessEnv;
}

function validate(raw: unknown, source: string): PartialConfig {
  const result = PartialConfigSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`invalid configuration in ${source}: ${issues}`);
  }
  return result.data;
}

/**
 * Reads and validates a JSON config file. Returns null when the file does
 * not exist; unreadable or invalid content is a `ConfigError`.
 */
export function readConfigFile(filePath: string): PartialConfig | null {
  if (!fs.existsSync(filePath)) {
    return null;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, 'utf8'));
  } catch (error) {
    throw new ConfigError(`failed to read config file ${filePath}: ${getErrorMessage(error)}`, error);
  }

  log.debug('Loaded config file', { path: filePath });
  return validate(raw, filePath);
}

function parseIntegerEnv(name: string, value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') {
    return undefined;
  }
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new ConfigError(`${name} must be an integer, got "${value}"`);
  }
  return parsed;
}

/**
 * Overrides taken from CODEATLAS_* variables. OPENAI_API_KEY stands in for
 * CODEATLAS_EMBEDDING_API_KEY when the latter is unset.
 */
export function readEnvConfig(env: NodeJS.ProcessEnv = process.env): PartialConfig {
  return validate(
    {
      dataDir: env.CODEATLAS_DATA_DIR || undefined,
      metadata: { dbPath: env.CODEATLAS_METADATA_DB || undefined },
      vectorStore: { path: env.CODEATLAS_VECTOR_DB || undefined },
      embeddings: {
        provider: env.CODEATLAS_EMBEDDING_PROVIDER || undefined,
        model: env.CODEATLAS_EMBEDDING_MODEL || undefined,
        endpoint: env.CODEATLAS_EMBEDDING_ENDPOINT || undefined,
        apiKey: env.CODEATLAS_EMBEDDING_API_KEY || env.OPENAI_API_KEY || undefined,
        dimensions: parseIntegerEnv('CODEATLAS_EMBEDDING_DIMENSIONS', env.CODEATLAS_EMBEDDING_DIMENSIONS)
      }
    },
    'environment'
  );
}

/**
 * Merges partial configs; later sources win key by key and undefined
 * values never override.
 */
export function mergeConfigs(...configs: Array<PartialConfig | null>): PartialConfig {
  let result: PartialConfig = {};

  for (const next of configs) {
    if (!next) continue;

    result = {
      dataDir: next.dataDir ?? result.dataDir,
      metadata: {
        dbPath: next.metadata?.dbPath ?? result.metadata?.dbPath
      },
      vectorStore: {
        type: next.vectorStore?.type ?? result.vectorStore?.type,
        path: next.vectorStore?.path ?? result.vectorStore?.path,
        collection: next.vectorStore?.collection ?? result.vectorStore?.collection,
        batchSize: next.vectorStore?.batchSize ?? result.vectorStore?.batchSize
      },
      embeddings: {
        provider: next.embeddings?.provider ?? result.embeddings?.provider,
        model: next.embeddings?.model ?? result.embeddings?.model,
        endpoint: next.embeddings?.endpoint ?? result.embeddings?.endpoint,
        apiKey: next.embeddings?.apiKey ?? result.embeddings?.apiKey,
        dimensions: next.embeddings?.dimensions ?? result.embeddings?.dimensions
      }
    };
  }

  return result;
}

function resolvePath(value: string): string {
  return value === ':memory:' ? value : path.resolve(expandHome(value));
}

/** Fills defaults and makes every path absolute. */
export function resolveConfig(partial: PartialConfig): AtlasConfig {
  const dataDir = resolvePath(partial.dataDir ?? STORAGE_DEFAULTS.DATA_DIR);
  const embeddings = partial.embeddings ?? {};

  return {
    dataDir,
    metadata: {
      dbPath: resolvePath(partial.metadata?.dbPath ?? path.join(dataDir, STORAGE_DEFAULTS.METADATA_DB))
    },
    vectorStore: {
      type: 'sqlite',
      path: resolvePath(partial.vectorStore?.path ?? path.join(dataDir, STORAGE_DEFAULTS.VECTOR_DB)),
      collection: partial.vectorStore?.collection ?? STORAGE_DEFAULTS.COLLECTION,
      batchSize: partial.vectorStore?.batchSize ?? STORAGE_DEFAULTS.BATCH_SIZE
    },
    embeddings: {
      provider: embeddings.provider ?? 'ollama',
      model: embeddings.model,
      endpoint: embeddings.endpoint,
      apiKey: embeddings.apiKey,
      dimensions: embeddings.dimensions
    }
  };
}

/**
 * Defaults, then the config file, then the environment.
 */
export function loadConfig(options: LoadConfigOptions = {}): AtlasConfig {
  const env = options.env ?? process.env;
  const explicitPath = options.configPath ?? env.CODEATLAS_CONFIG;

  let fileConfig: PartialConfig | null;
  if (explicitPath) {
    const resolved = resolvePath(explicitPath);
    fileConfig = readConfigFile(resolved);
    if (!fileConfig) {
      throw new ConfigError(`config file not found: ${resolved}`);
    }
  } else {
    fileConfig = readConfigFile(GLOBAL_CONFIG_FILE);
  }

  return resolveConfig(mergeConfigs(fileConfig, readEnvConfig(env)));
}
