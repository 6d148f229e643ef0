import chalk from 'chalk';
import { Command } from 'commander';
import { QUERY_DEFAULTS } from '../../config/constants.js';
import { QueryEngine } from '../../core/QueryEngine.js';
import { isChunkKind, type ChunkKind } from '../../types/chunk.js';
import type { SearchResult } from '../../types/vector-store.js';
import { print } from '../../utils/logger.js';
import { parsePositiveInt, withServices } from '../services.js';

interface QueryCommandOptions {
  query: string;
  limit: string;
  project?: string;
  group?: string;
  type?: string;
  package?: string;
}

function parseChunkType(value: string | undefined): ChunkKind | undefined {
  if (value === undefined) {
    return undefined;
  }
  if (!isChunkKind(value)) {
    throw new Error(`unknown chunk type: ${value}`);
  }
  return value;
}

function printResult(result: SearchResult, rank: number): void {
  const { chunk } = result;
  const label = chunk.receiver ? `(${chunk.receiver}) ${chunk.name}` : chunk.name;

  print(`${chalk.cyan.bold(`${rank}. ${label}`)} ${chalk.gray(`[${chunk.chunkType}] score ${result.score.toFixed(3)}`)}`);
  print(chalk.gray(`   ${chunk.project}:${chunk.filePath}:${chunk.lineStart}-${chunk.lineEnd}  package ${chunk.package}`));
  if (chunk.docString) {
    print(`   ${chunk.docString.split('\n')[0]}`);
  }
  if (chunk.httpEndpoints.length > 0) {
    print(chalk.gray(`   endpoints: ${chunk.httpEndpoints.join(', ')}`));
  }
  if (chunk.httpCalls.length > 0) {
    print(chalk.gray(`   calls: ${chunk.httpCalls.join(', ')}`));
  }
}

export function registerQueryCommand(program: Command): void {
  program
    .command('query')
    .description('Semantic search over indexed code')
    .requiredOption('-q, --query <text>', 'natural-language question')
    .option('-l, --limit <n>', 'maximum number of results', String(QUERY_DEFAULTS.LIMIT))
    .option('-p, --project <name>', 'restrict to one project')
    .option('-g, --group <name>', 'restrict to the projects of a group')
    .option('-t, --type <kind>', 'restrict to a chunk type (function, method, struct, interface)')
    .option('--package <name>', 'restrict to a package')
    .action(async (options: QueryCommandOptions, command: Command) => {
      if (options.project && options.group) {
        throw new Error('--project and --group cannot be combined');
      }
      const limit = parsePositiveInt(options.limit, '--limit');
      const chunkType = parseChunkType(options.type);

      await withServices(command, async ({ metadata, vectorStore, embedder }) => {
        const engine = new QueryEngine({ embedder, vectorStore, metadata });
        const results = options.group
          ? await engine.queryGroup(options.query, limit, options.group)
          : await engine.query(options.query, limit, {
            project: options.project,
            chunkType,
            package: options.package
          });

        if (results.length === 0) {
          print('No results found');
          return;
        }
        results.forEach((result, index) => printResult(result, index + 1));
      });
    });
}
