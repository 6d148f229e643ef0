import { Command } from 'commander';
import { IndexerEngine } from '../../core/IndexerEngine.js';
import { GoParser } from '../../core/indexing/go-parser.js';
import { print } from '../../utils/logger.js';
import { withServices } from '../services.js';

export function registerDeleteCommand(program: Command): void {
  program
    .command('delete')
    .description('Remove a project from the knowledge base')
    .requiredOption('-n, --name <name>', 'project name')
    .action(async (options: { name: string }, command: Command) => {
      await withServices(command, async ({ metadata, vectorStore, embedder }) => {
        const engine = new IndexerEngine({ parser: new GoParser(), embedder, vectorStore, metadata });
        const existed = await engine.deleteProject(options.name);
        print(existed ? `Deleted project ${options.name}` : `No metadata for ${options.name}; removed any stored chunks`);
      });
    });
}
