import path from 'path';
import { Command } from 'commander';
import { IndexerEngine } from '../../core/IndexerEngine.js';
import { GoParser } from '../../core/indexing/go-parser.js';
import { IndexerUI } from '../../utils/cli-ui.js';
import { LogLevel, log } from '../../utils/logger.js';
import { withServices } from '../services.js';

interface IndexCommandOptions {
  path: string;
  name: string;
  group?: string;
  description?: string;
  clean?: boolean;
}

export function registerIndexCommand(program: Command): void {
  program
    .command('index')
    .description('Index a Go project into the knowledge base')
    .option('-p, --path <dir>', 'project root directory', '.')
    .requiredOption('-n, --name <name>', 'project name')
    .option('-g, --group <name>', 'group to place the project in')
    .option('-d, --description <text>', 'project description')
    .option('--clean', 'remove existing data for the project before indexing')
    .action(async (options: IndexCommandOptions, command: Command) => {
      const ui = new IndexerUI();
      const projectPath = path.resolve(options.path);

      await withServices(command, async ({ config, metadata, vectorStore, embedder }) => {
        const engine = new IndexerEngine({
          parser: new GoParser(),
          embedder,
          vectorStore,
          metadata,
          onProgress: (event) => ui.handleProgress(event)
        });

        log.debug('Using vector store', { path: config.vectorStore.path });

        // only warnings and errors while the spinner runs
        const level = log.getLevel();
        if (level < LogLevel.WARN) {
          log.setLevel(LogLevel.WARN);
        }
        ui.showHeader(options.name, projectPath);
        ui.showConfiguration({
          provider: embedder.getName(),
          model: embedder.getModelName(),
          dimensions: embedder.getDimensions()
        });

        ui.start();
        try {
          const result = await engine.index({
            projectPath,
            projectName: options.name,
            clean: options.clean,
            groupName: options.group,
            description: options.description
          });
          ui.showSummary(result);
        } catch (error) {
          ui.showError('Indexing failed');
          throw error;
        } finally {
          ui.cleanup();
          log.setLevel(level);
        }
      });
    });
}
