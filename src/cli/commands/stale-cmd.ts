import chalk from 'chalk';
import { Command } from 'commander';
import { print } from '../../utils/logger.js';
import { formatDate, withServices } from '../services.js';

export function registerStaleCommand(program: Command): void {
  program
    .command('stale')
    .description('List files changed since they were last indexed')
    .requiredOption('-n, --name <name>', 'project name')
    .action(async (options: { name: string }, command: Command) => {
      await withServices(command, async ({ metadata }) => {
        const project = await metadata.getProject(options.name);
        const stale = await metadata.getStaleFiles(project.id);
        if (stale.length === 0) {
          print(`All files of ${project.name} are up to date`);
          return;
        }

        for (const file of stale) {
          print(`${chalk.yellow(file.filePath)}  modified ${formatDate(file.lastModifiedAt)}  indexed ${formatDate(file.lastIndexedAt)}`);
        }
      });
    });
}
