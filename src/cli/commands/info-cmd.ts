import chalk from 'chalk';
import { Command } from 'commander';
import { isStale } from '../../core/metadata.js';
import { print } from '../../utils/logger.js';
import { formatDate, withServices } from '../services.js';

export function registerInfoCommand(program: Command): void {
  program
    .command('info')
    .description('Show project information')
    .requiredOption('-n, --name <name>', 'project name')
    .action(async (options: { name: string }, command: Command) => {
      await withServices(command, async ({ metadata, vectorStore }) => {
        const project = await metadata.getProject(options.name);
        const files = await metadata.listFiles(project.id);
        const stale = files.filter(isStale);
        const stored = await vectorStore.count(project.name);

        print(chalk.cyan.bold(`${project.name}\n`));
        print(`Path:          ${project.path}`);
        print(`Language:      ${project.language}`);
        if (project.description) {
          print(`Description:   ${project.description}`);
        }
        print(`Group:         ${project.groupName ?? '-'}`);
        print(`Chunks:        ${project.chunkCount} recorded, ${stored} stored`);
        print(`Files:         ${files.length} (${stale.length} stale)`);
        print(`Last indexed:  ${formatDate(project.lastIndexedAt)}`);
        print(`Last modified: ${formatDate(project.lastModifiedAt)}`);
      });
    });
}
