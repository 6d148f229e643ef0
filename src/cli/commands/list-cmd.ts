import chalk from 'chalk';
import { Command } from 'commander';
import { print } from '../../utils/logger.js';
import { formatDate, withServices } from '../services.js';

export function registerListCommand(program: Command): void {
  program
    .command('list')
    .description('List indexed projects')
    .option('-g, --group <name>', 'only projects in this group')
    .action(async (options: { group?: string }, command: Command) => {
      await withServices(command, async ({ metadata }) => {
        const projects = await metadata.listProjects(options.group ? { groupName: options.group } : {});
        if (projects.length === 0) {
          print('No projects indexed');
          return;
        }

        for (const project of projects) {
          const group = project.groupName ? chalk.gray(` [${project.groupName}]`) : '';
          print(`${chalk.cyan(project.name)}${group}  ${project.chunkCount} chunks  indexed ${formatDate(project.lastIndexedAt)}`);
        }
      });
    });
}
