import chalk from 'chalk';
import { Command } from 'commander';
import { print } from '../../utils/logger.js';
import { withServices } from '../services.js';

export function registerGroupCommands(program: Command): void {
  const group = program
    .command('group')
    .description('Manage project groups');

  group
    .command('create <name>')
    .description('Create a group')
    .option('-d, --description <text>', 'group description', '')
    .action(async (name: string, options: { description: string }, command: Command) => {
      await withServices(command, async ({ metadata }) => {
        await metadata.createGroup(name, options.description);
        print(`Created group ${name}`);
      });
    });

  group
    .command('list')
    .description('List groups and their projects')
    .action(async (_options: Record<string, never>, command: Command) => {
      await withServices(command, async ({ metadata }) => {
        const groups = await metadata.listGroups();
        if (groups.length === 0) {
          print('No groups');
          return;
        }

        for (const entry of groups) {
          const projects = await metadata.getProjectsByGroup(entry.name);
          const description = entry.description ? chalk.gray(` - ${entry.description}`) : '';
          print(`${chalk.cyan(entry.name)}${description}`);
          for (const project of projects) {
            print(`  ${project.name}`);
          }
        }
      });
    });

  group
    .command('update <name>')
    .description('Change a group description')
    .requiredOption('-d, --description <text>', 'new description')
    .action(async (name: string, options: { description: string }, command: Command) => {
      await withServices(command, async ({ metadata }) => {
        await metadata.updateGroup(name, options.description);
        print(`Updated group ${name}`);
      });
    });

  group
    .command('delete <name>')
    .description('Delete a group; its projects are kept')
    .action(async (name: string, _options: Record<string, never>, command: Command) => {
      await withServices(command, async ({ metadata }) => {
        await metadata.deleteGroup(name);
        print(`Deleted group ${name}`);
      });
    });
}
