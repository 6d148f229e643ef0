import 'dotenv/config';
import fs from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';
import { Command } from 'commander';
import { z } from 'zod';
import { registerDeleteCommand } from './commands/delete-cmd.js';
import { registerGroupCommands } from './commands/group-cmd.js';
import { registerIndexCommand } from './commands/index-cmd.js';
import { registerInfoCommand } from './commands/info-cmd.js';
import { registerListCommand } from './commands/list-cmd.js';
import { registerQueryCommand } from './commands/query-cmd.js';
import { registerStaleCommand } from './commands/stale-cmd.js';

const PackageJsonSchema = z.object({ version: z.string() });

function readPackageVersion(): string {
  const __filename = fileURLToPath(import.meta.url);
  const __dirname = path.dirname(__filename);
  const packageJsonPath = path.join(__dirname, '..', '..', 'package.json');
  return PackageJsonSchema.parse(JSON.parse(fs.readFileSync(packageJsonPath, 'utf8'))).version;
}

export async function runCli(argv = process.argv): Promise<void> {
  const program = new Command();

  program
    .name('codeatlas')
    .description('Semantic code knowledge base for Go projects')
    .version(readPackageVersion())
    .option('-c, --config <path>', 'configuration file');

  registerIndexCommand(program);
  registerQueryCommand(program);
  registerListCommand(program);
  registerInfoCommand(program);
  registerStaleCommand(program);
  registerDeleteCommand(program);
  registerGroupCommands(program);

  if (!argv || argv.length <= 2) {
    program.help();
    return;
  }

  await program.parseAsync(argv);
}
