#!/usr/bin/env node

import chalk from 'chalk';
import { runCli } from './cli/index.js';
import { describeError } from './utils/error-utils.js';

runCli().catch((error: unknown) => {
  console.error(chalk.red(`Error: ${describeError(error)}`));
  process.exitCode = 1;
});
