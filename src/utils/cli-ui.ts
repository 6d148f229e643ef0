import chalk from 'chalk';
import ora, { type Ora } from 'ora';
import type { IndexResult, ProgressEvent } from '../core/types.js';

function formatDuration(ms: number): string {
  const totalSeconds = Math.floor(ms / 1000);
  const minutes = Math.floor(totalSeconds / 60);
  const seconds = totalSeconds % 60;
  return minutes > 0 ? `${minutes}m ${seconds}s` : `${(ms / 1000).toFixed(1)}s`;
}

/**
 * Spinner-based progress display for `index`, driven by indexer progress events.
 */
export class IndexerUI {
  private spinner: Ora | null = null;
  private startTime = 0;

  showHeader(projectName: string, projectPath: string): void {
    process.stdout.write(`${chalk.cyan.bold(`\nIndexing ${projectName}`)}\n`);
    process.stdout.write(`${chalk.gray(`   Path:      ${projectPath}`)}\n`);
  }

  showConfiguration(config: { provider: string; model: string; dimensions: number }): void {
    process.stdout.write(`${chalk.gray(`   Provider:  ${config.provider} (${config.model})`)}\n`);
    process.stdout.write(`${chalk.gray(`   Dimensions: ${config.dimensions}`)}\n\n`);
  }

  start(): void {
    this.startTime = Date.now();
    this.spinner = ora({ text: chalk.white('Parsing source files...'), color: 'cyan' }).start();
  }

  handleProgress(event: ProgressEvent): void {
    if (!this.spinner) return;

    switch (event.type) {
      case 'clean':
        this.spinner.info(chalk.gray(`Removed previous data for ${event.projectName}`));
        this.spinner.start(chalk.white('Parsing source files...'));
        break;
      case 'parsed':
        this.spinner.succeed(chalk.white(`Parsed ${event.fileCount} files into ${event.chunkCount} chunks`));
        if (event.skipped > 0) {
          this.spinner.warn(chalk.yellow(`${event.skipped} files skipped (parse errors)`));
        }
        this.spinner.start(chalk.white('Generating embeddings...'));
        break;
      case 'embedded':
        this.spinner.succeed(chalk.white(`Embedded ${event.chunkCount} chunks`));
        this.spinner.start(chalk.white('Writing to vector store...'));
        break;
      case 'stored':
        this.spinner.succeed(chalk.white(`Stored ${event.chunkCount} chunks`));
        this.spinner.start(chalk.white('Updating metadata...'));
        break;
      case 'metadata':
        if (event.synced) {
          this.spinner.succeed(chalk.white('Metadata updated'));
        } else {
          this.spinner.warn(chalk.yellow('Metadata update failed'));
        }
        break;
    }
  }

  showSummary(result: IndexResult): void {
    this.cleanup();
    process.stdout.write(`${chalk.green.bold(`\nIndexed ${result.projectName}`)} ${chalk.gray(`in ${formatDuration(Date.now() - this.startTime)}`)}\n`);
    process.stdout.write(`${chalk.gray(`   Chunks: ${result.chunkCount}   Files: ${result.fileCount}`)}\n`);
    for (const file of result.skippedFiles) {
      process.stdout.write(`${chalk.yellow(`   skipped ${file}`)}\n`);
    }
    if (result.metadataError) {
      process.stdout.write(`${chalk.yellow(`   metadata not updated: ${result.metadataError}`)}\n`);
    }
  }

  showError(message: string): void {
    if (this.spinner) {
      this.spinner.fail(chalk.red(message));
      this.spinner = null;
      return;
    }
    process.stderr.write(`${chalk.red(message)}\n`);
  }

  cleanup(): void {
    if (this.spinner?.isSpinning) {
      this.spinner.stop();
    }
    this.spinner = null;
  }
}
