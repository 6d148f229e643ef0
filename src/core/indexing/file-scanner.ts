import fg from 'fast-glob';
import fs from 'fs';
import { TraversalError } from '../../errors.js';
import { getSourcePatterns, type LanguageRule } from '../../languages/rules.js';

export interface ScanResult {
  /** POSIX paths relative to the root, in walk order. */
  files: string[];
}

/** Compares paths segment by segment so a directory sorts by its own name. */
export function compareWalkOrder(a: string, b: string): number {
  const left = a.split('/');
  const right = b.split('/');
  const length = Math.min(left.length, right.length);

  for (let i = 0; i < length; i++) {
    if (left[i] !== right[i]) {
      return left[i] < right[i] ? -1 : 1;
    }
  }
  return left.length - right.length;
}

export function buildScanIgnores(rule: LanguageRule): string[] {
  return [
    ...rule.skipDirs.map((dir) => `**/${dir}/**`),
    // hidden directories: a leading dot and at least one more character
    '**/.?*/**'
  ];
}

/**
 * Discovers the source files of one language under a project root.
 * The root itself is never filtered, even when its own name is hidden.
 */
export class FileScanner {
  constructor(private readonly rule: LanguageRule) {}

  async scan(root: string): Promise<ScanResult> {
    let stats: fs.Stats;
    try {
      stats = await fs.promises.stat(root);
    } catch (error) {
      throw new TraversalError(root, error);
    }
    if (!stats.isDirectory()) {
      throw new TraversalError(root, new Error('not a directory'));
    }

    let files: string[];
    try {
      files = await fg(getSourcePatterns(this.rule), {
        cwd: root,
        absolute: false,
        followSymbolicLinks: false,
        ignore: buildScanIgnores(this.rule),
        onlyFiles: true,
        dot: true,
        suppressErrors: false
      });
    } catch (error) {
      throw new TraversalError(root, error);
    }

    return { files: [...new Set(files)].sort(compareWalkOrder) };
  }
}
