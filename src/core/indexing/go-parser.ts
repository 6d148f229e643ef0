import crypto from 'crypto';
import fs from 'fs';
import path from 'path';
import type { SyntaxNode } from 'tree-sitter';
import Parser from 'tree-sitter';
import { generateChunkId } from '../../chunking/chunk-id.js';
import { PARSING_CONSTANTS } from '../../config/constants.js';
import { ParseError } from '../../errors.js';
import { LANG_RULES, type LanguageRule } from '../../languages/rules.js';
import { getParser } from '../../languages/tree-sitter-loader.js';
import { collectDeclarations, visitDeclaration, type Declaration } from '../../symbols/declarations.js';
import { extractDocString } from '../../symbols/doc-comments.js';
import { detectHttpUsage } from '../../symbols/http-heuristics.js';
import type { CodeChunk } from '../../types/chunk.js';
import { getErrorMessage } from '../../utils/error-utils.js';
import { log } from '../../utils/logger.js';
import type { ExtractionResult, ParsedFile, SourceParser } from '../types.js';
import { FileScanner } from './file-scanner.js';

const { SIZE_THRESHOLD, CHUNK_SIZE } = PARSING_CONSTANTS;

interface FileContext {
  projectName: string;
  filePath: string;
  packageName: string;
  imports: string[];
  lastModified: Date;
}

/** First `ERROR` node, or zero-width `MISSING` token inserted during recovery. */
function findErrorNode(node: SyntaxNode): SyntaxNode | null {
  if (node.type === 'ERROR' || node.isMissing) {
    return node;
  }
  if (!node.hasError) {
    return null;
  }
  for (const child of node.children) {
    const found = findErrorNode(child);
    if (found) {
      return found;
    }
  }
  return null;
}

function extractPackageName(root: SyntaxNode): string | null {
  const clause = root.namedChildren.find((child) => child.type === 'package_clause');
  const identifier = clause?.namedChildren.find((child) => child.type === 'package_identifier');
  return identifier ? identifier.text : null;
}

function collectImportPaths(node: SyntaxNode, out: string[]): void {
  if (node.type === 'import_spec') {
    const importPath = node.childForFieldName('path');
    if (importPath) {
      out.push(importPath.text.replace(/^"+|"+$/g, ''));
    }
    return;
  }
  for (const child of node.namedChildren) {
    collectImportPaths(child, out);
  }
}

function extractImports(root: SyntaxNode): string[] {
  const imports: string[] = [];
  for (const child of root.namedChildren) {
    if (child.type === 'import_declaration') {
      collectImportPaths(child, imports);
    }
  }
  return imports;
}

/**
 * Go extractor: walks the project, parses every `.go` file with tree-sitter
 * and turns top-level functions, methods, structs and interfaces into chunks.
 */
export class GoParser implements SourceParser {
  readonly language = 'go';
  private readonly rule: LanguageRule = LANG_RULES.go;
  private readonly scanner = new FileScanner(this.rule);

  async parse(projectPath: string, projectName: string): Promise<ExtractionResult> {
    const { files } = await this.scanner.scan(projectPath);
    const chunks: CodeChunk[] = [];
    const parsedFiles: ParsedFile[] = [];

    for (const rel of files) {
      const absolute = path.join(projectPath, ...rel.split('/'));
      const fileRecord: ParsedFile = { filePath: rel, lastModified: null, hash: '', chunkCount: 0, parsed: false };

      try {
        const [content, stats] = await Promise.all([
          fs.promises.readFile(absolute),
          fs.promises.stat(absolute)
        ]);
        fileRecord.lastModified = stats.mtime;
        fileRecord.hash = crypto.createHash('sha256').update(content).digest('hex');

        const fileChunks = this.parseSource(content.toString('utf8'), {
          projectName,
          filePath: rel,
          lastModified: stats.mtime
        });
        chunks.push(...fileChunks);
        fileRecord.chunkCount = fileChunks.length;
        fileRecord.parsed = true;
      } catch (error) {
        fileRecord.error = getErrorMessage(error);
        log.warn('Skipping file that failed to parse', { file: rel, error: fileRecord.error });
      }

      parsedFiles.push(fileRecord);
    }

    return { chunks, files: parsedFiles };
  }

  /**
   * Chunks of a single source text. Throws `ParseError` when the syntax tree
   * has error or missing nodes, or no package clause.
   */
  parseSource(
    source: string,
    file: { projectName: string; filePath: string; lastModified: Date }
  ): CodeChunk[] {
    const tree = this.buildTree(source);
    const root = tree.rootNode;

    if (root.hasError) {
      const errorNode = findErrorNode(root) ?? root;
      throw new ParseError(file.filePath, `syntax error at line ${errorNode.startPosition.row + 1}`);
    }

    const packageName = extractPackageName(root);
    if (packageName === null) {
      throw new ParseError(file.filePath, 'missing package clause');
    }

    const context: FileContext = { ...file, packageName, imports: extractImports(root) };

    return collectDeclarations(root, this.rule.declarationTypes)
      .map((declaration) => this.toChunk(declaration, context));
  }

  private toChunk(declaration: Declaration, context: FileContext): CodeChunk {
    const base: CodeChunk = {
      id: generateChunkId(context.projectName, context.filePath, declaration.name),
      project: context.projectName,
      filePath: context.filePath,
      package: context.packageName,
      language: this.language,
      chunkType: declaration.kind,
      name: declaration.name,
      code: declaration.node.text,
      lineStart: declaration.span.startPosition.row + 1,
      lineEnd: declaration.span.endPosition.row + 1,
      docString: extractDocString(declaration.docAnchor),
      httpEndpoints: [],
      httpCalls: [],
      imports: [],
      lastModified: context.lastModified
    };

    return visitDeclaration<CodeChunk>(declaration, {
      function: (fn) => {
        const usage = detectHttpUsage(fn.body);
        return { ...base, imports: [...context.imports], httpEndpoints: usage.endpoints, httpCalls: usage.calls };
      },
      method: (method) => {
        const usage = detectHttpUsage(method.body);
        return {
          ...base,
          receiver: method.receiver,
          imports: [...context.imports],
          httpEndpoints: usage.endpoints,
          httpCalls: usage.calls
        };
      },
      struct: () => base,
      interface: () => base
    });
  }

  private buildTree(source: string): Parser.Tree {
    const parser = getParser(this.rule.lang);
    if (source.length > SIZE_THRESHOLD) {
      return parser.parse((index: number) => {
        if (index < source.length) {
          return source.slice(index, Math.min(index + CHUNK_SIZE, source.length));
        }
        return null;
      });
    }
    return parser.parse(source);
  }
}
