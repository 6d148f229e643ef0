import type { SupportedLanguage } from './tree-sitter-loader.js';

export interface LanguageRule {
  lang: SupportedLanguage;
  extensions: string[];
  /** Top-level node types that can produce a chunk. */
  declarationTypes: string[];
  /** Directory names never descended into. */
  skipDirs: string[];
}

export const LANG_RULES: Record<SupportedLanguage, LanguageRule> = {
  go: {
    lang: 'go',
    extensions: ['.go'],
    declarationTypes: ['function_declaration', 'method_declaration', 'type_declaration'],
    skipDirs: ['vendor', 'node_modules']
  }
};

export function getSourcePatterns(rule: LanguageRule): string[] {
  return rule.extensions.map((ext) => `**/*${ext}`);
}
