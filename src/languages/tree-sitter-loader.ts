import Parser from 'tree-sitter';
import LangGo from 'tree-sitter-go';
import { safeGetProperty } from '../utils/error-utils.js';

/**
 * Grammar packages are CommonJS; depending on the loader the language object
 * arrives bare or under `default`.
 */
function resolveTreeSitterLanguage(module: unknown): unknown {
  const defaultProp = safeGetProperty(module, 'default');
  if (defaultProp) {
    return resolveTreeSitterLanguage(defaultProp);
  }
  return module;
}

export const RESOLVED_LANGUAGES = {
  go: resolveTreeSitterLanguage(LangGo)
};

export type SupportedLanguage = keyof typeof RESOLVED_LANGUAGES;

const parserCache = new Map<SupportedLanguage, Parser>();

/** One Parser per language, created on first use. */
export function getParser(language: SupportedLanguage): Parser {
  const cached = parserCache.get(language);
  if (cached) {
    return cached;
  }

  const parser = new Parser();
  parser.setLanguage(RESOLVED_LANGUAGES[language]);
  parserCache.set(language, parser);
  return parser;
}
