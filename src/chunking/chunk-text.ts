import type { CodeChunk } from '../types/chunk.js';

/**
 * Text projection handed to the embedding provider.
 */
export function chunkToText(chunk: CodeChunk): string {
  let text = '';

  if (chunk.docString) {
    text += `${chunk.docString}\n\n`;
  }

  text += `Project: ${chunk.project}\n`;
  text += `Package: ${chunk.package}\n`;
  text += `Type: ${chunk.chunkType}\n`;

  if (chunk.name) {
    text += `Name: ${chunk.name}\n`;
  }

  if (chunk.httpEndpoints.length > 0) {
    text += `HTTP Endpoints: ${chunk.httpEndpoints.join(', ')}\n`;
  }

  if (chunk.imports.length > 0) {
    text += `Imports: ${chunk.imports.join(', ')}\n`;
  }

  return `${text}\nCode:\n${chunk.code}`;
}
