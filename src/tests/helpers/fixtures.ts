import type { CodeChunk } from '../../types/chunk.js';

export function makeChunk(overrides: Partial<CodeChunk> & Pick<CodeChunk, 'id'>): CodeChunk {
  return {
    project: 'proj',
    filePath: 'main.go',
    package: 'main',
    language: 'go',
    chunkType: 'function',
    name: 'Run',
    code: 'func Run() {}',
    lineStart: 1,
    lineEnd: 1,
    docString: '',
    httpEndpoints: [],
    httpCalls: [],
    imports: [],
    lastModified: new Date('2024-01-01T00:00:00.000Z'),
    ...overrides
  };
}
