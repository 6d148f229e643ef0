import { z } from 'zod';

export const CHUNK_KINDS = ['function', 'method', 'struct', 'interface'] as const;

export type ChunkKind = typeof CHUNK_KINDS[number];

/**
 * One extracted unit of source code. Produced fresh on every parse and never
 * mutated; a later parse of the same unit yields a new value with the same id.
 */
export interface CodeChunk {
  id: string;
  project: string;
  /** POSIX path relative to the project root. */
  filePath: string;
  package: string;
  language: string;
  chunkType: ChunkKind;
  name: string;
  /** Receiver type text for methods, e.g. `*Server`. */
  receiver?: string;
  code: string;
  lineStart: number;
  lineEnd: number;
  docString: string;
  httpEndpoints: string[];
  httpCalls: string[];
  imports: string[];
  lastModified: Date;
}

export const CodeChunkSchema = z.object({
  id: z.string().min(1),
  project: z.string().min(1),
  filePath: z.string(),
  package: z.string(),
  language: z.string(),
  chunkType: z.enum(CHUNK_KINDS),
  name: z.string(),
  receiver: z.string().optional(),
  code: z.string(),
  lineStart: z.number().int().positive(),
  lineEnd: z.number().int().positive(),
  docString: z.string(),
  httpEndpoints: z.array(z.string()),
  httpCalls: z.array(z.string()),
  imports: z.array(z.string()),
  lastModified: z.coerce.date()
}).refine((chunk) => chunk.lineStart <= chunk.lineEnd, {
  message: 'lineStart must not exceed lineEnd',
  path: ['lineEnd']
});

export function isChunkKind(value: string): value is ChunkKind {
  return CHUNK_KINDS.some((kind) => kind === value);
}
