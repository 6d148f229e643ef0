/** Float32 little-endian encoding for embedding BLOB columns. */
export function encodeEmbedding(embedding: ArrayLike<number>): Buffer {
  const buffer = Buffer.allocUnsafe(embedding.length * 4);
  for (let i = 0; i < embedding.length; i++) {
    buffer.writeFloatLE(Number(embedding[i]) || 0, i * 4);
  }
  return buffer;
}

export function decodeEmbedding(buffer: Buffer): Float32Array {
  if (buffer.length < 4 || buffer.length % 4 !== 0) {
    return new Float32Array();
  }

  const vector = new Float32Array(buffer.length / 4);
  for (let i = 0; i < vector.length; i++) {
    vector[i] = buffer.readFloatLE(i * 4);
  }
  return vector;
}

export function cosineSimilarity(a: ArrayLike<number>, b: ArrayLike<number>): number {
  if (a.length !== b.length) return 0;

  let dotProduct = 0;
  let normA = 0;
  let normB = 0;

  for (let i = 0; i < a.length; i++) {
    dotProduct += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }

  if (normA === 0 || normB === 0) {
    return 0;
  }

  return dotProduct / (Math.sqrt(normA) * Math.sqrt(normB));
}
