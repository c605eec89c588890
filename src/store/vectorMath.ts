/**
 * Vector helpers for exact similarity search
 */

export function cosineSimilarity(a: number[], b: number[]): number {
  const length = Math.min(a.length, b.length)
  let dot = 0
  let normA = 0
  let normB = 0
  for (let i = 0; i < length; i++) {
    const x = a[i] ?? 0
    const y = b[i] ?? 0
    dot += x * y
    normA += x * x
    normB += y * y
  }
  if (normA === 0 || normB === 0) return 0
  return dot / (Math.sqrt(normA) * Math.sqrt(normB))
}

// Float32 little-endian, 4 bytes per component
export function vectorToBlob(vector: number[]): Buffer {
  return Buffer.from(new Float32Array(vector).buffer)
}

export function blobToVector(blob: Buffer): number[] {
  // Copy first: the blob's offset in its backing buffer may not be 4-byte aligned
  return Array.from(new Float32Array(new Uint8Array(blob).buffer))
}
