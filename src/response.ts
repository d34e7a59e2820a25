/** Largest error body prefix kept on an ApiError (1 MiB); the rest is discarded */
export const MAX_ERROR_BODY_BYTES = 1024 * 1024;

/**
 * Reads a response body to the end, keeping at most `limit` bytes.
 * Bytes past the limit are still read so the connection is released.
 */
export async function readBody(response: Response, limit: number = Infinity): Promise<Uint8Array> {
  if (!response.body) {
    return new Uint8Array(0);
  }

  const reader = response.body.getReader();
  const chunks: Uint8Array[] = [];
  let size = 0;

  try {
    for (;;) {
      const { done, value } = await reader.read();
      if (done) {
        break;
      }
      const chunk: Uint8Array = value;
      if (size < limit) {
        // Partial chunks are copied, not viewed
        const kept = chunk.length > limit - size ? chunk.slice(0, limit - size) : chunk;
        chunks.push(kept);
        size += kept.length;
      }
    }
  } finally {
    reader.releaseLock();
  }

  return concat(chunks, size);
}

/**
 * Drains whatever is left of a response body. No-op when the body is
 * absent or has already been read.
 */
export async function discardBody(response: Response): Promise<void> {
  if (!response.body || response.bodyUsed) {
    return;
  }

  const reader = response.body.getReader();
  try {
    for (;;) {
      const { done } = await reader.read();
      if (done) {
        return;
      }
    }
  } finally {
    reader.releaseLock();
  }
}

function concat(chunks: Uint8Array[], size: number): Uint8Array {
  if (chunks.length === 1) {
    return chunks[0];
  }
  const result = new Uint8Array(size);
  let offset = 0;
  for (const chunk of chunks) {
    result.set(chunk, offset);
    offset += chunk.length;
  }
  return result;
}
