import { createHash } from 'node:crypto';
import { StreamReadError } from './file-errors';

export type ContentChunk = Buffer | Uint8Array | string;

export interface SplitKey {
  hash: string;
  originalName: string;
}

/**
 * Derives the storage key for an upload: the SHA-256 of its bytes, base64url
 * encoded without padding, followed by the name it was uploaded under.
 *
 * The stream is consumed to the end; callers that still need the bytes
 * (for the actual write) must keep their own copy.
 */
export async function computeKey(
  originalName: string,
  content: AsyncIterable<ContentChunk>
): Promise<string> {
  const hasher = createHash('sha256');

  try {
    for await (const chunk of content) {
      hasher.update(chunk);
    }
  } catch (err) {
    throw new StreamReadError(err);
  }

  return `${hasher.digest('base64url')}/${originalName}`;
}

export function splitKey(fullKey: string): SplitKey | null {
  const idx = fullKey.indexOf('/');
  if (idx < 0) return null;
  return {
    hash: fullKey.slice(0, idx),
    originalName: fullKey.slice(idx + 1)
  };
}

export function publicToken(fullKey: string, tokenLength: number): string {
  return `/${fullKey.slice(0, tokenLength)}`;
}
