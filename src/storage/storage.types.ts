export const BACKING_STORE = Symbol('BACKING_STORE');

export interface ObjectMetadata {
  contentType: string;
}

/**
 * The narrow slice of an object store the file directory depends on.
 * Keys are opaque strings; the store never interprets them.
 */
export interface BackingStore {
  put(key: string, contentType: string, body: Buffer): Promise<void>;
  /** Keys starting with `prefix`, in the store's listing order. */
  listByPrefix(prefix: string, maxResults: number, signal?: AbortSignal): Promise<string[]>;
  /** Resolves `null` when no object exists under `key`. */
  getMetadata(key: string): Promise<ObjectMetadata | null>;
  signedGetUrl(key: string, ttlSeconds: number): Promise<string>;
}
