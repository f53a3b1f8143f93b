import { Logger } from '@nestjs/common';
import { Readable } from 'node:stream';
import type { BackingStore } from '../storage/storage.types';
import { computeKey, publicToken, splitKey } from './content-address';
import { deadlineSignal, withDeadline } from './deadline';
import { BackingStoreError, FileError, InvalidKeyError, ObjectMissingError } from './file-errors';
import { LRUCache } from './lru-cache';

export interface ResolvedFile {
  originalName: string;
  url: string;
  isImage: boolean;
}

export interface UploadInput {
  originalName: string;
  contentType: string;
  body: Buffer;
}

export interface ObjectDirectoryOptions {
  tokenLength: number;
  /** Public base URL the bucket is served from. Without it, lookups hand out signed URLs. */
  cdnBase?: string;
  cacheSize: number;
  signedUrlTtlSeconds: number;
  storeTimeoutMs: number;
}

export function isImageType(contentType: string): boolean {
  return contentType.trim().toLowerCase().startsWith('image/');
}

/**
 * Maps short public tokens to content-addressed objects in the backing
 * store, with an LRU in front of lookups when a CDN serves the bucket.
 */
export class ObjectDirectory {
  private readonly logger = new Logger(ObjectDirectory.name);
  private readonly cache: LRUCache<ResolvedFile> | null;
  private readonly cdnBase: string | null;

  constructor(
    private readonly store: BackingStore,
    private readonly options: ObjectDirectoryOptions
  ) {
    this.cdnBase = options.cdnBase ? options.cdnBase.replace(/\/+$/, '') : null;
    // Signed URLs expire, so results are only worth caching behind a CDN.
    this.cache = this.cdnBase ? new LRUCache<ResolvedFile>(options.cacheSize) : null;
  }

  get tokenLength(): number {
    return this.options.tokenLength;
  }

  get cacheEnabled(): boolean {
    return this.cache !== null;
  }

  async upload(input: UploadInput, signal?: AbortSignal): Promise<string> {
    const key = await computeKey(input.originalName, Readable.from([input.body]));
    const token = publicToken(key, this.options.tokenLength);

    if (await this.exists(key, signal)) {
      this.logger.log(`File with key ${key} already uploaded`);
      return token;
    }

    this.logger.log(`Uploading file as ${input.contentType} with key ${key}`);
    await this.call('write', signal, () => this.store.put(key, input.contentType, input.body));

    return token;
  }

  async lookup(token: string, signal?: AbortSignal): Promise<ResolvedFile> {
    const cached = this.cache?.get(token);
    if (cached) {
      return cached;
    }

    const fullKey = await this.firstKeyWithPrefix(token, signal);
    if (fullKey === undefined) {
      throw new ObjectMissingError(`No object found for ${token}`);
    }

    const parts = splitKey(fullKey);
    if (!parts) {
      this.logger.error(`Stored object ${fullKey} does not follow the <hash>/<name> layout`);
      throw new InvalidKeyError(fullKey);
    }

    const metadata = await this.call('metadata fetch', signal, () => this.store.getMetadata(fullKey));
    if (!metadata) {
      throw new ObjectMissingError(`Object ${fullKey} disappeared before it could be read`);
    }

    const file: ResolvedFile = {
      originalName: parts.originalName,
      url: await this.resolveUrl(fullKey, signal),
      isImage: isImageType(metadata.contentType)
    };

    this.cache?.set(token, file);
    return file;
  }

  /** Exact match only: a prefix search for `hash/a.txt` may also return `hash/a.txt.bak`. */
  private async exists(key: string, signal?: AbortSignal): Promise<boolean> {
    return (await this.firstKeyWithPrefix(key, signal)) === key;
  }

  private firstKeyWithPrefix(prefix: string, signal?: AbortSignal): Promise<string | undefined> {
    const listSignal = deadlineSignal(this.options.storeTimeoutMs, signal);
    return withDeadline('listing', listSignal, () => this.store.listByPrefix(prefix, 1, listSignal)).then(
      (keys) => keys[0],
      (err: unknown) => {
        throw this.wrap('listing', err);
      }
    );
  }

  private async resolveUrl(fullKey: string, signal?: AbortSignal): Promise<string> {
    if (this.cdnBase) {
      return `${this.cdnBase}/${encodeURIComponent(fullKey)}`;
    }
    return this.call('URL signing', signal, () =>
      this.store.signedGetUrl(fullKey, this.options.signedUrlTtlSeconds)
    );
  }

  private call<T>(operation: string, signal: AbortSignal | undefined, work: () => Promise<T>): Promise<T> {
    return withDeadline(operation, deadlineSignal(this.options.storeTimeoutMs, signal), work).catch(
      (err: unknown) => {
        throw this.wrap(operation, err);
      }
    );
  }

  private wrap(operation: string, err: unknown): FileError {
    if (err instanceof FileError) {
      return err;
    }
    const detail = err instanceof Error ? err.message : String(err);
    return new BackingStoreError(`Storage ${operation} failed: ${detail}`, err);
  }
}
