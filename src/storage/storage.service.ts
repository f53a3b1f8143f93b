import { Client } from 'minio';
import type { BackingStore, ObjectMetadata } from './storage.types';

export interface StorageConfig {
  endPoint: string;
  port: number;
  useSSL: boolean;
  region: string;
  accessKey: string;
  secretKey: string;
  bucket: string;
}

const MISSING_OBJECT_CODES = new Set(['NotFound', 'NoSuchKey']);

function itemName(item: unknown): string | undefined {
  if (typeof item !== 'object' || item === null || !('name' in item)) return undefined;
  return typeof item.name === 'string' ? item.name : undefined;
}

function isMissingObjectError(err: unknown): boolean {
  if (!(err instanceof Error) || !('code' in err)) return false;
  return typeof err.code === 'string' && MISSING_OBJECT_CODES.has(err.code);
}

/** S3-compatible backing store over a single bucket. */
export class StorageService implements BackingStore {
  private readonly client: Client;
  private readonly bucket: string;
  private readonly region: string;

  constructor(config: StorageConfig) {
    this.client = new Client({
      endPoint: config.endPoint,
      port: config.port,
      useSSL: config.useSSL,
      region: config.region,
      accessKey: config.accessKey,
      secretKey: config.secretKey
    });

    this.bucket = config.bucket;
    this.region = config.region;
  }

  get bucketName(): string {
    return this.bucket;
  }

  async ensureBucket(): Promise<void> {
    const exists = await this.client.bucketExists(this.bucket);
    if (!exists) {
      await this.client.makeBucket(this.bucket, this.region);
    }
  }

  async put(key: string, contentType: string, body: Buffer): Promise<void> {
    await this.client.putObject(this.bucket, key, body, body.length, {
      'Content-Type': contentType
    });
  }

  async listByPrefix(prefix: string, maxResults: number, signal?: AbortSignal): Promise<string[]> {
    signal?.throwIfAborted();
    const stream = this.client.listObjectsV2(this.bucket, prefix, true);
    const onAbort = () => stream.destroy(new Error('Listing aborted'));
    signal?.addEventListener('abort', onAbort, { once: true });

    const keys: string[] = [];
    try {
      for await (const item of stream) {
        // Common prefixes come through without a name.
        const name = itemName(item);
        if (name) {
          keys.push(name);
        }
        if (keys.length >= maxResults) {
          break;
        }
      }
    } finally {
      signal?.removeEventListener('abort', onAbort);
    }

    return keys;
  }

  async getMetadata(key: string): Promise<ObjectMetadata | null> {
    try {
      const stat = await this.client.statObject(this.bucket, key);
      const contentType: unknown = stat.metaData['content-type'];
      return {
        contentType: typeof contentType === 'string' ? contentType : 'application/octet-stream'
      };
    } catch (err) {
      if (isMissingObjectError(err)) {
        return null;
      }
      throw err;
    }
  }

  async signedGetUrl(key: string, ttlSeconds: number): Promise<string> {
    return this.client.presignedGetObject(this.bucket, key, ttlSeconds);
  }
}
