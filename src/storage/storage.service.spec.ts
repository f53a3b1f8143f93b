import { Client } from 'minio';
import { Readable } from 'node:stream';
import { StorageService } from './storage.service';

jest.mock('minio');

describe('StorageService', () => {
  let service: StorageService;
  let client: Client;

  const config = {
    endPoint: 'localhost',
    port: 9000,
    useSSL: false,
    region: 'us-west-1',
    accessKey: 'test-access-key',
    secretKey: 'test-secret-key',
    bucket: 'test-files'
  };

  beforeEach(() => {
    service = new StorageService(config);
    client = jest.mocked(Client).mock.instances[0];
  });

  afterEach(() => {
    jest.clearAllMocks();
  });

  describe('constructor', () => {
    it('creates the MinIO client from the config', () => {
      expect(Client).toHaveBeenCalledWith({
        endPoint: 'localhost',
        port: 9000,
        useSSL: false,
        region: 'us-west-1',
        accessKey: 'test-access-key',
        secretKey: 'test-secret-key'
      });
      expect(service.bucketName).toBe('test-files');
    });
  });

  describe('ensureBucket', () => {
    it('creates the bucket in the configured region when missing', async () => {
      jest.mocked(client.bucketExists).mockResolvedValue(false);
      jest.mocked(client.makeBucket).mockResolvedValue(undefined);

      await service.ensureBucket();

      expect(client.bucketExists).toHaveBeenCalledWith('test-files');
      expect(client.makeBucket).toHaveBeenCalledWith('test-files', 'us-west-1');
    });

    it('leaves an existing bucket alone', async () => {
      jest.mocked(client.bucketExists).mockResolvedValue(true);

      await service.ensureBucket();

      expect(client.makeBucket).not.toHaveBeenCalled();
    });
  });

  describe('put', () => {
    it('stores the body with its content type', async () => {
      jest.mocked(client.putObject).mockResolvedValue({ etag: 'etag', versionId: null });
      const body = Buffer.from('hello world');

      await service.put('abc/file.txt', 'text/plain', body);

      expect(client.putObject).toHaveBeenCalledWith('test-files', 'abc/file.txt', body, 11, {
        'Content-Type': 'text/plain'
      });
    });
  });

  describe('listByPrefix', () => {
    it('lists recursively and stops at the requested count', async () => {
      jest
        .mocked(client.listObjectsV2)
        .mockReturnValue(Readable.from([{ name: 'abc/one.txt' }, { name: 'abc/two.txt' }, { name: 'abc/three.txt' }]));

      await expect(service.listByPrefix('abc', 2)).resolves.toEqual(['abc/one.txt', 'abc/two.txt']);
      expect(client.listObjectsV2).toHaveBeenCalledWith('test-files', 'abc', true);
    });

    it('skips entries without a name', async () => {
      jest.mocked(client.listObjectsV2).mockReturnValue(Readable.from([{ prefix: 'abc/', size: 0 }, { name: 'abc/one.txt' }]));

      await expect(service.listByPrefix('abc', 1)).resolves.toEqual(['abc/one.txt']);
    });

    it('returns an empty list when nothing matches', async () => {
      jest.mocked(client.listObjectsV2).mockReturnValue(Readable.from([]));

      await expect(service.listByPrefix('zzz', 1)).resolves.toEqual([]);
    });

    it('rejects when the listing stream fails', async () => {
      const failing = new Readable({
        objectMode: true,
        read() {
          this.destroy(new Error('connection reset'));
        }
      });
      jest.mocked(client.listObjectsV2).mockReturnValue(failing);

      await expect(service.listByPrefix('abc', 1)).rejects.toThrow('connection reset');
    });

    it('destroys the listing stream when the signal aborts', async () => {
      const stalled = new Readable({ objectMode: true, read() {} });
      jest.mocked(client.listObjectsV2).mockReturnValue(stalled);
      const controller = new AbortController();

      const pending = service.listByPrefix('abc', 1, controller.signal);
      controller.abort();

      await expect(pending).rejects.toThrow('Listing aborted');
      expect(stalled.destroyed).toBe(true);
    });
  });

  describe('listByPrefix with an aborted signal', () => {
    it('does not open a listing', async () => {
      const controller = new AbortController();
      controller.abort(new Error('client disconnected'));

      await expect(service.listByPrefix('abc', 1, controller.signal)).rejects.toThrow('client disconnected');
      expect(client.listObjectsV2).not.toHaveBeenCalled();
    });
  });

  describe('getMetadata', () => {
    const stat = {
      size: 11,
      etag: 'etag',
      lastModified: new Date('2024-01-01T00:00:00Z'),
      versionId: null
    };

    it('returns the stored content type', async () => {
      jest.mocked(client.statObject).mockResolvedValue({ ...stat, metaData: { 'content-type': 'image/png' } });

      await expect(service.getMetadata('abc/pic.png')).resolves.toEqual({ contentType: 'image/png' });
      expect(client.statObject).toHaveBeenCalledWith('test-files', 'abc/pic.png');
    });

    it('falls back to application/octet-stream', async () => {
      jest.mocked(client.statObject).mockResolvedValue({ ...stat, metaData: {} });

      await expect(service.getMetadata('abc/blob')).resolves.toEqual({ contentType: 'application/octet-stream' });
    });

    it.each(['NotFound', 'NoSuchKey'])('returns null for %s', async (code) => {
      jest.mocked(client.statObject).mockRejectedValue(Object.assign(new Error('missing'), { code }));

      await expect(service.getMetadata('abc/gone.txt')).resolves.toBeNull();
    });

    it('rethrows other failures', async () => {
      jest.mocked(client.statObject).mockRejectedValue(Object.assign(new Error('denied'), { code: 'AccessDenied' }));

      await expect(service.getMetadata('abc/file.txt')).rejects.toThrow('denied');
    });
  });

  describe('signedGetUrl', () => {
    it('presigns a GET for the key', async () => {
      jest.mocked(client.presignedGetObject).mockResolvedValue('https://signed.example.com/abc/file.txt');

      await expect(service.signedGetUrl('abc/file.txt', 900)).resolves.toBe('https://signed.example.com/abc/file.txt');
      expect(client.presignedGetObject).toHaveBeenCalledWith('test-files', 'abc/file.txt', 900);
    });
  });
});
