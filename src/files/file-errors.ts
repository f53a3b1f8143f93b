export abstract class FileError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** No stored object matches the requested token or key. */
export class ObjectMissingError extends FileError {
  constructor(message = 'Could not find object in storage') {
    super(message);
  }
}

/**
 * A stored object's key does not have the `<hash>/<name>` shape. Objects
 * written by this service never look like this.
 */
export class InvalidKeyError extends FileError {
  constructor(readonly key: string) {
    super(`Encountered stored object with unexpected key: ${key}`);
  }
}

export class BackingStoreError extends FileError {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
  }
}

export class StreamReadError extends FileError {
  constructor(cause: unknown) {
    super('Could not read upload content', { cause });
  }
}
