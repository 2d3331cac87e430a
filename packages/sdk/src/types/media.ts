/**
 * Media handles: locally addressable copies of room attachments.
 */

export interface MediaHandle {
  /** Absolute path of the local copy. Valid until `release()` resolves. */
  path: string;
  mimetype?: string;
  release(): Promise<void>;
}

export interface IMediaResolver {
  resolve(source: string, mimetype?: string): Promise<MediaHandle>;
}
