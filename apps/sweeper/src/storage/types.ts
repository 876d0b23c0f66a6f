import type { ObjectRecord } from '@bucket-sweep/core';

export type DeleteFailure = {
  key: string;
  code: string;
  message: string;
};

export type DeleteOutcome = {
  deleted: string[];
  failed: DeleteFailure[];
};

export type ObjectStore = {
  /** Streams every object under `prefix`, page by page. */
  listObjects(args: { bucket: string; prefix?: string }): AsyncIterable<ObjectRecord>;
  deleteObjects(args: { bucket: string; keys: readonly string[] }): Promise<DeleteOutcome>;
  putObject(args: { bucket: string; key: string; body: string; contentType: string }): Promise<{ etag: string | undefined }>;
  listBuckets(): Promise<string[]>;
  /** Throws AppError 403/404 when the bucket cannot be reached. */
  assertBucketAccess(bucket: string): Promise<void>;
  close(): void;
};
