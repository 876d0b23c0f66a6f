import {
  S3Client,
  S3ServiceException,
  DeleteObjectsCommand,
  HeadBucketCommand,
  ListBucketsCommand,
  ListObjectsV2Command,
  PutObjectCommand,
  type DeleteObjectsCommandInput,
  type DeleteObjectsCommandOutput,
  type HeadBucketCommandInput,
  type HeadBucketCommandOutput,
  type ListBucketsCommandInput,
  type ListBucketsCommandOutput,
  type ListObjectsV2CommandInput,
  type ListObjectsV2CommandOutput,
  type PutObjectCommandInput,
  type PutObjectCommandOutput,
} from '@aws-sdk/client-s3';
import type { ObjectRecord } from '@bucket-sweep/core';

import { AppError, errorMessage } from '../utils/errors.js';
import type { DeleteFailure, DeleteOutcome, ObjectStore } from './types.js';

// DeleteObjects accepts at most 1000 keys per request.
export const DELETE_BATCH_SIZE = 1000;

/** The slice of the S3 API the sweeper calls; tests supply an in-process fake. */
export type S3Api = {
  listObjectsV2(input: ListObjectsV2CommandInput): Promise<ListObjectsV2CommandOutput>;
  deleteObjects(input: DeleteObjectsCommandInput): Promise<DeleteObjectsCommandOutput>;
  putObject(input: PutObjectCommandInput): Promise<PutObjectCommandOutput>;
  listBuckets(input: ListBucketsCommandInput): Promise<ListBucketsCommandOutput>;
  headBucket(input: HeadBucketCommandInput): Promise<HeadBucketCommandOutput>;
  destroy(): void;
};

export type S3ConnectionOptions = {
  region: string;
  endpoint?: string;
  accessKeyId?: string;
  secretAccessKey?: string;
  forcePathStyle?: boolean;
};

export function createS3Client(options: S3ConnectionOptions): S3Client {
  const forcePathStyle =
    typeof options.forcePathStyle === 'boolean'
      ? options.forcePathStyle
      : !!options.endpoint; // default true for MinIO-like endpoints

  return new S3Client({
    region: options.region,
    endpoint: options.endpoint,
    forcePathStyle,
    credentials:
      options.accessKeyId && options.secretAccessKey
        ? { accessKeyId: options.accessKeyId, secretAccessKey: options.secretAccessKey }
        : undefined,
  });
}

export function s3ApiFromClient(client: S3Client): S3Api {
  return {
    listObjectsV2: (input) => client.send(new ListObjectsV2Command(input)),
    deleteObjects: (input) => client.send(new DeleteObjectsCommand(input)),
    putObject: (input) => client.send(new PutObjectCommand(input)),
    listBuckets: (input) => client.send(new ListBucketsCommand(input)),
    headBucket: (input) => client.send(new HeadBucketCommand(input)),
    destroy: () => client.destroy(),
  };
}

export function chunk<T>(items: readonly T[], size: number): T[][] {
  const out: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    out.push(items.slice(i, i + size));
  }
  return out;
}

export class S3ObjectStore implements ObjectStore {
  constructor(private readonly api: S3Api) {}

  static fromOptions(options: S3ConnectionOptions): S3ObjectStore {
    return new S3ObjectStore(s3ApiFromClient(createS3Client(options)));
  }

  async *listObjects(args: { bucket: string; prefix?: string }): AsyncGenerator<ObjectRecord> {
    let continuationToken: string | undefined;
    do {
      const res = await this.api.listObjectsV2({
        Bucket: args.bucket,
        Prefix: args.prefix,
        ContinuationToken: continuationToken,
      });

      for (const item of res.Contents ?? []) {
        if (!item.Key || !item.LastModified) continue;
        yield {
          key: item.Key,
          sizeBytes: item.Size ?? 0,
          lastModified: item.LastModified,
          storageClass: item.StorageClass ?? 'STANDARD',
        };
      }

      continuationToken = res.IsTruncated ? res.NextContinuationToken : undefined;
    } while (continuationToken);
  }

  async deleteObjects(args: { bucket: string; keys: readonly string[] }): Promise<DeleteOutcome> {
    const deleted: string[] = [];
    const failed: DeleteFailure[] = [];

    for (const batch of chunk(args.keys, DELETE_BATCH_SIZE)) {
      try {
        const res = await this.api.deleteObjects({
          Bucket: args.bucket,
          Delete: { Objects: batch.map((key) => ({ Key: key })), Quiet: false },
        });

        for (const item of res.Deleted ?? []) {
          if (item.Key) deleted.push(item.Key);
        }
        for (const item of res.Errors ?? []) {
          failed.push({
            key: item.Key ?? '',
            code: item.Code ?? 'Unknown',
            message: item.Message ?? '',
          });
        }
      } catch (error) {
        // eslint-disable-next-line no-console
        console.error('[s3] delete batch failed', { bucket: args.bucket, size: batch.length, err: errorMessage(error) });
        for (const key of batch) {
          failed.push({ key, code: 'BatchFailed', message: errorMessage(error) });
        }
      }
    }

    return { deleted, failed };
  }

  async putObject(args: {
    bucket: string;
    key: string;
    body: string;
    contentType: string;
  }): Promise<{ etag: string | undefined }> {
    const res = await this.api.putObject({
      Bucket: args.bucket,
      Key: args.key,
      Body: args.body,
      ContentType: args.contentType,
    });
    return { etag: res.ETag };
  }

  async listBuckets(): Promise<string[]> {
    const res = await this.api.listBuckets({});
    return (res.Buckets ?? []).flatMap((bucket) => (bucket.Name ? [bucket.Name] : []));
  }

  async assertBucketAccess(bucket: string): Promise<void> {
    try {
      await this.api.headBucket({ Bucket: bucket });
    } catch (error) {
      const status = error instanceof S3ServiceException ? error.$metadata.httpStatusCode : undefined;
      if (status === 404) throw AppError.notFound(`Bucket '${bucket}' does not exist`);
      if (status === 403) throw AppError.forbidden(`Access denied to bucket '${bucket}'`);
      throw error;
    }
  }

  close(): void {
    this.api.destroy();
  }
}
