import type { Env } from '../config/env.js';
import { S3ObjectStore } from './s3.js';
import type { ObjectStore } from './types.js';

export * from './types.js';
export * from './s3.js';

export function createObjectStore(env: Env): ObjectStore {
  return S3ObjectStore.fromOptions({
    region: env.AWS_REGION,
    endpoint: env.S3_ENDPOINT,
    accessKeyId: env.S3_ACCESS_KEY_ID,
    secretAccessKey: env.S3_SECRET_ACCESS_KEY,
    forcePathStyle: env.S3_FORCE_PATH_STYLE,
  });
}
