/**
 * @module s3-store
 * ObjectStore on Amazon S3.
 */

import fs from 'node:fs';
import path from 'node:path';
import { DeleteObjectCommand, PutObjectCommand, S3Client } from '@aws-sdk/client-s3';

import { ServiceError, TouchError, type Logger, type ObjectStore } from '@touch/core';
import { toServiceError } from './errors.js';

export interface S3Location {
  bucket: string;
  key: string;
}

/** Split `s3://bucket/key`. Throws on anything else. */
export function parseS3Uri(uri: string): S3Location {
  const match = /^s3:\/\/([^/]+)\/(.+)$/.exec(uri);
  if (!match?.[1] || !match[2]) {
    throw new TouchError(`Not an S3 URI: ${uri}`, 'invalid-uri');
  }
  return { bucket: match[1], key: match[2] };
}

/** Join a key prefix and file name without doubled slashes. */
export function objectKey(keyPrefix: string, localPath: string): string {
  const prefix = keyPrefix.replace(/^\/+|\/+$/g, '');
  const base = path.basename(localPath);
  return prefix ? `${prefix}/${base}` : base;
}

export interface S3ObjectStoreOptions {
  bucket: string;
  region: string;
  logger: Logger;
  client?: S3Client;
}

export class S3ObjectStore implements ObjectStore {
  readonly name = 's3';
  private readonly bucket: string;
  private readonly client: S3Client;
  private readonly logger: Logger;

  constructor(opts: S3ObjectStoreOptions) {
    if (!opts.bucket) {
      throw new ServiceError('s3', 'auth', 'no bucket configured (set TOUCH_S3_BUCKET or aws.bucket)');
    }
    this.bucket = opts.bucket;
    this.client = opts.client ?? new S3Client({ region: opts.region });
    this.logger = opts.logger;
  }

  async put(localPath: string, keyPrefix: string, signal?: AbortSignal): Promise<string> {
    const key = objectKey(keyPrefix, localPath);
    const body = await fs.promises.readFile(localPath);
    try {
      await this.client.send(
        new PutObjectCommand({ Bucket: this.bucket, Key: key, Body: body }),
        { abortSignal: signal },
      );
    } catch (err) {
      throw toServiceError(this.name, `PutObject ${key}`, err);
    }
    const uri = `s3://${this.bucket}/${key}`;
    this.logger.debug(`Uploaded ${body.length} bytes to ${uri}`);
    return uri;
  }

  async delete(remoteUri: string): Promise<void> {
    const { bucket, key } = parseS3Uri(remoteUri);
    try {
      await this.client.send(new DeleteObjectCommand({ Bucket: bucket, Key: key }));
    } catch (err) {
      throw toServiceError(this.name, `DeleteObject ${key}`, err);
    }
  }
}
