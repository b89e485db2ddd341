/**
 * @touch/engine-aws
 *
 * Amazon S3 object store and Amazon Transcribe job service.
 */

import type { Logger, TouchConfig } from '@touch/core';

import { S3ObjectStore } from './s3-store.js';
import { AwsTranscribeService } from './transcribe.js';

export { S3ObjectStore, parseS3Uri, objectKey, type S3Location, type S3ObjectStoreOptions } from './s3-store.js';
export { AwsTranscribeService, isLanguageCode, type AwsTranscribeServiceOptions } from './transcribe.js';
export {
  TranscriptDocumentSchema,
  parseTranscriptDocument,
  toJobStatus,
  type TranscriptDocument,
} from './transcript.js';
export { awsErrorKind, isConflict, toServiceError } from './errors.js';

/** Store and transcription service for one region, from config. */
export function createAwsServices(config: TouchConfig, logger: Logger) {
  return {
    store: new S3ObjectStore({ bucket: config.aws.bucket, region: config.aws.region, logger }),
    transcription: new AwsTranscribeService({
      region: config.aws.region,
      languageCode: config.transcription.languageCode,
      logger,
    }),
  };
}
