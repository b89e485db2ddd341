/**
 * @module errors
 * Maps AWS SDK v3 exceptions onto ServiceError kinds.
 *
 * SDK errors are matched by shape (`name`, `$metadata.httpStatusCode`,
 * `code`) rather than by class, since each client ships its own classes.
 */

import { ServiceError, type ServiceErrorKind } from '@touch/core';

const NOT_FOUND_NAMES = new Set(['NotFoundException', 'NoSuchKey', 'NoSuchBucket', 'NotFound']);
const THROTTLE_NAMES = new Set([
  'ThrottlingException',
  'Throttling',
  'LimitExceededException',
  'TooManyRequestsException',
  'SlowDown',
  'RequestLimitExceeded',
]);
const AUTH_NAMES = new Set([
  'CredentialsProviderError',
  'UnrecognizedClientException',
  'InvalidAccessKeyId',
  'SignatureDoesNotMatch',
  'ExpiredToken',
  'ExpiredTokenException',
]);
const PERMISSION_NAMES = new Set(['AccessDenied', 'AccessDeniedException', 'Forbidden']);
const NETWORK_CODES = new Set([
  'ECONNRESET',
  'ECONNREFUSED',
  'ETIMEDOUT',
  'EAI_AGAIN',
  'ENOTFOUND',
  'EPIPE',
]);

/** Transcribe reports an unknown job as a 400 with this wording. */
const MISSING_JOB = /couldn'?t be found|could not be found|does not exist/i;

function stringField(err: object, key: 'name' | 'code' | 'message'): string | undefined {
  if (!(key in err)) return undefined;
  const value: unknown = Reflect.get(err, key);
  return typeof value === 'string' ? value : undefined;
}

function httpStatusOf(err: object): number | undefined {
  if (!('$metadata' in err)) return undefined;
  const meta = err.$metadata;
  if (typeof meta !== 'object' || meta === null || !('httpStatusCode' in meta)) return undefined;
  return typeof meta.httpStatusCode === 'number' ? meta.httpStatusCode : undefined;
}

/** Decide the ServiceError kind for anything an AWS client threw. */
export function awsErrorKind(err: unknown): ServiceErrorKind {
  if (typeof err !== 'object' || err === null) return 'remote';

  const name = stringField(err, 'name') ?? '';
  const code = stringField(err, 'code') ?? '';
  const message = stringField(err, 'message') ?? '';
  const status = httpStatusOf(err);

  if (NOT_FOUND_NAMES.has(name) || status === 404) return 'not-found';
  if (name === 'BadRequestException' && MISSING_JOB.test(message)) return 'not-found';
  if (THROTTLE_NAMES.has(name) || status === 429 || status === 503) return 'throttled';
  if (AUTH_NAMES.has(name) || status === 401) return 'auth';
  if (PERMISSION_NAMES.has(name) || status === 403) return 'permission';
  if (NETWORK_CODES.has(code) || name === 'TimeoutError' || name === 'RequestTimeout') return 'network';
  if (status !== undefined && status >= 500) return 'remote';
  if (status !== undefined && status >= 400) return 'invalid-input';
  return 'remote';
}

/** Transcribe refuses a job name that is already taken. */
export function isConflict(err: unknown): boolean {
  return typeof err === 'object' && err !== null && stringField(err, 'name') === 'ConflictException';
}

/** Wrap an SDK error for `service` ("s3", "transcribe"). */
export function toServiceError(service: string, action: string, err: unknown): ServiceError {
  if (err instanceof ServiceError) return err;
  const detail = typeof err === 'object' && err !== null ? stringField(err, 'message') : String(err);
  return new ServiceError(service, awsErrorKind(err), `${action} failed: ${detail ?? 'unknown error'}`, err);
}
