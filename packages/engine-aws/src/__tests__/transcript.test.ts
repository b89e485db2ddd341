import { describe, expect, it } from 'vitest';

import { FormatError } from '@touch/core';
import { objectKey, parseS3Uri } from '../s3-store.js';
import { isLanguageCode } from '../transcribe.js';
import { parseTranscriptDocument, toJobStatus } from '../transcript.js';

describe('parseTranscriptDocument', () => {
  it('returns the transcript text', () => {
    const doc = {
      jobName: 'touch-1',
      status: 'COMPLETED',
      results: { transcripts: [{ transcript: 'hello world' }], items: [] },
    };
    expect(parseTranscriptDocument(JSON.stringify(doc))).toBe('hello world');
  });

  it('rejects invalid JSON', () => {
    expect(() => parseTranscriptDocument('{not json')).toThrow(FormatError);
  });

  it('rejects a document without transcripts', () => {
    const doc = { results: { transcripts: [] } };
    expect(() => parseTranscriptDocument(JSON.stringify(doc))).toThrow(/unexpected structure/);
  });

  it('rejects a transcript of the wrong type', () => {
    const doc = { results: { transcripts: [{ transcript: 42 }] } };
    expect(() => parseTranscriptDocument(JSON.stringify(doc))).toThrow(FormatError);
  });
});

describe('toJobStatus', () => {
  it('maps Transcribe job states', () => {
    expect(toJobStatus({ TranscriptionJobStatus: 'QUEUED' })).toEqual({ state: 'Submitted' });
    expect(toJobStatus({ TranscriptionJobStatus: 'IN_PROGRESS' })).toEqual({ state: 'InProgress' });
    expect(
      toJobStatus({
        TranscriptionJobStatus: 'COMPLETED',
        Transcript: { TranscriptFileUri: 'https://example.test/t.json' },
      }),
    ).toEqual({ state: 'Completed', resultRef: 'https://example.test/t.json' });
    expect(toJobStatus({ TranscriptionJobStatus: 'FAILED', FailureReason: 'unsupported codec' })).toEqual({
      state: 'Failed',
      failureReason: 'unsupported codec',
    });
    expect(toJobStatus(undefined)).toEqual({ state: 'Submitted' });
  });
});

describe('S3 helpers', () => {
  it('parses s3 URIs', () => {
    expect(parseS3Uri('s3://media-bucket/audio/run-1/touch-run-1.wav')).toEqual({
      bucket: 'media-bucket',
      key: 'audio/run-1/touch-run-1.wav',
    });
    expect(() => parseS3Uri('https://example.test/a.wav')).toThrow(/Not an S3 URI/);
  });

  it('joins prefixes and file names', () => {
    expect(objectKey('/audio/run-1/', '/tmp/touch-run-1.wav')).toBe('audio/run-1/touch-run-1.wav');
    expect(objectKey('', '/tmp/a.wav')).toBe('a.wav');
  });
});

describe('isLanguageCode', () => {
  it('accepts Transcribe language codes only', () => {
    expect(isLanguageCode('en-US')).toBe(true);
    expect(isLanguageCode('ko-KR')).toBe(true);
    expect(isLanguageCode('xx-XX')).toBe(false);
  });
});
