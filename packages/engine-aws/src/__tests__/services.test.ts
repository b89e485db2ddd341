import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { describe, expect, it } from 'vitest';
import { NoSuchKey, S3Client, type ServiceOutputTypes as S3Output } from '@aws-sdk/client-s3';
import {
  BadRequestException,
  ConflictException,
  TranscribeClient,
  type ServiceOutputTypes as TranscribeOutput,
} from '@aws-sdk/client-transcribe';

import { FormatError, ServiceError, TouchError, silentLogger } from '@touch/core';
import { S3ObjectStore } from '../s3-store.js';
import { AwsTranscribeService } from '../transcribe.js';

interface SentCommand {
  command: string;
  input: object;
}

const credentials = { accessKeyId: 'test', secretAccessKey: 'test-secret' };

/** An S3Client whose requests are answered in process, before anything is signed or sent. */
function fakeS3(respond: (command: string, input: object) => S3Output) {
  const client = new S3Client({ region: 'ap-northeast-2', credentials });
  const sent: SentCommand[] = [];
  client.middlewareStack.add(
    (_next, context) => async (args) => {
      const command = typeof context.commandName === 'string' ? context.commandName : 'unknown';
      sent.push({ command, input: args.input });
      return { output: respond(command, args.input), response: {} };
    },
    { step: 'initialize', priority: 'high', name: 'inProcessResponder' },
  );
  return { client, sent };
}

function fakeTranscribe(respond: (command: string, input: object) => TranscribeOutput) {
  const client = new TranscribeClient({ region: 'ap-northeast-2', credentials });
  const sent: SentCommand[] = [];
  client.middlewareStack.add(
    (_next, context) => async (args) => {
      const command = typeof context.commandName === 'string' ? context.commandName : 'unknown';
      sent.push({ command, input: args.input });
      return { output: respond(command, args.input), response: {} };
    },
    { step: 'initialize', priority: 'high', name: 'inProcessResponder' },
  );
  return { client, sent };
}

function audioFile(runId: string): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'touch-s3-'));
  const file = path.join(dir, `touch-${runId}.wav`);
  fs.writeFileSync(file, 'RIFF');
  return file;
}

describe('S3ObjectStore', () => {
  it('uploads under <prefix>/<runId>/<basename> and returns the object URI', async () => {
    const { client, sent } = fakeS3(() => ({ $metadata: {} }));
    const store = new S3ObjectStore({ bucket: 'media-bucket', region: 'ap-northeast-2', logger: silentLogger, client });

    const uri = await store.put(audioFile('run-1'), 'audio/run-1/');

    expect(uri).toBe('s3://media-bucket/audio/run-1/touch-run-1.wav');
    expect(sent).toHaveLength(1);
    expect(sent[0]).toMatchObject({
      command: 'PutObjectCommand',
      input: { Bucket: 'media-bucket', Key: 'audio/run-1/touch-run-1.wav' },
    });
  });

  it('wraps upload failures as ServiceError', async () => {
    const { client } = fakeS3(() => {
      throw Object.assign(new Error('Please reduce your request rate.'), {
        name: 'SlowDown',
        $metadata: { httpStatusCode: 503 },
      });
    });
    const store = new S3ObjectStore({ bucket: 'media-bucket', region: 'ap-northeast-2', logger: silentLogger, client });

    await expect(store.put(audioFile('run-2'), 'audio/run-2')).rejects.toMatchObject({
      kind: 'throttled',
      message: 's3: PutObject audio/run-2/touch-run-2.wav failed: Please reduce your request rate.',
    });
  });

  it('deletes the bucket and key named by the URI', async () => {
    const { client, sent } = fakeS3(() => ({ $metadata: {} }));
    const store = new S3ObjectStore({ bucket: 'media-bucket', region: 'ap-northeast-2', logger: silentLogger, client });

    await store.delete('s3://archive-bucket/audio/run-3/touch-run-3.wav');

    expect(sent).toEqual([
      { command: 'DeleteObjectCommand', input: { Bucket: 'archive-bucket', Key: 'audio/run-3/touch-run-3.wav' } },
    ]);
  });

  it('reports a missing object as not-found', async () => {
    const { client } = fakeS3(() => {
      throw new NoSuchKey({ message: 'The specified key does not exist.', $metadata: { httpStatusCode: 404 } });
    });
    const store = new S3ObjectStore({ bucket: 'media-bucket', region: 'ap-northeast-2', logger: silentLogger, client });

    const err = await store.delete('s3://media-bucket/audio/gone.wav').catch((e: unknown) => e);

    expect(err).toBeInstanceOf(ServiceError);
    if (err instanceof ServiceError) {
      expect(err.kind).toBe('not-found');
      expect(err.severity).toBe('ignorable');
    }
  });

  it('rejects a delete for something that is not an S3 URI without calling S3', async () => {
    const { client, sent } = fakeS3(() => ({ $metadata: {} }));
    const store = new S3ObjectStore({ bucket: 'media-bucket', region: 'ap-northeast-2', logger: silentLogger, client });

    await expect(store.delete('mem://bucket/a.wav')).rejects.toThrow('Not an S3 URI: mem://bucket/a.wav');
    expect(sent).toEqual([]);
  });
});

describe('AwsTranscribeService job calls', () => {
  function service(respond: (command: string, input: object) => TranscribeOutput) {
    const { client, sent } = fakeTranscribe(respond);
    return {
      sent,
      transcribe: new AwsTranscribeService({ region: 'ap-northeast-2', languageCode: 'en-US', logger: silentLogger, client }),
    };
  }

  it('submits a WAV job under the given name', async () => {
    const { transcribe, sent } = service(() => ({ $metadata: {} }));

    await expect(transcribe.submit('s3://media-bucket/audio/a.wav', 'touch-run-1')).resolves.toBe('touch-run-1');
    expect(sent).toEqual([
      {
        command: 'StartTranscriptionJobCommand',
        input: {
          TranscriptionJobName: 'touch-run-1',
          LanguageCode: 'en-US',
          MediaFormat: 'wav',
          Media: { MediaFileUri: 's3://media-bucket/audio/a.wav' },
        },
      },
    ]);
  });

  it('accepts a job that an earlier attempt already created', async () => {
    const { transcribe } = service(() => {
      throw new ConflictException({
        message: 'The requested job name already exists.',
        $metadata: { httpStatusCode: 400 },
      });
    });

    await expect(transcribe.submit('s3://media-bucket/audio/a.wav', 'touch-run-2')).resolves.toBe('touch-run-2');
  });

  it('reports a rejected submit as a fatal ServiceError', async () => {
    const { transcribe } = service(() => {
      throw new BadRequestException({ message: 'Unsupported media', $metadata: { httpStatusCode: 400 } });
    });

    await expect(transcribe.submit('s3://media-bucket/audio/a.wav', 'touch-run-3')).rejects.toMatchObject({
      kind: 'invalid-input',
      message: 'transcribe: StartTranscriptionJob touch-run-3 failed: Unsupported media',
    });
  });

  it('maps job descriptions to poller statuses', async () => {
    const jobs: TranscribeOutput[] = [
      { $metadata: {}, TranscriptionJob: { TranscriptionJobName: 'touch-run-4', TranscriptionJobStatus: 'QUEUED' } },
      {
        $metadata: {},
        TranscriptionJob: {
          TranscriptionJobName: 'touch-run-4',
          TranscriptionJobStatus: 'COMPLETED',
          Transcript: { TranscriptFileUri: 'https://transcripts.test/touch-run-4.json' },
        },
      },
    ];
    const { transcribe, sent } = service(() => {
      const next = jobs.shift();
      if (!next) throw new Error('no more responses');
      return next;
    });

    await expect(transcribe.getStatus('touch-run-4')).resolves.toEqual({ state: 'Submitted' });
    await expect(transcribe.getStatus('touch-run-4')).resolves.toEqual({
      state: 'Completed',
      resultRef: 'https://transcripts.test/touch-run-4.json',
    });
    expect(sent[0]).toEqual({ command: 'GetTranscriptionJobCommand', input: { TranscriptionJobName: 'touch-run-4' } });
  });

  it('deletes jobs and reports an unknown job as not-found', async () => {
    const { transcribe, sent } = service((_command, input) => {
      if ('TranscriptionJobName' in input && input.TranscriptionJobName === 'touch-gone') {
        throw new BadRequestException({
          message: "The requested job couldn't be found. Check the job name and try your request again.",
          $metadata: { httpStatusCode: 400 },
        });
      }
      return { $metadata: {} };
    });

    await transcribe.delete('touch-run-5');
    await expect(transcribe.delete('touch-gone')).rejects.toMatchObject({ kind: 'not-found' });
    expect(sent.map((s) => s.command)).toEqual(['DeleteTranscriptionJobCommand', 'DeleteTranscriptionJobCommand']);
  });
});

function transcribeWith(fetchImpl: typeof fetch): AwsTranscribeService {
  return new AwsTranscribeService({ region: 'ap-northeast-2', languageCode: 'en-US', logger: silentLogger, fetchImpl });
}

describe('AwsTranscribeService.fetchResult', () => {
  it('returns the transcript text from the result document', async () => {
    const requested: string[] = [];
    const service = transcribeWith(async (input) => {
      requested.push(String(input));
      return new Response(JSON.stringify({ results: { transcripts: [{ transcript: 'good morning class' }] } }));
    });

    await expect(service.fetchResult('https://transcripts.test/job-1.json')).resolves.toBe('good morning class');
    expect(requested).toEqual(['https://transcripts.test/job-1.json']);
  });

  it('reports a malformed document as FormatError', async () => {
    const service = transcribeWith(async () => new Response(JSON.stringify({ results: {} })));
    await expect(service.fetchResult('https://transcripts.test/job-2.json')).rejects.toBeInstanceOf(FormatError);
  });

  it('treats server errors as transient and forbidden links as fatal', async () => {
    const flaky = transcribeWith(async () => new Response('busy', { status: 503 }));
    const expired = transcribeWith(async () => new Response('denied', { status: 403 }));

    const transient = await flaky.fetchResult('https://transcripts.test/a').catch((e: unknown) => e);
    const fatal = await expired.fetchResult('https://transcripts.test/b').catch((e: unknown) => e);

    expect(transient).toBeInstanceOf(ServiceError);
    expect(fatal).toBeInstanceOf(ServiceError);
    if (transient instanceof ServiceError && fatal instanceof ServiceError) {
      expect(transient.severity).toBe('transient');
      expect(fatal.kind).toBe('permission');
      expect(fatal.message).toBe('transcribe: transcript download returned HTTP 403');
    }
  });

  it('reports a failed download as a network error', async () => {
    const service = transcribeWith(async () => {
      throw new TypeError('fetch failed');
    });
    await expect(service.fetchResult('https://transcripts.test/c')).rejects.toMatchObject({
      kind: 'network',
      message: 'transcribe: transcript download failed',
    });
  });
});

describe('adapter construction', () => {
  it('rejects an unsupported language code', () => {
    expect(
      () => new AwsTranscribeService({ region: 'ap-northeast-2', languageCode: 'xx-XX', logger: silentLogger }),
    ).toThrow(TouchError);
  });

  it('rejects a store without a bucket', () => {
    const build = () => new S3ObjectStore({ bucket: '', region: 'ap-northeast-2', logger: silentLogger });
    expect(build).toThrow(ServiceError);
    expect(build).toThrow('s3: no bucket configured (set TOUCH_S3_BUCKET or aws.bucket)');
  });
});
