/**
 * @module transcribe
 * AsyncTranscriptionService on Amazon Transcribe (batch jobs).
 */

import {
  DeleteTranscriptionJobCommand,
  GetTranscriptionJobCommand,
  LanguageCode,
  MediaFormat,
  StartTranscriptionJobCommand,
  TranscribeClient,
} from '@aws-sdk/client-transcribe';

import {
  ServiceError,
  TouchError,
  type AsyncTranscriptionService,
  type JobStatus,
  type Logger,
} from '@touch/core';
import { isConflict, toServiceError } from './errors.js';
import { parseTranscriptDocument, toJobStatus } from './transcript.js';

const LANGUAGE_CODES: ReadonlySet<string> = new Set(Object.values(LanguageCode));

export function isLanguageCode(value: string): value is LanguageCode {
  return LANGUAGE_CODES.has(value);
}

export interface AwsTranscribeServiceOptions {
  region: string;
  languageCode: string;
  logger: Logger;
  client?: TranscribeClient;
  /** Downloads transcript documents. Default: global fetch */
  fetchImpl?: typeof fetch;
}

export class AwsTranscribeService implements AsyncTranscriptionService {
  readonly name = 'transcribe';
  private readonly client: TranscribeClient;
  private readonly languageCode: LanguageCode;
  private readonly logger: Logger;
  private readonly fetchImpl: typeof fetch;

  constructor(opts: AwsTranscribeServiceOptions) {
    if (!isLanguageCode(opts.languageCode)) {
      throw new TouchError(`Unsupported transcription language: ${opts.languageCode}`, 'config-invalid');
    }
    this.languageCode = opts.languageCode;
    this.client = opts.client ?? new TranscribeClient({ region: opts.region });
    this.logger = opts.logger;
    this.fetchImpl = opts.fetchImpl ?? fetch;
  }

  async submit(remoteUri: string, jobName: string, signal?: AbortSignal): Promise<string> {
    try {
      await this.client.send(
        new StartTranscriptionJobCommand({
          TranscriptionJobName: jobName,
          LanguageCode: this.languageCode,
          MediaFormat: MediaFormat.WAV,
          Media: { MediaFileUri: remoteUri },
        }),
        { abortSignal: signal },
      );
    } catch (err) {
      // Job names are unique per run, so a taken name is this run's own earlier submit.
      if (isConflict(err)) {
        this.logger.info(`Transcription job ${jobName} already exists; continuing with it`);
        return jobName;
      }
      throw toServiceError(this.name, `StartTranscriptionJob ${jobName}`, err);
    }
    this.logger.info(`Started transcription job ${jobName} (${this.languageCode})`);
    return jobName;
  }

  async getStatus(jobId: string, signal?: AbortSignal): Promise<JobStatus> {
    try {
      const out = await this.client.send(
        new GetTranscriptionJobCommand({ TranscriptionJobName: jobId }),
        { abortSignal: signal },
      );
      return toJobStatus(out.TranscriptionJob);
    } catch (err) {
      throw toServiceError(this.name, `GetTranscriptionJob ${jobId}`, err);
    }
  }

  async fetchResult(resultRef: string, signal?: AbortSignal): Promise<string> {
    let res: Response;
    try {
      res = await this.fetchImpl(resultRef, { signal });
    } catch (err) {
      throw new ServiceError(this.name, 'network', 'transcript download failed', err);
    }
    if (!res.ok) {
      const kind = res.status >= 500 || res.status === 429 ? 'remote' : 'permission';
      throw new ServiceError(this.name, kind, `transcript download returned HTTP ${res.status}`);
    }
    return parseTranscriptDocument(await res.text());
  }

  async delete(jobId: string): Promise<void> {
    try {
      await this.client.send(new DeleteTranscriptionJobCommand({ TranscriptionJobName: jobId }));
    } catch (err) {
      throw toServiceError(this.name, `DeleteTranscriptionJob ${jobId}`, err);
    }
  }
}
