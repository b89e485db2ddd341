/**
 * @module transcript
 * Amazon Transcribe result documents and job status mapping.
 */

import { z } from 'zod';
import type { TranscriptionJob } from '@aws-sdk/client-transcribe';

import { FormatError, type JobStatus } from '@touch/core';

export const TranscriptDocumentSchema = z.object({
  jobName: z.string().optional(),
  status: z.string().optional(),
  results: z.object({
    transcripts: z.array(z.object({ transcript: z.string() })).min(1),
  }),
});

export type TranscriptDocument = z.infer<typeof TranscriptDocumentSchema>;

/**
 * Pull the transcript text out of a result document.
 * Throws FormatError when the JSON or its structure is wrong.
 */
export function parseTranscriptDocument(raw: string): string {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    throw new FormatError('Transcript document is not valid JSON', err);
  }
  const parsed = TranscriptDocumentSchema.safeParse(json);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue ? `${issue.path.join('.')}: ${issue.message}` : 'unknown';
    throw new FormatError(`Transcript document has an unexpected structure (${where})`, parsed.error);
  }
  return parsed.data.results.transcripts.map((t) => t.transcript).join(' ').trim();
}

/** Map a Transcribe job description to the poller's status shape. */
export function toJobStatus(job: TranscriptionJob | undefined): JobStatus {
  if (!job) return { state: 'Submitted' };
  switch (job.TranscriptionJobStatus) {
    case 'COMPLETED':
      return { state: 'Completed', resultRef: job.Transcript?.TranscriptFileUri };
    case 'FAILED':
      return { state: 'Failed', failureReason: job.FailureReason };
    case 'IN_PROGRESS':
      return { state: 'InProgress' };
    default:
      return { state: 'Submitted' };
  }
}
