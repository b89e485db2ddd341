import { describe, expect, it } from 'vitest';

import { TouchConfigSchema } from '@touch/core';
import { doctorReport } from '../commands/doctor.js';

const ready = TouchConfigSchema.parse({
  aws: { bucket: 'media-bucket' },
  llm: { apiKey: 'test-secret' },
});

describe('doctorReport', () => {
  it('is ok when ffmpeg, a bucket and a supported language are present', () => {
    const report = doctorReport(ready, { AWS_PROFILE: 'default' }, { ffmpeg: true, ytDlp: true });
    expect(report.ok).toBe(true);
    expect(report.hints).toEqual([]);
    expect(report.checks).toMatchObject({ s3Bucket: true, awsCredentials: true, languageCode: true, llmKey: true });
  });

  it('fails without ffmpeg and explains why', () => {
    const report = doctorReport(ready, { AWS_PROFILE: 'default' }, { ffmpeg: false, ytDlp: true });
    expect(report.ok).toBe(false);
    expect(report.hints).toEqual(['Install ffmpeg to extract audio from media files.']);
  });

  it('flags a missing bucket and an unsupported language', () => {
    const config = TouchConfigSchema.parse({ transcription: { languageCode: 'xx-XX' } });
    const report = doctorReport(config, {}, { ffmpeg: true, ytDlp: false });
    expect(report.ok).toBe(false);
    expect(report.checks).toMatchObject({ s3Bucket: false, languageCode: false, llmKey: false, ytDlp: false });
    expect(report.hints).toHaveLength(5);
  });
});
