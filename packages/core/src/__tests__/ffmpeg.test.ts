import fs from 'node:fs';
import path from 'node:path';
import { describe, expect, it } from 'vitest';

import { ExtractionError } from '../errors.js';
import { FfmpegExtractor, classifyFfmpegFailure, ffmpegArgs } from '../providers/ffmpeg.js';
import { RecordingLogger, tempDir } from './helpers.js';

describe('ffmpegArgs', () => {
  it('requests mono 16 kHz 16-bit PCM without video', () => {
    expect(ffmpegArgs('in.mp4', '/work/out.wav')).toEqual([
      '-y', '-i', 'in.mp4', '-vn', '-ac', '1', '-ar', '16000', '-acodec', 'pcm_s16le', '/work/out.wav',
    ]);
  });
});

describe('classifyFfmpegFailure', () => {
  it('recognises a missing audio stream', () => {
    expect(classifyFfmpegFailure('Output file #0 does not contain any stream')).toBe('no-audio-track');
    expect(classifyFfmpegFailure('Stream map \'0:a\' matches no streams.')).toBe('no-audio-track');
  });

  it('treats anything else as unreadable input', () => {
    expect(classifyFfmpegFailure('in.mp4: Invalid data found when processing input')).toBe('unreadable-input');
  });
});

describe('FfmpegExtractor', () => {
  it('reports a missing executable as tool-missing and leaves no file behind', async () => {
    const workDir = tempDir('touch-ffmpeg-');
    const extractor = new FfmpegExtractor({
      workDir,
      logger: new RecordingLogger(),
      bin: path.join(workDir, 'no-such-ffmpeg'),
    });

    const err = await extractor.extract('in.mp4', { runId: 'run-1' }).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(ExtractionError);
    if (err instanceof ExtractionError) expect(err.code).toBe('tool-missing');
    expect(fs.readdirSync(workDir)).toEqual([]);
  });
});
