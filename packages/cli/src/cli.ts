#!/usr/bin/env node

/**
 * @touch/cli
 * Entry point for the `touch` command.
 */

import { describeError } from '@touch/core';

import { cmdConvert } from './commands/convert.js';
import { cmdDoctor } from './commands/doctor.js';
import { UsageError } from './utils/errors.js';

function printHelp(): void {
  console.log(`
  Usage: touch <command> [options]

  Commands:
    convert    Convert spoken media into Braille text
    doctor     Check environment readiness

  Global options:
    --help     Show this help message
    --version  Show version

  Convert options:
    <input>                   Media file path or http(s) URL
    --output, -o <path>       Output file (default: <input name>.brf)
    --mode <mode>             literal | optimized (default: literal)
    --timeout <seconds>       Abort the run after this long
    --debug                   Verbose logging

  Environment variables:
    AWS_REGION                Region for S3 and Transcribe (default: ap-northeast-2)
    TOUCH_S3_BUCKET           Bucket for uploaded audio (required)
    TOUCH_LANGUAGE            Transcription language (default: en-US)
    OPENROUTER_API_KEY        LLM key for the primary transform
    OPENAI_API_KEY            Alternative LLM key
    TOUCH_LLM_MODEL           Model override
    TOUCH_WORK_DIR            Directory for temporary files
    TOUCH_DEBUG=1             Verbose logging

  Examples:
    touch convert lecture.mp4 --output lecture.brf
    touch convert "https://youtube.com/watch?v=xyz" --mode optimized
    touch doctor
`);
}

const [command, ...rest] = process.argv.slice(2);

try {
  switch (command) {
    case 'convert':
      await cmdConvert(rest);
      break;
    case 'doctor':
      await cmdDoctor();
      break;
    case '--version':
    case '-v':
      console.log('0.1.0');
      break;
    case '--help':
    case '-h':
    default:
      printHelp();
      break;
  }
} catch (err) {
  if (err instanceof UsageError) {
    console.error(`Error: ${err.message}`);
    printHelp();
    process.exitCode = 2;
  } else {
    console.error(`Error: ${describeError(err)}`);
    process.exitCode = 1;
  }
}
