/**
 * @module commands/convert
 * `touch convert <input> [--output <path>] [--mode literal|optimized] [--timeout <s>] [--debug]`
 *
 * Runs one conversion with a spinner tracking stage events. Prints the
 * output path on success; on failure prints one line naming the stage and
 * cause and sets a non-zero exit code.
 */

import * as clack from '@clack/prompts';

import {
  CancelledError,
  FfmpegExtractor,
  PipelineOrchestrator,
  createTransformService,
  describeError,
  loadConfig,
  type Logger,
  type PipelineServices,
  type TouchConfig,
} from '@touch/core';
import { createAwsServices } from '@touch/engine-aws';
import { YtDlpFetcher } from '@touch/engine-youtube';

import { ClackLogger } from '../ui/logger.js';
import { parseConvertArgs } from '../utils/args.js';

export function createServices(config: TouchConfig, logger: Logger): PipelineServices {
  const { store, transcription } = createAwsServices(config, logger);
  return {
    extractor: new FfmpegExtractor({ workDir: config.work.dir, logger }),
    store,
    transcription,
    transform: createTransformService(config.llm, logger),
    fetcher: new YtDlpFetcher({ workDir: config.work.dir, logger }),
  };
}

export async function cmdConvert(argv: readonly string[]): Promise<void> {
  const args = parseConvertArgs(argv);
  const config = loadConfig(args.debug ? { debug: true } : {});

  clack.intro('touch convert');
  const spin = clack.spinner();
  spin.start(`Converting ${args.input}`);
  const logger = new ClackLogger(spin, config.debug);

  const controller = new AbortController();
  const onSigint = () => controller.abort(new CancelledError('Interrupted'));
  process.once('SIGINT', onSigint);

  try {
    const orchestrator = new PipelineOrchestrator({
      services: createServices(config, logger),
      config,
      logger,
    });
    orchestrator
      .on('stage:start', (e) => spin.message(`${e.stage}…`))
      .on('stage:retry', (e) => spin.message(`${e.stage}: retry ${e.attempt} in ${e.delayMs}ms`))
      .on('job:state', (e) => spin.message(`Transcription ${e.to}`))
      .on('transform:degraded', (e) => clack.log.warn(`Using ${e.mode} fallback: ${e.reason}`));

    const result = await orchestrator.runDetailed(args.input, args.output, args.mode, {
      signal: controller.signal,
      timeoutMs: args.timeoutMs,
    });

    spin.stop(result.degraded ? 'Done (fallback used)' : 'Done');
    if (result.cleanup.failures.length > 0) {
      clack.log.warn(`${result.cleanup.failures.length} temporary artifact(s) could not be removed`);
    }
    clack.outro(`${result.completedStages.length} stages in ${(result.durationMs / 1000).toFixed(1)}s`);
    console.log(result.outputPath);
  } catch (err) {
    spin.stop('Failed');
    console.error(`Error: ${describeError(err)}`);
    process.exitCode = 1;
  } finally {
    process.off('SIGINT', onSigint);
  }
}
