#!/usr/bin/env node
import { Command, InvalidArgumentError } from 'commander';
import { loadConfig } from './config/config';
import { preparePromptBatch } from './captioning/promptBuilder';
import { enumerateImages } from './dataset/imageEnumerator';
import { runAnnotationPipeline } from './pipeline/annotationPipeline';
import { createScorer } from './qualification/qualityScorer';
import { assignStatus } from './qualification/validationFilter';
import { handleError } from './utils/errors';
import { logger } from './utils/logger';

interface RunCommandOptions {
  config?: string;
  provider?: string;
  force?: boolean;
  limit?: number;
}

interface ScoreCommandOptions {
  config?: string;
  phase: string;
}

interface PromptsCommandOptions {
  config?: string;
  output?: string;
  limit?: number;
}

function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return parsed;
}

// stdout carries the JSON results
logger.setConsoleStream('stderr');

const program = new Command();

program
  .name('annotate')
  .description('Caption phase-labelled crystallization images with a vision model and build a validated dataset')
  .version('1.0.0');

program
  .command('run')
  .description('caption, score, filter and export the dataset')
  .option('-c, --config <path>', 'configuration file')
  .option('-p, --provider <id>', 'provider id overriding activeProvider')
  .option('-f, --force', 'ignore the checkpoint and request every image again')
  .option('-n, --limit <count>', 'only the first N images', parsePositiveInt)
  .action(async (options: RunCommandOptions) => {
    const controller = new AbortController();
    const onSigint = () => {
      if (controller.signal.aborted) {
        logger.warn('Second interrupt received, exiting immediately');
        process.exit(130);
      }
      logger.warn('Interrupt received: finishing in-flight requests, no new ones will start');
      controller.abort();
    };
    process.on('SIGINT', onSigint);

    try {
      const cfg = loadConfig(options.config);
      const summary = await runAnnotationPipeline(cfg, {
        force: options.force,
        limit: options.limit,
        provider: options.provider,
        signal: controller.signal,
      });
      console.log(JSON.stringify({ ...summary, output: summary.output.dataset }, null, 2));
    } finally {
      process.off('SIGINT', onSigint);
    }
  });

program
  .command('score')
  .description('score a single caption against a phase')
  .argument('<caption>', 'caption text')
  .requiredOption('--phase <label>', 'phase label the caption was written for')
  .option('-c, --config <path>', 'configuration file')
  .action((caption: string, options: ScoreCommandOptions) => {
    const cfg = loadConfig(options.config);
    const score = createScorer(cfg)(caption, options.phase);
    console.log(JSON.stringify({ ...score, validationStatus: assignStatus(score) }, null, 2));
  });

program
  .command('prompts')
  .description('write the prompt for every image without calling a provider')
  .option('-c, --config <path>', 'configuration file')
  .option('-o, --output <path>', 'output file (default <outputDir>/prompts.json)')
  .option('-n, --limit <count>', 'only the first N images', parsePositiveInt)
  .action(async (options: PromptsCommandOptions) => {
    const cfg = loadConfig(options.config);
    const records = await enumerateImages({
      root: cfg.dataset.root,
      phases: cfg.dataset.phases,
      extensions: cfg.dataset.extensions,
    });
    const selected = options.limit !== undefined ? records.slice(0, options.limit) : records;
    await preparePromptBatch(cfg, selected, options.output);
  });

program.parseAsync().then(
  () => process.exit(0),
  (error: unknown) => {
    handleError(error, 'annotate');
    process.exit(1);
  }
);
