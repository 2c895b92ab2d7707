#!/usr/bin/env node
import { Command } from 'commander';
import { config } from '../config.js';
import { positiveInt } from '../core/cliArgs.js';
import { logger, describeError } from '../core/logger.js';
import { CancellationToken, bindProcessSignals } from '../core/cancellation.js';
import { TerminalPrompter, resolveCredential } from '../core/prompt.js';
import { openDatabase } from '../db/schema.js';
import { PostStore } from '../db/queries.js';
import { OpenAICompatibleModel } from './model.js';
import { SeverityClassifier, runAnalysis } from './analyze.js';

interface AnalyzeCliOptions {
  batch: number;
  database: string;
  token?: string;
}

async function main(options: AnalyzeCliOptions): Promise<number> {
  logger.info(`Using model: ${config.llm.model} at ${config.llm.baseUrl}`);
  logger.info(`Batch size: ${options.batch}`);

  const db = openDatabase(options.database);
  const store = new PostStore(db);
  logger.info(`Connected to database: ${options.database}`);

  const cancel = new CancellationToken();
  const prompter = new TerminalPrompter(cancel);
  const disposeSignals = bindProcessSignals(cancel, async () => {
    db.close();
  });

  try {
    if (!options.token && !config.llm.token) {
      logger.warn('HF_TOKEN environment variable not found');
    }
    const token = await resolveCredential(options.token, config.llm.token, 'Please enter your model access token: ', prompter);
    if (!token) {
      logger.error('No token provided. Cannot proceed without model access.');
      return 1;
    }

    const model = new OpenAICompatibleModel({
      token,
      baseUrl: config.llm.baseUrl,
      model: config.llm.model,
      temperature: config.llm.temperature,
      maxTokens: config.llm.maxTokens,
      topP: config.llm.topP,
    });

    const summary = await runAnalysis(store, new SeverityClassifier(model), cancel, {
      batchSize: options.batch,
      recordDelayMs: config.analysis.recordDelayMs,
      batchDelayMs: config.analysis.batchDelayMs,
    });

    logger.info(
      `Analysis finished: ${summary.processed} processed, ${summary.scored} scored, ` +
        `${summary.unknown} unknown, ${summary.failed} failed`
    );
    return summary.interrupted ? 130 : 0;
  } finally {
    disposeSignals();
    db.close();
  }
}

const program = new Command()
  .name('linkedin-analyze')
  .description('Rate stored posts for toxic positivity with a language model')
  .option('-b, --batch <n>', 'Number of posts to process in one batch', positiveInt, config.analysis.batchSize)
  .option('--database <path>', 'SQLite database path', config.paths.database)
  .option('--token <token>', 'Model access token (defaults to HF_TOKEN)');

program.parse();

main(program.opts<AnalyzeCliOptions>())
  .then(code => {
    process.exit(code);
  })
  .catch(error => {
    logger.error(`Analysis failed: ${describeError(error)}`);
    process.exit(1);
  });
