#!/usr/bin/env node
import fs from 'fs';
import path from 'path';
import { Command } from 'commander';
import { config } from '../config.js';
import { positiveInt } from '../core/cliArgs.js';
import { logger, describeError } from '../core/logger.js';
import { closeBrowser } from '../core/browser.js';
import { CancellationToken, bindProcessSignals } from '../core/cancellation.js';
import { CheckpointStore } from '../core/checkpoint.js';
import { ConfigError } from '../core/errors.js';
import { TerminalPrompter, resolveCredential } from '../core/prompt.js';
import { openDatabase, type Db } from '../db/schema.js';
import { PostStore, type PostSink } from '../db/queries.js';
import { TextFileSink, defaultOutputName } from '../output/textFile.js';
import { playwrightSessions } from './driver.js';
import { parseQueryList, runSearchQueries, type RunLogWriter } from './runner.js';

interface ScrapeCliOptions {
  username?: string;
  password?: string;
  search?: string;
  file?: string;
  max: number;
  delay: number;
  timeout: number;
  database: string;
  batchSize: number;
  resume?: boolean;
  output?: string | true;
  headless: boolean;
}

function collectQueries(options: ScrapeCliOptions): string[] {
  if (!options.search && !options.file) {
    throw new ConfigError('Either --search or --file must be provided');
  }

  const queries: string[] = [];
  if (options.search?.trim()) {
    queries.push(options.search.trim());
  }
  if (options.file) {
    if (!fs.existsSync(options.file)) {
      throw new ConfigError(`Query file not found: ${options.file}`);
    }
    queries.push(...parseQueryList(fs.readFileSync(options.file, 'utf-8')));
  }

  if (queries.length === 0) {
    throw new ConfigError('No search queries to run');
  }
  return queries;
}

async function main(options: ScrapeCliOptions): Promise<number> {
  if (options.password) {
    logger.warn('Supplying passwords via command line arguments is not secure! Consider LINKEDIN_PASSWORD instead.');
  }

  let queries: string[];
  try {
    queries = collectQueries(options);
  } catch (error) {
    if (error instanceof ConfigError) {
      logger.error(error.message);
      return 1;
    }
    throw error;
  }
  logger.info(`Loaded ${queries.length} search queries`);

  const token = new CancellationToken();
  const prompter = new TerminalPrompter(token);

  const email = await resolveCredential(options.username, config.linkedin.email, 'LinkedIn email: ', prompter);
  const password = await resolveCredential(options.password, config.linkedin.password, 'LinkedIn password: ', prompter);
  if (!email || !password) {
    logger.error('LinkedIn credentials are required');
    return 1;
  }

  let db: Db | null = null;
  let sink: PostSink;
  let runLog: RunLogWriter | undefined;
  let textSink: TextFileSink | null = null;

  if (options.output !== undefined) {
    const fileName = typeof options.output === 'string' ? options.output : defaultOutputName();
    textSink = new TextFileSink(path.resolve(fileName));
    sink = textSink;
    logger.info(`Writing posts to ${textSink.filePath}`);
  } else {
    db = openDatabase(options.database);
    const store = new PostStore(db);
    sink = store;
    runLog = store;
    logger.info(`Storing posts in ${options.database} (${store.count()} already stored)`);
  }

  const checkpoint = new CheckpointStore(config.paths.checkpoint, email);
  const disposeSignals = bindProcessSignals(token, async () => {
    await closeBrowser();
    db?.close();
  });

  try {
    const summary = await runSearchQueries(
      queries,
      {
        sessions: playwrightSessions({ headless: options.headless, timeoutMs: options.timeout }),
        sink,
        checkpoint,
        token,
        prompter,
        credentials: { email, password },
        runLog,
      },
      {
        resume: options.resume ?? false,
        maxPosts: options.max,
        batchSize: options.batchSize,
        scrollDelayMs: options.delay * 1000,
        queryCooldownMs: config.scraper.queryCooldownMs,
        loginSettleMs: config.scraper.loginSettleMs,
        searchSettleMs: config.scraper.searchSettleMs,
        feedSettleMs: config.scraper.feedSettleMs,
        expandDelayMs: config.scraper.expandDelayMs,
        initialAttempts: config.scraper.initialAttempts,
        initialRetryDelayMs: config.scraper.initialRetryDelayMs,
        emptyScrollLimit: 3,
        debugDir: path.join(config.paths.logs, 'debug'),
      }
    );

    if (textSink) {
      logger.info(`Saved ${textSink.count} posts to ${textSink.filePath}`);
    }
    return summary.status === 'interrupted' ? 130 : 0;
  } catch (error) {
    logger.error(`Scrape failed: ${describeError(error)}`, { error });
    logger.error(`Progress saved to ${checkpoint.filePath}. Re-run with --resume to continue.`);
    return 1;
  } finally {
    disposeSignals();
    await closeBrowser();
    db?.close();
  }
}

const program = new Command()
  .name('linkedin-scrape')
  .description('Collect LinkedIn posts into SQLite, resumable across interruptions')
  .option('-u, --username <email>', 'LinkedIn username/email')
  .option('-p, --password <password>', 'LinkedIn password')
  .option('-s, --search <query>', 'Search query to find specific posts')
  .option('-f, --file <path>', 'File with one search query per line')
  .option('-m, --max <n>', 'Maximum number of posts to scrape per query', positiveInt, config.scraper.maxPosts)
  .option('-d, --delay <seconds>', 'Delay between scrolls in seconds', positiveInt, config.scraper.scrollDelaySeconds)
  .option('-t, --timeout <ms>', 'Timeout for page operations in milliseconds', positiveInt, config.scraper.timeoutMs)
  .option('--database <path>', 'SQLite database path', config.paths.database)
  .option('-b, --batch-size <n>', 'Posts per database write', positiveInt, config.scraper.batchSize)
  .option('-r, --resume', 'Resume from the last checkpoint')
  .option('-o, --output [file]', 'Write post text to a file instead of the database')
  .option('--headless', 'Run the browser without a window', config.browser.headless);

program.parse();

main(program.opts<ScrapeCliOptions>())
  .then(code => {
    process.exit(code);
  })
  .catch(error => {
    logger.error(`Scrape failed: ${describeError(error)}`);
    process.exit(1);
  });
