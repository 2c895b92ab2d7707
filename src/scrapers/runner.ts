import type { DriverSession, SessionFactory } from './driver.js';
import { FeedIngestor, type IngestOptions, type IngestResult } from './ingest.js';
import type { Credentials } from './linkedin.js';
import type { CheckpointState, CheckpointStore } from '../core/checkpoint.js';
import { EMPTY_CHECKPOINT } from '../core/checkpoint.js';
import type { CancellationToken } from '../core/cancellation.js';
import type { Prompter } from '../core/prompt.js';
import type { PostSink, ScrapeLogStatus } from '../db/queries.js';
import { logger, describeError } from '../core/logger.js';

/** Optional run bookkeeping; the SQLite store implements it, the text file sink does not. */
export interface RunLogWriter {
  logScrapeStart(query: string | null): number;
  logScrapeEnd(id: number, status: ScrapeLogStatus, itemsFound: number, itemsNew: number, error?: string): void;
}

export interface RunnerDeps {
  sessions: SessionFactory;
  sink: PostSink;
  checkpoint: CheckpointStore;
  token: CancellationToken;
  prompter: Prompter;
  credentials: Credentials;
  runLog?: RunLogWriter;
}

export interface RunnerOptions extends IngestOptions {
  resume: boolean;
  queryCooldownMs: number;
}

export interface PlannedQuery {
  query: string;
  offset: number;
}

export interface RunSummary {
  status: 'completed' | 'interrupted';
  results: IngestResult[];
  saved: number;
  collected: number;
}

const RUN_LOG_STATUS: Record<IngestResult['status'], ScrapeLogStatus> = {
  completed: 'success',
  login_failed: 'failed',
  failed: 'failed',
  interrupted: 'interrupted',
};

/**
 * Orders the queries for this run: completed ones are dropped, and the query
 * that was in flight when the checkpoint was written goes first with its offset.
 */
export function planQueries(queries: string[], state: CheckpointState): PlannedQuery[] {
  const completed = new Set(state.completedQueries);
  const unique = [...new Set(queries.map(q => q.trim()).filter(Boolean))];
  const remaining = unique.filter(query => !completed.has(query));

  const current = state.currentQuery;
  if (current && remaining.includes(current)) {
    return [
      { query: current, offset: state.postsCollected },
      ...remaining.filter(query => query !== current).map(query => ({ query, offset: 0 })),
    ];
  }

  return remaining.map(query => ({ query, offset: 0 }));
}

/**
 * Runs the search queries one browser session at a time. The checkpoint is
 * deleted once every query has been processed without an interrupt; otherwise
 * it is left behind for `--resume`.
 */
export async function runSearchQueries(
  queries: string[],
  deps: RunnerDeps,
  options: RunnerOptions
): Promise<RunSummary> {
  const { checkpoint, token } = deps;

  let state: CheckpointState = { ...EMPTY_CHECKPOINT, completedQueries: [] };
  if (options.resume) {
    if (checkpoint.exists()) {
      state = checkpoint.load();
      logger.info(
        `Resuming from checkpoint: ${state.completedQueries.length} completed, current: ${state.currentQuery ?? 'none'}`
      );
    } else {
      logger.info('No checkpoint found, starting fresh');
    }
  }

  const completed = [...state.completedQueries];
  const plan = planQueries(queries, state);
  const summary: RunSummary = { status: 'completed', results: [], saved: 0, collected: 0 };

  const skipped = queries.filter(query => state.completedQueries.includes(query.trim())).length;
  if (skipped > 0) {
    logger.info(`Skipping ${skipped} already completed queries`);
  }

  for (const [index, item] of plan.entries()) {
    if (token.isCancelled) {
      summary.status = 'interrupted';
      break;
    }

    logger.info(`\n🔍 Query ${index + 1}/${plan.length}: "${item.query}"`);

    const result = await runOneQuery(item, completed, deps, options);
    summary.results.push(result);
    summary.saved += result.saved;
    summary.collected += result.collected;

    if (result.status === 'interrupted') {
      summary.status = 'interrupted';
      break;
    }

    if (result.status === 'completed') {
      completed.push(item.query);
      checkpoint.save(completed, null, 0);
    } else {
      logger.warn(`Query "${item.query}" ended with ${result.status}${result.error ? `: ${result.error}` : ''}`);
    }

    if (index < plan.length - 1) {
      logger.info(`Waiting ${Math.round(options.queryCooldownMs / 1000)}s before the next query...`);
      await token.sleep(options.queryCooldownMs);
    }
  }

  if (token.isCancelled) {
    summary.status = 'interrupted';
  }

  if (summary.status === 'completed') {
    checkpoint.clear();
  } else {
    logger.info(`Progress saved to ${checkpoint.filePath}. Re-run with --resume to continue.`);
  }

  logger.info(`Run ${summary.status}: ${summary.collected} posts collected, ${summary.saved} new`);
  return summary;
}

async function runOneQuery(
  item: PlannedQuery,
  completed: string[],
  deps: RunnerDeps,
  options: RunnerOptions
): Promise<IngestResult> {
  const logId = deps.runLog?.logScrapeStart(item.query);

  let session: DriverSession;
  try {
    session = await deps.sessions();
  } catch (error) {
    deps.checkpoint.save(completed, item.query, item.offset);
    if (logId !== undefined) {
      deps.runLog?.logScrapeEnd(logId, 'failed', 0, 0, describeError(error));
    }
    throw error;
  }

  try {
    const ingestor = new FeedIngestor(
      {
        driver: session.driver,
        sink: deps.sink,
        checkpoint: deps.checkpoint,
        token: deps.token,
        prompter: deps.prompter,
        credentials: deps.credentials,
      },
      options
    );
    const result = await ingestor.run({
      query: item.query,
      completedQueries: completed,
      resumeOffset: item.offset,
    });

    if (logId !== undefined) {
      deps.runLog?.logScrapeEnd(logId, RUN_LOG_STATUS[result.status], result.collected, result.saved, result.error);
    }
    return result;
  } catch (error) {
    if (logId !== undefined) {
      deps.runLog?.logScrapeEnd(logId, 'failed', 0, 0, describeError(error));
    }
    throw error;
  } finally {
    await session.close();
  }
}

/** One query per line; blank lines and `#` comments are ignored. */
export function parseQueryList(contents: string): string[] {
  return contents
    .split(/\r?\n/)
    .map(line => line.trim())
    .filter(line => line.length > 0 && !line.startsWith('#'));
}
