import type { LanguageModel } from './model.js';
import { buildSeverityPrompt, parseClassification, type Classification } from './severity.js';
import type { PostStore } from '../db/queries.js';
import type { CancellationToken } from '../core/cancellation.js';
import { logger, describeError } from '../core/logger.js';

export interface ClassificationResult extends Classification {
  rawResponse: string;
}

export type ScoringStore = Pick<PostStore, 'fetchUnscored' | 'writeBack'>;

export interface AnalysisOptions {
  batchSize: number;
  recordDelayMs: number;
  batchDelayMs: number;
}

export interface AnalysisSummary {
  processed: number;
  scored: number;
  unknown: number;
  failed: number;
  interrupted: boolean;
}

export class SeverityClassifier {
  constructor(private model: LanguageModel) {}

  async classify(text: string): Promise<ClassificationResult> {
    const rawResponse = await this.model.generate(buildSeverityPrompt(text));
    return { ...parseClassification(rawResponse), rawResponse };
  }
}

function preview(text: string): string {
  return text.length > 100 ? `${text.slice(0, 100)}...` : text;
}

/**
 * Scores unscored posts batch by batch until none are left. A post whose model
 * call fails stays unscored and is not retried within this run, so the loop
 * always drains.
 */
export async function runAnalysis(
  store: ScoringStore,
  classifier: SeverityClassifier,
  token: CancellationToken,
  options: AnalysisOptions
): Promise<AnalysisSummary> {
  const summary: AnalysisSummary = { processed: 0, scored: 0, unknown: 0, failed: 0, interrupted: false };
  const failedIds = new Set<string>();

  while (!token.isCancelled) {
    const posts = store.fetchUnscored(options.batchSize, failedIds);
    if (posts.length === 0) {
      logger.info('No more posts found that need severity analysis');
      break;
    }

    logger.info(`Found ${posts.length} posts that need severity analysis in this batch`);

    for (const [index, post] of posts.entries()) {
      if (token.isCancelled) break;

      summary.processed++;
      logger.info(`Processing post ${index + 1}/${posts.length} (Total: ${summary.processed})`);
      logger.debug(`Post ${post.post_id}: ${preview(post.text)}`);

      let result: ClassificationResult;
      try {
        result = await classifier.classify(post.text);
      } catch (error) {
        failedIds.add(post.post_id);
        summary.failed++;
        logger.error(`Analysis failed for post ${post.post_id}: ${describeError(error)}`);
        await token.sleep(options.recordDelayMs);
        continue;
      }

      store.writeBack(post.post_id, result.severity, result.reasons);

      if (result.severity === 'Unknown') {
        summary.unknown++;
        logger.warn(`Could not extract severity for post ${post.post_id}; stored as Unknown`);
        logger.debug(`Full response: ${result.rawResponse}`);
      } else {
        summary.scored++;
        logger.info(`Severity: ${result.severity}`);
      }

      await token.sleep(options.recordDelayMs);
    }

    logger.info(`Completed batch. Total posts processed: ${summary.processed}`);

    // A short batch means the backlog is drained; the next fetch confirms it
    if (posts.length === options.batchSize) {
      await token.sleep(options.batchDelayMs);
    }
  }

  summary.interrupted = token.isCancelled;
  if (summary.interrupted) {
    logger.warn('Analysis interrupted; unprocessed posts stay unscored for the next run');
  }
  return summary;
}
