import express, { type Express, type Request } from 'express';
import type { Server } from 'http';
import { z } from 'zod';
import { config } from '../config.js';
import { logger, describeError } from '../core/logger.js';
import type { PostFilters, PostStore, StoredPost } from '../db/queries.js';

const optionalInt = z.coerce.number().int().nonnegative().optional();

const postQuerySchema = z.object({
  severity: z.enum(['0', '1', '2', '3', 'Unknown']).optional(),
  unscored: z.enum(['true', 'false']).optional().transform(val => val === 'true'),
  search: z.string().trim().min(1).optional(),
  query: z.string().trim().min(1).optional(),
  limit: optionalInt,
  offset: optionalInt,
});

function parseFilters(req: Request, defaultLimit?: number): PostFilters | null {
  const parsed = postQuerySchema.safeParse(req.query);
  if (!parsed.success) return null;
  return { ...parsed.data, limit: parsed.data.limit ?? defaultLimit };
}

const csvField = (value: string | null) => `"${(value ?? '').replace(/"/g, '""')}"`;

export function postsToCsv(posts: StoredPost[]): string {
  return [
    ['Post ID', 'Date', 'Author', 'Headline', 'Text', 'URL', 'Hashtags', 'Query', 'Severity', 'Reasons'].join(','),
    ...posts.map(p =>
      [
        p.post_id,
        p.post_date ?? '',
        csvField(p.post_author),
        csvField(p.profile_headline),
        csvField(p.text),
        p.post_url ?? '',
        csvField(p.hashtags),
        csvField(p.search_query),
        p.severity ?? '',
        csvField(p.reasons),
      ].join(',')
    ),
  ].join('\n');
}

/** Read-only JSON view over the post store. */
export function createApp(store: PostStore): Express {
  const app = express();

  app.get('/health', (_req, res) => {
    res.json({ status: 'ok', uptimeSeconds: Math.round(process.uptime()) });
  });

  app.get('/api/stats', (_req, res) => {
    res.json(store.getStats());
  });

  app.get('/api/posts', (req, res) => {
    const filters = parseFilters(req, 50);
    if (!filters) {
      res.status(400).json({ error: 'Invalid query parameters' });
      return;
    }
    res.json(store.getPosts(filters));
  });

  app.get('/api/logs', (req, res) => {
    const limit = optionalInt.safeParse(req.query.limit);
    res.json(store.getRecentLogs(limit.success && limit.data ? limit.data : 20));
  });

  // CSV export
  app.get('/api/export/posts', (req, res) => {
    const filters = parseFilters(req);
    if (!filters) {
      res.status(400).json({ error: 'Invalid query parameters' });
      return;
    }
    res.setHeader('Content-Type', 'text/csv');
    res.setHeader('Content-Disposition', 'attachment; filename=linkedin_posts.csv');
    res.send(postsToCsv(store.getPosts(filters)));
  });

  app.use((error: unknown, _req: Request, res: express.Response, _next: express.NextFunction) => {
    logger.error(`Request failed: ${describeError(error)}`);
    res.status(500).json({ error: 'Internal error. Check server logs.' });
  });

  return app;
}

export function startServer(store: PostStore, port: number = config.port): Server {
  const app = createApp(store);
  return app.listen(port, () => {
    logger.info(`Dashboard running at http://localhost:${port}`);
  });
}
