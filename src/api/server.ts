/**
 * Read-only article API
 *
 *   GET /                     index page
 *   GET /health               storage status and latest scrape
 *   GET /api/articles         list, newest first (?category, ?limit, ?offset)
 *   GET /api/articles/:id     one article with its body text
 */

import cors from 'cors';
import express from 'express';
import type { NextFunction, Request, Response } from 'express';
import { z } from 'zod';
import { logger } from '../utils/logger.js';
import type { ArticleReader } from '../db/repository.js';
import type { ArticleRecord } from '../types/index.js';

export interface ApiOptions {
  reader: ArticleReader;
  appName: string;
  /** "*" or a comma separated list of origins */
  corsOrigins: string;
}

const listQuerySchema = z.object({
  category: z.string().trim().min(1).optional(),
  limit: z.coerce.number().int().min(1).max(100).default(20),
  offset: z.coerce.number().int().min(0).default(0),
});

const idParamSchema = z.coerce.number().int().positive();

type AsyncHandler = (req: Request, res: Response) => Promise<void>;

const asyncRoute =
  (handler: AsyncHandler) =>
  (req: Request, res: Response, next: NextFunction): void => {
    handler(req, res).catch(next);
  };

export function toArticleOut(article: ArticleRecord) {
  return {
    id: article.id,
    category: article.category,
    origin_url: article.originUrl,
    title: article.title,
    meta_text: article.metaText,
    image_url: article.imageUrl,
    scraped_at: article.scrapedAt.toISOString(),
  };
}

export function toArticleDetailOut(article: ArticleRecord) {
  return { ...toArticleOut(article), content_text: article.contentText };
}

function corsOptions(corsOrigins: string): cors.CorsOptions {
  const value = corsOrigins.trim();
  if (value === '*') {
    return { origin: '*', credentials: false };
  }
  return {
    origin: value
      .split(',')
      .map((origin) => origin.trim())
      .filter(Boolean),
    credentials: false,
  };
}

function escapeHtml(value: string): string {
  return value.replace(/[&<>"']/g, (char) => `&#${char.charCodeAt(0)};`);
}

export function createApp({ reader, appName, corsOrigins }: ApiOptions): express.Express {
  const app = express();

  app.disable('x-powered-by');
  app.use(cors(corsOptions(corsOrigins)));

  app.get('/', (_req, res) => {
    const name = escapeHtml(appName);
    res.type('html').send(`<html>
  <head><title>${name}</title></head>
  <body style="font-family: Arial; padding: 24px;">
    <h1>${name}</h1>
    <ul>
      <li><a href="/health">/health</a></li>
      <li><a href="/api/articles">/api/articles</a></li>
    </ul>
  </body>
</html>`);
  });

  app.get(
    '/health',
    asyncRoute(async (_req, res) => {
      const db = await reader.ping();
      const stats = await reader.getStats();

      res.json({
        ok: true,
        app: appName,
        db,
        articles_count: stats.articlesCount,
        last_scraped_at: stats.lastScrapedAt?.toISOString() ?? null,
        last_origin_url: stats.lastOriginUrl,
      });
    })
  );

  app.get(
    '/api/articles',
    asyncRoute(async (req, res) => {
      const parsed = listQuerySchema.safeParse(req.query);
      if (!parsed.success) {
        res.status(422).json({ detail: parsed.error.issues });
        return;
      }

      const articles = await reader.list(parsed.data);
      res.json(articles.map(toArticleOut));
    })
  );

  app.get(
    '/api/articles/:id',
    asyncRoute(async (req, res) => {
      const id = idParamSchema.safeParse(req.params.id);
      if (!id.success) {
        res.status(422).json({ detail: id.error.issues });
        return;
      }

      const article = await reader.getById(id.data);
      if (!article) {
        res.status(404).json({ detail: 'Article not found' });
        return;
      }

      res.json(toArticleDetailOut(article));
    })
  );

  app.use((_req: Request, res: Response) => {
    res.status(404).json({ detail: 'Not Found' });
  });

  app.use((error: unknown, req: Request, res: Response, _next: NextFunction) => {
    logger.error({ error, method: req.method, path: req.originalUrl }, 'Request failed');
    res.status(500).json({ detail: 'Internal Server Error' });
  });

  return app;
}
