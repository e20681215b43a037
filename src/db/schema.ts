/**
 * PostgreSQL Database Schema
 */

export const SCHEMA = `
-- ═══════════════════════════════════════════════════════════════════════════════
-- Articles Table
-- One row per article detail page, keyed by its canonical URL
-- ═══════════════════════════════════════════════════════════════════════════════
CREATE TABLE IF NOT EXISTS articles (
  id SERIAL PRIMARY KEY,
  category VARCHAR(50) NOT NULL,
  origin_url TEXT NOT NULL,
  title TEXT NOT NULL,
  meta_text TEXT,
  image_url TEXT,
  content_text TEXT NOT NULL,
  scraped_at TIMESTAMPTZ NOT NULL DEFAULT now(),
  CONSTRAINT uq_articles_origin_url UNIQUE (origin_url)
);

-- ═══════════════════════════════════════════════════════════════════════════════
-- Indexes for Performance
-- ═══════════════════════════════════════════════════════════════════════════════
CREATE INDEX IF NOT EXISTS idx_articles_scraped_at ON articles(scraped_at DESC, id DESC);
CREATE INDEX IF NOT EXISTS idx_articles_category ON articles(category);
`;

/** Postgres SQLSTATE for unique_violation */
export const UNIQUE_VIOLATION = '23505';
