import { Router, Request, Response } from 'express';
import fs from 'fs-extra';
import * as path from 'node:path';
import { assertSiblingNames, embedLinks } from '../links.js';
import { readMarkdown } from '../loader.js';
import { renderDocument } from '../renderer.js';
import { SiteReport } from '../types.js';

/**
 * What the API serves from
 */
export interface SiteData {
  /** Directory holding the markdown sources */
  rootDir: string;
  /** Result of the last generation run */
  report: SiteReport;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Resolve a request path to a markdown file inside the root, or null
 */
function resolveSource(rootDir: string, requested: string): string | null {
  const root = path.resolve(rootDir);
  const resolved = path.resolve(root, requested);
  if (!resolved.startsWith(root + path.sep) || !resolved.endsWith('.md')) {
    return null;
  }
  return resolved;
}

/**
 * Create API routes for page access and on-demand rendering
 */
export function createApiRoutes(data: SiteData): Router {
  const router = Router();

  /**
   * GET /api/pages
   * List generated pages, optionally filtered by kind
   * Query params: ?kind=homepage
   */
  router.get('/pages', (req: Request, res: Response) => {
    const { kind } = req.query;

    let pages = data.report.pages;
    if (kind && typeof kind === 'string') {
      pages = pages.filter(p => p.kind === kind);
    }

    res.json(pages);
  });

  /**
   * GET /api/errors
   * Problems recorded during the last generation run
   */
  router.get('/errors', (_req: Request, res: Response) => {
    res.json(data.report.errors);
  });

  /**
   * GET /api/render
   * Render a source file under the root as an HTML body
   * Query params: ?path=docs/intro.md
   */
  router.get('/render', (req: Request, res: Response) => {
    const requested = req.query.path;

    if (!requested || typeof requested !== 'string') {
      res.status(400).json({ error: 'Query parameter "path" is required' });
      return;
    }

    const filePath = resolveSource(data.rootDir, requested);
    if (!filePath) {
      res.status(400).json({ error: `Not a markdown file under the root: ${requested}` });
      return;
    }

    // A directory named like a markdown file counts as absent
    if (!fs.statSync(filePath, { throwIfNoEntry: false })?.isFile()) {
      res.status(404).json({ error: `Document not found: ${requested}` });
      return;
    }

    const { html, warnings } = renderDocument(readMarkdown(filePath));
    res.json({ html, warnings });
  });

  /**
   * POST /api/render
   * Render markdown sent in the body; with sibling lists, render it as a homepage
   * Body: { markdown, homepageDirs?, singletonArticles? }
   */
  router.post('/render', (req: Request, res: Response) => {
    const body: unknown = req.body;

    if (!isRecord(body) || typeof body.markdown !== 'string') {
      res.status(400).json({ error: 'Body field "markdown" must be a string' });
      return;
    }

    const result = renderDocument(body.markdown);
    let html = result.html;

    if (body.homepageDirs !== undefined || body.singletonArticles !== undefined) {
      const homepageDirs = body.homepageDirs === undefined ? [] : body.homepageDirs;
      const singletonArticles = body.singletonArticles === undefined ? [] : body.singletonArticles;
      // Invalid lists throw InvalidSiblingLinksError, answered with 400
      assertSiblingNames(homepageDirs, 'homepageDirs');
      assertSiblingNames(singletonArticles, 'singletonArticles');
      html = embedLinks(html, homepageDirs, singletonArticles);
    }

    res.json({ html, warnings: result.warnings });
  });

  return router;
}
