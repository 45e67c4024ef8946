// ──────────────────────────────────────────
// Archive: read-only API routes
// ──────────────────────────────────────────

import { Router, Request, Response } from 'express';
import { ArchiveContract } from '../../shared/contracts';
import { categorySchema, indexSchema, sendError } from '../../shared/http';

export function createArchiveRoutes(archive: ArchiveContract): Router {
  const router = Router();

  // GET / — every entry, ordered by category then index
  router.get('/', async (_req: Request, res: Response) => {
    try {
      res.json(await archive.listEntries());
    } catch (err) {
      sendError(res, err);
    }
  });

  // GET /:category
  router.get('/:category', async (req: Request, res: Response) => {
    try {
      const category = categorySchema.parse(req.params.category);
      res.json(await archive.listEntries(category));
    } catch (err) {
      sendError(res, err);
    }
  });

  // GET /:category/:index — entry plus its clean table (null when raw only)
  router.get('/:category/:index', async (req: Request, res: Response) => {
    try {
      const category = categorySchema.parse(req.params.category);
      const index = indexSchema.parse(req.params.index);
      const entry = await archive.getEntry(category, index);
      const clean = await archive.loadClean(entry);
      res.json({ entry, clean });
    } catch (err) {
      sendError(res, err);
    }
  });

  // GET /:category/:index/raw — the archived bytes, unchanged
  router.get('/:category/:index/raw', async (req: Request, res: Response) => {
    try {
      const category = categorySchema.parse(req.params.category);
      const index = indexSchema.parse(req.params.index);
      const raw = await archive.getRaw(category, index);
      res
        .status(200)
        .type('application/octet-stream')
        .set('Content-Disposition', `attachment; filename="${raw.filename.replace(/"/g, '')}"`)
        .send(raw.content);
    } catch (err) {
      sendError(res, err);
    }
  });

  return router;
}
