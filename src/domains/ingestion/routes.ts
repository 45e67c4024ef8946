// ──────────────────────────────────────────
// Ingestion: API routes
// ──────────────────────────────────────────

import path from 'path';
import express, { Router, Request, Response } from 'express';
import { IngestionContract } from '../../shared/contracts';
import { categorySchema, sendError } from '../../shared/http';

const MAX_UPLOAD = '50mb';

export function createIngestionRoutes(ingestion: IngestionContract): Router {
  const router = Router();

  // POST /:category — raw file body, name in x-filename
  router.post(
    '/:category',
    express.raw({ type: () => true, limit: MAX_UPLOAD }),
    async (req: Request, res: Response) => {
      try {
        const category = categorySchema.parse(req.params.category);
        const header = req.get('x-filename');
        if (!header) {
          res.status(400).json({ error: 'Missing x-filename header' });
          return;
        }
        const content: Buffer = Buffer.isBuffer(req.body) ? req.body : Buffer.alloc(0);

        const outcome = await ingestion.ingest({ category, filename: path.basename(header), content });
        res.status(outcome.status === 'duplicate' ? 200 : 201).json(outcome);
      } catch (err) {
        sendError(res, err);
      }
    }
  );

  return router;
}
