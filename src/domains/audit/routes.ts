// ──────────────────────────────────────────
// Audit: API routes
// ──────────────────────────────────────────

import { Router, Request, Response } from 'express';
import { z } from 'zod';
import { categorySchema, sendError } from '../../shared/http';
import { AuditService } from './audit.service';

const headersQuery = z.object({ category: categorySchema.optional() });

export function createAuditRoutes(audit: AuditService): Router {
  const router = Router();

  // GET / — cross-category matrix, orphans and conflicts
  router.get('/', async (_req: Request, res: Response) => {
    try {
      res.json(await audit.buildMatrix());
    } catch (err) {
      sendError(res, err);
    }
  });

  // GET /headers?category=pm — column presence per archived file
  router.get('/headers', async (req: Request, res: Response) => {
    try {
      const { category } = headersQuery.parse(req.query);
      const headers = await audit.headerMatrix(category);
      res.json(Object.fromEntries(headers));
    } catch (err) {
      sendError(res, err);
    }
  });

  return router;
}
