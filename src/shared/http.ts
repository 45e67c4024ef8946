// ──────────────────────────────────────────
// HTTP helpers shared by the domain routers
// ──────────────────────────────────────────

import { Response } from 'express';
import { z, ZodError } from 'zod';
import { ArchiveNotFoundError } from './errors';
import { CATEGORIES, Category } from './types';

const CATEGORY_ALIASES: Record<string, Category> = { database: 'site' };

export const categorySchema = z.preprocess(
  (v) => (typeof v === 'string' ? CATEGORY_ALIASES[v.toLowerCase()] ?? v.toLowerCase() : v),
  z.enum(CATEGORIES)
);

export const indexSchema = z.coerce.number().int().min(0);

export function sendError(res: Response, err: unknown): void {
  if (err instanceof ZodError) {
    res.status(400).json({ error: 'validation_failed', issues: err.issues });
    return;
  }
  if (err instanceof ArchiveNotFoundError) {
    res.status(404).json({ error: err.message });
    return;
  }
  const message = err instanceof Error ? err.message : 'Internal error';
  res.status(500).json({ error: message });
}
