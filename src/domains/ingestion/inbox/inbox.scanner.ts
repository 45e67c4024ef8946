// ──────────────────────────────────────────
// Ingestion: inbox scanner — category drop folders → archive
// ──────────────────────────────────────────

import fs from 'fs';
import path from 'path';
import { createLogger } from '../../../platform/logger';
import { IngestionContract } from '../../../shared/contracts';
import { CATEGORIES, Category, IngestOutcome } from '../../../shared/types';

const log = createLogger('InboxScanner');

export const PROCESSED_DIR = 'processed';

export interface ScanResult {
  category: Category;
  file: string;
  outcome: IngestOutcome | null;
  error: string | null;
}

export function inboxPath(inboxDir: string, category: Category): string {
  return path.join(inboxDir, category);
}

export class InboxScanner {
  constructor(
    private inboxDir: string,
    private ingestion: IngestionContract
  ) {}

  ensureLayout(): void {
    for (const category of CATEGORIES) {
      fs.mkdirSync(path.join(inboxPath(this.inboxDir, category), PROCESSED_DIR), { recursive: true });
    }
  }

  pending(category: Category): string[] {
    const dir = inboxPath(this.inboxDir, category);
    if (!fs.existsSync(dir)) return [];
    return fs
      .readdirSync(dir, { withFileTypes: true })
      .filter((d) => d.isFile() && !d.name.startsWith('.'))
      .map((d) => d.name)
      .sort();
  }

  async run(): Promise<ScanResult[]> {
    const results: ScanResult[] = [];

    for (const category of CATEGORIES) {
      const files = this.pending(category);
      if (files.length === 0) continue;

      log.info(`Found ${files.length} file(s) in ${category} inbox`);

      // Sequential: index order follows file name order
      for (const file of files) {
        const source = path.join(inboxPath(this.inboxDir, category), file);
        try {
          const content = fs.readFileSync(source);
          const outcome = await this.ingestion.ingest({ category, filename: file, content });
          this.moveToProcessed(category, file);
          results.push({ category, file, outcome, error: null });
        } catch (err) {
          const message = err instanceof Error ? err.message : String(err);
          log.error(`Failed to ingest ${category}/${file}: ${message}`);
          results.push({ category, file, outcome: null, error: message });
        }
      }
    }

    return results;
  }

  private moveToProcessed(category: Category, file: string): void {
    const dir = inboxPath(this.inboxDir, category);
    const processed = path.join(dir, PROCESSED_DIR);
    fs.mkdirSync(processed, { recursive: true });

    let target = path.join(processed, file);
    if (fs.existsSync(target)) {
      target = path.join(processed, `${Date.now()}_${file}`);
    }
    fs.renameSync(path.join(dir, file), target);
  }
}
