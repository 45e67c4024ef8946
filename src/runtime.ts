// ──────────────────────────────────────────
// Runtime: Background job scheduler
// ──────────────────────────────────────────

import { InboxScanner } from './domains/ingestion/inbox/inbox.scanner';
import { createLogger } from './platform/logger';

const log = createLogger('Runtime');

export class Runtime {
  private intervals: NodeJS.Timeout[] = [];
  private scanning = false;

  constructor(
    private inboxScanner: InboxScanner,
    private pollMs: number
  ) {}

  start(): void {
    this.intervals.push(
      setInterval(() => {
        this.scanOnce().catch((err) =>
          log.error(`InboxScanner error: ${err instanceof Error ? err.message : String(err)}`)
        );
      }, this.pollMs)
    );

    log.info(`Started background jobs (inbox scan: ${this.pollMs / 1000}s)`);
  }

  stop(): void {
    this.intervals.forEach(clearInterval);
    this.intervals = [];
    log.info('Stopped background jobs');
  }

  /** Skips a tick while the previous scan is still running. */
  async scanOnce(): Promise<number> {
    if (this.scanning) return 0;
    this.scanning = true;
    try {
      const results = await this.inboxScanner.run();
      return results.length;
    } finally {
      this.scanning = false;
    }
  }
}
