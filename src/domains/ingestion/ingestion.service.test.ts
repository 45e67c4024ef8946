import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { ArchiveNotFoundError } from '../../shared/errors';
import { createTestServices, csv } from '../../testing/fixtures';
import { Services } from '../../services';

const PM_A = csv(['Date;Cell ID;pmA', '01.02.2024;00123;10', '02.02.2024;00124;20']);
const PM_B = csv(['Date;Cell ID;pmA', '03.02.2024;00123;30']);

describe('IngestionService', () => {
  let services: Services;

  beforeEach(async () => {
    services = await createTestServices();
  });

  afterEach(async () => {
    await services.db.destroy();
  });

  it('archives the raw bytes unchanged next to the clean table', async () => {
    const content = Buffer.from('Cell ID;Name\nA1;München\n', 'latin1');
    const outcome = await services.ingestion.ingest({ category: 'cm', filename: 'cm.csv', content });

    expect(outcome.status).toBe('normalized');
    expect(outcome.issues.map((i) => i.code)).toEqual(['EncodingError']);

    const raw = await services.archive.getRaw('cm', 0);
    expect(raw.content.equals(content)).toBe(true);
    expect(raw.filename).toBe('cm.csv');

    const clean = await services.archive.getClean('cm', 0);
    expect(clean?.table.rows).toEqual([{ 'Cell ID': 'A1', Name: 'München' }]);
    expect(clean?.table.provenance.encoding).toBe('latin1');
  });

  it('assigns dense indices per category', async () => {
    const first = await services.ingestion.ingest({ category: 'pm', filename: 'a.csv', content: PM_A });
    const second = await services.ingestion.ingest({ category: 'pm', filename: 'b.csv', content: PM_B });
    const other = await services.ingestion.ingest({ category: 'rf', filename: 'a.csv', content: PM_A });

    expect([first.entry.index, second.entry.index, other.entry.index]).toEqual([0, 1, 0]);
    expect(first.rowCount).toBe(2);
    expect((await services.archive.listEntries('pm')).map((e) => e.filename)).toEqual(['a.csv', 'b.csv']);
  });

  it('never hands out the same index to concurrent ingests', async () => {
    const outcomes = await Promise.all(
      [0, 1, 2, 3, 4].map((n) =>
        services.ingestion.ingest({
          category: 'pm',
          filename: `pm_${n}.csv`,
          content: csv(['Cell ID;pmA', `C${n};${n}`]),
        })
      )
    );

    expect(outcomes.map((o) => o.entry.index).sort((a, b) => a - b)).toEqual([0, 1, 2, 3, 4]);
  });

  it('keeps indices sequential when audits run between ingests', async () => {
    const indices: number[] = [];
    for (const n of [0, 1, 2]) {
      const outcome = await services.ingestion.ingest({
        category: 'pm',
        filename: `pm_${n}.csv`,
        content: csv(['Cell ID;pmA', `C${n};${n}`]),
      });
      indices.push(outcome.entry.index);
      await services.audit.buildMatrix();
    }

    expect(indices).toEqual([0, 1, 2]);
  });

  it('returns the existing entry for an identical re-ingest under skip', async () => {
    const first = await services.ingestion.ingest({ category: 'pm', filename: 'a.csv', content: PM_A });
    const again = await services.ingestion.ingest({ category: 'pm', filename: 'a.csv', content: PM_A });

    expect(again.status).toBe('duplicate');
    expect(again.entry.id).toBe(first.entry.id);
    expect(await services.archive.listEntries('pm')).toHaveLength(1);
  });

  it('archives one copy when the same file arrives twice at once under skip', async () => {
    const outcomes = await Promise.all([
      services.ingestion.ingest({ category: 'pm', filename: 'a.csv', content: PM_A }),
      services.ingestion.ingest({ category: 'pm', filename: 'a.csv', content: PM_A }),
    ]);

    expect(outcomes.map((o) => o.status).sort()).toEqual(['duplicate', 'normalized']);
    expect(outcomes[0].entry.id).toBe(outcomes[1].entry.id);
    expect(await services.archive.listEntries('pm')).toHaveLength(1);
  });

  it('versions a changed file under the same name', async () => {
    await services.ingestion.ingest({ category: 'pm', filename: 'a.csv', content: PM_A });
    const changed = await services.ingestion.ingest({ category: 'pm', filename: 'a.csv', content: PM_B });

    expect(changed.status).toBe('normalized');
    expect(changed.entry.index).toBe(1);
    expect(changed.entry.version).toBe(2);
  });

  it('keeps archiving identical content under the version policy', async () => {
    const versioned = await createTestServices({ REINGEST_POLICY: 'version' });
    try {
      await versioned.ingestion.ingest({ category: 'pm', filename: 'a.csv', content: PM_A });
      const again = await versioned.ingestion.ingest({ category: 'pm', filename: 'a.csv', content: PM_A });

      expect(again.status).toBe('normalized');
      expect(again.entry.index).toBe(1);
      expect(again.entry.version).toBe(2);
    } finally {
      await versioned.db.destroy();
    }
  });

  it('gives concurrent re-ingests distinct versions under the version policy', async () => {
    const versioned = await createTestServices({ REINGEST_POLICY: 'version' });
    try {
      const outcomes = await Promise.all(
        [0, 1, 2].map(() => versioned.ingestion.ingest({ category: 'pm', filename: 'a.csv', content: PM_A }))
      );

      expect(outcomes.map((o) => o.entry.version).sort()).toEqual([1, 2, 3]);
      expect(outcomes.map((o) => o.entry.index).sort()).toEqual([0, 1, 2]);
    } finally {
      await versioned.db.destroy();
    }
  });

  it('stores unreadable input as raw only with its failure', async () => {
    const outcome = await services.ingestion.ingest({
      category: 'site',
      filename: 'blank.csv',
      content: Buffer.from('\n\n'),
    });

    expect(outcome.status).toBe('raw_only');
    expect(outcome.entry.failure).toEqual({
      code: 'EmptyInputError',
      message: 'File has no non-empty lines',
      fatal: true,
    });
    expect(await services.archive.getClean('site', 0)).toBeNull();
    expect((await services.archive.getRaw('site', 0)).content.toString()).toBe('\n\n');

    const stored = await services.archive.getEntry('site', 0);
    expect(stored.status).toBe('raw_only');
    expect(stored.failure?.code).toBe('EmptyInputError');
  });

  it('raises ArchiveNotFoundError for an unknown index', async () => {
    await expect(services.archive.getEntry('rf', 7)).rejects.toThrow(ArchiveNotFoundError);
    await expect(services.archive.getEntry('rf', 7)).rejects.toThrow('No archive entry for rf #7');
  });
});
