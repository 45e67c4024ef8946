import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { Services } from '../../services';
import { createTestServices, csv } from '../../testing/fixtures';

const PM = csv(['Date;Cell ID;pmA;pmB', '01.02.2024;CellA;1;2', '01.02.2024;CellB;3;4']);
const CM = csv(['Cell ID,PCI', 'CellA,101']);

describe('AuditService', () => {
  let services: Services;

  beforeEach(async () => {
    services = await createTestServices();
  });

  afterEach(async () => {
    await services.db.destroy();
  });

  it('correlates identifiers across categories and skips raw-only entries', async () => {
    await services.ingestion.ingest({ category: 'pm', filename: 'pm.csv', content: PM });
    await services.ingestion.ingest({ category: 'cm', filename: 'cm.csv', content: CM });
    await services.ingestion.ingest({ category: 'site', filename: 'blank.csv', content: Buffer.from('\n') });

    const matrix = await services.audit.buildMatrix();

    expect(matrix.scanned.map((e) => `${e.category}#${e.index}`)).toEqual(['pm#0', 'cm#0']);
    expect(matrix.skipped).toEqual([{ category: 'site', index: 0, filename: 'blank.csv' }]);
    expect(matrix.orphans.map((r) => `${r.group}:${r.value}`)).toEqual(['cell_id:CellB', 'serving_pci:101']);
    expect(matrix.rows.filter((r) => r.kind === 'counter').map((r) => r.value)).toEqual(['pmA', 'pmB']);
  });

  it('leaves index assignment untouched by interleaved audits', async () => {
    const indices: number[] = [];
    for (const n of [1, 2, 3]) {
      const outcome = await services.ingestion.ingest({
        category: 'pm',
        filename: `pm_${n}.csv`,
        content: csv(['Cell ID;pmA', `Cell${n};${n}`]),
      });
      indices.push(outcome.entry.index);
      const matrix = await services.audit.buildMatrix();
      expect(matrix.scanned).toHaveLength(n);
    }
    expect(indices).toEqual([0, 1, 2]);
  });

  it('reports column presence per file', async () => {
    await services.ingestion.ingest({ category: 'pm', filename: 'a.csv', content: PM });
    await services.ingestion.ingest({ category: 'pm', filename: 'b.csv', content: csv(['Date;Cell ID;pmA', '01.02.2024;CellA;5']) });
    await services.ingestion.ingest({ category: 'cm', filename: 'cm.csv', content: CM });

    const headers = await services.audit.headerMatrix('pm');

    expect([...headers.keys()]).toEqual(['pm']);
    expect(headers.get('pm')).toEqual([
      { header: 'Cell ID', indices: [0, 1] },
      { header: 'Date', indices: [0, 1] },
      { header: 'pmA', indices: [0, 1] },
      { header: 'pmB', indices: [0] },
    ]);
  });
});
