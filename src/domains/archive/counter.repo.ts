// ──────────────────────────────────────────
// Archive: per-category ordinal counter
// ──────────────────────────────────────────

import { Knex } from 'knex';
import { Category } from '../../shared/types';

interface CounterRow {
  category: string;
  next_index: number;
}

export class CounterRepo {
  /**
   * Takes the category's counter row lock without moving the counter. Reads made
   * after it in the same transaction see every ingest committed before it.
   */
  async lock(trx: Knex.Transaction, category: Category): Promise<void> {
    await trx<CounterRow>('category_counters')
      .insert({ category, next_index: 0 })
      .onConflict('category')
      .ignore();
    await trx<CounterRow>('category_counters').where('category', category).increment('next_index', 0);
  }

  /**
   * Reserves the next index for a category. Must run inside the caller's
   * transaction: the UPDATE holds the row until commit, so concurrent ingests
   * serialise on it instead of reading the same value.
   */
  async reserve(trx: Knex.Transaction, category: Category): Promise<number> {
    await this.lock(trx, category);
    await trx<CounterRow>('category_counters').where('category', category).increment('next_index', 1);
    const row = await trx<CounterRow>('category_counters').where('category', category).first();
    if (!row) {
      throw new Error(`Counter row for ${category} vanished inside its transaction`);
    }
    return Number(row.next_index) - 1;
  }
}
