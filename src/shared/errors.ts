// ──────────────────────────────────────────
// Shared error taxonomy
// ──────────────────────────────────────────

import { Category, IssueCode, IssueRecord } from './types';

export interface IssueLocation {
  line?: number;
  column?: string;
  token?: string;
}

export abstract class DataQualityError extends Error {
  abstract readonly code: IssueCode;
  abstract readonly fatal: boolean;

  constructor(message: string, readonly location: IssueLocation = {}) {
    super(message);
    this.name = new.target.name;
  }

  toIssue(): IssueRecord {
    return {
      code: this.code,
      message: this.message,
      fatal: this.fatal,
      ...this.location,
    };
  }
}

export class EmptyInputError extends DataQualityError {
  readonly code = 'EmptyInputError';
  readonly fatal = true;
}

export class EncodingError extends DataQualityError {
  readonly code = 'EncodingError';

  constructor(message: string, readonly fatal: boolean) {
    super(message);
  }
}

export class RowShapeError extends DataQualityError {
  readonly code = 'RowShapeError';
  readonly fatal = false;

  constructor(line: number, expected: number, actual: number) {
    super(`Row has ${actual} tokens, header has ${expected}`, { line });
  }

  /** The CSV parser could not close a quoted field opened on this line. */
  static quoting(line: number | undefined, detail: string): IssueRecord {
    const issue: IssueRecord = { code: 'RowShapeError', message: `Malformed quoting: ${detail}`, fatal: false };
    return line === undefined ? issue : { ...issue, line };
  }
}

export class CellCoercionError extends DataQualityError {
  readonly code = 'CellCoercionError';
  readonly fatal = false;

  constructor(line: number, column: string, token: string, expected: string) {
    super(`Cannot read "${token}" as ${expected}`, { line, column, token });
  }
}

export class IdentifierConflictError extends DataQualityError {
  readonly code = 'IdentifierConflictError';
  readonly fatal = false;

  constructor(column: string, groups: string[]) {
    super(`Column "${column}" matches several identifier groups: ${groups.join(', ')}`, { column });
  }
}

export class ArchiveNotFoundError extends Error {
  constructor(readonly category: Category, readonly index: number, kind: 'entry' | 'raw' | 'clean' = 'entry') {
    super(`No ${kind === 'entry' ? 'archive entry' : `${kind} record`} for ${category} #${index}`);
    this.name = 'ArchiveNotFoundError';
  }
}

/** Unexpected failures during normalization still end up on the entry, never as a thrown ingest. */
export function toIssue(err: unknown): IssueRecord {
  if (err instanceof DataQualityError) return err.toIssue();
  const message = err instanceof Error ? err.message : String(err);
  return { code: 'NormalizationError', message, fatal: true };
}
