// ──────────────────────────────────────────
// Shared type definitions for telaudit
// ──────────────────────────────────────────

export const CATEGORIES = ['pm', 'cm', 'site', 'rf'] as const;

export type Category = (typeof CATEGORIES)[number];
export type EntryStatus = 'normalized' | 'raw_only';
export type IngestStatus = EntryStatus | 'duplicate';
export type ReingestPolicy = 'skip' | 'version';
export type EncodingFallback = 'latin1' | 'none';
export type TextEncoding = 'utf-8' | 'latin1';
export type ColumnKind = 'identifier' | 'integer' | 'float' | 'date' | 'text';
export type CellValue = string | number | Date | null;
export type CleanRow = Record<string, CellValue>;

export type IssueCode =
  | 'EmptyInputError'
  | 'EncodingError'
  | 'RowShapeError'
  | 'CellCoercionError'
  | 'IdentifierConflictError'
  | 'NormalizationError';

/** Serialised form of a data-quality problem, pinned to where it came from. */
export interface IssueRecord {
  code: IssueCode;
  message: string;
  fatal: boolean;
  line?: number;
  column?: string;
  token?: string;
}

// ── Sniffing ──

export interface DelimiterRule {
  name: 'semicolon' | 'comma' | 'tab';
  delimiter: string;
  decimalSeparator: string;
  thousandsSeparator: string;
}

export interface DelimiterScore {
  rule: DelimiterRule['name'];
  counts: number[];
  mean: number;
  variance: number | null;
  /** Variance relative to the mean (variance / mean²); null when the rule never occurs. */
  score: number | null;
}

export interface SourceLine {
  /** 0-based physical line number in the decoded text. */
  line: number;
  text: string;
}

export interface SourceRecord {
  /** 0-based physical line the record starts on. */
  line: number;
  tokens: string[];
}

export interface SniffResult {
  encoding: TextEncoding;
  delimiterRule: DelimiterRule;
  delimiterFallback: boolean;
  scores: DelimiterScore[];
  columnCount: number;
  headerLine: number;
  synthesizedHeader: boolean;
  header: string[];
  dataRecords: SourceRecord[];
  preambleLines: number;
  issues: IssueRecord[];
}

// ── Clean tables ──

export interface ColumnProfile {
  name: string;
  /** Header text before canonicalisation. */
  source: string;
  kind: ColumnKind;
  /** Name of the rule that decided the kind (date pattern, numeric, alias group…). */
  rule: string;
}

export interface TableProvenance {
  encoding: TextEncoding;
  delimiterRule: DelimiterRule['name'];
  delimiterFallback: boolean;
  decimalSeparator: string;
  thousandsSeparator: string;
  headerLine: number;
  synthesizedHeader: boolean;
  preambleLines: number;
}

export interface CleanTable {
  columns: ColumnProfile[];
  rows: CleanRow[];
  provenance: TableProvenance;
}

export interface NormalizationResult {
  table: CleanTable;
  skippedRows: number;
  issues: IssueRecord[];
}

// ── Archive ──

export interface ArchiveEntry {
  id: string;
  category: Category;
  index: number;
  filename: string;
  contentHash: string;
  byteSize: number;
  version: number;
  status: EntryStatus;
  failure: IssueRecord | null;
  ingestedAt: string;
}

export interface RawRecord {
  category: Category;
  index: number;
  filename: string;
  ingestedAt: string;
  content: Buffer;
}

export interface StoredCleanTable {
  entry: ArchiveEntry;
  table: CleanTable;
  skippedRows: number;
  issues: IssueRecord[];
}

export interface IngestParams {
  category: Category;
  filename: string;
  content: Buffer;
}

export interface IngestOutcome {
  status: IngestStatus;
  entry: ArchiveEntry;
  rowCount: number;
  skippedRows: number;
  issues: IssueRecord[];
}

// ── Audit ──

export interface EntryRef {
  category: Category;
  index: number;
  filename: string;
}

export interface IdentifierConflict {
  column: string;
  groups: string[];
}

export interface IdentifierSet {
  /** Alias group key → distinct values found under columns of that group. */
  identifiers: Map<string, Set<string>>;
  /** Identifier values that came from a column matching more than one group. */
  conflicted: Map<string, Set<string>>;
  counters: Set<string>;
  /** Canonical group key → column names that matched it. */
  identifierColumns: Map<string, Set<string>>;
  conflicts: IdentifierConflict[];
}

export interface AuditInput {
  entry: EntryRef;
  set: IdentifierSet;
}

export type MatrixKind = 'identifier' | 'counter';

export interface MatrixRow {
  kind: MatrixKind;
  /** Alias group key for identifiers, `counter` for counters. */
  group: string;
  value: string;
  entries: EntryRef[];
  categories: Category[];
  coverage: number;
  conflict: boolean;
  orphan: boolean;
  sparse: boolean;
}

export interface AuditConflict extends IdentifierConflict {
  entry: EntryRef;
  issue: IssueRecord;
}

export interface AuditMatrix {
  rows: MatrixRow[];
  orphans: MatrixRow[];
  conflicts: AuditConflict[];
  scanned: EntryRef[];
  skipped: EntryRef[];
}

export interface HeaderPresence {
  header: string;
  indices: number[];
}
