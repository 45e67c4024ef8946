// ──────────────────────────────────────────
// Ingestion: byte → text decoding
// ──────────────────────────────────────────

import { EncodingError } from '../../../shared/errors';
import { EncodingFallback, IssueRecord, TextEncoding } from '../../../shared/types';

const LATIN1_BOM = 'ï»¿';

export interface DecodedText {
  text: string;
  encoding: TextEncoding;
  issues: IssueRecord[];
}

export function decodeContent(content: Buffer, fallback: EncodingFallback): DecodedText {
  try {
    // fatal: true makes malformed sequences throw instead of becoming U+FFFD
    const text = new TextDecoder('utf-8', { fatal: true }).decode(content);
    return { text, encoding: 'utf-8', issues: [] };
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    if (fallback === 'none') {
      throw new EncodingError(`Content is not valid UTF-8 (${reason})`, true);
    }
    let text = content.toString('latin1');
    if (text.startsWith(LATIN1_BOM)) text = text.slice(LATIN1_BOM.length);
    const issue = new EncodingError(`Content is not valid UTF-8 (${reason}); decoded as Latin-1`, false);
    return { text, encoding: 'latin1', issues: [issue.toIssue()] };
  }
}
