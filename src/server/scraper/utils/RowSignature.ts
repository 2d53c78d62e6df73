// ============================================================================
// ROW SIGNATURE
// ============================================================================
// Identity signature and duplicate statistics. Duplicates are counted for
// observability only; no record is ever dropped here.

import { collapseWhitespace } from './ValueNormalizer.js';
import type { IssueRecord } from '../../../shared/types.js';

export const SIGNATURE_FIELDS = ['Title', 'Type', 'Created On', 'Created By'] as const;

export interface DuplicateStats {
  /** Distinct titles that occur more than once */
  duplicateTitleCount: number;
  /** Distinct signatures that occur more than once */
  duplicateSignatureCount: number;
  duplicateTitles: string[];
}

export function rowSignature(record: IssueRecord): string {
  return SIGNATURE_FIELDS.map((field) => collapseWhitespace(record[field] ?? '').toLowerCase()).join('|');
}

function countRepeated(keys: string[]): string[] {
  const counts = new Map<string, number>();
  for (const key of keys) {
    counts.set(key, (counts.get(key) ?? 0) + 1);
  }
  return [...counts.entries()].filter(([, n]) => n > 1).map(([key]) => key);
}

export function computeDuplicateStats(records: readonly IssueRecord[]): DuplicateStats {
  const duplicateTitles = countRepeated(records.map((r) => collapseWhitespace(r.Title ?? '')));
  const duplicateSignatures = countRepeated(records.map(rowSignature));

  return {
    duplicateTitleCount: duplicateTitles.length,
    duplicateSignatureCount: duplicateSignatures.length,
    duplicateTitles,
  };
}
