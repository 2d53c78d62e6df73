// ============================================================================
// RECORD VALIDATOR
// ============================================================================
// Moves values that landed in the wrong column back into place. Operates on
// raw extracted values before normalization.

import { isDateLike, matchPriority, matchStatus } from './ValueNormalizer.js';
import type { FieldVocabulary } from '../../config/FieldVocabulary.js';

export interface PlacementCorrection {
  field: string;
  from: string;
  reason: string;
}

const CORE_DATE_FIELDS = ['Deadline', 'Due Date', 'Created On'] as const;

/** Fields whose values may have been shifted into another column */
const SHIFTABLE_FIELDS = ['Type', 'Priority', 'Status', 'Deadline', 'Due Date', 'Created By', 'Created On'] as const;

function isBlank(value: string | undefined): boolean {
  return value === undefined || value.trim() === '';
}

function swap(fields: Record<string, string>, a: string, b: string): void {
  const tmp = fields[a] ?? '';
  fields[a] = fields[b] ?? '';
  fields[b] = tmp;
}

/**
 * Correct misplaced values in place and report what moved
 */
export function correctPlacement(fields: Record<string, string>, vocab: FieldVocabulary): PlacementCorrection[] {
  const corrections: PlacementCorrection[] = [];
  const title = (fields.Title ?? '').trim().toLowerCase();

  // Type repeating the title is a rendering artifact
  if (!isBlank(fields.Type) && title !== '' && fields.Type.trim().toLowerCase() === title) {
    fields.Type = '';
    corrections.push({ field: 'Type', from: 'Title', reason: 'type duplicated title' });
  }

  const checks: Array<{ field: 'Status' | 'Priority'; matches: (v: string) => boolean }> = [
    { field: 'Status', matches: (v) => matchStatus(v, vocab) !== null },
    { field: 'Priority', matches: (v) => matchPriority(v, vocab) !== null },
  ];

  for (const { field, matches } of checks) {
    // An empty field stays empty; only a wrong value is swapped out
    if (!(field in fields) || isBlank(fields[field]) || matches(fields[field] ?? '')) continue;
    const source = SHIFTABLE_FIELDS.find(
      (other) => other !== field && other in fields && matches(fields[other] ?? '')
    );
    if (source) {
      swap(fields, field, source);
      corrections.push({ field, from: source, reason: `${field.toLowerCase()} value found in ${source}` });
    }
  }

  // Created By holding a date moves into the first empty date slot
  const createdBy = fields['Created By'];
  if (createdBy !== undefined && isDateLike(createdBy, vocab)) {
    const emptySlot = CORE_DATE_FIELDS.find((f) => f in fields && isBlank(fields[f]));
    if (emptySlot) {
      fields[emptySlot] = createdBy;
      fields['Created By'] = '';
      corrections.push({ field: emptySlot, from: 'Created By', reason: 'date value found in Created By' });
    }
  }

  for (const dateField of CORE_DATE_FIELDS) {
    const current = fields[dateField];
    if (current === undefined || isBlank(current) || isDateLike(current, vocab)) continue;
    const source = SHIFTABLE_FIELDS.find(
      (other) =>
        !(CORE_DATE_FIELDS as readonly string[]).includes(other) &&
        other in fields &&
        isDateLike(fields[other] ?? '', vocab)
    );
    if (source) {
      swap(fields, dateField, source);
      corrections.push({ field: dateField, from: source, reason: `date value found in ${source}` });
    }
  }

  return corrections;
}
