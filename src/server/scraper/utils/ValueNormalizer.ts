// ============================================================================
// VALUE NORMALIZER
// ============================================================================
// Vocabulary matching and canonicalization of extracted cell values.
// Every normalize* function is a fixed point: applying it twice changes nothing.

import type { FieldVocabulary, IndicatorEntry, VocabularyEntry } from '../../config/FieldVocabulary.js';
import type { IssueRecord } from '../../../shared/types.js';

export interface NormalizeOptions {
  maxFieldLength: number;
  emptyValue: string;
}

const NUMERIC_DATE = /\b\d{1,2}[./-]\d{1,2}[./-]\d{2,4}\b/;
const ISO_DATE = /\b\d{4}-\d{2}-\d{2}\b/;

export function collapseWhitespace(value: string): string {
  return value.replace(/\s+/g, ' ').trim();
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/** Repeat a transform until the value stops changing */
function untilStable(value: string, transform: (v: string) => string): string {
  let current = value;
  for (let i = 0; i < 10; i++) {
    const next = transform(current);
    if (next === current) return next;
    current = next;
  }
  return current;
}

/** Whole-word containment, so "LOW" does not match inside "FOLLOW" */
function containsWord(text: string, word: string): boolean {
  return new RegExp(`(^|[^\\p{L}\\d])${escapeRegExp(word)}($|[^\\p{L}\\d])`, 'u').test(text);
}

function matchVocabulary(value: string, entries: readonly VocabularyEntry[]): string | null {
  const upper = value.toUpperCase();
  if (upper === '') return null;
  for (const entry of entries) {
    if (entry.keywords.every((k) => containsWord(upper, k.toUpperCase()))) {
      return entry.canonical;
    }
  }
  return null;
}

function matchIndicator(classNames: readonly string[], entries: readonly IndicatorEntry[]): string | null {
  const lowered = classNames.map((c) => c.toLowerCase());
  for (const entry of entries) {
    if (entry.tokens.some((t) => lowered.some((c) => c.includes(t.toLowerCase())))) {
      return entry.canonical;
    }
  }
  return null;
}

// ============================================================================
// STATUS / PRIORITY
// ============================================================================

function stripStatusNoise(value: string, vocab: FieldVocabulary): string {
  const firstLine = value.split(/\r?\n/).map((l) => l.trim()).find((l) => l !== '') ?? '';
  return untilStable(collapseWhitespace(firstLine), (v) => {
    let out = v;
    for (const noise of vocab.data.statusNoise) {
      out = out.replace(new RegExp(escapeRegExp(noise), 'gi'), ' ');
    }
    return collapseWhitespace(out);
  });
}

export function matchStatus(value: string, vocab: FieldVocabulary): string | null {
  return matchVocabulary(stripStatusNoise(value, vocab), vocab.data.statusVocabulary);
}

/** Canonical status, or the cleaned first line when no vocabulary entry matches */
export function normalizeStatus(value: string, vocab: FieldVocabulary): string {
  const cleaned = stripStatusNoise(value, vocab);
  return matchVocabulary(cleaned, vocab.data.statusVocabulary) ?? cleaned;
}

export function matchPriority(value: string, vocab: FieldVocabulary): string | null {
  return matchVocabulary(collapseWhitespace(value), vocab.data.priorityVocabulary);
}

export function normalizePriority(value: string, vocab: FieldVocabulary): string {
  const cleaned = collapseWhitespace(value);
  return matchVocabulary(cleaned, vocab.data.priorityVocabulary) ?? cleaned;
}

export function priorityFromClasses(classNames: readonly string[], vocab: FieldVocabulary): string | null {
  return matchIndicator(classNames, vocab.data.indicatorClasses.priority);
}

export function statusFromClasses(classNames: readonly string[], vocab: FieldVocabulary): string | null {
  return matchIndicator(classNames, vocab.data.indicatorClasses.status);
}

// ============================================================================
// DATES / USERS
// ============================================================================

const datePatternCache = new WeakMap<FieldVocabulary, { test: RegExp; extract: RegExp }>();

function datePatterns(vocab: FieldVocabulary): { test: RegExp; extract: RegExp } {
  const cached = datePatternCache.get(vocab);
  if (cached) return cached;

  const months = vocab.data.monthTokens.map(escapeRegExp).join('|');
  const named = [
    `(?:${months})\\.?\\s+\\d{1,2}(?:,?\\s+\\d{4})?`,
    `\\d{1,2}\\.?\\s+(?:${months})\\.?(?:,?\\s+\\d{4})?`,
  ];
  const source = [ISO_DATE.source, NUMERIC_DATE.source, ...named.map((n) => `(?<![\\p{L}\\d])${n}(?![\\p{L}\\d])`)].join('|');
  const patterns = {
    test: new RegExp(source, 'iu'),
    extract: new RegExp(source, 'giu'),
  };
  datePatternCache.set(vocab, patterns);
  return patterns;
}

export function isDateLike(value: string, vocab: FieldVocabulary): boolean {
  const trimmed = value.trim();
  if (trimmed === '' || !/\d/.test(trimmed)) return false;
  return datePatterns(vocab).test.test(trimmed);
}

/** Every date-looking substring of a text, in order of appearance */
export function findDates(text: string, vocab: FieldVocabulary): string[] {
  const matches = text.match(datePatterns(vocab).extract) ?? [];
  return matches.map((m) => collapseWhitespace(m));
}

export function isUserId(value: string, vocab: FieldVocabulary): boolean {
  return vocab.userIdPattern.test(value.trim());
}

// ============================================================================
// TITLES / RECORDS
// ============================================================================

/** Remove expand/collapse control labels and collapse whitespace */
export function cleanTitle(value: string, vocab: FieldVocabulary): string {
  const artifacts = vocab.data.titleArtifacts.map(
    (a) => new RegExp(`(^|\\s)${escapeRegExp(a)}(?=\\s|$)`, 'giu')
  );
  return untilStable(collapseWhitespace(value), (v) => {
    let out = v;
    for (const artifact of artifacts) {
      out = out.replace(artifact, ' ');
    }
    return collapseWhitespace(out);
  });
}

export function truncateValue(value: string, maxLength: number): string {
  if (value.length <= maxLength) return value;
  return `${value.slice(0, maxLength - 3).trimEnd()}...`;
}

export function normalizeField(field: string, raw: string, vocab: FieldVocabulary, options: NormalizeOptions): string {
  let value: string;
  switch (field) {
    case 'Title':
      value = cleanTitle(raw, vocab);
      break;
    case 'Status':
      value = normalizeStatus(raw, vocab);
      break;
    case 'Priority':
      value = normalizePriority(raw, vocab);
      break;
    default:
      value = collapseWhitespace(raw);
  }
  value = truncateValue(value, options.maxFieldLength);
  return value === '' ? options.emptyValue : value;
}

/**
 * Canonicalize every field of a record. normalizeRecord(normalizeRecord(r)) equals normalizeRecord(r).
 */
export function normalizeRecord(
  record: Readonly<Record<string, string>>,
  vocab: FieldVocabulary,
  options: NormalizeOptions
): IssueRecord {
  const out: Record<string, string> = {};
  for (const [field, raw] of Object.entries(record)) {
    out[field] = normalizeField(field, raw, vocab, options);
  }
  return Object.freeze(out);
}
