// ============================================================================
// TABLE SCHEMA INFERENCE
// ============================================================================
// Maps header texts and sample cell contents onto canonical fields.
// Built once per run; RowExtractor compensates for per-row anomalies.

import { cellTexts, segmentRow } from '../extract/CellSegmenter.js';
import { isDateLike, isUserId, matchPriority, matchStatus } from '../utils/ValueNormalizer.js';
import { isFatalIOError } from '../types/errors.js';
import type { FieldVocabulary } from '../../config/FieldVocabulary.js';
import type { LocatorChain } from '../locator/LocatorChain.js';
import type { ElementHandle, PageHandle } from '../../page/PageHandle.js';
import type { FieldName, QuerySpec, SchemaMap, SchemaSource } from '../../../shared/types.js';

export interface HeaderMatch {
  columns: Partial<Record<FieldName, number>>;
  unmatched: string[];
}

function normalizeHeader(text: string): string {
  return text.replace(/\s+/g, ' ').trim().toUpperCase();
}

/** Whole-word containment, so "ID" does not match inside "VALID" */
function containsPhrase(text: string, phrase: string): boolean {
  const escaped = phrase.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
  return new RegExp(`(^|[^\\p{L}\\d])${escaped}($|[^\\p{L}\\d])`, 'u').test(text);
}

/**
 * Header texts to canonical columns. Exact synonym first, then the longest
 * contained synonym. Each field maps at most once; the first header wins.
 */
export function matchHeaders(headerTexts: readonly string[], vocab: FieldVocabulary): HeaderMatch {
  const columns: Partial<Record<FieldName, number>> = {};
  const unmatched: string[] = [];
  const fields = vocab.mappableFields();

  headerTexts.forEach((raw, index) => {
    const header = normalizeHeader(raw);
    if (header === '') return;

    const open = fields.filter((f) => columns[f] === undefined);
    let match = open.find((f) => vocab.synonymsFor(f).includes(header));

    if (!match) {
      let best = 0;
      for (const field of open) {
        for (const synonym of vocab.synonymsFor(field)) {
          if (synonym.length > best && containsPhrase(header, synonym)) {
            best = synonym.length;
            match = field;
          }
        }
      }
    }

    if (match) {
      columns[match] = index;
    } else {
      unmatched.push(header);
    }
  });

  return { columns, unmatched };
}

function countMapped(columns: Partial<Record<FieldName, number>>): number {
  return Object.values(columns).filter((v) => v !== undefined).length;
}

/**
 * Pure inference over already-read texts
 */
export function inferSchema(
  headerTexts: readonly string[] | null,
  sampleRows: readonly (readonly string[])[],
  vocab: FieldVocabulary,
  minHeaderFields: number
): SchemaMap {
  const cellCount = Math.max(0, ...sampleRows.map((r) => r.length), headerTexts?.length ?? 0);
  const header: HeaderMatch = headerTexts ? matchHeaders(headerTexts, vocab) : { columns: {}, unmatched: [] };
  const columns: Partial<Record<FieldName, number>> = { ...header.columns };
  const headerMapped = countMapped(columns);
  let source: SchemaSource = 'header';

  if (headerMapped < minHeaderFields) {
    source = headerMapped > 0 ? 'mixed' : 'positional';
    const taken = new Set(Object.values(columns));

    // Positional defaults for the core fields
    vocab.data.positionalOrder.forEach((field, index) => {
      if (columns[field] !== undefined || taken.has(index) || index >= cellCount) return;
      columns[field] = index;
      taken.add(index);
    });

    // Content inference for the remaining cells
    for (let index = 0; index < cellCount; index++) {
      if (taken.has(index)) continue;
      const samples = sampleRows.map((r) => (r[index] ?? '').trim()).filter((v) => v !== '');
      if (samples.length === 0) continue;

      const field = inferFieldFromContent(samples, columns, vocab);
      if (field) {
        columns[field] = index;
        taken.add(index);
      }
    }
  }

  if (columns.Title === undefined) {
    const first = sampleRows[0] ?? [];
    const nonEmpty = first.findIndex((v) => v.trim() !== '');
    columns.Title = nonEmpty >= 0 ? nonEmpty : 0;
  }

  return Object.freeze({
    columns: Object.freeze(columns),
    source,
    unmatchedHeaders: Object.freeze([...header.unmatched]),
    cellCount,
  });
}

function inferFieldFromContent(
  samples: string[],
  columns: Partial<Record<FieldName, number>>,
  vocab: FieldVocabulary
): FieldName | null {
  const free = (field: FieldName): boolean => columns[field] === undefined;
  const all = (test: (v: string) => boolean): boolean => samples.every(test);

  if (all((v) => isDateLike(v, vocab))) {
    return vocab.data.dateSlots.find(free) ?? null;
  }
  if (free('Status') && all((v) => matchStatus(v, vocab) !== null)) {
    return 'Status';
  }
  if (free('Priority') && all((v) => matchPriority(v, vocab) !== null)) {
    return 'Priority';
  }
  if (all((v) => isUserId(v, vocab))) {
    return vocab.data.personSlots.find(free) ?? null;
  }
  return null;
}

// ============================================================================
// PAGE-BACKED INFERENCE
// ============================================================================

export interface SchemaInferenceOptions {
  minHeaderFields: number;
  headerCells: QuerySpec;
}

export class TableSchemaInference {
  private page: PageHandle;
  private locator: LocatorChain;
  private vocab: FieldVocabulary;
  private options: SchemaInferenceOptions;

  constructor(page: PageHandle, locator: LocatorChain, vocab: FieldVocabulary, options: SchemaInferenceOptions) {
    this.page = page;
    this.locator = locator;
    this.vocab = vocab;
    this.options = options;
  }

  /**
   * Reads header and sample texts from the page. A header or sample that
   * goes stale or times out is dropped; only a lost page propagates.
   */
  async infer(headerRow: ElementHandle | null, sampleRows: readonly ElementHandle[]): Promise<SchemaMap> {
    let headerTexts: string[] | null = null;

    if (headerRow) {
      try {
        headerTexts = await this.readHeader(headerRow);
      } catch (error) {
        if (isFatalIOError(error)) throw error;
        console.warn(`[TableSchemaInference] Header row unreadable, using positional mapping: ${errorMessage(error)}`);
      }
    }

    const samples: string[][] = [];
    for (const row of sampleRows) {
      try {
        const { cells } = await segmentRow(this.page, row);
        samples.push(await cellTexts(cells));
      } catch (error) {
        if (isFatalIOError(error)) throw error;
        console.warn(`[TableSchemaInference] Dropped sample row ${row.id}: ${errorMessage(error)}`);
      }
    }

    const schema = inferSchema(headerTexts, samples, this.vocab, this.options.minHeaderFields);
    const mapped = Object.entries(schema.columns)
      .map(([field, index]) => `${field}=${index}`)
      .join(', ');
    console.log(`[TableSchemaInference] ${schema.source} schema over ${schema.cellCount} cells: ${mapped}`);
    if (schema.unmatchedHeaders.length > 0) {
      console.log(`[TableSchemaInference] Unmatched headers: ${schema.unmatchedHeaders.join(', ')}`);
    }
    return schema;
  }

  private async readHeader(headerRow: ElementHandle): Promise<string[] | null> {
    const { handles } = await this.locator.resolveAll(this.options.headerCells, headerRow);
    if (handles.length === 0) return null;

    const texts: string[] = [];
    for (const cell of handles) {
      texts.push((await cell.innerText()).trim() || (await cell.textContent()).trim());
    }
    return texts;
  }
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
