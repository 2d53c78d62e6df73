// ============================================================================
// ROW EXTRACTOR
// ============================================================================
// One rendered row to one IssueRecord, or a Skip. Errors on a single row are
// absorbed here; only a lost page propagates.

import { classNamesOf, readCellValue, segmentRow } from './CellSegmenter.js';
import { correctPlacement } from '../utils/RecordValidator.js';
import {
  cleanTitle,
  findDates,
  isDateLike,
  matchPriority,
  normalizeRecord,
  priorityFromClasses,
  statusFromClasses,
} from '../utils/ValueNormalizer.js';
import { isFatalIOError, wrapError } from '../types/errors.js';
import { ALL_FIELDS, CORE_FIELDS, DATE_FIELDS } from '../../../shared/types.js';
import type { Cell } from './CellSegmenter.js';
import type { FieldVocabulary } from '../../config/FieldVocabulary.js';
import type { ElementHandle, PageHandle } from '../../page/PageHandle.js';
import type { FieldName, RowOutcome, SchemaMap } from '../../../shared/types.js';

export interface RowExtractorOptions {
  maxFieldLength: number;
  emptyValue: string;
}

export class RowExtractor {
  private page: PageHandle;
  private vocab: FieldVocabulary;
  private options: RowExtractorOptions;

  constructor(page: PageHandle, vocab: FieldVocabulary, options: RowExtractorOptions) {
    this.page = page;
    this.vocab = vocab;
    this.options = options;
  }

  async extract(row: ElementHandle, schema: SchemaMap, rowIndex: number): Promise<RowOutcome> {
    try {
      return await this.extractRow(row, schema, rowIndex);
    } catch (error) {
      if (isFatalIOError(error)) throw error;
      const engineError = wrapError(error, { rowIndex });
      console.warn(`[RowExtractor] Row ${rowIndex} skipped (${engineError.type}): ${engineError.message}`);
      return { kind: 'skip', reason: `${engineError.type}: ${engineError.message}`, rowIndex };
    }
  }

  private async extractRow(row: ElementHandle, schema: SchemaMap, rowIndex: number): Promise<RowOutcome> {
    const { strategy, cells } = await segmentRow(this.page, row);
    if (strategy === 'header-cells') {
      return { kind: 'skip', reason: 'header row', rowIndex };
    }
    if (cells.length === 0) {
      return { kind: 'skip', reason: 'no cells', rowIndex };
    }

    // Core fields always present, optional fields only when mapped
    const fields: Record<string, string> = {};
    for (const field of ALL_FIELDS) {
      if ((CORE_FIELDS as readonly string[]).includes(field) || schema.columns[field] !== undefined) {
        fields[field] = '';
      }
    }

    for (const field of ALL_FIELDS) {
      const cell = this.cellFor(field, schema, cells);
      if (cell) {
        fields[field] = (await readCellValue(this.page, cell)).value;
      }
    }

    await this.applyIndicators(fields, schema, cells);
    await this.fillDatesFromRowText(row, fields, schema);

    const corrections = correctPlacement(fields, this.vocab);
    for (const c of corrections) {
      console.log(`[RowExtractor] Row ${rowIndex}: ${c.reason} -> ${c.field}`);
    }

    fields.Title = cleanTitle(fields.Title ?? '', this.vocab);
    if (fields.Title === '') {
      return { kind: 'skip', reason: 'empty title', rowIndex };
    }

    const record = normalizeRecord(fields, this.vocab, this.options);
    return { kind: 'record', record, rowIndex };
  }

  private cellFor(field: FieldName, schema: SchemaMap, cells: readonly Cell[]): Cell | null {
    const index = schema.columns[field];
    if (index === undefined || index < 0 || index >= cells.length) return null;
    return cells[index] ?? null;
  }

  /**
   * Priority from color/class indicators when the text is ambiguous;
   * status from indicators when the text is empty
   */
  private async applyIndicators(fields: Record<string, string>, schema: SchemaMap, cells: readonly Cell[]): Promise<void> {
    const priorityCell = this.cellFor('Priority', schema, cells);
    if (priorityCell?.kind === 'element' && matchPriority(fields.Priority ?? '', this.vocab) === null) {
      const fromClasses = priorityFromClasses(await classNamesOf(this.page, priorityCell.handle), this.vocab);
      if (fromClasses) fields.Priority = fromClasses;
    }

    const statusCell = this.cellFor('Status', schema, cells);
    if (statusCell?.kind === 'element' && (fields.Status ?? '').trim() === '') {
      const fromClasses = statusFromClasses(await classNamesOf(this.page, statusCell.handle), this.vocab);
      if (fromClasses) fields.Status = fromClasses;
    }
  }

  /**
   * Empty mapped date fields take the first unused date found in the row text
   */
  private async fillDatesFromRowText(row: ElementHandle, fields: Record<string, string>, schema: SchemaMap): Promise<void> {
    const emptyMapped = DATE_FIELDS.filter(
      (f) => schema.columns[f] !== undefined && (fields[f] ?? '').trim() === ''
    );
    if (emptyMapped.length === 0) return;

    const used = new Set(
      DATE_FIELDS.map((f) => (fields[f] ?? '').trim()).filter((v) => v !== '' && isDateLike(v, this.vocab))
    );
    const available = findDates(await row.innerText(), this.vocab).filter((d) => !used.has(d));

    for (const field of emptyMapped) {
      const next = available.shift();
      if (next === undefined) break;
      fields[field] = next;
    }
  }
}
