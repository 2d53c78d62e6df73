// ============================================================================
// CELL SEGMENTER
// ============================================================================
// Splits a rendered row into cells and reads a value out of each cell,
// trying progressively weaker techniques.

import type { ElementHandle, JsonValue, PageHandle } from '../../page/PageHandle.js';

export type SegmentationStrategy = 'role-cells' | 'header-cells' | 'cell-class' | 'direct-children' | 'text-lines';

export type Cell =
  | { kind: 'element'; handle: ElementHandle }
  | { kind: 'text'; text: string };

export interface Segmentation {
  strategy: SegmentationStrategy;
  cells: Cell[];
}

export type ValueSource = 'text' | 'attribute' | 'descendant' | 'script' | 'empty';

export interface CellValue {
  value: string;
  source: ValueSource;
}

const ROLE_CELLS = ':scope > td, :scope > [role="gridcell"], :scope > [role="cell"]';
const NESTED_ROLE_CELLS = '[role="gridcell"], [role="cell"]';
const HEADER_CELLS = ':scope > th, :scope > [role="columnheader"]';
const CLASS_CELLS = ':scope > [class*="cell"], :scope > [class*="Cell"]';
const VALUE_ATTRIBUTES = ['title', 'aria-label', 'value', 'label'];

function elementCells(handles: ElementHandle[]): Cell[] {
  return handles.map((handle): Cell => ({ kind: 'element', handle }));
}

/**
 * Cells of a row: role cells, then cell-class children, then direct
 * children, then the row's text split into lines
 */
export async function segmentRow(page: PageHandle, row: ElementHandle): Promise<Segmentation> {
  const roleCells = await page.query({ kind: 'css', selector: ROLE_CELLS }, row);
  if (roleCells.length > 0) {
    return { strategy: 'role-cells', cells: elementCells(roleCells) };
  }

  const nested = await page.query({ kind: 'css', selector: NESTED_ROLE_CELLS }, row);
  if (nested.length > 0) {
    return { strategy: 'role-cells', cells: elementCells(nested) };
  }

  const headerCells = await page.query({ kind: 'css', selector: HEADER_CELLS }, row);
  if (headerCells.length > 0) {
    return { strategy: 'header-cells', cells: elementCells(headerCells) };
  }

  const classCells = await page.query({ kind: 'css', selector: CLASS_CELLS }, row);
  if (classCells.length > 0) {
    return { strategy: 'cell-class', cells: elementCells(classCells) };
  }

  const children = await page.query({ kind: 'css', selector: ':scope > *' }, row);
  if (children.length > 1) {
    return { strategy: 'direct-children', cells: elementCells(children) };
  }

  const lines = (await row.innerText())
    .split('\n')
    .map((line) => line.trim())
    .filter((line) => line !== '');
  return { strategy: 'text-lines', cells: lines.map((text): Cell => ({ kind: 'text', text })) };
}

/** Plain texts of a segmentation, first technique only (used for schema samples) */
export async function cellTexts(cells: readonly Cell[]): Promise<string[]> {
  const texts: string[] = [];
  for (const cell of cells) {
    texts.push(cell.kind === 'text' ? cell.text : (await cell.handle.innerText()).trim());
  }
  return texts;
}

/**
 * Value of one cell: rendered text, then value-bearing attributes, then the
 * first descendant with text, then script-evaluated text content
 */
export async function readCellValue(page: PageHandle, cell: Cell): Promise<CellValue> {
  if (cell.kind === 'text') {
    return { value: cell.text, source: cell.text.trim() === '' ? 'empty' : 'text' };
  }
  const { handle } = cell;

  const rendered = await handle.innerText();
  if (rendered.trim() !== '') return { value: rendered, source: 'text' };

  for (const name of VALUE_ATTRIBUTES) {
    const attr = await handle.getAttribute(name);
    if (attr && attr.trim() !== '') return { value: attr, source: 'attribute' };
  }

  const descendants = await page.query({ kind: 'css', selector: '*' }, handle);
  for (const descendant of descendants) {
    const text = await descendant.textContent();
    if (text.trim() !== '') return { value: text, source: 'descendant' };
    for (const name of VALUE_ATTRIBUTES) {
      const attr = await descendant.getAttribute(name);
      if (attr && attr.trim() !== '') return { value: attr, source: 'descendant' };
    }
  }

  const scripted = await page.evaluate('cellText', {}, handle);
  if (typeof scripted === 'string' && scripted.trim() !== '') {
    return { value: scripted, source: 'script' };
  }

  return { value: '', source: 'empty' };
}

function stringsOf(value: JsonValue): string[] {
  if (!Array.isArray(value)) return [];
  return value.filter((v): v is string => typeof v === 'string');
}

/** Class names on an element and its descendants */
export async function classNamesOf(page: PageHandle, handle: ElementHandle): Promise<string[]> {
  const tokens = stringsOf(await page.evaluate('classTokens', {}, handle));
  return tokens.flatMap((t) => t.split(/\s+/)).filter((t) => t !== '');
}
