import { JSDOM } from 'jsdom';
import { DomPageHandle } from '../../page/DomPageHandle.js';
import type { EngineConfigInput } from '../../config/EngineConfig.js';

export interface PageFixture {
  dom: JSDOM;
  document: Document;
  page: DomPageHandle;
}

export function createPage(body: string): PageFixture {
  const dom = new JSDOM(`<!DOCTYPE html><html><body>${body}</body></html>`);
  const document = dom.window.document;
  return { dom, document, page: new DomPageHandle(document) };
}

/** Table rows as HTML, one <tr> per array of cell texts */
export function rowsHtml(rows: readonly (readonly string[])[]): string {
  return rows.map((cells) => `<tr>${cells.map((c) => `<td>${c}</td>`).join('')}</tr>`).join('');
}

/** Append n numbered rows to a tbody */
export function appendRows(document: Document, tbody: Element, n: number): void {
  for (let i = 0; i < n; i++) {
    const tr = document.createElement('tr');
    const index = tbody.children.length + 1;
    tr.innerHTML = `<td>Issue ${index}</td><td>Task</td>`;
    tbody.appendChild(tr);
  }
}

export const FAST_CONFIG = {
  timeouts: { readyMs: 2000 },
  convergence: {
    stagnationThreshold: 2,
    recoveryAttempts: 0,
    baseDelayMs: 0,
    stagnationStepMs: 0,
    rowDelayPerRowMs: 0,
    maxDelayMs: 0,
    pagingKeyInterval: 1000,
    showMoreInterval: 1000,
  },
  extraction: { pageSettleMs: 0 },
  retry: { retryDelay: 0 },
} satisfies EngineConfigInput;
