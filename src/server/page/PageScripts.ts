// ============================================================================
// PAGE SCRIPTS
// ============================================================================
// Named DOM functions that QuerySpecs and the convergence loop reference by
// name. Each runs inside the page (Playwright serializes it), so it must be
// self-contained: no imports, no closures, no globals other than the DOM
// reached through `root`.

import type { ScriptArg } from '../../shared/types.js';
import type { JsonValue } from './PageHandle.js';

export type ScriptRoot = Document | Element;
export type ElementScript = (root: ScriptRoot, arg: ScriptArg) => Element[];
export type ValueScript = (root: ScriptRoot, arg: ScriptArg) => JsonValue;

// ============================================================================
// ELEMENT SCRIPTS
// ============================================================================

/** Rows with at least two non-empty cells and no header cells */
const dataRows: ElementScript = (root) => {
  const rows = Array.from(root.querySelectorAll('tr, [role="row"]'));
  return rows.filter((row) => {
    if (row.querySelector('th, [role="columnheader"]')) return false;
    const filled = Array.from(row.children).filter((c) => (c.textContent ?? '').trim() !== '');
    return filled.length >= 2;
  });
};

/** First row that carries header cells */
const headerRow: ElementScript = (root) => {
  const rows = Array.from(root.querySelectorAll('tr, [role="row"]'));
  const header = rows.find((row) => row.querySelector('th, [role="columnheader"]') !== null);
  return header ? [header] : [];
};

/** Clickable controls whose text or aria-label matches one of arg.labels */
const controlsByLabel: ElementScript = (root, arg) => {
  const labels = Array.isArray(arg.labels) ? arg.labels.map((l) => l.toLowerCase()) : [];
  const prefix = arg.prefix === true;
  const candidates = Array.from(
    root.querySelectorAll('button, a, [role="button"], [role="tab"], [role="link"]')
  );
  return candidates.filter((el) => {
    const texts = [
      (el.textContent ?? '').replace(/\s+/g, ' ').trim().toLowerCase(),
      (el.getAttribute('aria-label') ?? '').trim().toLowerCase(),
    ];
    return texts.some((text) =>
      text !== '' && labels.some((label) => text === label || (prefix && text.startsWith(label)))
    );
  });
};

/** Leaf elements showing only a number, styled as a badge or counter */
const numericBadges: ElementScript = (root) => {
  const all = Array.from(root.querySelectorAll('[class]'));
  return all.filter((el) => {
    if (el.children.length > 0) return false;
    const cls = (el.getAttribute('class') ?? '').toLowerCase();
    if (!/badge|count/.test(cls)) return false;
    return /^\d+$/.test((el.textContent ?? '').trim());
  });
};

// ============================================================================
// VALUE SCRIPTS
// ============================================================================

/** Full text content, including an open shadow root */
const cellText: ValueScript = (root) => {
  let text = root.textContent ?? '';
  if ('shadowRoot' in root && root.shadowRoot) {
    text = `${text} ${root.shadowRoot.textContent ?? ''}`;
  }
  return text.replace(/\s+/g, ' ').trim();
};

/** Class attribute values of the root and its descendants */
const classTokens: ValueScript = (root) => {
  const out: string[] = [];
  if ('getAttribute' in root) {
    const own = root.getAttribute('class');
    if (own) out.push(own);
  }
  for (const el of Array.from(root.querySelectorAll('[class]'))) {
    const cls = el.getAttribute('class');
    if (cls) out.push(cls);
  }
  return out;
};

/** Scroll every nested scrollable container to its bottom */
const scrollContainers: ValueScript = (root) => {
  const doc = 'documentElement' in root ? root : root.ownerDocument;
  const view = doc.defaultView;
  if (!view) return 0;
  let scrolled = 0;
  for (const el of Array.from(doc.querySelectorAll('*'))) {
    if (el.scrollHeight <= el.clientHeight + 10) continue;
    const overflow = view.getComputedStyle(el).overflowY;
    if (overflow === 'auto' || overflow === 'scroll') {
      el.scrollTop = el.scrollHeight;
      scrolled++;
    }
  }
  return scrolled;
};

/** Fire scroll and resize events so virtualized lists re-render */
const rerender: ValueScript = (root) => {
  const doc = 'documentElement' in root ? root : root.ownerDocument;
  const view = doc.defaultView;
  if (!view) return 0;
  view.dispatchEvent(new view.Event('resize'));
  view.dispatchEvent(new view.Event('scroll'));
  doc.dispatchEvent(new view.Event('scroll', { bubbles: true }));
  return 3;
};

export const ELEMENT_SCRIPTS: Readonly<Record<string, ElementScript>> = {
  dataRows,
  headerRow,
  controlsByLabel,
  numericBadges,
};

export const VALUE_SCRIPTS: Readonly<Record<string, ValueScript>> = {
  cellText,
  classTokens,
  scrollContainers,
  rerender,
};

export function getElementScript(name: string): ElementScript {
  const script = ELEMENT_SCRIPTS[name];
  if (!script) throw new Error(`Unknown element script in locator config: ${name}`);
  return script;
}

export function getValueScript(name: string): ValueScript {
  const script = VALUE_SCRIPTS[name];
  if (!script) throw new Error(`Unknown value script: ${name}`);
  return script;
}
