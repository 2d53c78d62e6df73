// ============================================================================
// DOM PAGE HANDLE
// ============================================================================
// PageHandle over an in-process DOM Document (jsdom). Used for saved HTML
// snapshots and tests. There is no layout engine: scrolling and paging keys
// only dispatch the events a browser would fire.

import { StaleHandleError } from '../scraper/types/errors.js';
import { getElementScript, getValueScript } from './PageScripts.js';
import type { ScriptArg, StructuralQuery } from '../../shared/types.js';
import type { ElementHandle, JsonValue, PageHandle, ScrollTarget } from './PageHandle.js';

type DomWindow = Window & typeof globalThis;

const BLOCK_TAGS = new Set([
  'ADDRESS', 'ARTICLE', 'ASIDE', 'BLOCKQUOTE', 'DD', 'DIV', 'DL', 'DT', 'FIELDSET',
  'FIGCAPTION', 'FIGURE', 'FOOTER', 'FORM', 'H1', 'H2', 'H3', 'H4', 'H5', 'H6',
  'HEADER', 'HR', 'LI', 'MAIN', 'NAV', 'OL', 'P', 'PRE', 'SECTION', 'TABLE',
  'TBODY', 'THEAD', 'TFOOT', 'TR', 'UL',
]);

const SKIPPED_TAGS = new Set(['SCRIPT', 'STYLE', 'TEMPLATE', 'NOSCRIPT']);

/** Elements carrying an ARIA role implicitly */
const IMPLICIT_ROLES: Record<string, string> = {
  button: 'button, input[type="button"], input[type="submit"]',
  checkbox: 'input[type="checkbox"]',
  link: 'a[href]',
  columnheader: 'th',
  row: 'tr',
  cell: 'td',
  gridcell: 'td',
  table: 'table',
  list: 'ul, ol',
  listitem: 'li',
};

/** Paging keys scroll the viewport in a browser */
const SCROLLING_KEYS = new Set(['End', 'PageDown', 'ArrowDown', 'Space']);

function collapse(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

class DomElementHandle implements ElementHandle {
  constructor(
    readonly id: string,
    private readonly el: Element,
    private readonly owner: DomPageHandle
  ) {}

  /** The live node, or StaleHandleError once it left the document */
  node(): Element {
    if (!this.el.isConnected) {
      throw new StaleHandleError(this.id);
    }
    return this.el;
  }

  async tagName(): Promise<string> {
    return this.node().tagName.toLowerCase();
  }

  async textContent(): Promise<string> {
    return this.node().textContent ?? '';
  }

  async innerText(): Promise<string> {
    return this.owner.renderText(this.node());
  }

  async getAttribute(name: string): Promise<string | null> {
    return this.node().getAttribute(name);
  }

  async isVisible(): Promise<boolean> {
    if (!this.el.isConnected) return false;
    return this.owner.isRendered(this.el);
  }

  async isEnabled(): Promise<boolean> {
    const el = this.node();
    if (el.hasAttribute('disabled')) return false;
    if (el.getAttribute('aria-disabled') === 'true') return false;
    return !el.classList.contains('disabled');
  }

  async isAttached(): Promise<boolean> {
    return this.el.isConnected;
  }

  async closest(selector: string): Promise<boolean> {
    return this.node().closest(selector) !== null;
  }
}

export class DomPageHandle implements PageHandle {
  private document: Document;
  private view: DomWindow;
  private ids: WeakMap<Element, string> = new WeakMap();
  private issued: Map<string, DomElementHandle> = new Map();
  private counter = 0;

  constructor(document: Document) {
    const view = document.defaultView;
    if (!view) {
      throw new Error('DomPageHandle needs a document attached to a window');
    }
    this.document = document;
    this.view = view;
  }

  // ==========================================================================
  // QUERIES
  // ==========================================================================

  async query(query: StructuralQuery, scope?: ElementHandle): Promise<ElementHandle[]> {
    const root = this.rootOf(scope);

    switch (query.kind) {
      case 'css':
        return this.wrapAll(Array.from(root.querySelectorAll(query.selector)));

      case 'xpath':
        return this.wrapAll(this.queryXPath(query.selector, root));

      case 'text': {
        const pattern = new RegExp(query.pattern, 'i');
        const wanted = query.pattern.toLowerCase();
        const candidates = Array.from(root.querySelectorAll(query.tag ?? '*')).filter((el) => {
          if (SKIPPED_TAGS.has(el.tagName)) return false;
          const text = collapse(el.textContent ?? '');
          return query.exact ? text.toLowerCase() === wanted : pattern.test(text);
        });
        // Keep the innermost matches
        const innermost = candidates.filter(
          (el) => !candidates.some((other) => other !== el && el.contains(other))
        );
        return this.wrapAll(innermost);
      }

      case 'role': {
        const implicit = IMPLICIT_ROLES[query.role];
        const selector = implicit ? `[role="${query.role}"], ${implicit}` : `[role="${query.role}"]`;
        const nameRe = query.name ? new RegExp(query.name, 'i') : null;
        const matches = Array.from(root.querySelectorAll(selector)).filter((el) => {
          const explicit = el.getAttribute('role');
          if (explicit && explicit !== query.role) return false;
          if (!nameRe) return true;
          const name = el.getAttribute('aria-label') ?? collapse(el.textContent ?? '');
          return nameRe.test(name.trim()) || nameRe.test(el.getAttribute('title') ?? '');
        });
        return this.wrapAll(matches);
      }
    }
  }

  async queryByScript(scriptName: string, arg: ScriptArg = {}, scope?: ElementHandle): Promise<ElementHandle[]> {
    const script = getElementScript(scriptName);
    return this.wrapAll(script(this.rootOf(scope), arg));
  }

  async evaluate(scriptName: string, arg: ScriptArg = {}, scope?: ElementHandle): Promise<JsonValue> {
    const script = getValueScript(scriptName);
    return script(this.rootOf(scope), arg);
  }

  // ==========================================================================
  // ACTIONS
  // ==========================================================================

  async scrollTo(target: ScrollTarget): Promise<void> {
    if (target === 'top' || target === 'bottom') {
      const scroller = this.document.scrollingElement ?? this.document.documentElement;
      scroller.scrollTop = target === 'top' ? 0 : scroller.scrollHeight;
    } else {
      const el = this.resolve(target);
      if (typeof el.scrollIntoView === 'function') {
        el.scrollIntoView({ block: 'center' });
      }
    }
    this.view.dispatchEvent(new this.view.Event('scroll'));
  }

  async click(handle: ElementHandle): Promise<void> {
    const el = this.resolve(handle);
    el.dispatchEvent(new this.view.MouseEvent('click', { bubbles: true, cancelable: true }));
  }

  async typeText(handle: ElementHandle, text: string): Promise<void> {
    const el = this.resolve(handle);
    if (el instanceof this.view.HTMLInputElement || el instanceof this.view.HTMLTextAreaElement) {
      el.value = text;
    } else {
      el.textContent = text;
    }
    el.dispatchEvent(new this.view.Event('input', { bubbles: true }));
  }

  async pressKey(key: string): Promise<void> {
    const target = this.document.activeElement ?? this.document.body;
    target.dispatchEvent(new this.view.KeyboardEvent('keydown', { key, bubbles: true }));
    target.dispatchEvent(new this.view.KeyboardEvent('keyup', { key, bubbles: true }));
    if (SCROLLING_KEYS.has(key)) {
      this.view.dispatchEvent(new this.view.Event('scroll'));
    }
  }

  async currentReadyState(): Promise<boolean> {
    return this.document.readyState !== 'loading';
  }

  async releaseHandles(): Promise<void> {
    this.issued.clear();
  }

  // ==========================================================================
  // RENDERING HELPERS (used by element handles)
  // ==========================================================================

  /** Whether the element and every ancestor are displayed */
  isRendered(el: Element): boolean {
    let current: Element | null = el;
    while (current) {
      if (current.hasAttribute('hidden')) return false;
      const style = this.view.getComputedStyle(current);
      if (style.display === 'none' || style.visibility === 'hidden') return false;
      current = current.parentElement;
    }
    return true;
  }

  /** Approximation of HTMLElement.innerText: block children on their own lines */
  renderText(el: Element): string {
    const parts: string[] = [];

    const walk = (node: Node): void => {
      if (node.nodeType === node.TEXT_NODE) {
        parts.push(node.textContent ?? '');
        return;
      }
      if (!(node instanceof this.view.Element)) return;
      if (SKIPPED_TAGS.has(node.tagName) || !this.isRenderedSelf(node)) return;
      if (node.tagName === 'BR') {
        parts.push('\n');
        return;
      }

      const block = BLOCK_TAGS.has(node.tagName);
      if (block) parts.push('\n');
      for (const child of Array.from(node.childNodes)) walk(child);
      if (node.tagName === 'TD' || node.tagName === 'TH') parts.push('\t');
      if (block) parts.push('\n');
    };

    for (const child of Array.from(el.childNodes)) walk(child);

    return parts
      .join('')
      .split('\n')
      .map((line) => line.replace(/[ \t\r\f\v]+/g, ' ').trim())
      .filter((line) => line !== '')
      .join('\n');
  }

  private isRenderedSelf(el: Element): boolean {
    if (el.hasAttribute('hidden')) return false;
    const style = this.view.getComputedStyle(el);
    return style.display !== 'none' && style.visibility !== 'hidden';
  }

  // ==========================================================================
  // HANDLE REGISTRY
  // ==========================================================================

  private wrapAll(elements: Element[]): ElementHandle[] {
    return elements.map((el) => this.wrap(el));
  }

  private wrap(el: Element): DomElementHandle {
    let id = this.ids.get(el);
    if (!id) {
      id = `dom-${++this.counter}`;
      this.ids.set(el, id);
    }
    const handle = new DomElementHandle(id, el, this);
    this.issued.set(id, handle);
    return handle;
  }

  private resolve(handle: ElementHandle): Element {
    const issued = this.issued.get(handle.id);
    if (!issued) {
      throw new StaleHandleError(handle.id, `Element handle ${handle.id} was released or never issued here`);
    }
    return issued.node();
  }

  private rootOf(scope?: ElementHandle): Document | Element {
    return scope ? this.resolve(scope) : this.document;
  }

  private queryXPath(expression: string, root: Document | Element): Element[] {
    const result = this.document.evaluate(
      expression,
      root,
      null,
      this.view.XPathResult.ORDERED_NODE_SNAPSHOT_TYPE,
      null
    );
    const out: Element[] = [];
    for (let i = 0; i < result.snapshotLength; i++) {
      const node = result.snapshotItem(i);
      if (node instanceof this.view.Element) out.push(node);
    }
    return out;
  }
}
