// ============================================================================
// PAGE HANDLE CONTRACT
// ============================================================================
// The engine's only view of the rendered document. Supplied by a browser
// driver adapter (Playwright) or an in-process DOM adapter (jsdom).

import type { ScriptArg, StructuralQuery } from '../../shared/types.js';

export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

/**
 * Opaque reference to one live node. Valid only for the current render:
 * any method may throw StaleHandleError once the node is detached.
 */
export interface ElementHandle {
  readonly id: string;
  tagName(): Promise<string>;
  textContent(): Promise<string>;
  /** Rendered text with line breaks between block-level children */
  innerText(): Promise<string>;
  getAttribute(name: string): Promise<string | null>;
  isVisible(): Promise<boolean>;
  /** Not disabled, not aria-disabled */
  isEnabled(): Promise<boolean>;
  isAttached(): Promise<boolean>;
  /** True when this node or an ancestor matches the CSS selector */
  closest(selector: string): Promise<boolean>;
}

export type ScrollTarget = 'top' | 'bottom' | ElementHandle;

export interface PageHandle {
  /** Structural query; scope limits the search to a subtree */
  query(query: StructuralQuery, scope?: ElementHandle): Promise<ElementHandle[]>;
  /** Run a registered element-returning page script */
  queryByScript(scriptName: string, arg?: ScriptArg, scope?: ElementHandle): Promise<ElementHandle[]>;
  /** Run a registered value-returning page script */
  evaluate(scriptName: string, arg?: ScriptArg, scope?: ElementHandle): Promise<JsonValue>;
  scrollTo(target: ScrollTarget): Promise<void>;
  click(handle: ElementHandle): Promise<void>;
  typeText(handle: ElementHandle, text: string): Promise<void>;
  pressKey(key: string): Promise<void>;
  /** Whether the document has finished loading */
  currentReadyState(): Promise<boolean>;
  /** Drop adapter-side references to handles issued so far */
  releaseHandles(): Promise<void>;
}
