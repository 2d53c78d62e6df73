// ============================================================================
// PLAYWRIGHT PAGE HANDLE
// ============================================================================
// PageHandle over a live Playwright page. Every call is bounded by the
// configured timeouts; driver errors are mapped onto the engine taxonomy.

import { errors } from 'playwright';
import type { ElementHandle as PwElementHandle, JSHandle, Page } from 'playwright';
import {
  EngineErrorType,
  FatalIOError,
  OperationTimeoutError,
  StaleHandleError,
  classifyError,
} from '../scraper/types/errors.js';
import { withTimeout } from '../scraper/utils/timing.js';
import { getElementScript, getValueScript } from './PageScripts.js';
import type { EngineConfig } from '../config/EngineConfig.js';
import type { ScriptArg, StructuralQuery } from '../../shared/types.js';
import type { ElementHandle, JsonValue, PageHandle, ScrollTarget } from './PageHandle.js';

type Timeouts = EngineConfig['timeouts'];

/**
 * Translate a driver error into the engine's thrown errors
 */
export function mapDriverError(error: unknown, operation: string, handleId?: string, timeoutMs = 0): Error {
  if (error instanceof StaleHandleError || error instanceof FatalIOError || error instanceof OperationTimeoutError) {
    return error;
  }
  if (error instanceof errors.TimeoutError) {
    return new OperationTimeoutError(operation, timeoutMs);
  }

  switch (classifyError(error)) {
    case EngineErrorType.STALE_HANDLE:
      return new StaleHandleError(handleId ?? 'unknown', `${operation}: element detached`);
    case EngineErrorType.FATAL_IO:
      return new FatalIOError(`${operation}: page is no longer usable`, { cause: error });
    default:
      return error instanceof Error ? error : new Error(String(error));
  }
}

/** Playwright selector string for a structural query */
export function toSelector(query: StructuralQuery): string {
  switch (query.kind) {
    case 'css':
      return `css=${query.selector}`;
    case 'xpath':
      return `xpath=${query.selector}`;
    case 'text': {
      const tag = query.tag ?? '*';
      return query.exact
        ? `${tag}:text-is(${JSON.stringify(query.pattern)})`
        : `${tag}:text-matches(${JSON.stringify(query.pattern)}, "i")`;
    }
    case 'role': {
      if (!query.name) return `role=${query.role}`;
      return `role=${query.role}[name=/${query.name.replace(/\//g, '\\/')}/i]`;
    }
  }
}

class PlaywrightElementHandle implements ElementHandle {
  constructor(
    readonly id: string,
    readonly raw: PwElementHandle<Element>,
    private readonly owner: PlaywrightPageHandle
  ) {}

  tagName(): Promise<string> {
    return this.owner.guard('tagName', this.id, () => this.raw.evaluate((el) => el.tagName.toLowerCase()));
  }

  textContent(): Promise<string> {
    return this.owner.guard('textContent', this.id, async () => (await this.raw.textContent()) ?? '');
  }

  innerText(): Promise<string> {
    return this.owner.guard('innerText', this.id, () =>
      this.raw.evaluate((el) => (el instanceof HTMLElement ? el.innerText : el.textContent ?? ''))
    );
  }

  getAttribute(name: string): Promise<string | null> {
    return this.owner.guard('getAttribute', this.id, () => this.raw.getAttribute(name));
  }

  isVisible(): Promise<boolean> {
    return this.owner.guard('isVisible', this.id, () => this.raw.isVisible());
  }

  isEnabled(): Promise<boolean> {
    return this.owner.guard('isEnabled', this.id, async () => {
      if (!(await this.raw.isEnabled())) return false;
      return this.raw.evaluate(
        (el) => el.getAttribute('aria-disabled') !== 'true' && !el.classList.contains('disabled')
      );
    });
  }

  async isAttached(): Promise<boolean> {
    try {
      return await this.raw.evaluate((el) => el.isConnected);
    } catch (error) {
      const mapped = mapDriverError(error, 'isAttached', this.id);
      if (mapped instanceof FatalIOError) throw mapped;
      return false;
    }
  }

  closest(selector: string): Promise<boolean> {
    return this.owner.guard('closest', this.id, () =>
      this.raw.evaluate((el, sel) => el.closest(sel) !== null, selector)
    );
  }
}

export class PlaywrightPageHandle implements PageHandle {
  private page: Page;
  private timeouts: Timeouts;
  private issued: Map<string, PlaywrightElementHandle> = new Map();
  private counter = 0;

  constructor(page: Page, timeouts: Timeouts) {
    this.page = page;
    this.timeouts = timeouts;
  }

  /**
   * Run a driver call under the query timeout with error mapping
   */
  async guard<T>(operation: string, handleId: string | undefined, fn: () => Promise<T>, timeoutMs = this.timeouts.queryMs): Promise<T> {
    if (this.page.isClosed()) {
      throw new FatalIOError(`${operation}: page is closed`);
    }
    try {
      return await withTimeout(fn(), timeoutMs, operation);
    } catch (error) {
      throw mapDriverError(error, operation, handleId, timeoutMs);
    }
  }

  async query(query: StructuralQuery, scope?: ElementHandle): Promise<ElementHandle[]> {
    const selector = toSelector(query);
    const found = await this.guard(`query ${selector}`, scope?.id, () =>
      scope ? this.resolve(scope).$$(selector) : this.page.$$(selector)
    );
    return found.map((raw) => this.wrap(raw));
  }

  async queryByScript(scriptName: string, arg: ScriptArg = {}, scope?: ElementHandle): Promise<ElementHandle[]> {
    const script = getElementScript(scriptName);
    const listHandle = await this.guard(`script ${scriptName}`, scope?.id, async () => {
      if (scope) return this.resolve(scope).evaluateHandle(script, arg);
      const doc = await this.page.evaluateHandle(() => document);
      try {
        return await doc.evaluateHandle(script, arg);
      } finally {
        await doc.dispose();
      }
    }, this.timeouts.evaluateMs);

    const handles: ElementHandle[] = [];
    const properties = await listHandle.getProperties();
    for (const property of properties.values()) {
      const element = property.asElement();
      if (element) {
        handles.push(this.wrap(element));
      } else {
        await property.dispose();
      }
    }
    await listHandle.dispose();
    return handles;
  }

  async evaluate(scriptName: string, arg: ScriptArg = {}, scope?: ElementHandle): Promise<JsonValue> {
    const script = getValueScript(scriptName);
    return this.guard(`evaluate ${scriptName}`, scope?.id, async () => {
      if (scope) return this.resolve(scope).evaluate(script, arg);
      const doc: JSHandle<Document> = await this.page.evaluateHandle(() => document);
      try {
        return await doc.evaluate(script, arg);
      } finally {
        await doc.dispose();
      }
    }, this.timeouts.evaluateMs);
  }

  async scrollTo(target: ScrollTarget): Promise<void> {
    if (target === 'top' || target === 'bottom') {
      const toBottom = target === 'bottom';
      await this.guard(
        'scrollTo',
        undefined,
        () =>
          this.page.evaluate((bottom) => {
            window.scrollTo(0, bottom ? document.body.scrollHeight : 0);
          }, toBottom),
        this.timeouts.actionMs
      );
      return;
    }
    const raw = this.resolve(target);
    await this.guard(
      'scrollIntoView',
      target.id,
      () => raw.scrollIntoViewIfNeeded({ timeout: this.timeouts.actionMs }),
      this.timeouts.actionMs
    );
  }

  async click(handle: ElementHandle): Promise<void> {
    const raw = this.resolve(handle);
    await this.guard('click', handle.id, () => raw.click({ timeout: this.timeouts.actionMs }), this.timeouts.actionMs);
  }

  async typeText(handle: ElementHandle, text: string): Promise<void> {
    const raw = this.resolve(handle);
    await this.guard('typeText', handle.id, () => raw.fill(text, { timeout: this.timeouts.actionMs }), this.timeouts.actionMs);
  }

  async pressKey(key: string): Promise<void> {
    await this.guard('pressKey', undefined, () => this.page.keyboard.press(key), this.timeouts.actionMs);
  }

  async currentReadyState(): Promise<boolean> {
    return this.guard('readyState', undefined, () =>
      this.page.evaluate(() => document.readyState === 'complete')
    );
  }

  async releaseHandles(): Promise<void> {
    const handles = [...this.issued.values()];
    this.issued.clear();
    for (const handle of handles) {
      try {
        await handle.raw.dispose();
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        console.warn(`[PlaywrightPageHandle] Failed to dispose ${handle.id}: ${message}`);
      }
    }
  }

  private wrap(raw: PwElementHandle<Element>): PlaywrightElementHandle {
    const id = `pw-${++this.counter}`;
    const handle = new PlaywrightElementHandle(id, raw, this);
    this.issued.set(id, handle);
    return handle;
  }

  private resolve(handle: ElementHandle): PwElementHandle<Element> {
    const issued = this.issued.get(handle.id);
    if (!issued) {
      throw new StaleHandleError(handle.id, `Element handle ${handle.id} was released or never issued here`);
    }
    return issued.raw;
  }
}
