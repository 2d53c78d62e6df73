// ============================================================================
// LOCATOR CHAIN
// ============================================================================
// Resolves a logical UI target through its ordered QuerySpec strategies.
// Structural strategies are tried first; scripted strategies only after every
// structural one failed. Absence is a result, not an exception.

import {
  DEFAULT_RETRY_CONFIG,
  calculateRetryDelay,
  classifyError,
  isFatalIOError,
  isRetriable,
  isStaleHandleError,
  wrapError,
} from '../types/errors.js';
import { sleep } from '../utils/timing.js';
import type { EngineError, RetryConfig } from '../types/errors.js';
import type { ElementHandle, PageHandle } from '../../page/PageHandle.js';
import type { LocatorStrategy, QuerySpec } from '../../../shared/types.js';

export type ResolveResult =
  | { kind: 'found'; handle: ElementHandle; strategy: LocatorStrategy; strategyIndex: number }
  | { kind: 'not_found'; target: string; attempted: string[] };

export interface ResolveAllResult {
  handles: ElementHandle[];
  /** Strategy that produced the handles, null when none qualified */
  strategy: LocatorStrategy | null;
}

export type ElementAction = { kind: 'click' } | { kind: 'type'; text: string };

export type ActionResult =
  | { kind: 'acted'; attempts: number; strategy: LocatorStrategy }
  | { kind: 'not_found'; target: string; attempted: string[] }
  | { kind: 'failed'; attempts: number; error: EngineError };

export interface LocatorChainOptions {
  retry?: RetryConfig;
}

/**
 * Short label for logs and NotFound reports
 */
export function describeStrategy(strategy: LocatorStrategy): string {
  if (strategy.description) return `${strategy.kind}:${strategy.description}`;
  switch (strategy.kind) {
    case 'css':
    case 'xpath':
      return `${strategy.kind}:${strategy.selector}`;
    case 'text':
      return `text:${strategy.pattern}`;
    case 'role':
      return strategy.name ? `role:${strategy.role}[${strategy.name}]` : `role:${strategy.role}`;
    case 'script':
      return `script:${strategy.script}`;
  }
}

export class LocatorChain {
  private page: PageHandle;
  private retry: RetryConfig;

  constructor(page: PageHandle, options: LocatorChainOptions = {}) {
    this.page = page;
    this.retry = options.retry ?? DEFAULT_RETRY_CONFIG;
  }

  /**
   * First visible (and, when required, interactable) handle for the target
   */
  async resolve(spec: QuerySpec, scope?: ElementHandle): Promise<ResolveResult> {
    const attempted: string[] = [];
    const ordered = this.orderStrategies(spec);

    for (const { strategy, index } of ordered) {
      attempted.push(describeStrategy(strategy));
      const candidates = await this.runStrategy(spec, strategy, scope);

      for (const candidate of candidates) {
        if (strategy.kind === 'script' && !(await this.scrollIntoView(candidate))) {
          continue;
        }
        if (await this.isUsable(candidate, spec)) {
          return { kind: 'found', handle: candidate, strategy, strategyIndex: index };
        }
      }
    }

    return { kind: 'not_found', target: spec.target, attempted };
  }

  /**
   * Usable handles from the first strategy yielding at least minCount of them
   */
  async resolveAll(spec: QuerySpec, scope?: ElementHandle, minCount = 1): Promise<ResolveAllResult> {
    for (const { strategy } of this.orderStrategies(spec)) {
      const candidates = await this.runStrategy(spec, strategy, scope);
      if (candidates.length < minCount) continue;

      const usable: ElementHandle[] = [];
      for (const candidate of candidates) {
        if (await this.isUsable(candidate, spec)) usable.push(candidate);
      }
      if (usable.length >= minCount) {
        return { handles: usable, strategy };
      }
    }
    return { handles: [], strategy: null };
  }

  async count(spec: QuerySpec, scope?: ElementHandle): Promise<number> {
    const { handles } = await this.resolveAll(spec, scope);
    return handles.length;
  }

  /**
   * Resolve then act. A handle that goes stale between the two steps is
   * re-resolved with backoff rather than retried.
   */
  async resolveAndAct(spec: QuerySpec, action: ElementAction, scope?: ElementHandle): Promise<ActionResult> {
    let attempt = 0;

    while (true) {
      const resolved = await this.resolve(spec, scope);
      if (resolved.kind === 'not_found') {
        return resolved;
      }

      try {
        if (action.kind === 'click') {
          await this.page.click(resolved.handle);
        } else {
          await this.page.typeText(resolved.handle, action.text);
        }
        return { kind: 'acted', attempts: attempt + 1, strategy: resolved.strategy };
      } catch (error) {
        if (isFatalIOError(error)) throw error;

        const type = classifyError(error);
        if (isRetriable(type, this.retry) && attempt < this.retry.maxRetries) {
          const delay = calculateRetryDelay(attempt, this.retry);
          console.log(
            `[LocatorChain] ${spec.target}: ${type} on ${action.kind}, re-resolving in ${delay}ms (attempt ${attempt + 1}/${this.retry.maxRetries})`
          );
          attempt++;
          await sleep(delay);
          continue;
        }

        return {
          kind: 'failed',
          attempts: attempt + 1,
          error: wrapError(error, { target: spec.target }),
        };
      }
    }
  }

  // ==========================================================================
  // INTERNALS
  // ==========================================================================

  private orderStrategies(spec: QuerySpec): Array<{ strategy: LocatorStrategy; index: number }> {
    const indexed = spec.strategies.map((strategy, index) => ({ strategy, index }));
    return [
      ...indexed.filter(({ strategy }) => strategy.kind !== 'script'),
      ...indexed.filter(({ strategy }) => strategy.kind === 'script'),
    ];
  }

  private async runStrategy(
    spec: QuerySpec,
    strategy: LocatorStrategy,
    scope?: ElementHandle
  ): Promise<ElementHandle[]> {
    try {
      if (strategy.kind === 'script') {
        return await this.page.queryByScript(strategy.script, strategy.arg, scope);
      }
      return await this.page.query(strategy, scope);
    } catch (error) {
      if (isFatalIOError(error)) throw error;
      if (!isStaleHandleError(error)) {
        const message = error instanceof Error ? error.message : String(error);
        console.warn(`[LocatorChain] ${spec.target}: strategy ${describeStrategy(strategy)} failed: ${message}`);
      }
      return [];
    }
  }

  private async scrollIntoView(handle: ElementHandle): Promise<boolean> {
    try {
      await this.page.scrollTo(handle);
      return true;
    } catch (error) {
      if (isFatalIOError(error)) throw error;
      return false;
    }
  }

  private async isUsable(handle: ElementHandle, spec: QuerySpec): Promise<boolean> {
    try {
      if (!(await handle.isAttached())) return false;
      if (!(await handle.isVisible())) return false;
      if (spec.requireInteractable && !(await handle.isEnabled())) return false;
      for (const selector of spec.excludeWithin ?? []) {
        if (await handle.closest(selector)) return false;
      }
      return true;
    } catch (error) {
      if (isFatalIOError(error)) throw error;
      // Stale or unreadable candidates are skipped
      return false;
    }
  }
}
