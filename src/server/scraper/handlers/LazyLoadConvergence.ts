// ============================================================================
// LAZY LOAD CONVERGENCE
// ============================================================================
// Drives scrolling, paging keys and "show more" clicks until the rendered row
// count reaches the target, stops growing, or the iteration budget runs out.

import { isFatalIOError } from '../types/errors.js';
import { sleep } from '../utils/timing.js';
import type { EngineConfig } from '../../config/EngineConfig.js';
import type { LocatorChain } from '../locator/LocatorChain.js';
import type { PageHandle } from '../../page/PageHandle.js';
import type { ConvergenceResult, ConvergenceState, LoadState, QuerySpec } from '../../../shared/types.js';

export interface LoadProgress {
  iteration: number;
  rowCount: number;
  bestCount: number;
  targetEstimate: number;
  noChangeStreak: number;
}

export interface LazyLoadTargets {
  rows: QuerySpec;
  showMore: QuerySpec;
}

export interface LazyLoadOptions {
  onProgress?: (progress: LoadProgress) => void;
}

type ConvergenceConfig = EngineConfig['convergence'];

/**
 * Delay before counting: base + stagnation factor + row factor, capped
 */
export function adaptiveDelay(state: LoadState, config: ConvergenceConfig): number {
  const stagnation = Math.min(state.noChangeStreak * config.stagnationStepMs, config.stagnationCapMs);
  const rows = Math.min(state.bestCount * config.rowDelayPerRowMs, config.rowDelayCapMs);
  return Math.min(config.baseDelayMs + stagnation + rows, config.maxDelayMs);
}

export function isSatisfied(count: number, targetEstimate: number, ratio: number): boolean {
  if (targetEstimate <= 0) return false;
  return count >= targetEstimate || count >= targetEstimate * ratio;
}

export class LazyLoadConvergence {
  private page: PageHandle;
  private locator: LocatorChain;
  private targets: LazyLoadTargets;
  private config: ConvergenceConfig;
  private options: LazyLoadOptions;

  constructor(
    page: PageHandle,
    locator: LocatorChain,
    targets: LazyLoadTargets,
    config: ConvergenceConfig,
    options: LazyLoadOptions = {}
  ) {
    this.page = page;
    this.locator = locator;
    this.targets = targets;
    this.config = config;
    this.options = options;
  }

  /**
   * Load rows until satisfied, stagnant or exhausted. Always returns the best
   * count observed; never throws except on a lost page.
   */
  async loadAll(targetEstimate: number, maxIterations: number = this.config.maxIterations): Promise<ConvergenceResult> {
    const initial = await this.countRows();
    const state: LoadState = {
      previousCount: initial,
      noChangeStreak: 0,
      iteration: 0,
      targetEstimate,
      bestCount: initial,
      recoveries: 0,
    };
    const history: number[] = [];

    console.log(`[LazyLoadConvergence] Starting with ${initial} rows, target ${targetEstimate}`);

    if (isSatisfied(initial, targetEstimate, this.config.satisfiedRatio)) {
      return this.finish(state, 'satisfied', history);
    }

    while (state.iteration < maxIterations) {
      state.iteration++;
      await this.page.releaseHandles();
      await this.triggerLoad(state.iteration);
      await sleep(adaptiveDelay(state, this.config));

      const count = await this.countRows();
      const grew = count > state.bestCount;
      state.previousCount = count;
      state.bestCount = Math.max(state.bestCount, count);
      state.noChangeStreak = grew ? 0 : state.noChangeStreak + 1;
      history.push(state.bestCount);
      this.report(state);

      if (grew) {
        console.log(`[LazyLoadConvergence] Iteration ${state.iteration}: ${state.bestCount}/${targetEstimate} rows`);
      }

      if (isSatisfied(state.bestCount, targetEstimate, this.config.satisfiedRatio)) {
        return this.finish(state, 'satisfied', history);
      }

      if (state.noChangeStreak >= this.config.stagnationThreshold) {
        if (state.recoveries < this.config.recoveryAttempts) {
          state.recoveries++;
          if (await this.recover(state)) {
            state.noChangeStreak = 0;
            history.push(state.bestCount);
            this.report(state);
            if (isSatisfied(state.bestCount, targetEstimate, this.config.satisfiedRatio)) {
              return this.finish(state, 'satisfied', history);
            }
            continue;
          }
        }
        return this.finish(state, 'stagnant', history);
      }
    }

    return this.finish(state, 'exhausted', history);
  }

  // ==========================================================================
  // LOAD TRIGGERS
  // ==========================================================================

  private async triggerLoad(iteration: number): Promise<void> {
    await this.attempt('scroll to bottom', () => this.page.scrollTo('bottom'));
    await this.attempt('scroll containers', () => this.page.evaluate('scrollContainers'));

    if (iteration % this.config.pagingKeyInterval === 0) {
      await this.attempt('paging keys', async () => {
        await this.page.pressKey('PageDown');
        await this.page.pressKey('End');
      });
    }

    if (iteration % this.config.showMoreInterval === 0) {
      await this.attempt('show more', async () => {
        const result = await this.locator.resolveAndAct(this.targets.showMore, { kind: 'click' });
        if (result.kind === 'acted') {
          console.log(`[LazyLoadConvergence] Clicked "show more" control (iteration ${iteration})`);
        }
      });
    }
  }

  /**
   * Forced re-render plus interaction with the last row. True when rows grew.
   */
  private async recover(state: LoadState): Promise<boolean> {
    const before = state.bestCount;
    console.log(`[LazyLoadConvergence] No growth for ${state.noChangeStreak} iterations at ${before} rows, attempting recovery`);

    await this.attempt('re-render events', () => this.page.evaluate('rerender'));
    await this.attempt('scroll to top', () => this.page.scrollTo('top'));
    await this.attempt('scroll to bottom', () => this.page.scrollTo('bottom'));
    await this.attempt('last row', async () => {
      const { handles } = await this.locator.resolveAll(this.targets.rows);
      const last = handles[handles.length - 1];
      if (last) {
        await this.page.scrollTo(last);
        await this.page.pressKey('End');
      }
    });
    await sleep(this.config.maxDelayMs);

    const count = await this.countRows();
    state.previousCount = count;
    state.bestCount = Math.max(state.bestCount, count);
    const grew = state.bestCount > before;
    console.log(
      grew
        ? `[LazyLoadConvergence] Recovery loaded ${state.bestCount - before} more rows`
        : '[LazyLoadConvergence] Recovery produced no new rows'
    );
    return grew;
  }

  // ==========================================================================
  // HELPERS
  // ==========================================================================

  private async countRows(): Promise<number> {
    return this.locator.count(this.targets.rows);
  }

  /** Run one load trigger; only a lost page is allowed to escape */
  private async attempt(label: string, action: () => Promise<unknown>): Promise<void> {
    try {
      await action();
    } catch (error) {
      if (isFatalIOError(error)) throw error;
      const message = error instanceof Error ? error.message : String(error);
      console.warn(`[LazyLoadConvergence] ${label} failed: ${message}`);
    }
  }

  private report(state: LoadState): void {
    this.options.onProgress?.({
      iteration: state.iteration,
      rowCount: state.previousCount,
      bestCount: state.bestCount,
      targetEstimate: state.targetEstimate,
      noChangeStreak: state.noChangeStreak,
    });
  }

  private finish(state: LoadState, outcome: ConvergenceState, history: number[]): ConvergenceResult {
    console.log(
      `[LazyLoadConvergence] ${outcome} after ${state.iteration} iterations: ${state.bestCount}/${state.targetEstimate} rows`
    );
    return {
      finalRowCount: state.bestCount,
      state: outcome,
      iterations: state.iteration,
      recoveries: state.recoveries,
      targetEstimate: state.targetEstimate,
      history,
    };
  }
}
