// ============================================================================
// PAGINATION HANDLER
// ============================================================================
// Moves between pages of the issue list through the next-page control

import { isFatalIOError } from '../types/errors.js';
import { sleep } from '../utils/timing.js';
import type { LocatorChain } from '../locator/LocatorChain.js';
import type { QuerySpec } from '../../../shared/types.js';

/**
 * Pagination configuration
 */
export interface PaginationConfig {
  /** QuerySpec for the next-page control */
  nextPage: QuerySpec;
  /** Rows, used to detect a click that did not change the page */
  rows: QuerySpec;
  /** Maximum number of pages to process */
  maxPages: number;
  /** Delay after clicking next page in ms */
  waitAfterClick: number;
}

/**
 * Pagination state
 */
export interface PaginationState {
  currentPage: number;
  hasNextPage: boolean;
  totalPagesScraped: number;
}

export class PaginationHandler {
  private locator: LocatorChain;
  private config: PaginationConfig;
  private state: PaginationState;

  constructor(locator: LocatorChain, config: PaginationConfig) {
    this.locator = locator;
    this.config = config;
    this.state = {
      currentPage: 1,
      hasNextPage: true,
      totalPagesScraped: 0,
    };
  }

  /**
   * Check if we should continue to next page
   */
  shouldContinue(): boolean {
    return this.state.currentPage < this.config.maxPages && this.state.hasNextPage;
  }

  /** Record that the current page has been processed */
  markPageScraped(): void {
    this.state.totalPagesScraped++;
  }

  /**
   * Click the next-page control. A missing or disabled control, or a click
   * that leaves the first row unchanged, ends paging.
   */
  async goToNextPage(): Promise<boolean> {
    const before = await this.firstRowText();

    try {
      const result = await this.locator.resolveAndAct(this.config.nextPage, { kind: 'click' });
      if (result.kind !== 'acted') {
        console.log(
          result.kind === 'not_found'
            ? '[PaginationHandler] No next page found'
            : `[PaginationHandler] Next page click failed: ${result.error.message}`
        );
        this.state.hasNextPage = false;
        return false;
      }
    } catch (error) {
      if (isFatalIOError(error)) throw error;
      const message = error instanceof Error ? error.message : String(error);
      console.error(`[PaginationHandler] Failed to navigate: ${message}`);
      this.state.hasNextPage = false;
      return false;
    }

    await sleep(this.config.waitAfterClick);

    const after = await this.firstRowText();
    if (before !== null && after === before) {
      console.log('[PaginationHandler] Page did not change after click, stopping');
      this.state.hasNextPage = false;
      return false;
    }

    this.state.currentPage++;
    console.log(`[PaginationHandler] Navigated to page ${this.state.currentPage}`);
    return true;
  }

  /**
   * Get current pagination state
   */
  getState(): PaginationState {
    return { ...this.state };
  }

  private async firstRowText(): Promise<string | null> {
    const { handles } = await this.locator.resolveAll(this.config.rows);
    const first = handles[0];
    if (!first) return null;
    try {
      return await first.innerText();
    } catch (error) {
      if (isFatalIOError(error)) throw error;
      return null;
    }
  }
}
