// ============================================================================
// COLUMN CONFIGURATOR
// ============================================================================
// Opens the table settings dialog and turns every column on, so that fields
// hidden by the default view reach the rows. Every step is optional: a table
// without a settings control is extracted with the columns it shows.

import { isFatalIOError, wrapError } from '../types/errors.js';
import { sleep } from '../utils/timing.js';
import type { EngineError } from '../types/errors.js';
import type { ActionResult, LocatorChain } from '../locator/LocatorChain.js';
import type { ElementHandle, PageHandle } from '../../page/PageHandle.js';
import type { QuerySpec } from '../../../shared/types.js';

export type ColumnStep = 'settings' | 'columnsTab' | 'selectAll' | 'confirm';

export interface ColumnTargets {
  settings: QuerySpec;
  columnsTab?: QuerySpec;
  selectAll?: QuerySpec;
  confirm?: QuerySpec;
}

export type ColumnConfigResult =
  | { kind: 'configured'; selectAllClicked: boolean }
  | { kind: 'skipped'; reason: string }
  | { kind: 'incomplete'; step: ColumnStep; error?: EngineError };

export class ColumnConfigurator {
  private page: PageHandle;
  private locator: LocatorChain;
  private targets: ColumnTargets;
  private settleMs: number;

  constructor(page: PageHandle, locator: LocatorChain, targets: ColumnTargets, settleMs = 0) {
    this.page = page;
    this.locator = locator;
    this.targets = targets;
    this.settleMs = settleMs;
  }

  async configure(): Promise<ColumnConfigResult> {
    const opened = await this.locator.resolveAndAct(this.targets.settings, { kind: 'click' });
    if (opened.kind === 'not_found') {
      console.log('[ColumnConfigurator] No table settings control, keeping the visible columns');
      return { kind: 'skipped', reason: 'settings control not found' };
    }
    if (opened.kind === 'failed') {
      console.warn(`[ColumnConfigurator] Settings control failed: ${opened.error.message}`);
      return { kind: 'incomplete', step: 'settings', error: opened.error };
    }
    await sleep(this.settleMs);

    // Some dialogs open straight on the column list
    if (this.targets.columnsTab) {
      const tab = await this.locator.resolveAndAct(this.targets.columnsTab, { kind: 'click' });
      if (tab.kind === 'failed') return this.abandon('columnsTab', tab);
      if (tab.kind === 'acted') await sleep(this.settleMs);
    }

    let selectAllClicked = false;
    if (this.targets.selectAll) {
      const found = await this.locator.resolve(this.targets.selectAll);
      if (found.kind === 'not_found') return this.abandon('selectAll', found);

      if (await this.isChecked(found.handle)) {
        console.log('[ColumnConfigurator] All columns already selected');
      } else {
        const clicked = await this.locator.resolveAndAct(this.targets.selectAll, { kind: 'click' });
        if (clicked.kind !== 'acted') return this.abandon('selectAll', clicked);
        selectAllClicked = true;
      }
    }

    if (this.targets.confirm) {
      const confirmed = await this.locator.resolveAndAct(this.targets.confirm, { kind: 'click' });
      if (confirmed.kind !== 'acted') return this.abandon('confirm', confirmed);
    }
    await sleep(this.settleMs);

    console.log('[ColumnConfigurator] Column selection applied');
    return { kind: 'configured', selectAllClicked };
  }

  /** aria-checked on custom controls, the checked attribute on native boxes */
  private async isChecked(handle: ElementHandle): Promise<boolean> {
    try {
      const aria = await handle.getAttribute('aria-checked');
      if (aria !== null) return aria === 'true';
      return (await handle.getAttribute('checked')) !== null;
    } catch (error) {
      if (isFatalIOError(error)) throw error;
      return false;
    }
  }

  /** Closes the dialog so it does not cover the table */
  private async abandon(step: ColumnStep, result: ActionResult): Promise<ColumnConfigResult> {
    const error = result.kind === 'failed' ? result.error : undefined;
    const detail = result.kind === 'not_found' ? `${result.target} not found` : (error?.message ?? 'no action');
    console.warn(`[ColumnConfigurator] Column selection stopped at ${step}: ${detail}`);
    try {
      await this.page.pressKey('Escape');
    } catch (error) {
      if (isFatalIOError(error)) throw error;
      console.warn(`[ColumnConfigurator] Could not dismiss the dialog: ${wrapError(error).message}`);
    }
    return error ? { kind: 'incomplete', step, error } : { kind: 'incomplete', step };
  }
}
