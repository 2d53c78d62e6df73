// ============================================================================
// COUNT PROBE
// ============================================================================
// Best-effort estimate of how many rows the data set holds

import { isFatalIOError } from '../types/errors.js';
import type { EngineConfig } from '../../config/EngineConfig.js';
import type { LocatorChain } from '../locator/LocatorChain.js';
import type { ElementHandle } from '../../page/PageHandle.js';
import type { QuerySpec, TargetEstimate } from '../../../shared/types.js';

export interface CountProbeTargets {
  rows: QuerySpec;
  caption?: QuerySpec;
  badge?: QuerySpec;
}

function toCount(raw: string): number | null {
  const value = Number(raw.replace(/[,.\s]/g, ''));
  return Number.isInteger(value) && value > 0 ? value : null;
}

/**
 * Total from a caption: "Issues (N)", "N of M", "1-20 of M", "(N)"
 */
export function parseCountCaption(text: string): number | null {
  const collapsed = text.replace(/\s+/g, ' ').trim();

  const labelled = collapsed.match(/Issues\s*\((\d[\d,.]*)\)/i);
  if (labelled?.[1]) return toCount(labelled[1]);

  const ofTotal = collapsed.match(/\b\d[\d,.]*(?:\s*[-–]\s*\d[\d,.]*)?\s+of\s+(\d[\d,.]*)/i);
  if (ofTotal?.[1]) return toCount(ofTotal[1]);

  const parenthesized = collapsed.match(/\((\d[\d,.]*)\)/);
  if (parenthesized?.[1]) return toCount(parenthesized[1]);

  return null;
}

/** A badge holds nothing but a number */
export function parseBadge(text: string): number | null {
  const trimmed = text.trim();
  return /^\d[\d,.]*$/.test(trimmed) ? toCount(trimmed) : null;
}

export class CountProbe {
  private locator: LocatorChain;
  private targets: CountProbeTargets;
  private config: EngineConfig['estimate'];

  constructor(locator: LocatorChain, targets: CountProbeTargets, config: EngineConfig['estimate']) {
    this.locator = locator;
    this.targets = targets;
    this.config = config;
  }

  async estimate(override?: number): Promise<TargetEstimate> {
    if (override !== undefined && override > 0) {
      console.log(`[CountProbe] Using target override: ${override}`);
      return { value: override, source: 'override' };
    }

    if (this.targets.caption) {
      const { handles } = await this.locator.resolveAll(this.targets.caption);
      for (const handle of handles) {
        const count = parseCountCaption(await this.readText(handle));
        if (count !== null) {
          console.log(`[CountProbe] Caption reports ${count} items`);
          return { value: count, source: 'caption' };
        }
      }
    }

    if (this.targets.badge) {
      const { handles } = await this.locator.resolveAll(this.targets.badge);
      for (const handle of handles) {
        const count = parseBadge(await this.readText(handle));
        if (count !== null) {
          console.log(`[CountProbe] Badge reports ${count} items`);
          return { value: count, source: 'badge' };
        }
      }
    }

    const visible = await this.locator.count(this.targets.rows);
    const scaled = Math.ceil(visible * this.config.multiplier);
    const value = Math.min(Math.max(scaled, this.config.defaultEstimate), this.config.ceiling);
    console.log(`[CountProbe] No count caption; estimating ${value} from ${visible} visible rows`);
    return { value, source: visible > 0 ? 'visible-rows' : 'default' };
  }

  /** Text of a candidate; one that went stale or timed out reads as empty */
  private async readText(handle: ElementHandle): Promise<string> {
    try {
      return await handle.textContent();
    } catch (error) {
      if (isFatalIOError(error)) throw error;
      const message = error instanceof Error ? error.message : String(error);
      console.warn(`[CountProbe] Skipping unreadable count candidate: ${message}`);
      return '';
    }
  }
}
