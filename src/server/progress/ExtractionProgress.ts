// ============================================================================
// EXTRACTION PROGRESS
// ============================================================================
// Observers (console, GUI, log) subscribe here; the engine never talks to a
// presentation layer directly.

import { EventEmitter } from 'events';
import type { EngineError } from '../scraper/types/errors.js';
import type { LoadProgress } from '../scraper/handlers/LazyLoadConvergence.js';
import type { ExtractionStats, RunStatus } from '../../shared/types.js';

export type ExtractionPhase =
  | 'ready'
  | 'navigate'
  | 'columns'
  | 'estimate'
  | 'load'
  | 'schema'
  | 'extract'
  | 'paginate'
  | 'duplicates'
  | 'done';

export interface ProgressEvents {
  phase: { runId: string; phase: ExtractionPhase; page: number; message: string };
  load: LoadProgress & { runId: string; page: number };
  row: { runId: string; page: number; rowIndex: number; outcome: 'record' | 'skip'; detail: string };
  warning: { runId: string; message: string; error?: EngineError };
  complete: { runId: string; status: RunStatus; stats: ExtractionStats };
}

export type ProgressEventName = keyof ProgressEvents;

export class ExtractionProgress extends EventEmitter {
  publish<K extends ProgressEventName>(event: K, payload: ProgressEvents[K]): void {
    this.emit(event, payload);
  }

  subscribe<K extends ProgressEventName>(event: K, listener: (payload: ProgressEvents[K]) => void): () => void {
    this.on(event, listener);
    return () => {
      this.off(event, listener);
    };
  }
}

/**
 * Log progress events to the console. Returns a function that detaches.
 */
export function attachConsoleReporter(progress: ExtractionProgress, options: { rows?: boolean } = {}): () => void {
  const detach = [
    progress.subscribe('phase', (e) => {
      console.log(`[Progress] ${e.phase} (page ${e.page}): ${e.message}`);
    }),
    progress.subscribe('load', (e) => {
      if (e.iteration % 10 === 0) {
        console.log(`[Progress] Loading page ${e.page}: ${e.bestCount}/${e.targetEstimate} rows after ${e.iteration} iterations`);
      }
    }),
    progress.subscribe('warning', (e) => {
      console.warn(`[Progress] Warning: ${e.message}`);
    }),
    progress.subscribe('complete', (e) => {
      console.log(
        `[Progress] Run ${e.runId} ${e.status}: ${e.stats.rowsExtracted}/${e.stats.rowsAttempted} rows, ` +
          `${e.stats.duplicateTitleCount} duplicate titles, ${e.stats.durationMs}ms`
      );
    }),
  ];

  if (options.rows) {
    detach.push(
      progress.subscribe('row', (e) => {
        console.log(`[Progress] Row ${e.rowIndex} (page ${e.page}) ${e.outcome}: ${e.detail}`);
      })
    );
  }

  return () => detach.forEach((d) => d());
}
