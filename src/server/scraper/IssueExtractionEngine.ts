// ============================================================================
// ISSUE EXTRACTION ENGINE
// ============================================================================
// Orchestrates one run: readiness -> navigation -> columns -> target estimate -> per page
// (converge, infer schema, extract rows, next page) -> duplicate statistics.

import { v4 as uuidv4 } from 'uuid';
import { resolveEngineConfig } from '../config/EngineConfig.js';
import { getDefaultCatalog } from '../config/LocatorCatalog.js';
import { getDefaultVocabulary } from '../config/FieldVocabulary.js';
import { ExtractionProgress } from '../progress/ExtractionProgress.js';
import { LocatorChain } from './locator/LocatorChain.js';
import { TableSchemaInference } from './schema/TableSchemaInference.js';
import { LazyLoadConvergence, isSatisfied } from './handlers/LazyLoadConvergence.js';
import { CountProbe } from './handlers/CountProbe.js';
import { PaginationHandler } from './handlers/PaginationHandler.js';
import { ColumnConfigurator } from './handlers/ColumnConfigurator.js';
import { RowExtractor } from './extract/RowExtractor.js';
import { computeDuplicateStats } from './utils/RowSignature.js';
import { sleep } from './utils/timing.js';
import { EngineErrorType, createEngineError, isFatalIOError, wrapError } from './types/errors.js';
import type { EngineError } from './types/errors.js';
import type { EngineConfig, EngineConfigInput } from '../config/EngineConfig.js';
import type { LocatorCatalog } from '../config/LocatorCatalog.js';
import type { FieldVocabulary } from '../config/FieldVocabulary.js';
import type { ExtractionPhase } from '../progress/ExtractionProgress.js';
import type { PageHandle } from '../page/PageHandle.js';
import type {
  ConvergenceResult,
  ExtractionStats,
  IssueRecord,
  RunStatus,
  SchemaMap,
  TargetEstimate,
} from '../../shared/types.js';

export interface EngineOptions {
  config?: EngineConfigInput;
  catalog?: LocatorCatalog;
  vocabulary?: FieldVocabulary;
  progress?: ExtractionProgress;
}

export interface SkippedRow {
  page: number;
  rowIndex: number;
  reason: string;
}

export interface ExtractionRunResult {
  runId: string;
  status: RunStatus;
  /** Every extracted record in page order; duplicates retained */
  records: IssueRecord[];
  stats: ExtractionStats;
  duplicateTitles: string[];
  skipped: SkippedRow[];
  errors: EngineError[];
}

/** Rows recognised as header rows are not data rows */
const HEADER_ROW_REASON = 'header row';

const READY_POLL_MS = 100;

export class IssueExtractionEngine {
  readonly progress: ExtractionProgress;
  private page: PageHandle;
  private config: EngineConfig;
  private catalog: LocatorCatalog;
  private vocabulary: FieldVocabulary;

  constructor(page: PageHandle, options: EngineOptions = {}) {
    this.page = page;
    this.config = resolveEngineConfig(options.config);
    this.catalog = options.catalog ?? getDefaultCatalog();
    this.vocabulary = options.vocabulary ?? getDefaultVocabulary();
    this.progress = options.progress ?? new ExtractionProgress();
  }

  /**
   * Run the full pipeline. Partial results are returned; only a lost page
   * (FatalIOError) aborts the run.
   */
  async run(): Promise<ExtractionRunResult> {
    const runId = uuidv4();
    const startTime = Date.now();
    const errors: EngineError[] = [];
    const records: IssueRecord[] = [];
    const skipped: SkippedRow[] = [];
    const convergence: ConvergenceResult[] = [];
    let schema: SchemaMap | null = null;
    let rowsAttempted = 0;
    let rowCounter = 0;
    let pageNumber = 1;

    const rowsSpec = this.catalog.get('issueRows');
    const locator = new LocatorChain(this.page, { retry: this.config.retry });
    const phase = (name: ExtractionPhase, message: string): void => {
      this.progress.publish('phase', { runId, phase: name, page: pageNumber, message });
    };
    const warn = (error: EngineError): void => {
      errors.push(error);
      this.progress.publish('warning', { runId, message: error.message, error });
    };

    console.log(`[IssueExtractionEngine] Starting run ${runId}`);

    try {
      phase('ready', 'Waiting for page readiness');
      if (!(await this.waitUntilReady())) {
        warn(createEngineError(`Page not ready after ${this.config.timeouts.readyMs}ms, continuing`, EngineErrorType.TIMEOUT));
      }

      phase('navigate', 'Activating navigation targets');
      for (const spec of this.catalog.navigationTargets()) {
        const result = await locator.resolveAndAct(spec, { kind: 'click' });
        if (result.kind === 'acted') {
          console.log(`[IssueExtractionEngine] Activated ${spec.target}`);
        } else if (result.kind === 'not_found') {
          console.log(`[IssueExtractionEngine] Navigation target ${spec.target} not present, skipping`);
        } else {
          warn(result.error);
        }
      }

      const settings = this.optionalSpec('columnSettings');
      if (this.config.extraction.configureColumns && settings) {
        phase('columns', 'Selecting all columns');
        const configurator = new ColumnConfigurator(
          this.page,
          locator,
          {
            settings,
            columnsTab: this.optionalSpec('selectColumnsTab'),
            selectAll: this.optionalSpec('selectAllColumns'),
            confirm: this.optionalSpec('confirmColumns'),
          },
          this.config.extraction.pageSettleMs
        );
        const columns = await configurator.configure();
        if (columns.kind === 'incomplete') {
          warn(
            columns.error ??
              createEngineError(
                `Column selection stopped at ${columns.step}, extracting the visible columns`,
                EngineErrorType.NOT_FOUND
              )
          );
        }
      }

      phase('estimate', 'Estimating row count');
      const probe = new CountProbe(
        locator,
        {
          rows: rowsSpec,
          caption: this.optionalSpec('itemCountCaption'),
          badge: this.optionalSpec('itemCountBadge'),
        },
        this.config.estimate
      );
      const targetEstimate: TargetEstimate = await probe.estimate(this.config.targetCountOverride);

      const loader = new LazyLoadConvergence(
        this.page,
        locator,
        { rows: rowsSpec, showMore: this.catalog.get('showMore') },
        this.config.convergence,
        {
          onProgress: (p) => this.progress.publish('load', { ...p, runId, page: pageNumber }),
        }
      );
      const inference = new TableSchemaInference(this.page, locator, this.vocabulary, {
        minHeaderFields: this.config.extraction.minHeaderFields,
        headerCells: this.catalog.get('headerCells'),
      });
      const extractor = new RowExtractor(this.page, this.vocabulary, {
        maxFieldLength: this.config.extraction.maxFieldLength,
        emptyValue: this.config.extraction.emptyValue,
      });
      const pagination = new PaginationHandler(locator, {
        nextPage: this.catalog.get('nextPage'),
        rows: rowsSpec,
        maxPages: this.config.extraction.maxPages,
        waitAfterClick: this.config.extraction.pageSettleMs,
      });

      while (true) {
        phase('load', `Loading rows (target ${targetEstimate.value})`);
        const remaining = Math.max(1, targetEstimate.value - rowsAttempted);
        const loaded = await loader.loadAll(remaining);
        convergence.push(loaded);
        // A page of a paged table rarely reaches the total; only a spent budget is reported
        if (loaded.state === 'exhausted') {
          warn(
            createEngineError(
              `Page ${pageNumber} load exhausted at ${loaded.finalRowCount}/${loaded.targetEstimate} rows`,
              EngineErrorType.CONVERGENCE_INCOMPLETE,
              { pageNumber }
            )
          );
        }

        await this.page.releaseHandles();
        if (!schema) {
          const sampleRows = (await locator.resolveAll(rowsSpec)).handles;
          if (sampleRows.length > 0) {
            phase('schema', 'Inferring column schema');
            const header = await locator.resolve(this.catalog.get('headerRow'));
            schema = await inference.infer(
              header.kind === 'found' ? header.handle : null,
              sampleRows.slice(0, this.config.extraction.sampleSize)
            );
          }
        }

        // Resolved after inference, which may have triggered a re-render
        const rows = (await locator.resolveAll(rowsSpec)).handles;

        phase('extract', `Extracting ${rows.length} rows`);
        for (const row of rows) {
          if (!schema) break;
          const rowIndex = rowCounter++;
          const outcome = await extractor.extract(row, schema, rowIndex);

          if (outcome.kind === 'record') {
            rowsAttempted++;
            records.push(outcome.record);
            this.progress.publish('row', { runId, page: pageNumber, rowIndex, outcome: 'record', detail: outcome.record.Title ?? '' });
          } else if (outcome.reason !== HEADER_ROW_REASON) {
            rowsAttempted++;
            skipped.push({ page: pageNumber, rowIndex, reason: outcome.reason });
            this.progress.publish('row', { runId, page: pageNumber, rowIndex, outcome: 'skip', detail: outcome.reason });
          }
        }
        pagination.markPageScraped();

        if (!pagination.shouldContinue()) break;
        phase('paginate', 'Looking for next page');
        await this.page.releaseHandles();
        if (!(await pagination.goToNextPage())) break;
        pageNumber++;
      }

      phase('duplicates', 'Computing duplicate statistics');
      const duplicates = computeDuplicateStats(records);
      if (duplicates.duplicateTitleCount > 0) {
        console.log(
          `[IssueExtractionEngine] ${duplicates.duplicateTitleCount} titles occur more than once (all rows retained)`
        );
      }

      const stats: ExtractionStats = {
        runId,
        rowsAttempted,
        rowsExtracted: records.length,
        rowsSkipped: skipped.length,
        duplicateTitleCount: duplicates.duplicateTitleCount,
        duplicateSignatureCount: duplicates.duplicateSignatureCount,
        pagesProcessed: pagination.getState().totalPagesScraped,
        targetEstimate,
        convergence,
        schema,
        durationMs: Date.now() - startTime,
      };
      const status = this.runStatus(records.length, rowsAttempted, skipped.length, convergence, targetEstimate);

      phase('done', `Run ${status}`);
      this.progress.publish('complete', { runId, status, stats });
      console.log(
        `[IssueExtractionEngine] Run ${runId} ${status}: ${records.length}/${rowsAttempted} rows in ${stats.durationMs}ms`
      );

      return { runId, status, records, stats, duplicateTitles: duplicates.duplicateTitles, skipped, errors };
    } catch (error) {
      const engineError = wrapError(error, { pageNumber });
      console.error(`[IssueExtractionEngine] Run ${runId} aborted (${engineError.type}): ${engineError.message}`);
      this.progress.publish('warning', { runId, message: `Run aborted: ${engineError.message}`, error: engineError });
      throw error;
    }
  }

  /**
   * complete: no skipped rows and either the target was reached across all
   * pages, or the target was only a guess and loading ended without
   * running out of iterations
   */
  private runStatus(
    extracted: number,
    attempted: number,
    skipped: number,
    convergence: ConvergenceResult[],
    estimate: TargetEstimate
  ): RunStatus {
    if (extracted === 0) return 'empty';
    if (skipped > 0) return 'partial';
    if (isSatisfied(attempted, estimate.value, this.config.convergence.satisfiedRatio)) return 'complete';

    const guessed = estimate.source === 'visible-rows' || estimate.source === 'default';
    return guessed && convergence.every((c) => c.state !== 'exhausted') ? 'complete' : 'partial';
  }

  private optionalSpec(target: string) {
    return this.catalog.has(target) ? this.catalog.get(target) : undefined;
  }

  private async waitUntilReady(): Promise<boolean> {
    const deadline = Date.now() + this.config.timeouts.readyMs;
    while (true) {
      try {
        if (await this.page.currentReadyState()) return true;
      } catch (error) {
        if (isFatalIOError(error)) throw error;
      }
      if (Date.now() >= deadline) return false;
      await sleep(READY_POLL_MS);
    }
  }
}
