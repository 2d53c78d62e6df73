// ============================================================================
// LIBRARY ENTRY
// ============================================================================

export { IssueExtractionEngine } from './scraper/IssueExtractionEngine.js';
export type { EngineOptions, ExtractionRunResult, SkippedRow } from './scraper/IssueExtractionEngine.js';

export { LocatorChain, describeStrategy } from './scraper/locator/LocatorChain.js';
export type { ResolveResult, ResolveAllResult, ElementAction, ActionResult } from './scraper/locator/LocatorChain.js';
export { TableSchemaInference, inferSchema, matchHeaders } from './scraper/schema/TableSchemaInference.js';
export { LazyLoadConvergence, adaptiveDelay, isSatisfied } from './scraper/handlers/LazyLoadConvergence.js';
export type { LoadProgress } from './scraper/handlers/LazyLoadConvergence.js';
export { CountProbe, parseCountCaption, parseBadge } from './scraper/handlers/CountProbe.js';
export { PaginationHandler } from './scraper/handlers/PaginationHandler.js';
export { RowExtractor } from './scraper/extract/RowExtractor.js';
export { normalizeRecord, normalizeField, cleanTitle } from './scraper/utils/ValueNormalizer.js';
export { rowSignature, computeDuplicateStats } from './scraper/utils/RowSignature.js';
export * from './scraper/types/errors.js';

export { EngineConfigSchema, DEFAULT_ENGINE_CONFIG, resolveEngineConfig, loadEngineConfigFromEnv } from './config/EngineConfig.js';
export type { EngineConfig, EngineConfigInput } from './config/EngineConfig.js';
export { LocatorCatalog, getDefaultCatalog } from './config/LocatorCatalog.js';
export { FieldVocabulary, getDefaultVocabulary } from './config/FieldVocabulary.js';

export type { PageHandle, ElementHandle, ScrollTarget, JsonValue } from './page/PageHandle.js';
export { DomPageHandle } from './page/DomPageHandle.js';
export { PlaywrightPageHandle } from './page/PlaywrightPageHandle.js';

export { ExtractionProgress, attachConsoleReporter } from './progress/ExtractionProgress.js';
export type { ExtractionPhase, ProgressEvents } from './progress/ExtractionProgress.js';

export * from '../shared/types.js';
