// ============================================================================
// ENGINE CONFIGURATION
// ============================================================================
// Timeouts, loop budgets and extraction limits passed into the engine

import { z } from 'zod';
import { DEFAULT_RETRY_CONFIG, EngineErrorType } from '../scraper/types/errors.js';

const TimeoutsSchema = z.object({
  /** Element queries and reads */
  queryMs: z.number().int().nonnegative().default(5000),
  /** Clicks, typing, key presses, scrolling */
  actionMs: z.number().int().nonnegative().default(5000),
  /** Page script evaluation */
  evaluateMs: z.number().int().nonnegative().default(10000),
  /** Waiting for the page to report ready */
  readyMs: z.number().int().nonnegative().default(30000),
});

const ConvergenceSchema = z.object({
  maxIterations: z.number().int().positive().default(100),
  /** Consecutive non-growing iterations before recovery / giving up */
  stagnationThreshold: z.number().int().positive().default(25),
  /** Fraction of the target estimate that counts as loaded */
  satisfiedRatio: z.number().gt(0).max(1).default(0.95),
  /** Press PageDown + End every N iterations */
  pagingKeyInterval: z.number().int().positive().default(3),
  /** Click a "show more" control every N iterations */
  showMoreInterval: z.number().int().positive().default(2),
  /** Escalated recovery rounds before declaring stagnation */
  recoveryAttempts: z.number().int().nonnegative().default(1),
  baseDelayMs: z.number().int().nonnegative().default(200),
  /** Added per stagnant iteration */
  stagnationStepMs: z.number().int().nonnegative().default(100),
  stagnationCapMs: z.number().int().nonnegative().default(1000),
  /** Added per loaded row */
  rowDelayPerRowMs: z.number().nonnegative().default(1),
  rowDelayCapMs: z.number().int().nonnegative().default(500),
  maxDelayMs: z.number().int().nonnegative().default(1000),
});

const EstimateSchema = z.object({
  defaultEstimate: z.number().int().positive().default(100),
  /** Applied to the visible row count when no count caption exists */
  multiplier: z.number().positive().default(1.5),
  ceiling: z.number().int().positive().default(5000),
});

const ExtractionSchema = z.object({
  maxFieldLength: z.number().int().min(4).default(500),
  emptyValue: z.string().default('N/A'),
  maxPages: z.number().int().positive().default(20),
  /** Header matches needed before the header mapping is trusted alone */
  minHeaderFields: z.number().int().positive().default(4),
  /** Rows fed to schema content inference */
  sampleSize: z.number().int().positive().default(3),
  /** Wait after clicking the next-page control */
  pageSettleMs: z.number().int().nonnegative().default(500),
  /** Turn on every column through the table settings dialog, when one exists */
  configureColumns: z.boolean().default(true),
});

const RetrySchema = z.object({
  maxRetries: z.number().int().nonnegative().default(DEFAULT_RETRY_CONFIG.maxRetries),
  retryDelay: z.number().int().nonnegative().default(DEFAULT_RETRY_CONFIG.retryDelay),
  backoffMultiplier: z.number().positive().default(DEFAULT_RETRY_CONFIG.backoffMultiplier),
  maxDelay: z.number().int().nonnegative().default(DEFAULT_RETRY_CONFIG.maxDelay),
  retriableTypes: z.array(z.nativeEnum(EngineErrorType)).default(DEFAULT_RETRY_CONFIG.retriableTypes),
});

export const EngineConfigSchema = z.object({
  timeouts: TimeoutsSchema.default({}),
  convergence: ConvergenceSchema.default({}),
  estimate: EstimateSchema.default({}),
  extraction: ExtractionSchema.default({}),
  retry: RetrySchema.default({}),
  /** Skips the count probe when set */
  targetCountOverride: z.number().int().positive().optional(),
});

export type EngineConfigInput = z.input<typeof EngineConfigSchema>;
export type EngineConfig = z.infer<typeof EngineConfigSchema>;

export const DEFAULT_ENGINE_CONFIG: EngineConfig = EngineConfigSchema.parse({});

/**
 * Validate a partial config and fill in defaults
 */
export function resolveEngineConfig(input: EngineConfigInput = {}): EngineConfig {
  const parsed = EngineConfigSchema.safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new Error(`Invalid engine config: ${issues}`);
  }
  return parsed.data;
}

function readInt(env: NodeJS.ProcessEnv, key: string): number | undefined {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') return undefined;
  const value = Number(raw);
  if (!Number.isInteger(value)) {
    console.warn(`[EngineConfig] Ignoring ${key}=${raw} (not an integer)`);
    return undefined;
  }
  return value;
}

// Drop undefined entries so they don't override defaults
function clean<T extends Record<string, number | undefined>>(section: T): Partial<T> {
  return Object.fromEntries(
    Object.entries(section).filter(([, v]) => v !== undefined)
  ) as Partial<T>;
}

/**
 * Overlay ISSUE_EXTRACTOR_* environment variables on a base input
 */
export function loadEngineConfigFromEnv(
  env: NodeJS.ProcessEnv = process.env,
  base: EngineConfigInput = {}
): EngineConfig {
  const convergence = clean({
    maxIterations: readInt(env, 'ISSUE_EXTRACTOR_MAX_ITERATIONS'),
    stagnationThreshold: readInt(env, 'ISSUE_EXTRACTOR_STAGNATION_THRESHOLD'),
  });
  const extraction = clean({
    maxPages: readInt(env, 'ISSUE_EXTRACTOR_MAX_PAGES'),
  });
  const timeouts = clean({
    queryMs: readInt(env, 'ISSUE_EXTRACTOR_QUERY_TIMEOUT_MS'),
  });
  const targetCountOverride = readInt(env, 'ISSUE_EXTRACTOR_TARGET_COUNT');

  return resolveEngineConfig({
    ...base,
    timeouts: { ...base.timeouts, ...timeouts },
    convergence: { ...base.convergence, ...convergence },
    extraction: { ...base.extraction, ...extraction },
    ...(targetCountOverride !== undefined ? { targetCountOverride } : {}),
  });
}
