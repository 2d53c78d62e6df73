// ============================================================================
// SHARED TYPES - Issue Table Extraction
// ============================================================================

// Canonical Fields
export const CORE_FIELDS = [
  'Title',
  'Type',
  'Priority',
  'Status',
  'Deadline',
  'Due Date',
  'Created By',
  'Created On',
] as const;

export const OPTIONAL_FIELDS = [
  'ID',
  'Description',
  'Category',
  'Component',
  'Assigned To',
  'Processor',
  'Reporter',
  'Last Changed By',
  'Last Changed On',
  'Closed On',
  'Start Date',
  'Project',
  'Customer',
  'Impact',
  'Resolution',
  'Phase',
  'Tags',
  'Comments',
] as const;

export type CoreField = (typeof CORE_FIELDS)[number];
export type OptionalField = (typeof OPTIONAL_FIELDS)[number];
export type FieldName = CoreField | OptionalField;

export const ALL_FIELDS: readonly FieldName[] = [...CORE_FIELDS, ...OPTIONAL_FIELDS];

/** Fields whose values are expected to look like dates */
export const DATE_FIELDS: readonly FieldName[] = [
  'Deadline',
  'Due Date',
  'Created On',
  'Last Changed On',
  'Closed On',
  'Start Date',
];

/** Fields that hold a person / user id */
export const PERSON_FIELDS: readonly FieldName[] = [
  'Created By',
  'Assigned To',
  'Processor',
  'Reporter',
  'Last Changed By',
];

export function isFieldName(value: string): value is FieldName {
  return (ALL_FIELDS as readonly string[]).includes(value);
}

// Locator Types
export type StructuralQuery =
  | { kind: 'css'; selector: string }
  | { kind: 'xpath'; selector: string }
  | { kind: 'text'; pattern: string; tag?: string; exact?: boolean }
  | { kind: 'role'; role: string; name?: string };

/** JSON arguments handed to a page script */
export type ScriptArg = Record<string, string | number | boolean | string[]>;

export interface ScriptQuery {
  kind: 'script';
  /** Name of a registered page script (see PageScripts) */
  script: string;
  arg?: ScriptArg;
}

export type LocatorStrategy = (StructuralQuery | ScriptQuery) & {
  description?: string;
};

/**
 * Ordered list of strategies for one logical UI target.
 * Strategies are tried in order and the first usable match wins.
 */
export interface QuerySpec {
  target: string;
  description?: string;
  strategies: readonly LocatorStrategy[];
  /** Candidates nested inside any of these CSS selectors are rejected */
  excludeWithin?: readonly string[];
  /** Also require the candidate to be enabled (not disabled / aria-disabled) */
  requireInteractable?: boolean;
}

// Schema Types
export type SchemaSource = 'header' | 'positional' | 'mixed';

export interface SchemaMap {
  /** Canonical field -> column index; absent means unmapped */
  readonly columns: Readonly<Partial<Record<FieldName, number>>>;
  readonly source: SchemaSource;
  /** Header texts (uppercased) that matched no known synonym */
  readonly unmatchedHeaders: readonly string[];
  /** Number of cells in the representative row */
  readonly cellCount: number;
}

// Record Types
export type IssueRecord = Readonly<Record<string, string>>;

export type RowOutcome =
  | { kind: 'record'; record: IssueRecord; rowIndex: number }
  | { kind: 'skip'; reason: string; rowIndex: number };

// Load Types
export interface LoadState {
  previousCount: number;
  noChangeStreak: number;
  iteration: number;
  targetEstimate: number;
  bestCount: number;
  recoveries: number;
}

export type ConvergenceState = 'satisfied' | 'stagnant' | 'exhausted';

export interface ConvergenceResult {
  finalRowCount: number;
  state: ConvergenceState;
  iterations: number;
  recoveries: number;
  targetEstimate: number;
  /** Row count observed after each iteration */
  history: number[];
}

export type TargetEstimateSource = 'override' | 'caption' | 'badge' | 'visible-rows' | 'default';

export interface TargetEstimate {
  value: number;
  source: TargetEstimateSource;
}

// Run Results
export type RunStatus = 'complete' | 'partial' | 'empty';

export interface ExtractionStats {
  runId: string;
  rowsAttempted: number;
  rowsExtracted: number;
  rowsSkipped: number;
  duplicateTitleCount: number;
  duplicateSignatureCount: number;
  pagesProcessed: number;
  targetEstimate: TargetEstimate;
  convergence: ConvergenceResult[];
  schema: SchemaMap | null;
  durationMs: number;
}
