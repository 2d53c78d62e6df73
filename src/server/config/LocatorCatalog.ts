// ============================================================================
// LOCATOR CATALOG
// ============================================================================
// Declarative QuerySpec table per logical UI target, loaded from
// configs/locators.json. New UI variants are added by appending strategies.

import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import { CONFIGS_DIR } from './FieldVocabulary.js';
import type { LocatorStrategy, QuerySpec } from '../../shared/types.js';

const ScriptArgSchema = z.record(
  z.union([z.string(), z.number(), z.boolean(), z.array(z.string())])
);

const StrategySchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('css'), selector: z.string().min(1), description: z.string().optional() }),
  z.object({ kind: z.literal('xpath'), selector: z.string().min(1), description: z.string().optional() }),
  z.object({
    kind: z.literal('text'),
    pattern: z.string().min(1),
    tag: z.string().optional(),
    exact: z.boolean().optional(),
    description: z.string().optional(),
  }),
  z.object({
    kind: z.literal('role'),
    role: z.string().min(1),
    name: z.string().optional(),
    description: z.string().optional(),
  }),
  z.object({
    kind: z.literal('script'),
    script: z.string().min(1),
    arg: ScriptArgSchema.optional(),
    description: z.string().optional(),
  }),
]);

const QuerySpecSchema = z.object({
  target: z.string().min(1),
  description: z.string().optional(),
  strategies: z.array(StrategySchema).min(1),
  excludeWithin: z.array(z.string().min(1)).optional(),
  requireInteractable: z.boolean().optional(),
});

export const LocatorTableSchema = z.object({
  /** Targets activated in order before loading (absence is not an error) */
  navigation: z.array(z.string()).default([]),
  targets: z.array(QuerySpecSchema).min(1),
});

export type LocatorTable = z.infer<typeof LocatorTableSchema>;

/** Targets the engine cannot run without */
export const REQUIRED_TARGETS = ['issueRows', 'headerRow', 'headerCells', 'showMore', 'nextPage'] as const;

function freezeSpec(spec: QuerySpec): QuerySpec {
  return Object.freeze({
    ...spec,
    strategies: Object.freeze(spec.strategies.map((s) => Object.freeze({ ...s }))),
    excludeWithin: spec.excludeWithin ? Object.freeze([...spec.excludeWithin]) : undefined,
  });
}

/**
 * Immutable, validated index of QuerySpecs by target name
 */
export class LocatorCatalog {
  private specs: Map<string, QuerySpec> = new Map();
  private navigation: string[];

  constructor(table: LocatorTable) {
    for (const spec of table.targets) {
      if (this.specs.has(spec.target)) {
        throw new Error(`Invalid locator table: duplicate target "${spec.target}"`);
      }
      this.specs.set(spec.target, freezeSpec(spec));
    }

    const missing = REQUIRED_TARGETS.filter((t) => !this.specs.has(t));
    if (missing.length > 0) {
      throw new Error(`Invalid locator table: missing targets ${missing.join(', ')}`);
    }

    const unknownNav = table.navigation.filter((t) => !this.specs.has(t));
    if (unknownNav.length > 0) {
      throw new Error(`Invalid locator table: unknown navigation targets ${unknownNav.join(', ')}`);
    }
    this.navigation = [...table.navigation];
  }

  static fromJSON(raw: unknown): LocatorCatalog {
    const parsed = LocatorTableSchema.safeParse(raw);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
      throw new Error(`Invalid locator table config: ${issues}`);
    }
    return new LocatorCatalog(parsed.data);
  }

  static load(filePath: string = path.join(CONFIGS_DIR, 'locators.json')): LocatorCatalog {
    const content = fs.readFileSync(filePath, 'utf-8');
    const catalog = LocatorCatalog.fromJSON(JSON.parse(content));
    console.log(`[LocatorCatalog] Loaded ${catalog.specs.size} targets from ${path.basename(filePath)}`);
    return catalog;
  }

  get(target: string): QuerySpec {
    const spec = this.specs.get(target);
    if (!spec) {
      throw new Error(`Locator target not found in config: ${target}`);
    }
    return spec;
  }

  has(target: string): boolean {
    return this.specs.has(target);
  }

  targets(): string[] {
    return [...this.specs.keys()];
  }

  navigationTargets(): QuerySpec[] {
    return this.navigation.map((t) => this.get(t));
  }

  /**
   * New catalog with extra strategies appended to existing targets
   * (or new targets created from them)
   */
  extend(additions: Record<string, LocatorStrategy[]>, navigation?: string[]): LocatorCatalog {
    const targets: QuerySpec[] = [...this.specs.values()].map((spec) => ({
      ...spec,
      strategies: [...spec.strategies, ...(additions[spec.target] ?? [])],
    }));

    for (const [target, strategies] of Object.entries(additions)) {
      if (!this.specs.has(target) && strategies.length > 0) {
        targets.push({ target, strategies });
      }
    }

    return new LocatorCatalog({
      navigation: navigation ?? this.navigation,
      targets: targets.map((t) => ({
        ...t,
        strategies: [...t.strategies],
        excludeWithin: t.excludeWithin ? [...t.excludeWithin] : undefined,
      })),
    });
  }
}

let defaultCatalog: LocatorCatalog | null = null;

/**
 * Shared catalog from the bundled configs directory (loaded once)
 */
export function getDefaultCatalog(): LocatorCatalog {
  if (!defaultCatalog) {
    defaultCatalog = LocatorCatalog.load();
  }
  return defaultCatalog;
}
