// ============================================================================
// FIELD VOCABULARY
// ============================================================================
// Header synonyms, value vocabularies and control labels loaded from
// configs/field-vocabulary.json

import fs from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import { CORE_FIELDS, OPTIONAL_FIELDS } from '../../shared/types.js';
import type { FieldName } from '../../shared/types.js';

export const CONFIGS_DIR = fileURLToPath(new URL('../../../configs/', import.meta.url));

const FieldNameSchema = z.enum([...CORE_FIELDS, ...OPTIONAL_FIELDS]);

const VocabularyEntrySchema = z.object({
  canonical: z.string().min(1),
  /** All keywords must appear as whole words in the uppercased value */
  keywords: z.array(z.string().min(1)).min(1),
});

const IndicatorEntrySchema = z.object({
  canonical: z.string().min(1),
  /** Any token contained in a lowercased class name matches */
  tokens: z.array(z.string().min(1)).min(1),
});

export const FieldVocabularySchema = z.object({
  headerSynonyms: z.record(FieldNameSchema, z.array(z.string().min(1))),
  positionalOrder: z.array(FieldNameSchema).min(1),
  dateSlots: z.array(FieldNameSchema),
  personSlots: z.array(FieldNameSchema),
  statusVocabulary: z.array(VocabularyEntrySchema).min(1),
  statusNoise: z.array(z.string()).default([]),
  priorityVocabulary: z.array(VocabularyEntrySchema).min(1),
  indicatorClasses: z.object({
    priority: z.array(IndicatorEntrySchema),
    status: z.array(IndicatorEntrySchema),
  }),
  controlLabels: z.object({
    showMore: z.array(z.string().min(1)),
    nextPage: z.array(z.string().min(1)),
  }),
  titleArtifacts: z.array(z.string().min(1)),
  monthTokens: z.array(z.string().min(1)),
  userIdPattern: z.string().min(1),
});

export type FieldVocabularyData = z.infer<typeof FieldVocabularySchema>;
export type VocabularyEntry = z.infer<typeof VocabularyEntrySchema>;
export type IndicatorEntry = z.infer<typeof IndicatorEntrySchema>;

/**
 * Validated vocabulary with synonyms indexed per canonical field
 */
export class FieldVocabulary {
  readonly data: FieldVocabularyData;
  readonly userIdPattern: RegExp;
  private synonymIndex: Map<FieldName, string[]> = new Map();

  constructor(data: FieldVocabularyData) {
    this.data = data;
    this.userIdPattern = new RegExp(data.userIdPattern);

    for (const field of FieldNameSchema.options) {
      const synonyms = data.headerSynonyms[field] ?? [];
      if (synonyms.length > 0) {
        this.synonymIndex.set(
          field,
          synonyms.map((s) => s.trim().toUpperCase())
        );
      }
    }
  }

  static fromJSON(raw: unknown): FieldVocabulary {
    const parsed = FieldVocabularySchema.safeParse(raw);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
      throw new Error(`Invalid field vocabulary config: ${issues}`);
    }
    return new FieldVocabulary(parsed.data);
  }

  static load(filePath: string = path.join(CONFIGS_DIR, 'field-vocabulary.json')): FieldVocabulary {
    const content = fs.readFileSync(filePath, 'utf-8');
    const vocabulary = FieldVocabulary.fromJSON(JSON.parse(content));
    console.log(`[FieldVocabulary] Loaded ${vocabulary.synonymIndex.size} fields from ${path.basename(filePath)}`);
    return vocabulary;
  }

  /** Uppercased synonyms, in declaration order */
  synonymsFor(field: FieldName): readonly string[] {
    return this.synonymIndex.get(field) ?? [];
  }

  /** Fields with at least one synonym, in canonical order */
  mappableFields(): FieldName[] {
    return [...this.synonymIndex.keys()];
  }
}

let defaultVocabulary: FieldVocabulary | null = null;

/**
 * Shared vocabulary from the bundled configs directory (loaded once)
 */
export function getDefaultVocabulary(): FieldVocabulary {
  if (!defaultVocabulary) {
    defaultVocabulary = FieldVocabulary.load();
  }
  return defaultVocabulary;
}
