/**
 * Boundary parsing for per-gene evidence records.
 *
 * Collectors assemble these records from loosely structured JSON columns, so
 * parsing is lenient about shape: an entry that is not a mapping (or a list
 * where a list is expected) is skipped and reported as a RecordIssue. Drug
 * fields are checked one at a time, so a bad field drops only itself. Facts
 * that are present but negative or non-finite are caller bugs and raise
 * EvidenceRecordError.
 */
import { z, type ZodError } from "zod";
import type {
  ClinicalAnnotation,
  ClinicalTrial,
  DrugEvidence,
  GeneEvidenceRecord,
  GoTermEvidence,
  PharmgkbPathwayEvidence,
  PharmgkbVariantEvidence,
  PublicationFact,
} from "@/types/evidence";
import { EvidenceRecordError } from "@/lib/errors";

export interface RecordIssue {
  path: string;
  message: string;
}

export interface ParsedEvidenceRecord {
  record: GeneEvidenceRecord;
  issues: RecordIssue[];
}

// ─── Schemas ─────────────────────────────────────────────────

type Schema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

const fact = z.number().finite().nonnegative();
const text = z.string().nullish();

const clinicalAnnotationSchema: Schema<ClinicalAnnotation> = z.object({
  evidence_level: z.union([z.string(), z.number().transform(String)]).nullish(),
  clinical_significance: text,
  phenotype_category: text,
});

const clinicalTrialSchema: Schema<ClinicalTrial> = z.object({
  phase: fact.nullish(),
  nct_id: text,
});

const phaseSchema = z.union([fact, z.string()]);

const goTermSchema: Schema<GoTermEvidence> = z.object({
  term: text,
  aspect: text,
});

const publicationSchema: Schema<PublicationFact> = z.object({
  pmid: z.union([z.string(), z.number().transform(String)]).nullish(),
  title: text,
  year: fact.nullish(),
});

const pharmgkbPathwaySchema: Schema<PharmgkbPathwayEvidence> = z.object({
  name: text,
  clinical_relevance: z.object({ cancer_relevance: z.boolean().nullish() }).nullish(),
});

const variantList = z.array(z.unknown()).transform((items) => structuredClone(items)).nullish();

const pharmgkbVariantSchema: Schema<PharmgkbVariantEvidence> = z.object({
  summary: z.object({
    high_impact_variants: fact.nullish(),
    clinical_actionable: fact.nullish(),
    max_pharmacogenomic_score: fact.nullish(),
  }).nullish(),
  cyp450_variants: variantList,
  cancer_relevant_variants: variantList,
});

// ─── Helpers ─────────────────────────────────────────────────

function isMapping(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

/** Negative or non-finite numbers are contract violations; anything else is a shape problem. */
function isFactViolation(error: ZodError): boolean {
  return error.issues.some((issue) => {
    if (issue.code === "too_small" || issue.code === "not_finite") return true;
    if (issue.code === "invalid_union") return issue.unionErrors.some(isFactViolation);
    return issue.code === "invalid_type" && issue.received === "nan";
  });
}

class RecordParser {
  readonly issues: RecordIssue[] = [];

  skip(path: string, message: string): void {
    this.issues.push({ path, message });
  }

  entry<T>(path: string, value: unknown, schema: Schema<T>): T | null {
    const result = schema.safeParse(value);
    if (result.success) return result.data;
    if (isFactViolation(result.error)) {
      throw EvidenceRecordError.fromZod(path, result.error);
    }
    this.skip(path, result.error.issues[0]?.message ?? "malformed entry");
    return null;
  }

  /** Parse one field on its own; a malformed value is dropped, the rest of the entry is kept. */
  field<T>(path: string, value: unknown, schema: Schema<T>): T | undefined {
    if (value == null) return undefined;
    return this.entry(path, value, schema) ?? undefined;
  }

  list<T>(path: string, value: unknown, schema: Schema<T>): T[] | undefined {
    if (value == null) return undefined;
    if (!Array.isArray(value)) {
      this.skip(path, "expected a list");
      return undefined;
    }
    const out: T[] = [];
    value.forEach((item, i) => {
      const parsed = this.entry(`${path}[${i}]`, item, schema);
      if (parsed !== null) out.push(parsed);
    });
    return out;
  }

  drug(path: string, raw: Record<string, unknown>): DrugEvidence {
    return {
      name: this.field(`${path}.name`, raw.name, z.string()),
      clinical_phase: this.field(`${path}.clinical_phase`, raw.clinical_phase, phaseSchema),
      max_phase: this.field(`${path}.max_phase`, raw.max_phase, fact),
      source: this.field(`${path}.source`, raw.source, z.string()),
      mechanism: this.field(`${path}.mechanism`, raw.mechanism, z.string()),
      clinical_annotations: this.list(`${path}.clinical_annotations`, raw.clinical_annotations, clinicalAnnotationSchema),
      clinical_trials: this.list(`${path}.clinical_trials`, raw.clinical_trials, clinicalTrialSchema),
    };
  }

  mapping<T>(
    field: string,
    value: unknown,
    parse: (path: string, raw: Record<string, unknown>) => T | null,
  ): Record<string, T> {
    const out: Record<string, T> = {};
    if (value == null) return out;
    if (!isMapping(value)) {
      this.skip(field, "expected a mapping");
      return out;
    }
    for (const [key, raw] of Object.entries(value)) {
      const path = `${field}.${key}`;
      if (!isMapping(raw)) {
        this.skip(path, "expected a mapping");
        continue;
      }
      const parsed = parse(path, raw);
      if (parsed !== null) out[key] = parsed;
    }
    return out;
  }

  strings(field: string, value: unknown): string[] {
    if (value == null) return [];
    if (!Array.isArray(value)) {
      this.skip(field, "expected a list");
      return [];
    }
    const out: string[] = [];
    value.forEach((item, i) => {
      if (typeof item === "string") out.push(item);
      else this.skip(`${field}[${i}]`, "expected a string");
    });
    return out;
  }
}

// ─── Public API ──────────────────────────────────────────────

export function emptyEvidenceRecord(): GeneEvidenceRecord {
  return {
    drugs: {},
    pathways: [],
    go_terms: {},
    source_references: {},
    features: {},
    molecular_functions: [],
    pharmgkb_pathways: {},
    pharmgkb_variants: null,
  };
}

/**
 * Parse a raw record into a GeneEvidenceRecord. Never mutates `raw`; the
 * returned record shares no references with it.
 */
export function parseGeneEvidenceRecord(raw: unknown): ParsedEvidenceRecord {
  if (raw == null) return { record: emptyEvidenceRecord(), issues: [] };
  if (!isMapping(raw)) {
    throw new EvidenceRecordError("Evidence record must be a JSON object", "$");
  }

  const p = new RecordParser();

  const sourceReferences: Record<string, PublicationFact[]> = {};
  const refs = raw.source_references;
  if (refs != null && !isMapping(refs)) {
    p.skip("source_references", "expected a mapping");
  } else if (refs != null) {
    for (const [source, list] of Object.entries(refs)) {
      if (!Array.isArray(list)) {
        p.skip(`source_references.${source}`, "expected a list");
        continue;
      }
      const facts: PublicationFact[] = [];
      list.forEach((item, i) => {
        const path = `source_references.${source}[${i}]`;
        // Bare PMIDs are common in collector output.
        if (typeof item === "string" || typeof item === "number") {
          facts.push({ pmid: String(item) });
        } else if (isMapping(item)) {
          const parsed = p.entry(path, item, publicationSchema);
          if (parsed !== null) facts.push(parsed);
        } else {
          p.skip(path, "expected a publication mapping or identifier");
        }
      });
      sourceReferences[source] = facts;
    }
  }

  let features: Record<string, unknown> = {};
  const rawFeatures = raw.features;
  if (Array.isArray(rawFeatures)) {
    features = Object.fromEntries(rawFeatures.map((f, i) => [String(i), structuredClone(f)]));
  } else if (isMapping(rawFeatures)) {
    features = structuredClone(rawFeatures);
  } else if (rawFeatures != null) {
    p.skip("features", "expected a mapping or list");
  }

  let variants: PharmgkbVariantEvidence | null = null;
  const rawVariants = raw.pharmgkb_variants;
  if (isMapping(rawVariants)) {
    if (Object.keys(rawVariants).length > 0) {
      variants = p.entry("pharmgkb_variants", rawVariants, pharmgkbVariantSchema);
    }
  } else if (rawVariants != null) {
    p.skip("pharmgkb_variants", "expected a mapping");
  }

  const record: GeneEvidenceRecord = {
    drugs: p.mapping("drugs", raw.drugs, (path, entry) => p.drug(path, entry)),
    pathways: [...new Set(p.strings("pathways", raw.pathways))],
    go_terms: p.mapping("go_terms", raw.go_terms, (path, entry) => p.entry(path, entry, goTermSchema)),
    source_references: sourceReferences,
    features,
    molecular_functions: p.strings("molecular_functions", raw.molecular_functions),
    pharmgkb_pathways: p.mapping(
      "pharmgkb_pathways",
      raw.pharmgkb_pathways,
      (path, entry) => p.entry(path, entry, pharmgkbPathwaySchema),
    ),
    pharmgkb_variants: variants,
  };

  return { record, issues: p.issues };
}

/** Convenience for callers that only want the record and log issues elsewhere. */
export function toGeneEvidenceRecord(raw: unknown): GeneEvidenceRecord {
  return parseGeneEvidenceRecord(raw).record;
}

/** True when the record carries at least one fact of any kind. */
export function hasAnyEvidence(record: GeneEvidenceRecord): boolean {
  return (
    Object.keys(record.drugs).length > 0
    || record.pathways.length > 0
    || Object.keys(record.go_terms).length > 0
    || Object.values(record.source_references).some((refs) => refs.length > 0)
    || Object.keys(record.features).length > 0
    || record.molecular_functions.length > 0
    || Object.keys(record.pharmgkb_pathways).length > 0
    || record.pharmgkb_variants !== null
  );
}
