/**
 * Read contract with the persistence layer, plus the row mapping and the
 * lossless CompositeScore wire format it stores.
 */
import { z } from "zod";
import { fromError } from "zod-validation-error";
import type { CompositeScore, GeneEvidenceRecord, GeneScoringOutput } from "@/types/evidence";
import { USE_CASES } from "@/types/evidence";
import type { StoredGeneContext, StoredGeneScores, StoredScoreRow } from "@/types/analytics";
import { ScoringContractError } from "@/lib/errors";

export interface ScoreStore {
  /** Resolves to null when nothing has been stored for the gene. */
  getStoredScores(geneSymbol: string): Promise<StoredGeneScores | null>;
}

// ─── Rows ────────────────────────────────────────────────────

function toRow(
  output: GeneScoringOutput,
  drugId: string | null,
  score: CompositeScore,
): StoredScoreRow {
  return {
    gene_symbol: output.gene_symbol,
    drug_id: drugId,
    use_case: score.use_case,
    evidence_score: score,
    confidence_lower: score.confidence_interval[0],
    confidence_upper: score.confidence_interval[1],
    evidence_count: output.evidence_count,
    evidence_quality: score.evidence_quality,
    scoring_version: output.scoring_version,
  };
}

/**
 * One gene-level row per use case, then one therapeutic-targeting row per
 * drug carrying the proxy composite.
 */
export function toStoredScoreRows(output: GeneScoringOutput): StoredScoreRow[] {
  const rows = USE_CASES.map((useCase) => toRow(output, null, output.use_case_scores[useCase]));
  for (const drugId of Object.keys(output.drug_specific_scores)) {
    rows.push(toRow(output, drugId, output.use_case_scores.therapeutic_targeting));
  }
  return rows;
}

export function toStoredGeneContext(record: GeneEvidenceRecord): StoredGeneContext {
  return structuredClone({
    drugs: record.drugs,
    pathways: record.pathways,
    go_terms: record.go_terms,
    source_references: record.source_references,
  });
}

// ─── Wire format ─────────────────────────────────────────────

const score = z.number().finite().nonnegative();

const compositeScoreSchema = z.object({
  overall_score: score,
  component_scores: z.object({
    clinical: score,
    mechanistic: score,
    publication: score,
    genomic: score,
    safety: score,
  }),
  confidence_interval: z.tuple([score, score]),
  evidence_quality: z.number().finite().min(0).max(1),
  use_case: z.enum(["drug_repurposing", "biomarker_discovery", "pathway_analysis", "therapeutic_targeting"]),
  scoring_version: z.string(),
});

export function serializeCompositeScore(composite: CompositeScore): string {
  const { overall_score, component_scores, confidence_interval, evidence_quality, use_case, scoring_version } =
    composite;
  return JSON.stringify({
    overall_score,
    component_scores: {
      clinical: component_scores.clinical,
      mechanistic: component_scores.mechanistic,
      publication: component_scores.publication,
      genomic: component_scores.genomic,
      safety: component_scores.safety,
    },
    confidence_interval,
    evidence_quality,
    use_case,
    scoring_version,
  });
}

/** Accepts the serialized string or an already-decoded JSON value. */
export function parseCompositeScore(input: unknown): CompositeScore {
  let value = input;
  if (typeof input === "string") {
    try {
      value = JSON.parse(input);
    } catch (err) {
      throw new ScoringContractError(
        `Stored composite score is not valid JSON: ${err instanceof Error ? err.message : String(err)}`,
      );
    }
  }
  const parsed = compositeScoreSchema.safeParse(value);
  if (!parsed.success) {
    throw new ScoringContractError(fromError(parsed.error, { prefix: "Invalid stored composite score" }).toString());
  }
  return parsed.data;
}

// ─── In-memory store ─────────────────────────────────────────

interface StoredEntry {
  rows: Array<Omit<StoredScoreRow, "evidence_score"> & { evidence_score: string }>;
  context: StoredGeneContext;
}

/** Keeps rows in their serialized form, so every read goes through the wire format. */
export class InMemoryScoreStore implements ScoreStore {
  private readonly genes = new Map<string, StoredEntry>();

  save(output: GeneScoringOutput, record: GeneEvidenceRecord): void {
    this.saveRows(output.gene_symbol, toStoredScoreRows(output), toStoredGeneContext(record));
  }

  /** Replaces anything previously stored for the gene. */
  saveRows(geneSymbol: string, rows: readonly StoredScoreRow[], context: StoredGeneContext): void {
    this.genes.set(geneSymbol, {
      rows: rows.map((row) => ({ ...row, evidence_score: serializeCompositeScore(row.evidence_score) })),
      context: structuredClone(context),
    });
  }

  get size(): number {
    return this.genes.size;
  }

  async getStoredScores(geneSymbol: string): Promise<StoredGeneScores | null> {
    const entry = this.genes.get(geneSymbol);
    if (!entry || entry.rows.length === 0) return null;
    return {
      gene_symbol: geneSymbol,
      rows: entry.rows.map((row) => ({ ...row, evidence_score: parseCompositeScore(row.evidence_score) })),
      context: structuredClone(entry.context),
    };
  }
}
