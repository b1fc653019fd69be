/** Builders for hand-made stored score rows used by the analytics suites. */
import type { CompositeScore, EvidenceDomain, UseCase } from "@/types/evidence";
import type { StoredGeneContext, StoredScoreRow } from "@/types/analytics";

export function composite(
  useCase: UseCase,
  overall: number,
  components: Record<EvidenceDomain, number>,
): CompositeScore {
  return {
    overall_score: overall,
    component_scores: { ...components },
    confidence_interval: [Math.max(0, overall - 2), overall + 2],
    evidence_quality: 0.5,
    use_case: useCase,
    scoring_version: "1.0",
  };
}

export function row(
  gene: string,
  drugId: string | null,
  score: CompositeScore,
  evidenceCount: number,
): StoredScoreRow {
  return {
    gene_symbol: gene,
    drug_id: drugId,
    use_case: score.use_case,
    evidence_score: score,
    confidence_lower: score.confidence_interval[0],
    confidence_upper: score.confidence_interval[1],
    evidence_count: evidenceCount,
    evidence_quality: score.evidence_quality,
    scoring_version: score.scoring_version,
  };
}

export function emptyContext(): StoredGeneContext {
  return { drugs: {}, pathways: [], go_terms: {}, source_references: {} };
}

// ─── Panel genes ─────────────────────────────────────────────

const STRONG_COMPONENTS = { clinical: 24, mechanistic: 10, publication: 8, genomic: 6, safety: 6 };
const WEAK_COMPONENTS = { clinical: 3, mechanistic: 2, publication: 1, genomic: 0, safety: 0 };

/** Priority-panel gene with strong, consistent evidence and two drugs. */
export function strongGene(symbol = "BRCA1"): { rows: StoredScoreRow[]; context: StoredGeneContext } {
  return {
    rows: [
      row(symbol, null, composite("drug_repurposing", 65, STRONG_COMPONENTS), 12),
      row(symbol, null, composite("biomarker_discovery", 50, STRONG_COMPONENTS), 12),
      row(symbol, null, composite("pathway_analysis", 40, STRONG_COMPONENTS), 12),
      row(symbol, null, composite("therapeutic_targeting", 55, STRONG_COMPONENTS), 12),
      row(symbol, "olap", composite("therapeutic_targeting", 60, STRONG_COMPONENTS), 12),
      row(symbol, "olap", composite("therapeutic_targeting", 50, STRONG_COMPONENTS), 12),
      row(symbol, "cisp", composite("therapeutic_targeting", 70, STRONG_COMPONENTS), 12),
    ],
    context: {
      drugs: {
        olap: { name: "Olaparib-test", max_phase: 4, mechanism: "PARP inhibitor" },
        cisp: { name: "Cisplatin-test" },
      },
      pathways: ["Homology directed repair"],
      go_terms: { "GO:TEST1": { term: "double-strand break repair", aspect: "biological_process" } },
      source_references: { pubmed: [{ pmid: "1" }], pharmgkb: [{ pmid: "2" }] },
    },
  };
}

/** Gene outside every priority panel with one weak use-case score. */
export function weakGene(symbol = "GENEX"): { rows: StoredScoreRow[]; context: StoredGeneContext } {
  return {
    rows: [row(symbol, null, composite("therapeutic_targeting", 12, WEAK_COMPONENTS), 1)],
    context: emptyContext(),
  };
}
