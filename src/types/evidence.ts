/** Contract types for per-gene evidence records and the scores derived from them. */

export type EvidenceDomain =
  | "clinical"
  | "mechanistic"
  | "publication"
  | "genomic"
  | "safety";

export const EVIDENCE_DOMAINS: readonly EvidenceDomain[] = [
  "clinical",
  "mechanistic",
  "publication",
  "genomic",
  "safety",
];

export type UseCase =
  | "drug_repurposing"
  | "biomarker_discovery"
  | "pathway_analysis"
  | "therapeutic_targeting";

export const USE_CASES: readonly UseCase[] = [
  "drug_repurposing",
  "biomarker_discovery",
  "pathway_analysis",
  "therapeutic_targeting",
];

// ─── Input record ────────────────────────────────────────────

export interface ClinicalAnnotation {
  evidence_level?: string | null;
  clinical_significance?: string | null;
  phenotype_category?: string | null;
}

export interface ClinicalTrial {
  phase?: number | null;
  nct_id?: string | null;
}

export interface DrugEvidence {
  name?: string | null;
  /** Numeric ChEMBL-style phase or a repurposing-hub label ("Approved", "Phase 2", ...). */
  clinical_phase?: number | string | null;
  max_phase?: number | null;
  source?: string | null;
  mechanism?: string | null;
  clinical_annotations?: ClinicalAnnotation[] | null;
  clinical_trials?: ClinicalTrial[] | null;
}

export interface GoTermEvidence {
  term?: string | null;
  aspect?: string | null;
}

export interface PublicationFact {
  pmid?: string | null;
  title?: string | null;
  year?: number | null;
}

export interface PharmgkbPathwayEvidence {
  name?: string | null;
  clinical_relevance?: { cancer_relevance?: boolean | null } | null;
}

export interface PharmgkbVariantSummary {
  high_impact_variants?: number | null;
  clinical_actionable?: number | null;
  max_pharmacogenomic_score?: number | null;
}

export interface PharmgkbVariantEvidence {
  summary?: PharmgkbVariantSummary | null;
  cyp450_variants?: unknown[] | null;
  cancer_relevant_variants?: unknown[] | null;
}

/**
 * A gene's evidence after boundary parsing. Every field is present;
 * an empty container means "no evidence of this kind".
 */
export interface GeneEvidenceRecord {
  drugs: Record<string, DrugEvidence>;
  pathways: string[];
  go_terms: Record<string, GoTermEvidence>;
  source_references: Record<string, PublicationFact[]>;
  features: Record<string, unknown>;
  molecular_functions: string[];
  pharmgkb_pathways: Record<string, PharmgkbPathwayEvidence>;
  pharmgkb_variants: PharmgkbVariantEvidence | null;
}

// ─── Scores ──────────────────────────────────────────────────

export interface EvidenceComponent {
  type: string;
  score: number;
  detail: Record<string, number | string>;
}

export interface EvidenceBreakdown {
  components: EvidenceComponent[];
  evidence_count: number;
  bonuses: Record<string, number>;
}

export interface EvidenceScore {
  score: number;
  confidence: number;
  source: string;
  domain: EvidenceDomain;
  metadata: EvidenceBreakdown;
}

export interface CompositeScore {
  overall_score: number;
  component_scores: Record<EvidenceDomain, number>;
  confidence_interval: [number, number];
  evidence_quality: number;
  use_case: UseCase;
  scoring_version: string;
}

// ─── Batch output ────────────────────────────────────────────

export interface DrugSpecificScore {
  drug_name: string;
  score: number;
  source: string;
}

export interface GeneScoringOutput {
  gene_id: string;
  gene_symbol: string;
  evidence_scores: EvidenceScore[];
  use_case_scores: Record<UseCase, CompositeScore>;
  drug_specific_scores: Record<string, DrugSpecificScore>;
  evidence_count: number;
  scoring_version: string;
  last_updated: string;
}

export interface UseCaseStatistics {
  mean: number;
  median: number;
  high_confidence_genes: number;
  medium_confidence_genes: number;
  low_confidence_genes: number;
}

export interface ScoringRunSummary {
  total_genes_scored: number;
  overall_statistics: {
    mean: number;
    median: number;
    std: number;
    min: number;
    max: number;
  };
  use_case_statistics: Partial<Record<UseCase, UseCaseStatistics>>;
}
