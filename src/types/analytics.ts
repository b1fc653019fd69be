/** TypeScript interfaces for stored score rows and the analytics built on them. */

import type {
  CompositeScore,
  DrugEvidence,
  GoTermEvidence,
  PublicationFact,
  UseCase,
} from "./evidence";

// ─── Stored rows (persistence contract) ──────────────────────

export interface StoredScoreRow {
  gene_symbol: string;
  /** null for gene-level rows; the drug key for drug-level rows. */
  drug_id: string | null;
  use_case: UseCase;
  evidence_score: CompositeScore;
  confidence_lower: number;
  confidence_upper: number;
  evidence_count: number;
  evidence_quality: number;
  scoring_version: string;
}

/** Gene context read back alongside the stored rows. */
export interface StoredGeneContext {
  drugs: Record<string, DrugEvidence>;
  pathways: string[];
  go_terms: Record<string, GoTermEvidence>;
  source_references: Record<string, PublicationFact[]>;
}

export interface StoredGeneScores {
  gene_symbol: string;
  rows: StoredScoreRow[];
  context: StoredGeneContext;
}

// ─── Gene analytics ──────────────────────────────────────────

export interface TopDrug {
  drug_id: string;
  name: string;
  avg_score: number;
  max_phase: number;
  mechanism: string;
}

export interface GeneAnalyticsProfile {
  gene_symbol: string;
  total_evidence_items: number;
  evidence_diversity_score: number;
  clinical_strength: number;
  mechanistic_depth: number;
  publication_support: number;
  genomic_relevance: number;
  safety_profile: number;
  cross_validation_score: number;
  recommendation_confidence: number;
  /** Use case → overall score, highest first. */
  use_case_rankings: Array<{ use_case: UseCase; score: number }>;
  top_drugs: TopDrug[];
  evidence_gaps: string[];
  recommendations: string[];
}

// ─── Comparative analytics ───────────────────────────────────

export interface ConfidenceRankingEntry {
  gene: string;
  confidence: number;
  evidence_items: number;
}

export interface ClinicalRankingEntry {
  gene: string;
  clinical_strength: number;
  top_drugs_count: number;
}

export interface DiversityRankingEntry {
  gene: string;
  diversity_score: number;
  evidence_gaps_count: number;
}

export interface GeneRankings {
  by_confidence: ConfidenceRankingEntry[];
  by_clinical_strength: ClinicalRankingEntry[];
  by_evidence_diversity: DiversityRankingEntry[];
}

export interface UseCaseGeneScore {
  gene: string;
  score: number;
  confidence: number;
}

export interface UseCaseComparison {
  gene_count: number;
  avg_score: number;
  std_score: number;
  top_genes: UseCaseGeneScore[];
  score_distribution: {
    high: number;
    medium: number;
    low: number;
  };
}

export interface EvidenceQualityDistribution {
  confidence_distribution: {
    mean: number;
    median: number;
    std: number;
    high_confidence_count: number;
    medium_confidence_count: number;
    low_confidence_count: number;
  };
  diversity_distribution: {
    mean: number;
    median: number;
    high_diversity_count: number;
  };
  evidence_volume: {
    mean_evidence_items: number;
    median_evidence_items: number;
    well_evidenced_count: number;
  };
}

export type ReadinessCategory =
  | "ready_for_clinical"
  | "ready_for_preclinical"
  | "requires_basic_research"
  | "insufficient_evidence";

export type ResearchType =
  | "clinical_trials"
  | "mechanism_studies"
  | "literature_validation"
  | "safety_assessment";

export interface ResearchOpportunity {
  gene: string;
  opportunity_score: number;
  research_types_needed: ResearchType[];
  evidence_gaps_count: number;
  confidence: number;
  priority_areas: string[];
}

export interface SkippedGene {
  gene: string;
  reason: "no_stored_scores" | "store_error";
}

export interface ComparativeAnalysis {
  total_genes_analyzed: number;
  analysis_date: string;
  gene_rankings: GeneRankings;
  use_case_comparison: Partial<Record<UseCase, UseCaseComparison>>;
  evidence_quality_distribution: EvidenceQualityDistribution;
  clinical_readiness_assessment: Record<ReadinessCategory, string[]>;
  research_priorities: ResearchOpportunity[];
  portfolio_recommendations: string[];
  skipped_genes: SkippedGene[];
}

export interface AnalyticsError {
  error: string;
  skipped_genes: SkippedGene[];
}

export type ComparativeAnalysisResult = ComparativeAnalysis | AnalyticsError;

export interface GeneProfileSummary {
  summary_metrics: {
    confidence: number;
    clinical_strength: number;
    evidence_diversity: number;
    total_evidence: number;
  };
  use_case_rankings: GeneAnalyticsProfile["use_case_rankings"];
  top_drugs: TopDrug[];
  evidence_gaps: string[];
  recommendations: string[];
}

export interface AnalyticsReport {
  report_metadata: {
    generated_date: string;
    gene_count: number;
    genes_analyzed: string[];
    scoring_system_version: string;
  };
  executive_summary: {
    total_genes_analyzed: number;
    clinical_readiness: Record<ReadinessCategory, string[]>;
    top_priorities: ResearchOpportunity[];
    portfolio_recommendations: string[];
  };
  detailed_analysis: ComparativeAnalysis;
  individual_gene_profiles: Record<string, GeneProfileSummary>;
}
